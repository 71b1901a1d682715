export * from './http';
export * from './transport';
