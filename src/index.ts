export * from './types/circuitbreaker';
export * from './types/auth';
export * from './circuitbreaker';
export * from './transport';
export * from './errors';
export * from './header';
export * from './logger';
export * from './context';
export * from './config';
export * from './standard';
export * from './resiliency';
export * from './logging';
export * from './metrics';
export * from './tracing';
export * from './cors';
export * from './auth';
export * from './validation';
export * from './admin';
