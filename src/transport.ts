// Outbound HTTP round trippers and their composition

/**
 * Performs a single outbound HTTP exchange.
 */
export interface RoundTripper {
  roundTrip(request: Request): Promise<Response>;
}

export type TransportDecorator = (base: RoundTripper) => RoundTripper;

export type FetchFn = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

// Process-wide fallback used by decorators constructed without a base
export const defaultTransport: RoundTripper = {
  roundTrip: (request) => fetch(request)
};

/**
 * Wraps `base` with each decorator in turn, so the last one given ends up
 * outermost.
 */
export function composeTransports(
  base: RoundTripper,
  ...decorators: TransportDecorator[]
): RoundTripper {
  return decorators.reduce<RoundTripper>((inner, decorate) => decorate(inner), base);
}

export function asFetch(transport: RoundTripper): FetchFn {
  return (input, init) => transport.roundTrip(new Request(input, init));
}
