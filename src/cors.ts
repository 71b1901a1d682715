// CORS handling on hono/cors
import type { MiddlewareHandler } from 'hono';
import { cors } from 'hono/cors';

const ALLOW_METHODS = ['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE'];
const ALLOW_HEADERS = ['Accept', 'Content-Type'];
const EXPOSE_HEADERS = ['Cache-Control', 'Content-Security-Policy', 'Content-Type', 'Location'];

export interface CorsOptions {
  /** A single origin, `*`, or a list of accepted origins. */
  allowOrigin: string | string[];
  allowCredentials: boolean;
  /** Preflight cache lifetime in seconds. */
  maxAge: number;
  additionalAllowHeaders: string[];
  additionalExposeHeaders: string[];
}

export function defaultCorsOptions(): CorsOptions {
  return {
    allowOrigin: '*',
    allowCredentials: false,
    maxAge: 3600,
    additionalAllowHeaders: [],
    additionalExposeHeaders: []
  };
}

function isWildcard(origin: string | string[]): boolean {
  return Array.isArray(origin) ? origin.includes('*') : origin === '*';
}

/**
 * Preflight requests are answered with 204. Credentials are never allowed
 * together with a wildcard origin.
 */
export function corsMiddleware(options: Partial<CorsOptions> = {}): MiddlewareHandler {
  const opts: CorsOptions = { ...defaultCorsOptions(), ...options };
  const wildcard = isWildcard(opts.allowOrigin);

  return cors({
    origin: wildcard ? '*' : opts.allowOrigin,
    allowMethods: ALLOW_METHODS,
    allowHeaders: [...ALLOW_HEADERS, ...opts.additionalAllowHeaders],
    exposeHeaders: [...EXPOSE_HEADERS, ...opts.additionalExposeHeaders],
    credentials: opts.allowCredentials && !wildcard,
    maxAge: opts.maxAge > 0 ? opts.maxAge : undefined
  });
}
