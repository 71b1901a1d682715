import type { Context } from 'hono';
import type { JWTVerifyGetKey, JWTVerifyOptions, KeyLike } from 'jose';
import type { ErrorResponse } from '../errors';

/**
 * Decides whether a request may proceed. Implementations may enrich the
 * context, e.g. with verified token claims.
 */
export type AuthorizationFn = (c: Context) => boolean | Promise<boolean>;

export interface BasicCredentials {
  username: string;
  password: string;
}

export type VerificationKey = KeyLike | Uint8Array | JWTVerifyGetKey;

export interface BearerTokenOptions {
  /** Static key or a resolver such as a remote key set. */
  key: VerificationKey;
  verifyOptions?: JWTVerifyOptions;
}

export interface RequireAuthorizationOptions {
  authorizationFns: AuthorizationFn[];
  errorResponse: ErrorResponse;
}

export interface AddJwtToContextOptions {
  errorResponse: ErrorResponse;
}
