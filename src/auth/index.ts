import type { MiddlewareHandler } from 'hono';
import { decodeJwt } from 'jose';
import { loggerFromContext } from '../context';
import { authenticationRequired, unauthorized } from '../errors';
import { errorMessage } from '../logger';
import { LogField } from '../logging';
import type { AddJwtToContextOptions, RequireAuthorizationOptions } from '../types/auth';
import { extractBearerToken } from './authorizers';

export * from './authorizers';
export * from './key-provider';
export * from './transport';

export function defaultRequireAuthorizationOptions(): RequireAuthorizationOptions {
  return { authorizationFns: [], errorResponse: authenticationRequired() };
}

/**
 * Lets the request through when any authorization function allows it.
 */
export function requireAuthorization(
  options: Partial<RequireAuthorizationOptions> = {}
): MiddlewareHandler {
  const opts: RequireAuthorizationOptions = { ...defaultRequireAuthorizationOptions(), ...options };

  return async (c, next) => {
    for (const authorize of opts.authorizationFns) {
      if (await authorize(c)) {
        await next();
        return;
      }
    }
    return opts.errorResponse.toResponse();
  };
}

export function defaultAddJwtToContextOptions(): AddJwtToContextOptions {
  return { errorResponse: unauthorized('Invalid bearer token') };
}

/**
 * Decodes a Bearer token into the `jwt` context variable without verifying
 * its signature. Requests without a Bearer token pass through untouched.
 */
export function addJwtToContext(
  options: AddJwtToContextOptions = defaultAddJwtToContextOptions()
): MiddlewareHandler {
  return async (c, next) => {
    const token = extractBearerToken(c);
    if (!token) {
      await next();
      return;
    }

    try {
      c.set('jwt', decodeJwt(token));
    } catch (error) {
      loggerFromContext(c).debug('failed to decode bearer token', { [LogField.Error]: errorMessage(error) });
      return options.errorResponse.toResponse();
    }
    await next();
  };
}
