import type { Context } from 'hono';
import { timingSafeEqual } from 'hono/utils/buffer';
import { jwtVerify, JWTPayload } from 'jose';
import { loggerFromContext } from '../context';
import { HEADER_AUTHORIZATION } from '../header';
import { errorMessage } from '../logger';
import { LogField } from '../logging';
import type { AuthorizationFn, BasicCredentials, BearerTokenOptions, VerificationKey } from '../types/auth';

export function extractBearerToken(c: Context): string | undefined {
  const value = c.req.header(HEADER_AUTHORIZATION);
  if (!value?.startsWith('Bearer ')) return undefined;
  const token = value.slice('Bearer '.length).trim();
  return token || undefined;
}

export function parseBasicAuth(c: Context): BasicCredentials | undefined {
  const value = c.req.header(HEADER_AUTHORIZATION);
  if (!value?.startsWith('Basic ')) return undefined;

  let decoded: string;
  try {
    const binary = atob(value.slice('Basic '.length).trim());
    decoded = new TextDecoder().decode(Uint8Array.from(binary, ch => ch.charCodeAt(0)));
  } catch {
    return undefined;
  }
  const separator = decoded.indexOf(':');
  if (separator < 0) return undefined;
  return {
    username: decoded.slice(0, separator),
    password: decoded.slice(separator + 1)
  };
}

/**
 * Accepts Basic credentials equal to the configured ones. Both values are
 * compared in constant time and empty credentials never match.
 */
export function allowBasicAuthUser(expected: BasicCredentials): AuthorizationFn {
  return async (c) => {
    const credentials = parseBasicAuth(c);
    if (!credentials || !credentials.username || !credentials.password) {
      return false;
    }
    const usernameMatch = await timingSafeEqual(expected.username, credentials.username);
    const passwordMatch = await timingSafeEqual(expected.password, credentials.password);
    return usernameMatch && passwordMatch;
  };
}

async function verifyToken(token: string, key: VerificationKey, options: BearerTokenOptions['verifyOptions']): Promise<JWTPayload> {
  if (typeof key === 'function') {
    const { payload } = await jwtVerify(token, key, options);
    return payload;
  }
  const { payload } = await jwtVerify(token, key, options);
  return payload;
}

/**
 * Accepts a Bearer JWT that verifies against `key`; its claims are stored
 * as the `jwt` context variable.
 */
export function allowBearerTokenUser(options: BearerTokenOptions): AuthorizationFn {
  return async (c) => {
    const token = extractBearerToken(c);
    if (!token) return false;

    try {
      c.set('jwt', await verifyToken(token, options.key, options.verifyOptions));
      return true;
    } catch (error) {
      loggerFromContext(c).debug('bearer token rejected', { [LogField.Error]: errorMessage(error) });
      return false;
    }
  };
}

/**
 * Basic credentials are checked when the request carries them, the Bearer
 * token otherwise.
 */
export function allowAuthorizedUser(basic: BasicCredentials, bearer: BearerTokenOptions): AuthorizationFn {
  const allowBasic = allowBasicAuthUser(basic);
  const allowBearer = allowBearerTokenUser(bearer);
  return (c) => {
    const scheme = c.req.header(HEADER_AUTHORIZATION)?.split(' ')[0];
    return scheme === 'Basic' ? allowBasic(c) : allowBearer(c);
  };
}
