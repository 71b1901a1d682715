// Request scoped values kept on the Hono context
import type { Context } from 'hono';
import { getContext } from 'hono/context-storage';
import type { JWTPayload } from 'jose';
import { Logger, rootLogger } from './logger';

declare module 'hono' {
  interface ContextVariableMap {
    logger: Logger | undefined;
    jwt: JWTPayload | undefined;
  }
}

export function loggerFromContext(c: Context): Logger {
  return c.get('logger') ?? rootLogger;
}

/**
 * The context of the request being handled, when the contextStorage
 * middleware is installed and a request is in flight.
 */
export function currentContext(): Context | undefined {
  try {
    return getContext();
  } catch {
    return undefined;
  }
}

export function currentLogger(): Logger {
  const c = currentContext();
  return c ? loggerFromContext(c) : rootLogger;
}

export function currentRequestId(): string | undefined {
  const id = currentContext()?.get('requestId');
  return id ? id : undefined;
}
