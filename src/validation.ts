// Request validation
import type { MiddlewareHandler } from 'hono';
import type { ZodType, ZodTypeDef } from 'zod';
import { loggerFromContext } from './context';
import {
  ErrorResponse,
  invalidRequestBody,
  missingRequiredHeader,
  payloadTooLarge,
  requestHeaderFieldsTooLarge,
  uriTooLong
} from './errors';
import { HEADER_CONTENT_LENGTH } from './header';
import { errorMessage } from './logger';
import { LogField } from './logging';

// SizeLimits //

/** Unset or zero limits are not checked. */
export interface SizeLimits {
  maxUrlLength?: number;
  maxBodyBytes?: number;
  maxHeaderCount?: number;
  maxHeaderBytes?: number;
}

export const DEFAULT_SIZE_LIMITS: Readonly<SizeLimits> = {
  maxUrlLength: 8192,
  maxBodyBytes: 10 * 1024 * 1024,
  maxHeaderCount: 100,
  maxHeaderBytes: 16 * 1024
};

function exceeds(limit: number | undefined, actual: number): boolean {
  return limit !== undefined && limit > 0 && actual > limit;
}

/**
 * Returns the error for the first limit the request breaks. The body is
 * judged by its declared Content-Length only; headers are measured as
 * "name: value\r\n" lines.
 */
export function checkRequestSize(request: Request, limits: SizeLimits): ErrorResponse | undefined {
  if (exceeds(limits.maxUrlLength, request.url.length)) {
    return uriTooLong(`URL is longer than ${limits.maxUrlLength} characters`);
  }

  const declaredBytes = Number.parseInt(request.headers.get(HEADER_CONTENT_LENGTH) ?? '', 10);
  if (exceeds(limits.maxBodyBytes, declaredBytes)) {
    return payloadTooLarge(`Request body of ${declaredBytes} bytes exceeds the ${limits.maxBodyBytes} byte limit`);
  }

  let headerCount = 0;
  let headerBytes = 0;
  request.headers.forEach((value, name) => {
    headerCount++;
    headerBytes += name.length + value.length + 4;
  });

  if (exceeds(limits.maxHeaderCount, headerCount)) {
    return requestHeaderFieldsTooLarge(`Request has ${headerCount} headers, the limit is ${limits.maxHeaderCount}`);
  }
  if (exceeds(limits.maxHeaderBytes, headerBytes)) {
    return requestHeaderFieldsTooLarge(`Request headers take ${headerBytes} bytes, the limit is ${limits.maxHeaderBytes}`);
  }
  return undefined;
}

export function sizeLimits(limits: SizeLimits = DEFAULT_SIZE_LIMITS): MiddlewareHandler {
  return async (c, next) => {
    const rejection = checkRequestSize(c.req.raw, limits);
    if (rejection) {
      loggerFromContext(c).debug('request exceeds size limits', { [LogField.Error]: rejection.message });
      return rejection.toResponse();
    }
    await next();
  };
}

// ContextRequestBody //

export interface ContextRequestBodyOptions<B> {
  schema: ZodType<B, ZodTypeDef, unknown>;
  errorResponse?: ErrorResponse;
}

export type RequestBodyEnv<B> = { Variables: { requestBody: B } };

/**
 * Parses the JSON body against `schema` and exposes the result as the
 * `requestBody` variable of the route.
 */
export function contextRequestBody<B>(
  options: ContextRequestBodyOptions<B>
): MiddlewareHandler<RequestBodyEnv<B>> {
  const errorResponse = options.errorResponse ?? invalidRequestBody();

  return async (c, next) => {
    let raw: unknown;
    try {
      raw = await c.req.json();
    } catch (error) {
      loggerFromContext(c).debug('request body is not valid JSON', { [LogField.Error]: errorMessage(error) });
      return errorResponse.toResponse();
    }

    const parsed = options.schema.safeParse(raw);
    if (!parsed.success) {
      loggerFromContext(c).debug('request body failed validation', {
        [LogField.Error]: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ')
      });
      return errorResponse.toResponse();
    }

    c.set('requestBody', parsed.data);
    await next();
  };
}

// RequiredHeader //

export interface RequiredHeaderOptions {
  errorResponse: ErrorResponse;
}

export function requiredHeader(name: string, options?: RequiredHeaderOptions): MiddlewareHandler {
  const errorResponse = options?.errorResponse ?? missingRequiredHeader(name);

  return async (c, next) => {
    if (!c.req.header(name)) {
      return errorResponse.toResponse();
    }
    await next();
  };
}
