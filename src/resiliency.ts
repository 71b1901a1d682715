// Circuit breaking, timeouts and panic recovery for both directions
import type { MiddlewareHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { timeout } from 'hono/timeout';
import { CircuitBreaker, defaultCircuitBreakerSettings, isCircuitOpenError } from './circuitbreaker';
import { loggerFromContext } from './context';
import { circuitOpen, ErrorResponse, panicRecovery, timeoutError } from './errors';
import { HEADER_RETRY_AFTER } from './header';
import { errorMessage } from './logger';
import { LogField } from './logging';
import { defaultTransport, RoundTripper } from './transport';
import type { CircuitBreakerSettings } from './types/circuitbreaker';

const DEFAULT_TIMEOUT_MS = 120_000;

// CircuitBreakerTransport //

export interface CircuitBreakerTransportOptions {
  settings: Partial<CircuitBreakerSettings>;
  /** Counts a response as a failure while still returning it. */
  isFailureResponse?: (response: Response) => boolean;
}

export function defaultCircuitBreakerTransportOptions(): CircuitBreakerTransportOptions {
  return { settings: defaultCircuitBreakerSettings() };
}

export class CircuitBreakerTransport implements RoundTripper {
  readonly breaker: CircuitBreaker;

  constructor(
    readonly base: RoundTripper = defaultTransport,
    readonly options: CircuitBreakerTransportOptions = defaultCircuitBreakerTransportOptions()
  ) {
    this.breaker = new CircuitBreaker(options.settings);
  }

  roundTrip(request: Request): Promise<Response> {
    return this.breaker.execute(
      () => this.base.roundTrip(request),
      { isFailureResult: this.options.isFailureResponse }
    );
  }
}

// TimeoutTransport //

export interface TimeoutTransportOptions {
  timeout: number;
}

export function defaultTimeoutTransportOptions(): TimeoutTransportOptions {
  return { timeout: DEFAULT_TIMEOUT_MS };
}

/**
 * Aborts the outbound request once `timeout` ms pass before the response
 * headers arrive, or as soon as the request's own signal aborts.
 */
export class TimeoutTransport implements RoundTripper {
  constructor(
    readonly base: RoundTripper = defaultTransport,
    readonly options: TimeoutTransportOptions = defaultTimeoutTransportOptions()
  ) {}

  async roundTrip(request: Request): Promise<Response> {
    const controller = new AbortController();
    const upstream = request.signal;
    const onAbort = () => controller.abort(upstream.reason);

    if (upstream.aborted) {
      onAbort();
    } else {
      upstream.addEventListener('abort', onAbort, { once: true });
    }
    const timer = setTimeout(() => {
      controller.abort(new DOMException(`request timed out after ${this.options.timeout} ms`, 'TimeoutError'));
    }, this.options.timeout);

    try {
      return await this.base.roundTrip(new Request(request, { signal: controller.signal }));
    } finally {
      clearTimeout(timer);
      upstream.removeEventListener('abort', onAbort);
    }
  }
}

// TimeoutContext //

export interface TimeoutContextOptions {
  timeout: number;
  errorResponse: ErrorResponse;
}

export function defaultTimeoutContextOptions(): TimeoutContextOptions {
  return { timeout: DEFAULT_TIMEOUT_MS, errorResponse: timeoutError() };
}

export function timeoutContext(
  options: TimeoutContextOptions = defaultTimeoutContextOptions()
): MiddlewareHandler {
  return timeout(
    options.timeout,
    () => new HTTPException(408, { res: options.errorResponse.toResponse() })
  );
}

// RecoverPanic //

export interface RecoverPanicOptions {
  errorResponse: ErrorResponse;
}

export function defaultRecoverPanicOptions(): RecoverPanicOptions {
  return { errorResponse: panicRecovery() };
}

/**
 * Replaces the response of a handler that threw with `errorResponse`. An
 * open upstream circuit is answered with 503 instead.
 */
export function recoverPanic(
  options: RecoverPanicOptions = defaultRecoverPanicOptions()
): MiddlewareHandler {
  return async (c, next) => {
    let failure: unknown;
    try {
      await next();
      failure = c.error;
    } catch (error) {
      failure = error;
    }

    if (failure === undefined || failure instanceof HTTPException) {
      return;
    }

    if (isCircuitOpenError(failure)) {
      loggerFromContext(c).warn('upstream circuit is open', {
        [LogField.Error]: failure.message
      });
      const headers: Record<string, string> = {};
      if (failure.retryAfterMs !== undefined) {
        headers[HEADER_RETRY_AFTER] = String(Math.ceil(failure.retryAfterMs / 1000));
      }
      c.error = undefined;
      c.res = circuitOpen().toResponse(headers);
      return;
    }

    loggerFromContext(c).error('recovered from panic', {
      [LogField.Error]: errorMessage(failure),
      [LogField.StackTrace]: failure instanceof Error ? failure.stack : undefined
    });
    c.error = undefined;
    c.res = options.errorResponse.toResponse();
  };
}
