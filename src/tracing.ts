// Request id propagation and trace aware logging
import type { Context, MiddlewareHandler } from 'hono';
import { requestId } from 'hono/request-id';
import { isValidSpanId, isValidTraceId, SpanContext, trace } from '@opentelemetry/api';
import { currentRequestId, loggerFromContext } from './context';
import { HEADER_REQUEST_ID } from './header';
import { LogField } from './logging';
import { defaultTransport, RoundTripper } from './transport';

export function defaultRequestIdGenerator(): string {
  return crypto.randomUUID();
}

// RequestIdHeader //

export interface RequestIdHeaderOptions {
  headerName: string;
  generator: () => string;
}

export function defaultRequestIdHeaderOptions(): RequestIdHeaderOptions {
  return { headerName: HEADER_REQUEST_ID, generator: defaultRequestIdGenerator };
}

/**
 * Reuses the incoming request id or generates one, echoes it on the
 * response and exposes it as the `requestId` context variable.
 */
export function requestIdHeader(
  options: RequestIdHeaderOptions = defaultRequestIdHeaderOptions()
): MiddlewareHandler {
  return requestId({
    headerName: options.headerName,
    generator: () => options.generator()
  });
}

// RequestIdLogger //

export interface RequestIdLoggerOptions {
  logFieldName: string;
}

export function defaultRequestIdLoggerOptions(): RequestIdLoggerOptions {
  return { logFieldName: LogField.RequestId };
}

export function requestIdLogger(
  options: RequestIdLoggerOptions = defaultRequestIdLoggerOptions()
): MiddlewareHandler {
  return async (c, next) => {
    const id = c.get('requestId');
    if (id) {
      c.set('logger', loggerFromContext(c).with({ [options.logFieldName]: id }));
    }
    await next();
  };
}

// TracingLogger //

export interface TracingLoggerOptions {
  logFieldTraceId: string;
  logFieldSpanId: string;
  spanContext: (c: Context) => SpanContext | undefined;
}

export function defaultTracingLoggerOptions(): TracingLoggerOptions {
  return {
    logFieldTraceId: LogField.TraceId,
    logFieldSpanId: LogField.SpanId,
    spanContext: () => trace.getActiveSpan()?.spanContext()
  };
}

export function tracingLogger(
  options: TracingLoggerOptions = defaultTracingLoggerOptions()
): MiddlewareHandler {
  return async (c, next) => {
    const spanContext = options.spanContext(c);
    if (spanContext) {
      const fields: Record<string, string> = {};
      if (isValidTraceId(spanContext.traceId)) {
        fields[options.logFieldTraceId] = spanContext.traceId;
      }
      if (isValidSpanId(spanContext.spanId)) {
        fields[options.logFieldSpanId] = spanContext.spanId;
      }
      if (Object.keys(fields).length > 0) {
        c.set('logger', loggerFromContext(c).with(fields));
      }
    }
    await next();
  };
}

// RequestIdHeaderTransport //

export interface RequestIdHeaderTransportOptions {
  headerName: string;
  /** Resolves the id of the request being served, if any. */
  requestId: () => string | undefined;
}

export function defaultRequestIdHeaderTransportOptions(): RequestIdHeaderTransportOptions {
  return { headerName: HEADER_REQUEST_ID, requestId: currentRequestId };
}

export class RequestIdHeaderTransport implements RoundTripper {
  constructor(
    readonly base: RoundTripper = defaultTransport,
    readonly options: RequestIdHeaderTransportOptions = defaultRequestIdHeaderTransportOptions()
  ) {}

  roundTrip(request: Request): Promise<Response> {
    const id = this.options.requestId();
    if (!id) {
      return this.base.roundTrip(request);
    }

    const headers = new Headers(request.headers);
    headers.set(this.options.headerName, id);
    return this.base.roundTrip(new Request(request, { headers }));
  }
}
