// Default middleware chain and outbound transport built from the config
import type { MiddlewareHandler } from 'hono';
import { contextStorage } from 'hono/context-storage';
import type { GatewayConfig } from './config';
import { corsMiddleware } from './cors';
import { timeoutError } from './errors';
import { rootLogger, setLogLevel } from './logger';
import { contextLogger, logRequest, RequestLoggerTransport } from './logging';
import { RequestMetricsTransport } from './metrics';
import { CircuitBreakerTransport, recoverPanic, timeoutContext, TimeoutTransport } from './resiliency';
import { requestIdHeader, RequestIdHeaderTransport, requestIdLogger, tracingLogger } from './tracing';
import { composeTransports, defaultTransport, RoundTripper } from './transport';

/**
 * Inbound chain, outermost first: context storage, request id, loggers,
 * request logging, panic recovery, CORS, timeout.
 */
export function standardMiddlewares(config: GatewayConfig): MiddlewareHandler[] {
  setLogLevel(config.logLevel);

  return [
    contextStorage(),
    requestIdHeader(),
    contextLogger({ logger: rootLogger }),
    requestIdLogger(),
    tracingLogger(),
    logRequest(),
    recoverPanic(),
    corsMiddleware({ allowOrigin: config.corsAllowOrigin }),
    timeoutContext({ timeout: config.requestTimeout, errorResponse: timeoutError() })
  ];
}

/**
 * Outbound transport, innermost first: timeout, circuit breaker, request id
 * header, logging, metrics. Upstream 5xx responses count as breaker failures.
 */
export function standardTransport(config: GatewayConfig, base: RoundTripper = defaultTransport): RoundTripper {
  const { circuitBreaker } = config;

  return composeTransports(
    base,
    inner => new TimeoutTransport(inner, { timeout: config.requestTimeout }),
    inner => new CircuitBreakerTransport(inner, {
      settings: circuitBreaker,
      isFailureResponse: response => response.status >= 500
    }),
    inner => new RequestIdHeaderTransport(inner),
    inner => new RequestLoggerTransport(inner),
    inner => new RequestMetricsTransport(inner, circuitBreaker.name)
  );
}
