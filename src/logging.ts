// Request logging middlewares and transport
import type { MiddlewareHandler } from 'hono';
import { currentLogger, loggerFromContext } from './context';
import { errorMessage, Logger, rootLogger } from './logger';
import { defaultTransport, RoundTripper } from './transport';

export const LogField = {
  RequestMethod: 'request-method',
  RequestId: 'request-id',
  ResponseStatus: 'response-status',
  UrlPath: 'url-path',
  UserAgent: 'user-agent',
  EventDuration: 'event-duration',
  Logger: 'logger',
  StackTrace: 'stack-trace',
  TraceId: 'trace-id',
  SpanId: 'span-id',
  Error: 'error'
} as const;

// ContextLogger //

export interface ContextLoggerOptions {
  logger: Logger;
}

export function contextLogger(options: ContextLoggerOptions = { logger: rootLogger }): MiddlewareHandler {
  return async (c, next) => {
    c.set('logger', options.logger);
    await next();
  };
}

// LogContextCancellation //

export interface LogContextCancellationOptions {
  description: string;
}

export function logContextCancellation(options: LogContextCancellationOptions): MiddlewareHandler {
  return async (c, next) => {
    await next();

    const signal = c.req.raw.signal;
    if (signal.aborted) {
      loggerFromContext(c).info(`context '${options.description}' is cancelled`, {
        [LogField.Error]: errorMessage(signal.reason)
      });
    }
  };
}

// LogRequest //

export interface LogRequestOptions {
  /** Patterns matched in full against "<METHOD> <PATH> <STATUS>". */
  exclusions: string[];
}

function compileExclusions(patterns: string[]): RegExp[] {
  const compiled: RegExp[] = [];
  for (const pattern of patterns) {
    const fullMatchPattern = `^${pattern}$`;
    try {
      compiled.push(new RegExp(fullMatchPattern));
    } catch (error) {
      rootLogger.error(`failed to compile exclude logging pattern '${fullMatchPattern}', skipping pattern`, {
        [LogField.Error]: errorMessage(error)
      });
    }
  }
  return compiled;
}

export function logRequest(options: LogRequestOptions = { exclusions: [] }): MiddlewareHandler {
  const exclusions = compileExclusions(options.exclusions);

  return async (c, next) => {
    const start = performance.now();
    await next();

    const method = c.req.method;
    const path = c.req.path;
    const status = c.res.status;

    const requestInfo = `${method} ${path} ${status}`;
    if (exclusions.some(re => re.test(requestInfo))) {
      return;
    }

    const logger = loggerFromContext(c).with({
      [LogField.RequestMethod]: method,
      [LogField.ResponseStatus]: status,
      [LogField.UrlPath]: path,
      [LogField.UserAgent]: c.req.header('User-Agent') ?? '',
      [LogField.Logger]: 'request.incoming',
      [LogField.EventDuration]: Math.round((performance.now() - start) * 1000)
    });
    if (status >= 500) {
      logger.error('request');
    } else {
      logger.info('request');
    }
  };
}

// RequestLoggerTransport //

export interface RequestLoggerTransportOptions {
  /** Statuses at or above this are logged as warnings. */
  warningStatusCodeThreshold: number;
}

export function defaultRequestLoggerTransportOptions(): RequestLoggerTransportOptions {
  return { warningStatusCodeThreshold: 500 };
}

export class RequestLoggerTransport implements RoundTripper {
  constructor(
    readonly base: RoundTripper = defaultTransport,
    readonly options: RequestLoggerTransportOptions = defaultRequestLoggerTransportOptions()
  ) {}

  async roundTrip(request: Request): Promise<Response> {
    const start = Date.now();
    try {
      const response = await this.base.roundTrip(request);
      this.logResponse(request, response.status, start);
      return response;
    } catch (error) {
      this.logResponse(request, 0, start, error);
      throw error;
    }
  }

  private logResponse(request: Request, status: number, start: number, error?: unknown): void {
    const message = `request ${request.method} ${request.url} -> ${status} (${Date.now() - start} ms)`;
    const logger = currentLogger();
    if (error !== undefined || status >= this.options.warningStatusCodeThreshold) {
      logger.warn(message, error === undefined ? undefined : { [LogField.Error]: errorMessage(error) });
      return;
    }
    logger.info(message);
  }
}
