// Request metrics on the OpenTelemetry API
import type { MiddlewareHandler } from 'hono';
import { Attributes, Counter, Histogram, MeterProvider, metrics } from '@opentelemetry/api';
import { HEADER_CONTENT_LENGTH } from './header';
import { defaultTransport, RoundTripper } from './transport';

export interface RequestMetricsOptions {
  meterProvider: MeterProvider;
}

export function defaultRequestMetricsOptions(): RequestMetricsOptions {
  return { meterProvider: metrics.getMeterProvider() };
}

/**
 * Records `http.server.requests.seconds` per request, partitioned by
 * method, status and matched route pattern.
 */
export function requestMetrics(
  options: RequestMetricsOptions = defaultRequestMetricsOptions()
): MiddlewareHandler {
  const meter = options.meterProvider.getMeter('server');
  const requestSeconds = meter.createHistogram('http.server.requests.seconds', {
    description: 'How long it took to process requests, partitioned by status code, method, and HTTP path.',
    unit: 's'
  });

  return async (c, next) => {
    const start = performance.now();
    await next();

    requestSeconds.record((performance.now() - start) / 1000, {
      method: c.req.method,
      status: String(c.res.status),
      uri: c.req.routePath
    });
  };
}

// RequestMetricsTransport //

export type RequestMetricsTransportOptions = RequestMetricsOptions;

export function defaultRequestMetricsTransportOptions(): RequestMetricsTransportOptions {
  return defaultRequestMetricsOptions();
}

export function clientMeterName(clientName: string): string {
  return clientName ? `client.${clientName.replaceAll('-', '_')}` : 'client.default';
}

function contentLength(headers: Headers): number {
  const size = Number.parseInt(headers.get(HEADER_CONTENT_LENGTH) ?? '', 10);
  return Number.isNaN(size) ? 0 : size;
}

export class RequestMetricsTransport implements RoundTripper {
  private readonly requestCount: Counter;
  private readonly errorCount: Counter;
  private readonly requestBytes: Histogram;
  private readonly responseBytes: Histogram;

  constructor(
    readonly base: RoundTripper = defaultTransport,
    readonly clientName = '',
    readonly options: RequestMetricsTransportOptions = defaultRequestMetricsTransportOptions()
  ) {
    const meter = options.meterProvider.getMeter(clientMeterName(clientName));
    this.requestCount = meter.createCounter('http.client.requests.count', {
      description: 'Number of upstream http requests by target hostname, method, and response status.'
    });
    this.errorCount = meter.createCounter('http.client.requests.errors.count', {
      description: 'Number of upstream http requests that raised a technical error by target hostname, method, and response status.'
    });
    this.requestBytes = meter.createHistogram('http.client.requests.request.bytes', {
      description: 'Size of the request by target hostname and method.',
      unit: 'By'
    });
    this.responseBytes = meter.createHistogram('http.client.requests.response.bytes', {
      description: 'Size of the response by target hostname, method, outcome, and response status.',
      unit: 'By'
    });
  }

  async roundTrip(request: Request): Promise<Response> {
    this.recordRequest(request);

    let response: Response;
    try {
      response = await this.base.roundTrip(request);
    } catch (error) {
      this.recordResponse(request.method, 0, 0, true);
      throw error;
    }

    this.recordResponse(request.method, response.status, contentLength(response.headers), false);
    return response;
  }

  private attributes(attributes: Attributes): Attributes {
    return this.clientName ? { ...attributes, 'client.name': this.clientName } : attributes;
  }

  private recordRequest(request: Request): void {
    const size = contentLength(request.headers);
    if (size > 0) {
      this.requestBytes.record(size, this.attributes({ 'http.method': request.method }));
    }
  }

  private recordResponse(method: string, status: number, size: number, failed: boolean): void {
    const attributes = this.attributes({ 'http.method': method, 'response.status': status });

    this.requestCount.add(1, attributes);
    if (failed) {
      this.errorCount.add(1, attributes);
    }
    if (size > 0) {
      this.responseBytes.record(size, attributes);
    }
  }
}
