import { Hono } from 'hono';
import { contextStorage } from 'hono/context-storage';
import { describe, expect, it } from 'vitest';
import { loggerFromContext } from './context';
import { Logger } from './logger';
import { contextLogger } from './logging';
import {
  defaultRequestIdGenerator,
  requestIdHeader,
  RequestIdHeaderTransport,
  requestIdLogger,
  tracingLogger
} from './tracing';
import type { RoundTripper } from './transport';

function capture() {
  const lines: string[] = [];
  const logger = new Logger({}, line => lines.push(line));
  const entries = () => lines.map((line): Record<string, unknown> => JSON.parse(line));
  return { logger, entries };
}

describe('requestIdHeader', () => {
  it('reuses the incoming request id', async () => {
    const app = new Hono();
    app.use(requestIdHeader());
    app.get('/', c => c.text(c.get('requestId')));

    const res = await app.request('/', { headers: { 'X-Request-ID': 'abc-123' } });
    expect(res.headers.get('X-Request-ID')).toBe('abc-123');
    expect(await res.text()).toBe('abc-123');
  });

  it('generates an id when none is sent', async () => {
    const app = new Hono();
    app.use(requestIdHeader({ headerName: 'X-Correlation-ID', generator: () => 'generated-id' }));
    app.get('/', c => c.text(c.get('requestId')));

    const res = await app.request('/');
    expect(res.headers.get('X-Correlation-ID')).toBe('generated-id');
    expect(await res.text()).toBe('generated-id');
  });

  it('generates version 4 UUIDs by default', () => {
    expect(defaultRequestIdGenerator()).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });
});

describe('requestIdLogger', () => {
  it('adds the request id to the context logger', async () => {
    const { logger, entries } = capture();
    const app = new Hono();
    app.use(contextLogger({ logger }));
    app.use(requestIdHeader());
    app.use(requestIdLogger());
    app.get('/', (c) => {
      loggerFromContext(c).info('handled');
      return c.text('ok');
    });

    await app.request('/', { headers: { 'X-Request-ID': 'req-42' } });
    expect(entries()).toEqual([
      expect.objectContaining({ message: 'handled', 'request-id': 'req-42' })
    ]);
  });
});

describe('tracingLogger', () => {
  function appWith(traceId: string, spanId: string) {
    const { logger, entries } = capture();
    const app = new Hono();
    app.use(contextLogger({ logger }));
    app.use(tracingLogger({
      logFieldTraceId: 'trace-id',
      logFieldSpanId: 'span-id',
      spanContext: () => ({ traceId, spanId, traceFlags: 1 })
    }));
    app.get('/', (c) => {
      loggerFromContext(c).info('traced');
      return c.text('ok');
    });
    return { app, entries };
  }

  it('adds valid trace and span ids', async () => {
    const { app, entries } = appWith('0af7651916cd43dd8448eb211c80319c', 'b7ad6b7169203331');
    await app.request('/');

    expect(entries()[0]).toMatchObject({
      'trace-id': '0af7651916cd43dd8448eb211c80319c',
      'span-id': 'b7ad6b7169203331'
    });
  });

  it('ignores invalid ids', async () => {
    const { app, entries } = appWith('00000000000000000000000000000000', '0000000000000000');
    await app.request('/');

    const entry = entries()[0];
    expect(entry).toBeDefined();
    expect(entry).not.toHaveProperty('trace-id');
    expect(entry).not.toHaveProperty('span-id');
  });

  it('leaves the logger alone without an active span', async () => {
    const app = new Hono();
    app.use(tracingLogger());
    app.get('/', c => c.text(c.get('logger') === undefined ? 'none' : 'set'));

    const res = await app.request('/');
    expect(await res.text()).toBe('none');
  });
});

describe('RequestIdHeaderTransport', () => {
  function recorder() {
    const seen: Request[] = [];
    const base: RoundTripper = {
      roundTrip: async (request) => {
        seen.push(request);
        return new Response('ok');
      }
    };
    return { seen, base };
  }

  it('copies the request id onto a cloned request', async () => {
    const { seen, base } = recorder();
    const transport = new RequestIdHeaderTransport(base, {
      headerName: 'X-Request-ID',
      requestId: () => 'req-7'
    });
    const original = new Request('http://upstream.test/');

    await transport.roundTrip(original);
    expect(seen[0]?.headers.get('X-Request-ID')).toBe('req-7');
    expect(original.headers.get('X-Request-ID')).toBeNull();
  });

  it('passes the request through without an id', async () => {
    const { seen, base } = recorder();
    const transport = new RequestIdHeaderTransport(base, {
      headerName: 'X-Request-ID',
      requestId: () => undefined
    });
    const original = new Request('http://upstream.test/');

    await transport.roundTrip(original);
    expect(seen[0]).toBe(original);
  });

  it('picks up the id of the request being served', async () => {
    const { seen, base } = recorder();
    const transport = new RequestIdHeaderTransport(base);
    const app = new Hono();
    app.use(contextStorage());
    app.use(requestIdHeader());
    app.get('/', async (c) => {
      await transport.roundTrip(new Request('http://upstream.test/'));
      return c.text('ok');
    });

    await app.request('/', { headers: { 'X-Request-ID': 'inbound-1' } });
    expect(seen[0]?.headers.get('X-Request-ID')).toBe('inbound-1');
  });
});
