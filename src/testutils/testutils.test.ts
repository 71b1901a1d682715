import { Hono } from 'hono';
import { describe, expect, it } from 'vitest';
import {
  parseResponse,
  performRequest,
  readMockResponseFromFile,
  RequestAsserter,
  RequestAssertionError
} from './index';

describe('RequestAsserter', () => {
  it('answers matching requests with the queued response', async () => {
    const asserter = new RequestAsserter();
    asserter
      .expectRequest({ method: 'POST', url: 'http://upstream.test/orders', body: { name: 'widget', quantity: 3 } })
      .willReturnResponse({
        status: 201,
        headers: { 'Content-Type': 'application/json' },
        body: '{"id":"order-1"}'
      });

    const res = await asserter.roundTrip(new Request('http://upstream.test/orders', {
      method: 'POST',
      body: '{"quantity":3,"name":"widget"}'
    }));

    expect(await parseResponse(res)).toEqual({
      status: 201,
      headers: { 'content-type': 'application/json' },
      body: { id: 'order-1' }
    });
    expect(asserter.pending()).toBe(0);
  });

  it('fails on a method mismatch', async () => {
    const asserter = new RequestAsserter();
    asserter.expectRequest({ method: 'GET' });

    await expect(asserter.roundTrip(new Request('http://upstream.test/', { method: 'DELETE' })))
      .rejects.toThrow(new RequestAssertionError('expected method GET, got DELETE'));
  });

  it('fails on a url mismatch', async () => {
    const asserter = new RequestAsserter();
    asserter.expectRequest({ url: 'http://upstream.test/a' });

    await expect(asserter.roundTrip(new Request('http://upstream.test/b')))
      .rejects.toThrow('expected url http://upstream.test/a, got http://upstream.test/b');
  });

  it('fails on a body mismatch', async () => {
    const asserter = new RequestAsserter();
    asserter.expectRequest({ body: { name: 'widget' } });

    await expect(asserter.roundTrip(new Request('http://upstream.test/', { method: 'POST', body: '{"name":"gadget"}' })))
      .rejects.toThrow('expected request body {"name":"widget"}, got {"name":"gadget"}');
  });

  it('fails when nothing is expected', async () => {
    const asserter = new RequestAsserter();
    await expect(asserter.roundTrip(new Request('http://upstream.test/')))
      .rejects.toThrow('unexpected request GET http://upstream.test/');
  });

  it('answers an empty 200 without a configured response', async () => {
    const asserter = new RequestAsserter();
    asserter.expectRequest();

    const res = await asserter.roundTrip(new Request('http://upstream.test/'));
    expect(res.status).toBe(200);
    expect(await res.text()).toBe('');
  });

  it('forgets expectations on reset', () => {
    const asserter = new RequestAsserter();
    asserter.expectRequest();
    asserter.expectRequest();
    expect(asserter.pending()).toBe(2);
    asserter.reset();
    expect(asserter.pending()).toBe(0);
  });
});

describe('performRequest', () => {
  const app = new Hono();
  app.post('/orders', async (c) => {
    const order: unknown = await c.req.json();
    return c.json({ id: 'order-1', ...(typeof order === 'object' ? order : {}) }, 201);
  });
  app.get('/plain', c => c.text('hello'));

  it('sends JSON bodies and parses JSON replies', async () => {
    const res = await performRequest(app, { method: 'POST', url: '/orders', body: { name: 'widget', quantity: 3 } });
    const fixture = await readMockResponseFromFile(new URL('./testdata/order-created.json', import.meta.url));

    expect(res.status).toBe(fixture.status);
    expect(res.body).toEqual(fixture.body);
  });

  it('keeps other bodies as text', async () => {
    const res = await performRequest(app, { method: 'GET', url: '/plain' });
    expect(res).toMatchObject({ status: 200, body: 'hello' });
  });
});
