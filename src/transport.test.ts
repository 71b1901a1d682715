import { describe, expect, it } from 'vitest';
import { asFetch, composeTransports, RoundTripper, TransportDecorator } from './transport';

function tagging(tag: string): TransportDecorator {
  return (base) => ({
    roundTrip: async (request) => {
      const headers = new Headers(request.headers);
      headers.append('X-Trail', tag);
      return base.roundTrip(new Request(request, { headers }));
    }
  });
}

const echo: RoundTripper = {
  roundTrip: async (request) => new Response(request.headers.get('X-Trail') ?? '')
};

describe('composeTransports', () => {
  it('applies decorators from the innermost outward', async () => {
    const transport = composeTransports(echo, tagging('inner'), tagging('outer'));
    const response = await transport.roundTrip(new Request('http://upstream.test/'));
    expect(await response.text()).toBe('outer, inner');
  });

  it('returns the base when no decorators are given', () => {
    expect(composeTransports(echo)).toBe(echo);
  });
});

describe('asFetch', () => {
  it('builds a request from fetch arguments', async () => {
    const seen: Request[] = [];
    const fetchFn = asFetch({
      roundTrip: async (request) => {
        seen.push(request);
        return new Response('done', { status: 201 });
      }
    });

    const response = await fetchFn('http://upstream.test/items', {
      method: 'POST',
      body: '{"a":1}',
      headers: { 'Content-Type': 'application/json' }
    });

    expect(response.status).toBe(201);
    expect(seen).toHaveLength(1);
    expect(seen[0]?.method).toBe('POST');
    expect(seen[0]?.url).toBe('http://upstream.test/items');
    expect(await seen[0]?.text()).toBe('{"a":1}');
  });
});
