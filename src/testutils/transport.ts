import { isDeepStrictEqual } from 'node:util';
import type { RoundTripper } from '../transport';

export interface ExpectedRequestMatch {
  method?: string;
  url?: string;
  /** Compared as JSON with the body that was sent. */
  body?: unknown;
}

export interface MockResponse {
  status: number;
  headers?: HeadersInit;
  body?: string;
}

export class RequestAssertionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RequestAssertionError';
  }
}

export class ExpectedRequest {
  response?: MockResponse;

  constructor(readonly match: ExpectedRequestMatch) {}

  willReturnResponse(response: MockResponse): this {
    this.response = response;
    return this;
  }
}

/**
 * Transport double that checks each outbound request against the next
 * queued expectation and answers with its mock response.
 */
export class RequestAsserter implements RoundTripper {
  private expected: ExpectedRequest[] = [];

  expectRequest(match: ExpectedRequestMatch = {}): ExpectedRequest {
    const expectation = new ExpectedRequest(match);
    this.expected.push(expectation);
    return expectation;
  }

  pending(): number {
    return this.expected.length;
  }

  reset(): void {
    this.expected = [];
  }

  async roundTrip(request: Request): Promise<Response> {
    const next = this.expected.shift();
    if (!next) {
      throw new RequestAssertionError(`unexpected request ${request.method} ${request.url}`);
    }

    const { method, url, body } = next.match;
    if (method !== undefined && method !== request.method) {
      throw new RequestAssertionError(`expected method ${method}, got ${request.method}`);
    }
    if (url !== undefined && url !== request.url) {
      throw new RequestAssertionError(`expected url ${url}, got ${request.url}`);
    }
    if (body !== undefined) {
      await assertJsonBody(request, body);
    }

    const response = next.response;
    if (!response) {
      return new Response(null, { status: 200 });
    }
    return new Response(response.body ?? null, {
      status: response.status,
      headers: response.headers
    });
  }
}

async function assertJsonBody(request: Request, expected: unknown): Promise<void> {
  const text = await request.text();
  let actual: unknown;
  try {
    actual = JSON.parse(text);
  } catch (error) {
    throw new RequestAssertionError(`request body is not valid JSON: ${String(error)}`);
  }

  const normalized: unknown = JSON.parse(JSON.stringify(expected));
  if (!isDeepStrictEqual(normalized, actual)) {
    throw new RequestAssertionError(`expected request body ${JSON.stringify(normalized)}, got ${text}`);
  }
}
