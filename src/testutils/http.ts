import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { HEADER_CONTENT_TYPE, MIME_APPLICATION_JSON } from '../header';

export interface TestRequest {
  method: string;
  url: string;
  headers?: Record<string, string>;
  /** Sent as JSON when present. */
  body?: unknown;
}

export interface TestResponse {
  status: number;
  headers: Record<string, string>;
  body: unknown;
}

export interface RequestHandler {
  request(input: string, init?: RequestInit): Response | Promise<Response>;
}

const testResponseSchema = z.object({
  status: z.number().int(),
  headers: z.record(z.string()).default({}),
  body: z.unknown()
});

/**
 * Reads the status, headers and body of a response. JSON bodies are parsed,
 * anything else is kept as text.
 */
export async function parseResponse(res: Response): Promise<TestResponse> {
  const text = await res.text();
  const contentType = res.headers.get(HEADER_CONTENT_TYPE) ?? '';

  let body: unknown = text;
  if (contentType.startsWith(MIME_APPLICATION_JSON) && text !== '') {
    body = JSON.parse(text);
  }

  return {
    status: res.status,
    headers: Object.fromEntries(res.headers),
    body
  };
}

export async function performRequest(app: RequestHandler, req: TestRequest): Promise<TestResponse> {
  const headers = new Headers(req.headers);
  let body: string | undefined;
  if (req.body !== undefined) {
    body = JSON.stringify(req.body);
    if (!headers.has(HEADER_CONTENT_TYPE)) {
      headers.set(HEADER_CONTENT_TYPE, MIME_APPLICATION_JSON);
    }
  }

  const res = await app.request(req.url, { method: req.method, headers, body });
  return parseResponse(res);
}

export async function readMockResponseFromFile(path: string | URL): Promise<TestResponse> {
  const raw: unknown = JSON.parse(await readFile(path, 'utf8'));
  const { status, headers, body } = testResponseSchema.parse(raw);
  return { status, headers, body };
}
