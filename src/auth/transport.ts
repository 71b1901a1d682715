import { HEADER_AUTHORIZATION } from '../header';
import { defaultTransport, RoundTripper } from '../transport';
import type { BasicCredentials } from '../types/auth';

export type BasicAuthTransportOptions = BasicCredentials;

/**
 * Sends every outbound request with `Authorization: Basic` credentials.
 * The caller's request is cloned, never modified.
 */
export class BasicAuthTransport implements RoundTripper {
  private readonly authorization: string;

  constructor(
    readonly base: RoundTripper = defaultTransport,
    options: BasicAuthTransportOptions
  ) {
    const bytes = new TextEncoder().encode(`${options.username}:${options.password}`);
    this.authorization = `Basic ${btoa(String.fromCharCode(...bytes))}`;
  }

  roundTrip(request: Request): Promise<Response> {
    const headers = new Headers(request.headers);
    headers.set(HEADER_AUTHORIZATION, this.authorization);
    return this.base.roundTrip(new Request(request, { headers }));
  }
}
