import { describe, expect, it } from 'vitest';
import { missingRequiredHeader, newErrorResponse, requestTimeout, unauthorized } from './errors';

describe('ErrorResponse', () => {
  it('renders status text and message as JSON', async () => {
    const response = unauthorized().toResponse();
    expect(response.status).toBe(401);
    expect(response.headers.get('Content-Type')).toBe('application/json');
    expect(await response.json()).toEqual({
      status: 'Unauthorized',
      message: 'Authentication required'
    });
  });

  it('keeps extra headers', () => {
    const response = requestTimeout().toResponse({ 'Retry-After': '5' });
    expect(response.status).toBe(408);
    expect(response.headers.get('Retry-After')).toBe('5');
  });

  it('names the missing header', () => {
    expect(missingRequiredHeader('X-Tenant').toJSON()).toEqual({
      status: 'Precondition Required',
      message: 'Missing required header: X-Tenant'
    });
  });

  it('builds arbitrary responses', () => {
    const error = newErrorResponse(418, "I'm a teapot", 'short and stout');
    expect(error.httpStatusCode).toBe(418);
    expect(JSON.stringify(error)).toBe('{"status":"I\'m a teapot","message":"short and stout"}');
  });
});
