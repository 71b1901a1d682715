// JSON error responses shared by the middlewares

export interface ErrorBody {
  status: string;
  message: string;
}

export class ErrorResponse {
  constructor(
    readonly httpStatusCode: number,
    readonly statusText: string,
    readonly message: string
  ) {}

  toJSON(): ErrorBody {
    return { status: this.statusText, message: this.message };
  }

  toResponse(headers?: HeadersInit): Response {
    const responseHeaders = new Headers(headers);
    responseHeaders.set('Content-Type', 'application/json');
    return new Response(JSON.stringify(this.toJSON()), {
      status: this.httpStatusCode,
      headers: responseHeaders
    });
  }
}

export function newErrorResponse(httpStatusCode: number, statusText: string, message: string): ErrorResponse {
  return new ErrorResponse(httpStatusCode, statusText, message);
}

export function badRequest(message = 'Invalid request'): ErrorResponse {
  return new ErrorResponse(400, 'Bad Request', message);
}

export function unauthorized(message = 'Authentication required'): ErrorResponse {
  return new ErrorResponse(401, 'Unauthorized', message);
}

export function forbidden(message = 'Access denied'): ErrorResponse {
  return new ErrorResponse(403, 'Forbidden', message);
}

export function requestTimeout(message = 'Request processing timeout'): ErrorResponse {
  return new ErrorResponse(408, 'Request Timeout', message);
}

export function payloadTooLarge(message = 'Request body too large'): ErrorResponse {
  return new ErrorResponse(413, 'Payload Too Large', message);
}

export function uriTooLong(message = 'Request URL too long'): ErrorResponse {
  return new ErrorResponse(414, 'URI Too Long', message);
}

export function requestHeaderFieldsTooLarge(message = 'Request headers too large'): ErrorResponse {
  return new ErrorResponse(431, 'Request Header Fields Too Large', message);
}

export function preconditionRequired(message = 'Missing required precondition'): ErrorResponse {
  return new ErrorResponse(428, 'Precondition Required', message);
}

export function internalServerError(message = 'An unexpected error occurred'): ErrorResponse {
  return new ErrorResponse(500, 'Internal Server Error', message);
}

export function serviceUnavailable(message = 'Service temporarily unavailable'): ErrorResponse {
  return new ErrorResponse(503, 'Service Unavailable', message);
}

export const invalidRequestBody = (): ErrorResponse => badRequest('Invalid request body');

export const missingRequiredHeader = (header: string): ErrorResponse =>
  preconditionRequired(`Missing required header: ${header}`);

export const authenticationRequired = (): ErrorResponse => unauthorized();

export const accessDenied = (): ErrorResponse => forbidden();

export const timeoutError = (): ErrorResponse => requestTimeout();

export const panicRecovery = (): ErrorResponse => internalServerError();

export const circuitOpen = (): ErrorResponse => serviceUnavailable('Upstream circuit is open');
