export const HEADER_AUTHORIZATION = 'Authorization';
export const HEADER_CONTENT_TYPE = 'Content-Type';
export const HEADER_CONTENT_LENGTH = 'Content-Length';
export const HEADER_REQUEST_ID = 'X-Request-ID';
export const HEADER_RETRY_AFTER = 'Retry-After';
export const HEADER_USER_AGENT = 'User-Agent';

export const MIME_APPLICATION_JSON = 'application/json';
