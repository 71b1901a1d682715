import { createRemoteJWKSet, JWTVerifyGetKey, RemoteJWKSetOptions } from 'jose';

export class MissingKeyIdError extends Error {
  constructor() {
    super('use of remote key set requires that the payload contains a "kid" field in the protected header');
    this.name = 'MissingKeyIdError';
  }
}

/**
 * Key resolver bound to a single JWKS URL. Tokens without a `kid` in their
 * protected header are rejected before any key set is fetched.
 */
export function remoteKeySetProvider(keySetUrl: string | URL, options?: RemoteJWKSetOptions): JWTVerifyGetKey {
  const keySet = createRemoteJWKSet(new URL(keySetUrl), options);

  return async (protectedHeader, token) => {
    if (!protectedHeader.kid) {
      throw new MissingKeyIdError();
    }
    return keySet(protectedHeader, token);
  };
}
