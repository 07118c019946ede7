import { err, ok, ResultAsync, type Result } from 'neverthrow';

import { getErrorMessage, hasNumberProperty } from '../core/type-guards.js';
import type { AuthFailure, KudaHeaders } from '../core/types.js';

const DEFAULT_AUTH_FAILURE_STATUS = 401;

/**
 * Produces the headers for one Kuda call. Resolves to an {@link AuthFailure} instead of throwing,
 * so the normalizer can report it without sending the request.
 */
export interface HeaderProvider {
  generateHeaders(): Promise<Result<KudaHeaders, AuthFailure>>;
}

/**
 * Caller-owned token acquisition (token endpoint, caching). May reject with an error
 * carrying a numeric `status` or `statusCode`.
 */
export type TokenSource = () => Promise<string>;

function toAuthFailure(error: unknown): AuthFailure {
  let status = DEFAULT_AUTH_FAILURE_STATUS;
  if (hasNumberProperty(error, 'status')) {
    status = error.status;
  } else if (hasNumberProperty(error, 'statusCode')) {
    status = error.statusCode;
  }

  return {
    status,
    message: getErrorMessage(error, 'Token source failed'),
    body: error,
  };
}

function bearerHeaders(token: string): KudaHeaders {
  return {
    Authorization: `Bearer ${token}`,
    'Content-Type': 'application/json',
  };
}

export function createBearerHeaderProvider(tokenSource: TokenSource): HeaderProvider {
  return {
    async generateHeaders(): Promise<Result<KudaHeaders, AuthFailure>> {
      // Promise.resolve().then() also captures a token source that throws synchronously
      const token = await ResultAsync.fromPromise(Promise.resolve().then(tokenSource), toAuthFailure);
      if (token.isErr()) {
        return err(token.error);
      }
      if (token.value.trim() === '') {
        return err({ status: DEFAULT_AUTH_FAILURE_STATUS, message: 'Token source returned an empty token' });
      }
      return ok(bearerHeaders(token.value));
    },
  };
}

/**
 * Fixed token, for scripts and tests that already hold one.
 */
export function createStaticHeaderProvider(token: string): HeaderProvider {
  return createBearerHeaderProvider(() => Promise.resolve(token));
}
