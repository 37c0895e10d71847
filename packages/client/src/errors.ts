export type FireApiErrorKind = 'client' | 'authentication' | 'request';

/**
 * Generic client error. Also the base of every error this package throws,
 * so `instanceof FireApiError` catches all of them; use `kind` to tell them apart.
 */
export class FireApiError extends Error {
  readonly kind: FireApiErrorKind = 'client';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FireApiError';
  }
}

export type AuthenticationFailure = 'invalid_key' | 'access_denied';

/** 401 (bad key) or 403 (access denied / 24fire+ required). */
export class ApiAuthenticationError extends FireApiError {
  override readonly kind = 'authentication' as const;
  readonly status: 401 | 403;
  readonly reason: AuthenticationFailure;

  constructor(status: 401 | 403) {
    super(
      status === 401
        ? 'Authentication failed. Check your API key.'
        : "Access denied or this feature requires a '24fire+' subscription."
    );
    this.name = 'ApiAuthenticationError';
    this.status = status;
    this.reason = status === 401 ? 'invalid_key' : 'access_denied';
  }
}

/**
 * Non-2xx response other than 401/403, or a request that timed out
 * (then `status` is null and `body` is empty).
 */
export class ApiRequestError extends FireApiError {
  override readonly kind = 'request' as const;
  readonly status: number | null;
  readonly body: string;

  constructor(message: string, status: number | null, body: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ApiRequestError';
    this.status = status;
    this.body = body;
  }
}

export function isFireApiError(err: unknown): err is FireApiError {
  return err instanceof FireApiError;
}

/** Extract a readable error message from unknown throw. */
export function getReadableErrorMessage(err: unknown): string {
  if (err === null || err === undefined) return 'Unknown error';

  if (err instanceof Error) {
    const m = err.message?.trim();
    if (m && m !== '[object Object]') return m;
    return err.name;
  }

  if (typeof err === 'string') return err;
  if (typeof err === 'object') return JSON.stringify(err);
  return String(err);
}
