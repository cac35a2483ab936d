export type BackendErrorKind =
  | 'auth'
  | 'network'
  | 'quota'
  | 'timeout'
  | 'response'
  | 'configuration'
  | 'unknown';

export interface BackendErrorOptions {
  kind: BackendErrorKind;
  status?: number;
  cause?: unknown;
}

/**
 * The model backend could not be reached or rejected the request.
 * Never produced for replies that merely fail to parse.
 */
export class BackendError extends Error {
  readonly kind: BackendErrorKind;

  readonly status?: number;

  constructor(message: string, options: BackendErrorOptions) {
    super(message, { cause: options.cause });
    this.name = 'BackendError';
    this.kind = options.kind;
    this.status = options.status;
  }
}

export function isBackendError(error: unknown): error is BackendError {
  return error instanceof BackendError;
}
