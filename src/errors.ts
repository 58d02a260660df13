export type TransportOperation =
  | 'deleteMessage'
  | 'sendMessage'
  | 'restrictUser'
  | 'banUser';

export interface TransportError {
  kind: 'transport';
  operation: TransportOperation;
  message: string;
  status?: number;
}

export interface StoreUnavailable {
  kind: 'store_unavailable';
  operation: string;
  message: string;
  timedOut: boolean;
}

export interface ConfigLoadError {
  kind: 'config_load';
  path: string;
  field?: string;
  message: string;
}

export type ModerationError = TransportError | StoreUnavailable | ConfigLoadError;

export type ActionResult =
  | { ok: true }
  | { ok: false; error: TransportError };

export type StoreResult<T> =
  | { status: 'ok'; value: T }
  | { status: 'degraded'; value: T; error: StoreUnavailable };

const BUSY_ERROR_CODES = new Set(['SQLITE_BUSY', 'SQLITE_LOCKED']);

/** True for SQLite lock waits that ran past `busy_timeout`. */
export function isBusyError(error: unknown): boolean {
  if (!error || typeof error !== 'object' || !('code' in error)) {
    return false;
  }

  const { code } = error;
  return typeof code === 'string' && BUSY_ERROR_CODES.has(code);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function extractErrorStatus(error: unknown): number | undefined {
  if (!error || typeof error !== 'object' || !('status' in error)) {
    return undefined;
  }

  const { status } = error;
  if (typeof status !== 'number') {
    return undefined;
  }

  return Number.isFinite(status) ? status : undefined;
}

export function toTransportError(operation: TransportOperation, error: unknown): TransportError {
  const status = extractErrorStatus(error);
  return {
    kind: 'transport',
    operation,
    message: errorMessage(error),
    ...(status !== undefined ? { status } : {}),
  };
}

export function describeError(error: ModerationError): string {
  switch (error.kind) {
    case 'transport':
      return `${error.operation} failed: ${error.message}`;
    case 'store_unavailable':
      return `store ${error.operation} ${error.timedOut ? 'timed out' : 'failed'}: ${error.message}`;
    case 'config_load':
      return error.field
        ? `${error.path}: ${error.field}: ${error.message}`
        : `${error.path}: ${error.message}`;
    default:
      return 'unknown error';
  }
}
