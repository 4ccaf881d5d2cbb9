export class RelayError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'RelayError';
  }
}

export class ConfigError extends RelayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class DbError extends RelayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DB_ERROR', details);
    this.name = 'DbError';
  }
}

/**
 * Failure kinds a source or the fetch pipeline can report for one item or handle.
 */
export type SourceFailureKind =
  | 'USER_RESOLUTION_FAILED'
  | 'NO_VIDEO_LISTING'
  | 'NETWORK_FAILURE'
  | 'NO_DOWNLOADABLE_MEDIA'
  | 'WRITE_FAILURE'
  | 'IN_FLIGHT';

// NO_DOWNLOADABLE_MEDIA is final for the item. A WRITE_FAILURE only fails that attempt.
const TRANSIENT_KINDS: ReadonlySet<SourceFailureKind> = new Set([
  'NETWORK_FAILURE',
  'NO_VIDEO_LISTING',
  'WRITE_FAILURE',
  'IN_FLIGHT',
]);

export class SourceError extends RelayError {
  constructor(
    message: string,
    public readonly kind: SourceFailureKind,
    details?: Record<string, unknown>,
  ) {
    super(message, 'SOURCE_ERROR', { kind, ...details });
    this.name = 'SourceError';
  }

  /** Transient failures are retried on the next tick. */
  get transient(): boolean {
    return TRANSIENT_KINDS.has(this.kind);
  }
}

export class DeliveryError extends RelayError {
  constructor(
    message: string,
    public readonly permanent: boolean,
    details?: Record<string, unknown>,
  ) {
    super(message, 'DELIVERY_ERROR', { permanent, ...details });
    this.name = 'DeliveryError';
  }
}

/**
 * A local artifact could not be read for upload. Fails that send only; the
 * destination never saw it, so this is not a rejection.
 */
export class LocalFileError extends DeliveryError {
  constructor(
    message: string,
    public readonly filePath: string,
  ) {
    super(message, false, { path: filePath, local: true });
    this.name = 'LocalFileError';
  }
}

export class ActionError extends RelayError {
  constructor(
    message: string,
    public readonly expired: boolean,
    details?: Record<string, unknown>,
  ) {
    super(message, 'ACTION_ERROR', { expired, ...details });
    this.name = 'ActionError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
