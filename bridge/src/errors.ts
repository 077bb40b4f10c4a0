// ============================================================================
// TsuryPhone Bridge - Errors
// Error classes raised by the bridge. Transport problems are retryable
// (the next poll or reconnect picks them up); validation problems are
// raised before any request leaves the process.
// ============================================================================

/** Why a device request failed */
export type DeviceRequestErrorKind = 'timeout' | 'network' | 'http' | 'invalid-payload';

/**
 * A request to the device HTTP API failed.
 * `retryable` is true for transport failures (timeout, refused connection).
 */
export class DeviceRequestError extends Error {
  readonly kind: DeviceRequestErrorKind;
  readonly status: number | undefined;
  readonly retryable: boolean;

  constructor(
    message: string,
    kind: DeviceRequestErrorKind,
    options: { status?: number; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = 'DeviceRequestError';
    this.kind = kind;
    this.status = options.status;
    this.retryable = kind === 'timeout' || kind === 'network';
  }
}

/** Ring pattern text did not match the pattern grammar */
export class RingPatternError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RingPatternError';
  }
}

/** User-supplied input (device name, DnD hours, numbers) was rejected */
export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

/** Neither status nor stats could be fetched during a refresh cycle */
export class RefreshFailedError extends Error {
  constructor(message: string, readonly causes: unknown[]) {
    super(message);
    this.name = 'RefreshFailedError';
  }
}

/** A registry lookup named a device that is not configured */
export class UnknownDeviceError extends Error {
  constructor(readonly deviceId: string) {
    super(`Device not found: ${deviceId}`);
    this.name = 'UnknownDeviceError';
  }
}

/** Format any thrown value for a log line */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
