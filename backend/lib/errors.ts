/**
 * Raised when the remote detection endpoint cannot be reached, answers with a
 * non-200 status, or answers 200 with a body that is not a detection result.
 */
export class RemoteDetectionError extends Error {
  /**
   * @param message Description of the failure
   * @param status Upstream HTTP status; undefined when no response arrived
   * @param body Raw upstream body text, empty when no response arrived
   */
  constructor(
    message: string,
    public readonly status: number | undefined,
    public readonly body: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'RemoteDetectionError';
  }
}

export type StoreDeletionReason = 'invalid-key' | 'not-found' | 'store-error';

/**
 * Raised when an object could not be deleted from the object store.
 */
export class StoreDeletionError extends Error {
  constructor(
    public readonly key: string,
    public readonly reason: StoreDeletionReason,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'StoreDeletionError';
  }
}

/**
 * Raised when a scanned detection record has a missing or non-integer
 * timestamp. Aborts the whole export.
 */
export class DataShapeError extends Error {
  constructor(
    public readonly recordIndex: number,
    public readonly value: unknown,
    message: string
  ) {
    super(message);
    this.name = 'DataShapeError';
  }
}
