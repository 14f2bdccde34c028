/**
 * Bridge Errors
 *
 * Every failure the bridge reports is a BridgeError with a stable code.
 * Transient faults are retried by the layer that owns the resource;
 * the rest are rejected at the boundary or annotated on results.
 */

export type BridgeErrorCode =
  | 'STORE_UNAVAILABLE'
  | 'TRANSLATION_DEGRADED'
  | 'SIGNATURE_INVALID'
  | 'DELIVERY_EXHAUSTED'
  | 'TRANSPORT_TRANSIENT'
  | 'INVALID_ACTIVITY'
  | 'CONFIG_ERROR';

/**
 * Base error class for bridge operations.
 */
export class BridgeError extends Error {
  constructor(
    message: string,
    public code: BridgeErrorCode,
    public retryable: boolean = false,
    public cause?: unknown
  ) {
    super(message);
    this.name = 'BridgeError';
  }
}

/**
 * The persistent layer could not be reached. Aborts the current operation.
 */
export class StoreUnavailable extends BridgeError {
  constructor(operation: string, cause?: unknown) {
    super(
      `Store unavailable during ${operation}: ${cause instanceof Error ? cause.message : String(cause)}`,
      'STORE_UNAVAILABLE',
      true,
      cause
    );
    this.name = 'StoreUnavailable';
  }
}

export type DegradationReason =
  | 'missing_parent'
  | 'missing_quote'
  | 'unresolved_mention'
  | 'unsupported_media'
  | 'invalid_reference'
  | 'thread_too_deep';

/**
 * A lossy or partial translation. Collected on translation results, never thrown.
 */
export class TranslationDegraded extends BridgeError {
  constructor(
    public reason: DegradationReason,
    public subject: string,
    detail?: string
  ) {
    super(detail ?? `${reason}: ${subject}`, 'TRANSLATION_DEGRADED', false);
    this.name = 'TranslationDegraded';
  }
}

/**
 * An inbound activity failed HTTP signature verification. No side effects were performed.
 */
export class SignatureInvalid extends BridgeError {
  constructor(message: string, public actor?: string) {
    super(message, 'SIGNATURE_INVALID', false);
    this.name = 'SignatureInvalid';
  }
}

/**
 * An outbound activity was dropped after the retry ceiling.
 */
export class DeliveryExhausted extends BridgeError {
  constructor(
    public activityId: string,
    public inbox: string,
    public attempts: number,
    public lastError: string
  ) {
    super(
      `Delivery of ${activityId} to ${inbox} exhausted after ${attempts} attempts: ${lastError}`,
      'DELIVERY_EXHAUSTED',
      false
    );
    this.name = 'DeliveryExhausted';
  }
}

/**
 * Relay or HTTP I/O failure. Always retried with backoff by its owner.
 */
export class TransportTransient extends BridgeError {
  constructor(message: string, public status?: number, cause?: unknown) {
    super(message, 'TRANSPORT_TRANSIENT', true, cause);
    this.name = 'TransportTransient';
  }
}

/**
 * An inbound payload that does not describe a usable activity.
 */
export class InvalidActivity extends BridgeError {
  constructor(message: string) {
    super(message, 'INVALID_ACTIVITY', false);
    this.name = 'InvalidActivity';
  }
}

export class ConfigError extends BridgeError {
  constructor(public issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, 'CONFIG_ERROR', false);
    this.name = 'ConfigError';
  }
}

/**
 * Format an unknown thrown value for logging.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
