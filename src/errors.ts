/**
 * Error taxonomy for share lifecycle operations.
 *
 * Every error carries the request context (sample ids, recipient,
 * destination) so an operator can retry the request by hand.
 */

/** Stable error codes, one per error class */
export type ShareErrorCode =
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'SECURITY'
  | 'NOTHING_SHARED'
  | 'CAPABILITY'
  | 'INVALID_REQUEST'
  | 'OPERATION_FAILED'
  | 'RECORD_STORE';

/** Request context attached to an error */
export interface ShareErrorContext {
  sampleId?: string;
  sampleIds?: string[];
  recipient?: string;
  destination?: string;
  sourceContainer?: string;
}

export class ShareError extends Error {
  public readonly code: ShareErrorCode;
  public readonly context: ShareErrorContext;

  constructor(code: ShareErrorCode, message: string, context: ShareErrorContext = {}, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ShareError';
    this.code = code;
    this.context = context;
  }
}

/** Requested sample(s) or destination container absent */
export class NotFoundError extends ShareError {
  constructor(message: string, context?: ShareErrorContext) {
    super('NOT_FOUND', message, context);
    this.name = 'NotFoundError';
  }
}

/** Destination container already exists when a new one was requested */
export class ConflictError extends ShareError {
  constructor(message: string, context?: ShareErrorContext) {
    super('CONFLICT', message, context);
    this.name = 'ConflictError';
  }
}

/** Destination equals the source container */
export class SecurityError extends ShareError {
  constructor(message: string, context?: ShareErrorContext) {
    super('SECURITY', message, context);
    this.name = 'SecurityError';
  }
}

/** Every sample of a multi-sample share failed to copy */
export class NothingSharedError extends ShareError {
  constructor(message: string, context?: ShareErrorContext) {
    super('NOTHING_SHARED', message, context);
    this.name = 'NothingSharedError';
  }
}

/**
 * The object store cannot sign URLs (missing signing credentials,
 * expiry beyond what the store can presign).
 */
export class CapabilityError extends ShareError {
  constructor(message: string, context?: ShareErrorContext, options?: ErrorOptions) {
    super('CAPABILITY', message, context, options);
    this.name = 'CapabilityError';
  }
}

/** Request rejected by input validation */
export class InvalidRequestError extends ShareError {
  public readonly errors: string[];

  constructor(errors: string[], context?: ShareErrorContext) {
    super('INVALID_REQUEST', `Invalid share request: ${errors.join('; ')}`, context);
    this.name = 'InvalidRequestError';
    this.errors = errors;
  }
}

/** An unexpected gateway failure while a request was running */
export class OperationFailedError extends ShareError {
  constructor(message: string, context?: ShareErrorContext, options?: ErrorOptions) {
    super('OPERATION_FAILED', message, context, options);
    this.name = 'OperationFailedError';
  }
}

/** The tracking file could not be read, parsed or written */
export class RecordStoreError extends ShareError {
  public readonly filePath: string;

  constructor(filePath: string, message: string, options?: ErrorOptions) {
    super('RECORD_STORE', message, {}, options);
    this.name = 'RecordStoreError';
    this.filePath = filePath;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
