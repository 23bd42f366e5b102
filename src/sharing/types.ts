/**
 * Share lifecycle types.
 *
 * A share copies one sample (zipped into a fresh bucket, handed out as a
 * link) or several samples (copied into a bucket the recipient is granted
 * read access to), and is tracked as a ShareRecord until it expires.
 */

import type { ShareError } from '../errors.js';

/** Kind of share */
export type ShareKind = 'single' | 'multi';

/** All valid share kinds */
export const SHARE_KINDS: readonly ShareKind[] = ['single', 'multi'] as const;

/** Lifecycle progress of a share request */
export type ShareStatus = 'provisioning' | 'copying' | 'granted' | 'failed' | 'completed';

/** All valid share statuses */
export const SHARE_STATUSES: readonly ShareStatus[] = [
  'provisioning',
  'copying',
  'granted',
  'failed',
  'completed',
] as const;

/** Where shared data was placed */
export type ShareDestination =
  /** Single share: the uploaded archive */
  | { type: 'object'; container: string; key: string }
  /** Multi share: the bucket the samples were copied into */
  | { type: 'container'; container: string };

/** A tracked share */
export interface ShareRecord {
  readonly id: string;
  kind: ShareKind;
  /** Sample ids covered by the share, in request order */
  subjects: string[];
  recipient: string;
  sourceContainer: string;
  destination: ShareDestination;
  createdAt: Date;
  expiresAt: Date;
  /** False once expired or explicitly deactivated */
  active: boolean;
  status: ShareStatus;
}

/** A record as seen at a given instant */
export interface ShareRecordView extends ShareRecord {
  /** Whole days until expiry, rounded up, never negative */
  daysRemaining: number;
  /** The persisted active flag, before expiry correction */
  storedActive: boolean;
}

/** Input for a single-sample share */
export interface SingleShareRequest {
  sourceContainer: string;
  sampleId: string;
  recipient: string;
  ttlDays: number;
}

/** Input for a multi-sample share */
export interface MultiShareRequest {
  sourceContainer: string;
  sampleIds: string[];
  recipient: string;
  destinationContainer: string;
  ttlDays: number;
  /** Create the destination bucket (fails if it exists) instead of reusing one */
  createNew: boolean;
}

/** How the recipient reaches a single-sample archive */
export type AccessMode = 'signed' | 'direct';

export interface SingleShareValue {
  record: ShareRecord;
  url: string;
  accessMode: AccessMode;
}

/** Copied-file count recorded for a sample that failed mid-copy */
export const COPY_FAILED = -1;

export interface MultiShareValue {
  record: ShareRecord;
  /**
   * Files copied per sample id: 0 = no files found,
   * COPY_FAILED = error during copy
   */
  results: Record<string, number>;
  succeeded: string[];
  failed: string[];
}

/** Secondary problems attached to an otherwise successful share */
export type ShareWarning =
  | { kind: 'notification_failed'; message: string }
  | { kind: 'persistence_failed'; message: string }
  | { kind: 'partial_failure'; message: string; failedSubjects: string[] };

/**
 * Outcome of a share operation: fully clean, successful with warnings,
 * or failed. `partiallyApplied` marks failures that happened after the
 * first change to the object store; that state is not rolled back.
 */
export type ShareResult<T> =
  | { outcome: 'success'; value: T }
  | { outcome: 'warning'; value: T; warnings: ShareWarning[] }
  | { outcome: 'failure'; error: ShareError; partiallyApplied: boolean };

/** What happened to stored data when a share was deleted */
export type CleanupOutcome = 'succeeded' | 'failed' | 'not_attempted';

export interface DeleteShareResult {
  recordRemoved: boolean;
  cleanup: CleanupOutcome;
}

/** Progress event emitted while a share request runs */
export interface ShareProgress {
  status: ShareStatus;
  detail: string;
  sampleId?: string;
}

export type ShareProgressCallback = (progress: ShareProgress) => void;

/** Validation result for share inputs */
export interface ShareValidation {
  valid: boolean;
  errors: string[];
}

/** Record field a listing is ordered by */
export type ShareSortKey = 'created' | 'expires';

/** Listing filters */
export interface ShareListQuery {
  now?: Date;
  /** Include inactive (expired or deactivated) records */
  includeInactive?: boolean;
  /** Only shares for this recipient (case-insensitive) */
  recipient?: string;
  kind?: ShareKind;
  /** Order by creation or expiry time; stored order when omitted */
  sortBy?: ShareSortKey;
  /** Newest / latest first */
  descending?: boolean;
}

/** Per-id outcome of a command applied to several shares */
export interface BatchOutcome {
  succeeded: string[];
  failed: string[];
}

export interface BatchDeleteOutcome extends BatchOutcome {
  /** Cleanup result for each removed record */
  cleanup: Record<string, CleanupOutcome>;
}
