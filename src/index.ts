/**
 * sample-share
 *
 * Copies sample files out of a source S3 bucket for a recipient, grants
 * access, emails a notice, and tracks each share until it expires.
 */

// Configuration
export {
  buildShareConfig,
  buildSmtpConfig,
  normalizePrefix,
  validateShareConfig,
  validateSmtpConfig,
} from './config.js';
export type { ShareConfig, ShareConfigChecks, SmtpConfig } from './config.js';

// Logging
export { createLogger } from './logger.js';
export type { LoggerOptions } from './logger.js';

// Errors
export {
  ShareError,
  NotFoundError,
  ConflictError,
  SecurityError,
  NothingSharedError,
  CapabilityError,
  InvalidRequestError,
  OperationFailedError,
  RecordStoreError,
  errorMessage,
} from './errors.js';
export type { ShareErrorCode, ShareErrorContext } from './errors.js';

// Share lifecycle
export { ShareLifecycleManager } from './sharing/lifecycle-manager.js';
export type {
  ShareLifecycleConfig,
  ShareLifecycleDeps,
  ShareLifecycleOptions,
} from './sharing/lifecycle-manager.js';
export {
  isValidContainerName,
  isValidEmail,
  normalizeSampleIds,
  validateMultiShareRequest,
  validateShareRecord,
  validateSingleShareRequest,
  MAX_SAMPLES_PER_SHARE,
} from './sharing/validation.js';
export { COPY_FAILED, SHARE_KINDS, SHARE_STATUSES } from './sharing/types.js';
export type {
  AccessMode,
  BatchDeleteOutcome,
  BatchOutcome,
  CleanupOutcome,
  DeleteShareResult,
  MultiShareRequest,
  MultiShareValue,
  ShareDestination,
  ShareKind,
  ShareListQuery,
  ShareProgress,
  ShareProgressCallback,
  ShareRecord,
  ShareRecordView,
  ShareResult,
  ShareSortKey,
  ShareStatus,
  ShareValidation,
  ShareWarning,
  SingleShareRequest,
  SingleShareValue,
} from './sharing/types.js';

// Share records
export {
  JsonFileShareRecordStore,
  RECORD_FILE_VERSION,
  deriveView,
  deserializeRecord,
  serializeRecord,
} from './records/record-store.js';
export type { ShareRecordStore } from './records/record-store.js';

// Samples
export {
  multiContainerName,
  parseSampleList,
  randomSuffix,
  relativeKey,
  sampleIdFromPrefix,
  samplePrefix,
  sanitizeNamePart,
  singleContainerName,
} from './samples/sample-paths.js';

// Object store
export { S3ObjectStore, MAX_PRESIGN_SECONDS, DELETION_RULE_ID } from './storage/s3-object-store.js';
export type { S3ObjectStoreConfig } from './storage/s3-object-store.js';
export {
  buildGrantStatements,
  grantStatementId,
  isAwsPrincipal,
  mergePolicyDocument,
  renderPrincipal,
  toAwsStatement,
} from './storage/policies.js';
export type { S3PolicyStatement } from './storage/policies.js';
export type { GrantTarget, ObjectRef, ObjectStoreGateway, StoreRole } from './storage/types.js';

// Notifications
export { SmtpNotifier } from './notify/smtp-notifier.js';
export type { MailTransport, SmtpNotifierOptions } from './notify/smtp-notifier.js';
export {
  MAX_LISTED_SAMPLES,
  escapeHtml,
  expiryFrom,
  formatExpiry,
  renderMultiNotice,
  renderSingleNotice,
  summariseSamples,
} from './notify/templates.js';
export type { NoticeLink, NotificationGateway, RenderedNotice } from './notify/types.js';

// Archives
export { ZipArchiver } from './archive/zip-archiver.js';
export type { ArchiveEntry, Archiver } from './archive/zip-archiver.js';
