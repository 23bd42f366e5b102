/**
 * Share lifecycle: provision, copy, grant, notify, record, expire, delete.
 *
 * Single-sample shares zip the sample into a fresh bucket and hand the
 * recipient a link. Multi-sample shares copy the samples into one bucket
 * the recipient is granted read access to. Every request is recorded in
 * a ShareRecordStore so it can be listed, expired and cleaned up later.
 *
 * Nothing done to the object store is rolled back: a failure after the
 * first side effect is reported with `partiallyApplied: true`.
 */

import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type { ArchiveEntry, Archiver } from '../archive/zip-archiver.js';
import type { ShareConfig } from '../config.js';
import {
  CapabilityError,
  ConflictError,
  InvalidRequestError,
  NotFoundError,
  NothingSharedError,
  OperationFailedError,
  SecurityError,
  ShareError,
  errorMessage,
} from '../errors.js';
import type { ShareErrorContext } from '../errors.js';
import type { NotificationGateway } from '../notify/types.js';
import type { ShareRecordStore } from '../records/record-store.js';
import { deriveView } from '../records/record-store.js';
import {
  randomSuffix,
  relativeKey,
  sampleIdFromPrefix,
  samplePrefix,
  singleContainerName,
} from '../samples/sample-paths.js';
import type { ObjectStoreGateway } from '../storage/types.js';
import type {
  AccessMode,
  BatchDeleteOutcome,
  BatchOutcome,
  DeleteShareResult,
  MultiShareRequest,
  MultiShareValue,
  ShareListQuery,
  ShareProgressCallback,
  ShareRecord,
  ShareRecordView,
  ShareResult,
  ShareStatus,
  ShareWarning,
  SingleShareRequest,
  SingleShareValue,
} from './types.js';
import { COPY_FAILED } from './types.js';
import {
  normalizeSampleIds,
  validateMultiShareRequest,
  validateSingleShareRequest,
} from './validation.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/** Attempts at finding an unused single-share bucket name */
const MAX_NAME_ATTEMPTS = 5;

/** Settings the lifecycle manager reads */
export type ShareLifecycleConfig = Pick<
  ShareConfig,
  | 'region'
  | 'sourcePrefix'
  | 'singleContainerPrefix'
  | 'copyConcurrency'
  | 'maxSingleTtlDays'
  | 'maxMultiTtlDays'
>;

export interface ShareLifecycleDeps {
  store: ObjectStoreGateway;
  notifier: NotificationGateway;
  records: ShareRecordStore;
  archiver: Archiver;
  config: ShareLifecycleConfig;
  logger: Logger;
}

/** Options for creating a ShareLifecycleManager */
export interface ShareLifecycleOptions {
  /** Share id generator (default: random UUID) */
  generateId?: () => string;
  /** Clock (default: system time) */
  now?: () => Date;
  /** Suffix generator for single-share bucket names (default: 8 random hex chars) */
  nameSuffix?: () => string;
  /** Receives status changes while a share request runs */
  onProgress?: ShareProgressCallback;
}

export class ShareLifecycleManager {
  private readonly store: ObjectStoreGateway;
  private readonly notifier: NotificationGateway;
  private readonly records: ShareRecordStore;
  private readonly archiver: Archiver;
  private readonly config: ShareLifecycleConfig;
  private readonly logger: Logger;
  private readonly generateId: () => string;
  private readonly now: () => Date;
  private readonly nameSuffix: () => string;
  private readonly onProgress: ShareProgressCallback | undefined;

  constructor(deps: ShareLifecycleDeps, options?: ShareLifecycleOptions) {
    this.store = deps.store;
    this.notifier = deps.notifier;
    this.records = deps.records;
    this.archiver = deps.archiver;
    this.config = deps.config;
    this.logger = deps.logger.child({ component: 'share-lifecycle' });
    this.generateId = options?.generateId ?? (() => randomUUID());
    this.now = options?.now ?? (() => new Date());
    this.nameSuffix = options?.nameSuffix ?? (() => randomSuffix());
    this.onProgress = options?.onProgress;
  }

  // ─── Single-sample shares ─────────────────────────────────────────

  /**
   * Zip one sample into a new bucket and send the recipient a link.
   * The link is presigned when the store can sign it, otherwise the
   * recipient is granted read access and gets the direct object URL.
   */
  async shareSingle(request: SingleShareRequest): Promise<ShareResult<SingleShareValue>> {
    const sampleId = request.sampleId.trim();
    const context: ShareErrorContext = {
      sampleId,
      recipient: request.recipient,
      sourceContainer: request.sourceContainer,
    };

    const validation = validateSingleShareRequest(request, this.config.maxSingleTtlDays);
    if (!validation.valid) {
      return this.reject(new InvalidRequestError(validation.errors, context), false);
    }

    let applied = false;
    try {
      this.emit('provisioning', `Collecting files for sample ${sampleId}`, sampleId);

      const objects = await this.store.list(
        request.sourceContainer,
        samplePrefix(this.config.sourcePrefix, sampleId)
      );
      if (objects.length === 0) {
        return this.reject(
          new NotFoundError(`No files found for sample ${sampleId} in ${request.sourceContainer}`, context),
          false
        );
      }

      this.emit('copying', `Archiving ${objects.length} file(s)`, sampleId);
      const entries: ArchiveEntry[] = [];
      for (const object of objects) {
        entries.push({
          name: relativeKey(this.config.sourcePrefix, object.name),
          data: await this.store.download(request.sourceContainer, object.name),
        });
      }
      const archive = await this.archiver.archiveFiles(entries);

      const container = await this.chooseSingleContainer(request.sourceContainer, sampleId);
      context.destination = container;
      const key = `${sampleId}.${this.archiver.extension}`;

      applied = true;
      await this.store.create(container, this.config.region);
      await this.store.setDeletionPolicy(container, request.ttlDays);
      await this.store.upload(container, key, archive, this.archiver.contentType);

      const { url, accessMode } = await this.resolveLink(container, key, request);
      this.emit('granted', `Archive available via ${accessMode} link`, sampleId);

      const warnings: ShareWarning[] = [];
      const notified = await this.notify(() =>
        this.notifier.sendSingleNotice(request.recipient, sampleId, [{ filename: key, url }], request.ttlDays)
      );
      if (!notified) {
        warnings.push({
          kind: 'notification_failed',
          message: `Could not notify ${request.recipient} about sample ${sampleId}`,
        });
      }

      const record = this.buildRecord({
        kind: 'single',
        subjects: [sampleId],
        recipient: request.recipient,
        sourceContainer: request.sourceContainer,
        destination: { type: 'object', container, key },
        ttlDays: request.ttlDays,
      });
      await this.persist(record, warnings);

      this.logger.info(
        { shareId: record.id, sampleId, bucket: container, key, accessMode, recipient: request.recipient },
        'Single-sample share completed'
      );
      this.emit('completed', `Shared sample ${sampleId}`, sampleId);

      return this.succeed({ record, url, accessMode }, warnings);
    } catch (err) {
      return this.reject(this.wrap(err, 'Single-sample share failed', context), applied);
    }
  }

  /**
   * Generate bucket names until one is neither the source nor already taken.
   */
  private async chooseSingleContainer(sourceContainer: string, sampleId: string): Promise<string> {
    for (let attempt = 0; attempt < MAX_NAME_ATTEMPTS; attempt++) {
      const candidate = singleContainerName(this.config.singleContainerPrefix, sampleId, this.nameSuffix());
      if (candidate === sourceContainer) continue;
      if (!(await this.store.exists(candidate))) {
        return candidate;
      }
      this.logger.debug({ bucket: candidate }, 'Generated bucket name already taken');
    }
    throw new OperationFailedError(
      `Could not find a free bucket name for sample ${sampleId} after ${MAX_NAME_ATTEMPTS} attempts`,
      { sampleId, sourceContainer }
    );
  }

  private async resolveLink(
    container: string,
    key: string,
    request: SingleShareRequest
  ): Promise<{ url: string; accessMode: AccessMode }> {
    try {
      const url = await this.store.signedUrl(container, key, request.ttlDays);
      return { url, accessMode: 'signed' };
    } catch (err) {
      if (!(err instanceof CapabilityError)) {
        throw err;
      }
      this.logger.warn(
        { bucket: container, key, error: err.message },
        'Cannot sign URL, granting direct read access instead'
      );
      await this.store.grantRole({ container, object: key }, request.recipient, 'reader');
      return { url: this.store.objectUrl(container, key), accessMode: 'direct' };
    }
  }

  // ─── Multi-sample shares ──────────────────────────────────────────

  /**
   * Copy several samples into one bucket and grant the recipient read
   * access to it. Samples that fail to copy are reported, not fatal,
   * unless none succeeds.
   */
  async shareMultiple(request: MultiShareRequest): Promise<ShareResult<MultiShareValue>> {
    const destination = request.destinationContainer;
    const context: ShareErrorContext = {
      sampleIds: [...request.sampleIds],
      recipient: request.recipient,
      destination,
      sourceContainer: request.sourceContainer,
    };

    if (destination === request.sourceContainer) {
      return this.reject(
        new SecurityError(
          `Destination bucket ${destination} is the source bucket; refusing to share into it`,
          context
        ),
        false
      );
    }

    const sampleIds = normalizeSampleIds(request.sampleIds);
    context.sampleIds = sampleIds;
    const validation = validateMultiShareRequest({ ...request, sampleIds }, this.config.maxMultiTtlDays);
    if (!validation.valid) {
      return this.reject(new InvalidRequestError(validation.errors, context), false);
    }

    let applied = false;
    try {
      this.emit('provisioning', `Preparing bucket ${destination}`);

      const exists = await this.store.exists(destination);
      if (request.createNew) {
        if (exists) {
          return this.reject(new ConflictError(`Bucket ${destination} already exists`, context), false);
        }
        applied = true;
        await this.store.create(destination, this.config.region);
        await this.store.setDeletionPolicy(destination, request.ttlDays);
      } else if (!exists) {
        return this.reject(new NotFoundError(`Bucket ${destination} does not exist`, context), false);
      }

      applied = true;
      const results = await this.copySamples(request.sourceContainer, sampleIds, destination);

      await this.store.grantRole({ container: destination }, request.recipient, 'reader');
      this.emit('granted', `Granted ${request.recipient} read access to ${destination}`);

      const succeeded = sampleIds.filter((id) => (results[id] ?? 0) > 0);
      const failed = sampleIds.filter((id) => (results[id] ?? 0) <= 0);

      if (succeeded.length === 0) {
        return this.reject(
          new NothingSharedError(
            `None of the ${sampleIds.length} requested sample(s) could be copied to ${destination}`,
            context
          ),
          true
        );
      }

      const warnings: ShareWarning[] = [];
      const notified = await this.notify(() =>
        this.notifier.sendMultiNotice(request.recipient, succeeded, destination, request.ttlDays)
      );
      if (!notified) {
        warnings.push({
          kind: 'notification_failed',
          message: `Could not notify ${request.recipient} about bucket ${destination}`,
        });
      }

      const record = this.buildRecord({
        kind: 'multi',
        subjects: succeeded,
        recipient: request.recipient,
        sourceContainer: request.sourceContainer,
        destination: { type: 'container', container: destination },
        ttlDays: request.ttlDays,
      });
      await this.persist(record, warnings);

      if (failed.length > 0) {
        warnings.push({
          kind: 'partial_failure',
          message: `${failed.length} of ${sampleIds.length} sample(s) were not shared: ${failed.join(', ')}`,
          failedSubjects: failed,
        });
      }

      this.logger.info(
        {
          shareId: record.id,
          bucket: destination,
          succeeded: succeeded.length,
          failed: failed.length,
          recipient: request.recipient,
        },
        'Multi-sample share completed'
      );
      this.emit('completed', `Shared ${succeeded.length} sample(s) in ${destination}`);

      return this.succeed({ record, results, succeeded, failed }, warnings);
    } catch (err) {
      return this.reject(this.wrap(err, 'Multi-sample share failed', context), applied);
    }
  }

  /**
   * Copy samples with at most `copyConcurrency` in flight.
   * Counts are keyed by sample id, in request order.
   */
  private async copySamples(
    sourceContainer: string,
    sampleIds: string[],
    destination: string
  ): Promise<Record<string, number>> {
    const results: Record<string, number> = {};
    for (const id of sampleIds) {
      results[id] = 0;
    }

    const queue = [...sampleIds];
    const inflight: Promise<void>[] = [];

    const processNext = async (): Promise<void> => {
      const sampleId = queue.shift();
      if (sampleId === undefined) return;

      results[sampleId] = await this.copySample(sourceContainer, sampleId, destination);

      if (queue.length > 0) {
        await processNext();
      }
    };

    const concurrency = Math.min(Math.max(this.config.copyConcurrency, 1), sampleIds.length);
    for (let i = 0; i < concurrency; i++) {
      inflight.push(processNext());
    }
    await Promise.all(inflight);

    return results;
  }

  /**
   * Copy one sample's files. Returns the number copied, 0 when the sample
   * has no files, or COPY_FAILED when a list or copy call threw.
   */
  private async copySample(sourceContainer: string, sampleId: string, destination: string): Promise<number> {
    this.emit('copying', `Copying sample ${sampleId}`, sampleId);

    let copied = 0;
    try {
      const objects = await this.store.list(sourceContainer, samplePrefix(this.config.sourcePrefix, sampleId));
      if (objects.length === 0) {
        this.logger.warn({ sampleId, bucket: sourceContainer }, 'No files found for sample');
        return 0;
      }

      for (const object of objects) {
        await this.store.copy(
          sourceContainer,
          object.name,
          destination,
          relativeKey(this.config.sourcePrefix, object.name)
        );
        copied++;
      }
    } catch (err) {
      this.logger.error(
        { sampleId, bucket: destination, copied, error: errorMessage(err) },
        'Failed to copy sample'
      );
      return COPY_FAILED;
    }

    this.logger.debug({ sampleId, bucket: destination, copied }, 'Sample copied');
    return copied;
  }

  // ─── Record maintenance ───────────────────────────────────────────

  /**
   * Mark every active record whose expiry has passed as inactive.
   * Returns the ids that changed. Object-store data is left alone.
   */
  async expire(now: Date = this.now()): Promise<string[]> {
    const records = await this.records.listAll();
    const expired: string[] = [];

    for (const record of records) {
      if (!record.active || record.expiresAt.getTime() > now.getTime()) continue;
      if (await this.records.updateStatus(record.id, false)) {
        expired.push(record.id);
      }
    }

    if (expired.length > 0) {
      this.logger.info({ count: expired.length, shareIds: expired }, 'Expired shares');
    }
    return expired;
  }

  /**
   * Remove a share record. Single-sample archives are deleted from the
   * store first; multi-sample buckets are left to their deletion policy.
   */
  async deleteShare(id: string): Promise<DeleteShareResult> {
    const records = await this.records.listAll();
    const record = records.find((r) => r.id === id);
    if (!record) {
      return { recordRemoved: false, cleanup: 'not_attempted' };
    }

    const cleanup = record.destination.type === 'object'
      ? await this.removeArchive(record.id, record.destination.container, record.destination.key)
      : 'not_attempted';

    const recordRemoved = await this.records.delete(id);
    this.logger.info({ shareId: id, kind: record.kind, cleanup, recordRemoved }, 'Share deleted');

    return { recordRemoved, cleanup };
  }

  private async removeArchive(
    shareId: string,
    container: string,
    key: string
  ): Promise<'succeeded' | 'failed'> {
    try {
      const names = new Set<string>([key]);
      for (const object of await this.store.list(container, key)) {
        names.add(object.name);
      }

      let allDeleted = true;
      for (const name of names) {
        if (!(await this.store.delete(container, name))) {
          this.logger.warn({ shareId, bucket: container, key: name }, 'Shared object was already gone');
          allDeleted = false;
        }
      }
      return allDeleted ? 'succeeded' : 'failed';
    } catch (err) {
      this.logger.error(
        { shareId, bucket: container, key, error: errorMessage(err) },
        'Failed to delete shared archive'
      );
      return 'failed';
    }
  }

  /** Mark a share inactive. Resolves false for an unknown id. */
  async deactivate(id: string): Promise<boolean> {
    const changed = await this.records.updateStatus(id, false);
    if (changed) {
      this.logger.info({ shareId: id }, 'Share deactivated');
    }
    return changed;
  }

  /**
   * Delete several shares, one after another. An id counts as failed when
   * no record was removed or the removal threw.
   */
  async deleteShares(ids: string[]): Promise<BatchDeleteOutcome> {
    const outcome: BatchDeleteOutcome = { succeeded: [], failed: [], cleanup: {} };

    for (const id of new Set(ids)) {
      try {
        const result = await this.deleteShare(id);
        if (result.recordRemoved) {
          outcome.succeeded.push(id);
          outcome.cleanup[id] = result.cleanup;
        } else {
          outcome.failed.push(id);
        }
      } catch (err) {
        this.logger.error({ shareId: id, error: errorMessage(err) }, 'Failed to delete share');
        outcome.failed.push(id);
      }
    }

    return outcome;
  }

  /** Mark several shares inactive; unknown ids and errors count as failed */
  async deactivateShares(ids: string[]): Promise<BatchOutcome> {
    const outcome: BatchOutcome = { succeeded: [], failed: [] };

    for (const id of new Set(ids)) {
      try {
        if (await this.deactivate(id)) {
          outcome.succeeded.push(id);
        } else {
          outcome.failed.push(id);
        }
      } catch (err) {
        this.logger.error({ shareId: id, error: errorMessage(err) }, 'Failed to deactivate share');
        outcome.failed.push(id);
      }
    }

    return outcome;
  }

  async listShares(query?: ShareListQuery): Promise<ShareRecordView[]> {
    const recipient = query?.recipient?.trim().toLowerCase();
    const views = deriveView(await this.records.listAll(), query?.now ?? this.now()).filter(
      (view) =>
        (query?.includeInactive || view.active) &&
        (!recipient || view.recipient.toLowerCase() === recipient) &&
        (!query?.kind || view.kind === query.kind)
    );

    const sortBy = query?.sortBy;
    if (!sortBy) {
      return views;
    }
    const direction = query?.descending ? -1 : 1;
    const timeOf = (view: ShareRecordView): number =>
      (sortBy === 'created' ? view.createdAt : view.expiresAt).getTime();
    return views.sort((a, b) => direction * (timeOf(a) - timeOf(b)));
  }

  /** Sample ids available under the source prefix, sorted */
  async listSamples(sourceContainer: string): Promise<string[]> {
    const prefixes = await this.store.listPrefixes(sourceContainer, this.config.sourcePrefix);
    const ids = new Set(
      prefixes
        .map((prefix) => sampleIdFromPrefix(this.config.sourcePrefix, prefix))
        .filter((id) => id.length > 0)
    );
    return [...ids].sort();
  }

  // ─── Helpers ──────────────────────────────────────────────────────

  private buildRecord(params: {
    kind: ShareRecord['kind'];
    subjects: string[];
    recipient: string;
    sourceContainer: string;
    destination: ShareRecord['destination'];
    ttlDays: number;
  }): ShareRecord {
    const createdAt = this.now();
    return {
      id: this.generateId(),
      kind: params.kind,
      subjects: params.subjects,
      recipient: params.recipient,
      sourceContainer: params.sourceContainer,
      destination: params.destination,
      createdAt,
      expiresAt: new Date(createdAt.getTime() + params.ttlDays * DAY_MS),
      active: true,
      status: 'completed',
    };
  }

  /** A store failure after the data is shared becomes a warning */
  private async persist(record: ShareRecord, warnings: ShareWarning[]): Promise<void> {
    try {
      await this.records.append(record);
    } catch (err) {
      this.logger.error({ shareId: record.id, error: errorMessage(err) }, 'Failed to record share');
      warnings.push({
        kind: 'persistence_failed',
        message: `Share ${record.id} was not recorded: ${errorMessage(err)}`,
      });
    }
  }

  /** Notifier rejections count as a failed delivery */
  private async notify(send: () => Promise<boolean>): Promise<boolean> {
    try {
      return await send();
    } catch (err) {
      this.logger.error({ error: errorMessage(err) }, 'Notifier threw');
      return false;
    }
  }

  private wrap(err: unknown, message: string, context: ShareErrorContext): ShareError {
    if (err instanceof ShareError) {
      return err;
    }
    this.logger.error({ ...context, error: errorMessage(err) }, message);
    return new OperationFailedError(`${message}: ${errorMessage(err)}`, { ...context }, { cause: err });
  }

  private succeed<T>(value: T, warnings: ShareWarning[]): ShareResult<T> {
    return warnings.length > 0 ? { outcome: 'warning', value, warnings } : { outcome: 'success', value };
  }

  private reject<T>(error: ShareError, partiallyApplied: boolean): ShareResult<T> {
    this.emit('failed', error.message, error.context.sampleId);
    this.logger.warn({ code: error.code, partiallyApplied, ...error.context }, error.message);
    return { outcome: 'failure', error, partiallyApplied };
  }

  private emit(status: ShareStatus, detail: string, sampleId?: string): void {
    this.onProgress?.({ status, detail, sampleId });
  }
}
