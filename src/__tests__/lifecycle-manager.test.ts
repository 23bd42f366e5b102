import { describe, it, expect, beforeEach } from 'vitest';
import JSZip from 'jszip';
import { ZipArchiver } from '../archive/zip-archiver.js';
import {
  ConflictError,
  InvalidRequestError,
  NotFoundError,
  NothingSharedError,
  OperationFailedError,
  SecurityError,
} from '../errors.js';
import { ShareLifecycleManager } from '../sharing/lifecycle-manager.js';
import type { ShareLifecycleConfig } from '../sharing/lifecycle-manager.js';
import type { MultiShareRequest, ShareProgress, ShareRecord, SingleShareRequest } from '../sharing/types.js';
import { COPY_FAILED } from '../sharing/types.js';
import {
  InMemoryObjectStore,
  InMemoryShareRecordStore,
  RecordingNotifier,
  silentLogger,
} from './helpers/fakes.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const SOURCE = 'lab-data';
const NOW = new Date('2026-03-01T12:00:00.000Z');
const SINGLE_BUCKET = 'temp-share-889-6625-abcd1234';

function makeConfig(overrides?: Partial<ShareLifecycleConfig>): ShareLifecycleConfig {
  return {
    region: 'us-east-1',
    sourcePrefix: '',
    singleContainerPrefix: 'temp-share',
    copyConcurrency: 2,
    maxSingleTtlDays: 30,
    maxMultiTtlDays: 90,
    ...overrides,
  };
}

function singleRequest(overrides?: Partial<SingleShareRequest>): SingleShareRequest {
  return {
    sourceContainer: SOURCE,
    sampleId: '889-6625',
    recipient: 'user@example.com',
    ttlDays: 7,
    ...overrides,
  };
}

function multiRequest(overrides?: Partial<MultiShareRequest>): MultiShareRequest {
  return {
    sourceContainer: SOURCE,
    sampleIds: ['A', 'B', 'C'],
    recipient: 'user@example.com',
    destinationContainer: 'shared-out',
    ttlDays: 30,
    createNew: true,
    ...overrides,
  };
}

describe('ShareLifecycleManager', () => {
  let store: InMemoryObjectStore;
  let notifier: RecordingNotifier;
  let records: InMemoryShareRecordStore;
  let progress: ShareProgress[];
  let suffixes: string[];

  function makeManager(config?: Partial<ShareLifecycleConfig>, objectStore = store): ShareLifecycleManager {
    let counter = 0;
    return new ShareLifecycleManager(
      {
        store: objectStore,
        notifier,
        records,
        archiver: new ZipArchiver(),
        config: makeConfig(config),
        logger: silentLogger(),
      },
      {
        generateId: () => `share-${++counter}`,
        now: () => NOW,
        nameSuffix: () => suffixes.shift() ?? 'abcd1234',
        onProgress: (event) => progress.push(event),
      }
    );
  }

  beforeEach(() => {
    store = new InMemoryObjectStore();
    store.seed(SOURCE, {
      '889-6625/reads_R1.fq': 'ACGT',
      '889-6625/reads_R2.fq': 'TGCA',
      '889-66250/other.fq': 'GGGG',
      'A/a1.txt': 'a1',
      'A/a2.txt': 'a2',
      'C/c1.txt': 'c1',
    });
    notifier = new RecordingNotifier();
    records = new InMemoryShareRecordStore();
    progress = [];
    suffixes = [];
  });

  // ─── shareSingle ──────────────────────────────────────────────────

  describe('shareSingle', () => {
    it('should zip the sample, upload it to a new bucket and send a signed link', async () => {
      const manager = makeManager();

      const result = await manager.shareSingle(singleRequest());

      expect(result.outcome).toBe('success');
      if (result.outcome !== 'success') return;

      const url = `https://signed.test/${SINGLE_BUCKET}/889-6625.zip?ttl=7`;
      expect(result.value.url).toBe(url);
      expect(result.value.accessMode).toBe('signed');
      expect(result.value.record).toEqual({
        id: 'share-1',
        kind: 'single',
        subjects: ['889-6625'],
        recipient: 'user@example.com',
        sourceContainer: SOURCE,
        destination: { type: 'object', container: SINGLE_BUCKET, key: '889-6625.zip' },
        createdAt: NOW,
        expiresAt: new Date('2026-03-08T12:00:00.000Z'),
        active: true,
        status: 'completed',
      });

      expect(records.records).toHaveLength(1);
      expect(store.deletionPolicies.get(SINGLE_BUCKET)).toBe(7);
      expect(notifier.sent).toEqual([
        {
          kind: 'single',
          recipient: 'user@example.com',
          sampleIds: ['889-6625'],
          urls: [{ filename: '889-6625.zip', url }],
          ttlDays: 7,
        },
      ]);
    });

    it('should archive only files under the exact sample prefix', async () => {
      const manager = makeManager();
      await manager.shareSingle(singleRequest());

      const archive = store.buckets.get(SINGLE_BUCKET)?.get('889-6625.zip');
      expect(archive).toBeDefined();
      if (!archive) return;

      const zip = await JSZip.loadAsync(archive);
      const names = Object.values(zip.files)
        .filter((entry) => !entry.dir)
        .map((entry) => entry.name)
        .sort();
      expect(names).toEqual(['889-6625/reads_R1.fq', '889-6625/reads_R2.fq']);
      expect(await zip.file('889-6625/reads_R2.fq')?.async('string')).toBe('TGCA');
    });

    it('should name archive entries relative to the source prefix', async () => {
      store.seed('prefixed-source', { 'FulgentTF/S1/x.fq': 'xx', 'FulgentTF/S1/sub/y.fq': 'yy' });
      const manager = makeManager({ sourcePrefix: 'FulgentTF/' });

      const result = await manager.shareSingle(
        singleRequest({ sourceContainer: 'prefixed-source', sampleId: 'S1' })
      );

      expect(result.outcome).toBe('success');
      const archive = store.buckets.get('temp-share-s1-abcd1234')?.get('S1.zip');
      expect(archive).toBeDefined();
      if (!archive) return;
      const zip = await JSZip.loadAsync(archive);
      const names = Object.values(zip.files)
        .filter((entry) => !entry.dir)
        .map((entry) => entry.name)
        .sort();
      expect(names).toEqual(['S1/sub/y.fq', 'S1/x.fq']);
    });

    it('should report progress through to completion', async () => {
      const manager = makeManager();
      await manager.shareSingle(singleRequest());

      expect(progress.map((event) => event.status)).toEqual([
        'provisioning',
        'copying',
        'granted',
        'completed',
      ]);
      expect(progress.every((event) => event.sampleId === '889-6625')).toBe(true);
    });

    it('should fall back to a direct URL and an object grant when signing is unavailable', async () => {
      store.signingUnavailable = true;
      const manager = makeManager();

      const result = await manager.shareSingle(singleRequest());

      expect(result.outcome).toBe('success');
      if (result.outcome !== 'success') return;
      expect(result.value.accessMode).toBe('direct');
      expect(result.value.url).toBe(`https://direct.test/${SINGLE_BUCKET}/889-6625.zip`);
      expect(store.grants).toEqual([
        {
          target: { container: SINGLE_BUCKET, object: '889-6625.zip' },
          principal: 'user@example.com',
          role: 'reader',
        },
      ]);
    });

    it('should fail without fallback when signing fails for another reason', async () => {
      store.failOn.signedUrl = () => new Error('connection reset');
      const manager = makeManager();

      const result = await manager.shareSingle(singleRequest());

      expect(result.outcome).toBe('failure');
      if (result.outcome !== 'failure') return;
      expect(result.error).toBeInstanceOf(OperationFailedError);
      expect(result.error.message).toBe('Single-sample share failed: connection reset');
      expect(result.error.context.destination).toBe(SINGLE_BUCKET);
      expect(result.partiallyApplied).toBe(true);
      expect(store.grants).toHaveLength(0);
      expect(notifier.sent).toHaveLength(0);
      expect(records.records).toHaveLength(0);
      expect(progress[progress.length - 1]?.status).toBe('failed');
    });

    it('should return NotFoundError without side effects when the sample has no files', async () => {
      const manager = makeManager();

      const result = await manager.shareSingle(singleRequest({ sampleId: 'missing' }));

      expect(result.outcome).toBe('failure');
      if (result.outcome !== 'failure') return;
      expect(result.error).toBeInstanceOf(NotFoundError);
      expect(result.error.message).toBe('No files found for sample missing in lab-data');
      expect(result.partiallyApplied).toBe(false);
      expect(store.callsTo('create')).toHaveLength(0);
      expect(records.records).toHaveLength(0);
    });

    it('should regenerate the bucket name when it is taken or equals the source', async () => {
      store.seed('temp-share-s1-aaaa1111', { 's1/f.txt': 'f' });
      store.seed('temp-share-s1-bbbb2222', {});
      suffixes = ['aaaa1111', 'bbbb2222', 'cccc3333'];
      const manager = makeManager();

      const result = await manager.shareSingle(
        singleRequest({ sourceContainer: 'temp-share-s1-aaaa1111', sampleId: 's1' })
      );

      expect(result.outcome).toBe('success');
      if (result.outcome !== 'success') return;
      expect(result.value.record.destination.container).toBe('temp-share-s1-cccc3333');
      // The source name is skipped without a lookup
      expect(store.callsTo('exists').map((call) => call.args[0])).toEqual([
        'temp-share-s1-bbbb2222',
        'temp-share-s1-cccc3333',
      ]);
    });

    it('should return a warning when the notification is not delivered', async () => {
      notifier.deliver = false;
      const manager = makeManager();

      const result = await manager.shareSingle(singleRequest());

      expect(result.outcome).toBe('warning');
      if (result.outcome !== 'warning') return;
      expect(result.warnings).toEqual([
        { kind: 'notification_failed', message: 'Could not notify user@example.com about sample 889-6625' },
      ]);
      expect(records.records).toHaveLength(1);
    });

    it('should return a warning when the record cannot be stored', async () => {
      records.failAppend = new Error('disk full');
      const manager = makeManager();

      const result = await manager.shareSingle(singleRequest());

      expect(result.outcome).toBe('warning');
      if (result.outcome !== 'warning') return;
      expect(result.warnings).toEqual([
        { kind: 'persistence_failed', message: 'Share share-1 was not recorded: disk full' },
      ]);
      expect(store.buckets.get(SINGLE_BUCKET)?.has('889-6625.zip')).toBe(true);
    });

    it('should reject an out-of-range ttl before touching the store', async () => {
      const manager = makeManager();

      const result = await manager.shareSingle(singleRequest({ ttlDays: 31 }));

      expect(result.outcome).toBe('failure');
      if (result.outcome !== 'failure') return;
      expect(result.error).toBeInstanceOf(InvalidRequestError);
      expect(result.error.message).toBe('Invalid share request: ttlDays must be a whole number between 1 and 30');
      expect(result.partiallyApplied).toBe(false);
      expect(store.calls).toHaveLength(0);
    });
  });

  // ─── shareMultiple ────────────────────────────────────────────────

  describe('shareMultiple', () => {
    it('should refuse to share into the source bucket before any other check', async () => {
      const manager = makeManager();

      const result = await manager.shareMultiple(
        multiRequest({ destinationContainer: SOURCE, recipient: 'not-an-email' })
      );

      expect(result.outcome).toBe('failure');
      if (result.outcome !== 'failure') return;
      expect(result.error).toBeInstanceOf(SecurityError);
      expect(result.partiallyApplied).toBe(false);
      expect(store.calls).toHaveLength(0);
      expect(notifier.sent).toHaveLength(0);
      expect(records.records).toHaveLength(0);
    });

    it('should keep its own copy of the requested ids in the error context', async () => {
      const manager = makeManager();
      const sampleIds = ['A', 'B'];

      const result = await manager.shareMultiple(multiRequest({ sampleIds, destinationContainer: SOURCE }));
      sampleIds.push('C');

      expect(result.outcome).toBe('failure');
      if (result.outcome !== 'failure') return;
      expect(result.error.context.sampleIds).toEqual(['A', 'B']);
      expect(result.error.context.sampleIds).not.toBe(sampleIds);
    });

    it('should share the samples that exist and report the rest', async () => {
      const manager = makeManager();

      const result = await manager.shareMultiple(multiRequest());

      expect(result.outcome).toBe('warning');
      if (result.outcome !== 'warning') return;
      expect(result.value.results).toEqual({ A: 2, B: 0, C: 1 });
      expect(result.value.succeeded).toEqual(['A', 'C']);
      expect(result.value.failed).toEqual(['B']);
      expect(result.value.record.subjects).toEqual(['A', 'C']);
      expect(result.value.record.destination).toEqual({ type: 'container', container: 'shared-out' });
      expect(result.warnings).toEqual([
        {
          kind: 'partial_failure',
          message: '1 of 3 sample(s) were not shared: B',
          failedSubjects: ['B'],
        },
      ]);

      expect([...(store.buckets.get('shared-out')?.keys() ?? [])].sort()).toEqual([
        'A/a1.txt',
        'A/a2.txt',
        'C/c1.txt',
      ]);
      expect(store.deletionPolicies.get('shared-out')).toBe(30);
      expect(store.grants).toEqual([
        { target: { container: 'shared-out' }, principal: 'user@example.com', role: 'reader' },
      ]);
      expect(notifier.sent).toEqual([
        {
          kind: 'multi',
          recipient: 'user@example.com',
          sampleIds: ['A', 'C'],
          urls: [],
          container: 'shared-out',
          ttlDays: 30,
        },
      ]);
      expect(records.records).toHaveLength(1);
    });

    it('should mark a sample whose copy throws as failed and keep going', async () => {
      store.failOn.copy = (_src, name) => (name === 'A/a2.txt' ? new Error('throttled') : undefined);
      const manager = makeManager();

      const result = await manager.shareMultiple(multiRequest());

      expect(result.outcome).toBe('warning');
      if (result.outcome !== 'warning') return;
      expect(result.value.results).toEqual({ A: COPY_FAILED, B: 0, C: 1 });
      expect(result.value.failed).toEqual(['A', 'B']);
      expect(result.value.record.subjects).toEqual(['C']);
    });

    it('should return success without warnings when every sample is copied', async () => {
      const manager = makeManager();

      const result = await manager.shareMultiple(multiRequest({ sampleIds: ['A', 'C'] }));

      expect(result.outcome).toBe('success');
      if (result.outcome !== 'success') return;
      expect(result.value.failed).toEqual([]);
      expect(result.value.record.expiresAt).toEqual(new Date(NOW.getTime() + 30 * DAY_MS));
    });

    it('should de-duplicate sample ids keeping the first occurrence', async () => {
      const manager = makeManager();

      const result = await manager.shareMultiple(multiRequest({ sampleIds: ['C', ' A ', 'C', 'A'] }));

      expect(result.outcome).toBe('success');
      if (result.outcome !== 'success') return;
      expect(result.value.record.subjects).toEqual(['C', 'A']);
      expect(Object.keys(result.value.results)).toEqual(['C', 'A']);
    });

    it('should return ConflictError when a new bucket is requested but exists', async () => {
      store.seed('shared-out', {});
      const manager = makeManager();

      const result = await manager.shareMultiple(multiRequest());

      expect(result.outcome).toBe('failure');
      if (result.outcome !== 'failure') return;
      expect(result.error).toBeInstanceOf(ConflictError);
      expect(result.partiallyApplied).toBe(false);
      expect(store.callsTo('create')).toHaveLength(0);
      expect(store.callsTo('copy')).toHaveLength(0);
    });

    it('should return NotFoundError when reusing a bucket that does not exist', async () => {
      const manager = makeManager();

      const result = await manager.shareMultiple(multiRequest({ createNew: false }));

      expect(result.outcome).toBe('failure');
      if (result.outcome !== 'failure') return;
      expect(result.error).toBeInstanceOf(NotFoundError);
      expect(result.error.message).toBe('Bucket shared-out does not exist');
      expect(result.partiallyApplied).toBe(false);
    });

    it('should reuse an existing bucket without creating it or changing its policy', async () => {
      store.seed('shared-out', { 'older/file.txt': 'old' });
      const manager = makeManager();

      const result = await manager.shareMultiple(multiRequest({ sampleIds: ['A'], createNew: false }));

      expect(result.outcome).toBe('success');
      expect(store.callsTo('create')).toHaveLength(0);
      expect(store.deletionPolicies.has('shared-out')).toBe(false);
      expect(store.buckets.get('shared-out')?.has('older/file.txt')).toBe(true);
    });

    it('should return NothingSharedError after granting when no sample is copied', async () => {
      const manager = makeManager();

      const result = await manager.shareMultiple(multiRequest({ sampleIds: ['X', 'Y'] }));

      expect(result.outcome).toBe('failure');
      if (result.outcome !== 'failure') return;
      expect(result.error).toBeInstanceOf(NothingSharedError);
      expect(result.partiallyApplied).toBe(true);
      expect(store.grants).toHaveLength(1);
      expect(notifier.sent).toHaveLength(0);
      expect(records.records).toHaveLength(0);
    });

    it('should reject an invalid bucket name before touching the store', async () => {
      const manager = makeManager();

      const result = await manager.shareMultiple(multiRequest({ destinationContainer: 'Bad_Bucket' }));

      expect(result.outcome).toBe('failure');
      if (result.outcome !== 'failure') return;
      expect(result.error).toBeInstanceOf(InvalidRequestError);
      expect(store.calls).toHaveLength(0);
    });

    it('should copy at most copyConcurrency samples at a time', async () => {
      class SlowStore extends InMemoryObjectStore {
        inFlight = 0;
        peak = 0;

        override async list(container: string, prefix: string) {
          this.inFlight++;
          this.peak = Math.max(this.peak, this.inFlight);
          await new Promise((resolve) => setTimeout(resolve, 5));
          try {
            return await super.list(container, prefix);
          } finally {
            this.inFlight--;
          }
        }
      }
      const slow = new SlowStore();
      slow.seed(SOURCE, { 'S1/f': '1', 'S2/f': '2', 'S3/f': '3', 'S4/f': '4', 'S5/f': '5' });
      const manager = makeManager({ copyConcurrency: 2 }, slow);

      const result = await manager.shareMultiple(
        multiRequest({ sampleIds: ['S1', 'S2', 'S3', 'S4', 'S5'] })
      );

      expect(result.outcome).toBe('success');
      expect(slow.peak).toBe(2);
    });

    it('should report copy progress per sample', async () => {
      const manager = makeManager();
      await manager.shareMultiple(multiRequest());

      const statuses = progress.map((event) => event.status);
      expect(statuses[0]).toBe('provisioning');
      expect(statuses[statuses.length - 1]).toBe('completed');
      expect(progress.filter((event) => event.status === 'copying').map((event) => event.sampleId)).toEqual([
        'A',
        'B',
        'C',
      ]);
    });
  });

  // ─── Step ordering ────────────────────────────────────────────────

  describe('step ordering', () => {
    let events: string[];

    class SequencedNotifier extends RecordingNotifier {
      override async sendSingleNotice(
        ...args: Parameters<RecordingNotifier['sendSingleNotice']>
      ): Promise<boolean> {
        events.push('notify');
        return super.sendSingleNotice(...args);
      }

      override async sendMultiNotice(
        ...args: Parameters<RecordingNotifier['sendMultiNotice']>
      ): Promise<boolean> {
        events.push('notify');
        return super.sendMultiNotice(...args);
      }
    }

    class SequencedRecordStore extends InMemoryShareRecordStore {
      override async append(record: ShareRecord): Promise<void> {
        events.push('append');
        return super.append(record);
      }
    }

    function methods(): string[] {
      return store.calls.map((call) => call.method);
    }

    beforeEach(() => {
      events = [];
      notifier = new SequencedNotifier();
      records = new SequencedRecordStore();
    });

    it('should upload the archive before asking for its link', async () => {
      const manager = makeManager();

      await manager.shareSingle(singleRequest());

      expect(methods().indexOf('upload')).toBeGreaterThan(-1);
      expect(methods().indexOf('upload')).toBeLessThan(methods().indexOf('signedUrl'));
    });

    it('should upload the archive before granting access to it', async () => {
      store.signingUnavailable = true;
      const manager = makeManager();

      await manager.shareSingle(singleRequest());

      expect(methods().indexOf('upload')).toBeGreaterThan(-1);
      expect(methods().indexOf('upload')).toBeLessThan(methods().indexOf('grantRole'));
    });

    it('should grant bucket access only after the last copy', async () => {
      const manager = makeManager();

      await manager.shareMultiple(multiRequest());

      expect(methods().lastIndexOf('copy')).toBeGreaterThan(-1);
      expect(methods().lastIndexOf('copy')).toBeLessThan(methods().indexOf('grantRole'));
    });

    it('should record a single share after notifying', async () => {
      const manager = makeManager();

      await manager.shareSingle(singleRequest());

      expect(events).toEqual(['notify', 'append']);
    });

    it('should record a multi share after notifying', async () => {
      const manager = makeManager();

      await manager.shareMultiple(multiRequest());

      expect(events).toEqual(['notify', 'append']);
    });

    it('should record the share after a notification that was not delivered', async () => {
      notifier.deliver = false;
      const manager = makeManager();

      await manager.shareMultiple(multiRequest());

      expect(events).toEqual(['notify', 'append']);
    });
  });

  // ─── Record maintenance ───────────────────────────────────────────

  function makeRecord(id: string, overrides?: Partial<ShareRecord>): ShareRecord {
    return {
      id,
      kind: 'multi',
      subjects: ['A'],
      recipient: 'user@example.com',
      sourceContainer: SOURCE,
      destination: { type: 'container', container: 'shared-out' },
      createdAt: new Date(NOW.getTime() - 10 * DAY_MS),
      expiresAt: new Date(NOW.getTime() + DAY_MS),
      active: true,
      status: 'completed',
      ...overrides,
    };
  }

  describe('expire', () => {
    it('should deactivate active records past their expiry and be idempotent', async () => {
      await records.append(makeRecord('past', { expiresAt: new Date(NOW.getTime() - DAY_MS) }));
      await records.append(makeRecord('exact', { expiresAt: NOW }));
      await records.append(makeRecord('future'));
      await records.append(
        makeRecord('already', { expiresAt: new Date(NOW.getTime() - DAY_MS), active: false })
      );
      const manager = makeManager();

      expect(await manager.expire(NOW)).toEqual(['past', 'exact']);
      expect(await manager.expire(NOW)).toEqual([]);
      expect(records.records.map((r) => [r.id, r.active])).toEqual([
        ['past', false],
        ['exact', false],
        ['future', true],
        ['already', false],
      ]);
    });

    it('should leave object-store data alone', async () => {
      store.seed('shared-out', { 'A/a1.txt': 'a1' });
      await records.append(makeRecord('past', { expiresAt: new Date(NOW.getTime() - DAY_MS) }));
      const manager = makeManager();

      await manager.expire(NOW);

      expect(store.callsTo('delete')).toHaveLength(0);
      expect(store.buckets.get('shared-out')?.size).toBe(1);
    });
  });

  describe('deleteShare', () => {
    it('should delete the single-share archive and the record', async () => {
      const manager = makeManager();
      await manager.shareSingle(singleRequest());

      const result = await manager.deleteShare('share-1');

      expect(result).toEqual({ recordRemoved: true, cleanup: 'succeeded' });
      expect(store.buckets.get(SINGLE_BUCKET)?.size).toBe(0);
      expect(records.records).toHaveLength(0);
    });

    it('should report failed cleanup when the archive is already gone and still remove the record', async () => {
      const manager = makeManager();
      await manager.shareSingle(singleRequest());
      store.buckets.get(SINGLE_BUCKET)?.delete('889-6625.zip');

      const result = await manager.deleteShare('share-1');

      expect(result).toEqual({ recordRemoved: true, cleanup: 'failed' });
      expect(records.records).toHaveLength(0);
    });

    it('should report failed cleanup when the store throws', async () => {
      const manager = makeManager();
      await manager.shareSingle(singleRequest());
      store.failOn.delete = () => new Error('access denied');

      const result = await manager.deleteShare('share-1');

      expect(result).toEqual({ recordRemoved: true, cleanup: 'failed' });
    });

    it('should leave multi-share data in place', async () => {
      const manager = makeManager();
      await manager.shareMultiple(multiRequest({ sampleIds: ['A'] }));

      const result = await manager.deleteShare('share-1');

      expect(result).toEqual({ recordRemoved: true, cleanup: 'not_attempted' });
      expect(store.buckets.get('shared-out')?.size).toBe(2);
      expect(store.callsTo('delete')).toHaveLength(0);
    });

    it('should report an unknown id without cleanup', async () => {
      const manager = makeManager();

      expect(await manager.deleteShare('nope')).toEqual({ recordRemoved: false, cleanup: 'not_attempted' });
    });
  });

  describe('deactivate', () => {
    it('should mark a record inactive', async () => {
      await records.append(makeRecord('r1'));
      const manager = makeManager();

      expect(await manager.deactivate('r1')).toBe(true);
      expect(records.records[0]?.active).toBe(false);
    });

    it('should return false for an unknown id', async () => {
      const manager = makeManager();
      expect(await manager.deactivate('nope')).toBe(false);
    });
  });

  describe('listShares', () => {
    it('should hide expired records unless inactive ones are requested', async () => {
      await records.append(makeRecord('r1'));
      const manager = makeManager();
      const later = new Date(NOW.getTime() + 2 * DAY_MS);

      expect(await manager.listShares({ now: later })).toEqual([]);

      const all = await manager.listShares({ now: later, includeInactive: true });
      expect(all).toHaveLength(1);
      expect(all[0]?.active).toBe(false);
      expect(all[0]?.storedActive).toBe(true);
      expect(all[0]?.daysRemaining).toBe(0);
    });

    it('should list active records with days remaining', async () => {
      await records.append(makeRecord('r1', { expiresAt: new Date(NOW.getTime() + 2.5 * DAY_MS) }));
      const manager = makeManager();

      const shares = await manager.listShares();

      expect(shares.map((s) => [s.id, s.active, s.daysRemaining])).toEqual([['r1', true, 3]]);
    });
  });

  describe('deactivateShares', () => {
    it('should report which ids were deactivated and which were not', async () => {
      await records.append(makeRecord('r1'));
      await records.append(makeRecord('r2'));
      const manager = makeManager();

      expect(await manager.deactivateShares(['r1', 'nope', 'r1', 'r2'])).toEqual({
        succeeded: ['r1', 'r2'],
        failed: ['nope'],
      });
      expect(records.records.map((r) => r.active)).toEqual([false, false]);
    });

    it('should count an id whose update throws as failed and carry on', async () => {
      class FlakyRecordStore extends InMemoryShareRecordStore {
        override async updateStatus(id: string, active: boolean): Promise<boolean> {
          if (id === 'r1') throw new Error('disk full');
          return super.updateStatus(id, active);
        }
      }
      records = new FlakyRecordStore();
      await records.append(makeRecord('r1'));
      await records.append(makeRecord('r2'));
      const manager = makeManager();

      expect(await manager.deactivateShares(['r1', 'r2'])).toEqual({ succeeded: ['r2'], failed: ['r1'] });
    });
  });

  describe('deleteShares', () => {
    it('should delete each share and report cleanup per removed record', async () => {
      const manager = makeManager();
      await manager.shareSingle(singleRequest());
      await records.append(makeRecord('m1'));

      expect(await manager.deleteShares(['share-1', 'nope', 'm1'])).toEqual({
        succeeded: ['share-1', 'm1'],
        failed: ['nope'],
        cleanup: { 'share-1': 'succeeded', m1: 'not_attempted' },
      });
      expect(records.records).toHaveLength(0);
    });
  });

  describe('listShares filters and ordering', () => {
    beforeEach(async () => {
      await records.append(
        makeRecord('r1', {
          createdAt: new Date(NOW.getTime() - 10 * DAY_MS),
          expiresAt: new Date(NOW.getTime() + 5 * DAY_MS),
        })
      );
      await records.append(
        makeRecord('r2', {
          kind: 'single',
          recipient: 'Other@Example.com',
          destination: { type: 'object', container: 'temp-share-a-abcd1234', key: 'A.zip' },
          createdAt: new Date(NOW.getTime() - 2 * DAY_MS),
          expiresAt: new Date(NOW.getTime() + DAY_MS),
        })
      );
      await records.append(
        makeRecord('r3', {
          createdAt: new Date(NOW.getTime() - 5 * DAY_MS),
          expiresAt: new Date(NOW.getTime() + 9 * DAY_MS),
        })
      );
    });

    async function ids(query: Parameters<ShareLifecycleManager['listShares']>[0]): Promise<string[]> {
      return (await makeManager().listShares(query)).map((view) => view.id);
    }

    it('should keep stored order without a sort key', async () => {
      expect(await ids({})).toEqual(['r1', 'r2', 'r3']);
    });

    it('should filter by recipient ignoring case', async () => {
      expect(await ids({ recipient: 'other@example.com' })).toEqual(['r2']);
    });

    it('should filter by kind', async () => {
      expect(await ids({ kind: 'multi' })).toEqual(['r1', 'r3']);
    });

    it('should sort by expiry, soonest first or latest first', async () => {
      expect(await ids({ sortBy: 'expires' })).toEqual(['r2', 'r1', 'r3']);
      expect(await ids({ sortBy: 'expires', descending: true })).toEqual(['r3', 'r1', 'r2']);
    });

    it('should sort by creation, oldest first or newest first', async () => {
      expect(await ids({ sortBy: 'created' })).toEqual(['r1', 'r3', 'r2']);
      expect(await ids({ sortBy: 'created', descending: true })).toEqual(['r2', 'r3', 'r1']);
    });

    it('should combine filters with sorting', async () => {
      expect(await ids({ recipient: 'user@example.com', sortBy: 'created', descending: true })).toEqual([
        'r3',
        'r1',
      ]);
    });
  });

  describe('listSamples', () => {
    it('should list first-level sample directories, sorted', async () => {
      const manager = makeManager();

      expect(await manager.listSamples(SOURCE)).toEqual(['889-6625', '889-66250', 'A', 'C']);
    });

    it('should strip the configured source prefix', async () => {
      store.seed('prefixed-source', {
        'FulgentTF/S2/y.fq': 'y',
        'FulgentTF/S1/x.fq': 'x',
        'other/z.fq': 'z',
      });
      const manager = makeManager({ sourcePrefix: 'FulgentTF/' });

      expect(await manager.listSamples('prefixed-source')).toEqual(['S1', 'S2']);
    });
  });
});
