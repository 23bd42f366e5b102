/**
 * Durable share records.
 *
 * JsonFileShareRecordStore keeps every record in one JSON document that is
 * read and rewritten whole on each mutation. Mutations on one instance are
 * serialised; separate processes sharing a file are not coordinated
 * (last writer wins).
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Logger } from 'pino';
import { RecordStoreError, errorMessage } from '../errors.js';
import type {
  ShareDestination,
  ShareKind,
  ShareRecord,
  ShareRecordView,
  ShareStatus,
} from '../sharing/types.js';
import { SHARE_KINDS, SHARE_STATUSES } from '../sharing/types.js';
import { validateShareRecord } from '../sharing/validation.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/** Current document format */
export const RECORD_FILE_VERSION = '1';

export interface ShareRecordStore {
  append(record: ShareRecord): Promise<void>;
  /** Resolves false when no record has this id */
  updateStatus(id: string, active: boolean): Promise<boolean>;
  /** Resolves false when no record has this id */
  delete(id: string): Promise<boolean>;
  /** All records in insertion order */
  listAll(): Promise<ShareRecord[]>;
}

/**
 * Records as seen at `now`. `active` is corrected for expiry without
 * touching storage; `storedActive` keeps the persisted flag.
 */
export function deriveView(records: ShareRecord[], now: Date): ShareRecordView[] {
  return records.map((record) => {
    const remainingMs = record.expiresAt.getTime() - now.getTime();
    return {
      ...record,
      subjects: [...record.subjects],
      active: record.active && remainingMs > 0,
      storedActive: record.active,
      daysRemaining: Math.max(0, Math.ceil(remainingMs / DAY_MS)),
    };
  });
}

// ─── Serialization ──────────────────────────────────────────────────

export interface StoredRecord {
  id: string;
  kind: ShareKind;
  subjects: string[];
  recipient: string;
  sourceContainer: string;
  destination: ShareDestination;
  createdAt: string;
  expiresAt: string;
  active: boolean;
  status: ShareStatus;
}

interface RecordDocument {
  version: string;
  records: StoredRecord[];
}

export function serializeRecord(record: ShareRecord): StoredRecord {
  return {
    id: record.id,
    kind: record.kind,
    subjects: [...record.subjects],
    recipient: record.recipient,
    sourceContainer: record.sourceContainer,
    destination: { ...record.destination },
    createdAt: record.createdAt.toISOString(),
    expiresAt: record.expiresAt.toISOString(),
    active: record.active,
    status: record.status,
  };
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(source: Record<string, unknown>, key: string): string {
  const value = source[key];
  if (typeof value !== 'string') {
    throw new Error(`'${key}' must be a string`);
  }
  return value;
}

function readDate(source: Record<string, unknown>, key: string): Date {
  const date = new Date(readString(source, key));
  if (isNaN(date.getTime())) {
    throw new Error(`'${key}' must be an ISO 8601 date`);
  }
  return date;
}

function readKind(value: unknown): ShareKind {
  const kind = SHARE_KINDS.find((k) => k === value);
  if (!kind) throw new Error(`unknown kind '${String(value)}'`);
  return kind;
}

function readStatus(value: unknown): ShareStatus {
  const status = SHARE_STATUSES.find((s) => s === value);
  if (!status) throw new Error(`unknown status '${String(value)}'`);
  return status;
}

function readDestination(value: unknown): ShareDestination {
  if (!isObject(value)) {
    throw new Error("'destination' must be an object");
  }
  const container = readString(value, 'container');
  if (value['type'] === 'object') {
    return { type: 'object', container, key: readString(value, 'key') };
  }
  if (value['type'] === 'container') {
    return { type: 'container', container };
  }
  throw new Error(`unknown destination type '${String(value['type'])}'`);
}

/** Parse one stored record; throws with a description of the first problem */
export function deserializeRecord(value: unknown): ShareRecord {
  if (!isObject(value)) {
    throw new Error('record must be an object');
  }
  const subjects = value['subjects'];
  if (!Array.isArray(subjects) || !subjects.every((s): s is string => typeof s === 'string')) {
    throw new Error("'subjects' must be an array of strings");
  }
  const active = value['active'];
  if (typeof active !== 'boolean') {
    throw new Error("'active' must be a boolean");
  }

  const record: ShareRecord = {
    id: readString(value, 'id'),
    kind: readKind(value['kind']),
    subjects,
    recipient: readString(value, 'recipient'),
    sourceContainer: readString(value, 'sourceContainer'),
    destination: readDestination(value['destination']),
    createdAt: readDate(value, 'createdAt'),
    expiresAt: readDate(value, 'expiresAt'),
    active,
    status: readStatus(value['status']),
  };

  const validation = validateShareRecord(record);
  if (!validation.valid) {
    throw new Error(`record '${record.id}': ${validation.errors.join('; ')}`);
  }
  return record;
}

// ─── JSON file store ────────────────────────────────────────────────

export class JsonFileShareRecordStore implements ShareRecordStore {
  private readonly filePath: string;
  private readonly logger: Logger;
  /** Tail of the mutation chain */
  private pending: Promise<unknown> = Promise.resolve();

  constructor(filePath: string, logger: Logger) {
    this.filePath = filePath;
    this.logger = logger.child({ component: 'record-store' });
  }

  async append(record: ShareRecord): Promise<void> {
    const validation = validateShareRecord(record);
    if (!validation.valid) {
      throw new RecordStoreError(
        this.filePath,
        `Refusing to store invalid record '${record.id}': ${validation.errors.join('; ')}`
      );
    }

    await this.mutate((records) => {
      if (records.some((r) => r.id === record.id)) {
        throw new RecordStoreError(this.filePath, `Duplicate share id '${record.id}'`);
      }
      records.push(record);
      return { changed: true, result: undefined };
    });

    this.logger.debug({ shareId: record.id, kind: record.kind }, 'Share record appended');
  }

  async updateStatus(id: string, active: boolean): Promise<boolean> {
    return this.mutate((records) => {
      const record = records.find((r) => r.id === id);
      if (!record) {
        return { changed: false, result: false };
      }
      record.active = active;
      return { changed: true, result: true };
    });
  }

  async delete(id: string): Promise<boolean> {
    return this.mutate((records) => {
      const index = records.findIndex((r) => r.id === id);
      if (index === -1) {
        return { changed: false, result: false };
      }
      records.splice(index, 1);
      return { changed: true, result: true };
    });
  }

  async listAll(): Promise<ShareRecord[]> {
    // Reads queue behind pending writes so callers see their own mutations
    const read = this.pending.then(() => this.load());
    this.pending = read.catch(() => undefined);
    return read;
  }

  /**
   * Queue a read-modify-write. The document is only rewritten when the
   * mutator reports a change.
   */
  private mutate<T>(mutator: (records: ShareRecord[]) => { changed: boolean; result: T }): Promise<T> {
    const run = this.pending.then(async () => {
      const records = await this.load();
      const { changed, result } = mutator(records);
      if (changed) {
        await this.save(records);
      }
      return result;
    });
    this.pending = run.catch(() => undefined);
    return run;
  }

  private async load(): Promise<ShareRecord[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) {
        return [];
      }
      throw new RecordStoreError(this.filePath, `Cannot read ${this.filePath}: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new RecordStoreError(this.filePath, `Invalid JSON in ${this.filePath}: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    if (!isObject(parsed) || !Array.isArray(parsed['records'])) {
      throw new RecordStoreError(this.filePath, `${this.filePath} is not a share record document`);
    }
    if (parsed['version'] !== RECORD_FILE_VERSION) {
      throw new RecordStoreError(
        this.filePath,
        `Unsupported record file version '${String(parsed['version'])}' in ${this.filePath}`
      );
    }

    const records: ShareRecord[] = [];
    for (const entry of parsed['records']) {
      try {
        records.push(deserializeRecord(entry));
      } catch (err) {
        throw new RecordStoreError(this.filePath, `Invalid record in ${this.filePath}: ${errorMessage(err)}`, {
          cause: err,
        });
      }
    }
    return records;
  }

  private async save(records: ShareRecord[]): Promise<void> {
    const document: RecordDocument = {
      version: RECORD_FILE_VERSION,
      records: records.map(serializeRecord),
    };
    const tmpPath = `${this.filePath}.tmp`;

    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(tmpPath, JSON.stringify(document, null, 2) + '\n', 'utf-8');
      await rename(tmpPath, this.filePath);
    } catch (err) {
      this.logger.error({ filePath: this.filePath, error: errorMessage(err) }, 'Failed to write share records');
      throw new RecordStoreError(this.filePath, `Cannot write ${this.filePath}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
