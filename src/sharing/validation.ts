/**
 * Input and record validation for shares.
 */

import type {
  MultiShareRequest,
  ShareRecord,
  ShareValidation,
  SingleShareRequest,
} from './types.js';
import { SHARE_KINDS, SHARE_STATUSES } from './types.js';

/** RFC-shaped, not exhaustive */
const EMAIL_PATTERN = /^[a-zA-Z0-9_.+-]+@[a-zA-Z0-9-]+\.[a-zA-Z0-9-.]+$/;

/** S3 bucket naming: 3-63 chars, lowercase letters, digits, dots, hyphens */
const CONTAINER_PATTERN = /^[a-z0-9][a-z0-9.-]{1,61}[a-z0-9]$/;

/** Characters that would break out of a sample's key prefix */
const SAMPLE_ID_FORBIDDEN = /[/\\]|^\.\.?$/;

/** Maximum samples in one multi-sample request */
export const MAX_SAMPLES_PER_SHARE = 1000;

export function isValidEmail(email: string): boolean {
  return EMAIL_PATTERN.test(email);
}

export function isValidContainerName(name: string): boolean {
  return CONTAINER_PATTERN.test(name) && !name.includes('..') && !/^\d+\.\d+\.\d+\.\d+$/.test(name);
}

function checkSampleId(sampleId: string, errors: string[]): void {
  if (!sampleId || !sampleId.trim()) {
    errors.push('Sample ID must not be empty');
  } else if (SAMPLE_ID_FORBIDDEN.test(sampleId.trim())) {
    errors.push(`Invalid sample ID: '${sampleId}'`);
  }
}

function checkRecipient(recipient: string, errors: string[]): void {
  if (!isValidEmail(recipient)) {
    errors.push(`Invalid recipient email: '${recipient}'`);
  }
}

function checkTtl(ttlDays: number, maxTtlDays: number, errors: string[]): void {
  if (!Number.isInteger(ttlDays) || ttlDays < 1 || ttlDays > maxTtlDays) {
    errors.push(`ttlDays must be a whole number between 1 and ${maxTtlDays}`);
  }
}

export function validateSingleShareRequest(
  request: SingleShareRequest,
  maxTtlDays: number
): ShareValidation {
  const errors: string[] = [];

  if (!request.sourceContainer) {
    errors.push('sourceContainer is required');
  }
  checkSampleId(request.sampleId, errors);
  checkRecipient(request.recipient, errors);
  checkTtl(request.ttlDays, maxTtlDays, errors);

  return { valid: errors.length === 0, errors };
}

export function validateMultiShareRequest(
  request: MultiShareRequest,
  maxTtlDays: number
): ShareValidation {
  const errors: string[] = [];

  if (!request.sourceContainer) {
    errors.push('sourceContainer is required');
  }

  if (request.sampleIds.length === 0) {
    errors.push('At least one sample ID is required');
  } else if (request.sampleIds.length > MAX_SAMPLES_PER_SHARE) {
    errors.push(`Maximum ${MAX_SAMPLES_PER_SHARE} samples per share`);
  } else {
    for (const sampleId of request.sampleIds) {
      const before = errors.length;
      checkSampleId(sampleId, errors);
      if (errors.length > before) break;
    }
  }

  checkRecipient(request.recipient, errors);

  if (!isValidContainerName(request.destinationContainer)) {
    errors.push(
      `Invalid bucket name: '${request.destinationContainer}'. ` +
        'Use 3-63 lowercase letters, digits, dots or hyphens, starting and ending with a letter or digit'
    );
  }

  checkTtl(request.ttlDays, maxTtlDays, errors);

  return { valid: errors.length === 0, errors };
}

/** Trim ids and drop blanks and repeats, keeping first occurrence order */
export function normalizeSampleIds(sampleIds: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of sampleIds) {
    const id = raw.trim();
    if (!id || seen.has(id)) continue;
    seen.add(id);
    result.push(id);
  }
  return result;
}

/**
 * Check the invariants every stored record must satisfy.
 */
export function validateShareRecord(record: ShareRecord): ShareValidation {
  const errors: string[] = [];

  if (!record.id) {
    errors.push('id is required');
  }
  if (!SHARE_KINDS.includes(record.kind)) {
    errors.push(`Invalid kind: '${String(record.kind)}'`);
  }
  if (!SHARE_STATUSES.includes(record.status)) {
    errors.push(`Invalid status: '${String(record.status)}'`);
  }
  if (record.subjects.length === 0) {
    errors.push('subjects must not be empty');
  }
  if (record.kind === 'single' && record.subjects.length !== 1) {
    errors.push('single shares cover exactly one sample');
  }
  if (record.kind === 'single' && record.destination.type !== 'object') {
    errors.push('single shares must point at an object');
  }
  if (record.kind === 'multi' && record.destination.type !== 'container') {
    errors.push('multi shares must point at a container');
  }
  if (record.destination.container === record.sourceContainer) {
    errors.push('destination must not be the source container');
  }
  if (isNaN(record.createdAt.getTime()) || isNaN(record.expiresAt.getTime())) {
    errors.push('createdAt and expiresAt must be valid dates');
  } else if (record.expiresAt.getTime() <= record.createdAt.getTime()) {
    errors.push('expiresAt must be after createdAt');
  }

  return { valid: errors.length === 0, errors };
}
