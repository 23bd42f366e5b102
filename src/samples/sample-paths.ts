/**
 * Sample addressing and sample-list parsing.
 *
 * Source layout: {sourcePrefix}{sampleId}/... in the source bucket.
 */

import { randomUUID } from 'node:crypto';

/** Key prefix holding one sample's files */
export function samplePrefix(sourcePrefix: string, sampleId: string): string {
  return `${sourcePrefix}${sampleId.trim()}/`;
}

/**
 * Key of an object relative to the source prefix, e.g.
 * `FulgentTF/889-6625/reads.fq` -> `889-6625/reads.fq`.
 */
export function relativeKey(sourcePrefix: string, key: string): string {
  return sourcePrefix && key.startsWith(sourcePrefix) ? key.slice(sourcePrefix.length) : key;
}

/** Sample id from a first-level prefix returned by listPrefixes */
export function sampleIdFromPrefix(sourcePrefix: string, prefix: string): string {
  return relativeKey(sourcePrefix, prefix).replace(/\/+$/, '');
}

/** Short random hex suffix for generated bucket names */
export function randomSuffix(length = 8): string {
  return randomUUID().replace(/-/g, '').slice(0, length);
}

/** Lowercase, replace anything outside [a-z0-9-], collapse and trim hyphens */
export function sanitizeNamePart(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9-]+/g, '-')
    .replace(/-{2,}/g, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * Bucket name for a single-sample share: {prefix}-{sample}-{suffix},
 * shortened to the 63-character bucket limit.
 */
export function singleContainerName(prefix: string, sampleId: string, suffix: string): string {
  const head = sanitizeNamePart(prefix) || 'share';
  const tail = sanitizeNamePart(suffix);
  const room = 63 - head.length - tail.length - 2;
  const sample = sanitizeNamePart(sampleId).slice(0, Math.max(room, 0)).replace(/-+$/, '');
  return sample ? `${head}-${sample}-${tail}` : `${head}-${tail}`;
}

/** Bucket name for a multi-sample share: shared-samples-{count}-{suffix} */
export function multiContainerName(sampleCount: number, suffix: string): string {
  return `shared-samples-${sampleCount}-${sanitizeNamePart(suffix)}`;
}

/**
 * Parse an uploaded sample list.
 *
 * Content containing a comma is read as CSV (first column, optional
 * header row); anything else as one sample id per line.
 */
export function parseSampleList(content: string, hasHeader: boolean): string[] {
  const lines = content.split(/\r?\n/);

  if (content.includes(',')) {
    const rows = hasHeader ? lines.slice(1) : lines;
    return rows
      .map((row) => (row.split(',')[0] ?? '').trim().replace(/^"(.*)"$/, '$1').trim())
      .filter((id) => id.length > 0);
  }

  return lines.map((line) => line.trim()).filter((id) => id.length > 0);
}
