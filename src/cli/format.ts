/**
 * Plain-text rendering of share results for the CLI.
 */

import type { ShareError } from '../errors.js';
import type {
  BatchOutcome,
  CleanupOutcome,
  ShareDestination,
  ShareRecordView,
  ShareWarning,
} from '../sharing/types.js';
import { COPY_FAILED } from '../sharing/types.js';

export function describeDestination(destination: ShareDestination): string {
  return destination.type === 'object'
    ? `s3://${destination.container}/${destination.key}`
    : `s3://${destination.container}`;
}

export function describeCopyCount(count: number): string {
  if (count === COPY_FAILED) return 'copy failed';
  if (count === 0) return 'no files found';
  return `${count} file${count !== 1 ? 's' : ''}`;
}

export function describeWarning(warning: ShareWarning): string {
  switch (warning.kind) {
    case 'notification_failed':
      return `Notification not sent: ${warning.message}`;
    case 'persistence_failed':
      return `Share not recorded: ${warning.message}`;
    case 'partial_failure':
      return `Partial share: ${warning.message}`;
  }
}

/** Message plus the request context an operator needs to retry by hand */
export function describeFailure(error: ShareError, partiallyApplied: boolean): string[] {
  const lines = [`${error.name}: ${error.message}`];
  const { sampleId, sampleIds, recipient, destination } = error.context;
  if (sampleId) lines.push(`  Sample: ${sampleId}`);
  if (sampleIds && sampleIds.length > 0) lines.push(`  Samples: ${sampleIds.join(', ')}`);
  if (recipient) lines.push(`  Recipient: ${recipient}`);
  if (destination) lines.push(`  Destination: ${destination}`);
  if (partiallyApplied) {
    lines.push('  Some changes were already made to the object store and were not rolled back.');
  }
  return lines;
}

export function describeCleanup(cleanup: CleanupOutcome): string {
  switch (cleanup) {
    case 'succeeded':
      return 'shared data deleted';
    case 'failed':
      return 'shared data could not be fully deleted';
    case 'not_attempted':
      return 'shared data left in place';
  }
}

/** e.g. "Deleted 2 shares, 1 failed." */
export function describeBatch(verb: string, outcome: BatchOutcome): string {
  const count = outcome.succeeded.length;
  const summary = `${verb} ${count} share${count !== 1 ? 's' : ''}`;
  return outcome.failed.length > 0 ? `${summary}, ${outcome.failed.length} failed.` : `${summary}.`;
}

/** One line per share: id, kind, state, days left, recipient, samples, destination */
export function formatShareRow(view: ShareRecordView): string {
  const state = view.active ? 'active' : view.storedActive ? 'expired' : 'inactive';
  const samples =
    view.subjects.length === 1 ? view.subjects[0] : `${view.subjects.length} samples`;
  return [
    view.id,
    view.kind.padEnd(6),
    state.padEnd(8),
    `${view.daysRemaining}d`.padStart(4),
    view.recipient,
    samples,
    describeDestination(view.destination),
  ].join('  ');
}
