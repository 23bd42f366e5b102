/**
 * Email bodies for share notices.
 */

import type { NoticeLink, RenderedNotice } from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/** Sample ids listed in a multi-sample notice before the rest is summarised */
export const MAX_LISTED_SAMPLES = 10;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** `YYYY-MM-DD HH:MM:SS UTC` */
export function formatExpiry(date: Date): string {
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())} UTC`
  );
}

export function expiryFrom(now: Date, ttlDays: number): Date {
  const start = new Date(now.getTime());
  start.setUTCMilliseconds(0);
  return new Date(start.getTime() + ttlDays * DAY_MS);
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function plural(days: number): string {
  return days === 1 ? 'day' : 'days';
}

export function renderSingleNotice(
  sampleId: string,
  urls: NoticeLink[],
  ttlDays: number,
  expiresAt: Date
): RenderedNotice {
  const expiry = formatExpiry(expiresAt);
  const links = urls
    .map((link) => `<li><a href="${escapeHtml(link.url)}">${escapeHtml(link.filename)}</a></li>`)
    .join('');

  const html = [
    '<html><body>',
    '<h2>Sample Data Available</h2>',
    `<p>The data for sample <strong>${escapeHtml(sampleId)}</strong> is now available for download.</p>`,
    `<ul>${links}</ul>`,
    `<p>This link will expire on <strong>${expiry}</strong> (${ttlDays} ${plural(ttlDays)} from now).</p>`,
    '<p>If you have any questions or issues with the download, please contact the data provider.</p>',
    '</body></html>',
  ].join('\n');

  const text = [
    `The data for sample ${sampleId} is now available for download.`,
    '',
    ...urls.map((link) => `${link.filename}: ${link.url}`),
    '',
    `This link will expire on ${expiry} (${ttlDays} ${plural(ttlDays)} from now).`,
  ].join('\n');

  return { subject: `Data available for sample ${sampleId}`, html, text };
}

/** Sample ids for display, truncated after MAX_LISTED_SAMPLES */
export function summariseSamples(sampleIds: string[]): string[] {
  if (sampleIds.length <= MAX_LISTED_SAMPLES) {
    return [...sampleIds];
  }
  return [
    ...sampleIds.slice(0, MAX_LISTED_SAMPLES),
    `... and ${sampleIds.length - MAX_LISTED_SAMPLES} more`,
  ];
}

export function renderMultiNotice(
  sampleIds: string[],
  container: string,
  ttlDays: number,
  expiresAt: Date
): RenderedNotice {
  const expiry = formatExpiry(expiresAt);
  const listed = summariseSamples(sampleIds);

  const html = [
    '<html><body>',
    '<h2>Multiple Samples Available</h2>',
    `<p>The following samples are now available in storage bucket <strong>${escapeHtml(container)}</strong>:</p>`,
    `<p>${listed.map(escapeHtml).join('<br>')}</p>`,
    '<p>You have been granted read access to this bucket. Use the AWS console or the AWS CLI to download the data.</p>',
    `<p>This data will be automatically deleted on <strong>${expiry}</strong> (${ttlDays} ${plural(ttlDays)} from now).</p>`,
    '<p>If you have any questions or issues with access, please contact the data provider.</p>',
    '</body></html>',
  ].join('\n');

  const text = [
    `The following samples are now available in storage bucket ${container}:`,
    '',
    ...listed,
    '',
    `This data will be automatically deleted on ${expiry} (${ttlDays} ${plural(ttlDays)} from now).`,
  ].join('\n');

  return { subject: `${sampleIds.length} samples available in bucket ${container}`, html, text };
}
