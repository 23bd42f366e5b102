/**
 * Share service configuration.
 *
 * Reads from environment variables with defaults. All values can be
 * overridden programmatically.
 */

import { isAwsPrincipal, renderPrincipal } from './storage/policies.js';

/** SMTP settings for recipient notifications */
export interface SmtpConfig {
  host: string;
  port: number;
  /** Upgrade the connection with STARTTLS */
  useTls: boolean;
  username: string;
  password: string;
  fromAddress: string;
}

export interface ShareConfig {
  /** Region used for the S3 client and for new share buckets */
  region: string;
  /** Bucket holding the sample files */
  sourceContainer: string;
  /** Key prefix under which each sample is a "directory" (may be empty) */
  sourcePrefix: string;
  /** JSON file backing the share record store */
  recordsPath: string;
  /** Name prefix for buckets created by single-sample shares */
  singleContainerPrefix: string;
  /** Maps a recipient address to a bucket policy principal */
  principalTemplate: string;
  /** Samples copied in parallel during a multi-sample share */
  copyConcurrency: number;
  maxSingleTtlDays: number;
  maxMultiTtlDays: number;
  defaultSingleTtlDays: number;
  defaultMultiTtlDays: number;
  logLevel: string;
  logPretty: boolean;
  smtp: SmtpConfig;
}

function getEnv(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  return value.toLowerCase() === 'true';
}

/**
 * Build the SMTP config from environment variables.
 *
 * Environment variables:
 * - EMAIL_SMTP_SERVER: SMTP host
 * - EMAIL_SMTP_PORT: SMTP port (default: 587)
 * - EMAIL_USE_TLS: Use STARTTLS (default: true)
 * - EMAIL_USERNAME / EMAIL_PASSWORD: SMTP credentials
 * - EMAIL_FROM_ADDRESS: Sender address (default: EMAIL_USERNAME)
 */
export function buildSmtpConfig(overrides?: Partial<SmtpConfig>): SmtpConfig {
  const username = overrides?.username ?? getEnv('EMAIL_USERNAME', '');
  return {
    host: overrides?.host ?? getEnv('EMAIL_SMTP_SERVER', ''),
    port: overrides?.port ?? getEnvNumber('EMAIL_SMTP_PORT', 587),
    useTls: overrides?.useTls ?? getEnvBoolean('EMAIL_USE_TLS', true),
    username,
    password: overrides?.password ?? getEnv('EMAIL_PASSWORD', ''),
    fromAddress: overrides?.fromAddress ?? getEnv('EMAIL_FROM_ADDRESS', username),
  };
}

/**
 * Build share config from environment variables and optional overrides.
 *
 * Environment variables:
 * - AWS_REGION: Region for S3 (default: us-east-1)
 * - SOURCE_BUCKET: Bucket holding the samples (required)
 * - SOURCE_PREFIX: Key prefix of the sample directories (default: none)
 * - SHARE_RECORDS_PATH: Tracking file (default: data/shares.json)
 * - SHARE_CONTAINER_PREFIX: Prefix of single-share buckets (default: temp-share)
 * - SHARE_PRINCIPAL_TEMPLATE: Recipient principal template (required for sharing)
 * - SHARE_COPY_CONCURRENCY: Parallel sample copies (default: 4)
 * - SHARE_MAX_SINGLE_TTL_DAYS / SHARE_MAX_MULTI_TTL_DAYS: TTL ceilings (30 / 90)
 * - LOG_LEVEL: pino level (default: info)
 * - LOG_PRETTY: Pretty-print logs (default: false)
 */
export function buildShareConfig(
  overrides?: Partial<Omit<ShareConfig, 'smtp'>> & { smtp?: Partial<SmtpConfig> }
): ShareConfig {
  return {
    region: overrides?.region ?? getEnv('AWS_REGION', 'us-east-1'),
    sourceContainer: overrides?.sourceContainer ?? getEnv('SOURCE_BUCKET', ''),
    sourcePrefix: normalizePrefix(overrides?.sourcePrefix ?? getEnv('SOURCE_PREFIX', '')),
    recordsPath: overrides?.recordsPath ?? getEnv('SHARE_RECORDS_PATH', 'data/shares.json'),
    singleContainerPrefix:
      overrides?.singleContainerPrefix ?? getEnv('SHARE_CONTAINER_PREFIX', 'temp-share'),
    principalTemplate:
      overrides?.principalTemplate ?? getEnv('SHARE_PRINCIPAL_TEMPLATE', ''),
    copyConcurrency: overrides?.copyConcurrency ?? getEnvNumber('SHARE_COPY_CONCURRENCY', 4),
    maxSingleTtlDays: overrides?.maxSingleTtlDays ?? getEnvNumber('SHARE_MAX_SINGLE_TTL_DAYS', 30),
    maxMultiTtlDays: overrides?.maxMultiTtlDays ?? getEnvNumber('SHARE_MAX_MULTI_TTL_DAYS', 90),
    defaultSingleTtlDays: overrides?.defaultSingleTtlDays ?? 7,
    defaultMultiTtlDays: overrides?.defaultMultiTtlDays ?? 30,
    logLevel: overrides?.logLevel ?? getEnv('LOG_LEVEL', 'info'),
    logPretty: overrides?.logPretty ?? getEnvBoolean('LOG_PRETTY', false),
    smtp: buildSmtpConfig(overrides?.smtp),
  };
}

/** Strip leading slashes and guarantee a trailing one (empty stays empty) */
export function normalizePrefix(prefix: string): string {
  const trimmed = prefix.trim().replace(/^\/+/, '').replace(/\/+$/, '');
  return trimmed ? `${trimmed}/` : '';
}

/** Recipient used to check that the principal template renders to an AWS principal */
const TEMPLATE_CHECK_RECIPIENT = 'recipient@example.com';

/** Which command-specific settings validateShareConfig checks */
export interface ShareConfigChecks {
  /** Commands that read the source bucket (default: true) */
  requireSource?: boolean;
  /** Commands that grant recipients access (default: true) */
  requireGrants?: boolean;
}

/**
 * Validate a share configuration.
 * Returns an array of error messages (empty = valid).
 */
export function validateShareConfig(config: ShareConfig, checks?: ShareConfigChecks): string[] {
  const errors: string[] = [];

  if ((checks?.requireSource ?? true) && !config.sourceContainer) {
    errors.push('sourceContainer is required: set SOURCE_BUCKET');
  }

  if (!config.region) {
    errors.push('region is required: set AWS_REGION');
  }

  if (!config.recordsPath) {
    errors.push('recordsPath must not be empty');
  }

  if (checks?.requireGrants ?? true) {
    if (!config.principalTemplate) {
      errors.push('principalTemplate is required: set SHARE_PRINCIPAL_TEMPLATE');
    } else {
      const rendered = renderPrincipal(config.principalTemplate, TEMPLATE_CHECK_RECIPIENT);
      if (!isAwsPrincipal(rendered)) {
        errors.push(
          `principalTemplate must render to an IAM ARN or a 12-digit account id, got '${rendered}'`
        );
      }
    }
  }

  if (config.copyConcurrency < 1 || config.copyConcurrency > 64) {
    errors.push('copyConcurrency must be between 1 and 64');
  }

  if (config.maxSingleTtlDays < 1) {
    errors.push('maxSingleTtlDays must be at least 1');
  }

  if (config.maxMultiTtlDays < 1) {
    errors.push('maxMultiTtlDays must be at least 1');
  }

  if (config.defaultSingleTtlDays > config.maxSingleTtlDays) {
    errors.push('defaultSingleTtlDays must not exceed maxSingleTtlDays');
  }

  if (config.defaultMultiTtlDays > config.maxMultiTtlDays) {
    errors.push('defaultMultiTtlDays must not exceed maxMultiTtlDays');
  }

  return errors;
}

/**
 * Validate the SMTP part of the configuration. Only needed by commands
 * that send notifications.
 */
export function validateSmtpConfig(smtp: SmtpConfig): string[] {
  const errors: string[] = [];

  if (!smtp.host) {
    errors.push('EMAIL_SMTP_SERVER environment variable not set');
  }
  if (!smtp.username) {
    errors.push('EMAIL_USERNAME environment variable not set');
  }
  if (!smtp.password) {
    errors.push('EMAIL_PASSWORD environment variable not set');
  }
  if (smtp.port < 1 || smtp.port > 65535) {
    errors.push('EMAIL_SMTP_PORT must be a valid port');
  }

  return errors;
}
