import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  buildShareConfig,
  buildSmtpConfig,
  normalizePrefix,
  validateShareConfig,
  validateSmtpConfig,
} from '../config.js';

const ENV_KEYS = [
  'AWS_REGION',
  'SOURCE_BUCKET',
  'SOURCE_PREFIX',
  'SHARE_RECORDS_PATH',
  'SHARE_CONTAINER_PREFIX',
  'SHARE_PRINCIPAL_TEMPLATE',
  'SHARE_COPY_CONCURRENCY',
  'SHARE_MAX_SINGLE_TTL_DAYS',
  'SHARE_MAX_MULTI_TTL_DAYS',
  'LOG_LEVEL',
  'LOG_PRETTY',
  'EMAIL_SMTP_SERVER',
  'EMAIL_SMTP_PORT',
  'EMAIL_USE_TLS',
  'EMAIL_USERNAME',
  'EMAIL_PASSWORD',
  'EMAIL_FROM_ADDRESS',
];

describe('Share config', () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  describe('buildShareConfig', () => {
    it('should use defaults when no env vars are set', () => {
      const config = buildShareConfig();

      expect(config.region).toBe('us-east-1');
      expect(config.sourceContainer).toBe('');
      expect(config.sourcePrefix).toBe('');
      expect(config.recordsPath).toBe('data/shares.json');
      expect(config.singleContainerPrefix).toBe('temp-share');
      expect(config.principalTemplate).toBe('');
      expect(config.copyConcurrency).toBe(4);
      expect(config.maxSingleTtlDays).toBe(30);
      expect(config.maxMultiTtlDays).toBe(90);
      expect(config.defaultSingleTtlDays).toBe(7);
      expect(config.defaultMultiTtlDays).toBe(30);
      expect(config.logLevel).toBe('info');
      expect(config.logPretty).toBe(false);
    });

    it('should read env vars', () => {
      process.env['AWS_REGION'] = 'eu-west-1';
      process.env['SOURCE_BUCKET'] = 'lab-data';
      process.env['SOURCE_PREFIX'] = '/FulgentTF';
      process.env['SHARE_COPY_CONCURRENCY'] = '8';
      process.env['LOG_PRETTY'] = 'true';

      const config = buildShareConfig();

      expect(config.region).toBe('eu-west-1');
      expect(config.sourceContainer).toBe('lab-data');
      expect(config.sourcePrefix).toBe('FulgentTF/');
      expect(config.copyConcurrency).toBe(8);
      expect(config.logPretty).toBe(true);
    });

    it('should fall back to the default for a non-numeric number', () => {
      process.env['SHARE_COPY_CONCURRENCY'] = 'lots';
      expect(buildShareConfig().copyConcurrency).toBe(4);
    });

    it('should let overrides win over env vars', () => {
      process.env['SOURCE_BUCKET'] = 'lab-data';

      const config = buildShareConfig({ sourceContainer: 'other-data', smtp: { port: 465 } });

      expect(config.sourceContainer).toBe('other-data');
      expect(config.smtp.port).toBe(465);
    });
  });

  describe('buildSmtpConfig', () => {
    it('should default the sender to the username', () => {
      process.env['EMAIL_USERNAME'] = 'sender@example.com';

      const smtp = buildSmtpConfig();

      expect(smtp.port).toBe(587);
      expect(smtp.useTls).toBe(true);
      expect(smtp.fromAddress).toBe('sender@example.com');
    });

    it('should prefer an explicit sender address', () => {
      process.env['EMAIL_USERNAME'] = 'sender@example.com';
      process.env['EMAIL_FROM_ADDRESS'] = 'noreply@example.com';

      expect(buildSmtpConfig().fromAddress).toBe('noreply@example.com');
    });
  });

  describe('normalizePrefix', () => {
    it('should strip leading slashes and end with exactly one slash', () => {
      expect(normalizePrefix('/FulgentTF//')).toBe('FulgentTF/');
      expect(normalizePrefix('runs/2026')).toBe('runs/2026/');
    });

    it('should keep an empty prefix empty', () => {
      expect(normalizePrefix('')).toBe('');
      expect(normalizePrefix('/')).toBe('');
    });
  });

  describe('validateShareConfig', () => {
    const TEMPLATE = 'arn:aws:iam::123456789012:user/{recipient}';

    function complete(overrides?: Parameters<typeof buildShareConfig>[0]) {
      return buildShareConfig({ sourceContainer: 'lab-data', principalTemplate: TEMPLATE, ...overrides });
    }

    it('should accept a complete config', () => {
      expect(validateShareConfig(complete())).toEqual([]);
    });

    it('should require a source bucket and a principal template by default', () => {
      expect(validateShareConfig(buildShareConfig())).toEqual([
        'sourceContainer is required: set SOURCE_BUCKET',
        'principalTemplate is required: set SHARE_PRINCIPAL_TEMPLATE',
      ]);
    });

    it('should skip the source and grant settings when a command does not need them', () => {
      expect(validateShareConfig(buildShareConfig(), { requireSource: false, requireGrants: false })).toEqual([]);
    });

    it('should reject a template that renders to an email address', () => {
      const config = complete({ principalTemplate: '{recipient}' });

      expect(validateShareConfig(config)).toEqual([
        "principalTemplate must render to an IAM ARN or a 12-digit account id, got 'recipient@example.com'",
      ]);
    });

    it('should accept an account id and a role ARN', () => {
      expect(validateShareConfig(complete({ principalTemplate: '123456789012' }))).toEqual([]);
      expect(
        validateShareConfig(complete({ principalTemplate: 'arn:aws:iam::123456789012:role/{recipient}' }))
      ).toEqual([]);
    });

    it('should reject a default ttl above its ceiling', () => {
      expect(validateShareConfig(complete({ defaultSingleTtlDays: 45 }))).toEqual([
        'defaultSingleTtlDays must not exceed maxSingleTtlDays',
      ]);
    });

    it('should bound copy concurrency', () => {
      expect(validateShareConfig(complete({ copyConcurrency: 0 }))).toEqual([
        'copyConcurrency must be between 1 and 64',
      ]);
    });
  });

  describe('validateSmtpConfig', () => {
    it('should list every missing setting', () => {
      expect(validateSmtpConfig(buildSmtpConfig())).toEqual([
        'EMAIL_SMTP_SERVER environment variable not set',
        'EMAIL_USERNAME environment variable not set',
        'EMAIL_PASSWORD environment variable not set',
      ]);
    });

    it('should accept a complete config', () => {
      const smtp = buildSmtpConfig({
        host: 'smtp.example.com',
        username: 'sender@example.com',
        password: 'test-secret',
      });
      expect(validateSmtpConfig(smtp)).toEqual([]);
    });
  });
});
