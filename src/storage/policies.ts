import { createHash } from 'node:crypto';
import type { GrantTarget, StoreRole } from './types.js';

/**
 * Bucket policy builders for recipient read grants.
 *
 * S3 has no per-user ACL on buckets that the share flow can rely on, so a
 * grant is a bucket policy statement naming the recipient's principal.
 * Statements are merged into whatever policy the bucket already carries.
 */

/** A single bucket policy statement */
export interface S3PolicyStatement {
  sid: string;
  effect: 'Allow' | 'Deny';
  principal: string;
  actions: string[];
  resources: string[];
}

/** Actions granted per role */
const ROLE_ACTIONS: Record<StoreRole, { object: string[]; bucket: string[] }> = {
  reader: {
    object: ['s3:GetObject', 's3:GetObjectVersion'],
    bucket: ['s3:ListBucket'],
  },
};

/**
 * Map a recipient to a policy principal using a template such as
 * `arn:aws:iam::123456789012:user/{recipient}`.
 */
export function renderPrincipal(template: string, recipient: string): string {
  return template.split('{recipient}').join(recipient);
}

const IAM_ARN_PATTERN = /^arn:aws(-[a-z]+)*:iam::\d{12}:\S+$/;
const ACCOUNT_ID_PATTERN = /^\d{12}$/;

/** True for an IAM ARN or a bare 12-digit account id */
export function isAwsPrincipal(principal: string): boolean {
  return IAM_ARN_PATTERN.test(principal) || ACCOUNT_ID_PATTERN.test(principal);
}

/** Deterministic statement id so repeated grants replace instead of pile up */
export function grantStatementId(target: GrantTarget, principal: string): string {
  const digest = createHash('sha256')
    .update(`${target.container}\n${target.object ?? ''}\n${principal}`)
    .digest('hex')
    .slice(0, 16);
  return `SampleShareRead${digest}`;
}

/**
 * Build the statements that grant `role` on a container or object.
 */
export function buildGrantStatements(
  target: GrantTarget,
  principal: string,
  role: StoreRole
): S3PolicyStatement[] {
  const bucketArn = `arn:aws:s3:::${target.container}`;
  const actions = ROLE_ACTIONS[role];
  const sid = grantStatementId(target, principal);

  if (target.object !== undefined) {
    return [
      {
        sid,
        effect: 'Allow',
        principal,
        actions: actions.object,
        resources: [`${bucketArn}/${target.object}`],
      },
    ];
  }

  return [
    {
      sid: `${sid}List`,
      effect: 'Allow',
      principal,
      actions: actions.bucket,
      resources: [bucketArn],
    },
    {
      sid,
      effect: 'Allow',
      principal,
      actions: actions.object,
      resources: [`${bucketArn}/*`],
    },
  ];
}

/**
 * Convert a statement to the AWS policy JSON structure.
 */
export function toAwsStatement(stmt: S3PolicyStatement): Record<string, unknown> {
  return {
    Sid: stmt.sid,
    Effect: stmt.effect,
    Principal: stmt.principal === '*' ? '*' : { AWS: stmt.principal },
    Action: stmt.actions,
    Resource: stmt.resources,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge statements into an existing bucket policy document (raw JSON as
 * returned by GetBucketPolicy, or undefined when the bucket has none).
 * Existing statements with the same Sid are replaced; all others are kept.
 */
export function mergePolicyDocument(
  existingJson: string | undefined,
  statements: S3PolicyStatement[]
): Record<string, unknown> {
  let existing: unknown[] = [];
  if (existingJson) {
    const parsed: unknown = JSON.parse(existingJson);
    if (isRecord(parsed)) {
      const current = parsed['Statement'];
      if (Array.isArray(current)) {
        existing = current;
      } else if (isRecord(current)) {
        existing = [current];
      }
    }
  }

  const incomingSids = new Set(statements.map((s) => s.sid));
  const kept = existing.filter(
    (stmt) => !(isRecord(stmt) && typeof stmt['Sid'] === 'string' && incomingSids.has(stmt['Sid']))
  );

  return {
    Version: '2012-10-17',
    Statement: [...kept, ...statements.map((stmt) => toAwsStatement(stmt))],
  };
}
