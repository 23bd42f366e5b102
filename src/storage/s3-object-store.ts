/**
 * S3-backed object store gateway.
 *
 * Containers map to buckets and object names to keys. Buckets created here
 * get the same baseline hardening as any other bucket we own: public access
 * blocked and AES-256 default encryption.
 */

import {
  S3Client,
  HeadBucketCommand,
  CreateBucketCommand,
  PutPublicAccessBlockCommand,
  PutBucketEncryptionCommand,
  ListObjectsV2Command,
  CopyObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  DeleteObjectCommand,
  PutBucketLifecycleConfigurationCommand,
  GetBucketPolicyCommand,
  PutBucketPolicyCommand,
} from '@aws-sdk/client-s3';
import type { BucketLocationConstraint, CreateBucketCommandInput } from '@aws-sdk/client-s3';
import { Upload } from '@aws-sdk/lib-storage';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import type { Logger } from 'pino';
import { CapabilityError, errorMessage } from '../errors.js';
import { buildGrantStatements, isAwsPrincipal, mergePolicyDocument, renderPrincipal } from './policies.js';
import type { GrantTarget, ObjectRef, ObjectStoreGateway, StoreRole } from './types.js';

/** SigV4 presigned URLs are capped at 7 days */
export const MAX_PRESIGN_SECONDS = 7 * 24 * 60 * 60;

/** Lifecycle rule id written by setDeletionPolicy */
export const DELETION_RULE_ID = 'sample-share-expiry';

export interface S3ObjectStoreConfig {
  region: string;
  /** Maps a recipient to a policy principal, see renderPrincipal() */
  principalTemplate: string;
}

function httpStatusOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && '$metadata' in err) {
    const meta = err.$metadata;
    if (typeof meta === 'object' && meta !== null && 'httpStatusCode' in meta) {
      return typeof meta.httpStatusCode === 'number' ? meta.httpStatusCode : undefined;
    }
  }
  return undefined;
}

function errorName(err: unknown): string {
  return err instanceof Error ? err.name : '';
}

function isNotFound(err: unknown): boolean {
  const name = errorName(err);
  return (
    httpStatusOf(err) === 404 ||
    name === 'NotFound' ||
    name === 'NoSuchKey' ||
    name === 'NoSuchBucket' ||
    name === 'NoSuchBucketPolicy'
  );
}

function encodeKey(key: string): string {
  return key.split('/').map(encodeURIComponent).join('/');
}

export class S3ObjectStore implements ObjectStoreGateway {
  private readonly client: S3Client;
  private readonly config: S3ObjectStoreConfig;
  private readonly logger: Logger;

  constructor(config: S3ObjectStoreConfig, logger: Logger) {
    this.config = config;
    this.logger = logger.child({ component: 's3-object-store' });

    this.client = new S3Client({
      region: this.config.region,
    });
  }

  /**
   * A 403 means the bucket exists but belongs to someone else; bucket names
   * are global, so that still counts as taken.
   */
  async exists(container: string): Promise<boolean> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: container }));
      return true;
    } catch (err) {
      if (isNotFound(err)) {
        return false;
      }
      if (httpStatusOf(err) === 403) {
        this.logger.warn({ bucket: container }, 'Bucket exists but is not accessible');
        return true;
      }
      throw err;
    }
  }

  async create(container: string, region: string): Promise<void> {
    const createParams: CreateBucketCommandInput = { Bucket: container };

    // LocationConstraint is not needed for us-east-1
    if (region !== 'us-east-1') {
      createParams.CreateBucketConfiguration = {
        LocationConstraint: region as BucketLocationConstraint,
      };
    }

    await this.client.send(new CreateBucketCommand(createParams));

    await this.client.send(
      new PutPublicAccessBlockCommand({
        Bucket: container,
        PublicAccessBlockConfiguration: {
          BlockPublicAcls: true,
          IgnorePublicAcls: true,
          BlockPublicPolicy: true,
          RestrictPublicBuckets: true,
        },
      })
    );

    await this.client.send(
      new PutBucketEncryptionCommand({
        Bucket: container,
        ServerSideEncryptionConfiguration: {
          Rules: [
            {
              ApplyServerSideEncryptionByDefault: { SSEAlgorithm: 'AES256' },
              BucketKeyEnabled: true,
            },
          ],
        },
      })
    );

    this.logger.info({ bucket: container, region }, 'Created bucket');
  }

  async list(container: string, prefix: string): Promise<ObjectRef[]> {
    const objects: ObjectRef[] = [];
    let continuationToken: string | undefined;

    do {
      const response = await this.client.send(
        new ListObjectsV2Command({
          Bucket: container,
          Prefix: prefix,
          ContinuationToken: continuationToken,
        })
      );

      for (const entry of response.Contents ?? []) {
        // Skip folder markers
        if (!entry.Key || entry.Key.endsWith('/')) continue;
        objects.push({
          name: entry.Key,
          size: entry.Size ?? 0,
          generation: entry.ETag ?? '',
        });
      }

      continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
    } while (continuationToken);

    this.logger.debug({ bucket: container, prefix, count: objects.length }, 'Listed objects');
    return objects;
  }

  async listPrefixes(container: string, prefix: string): Promise<string[]> {
    const prefixes: string[] = [];
    let continuationToken: string | undefined;

    do {
      const response = await this.client.send(
        new ListObjectsV2Command({
          Bucket: container,
          Prefix: prefix,
          Delimiter: '/',
          ContinuationToken: continuationToken,
        })
      );

      for (const entry of response.CommonPrefixes ?? []) {
        if (entry.Prefix) prefixes.push(entry.Prefix);
      }

      continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
    } while (continuationToken);

    return prefixes;
  }

  async copy(srcContainer: string, srcName: string, dstContainer: string, dstName: string): Promise<void> {
    await this.client.send(
      new CopyObjectCommand({
        Bucket: dstContainer,
        Key: dstName,
        CopySource: `${srcContainer}/${encodeKey(srcName)}`,
      })
    );
    this.logger.debug(
      { from: `${srcContainer}/${srcName}`, to: `${dstContainer}/${dstName}` },
      'Copied object'
    );
  }

  async upload(container: string, name: string, bytes: Uint8Array, contentType?: string): Promise<void> {
    const upload = new Upload({
      client: this.client,
      params: {
        Bucket: container,
        Key: name,
        Body: bytes,
        ContentType: contentType ?? 'application/octet-stream',
      },
    });
    await upload.done();
    this.logger.info({ bucket: container, key: name, sizeBytes: bytes.byteLength }, 'Uploaded object');
  }

  async download(container: string, name: string): Promise<Uint8Array> {
    const response = await this.client.send(new GetObjectCommand({ Bucket: container, Key: name }));
    if (!response.Body) {
      throw new Error(`Empty response body for ${container}/${name}`);
    }
    return response.Body.transformToByteArray();
  }

  async delete(container: string, name: string): Promise<boolean> {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: container, Key: name }));
    } catch (err) {
      if (isNotFound(err)) {
        this.logger.warn({ bucket: container, key: name }, 'Object already deleted');
        return false;
      }
      throw err;
    }

    await this.client.send(new DeleteObjectCommand({ Bucket: container, Key: name }));
    this.logger.info({ bucket: container, key: name }, 'Deleted object');
    return true;
  }

  async signedUrl(container: string, name: string, ttlDays: number): Promise<string> {
    const expiresIn = ttlDays * 24 * 60 * 60;
    const context = { destination: `${container}/${name}` };

    if (expiresIn > MAX_PRESIGN_SECONDS) {
      throw new CapabilityError(
        `S3 cannot presign URLs valid for ${ttlDays} days (limit: 7 days)`,
        context
      );
    }

    try {
      return await getSignedUrl(
        this.client,
        new GetObjectCommand({ Bucket: container, Key: name }),
        { expiresIn }
      );
    } catch (err) {
      if (errorName(err) === 'CredentialsProviderError') {
        throw new CapabilityError(
          `No signing credentials available: ${errorMessage(err)}`,
          context,
          { cause: err }
        );
      }
      throw err;
    }
  }

  objectUrl(container: string, name: string): string {
    return `https://${container}.s3.${this.config.region}.amazonaws.com/${encodeKey(name)}`;
  }

  async setDeletionPolicy(container: string, days: number): Promise<void> {
    await this.client.send(
      new PutBucketLifecycleConfigurationCommand({
        Bucket: container,
        LifecycleConfiguration: {
          Rules: [
            {
              ID: DELETION_RULE_ID,
              Status: 'Enabled',
              Filter: { Prefix: '' },
              Expiration: { Days: days },
            },
          ],
        },
      })
    );
    this.logger.info({ bucket: container, days }, 'Set deletion policy');
  }

  async grantRole(target: GrantTarget, principal: string, role: StoreRole): Promise<void> {
    const resolved = renderPrincipal(this.config.principalTemplate, principal);
    if (!isAwsPrincipal(resolved)) {
      throw new Error(`Cannot grant access to '${resolved}': not an IAM ARN or account id`);
    }

    let existing: string | undefined;
    try {
      const response = await this.client.send(new GetBucketPolicyCommand({ Bucket: target.container }));
      existing = response.Policy;
    } catch (err) {
      if (!isNotFound(err)) {
        throw err;
      }
    }

    const statements = buildGrantStatements(target, resolved, role);
    const document = mergePolicyDocument(existing, statements);

    await this.client.send(
      new PutBucketPolicyCommand({
        Bucket: target.container,
        Policy: JSON.stringify(document),
      })
    );

    this.logger.info(
      { bucket: target.container, key: target.object, principal: resolved, role },
      'Granted access'
    );
  }
}
