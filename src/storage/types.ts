/**
 * Object store contract used by the share lifecycle.
 *
 * Addressing is container (bucket) + object name (key). Containers are
 * flat; "directories" are key prefixes ending in '/'.
 */

/** One object returned by a listing */
export interface ObjectRef {
  /** Full object key */
  name: string;
  /** Size in bytes */
  size: number;
  /** Store-specific generation/version marker (ETag on S3) */
  generation: string;
}

/** Roles that can be granted to a recipient */
export type StoreRole = 'reader';

/** Target of an access grant: a whole container or one object in it */
export interface GrantTarget {
  container: string;
  object?: string;
}

export interface ObjectStoreGateway {
  exists(container: string): Promise<boolean>;
  create(container: string, region: string): Promise<void>;
  list(container: string, prefix: string): Promise<ObjectRef[]>;
  /** First-level sub-prefixes directly under `prefix` */
  listPrefixes(container: string, prefix: string): Promise<string[]>;
  copy(srcContainer: string, srcName: string, dstContainer: string, dstName: string): Promise<void>;
  upload(container: string, name: string, bytes: Uint8Array, contentType?: string): Promise<void>;
  download(container: string, name: string): Promise<Uint8Array>;
  /** Resolves false when the object did not exist */
  delete(container: string, name: string): Promise<boolean>;
  /**
   * Time-limited, credential-free URL.
   * Rejects with CapabilityError when the store cannot sign.
   */
  signedUrl(container: string, name: string, ttlDays: number): Promise<string>;
  /** Direct URL that requires the caller to authenticate */
  objectUrl(container: string, name: string): string;
  /** Delete every object in the container `days` days after creation */
  setDeletionPolicy(container: string, days: number): Promise<void>;
  grantRole(target: GrantTarget, principal: string, role: StoreRole): Promise<void>;
}
