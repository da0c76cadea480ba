/**
 * Byte store keyed by opaque, "/"-separated keys.
 *
 * The queue only needs create, read, list-by-prefix and delete, so the same
 * design runs against local disk, an app sandbox or an object store.
 */
export interface DurableStorage {
  /** Create or replace. Resolves only once the bytes are durable. */
  put(key: string, bytes: Uint8Array): Promise<void>;
  /** Null when the key does not exist. */
  get(key: string): Promise<Uint8Array | null>;
  /** Every key that starts with `prefix`, in no particular order. */
  list(prefix: string): Promise<string[]>;
  /** Deleting a missing key is not an error. */
  delete(key: string): Promise<void>;
}

const KEY_SEGMENT = /^[A-Za-z0-9._-]+$/;

/**
 * Keys are relative paths of safe segments; "." and ".." are refused so a key
 * can never escape the storage root.
 */
export function assertValidKey(key: string): void {
  const segments = key.split("/");
  const valid =
    segments.length > 0 &&
    segments.every(
      (segment) => KEY_SEGMENT.test(segment) && segment !== "." && segment !== ".."
    );
  if (!valid) {
    throw new Error(`Invalid storage key: ${JSON.stringify(key)}`);
  }
}
