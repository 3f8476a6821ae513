/**
 * Abstract storage backend interface.
 */

export interface StorageBackend {
  /** Write data to the given key. */
  write(key: string, data: Uint8Array | string): Promise<void>;

  /** Read data from the given key. */
  read(key: string): Promise<Uint8Array>;

  /** Check if the key exists. */
  exists(key: string): Promise<boolean>;
}
