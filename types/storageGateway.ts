export interface StorageGateway {
  /**
   * Rejects with `NotFoundError` when the object does not exist and with
   * `TransientError` for any other backend failure.
   */
  fetch(bucket: string, key: string): Promise<Uint8Array>;

  /**
   * Overwrites whatever is stored at the same key.
   */
  store(
    bucket: string,
    key: string,
    bytes: Uint8Array,
    contentType: string
  ): Promise<void>;
}
