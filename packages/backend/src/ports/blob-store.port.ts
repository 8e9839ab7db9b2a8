export const BLOB_STORE = Symbol('BLOB_STORE');

export interface BlobStore {
  /** Returns a public URL for the stored bytes. */
  store(bytes: Buffer, mimeType: string): Promise<string>;
}
