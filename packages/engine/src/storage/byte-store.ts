import { NotFoundError } from '../errors.js';

export interface FetchOptions {
  signal?: AbortSignal;
}

/**
 * Canonical resource bytes live outside the index. The store reads them by uri and,
 * where the implementation allows, writes inline content it was handed.
 */
export interface ByteStore {
  fetchBytes(uri: string, opts?: FetchOptions): Promise<Uint8Array>;
  putBytes?(uri: string, bytes: Uint8Array): Promise<void>;
}

export class InMemoryByteStore implements ByteStore {
  private readonly blobs = new Map<string, Uint8Array>();

  async fetchBytes(uri: string): Promise<Uint8Array> {
    const bytes = this.blobs.get(uri);
    if (!bytes) throw new NotFoundError('Resource bytes', uri);
    return bytes;
  }

  async putBytes(uri: string, bytes: Uint8Array): Promise<void> {
    this.blobs.set(uri, Uint8Array.from(bytes));
  }

  has(uri: string): boolean {
    return this.blobs.has(uri);
  }
}
