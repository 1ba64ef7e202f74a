/**
 * MemorySecretStore: in-memory SecretStore for unit tests.
 *
 * Counts every call and can be told to fail reads, writes or deletes,
 * which is how tests simulate an unavailable keychain.
 */

import type { SecretStore, StoredCredential } from "../types/credentials.js";

export interface MemorySecretStoreOptions {
  failReads?: boolean;
  failWrites?: boolean;
  failDeletes?: boolean;
}

export class MemorySecretStore implements SecretStore {
  readonly calls = { read: 0, write: 0, delete: 0 };

  private entries = new Map<string, StoredCredential>();
  private failReads: boolean;
  private failWrites: boolean;
  private failDeletes: boolean;

  constructor(options: MemorySecretStoreOptions = {}) {
    this.failReads = options.failReads ?? false;
    this.failWrites = options.failWrites ?? false;
    this.failDeletes = options.failDeletes ?? false;
  }

  /** Put an entry without counting it as a write. */
  seed(key: string, secret: string | Uint8Array, label = "Bearer"): void {
    const bytes = typeof secret === "string" ? new TextEncoder().encode(secret) : secret;
    this.entries.set(key, { label, secret: bytes });
  }

  /** Decoded secret currently stored under `key`, if any. */
  peek(key: string): string | undefined {
    const entry = this.entries.get(key);
    return entry ? new TextDecoder().decode(entry.secret) : undefined;
  }

  labelOf(key: string): string | undefined {
    return this.entries.get(key)?.label;
  }

  setFailures(options: MemorySecretStoreOptions): void {
    this.failReads = options.failReads ?? this.failReads;
    this.failWrites = options.failWrites ?? this.failWrites;
    this.failDeletes = options.failDeletes ?? this.failDeletes;
  }

  async read(key: string): Promise<StoredCredential | null> {
    this.calls.read++;
    if (this.failReads) throw new Error("secret store read failed");
    const entry = this.entries.get(key);
    return entry ? { label: entry.label, secret: entry.secret.slice() } : null;
  }

  async write(key: string, label: string, secret: Uint8Array): Promise<void> {
    this.calls.write++;
    if (this.failWrites) throw new Error("secret store write failed");
    this.entries.set(key, { label, secret: secret.slice() });
  }

  async delete(key: string): Promise<void> {
    this.calls.delete++;
    if (this.failDeletes) throw new Error("secret store delete failed");
    this.entries.delete(key);
  }
}
