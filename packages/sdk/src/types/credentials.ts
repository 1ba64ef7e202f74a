/**
 * Credential lifecycle types and the secret store contract.
 */

import type { CredentialError } from "../errors/base.js";

/** Where the active secret came from. */
export type CredentialOrigin = "environment" | "store";

/** The active credential. Instances handed out are frozen copies. */
export interface Credential {
  readonly secret: string;
  readonly origin: CredentialOrigin;
}

export type AuthState = "unauthenticated" | "authenticating" | "authenticated";

/** Result of `authenticate()`. "Not found" is an expected outcome, not a fault. */
export type AuthenticationOutcome =
  | { status: "success"; origin: CredentialOrigin }
  | { status: "credentials_not_found"; error: CredentialError }
  | { status: "malformed"; error: CredentialError }
  | { status: "store_unavailable"; error: CredentialError };

/** What a secret store returns for a key. */
export interface StoredCredential {
  /** Credential type label, e.g. "Bearer". */
  label: string;
  secret: Uint8Array;
}

/**
 * Async key-value store for opaque credential blobs, keyed by endpoint URL.
 * Implementations throw on I/O failure; a missing key is `null`, not an error.
 */
export interface SecretStore {
  read(key: string): Promise<StoredCredential | null>;
  write(key: string, label: string, secret: Uint8Array): Promise<void>;
  delete(key: string): Promise<void>;
}

/** Listener notified after each credential state transition. */
export type CredentialListener = (state: AuthState, origin: CredentialOrigin | undefined) => void;
