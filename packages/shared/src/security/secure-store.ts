/**
 * SecureStore: encrypted file-backed SecretStore.
 *
 * Each credential lives in its own file, named after a hash of the endpoint
 * URL it belongs to, so the URL never appears on disk in the clear.
 *
 * - AES-256-GCM authenticated encryption
 * - PBKDF2 key derivation (100,000 iterations, SHA-512)
 * - Machine-binding via hostname + username + saltSuffix
 * - Files written with mode 0600
 * - Mutations guarded by an in-process mutex plus an O_EXCL lock file,
 *   so several hosts sharing one directory do not interleave writes
 */
import {
  randomBytes,
  createCipheriv,
  createDecipheriv,
  createHash,
  pbkdf2Sync,
} from "node:crypto";
import { hostname, userInfo } from "node:os";
import { mkdir, readFile, writeFile, unlink, chmod } from "node:fs/promises";
import { join } from "node:path";
import type { SecretStore, StoredCredential } from "@relaykit/sdk";
import { createLogger } from "../logger/index.js";
import { withProcessLock, acquireFileLock, isErrnoException } from "./file-lock.js";

const logger = createLogger("SecureStore");

const PBKDF2_ITERATIONS = 100000;
const PBKDF2_KEYLEN = 32; // AES-256
const PBKDF2_DIGEST = "sha512";
const AES_ALGORITHM = "aes-256-gcm";
const IV_LENGTH = 12;
const SALT_LENGTH = 16;

/** Encrypted payload stored on disk. */
export interface EncryptedPayload {
  iv: string;
  tag: string;
  salt: string;
  data: string;
}

/** Plaintext inside the encrypted payload. */
interface CredentialRecord {
  label: string;
  /** base64 of the raw secret bytes */
  secret: string;
}

export interface SecureStoreOptions {
  /** Directory holding the credential files. */
  basePath: string;
  /** Suffix mixed into the machine key (default: "relaykit"). */
  saltSuffix?: string;
}

function deriveMachineKey(salt: Buffer, saltSuffix: string): Buffer {
  const machineId = `${hostname()}|${userInfo().username}|${saltSuffix}`;
  return pbkdf2Sync(machineId, salt, PBKDF2_ITERATIONS, PBKDF2_KEYLEN, PBKDF2_DIGEST);
}

function encryptData(plaintext: string, saltSuffix: string): EncryptedPayload {
  const salt = randomBytes(SALT_LENGTH);
  const key = deriveMachineKey(salt, saltSuffix);
  const iv = randomBytes(IV_LENGTH);

  const cipher = createCipheriv(AES_ALGORITHM, key, iv);
  const encrypted = Buffer.concat([cipher.update(plaintext, "utf-8"), cipher.final()]);

  return {
    iv: iv.toString("hex"),
    tag: cipher.getAuthTag().toString("hex"),
    salt: salt.toString("hex"),
    data: encrypted.toString("base64"),
  };
}

function decryptData(payload: EncryptedPayload, saltSuffix: string): string {
  const key = deriveMachineKey(Buffer.from(payload.salt, "hex"), saltSuffix);
  const decipher = createDecipheriv(AES_ALGORITHM, key, Buffer.from(payload.iv, "hex"));
  decipher.setAuthTag(Buffer.from(payload.tag, "hex"));

  return Buffer.concat([
    decipher.update(Buffer.from(payload.data, "base64")),
    decipher.final(),
  ]).toString("utf-8");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isEncryptedPayload(value: unknown): value is EncryptedPayload {
  return (
    isRecord(value) &&
    typeof value.iv === "string" &&
    typeof value.tag === "string" &&
    typeof value.salt === "string" &&
    typeof value.data === "string"
  );
}

function isCredentialRecord(value: unknown): value is CredentialRecord {
  return isRecord(value) && typeof value.label === "string" && typeof value.secret === "string";
}

/** File name for the credential of `key`. */
export function credentialFileName(key: string): string {
  const digest = createHash("sha256").update(key).digest("hex").slice(0, 32);
  return `credential-${digest}.json`;
}

export class SecureStore implements SecretStore {
  private basePath: string;
  private saltSuffix: string;

  constructor(options: SecureStoreOptions) {
    this.basePath = options.basePath;
    this.saltSuffix = options.saltSuffix ?? "relaykit";
  }

  async ensureDir(): Promise<void> {
    await mkdir(this.basePath, { recursive: true, mode: 0o700 });
  }

  /** Path of the file backing `key`. */
  pathFor(key: string): string {
    return join(this.basePath, credentialFileName(key));
  }

  private async withLock<T>(filePath: string, fn: () => Promise<T>): Promise<T> {
    return withProcessLock(filePath, async () => {
      await this.ensureDir();
      const release = await acquireFileLock(`${filePath}.lock`);
      try {
        return await fn();
      } finally {
        await release();
      }
    });
  }

  private async removeFile(filePath: string): Promise<void> {
    try {
      await unlink(filePath);
    } catch (err) {
      if (!isErrnoException(err) || err.code !== "ENOENT") throw err;
    }
  }

  /**
   * Read the credential for `key`. Missing files yield `null`; a file that
   * cannot be decrypted (written on another machine, or corrupted) is removed
   * and also yields `null`. Other I/O failures are thrown.
   */
  async read(key: string): Promise<StoredCredential | null> {
    const filePath = this.pathFor(key);
    return this.withLock(filePath, async () => {
      let content: string;
      try {
        content = await readFile(filePath, "utf-8");
      } catch (err) {
        if (isErrnoException(err) && err.code === "ENOENT") return null;
        throw err;
      }

      try {
        const payload: unknown = JSON.parse(content);
        if (!isEncryptedPayload(payload)) throw new Error("not an encrypted payload");
        const record: unknown = JSON.parse(decryptData(payload, this.saltSuffix));
        if (!isCredentialRecord(record)) throw new Error("unexpected credential record");
        return {
          label: record.label,
          secret: new Uint8Array(Buffer.from(record.secret, "base64")),
        };
      } catch (err) {
        logger.warn("Unreadable credential file removed", {
          file: filePath,
          error: err instanceof Error ? err.message : String(err),
        });
        await this.removeFile(filePath);
        return null;
      }
    });
  }

  async write(key: string, label: string, secret: Uint8Array): Promise<void> {
    const filePath = this.pathFor(key);
    const record: CredentialRecord = { label, secret: Buffer.from(secret).toString("base64") };
    const payload = encryptData(JSON.stringify(record), this.saltSuffix);

    await this.withLock(filePath, async () => {
      await writeFile(filePath, JSON.stringify(payload, null, 2), { encoding: "utf-8", mode: 0o600 });
      // mode is only applied on create
      if (process.platform !== "win32") await chmod(filePath, 0o600);
    });
  }

  /** Delete the credential for `key`. A missing file is not an error. */
  async delete(key: string): Promise<void> {
    const filePath = this.pathFor(key);
    await this.withLock(filePath, () => this.removeFile(filePath));
  }
}
