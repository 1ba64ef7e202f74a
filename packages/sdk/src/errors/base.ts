/**
 * Error hierarchy for providers.
 */

import { ErrorCode, type CredentialErrorCode } from "./codes.js";

export class RelayError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "RelayError";
  }
}

/** A secret could not be resolved or the secret store failed. */
export class CredentialError extends RelayError {
  constructor(
    public readonly providerId: string,
    code: CredentialErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Provider "${providerId}" credentials: ${message}`, code, options);
    this.name = "CredentialError";
  }

  get isNotFound(): boolean {
    return this.code === ErrorCode.CREDENTIALS_NOT_FOUND;
  }
}

/** Connection failure, non-success status, or a stream cut short. */
export class TransportError extends RelayError {
  public readonly statusCode?: number;

  constructor(
    public readonly providerId: string,
    message: string,
    options?: { cause?: unknown; code?: string; statusCode?: number },
  ) {
    super(`Provider "${providerId}" transport error: ${message}`, options?.code ?? ErrorCode.TRANSPORT_ERROR, options);
    this.name = "TransportError";
    this.statusCode = options?.statusCode;
  }
}

/** The upstream sent a chunk that could not be decoded. */
export class ProtocolError extends RelayError {
  public readonly chunk?: string;

  constructor(
    public readonly providerId: string,
    message: string,
    options?: { cause?: unknown; chunk?: string },
  ) {
    super(`Provider "${providerId}" protocol error: ${message}`, ErrorCode.PROTOCOL_ERROR, options);
    this.name = "ProtocolError";
    this.chunk = options?.chunk;
  }
}

/** The upstream declined or could not satisfy a forced tool call. */
export class ToolCallError extends RelayError {
  constructor(
    public readonly toolName: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Tool "${toolName}" was not called: ${message}`, ErrorCode.TOOL_CALL_ERROR, options);
    this.name = "ToolCallError";
  }
}

export class ConfigError extends RelayError {
  constructor(
    message: string,
    options?: { cause?: unknown; code?: string },
  ) {
    super(message, options?.code ?? ErrorCode.CONFIG_ERROR, options);
    this.name = "ConfigError";
  }
}
