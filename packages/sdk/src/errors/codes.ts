/**
 * Stable error codes carried by `RelayError.code`.
 */

export const ErrorCode = {
  CREDENTIALS_NOT_FOUND: "CREDENTIALS_NOT_FOUND",
  CREDENTIALS_MALFORMED: "CREDENTIALS_MALFORMED",
  CREDENTIAL_STORE_UNAVAILABLE: "CREDENTIAL_STORE_UNAVAILABLE",

  TRANSPORT_ERROR: "TRANSPORT_ERROR",
  HTTP_STATUS: "HTTP_STATUS",
  REQUEST_ABORTED: "REQUEST_ABORTED",
  STREAM_INTERRUPTED: "STREAM_INTERRUPTED",
  UPSTREAM_ERROR: "UPSTREAM_ERROR",

  PROTOCOL_ERROR: "PROTOCOL_ERROR",
  TOOL_CALL_ERROR: "TOOL_CALL_ERROR",

  CONFIG_ERROR: "CONFIG_ERROR",
  CONTEXT_OVERFLOW: "CONTEXT_OVERFLOW",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

export type CredentialErrorCode =
  | typeof ErrorCode.CREDENTIALS_NOT_FOUND
  | typeof ErrorCode.CREDENTIALS_MALFORMED
  | typeof ErrorCode.CREDENTIAL_STORE_UNAVAILABLE;
