export { createLogger } from "./logger/index.js";
export type { Logger, LogLevel, LogContext } from "./logger/index.js";

export { generateId } from "./utils/uuid.js";
export { validateInput, formatZodError, zodToJsonSchema } from "./utils/validation.js";
export type { ValidationResult } from "./utils/validation.js";

export {
  AvailableModelSchema,
  ProviderSettingsSchema,
  HostConfigSchema,
  DEFAULT_OPENROUTER_API_URL,
  DEFAULT_API_KEY_ENV_VAR,
  DEFAULT_MAX_CONCURRENT_REQUESTS,
} from "./utils/config-schema.js";
export type {
  AvailableModel,
  ProviderSettings,
  ProviderSettingsInput,
  HostConfig,
} from "./utils/config-schema.js";

export { SecureStore, credentialFileName } from "./security/secure-store.js";
export type { SecureStoreOptions, EncryptedPayload } from "./security/secure-store.js";

export { withProcessLock, acquireFileLock, isErrnoException } from "./security/file-lock.js";
