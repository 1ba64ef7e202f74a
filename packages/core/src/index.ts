// EventBus
export { createEventBus, providerEvent } from "./bus/index.js";

// Credentials
export { CredentialManager, BEARER_LABEL } from "./credentials/credential-manager.js";
export type { CredentialManagerOptions, CredentialChange } from "./credentials/credential-manager.js";

// Dispatch
export { createRateLimiter } from "./dispatch/rate-limiter.js";
export type { RateLimiter, RateLimiterOptions, Permit } from "./dispatch/rate-limiter.js";

// Tokens
export { createTokenAccountant } from "./tokens/token-accountant.js";
export type { TokenAccountant, TokenBudget } from "./tokens/token-accountant.js";

// Infrastructure
export { createProviderRegistry } from "./infrastructure/provider-registry.js";
export type { ProviderRegistry, ResolvedModel } from "./infrastructure/provider-registry.js";

// Observability
export { createMetricsCollector } from "./observability/metrics.js";
export type { MetricsCollector, MetricsSnapshot, TimingSummary } from "./observability/metrics.js";
