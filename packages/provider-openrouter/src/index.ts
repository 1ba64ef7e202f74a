export { OpenRouterProvider, createOpenRouterProvider, OPENROUTER_PROVIDER_ID, OPENROUTER_PROVIDER_NAME } from "./provider.js";
export type { OpenRouterProviderOptions } from "./provider.js";
export { OpenRouterLanguageModel } from "./model.js";
export type { OpenRouterModelOptions } from "./model.js";
export { BUILTIN_MODELS, resolveCatalog, toDescriptor } from "./catalog.js";
export { buildHeaders, buildRequestBody, toWireMessages, forcedToolSchema } from "./request.js";
export { SseDecoder } from "./stream/sse-decoder.js";
export { CompletionChunkParser, mapFinishReason, DONE_SENTINEL } from "./stream/chunk-parser.js";
