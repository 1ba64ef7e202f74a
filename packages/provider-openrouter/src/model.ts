/**
 * OpenRouterLanguageModel: one model behind the OpenRouter chat completions API.
 *
 * Streams go through the provider's rate limiter: the permit is taken on the
 * first `next()` and released when the stream completes, fails or is
 * abandoned. Abandoning a stream cancels the body reader and aborts the
 * HTTP request.
 */

import {
  CredentialError,
  ErrorCode,
  ProtocolError,
  ProviderEventType,
  RelayError,
  ToolCallError,
  TransportError,
  type ChatRequest,
  type CompletionEvent,
  type EventBus,
  type FetchLike,
  type ForcedToolSpec,
  type ILanguageModel,
  type ModelDescriptor,
} from "@relaykit/sdk";
import { formatZodError, generateId, type Logger } from "@relaykit/shared";
import {
  providerEvent,
  type CredentialManager,
  type MetricsCollector,
  type RateLimiter,
} from "@relaykit/core";
import { buildHeaders, buildRequestBody, forcedToolSchema } from "./request.js";
import { CompletionResponseSchema, UpstreamErrorSchema, type WireRequestBody } from "./wire.js";
import { SseDecoder } from "./stream/sse-decoder.js";
import { CompletionChunkParser } from "./stream/chunk-parser.js";

export interface OpenRouterModelOptions {
  descriptor: ModelDescriptor;
  providerId: string;
  apiUrl: string;
  appName?: string;
  appUrl?: string;
  credentials: CredentialManager;
  limiter: RateLimiter;
  fetch: FetchLike;
  bus: EventBus;
  logger: Logger;
  metrics?: MetricsCollector;
}

type RequestOutcome = "finished" | "failed" | "cancelled";

const OUTCOME_EVENTS: Record<RequestOutcome, string> = {
  finished: ProviderEventType.REQUEST_FINISHED,
  failed: ProviderEventType.REQUEST_FAILED,
  cancelled: ProviderEventType.REQUEST_CANCELLED,
};

export class OpenRouterLanguageModel implements ILanguageModel {
  readonly descriptor: ModelDescriptor;
  readonly providerId: string;

  private readonly endpoint: string;
  private readonly options: OpenRouterModelOptions;

  constructor(options: OpenRouterModelOptions) {
    this.descriptor = Object.freeze({ ...options.descriptor });
    this.providerId = options.providerId;
    this.endpoint = `${options.apiUrl.replace(/\/+$/, "")}/chat/completions`;
    this.options = options;
  }

  maxTokenCount(): number {
    return this.descriptor.contextWindow;
  }

  maxOutputTokens(): number | undefined {
    return this.descriptor.maxOutputTokens;
  }

  /** Sends a one-token completion and reads the prompt size from its usage. */
  async countTokens(request: ChatRequest): Promise<number> {
    const secret = this.requireSecret();
    const body = buildRequestBody(this.descriptor.id, { ...request, maxTokens: 1 }, { stream: false });
    const response = await this.post(body, secret, false, request.signal, request.signal);

    let json: unknown;
    try {
      json = await response.json();
    } catch (err) {
      throw new ProtocolError(this.providerId, "token count response is not valid JSON", { cause: err });
    }
    const parsed = CompletionResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new ProtocolError(this.providerId, `token count response has no usage (${formatZodError(parsed.error)})`);
    }
    return parsed.data.usage.prompt_tokens;
  }

  async *streamCompletion(request: ChatRequest): AsyncGenerator<CompletionEvent, void, undefined> {
    const secret = this.requireSecret();
    const requestId = generateId("req");
    const log = this.options.logger.child("request");
    log.setContext({ modelId: this.descriptor.id, requestId });

    const { bus, limiter, metrics } = this.options;
    const stopTimer = log.time("completion");
    let outcome: RequestOutcome = "cancelled";
    let failure: unknown;

    bus.emit(providerEvent(ProviderEventType.REQUEST_STARTED, { requestId, modelId: this.descriptor.id }));
    log.debug("Completion requested", { messages: request.messages.length });

    try {
      yield* limiter.stream(() => this.openStream(request, secret, log), request.signal);
      outcome = "finished";
    } catch (err) {
      outcome = "failed";
      failure = this.normalizeError(err, request.signal);
      log.warn("Completion failed", { error: errorMessage(failure) });
      throw failure;
    } finally {
      const durationMs = stopTimer();
      metrics?.increment(`request.${outcome}`);
      metrics?.timing("request.duration_ms", durationMs);
      bus.emit(
        providerEvent(OUTCOME_EVENTS[outcome], {
          requestId,
          modelId: this.descriptor.id,
          durationMs,
          ...(failure !== undefined ? { error: errorMessage(failure) } : {}),
        }),
      );
    }
  }

  async *useAnyTool(request: ChatRequest, tool: ForcedToolSpec): AsyncGenerator<string, void, undefined> {
    const forced: ChatRequest = {
      ...request,
      tools: [forcedToolSchema(tool)],
      toolChoice: { name: tool.name },
    };

    let calls = 0;
    for await (const event of this.streamCompletion(forced)) {
      if (event.type === "tool_call") {
        if (event.toolCall.name !== tool.name) {
          throw new ToolCallError(tool.name, `model called "${event.toolCall.name}" instead`);
        }
        calls++;
        yield event.toolCall.rawArguments;
      } else if (event.type === "stop" && calls === 0) {
        throw new ToolCallError(tool.name, `model stopped (${event.reason}) without calling it`);
      }
    }
  }

  private async *openStream(
    request: ChatRequest,
    secret: string,
    log: Logger,
  ): AsyncGenerator<CompletionEvent, void, undefined> {
    const controller = new AbortController();
    const onAbort = (): void => controller.abort(request.signal?.reason);
    request.signal?.addEventListener("abort", onAbort, { once: true });

    let cancelBody: (() => Promise<void>) | undefined;
    let bodyDone = false;
    let completed = false;

    try {
      const body = buildRequestBody(this.descriptor.id, request, { stream: true });
      const response = await this.post(body, secret, true, controller.signal, request.signal);
      if (!response.body) {
        throw new TransportError(this.providerId, "response has no body");
      }

      const reader = response.body.getReader();
      cancelBody = () => reader.cancel();
      const read = async () => {
        try {
          return await reader.read();
        } catch (err) {
          if (request.signal?.aborted) throw this.aborted(err);
          throw new TransportError(this.providerId, `stream interrupted: ${errorMessage(err)}`, {
            code: ErrorCode.STREAM_INTERRUPTED,
            cause: err,
          });
        }
      };

      const decoder = new SseDecoder();
      const parser = new CompletionChunkParser(this.providerId);
      const decode = (next: () => string[]): string[] => {
        try {
          return next();
        } catch (err) {
          throw new ProtocolError(this.providerId, "stream is not valid UTF-8", { cause: err });
        }
      };

      while (!parser.finished) {
        const chunk = await read();
        if (chunk.done) {
          bodyDone = true;
          for (const payload of decode(() => decoder.flush())) {
            yield* parser.push(payload);
          }
          yield* parser.end();
          break;
        }
        for (const payload of decode(() => decoder.push(chunk.value))) {
          yield* parser.push(payload);
          if (parser.finished) break;
        }
      }
      completed = true;
    } finally {
      request.signal?.removeEventListener("abort", onAbort);
      if (cancelBody && !bodyDone) {
        await cancelBody().catch((err: unknown) => {
          log.debug("Body reader cancel failed", { error: errorMessage(err) });
        });
      }
      if (!completed) {
        controller.abort();
      }
    }
  }

  private async post(
    body: WireRequestBody,
    secret: string,
    stream: boolean,
    signal: AbortSignal | undefined,
    callerSignal: AbortSignal | undefined,
  ): Promise<Response> {
    const headers = buildHeaders({
      secret,
      stream,
      appName: this.options.appName,
      appUrl: this.options.appUrl,
    });

    let response: Response;
    try {
      response = await this.options.fetch(this.endpoint, {
        method: "POST",
        headers,
        body: JSON.stringify(body),
        signal,
      });
    } catch (err) {
      if (callerSignal?.aborted) throw this.aborted(err);
      throw new TransportError(this.providerId, `request failed: ${errorMessage(err)}`, { cause: err });
    }

    if (!response.ok) {
      throw await this.statusError(response);
    }
    return response;
  }

  private async statusError(response: Response): Promise<TransportError> {
    const text = await response.text().catch((err: unknown) => {
      this.options.logger.debug("Could not read error body", { error: errorMessage(err) });
      return "";
    });
    const upstream = UpstreamErrorSchema.safeParse(parseJson(text));
    const detail = upstream.success
      ? upstream.data.error.message
      : text.trim().slice(0, 500) || response.statusText || "no details";
    return new TransportError(this.providerId, `HTTP ${response.status}: ${detail}`, {
      code: ErrorCode.HTTP_STATUS,
      statusCode: response.status,
    });
  }

  private requireSecret(): string {
    const credential = this.options.credentials.credential();
    if (!credential) {
      throw new CredentialError(
        this.providerId,
        ErrorCode.CREDENTIALS_NOT_FOUND,
        "not authenticated; authenticate or set an API key first",
      );
    }
    return credential.secret;
  }

  private aborted(cause: unknown): TransportError {
    return new TransportError(this.providerId, "request aborted", { code: ErrorCode.REQUEST_ABORTED, cause });
  }

  private normalizeError(err: unknown, signal: AbortSignal | undefined): unknown {
    if (err instanceof RelayError) return err;
    if (signal?.aborted) return this.aborted(err);
    return err;
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
