/**
 * TokenAccountant: context window bookkeeping for language models.
 *
 * Limits are pure lookups on the model descriptor. Prompt sizes come from
 * the provider (`ILanguageModel.countTokens`), so every budget check is
 * asynchronous.
 */

import {
  ConfigError,
  ErrorCode,
  type ChatRequest,
  type ILanguageModel,
  type Message,
} from "@relaykit/sdk";
import { createLogger, type Logger } from "@relaykit/shared";

export interface TokenBudget {
  promptTokens: number;
  /** Tokens held back for the response. */
  outputReserve: number;
  contextWindow: number;
  /** Context left after prompt and reserve; negative when over. */
  available: number;
  fits: boolean;
}

export interface TokenAccountant {
  maxTokenCount(model: ILanguageModel): number;
  maxOutputTokens(model: ILanguageModel): number | undefined;
  countTokens(model: ILanguageModel, request: ChatRequest): Promise<number>;
  checkBudget(model: ILanguageModel, request: ChatRequest): Promise<TokenBudget>;
  /**
   * Drop the oldest conversation turns until the request fits the context
   * window. System messages and the latest turn are always kept.
   */
  fitToContext(model: ILanguageModel, request: ChatRequest): Promise<ChatRequest>;
}

export function createTokenAccountant(logger: Logger = createLogger("TokenAccountant")): TokenAccountant {
  async function checkBudget(model: ILanguageModel, request: ChatRequest): Promise<TokenBudget> {
    const promptTokens = await model.countTokens(request);
    const outputReserve = request.maxTokens ?? model.maxOutputTokens() ?? 0;
    const contextWindow = model.maxTokenCount();
    const available = contextWindow - promptTokens - outputReserve;
    return { promptTokens, outputReserve, contextWindow, available, fits: available >= 0 };
  }

  return {
    maxTokenCount(model: ILanguageModel): number {
      return model.maxTokenCount();
    },

    maxOutputTokens(model: ILanguageModel): number | undefined {
      return model.maxOutputTokens();
    },

    countTokens(model: ILanguageModel, request: ChatRequest): Promise<number> {
      return model.countTokens(request);
    },

    checkBudget,

    async fitToContext(model: ILanguageModel, request: ChatRequest): Promise<ChatRequest> {
      const systemMessages = request.messages.filter((m) => m.role === "system");
      const turns = splitTurns(request.messages.filter((m) => m.role !== "system"));

      let dropped = 0;
      for (;;) {
        const candidate: ChatRequest = {
          ...request,
          messages: [...systemMessages, ...turns.slice(dropped).flat()],
        };
        const budget = await checkBudget(model, candidate);
        if (budget.fits) {
          if (dropped > 0) {
            logger.debug("Dropped oldest turns to fit context", {
              modelId: model.descriptor.id,
              dropped,
              promptTokens: budget.promptTokens,
            });
          }
          return candidate;
        }
        if (dropped >= turns.length - 1) {
          throw new ConfigError(
            `Request needs ${budget.promptTokens + budget.outputReserve} tokens but model "${model.descriptor.id}" has a context window of ${budget.contextWindow}`,
            { code: ErrorCode.CONTEXT_OVERFLOW },
          );
        }
        dropped++;
      }
    },
  };
}

/**
 * Group messages into turns. A turn starts at each user message; anything
 * before the first user message forms a turn of its own.
 */
function splitTurns(messages: Message[]): Message[][] {
  const turns: Message[][] = [];
  for (const message of messages) {
    const last = turns[turns.length - 1];
    if (message.role === "user" || last === undefined) {
      turns.push([message]);
    } else {
      last.push(message);
    }
  }
  return turns;
}
