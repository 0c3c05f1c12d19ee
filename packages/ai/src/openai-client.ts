import { z } from "zod";

import type { ChatMessage } from "./messages";

export interface Logger {
  debug?: (...args: [message: string, metadata?: Record<string, unknown>]) => void;
  info?: (...args: [message: string, metadata?: Record<string, unknown>]) => void;
  error?: (...args: [message: string, metadata?: Record<string, unknown>]) => void;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface OpenAIClientConfig {
  apiKey: string;
  baseUrl?: string;
  model?: string;
  timeoutMs?: number;
  logger?: Logger;
  fetch?: FetchLike;
}

export interface ChatCompletionRequest {
  messages: ChatMessage[];
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface ChatCompletionResponse {
  id: string;
  content: string;
  finishReason?: string;
  model?: string;
  usage?: Record<string, unknown>;
}

export class OpenAIRequestError extends Error {
  constructor(
    readonly status: number,
    readonly body: string,
  ) {
    super(`OpenAI error ${status}: ${body}`);
    this.name = "OpenAIRequestError";
  }
}

const chatCompletionSchema = z.object({
  id: z.string(),
  model: z.string().optional(),
  usage: z.record(z.unknown()).optional(),
  choices: z
    .array(
      z.object({
        finish_reason: z.string().nullish(),
        message: z.object({
          role: z.string().optional(),
          content: z.string().nullish(),
        }),
      }),
    )
    .min(1),
});

export const DEFAULT_BASE_URL = "https://api.openai.com/v1";

/**
 * Minimal client for OpenAI-compatible `/chat/completions` endpoints. Each call is a single
 * attempt; callers decide how to retry.
 */
export class OpenAIChatClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly config: OpenAIClientConfig) {
    this.baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/$/, "");
    this.timeoutMs = config.timeoutMs ?? 60_000;
    this.fetchImpl = config.fetch ?? fetch;
  }

  async createChatCompletion(request: ChatCompletionRequest): Promise<ChatCompletionResponse> {
    const model = request.model ?? this.config.model;
    const response = await this.performRequest(request, model);

    if (!response.ok) {
      throw new OpenAIRequestError(response.status, await response.text());
    }

    const payload = chatCompletionSchema.parse(await response.json());
    const [choice] = payload.choices;

    this.config.logger?.info?.("openai.chat.complete", {
      model: payload.model ?? model,
      usage: payload.usage,
    });

    return {
      id: payload.id,
      model: payload.model,
      usage: payload.usage,
      finishReason: choice?.finish_reason ?? undefined,
      content: choice?.message.content?.trim() ?? "",
    };
  }

  private async performRequest(request: ChatCompletionRequest, model: string | undefined): Promise<Response> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    const payload: Record<string, unknown> = {
      model,
      messages: request.messages,
      temperature: request.temperature,
      max_tokens: request.maxTokens,
    };

    this.config.logger?.debug?.("openai.chat.request", {
      model,
      messages: request.messages.length,
      hasAttachments: request.messages.some(
        (message) => Array.isArray(message.content) && message.content.some((part) => part.type === "file"),
      ),
    });

    try {
      return await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.config.apiKey}`,
        },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });
    } catch (error) {
      this.config.logger?.error?.("openai.chat.error", { error: error instanceof Error ? error.message : String(error) });
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }
}
