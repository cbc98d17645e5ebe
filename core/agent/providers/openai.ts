import OpenAI from "openai";
import {
  AgentError,
  type AgentMessage,
  type AgentResponseChunk,
  type CompletionRequest,
  type RemoteProvider,
} from "@shared/coordination";
import { errorChunk, isAbortError, isTransientMessage, textChunk } from "./chunks";

/**
 * OpenAI Provider implementing the remote translation backend
 */
export class OpenAIProvider implements RemoteProvider {
  id = "openai";
  name = "OpenAI";
  locality = "remote" as const;
  defaultModel: string;
  apiKeyRequired = true;

  private client: OpenAI;

  constructor(apiKey?: string, model = "gpt-4o-mini") {
    const key = apiKey || process.env.OPENAI_API_KEY;
    if (!key) {
      throw new AgentError(
        "MISSING_API_KEY",
        "OPENAI_API_KEY is required for OpenAI provider",
        false,
      );
    }
    this.client = new OpenAI({ apiKey: key, maxRetries: 0 });
    this.defaultModel = model;
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }

  /**
   * Convert internal messages to OpenAI's expected format
   */
  private formatMessagesForOpenAI(
    systemPrompt: string,
    messages: AgentMessage[],
  ): OpenAI.ChatCompletionMessageParam[] {
    const formatted: OpenAI.ChatCompletionMessageParam[] = [
      { role: "system", content: systemPrompt },
    ];
    for (const msg of messages) {
      formatted.push({ role: msg.role, content: msg.content });
    }
    return formatted;
  }

  async *streamResponse(config: CompletionRequest): AsyncGenerator<AgentResponseChunk> {
    const { systemPrompt, messages, modelPreferences, signal } = config;

    try {
      const stream = await this.client.chat.completions.create(
        {
          model: modelPreferences?.model || this.defaultModel,
          max_tokens: modelPreferences?.maxTokens || 500,
          temperature: modelPreferences?.temperature ?? 0,
          stream: true,
          response_format: { type: "json_object" },
          messages: this.formatMessagesForOpenAI(systemPrompt, messages),
        },
        { signal },
      );

      for await (const chunk of stream) {
        const choice = chunk.choices[0];
        if (!choice) continue;

        if (choice.delta.content) {
          yield textChunk(choice.delta.content);
        }
        if (choice.finish_reason === "stop") {
          yield textChunk("", true);
        }
      }
    } catch (error) {
      yield errorChunk(
        this.getErrorCode(error),
        error instanceof Error ? error.message : "Unknown OpenAI API error",
        this.isRetryableError(error),
      );
    }
  }

  /**
   * Check if an error is retryable
   */
  private isRetryableError(error: unknown): boolean {
    if (error instanceof OpenAI.APIConnectionError) {
      return !isAbortError(error);
    }
    if (error instanceof OpenAI.APIError) {
      return (
        error.status === 429 ||
        error.status === 500 ||
        error.status === 502 ||
        error.status === 503 ||
        error.status === 504
      );
    }
    return isTransientMessage(error);
  }

  private getErrorCode(error: unknown): string {
    if (isAbortError(error)) return "ABORTED";
    if (error instanceof OpenAI.APIConnectionError) return "NETWORK_ERROR";
    if (error instanceof OpenAI.APIError) {
      if (error.status === 401) return "UNAUTHORIZED";
      if (error.status === 403) return "FORBIDDEN";
      if (error.status === 404) return "NOT_FOUND";
      if (error.status === 429) return "RATE_LIMITED";
      if (error.status !== undefined && error.status >= 500) return "SERVER_ERROR";
      return "API_ERROR";
    }
    if (error instanceof Error && error.message.includes("timeout")) return "TIMEOUT";
    return "UNKNOWN_ERROR";
  }
}
