import Anthropic from "@anthropic-ai/sdk";
import {
  AgentError,
  type AgentMessage,
  type AgentResponseChunk,
  type CompletionRequest,
  type RemoteProvider,
} from "@shared/coordination";
import { errorChunk, isAbortError, isTransientMessage, textChunk } from "./chunks";

/**
 * Claude Provider implementing the remote translation backend
 */
export class ClaudeProvider implements RemoteProvider {
  id = "claude";
  name = "Claude (Anthropic)";
  locality = "remote" as const;
  defaultModel: string;
  apiKeyRequired = true;

  private client: Anthropic;

  constructor(apiKey?: string, model = "claude-3-5-haiku-latest") {
    const key = apiKey || process.env.ANTHROPIC_API_KEY;
    if (!key) {
      throw new AgentError(
        "MISSING_API_KEY",
        "ANTHROPIC_API_KEY is required for Claude provider",
        false,
      );
    }
    this.client = new Anthropic({ apiKey: key, maxRetries: 0 });
    this.defaultModel = model;
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }

  private formatMessagesForClaude(messages: AgentMessage[]): Anthropic.MessageParam[] {
    return messages.map((msg) => ({
      role: msg.role,
      content: msg.content,
    }));
  }

  async *streamResponse(config: CompletionRequest): AsyncGenerator<AgentResponseChunk> {
    const { systemPrompt, messages, modelPreferences, signal } = config;

    try {
      const stream = this.client.messages.stream(
        {
          model: modelPreferences?.model || this.defaultModel,
          max_tokens: modelPreferences?.maxTokens || 500,
          temperature: modelPreferences?.temperature ?? 0,
          system: systemPrompt,
          messages: this.formatMessagesForClaude(messages),
        },
        { signal },
      );

      for await (const event of stream) {
        if (event.type === "content_block_delta" && event.delta.type === "text_delta") {
          yield textChunk(event.delta.text);
        } else if (event.type === "message_stop") {
          yield textChunk("", true);
        }
      }
    } catch (error) {
      yield errorChunk(
        this.getErrorCode(error),
        error instanceof Error ? error.message : "Unknown Claude API error",
        this.isRetryableError(error),
      );
    }
  }

  /**
   * Check if an error is retryable
   */
  private isRetryableError(error: unknown): boolean {
    if (error instanceof Anthropic.APIError) {
      return (
        error.status === 429 ||
        error.status === 500 ||
        error.status === 502 ||
        error.status === 503 ||
        error.status === 504 ||
        error.status === 529
      );
    }
    return isTransientMessage(error);
  }

  private getErrorCode(error: unknown): string {
    if (isAbortError(error)) return "ABORTED";
    if (error instanceof Anthropic.APIError) {
      if (error.status === 401) return "UNAUTHORIZED";
      if (error.status === 403) return "FORBIDDEN";
      if (error.status === 404) return "NOT_FOUND";
      if (error.status === 429) return "RATE_LIMITED";
      if (error.status !== undefined && error.status >= 500) return "SERVER_ERROR";
      return "API_ERROR";
    }
    if (error instanceof Error) {
      if (error.message.includes("timeout")) return "TIMEOUT";
      if (error.message.includes("network")) return "NETWORK_ERROR";
    }
    return "UNKNOWN_ERROR";
  }
}
