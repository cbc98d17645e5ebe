import { FinishReason, GoogleGenerativeAI, type Content } from "@google/generative-ai";
import {
  AgentError,
  type AgentMessage,
  type AgentResponseChunk,
  type CompletionRequest,
  type RemoteProvider,
} from "@shared/coordination";
import { errorChunk, isAbortError, isTransientMessage, textChunk } from "./chunks";

/**
 * Gemini Provider implementing the remote translation backend
 */
export class GeminiProvider implements RemoteProvider {
  id = "gemini";
  name = "Gemini (Google)";
  locality = "remote" as const;
  defaultModel: string;
  apiKeyRequired = true;

  private client: GoogleGenerativeAI;

  constructor(apiKey?: string, model = "gemini-2.0-flash") {
    const key = apiKey || process.env.GOOGLE_API_KEY;
    if (!key) {
      throw new AgentError(
        "MISSING_API_KEY",
        "GOOGLE_API_KEY is required for Gemini provider",
        false,
      );
    }
    this.client = new GoogleGenerativeAI(key);
    this.defaultModel = model;
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }

  private formatMessagesForGemini(messages: AgentMessage[]): Content[] {
    return messages.map((msg) => ({
      role: msg.role === "assistant" ? "model" : "user",
      parts: [{ text: msg.content }],
    }));
  }

  async *streamResponse(config: CompletionRequest): AsyncGenerator<AgentResponseChunk> {
    const { systemPrompt, messages, modelPreferences, signal } = config;

    try {
      const model = this.client.getGenerativeModel({
        model: modelPreferences?.model || this.defaultModel,
        systemInstruction: systemPrompt,
        generationConfig: {
          temperature: modelPreferences?.temperature ?? 0,
          maxOutputTokens: modelPreferences?.maxTokens || 500,
          responseMimeType: "application/json",
        },
      });

      const result = await model.generateContentStream(
        { contents: this.formatMessagesForGemini(messages) },
        { signal },
      );

      for await (const chunk of result.stream) {
        const candidate = chunk.candidates?.[0];
        for (const part of candidate?.content?.parts ?? []) {
          if (part.text) {
            yield textChunk(part.text);
          }
        }
        if (candidate?.finishReason === FinishReason.STOP) {
          yield textChunk("", true);
        }
      }
    } catch (error) {
      yield errorChunk(
        this.getErrorCode(error),
        error instanceof Error ? error.message : "Unknown Gemini API error",
        this.isRetryableError(error),
      );
    }
  }

  /**
   * Check if an error is retryable. The SDK only reports status codes inside
   * the message text.
   */
  private isRetryableError(error: unknown): boolean {
    if (isAbortError(error)) return false;
    if (error instanceof Error) {
      const message = error.message.toLowerCase();
      if (
        message.includes("rate limit") ||
        message.includes("quota") ||
        message.includes("[429") ||
        message.includes("[500") ||
        message.includes("[503")
      ) {
        return true;
      }
    }
    return isTransientMessage(error);
  }

  private getErrorCode(error: unknown): string {
    if (isAbortError(error)) return "ABORTED";
    if (error instanceof Error) {
      const message = error.message.toLowerCase();
      if (message.includes("unauthorized") || message.includes("[401")) return "UNAUTHORIZED";
      if (message.includes("forbidden") || message.includes("[403")) return "FORBIDDEN";
      if (message.includes("not found") || message.includes("[404")) return "NOT_FOUND";
      if (message.includes("rate limit") || message.includes("quota") || message.includes("[429")) {
        return "RATE_LIMITED";
      }
      if (message.includes("[500") || message.includes("[503")) return "SERVER_ERROR";
      if (message.includes("timeout")) return "TIMEOUT";
      if (message.includes("network") || message.includes("fetch failed")) return "NETWORK_ERROR";
    }
    return "UNKNOWN_ERROR";
  }
}
