import type {
  AgentResponseChunk,
  CompletionRequest,
  LocalProvider,
} from "@shared/coordination";
import { errorChunk, isAbortError, textChunk } from "./chunks";

const PROBE_TIMEOUT_MS = 1500;

interface OllamaGenerateResponse {
  response: string;
  done?: boolean;
}

function isGenerateResponse(value: unknown): value is OllamaGenerateResponse {
  return (
    typeof value === "object" &&
    value !== null &&
    "response" in value &&
    typeof value.response === "string"
  );
}

class OllamaHttpError extends Error {
  constructor(
    public status: number,
    message: string,
  ) {
    super(message);
    this.name = "OllamaHttpError";
  }
}

/**
 * Local inference through an Ollama server. Non-streaming `/api/generate`
 * with JSON output; `/api/tags` doubles as the availability probe.
 */
export class OllamaProvider implements LocalProvider {
  id = "ollama";
  name = "Ollama (local)";
  locality = "local" as const;
  apiKeyRequired = false;
  apiEndpoint: string;
  defaultModel: string;

  constructor(host = "http://localhost:11434", model = "qwen2.5-coder:7b") {
    this.apiEndpoint = host.replace(/\/+$/, "");
    this.defaultModel = model;
  }

  async isAvailable(signal?: AbortSignal): Promise<boolean> {
    const probe = AbortSignal.timeout(PROBE_TIMEOUT_MS);
    try {
      const response = await fetch(`${this.apiEndpoint}/api/tags`, {
        signal: signal ? AbortSignal.any([signal, probe]) : probe,
      });
      return response.ok;
    } catch {
      return false;
    }
  }

  async *streamResponse(config: CompletionRequest): AsyncGenerator<AgentResponseChunk> {
    const { systemPrompt, messages, modelPreferences, signal } = config;
    const prompt = messages.map((message) => message.content).join("\n\n");

    try {
      const response = await fetch(`${this.apiEndpoint}/api/generate`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          model: modelPreferences?.model || this.defaultModel,
          system: systemPrompt,
          prompt,
          stream: false,
          format: "json",
          options: {
            temperature: modelPreferences?.temperature ?? 0,
            num_predict: modelPreferences?.maxTokens ?? 500,
          },
        }),
        signal,
      });

      if (!response.ok) {
        const detail = await response.text();
        throw new OllamaHttpError(
          response.status,
          `Ollama returned ${response.status}: ${detail.slice(0, 200)}`,
        );
      }

      const body: unknown = await response.json();
      if (!isGenerateResponse(body)) {
        yield errorChunk("INVALID_RESPONSE", "Ollama response has no text", false);
        return;
      }

      yield textChunk(body.response);
      yield textChunk("", true);
    } catch (error) {
      yield errorChunk(
        this.getErrorCode(error),
        error instanceof Error ? error.message : "Unknown Ollama error",
        this.isRetryableError(error),
      );
    }
  }

  private isRetryableError(error: unknown): boolean {
    if (error instanceof OllamaHttpError) {
      return error.status >= 500;
    }
    // A refused connection means the server is down; fall back instead of retrying
    return false;
  }

  private getErrorCode(error: unknown): string {
    if (isAbortError(error)) return "ABORTED";
    if (error instanceof OllamaHttpError) {
      if (error.status === 404) return "MODEL_NOT_FOUND";
      if (error.status >= 500) return "SERVER_ERROR";
      return "API_ERROR";
    }
    if (error instanceof TypeError) return "CONNECTION_FAILED";
    return "UNKNOWN_ERROR";
  }
}
