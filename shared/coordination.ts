/**
 * Shared types for translation backends
 */

/**
 * Core agent message structure
 */
export interface AgentMessage {
  role: "user" | "assistant";
  content: string;
  timestamp?: number;
}

/**
 * Model preferences for a single completion
 */
export interface ModelPreferences {
  model?: string;
  temperature?: number; // 0-1
  maxTokens?: number;
}

export type AgentResponseChunkType = "text" | "error";

/**
 * Streaming response chunk
 */
export interface AgentResponseChunk {
  type: AgentResponseChunkType;
  chunkId: string;
  timestamp: number;

  // For "text" type
  text?: string;
  isDone?: boolean;

  // For "error" type
  error?: {
    code: string;
    message: string;
    retryable: boolean;
  };
}

export interface CompletionRequest {
  systemPrompt: string;
  messages: AgentMessage[];
  modelPreferences?: ModelPreferences;
  signal?: AbortSignal;
}

/**
 * LLM provider interface
 */
export interface LLMProvider {
  id: string; // "ollama" | "claude" | "openai" | "gemini"
  name: string;
  locality: "local" | "remote";

  defaultModel: string;
  apiEndpoint?: string;
  apiKeyRequired: boolean;

  // Cheap reachability probe used to order backends
  isAvailable(signal?: AbortSignal): Promise<boolean>;
  streamResponse(config: CompletionRequest): AsyncGenerator<AgentResponseChunk>;
}

export interface LocalProvider extends LLMProvider {
  locality: "local";
}

export interface RemoteProvider extends LLMProvider {
  locality: "remote";
}

export type TranslationBackend = LocalProvider | RemoteProvider;

/**
 * Error type for agent operations
 */
export class AgentError extends Error {
  constructor(
    public code: string,
    message: string,
    public retryable: boolean = false,
    public statusCode?: number,
  ) {
    super(message);
    this.name = "AgentError";
  }
}
