/**
 * Translation backends
 *
 * Re-exports all provider implementations and builds the ordered backend
 * list: the local Ollama server first, then every remote API with a key.
 */

export { OllamaProvider } from "./ollama";
export { ClaudeProvider } from "./claude";
export { OpenAIProvider } from "./openai";
export { GeminiProvider } from "./gemini";

import { AgentError, type TranslationBackend } from "@shared/coordination";
import { createLogger } from "../../lib/logger";
import { OllamaProvider } from "./ollama";
import { ClaudeProvider } from "./claude";
import { OpenAIProvider } from "./openai";
import { GeminiProvider } from "./gemini";

const log = createLogger("providers");

export const REMOTE_PROVIDER_IDS = ["claude", "openai", "gemini"] as const;
export type RemoteProviderId = (typeof REMOTE_PROVIDER_IDS)[number];

/**
 * Provider configuration for initialization
 */
export interface ProviderConfig {
  ollamaHost?: string;
  ollamaModel?: string;
  disableLocal?: boolean;
  anthropicApiKey?: string;
  openaiApiKey?: string;
  geminiApiKey?: string;
  // Remote provider tried first; remoteModel applies to it only
  remoteProvider?: string;
  remoteModel?: string;
}

function isRemoteProviderId(value: string): value is RemoteProviderId {
  return REMOTE_PROVIDER_IDS.some((id) => id === value);
}

/**
 * Create a specific remote provider by ID
 */
export function createProvider(
  providerId: string,
  apiKey?: string,
  model?: string,
): TranslationBackend {
  switch (providerId) {
    case "claude":
      return new ClaudeProvider(apiKey, model);
    case "openai":
      return new OpenAIProvider(apiKey, model);
    case "gemini":
      return new GeminiProvider(apiKey, model);
    default:
      throw new AgentError("UNKNOWN_PROVIDER", `Unknown provider: ${providerId}`, false);
  }
}

/**
 * Create all configured providers in the order the translator tries them.
 */
export function createConfiguredProviders(
  config: ProviderConfig = {},
): Map<string, TranslationBackend> {
  const providers = new Map<string, TranslationBackend>();

  if (!config.disableLocal) {
    providers.set("ollama", new OllamaProvider(config.ollamaHost, config.ollamaModel));
  }

  const keys: Record<RemoteProviderId, string | undefined> = {
    claude: config.anthropicApiKey,
    openai: config.openaiApiKey,
    gemini: config.geminiApiKey,
  };

  const preferred =
    config.remoteProvider && isRemoteProviderId(config.remoteProvider)
      ? config.remoteProvider
      : undefined;
  if (config.remoteProvider && !preferred) {
    log.warn(`Ignoring unknown KUBEWARD_REMOTE_PROVIDER "${config.remoteProvider}"`);
  }

  const order = preferred
    ? [preferred, ...REMOTE_PROVIDER_IDS.filter((id) => id !== preferred)]
    : [...REMOTE_PROVIDER_IDS];

  for (const id of order) {
    const key = keys[id];
    if (!key) continue;
    try {
      providers.set(id, createProvider(id, key, id === preferred ? config.remoteModel : undefined));
    } catch (error) {
      log.warn(`Failed to initialize ${id} provider`, error);
    }
  }

  return providers;
}
