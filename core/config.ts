import os from "node:os";
import path from "node:path";
import { isLogLevel, type LogLevel } from "./lib/logger";

export interface KubewardConfig {
  homeDir: string;
  auditDbPath: string;
  allowlistPath: string;
  logFilePath: string;
  logLevel: LogLevel;

  kubeconfigPath?: string;
  contextOverride?: string;
  kubectlBinary: string;
  verbCatalogPath?: string;

  translationTimeoutMs: number;
  confidenceThreshold: number;
  auditRetentionDays: number;
  outputCapBytes: number;
  executionTimeoutMs: number;

  ollamaHost: string;
  ollamaModel: string;
  disableLocal: boolean;
  anthropicApiKey?: string;
  openaiApiKey?: string;
  geminiApiKey?: string;
  remoteProvider?: string;
  remoteModel?: string;
}

export interface ConfigWarning {
  key: string;
  message: string;
}

type Env = Record<string, string | undefined>;

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function expandHome(value: string): string {
  if (value === "~") return os.homedir();
  if (value.startsWith("~/")) return path.join(os.homedir(), value.slice(2));
  return value;
}

function isTruthy(value: string | undefined): boolean {
  return !!value && ["1", "true", "yes"].includes(value.trim().toLowerCase());
}

/**
 * Build the runtime configuration from environment variables. Values that do
 * not parse fall back to their defaults and are reported in `warnings`.
 */
export function loadConfig(env: Env = process.env): {
  config: KubewardConfig;
  warnings: ConfigWarning[];
} {
  const warnings: ConfigWarning[] = [];

  const readInt = (key: string, fallback: number, min: number, max: number): number => {
    const raw = nonEmpty(env[key]);
    if (raw === undefined) return fallback;
    const parsed = Number(raw);
    if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
      warnings.push({
        key,
        message: `${key}=${raw} is not an integer in [${min}, ${max}], using ${fallback}`,
      });
      return fallback;
    }
    return parsed;
  };

  const homeDir = expandHome(nonEmpty(env.KUBEWARD_HOME) || path.join(os.homedir(), ".kubeward"));
  const resolveFile = (key: string, fileName: string): string => {
    const override = nonEmpty(env[key]);
    return override ? expandHome(override) : path.join(homeDir, fileName);
  };

  let logLevel: LogLevel = "info";
  const rawLevel = nonEmpty(env.KUBEWARD_LOG_LEVEL)?.toLowerCase();
  if (rawLevel) {
    if (isLogLevel(rawLevel)) {
      logLevel = rawLevel;
    } else {
      warnings.push({
        key: "KUBEWARD_LOG_LEVEL",
        message: `Unknown log level "${rawLevel}", using info`,
      });
    }
  }

  const kubeconfig = nonEmpty(env.KUBECONFIG);
  const verbCatalog = nonEmpty(env.KUBEWARD_VERB_CATALOG);

  const config: KubewardConfig = {
    homeDir,
    auditDbPath: resolveFile("KUBEWARD_AUDIT_DB", "audit.db"),
    allowlistPath: resolveFile("KUBEWARD_ALLOWLIST", "allowlist"),
    logFilePath: resolveFile("KUBEWARD_LOG_FILE", "kubeward.log"),
    logLevel,

    // KUBECONFIG may hold a path list; the first entry is the one we read
    kubeconfigPath: kubeconfig
      ? expandHome(kubeconfig.split(path.delimiter)[0] || kubeconfig)
      : undefined,
    contextOverride: nonEmpty(env.KUBEWARD_CONTEXT),
    kubectlBinary: nonEmpty(env.KUBEWARD_KUBECTL) || "kubectl",
    verbCatalogPath: verbCatalog ? expandHome(verbCatalog) : undefined,

    translationTimeoutMs: readInt("KUBEWARD_TRANSLATION_TIMEOUT_MS", 10_000, 1_000, 120_000),
    confidenceThreshold: readInt("KUBEWARD_CONFIDENCE_THRESHOLD", 70, 0, 100),
    auditRetentionDays: readInt("KUBEWARD_AUDIT_RETENTION_DAYS", 90, 1, 3650),
    outputCapBytes: readInt("KUBEWARD_OUTPUT_CAP_BYTES", 10 * 1024, 1024, 10 * 1024 * 1024),
    executionTimeoutMs: readInt("KUBEWARD_EXEC_TIMEOUT_MS", 600_000, 1_000, 86_400_000),

    ollamaHost: (nonEmpty(env.OLLAMA_HOST) || "http://localhost:11434").replace(/\/+$/, ""),
    ollamaModel: nonEmpty(env.OLLAMA_MODEL) || "qwen2.5-coder:7b",
    disableLocal: isTruthy(env.KUBEWARD_DISABLE_LOCAL),
    anthropicApiKey: nonEmpty(env.ANTHROPIC_API_KEY),
    openaiApiKey: nonEmpty(env.OPENAI_API_KEY),
    geminiApiKey: nonEmpty(env.GOOGLE_API_KEY) || nonEmpty(env.GEMINI_API_KEY),
    remoteProvider: nonEmpty(env.KUBEWARD_REMOTE_PROVIDER)?.toLowerCase(),
    remoteModel: nonEmpty(env.KUBEWARD_REMOTE_MODEL),
  };

  return { config, warnings };
}
