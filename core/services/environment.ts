import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import * as yaml from "js-yaml";
import type {
  EnvironmentClass,
  EnvironmentContext,
  KubeContextSummary,
} from "@shared/environment";

export class ConfigurationError extends Error {
  code:
    | "KUBECONFIG_NOT_FOUND"
    | "KUBECONFIG_UNREADABLE"
    | "KUBECONFIG_INVALID"
    | "NO_ACTIVE_CONTEXT"
    | "CONTEXT_NOT_FOUND";
  remediation: string;

  constructor(code: ConfigurationError["code"], message: string, remediation: string) {
    super(message);
    this.name = "ConfigurationError";
    this.code = code;
    this.remediation = remediation;
  }
}

export interface ResolveEnvironmentOptions {
  kubeconfigPath?: string;
  contextOverride?: string;
}

interface ParsedKubeconfig {
  filePath: string;
  currentContext?: string;
  contexts: KubeContextSummary[];
}

/**
 * Coarse deployment tier from a context name. Checked in order, so a name
 * containing both "prod" and "dev" is production.
 */
export function classifyEnvironment(name: string): EnvironmentClass {
  const lower = name.toLowerCase();
  if (lower.includes("prod")) return "production";
  if (lower.includes("stag")) return "staging";
  if (lower.includes("dev")) return "development";
  return "unknown";
}

export function effectiveNamespace(context: EnvironmentContext): string {
  return context.namespace || "default";
}

export function defaultKubeconfigPath(): string {
  return path.join(os.homedir(), ".kube", "config");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

function readKubeconfig(filePath: string): ParsedKubeconfig {
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError(
      "KUBECONFIG_NOT_FOUND",
      `No kubeconfig found at ${filePath}`,
      "Set KUBECONFIG to your kubeconfig file, or pass --kubeconfig <path>.",
    );
  }

  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(
      "KUBECONFIG_UNREADABLE",
      `Cannot read kubeconfig at ${filePath}: ${reason}`,
      "Check the file permissions, then start kubeward again.",
    );
  }

  let document: unknown;
  try {
    document = yaml.load(text);
  } catch (error) {
    const line =
      error instanceof yaml.YAMLException && error.mark ? ` (line ${error.mark.line + 1})` : "";
    throw new ConfigurationError(
      "KUBECONFIG_INVALID",
      `Kubeconfig at ${filePath} is not valid YAML${line}`,
      "Fix the file, or check it with `kubectl config view`.",
    );
  }

  if (!isRecord(document)) {
    throw new ConfigurationError(
      "KUBECONFIG_INVALID",
      `Kubeconfig at ${filePath} is empty or not a mapping`,
      "Create a context with `kubectl config set-context <name> --cluster=<cluster>`.",
    );
  }

  const rawContexts = Array.isArray(document.contexts) ? document.contexts : [];
  const currentContext = optionalString(document["current-context"]);
  const contexts: KubeContextSummary[] = [];

  for (const entry of rawContexts) {
    if (!isRecord(entry)) continue;
    const name = optionalString(entry.name);
    const body = isRecord(entry.context) ? entry.context : undefined;
    const cluster = optionalString(body?.cluster);
    if (!name || !cluster) {
      throw new ConfigurationError(
        "KUBECONFIG_INVALID",
        `Kubeconfig at ${filePath} has a context without a name or cluster`,
        "Every entry under `contexts` needs `name` and `context.cluster`.",
      );
    }
    contexts.push({
      name,
      cluster,
      namespace: optionalString(body?.namespace),
      user: optionalString(body?.user) || "",
      isCurrent: name === currentContext,
    });
  }

  return { filePath, currentContext, contexts };
}

export function listContexts(options: ResolveEnvironmentOptions = {}): KubeContextSummary[] {
  return readKubeconfig(options.kubeconfigPath || defaultKubeconfigPath()).contexts;
}

/**
 * Resolve the active kubeconfig context into an immutable session snapshot.
 */
export function resolveEnvironment(options: ResolveEnvironmentOptions = {}): EnvironmentContext {
  const parsed = readKubeconfig(options.kubeconfigPath || defaultKubeconfigPath());

  if (parsed.contexts.length === 0) {
    throw new ConfigurationError(
      "NO_ACTIVE_CONTEXT",
      `Kubeconfig at ${parsed.filePath} defines no contexts`,
      "Create a context with `kubectl config set-context <name> --cluster=<cluster>`.",
    );
  }

  const selected = options.contextOverride || parsed.currentContext;
  if (!selected) {
    throw new ConfigurationError(
      "NO_ACTIVE_CONTEXT",
      `Kubeconfig at ${parsed.filePath} has no current-context`,
      "Run `kubectl config use-context <name>` or pass --context <name>.",
    );
  }

  const match = parsed.contexts.find((context) => context.name === selected);
  if (!match) {
    const known = parsed.contexts.map((context) => context.name).join(", ");
    throw new ConfigurationError(
      "CONTEXT_NOT_FOUND",
      `Context "${selected}" is not defined in ${parsed.filePath}`,
      `Pick one of: ${known}.`,
    );
  }

  return Object.freeze({
    name: match.name,
    cluster: match.cluster,
    namespace: match.namespace,
    user: match.user,
    environmentClass: classifyEnvironment(match.name),
  });
}
