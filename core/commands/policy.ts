import type { CommandPolicyDecision } from "@shared/terminal";

const UNSAFE_PATTERN = /[;&|`<>\n\r]/;
const VARIABLE_SUBSTITUTION_PATTERN = /\$\(|\$\{|`/;

// Global flags that consume the following token when written without "="
const VALUE_FLAGS = new Set([
  "-n",
  "--namespace",
  "--context",
  "--kubeconfig",
  "--cluster",
  "--user",
  "-s",
  "--server",
  "--token",
  "--as",
]);

// Flags that point kubectl at a cluster other than the session's
const TARGET_FLAGS = new Set(["--kubeconfig", "--cluster", "--server", "-s"]);

export interface PolicyOptions {
  // Context the session is pinned to; a different --context is refused
  sessionContext?: string;
}

function unquote(token: string): string {
  if (
    (token.startsWith('"') && token.endsWith('"')) ||
    (token.startsWith("'") && token.endsWith("'"))
  ) {
    return token.slice(1, -1);
  }
  return token;
}

/**
 * Split command while preserving quoted groups.
 */
export function splitCommand(command: string): string[] {
  const tokens = command.match(/(?:[^\s"']+|"[^"]*"|'[^']*')+/g) || [];
  return tokens.map((token) => unquote(token.trim())).filter(Boolean);
}

export function normalizeCommand(command: string): string {
  return command.replace(/\s+/g, " ").trim();
}

/**
 * Index of the first positional argument after the binary, skipping global
 * flags; -1 when there is none.
 */
export function findSubcommandIndex(tokens: string[]): number {
  for (let index = 1; index < tokens.length; index += 1) {
    const token = tokens[index];
    if (VALUE_FLAGS.has(token)) {
      index += 1;
      continue;
    }
    if (token.startsWith("-")) continue;
    return index;
  }
  return -1;
}

export function findSubcommand(tokens: string[]): string {
  const index = findSubcommandIndex(tokens);
  return index > 0 ? tokens[index] : "";
}

/**
 * First flag, before any `--`, that would send the command somewhere other
 * than the session context.
 */
export function findTargetOverride(
  tokens: string[],
  sessionContext?: string,
): { flag: string; value: string } | null {
  for (let index = 1; index < tokens.length; index += 1) {
    const token = tokens[index];
    if (token === "--") break;
    const [flag, ...rest] = token.split("=");
    const value = rest.length > 0 ? rest.join("=") : (tokens[index + 1] ?? "");
    if (TARGET_FLAGS.has(flag)) return { flag, value };
    if (flag === "--context" && sessionContext !== undefined && value !== sessionContext) {
      return { flag, value };
    }
  }
  return null;
}

export function evaluateCommandPolicy(
  command: string,
  options: PolicyOptions = {},
): {
  decision: CommandPolicyDecision;
  tokens: string[];
} {
  const trimmed = command.trim();
  if (!trimmed) {
    return {
      decision: {
        allowed: false,
        reason: "Command is empty",
      },
      tokens: [],
    };
  }

  if (UNSAFE_PATTERN.test(trimmed) || VARIABLE_SUBSTITUTION_PATTERN.test(trimmed)) {
    return {
      decision: {
        allowed: false,
        reason: "Command contains unsafe shell operators",
      },
      tokens: [],
    };
  }

  const tokens = splitCommand(trimmed);
  const binary = tokens[0];
  if (binary !== "kubectl") {
    return {
      decision: {
        allowed: false,
        reason: `Only kubectl commands are supported, got: ${binary}`,
      },
      tokens,
    };
  }

  const subcommand = findSubcommand(tokens);
  if (!subcommand) {
    return {
      decision: {
        allowed: false,
        family: "kubectl",
        reason: "kubectl subcommand is required",
      },
      tokens,
    };
  }

  const override = findTargetOverride(tokens, options.sessionContext);
  if (override) {
    return {
      decision: {
        allowed: false,
        family: "kubectl",
        subcommand,
        reason:
          override.flag === "--context"
            ? `Command names context "${override.value}" but the session is on ${options.sessionContext}; use use-context to switch`
            : `${override.flag} is not allowed; commands run against the session context only`,
      },
      tokens,
    };
  }

  return {
    decision: {
      allowed: true,
      family: "kubectl",
      subcommand,
      matchedRule: `kubectl:${subcommand}`,
    },
    tokens,
  };
}
