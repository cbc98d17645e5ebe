/**
 * Commands the session handles itself instead of sending to translation.
 */

export type BuiltinCommand =
  | { kind: "help" }
  | { kind: "exit" }
  | { kind: "clear" }
  | { kind: "history_today" }
  | { kind: "history_days"; days: number }
  | { kind: "history_env"; name: string }
  | { kind: "history_more" }
  | { kind: "allowlist_list" }
  | { kind: "allowlist_remove"; command: string }
  | { kind: "contexts" }
  | { kind: "use_context"; name: string };

export const HELP_LINES: readonly string[] = [
  "Type a request in plain language, or a kubectl command to run it directly.",
  "",
  "  history [today]            commands run today",
  "  history last N days        commands from the last N days (also: history Nd)",
  "  history env NAME           commands run against one context",
  "  history more               next page of the last history query",
  "  allowlist                  commands that skip confirmation",
  "  allowlist remove COMMAND   drop a command from the allowlist",
  "  contexts                   kubeconfig contexts",
  "  use-context NAME           switch the session to another context",
  "  clear                      clear the screen",
  "  exit | quit                leave the session",
  "",
  "Ctrl+C cancels a translation or interrupts a running command.",
];

function parseHistory(args: string[]): BuiltinCommand | null {
  if (args.length === 0) return { kind: "history_today" };
  const [first, ...rest] = args;

  if (first === "today" && rest.length === 0) return { kind: "history_today" };
  if (first === "more" && rest.length === 0) return { kind: "history_more" };
  if (first === "env" && rest.length === 1) return { kind: "history_env", name: rest[0] };

  const shorthand = /^(\d+)d$/.exec(first);
  if (shorthand && rest.length === 0) {
    return { kind: "history_days", days: Number(shorthand[1]) };
  }

  if (first === "last" && rest.length >= 1 && /^\d+$/.test(rest[0])) {
    const unit = rest.slice(1).join(" ");
    if (unit === "" || unit === "days" || unit === "day") {
      return { kind: "history_days", days: Number(rest[0]) };
    }
  }

  return null;
}

/**
 * Recognise a built-in. Input that only starts like one ("history of pod
 * restarts") returns null and goes to translation.
 */
export function parseBuiltin(input: string): BuiltinCommand | null {
  const trimmed = input.trim();
  const [head, ...args] = trimmed.split(/\s+/);

  switch (head) {
    case "help":
    case "?":
      return args.length === 0 ? { kind: "help" } : null;
    case "exit":
    case "quit":
      return args.length === 0 ? { kind: "exit" } : null;
    case "clear":
      return args.length === 0 ? { kind: "clear" } : null;
    case "contexts":
      return args.length === 0 ? { kind: "contexts" } : null;
    case "use-context":
      return args.length === 1 ? { kind: "use_context", name: args[0] } : null;
    case "history":
      return parseHistory(args);
    case "allowlist": {
      if (args.length === 0 || (args.length === 1 && args[0] === "list")) {
        return { kind: "allowlist_list" };
      }
      if (args[0] === "remove" && args.length > 1) {
        return { kind: "allowlist_remove", command: trimmed.replace(/^allowlist\s+remove\s+/, "") };
      }
      return null;
    }
    default:
      return null;
  }
}
