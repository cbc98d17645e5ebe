import { describe, expect, it } from "vitest";
import { parseBuiltin } from "../builtins";

describe("parseBuiltin", () => {
  it.each([
    ["help", { kind: "help" }],
    ["?", { kind: "help" }],
    ["exit", { kind: "exit" }],
    ["  quit  ", { kind: "exit" }],
    ["clear", { kind: "clear" }],
    ["contexts", { kind: "contexts" }],
    ["use-context prod-us", { kind: "use_context", name: "prod-us" }],
    ["history", { kind: "history_today" }],
    ["history today", { kind: "history_today" }],
    ["history more", { kind: "history_more" }],
    ["history env staging-eu", { kind: "history_env", name: "staging-eu" }],
    ["history 7d", { kind: "history_days", days: 7 }],
    ["history last 3 days", { kind: "history_days", days: 3 }],
    ["history last 1 day", { kind: "history_days", days: 1 }],
    ["history last 14", { kind: "history_days", days: 14 }],
    ["allowlist", { kind: "allowlist_list" }],
    ["allowlist list", { kind: "allowlist_list" }],
    [
      "allowlist remove kubectl delete pod web-1",
      { kind: "allowlist_remove", command: "kubectl delete pod web-1" },
    ],
  ])("parses %j", (input, expected) => {
    expect(parseBuiltin(input)).toEqual(expected);
  });

  it.each([
    "help me find crashing pods",
    "exit the maintenance mode on node-3",
    "clear the failed jobs",
    "contexts of the cluster",
    "use-context",
    "use-context a b",
    "history of pod restarts",
    "history last week",
    "history env",
    "allowlist remove",
    "allowlist the last command",
    "show me pods",
    "kubectl get pods",
    "",
  ])("leaves %j for translation", (input) => {
    expect(parseBuiltin(input)).toBeNull();
  });
});
