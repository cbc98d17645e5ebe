import type { CommandAdapter } from "./types";

/**
 * Pins commands to the session context unless they already name it (the
 * policy refuses any other) or are `kubectl config` calls.
 */
export const kubectlAdapter: CommandAdapter = {
  family: "kubectl",
  build(tokens, options) {
    const executable = options?.executable || "kubectl";
    const args = tokens.slice(1);
    const hasExplicitContext = args.some(
      (arg) => arg === "--context" || arg.startsWith("--context="),
    );
    const isConfigCommand = args.find((arg) => !arg.startsWith("-")) === "config";

    if (options?.clusterContext && !hasExplicitContext && !isConfigCommand) {
      return {
        executable,
        args: ["--context", options.clusterContext, ...args],
      };
    }

    return { executable, args };
  },
};
