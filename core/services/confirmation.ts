import type { EnvironmentClass } from "@shared/environment";
import type { ConfirmationSpec, RiskLevel } from "@shared/terminal";
import { findSubcommandIndex, splitCommand } from "../commands/policy";
import type { AllowlistView } from "./allowlist";

// Verbs whose first argument is already the target name
const NAME_FIRST_VERBS = new Set(["drain", "cordon", "uncordon", "taint"]);

// Flags that select many resources, so no single name identifies the target
const BULK_FLAGS = new Set(["--all", "--all-namespaces", "-A", "-l", "--selector", "--field-selector", "-f", "--filename"]);

const FLAG_WITH_VALUE = new Set([
  "-n",
  "--namespace",
  "--context",
  "--kubeconfig",
  "--cluster",
  "--user",
  "-l",
  "--selector",
  "--field-selector",
  "-f",
  "--filename",
  "-o",
  "--output",
  "--replicas",
  "--grace-period",
  "--timeout",
]);

/**
 * Name of the resource a command acts on, used as the phrase to type before a
 * destructive production command runs. Falls back to the environment class
 * word when the command does not target exactly one named resource.
 */
export function extractResourceName(command: string, environmentClass: EnvironmentClass): string {
  const tokens = splitCommand(command);
  const verbIndex = findSubcommandIndex(tokens);
  const subcommand = verbIndex > 0 ? tokens[verbIndex] : "";

  const positional: string[] = [];
  for (let index = verbIndex + 1; verbIndex > 0 && index < tokens.length; index += 1) {
    const token = tokens[index];
    const flagName = token.split("=")[0];
    if (BULK_FLAGS.has(flagName)) return environmentClass;
    if (token.startsWith("-")) {
      if (FLAG_WITH_VALUE.has(token)) index += 1;
      continue;
    }
    if (token === "all") continue;
    positional.push(token);
  }

  const first = positional[0];
  if (!first) return environmentClass;
  // One name only; a command touching several is confirmed with the environment word
  if (NAME_FIRST_VERBS.has(subcommand)) return positional.length === 1 ? first : environmentClass;
  if (first.includes("/")) {
    const name = first.slice(first.indexOf("/") + 1);
    return name && positional.length === 1 ? name : environmentClass;
  }
  return positional.length === 2 ? positional[1] : environmentClass;
}

export function deriveConfirmationSpec(
  riskLevel: RiskLevel,
  environmentClass: EnvironmentClass,
  command: string,
): ConfirmationSpec {
  if (riskLevel === "LOW") return { modality: "none" };
  if (riskLevel === "HIGH" && environmentClass === "production") {
    return {
      modality: "typed_phrase",
      expectedPhrase: extractResourceName(command, environmentClass),
    };
  }
  // MEDIUM anywhere, HIGH outside production (unknown counts as staging)
  return { modality: "yes_no" };
}

export type GateDecision =
  | { kind: "execute"; reason: "low_risk" | "allowlisted" }
  | { kind: "confirm"; spec: ConfirmationSpec };

/**
 * Decides whether a classified command runs straight away or needs the
 * operator. The allowlist is consulted before any dialog is shown.
 */
export class ConfirmationEngine {
  constructor(private readonly allowlist: AllowlistView) {}

  decide(command: string, riskLevel: RiskLevel, environmentClass: EnvironmentClass): GateDecision {
    const spec = deriveConfirmationSpec(riskLevel, environmentClass, command);
    if (spec.modality === "none") return { kind: "execute", reason: "low_risk" };
    if (this.allowlist.isAllowed(command)) return { kind: "execute", reason: "allowlisted" };
    return { kind: "confirm", spec };
  }
}
