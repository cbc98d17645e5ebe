/**
 * Command translation, classification and execution types
 */

import type { EnvironmentContext } from "./environment";

export type CommandFamily = "kubectl";

export type RiskLevel = "LOW" | "MEDIUM" | "HIGH";

export type ConfirmationModality = "none" | "yes_no" | "typed_phrase";

export interface ConfirmationSpec {
  modality: ConfirmationModality;
  expectedPhrase?: string;
}

export interface RiskAssessment {
  level: RiskLevel;
  // Verb or pattern that decided the level, absent for the LOW default
  matchedRule?: string;
}

export interface TranslationRequest {
  text: string;
  context: EnvironmentContext;
}

export interface TranslationResult {
  command: string;
  confidence: number;
  rationale: string;
  needsClarification: boolean;
  backendId: string;
}

export interface CommandPolicyDecision {
  allowed: boolean;
  family?: CommandFamily;
  subcommand?: string;
  reason?: string;
  matchedRule?: string;
}

export interface BrokerExecuteRequest {
  command: string;
  clusterContext?: string;
  timeoutMs?: number;
  maxOutputBytes?: number;
}

export interface ExecutionResult {
  stdout: string;
  stderr: string;
  // 130 after an operator interrupt, 124 after the hard timeout
  exitCode: number;
  executedAt: number;
  durationMs: number;
  interrupted: boolean;
  timedOut: boolean;
  truncated: boolean;
  policyDecision: CommandPolicyDecision;
}

export type OutputStream = "stdout" | "stderr";
