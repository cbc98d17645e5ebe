/**
 * Audit trail types
 */

import type { RiskLevel } from "./terminal";

export type UserAction = "EXECUTED" | "CANCELLED" | "EDITED";

export interface AuditLogEntry {
  id: number;
  timestamp: number;
  userId: string;
  naturalLanguageInput: string;
  finalCommand: string;
  // AI-proposed command before the operator edited it
  originalCommand: string | null;
  // null for commands typed directly
  confidence: number | null;
  riskLevel: RiskLevel;
  environmentName: string;
  cluster: string;
  namespace: string | null;
  exitCode: number | null;
  stdout: string | null;
  stderr: string | null;
  durationMs: number | null;
  userAction: UserAction;
}

export type NewAuditEntry = Omit<AuditLogEntry, "id">;

export type AuditQueryFilter =
  | { kind: "range"; since: number; until?: number }
  | { kind: "environment"; name: string };

export interface AuditPageRequest {
  limit?: number;
  offset?: number;
}

export interface AuditPage {
  entries: AuditLogEntry[];
  offset: number;
  hasMore: boolean;
}
