/**
 * SQLite-backed append-only audit trail.
 *
 * One row per attempted command: executed, edited, or cancelled at the
 * confirmation step. Rows are never updated; a retention sweep at open
 * deletes rows past the horizon.
 */

import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import type {
  AuditLogEntry,
  AuditPage,
  AuditPageRequest,
  AuditQueryFilter,
  NewAuditEntry,
  UserAction,
} from "@shared/audit";
import type { RiskLevel } from "@shared/terminal";
import { TRUNCATION_MARKER } from "../commands/broker";
import { createLogger } from "../lib/logger";

const log = createLogger("audit-log");

const DAY_MS = 24 * 60 * 60 * 1000;
export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 200;
const DEFAULT_OUTPUT_CAP_BYTES = 10 * 1024;
const DEFAULT_RETENTION_DAYS = 90;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS audit_log (
    id                     INTEGER PRIMARY KEY AUTOINCREMENT,
    timestamp              INTEGER NOT NULL,
    user_id                TEXT NOT NULL,
    natural_language_input TEXT NOT NULL,
    kubectl_command        TEXT NOT NULL,
    original_command       TEXT,
    confidence_score       INTEGER CHECK (confidence_score IS NULL OR confidence_score BETWEEN 0 AND 100),
    risk_level             TEXT NOT NULL CHECK (risk_level IN ('LOW', 'MEDIUM', 'HIGH')),
    environment_name       TEXT NOT NULL,
    cluster                TEXT NOT NULL,
    namespace              TEXT,
    exit_code              INTEGER,
    stdout                 TEXT,
    stderr                 TEXT,
    execution_duration_ms  INTEGER,
    user_action            TEXT NOT NULL CHECK (user_action IN ('EXECUTED', 'CANCELLED', 'EDITED')),
    created_at             INTEGER NOT NULL,
    CHECK (user_action <> 'CANCELLED' OR exit_code IS NULL)
  );

  CREATE INDEX IF NOT EXISTS idx_audit_timestamp ON audit_log(timestamp DESC);
  CREATE INDEX IF NOT EXISTS idx_audit_environment ON audit_log(environment_name);
  CREATE INDEX IF NOT EXISTS idx_audit_user_action ON audit_log(user_action);
  CREATE INDEX IF NOT EXISTS idx_audit_env_timestamp ON audit_log(environment_name, timestamp DESC);

  CREATE TRIGGER IF NOT EXISTS audit_log_immutable
  BEFORE UPDATE ON audit_log
  BEGIN
    SELECT RAISE(ABORT, 'audit entries are immutable');
  END;
`;

export class AuditError extends Error {
  constructor(
    public code: "AUDIT_UNAVAILABLE" | "AUDIT_WRITE_FAILED" | "AUDIT_QUERY_FAILED",
    message: string,
  ) {
    super(message);
    this.name = "AuditError";
  }
}

export type AuditWriteResult = { ok: true; id: number } | { ok: false; error: AuditError };

interface AuditRow {
  id: number;
  timestamp: number;
  user_id: string;
  natural_language_input: string;
  kubectl_command: string;
  original_command: string | null;
  confidence_score: number | null;
  risk_level: RiskLevel;
  environment_name: string;
  cluster: string;
  namespace: string | null;
  exit_code: number | null;
  stdout: string | null;
  stderr: string | null;
  execution_duration_ms: number | null;
  user_action: UserAction;
}

function rowToEntry(row: AuditRow): AuditLogEntry {
  return {
    id: row.id,
    timestamp: row.timestamp,
    userId: row.user_id,
    naturalLanguageInput: row.natural_language_input,
    finalCommand: row.kubectl_command,
    originalCommand: row.original_command,
    confidence: row.confidence_score,
    riskLevel: row.risk_level,
    environmentName: row.environment_name,
    cluster: row.cluster,
    namespace: row.namespace,
    exitCode: row.exit_code,
    stdout: row.stdout,
    stderr: row.stderr,
    durationMs: row.execution_duration_ms,
    userAction: row.user_action,
  };
}

/**
 * Cap a captured stream at `maxBytes`, appending the truncation marker once.
 */
export function truncateForAudit(value: string | null, maxBytes: number): string | null {
  if (value === null) return null;
  const buffer = Buffer.from(value, "utf8");
  if (buffer.length <= maxBytes) return value;
  const body = value.endsWith(TRUNCATION_MARKER) ? value.slice(0, -TRUNCATION_MARKER.length) : value;
  return Buffer.from(body, "utf8").subarray(0, maxBytes).toString("utf8") + TRUNCATION_MARKER;
}

export function todayFilter(now: number = Date.now()): AuditQueryFilter {
  const start = new Date(now);
  start.setHours(0, 0, 0, 0);
  return { kind: "range", since: start.getTime() };
}

export function lastDaysFilter(days: number, now: number = Date.now()): AuditQueryFilter {
  return { kind: "range", since: now - Math.max(1, Math.floor(days)) * DAY_MS };
}

export function environmentFilter(name: string): AuditQueryFilter {
  return { kind: "environment", name };
}

export interface AuditLogOptions {
  retentionDays?: number;
  outputCapBytes?: number;
  now?: () => number;
}

function sweep(db: Database.Database, now: () => number, days: number): number {
  const cutoff = now() - days * DAY_MS;
  const info = db.prepare("DELETE FROM audit_log WHERE timestamp < ?").run(cutoff);
  if (info.changes > 0) {
    log.info(`Pruned ${info.changes} audit entries older than ${days} days`);
  }
  return info.changes;
}

export class AuditLog {
  private readonly outputCapBytes: number;
  private readonly now: () => number;

  private constructor(
    private db: Database.Database | null,
    options: AuditLogOptions,
    readonly unavailableReason?: string,
  ) {
    this.outputCapBytes = options.outputCapBytes || DEFAULT_OUTPUT_CAP_BYTES;
    this.now = options.now || Date.now;
  }

  /**
   * Open (or create) the store and run the retention sweep. Never throws: a
   * store that cannot be opened yields a disabled log whose writes fail with
   * AUDIT_UNAVAILABLE, so commands still run.
   */
  static open(dbPath: string, options: AuditLogOptions = {}): AuditLog {
    let db: Database.Database | null = null;
    try {
      if (dbPath !== ":memory:") {
        fs.mkdirSync(path.dirname(dbPath), { recursive: true });
      }
      db = new Database(dbPath);
      db.pragma("journal_mode = WAL");
      db.pragma("busy_timeout = 3000");
      db.exec(SCHEMA);
      if (dbPath !== ":memory:") {
        fs.chmodSync(dbPath, 0o600);
      }
      sweep(db, options.now || Date.now, options.retentionDays ?? DEFAULT_RETENTION_DAYS);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      log.error(`Cannot open audit store at ${dbPath}: ${reason}`);
      db?.close();
      return new AuditLog(null, options, `Audit store unavailable: ${reason}`);
    }

    log.info(`Opened audit store at ${dbPath}`);
    return new AuditLog(db, options);
  }

  get available(): boolean {
    return this.db !== null;
  }

  /**
   * Best-effort append. Failures are logged and returned, never thrown.
   */
  record(entry: NewAuditEntry): AuditWriteResult {
    if (!this.db) {
      const error = new AuditError("AUDIT_UNAVAILABLE", this.unavailableReason || "Audit store is closed");
      log.warn(`Audit entry dropped: ${error.message}`);
      return { ok: false, error };
    }

    const now = this.now();
    try {
      const info = this.db
        .prepare(
          `INSERT INTO audit_log (
            timestamp, user_id, natural_language_input, kubectl_command, original_command,
            confidence_score, risk_level, environment_name, cluster, namespace,
            exit_code, stdout, stderr, execution_duration_ms, user_action, created_at
          ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          Math.min(entry.timestamp, now),
          entry.userId,
          entry.naturalLanguageInput,
          entry.finalCommand,
          entry.originalCommand,
          entry.confidence,
          entry.riskLevel,
          entry.environmentName,
          entry.cluster,
          entry.namespace,
          entry.exitCode,
          truncateForAudit(entry.stdout, this.outputCapBytes),
          truncateForAudit(entry.stderr, this.outputCapBytes),
          entry.durationMs,
          entry.userAction,
          now,
        );
      return { ok: true, id: Number(info.lastInsertRowid) };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      log.warn(`Failed to record audit entry: ${reason}`);
      return { ok: false, error: new AuditError("AUDIT_WRITE_FAILED", reason) };
    }
  }

  /**
   * Most recent first, ordered by (timestamp, id) so repeated queries return
   * the same sequence.
   */
  query(filter: AuditQueryFilter, page: AuditPageRequest = {}): AuditPage {
    if (!this.db) {
      throw new AuditError("AUDIT_UNAVAILABLE", this.unavailableReason || "Audit store is closed");
    }

    const limit = Math.min(Math.max(Math.floor(page.limit ?? DEFAULT_PAGE_SIZE), 1), MAX_PAGE_SIZE);
    const offset = Math.max(Math.floor(page.offset ?? 0), 0);

    const conditions: string[] = [];
    const params: Array<string | number> = [];
    if (filter.kind === "range") {
      conditions.push("timestamp >= ?");
      params.push(filter.since);
      if (filter.until !== undefined) {
        conditions.push("timestamp < ?");
        params.push(filter.until);
      }
    } else {
      conditions.push("environment_name = ?");
      params.push(filter.name);
    }

    try {
      const rows = this.db
        .prepare<Array<string | number>, AuditRow>(
          `SELECT * FROM audit_log WHERE ${conditions.join(" AND ")}
           ORDER BY timestamp DESC, id DESC LIMIT ? OFFSET ?`,
        )
        .all(...params, limit + 1, offset);

      return {
        entries: rows.slice(0, limit).map(rowToEntry),
        offset,
        hasMore: rows.length > limit,
      };
    } catch (error) {
      throw new AuditError(
        "AUDIT_QUERY_FAILED",
        error instanceof Error ? error.message : String(error),
      );
    }
  }

  /** Remove entries older than `days` days. Returns the number deleted. */
  sweepRetention(days: number): number {
    if (!this.db) return 0;
    return sweep(this.db, this.now, days);
  }

  close(): void {
    if (!this.db) return;
    this.db.close();
    this.db = null;
    log.info("Audit store closed");
  }
}

function fit(value: string, width: number): string {
  const clipped = value.length > width ? `${value.slice(0, width - 3)}...` : value;
  return clipped.padEnd(width);
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

export function formatTimestamp(ms: number): string {
  const date = new Date(ms);
  return (
    `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
    `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`
  );
}

export function formatAuditTable(entries: AuditLogEntry[]): string {
  if (entries.length === 0) {
    return "No commands found.";
  }

  const header = `${fit("ID", 6)} ${fit("Time", 20)} ${fit("Command", 40)} ${fit("Environment", 15)} ${fit("Action", 10)} Exit`;
  const rows = entries.map(
    (entry) =>
      `${fit(String(entry.id), 6)} ${fit(formatTimestamp(entry.timestamp), 20)} ${fit(entry.finalCommand, 40)} ${fit(entry.environmentName, 15)} ${fit(entry.userAction, 10)} ${entry.exitCode === null ? "-" : entry.exitCode}`,
  );
  return [header, "-".repeat(100), ...rows].join("\n");
}
