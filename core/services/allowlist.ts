import fs from "node:fs";
import path from "node:path";
import { createLogger } from "../lib/logger";

const log = createLogger("allowlist");

const HEADER = "# kubeward allowlist: one exact command per line, matched verbatim\n";

export class AllowlistError extends Error {
  constructor(
    public code: "ALLOWLIST_INVALID" | "ALLOWLIST_WRITE_FAILED",
    message: string,
  ) {
    super(message);
    this.name = "AllowlistError";
  }
}

/**
 * Read-only view handed to everything except the session that owns the list.
 */
export interface AllowlistView {
  isAllowed(command: string): boolean;
  entries(): readonly string[];
}

function parseEntries(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith("#"));
}

/**
 * Commands the operator approved with "allow always". Exact string match on
 * the trimmed command, no patterns. Loaded once and rewritten atomically on
 * every change.
 */
export class Allowlist implements AllowlistView {
  private readonly commands: Set<string>;

  private constructor(
    private readonly filePath: string,
    commands: Iterable<string>,
  ) {
    this.commands = new Set(commands);
  }

  static load(filePath: string): Allowlist {
    if (!fs.existsSync(filePath)) {
      return new Allowlist(filePath, []);
    }
    const entries = parseEntries(fs.readFileSync(filePath, "utf8"));
    log.debug(`loaded ${entries.length} allowlisted commands from ${filePath}`);
    return new Allowlist(filePath, entries);
  }

  get path(): string {
    return this.filePath;
  }

  isAllowed(command: string): boolean {
    return this.commands.has(command.trim());
  }

  entries(): readonly string[] {
    return Array.from(this.commands);
  }

  add(command: string): void {
    const normalized = this.validate(command);
    if (this.commands.has(normalized)) return;
    this.commands.add(normalized);
    try {
      this.persist();
    } catch (error) {
      this.commands.delete(normalized);
      throw error;
    }
  }

  /**
   * Returns false when the command was not on the list.
   */
  remove(command: string): boolean {
    const normalized = command.trim();
    if (!this.commands.delete(normalized)) return false;
    try {
      this.persist();
    } catch (error) {
      this.commands.add(normalized);
      throw error;
    }
    return true;
  }

  private validate(command: string): string {
    const normalized = command.trim();
    if (!normalized) {
      throw new AllowlistError("ALLOWLIST_INVALID", "Cannot allowlist an empty command");
    }
    if (/[\r\n]/.test(normalized)) {
      throw new AllowlistError("ALLOWLIST_INVALID", "Allowlisted commands must be a single line");
    }
    if (normalized.startsWith("#")) {
      throw new AllowlistError("ALLOWLIST_INVALID", "Allowlisted commands cannot start with #");
    }
    return normalized;
  }

  private persist(): void {
    const body = HEADER + Array.from(this.commands).map((command) => `${command}\n`).join("");
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    let written = false;
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(tempPath, body, { mode: 0o600 });
      written = true;
      fs.renameSync(tempPath, this.filePath);
    } catch (error) {
      if (written) fs.rmSync(tempPath, { force: true });
      throw new AllowlistError(
        "ALLOWLIST_WRITE_FAILED",
        `Cannot write ${this.filePath}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }
}
