import { createLogger } from "../core/lib/logger";
import { ENTER_ALT_SCREEN, EXIT_ALT_SCREEN, HIDE_CURSOR, SHOW_CURSOR } from "./ansi";

const log = createLogger("terminal");

export interface TerminalInput {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
}

export interface TerminalOutput {
  write(chunk: string): unknown;
}

export interface ProcessHooks {
  on(event: string, listener: (...args: unknown[]) => void): unknown;
  off(event: string, listener: (...args: unknown[]) => void): unknown;
  exit(code?: number): void;
}

const SIGNAL_EXIT_CODES: Record<"SIGTERM" | "SIGHUP", number> = {
  SIGTERM: 143,
  SIGHUP: 129,
};

function describeFault(fault: unknown): string {
  return fault instanceof Error ? fault.message : String(fault);
}

/**
 * Owns raw mode, the alternate screen and the hidden cursor. `release` puts
 * the terminal back and may be called any number of times; process exit,
 * termination signals and uncaught faults all release before the process
 * goes away.
 */
export class TerminalGuard {
  private acquired = false;
  private readonly handlers = new Map<string, (...args: unknown[]) => void>();

  constructor(
    private readonly input: TerminalInput,
    private readonly output: TerminalOutput,
    private readonly proc: ProcessHooks,
    private readonly errorOutput: TerminalOutput,
  ) {}

  get active(): boolean {
    return this.acquired;
  }

  acquire(): void {
    if (this.acquired) return;
    this.acquired = true;
    if (this.input.isTTY && this.input.setRawMode) {
      this.input.setRawMode(true);
    }
    this.output.write(ENTER_ALT_SCREEN + HIDE_CURSOR);
    this.installHandlers();
  }

  release(): void {
    if (!this.acquired) return;
    this.acquired = false;
    this.removeHandlers();
    if (this.input.isTTY && this.input.setRawMode) {
      this.input.setRawMode(false);
    }
    this.output.write(SHOW_CURSOR + EXIT_ALT_SCREEN);
  }

  private installHandlers(): void {
    this.handlers.set("exit", () => this.release());

    for (const signal of ["SIGTERM", "SIGHUP"] as const) {
      this.handlers.set(signal, () => {
        this.release();
        log.warn(`Received ${signal}, terminal restored`);
        this.proc.exit(SIGNAL_EXIT_CODES[signal]);
      });
    }

    for (const event of ["uncaughtException", "unhandledRejection"] as const) {
      this.handlers.set(event, (fault: unknown) => {
        this.release();
        log.error(`${event}: ${describeFault(fault)}`, fault);
        this.errorOutput.write(`kubeward: ${describeFault(fault)}\n`);
        this.proc.exit(1);
      });
    }

    for (const [event, handler] of this.handlers) {
      this.proc.on(event, handler);
    }
  }

  private removeHandlers(): void {
    for (const [event, handler] of this.handlers) {
      this.proc.off(event, handler);
    }
    this.handlers.clear();
  }
}

/**
 * Run `fn` with the terminal acquired, releasing it however `fn` ends.
 */
export async function withTerminal<T>(guard: TerminalGuard, fn: () => Promise<T>): Promise<T> {
  guard.acquire();
  try {
    return await fn();
  } finally {
    guard.release();
  }
}
