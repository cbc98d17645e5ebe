/**
 * Drives the session: queues keypresses, runs the effects the state machine
 * asks for, and repaints on a fixed tick. Async work (translation, command
 * execution) never touches the state directly; each settlement is dropped
 * into the outcome queue and picked up by the next tick.
 */

import type { AuditQueryFilter } from "@shared/audit";
import type { EnvironmentContext, KubeContextSummary } from "@shared/environment";
import type { CommandBroker } from "../core/commands/broker";
import type { Allowlist } from "../core/services/allowlist";
import {
  environmentFilter,
  formatAuditTable,
  lastDaysFilter,
  todayFilter,
  type AuditLog,
} from "../core/services/auditLog";
import { ConfigurationError, effectiveNamespace } from "../core/services/environment";
import { TranslationError, type Translator } from "../core/services/translator";
import { createLogger } from "../core/lib/logger";
import { CLEAR_LINE, CLEAR_SCREEN, CURSOR_HOME } from "./ansi";
import type { BuiltinCommand } from "./builtins";
import type { KeyEvent } from "./keys";
import { renderScreen } from "./render";
import type {
  SessionEffect,
  SessionEvent,
  SessionMachine,
  SessionState,
  TranslationFailure,
} from "./sessionMachine";

const log = createLogger("session");

export const TICK_MS = 100;
const HISTORY_PAGE_SIZE = 20;

export interface Screen {
  write(chunk: string): unknown;
  columns?: number;
  rows?: number;
}

export interface ContextSource {
  listContexts(): KubeContextSummary[];
  resolve(name: string): EnvironmentContext;
}

export interface InteractionLoopOptions {
  machine: SessionMachine;
  context: EnvironmentContext;
  translator: Pick<Translator, "translate">;
  broker: Pick<CommandBroker, "execute">;
  auditLog: Pick<AuditLog, "record" | "query">;
  allowlist: Pick<Allowlist, "add" | "remove" | "entries">;
  contexts: ContextSource;
  userId: string;
  screen: Screen;
  now?: () => number;
  tickMs?: number;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function toFailure(error: unknown): TranslationFailure {
  if (error instanceof TranslationError) {
    return { code: error.code, message: error.message, rawRationale: error.rawRationale };
  }
  return { code: "TRANSLATION_UNAVAILABLE", message: errorMessage(error) };
}

export class InteractionLoop {
  private state: SessionState;
  private readonly keys: KeyEvent[] = [];
  private readonly outcomes: SessionEvent[] = [];
  private readonly inFlight = new Map<number, AbortController>();
  private lastHistory: { filter: AuditQueryFilter; nextOffset: number } | null = null;
  private exitRequested = false;
  private lastFrame = "";
  private lastSize = "";
  private readonly now: () => number;
  private readonly tickMs: number;

  constructor(private readonly options: InteractionLoopOptions) {
    this.state = options.machine.initialState(options.context);
    this.now = options.now || Date.now;
    this.tickMs = options.tickMs || TICK_MS;
  }

  get snapshot(): SessionState {
    return this.state;
  }

  get finished(): boolean {
    return this.exitRequested;
  }

  enqueueKey(key: KeyEvent): void {
    this.keys.push(key);
  }

  /**
   * One frame: queued keys, then settled outcomes, then the spinner, then a
   * repaint. Returns false once the session asked to exit.
   */
  tick(): boolean {
    for (const key of this.keys.splice(0)) {
      this.dispatch({ type: "key", key });
    }
    for (const outcome of this.outcomes.splice(0)) {
      this.dispatch(outcome);
    }
    this.dispatch({ type: "tick" });
    this.paint();
    return !this.exitRequested;
  }

  run(): Promise<void> {
    this.paint();
    return new Promise((resolve) => {
      const timer = setInterval(() => {
        if (this.tick()) return;
        clearInterval(timer);
        this.shutdown();
        resolve();
      }, this.tickMs);
    });
  }

  shutdown(): void {
    for (const controller of this.inFlight.values()) {
      controller.abort();
    }
    this.inFlight.clear();
  }

  private dispatch(event: SessionEvent): void {
    const { state, effects } = this.options.machine.transition(this.state, event);
    this.state = state;
    for (const effect of effects) {
      this.perform(effect);
    }
  }

  private perform(effect: SessionEffect): void {
    switch (effect.type) {
      case "translate":
        this.startTranslation(effect.requestId, effect.text, effect.context);
        return;
      case "execute":
        this.startExecution(effect.requestId, effect.command, effect.context);
        return;
      case "cancel_translation":
      case "interrupt_execution":
        this.inFlight.get(effect.requestId)?.abort();
        return;
      case "audit": {
        const result = this.options.auditLog.record({
          ...effect.entry,
          userId: this.options.userId,
          timestamp: this.now(),
        });
        if (!result.ok) {
          this.dispatch({ type: "notice", text: `Audit log write failed: ${result.error.message}` });
        }
        return;
      }
      case "allowlist_add":
        try {
          this.options.allowlist.add(effect.command);
        } catch (error) {
          log.warn(`allowlist update failed: ${errorMessage(error)}`);
          this.dispatch({ type: "builtin_output", lines: [errorMessage(error)], isError: true });
        }
        return;
      case "builtin":
        this.runBuiltin(effect.command);
        return;
      case "exit":
        this.exitRequested = true;
        return;
    }
  }

  private startTranslation(requestId: number, text: string, context: EnvironmentContext): void {
    const controller = new AbortController();
    this.inFlight.set(requestId, controller);
    void this.options.translator
      .translate({ text, context }, { signal: controller.signal })
      .then(
        (result) => {
          this.outcomes.push({ type: "translation_succeeded", requestId, result });
        },
        (error: unknown) => {
          this.outcomes.push({ type: "translation_failed", requestId, failure: toFailure(error) });
        },
      )
      .finally(() => this.inFlight.delete(requestId));
  }

  private startExecution(requestId: number, command: string, context: EnvironmentContext): void {
    const controller = new AbortController();
    this.inFlight.set(requestId, controller);
    void this.options.broker
      .execute(
        { command, clusterContext: context.name },
        {
          signal: controller.signal,
          onOutput: (stream, text) => {
            this.outcomes.push({ type: "execution_output", requestId, stream, text });
          },
        },
      )
      .then(
        (result) => {
          this.outcomes.push({ type: "execution_finished", requestId, result });
        },
        (error: unknown) => {
          this.outcomes.push({ type: "execution_failed", requestId, message: errorMessage(error) });
        },
      )
      .finally(() => this.inFlight.delete(requestId));
  }

  private output(lines: string[], isError = false): void {
    this.dispatch({ type: "builtin_output", lines, isError });
  }

  private showHistory(filter: AuditQueryFilter, offset = 0): void {
    try {
      const page = this.options.auditLog.query(filter, { limit: HISTORY_PAGE_SIZE, offset });
      this.lastHistory = { filter, nextOffset: offset + page.entries.length };
      const lines = formatAuditTable(page.entries).split("\n");
      if (page.hasMore) lines.push("More entries: type history more.");
      this.output(lines);
    } catch (error) {
      this.output([errorMessage(error)], true);
    }
  }

  private runBuiltin(command: BuiltinCommand): void {
    switch (command.kind) {
      case "history_today":
        this.showHistory(todayFilter(this.now()));
        return;
      case "history_days":
        this.showHistory(lastDaysFilter(command.days, this.now()));
        return;
      case "history_env":
        this.showHistory(environmentFilter(command.name));
        return;
      case "history_more":
        if (!this.lastHistory) {
          this.output(["No earlier history query. Try history today."]);
          return;
        }
        this.showHistory(this.lastHistory.filter, this.lastHistory.nextOffset);
        return;
      case "allowlist_list": {
        const entries = this.options.allowlist.entries();
        this.output(entries.length === 0 ? ["The allowlist is empty."] : entries.map((entry) => `  ${entry}`));
        return;
      }
      case "allowlist_remove":
        try {
          const removed = this.options.allowlist.remove(command.command);
          this.output([removed ? `Removed from the allowlist: ${command.command}` : `Not on the allowlist: ${command.command}`]);
        } catch (error) {
          this.output([errorMessage(error)], true);
        }
        return;
      case "contexts":
        try {
          const contexts = this.options.contexts.listContexts();
          this.output(
            contexts.length === 0
              ? ["No contexts in the kubeconfig."]
              : contexts.map(
                  (entry) =>
                    `${entry.name === this.state.context.name ? "*" : " "} ${entry.name}  (cluster ${entry.cluster}, ns ${entry.namespace || "default"})`,
                ),
          );
        } catch (error) {
          this.output([errorMessage(error)], true);
        }
        return;
      case "use_context":
        try {
          const context = this.options.contexts.resolve(command.name);
          log.info(`switched to ${context.name} (${context.environmentClass}, ns ${effectiveNamespace(context)})`);
          this.dispatch({ type: "context_switched", context });
        } catch (error) {
          const lines = [errorMessage(error)];
          if (error instanceof ConfigurationError) lines.push(error.remediation);
          this.output(lines, true);
        }
        return;
      case "help":
      case "exit":
      case "clear":
        return;
    }
  }

  private paint(): void {
    const columns = this.options.screen.columns || 80;
    const rows = this.options.screen.rows || 24;
    const size = `${columns}x${rows}`;
    let prefix = CURSOR_HOME;
    if (size !== this.lastSize) {
      this.lastSize = size;
      prefix = CLEAR_SCREEN;
    }

    const frame = renderScreen(this.state, { columns, rows })
      .map((line) => CLEAR_LINE + line)
      .join("\r\n");
    if (prefix === CURSOR_HOME && frame === this.lastFrame) return;
    this.lastFrame = frame;
    this.options.screen.write(prefix + frame);
  }
}
