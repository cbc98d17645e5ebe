/**
 * Session state machine for the interactive terminal.
 *
 * `transition` is pure: it takes the current state and one event and returns
 * the next state plus the effects the interaction loop must perform
 * (translate, execute, audit, ...). Asynchronous results come back in as
 * events tagged with the request id that started them; results for any other
 * id are stale and ignored.
 */

import type { NewAuditEntry, UserAction } from "@shared/audit";
import type { EnvironmentContext } from "@shared/environment";
import type {
  ConfirmationSpec,
  ExecutionResult,
  OutputStream,
  RiskAssessment,
  TranslationResult,
} from "@shared/terminal";
import { evaluateCommandPolicy } from "../core/commands/policy";
import type { ConfirmationEngine } from "../core/services/confirmation";
import { explainFailure } from "../core/services/errorExplainer";
import type { TranslationError } from "../core/services/translator";
import { sanitizeForDisplay } from "./ansi";
import { HELP_LINES, parseBuiltin, type BuiltinCommand } from "./builtins";
import type { KeyEvent } from "./keys";
import { handleModalKey, openModal, type ModalState } from "./modal";

const MAX_LINES = 2000;
const MAX_INPUT_LENGTH = 1000;
const MAX_INPUT_HISTORY = 100;
const MAX_RATIONALE_DISPLAY = 300;

export type LineType = "input" | "command" | "output" | "error" | "info" | "warning";

export interface TerminalLine {
  id: number;
  type: LineType;
  content: string;
  // Output line still waiting for its newline
  partial?: boolean;
}

export interface PendingCommand {
  // Natural-language request, or the command itself when typed directly
  input: string;
  command: string;
  // Command as first proposed, kept once the operator edits it
  originalCommand: string | null;
  confidence: number | null;
  lowConfidence: boolean;
  rationale: string | null;
  risk: RiskAssessment;
  spec: ConfirmationSpec;
}

export type SessionPhase =
  | { kind: "normal" }
  | { kind: "translating"; requestId: number; text: string }
  | { kind: "modal_active"; modal: ModalState }
  | { kind: "editing" }
  | { kind: "executing"; requestId: number; interrupting: boolean; sawOutput: boolean };

export interface SessionState {
  phase: SessionPhase;
  context: EnvironmentContext;
  input: string;
  pending: PendingCommand | null;
  lines: TerminalLine[];
  notice: string | null;
  nextRequestId: number;
  nextLineId: number;
  spinnerFrame: number;
  inputHistory: string[];
  historyCursor: number | null;
}

export interface TranslationFailure {
  code: TranslationError["code"];
  message: string;
  rawRationale?: string;
}

export type SessionEvent =
  | { type: "key"; key: KeyEvent }
  | { type: "tick" }
  | { type: "translation_succeeded"; requestId: number; result: TranslationResult }
  | { type: "translation_failed"; requestId: number; failure: TranslationFailure }
  | { type: "execution_output"; requestId: number; stream: OutputStream; text: string }
  | { type: "execution_finished"; requestId: number; result: ExecutionResult }
  | { type: "execution_failed"; requestId: number; message: string }
  | { type: "builtin_output"; lines: string[]; isError?: boolean }
  | { type: "context_switched"; context: EnvironmentContext }
  | { type: "notice"; text: string };

// Audit entry minus what the loop adds when it writes (user and time)
export type AuditDraft = Omit<NewAuditEntry, "userId" | "timestamp">;

export type SessionEffect =
  | { type: "translate"; requestId: number; text: string; context: EnvironmentContext }
  | { type: "cancel_translation"; requestId: number }
  | { type: "execute"; requestId: number; command: string; context: EnvironmentContext }
  | { type: "interrupt_execution"; requestId: number }
  | { type: "audit"; entry: AuditDraft }
  | { type: "allowlist_add"; command: string }
  | { type: "builtin"; command: BuiltinCommand }
  | { type: "exit" };

export interface Transition {
  state: SessionState;
  effects: SessionEffect[];
}

export interface SessionMachineOptions {
  assessRisk: (command: string) => RiskAssessment;
  gate: Pick<ConfirmationEngine, "decide">;
  confidenceThreshold: number;
}

export function isDirectCommand(input: string): boolean {
  return input === "kubectl" || input.startsWith("kubectl ");
}

export function lowConfidenceBanner(confidence: number): string {
  return `Low confidence (${confidence}%). Review the command before running it.`;
}

function appendLines(state: SessionState, type: LineType, contents: readonly string[]): SessionState {
  let nextLineId = state.nextLineId;
  const added = contents.map((content) => ({ id: nextLineId++, type, content: sanitizeForDisplay(content) }));
  return { ...state, lines: capLines([...state.lines, ...added]), nextLineId };
}

function capLines(lines: TerminalLine[]): TerminalLine[] {
  return lines.length > MAX_LINES ? lines.slice(lines.length - MAX_LINES) : lines;
}

function appendOutput(state: SessionState, stream: OutputStream, text: string): SessionState {
  const type: LineType = stream === "stdout" ? "output" : "error";
  const pieces = sanitizeForDisplay(text.replace(/\r\n/g, "\n")).split("\n");
  const lines = [...state.lines];
  let nextLineId = state.nextLineId;

  pieces.forEach((piece, index) => {
    const isLast = index === pieces.length - 1;
    if (isLast && piece === "") return;
    const previous = lines[lines.length - 1];
    if (index === 0 && previous?.partial && previous.type === type) {
      lines[lines.length - 1] = { ...previous, content: previous.content + piece, partial: isLast };
    } else {
      lines.push({ id: nextLineId++, type, content: piece, partial: isLast });
    }
  });

  return { ...state, lines: capLines(lines), nextLineId };
}

function closeOutput(state: SessionState): SessionState {
  const last = state.lines[state.lines.length - 1];
  if (!last?.partial) return state;
  return { ...state, lines: [...state.lines.slice(0, -1), { ...last, partial: false }] };
}

function clip(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

function wasEdited(pending: PendingCommand): boolean {
  return pending.originalCommand !== null && pending.originalCommand !== pending.command;
}

export class SessionMachine {
  constructor(private readonly options: SessionMachineOptions) {}

  initialState(context: EnvironmentContext): SessionState {
    return {
      phase: { kind: "normal" },
      context,
      input: "",
      pending: null,
      lines: [],
      notice: null,
      nextRequestId: 1,
      nextLineId: 1,
      spinnerFrame: 0,
      inputHistory: [],
      historyCursor: null,
    };
  }

  transition(state: SessionState, event: SessionEvent): Transition {
    switch (event.type) {
      case "key":
        return this.onKey({ ...state, notice: null }, event.key);
      case "tick":
        if (state.phase.kind === "translating" || state.phase.kind === "executing") {
          return { state: { ...state, spinnerFrame: state.spinnerFrame + 1 }, effects: [] };
        }
        return { state, effects: [] };
      case "translation_succeeded":
        if (state.phase.kind !== "translating" || state.phase.requestId !== event.requestId) {
          return { state, effects: [] };
        }
        return this.onTranslated(state, state.phase.text, event.result);
      case "translation_failed":
        if (state.phase.kind !== "translating" || state.phase.requestId !== event.requestId) {
          return { state, effects: [] };
        }
        return this.onTranslationFailed(state, event.failure);
      case "execution_output":
        if (state.phase.kind !== "executing" || state.phase.requestId !== event.requestId) {
          return { state, effects: [] };
        }
        return {
          state: appendOutput({ ...state, phase: { ...state.phase, sawOutput: true } }, event.stream, event.text),
          effects: [],
        };
      case "execution_finished":
        if (state.phase.kind !== "executing" || state.phase.requestId !== event.requestId) {
          return { state, effects: [] };
        }
        return this.onExecuted(state, state.phase.sawOutput, event.result);
      case "execution_failed":
        if (state.phase.kind !== "executing" || state.phase.requestId !== event.requestId) {
          return { state, effects: [] };
        }
        return this.onExecutionFailed(state, event.message);
      case "builtin_output":
        return { state: appendLines(state, event.isError ? "error" : "info", event.lines), effects: [] };
      case "context_switched": {
        const next = appendLines({ ...state, context: event.context }, "info", [
          `Switched to ${event.context.name} (${event.context.environmentClass}).`,
        ]);
        return { state: next, effects: [] };
      }
      case "notice":
        return { state: { ...state, notice: event.text }, effects: [] };
    }
  }

  private onKey(state: SessionState, key: KeyEvent): Transition {
    switch (state.phase.kind) {
      case "normal":
        return this.onNormalKey(state, key);
      case "translating":
        return this.onTranslatingKey(state, state.phase.requestId, key);
      case "modal_active":
        return this.onModalKey(state, state.phase.modal, key);
      case "editing":
        return this.onEditingKey(state, key);
      case "executing":
        return this.onExecutingKey(state, state.phase, key);
    }
  }

  private editInput(state: SessionState, key: KeyEvent): SessionState | null {
    if (key.kind === "char") {
      if (state.input.length >= MAX_INPUT_LENGTH) return state;
      return { ...state, input: state.input + key.char, historyCursor: null };
    }
    if (key.kind === "backspace") {
      return { ...state, input: [...state.input].slice(0, -1).join(""), historyCursor: null };
    }
    return null;
  }

  private onNormalKey(state: SessionState, key: KeyEvent): Transition {
    const edited = this.editInput(state, key);
    if (edited) return { state: edited, effects: [] };

    switch (key.kind) {
      case "enter":
        return this.submit(state);
      case "escape":
        return { state: { ...state, input: "", historyCursor: null }, effects: [] };
      case "interrupt":
        if (state.input) return { state: { ...state, input: "", historyCursor: null }, effects: [] };
        return { state: { ...state, notice: "Press Ctrl+D or type exit to quit." }, effects: [] };
      case "ctrl":
        if (key.name === "d" && !state.input) return { state, effects: [{ type: "exit" }] };
        if (key.name === "l") return { state: { ...state, lines: [] }, effects: [] };
        return { state, effects: [] };
      case "up":
        return { state: this.recall(state, -1), effects: [] };
      case "down":
        return { state: this.recall(state, 1), effects: [] };
      default:
        return { state, effects: [] };
    }
  }

  private recall(state: SessionState, step: 1 | -1): SessionState {
    const history = state.inputHistory;
    if (history.length === 0) return state;
    if (step === -1) {
      const cursor = state.historyCursor === null ? history.length - 1 : Math.max(0, state.historyCursor - 1);
      return { ...state, historyCursor: cursor, input: history[cursor] };
    }
    if (state.historyCursor === null) return state;
    const cursor = state.historyCursor + 1;
    if (cursor >= history.length) return { ...state, historyCursor: null, input: "" };
    return { ...state, historyCursor: cursor, input: history[cursor] };
  }

  private submit(state: SessionState): Transition {
    const text = state.input.trim();
    if (!text) return { state, effects: [] };

    const history = [...state.inputHistory.filter((entry) => entry !== text), text].slice(-MAX_INPUT_HISTORY);
    let next = appendLines({ ...state, input: "", historyCursor: null, inputHistory: history }, "input", [
      `› ${text}`,
    ]);

    const builtin = parseBuiltin(text);
    if (builtin) {
      switch (builtin.kind) {
        case "exit":
          return { state: next, effects: [{ type: "exit" }] };
        case "clear":
          return { state: { ...next, lines: [] }, effects: [] };
        case "help":
          return { state: appendLines(next, "info", HELP_LINES), effects: [] };
        default:
          return { state: next, effects: [{ type: "builtin", command: builtin }] };
      }
    }

    if (isDirectCommand(text)) {
      const { decision } = evaluateCommandPolicy(text, { sessionContext: state.context.name });
      if (!decision.allowed) {
        return { state: appendLines(next, "error", [`Command rejected: ${decision.reason}`]), effects: [] };
      }
      return this.gate(next, {
        input: text,
        command: text,
        originalCommand: null,
        confidence: null,
        lowConfidence: false,
        rationale: null,
      });
    }

    const requestId = next.nextRequestId;
    next = {
      ...next,
      phase: { kind: "translating", requestId, text },
      nextRequestId: requestId + 1,
      spinnerFrame: 0,
    };
    return { state: next, effects: [{ type: "translate", requestId, text, context: next.context }] };
  }

  private onTranslated(state: SessionState, text: string, result: TranslationResult): Transition {
    const lowConfidence = result.confidence < this.options.confidenceThreshold;
    let next = appendLines(state, "command", [`→ ${result.command}`]);
    next = appendLines(next, "info", [`confidence ${result.confidence}% via ${result.backendId}`]);
    if (result.rationale) {
      next = appendLines(next, result.needsClarification ? "warning" : "info", [
        clip(result.rationale, MAX_RATIONALE_DISPLAY),
      ]);
    }
    if (lowConfidence) {
      next = appendLines(next, "warning", [lowConfidenceBanner(result.confidence)]);
    }

    return this.gate(next, {
      input: text,
      command: result.command,
      originalCommand: null,
      confidence: result.confidence,
      lowConfidence,
      rationale: result.rationale || null,
    });
  }

  private onTranslationFailed(state: SessionState, failure: TranslationFailure): Transition {
    const next: SessionState = { ...state, phase: { kind: "normal" } };
    switch (failure.code) {
      case "TRANSLATION_UNAVAILABLE":
        return {
          state: appendLines(
            appendLines({ ...next, input: next.input || "kubectl " }, "error", [
              `Translation unavailable: ${failure.message}`,
            ]),
            "info",
            ["Type the kubectl command yourself to continue."],
          ),
          effects: [],
        };
      case "TRANSLATION_MALFORMED": {
        let malformed = appendLines(next, "error", [`Could not use the translation: ${failure.message}`]);
        if (failure.rawRationale) {
          malformed = appendLines(malformed, "info", [
            `Backend said: ${clip(failure.rawRationale, MAX_RATIONALE_DISPLAY)}`,
          ]);
        }
        return {
          state: appendLines(malformed, "info", ["Rephrase the request or type the kubectl command directly."]),
          effects: [],
        };
      }
      case "TRANSLATION_CANCELLED":
        return { state: next, effects: [] };
      case "TRANSLATION_INVALID":
        return { state: appendLines(next, "error", [failure.message]), effects: [] };
    }
  }

  /**
   * Classify, then either run straight away (LOW or allowlisted) or open the
   * confirmation dialog.
   */
  private gate(state: SessionState, base: Omit<PendingCommand, "risk" | "spec">): Transition {
    const risk = this.options.assessRisk(base.command);
    const decision = this.options.gate.decide(base.command, risk.level, state.context.environmentClass);
    const spec: ConfirmationSpec = decision.kind === "confirm" ? decision.spec : { modality: "none" };
    const pending: PendingCommand = { ...base, risk, spec };

    if (decision.kind === "execute") {
      const next =
        decision.reason === "allowlisted"
          ? appendLines(state, "info", ["Allowlisted, running without confirmation."])
          : state;
      return this.startExecution({ ...next, pending });
    }

    return {
      state: { ...state, pending, phase: { kind: "modal_active", modal: openModal(spec) } },
      effects: [],
    };
  }

  private startExecution(state: SessionState, effects: SessionEffect[] = []): Transition {
    const pending = state.pending;
    if (!pending) return { state: { ...state, phase: { kind: "normal" } }, effects };
    const requestId = state.nextRequestId;
    const next = appendLines(
      {
        ...state,
        phase: { kind: "executing", requestId, interrupting: false, sawOutput: false },
        nextRequestId: requestId + 1,
        spinnerFrame: 0,
      },
      "command",
      [`$ ${pending.command}`],
    );
    return {
      state: next,
      effects: [...effects, { type: "execute", requestId, command: pending.command, context: next.context }],
    };
  }

  private onTranslatingKey(state: SessionState, requestId: number, key: KeyEvent): Transition {
    const edited = this.editInput(state, key);
    if (edited) return { state: edited, effects: [] };

    switch (key.kind) {
      case "enter":
        return { state: { ...state, notice: "Still processing the previous request…" }, effects: [] };
      case "interrupt":
      case "escape":
        return {
          state: appendLines({ ...state, phase: { kind: "normal" } }, "info", ["Translation cancelled."]),
          effects: [{ type: "cancel_translation", requestId }],
        };
      default:
        return { state, effects: [] };
    }
  }

  private onModalKey(state: SessionState, modal: ModalState, key: KeyEvent): Transition {
    const outcome = handleModalKey(modal, key);
    if (outcome.kind === "pending") {
      return { state: { ...state, phase: { kind: "modal_active", modal: outcome.modal } }, effects: [] };
    }

    const pending = state.pending;
    if (!pending) return { state: { ...state, phase: { kind: "normal" } }, effects: [] };

    switch (outcome.decision) {
      case "allow_once":
        return this.startExecution(state);
      case "allow_always":
        return this.startExecution(
          appendLines(state, "info", ["Added to the allowlist."]),
          [{ type: "allowlist_add", command: pending.command }],
        );
      case "deny":
        return this.cancel(state, pending, "Cancelled.");
      case "mismatch":
        return this.cancel(
          state,
          pending,
          modal.kind === "typed_phrase"
            ? `Typed text did not match "${modal.expected}". Cancelled.`
            : "Cancelled.",
        );
      case "edit":
        return { state: { ...state, phase: { kind: "editing" }, input: pending.command }, effects: [] };
    }
  }

  private onEditingKey(state: SessionState, key: KeyEvent): Transition {
    const pending = state.pending;
    if (!pending) return { state: { ...state, phase: { kind: "normal" } }, effects: [] };

    const edited = this.editInput(state, key);
    if (edited) return { state: edited, effects: [] };

    switch (key.kind) {
      case "enter": {
        const command = state.input.trim();
        const { decision } = evaluateCommandPolicy(command, { sessionContext: state.context.name });
        if (!decision.allowed) {
          return { state: { ...state, notice: `Command rejected: ${decision.reason}` }, effects: [] };
        }
        const originalCommand =
          command === pending.command ? pending.originalCommand : (pending.originalCommand ?? pending.command);
        const next = appendLines({ ...state, input: "", phase: { kind: "normal" } }, "command", [
          `✎ ${command}`,
        ]);
        return this.gate(next, {
          input: pending.input,
          command,
          originalCommand,
          confidence: pending.confidence,
          lowConfidence: pending.lowConfidence,
          rationale: pending.rationale,
        });
      }
      case "escape":
      case "interrupt":
        return this.cancel({ ...state, input: "" }, pending, "Edit cancelled.");
      default:
        return { state, effects: [] };
    }
  }

  private onExecutingKey(
    state: SessionState,
    phase: Extract<SessionPhase, { kind: "executing" }>,
    key: KeyEvent,
  ): Transition {
    const edited = this.editInput(state, key);
    if (edited) return { state: edited, effects: [] };

    switch (key.kind) {
      case "interrupt":
        if (phase.interrupting) return { state, effects: [] };
        return {
          state: { ...state, phase: { ...phase, interrupting: true }, notice: "Interrupting…" },
          effects: [{ type: "interrupt_execution", requestId: phase.requestId }],
        };
      case "enter":
        return { state: { ...state, notice: "A command is still running. Ctrl+C interrupts it." }, effects: [] };
      default:
        return { state, effects: [] };
    }
  }

  private cancel(state: SessionState, pending: PendingCommand, message: string): Transition {
    const next = appendLines({ ...state, phase: { kind: "normal" }, pending: null }, "info", [message]);
    return {
      state: next,
      effects: [
        {
          type: "audit",
          entry: this.draft(state, pending, "CANCELLED", {
            exitCode: null,
            stdout: null,
            stderr: null,
            durationMs: null,
          }),
        },
      ],
    };
  }

  private onExecuted(state: SessionState, sawOutput: boolean, result: ExecutionResult): Transition {
    const pending = state.pending;
    let next = closeOutput({ ...state, phase: { kind: "normal" }, pending: null });

    if (!sawOutput) {
      if (result.stdout) next = closeOutput(appendOutput(next, "stdout", result.stdout));
      if (result.stderr) next = closeOutput(appendOutput(next, "stderr", result.stderr));
    }

    const suffix = result.timedOut ? " (timed out)" : result.interrupted ? " (interrupted)" : "";
    next = appendLines(next, result.exitCode === 0 ? "info" : "warning", [
      `exit ${result.exitCode} in ${result.durationMs}ms${suffix}`,
    ]);
    if (result.exitCode !== 0 && !result.interrupted && !result.timedOut) {
      const { explanation, nextAction } = explainFailure(result.stderr);
      next = appendLines(next, "warning", [explanation]);
      next = appendLines(next, "info", [`Next: ${nextAction}`]);
    }
    if (result.truncated) {
      next = appendLines(next, "warning", ["Output passed the capture limit; the audit log keeps the first part."]);
    }

    if (!pending) return { state: next, effects: [] };
    return {
      state: next,
      effects: [
        {
          type: "audit",
          entry: this.draft(state, pending, wasEdited(pending) ? "EDITED" : "EXECUTED", {
            exitCode: result.exitCode,
            stdout: result.stdout,
            stderr: result.stderr,
            durationMs: result.durationMs,
          }),
        },
      ],
    };
  }

  private onExecutionFailed(state: SessionState, message: string): Transition {
    const pending = state.pending;
    const next = appendLines(closeOutput({ ...state, phase: { kind: "normal" }, pending: null }), "error", [
      message,
    ]);
    if (!pending) return { state: next, effects: [] };
    return {
      state: next,
      effects: [
        {
          type: "audit",
          entry: this.draft(state, pending, wasEdited(pending) ? "EDITED" : "EXECUTED", {
            exitCode: null,
            stdout: null,
            stderr: message,
            durationMs: null,
          }),
        },
      ],
    };
  }

  private draft(
    state: SessionState,
    pending: PendingCommand,
    userAction: UserAction,
    outcome: Pick<AuditDraft, "exitCode" | "stdout" | "stderr" | "durationMs">,
  ): AuditDraft {
    return {
      naturalLanguageInput: pending.input,
      finalCommand: pending.command,
      originalCommand: wasEdited(pending) ? pending.originalCommand : null,
      confidence: pending.confidence,
      riskLevel: pending.risk.level,
      environmentName: state.context.name,
      cluster: state.context.cluster,
      namespace: state.context.namespace ?? null,
      ...outcome,
      userAction,
    };
  }
}
