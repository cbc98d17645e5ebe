/**
 * Pure screen renderer: session state in, one string per terminal row out.
 */

import type { EnvironmentClass } from "@shared/environment";
import { effectiveNamespace } from "../core/services/environment";
import { style, truncate } from "./ansi";
import { YES_NO_CHOICES, type ModalState, type YesNoChoice } from "./modal";
import {
  lowConfidenceBanner,
  type LineType,
  type PendingCommand,
  type SessionState,
} from "./sessionMachine";

export const SPINNER_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"] as const;

export interface ScreenSize {
  columns: number;
  rows: number;
}

const MIN_COLUMNS = 20;
const MIN_ROWS = 6;

const CHOICE_LABELS: Record<YesNoChoice, string> = {
  deny: "Deny",
  allow_once: "Allow once",
  allow_always: "Allow always",
};

function environmentBadge(environmentClass: EnvironmentClass): string {
  const label = ` ${environmentClass.toUpperCase()} `;
  switch (environmentClass) {
    case "production":
      return style.whiteOnRed(label);
    case "staging":
      return style.blackOnYellow(label);
    case "development":
      return style.blackOnGreen(label);
    case "unknown":
      return style.inverse(label);
  }
}

function styleLine(type: LineType, text: string): string {
  switch (type) {
    case "input":
      return style.bold(text);
    case "command":
      return style.cyan(text);
    case "error":
      return style.red(text);
    case "warning":
      return style.yellow(text);
    case "info":
      return style.dim(text);
    case "output":
      return text;
  }
}

/** Break plain text into rows of at most `width` characters. */
export function wrap(text: string, width: number): string[] {
  const chars = [...text.replace(/\t/g, "  ")];
  if (chars.length === 0) return [""];
  const rows: string[] = [];
  for (let start = 0; start < chars.length; start += width) {
    rows.push(chars.slice(start, start + width).join(""));
  }
  return rows;
}

function renderHeader(state: SessionState, columns: number): string {
  const { context } = state;
  const details = truncate(
    ` ${context.name}  cluster ${context.cluster}  ns ${effectiveNamespace(context)} `,
    Math.max(columns - context.environmentClass.length - 12, 0),
  );
  return `${style.bold(" kubeward ")}${details}${environmentBadge(context.environmentClass)}`;
}

function renderChoices(selected: YesNoChoice): string {
  return YES_NO_CHOICES.map((choice) =>
    choice === selected ? style.inverse(` ${CHOICE_LABELS[choice]} `) : ` ${CHOICE_LABELS[choice]} `,
  ).join(" ");
}

function renderModal(state: SessionState, pending: PendingCommand, modal: ModalState, columns: number): string[] {
  const inner = Math.max(columns - 2, 1);
  const body: string[] = [];
  const { context } = state;
  const rule = pending.risk.matchedRule ? ` (${pending.risk.matchedRule})` : "";

  body.push(...wrap(`$ ${pending.command}`, inner).map((row) => style.cyan(row)));
  body.push(
    truncate(`Risk: ${pending.risk.level}${rule}  Environment: ${context.name} (${context.environmentClass})`, inner),
  );
  if (pending.lowConfidence && pending.confidence !== null) {
    body.push(...wrap(lowConfidenceBanner(pending.confidence), inner).map((row) => style.yellow(row)));
  }

  if (modal.kind === "yes_no") {
    body.push("");
    body.push(renderChoices(modal.selected));
    body.push(style.dim(truncate("y once  a always  n deny  Tab/←/→ move  Enter confirm  e edit  Esc cancel", inner)));
  } else {
    body.push("");
    body.push(truncate(`Type "${modal.expected}" to run this in ${context.environmentClass}.`, inner));
    body.push(`> ${truncate(modal.typed, Math.max(inner - 3, 1))}_`);
    body.push(`[${modal.remember ? "x" : " "}] Remember (allow always), Tab toggles`);
    body.push(style.dim(truncate("Enter confirm  Ctrl+E edit  Esc cancel", inner)));
  }

  const title = truncate(` Confirm ${pending.risk.level} risk command `, inner);
  const top = `┌${title}${"─".repeat(Math.max(inner - [...title].length, 0))}`;
  const bottom = `└${"─".repeat(inner)}`;
  const frame = pending.risk.level === "HIGH" ? style.red : style.yellow;
  return [frame(top), ...body.map((row) => `${frame("│")} ${row}`), frame(bottom)];
}

function renderStatus(state: SessionState, columns: number): string {
  if (state.notice) return style.yellow(truncate(state.notice, columns));
  const spinner = SPINNER_FRAMES[state.spinnerFrame % SPINNER_FRAMES.length];

  switch (state.phase.kind) {
    case "translating":
      return style.magenta(truncate(`${spinner} Translating… Ctrl+C cancels`, columns));
    case "executing":
      return style.magenta(
        truncate(
          state.phase.interrupting ? `${spinner} Interrupting…` : `${spinner} Running… Ctrl+C interrupts`,
          columns,
        ),
      );
    case "editing":
      return style.dim(truncate("Editing: Enter runs the edited command, Esc cancels", columns));
    case "modal_active":
      return style.dim(truncate("Waiting for confirmation", columns));
    case "normal":
      return style.dim(truncate("Enter submits, help lists built-in commands", columns));
  }
}

function renderPrompt(state: SessionState, columns: number): string {
  const prefix = state.phase.kind === "editing" ? "edit› " : "› ";
  const room = Math.max(columns - prefix.length - 1, 1);
  const chars = [...state.input];
  const visible = chars.length > room ? chars.slice(chars.length - room).join("") : state.input;
  return `${style.bold(prefix)}${visible}${style.inverse(" ")}`;
}

/**
 * Lay out the whole screen. Always returns exactly `rows` entries.
 */
export function renderScreen(state: SessionState, size: ScreenSize): string[] {
  const columns = Math.max(size.columns, MIN_COLUMNS);
  const rows = Math.max(size.rows, MIN_ROWS);

  const header = renderHeader(state, columns);
  const modal =
    state.phase.kind === "modal_active" && state.pending
      ? renderModal(state, state.pending, state.phase.modal, columns)
      : [];
  const footer = [renderStatus(state, columns), renderPrompt(state, columns)];

  const bodyHeight = Math.max(rows - 1 - modal.length - footer.length, 0);
  const body: string[] = [];
  for (let index = state.lines.length - 1; index >= 0 && body.length < bodyHeight; index -= 1) {
    const line = state.lines[index];
    const wrapped = wrap(line.content, columns).map((row) => styleLine(line.type, row));
    body.unshift(...wrapped.slice(Math.max(wrapped.length - (bodyHeight - body.length), 0)));
  }
  while (body.length < bodyHeight) body.unshift("");

  return [header, ...body, ...modal, ...footer].slice(-rows);
}
