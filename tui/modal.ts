import type { ConfirmationSpec } from "@shared/terminal";
import type { KeyEvent } from "./keys";

export type YesNoChoice = "deny" | "allow_once" | "allow_always";

export const YES_NO_CHOICES: readonly YesNoChoice[] = ["deny", "allow_once", "allow_always"];

export type ModalState =
  | { kind: "yes_no"; selected: YesNoChoice }
  | { kind: "typed_phrase"; expected: string; typed: string; remember: boolean };

export type ModalDecision = "allow_once" | "allow_always" | "deny" | "mismatch" | "edit";

export type ModalOutcome =
  | { kind: "pending"; modal: ModalState }
  | { kind: "decided"; decision: ModalDecision };

const MAX_TYPED_LENGTH = 256;

export function openModal(spec: ConfirmationSpec): ModalState {
  if (spec.modality === "typed_phrase" && spec.expectedPhrase) {
    return { kind: "typed_phrase", expected: spec.expectedPhrase, typed: "", remember: false };
  }
  return { kind: "yes_no", selected: "deny" };
}

function cycle(selected: YesNoChoice, step: 1 | -1): YesNoChoice {
  const index = YES_NO_CHOICES.indexOf(selected);
  const next = (index + step + YES_NO_CHOICES.length) % YES_NO_CHOICES.length;
  return YES_NO_CHOICES[next];
}

function pending(modal: ModalState): ModalOutcome {
  return { kind: "pending", modal };
}

function decided(decision: ModalDecision): ModalOutcome {
  return { kind: "decided", decision };
}

function handleYesNo(modal: Extract<ModalState, { kind: "yes_no" }>, key: KeyEvent): ModalOutcome {
  switch (key.kind) {
    case "tab":
    case "right":
      return pending({ ...modal, selected: cycle(modal.selected, 1) });
    case "left":
      return pending({ ...modal, selected: cycle(modal.selected, -1) });
    case "enter":
      return decided(modal.selected);
    case "escape":
    case "interrupt":
      return decided("deny");
    case "ctrl":
      return key.name === "e" ? decided("edit") : pending(modal);
    case "char":
      switch (key.char.toLowerCase()) {
        case "y":
          return pending({ ...modal, selected: "allow_once" });
        case "a":
          return pending({ ...modal, selected: "allow_always" });
        case "n":
          return pending({ ...modal, selected: "deny" });
        case "e":
          return decided("edit");
        default:
          return pending(modal);
      }
    default:
      return pending(modal);
  }
}

function handleTypedPhrase(
  modal: Extract<ModalState, { kind: "typed_phrase" }>,
  key: KeyEvent,
): ModalOutcome {
  switch (key.kind) {
    case "char":
      if (modal.typed.length >= MAX_TYPED_LENGTH) return pending(modal);
      return pending({ ...modal, typed: modal.typed + key.char });
    case "backspace":
      return pending({ ...modal, typed: [...modal.typed].slice(0, -1).join("") });
    case "tab":
      return pending({ ...modal, remember: !modal.remember });
    case "enter":
      if (modal.typed !== modal.expected) return decided("mismatch");
      return decided(modal.remember ? "allow_always" : "allow_once");
    case "escape":
    case "interrupt":
      return decided("deny");
    case "ctrl":
      return key.name === "e" ? decided("edit") : pending(modal);
    default:
      return pending(modal);
  }
}

/**
 * Apply one key to the confirmation dialog. Keys the dialog does not bind
 * leave it unchanged.
 */
export function handleModalKey(modal: ModalState, key: KeyEvent): ModalOutcome {
  return modal.kind === "yes_no" ? handleYesNo(modal, key) : handleTypedPhrase(modal, key);
}
