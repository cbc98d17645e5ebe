const ESC = "\u001b[";

export const ENTER_ALT_SCREEN = `${ESC}?1049h`;
export const EXIT_ALT_SCREEN = `${ESC}?1049l`;
export const HIDE_CURSOR = `${ESC}?25l`;
export const SHOW_CURSOR = `${ESC}?25h`;
export const CLEAR_SCREEN = `${ESC}2J${ESC}H`;
export const CURSOR_HOME = `${ESC}H`;
export const CLEAR_LINE = `${ESC}2K`;

const ANSI_PATTERN = /\u001b\[[0-9;?]*[A-Za-z]/g;
// CSI, OSC (BEL or ST terminated) and two-byte escapes
const CONTROL_SEQUENCE_PATTERN = /\u001b\[[0-?]*[ -\/]*[@-~]|\u001b\][^\u0007\u001b]*(?:\u0007|\u001b\\)?|\u001b[@-Z\\-_]?/g;
// C0 controls and DEL, keeping tab and newline
const CONTROL_CHAR_PATTERN = /[\u0000-\u0008\u000b-\u001f\u007f]/g;

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, "");
}

/** Remove escape sequences and control characters from text shown on screen. */
export function sanitizeForDisplay(text: string): string {
  return text.replace(CONTROL_SEQUENCE_PATTERN, "").replace(CONTROL_CHAR_PATTERN, "");
}

function sgr(code: string) {
  return (text: string) => `${ESC}${code}m${text}${ESC}0m`;
}

export const style = {
  bold: sgr("1"),
  dim: sgr("2"),
  inverse: sgr("7"),
  red: sgr("31"),
  yellow: sgr("33"),
  magenta: sgr("35"),
  cyan: sgr("36"),
  whiteOnRed: sgr("97;41"),
  blackOnYellow: sgr("30;43"),
  blackOnGreen: sgr("30;42"),
} as const;

/** Visible width after stripping escape sequences. */
export function visibleLength(text: string): number {
  return [...stripAnsi(text)].length;
}

/**
 * Cut plain text to `width` columns. Escape sequences are not counted, so
 * callers clip before styling.
 */
export function truncate(text: string, width: number): string {
  const chars = [...text];
  if (chars.length <= width) return text;
  if (width <= 1) return chars.slice(0, width).join("");
  return `${chars.slice(0, width - 1).join("")}…`;
}
