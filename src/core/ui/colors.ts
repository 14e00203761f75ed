/**
 * ANSI color helpers for CLI output
 */

const ESC = '\x1b[';
const RESET = `${ESC}0m`;

export const colors = {
  violet: `${ESC}38;5;135m`,
  success: `${ESC}38;5;34m`,
  error: `${ESC}38;5;124m`,
  warning: `${ESC}38;5;214m`,
  muted: `${ESC}38;5;244m`,
  bold: `${ESC}1m`,
  reset: RESET,
};

export type Paint = (text: string) => string;

export interface Palette {
  violet: Paint;
  success: Paint;
  error: Paint;
  warning: Paint;
  muted: Paint;
  bold: Paint;
}

const plain: Paint = (text) => text;

/** Color helpers; every helper returns its input untouched when `enabled` is false. */
export function createPalette(enabled: boolean): Palette {
  const wrap = (code: string): Paint => (enabled ? (text) => `${code}${text}${RESET}` : plain);
  return {
    violet: wrap(colors.violet),
    success: wrap(colors.success),
    error: wrap(colors.error),
    warning: wrap(colors.warning),
    muted: wrap(colors.muted),
    bold: wrap(colors.bold),
  };
}

export function errorBlock(c: Palette, message: string): string {
  return `${c.bold(c.error('[ERROR]'))} ${c.error(message)}`;
}

export function successBlock(c: Palette, message: string): string {
  return `${c.bold(c.success('[OK]'))} ${c.success(message)}`;
}

/** Color output only on a terminal, and never when NO_COLOR is set. */
export function shouldUseColor(stream: { isTTY?: boolean } = process.stdout): boolean {
  return Boolean(stream.isTTY) && !process.env.NO_COLOR;
}
