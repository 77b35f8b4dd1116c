/**
 * Minimal ANSI styling for log lines and CLI output.
 *
 * Honors NO_COLOR (https://no-color.org) and FORCE_COLOR; otherwise colors
 * only when the target stream is a TTY. Each style closes with its own reset
 * code so styles nest: bold(red("x")) → \x1b[1m\x1b[31mx\x1b[39m\x1b[22m
 */

export function colorEnabled(stream: NodeJS.WriteStream = process.stderr): boolean {
  if ("NO_COLOR" in process.env) {
    return false;
  }
  if ("FORCE_COLOR" in process.env) {
    return true;
  }
  return stream.isTTY ?? false;
}

export type StyleFn = (text: string) => string;

function make(open: number, close: number): StyleFn {
  const o = `\x1b[${open}m`;
  const c = `\x1b[${close}m`;
  return (t) => (colorEnabled() ? `${o}${t}${c}` : t);
}

export const bold = make(1, 22);
export const dim = make(2, 22);

export const red = make(31, 39);
export const green = make(32, 39);
export const yellow = make(33, 39);
export const cyan = make(36, 39);
