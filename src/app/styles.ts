// ANSI escape sequences for the terminal view.

export const CLUES_STYLE = '\x1b[1m'; // bold
export const ERROR_COLOR = '\x1b[91m'; // light red
export const CORRECT_COLOR = '\x1b[92m'; // light green
export const RESET_STYLE = '\x1b[0m';

export const HIDE_CURSOR = '\x1b[?25l';
export const SHOW_CURSOR = '\x1b[?25h';
export const CLEAR_BELOW = '\x1b[J';

export function cursorUp(lines: number): string {
  return `\x1b[${lines}A`;
}
