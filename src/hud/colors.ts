/**
 * ANSI color codes for statusline output.
 *
 * Colors are plain escape strings: a fixed 16-color palette for foregrounds
 * and backgrounds, plus 24-bit sequences built from RGB channels. Renderers
 * compare them by string equality only.
 */

import type { Color } from '../shared/types.js';

export const RESET = '\x1b[0m';

// Foregrounds
export const FG = {
  black: '\x1b[30m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  brightBlack: '\x1b[90m',
  brightRed: '\x1b[91m',
  brightGreen: '\x1b[92m',
  brightYellow: '\x1b[93m',
  brightBlue: '\x1b[94m',
  brightMagenta: '\x1b[95m',
  brightCyan: '\x1b[96m',
  brightWhite: '\x1b[97m',
} as const;

// Backgrounds
export const BG = {
  black: '\x1b[40m',
  red: '\x1b[41m',
  green: '\x1b[42m',
  yellow: '\x1b[43m',
  blue: '\x1b[44m',
  magenta: '\x1b[45m',
  cyan: '\x1b[46m',
  white: '\x1b[47m',
  brightBlack: '\x1b[100m',
  brightRed: '\x1b[101m',
  brightGreen: '\x1b[102m',
  brightYellow: '\x1b[103m',
  brightBlue: '\x1b[104m',
  brightMagenta: '\x1b[105m',
  brightCyan: '\x1b[106m',
  brightWhite: '\x1b[107m',
} as const;

export type PaletteName = keyof typeof FG;

export const trueColor = (r: number, g: number, b: number): Color =>
  `\x1b[38;2;${r};${g};${b}m`;

export const trueColorBg = (r: number, g: number, b: number): Color =>
  `\x1b[48;2;${r};${g};${b}m`;

/** Separator foreground when a background has no palette counterpart. */
export const NEUTRAL_FG: Color = FG.white;

export const PALETTE_NAMES: readonly PaletteName[] = [
  'black',
  'red',
  'green',
  'yellow',
  'blue',
  'magenta',
  'cyan',
  'white',
  'brightBlack',
  'brightRed',
  'brightGreen',
  'brightYellow',
  'brightBlue',
  'brightMagenta',
  'brightCyan',
  'brightWhite',
];

const BG_TO_FG: ReadonlyMap<Color, Color> = new Map(
  PALETTE_NAMES.map((name): [Color, Color] => [BG[name], FG[name]])
);

/**
 * Foreground that matches a background, for drawing the arrow that leads
 * out of a segment. Only the fixed palette is mapped; true-color
 * backgrounds get the neutral foreground.
 */
export function bgToFg(bg: Color): Color {
  return BG_TO_FG.get(bg) ?? NEUTRAL_FG;
}
