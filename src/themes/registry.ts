/**
 * Theme Registry
 *
 * A fixed catalog of style profiles. Threshold colors are stored as plain
 * `percent → color` functions next to the static colors, so a Theme stays
 * an immutable value and is evaluated only when widgets are built.
 */

import { BG, FG, RESET, trueColor, trueColorBg } from '../hud/colors.js';
import type { Color, ColorRule, RuleStyle, Theme, ThemeName } from '../shared/types.js';

/** Color for values below `low`, below `high`, and everything else. */
function bands(low: number, high: number, under: Color, mid: Color, over: Color): ColorRule {
  return (percent) => {
    if (percent < low) return under;
    if (percent < high) return mid;
    return over;
  };
}

const constant = (color: Color): ColorRule => () => color;

// ---------------------------------------------------------------------------
// Powerline: every segment on a background, arrow separators
// ---------------------------------------------------------------------------

const powerline: Theme = {
  name: 'Powerline',
  styles: {
    identity: { fg: FG.brightWhite, bg: BG.blue },
    path: { fg: FG.black, bg: BG.brightCyan },
    git: { fg: FG.brightWhite, bg: BG.brightGreen },
    model: { fg: FG.brightWhite, bg: BG.magenta },
    tokens: { fg: FG.brightWhite, bg: BG.brightBlack },
    time: { fg: FG.brightWhite, bg: BG.brightBlue },
    cost: { fg: FG.brightWhite, bg: BG.red },
    messages: { fg: FG.brightWhite, bg: BG.magenta },
    efficiency: { fg: FG.brightWhite, bg: BG.brightBlue },
    latency: { fg: FG.brightWhite, bg: BG.brightGreen },
  },
  rules: {
    // Remaining percentage: low is bad
    usage: {
      fg: bands(10, 30, FG.brightWhite, FG.black, FG.black),
      bg: bands(10, 30, BG.red, BG.yellow, BG.green),
    },
    compaction: {
      fg: bands(50, 80, FG.brightWhite, FG.black, FG.brightWhite),
      bg: bands(50, 80, BG.green, BG.yellow, BG.red),
    },
    weekly: {
      fg: bands(60, 85, FG.brightWhite, FG.black, FG.brightWhite),
      bg: bands(60, 85, BG.brightBlue, BG.yellow, BG.red),
    },
  },
  separator: RESET,
  powerline: true,
};

// ---------------------------------------------------------------------------
// Minimal: foreground colors only, pipe divider
// ---------------------------------------------------------------------------

const noBackground: ColorRule = constant('');

const minimal: Theme = {
  name: 'Minimal',
  styles: {
    identity: { fg: FG.brightGreen, bg: '' },
    path: { fg: FG.brightBlue, bg: '' },
    git: { fg: FG.brightYellow, bg: '' },
    model: { fg: FG.brightMagenta, bg: '' },
    tokens: { fg: FG.brightBlack, bg: '' },
    time: { fg: FG.brightCyan, bg: '' },
    cost: { fg: FG.brightRed, bg: '' },
    messages: { fg: FG.brightMagenta, bg: '' },
    efficiency: { fg: FG.brightBlue, bg: '' },
    latency: { fg: FG.brightGreen, bg: '' },
  },
  rules: {
    usage: {
      fg: bands(10, 30, FG.brightRed, FG.brightYellow, FG.brightGreen),
      bg: noBackground,
    },
    compaction: {
      fg: bands(50, 80, FG.brightGreen, FG.brightYellow, FG.brightRed),
      bg: noBackground,
    },
    weekly: {
      fg: bands(60, 85, FG.brightBlue, FG.brightYellow, FG.brightRed),
      bg: noBackground,
    },
  },
  separator: FG.brightBlack,
  powerline: false,
};

// ---------------------------------------------------------------------------
// Gruvbox: warm true-color palette on dark grays
// ---------------------------------------------------------------------------

const gruv = {
  orange: trueColor(254, 128, 25),
  yellowGreen: trueColor(184, 187, 38),
  aqua: trueColor(131, 165, 152),
  purple: trueColor(211, 134, 155),
  light: trueColor(235, 219, 178),
  brightGreen: trueColor(142, 192, 124),
  yellow: trueColor(250, 189, 47),
  red: trueColor(251, 73, 52),
  bgDark: trueColorBg(40, 40, 40),
  bgGray: trueColorBg(60, 56, 54),
  bgDarker: trueColorBg(80, 73, 69),
  bgBrown: trueColorBg(102, 92, 84),
  bgDarkest: trueColorBg(50, 48, 47),
};

const gruvRule = (fg: ColorRule): RuleStyle => ({ fg, bg: constant(gruv.bgGray) });

const gruvbox: Theme = {
  name: 'Gruvbox',
  styles: {
    identity: { fg: gruv.orange, bg: gruv.bgDark },
    path: { fg: gruv.aqua, bg: gruv.bgDarker },
    git: { fg: gruv.orange, bg: gruv.bgGray },
    model: { fg: gruv.purple, bg: gruv.bgBrown },
    tokens: { fg: gruv.light, bg: gruv.bgDarkest },
    time: { fg: gruv.brightGreen, bg: gruv.bgDark },
    cost: { fg: gruv.red, bg: gruv.bgDark },
    messages: { fg: gruv.purple, bg: gruv.bgGray },
    efficiency: { fg: gruv.aqua, bg: gruv.bgDarker },
    latency: { fg: gruv.brightGreen, bg: gruv.bgDarkest },
  },
  rules: {
    usage: gruvRule(bands(10, 30, gruv.red, gruv.yellow, gruv.yellowGreen)),
    compaction: gruvRule(bands(50, 80, gruv.brightGreen, gruv.yellow, gruv.red)),
    weekly: gruvRule(bands(60, 85, gruv.aqua, gruv.yellow, gruv.red)),
  },
  separator: trueColor(80, 73, 69),
  powerline: true,
};

// ---------------------------------------------------------------------------
// Lookup
// ---------------------------------------------------------------------------

function freezeTheme(theme: Theme): Theme {
  Object.values(theme.styles).forEach((style) => Object.freeze(style));
  Object.values(theme.rules).forEach((rule) => Object.freeze(rule));
  Object.freeze(theme.styles);
  Object.freeze(theme.rules);
  return Object.freeze(theme);
}

export const THEMES: Readonly<Record<ThemeName, Theme>> = Object.freeze({
  powerline: freezeTheme(powerline),
  minimal: freezeTheme(minimal),
  gruvbox: freezeTheme(gruvbox),
});

export const DEFAULT_THEME: ThemeName = 'powerline';

const THEME_NAMES: readonly ThemeName[] = ['powerline', 'minimal', 'gruvbox'];

export function isThemeName(name: string): name is ThemeName {
  return THEME_NAMES.some((known) => known === name);
}

/**
 * Resolve a theme by name. Unknown or missing names fall back to the
 * powerline theme; selection never fails.
 */
export function getTheme(name?: string): Theme {
  const key = name?.trim().toLowerCase() ?? '';
  return isThemeName(key) ? THEMES[key] : THEMES[DEFAULT_THEME];
}

export function listThemes(): ThemeName[] {
  return [...THEME_NAMES];
}
