import { describe, it, expect } from 'vitest';
import {
  BG,
  FG,
  NEUTRAL_FG,
  PALETTE_NAMES,
  RESET,
  bgToFg,
  trueColor,
  trueColorBg,
} from '../hud/colors.js';
import { SYMBOLS, renderSegment, renderSeparator, renderWidgets } from '../hud/render.js';
import { THEMES } from '../themes/registry.js';
import type { Widget } from '../shared/types.js';

const ARROW = '\uE0B0';
const THIN_ARROW = '\uE0B1';

function widget(text: string, fg: string, bg: string = ''): Widget {
  return { name: 'identity', text, fg, bg };
}

// ---------------------------------------------------------------------------
// Colors
// ---------------------------------------------------------------------------

describe('trueColor', () => {
  it('should build 24-bit foreground and background sequences', () => {
    expect(trueColor(1, 2, 3)).toBe('\x1b[38;2;1;2;3m');
    expect(trueColorBg(40, 40, 40)).toBe('\x1b[48;2;40;40;40m');
  });
});

describe('bgToFg', () => {
  it('should map every palette background to its foreground', () => {
    for (const name of PALETTE_NAMES) {
      expect(bgToFg(BG[name])).toBe(FG[name]);
    }
  });

  it('should map the blue background to the blue foreground', () => {
    expect(bgToFg('\x1b[44m')).toBe('\x1b[34m');
  });

  it('should use the neutral foreground for true-color backgrounds', () => {
    expect(bgToFg(trueColorBg(40, 40, 40))).toBe(NEUTRAL_FG);
    expect(NEUTRAL_FG).toBe(FG.white);
  });

  it('should use the neutral foreground for an empty background', () => {
    expect(bgToFg('')).toBe(FG.white);
  });
});

// ---------------------------------------------------------------------------
// Segments
// ---------------------------------------------------------------------------

describe('renderSegment', () => {
  it('should pad segments with a background in powerline themes', () => {
    const w = widget('main', FG.brightWhite, BG.blue);
    expect(renderSegment(w, THEMES.powerline)).toBe(`${BG.blue}${FG.brightWhite} main ${RESET}`);
  });

  it('should render foreground-only segments without padding', () => {
    const w = widget('main', FG.brightGreen);
    expect(renderSegment(w, THEMES.powerline)).toBe(`${FG.brightGreen}main${RESET}`);
  });

  it('should drop the background in non-powerline themes', () => {
    const w = widget('main', FG.brightGreen, BG.red);
    expect(renderSegment(w, THEMES.minimal)).toBe(`${FG.brightGreen}main${RESET}`);
  });
});

// ---------------------------------------------------------------------------
// Separators
// ---------------------------------------------------------------------------

describe('renderSeparator', () => {
  const blue = widget('a', FG.brightWhite, BG.blue);
  const magenta = widget('b', FG.brightWhite, BG.magenta);
  const plain = widget('c', FG.brightGreen);

  it('should draw an arrow on the next background between two backgrounds', () => {
    expect(renderSeparator(blue, magenta, THEMES.powerline)).toBe(
      `${BG.magenta}${FG.blue}${ARROW}${RESET}`
    );
  });

  it('should take the arrow color from the current segment only', () => {
    expect(renderSeparator(magenta, blue, THEMES.powerline)).toBe(
      `${BG.blue}${FG.magenta}${ARROW}${RESET}`
    );
  });

  it('should draw a bare arrow from a background into plain text', () => {
    expect(renderSeparator(blue, plain, THEMES.powerline)).toBe(`${FG.blue}${ARROW}${RESET}`);
  });

  it('should draw a thin arrow after plain text', () => {
    expect(renderSeparator(plain, blue, THEMES.powerline)).toBe(
      ` ${RESET}${THIN_ARROW}${RESET} `
    );
    expect(renderSeparator(plain, plain, THEMES.powerline)).toBe(
      ` ${RESET}${THIN_ARROW}${RESET} `
    );
  });

  it('should use the neutral arrow color after a true-color background', () => {
    const dark = widget('a', FG.brightWhite, trueColorBg(40, 40, 40));
    const gray = widget('b', FG.brightWhite, trueColorBg(60, 56, 54));
    expect(renderSeparator(dark, gray, THEMES.gruvbox)).toBe(
      `${trueColorBg(60, 56, 54)}${FG.white}${ARROW}${RESET}`
    );
  });

  it('should always use a pipe divider in non-powerline themes', () => {
    expect(renderSeparator(blue, magenta, THEMES.minimal)).toBe(
      ` ${FG.brightBlack}${SYMBOLS.divider}${RESET} `
    );
  });
});

// ---------------------------------------------------------------------------
// Full line
// ---------------------------------------------------------------------------

describe('renderWidgets', () => {
  it('should render an empty list to an empty string', () => {
    expect(renderWidgets([], THEMES.powerline)).toBe('');
    expect(renderWidgets([], THEMES.minimal)).toBe('');
  });

  it('should render a single widget without separators', () => {
    const w = widget('solo', FG.brightGreen);
    expect(renderWidgets([w], THEMES.minimal)).toBe(`${FG.brightGreen}solo${RESET}`);
  });

  it('should join minimal widgets with pipe dividers', () => {
    const identity = widget('dev@box', FG.brightGreen);
    const path = widget('~/work', FG.brightBlue);
    expect(renderWidgets([identity, path], THEMES.minimal)).toBe(
      `${FG.brightGreen}dev@box${RESET}` +
        ` ${FG.brightBlack}|${RESET} ` +
        `${FG.brightBlue}~/work${RESET}`
    );
  });

  it('should chain powerline segments with arrows', () => {
    const a = widget('a', FG.brightWhite, BG.blue);
    const b = widget('b', FG.black, BG.brightCyan);
    expect(renderWidgets([a, b], THEMES.powerline)).toBe(
      `${BG.blue}${FG.brightWhite} a ${RESET}` +
        `${BG.brightCyan}${FG.blue}${ARROW}${RESET}` +
        `${BG.brightCyan}${FG.black} b ${RESET}`
    );
  });
});
