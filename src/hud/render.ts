/**
 * Powerline Renderer
 *
 * Joins widgets into one line. Separators depend on the backgrounds on
 * either side of them:
 *
 *   bg → bg        arrow in the current background's color, on the next background
 *   bg → plain     arrow in the current background's color, no background
 *   plain → any    thin arrow in the theme's separator color
 *
 * Themes without Powerline styling always use a plain pipe divider.
 */

import { RESET, bgToFg } from './colors.js';
import type { Theme, Widget } from '../shared/types.js';

export const SYMBOLS = {
  rightArrow: '\uE0B0',
  rightThinArrow: '\uE0B1',
  divider: '|',
} as const;

export function renderSegment(widget: Widget, theme: Theme): string {
  if (theme.powerline && widget.bg !== '') {
    return `${widget.bg}${widget.fg} ${widget.text} ${RESET}`;
  }
  return `${widget.fg}${widget.text}${RESET}`;
}

export function renderSeparator(current: Widget, next: Widget, theme: Theme): string {
  if (!theme.powerline) {
    return ` ${theme.separator}${SYMBOLS.divider}${RESET} `;
  }

  if (current.bg !== '' && next.bg !== '') {
    return `${next.bg}${bgToFg(current.bg)}${SYMBOLS.rightArrow}${RESET}`;
  }
  if (current.bg !== '') {
    return `${bgToFg(current.bg)}${SYMBOLS.rightArrow}${RESET}`;
  }
  return ` ${theme.separator}${SYMBOLS.rightThinArrow}${RESET} `;
}

/**
 * Render the full line. An empty widget list renders to an empty string.
 */
export function renderWidgets(widgets: readonly Widget[], theme: Theme): string {
  const parts: string[] = [];

  widgets.forEach((widget, i) => {
    parts.push(renderSegment(widget, theme));
    const next = widgets[i + 1];
    if (next) {
      parts.push(renderSeparator(widget, next, theme));
    }
  });

  return parts.join('');
}
