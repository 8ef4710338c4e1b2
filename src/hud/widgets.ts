/**
 * Widget Assembly
 *
 * Turns a StatusSnapshot into the ordered list of widgets for one render.
 * Each element is built by a small function that returns a Widget or null
 * (nothing to show); the list keeps a fixed order, so a missing metric only
 * removes its own widget.
 */

import {
  MESSAGE_LIMIT,
  calculateCompactionPercentage,
  calculateContextEfficiency,
  calculateCost,
  calculateDailyUsagePercentage,
  calculateUsagePercentage,
  calculateWeeklyUsagePercentage,
  formatCost,
  formatEfficiency,
  formatLatency,
  formatTokensAdvanced,
  normalizeModelName,
  selectReset,
  truncatePath,
} from '../metrics/index.js';
import type {
  RuleCategory,
  StaticCategory,
  StatusSnapshot,
  Theme,
  Widget,
  WidgetName,
} from '../shared/types.js';

export const ICONS = {
  gitBranch: '\uE0A0',
  tokens: '🔤',
  cost: '$',
  messages: '💬',
  efficiency: '📊',
  compaction: '🗜️',
  weekly: '📅',
  daily: '📊',
  latency: '⚡',
  timer: '⏱',
} as const;

function styled(theme: Theme, name: WidgetName, category: StaticCategory, text: string): Widget {
  const { fg, bg } = theme.styles[category];
  return { name, text, fg, bg };
}

function ruled(
  theme: Theme,
  name: WidgetName,
  category: RuleCategory,
  percent: number,
  text: string
): Widget {
  const rule = theme.rules[category];
  return { name, text, fg: rule.fg(percent), bg: rule.bg(percent) };
}

// ---------------------------------------------------------------------------
// Elements
// ---------------------------------------------------------------------------

export function usageWidget(snapshot: StatusSnapshot, theme: Theme): Widget {
  const used = calculateUsagePercentage(
    snapshot.dailyTokens,
    snapshot.contextTokens,
    snapshot.contextCharacters
  );
  const remaining = Math.max(0, 100 - used);
  return ruled(theme, 'usage', 'usage', remaining, `${remaining}%`);
}

/**
 * Show whichever of the weekly and daily limits is more restrictive.
 * Weekly wins only when strictly larger; both use the weekly color rule.
 */
export function limitWidget(snapshot: StatusSnapshot, theme: Theme): Widget | null {
  if (snapshot.weeklyTokens <= 0 && snapshot.dailyTokens <= 0) return null;

  const daily = calculateDailyUsagePercentage(snapshot.dailyTokens);
  const weekly = calculateWeeklyUsagePercentage(snapshot.weeklyTokens);

  if (weekly > daily && weekly > 0) {
    return ruled(theme, 'weekly', 'weekly', weekly, `${ICONS.weekly} ${weekly}%`);
  }
  if (daily > 0) {
    return ruled(theme, 'daily', 'weekly', daily, `${ICONS.daily} ${daily}%`);
  }
  return null;
}

export function costWidget(snapshot: StatusSnapshot, theme: Theme): Widget | null {
  if (snapshot.sessionInputTokens <= 0 && snapshot.sessionOutputTokens <= 0) return null;

  const modelName = snapshot.model.display_name || snapshot.model.id || '';
  const { sessionCost } = calculateCost(
    modelName,
    snapshot.sessionInputTokens,
    snapshot.sessionOutputTokens
  );
  return styled(theme, 'cost', 'cost', `${ICONS.cost} ${formatCost(sessionCost)}`);
}

// ---------------------------------------------------------------------------
// Assembly
// ---------------------------------------------------------------------------

/**
 * Build the widget list in display order:
 * identity → path → git → model → usage → weekly/daily → tokens → cost →
 * messages → efficiency → compaction → latency → timer → reset
 *
 * Identity, path, usage and reset always render. The model widget is left
 * out when neither a display name nor an id is known; the rest drop out
 * when their metric is zero or absent.
 */
export function buildWidgets(snapshot: StatusSnapshot, theme: Theme): Widget[] {
  const widgets: (Widget | null)[] = [];

  widgets.push(styled(theme, 'identity', 'identity', snapshot.identity));
  widgets.push(
    styled(theme, 'path', 'path', truncatePath(snapshot.workspacePath, snapshot.pathMaxLength))
  );

  if (snapshot.git) {
    const { branch, changes } = snapshot.git;
    const label = changes > 0 ? `${branch}±${changes}` : branch;
    widgets.push(styled(theme, 'git', 'git', `${ICONS.gitBranch} ${label}`));
  }

  const model = normalizeModelName(snapshot.model);
  if (model) {
    widgets.push(styled(theme, 'model', 'model', model));
  }

  widgets.push(usageWidget(snapshot, theme));
  widgets.push(limitWidget(snapshot, theme));

  if (snapshot.dailyTokens > 0) {
    widgets.push(
      styled(theme, 'tokens', 'tokens', `${ICONS.tokens} ${formatTokensAdvanced(snapshot.dailyTokens)}`)
    );
  }

  widgets.push(costWidget(snapshot, theme));

  if (snapshot.messages > 0) {
    widgets.push(
      styled(theme, 'messages', 'messages', `${ICONS.messages} ${snapshot.messages}/${MESSAGE_LIMIT}`)
    );
  }

  if (snapshot.contextTokens > 0) {
    const efficiency = calculateContextEfficiency(snapshot.contextTokens);
    widgets.push(
      styled(theme, 'efficiency', 'efficiency', `${ICONS.efficiency} ${formatEfficiency(efficiency)}`)
    );

    const compaction = calculateCompactionPercentage(snapshot.contextTokens);
    widgets.push(
      ruled(theme, 'compaction', 'compaction', compaction, `${ICONS.compaction} ${compaction}%`)
    );
  }

  if (snapshot.latency && snapshot.latency.requestCount > 0) {
    widgets.push(
      styled(theme, 'latency', 'latency', `${ICONS.latency} ${formatLatency(snapshot.latency.averageMs)}`)
    );
  }

  if (snapshot.blockElapsed) {
    widgets.push(styled(theme, 'timer', 'time', `${ICONS.timer} ${snapshot.blockElapsed}`));
  }

  const reset = selectReset(snapshot.rollingReset, snapshot.weeklyReset);
  widgets.push(styled(theme, 'reset', 'time', `${reset.label} reset ${reset.text}`));

  return widgets.filter((widget): widget is Widget => widget !== null);
}
