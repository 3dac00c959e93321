import cronParser from 'cron-parser';

/** Named intervals and the cron expression each one stands for. */
export const INTERVAL_ALIASES = {
  '@once': null,
  '@hourly': '0 * * * *',
  '@daily': '0 0 * * *',
  '@weekly': '0 0 * * 0',
  '@monthly': '0 0 1 * *',
  '@yearly': '0 0 1 1 *',
} as const;

export type IntervalAlias = keyof typeof INTERVAL_ALIASES;

const CRON_FIELDS = 5;

export function isIntervalAlias(value: string): value is IntervalAlias {
  return Object.prototype.hasOwnProperty.call(INTERVAL_ALIASES, value);
}

/** Returns why `expr` is not a 5-field cron expression, or undefined. */
export function checkCronExpression(expr: string): string | undefined {
  const fields = expr.trim().split(/\s+/).filter(Boolean);
  if (fields.length !== CRON_FIELDS) {
    return `expected a cron expression with ${CRON_FIELDS} fields or one of ${Object.keys(INTERVAL_ALIASES).join(', ')}, got '${expr}'`;
  }
  try {
    cronParser.parseExpression(expr, { utc: true });
    return undefined;
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return `invalid cron expression '${expr}': ${reason}`;
  }
}

/** Aliases are accepted as-is; anything else must parse as cron. */
export function checkInterval(value: string): string | undefined {
  if (isIntervalAlias(value)) return undefined;
  return checkCronExpression(value);
}

/**
 * Next fire time after `from`, in UTC. `@once` has none.
 * Throws when the interval is not valid.
 */
export function nextRun(interval: string, from = new Date()): Date | null {
  const expr = isIntervalAlias(interval) ? INTERVAL_ALIASES[interval] : interval;
  if (expr === null) return null;
  const problem = checkCronExpression(expr);
  if (problem) throw new Error(problem);
  return cronParser.parseExpression(expr, { currentDate: from, utc: true }).next().toDate();
}
