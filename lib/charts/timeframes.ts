/**
 * Chart timeframes and their period length in minutes.
 */

export const TIMEFRAME_MINUTES: Record<string, number> = {
  M1: 1,
  M2: 2,
  M3: 3,
  M4: 4,
  M5: 5,
  M6: 6,
  M10: 10,
  M12: 12,
  M15: 15,
  M20: 20,
  M30: 30,
  H1: 60,
  H2: 120,
  H3: 180,
  H4: 240,
  H6: 360,
  H8: 480,
  H12: 720,
  D1: 1440,
  W1: 10080,
  MN1: 43200,
};

// Longest to shortest
export const DEFAULT_TIMEFRAMES = ["D1", "H4", "M15", "M5", "M1"] as const;

export function isTimeframe(name: string): boolean {
  return Object.prototype.hasOwnProperty.call(TIMEFRAME_MINUTES, name);
}

/**
 * Parse a comma-separated timeframe list.
 * Names are upper-cased and deduped (first occurrence wins); the given order is kept.
 */
export function parseTimeframes(value: string): { timeframes: string[]; unknown: string[] } {
  const timeframes: string[] = [];
  const unknown: string[] = [];

  for (const raw of value.split(",")) {
    const name = raw.trim().toUpperCase();
    if (!name) continue;
    if (!isTimeframe(name)) {
      unknown.push(name);
      continue;
    }
    if (!timeframes.includes(name)) timeframes.push(name);
  }

  return { timeframes, unknown };
}
