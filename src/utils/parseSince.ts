const UNIT_MS: Record<string, number> = {
  w: 7 * 24 * 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
  h: 60 * 60 * 1000,
  m: 60 * 1000,
  s: 1000,
};

const DURATION_PATTERN = /^(\d+)\s*(w|wk|weeks?|d|days?|h|hrs?|hours?|m|mins?|minutes?|s|secs?|seconds?)$/i;

/** "3d", "12h", "45 min", "2 weeks" to milliseconds; null when unparseable. */
export function parseDuration(input: string): number | null {
  const match = input.trim().match(DURATION_PATTERN);
  if (!match) return null;
  return parseInt(match[1], 10) * UNIT_MS[match[2].charAt(0).toLowerCase()];
}

/**
 * Resolves a `since` query value to an epoch-ms cutoff. Accepts a relative
 * duration counted back from `now`, or an ISO-8601 date-time.
 */
export function parseSince(sinceStr: string, now = Date.now()): number | null {
  const offset = parseDuration(sinceStr);
  if (offset !== null) return now - offset;

  const trimmed = sinceStr.trim();
  if (!/^\d{4}-\d{2}-\d{2}/.test(trimmed)) return null;
  const absolute = Date.parse(trimmed);
  return Number.isNaN(absolute) || absolute > now ? null : absolute;
}
