/**
 * Watermarks are ISO-8601 UTC strings as produced by Date#toISOString, which
 * sort lexicographically in time order.
 */
export function laterTimestamp(a: string | null | undefined, b: string | null | undefined): string | null {
  if (!a) return b ?? null;
  if (!b) return a;
  return a >= b ? a : b;
}

export function maxOccurredAt(records: Iterable<{ occurredAt: string }>): string | null {
  let latest: string | null = null;
  for (const record of records) {
    latest = laterTimestamp(latest, record.occurredAt);
  }
  return latest;
}
