/**
 * Normalizes a remote `riskScore` value to a number in [0, 1], or null when
 * the message carries no usable score. Older chatbot builds wrote the labels
 * "Risky" / "Not Risky" instead of a number.
 */
export function normalizeRiskScore(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? clamp(value) : null;
  }

  if (typeof value === "string") {
    const label = value.trim().toLowerCase();
    if (label === "risky") return 1;
    if (label === "not risky") return 0;
    if (label.length === 0) return null;
    const parsed = Number(label);
    return Number.isFinite(parsed) ? clamp(parsed) : null;
  }

  return null;
}

export function exceedsThreshold(score: number | null, threshold: number): boolean {
  return score !== null && score > threshold;
}

function clamp(score: number): number {
  return Math.min(1, Math.max(0, score));
}
