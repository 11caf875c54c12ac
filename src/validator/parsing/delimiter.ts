import { countDelimitersOutsideQuotes } from "./tokenizer";

/** Tried in this order; earlier candidates win ties. */
export const CANDIDATE_DELIMITERS = [",", "|", "\t", "*", ";", ":"] as const;

export const FALLBACK_DELIMITER = ",";
export const DETECTION_LINES = 20;

export interface DelimiterProfile {
  delimiter: string;
  counts: number[];
  /** null when the candidate was ruled out */
  score: number | null;
}

function scoreCounts(counts: number[]): number | null {
  if (counts.length === 0 || counts.every((c) => c === 0)) return null;

  const distinct = new Set(counts);
  if (distinct.size === 1) return counts[0] * 100;
  if (distinct.size > 3) return null;

  const avg = counts.reduce((a, b) => a + b, 0) / counts.length;
  if (avg <= 0) return null;
  const variance =
    counts.reduce((sum, c) => sum + (c - avg) ** 2, 0) / counts.length;
  return avg / (1 + variance);
}

export function profileDelimiters(sampleLines: string[]): DelimiterProfile[] {
  const lines = sampleLines
    .map((l) => l.trim())
    .filter((l) => l.length > 0)
    .slice(0, DETECTION_LINES);

  return CANDIDATE_DELIMITERS.map((delimiter) => {
    const counts = lines.map((l) => countDelimitersOutsideQuotes(l, delimiter));
    return { delimiter, counts, score: scoreCounts(counts) };
  });
}

/**
 * Picks the candidate whose per-line count is the most consistent. A count
 * that is identical on every line scores `count * 100`, which beats any
 * inconsistent candidate.
 */
export function detectDelimiter(
  sampleLines: string[],
  override?: string
): string {
  if (override) return override;

  let best: string | null = null;
  let bestScore = -1;
  for (const profile of profileDelimiters(sampleLines)) {
    if (profile.score !== null && profile.score > bestScore) {
      bestScore = profile.score;
      best = profile.delimiter;
    }
  }
  return best ?? FALLBACK_DELIMITER;
}
