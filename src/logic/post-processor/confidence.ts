export interface ConfidenceInput {
  /** Scores of the chunks the answer was grounded on, best first. */
  scores: readonly number[];
  threshold: number;
  topK: number;
  /** Generation certainty in [0, 1], when the backend reports one. */
  certainty?: number;
}

const TOP_WEIGHT = 0.5;
const COVERAGE_WEIGHT = 0.25;
const CERTAINTY_WEIGHT = 0.25;

/**
 * 0.5 * top score + 0.25 * coverage + 0.25 * certainty, where coverage is the share
 * of the top-K slots filled by chunks above threshold. Without a certainty signal
 * the first two terms are rescaled to [0, 1]. Zero when no chunk passes threshold.
 */
export function computeConfidence({ scores, threshold, topK, certainty }: ConfidenceInput): number {
  const passing = scores.filter(score => score >= threshold);
  if (passing.length === 0) {
    return 0;
  }

  const top = Math.max(...passing);
  const coverage = Math.min(1, passing.length / Math.max(1, topK));
  const grounded = TOP_WEIGHT * top + COVERAGE_WEIGHT * coverage;
  const raw = certainty === undefined
    ? grounded / (TOP_WEIGHT + COVERAGE_WEIGHT)
    : grounded + CERTAINTY_WEIGHT * Math.min(1, Math.max(0, certainty));

  return Math.round(Math.min(1, Math.max(0, raw)) * 1000) / 1000;
}
