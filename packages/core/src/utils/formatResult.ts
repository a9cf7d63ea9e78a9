import type { SynthesisResult } from "../types/index.js";

/**
 * One-line status caption shown under a reply, e.g.
 * `Sentiment: NEGATIVE (0.99) | Emotion: sadness (0.80)`.
 */
export function formatResultSummary(result: SynthesisResult): string {
  const parts = [
    `Sentiment: ${result.sentimentLabel} (${result.sentimentScore.toFixed(2)})`,
    `Emotion: ${result.emotionLabel} (${result.emotionScore.toFixed(2)})`,
  ];
  if (result.crisis) {
    parts.push("possible crisis language detected");
  }
  return parts.join(" | ");
}
