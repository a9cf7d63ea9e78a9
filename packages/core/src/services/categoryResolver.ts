import type {
  EmotionLabel,
  EmotionResult,
  NegativeEmotion,
  ResponseCategory,
  SentimentResult,
  SupportiveCategory,
} from "../types/index.js";
import { SYNTHESIS_CONFIG } from "../config/settings.js";

export interface ResolveOptions {
  /** Inclusive lower bound for `negative_strong`. Default: 0.7 */
  strongNegativeThreshold?: number;
}

/**
 * Compile-time exhaustiveness check for switches over closed unions. If a
 * value outside the union still arrives at run time, `fallback` is used.
 */
function exhaustiveFallback<T>(_unhandled: never, fallback: T): T {
  return fallback;
}

/**
 * Narrows an emotion to the negative cluster, or `null` for the rest.
 * Written as a switch so a new emotion label fails to compile until it is
 * placed on one side.
 */
export function toNegativeEmotion(label: EmotionLabel): NegativeEmotion | null {
  switch (label) {
    case "sadness":
    case "anger":
    case "fear":
    case "disgust":
      return label;
    case "surprise":
    case "neutral":
    case "joy":
      return null;
    default:
      return exhaustiveFallback(label, null);
  }
}

/**
 * Fuses the crisis flag and both classifier readings into one category.
 * Rules are checked in order and the first match wins:
 *
 * 1. crisis flag → `crisis`
 * 2. NEGATIVE at or above the threshold → `negative_strong`
 * 3. NEGATIVE below it, or a negative-cluster emotion → that emotion, else
 *    `negative_mild`
 * 4. POSITIVE or `joy` → `joy`
 * 5. otherwise → `neutral`
 *
 * Emotion score is never consulted.
 */
export function resolveCategory(
  sentiment: SentimentResult,
  emotion: EmotionResult,
  crisis: boolean,
  options: ResolveOptions = {},
): ResponseCategory {
  const threshold =
    options.strongNegativeThreshold ?? SYNTHESIS_CONFIG.strongNegativeThreshold;

  if (crisis) return "crisis";

  const negativeSentiment = sentiment.label === "NEGATIVE";
  if (negativeSentiment && sentiment.score >= threshold) {
    return "negative_strong";
  }

  const negativeEmotion = toNegativeEmotion(emotion.label);
  if (negativeEmotion) return negativeEmotion;
  if (negativeSentiment) return "negative_mild";

  if (sentiment.label === "POSITIVE" || emotion.label === "joy") return "joy";

  return "neutral";
}

/**
 * Whether replies in `category` come with a coping tip.
 */
export function isSupportiveCategory(
  category: ResponseCategory,
): category is SupportiveCategory {
  switch (category) {
    case "negative_strong":
    case "negative_mild":
    case "sadness":
    case "anger":
    case "fear":
    case "disgust":
      return true;
    case "crisis":
    case "joy":
    case "neutral":
      return false;
    default:
      return exhaustiveFallback(category, false);
  }
}
