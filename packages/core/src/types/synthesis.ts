import type {
  EmotionLabel,
  EmotionResult,
  SentimentLabel,
  SentimentResult,
} from "@solace/shared";

export type { EmotionLabel, EmotionResult, SentimentLabel, SentimentResult };

/**
 * Classifier output as handed over by the caller. Fields may be missing or
 * malformed; the engine normalizes them instead of rejecting the call.
 */
export interface RawClassifierResult {
  label?: string | null | undefined;
  score?: number | string | null | undefined;
}

/** Emotions that route a message to an emotion-specific negative reply. */
export type NegativeEmotion = Extract<
  EmotionLabel,
  "sadness" | "anger" | "fear" | "disgust"
>;

/**
 * Reply buckets. `joy` doubles as the positive bucket and `neutral` as the
 * fallback bucket.
 */
export type ResponseCategory =
  | "crisis"
  | "negative_strong"
  | "negative_mild"
  | NegativeEmotion
  | "joy"
  | "neutral";

/** Every category whose reply is drawn from a list of variants. */
export type ReplyCategory = Exclude<ResponseCategory, "crisis">;

/** Non-crisis categories that also carry a coping tip. */
export type SupportiveCategory = Exclude<ReplyCategory, "joy" | "neutral">;

/**
 * A non-empty, read-only list. Indexing the first slot is always defined.
 */
export type NonEmptyList<T> = readonly [T, ...T[]];

export interface SynthesisResult {
  readonly sentimentLabel: SentimentLabel;
  readonly sentimentScore: number;
  readonly emotionLabel: EmotionLabel;
  readonly emotionScore: number;
  readonly category: ResponseCategory;
  readonly crisis: boolean;
  readonly reply: string;
  readonly tip: string | null;
  /** Set exactly when `tip` is. */
  readonly encouragement: string | null;
}
