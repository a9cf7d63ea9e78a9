import { z } from "zod";

/**
 * Score substituted when a classifier omits its confidence or reports
 * something that is not a finite number.
 */
export const DEFAULT_CLASSIFIER_SCORE = 0.5;

/**
 * Polarity labels after normalization. Binary sentiment models only emit
 * POSITIVE/NEGATIVE; NEUTRAL absorbs every other label.
 */
export const SENTIMENT_LABELS = ["POSITIVE", "NEGATIVE", "NEUTRAL"] as const;

export const sentimentLabelSchema = z.enum(SENTIMENT_LABELS);

export type SentimentLabel = z.infer<typeof sentimentLabelSchema>;

/**
 * Labels of the seven-way emotion model.
 */
export const EMOTION_LABELS = [
  "sadness",
  "anger",
  "fear",
  "disgust",
  "surprise",
  "neutral",
  "joy",
] as const;

export const emotionLabelSchema = z.enum(EMOTION_LABELS);

export type EmotionLabel = z.infer<typeof emotionLabelSchema>;

/**
 * Confidence in `[0, 1]`. Numeric strings are accepted; out-of-range values
 * are clamped; anything unusable becomes `DEFAULT_CLASSIFIER_SCORE`.
 */
export const classifierScoreSchema = z
  .union([z.number(), z.string().trim().min(1).pipe(z.coerce.number())])
  .pipe(z.number().finite())
  .catch(DEFAULT_CLASSIFIER_SCORE)
  .transform((score) => Math.min(1, Math.max(0, score)));

/**
 * Trimmed and upper-cased; unknown or missing labels become NEUTRAL.
 */
export const lenientSentimentLabelSchema = z
  .string()
  .trim()
  .toUpperCase()
  .pipe(sentimentLabelSchema)
  .catch("NEUTRAL");

/**
 * Trimmed and lower-cased; unknown or missing labels become `neutral`.
 */
export const lenientEmotionLabelSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(emotionLabelSchema)
  .catch("neutral");

export const sentimentResultSchema = z
  .object({
    label: lenientSentimentLabelSchema,
    score: classifierScoreSchema,
  })
  .catch({ label: "NEUTRAL", score: DEFAULT_CLASSIFIER_SCORE });

export type SentimentResult = z.infer<typeof sentimentResultSchema>;

export const emotionResultSchema = z
  .object({
    label: lenientEmotionLabelSchema,
    score: classifierScoreSchema,
  })
  .catch({ label: "neutral", score: DEFAULT_CLASSIFIER_SCORE });

export type EmotionResult = z.infer<typeof emotionResultSchema>;

const classifierPredictionSchema = z.object({
  label: z.string().trim().min(1),
  score: classifierScoreSchema,
});

export type ClassifierPrediction = z.infer<typeof classifierPredictionSchema>;

/**
 * What a text-classification model returns: one prediction, or a ranked list
 * whose first entry is the top prediction. Only the label is required; the
 * score is defaulted or clamped like any other classifier score.
 */
export const classifierOutputSchema = z.union([
  classifierPredictionSchema,
  z
    .array(classifierPredictionSchema)
    .nonempty()
    .transform((predictions) => predictions[0]),
]);
