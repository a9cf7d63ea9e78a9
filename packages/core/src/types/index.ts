export type {
  EmotionLabel,
  EmotionResult,
  SentimentLabel,
  SentimentResult,
  RawClassifierResult,
  NegativeEmotion,
  ResponseCategory,
  ReplyCategory,
  SupportiveCategory,
  NonEmptyList,
  SynthesisResult,
} from "./synthesis.js";
