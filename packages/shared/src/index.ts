export {
  type LogLevel,
  type LogContext,
  type Logger,
  createLogger,
  errorContext,
  logger,
} from "./logger.js";

export {
  CircuitBreaker,
  CircuitBreakerError,
  RequestTimeoutError,
  type CircuitBreakerConfig,
  type CircuitBreakerMetrics,
  type CircuitBreakerState,
} from "./circuitBreaker.js";

export {
  type AppErrorOptions,
  type SubclassErrorOptions,
  AppError,
  ValidationError,
  ConfigurationError,
  ExternalServiceError,
} from "./errors.js";

export {
  type NumericBounds,
  getOptionalEnv,
  parseEnvInt,
  parseEnvFloat,
} from "./env.js";

export {
  DEFAULT_CLASSIFIER_SCORE,
  SENTIMENT_LABELS,
  sentimentLabelSchema,
  type SentimentLabel,
  EMOTION_LABELS,
  emotionLabelSchema,
  type EmotionLabel,
  classifierScoreSchema,
  lenientSentimentLabelSchema,
  lenientEmotionLabelSchema,
  sentimentResultSchema,
  type SentimentResult,
  emotionResultSchema,
  type EmotionResult,
  classifierOutputSchema,
  type ClassifierPrediction,
} from "./validation.js";
