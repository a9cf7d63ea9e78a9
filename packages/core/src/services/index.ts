export { detectCrisis, findCrisisPhrase } from "./crisisDetector.js";

export {
  resolveCategory,
  isSupportiveCategory,
  toNegativeEmotion,
  type ResolveOptions,
} from "./categoryResolver.js";

export {
  ResponseSynthesisEngine,
  createResponseSynthesisEngine,
  normalizeSentiment,
  normalizeEmotion,
  type ResponseSynthesisEngineOptions,
} from "./responseSynthesis.js";

export {
  ClassifierGateway,
  createClassifierGateway,
  respondToMessage,
  FALLBACK_SENTIMENT,
  FALLBACK_EMOTION,
  type TextClassifier,
  type ClassifierKind,
  type ClassifierReading,
  type ClassifierReadings,
  type ClassifierGatewayOptions,
  type RespondDependencies,
} from "./classifierGateway.js";
