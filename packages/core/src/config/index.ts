export {
  SYNTHESIS_CONFIG,
  CLASSIFIER_CONFIG,
  getSynthesisSettings,
  getClassifierSettings,
  type SynthesisSettings,
  type ClassifierSettings,
} from "./settings.js";
export { getFeatureFlags, type FeatureFlags } from "./featureFlags.js";
