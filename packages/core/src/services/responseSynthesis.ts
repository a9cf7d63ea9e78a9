import {
  ValidationError,
  emotionResultSchema,
  logger,
  sentimentResultSchema,
  type Logger,
} from "@solace/shared";
import type {
  EmotionResult,
  RawClassifierResult,
  SentimentResult,
  SynthesisResult,
} from "../types/index.js";
import { getFeatureFlags } from "../config/featureFlags.js";
import { SYNTHESIS_CONFIG, getSynthesisSettings } from "../config/settings.js";
import {
  createCrisisLexicon,
  type CrisisLexicon,
} from "../prompts/crisisLexicon.js";
import {
  createTemplateBank,
  type TemplateBank,
} from "../prompts/supportTemplates.js";
import { selectDeterministic } from "../utils/deterministicSelect.js";
import { isSupportiveCategory, resolveCategory } from "./categoryResolver.js";
import { findCrisisPhrase } from "./crisisDetector.js";

const log = logger.child({ service: "response-synthesis" });

export interface ResponseSynthesisEngineOptions {
  templates: TemplateBank;
  lexicon: CrisisLexicon;
  /** Inclusive lower bound for `negative_strong`, in `[0, 1]`. Default: 0.7 */
  strongNegativeThreshold?: number;
  /** Attach a coping tip to negative, non-crisis replies. Default: true */
  copingTips?: boolean;
  logger?: Logger;
}

/**
 * Canonical sentiment reading: upper-case label (unknown → NEUTRAL), score
 * clamped to `[0, 1]` (missing → 0.5). Never throws.
 */
export function normalizeSentiment(
  raw: RawClassifierResult | null | undefined,
): SentimentResult {
  return sentimentResultSchema.parse(raw);
}

/**
 * Canonical emotion reading: lower-case label (unknown → `neutral`), score
 * clamped to `[0, 1]` (missing → 0.5). Never throws.
 */
export function normalizeEmotion(
  raw: RawClassifierResult | null | undefined,
): EmotionResult {
  return emotionResultSchema.parse(raw);
}

/**
 * Turns a message and its two classifier readings into one supportive reply.
 *
 * Holds only the read-only template bank and lexicon it was given, so a
 * single instance can serve any number of concurrent callers. Each call is a
 * single synchronous pass; identical arguments always produce identical
 * `reply` and `tip`.
 */
export class ResponseSynthesisEngine {
  private readonly templates: TemplateBank;
  private readonly lexicon: CrisisLexicon;
  private readonly strongNegativeThreshold: number;
  private readonly copingTips: boolean;
  private readonly log: Logger;

  constructor(options: ResponseSynthesisEngineOptions) {
    const threshold = options.strongNegativeThreshold ??
      SYNTHESIS_CONFIG.strongNegativeThreshold;
    if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
      throw new ValidationError(
        `strongNegativeThreshold must be within [0, 1], got ${threshold}`,
        { code: "INVALID_THRESHOLD", context: { threshold } },
      );
    }

    this.templates = options.templates;
    this.lexicon = options.lexicon;
    this.strongNegativeThreshold = threshold;
    this.copingTips = options.copingTips ?? true;
    this.log = options.logger ?? log;
  }

  synthesize(
    text: string,
    sentiment: RawClassifierResult | null | undefined,
    emotion: RawClassifierResult | null | undefined,
  ): SynthesisResult {
    const normalizedSentiment = normalizeSentiment(sentiment);
    const normalizedEmotion = normalizeEmotion(emotion);

    const crisisPhrase = findCrisisPhrase(text, this.lexicon);
    const crisis = crisisPhrase !== null;
    const category = resolveCategory(
      normalizedSentiment,
      normalizedEmotion,
      crisis,
      { strongNegativeThreshold: this.strongNegativeThreshold },
    );

    const reply =
      category === "crisis"
        ? this.templates.crisisMessage
        : selectDeterministic(text, this.templates.templatesFor(category));

    const tip =
      this.copingTips && isSupportiveCategory(category)
        ? selectDeterministic(text, this.templates.tips())
        : null;

    if (crisis) {
      this.log.warn("Crisis language detected", {
        matchedPhrase: crisisPhrase,
        sentimentLabel: normalizedSentiment.label,
        emotionLabel: normalizedEmotion.label,
      });
    }

    this.log.debug("Reply synthesized", {
      category,
      crisis,
      sentimentLabel: normalizedSentiment.label,
      emotionLabel: normalizedEmotion.label,
      hasTip: tip !== null,
    });

    return Object.freeze({
      sentimentLabel: normalizedSentiment.label,
      sentimentScore: normalizedSentiment.score,
      emotionLabel: normalizedEmotion.label,
      emotionScore: normalizedEmotion.score,
      category,
      crisis,
      reply,
      tip,
      encouragement: tip === null ? null : this.templates.encouragement,
    });
  }
}

/**
 * Engine wired with the default template bank and lexicon, env-derived
 * settings and feature flags. Any option can be overridden.
 */
export function createResponseSynthesisEngine(
  overrides: Partial<ResponseSynthesisEngineOptions> = {},
): ResponseSynthesisEngine {
  return new ResponseSynthesisEngine({
    templates: overrides.templates ?? createTemplateBank(),
    lexicon: overrides.lexicon ?? createCrisisLexicon(),
    strongNegativeThreshold:
      overrides.strongNegativeThreshold ??
      getSynthesisSettings().strongNegativeThreshold,
    copingTips: overrides.copingTips ?? getFeatureFlags().copingTips,
    logger: overrides.logger ?? log,
  });
}
