import {
  CircuitBreaker,
  DEFAULT_CLASSIFIER_SCORE,
  ExternalServiceError,
  classifierOutputSchema,
  errorContext,
  logger,
  type CircuitBreakerMetrics,
  type ClassifierPrediction,
  type Logger,
} from "@solace/shared";
import type {
  EmotionResult,
  SentimentResult,
  SynthesisResult,
} from "../types/index.js";
import {
  getClassifierSettings,
  type ClassifierSettings,
} from "../config/settings.js";
import {
  normalizeEmotion,
  normalizeSentiment,
  type ResponseSynthesisEngine,
} from "./responseSynthesis.js";

const log = logger.child({ service: "classifier-gateway" });

const OUTPUT_INVALID = "CLASSIFIER_OUTPUT_INVALID";

/** Output without a usable label does not count toward opening a circuit. */
function isOutage(error: Error): boolean {
  return !(
    error instanceof ExternalServiceError && error.code === OUTPUT_INVALID
  );
}

/**
 * Any text-classification backend: a local model, an inference API, a stub.
 * Resolves to one `{ label, score }` prediction or a ranked list of them.
 */
export type TextClassifier = (text: string) => Promise<unknown>;

export type ClassifierKind = "sentiment" | "emotion";

export interface ClassifierReading<T> {
  result: T;
  /** True when `result` is the default reading rather than model output. */
  degraded: boolean;
}

export interface ClassifierReadings {
  sentiment: ClassifierReading<SentimentResult>;
  emotion: ClassifierReading<EmotionResult>;
}

export interface ClassifierGatewayOptions {
  sentiment: TextClassifier;
  emotion: TextClassifier;
  settings?: ClassifierSettings;
  logger?: Logger;
}

export const FALLBACK_SENTIMENT: SentimentResult = Object.freeze({
  label: "NEUTRAL",
  score: DEFAULT_CLASSIFIER_SCORE,
});

export const FALLBACK_EMOTION: EmotionResult = Object.freeze({
  label: "neutral",
  score: DEFAULT_CLASSIFIER_SCORE,
});

/**
 * Calls the two external classifiers behind circuit breakers. A failure,
 * timeout, open circuit, or unrecognized output is logged and replaced by
 * the neutral mid-confidence reading, so the engine always receives a
 * usable `ClassifierResult`.
 */
export class ClassifierGateway {
  private readonly sentimentClassifier: TextClassifier;
  private readonly emotionClassifier: TextClassifier;
  private readonly sentimentCircuit: CircuitBreaker;
  private readonly emotionCircuit: CircuitBreaker;
  private readonly log: Logger;

  constructor(options: ClassifierGatewayOptions) {
    const settings = options.settings ?? getClassifierSettings();
    this.log = options.logger ?? log;
    this.sentimentClassifier = options.sentiment;
    this.emotionClassifier = options.emotion;
    this.sentimentCircuit = this.createCircuit("sentiment", settings);
    this.emotionCircuit = this.createCircuit("emotion", settings);
  }

  /**
   * Reads both classifiers in parallel. Blank text skips the calls and
   * yields the default readings.
   */
  async classify(text: string): Promise<ClassifierReadings> {
    if (!text.trim()) {
      return {
        sentiment: { result: FALLBACK_SENTIMENT, degraded: false },
        emotion: { result: FALLBACK_EMOTION, degraded: false },
      };
    }

    const [sentiment, emotion] = await Promise.all([
      this.read(
        "sentiment",
        text,
        this.sentimentClassifier,
        this.sentimentCircuit,
        normalizeSentiment,
        FALLBACK_SENTIMENT,
      ),
      this.read(
        "emotion",
        text,
        this.emotionClassifier,
        this.emotionCircuit,
        normalizeEmotion,
        FALLBACK_EMOTION,
      ),
    ]);

    return { sentiment, emotion };
  }

  getMetrics(): Record<ClassifierKind, CircuitBreakerMetrics> {
    return {
      sentiment: this.sentimentCircuit.getMetrics(),
      emotion: this.emotionCircuit.getMetrics(),
    };
  }

  private createCircuit(
    kind: ClassifierKind,
    settings: ClassifierSettings,
  ): CircuitBreaker {
    return new CircuitBreaker({
      name: `${kind}-classifier`,
      failureThreshold: settings.failureThreshold,
      resetTimeout: settings.resetTimeoutMs,
      requestTimeout: settings.timeoutMs,
      successThreshold: 1,
      logger: this.log,
      shouldRecordFailure: isOutage,
    });
  }

  private read<T>(
    kind: ClassifierKind,
    text: string,
    classifier: TextClassifier,
    circuit: CircuitBreaker,
    normalize: (prediction: ClassifierPrediction) => T,
    fallback: T,
  ): Promise<ClassifierReading<T>> {
    return circuit.executeWithFallback<ClassifierReading<T>>(
      async () => {
        const output = await classifier(text);
        const parsed = classifierOutputSchema.safeParse(output);
        if (!parsed.success) {
          throw new ExternalServiceError(
            `The ${kind} classifier returned an unrecognized result`,
            {
              code: OUTPUT_INVALID,
              cause: parsed.error,
              context: { classifier: kind },
            },
          );
        }
        return { result: normalize(parsed.data), degraded: false };
      },
      (error) => {
        this.log.warn("Classifier unavailable, using default reading", {
          classifier: kind,
          ...errorContext(error),
        });
        return { result: fallback, degraded: true };
      },
    );
  }
}

export function createClassifierGateway(
  options: ClassifierGatewayOptions,
): ClassifierGateway {
  return new ClassifierGateway(options);
}

export interface RespondDependencies {
  gateway: ClassifierGateway;
  engine: ResponseSynthesisEngine;
}

/**
 * Classifies a message and synthesizes the reply in one step.
 */
export async function respondToMessage(
  text: string,
  { gateway, engine }: RespondDependencies,
): Promise<SynthesisResult> {
  const readings = await gateway.classify(text);
  return engine.synthesize(
    text,
    readings.sentiment.result,
    readings.emotion.result,
  );
}
