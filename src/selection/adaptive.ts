import { describeError, logger } from "../logger";
import type { SourceName, StatisticsSnapshot } from "../types";

const log = logger.child({ component: "adaptive-ranker" });

export const MODEL_WEIGHT = 0.7;
export const HISTORY_WEIGHT = 0.3;
export const UNKNOWN_SOURCE_PROBABILITY = 0.1;
export const DEFAULT_SUCCESS_RATE = 0.5;
export const DEFAULT_QUALITY_SCORE = 0.5;

/** Predicts, per source, the probability that it will answer the question well. */
export interface SourceSuccessModel {
  predict(question: string): ReadonlyMap<string, number>;
}

export type ClassifierSlot =
  | { kind: "untrained" }
  | { kind: "single"; model: SourceSuccessModel }
  | { kind: "ensemble"; models: readonly SourceSuccessModel[]; fallback?: SourceSuccessModel };

export interface RankedSource {
  source: SourceName;
  score: number;
}

/**
 * Orders sources for a question by blending classifier predictions with
 * historical success rates. Falls back to statistics alone when no model is
 * available or every model fails.
 */
export class AdaptiveSourceRanker {
  constructor(private readonly slot: ClassifierSlot = { kind: "untrained" }) {}

  get trained(): boolean {
    return this.slot.kind !== "untrained";
  }

  rank(question: string, available: readonly SourceName[], snapshot?: StatisticsSnapshot): RankedSource[] {
    const predictions = this.predict(question);
    const ranked = available.map((source) => {
      const stats = snapshot?.get(source);
      const successRate = stats?.successRate ?? DEFAULT_SUCCESS_RATE;
      if (predictions) {
        const probability = predictions.get(source) ?? UNKNOWN_SOURCE_PROBABILITY;
        return { source, score: MODEL_WEIGHT * probability + HISTORY_WEIGHT * successRate };
      }
      return { source, score: successRate * (stats?.qualityScore ?? DEFAULT_QUALITY_SCORE) };
    });
    return ranked.sort((a, b) => b.score - a.score);
  }

  private predict(question: string): ReadonlyMap<string, number> | null {
    switch (this.slot.kind) {
      case "untrained":
        return null;
      case "single":
        return safePredict(this.slot.model, question);
      case "ensemble": {
        const votes = this.slot.models
          .map((model) => safePredict(model, question))
          .filter((prediction): prediction is ReadonlyMap<string, number> => prediction !== null);
        if (votes.length > 0) {
          return averagePredictions(votes);
        }
        log.debug("Ensemble produced no prediction, degrading");
        return this.slot.fallback ? safePredict(this.slot.fallback, question) : null;
      }
    }
  }
}

function safePredict(model: SourceSuccessModel, question: string): ReadonlyMap<string, number> | null {
  try {
    return model.predict(question);
  } catch (error) {
    log.warn("Source model prediction failed", { error: describeError(error) });
    return null;
  }
}

function averagePredictions(predictions: readonly ReadonlyMap<string, number>[]): Map<string, number> {
  const totals = new Map<string, number>();
  for (const prediction of predictions) {
    for (const [source, probability] of prediction) {
      totals.set(source, (totals.get(source) ?? 0) + probability);
    }
  }
  const averaged = new Map<string, number>();
  for (const [source, total] of totals) {
    averaged.set(source, total / predictions.length);
  }
  return averaged;
}
