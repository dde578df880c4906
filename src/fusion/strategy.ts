import type { FusionStrategy } from "../types";
import { normalize } from "../text/normalizer";

export interface StrategyProfile {
  strategy: Exclude<FusionStrategy, "single">;
  /** How many of the top-ranked sources may contribute. */
  poolSize: number;
  /** Sources must score strictly above this to contribute. */
  relevanceFloor: number;
  sentencesPerSource: number;
  duplicateThreshold: number;
}

const FACTUAL_CATEGORIES = new Set(["factual", "qual", "quem", "quanto", "which", "who", "how_many", "how many"]);
const EXPLANATORY_CATEGORIES = new Set(["explanatory", "como", "porque", "por que", "how", "why"]);

export const STRATEGY_PROFILES: Record<StrategyProfile["strategy"], StrategyProfile> = {
  factual: { strategy: "factual", poolSize: 1, relevanceFloor: Number.NEGATIVE_INFINITY, sentencesPerSource: Number.POSITIVE_INFINITY, duplicateThreshold: 1 },
  explanatory: { strategy: "explanatory", poolSize: 3, relevanceFloor: 0.1, sentencesPerSource: 3, duplicateThreshold: 0.7 },
  general: { strategy: "general", poolSize: 2, relevanceFloor: 0.05, sentencesPerSource: 2, duplicateThreshold: 0.75 }
};

export function resolveStrategy(category: string): StrategyProfile {
  const key = normalize(category).trim().replace(/[-\s]+/g, " ");
  if (FACTUAL_CATEGORIES.has(key) || FACTUAL_CATEGORIES.has(key.replace(/ /g, "_"))) {
    return STRATEGY_PROFILES.factual;
  }
  if (EXPLANATORY_CATEGORIES.has(key)) {
    return STRATEGY_PROFILES.explanatory;
  }
  return STRATEGY_PROFILES.general;
}
