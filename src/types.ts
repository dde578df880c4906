export const SOURCE_NAMES = ["wolfram", "google", "duckduckgo", "wikipedia", "arxiv", "dbpedia", "youtube"] as const;

export type SourceName = (typeof SOURCE_NAMES)[number];

export function isSourceName(value: unknown): value is SourceName {
  return typeof value === "string" && SOURCE_NAMES.some((name) => name === value);
}

export interface RankedCandidate<S extends string = SourceName> {
  source: S;
  text: string;
  relevance: number;
}

export type FusionStrategy = "single" | "factual" | "explanatory" | "general";

export interface FusedAnswer<S extends string = SourceName> {
  text: string;
  contributingSources: S[];
  /** Contributing sources joined with "+". */
  source: string;
  strategy: FusionStrategy;
}

export interface SourceStatistics {
  source: SourceName;
  successRate: number;
  averageLatency: number;
  qualityScore: number;
  totalUses: number;
}

export type StatisticsSnapshot = ReadonlyMap<SourceName, Readonly<SourceStatistics>>;

export interface SourceTiming {
  source: SourceName;
  text: string | null;
  latencySeconds: number | null;
}

export interface AnswerCycleOutcome {
  question: string;
  category: string;
  selectedSources: SourceName[];
  results: SourceTiming[];
  answer: FusedAnswer | null;
  elapsedMs: number;
}

export interface AnswerLogEntry {
  question: string;
  category: string;
  answer: string;
  source: string;
  fallback: boolean;
  quality: number;
  elapsedMs: number;
}
