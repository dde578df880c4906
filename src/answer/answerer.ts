import type { FanoutSettings } from "../config/env";
import type { SourceRegistry } from "../data/registry";
import { OrchestrationFault } from "../errors";
import { fanOut } from "../fanout/scheduler";
import { fuse } from "../fusion/fusion";
import { describeError, logger } from "../logger";
import type { QuestionAnalysis } from "../parsers/question-schema";
import { AdaptiveSourceRanker } from "../selection/adaptive";
import { selectSources } from "../selection/policy";
import { normalize } from "../text/normalizer";
import type { AnswerCycleOutcome, FusedAnswer, SourceName, SourceTiming, StatisticsSnapshot } from "../types";
import { TtlCache } from "./cache";
import { ConversationContext } from "./context";
import type { Exchange } from "./context";

const log = logger.child({ component: "answerer" });

export type OutcomeListener = (outcome: AnswerCycleOutcome) => void;

export interface AnswererOptions {
  registry: SourceRegistry;
  fanout: FanoutSettings;
  maxSentences?: number;
  cache?: { maxEntries: number; ttlSeconds: number };
  contextSize?: number;
  ranker?: AdaptiveSourceRanker;
  /** Source statistics read once per cycle. */
  statistics?: () => StatisticsSnapshot;
  now?: () => number;
}

export interface AnswerRequest {
  /** Explicit source order; overrides every other selection rule. */
  sourcePriority?: readonly SourceName[];
  analysis?: QuestionAnalysis;
}

/**
 * Runs one answer cycle: selection, fan-out, fusion. Owns the answer cache and
 * the conversation context; reset() clears both.
 */
export class QuestionAnswerer {
  private readonly cache: TtlCache<FusedAnswer>;

  private readonly context: ConversationContext;

  private readonly listeners = new Set<OutcomeListener>();

  private readonly ranker: AdaptiveSourceRanker;

  private readonly now: () => number;

  constructor(private readonly options: AnswererOptions) {
    this.now = options.now ?? Date.now;
    const cacheOptions = options.cache ?? { maxEntries: 200, ttlSeconds: 3600 };
    this.cache = new TtlCache<FusedAnswer>({
      maxEntries: cacheOptions.maxEntries,
      ttlMs: cacheOptions.ttlSeconds * 1000,
      now: this.now
    });
    this.context = new ConversationContext(options.contextSize ?? 10);
    this.ranker = options.ranker ?? new AdaptiveSourceRanker();
  }

  onOutcome(listener: OutcomeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async answerQuestion(question: string, category: string, request: AnswerRequest = {}): Promise<FusedAnswer | null> {
    const key = normalize(question.trim());
    const cached = this.cache.get(key);
    if (cached) {
      log.debug("Cache hit", { question });
      this.context.push({ question, answer: cached.text, source: cached.source, at: new Date(this.now()) });
      return copyAnswer(cached);
    }

    const startedAt = this.now();
    let outcome: AnswerCycleOutcome;

    try {
      const adapters = this.options.registry.resolve(this.chooseSources(question, request));
      const { fanout } = this.options;

      const report = await fanOut(question, adapters, {
        perSourceTimeoutSeconds: fanout.perSourceTimeoutSeconds,
        overallTimeoutSeconds: fanout.overallTimeoutSeconds,
        earlyStopThreshold: fanout.earlyStopThreshold,
        substantialLength: fanout.substantialLength,
        maxConcurrency: fanout.maxConcurrency
      });

      const answer = fuse(report.results, question, category, { maxSentences: this.options.maxSentences });

      const results: SourceTiming[] = adapters.map((adapter) => ({
        source: adapter.name,
        text: report.results.get(adapter.name) ?? null,
        latencySeconds: report.latencies.get(adapter.name) ?? null
      }));

      outcome = {
        question,
        category,
        selectedSources: adapters.map((adapter) => adapter.name),
        results,
        answer,
        elapsedMs: this.now() - startedAt
      };
    } catch (error) {
      log.error("Answer cycle failed", { question, error: describeError(error) });
      throw new OrchestrationFault(`Failed to answer question: ${describeError(error)}`, { cause: error });
    }

    const { answer } = outcome;
    this.context.push({ question, answer: answer?.text ?? null, source: answer?.source ?? null, at: new Date(this.now()) });
    if (answer) {
      this.cache.set(key, copyAnswer(answer));
    }
    this.notify(outcome);

    log.info("Answer cycle complete", {
      question,
      category,
      selected: outcome.selectedSources,
      source: answer?.source ?? null,
      strategy: answer?.strategy ?? null,
      elapsedMs: outcome.elapsedMs
    });
    return answer;
  }

  recentExchanges(): Exchange[] {
    return this.context.recent();
  }

  reset(): void {
    this.cache.clear();
    this.context.clear();
  }

  /** Ordered sources for a question, capped at the configured maximum. */
  chooseSources(question: string, request: AnswerRequest = {}): SourceName[] {
    const { registry, fanout } = this.options;
    const available = registry.names();

    let ordered: SourceName[];
    if (request.sourcePriority && request.sourcePriority.length > 0) {
      ordered = request.sourcePriority.filter((source) => registry.has(source));
    } else {
      const candidates = request.analysis ? selectSources(request.analysis, available) : available;
      // Ties keep the candidate order, so an empty history leaves it as is.
      ordered =
        this.ranker.trained || this.options.statistics
          ? this.ranker.rank(question, candidates, this.options.statistics?.()).map(({ source }) => source)
          : candidates;
    }

    return Array.from(new Set(ordered)).slice(0, fanout.maxSources);
  }

  private notify(outcome: AnswerCycleOutcome): void {
    for (const listener of this.listeners) {
      try {
        listener(outcome);
      } catch (error) {
        log.warn("Outcome listener failed", { error: describeError(error) });
      }
    }
  }
}

function copyAnswer(answer: FusedAnswer): FusedAnswer {
  return { ...answer, contributingSources: [...answer.contributingSources] };
}
