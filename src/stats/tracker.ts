import { logger } from "../logger";
import type { AnswerCycleOutcome, SourceName, SourceStatistics, StatisticsSnapshot } from "../types";
import { assessAnswerQuality } from "./quality";

const log = logger.child({ component: "source-stats" });

export interface SourceOutcome {
  source: SourceName;
  latencySeconds: number;
  success: boolean;
  quality?: number;
}

interface MutableStatistics extends SourceStatistics {
  successes: number;
  qualitySamples: number;
}

/** Running per-source statistics fed by answer cycles. */
export class SourceStatisticsTracker {
  private readonly stats = new Map<SourceName, MutableStatistics>();

  record(outcome: SourceOutcome): void {
    const current = this.stats.get(outcome.source) ?? {
      source: outcome.source,
      successRate: 0,
      averageLatency: 0,
      qualityScore: 0,
      totalUses: 0,
      successes: 0,
      qualitySamples: 0
    };

    const totalUses = current.totalUses + 1;
    const successes = current.successes + (outcome.success ? 1 : 0);
    const averageLatency = current.averageLatency + (outcome.latencySeconds - current.averageLatency) / totalUses;

    let { qualityScore, qualitySamples } = current;
    if (outcome.quality !== undefined) {
      qualitySamples += 1;
      qualityScore += (outcome.quality - qualityScore) / qualitySamples;
    }

    this.stats.set(outcome.source, {
      source: outcome.source,
      totalUses,
      successes,
      successRate: successes / totalUses,
      averageLatency,
      qualityScore,
      qualitySamples
    });
  }

  /** Listener for completed answer cycles. */
  recordCycle(outcome: AnswerCycleOutcome): void {
    const contributors = new Set(outcome.answer?.contributingSources ?? []);
    const quality = outcome.answer ? assessAnswerQuality(outcome.question, outcome.answer.text) : 0;

    for (const result of outcome.results) {
      // No latency means the fan-out stopped before the source settled.
      if (result.latencySeconds === null) continue;
      const answered = result.text !== null;
      this.record({
        source: result.source,
        latencySeconds: result.latencySeconds,
        success: answered,
        quality: contributors.has(result.source) ? quality : answered ? undefined : 0
      });
    }
    log.debug("Recorded answer cycle", { question: outcome.question, contributors: Array.from(contributors) });
  }

  /** Frozen copy; later records do not affect it. */
  snapshot(): StatisticsSnapshot {
    const copy = new Map<SourceName, Readonly<SourceStatistics>>();
    for (const [source, stats] of this.stats) {
      copy.set(
        source,
        Object.freeze({
          source,
          successRate: stats.successRate,
          averageLatency: stats.averageLatency,
          qualityScore: stats.qualityScore,
          totalUses: stats.totalUses
        })
      );
    }
    return copy;
  }

  reset(): void {
    this.stats.clear();
  }
}
