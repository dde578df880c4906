import pLimit from "p-limit";
import type { SourceAdapter } from "../data/adapter";
import { describeError, logger } from "../logger";
import type { SourceName } from "../types";

const log = logger.child({ component: "fanout" });

export interface FanoutOptions {
  perSourceTimeoutSeconds: number;
  overallTimeoutSeconds: number;
  /** Stop collecting once this many substantial answers have arrived. */
  earlyStopThreshold?: number;
  /** Trimmed length an answer needs to count towards the early stop. */
  substantialLength?: number;
  maxConcurrency?: number;
  /** Called once per settled source, in completion order. */
  onResult?: (source: SourceName, text: string | null, latencySeconds: number) => void;
}

export type StopReason = "completed" | "early_stop" | "overall_timeout";

export interface FanoutReport {
  results: Map<SourceName, string | null>;
  latencies: Map<SourceName, number>;
  stopReason: StopReason;
}

/**
 * Invokes every adapter concurrently and resolves with one entry per selected
 * source. Calls still running when collection stops are abandoned and their
 * late results are discarded.
 */
export async function fetchAll(
  query: string,
  adapters: readonly SourceAdapter[],
  options: FanoutOptions
): Promise<Map<SourceName, string | null>> {
  const report = await fanOut(query, adapters, options);
  return report.results;
}

export function fanOut(query: string, adapters: readonly SourceAdapter[], options: FanoutOptions): Promise<FanoutReport> {
  const {
    perSourceTimeoutSeconds,
    overallTimeoutSeconds,
    earlyStopThreshold = 2,
    substantialLength = 100,
    maxConcurrency = adapters.length
  } = options;

  const unique = dedupeAdapters(adapters);
  const results = new Map<SourceName, string | null>(unique.map((adapter) => [adapter.name, null]));
  const latencies = new Map<SourceName, number>();

  if (unique.length === 0) {
    return Promise.resolve({ results, latencies, stopReason: "completed" });
  }

  const limit = pLimit(Math.max(1, Math.min(unique.length, maxConcurrency)));
  const startedAt = Date.now();

  return new Promise<FanoutReport>((resolve, reject) => {
    let settled = false;
    let pending = unique.length;
    let substantial = 0;

    const finish = (stopReason: StopReason) => {
      if (settled) return;
      settled = true;
      clearTimeout(overallTimer);
      limit.clearQueue();
      log.info("Fan-out finished", {
        query,
        stopReason,
        answered: Array.from(results.values()).filter((text) => text !== null).length,
        selected: unique.length,
        elapsedMs: Date.now() - startedAt
      });
      resolve({ results: new Map(results), latencies: new Map(latencies), stopReason });
    };

    const overallTimer = setTimeout(() => {
      log.warn("Fan-out overall timeout reached", { query, overallTimeoutSeconds, pending });
      finish("overall_timeout");
    }, overallTimeoutSeconds * 1000);

    for (const adapter of unique) {
      void limit(() => invokeWithTimeout(adapter, query, perSourceTimeoutSeconds)).then(({ text, latencySeconds }) => {
        if (settled) {
          log.debug("Discarding late result", { source: adapter.name });
          return;
        }
        results.set(adapter.name, text);
        latencies.set(adapter.name, latencySeconds);
        notify(adapter.name, text, latencySeconds);
        pending -= 1;

        if (text !== null && text.trim().length > substantialLength) {
          substantial += 1;
        }
        if (substantial >= earlyStopThreshold) {
          log.debug("Early stop", { query, substantial });
          finish("early_stop");
        } else if (pending === 0) {
          finish("completed");
        }
      }).catch((error: unknown) => {
        if (settled) return;
        settled = true;
        clearTimeout(overallTimer);
        limit.clearQueue();
        reject(error);
      });
    }
  });

  function notify(source: SourceName, text: string | null, latencySeconds: number): void {
    try {
      options.onResult?.(source, text, latencySeconds);
    } catch (error) {
      log.warn("Result listener failed", { source, error: describeError(error) });
    }
  }
}

interface TimedResult {
  text: string | null;
  latencySeconds: number;
}

async function invokeWithTimeout(adapter: SourceAdapter, query: string, perSourceTimeoutSeconds: number): Promise<TimedResult> {
  const timeoutSeconds = Math.min(adapter.timeoutSeconds, perSourceTimeoutSeconds);
  const startedAt = Date.now();
  const call = adapter.fetch(query, timeoutSeconds).catch((error: unknown) => {
    log.warn("Adapter rejected", { source: adapter.name, error: describeError(error) });
    return null;
  });

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<null>((resolve) => {
    timer = setTimeout(() => {
      log.warn("Source timed out", { source: adapter.name, timeoutSeconds });
      resolve(null);
    }, timeoutSeconds * 1000);
  });

  try {
    const text = await Promise.race([call, timeout]);
    return { text, latencySeconds: (Date.now() - startedAt) / 1000 };
  } finally {
    clearTimeout(timer);
  }
}

function dedupeAdapters(adapters: readonly SourceAdapter[]): SourceAdapter[] {
  const seen = new Set<SourceName>();
  return adapters.filter((adapter) => {
    if (seen.has(adapter.name)) return false;
    seen.add(adapter.name);
    return true;
  });
}
