import { describeError, logger } from "../logger";
import type { Logger } from "../logger";
import type { SourceName } from "../types";
import type { ProviderHttp } from "../utils";

export interface SourceAdapter {
  readonly name: SourceName;
  /** Upper bound the provider is allowed, in seconds. */
  readonly timeoutSeconds: number;
  /** Never rejects: every failure resolves to null. */
  fetch(query: string, timeoutSeconds: number): Promise<string | null>;
}

export abstract class BaseAdapter implements SourceAdapter {
  abstract readonly name: SourceName;

  abstract readonly timeoutSeconds: number;

  private cachedLog: Logger | null = null;

  constructor(protected readonly http: ProviderHttp) {}

  protected get log(): Logger {
    if (!this.cachedLog) {
      this.cachedLog = logger.child({ component: "adapter", source: this.name });
    }
    return this.cachedLog;
  }

  async fetch(query: string, timeoutSeconds: number): Promise<string | null> {
    const trimmed = query.trim();
    if (!trimmed) {
      return null;
    }
    const budgetMs = Math.max(1, Math.round(Math.min(this.timeoutSeconds, timeoutSeconds) * 1000));
    try {
      const text = await this.lookup(trimmed, budgetMs);
      if (text === null || text.trim().length === 0) {
        this.log.debug("No usable content", { query: trimmed });
        return null;
      }
      this.log.info("Source answered", { query: trimmed, length: text.length });
      return text.trim();
    } catch (error) {
      this.log.warn("Source lookup failed", { query: trimmed, error: describeError(error) });
      return null;
    }
  }

  /** Provider-specific lookup; may throw, the base class maps failures to null. */
  protected abstract lookup(query: string, timeoutMs: number): Promise<string | null>;
}

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}
