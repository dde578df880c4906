import axios, { AxiosError } from "axios";
import type { AxiosInstance } from "axios";
import { CircuitOpenError, ProviderUnavailableError } from "./errors";

export interface CircuitBreakerOptions {
  failureThreshold?: number;
  cooldownMs?: number;
  /** Errors for which this returns false leave the breaker closed. */
  isFailure?: (error: unknown) => boolean;
}

interface CircuitBreakerState {
  failures: number;
  openedAt: number | null;
}

export interface RequestOptions {
  params?: Record<string, string | number | undefined>;
  headers?: Record<string, string>;
  timeoutMs: number;
}

/** Outbound HTTP used by the source adapters. */
export interface ProviderHttp {
  getJson(url: string, options: RequestOptions): Promise<unknown>;
  getText(url: string, options: RequestOptions): Promise<string>;
}

export class CircuitBreaker {
  private readonly state: CircuitBreakerState = { failures: 0, openedAt: null };

  private readonly failureThreshold: number;

  private readonly cooldownMs: number;

  private readonly isFailure: (error: unknown) => boolean;

  constructor(
    private readonly host: string,
    { failureThreshold = 3, cooldownMs = 15_000, isFailure = () => true }: CircuitBreakerOptions = {}
  ) {
    this.failureThreshold = failureThreshold;
    this.cooldownMs = cooldownMs;
    this.isFailure = isFailure;
  }

  async exec<T>(action: () => Promise<T>): Promise<T> {
    if (this.isOpen()) {
      throw new CircuitOpenError(this.host);
    }

    try {
      const result = await action();
      this.reset();
      return result;
    } catch (error) {
      if (this.isFailure(error)) {
        this.recordFailure();
      } else {
        this.reset();
      }
      throw error;
    }
  }

  private recordFailure(): void {
    this.state.failures += 1;
    if (this.state.failures >= this.failureThreshold) {
      this.state.openedAt = Date.now();
    }
  }

  private reset(): void {
    this.state.failures = 0;
    this.state.openedAt = null;
  }

  isOpen(): boolean {
    if (this.state.openedAt === null) {
      return false;
    }
    const elapsed = Date.now() - this.state.openedAt;
    if (elapsed > this.cooldownMs) {
      this.reset();
      return false;
    }
    return true;
  }
}

/**
 * True for replies that say the host is down or failing, as opposed to a
 * reply that simply has nothing for this request (4xx, and 501 "no short
 * answer" from Wolfram).
 */
export function isOutage(error: unknown): boolean {
  if (!(error instanceof ProviderUnavailableError) || error.status === undefined) {
    return true;
  }
  return error.status >= 500 && error.status !== 501;
}

/**
 * axios-backed client with one circuit breaker per host. Requests are never
 * retried; a failed call is reported once and the caller moves on. Only
 * outages count against the breaker.
 */
export class AxiosProviderHttp implements ProviderHttp {
  private readonly breakers = new Map<string, CircuitBreaker>();

  constructor(
    private readonly client: AxiosInstance = axios.create({
      headers: { "User-Agent": "answer-fusion-service/0.1" }
    }),
    private readonly breakerOptions: CircuitBreakerOptions = {}
  ) {}

  async getJson(url: string, options: RequestOptions): Promise<unknown> {
    return this.request(url, options, "json");
  }

  async getText(url: string, options: RequestOptions): Promise<string> {
    const data = await this.request(url, options, "text");
    return typeof data === "string" ? data : JSON.stringify(data);
  }

  private async request(url: string, options: RequestOptions, responseType: "json" | "text"): Promise<unknown> {
    const host = new URL(url).host.toLowerCase();
    const breaker = this.breakerFor(host);
    return breaker.exec(async () => {
      try {
        const response = await this.client.get<unknown>(url, {
          params: options.params,
          headers: options.headers,
          timeout: options.timeoutMs,
          responseType
        });
        return response.data;
      } catch (error) {
        const status = error instanceof AxiosError ? error.response?.status : undefined;
        throw new ProviderUnavailableError(host, describeHttpFailure(error), { cause: error, status });
      }
    });
  }

  private breakerFor(host: string): CircuitBreaker {
    const existing = this.breakers.get(host);
    if (existing) {
      return existing;
    }
    const breaker = new CircuitBreaker(host, { isFailure: isOutage, ...this.breakerOptions });
    this.breakers.set(host, breaker);
    return breaker;
  }
}

function describeHttpFailure(error: unknown): string {
  if (error instanceof AxiosError) {
    if (error.response) {
      return `HTTP ${error.response.status}`;
    }
    if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
      return "request timed out";
    }
    return error.code ?? error.message;
  }
  return error instanceof Error ? error.message : String(error);
}
