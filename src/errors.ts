/** Raised inside adapters and the HTTP client; adapters turn it into a null result. */
export class ProviderUnavailableError extends Error {
  readonly provider: string;

  /** HTTP status of the reply, when the provider answered at all. */
  readonly status?: number;

  constructor(provider: string, message: string, options?: { cause?: unknown; status?: number }) {
    super(message, options);
    this.name = "ProviderUnavailableError";
    this.provider = provider;
    this.status = options?.status;
  }
}

export class CircuitOpenError extends ProviderUnavailableError {
  constructor(host: string) {
    super(host, `Circuit breaker is open for ${host}`);
    this.name = "CircuitOpenError";
  }
}

/** Unexpected failure while orchestrating an answer cycle. */
export class OrchestrationFault extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "OrchestrationFault";
  }
}
