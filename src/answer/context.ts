export interface Exchange {
  question: string;
  answer: string | null;
  source: string | null;
  at: Date;
}

/** Fixed-capacity ring of the most recent exchanges. */
export class ConversationContext {
  private readonly buffer: Array<Exchange | undefined>;

  private next = 0;

  private count = 0;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError("Context capacity must be a positive integer");
    }
    this.buffer = new Array<Exchange | undefined>(capacity).fill(undefined);
  }

  push(exchange: Exchange): void {
    this.buffer[this.next] = exchange;
    this.next = (this.next + 1) % this.capacity;
    this.count = Math.min(this.count + 1, this.capacity);
  }

  /** Oldest first. */
  recent(): Exchange[] {
    const start = this.count < this.capacity ? 0 : this.next;
    const ordered: Exchange[] = [];
    for (let offset = 0; offset < this.count; offset += 1) {
      const exchange = this.buffer[(start + offset) % this.capacity];
      if (exchange) ordered.push(exchange);
    }
    return ordered;
  }

  clear(): void {
    this.buffer.fill(undefined);
    this.next = 0;
    this.count = 0;
  }
}
