import { Logger, silentLogger } from "./logger.js";

// ============================================
// Rate Limiting
// ============================================
// Two layers:
//   1. sliding 60s window: once (maxPerMinute - margin) requests are in the
//      window, wait for the oldest one to fall out
//   2. fixed spacing after every admission
// Single caller; concurrent admit() calls are not coordinated beyond FIFO.

const WINDOW_MS = 60_000;

export interface RateLimiterOptions {
  maxPerMinute: number;
  margin: number;
  spacingMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class RateLimiter {
  private window: number[] = [];

  private readonly ceiling: number;
  private readonly spacingMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  constructor(options: RateLimiterOptions) {
    this.ceiling = Math.max(1, options.maxPerMinute - options.margin);
    this.spacingMs = options.spacingMs;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleep;
    this.logger = options.logger ?? silentLogger;
  }

  /** Requests admitted in the trailing window, oldest first */
  get admissions(): readonly number[] {
    return this.window;
  }

  /** Blocks until one more request may be sent, then records it */
  async admit(): Promise<void> {
    this.prune();

    while (this.window.length >= this.ceiling) {
      const waitMs = WINDOW_MS - (this.now() - this.window[0]);
      if (waitMs > 0) {
        this.logger.info(`Rate limit approaching, waiting ${(waitMs / 1000).toFixed(1)} seconds...`);
        await this.sleep(waitMs);
      }
      this.prune();
    }

    if (this.spacingMs > 0) await this.sleep(this.spacingMs);
    this.window.push(this.now());
  }

  private prune(): void {
    const current = this.now();
    this.window = this.window.filter((ts) => current - ts < WINDOW_MS);
  }
}
