/**
 * Result aggregator: the single owner of a run's counters and available set.
 *
 * `record()` runs to completion without yielding, so every update is atomic with
 * respect to the other workers on the event loop. Listeners are notified later
 * via setImmediate and never run inside `record()`. A listener that throws is
 * logged and skipped.
 */

import { createLogger } from "../utils/logger.js";
import { errorMessage } from "./errors.js";
import type { Domain, LookupOutcome, RunStatistics } from "./types.js";

export interface ResultAggregatorOptions {
  /** Number of domains that will be recorded */
  total: number;
  /** Emit progress every N recorded outcomes (default: 5% of total) */
  progressEvery?: number;
}

const log = createLogger("aggregator");

export type ProgressListener = (stats: RunStatistics) => void;
export type AvailableListener = (domain: Domain) => void;

export function defaultProgressEvery(total: number): number {
  return Math.max(1, Math.ceil(total / 20));
}

function notify(call: () => void): void {
  try {
    call();
  } catch (err) {
    log.warn(`Result listener failed: ${errorMessage(err)}`);
  }
}

export class ResultAggregator {
  private readonly stats: RunStatistics;
  private readonly available: Domain[] = [];
  private readonly progressEvery: number;
  private readonly progressListeners = new Set<ProgressListener>();
  private readonly availableListeners = new Set<AvailableListener>();

  constructor(options: ResultAggregatorOptions) {
    if (!Number.isInteger(options.total) || options.total < 0) {
      throw new RangeError(`total must be a non-negative integer, got ${options.total}`);
    }
    const every = options.progressEvery ?? defaultProgressEvery(options.total);
    this.progressEvery = Math.max(1, Math.floor(every));
    this.stats = {
      total: options.total,
      processed: 0,
      available: 0,
      taken: 0,
      errors: 0,
      timeouts: 0,
    };
  }

  /** Subscribe to progress snapshots. Returns an unsubscribe function. */
  onProgress(listener: ProgressListener): () => void {
    this.progressListeners.add(listener);
    return () => {
      this.progressListeners.delete(listener);
    };
  }

  onAvailable(listener: AvailableListener): () => void {
    this.availableListeners.add(listener);
    return () => {
      this.availableListeners.delete(listener);
    };
  }

  record(domain: Domain, outcome: LookupOutcome): void {
    if (this.stats.processed >= this.stats.total) {
      throw new Error(
        `Outcome for ${domain} exceeds the ${this.stats.total} domains of this run`,
      );
    }

    this.stats.processed += 1;
    switch (outcome.kind) {
      case "available":
        this.stats.available += 1;
        this.available.push(domain);
        break;
      case "taken":
        this.stats.taken += 1;
        break;
      case "error":
        this.stats.errors += 1;
        if (outcome.code === "timeout") this.stats.timeouts += 1;
        break;
    }

    const isAvailable = outcome.kind === "available";
    const dueProgress =
      this.stats.processed % this.progressEvery === 0 ||
      this.stats.processed === this.stats.total;
    if (!isAvailable && !dueProgress) return;

    const snapshot = dueProgress ? this.snapshot() : null;
    setImmediate(() => {
      if (isAvailable) {
        for (const listener of this.availableListeners) notify(() => listener(domain));
      }
      if (snapshot) {
        for (const listener of this.progressListeners) notify(() => listener(snapshot));
      }
    });
  }

  snapshot(): RunStatistics {
    return { ...this.stats };
  }

  availableDomains(): Domain[] {
    return [...this.available];
  }

  /** True once every expected outcome has been recorded. */
  get drained(): boolean {
    return this.stats.processed === this.stats.total;
  }
}
