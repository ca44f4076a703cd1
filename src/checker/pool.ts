/**
 * Worker pool: N async workers draining one shared queue.
 */

import { createLogger } from "../utils/logger.js";
import type { ResultAggregator } from "./aggregator.js";
import { errorMessage } from "./errors.js";
import type { AsyncQueue } from "./queue.js";
import type { Domain, DomainResolver, LookupOutcome } from "./types.js";

const log = createLogger("pool");

export interface WorkerPoolOptions {
  queue: AsyncQueue<Domain>;
  resolver: DomainResolver;
  aggregator: ResultAggregator;
  /** Number of concurrent workers (minimum 1) */
  threads: number;
  timeoutMs: number;
}

async function lookupSafely(
  resolver: DomainResolver,
  domain: Domain,
  timeoutMs: number,
): Promise<LookupOutcome> {
  try {
    return await resolver.lookup(domain, timeoutMs);
  } catch (err) {
    // A throwing resolver only costs this one domain.
    return { kind: "error", code: "network", reason: errorMessage(err) };
  }
}

async function runWorker(id: number, options: WorkerPoolOptions): Promise<number> {
  const { queue, resolver, aggregator, timeoutMs } = options;
  let handled = 0;

  log.debug(`Worker ${id} started`);
  for await (const domain of queue) {
    const outcome = await lookupSafely(resolver, domain, timeoutMs);
    aggregator.record(domain, outcome);
    handled += 1;
  }
  log.debug(`Worker ${id} finished after ${handled} domain(s)`);
  return handled;
}

/**
 * Run the pool until the queue is closed and drained.
 * Resolves with the number of domains each worker handled.
 */
export async function runWorkerPool(options: WorkerPoolOptions): Promise<number[]> {
  const threads = Number.isFinite(options.threads) ? Math.max(1, Math.floor(options.threads)) : 1;
  const workers = Array.from({ length: threads }, (_, id) => runWorker(id, options));
  return Promise.all(workers);
}
