/**
 * Run coordinator
 *
 * idle → loading → running → draining → reporting → done
 *
 * Any fatal error moves the run to "failed". Load failures happen before the
 * queue or any worker exists, and no output file is written for them.
 */

import { setImmediate as flushImmediates } from "node:timers/promises";
import { createLogger } from "../utils/logger.js";
import { ResultAggregator } from "./aggregator.js";
import { loadDomains } from "./input.js";
import { writeReport } from "./output.js";
import { runWorkerPool } from "./pool.js";
import { AsyncQueue } from "./queue.js";
import { clampTimeoutSeconds, createDnsResolver } from "./resolver.js";
import type { Domain, DomainResolver, RunPhase, RunReport, RunStatistics } from "./types.js";

const log = createLogger("checker");

export interface CheckRunOptions {
  inputFile: string;
  threads: number;
  /** Per-lookup timeout, clamped to MAX_TIMEOUT_SECONDS */
  timeoutSeconds: number;
  /** Directory for the results file (default: cwd) */
  outputDir?: string;
  /** Progress cadence in recorded outcomes (default: 5% of total) */
  progressEvery?: number;
  /** Bound on queued-but-unclaimed domains (default: unbounded) */
  queueCapacity?: number;
  /** Custom DNS servers for the default resolver */
  dnsServers?: string[];
  /** Resolver override, used instead of DNS */
  resolver?: DomainResolver;
  /** Clock override for the run start time */
  now?: () => Date;
}

function formatProgress(stats: RunStatistics): string {
  const pct = stats.total > 0 ? (stats.processed / stats.total) * 100 : 0;
  return (
    `Progress: ${stats.processed}/${stats.total} domains (${pct.toFixed(1)}%)` +
    ` - Found ${stats.available} available, ${stats.errors} errors`
  );
}

export class CheckRun {
  private currentPhase: RunPhase = "idle";
  private readonly options: CheckRunOptions;

  constructor(options: CheckRunOptions) {
    this.options = options;
  }

  get phase(): RunPhase {
    return this.currentPhase;
  }

  private transition(next: RunPhase): void {
    log.debug(`Run phase ${this.currentPhase} -> ${next}`);
    this.currentPhase = next;
  }

  async execute(): Promise<RunReport> {
    if (this.currentPhase !== "idle") {
      throw new Error(`Run already started (phase: ${this.currentPhase})`);
    }
    try {
      return await this.executePhases();
    } catch (err) {
      this.transition("failed");
      throw err;
    }
  }

  private async executePhases(): Promise<RunReport> {
    const { options } = this;
    const startedAt = (options.now ?? (() => new Date()))();
    const timeoutSeconds = clampTimeoutSeconds(options.timeoutSeconds);
    const outputDir = options.outputDir ?? ".";

    this.transition("loading");
    const { domains, rejected } = await loadDomains(options.inputFile);

    this.transition("running");
    const resolver = options.resolver ?? createDnsResolver({ servers: options.dnsServers });
    const aggregator = new ResultAggregator({
      total: domains.length,
      progressEvery: options.progressEvery,
    });
    const unsubscribe = [
      aggregator.onProgress((stats) => log.info(formatProgress(stats))),
      aggregator.onAvailable((domain) => log.info(`Available: ${domain}`)),
    ];

    log.info(
      `Starting domain availability check with ${options.threads} workers (timeout ${timeoutSeconds}s)`,
    );

    try {
      const queue = new AsyncQueue<Domain>(options.queueCapacity);
      const produce = async () => {
        for (const domain of domains) await queue.enqueue(domain);
        queue.close();
      };
      await Promise.all([
        produce(),
        runWorkerPool({
          queue,
          resolver,
          aggregator,
          threads: options.threads,
          timeoutMs: timeoutSeconds * 1000,
        }),
      ]);

      this.transition("draining");
      if (!aggregator.drained) {
        const { processed, total } = aggregator.snapshot();
        throw new Error(`Pool stopped with ${total - processed} domain(s) unrecorded`);
      }
      // Deliver the progress notifications queued by the last records.
      await flushImmediates();
    } finally {
      for (const off of unsubscribe) off();
    }

    this.transition("reporting");
    const stats = aggregator.snapshot();
    const available = aggregator.availableDomains();
    const outputFile = await writeReport(outputDir, {
      startedAt,
      inputFile: options.inputFile,
      stats,
      available,
    });

    log.info(`Completed! Checked ${stats.processed} domains`);
    log.info(`Found ${stats.available} available domains`);
    if (stats.errors > 0) {
      log.warn(
        `Lookup errors: ${stats.errors} (timeouts=${stats.timeouts}, other=${stats.errors - stats.timeouts})`,
      );
    }
    log.info(`Results saved to ${outputFile}`);

    this.transition("done");
    return { outputFile, startedAt, stats, available, rejected: rejected.length };
  }
}

export async function runDomainCheck(options: CheckRunOptions): Promise<RunReport> {
  return new CheckRun(options).execute();
}
