/**
 * Public surface of the checker module.
 */
export { CheckRun, runDomainCheck, type CheckRunOptions } from "./coordinator.js";
export { ResultAggregator, defaultProgressEvery, type ResultAggregatorOptions } from "./aggregator.js";
export { AsyncQueue, type QueueResult } from "./queue.js";
export { runWorkerPool, type WorkerPoolOptions } from "./pool.js";
export {
  createDnsResolver,
  classifyLookupError,
  clampTimeoutSeconds,
  withDeadline,
  MAX_TIMEOUT_SECONDS,
  type DnsBackend,
  type DnsResolverOptions,
} from "./resolver.js";
export { validateDomain, isValidDomain } from "./validator.js";
export { loadDomains, parseDomainLines, type LoadedDomains } from "./input.js";
export { writeReport, renderReport, outputFileName, formatTimestamp } from "./output.js";
export {
  InputLoadError,
  OutputWriteError,
  ConfigError,
  ResolutionTimeoutError,
  QueueClosedError,
} from "./errors.js";
export type * from "./types.js";
