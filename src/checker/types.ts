// Core types for a domain check run

export type Domain = string;

export type ValidationResult =
  | { valid: true; domain: Domain }
  | { valid: false; line: string; reason: "empty" | "syntax" };

export type LookupErrorCode = "timeout" | "network";

export type LookupOutcome =
  | { kind: "available" }
  | { kind: "taken"; addresses: string[] }
  | { kind: "error"; code: LookupErrorCode; reason: string };

export interface RunStatistics {
  /** Domains enqueued for lookup */
  total: number;
  processed: number;
  available: number;
  taken: number;
  /** All error outcomes, timeouts included */
  errors: number;
  timeouts: number;
}

export type RunPhase =
  | "idle"
  | "loading"
  | "running"
  | "draining"
  | "reporting"
  | "done"
  | "failed";

export interface DomainResolver {
  /**
   * Resolve one domain within `timeoutMs`.
   * Implementations report failures as `error` outcomes instead of throwing.
   */
  lookup(domain: Domain, timeoutMs: number): Promise<LookupOutcome>;
}

export interface RunReport {
  outputFile: string;
  startedAt: Date;
  stats: RunStatistics;
  available: Domain[];
  /** Non-empty input lines that failed validation */
  rejected: number;
}
