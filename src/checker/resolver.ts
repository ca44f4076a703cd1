/**
 * DNS-backed domain resolver.
 *
 * One lookup is one A-record query on its own `node:dns` Resolver, so a
 * deadline can cancel exactly that query without touching other workers.
 */

import { Resolver } from "node:dns/promises";
import ipaddr from "ipaddr.js";
import { createLogger } from "../utils/logger.js";
import { ConfigError, ResolutionTimeoutError, errorMessage } from "./errors.js";
import type { DomainResolver, LookupOutcome } from "./types.js";

const log = createLogger("resolver");

export const MAX_TIMEOUT_SECONDS = 25;

/** DNS error codes that mean "no such name" (NXDOMAIN). */
const NOT_FOUND_CODES = new Set(["ENOTFOUND"]);
/** The name exists but carries no A record. */
const NO_DATA_CODES = new Set(["ENODATA"]);

/** Subset of `node:dns/promises` Resolver used per lookup. */
export interface DnsBackend {
  resolve4(hostname: string): Promise<string[]>;
  cancel(): void;
  setServers(servers: string[]): void;
}

export interface DnsResolverOptions {
  /** Resolver addresses, e.g. ["1.1.1.1", "8.8.8.8:53"]. Defaults to the system resolvers. */
  servers?: string[];
  /** Test seam: builds the backend for one lookup. */
  createBackend?: (timeoutMs: number) => DnsBackend;
}

function isPort(value: string | undefined): boolean {
  if (value === undefined) return true;
  const port = Number(value);
  return /^\d{1,5}$/.test(value) && port >= 1 && port <= 65535;
}

/**
 * Server address forms `Resolver#setServers` takes: "1.1.1.1", "1.1.1.1:53",
 * "2606:4700::1111" and "[2606:4700::1111]:53".
 */
export function isDnsServerAddress(value: string): boolean {
  const bracketed = /^\[([^\]]+)\](?::([^:]*))?$/.exec(value);
  if (bracketed) return ipaddr.IPv6.isValid(bracketed[1] ?? "") && isPort(bracketed[2]);
  if (ipaddr.IPv6.isValid(value)) return true;
  const [host = "", port, ...rest] = value.split(":");
  return rest.length === 0 && ipaddr.IPv4.isValidFourPartDecimal(host) && isPort(port);
}

export function clampTimeoutSeconds(seconds: number): number {
  return Math.min(seconds, MAX_TIMEOUT_SECONDS);
}

/**
 * Race `task` against a hard deadline. On expiry `onTimeout` runs (to cancel the
 * underlying operation) and the returned promise rejects with ResolutionTimeoutError.
 */
export async function withDeadline<T>(
  task: Promise<T>,
  domain: string,
  timeoutMs: number,
  onTimeout: () => void,
): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;
  let timeoutError: ResolutionTimeoutError | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      timeoutError = new ResolutionTimeoutError(domain, timeoutMs);
      reject(timeoutError);
      onTimeout();
    }, timeoutMs);
  });

  try {
    return await Promise.race([task, deadline]);
  } catch (err) {
    // Cancelling rejects `task` too; past the deadline the timeout is the outcome.
    throw timeoutError ?? err;
  } finally {
    clearTimeout(timeoutId);
  }
}

function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/** Map a failed lookup to its outcome. Only NXDOMAIN counts as available. */
export function classifyLookupError(err: unknown): LookupOutcome {
  if (err instanceof ResolutionTimeoutError) {
    return { kind: "error", code: "timeout", reason: err.message };
  }
  const code = errorCode(err);
  if (code && NOT_FOUND_CODES.has(code)) return { kind: "available" };
  if (code && NO_DATA_CODES.has(code)) return { kind: "taken", addresses: [] };
  return {
    kind: "error",
    code: "network",
    reason: code ? `${code}: ${errorMessage(err)}` : errorMessage(err),
  };
}

function defaultBackend(timeoutMs: number): DnsBackend {
  // c-ares retries internally; one try keeps the deadline meaningful.
  return new Resolver({ timeout: timeoutMs, tries: 1 });
}

export function createDnsResolver(options: DnsResolverOptions = {}): DomainResolver {
  const createBackend = options.createBackend ?? defaultBackend;
  const servers = options.servers ?? [];
  const invalid = servers.filter((server) => !isDnsServerAddress(server));
  if (invalid.length > 0) {
    throw new ConfigError(`Invalid DNS server address: ${invalid.join(", ")}`);
  }

  return {
    async lookup(domain: string, timeoutMs: number): Promise<LookupOutcome> {
      const backend = createBackend(timeoutMs);

      try {
        if (servers.length > 0) backend.setServers(servers);
        const addresses = await withDeadline(backend.resolve4(domain), domain, timeoutMs, () =>
          backend.cancel(),
        );
        return { kind: "taken", addresses };
      } catch (err) {
        const outcome = classifyLookupError(err);
        if (outcome.kind === "error") {
          log.debug(`Lookup failed for ${domain}: ${outcome.reason}`);
        }
        return outcome;
      }
    },
  };
}
