/**
 * Configuration schema (Zod)
 */

import { z } from "zod";
import { clampTimeoutSeconds, isDnsServerAddress } from "../checker/resolver.js";

/** Accept numeric strings, which is what `${VAR}` expansion yields in YAML. */
function numeric<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => {
    if (typeof value !== "string" || value.trim() === "") return value;
    const n = Number(value);
    return Number.isNaN(n) ? value : n;
  }, schema);
}

export const dnsConfigSchema = z.object({
  /** Resolver addresses ("1.1.1.1", "[2606:4700::1111]:53"); empty = system resolvers */
  servers: z
    .array(
      z
        .string()
        .min(1)
        .refine(isDnsServerAddress, (value) => ({ message: `not an IP address: ${value}` })),
    )
    .default([]),
});

export const checkerConfigSchema = z.object({
  /** Input file, one domain per line */
  input: z.string().min(1).default("domains.txt"),
  /** Concurrent lookup workers */
  threads: numeric(z.number().int().min(1, "threads must be at least 1")).default(8),
  /** Per-lookup timeout; values above the maximum are clamped, not rejected */
  timeoutSeconds: numeric(z.number().positive("timeoutSeconds must be positive"))
    .default(5)
    .transform(clampTimeoutSeconds),
  /** Progress line every N recorded lookups (default: 5% of the input) */
  progressEvery: numeric(z.number().int().positive()).optional(),
  /** Where available_<date>_<time>.txt is written */
  outputDir: z.string().min(1).default("."),
  /** Bound on domains buffered ahead of the workers (default: unbounded) */
  queueCapacity: numeric(z.number().int().positive()).optional(),
  dns: dnsConfigSchema.default({}),
});

export type CheckerConfig = z.infer<typeof checkerConfigSchema>;
