/**
 * Config loader with environment variable expansion
 *
 * Precedence: CLI overrides > YAML config file > schema defaults.
 */

import { readFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { parse } from "yaml";
import { ZodError } from "zod";
import { ConfigError, errorMessage } from "../checker/errors.js";
import { createLogger } from "../utils/logger.js";
import { expandEnvVarsDeep } from "./expand-env.js";
import { checkerConfigSchema, type CheckerConfig } from "./schema.js";

const log = createLogger("config");

/** Values given on the command line; undefined means "not given". */
export interface ConfigOverrides {
  input?: string;
  threads?: number;
  timeoutSeconds?: number;
  progressEvery?: number;
  outputDir?: string;
  dnsServers?: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function expandHome(path: string): string {
  const home = process.env.HOME ?? process.env.USERPROFILE ?? ".";
  if (path === "~") return home;
  return path.startsWith("~/") ? resolve(home, path.slice(2)) : path;
}

/**
 * Read a YAML config file and expand `${VAR}` references.
 * Relative `input` / `outputDir` paths are resolved against the file's directory.
 */
export async function loadConfigFile(
  path: string,
  env: Record<string, string | undefined> = process.env,
): Promise<Record<string, unknown>> {
  const expandedPath = expandHome(path);
  log.info(`Loading config from ${expandedPath}`);

  let content: string;
  try {
    content = await readFile(expandedPath, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      throw new ConfigError(`Config file not found: ${expandedPath}`);
    }
    throw new ConfigError(`Config file unreadable: ${expandedPath}: ${errorMessage(err)}`);
  }

  let parsed: unknown;
  try {
    parsed = parse(content);
  } catch (err) {
    throw new ConfigError(`Config file is not valid YAML: ${expandedPath}: ${errorMessage(err)}`);
  }
  // An empty file parses to null.
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file must contain a mapping: ${expandedPath}`);
  }

  const expanded = expandEnvVarsDeep(parsed, env);
  if (!isRecord(expanded)) return {};

  const configDir = dirname(resolve(expandedPath));
  for (const key of ["input", "outputDir"]) {
    const value = expanded[key];
    if (typeof value === "string" && value) expanded[key] = resolve(configDir, expandHome(value));
  }
  return expanded;
}

export function applyOverrides(
  raw: Record<string, unknown>,
  overrides: ConfigOverrides,
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...raw };
  const { dnsServers, ...scalars } = overrides;
  for (const [key, value] of Object.entries(scalars)) {
    if (value !== undefined) merged[key] = value;
  }
  if (dnsServers !== undefined) {
    const dns = isRecord(raw.dns) ? raw.dns : {};
    merged.dns = { ...dns, servers: dnsServers };
  }
  return merged;
}

export function parseConfig(raw: unknown): CheckerConfig {
  try {
    return checkerConfigSchema.parse(raw);
  } catch (err) {
    if (err instanceof ZodError) {
      throw new ConfigError(formatZodError(err));
    }
    throw err;
  }
}

export async function loadConfig(
  configPath: string | undefined,
  overrides: ConfigOverrides = {},
): Promise<CheckerConfig> {
  const raw = configPath ? await loadConfigFile(configPath) : {};
  const merged = applyOverrides(raw, overrides);
  const config = parseConfig(merged);
  // The schema clamps silently; warn for flag and file values alike.
  const requestedTimeout = Number(merged.timeoutSeconds);
  if (requestedTimeout > config.timeoutSeconds) {
    log.warn(`Timeout ${requestedTimeout}s exceeds the maximum; using ${config.timeoutSeconds}s`);
  }
  log.debug(
    `Effective config: input=${config.input} threads=${config.threads} timeoutSeconds=${config.timeoutSeconds} outputDir=${config.outputDir}`,
  );
  return config;
}

export function formatZodError(error: ZodError): string {
  const lines = error.errors.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `- ${path}: ${issue.message}`;
  });
  return `Config validation failed:\n${lines.join("\n")}`;
}
