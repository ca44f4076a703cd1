/**
 * Command-line surface: flag parsing, config resolution and exit codes.
 */

import { Command, InvalidArgumentError } from "commander";
import {
  ConfigError,
  InputLoadError,
  MAX_TIMEOUT_SECONDS,
  OutputWriteError,
  runDomainCheck,
  type CheckRunOptions,
  type RunReport,
} from "../checker/index.js";
import { errorMessage } from "../checker/errors.js";
import { loadConfig } from "../config/loader.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("cli");

export interface CliIO {
  /** Plain result output (stdout) */
  print: (msg: string) => void;
  /** Fatal error output (stderr) */
  error: (msg: string) => void;
  exit: (code: number) => void;
}

export interface CliDeps {
  version: string;
  run: (options: CheckRunOptions) => Promise<RunReport>;
  io: CliIO;
}

interface CliOptions {
  file?: string;
  threads?: number;
  timeout?: number;
  config?: string;
  progressEvery?: number;
  outputDir?: string;
  dns?: string[];
}

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!/^\s*\d+\s*$/.test(value) || !Number.isSafeInteger(n) || n < 1) {
    throw new InvalidArgumentError("Expected an integer of at least 1.");
  }
  return n;
}

export function parseTimeoutSeconds(value: string): number {
  const n = Number(value);
  if (value.trim() === "" || !Number.isFinite(n) || n <= 0) {
    throw new InvalidArgumentError("Expected a positive number of seconds.");
  }
  return n;
}

export function parseServerList(value: string): string[] {
  const servers = value
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  if (servers.length === 0) {
    throw new InvalidArgumentError("Expected a comma-separated list of DNS servers.");
  }
  return servers;
}

const defaultIO: CliIO = {
  print: (msg) => process.stdout.write(`${msg}\n`),
  error: (msg) => process.stderr.write(`${msg}\n`),
  exit: (code) => process.exit(code),
};

function reportFailure(err: unknown, io: CliIO): void {
  if (err instanceof OutputWriteError) {
    io.error(`Error: ${err.message}`);
    io.error(`Printing ${err.available.length} available domain(s) to stdout instead.`);
    for (const domain of err.available) io.print(domain);
    return;
  }
  if (err instanceof InputLoadError || err instanceof ConfigError) {
    io.error(`Error: ${err.message}`);
    return;
  }
  log.error("Domain check failed", err);
  io.error(`Error: ${errorMessage(err)}`);
}

export function createProgram(deps: Partial<CliDeps> = {}): Command {
  const run = deps.run ?? runDomainCheck;
  const io = deps.io ?? defaultIO;

  const program = new Command();
  program
    .name("domain-sweep")
    .description(
      "Multi-worker domain availability checker: lists domains whose DNS lookup returns \"name not found\".",
    )
    .version(deps.version ?? "0.0.0")
    .option("-f, --file <path>", "Input file containing domains (default: domains.txt)")
    .option("-t, --threads <n>", "Number of concurrent workers (default: 8)", parsePositiveInt)
    .option(
      "-o, --timeout <seconds>",
      `Timeout in seconds for each lookup (default: 5, max: ${MAX_TIMEOUT_SECONDS})`,
      parseTimeoutSeconds,
    )
    .option("-c, --config <path>", "YAML config file (CLI flags take precedence)")
    .option("-p, --progress-every <n>", "Report progress every N lookups (default: 5% of input)", parsePositiveInt)
    .option("-d, --output-dir <dir>", "Directory for the results file (default: .)")
    .option("--dns <servers>", "Comma-separated DNS servers to query instead of the system resolvers", parseServerList)
    .action(async (options: CliOptions) => {
      try {
        const config = await loadConfig(options.config, {
          input: options.file,
          threads: options.threads,
          timeoutSeconds: options.timeout,
          progressEvery: options.progressEvery,
          outputDir: options.outputDir,
          dnsServers: options.dns,
        });

        const report = await run({
          inputFile: config.input,
          threads: config.threads,
          timeoutSeconds: config.timeoutSeconds,
          progressEvery: config.progressEvery,
          outputDir: config.outputDir,
          queueCapacity: config.queueCapacity,
          dnsServers: config.dns.servers,
        });
        if (report.rejected > 0) {
          log.info(`Skipped ${report.rejected} invalid line(s)`);
        }
      } catch (err) {
        reportFailure(err, io);
        io.exit(1);
      }
    });

  return program;
}
