import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { CommanderError } from "commander";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { stringify } from "yaml";
import { InputLoadError, OutputWriteError } from "../../checker/errors.js";
import type { CheckRunOptions } from "../../checker/coordinator.js";
import type { RunReport } from "../../checker/types.js";
import { createProgram, parsePositiveInt, parseServerList, parseTimeoutSeconds } from "../program.js";

function okReport(): RunReport {
  return {
    outputFile: "available_20260102_030405.txt",
    startedAt: new Date(2026, 0, 2, 3, 4, 5),
    stats: { total: 1, processed: 1, available: 0, taken: 1, errors: 0, timeouts: 0 },
    available: [],
    rejected: 0,
  };
}

function setup(run = vi.fn(async (_options: CheckRunOptions) => okReport())) {
  const io = { print: vi.fn(), error: vi.fn(), exit: vi.fn() };
  const out: string[] = [];
  const err: string[] = [];
  const program = createProgram({ version: "1.2.3", run, io })
    .exitOverride()
    .configureOutput({
      writeOut: (s) => out.push(s),
      writeErr: (s) => err.push(s),
    });
  const parse = (...args: string[]) => program.parseAsync(["node", "domain-sweep", ...args]);
  return { run, io, out, err, parse };
}

describe("option parsers", () => {
  it("accepts positive integers only", () => {
    expect(parsePositiveInt("8")).toBe(8);
    for (const bad of ["0", "-2", "1.5", "abc", ""]) {
      expect(() => parsePositiveInt(bad)).toThrow("Expected an integer of at least 1.");
    }
  });

  it("accepts positive second values", () => {
    expect(parseTimeoutSeconds("2.5")).toBe(2.5);
    for (const bad of ["0", "-1", "soon", " "]) {
      expect(() => parseTimeoutSeconds(bad)).toThrow("Expected a positive number of seconds.");
    }
  });

  it("splits server lists", () => {
    expect(parseServerList(" 1.1.1.1, 8.8.8.8 ,")).toEqual(["1.1.1.1", "8.8.8.8"]);
    expect(() => parseServerList(" , ")).toThrow("Expected a comma-separated list of DNS servers.");
  });
});

describe("createProgram", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "domain-sweep-cli-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("runs with the documented defaults", async () => {
    const { run, io, parse } = setup();
    await parse();

    expect(run).toHaveBeenCalledWith({
      inputFile: "domains.txt",
      threads: 8,
      timeoutSeconds: 5,
      progressEvery: undefined,
      outputDir: ".",
      queueCapacity: undefined,
      dnsServers: [],
    });
    expect(io.exit).not.toHaveBeenCalled();
  });

  it("passes flags through and clamps the timeout", async () => {
    const { run, parse } = setup();
    await parse("-f", "list.txt", "-t", "4", "-o", "60", "-p", "10", "-d", "out", "--dns", "1.1.1.1,8.8.8.8");

    expect(run).toHaveBeenCalledWith({
      inputFile: "list.txt",
      threads: 4,
      timeoutSeconds: 25,
      progressEvery: 10,
      outputDir: "out",
      queueCapacity: undefined,
      dnsServers: ["1.1.1.1", "8.8.8.8"],
    });
  });

  it("reads a config file and lets flags override it", async () => {
    const configPath = join(dir, "sweep.yaml");
    await writeFile(configPath, stringify({ input: "candidates.txt", threads: 3, queueCapacity: 100 }), "utf-8");
    const { run, parse } = setup();

    await parse("--config", configPath, "--threads", "6");

    expect(run).toHaveBeenCalledWith({
      inputFile: join(dir, "candidates.txt"),
      threads: 6,
      timeoutSeconds: 5,
      progressEvery: undefined,
      outputDir: ".",
      queueCapacity: 100,
      dnsServers: [],
    });
  });

  it("exits non-zero on an invalid thread count without running", async () => {
    const { run, err, parse } = setup();

    await expect(parse("-t", "0")).rejects.toMatchObject({
      code: "commander.invalidArgument",
      exitCode: 1,
    });
    expect(run).not.toHaveBeenCalled();
    expect(err.join("")).toContain("Expected an integer of at least 1.");
  });

  it("exits 1 on a DNS server that is not an IP address without running", async () => {
    const { run, io, parse } = setup();

    await parse("--dns", "not-an-ip");

    expect(run).not.toHaveBeenCalled();
    expect(io.error).toHaveBeenCalledWith(
      "Error: Config validation failed:\n- dns.servers.0: not an IP address: not-an-ip",
    );
    expect(io.exit).toHaveBeenCalledWith(1);
  });

  it("prints usage and exits 0 for --help", async () => {
    const { run, out, parse } = setup();

    const failure = parse("--help");
    await expect(failure).rejects.toBeInstanceOf(CommanderError);
    await expect(failure).rejects.toMatchObject({ code: "commander.helpDisplayed", exitCode: 0 });
    expect(out.join("")).toContain("-t, --threads <n>");
    expect(run).not.toHaveBeenCalled();
  });

  it("reports load failures on stderr and exits 1", async () => {
    const run = vi.fn(async (_options: CheckRunOptions): Promise<RunReport> => {
      throw new InputLoadError("No valid domains found in empty.txt", "NO_VALID_DOMAINS", "empty.txt");
    });
    const { io, parse } = setup(run);

    await parse("-f", "empty.txt");

    expect(io.error).toHaveBeenCalledWith("Error: No valid domains found in empty.txt");
    expect(io.exit).toHaveBeenCalledWith(1);
  });

  it("prints computed results when the output file cannot be written", async () => {
    const run = vi.fn(async (_options: CheckRunOptions): Promise<RunReport> => {
      throw new OutputWriteError("Failed to write results to /ro/x.txt: EACCES", "/ro/x.txt", ["free.com"]);
    });
    const { io, parse } = setup(run);

    await parse();

    expect(io.error).toHaveBeenCalledWith("Error: Failed to write results to /ro/x.txt: EACCES");
    expect(io.print).toHaveBeenCalledWith("free.com");
    expect(io.exit).toHaveBeenCalledWith(1);
  });

  it("exits 1 on an invalid config file", async () => {
    const configPath = join(dir, "bad.yaml");
    await writeFile(configPath, stringify({ threads: 0 }), "utf-8");
    const { run, io, parse } = setup();

    await parse("-c", configPath);

    expect(run).not.toHaveBeenCalled();
    expect(io.error).toHaveBeenCalledWith(
      "Error: Config validation failed:\n- threads: threads must be at least 1",
    );
    expect(io.exit).toHaveBeenCalledWith(1);
  });
});
