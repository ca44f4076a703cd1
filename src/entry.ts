#!/usr/bin/env node
/**
 * domain-sweep entry point
 */

import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { createProgram } from "./cli/program.js";
import { logger } from "./utils/logger.js";

const log = logger;

const __dirname = dirname(fileURLToPath(import.meta.url));
// Same relative location from src/ and from dist/.
const pkg = JSON.parse(readFileSync(join(__dirname, "..", "package.json"), "utf-8")) as {
  name: string;
  version: string;
};

const nodeMajor = Number.parseInt(process.versions.node.split(".")[0] ?? "0", 10);
if (Number.isNaN(nodeMajor) || nodeMajor < 20) {
  log.error(`Node.js ${process.versions.node} is not supported. Please upgrade to >= 20.0.0.`);
  process.exit(1);
}

createProgram({ version: pkg.version })
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    log.error("Unexpected failure", err);
    process.exit(1);
  });
