import { readFile } from "node:fs/promises";
import { createLogger } from "../utils/logger.js";
import { InputLoadError, errorMessage } from "./errors.js";
import type { Domain } from "./types.js";
import { validateDomain } from "./validator.js";

const log = createLogger("input");

export interface LoadedDomains {
  domains: Domain[];
  /** Non-empty lines that failed validation */
  rejected: string[];
}

/** Split file content into lines and keep the syntactically valid domains, in file order. */
export function parseDomainLines(content: string): LoadedDomains {
  const domains: Domain[] = [];
  const rejected: string[] = [];

  for (const line of content.split(/\r?\n/)) {
    const result = validateDomain(line);
    if (result.valid) {
      domains.push(result.domain);
    } else if (result.reason === "syntax") {
      rejected.push(line.trim());
    }
  }
  return { domains, rejected };
}

export async function loadDomains(path: string): Promise<LoadedDomains> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      throw new InputLoadError(`Input file not found: ${path}`, "INPUT_NOT_FOUND", path);
    }
    throw new InputLoadError(
      `Error loading domains from ${path}: ${errorMessage(err)}`,
      "INPUT_UNREADABLE",
      path,
    );
  }

  const loaded = parseDomainLines(content);
  for (const line of loaded.rejected) {
    log.warn(`Skipping invalid domain: ${line}`);
  }
  if (loaded.domains.length === 0) {
    throw new InputLoadError(`No valid domains found in ${path}`, "NO_VALID_DOMAINS", path);
  }

  log.info(`Loaded ${loaded.domains.length} domains for checking`);
  return loaded;
}
