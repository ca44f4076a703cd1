import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { OutputWriteError, errorMessage } from "./errors.js";
import type { Domain, RunStatistics } from "./types.js";

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

function dateParts(date: Date) {
  return {
    date: `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`,
    time: `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`,
  };
}

/** `available_YYYYMMDD_HHMMSS.txt`, local time. */
export function outputFileName(startedAt: Date): string {
  const { date, time } = dateParts(startedAt);
  return `available_${date}_${time}.txt`;
}

/** `YYYY-MM-DD HH:MM:SS`, local time. */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export interface ReportContent {
  startedAt: Date;
  inputFile: string;
  stats: RunStatistics;
  available: readonly Domain[];
}

export function renderReport(report: ReportContent): string {
  const { stats } = report;
  const header = [
    `# Available domains - ${formatTimestamp(report.startedAt)}`,
    `# Input file: ${report.inputFile}`,
    `# checked=${stats.processed} available=${stats.available} errors=${stats.errors}`,
    "",
  ];
  return [...header, ...report.available].join("\n") + "\n";
}

/** Write the report file into `outputDir` and return its path. */
export async function writeReport(outputDir: string, report: ReportContent): Promise<string> {
  const path = join(outputDir, outputFileName(report.startedAt));
  try {
    await mkdir(outputDir, { recursive: true });
    await writeFile(path, renderReport(report), "utf-8");
  } catch (err) {
    throw new OutputWriteError(
      `Failed to write results to ${path}: ${errorMessage(err)}`,
      path,
      report.available,
    );
  }
  return path;
}
