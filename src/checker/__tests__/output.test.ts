import { describe, it, expect } from "vitest";
import { formatTimestamp, outputFileName, renderReport } from "../output.js";

const startedAt = new Date(2026, 9, 18, 7, 5, 9);

describe("output naming", () => {
  it("names the file after the local start time", () => {
    expect(outputFileName(startedAt)).toBe("available_20261018_070509.txt");
  });

  it("formats header timestamps", () => {
    expect(formatTimestamp(startedAt)).toBe("2026-10-18 07:05:09");
  });
});

describe("renderReport", () => {
  it("writes the run header followed by one domain per line", () => {
    const text = renderReport({
      startedAt,
      inputFile: "domains.txt",
      stats: { total: 4, processed: 4, available: 2, taken: 1, errors: 1, timeouts: 1 },
      available: ["b.com", "a.com"],
    });

    expect(text).toBe(
      "# Available domains - 2026-10-18 07:05:09\n" +
        "# Input file: domains.txt\n" +
        "# checked=4 available=2 errors=1\n" +
        "\n" +
        "b.com\n" +
        "a.com\n",
    );
  });
});
