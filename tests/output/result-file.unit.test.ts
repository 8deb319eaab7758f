import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import {
  formatTimestamp,
  formatUtilization,
  resultFileName,
  writeResultFile,
} from "../../src/output/result-file.js";

const now = new Date(2026, 2, 9, 14, 5, 0);

describe("formatTimestamp", () => {
  it("formats local time as YYYYMMDD_HHMMSS", () => {
    expect(formatTimestamp(now)).toBe("20260309_140500");
    expect(formatTimestamp(new Date(2026, 11, 31, 23, 59, 58))).toBe("20261231_235958");
  });
});

describe("formatUtilization", () => {
  it("drops trailing zeros", () => {
    expect(formatUtilization(1)).toBe("1");
    expect(formatUtilization(0.85)).toBe("0.85");
    expect(formatUtilization(0.9)).toBe("0.9");
    expect(formatUtilization(10)).toBe("10");
  });
});

describe("resultFileName", () => {
  it("names an uncapped run", () => {
    expect(
      resultFileName({ inputPath: "input/calls.csv", utilization: 1, algorithm: "greedy", format: "text", now }),
    ).toBe("20260309_140500_calls_util1_RESULT.txt");
  });

  it("adds the capacity, and the algorithm unless greedy", () => {
    const base = { inputPath: "/data/calls.csv", utilization: 0.85, capacity: 40, now } as const;

    expect(resultFileName({ ...base, algorithm: "greedy", format: "csv" })).toBe(
      "20260309_140500_calls_util0.85_cap40_RESULT.csv",
    );
    expect(resultFileName({ ...base, algorithm: "shift", format: "json" })).toBe(
      "20260309_140500_calls_util0.85_cap40_shift_RESULT.json",
    );
  });

  it("does not name the algorithm without a capacity", () => {
    expect(
      resultFileName({ inputPath: "calls.csv", utilization: 1, algorithm: "shift", format: "text", now }),
    ).toBe("20260309_140500_calls_util1_RESULT.txt");
  });
});

describe("writeResultFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "callplan-result-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("creates the directory and writes the content", async () => {
    const target = path.join(dir, "nested", "results");

    const written = await writeResultFile("09:00 : total=1 ; Acme=1", target, {
      inputPath: "calls.csv",
      utilization: 1,
      algorithm: "greedy",
      format: "text",
      now,
    });

    expect(written).toBe(path.join(target, "20260309_140500_calls_util1_RESULT.txt"));
    expect(await readFile(written, "utf-8")).toBe("09:00 : total=1 ; Acme=1");
  });
});
