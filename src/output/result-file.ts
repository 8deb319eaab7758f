import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { AllocationAlgorithm } from "../types.js";
import { OUTPUT_EXTENSIONS, type OutputFormat } from "./format.js";

export interface ResultFileNameOptions {
  inputPath: string;
  utilization: number;
  capacity?: number;
  algorithm: AllocationAlgorithm;
  format: OutputFormat;
  now: Date;
}

const pad = (value: number, width = 2): string => String(value).padStart(width, "0");

/**
 * Local timestamp as `YYYYMMDD_HHMMSS`.
 */
export function formatTimestamp(date: Date): string {
  return (
    `${pad(date.getFullYear(), 4)}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Utilization with two decimals and trailing zeros removed (`1` not `1.00`,
 * `0.85`, `0.9`).
 */
export function formatUtilization(utilization: number): string {
  return utilization.toFixed(2).replace(/\.?0+$/, "");
}

/**
 * Name of the file a run's output is saved under:
 * `{timestamp}_{input}_util{u}[_cap{K}[_{algorithm}]]_RESULT.{ext}`.
 *
 * The algorithm is only named when a capacity is set and it is not the
 * default `greedy`.
 *
 * @example
 * ```ts
 * resultFileName({
 *   inputPath: "input/calls.csv",
 *   utilization: 0.85,
 *   capacity: 40,
 *   algorithm: "shift",
 *   format: "json",
 *   now: new Date(2026, 2, 9, 14, 5, 0),
 * });
 * // "20260309_140500_calls_util0.85_cap40_shift_RESULT.json"
 * ```
 */
export function resultFileName(options: ResultFileNameOptions): string {
  const inputName = path.parse(options.inputPath).name;
  const parts = [
    formatTimestamp(options.now),
    inputName,
    `util${formatUtilization(options.utilization)}`,
  ];
  if (options.capacity !== undefined) {
    parts.push(`cap${options.capacity}`);
    if (options.algorithm !== "greedy") {
      parts.push(options.algorithm);
    }
  }
  return `${parts.join("_")}_RESULT.${OUTPUT_EXTENSIONS[options.format]}`;
}

/**
 * Writes `content` under `directory` (created if needed) and returns the
 * path written.
 */
export async function writeResultFile(
  content: string,
  directory: string,
  options: ResultFileNameOptions,
): Promise<string> {
  await mkdir(directory, { recursive: true });
  const filePath = path.join(directory, resultFileName(options));
  await writeFile(filePath, content, "utf-8");
  return filePath;
}
