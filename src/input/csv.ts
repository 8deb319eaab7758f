import { parse } from "csv-parse/sync";
import * as z from "zod";
import { InputParseError } from "../errors.js";
import {
  CustomerPrioritySchema,
  DEFAULT_DAY,
  type CustomerRequirement,
  type DayConfig,
} from "../types.js";
import { parseEndHour, parseHour } from "./time.js";

/**
 * Header names of the requirements CSV. Time columns carry the zone suffix
 * of the day (`StartTimePT`, `EndTimePT` by default).
 */
export function requirementColumns(day: DayConfig = DEFAULT_DAY) {
  return {
    name: "CustomerName",
    duration: "AverageCallDurationSeconds",
    start: `StartTime${day.zone}`,
    end: `EndTime${day.zone}`,
    calls: "NumberOfCalls",
    priority: "Priority",
  } as const;
}

const RowsSchema = z.array(z.array(z.string()));

function parseInteger(value: string, column: string): number {
  if (!/^[+-]?\d+$/.test(value)) {
    throw new Error(`${column} must be an integer, got: '${value}'`);
  }
  return Number.parseInt(value, 10);
}

/**
 * Reads customer requirements from CSV text.
 *
 * The header row must name every column of {@link requirementColumns};
 * extra columns are ignored. Rows are numbered from 1 with the header as
 * row 1, and blank lines are skipped.
 *
 * @throws InputParseError for a missing header, a malformed row or an empty
 * file; the error names the offending row where there is one.
 */
export function parseRequirementsCsv(
  text: string,
  day: DayConfig = DEFAULT_DAY,
): CustomerRequirement[] {
  let raw: unknown;
  try {
    raw = parse(text, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
      trim: true,
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InputParseError(`Could not read CSV: ${message}`);
  }
  const rows = RowsSchema.parse(raw);

  const [header, ...body] = rows;
  if (!header || header.every((cell) => cell === "")) {
    throw new InputParseError("CSV file is empty or has no header row");
  }

  const columns = requirementColumns(day);
  const position = new Map(header.map((name, index) => [name, index]));
  const missing = Object.values(columns).filter((name) => !position.has(name));
  if (missing.length > 0) {
    throw new InputParseError(
      `CSV header is missing required column(s): ${missing.join(", ")}`,
      1,
    );
  }

  const requirements: CustomerRequirement[] = [];
  const names = new Set<string>();

  body.forEach((row, offset) => {
    const rowNumber = offset + 2;
    try {
      if (row.length > header.length) {
        throw new Error(
          `Row ${rowNumber} has more columns than expected. Extra value(s): ${row.slice(header.length).join(", ")}`,
        );
      }
      if (row.length < header.length) {
        throw new Error(
          `Row ${rowNumber} is missing value(s) for column(s): ${header.slice(row.length).join(", ")}`,
        );
      }

      const cell = (column: string): string => row[position.get(column) ?? -1] ?? "";

      const name = cell(columns.name);
      if (!name) {
        throw new Error(`${columns.name} is required`);
      }
      if (names.has(name)) {
        throw new Error(`${columns.name} '${name}' appears more than once`);
      }

      const avgCallDurationSeconds = parseInteger(cell(columns.duration), columns.duration);
      if (avgCallDurationSeconds <= 0) {
        throw new Error(`${columns.duration} must be positive`);
      }

      const startText = cell(columns.start);
      const endText = cell(columns.end);
      const startHour = parseHour(startText);
      const endHour = parseEndHour(endText, day.hoursPerDay);
      if (endHour <= startHour) {
        throw new Error(
          `${columns.end} (${endText}) must be after ${columns.start} (${startText})`,
        );
      }

      const callVolume = parseInteger(cell(columns.calls), columns.calls);
      if (callVolume < 0) {
        throw new Error(`${columns.calls} cannot be negative`);
      }

      const priorityValue = parseInteger(cell(columns.priority), columns.priority);
      const priority = CustomerPrioritySchema.safeParse(priorityValue);
      if (!priority.success) {
        throw new Error(`${columns.priority} must be 1-5, got: ${priorityValue}`);
      }

      names.add(name);
      requirements.push({
        name,
        avgCallDurationSeconds,
        startHour,
        endHour,
        callVolume,
        priority: priority.data,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new InputParseError(`Error parsing row ${rowNumber}: ${message}`, rowNumber);
    }
  });

  if (requirements.length === 0) {
    throw new InputParseError("No valid records found in input file");
  }

  return requirements;
}
