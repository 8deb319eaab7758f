import pino from "pino";
import { DemandArena, type CustomerHourlyDemand } from "../src/allocation/demand.js";
import type { AllocationContext } from "../src/allocation/allocator.types.js";
import { silentLogger } from "../src/logger.js";
import { DEFAULT_DAY, type CustomerRequirement, type DayConfig } from "../src/types.js";

/**
 * Requirement with one-hour calls, so at utilization 1 an hour needs
 * exactly `ceil(calls)` agents.
 */
export function customer(
  overrides: Partial<CustomerRequirement> & Pick<CustomerRequirement, "name">,
): CustomerRequirement {
  return {
    avgCallDurationSeconds: 3600,
    startHour: 9,
    endHour: 10,
    callVolume: 0,
    priority: 1,
    ...overrides,
  };
}

/**
 * Arena with hand-picked (non-uniform) calls per hour, keyed by customer
 * name then hour.
 */
export function arenaWithCalls(
  customers: CustomerRequirement[],
  calls: Record<string, Record<number, number>>,
  day: DayConfig = DEFAULT_DAY,
): DemandArena {
  const records: CustomerHourlyDemand[] = customers.flatMap((c, customerIndex) =>
    Object.entries(calls[c.name] ?? {}).map(([hour, n]) => ({
      customerIndex,
      customer: c,
      hour: Number(hour),
      originalCalls: n,
      currentCalls: n,
    })),
  );
  return new DemandArena(customers, records, day);
}

export function context(arena: DemandArena, capacity: number, utilization = 1): AllocationContext {
  return { arena, capacity, utilization, logger: silentLogger() };
}

/**
 * Debug logger that keeps every entry it writes, parsed.
 */
export function recordingLogger(): { logger: pino.Logger; entries: Array<Record<string, unknown>> } {
  const entries: Array<Record<string, unknown>> = [];
  const logger = pino(
    { level: "debug" },
    {
      write(line: string) {
        const parsed: unknown = JSON.parse(line);
        if (typeof parsed === "object" && parsed !== null) {
          entries.push(Object.fromEntries(Object.entries(parsed)));
        }
      },
    },
  );
  return { logger, entries };
}

export function expectError<E extends Error>(
  fn: () => unknown,
  type: new (...args: never[]) => E,
): E {
  try {
    fn();
  } catch (error) {
    if (error instanceof type) return error;
    throw error;
  }
  throw new Error(`Expected ${type.name} to be thrown`);
}

/** Five customers with overlapping windows and every priority. */
export const mixedDay: CustomerRequirement[] = [
  { name: "Harbor Health", avgCallDurationSeconds: 300, startHour: 9, endHour: 19, callVolume: 2000, priority: 1 },
  { name: "Northwind", avgCallDurationSeconds: 120, startHour: 6, endHour: 13, callVolume: 4050, priority: 2 },
  { name: "Lakeside", avgCallDurationSeconds: 240, startHour: 8, endHour: 12, callVolume: 900, priority: 3 },
  { name: "Summit", avgCallDurationSeconds: 180, startHour: 12, endHour: 18, callVolume: 1200, priority: 4 },
  { name: "Evergreen", avgCallDurationSeconds: 600, startHour: 10, endHour: 14, callVolume: 300, priority: 5 },
];
