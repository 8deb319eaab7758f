/**
 * Staffing plan entry point.
 *
 * @example
 * ```typescript
 * import { planStaffing } from "callplan";
 *
 * const result = planStaffing(
 *   [
 *     { name: "Acme", avgCallDurationSeconds: 120, startHour: 9, endHour: 17, callVolume: 100, priority: 1 },
 *     { name: "Globex", avgCallDurationSeconds: 300, startHour: 8, endHour: 12, callVolume: 400, priority: 2 },
 *   ],
 *   { capacity: 10, algorithm: "shift" },
 * );
 *
 * for (const { hour, agents } of result.schedule) {
 *   console.log(hour, agents);
 * }
 * ```
 *
 * @module
 */

import type pino from "pino";
import { parsePlannerConfig, type PlannerConfigInput } from "./config.js";
import { silentLogger } from "./logger.js";
import { validateDayConfig, assertRequirements } from "./validation.js";
import { DEFAULT_DAY, type CustomerRequirement, type DayConfig } from "./types.js";
import { buildDemandArena } from "./allocation/demand.js";
import { allocateUncapped } from "./allocation/greedy.js";
import { resolveAllocator } from "./allocation/registry.js";
import { aggregate, type PlanResult } from "./allocation/aggregate.js";

export interface PlanOptions {
  /** Day the demand is bucketed into. Defaults to {@link DEFAULT_DAY}. */
  day?: DayConfig;
  /** Receives debug detail (overflow hours, moves) and a run summary. */
  logger?: pino.Logger;
}

/**
 * Computes the hour-by-hour agent schedule for one day.
 *
 * Without a capacity every customer gets its full requirement. With one,
 * the configured algorithm shares it out and shortfalls are reported as
 * unmet demand.
 *
 * Validation happens before any computation; a failed run returns nothing.
 *
 * @throws InvalidConfigurationError for a bad configuration or day
 * @throws InputContractError for a requirement that breaks its contract
 *
 * @category Planning
 */
export function planStaffing(
  requirements: readonly CustomerRequirement[],
  config: PlannerConfigInput = {},
  options: PlanOptions = {},
): PlanResult {
  const { utilization, capacity, algorithm } = parsePlannerConfig(config);
  const day = options.day ?? DEFAULT_DAY;
  const logger = options.logger ?? silentLogger();

  validateDayConfig(day);
  assertRequirements(requirements, day);

  const arena = buildDemandArena(requirements, day);

  let result: PlanResult;
  if (capacity === undefined) {
    logger.debug({ customers: requirements.length, utilization }, "planning uncapped");
    result = aggregate(arena, allocateUncapped(arena, utilization), "uncapped");
  } else {
    logger.debug(
      { customers: requirements.length, utilization, capacity, algorithm },
      "planning with capacity",
    );
    const allocate = resolveAllocator(algorithm);
    result = aggregate(arena, allocate({ arena, capacity, utilization, logger }), algorithm);
  }

  logger.info(
    {
      mode: result.mode,
      agentHours: result.schedule.reduce((sum, e) => sum + e.agents, 0),
      unmetCalls: result.reports.reduce((sum, r) => sum + r.unmetCalls, 0),
      moves: result.moves.length,
    },
    "plan complete",
  );

  return result;
}
