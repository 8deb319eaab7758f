/**
 * Call-center staffing planner.
 *
 * Turns per-customer call volumes into the number of agents needed in each
 * hour of one day, and shares out a limited agent capacity when there is
 * not enough to go round.
 *
 * @remarks
 * ## Core Concepts
 *
 * **Requirements**: each {@link CustomerRequirement} names a call volume,
 * an average call duration, an active window `[startHour, endHour)` and a
 * priority (1 highest, 5 lowest). Volume is spread evenly over the window.
 *
 * **Baseline**: an hour with `c` calls of `d` seconds needs
 * `ceil(c * d / 3600 / utilization)` agents ({@link requiredAgents}).
 *
 * **Capacity**: with a `capacity`, no hour gets more agents than that.
 * Two policies decide who is served:
 * - `greedy`: every hour on its own, strictly by priority.
 * - `shift`: overflow is first moved into nearby hours of the same
 *   customer's window that have spare agents, lowest priority moved first;
 *   each hour is then served by priority.
 *
 * **Reporting**: {@link planStaffing} returns a {@link PlanResult}: a
 * schedule with one entry per hour, per-hour detail, per-customer
 * {@link AllocationReport}s and any redistribution moves.
 *
 * @example Plan a day with a capacity ceiling
 * ```typescript
 * import { planStaffing, formatPlan } from "callplan";
 *
 * const result = planStaffing(
 *   [
 *     { name: "Acme", avgCallDurationSeconds: 120, startHour: 9, endHour: 17, callVolume: 1200, priority: 1 },
 *     { name: "Globex", avgCallDurationSeconds: 300, startHour: 9, endHour: 13, callVolume: 200, priority: 3 },
 *   ],
 *   { capacity: 6, algorithm: "shift" },
 * );
 *
 * console.log(formatPlan(result, "text"));
 * for (const report of result.reports) {
 *   console.log(report.customer, report.servedCalls, report.unmetCalls);
 * }
 * ```
 *
 * @example Read requirements from CSV
 * ```typescript
 * import { readFile } from "node:fs/promises";
 * import { parseRequirementsCsv, planStaffing } from "callplan";
 *
 * const requirements = parseRequirementsCsv(await readFile("input.csv", "utf-8"));
 * const result = planStaffing(requirements, { utilization: 0.85 });
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Types
// ============================================================================

export type {
  AllocationAlgorithm,
  CustomerPriority,
  CustomerRequirement,
  DayConfig,
  HourBucket,
  PlanMode,
  PlannerConfig,
} from "./types.js";

export {
  AllocationAlgorithmSchema,
  CustomerPrioritySchema,
  DEFAULT_DAY,
  customerRequirementSchema,
} from "./types.js";

// ============================================================================
// Errors
// ============================================================================

export { InputContractError, InputParseError, InvalidConfigurationError } from "./errors.js";

// ============================================================================
// Configuration & validation
// ============================================================================

export { parsePlannerConfig } from "./config.js";
export type { PlannerConfigInput } from "./config.js";

export { assertRequirements, requirementIssues, validateDayConfig } from "./validation.js";

// ============================================================================
// Planning
// ============================================================================

export { planStaffing } from "./planner.js";
export type { PlanOptions } from "./planner.js";

// ============================================================================
// Demand & allocation
// ============================================================================

export { DemandArena, buildDemandArena, expandRequirement } from "./allocation/demand.js";
export type { CustomerHourlyDemand } from "./allocation/demand.js";

export {
  AGENT_LOAD_TOLERANCE,
  SECONDS_PER_HOUR,
  agentLoad,
  callsForAgentLoad,
  requiredAgents,
} from "./allocation/utils.js";

export {
  allocateDayByPriority,
  allocateGreedy,
  allocateHourByPriority,
  allocateUncapped,
} from "./allocation/greedy.js";
export { allocateShift, redistributeOverflow } from "./allocation/shift.js";
export { builtInAllocators, resolveAllocator } from "./allocation/registry.js";

export type {
  AllocationContext,
  AllocationOutcome,
  Allocator,
  CustomerHourAllocation,
  HourAllocation,
  RedistributionMove,
} from "./allocation/allocator.types.js";

// ============================================================================
// Reporting
// ============================================================================

export { aggregate } from "./allocation/aggregate.js";
export type {
  AllocationReport,
  PlanResult,
  Schedule,
  ScheduleEntry,
} from "./allocation/aggregate.js";

// ============================================================================
// Input & output
// ============================================================================

export { parseRequirementsCsv, requirementColumns } from "./input/csv.js";
export { parseEndHour, parseHour } from "./input/time.js";

export {
  OUTPUT_EXTENSIONS,
  OutputFormatSchema,
  formatCsv,
  formatJson,
  formatPlan,
  formatText,
} from "./output/format.js";
export type { OutputFormat } from "./output/format.js";

export { computeMetrics, formatMetrics } from "./output/metrics.js";
export type { PlanMetrics } from "./output/metrics.js";

export {
  formatTimestamp,
  formatUtilization,
  resultFileName,
  writeResultFile,
} from "./output/result-file.js";
export type { ResultFileNameOptions } from "./output/result-file.js";

// ============================================================================
// Logging
// ============================================================================

export { createLogger, silentLogger } from "./logger.js";
export type { LoggerOptions } from "./logger.js";
