import { InvalidConfigurationError } from "../errors.js";
import type { CustomerRequirement } from "../types.js";

export const SECONDS_PER_HOUR = 3600;

/**
 * Relative rounding error tolerated above an integer agent load: a few
 * ulps, the drift left by moving calls in agent-sized portions.
 */
export const AGENT_LOAD_TOLERANCE = 16 * Number.EPSILON;

export function assertUtilization(utilization: number): void {
  if (!Number.isFinite(utilization) || utilization <= 0) {
    throw new InvalidConfigurationError(
      `Utilization must be a positive number, got ${utilization}`,
      [`utilization: must be > 0`],
    );
  }
}

/**
 * Fractional agents needed to handle `calls` calls of the given duration
 * within one hour.
 */
export function agentLoad(calls: number, durationSeconds: number, utilization: number): number {
  return (calls * durationSeconds) / SECONDS_PER_HOUR / utilization;
}

/**
 * Inverse of {@link agentLoad}: the calls that `load` agents handle in one
 * hour.
 */
export function callsForAgentLoad(
  load: number,
  durationSeconds: number,
  utilization: number,
): number {
  return (load * SECONDS_PER_HOUR * utilization) / durationSeconds;
}

/**
 * Whole agents required for `calls` calls per hour:
 * `ceil(calls * duration / 3600 / utilization)`.
 *
 * @throws InvalidConfigurationError when `utilization <= 0`
 *
 * @example
 * ```ts
 * requiredAgents(12.5, 120, 1); // ceil(0.4167) = 1
 * requiredAgents(2000, 300, 1); // ceil(166.67) = 167
 * ```
 */
export function requiredAgents(calls: number, durationSeconds: number, utilization: number): number {
  assertUtilization(utilization);
  const load = agentLoad(calls, durationSeconds, utilization);
  return Math.max(0, Math.ceil(load - AGENT_LOAD_TOLERANCE * Math.max(1, load)));
}

/**
 * Rounds to the nearest integer, halves away from zero for positive values.
 */
export function roundHalfUp(value: number): number {
  return Math.floor(value + 0.5);
}

/**
 * Customer indices ordered by priority (1 first), ties by input order.
 */
export function priorityAscending(customers: readonly CustomerRequirement[]): number[] {
  return customers
    .map((customer, index) => ({ index, priority: customer.priority }))
    .sort((a, b) => a.priority - b.priority || a.index - b.index)
    .map((entry) => entry.index);
}

/**
 * Customer indices ordered by priority (5 first), ties by input order.
 */
export function priorityDescending(customers: readonly CustomerRequirement[]): number[] {
  return customers
    .map((customer, index) => ({ index, priority: customer.priority }))
    .sort((a, b) => b.priority - a.priority || a.index - b.index)
    .map((entry) => entry.index);
}

export function formatHour(hour: number): string {
  return `${String(hour).padStart(2, "0")}:00`;
}
