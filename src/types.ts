/**
 * Core staffing types shared by the demand engine, the allocators and the
 * input/output collaborators.
 *
 * @packageDocumentation
 */

import * as z from "zod";

// ============================================================================
// Day
// ============================================================================

/**
 * The fixed day that demand is bucketed into.
 *
 * Hours are numbered `0` to `hoursPerDay - 1`; bucket `h` covers
 * `[h:00, h+1:00)`. `zone` labels the single timezone every input time is
 * expressed in (it is also the suffix of the CSV time columns).
 *
 * @example
 * ```typescript
 * const day: DayConfig = { hoursPerDay: 24, zone: "PT" };
 * ```
 */
export interface DayConfig {
  hoursPerDay: number;
  zone: string;
}

/**
 * Default day: 24 one-hour buckets in Pacific Time.
 */
export const DEFAULT_DAY: DayConfig = Object.freeze({ hoursPerDay: 24, zone: "PT" });

/**
 * Integer identifying one hour-of-day slot.
 */
export type HourBucket = number;

// ============================================================================
// Customer requirements
// ============================================================================

/**
 * Priority of a customer. `1` is the highest, `5` the lowest.
 */
export type CustomerPriority = 1 | 2 | 3 | 4 | 5;

export const CustomerPrioritySchema = z.union([
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
  z.literal(5),
]);

/**
 * One customer's call requirement for the day.
 *
 * Calls are spread uniformly over the active hours `[startHour, endHour)`.
 *
 * @example
 * ```typescript
 * const acme: CustomerRequirement = {
 *   name: "Acme Clinic",
 *   avgCallDurationSeconds: 120,
 *   startHour: 9,
 *   endHour: 17,
 *   callVolume: 100,
 *   priority: 1,
 * };
 * ```
 */
export interface CustomerRequirement {
  /** Unique within a run. */
  name: string;
  /** Average handling time of one call, in seconds. */
  avgCallDurationSeconds: number;
  /** First active hour (inclusive). */
  startHour: HourBucket;
  /** End of the active window (exclusive). */
  endHour: number;
  /** Total calls expected over the day. */
  callVolume: number;
  priority: CustomerPriority;
}

/**
 * Schema for a single {@link CustomerRequirement}, bounded by the given day.
 */
export function customerRequirementSchema(day: DayConfig) {
  return z
    .object({
      name: z.string().trim().min(1, "name is required"),
      avgCallDurationSeconds: z.number().positive(),
      startHour: z
        .number()
        .int()
        .min(0)
        .max(day.hoursPerDay - 1),
      endHour: z.number().int().min(1).max(day.hoursPerDay),
      callVolume: z.number().int().nonnegative(),
      priority: CustomerPrioritySchema,
    })
    .refine((r) => r.endHour > r.startHour, {
      message: "endHour must be after startHour",
      path: ["endHour"],
    });
}

// ============================================================================
// Planner configuration
// ============================================================================

/**
 * Capacity allocation policy used when a capacity ceiling is set.
 *
 * - `greedy`: each hour is served in strict priority order.
 * - `shift`: overflow is first moved to nearby hours inside each customer's
 *   own window, then each hour is served in priority order.
 */
export type AllocationAlgorithm = "greedy" | "shift";

export const AllocationAlgorithmSchema = z.union([z.literal("greedy"), z.literal("shift")]);

/**
 * Run configuration.
 */
export interface PlannerConfig {
  /** Productive-time fraction of an agent. Divides the workload. */
  utilization: number;
  /** Maximum agents in any hour. Absent means uncapped. */
  capacity?: number;
  algorithm: AllocationAlgorithm;
}

/**
 * How a plan was produced.
 */
export type PlanMode = "uncapped" | AllocationAlgorithm;
