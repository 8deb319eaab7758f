import * as z from "zod";
import { InvalidConfigurationError } from "./errors.js";
import { AllocationAlgorithmSchema, type PlannerConfig } from "./types.js";

const PlannerConfigSchema = z.object({
  utilization: z.number().positive().default(1),
  capacity: z.number().int().nonnegative().optional(),
  algorithm: AllocationAlgorithmSchema.default("greedy"),
});

/**
 * Raw configuration accepted by {@link planStaffing}; every field is
 * optional and falls back to its default.
 */
export type PlannerConfigInput = z.input<typeof PlannerConfigSchema>;

/**
 * Validates a configuration and fills in defaults. Accepts untrusted input
 * (parsed JSON, CLI options).
 *
 * @throws InvalidConfigurationError listing every failing field.
 *
 * @example
 * ```ts
 * parsePlannerConfig({ capacity: 40, algorithm: "shift" });
 * // { utilization: 1, capacity: 40, algorithm: "shift" }
 * ```
 */
export function parsePlannerConfig(input: unknown = {}): PlannerConfig {
  const result = PlannerConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "config"}: ${issue.message}`,
    );
    throw new InvalidConfigurationError(`Invalid planner configuration: ${issues.join("; ")}`, issues);
  }
  return result.data;
}
