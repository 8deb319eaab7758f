import { InputContractError, InvalidConfigurationError } from "./errors.js";
import { customerRequirementSchema, type CustomerRequirement, type DayConfig } from "./types.js";

/**
 * Checks that a day configuration can bucket demand.
 *
 * @throws InvalidConfigurationError
 */
export function validateDayConfig(day: DayConfig): void {
  if (!Number.isInteger(day.hoursPerDay) || day.hoursPerDay < 1) {
    throw new InvalidConfigurationError(
      `hoursPerDay must be a positive integer, got ${day.hoursPerDay}`,
      ["day.hoursPerDay: must be a positive integer"],
    );
  }
}

/**
 * Returns the contract problems of one requirement (empty when valid).
 */
export function requirementIssues(requirement: CustomerRequirement, day: DayConfig): string[] {
  const result = customerRequirementSchema(day).safeParse(requirement);
  if (result.success) return [];
  return result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
}

/**
 * Fails fast on requirements the input reader should never have let
 * through. Nothing is coerced.
 *
 * @throws InputContractError on the first offending requirement
 */
export function assertRequirements(
  requirements: readonly CustomerRequirement[],
  day: DayConfig,
): void {
  const seen = new Set<string>();
  for (const requirement of requirements) {
    const issues = requirementIssues(requirement, day);
    if (issues.length > 0) {
      throw new InputContractError(
        `Invalid requirement for customer "${requirement.name}": ${issues.join("; ")}`,
        requirement.name,
        issues,
      );
    }
    if (seen.has(requirement.name)) {
      throw new InputContractError(
        `Duplicate customer name "${requirement.name}"`,
        requirement.name,
        ["name: must be unique"],
      );
    }
    seen.add(requirement.name);
  }
}
