import { describe, it, expect } from "vitest";
import { requirementIssues, validateDayConfig } from "../src/validation.js";
import { InvalidConfigurationError } from "../src/errors.js";
import { CustomerPrioritySchema, DEFAULT_DAY } from "../src/types.js";
import { customer } from "./helpers.js";

describe("requirementIssues", () => {
  it("returns nothing for a valid requirement", () => {
    expect(requirementIssues(customer({ name: "Acme", callVolume: 10 }), DEFAULT_DAY)).toEqual([]);
  });

  it("bounds hours by the day", () => {
    const day = { hoursPerDay: 12, zone: "PT" };
    const issues = requirementIssues(customer({ name: "Late", startHour: 9, endHour: 13 }), day);
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^endHour: /);
  });

  it("rejects a blank name and a non-positive duration", () => {
    const issues = requirementIssues(
      customer({ name: "  ", avgCallDurationSeconds: 0 }),
      DEFAULT_DAY,
    );
    expect(issues.map((issue) => issue.split(":")[0])).toEqual(["name", "avgCallDurationSeconds"]);
  });
});

describe("validateDayConfig", () => {
  it("accepts a positive whole number of hours", () => {
    expect(() => validateDayConfig({ hoursPerDay: 8, zone: "ET" })).not.toThrow();
  });

  it("rejects anything else", () => {
    expect(() => validateDayConfig({ hoursPerDay: 2.5, zone: "ET" })).toThrow(InvalidConfigurationError);
    expect(() => validateDayConfig({ hoursPerDay: -1, zone: "ET" })).toThrow(InvalidConfigurationError);
  });
});

describe("CustomerPrioritySchema", () => {
  it("accepts priorities 1 to 5 only", () => {
    expect([1, 2, 3, 4, 5].every((p) => CustomerPrioritySchema.safeParse(p).success)).toBe(true);
    expect(CustomerPrioritySchema.safeParse(0).success).toBe(false);
    expect(CustomerPrioritySchema.safeParse(6).success).toBe(false);
    expect(CustomerPrioritySchema.safeParse(2.5).success).toBe(false);
  });
});
