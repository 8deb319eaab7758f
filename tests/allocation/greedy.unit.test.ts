import { describe, it, expect } from "vitest";
import { buildDemandArena } from "../../src/allocation/demand.js";
import {
  allocateGreedy,
  allocateHourByPriority,
  allocateUncapped,
} from "../../src/allocation/greedy.js";
import { context, customer, mixedDay } from "../helpers.js";

describe("allocateHourByPriority", () => {
  it("serves the higher priority first and gives the rest nothing", () => {
    const arena = buildDemandArena([
      customer({ name: "X", callVolume: 2, priority: 1 }),
      customer({ name: "Y", callVolume: 2, priority: 2 }),
    ]);

    const hour = allocateHourByPriority(arena, 9, 1, 1);

    expect(hour.totalAgents).toBe(1);
    expect(hour.customers).toEqual([
      {
        customer: "X",
        priority: 1,
        requestedCalls: 2,
        servedCalls: 1,
        requiredAgents: 2,
        allocatedAgents: 1,
        unmetAgents: 1,
      },
      {
        customer: "Y",
        priority: 2,
        requestedCalls: 2,
        servedCalls: 0,
        requiredAgents: 2,
        allocatedAgents: 0,
        unmetAgents: 2,
      },
    ]);
  });

  it("allocates and lists by priority, not input order", () => {
    const arena = buildDemandArena([
      customer({ name: "Y", callVolume: 2, priority: 2 }),
      customer({ name: "X", callVolume: 2, priority: 1 }),
    ]);

    const hour = allocateHourByPriority(arena, 9, 2, 1);

    expect(hour.customers.map((c) => [c.customer, c.allocatedAgents])).toEqual([
      ["X", 2],
      ["Y", 0],
    ]);
  });

  it("lists customers in input order when uncapped", () => {
    const arena = buildDemandArena([
      customer({ name: "Y", callVolume: 2, priority: 2 }),
      customer({ name: "X", callVolume: 2, priority: 1 }),
    ]);

    const hour = allocateHourByPriority(arena, 9, Number.POSITIVE_INFINITY, 1);

    expect(hour.customers.map((c) => [c.customer, c.allocatedAgents])).toEqual([
      ["Y", 2],
      ["X", 2],
    ]);
  });

  it("breaks priority ties by input order", () => {
    const arena = buildDemandArena([
      customer({ name: "A", callVolume: 2, priority: 2 }),
      customer({ name: "B", callVolume: 2, priority: 2 }),
    ]);

    const hour = allocateHourByPriority(arena, 9, 3, 1);

    expect(hour.customers.map((c) => c.allocatedAgents)).toEqual([2, 1]);
  });

  it("scales served calls by the share of agents allocated", () => {
    const arena = buildDemandArena([
      customer({ name: "Partial", avgCallDurationSeconds: 2880, callVolume: 5 }),
    ]);

    const [entry] = allocateHourByPriority(arena, 9, 2, 1).customers;

    expect(entry?.requiredAgents).toBe(4);
    expect(entry?.allocatedAgents).toBe(2);
    expect(entry?.servedCalls).toBe(2.5);
  });

  it("skips customers without calls in the hour", () => {
    const arena = buildDemandArena([
      customer({ name: "Quiet", callVolume: 0 }),
      customer({ name: "Busy", callVolume: 1 }),
    ]);

    expect(allocateHourByPriority(arena, 9, 5, 1).customers.map((c) => c.customer)).toEqual([
      "Busy",
    ]);
    expect(allocateHourByPriority(arena, 3, 5, 1).customers).toEqual([]);
  });
});

describe("allocateGreedy", () => {
  it("never uses spare capacity of another hour", () => {
    const arena = buildDemandArena([
      customer({ name: "X", startHour: 9, endHour: 11, callVolume: 4, priority: 1 }),
      customer({ name: "Y", startHour: 10, endHour: 11, callVolume: 3, priority: 2 }),
    ]);

    const { hours, moves } = allocateGreedy(context(arena, 3));

    expect(moves).toEqual([]);
    expect(hours[9]?.totalAgents).toBe(2);
    expect(hours[10]?.customers.map((c) => [c.customer, c.allocatedAgents, c.unmetAgents])).toEqual([
      ["X", 2, 0],
      ["Y", 1, 2],
    ]);
  });

  it("never exceeds capacity", () => {
    const arena = buildDemandArena(mixedDay);
    const { hours } = allocateGreedy(context(arena, 20));

    expect(hours).toHaveLength(24);
    for (const hour of hours) {
      expect(hour.totalAgents).toBeLessThanOrEqual(20);
    }
  });

  it("leaves lower priorities unserved while a higher one is short", () => {
    const arena = buildDemandArena(mixedDay);
    const { hours } = allocateGreedy(context(arena, 20));

    for (const hour of hours) {
      for (const short of hour.customers.filter((c) => c.unmetAgents > 0)) {
        const lower = hour.customers.filter((c) => c.priority > short.priority);
        expect(lower.every((c) => c.allocatedAgents === 0)).toBe(true);
      }
    }
  });

  it("matches the uncapped requirement when capacity is ample", () => {
    const arena = buildDemandArena(mixedDay);
    const capped = allocateGreedy(context(arena, 1000, 0.85));
    const uncapped = allocateUncapped(arena, 0.85);

    expect(capped.hours).toEqual(uncapped.hours);
  });
});

describe("allocateUncapped", () => {
  it("gives every customer its full requirement", () => {
    const arena = buildDemandArena(mixedDay);
    const { hours } = allocateUncapped(arena, 1);

    expect(hours[10]?.customers.map((c) => [c.customer, c.allocatedAgents])).toEqual([
      ["Harbor Health", 17],
      ["Northwind", 20],
      ["Lakeside", 15],
      ["Evergreen", 13],
    ]);
    expect(hours[10]?.totalAgents).toBe(65);
    expect(hours.every((h) => h.customers.every((c) => c.unmetAgents === 0))).toBe(true);
  });
});
