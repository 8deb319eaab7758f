import type { CustomerPriority, HourBucket, PlanMode } from "../types.js";
import type { DemandArena } from "./demand.js";
import type { AllocationOutcome, HourAllocation, RedistributionMove } from "./allocator.types.js";
import { roundHalfUp } from "./utils.js";

/**
 * Agents staffed in one hour.
 *
 * @category Reporting
 */
export interface ScheduleEntry {
  hour: HourBucket;
  agents: number;
}

/**
 * One entry per hour of the day, ascending, zero where nothing is staffed.
 *
 * @category Reporting
 */
export type Schedule = readonly ScheduleEntry[];

/**
 * Daily outcome for one customer.
 *
 * @category Reporting
 */
export interface AllocationReport {
  customer: string;
  priority: CustomerPriority;
  /** The customer's call volume for the day. */
  requestedCalls: number;
  /** Calls covered by allocated agents, rounded half-up once for the day. */
  servedCalls: number;
  /** `requestedCalls - servedCalls`. */
  unmetCalls: number;
  /** `servedCalls / requestedCalls`; 1 when nothing was requested. */
  utilization: number;
  requiredAgentHours: number;
  allocatedAgentHours: number;
  unmetAgentHours: number;
}

/**
 * Everything a plan produces, ready for formatting.
 *
 * @category Reporting
 */
export interface PlanResult {
  mode: PlanMode;
  schedule: Schedule;
  /** Per-hour detail behind each schedule entry. */
  hours: HourAllocation[];
  /** One report per customer, in input order. */
  reports: AllocationReport[];
  /** Redistribution moves (shift policy only). */
  moves: RedistributionMove[];
}

/**
 * Turns an allocation into the final schedule and per-customer reports.
 *
 * @category Reporting
 */
export function aggregate(
  arena: DemandArena,
  outcome: AllocationOutcome,
  mode: PlanMode,
): PlanResult {
  const byHour = new Map(outcome.hours.map((h) => [h.hour, h]));
  const hours: HourAllocation[] = [];
  const schedule: ScheduleEntry[] = [];
  for (let hour = 0; hour < arena.day.hoursPerDay; hour++) {
    const allocation = byHour.get(hour) ?? { hour, totalAgents: 0, customers: [] };
    hours.push(allocation);
    schedule.push({ hour, agents: allocation.totalAgents });
  }

  const reports = arena.customers.map((customer): AllocationReport => {
    let served = 0;
    let required = 0;
    let allocated = 0;
    for (const allocation of hours) {
      for (const entry of allocation.customers) {
        if (entry.customer !== customer.name) continue;
        served += entry.servedCalls;
        required += entry.requiredAgents;
        allocated += entry.allocatedAgents;
      }
    }

    const requestedCalls = customer.callVolume;
    const servedCalls = Math.min(requestedCalls, Math.max(0, roundHalfUp(served)));
    return {
      customer: customer.name,
      priority: customer.priority,
      requestedCalls,
      servedCalls,
      unmetCalls: requestedCalls - servedCalls,
      utilization: requestedCalls === 0 ? 1 : servedCalls / requestedCalls,
      requiredAgentHours: required,
      allocatedAgentHours: allocated,
      unmetAgentHours: required - allocated,
    };
  });

  return { mode, schedule, hours, reports, moves: outcome.moves };
}
