import type pino from "pino";
import type { AllocationAlgorithm, CustomerPriority, HourBucket } from "../types.js";
import type { DemandArena } from "./demand.js";

/**
 * What one customer got in one hour.
 *
 * @category Allocation
 */
export interface CustomerHourAllocation {
  customer: string;
  priority: CustomerPriority;
  /** Calls demanded this hour (after any redistribution). */
  requestedCalls: number;
  /** Calls covered by the allocated agents. */
  servedCalls: number;
  /** Uncapped agent requirement for `requestedCalls`. */
  requiredAgents: number;
  allocatedAgents: number;
  /** `requiredAgents - allocatedAgents`. */
  unmetAgents: number;
}

/**
 * Allocation of one hour across the customers with demand in it, listed in
 * allocation (priority) order, or input order when uncapped.
 *
 * @category Allocation
 */
export interface HourAllocation {
  hour: HourBucket;
  totalAgents: number;
  customers: CustomerHourAllocation[];
}

/**
 * Calls moved by overflow redistribution, in the order the moves happened.
 *
 * @category Allocation
 */
export interface RedistributionMove {
  customer: string;
  fromHour: HourBucket;
  toHour: HourBucket;
  callsMoved: number;
}

/**
 * Inputs shared by every capacity allocator.
 */
export interface AllocationContext {
  readonly arena: DemandArena;
  /** Maximum agents in any hour. */
  readonly capacity: number;
  readonly utilization: number;
  readonly logger: pino.Logger;
}

export interface AllocationOutcome {
  /** One entry per hour of the day, ascending. */
  hours: HourAllocation[];
  moves: RedistributionMove[];
}

/**
 * A capacity allocation policy.
 *
 * Allocators may change `currentCalls` on the arena's records but must keep
 * each customer's total volume and window intact, and must never allocate
 * more than `capacity` agents in an hour.
 */
export type Allocator = (context: AllocationContext) => AllocationOutcome;

export type BuiltInAllocators = {
  [K in AllocationAlgorithm]: Allocator;
};
