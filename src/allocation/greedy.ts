import type { DemandArena } from "./demand.js";
import type {
  AllocationContext,
  AllocationOutcome,
  CustomerHourAllocation,
  HourAllocation,
} from "./allocator.types.js";
import { formatHour, priorityAscending, requiredAgents } from "./utils.js";

/**
 * Serves one hour in strict priority order.
 *
 * Customers with demand in the hour are taken by priority (1 first), ties by
 * input order. Each is served in full while its agents fit the remaining
 * capacity. The first one that does not fit receives what is left, with its
 * served calls scaled by `allocated / required`; everyone after it receives
 * nothing.
 *
 * Customers are listed in allocation order. Pass `Infinity` as `capacity`
 * for the uncapped requirement, which lists them in input order instead.
 */
export function allocateHourByPriority(
  arena: DemandArena,
  hour: number,
  capacity: number,
  utilization: number,
): HourAllocation {
  const hasCalls = (index: number | undefined): index is number =>
    index !== undefined && arena.at(index).currentCalls > 0;
  const ordered = priorityAscending(arena.customers)
    .map((customerIndex) => arena.indexOf(customerIndex, hour))
    .filter(hasCalls);
  const listing = Number.isFinite(capacity) ? ordered : arena.indicesAt(hour).filter(hasCalls);

  const byIndex = new Map<number, CustomerHourAllocation>();
  let remaining = capacity;

  for (const index of ordered) {
    const record = arena.at(index);
    const required = requiredAgents(
      record.currentCalls,
      record.customer.avgCallDurationSeconds,
      utilization,
    );

    let allocated: number;
    let served: number;
    if (required <= remaining) {
      allocated = required;
      served = record.currentCalls;
    } else {
      allocated = remaining;
      served = (record.currentCalls * allocated) / required;
    }
    remaining -= allocated;

    byIndex.set(index, {
      customer: record.customer.name,
      priority: record.customer.priority,
      requestedCalls: record.currentCalls,
      servedCalls: served,
      requiredAgents: required,
      allocatedAgents: allocated,
      unmetAgents: required - allocated,
    });
  }

  const customers: CustomerHourAllocation[] = [];
  let totalAgents = 0;
  for (const index of listing) {
    const entry = byIndex.get(index);
    if (!entry) continue;
    customers.push(entry);
    totalAgents += entry.allocatedAgents;
  }

  return { hour, totalAgents, customers };
}

/**
 * Runs {@link allocateHourByPriority} for every hour of the arena's day.
 */
export function allocateDayByPriority(
  arena: DemandArena,
  capacity: number,
  utilization: number,
): HourAllocation[] {
  return Array.from({ length: arena.day.hoursPerDay }, (_, hour) =>
    allocateHourByPriority(arena, hour, capacity, utilization),
  );
}

/**
 * Uncapped requirement: every customer gets its full agent count.
 */
export function allocateUncapped(arena: DemandArena, utilization: number): AllocationOutcome {
  return {
    hours: allocateDayByPriority(arena, Number.POSITIVE_INFINITY, utilization),
    moves: [],
  };
}

/**
 * Greedy capacity policy: each hour is allocated on its own, in strict
 * priority order.
 *
 * Spare capacity in one hour is never used for demand in another, and a
 * lower-priority customer is served only when every higher-priority
 * customer in the same hour was served in full.
 *
 * @category Allocation
 */
export function allocateGreedy(context: AllocationContext): AllocationOutcome {
  const { arena, capacity, utilization, logger } = context;
  const hours = allocateDayByPriority(arena, capacity, utilization);

  for (const allocation of hours) {
    const unmet = allocation.customers.filter((c) => c.unmetAgents > 0);
    if (unmet.length === 0) continue;
    logger.debug(
      {
        hour: formatHour(allocation.hour),
        unmet: Object.fromEntries(unmet.map((c) => [c.customer, c.unmetAgents])),
      },
      "capacity exhausted",
    );
  }

  return { hours, moves: [] };
}
