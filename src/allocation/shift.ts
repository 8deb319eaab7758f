import type pino from "pino";
import type { DemandArena } from "./demand.js";
import type { AllocationContext, AllocationOutcome, RedistributionMove } from "./allocator.types.js";
import { allocateDayByPriority } from "./greedy.js";
import { callsForAgentLoad, formatHour, priorityDescending, requiredAgents } from "./utils.js";

interface SpilloverCandidate {
  index: number;
  hour: number;
  spare: number;
}

/**
 * Shift capacity policy.
 *
 * Overflowing hours first hand demand to nearby hours inside each customer's
 * own window ({@link redistributeOverflow}); the result is then allocated
 * hour by hour in priority order, so whatever could not be moved shows up
 * as unmet demand of the lowest-priority customers in that hour.
 *
 * @category Allocation
 */
export function allocateShift(context: AllocationContext): AllocationOutcome {
  const { arena, capacity, utilization, logger } = context;
  const moves = redistributeOverflow(arena, capacity, utilization, logger);
  const hours = allocateDayByPriority(arena, capacity, utilization);
  return { hours, moves };
}

/**
 * Moves calls out of hours whose uncapped requirement exceeds `capacity`.
 *
 * Overflow hours are visited in ascending order. In each, customers are
 * taken lowest priority first (ties by input order) until the hour fits.
 * A customer gives up at most the hour's overflow, into hours of its own
 * window that still have spare agents, nearest first and earlier first on
 * a tie. A target only receives what its spare agents can absorb, so the
 * customers already assigned there keep their full requirement.
 *
 * Mutates `currentCalls` on the arena; `originalCalls` and every customer's
 * total volume are unchanged.
 *
 * @returns the moves made, in order
 */
export function redistributeOverflow(
  arena: DemandArena,
  capacity: number,
  utilization: number,
  logger?: pino.Logger,
): RedistributionMove[] {
  const agentsAt = (index: number): number => {
    const record = arena.at(index);
    return requiredAgents(
      record.currentCalls,
      record.customer.avgCallDurationSeconds,
      utilization,
    );
  };
  const loadAt = (hour: number): number =>
    arena.indicesAt(hour).reduce((sum, index) => sum + agentsAt(index), 0);

  const overflowHours: number[] = [];
  for (let hour = 0; hour < arena.day.hoursPerDay; hour++) {
    if (loadAt(hour) > capacity) overflowHours.push(hour);
  }
  if (overflowHours.length === 0) return [];

  logger?.debug({ overflowHours: overflowHours.map(formatHour) }, "overflow hours");

  const processingOrder = priorityDescending(arena.customers);
  const moves: RedistributionMove[] = [];

  for (const hour of overflowHours) {
    for (const customerIndex of processingOrder) {
      const overflow = loadAt(hour) - capacity;
      if (overflow <= 0) break;

      const sourceIndex = arena.indexOf(customerIndex, hour);
      if (sourceIndex === undefined) continue;
      const source = arena.at(sourceIndex);
      const sourceAgents = agentsAt(sourceIndex);
      if (sourceAgents === 0) continue;

      const duration = source.customer.avgCallDurationSeconds;
      const keepAgents = sourceAgents - Math.min(sourceAgents, overflow);

      for (const target of spilloverCandidates(arena, customerIndex, hour, capacity, loadAt)) {
        if (agentsAt(sourceIndex) <= keepAgents) break;

        const record = arena.at(target.index);
        const needed = source.currentCalls - callsForAgentLoad(keepAgents, duration, utilization);
        const fits =
          callsForAgentLoad(agentsAt(target.index) + target.spare, duration, utilization) -
          record.currentCalls;
        const amount = Math.min(needed, fits, source.currentCalls);
        if (amount <= 0) continue;

        source.currentCalls -= amount;
        record.currentCalls += amount;

        const move: RedistributionMove = {
          customer: source.customer.name,
          fromHour: hour,
          toHour: target.hour,
          callsMoved: amount,
        };
        moves.push(move);
        logger?.debug(
          { ...move, fromHour: formatHour(hour), toHour: formatHour(target.hour) },
          "calls redistributed",
        );
      }
    }
  }

  return moves;
}

/**
 * Hours in the customer's window, other than `sourceHour`, with spare
 * agents; nearest first, earlier hour first on equal distance.
 */
function spilloverCandidates(
  arena: DemandArena,
  customerIndex: number,
  sourceHour: number,
  capacity: number,
  loadAt: (hour: number) => number,
): SpilloverCandidate[] {
  const candidates: SpilloverCandidate[] = [];
  for (const index of arena.indicesOf(customerIndex)) {
    const { hour } = arena.at(index);
    if (hour === sourceHour) continue;
    const spare = capacity - loadAt(hour);
    if (spare > 0) candidates.push({ index, hour, spare });
  }

  return candidates.sort(
    (a, b) => Math.abs(a.hour - sourceHour) - Math.abs(b.hour - sourceHour) || a.hour - b.hour,
  );
}
