import type { AllocationAlgorithm } from "../types.js";
import type { Allocator, BuiltInAllocators } from "./allocator.types.js";
import { allocateGreedy } from "./greedy.js";
import { allocateShift } from "./shift.js";

export const builtInAllocators: BuiltInAllocators = {
  greedy: allocateGreedy,
  shift: allocateShift,
};

/**
 * Looks up the allocator for an algorithm name.
 */
export function resolveAllocator(algorithm: AllocationAlgorithm): Allocator {
  return builtInAllocators[algorithm];
}
