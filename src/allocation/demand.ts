import type { CustomerRequirement, DayConfig, HourBucket } from "../types.js";
import { DEFAULT_DAY } from "../types.js";

/**
 * Call demand of one customer in one hour.
 *
 * `originalCalls` is fixed at expansion time and kept for reporting.
 * `currentCalls` starts equal to it and is changed only by overflow
 * redistribution.
 *
 * @category Demand
 */
export interface CustomerHourlyDemand {
  /** Position of the customer in the input. */
  readonly customerIndex: number;
  readonly customer: CustomerRequirement;
  readonly hour: HourBucket;
  readonly originalCalls: number;
  currentCalls: number;
}

/**
 * Expands one requirement into one record per active hour, with the
 * volume spread uniformly (`callVolume / (endHour - startHour)` each).
 *
 * Fractional values are call rates, not call counts.
 *
 * @example
 * ```ts
 * expandRequirement(
 *   { name: "Acme", avgCallDurationSeconds: 120, startHour: 9, endHour: 17, callVolume: 100, priority: 1 },
 *   0,
 * );
 * // 8 records, hours 9..16, 12.5 calls each
 * ```
 *
 * @category Demand
 */
export function expandRequirement(
  customer: CustomerRequirement,
  customerIndex: number,
): CustomerHourlyDemand[] {
  const activeHours = customer.endHour - customer.startHour;
  const callsPerHour = customer.callVolume / activeHours;

  const records: CustomerHourlyDemand[] = [];
  for (let hour = customer.startHour; hour < customer.endHour; hour++) {
    records.push({
      customerIndex,
      customer,
      hour,
      originalCalls: callsPerHour,
      currentCalls: callsPerHour,
    });
  }
  return records;
}

/**
 * The single store of demand records for one run.
 *
 * Records keep their index for the whole run. Traversals (per hour, per
 * customer, priority orders) are index lists into the same records, so a
 * change made through one view is seen by every other.
 *
 * @category Demand
 */
export class DemandArena {
  readonly day: DayConfig;
  readonly customers: readonly CustomerRequirement[];
  readonly records: readonly CustomerHourlyDemand[];

  #byCustomer: number[][];
  #byHour: number[][];
  #slot = new Map<string, number>();

  constructor(
    customers: readonly CustomerRequirement[],
    records: readonly CustomerHourlyDemand[],
    day: DayConfig = DEFAULT_DAY,
  ) {
    this.day = day;
    this.customers = customers;
    this.records = records;
    this.#byCustomer = customers.map(() => []);
    this.#byHour = Array.from({ length: day.hoursPerDay }, () => []);

    records.forEach((record, index) => {
      const { customerIndex, hour } = record;
      const customer = customers[customerIndex];
      if (customer === undefined || customer !== record.customer) {
        throw new Error(`Demand record ${index} does not belong to a known customer`);
      }
      if (hour < customer.startHour || hour >= customer.endHour || hour >= day.hoursPerDay) {
        throw new Error(
          `Demand record for "${customer.name}" at hour ${hour} lies outside [${customer.startHour}, ${customer.endHour})`,
        );
      }
      const key = `${customerIndex}:${hour}`;
      if (this.#slot.has(key)) {
        throw new Error(`Duplicate demand record for "${customer.name}" at hour ${hour}`);
      }
      this.#slot.set(key, index);
      this.#byCustomer[customerIndex]?.push(index);
      this.#byHour[hour]?.push(index);
    });

    for (const indices of this.#byCustomer) {
      indices.sort((a, b) => this.at(a).hour - this.at(b).hour);
    }
    for (const indices of this.#byHour) {
      indices.sort((a, b) => this.at(a).customerIndex - this.at(b).customerIndex);
    }
  }

  at(index: number): CustomerHourlyDemand {
    const record = this.records[index];
    if (!record) {
      throw new Error(`No demand record at index ${index}`);
    }
    return record;
  }

  /** Index of the record for a customer and hour, if the hour is active for it. */
  indexOf(customerIndex: number, hour: HourBucket): number | undefined {
    return this.#slot.get(`${customerIndex}:${hour}`);
  }

  /** Record indices in an hour, in customer input order. */
  indicesAt(hour: HourBucket): readonly number[] {
    return this.#byHour[hour] ?? [];
  }

  /** Record indices of a customer, by hour. */
  indicesOf(customerIndex: number): readonly number[] {
    return this.#byCustomer[customerIndex] ?? [];
  }

  /** Sum of `currentCalls` over a customer's hours. */
  currentVolumeOf(customerIndex: number): number {
    return this.indicesOf(customerIndex).reduce((sum, i) => sum + this.at(i).currentCalls, 0);
  }
}

/**
 * Expands every requirement, in input order, into one arena.
 *
 * @category Demand
 */
export function buildDemandArena(
  customers: readonly CustomerRequirement[],
  day: DayConfig = DEFAULT_DAY,
): DemandArena {
  const records = customers.flatMap((customer, index) => expandRequirement(customer, index));
  return new DemandArena(customers, records, day);
}
