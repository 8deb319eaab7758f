import * as z from "zod";
import type { PlanResult } from "../allocation/aggregate.js";
import type { HourAllocation } from "../allocation/allocator.types.js";
import { formatHour } from "../allocation/utils.js";

export const OutputFormatSchema = z.union([z.literal("text"), z.literal("json"), z.literal("csv")]);

export type OutputFormat = z.infer<typeof OutputFormatSchema>;

/** File extension used for each output format. */
export const OUTPUT_EXTENSIONS = {
  text: "txt",
  json: "json",
  csv: "csv",
} as const satisfies Record<OutputFormat, string>;

function allocatedAgents(hour: HourAllocation): Array<[string, number]> {
  return hour.customers
    .filter((c) => c.allocatedAgents > 0)
    .map((c): [string, number] => [c.customer, c.allocatedAgents]);
}

function unmetAgents(hour: HourAllocation): Array<[string, number]> {
  return hour.customers
    .filter((c) => c.unmetAgents > 0)
    .map((c): [string, number] => [c.customer, c.unmetAgents]);
}

function pairs(entries: Array<[string, number]>, separator: string): string {
  return entries.map(([name, agents]) => `${name}=${agents}`).join(separator);
}

/**
 * One line per hour: `09:00 : total=3 ; Acme=1, Globex=2`.
 *
 * Unmet agents are appended (` | unmet: Globex=1`) for capacity-limited
 * plans only.
 */
export function formatText(result: PlanResult): string {
  const showUnmet = result.mode !== "uncapped";
  return result.hours
    .map((hour) => {
      const customers = allocatedAgents(hour);
      let line = `${formatHour(hour.hour)} : total=${hour.totalAgents} ; ${
        customers.length > 0 ? pairs(customers, ", ") : "none"
      }`;
      const unmet = unmetAgents(hour);
      if (showUnmet && unmet.length > 0) {
        line += ` | unmet: ${pairs(unmet, ", ")}`;
      }
      return line;
    })
    .join("\n");
}

/**
 * Pretty-printed JSON array, one object per hour. `unmet_demand` is only
 * present for hours with unmet agents.
 */
export function formatJson(result: PlanResult): string {
  const data = result.hours.map((hour) => {
    const unmet = unmetAgents(hour);
    return {
      hour: formatHour(hour.hour),
      total_agents: hour.totalAgents,
      customers: Object.fromEntries(allocatedAgents(hour)),
      ...(unmet.length > 0 ? { unmet_demand: Object.fromEntries(unmet) } : {}),
    };
  });
  return JSON.stringify(data, null, 2);
}

function quote(value: string): string {
  return `"${value.replaceAll('"', '""')}"`;
}

/**
 * CSV with columns `hour,total_agents,customers,unmet_demand`; customer
 * lists are `;`-separated `name=agents` pairs.
 */
export function formatCsv(result: PlanResult): string {
  const lines = ["hour,total_agents,customers,unmet_demand"];
  for (const hour of result.hours) {
    const customers = pairs(allocatedAgents(hour), ";") || "none";
    const unmet = pairs(unmetAgents(hour), ";");
    lines.push(`${formatHour(hour.hour)},${hour.totalAgents},${quote(customers)},${quote(unmet)}`);
  }
  return lines.join("\n");
}

export function formatPlan(result: PlanResult, format: OutputFormat): string {
  switch (format) {
    case "text":
      return formatText(result);
    case "json":
      return formatJson(result);
    case "csv":
      return formatCsv(result);
  }
}
