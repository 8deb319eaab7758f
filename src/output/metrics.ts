import type { PlanResult } from "../allocation/aggregate.js";
import { formatHour } from "../allocation/utils.js";

const RULE = "=".repeat(50);
const THIN_RULE = "-".repeat(50);
const MOVES_SHOWN = 10;

const count = (value: number): string => value.toLocaleString("en-US");

/**
 * Totals across the plan: calls requested and served, agent-hours, peak
 * agents and unmet agent-hours.
 */
export interface PlanMetrics {
  callsRequested: number;
  callsServed: number;
  /** `callsServed / callsRequested`; 1 when nothing was requested. */
  servedRatio: number;
  agentHours: number;
  peakAgents: number;
  unmetAgentHours: number;
}

export function computeMetrics(result: PlanResult): PlanMetrics {
  const callsRequested = result.reports.reduce((sum, r) => sum + r.requestedCalls, 0);
  const callsServed = result.reports.reduce((sum, r) => sum + r.servedCalls, 0);
  const agents = result.schedule.map((e) => e.agents);
  return {
    callsRequested,
    callsServed,
    servedRatio: callsRequested > 0 ? callsServed / callsRequested : 1,
    agentHours: agents.reduce((sum, a) => sum + a, 0),
    peakAgents: agents.length > 0 ? Math.max(...agents) : 0,
    unmetAgentHours: result.reports.reduce((sum, r) => sum + r.unmetAgentHours, 0),
  };
}

/**
 * Human-readable summary block for stderr.
 *
 * @example
 * ```text
 * ==================================================
 * METRICS SUMMARY
 * ==================================================
 * Total calls required:    100
 * Total calls served:      100 (100.0%)
 * Total agent-hours:       8
 * Peak agents (any hour):  1
 *
 * Unmet demand:            None
 * ==================================================
 * ```
 */
export function formatMetrics(result: PlanResult): string {
  const metrics = computeMetrics(result);
  const lines = [
    RULE,
    "METRICS SUMMARY",
    RULE,
    `Total calls required:    ${count(metrics.callsRequested)}`,
    `Total calls served:      ${count(metrics.callsServed)} (${(metrics.servedRatio * 100).toFixed(1)}%)`,
    `Total agent-hours:       ${count(metrics.agentHours)}`,
    `Peak agents (any hour):  ${count(metrics.peakAgents)}`,
    "",
  ];

  const unmetHours = result.hours.filter((h) => h.customers.some((c) => c.unmetAgents > 0));
  if (unmetHours.length === 0) {
    lines.push("Unmet demand:            None");
  } else {
    lines.push(`Unmet demand:            ${count(metrics.unmetAgentHours)} agent-hours`);
    lines.push(THIN_RULE);
    lines.push("Unmet demand breakdown by hour:");
    for (const hour of unmetHours) {
      const unmet = hour.customers.filter((c) => c.unmetAgents > 0);
      const total = unmet.reduce((sum, c) => sum + c.unmetAgents, 0);
      const detail = unmet.map((c) => `${c.customer}=${c.unmetAgents}`).join(", ");
      lines.push(`  ${formatHour(hour.hour)} : ${count(total)} agents (${detail})`);
    }
  }

  if (result.mode === "shift") {
    lines.push(THIN_RULE);
    lines.push(`Call redistributions:    ${count(result.moves.length)}`);
    for (const move of result.moves.slice(0, MOVES_SHOWN)) {
      lines.push(
        `  ${move.customer}: ${formatHour(move.fromHour)} → ${formatHour(move.toHour)} (${move.callsMoved.toFixed(0)} calls)`,
      );
    }
    if (result.moves.length > MOVES_SHOWN) {
      lines.push(`  ... and ${result.moves.length - MOVES_SHOWN} more`);
    }
  }

  lines.push(RULE);
  return lines.join("\n");
}
