import { PLANNER_CONSTANTS } from "./constants";
import type { Goal } from "../types/model/goal.model";
import type { Step } from "../types/model/step.model";

const HOUR_UNIT = "(?:hours?|hrs?|h)";
const MINUTE_UNIT = "(?:minutes?|mins?|m)";

const SINGLE_UNIT = new RegExp(`^(\\d+(?:\\.\\d+)?)\\s*(${HOUR_UNIT}|${MINUTE_UNIT})?$`);
const HOURS_AND_MINUTES = new RegExp(
  `^(\\d+)\\s*${HOUR_UNIT}\\s*(?:and\\s+)?(\\d+)\\s*${MINUTE_UNIT}$`
);

const isHourUnit = (unit: string) => /^h/.test(unit);

/**
 * Parse a step duration into whole minutes. Returns null for anything that
 * is not a plain amount of minutes or hours ("Half a day", "1-2 hours",
 * "Ongoing").
 */
export function parseDurationMinutes(duration: string): number | null {
  const text = duration.trim().toLowerCase();
  if (!text) return null;

  const compound = HOURS_AND_MINUTES.exec(text);
  if (compound) {
    return parseInt(compound[1], 10) * 60 + parseInt(compound[2], 10);
  }

  const single = SINGLE_UNIT.exec(text);
  if (!single) return null;

  const amount = parseFloat(single[1]);
  const unit = single[2] ?? "minutes";
  return Math.round(isHourUnit(unit) ? amount * 60 : amount);
}

const plural = (count: number, unit: string) =>
  `${count} ${unit}${count === 1 ? "" : "s"}`;

export function formatMinutes(totalMinutes: number): string {
  if (totalMinutes < 60) return plural(totalMinutes, "minute");
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  return minutes === 0
    ? plural(hours, "hour")
    : `${plural(hours, "hour")} ${plural(minutes, "minute")}`;
}

export function formatDays(days: number): string {
  return plural(days, "day");
}

/**
 * Human-readable length of a whole plan.
 *
 * A requested day count wins, then recurring goals read as "Ongoing", then
 * steps spread over several days give "N days". Otherwise the step durations are summed,
 * but only when every one of them is numeric.
 */
export function deriveTotalDuration(goal: Goal, steps: Step[]): string {
  const lastDay = steps.reduce((max, step) => Math.max(max, step.day), 0);
  if (goal.dayCount !== undefined) return formatDays(goal.dayCount);
  if (goal.isRecurring) return PLANNER_CONSTANTS.ONGOING_DURATION;
  if (lastDay > 1) return formatDays(lastDay);

  let total = 0;
  for (const step of steps) {
    const minutes = parseDurationMinutes(step.duration);
    if (minutes === null) return PLANNER_CONSTANTS.ONGOING_DURATION;
    total += minutes;
  }
  return steps.length > 0 ? formatMinutes(total) : PLANNER_CONSTANTS.ONGOING_DURATION;
}
