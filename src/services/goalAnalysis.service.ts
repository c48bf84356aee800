import { KNOWN_LOCATIONS } from "../utils/constants";
import { toTitleCase } from "../utils/convert";
import type { Goal } from "../types/model/goal.model";

const LOCATIONS_LONGEST_FIRST = [...KNOWN_LOCATIONS].sort((a, b) => b.length - a.length);

const PLACE_AFTER_PREPOSITION =
  /\b(?:in|to|at|around|near|visit|visiting)\s+([A-Z][\w'-]*(?:\s+[A-Z][\w'-]*)*)/;

const DAY_COUNT = /\b(\d+)\s*-?\s*(day|week)s?\b/i;
const WEEKEND = /\bweekend\b/i;
const RECURRING = /\b(daily|routine|every\s+day|each\s+day|habits?)\b/i;

const escapeRegExp = (text: string) => text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/**
 * Find a place name in a goal: a known city first, then a capitalised phrase
 * following a preposition ("... in San Sebastian"). No NLP, so false positives
 * are possible and are settled by the weather lookup failing.
 */
export function extractLocation(goalText: string): string | undefined {
  for (const city of LOCATIONS_LONGEST_FIRST) {
    if (new RegExp(`\\b${escapeRegExp(city)}\\b`, "i").test(goalText)) {
      return toTitleCase(city);
    }
  }

  const match = PLACE_AFTER_PREPOSITION.exec(goalText);
  return match ? match[1].trim() : undefined;
}

export function extractDayCount(goalText: string): number | undefined {
  const match = DAY_COUNT.exec(goalText);
  if (match) {
    const amount = parseInt(match[1], 10);
    if (amount < 1) return undefined;
    return match[2].toLowerCase() === "week" ? amount * 7 : amount;
  }
  return WEEKEND.test(goalText) ? 2 : undefined;
}

export function analyzeGoal(goalText: string): Goal {
  const text = goalText.trim();
  const location = extractLocation(text);
  const dayCount = extractDayCount(text);

  return {
    text,
    location,
    dayCount,
    isRecurring: RECURRING.test(text),
    hasLocation: location !== undefined,
    hasDuration: dayCount !== undefined,
  };
}
