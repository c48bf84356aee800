import { PLANNER_CONSTANTS } from "./constants";
import { collapseWhitespace } from "./convert";
import type { Step } from "../types/model/step.model";

const DAY_HEADER = /^day\s+(\d+)\b/i;
const NUMBERED_ENTRY = /^(\d+)[.)]\s+(.+)$/;
const BULLET = /^[-*•]\s+(.+)$/;
const PARENTHESIZED = /\(([^()]*)\)/g;

const stripEmphasis = (text: string) => collapseWhitespace(text.replace(/\*\*|__/g, ""));

const headerText = (line: string) =>
  line.replace(/^#{1,6}\s*/, "").replace(/^\*\*|^__/, "").trim();

interface ParsedEntry {
  title: string;
  duration: string;
  description: string;
}

/**
 * Split "Title (duration): inline text" around its last parenthesised group.
 */
export function parseEntry(text: string): ParsedEntry | null {
  const cleaned = stripEmphasis(text);
  const groups = [...cleaned.matchAll(PARENTHESIZED)];
  const last = groups[groups.length - 1];

  if (!last || last.index === undefined) {
    const [title, ...rest] = cleaned.split(/\s+[-–:]\s+|:\s+/);
    const trimmedTitle = title.replace(/[:\-–]\s*$/, "").trim();
    if (!trimmedTitle) return null;
    return {
      title: trimmedTitle,
      duration: PLANNER_CONSTANTS.UNSPECIFIED_DURATION,
      description: rest.join(" ").trim(),
    };
  }

  const title = cleaned
    .slice(0, last.index)
    .replace(/[\s:\-–]+$/, "")
    .trim();
  if (!title) return null;

  const duration = last[1].trim() || PLANNER_CONSTANTS.UNSPECIFIED_DURATION;
  const description = cleaned
    .slice(last.index + last[0].length)
    .replace(/^[\s:\-–]+/, "")
    .trim();

  return { title, duration, description };
}

/**
 * Turn a free-form completion reply into ordered steps.
 *
 * "Day N" headers switch the current day (day 1 until one is seen), numbered
 * lines open a step and bullets under a step form its description, as do
 * numbered lines indented deeper than the step. Lines that fit none of these
 * are skipped.
 */
export function parseCompletion(reply: string): Step[] {
  const steps: Step[] = [];
  let currentDay = 1;
  let current: Step | null = null;
  let currentIndent = 0;
  let bullets: string[] = [];

  const flush = () => {
    if (!current) return;
    if (bullets.length > 0) {
      current.description = [current.description, ...bullets].filter(Boolean).join(" ");
    }
    steps.push(current);
    current = null;
    bullets = [];
  };

  for (const rawLine of reply.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;

    const header = DAY_HEADER.exec(headerText(line));
    if (header) {
      flush();
      const day = parseInt(header[1], 10);
      if (day >= 1) currentDay = day;
      continue;
    }

    const indent = rawLine.length - rawLine.trimStart().length;
    const numbered = NUMBERED_ENTRY.exec(line.replace(/^\*\*(?=\d)/, ""));
    if (numbered && current && indent > currentIndent) {
      // indented deeper than its step: a sub-item of that step
      const text = stripEmphasis(numbered[2]);
      if (text) bullets.push(text);
      continue;
    }
    if (numbered) {
      const entry = parseEntry(numbered[2]);
      if (!entry) continue;
      flush();
      currentIndent = indent;
      current = {
        sequence: steps.length + 1,
        day: currentDay,
        title: entry.title,
        duration: entry.duration,
        description: entry.description,
      };
      continue;
    }

    if (!current) continue;

    const bullet = BULLET.exec(line);
    if (bullet) {
      const text = stripEmphasis(bullet[1]);
      if (text) bullets.push(text);
      continue;
    }

    if (!current.description && bullets.length === 0) {
      current.description = stripEmphasis(line);
    }
  }

  flush();
  return steps;
}
