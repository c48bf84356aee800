import { v4 as uuidv4 } from "uuid";
import { PlanStatus } from "../common/common-enum";
import type { Goal } from "../types/model/goal.model";
import type { Plan } from "../types/model/plan.model";
import type { PlanDayGroup } from "../types/model/planDay.model";
import type { Step } from "../types/model/step.model";
import type { WeatherInfo } from "../types/model/weather.model";
import { deriveTotalDuration } from "../utils/calculators";
import { PLANNER_CONSTANTS } from "../utils/constants";
import { analyzeGoal } from "./goalAnalysis.service";

const placeholderStep = (): Step => ({
  sequence: 1,
  day: 1,
  title: PLANNER_CONSTANTS.PLACEHOLDER_STEP.title,
  duration: PLANNER_CONSTANTS.PLACEHOLDER_STEP.duration,
  description: PLANNER_CONSTANTS.PLACEHOLDER_STEP.description,
});

// A routine repeats; "Day N" headers in the reply are one pass through it.
const isRoutine = (goal: Goal) => goal.isRecurring && !goal.hasDuration;

/**
 * Order steps by day, keeping their relative order within a day, and number
 * them 1..n across the whole plan.
 */
export function renumberSteps(steps: Step[]): Step[] {
  return steps
    .map((step, index) => ({ step, index }))
    .sort((a, b) => a.step.day - b.step.day || a.index - b.index)
    .map(({ step }, index) => ({ ...step, day: Math.max(1, step.day), sequence: index + 1 }));
}

export function groupStepsByDay(plan: Plan, goal: Goal = analyzeGoal(plan.goal)): PlanDayGroup[] {
  const groups: PlanDayGroup[] = [];
  for (const step of plan.steps) {
    const last = groups[groups.length - 1];
    if (last && last.day === step.day) {
      last.steps.push(step);
    } else {
      groups.push({ day: step.day, label: `Day ${step.day}`, steps: [step] });
    }
  }

  if (groups.length === 1 && !goal.hasDuration) {
    groups[0].label = PLANNER_CONSTANTS.DAILY_ROUTINE_LABEL;
  }
  return groups;
}

export class PlanAssemblerService {
  constructor(
    private now: () => Date = () => new Date(),
    private generateId: () => string = uuidv4
  ) {}

  /** Merge steps and weather into a draft plan. No I/O. */
  assemble(goalText: string, steps: Step[], weather?: WeatherInfo): Plan {
    const goal = analyzeGoal(goalText);
    const candidates = steps.length > 0 ? steps : [placeholderStep()];
    const ordered = renumberSteps(
      isRoutine(goal) ? candidates.map((step) => ({ ...step, day: 1 })) : candidates
    );

    return {
      id: this.generateId(),
      goal: goal.text,
      totalDuration: deriveTotalDuration(goal, ordered),
      steps: ordered,
      weather,
      createdAt: this.now().toISOString(),
      status: PlanStatus.DRAFT,
    };
  }
}
