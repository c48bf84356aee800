import type { Plan } from "./plan.model";
import type { Step } from "./step.model";

export interface PlanDayGroup {
  day: number;
  label: string; // "Day 2" or "Daily Routine"
  steps: Step[];
}

export interface PlanView {
  plan: Plan;
  days: PlanDayGroup[];
}
