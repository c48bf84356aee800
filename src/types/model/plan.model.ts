import type { PlanStatus } from "../../common/common-enum";
import type { Step } from "./step.model";
import type { WeatherInfo } from "./weather.model";

export interface Plan {
  id: string;
  goal: string;
  totalDuration: string;
  steps: Step[];
  weather?: WeatherInfo;
  createdAt: string; // ISO-8601
  status: PlanStatus;
}

export interface PlanSummary {
  id: string;
  goal: string;
  totalDuration: string;
  stepCount: number;
  createdAt: string;
}
