import { PlanStatus } from "../common/common-enum";
import type { PlanSummary } from "../types/model/plan.model";
import type { PlanView } from "../types/model/planDay.model";
import { logger } from "../utils/logger";
import { analyzeGoal } from "./goalAnalysis.service";
import type { GoalDecomposerService } from "./goalDecomposer.service";
import { groupStepsByDay, type PlanAssemblerService } from "./planAssembler.service";
import type { PlanStoreService } from "./planStore.service";
import type { StepEnricherService } from "./stepEnricher.service";
import type { WeatherAugmenterService } from "./weatherAugmenter.service";

export interface PlanningAgentDeps {
  decomposer: GoalDecomposerService;
  enricher: StepEnricherService;
  weatherAugmenter: WeatherAugmenterService;
  assembler: PlanAssemblerService;
  store: PlanStoreService;
}

/**
 * Runs the planning pipeline end to end for one goal:
 * decompose → enrich (step by step) → weather → assemble → save.
 */
export class PlanningAgentService {
  constructor(private deps: PlanningAgentDeps) {}

  async initialize(): Promise<void> {
    await this.deps.store.initialize();
  }

  async close(): Promise<void> {
    await this.deps.store.close();
  }

  /**
   * Upstream failures are absorbed by each stage; only a StorageError from
   * the final save escapes, since an unsaved plan cannot be retrieved later.
   */
  async createPlan(goalText: string): Promise<PlanView> {
    const goal = analyzeGoal(goalText);
    logger.info(`[PlanningAgent] Creating plan for goal: "${goal.text}"`);
    const startedAt = Date.now();

    const steps = await this.deps.decomposer.decompose(goal.text);
    const enriched = await this.deps.enricher.enrichAll(steps, goal.location);
    const weather = await this.deps.weatherAugmenter.augment(goal.text);
    const draft = this.deps.assembler.assemble(goal.text, enriched, weather);

    await this.deps.store.save(draft);
    const plan = { ...draft, status: PlanStatus.SAVED };

    logger.info(
      `[PlanningAgent] Plan ${plan.id} saved with ${plan.steps.length} steps in ${
        Date.now() - startedAt
      }ms`
    );
    return { plan, days: groupStepsByDay(plan, goal) };
  }

  async getPlan(id: string): Promise<PlanView | null> {
    const plan = await this.deps.store.load(id);
    if (!plan) return null;
    return { plan, days: groupStepsByDay(plan) };
  }

  async listPlans(limit?: number): Promise<PlanSummary[]> {
    return this.deps.store.listAll(limit);
  }
}
