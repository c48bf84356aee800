import { Pool } from "pg";
import { buildDatabaseConfig } from "../configs/database";
import { loadConfig, type AppConfig } from "../configs/environment";
import { createCompletionClient } from "./completion.service";
import { GoalDecomposerService } from "./goalDecomposer.service";
import { PlanAssemblerService } from "./planAssembler.service";
import { PlanningAgentService } from "./planningAgent.service";
import { PlanStoreService } from "./planStore.service";
import { StepEnricherService } from "./stepEnricher.service";
import { WeatherService } from "./weather.service";
import { WeatherAugmenterService } from "./weatherAugmenter.service";
import { WebSearchService } from "./webSearch.service";

export function createPlanningAgent(
  config: AppConfig,
  pool: Pool = new Pool(buildDatabaseConfig(config))
): PlanningAgentService {
  const timeoutMs = config.upstream.timeoutMs;

  return new PlanningAgentService({
    decomposer: new GoalDecomposerService(createCompletionClient(config), timeoutMs),
    enricher: new StepEnricherService(new WebSearchService(config.search, timeoutMs)),
    weatherAugmenter: new WeatherAugmenterService(new WeatherService(config.weather, timeoutMs)),
    assembler: new PlanAssemblerService(),
    store: new PlanStoreService(pool),
  });
}

// Singleton shared by the HTTP layer and the start-up sequence
export const planningAgent = createPlanningAgent(loadConfig());
