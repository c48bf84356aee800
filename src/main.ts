import { loadConfig, missingServiceKeys, validateConfig } from "./configs/environment";
import { planningAgent } from "./services";
import { logger } from "./utils/logger";

class PlannerApplication {
  async initialize() {
    logger.info("Starting goal planner ...");

    validateConfig();

    const missing = missingServiceKeys(loadConfig());
    if (missing.length > 0) {
      logger.warn(`Missing ${missing.join(", ")}; the affected stages will use fallbacks.`);
    }

    await planningAgent.initialize();
    logger.info("Goal planner ready!");
  }

  async shutdown() {
    await planningAgent.close();
    logger.info("Database pool closed");
  }
}

// Run directly to prepare the database and exit.
async function main() {
  const app = new PlannerApplication();

  await app.initialize();
  await app.shutdown();
}
if (require.main === module) {
  main().catch((error) => {
    logger.error("Failed to initialize application:", error);
    process.exit(1);
  });
}

export { PlannerApplication };
