import "dotenv/config";
import express from "express";
import helmet from "helmet";
import cors from "cors";
import compression from "compression";
import { loadConfig } from "./src/configs/environment";
import { requestLogger } from "./src/middlewares/logger.middleware";
import { createRateLimiter } from "./src/middlewares/validation.middleware";
import { errorMiddleware } from "./src/middlewares/error.middleware";
import { logger } from "./src/utils/logger";
import { PlannerApplication } from "./src/main";
import routes from "./src/routes";

const config = loadConfig();
const app = express();

app.use(helmet());
app.use(cors({ origin: config.api.cors.origin }));
app.use(compression());
app.use(express.json({ limit: "1mb" }));
app.use(createRateLimiter(config.api.rateLimit));
app.use(requestLogger);

app.use("/", routes);

// Error middleware should be last
app.use(errorMiddleware);

const plannerApp = new PlannerApplication();
plannerApp
  .initialize()
  .then(() => {
    app.listen(config.port, () => logger.info(`Goal planner listening on port ${config.port}`));
  })
  .catch((error) => {
    logger.error("Failed to initialize application:", error);
    process.exit(1);
  });

const shutdown = () => {
  plannerApp
    .shutdown()
    .catch((error) => logger.error("Shutdown failed:", error))
    .finally(() => process.exit(0));
};
process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
