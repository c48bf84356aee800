"use strict";
import express from "express";
import { LlmProvider } from "../../common/common-enum";
import { loadConfig } from "../../configs/environment";

const healthRouter = express.Router();

healthRouter.get("/", (req, res) => {
  res.json({
    success: true,
    message: "Goal planner backend is healthy",
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    environment: loadConfig().nodeEnv,
  });
});

healthRouter.get("/status", (req, res) => {
  const config = loadConfig();
  const llmKey =
    config.llm.provider === LlmProvider.GEMINI
      ? config.llm.geminiApiKey
      : config.llm.openaiApiKey;

  res.json({
    success: true,
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    services: {
      completion: llmKey ? "configured" : "not_configured",
      completion_provider: config.llm.provider,
      search: config.search.apiKey ? "configured" : "not_configured",
      weather: config.weather.apiKey ? "configured" : "not_configured",
      database: `${config.database.host}:${config.database.port}/${config.database.name}`,
    },
    endpoints: {
      plans: "/api/v1/plans",
    },
  });
});

export default healthRouter;
