import dotenv from "dotenv";
import { z } from "zod";
import { LlmProvider } from "../common/common-enum";

dotenv.config();

export type LogLevel = "debug" | "info" | "warn" | "error";

const numeric = (name: string) =>
  z.string().regex(/^\d+$/, `${name} must be a positive integer`).optional();

const envSchema = z.object({
  PORT: numeric("PORT"),
  NODE_ENV: z.string().optional(),

  DB_HOST: z.string().optional(),
  DB_PORT: numeric("DB_PORT"),
  DB_NAME: z.string().optional(),
  DB_USER: z.string().optional(),
  DB_PASSWORD: z.string().optional(),
  DB_SSL: z.enum(["true", "false"]).optional(),
  DB_SSL_CERT: z.string().optional(),

  LLM_PROVIDER: z.nativeEnum(LlmProvider).optional(),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().optional(),
  GEMINI_API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().optional(),
  LLM_TEMPERATURE: z
    .string()
    .regex(/^\d+(\.\d+)?$/, "LLM_TEMPERATURE must be a number")
    .optional(),
  LLM_MAX_TOKENS: numeric("LLM_MAX_TOKENS"),

  SERPAPI_KEY: z.string().optional(),
  WEATHER_API_KEY: z.string().optional(),
  UPSTREAM_TIMEOUT_MS: numeric("UPSTREAM_TIMEOUT_MS"),

  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).optional(),

  RATE_LIMIT_WINDOW: numeric("RATE_LIMIT_WINDOW"),
  RATE_LIMIT_MAX: numeric("RATE_LIMIT_MAX"),
  CORS_ORIGIN: z.string().optional(),
});

export type AppConfig = ReturnType<typeof buildConfig>;

const toLogLevel = (value: string | undefined): LogLevel => {
  switch (value) {
    case "debug":
    case "warn":
    case "error":
      return value;
    default:
      return "info";
  }
};

const toProvider = (value: string | undefined): LlmProvider =>
  value === LlmProvider.GEMINI ? LlmProvider.GEMINI : LlmProvider.OPENAI;

export const buildConfig = (env: NodeJS.ProcessEnv = process.env) => {
  return {
    port: parseInt(env.PORT || "3000", 10),
    nodeEnv: env.NODE_ENV || "development",
    database: {
      host: env.DB_HOST || "localhost",
      port: parseInt(env.DB_PORT || "5432", 10),
      name: env.DB_NAME || "goal_planner",
      user: env.DB_USER || "postgres",
      password: env.DB_PASSWORD || "postgres",
      ssl: env.DB_SSL === "true",
      sslCertPath: env.DB_SSL_CERT || "",
    },
    llm: {
      provider: toProvider(env.LLM_PROVIDER),
      openaiApiKey: env.OPENAI_API_KEY || "",
      openaiModel: env.OPENAI_MODEL || "gpt-4o-mini",
      geminiApiKey: env.GEMINI_API_KEY || "",
      geminiModel: env.GEMINI_MODEL || "gemini-1.5-flash",
      temperature: parseFloat(env.LLM_TEMPERATURE || "0.7"),
      maxTokens: parseInt(env.LLM_MAX_TOKENS || "1200", 10),
    },
    search: {
      apiKey: env.SERPAPI_KEY || "",
      baseUrl: "https://serpapi.com",
      resultCount: 3,
    },
    weather: {
      apiKey: env.WEATHER_API_KEY || "",
      baseUrl: "https://api.openweathermap.org/data/2.5",
    },
    upstream: {
      timeoutMs: parseInt(env.UPSTREAM_TIMEOUT_MS || "8000", 10),
    },
    logging: {
      level: toLogLevel(env.LOG_LEVEL),
    },
    api: {
      rateLimit: {
        windowMs: parseInt(env.RATE_LIMIT_WINDOW || "900000", 10),
        max: parseInt(env.RATE_LIMIT_MAX || "100", 10),
      },
      cors: {
        origin: env.CORS_ORIGIN?.split(",") || ["http://localhost:3000"],
      },
    },
  };
};

let cachedConfig: AppConfig | null = null;

export const loadConfig = (): AppConfig => {
  if (!cachedConfig) {
    cachedConfig = buildConfig();
  }
  return cachedConfig;
};

export const validateConfig = (env: NodeJS.ProcessEnv = process.env) => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join(", ");
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
};

/**
 * Names of the upstream keys that are not set. The matching components
 * still run and fall back to their placeholder results.
 */
export const missingServiceKeys = (config: AppConfig): string[] => {
  const missing: string[] = [];
  if (config.llm.provider === LlmProvider.OPENAI && !config.llm.openaiApiKey) {
    missing.push("OPENAI_API_KEY");
  }
  if (config.llm.provider === LlmProvider.GEMINI && !config.llm.geminiApiKey) {
    missing.push("GEMINI_API_KEY");
  }
  if (!config.search.apiKey) missing.push("SERPAPI_KEY");
  if (!config.weather.apiKey) missing.push("WEATHER_API_KEY");
  return missing;
};
