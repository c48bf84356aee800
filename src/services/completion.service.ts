import OpenAI from "openai";
import { GoogleGenerativeAI } from "@google/generative-ai";
import { LlmProvider } from "../common/common-enum";
import type { AppConfig } from "../configs/environment";
import { logger } from "../utils/logger";

export const PLANNER_SYSTEM_PROMPT =
  "You are a helpful planning assistant. You break goals into concrete, " +
  "day-by-day action steps and always answer in plain text.";

export interface CompletionClient {
  readonly provider: LlmProvider;
  complete(prompt: string): Promise<string>;
}

type LlmSettings = AppConfig["llm"];

export class OpenAICompletionClient implements CompletionClient {
  readonly provider = LlmProvider.OPENAI;
  private openai: OpenAI;

  constructor(private settings: LlmSettings, timeoutMs: number) {
    // fire-once: the decomposer falls back instead of retrying
    this.openai = new OpenAI({
      apiKey: settings.openaiApiKey,
      timeout: timeoutMs,
      maxRetries: 0,
    });
  }

  async complete(prompt: string): Promise<string> {
    const completion = await this.openai.chat.completions.create({
      model: this.settings.openaiModel,
      temperature: this.settings.temperature,
      max_tokens: this.settings.maxTokens,
      messages: [
        { role: "system", content: PLANNER_SYSTEM_PROMPT },
        { role: "user", content: prompt },
      ],
    });
    return completion.choices[0]?.message?.content ?? "";
  }
}

export class GeminiCompletionClient implements CompletionClient {
  readonly provider = LlmProvider.GEMINI;
  private gemini: GoogleGenerativeAI;

  constructor(private settings: LlmSettings, private timeoutMs: number) {
    this.gemini = new GoogleGenerativeAI(settings.geminiApiKey);
  }

  async complete(prompt: string): Promise<string> {
    const model = this.gemini.getGenerativeModel(
      {
        model: this.settings.geminiModel,
        systemInstruction: PLANNER_SYSTEM_PROMPT,
        generationConfig: {
          temperature: this.settings.temperature,
          maxOutputTokens: this.settings.maxTokens,
        },
      },
      { timeout: this.timeoutMs }
    );

    const result = await model.generateContent(prompt);
    return result.response.text();
  }
}

/**
 * Build the client for the configured provider, or null when its API key is
 * missing so the decomposer goes straight to its fallback step.
 */
export function createCompletionClient(config: AppConfig): CompletionClient | null {
  const { llm, upstream } = config;

  if (llm.provider === LlmProvider.GEMINI) {
    if (!llm.geminiApiKey) {
      logger.warn("GEMINI_API_KEY not set. Goal decomposition will use the fallback step.");
      return null;
    }
    logger.info(`Gemini completion client configured (${llm.geminiModel})`);
    return new GeminiCompletionClient(llm, upstream.timeoutMs);
  }

  if (!llm.openaiApiKey) {
    logger.warn("OPENAI_API_KEY not set. Goal decomposition will use the fallback step.");
    return null;
  }
  logger.info(`OpenAI completion client configured (${llm.openaiModel})`);
  return new OpenAICompletionClient(llm, upstream.timeoutMs);
}
