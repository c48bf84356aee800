import axios, { type AxiosInstance, type InternalAxiosRequestConfig } from "axios";
import type { Pool } from "pg";
import { newDb } from "pg-mem";
import { LlmProvider } from "../common/common-enum";
import type { CompletionClient } from "../services/completion.service";
import type { SearchProvider, SearchResult } from "../services/webSearch.service";
import type { WeatherProvider } from "../services/weather.service";
import type { WeatherInfo } from "../types/model/weather.model";

export class FakeCompletionClient implements CompletionClient {
  readonly provider = LlmProvider.OPENAI;
  prompts: string[] = [];

  constructor(private respond: (prompt: string) => Promise<string>) {}

  complete(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return this.respond(prompt);
  }
}

export class FakeSearchProvider implements SearchProvider {
  isConfigured = true;
  queries: string[] = [];

  constructor(private respond: (query: string) => Promise<SearchResult[]>) {}

  search(query: string): Promise<SearchResult[]> {
    this.queries.push(query);
    return this.respond(query);
  }
}

export class FakeWeatherProvider implements WeatherProvider {
  isConfigured = true;
  calls: Array<{ location: string; days?: number }> = [];

  constructor(private respond: (location: string) => Promise<WeatherInfo>) {}

  getWeather(location: string, days?: number): Promise<WeatherInfo> {
    this.calls.push({ location, days });
    return this.respond(location);
  }
}

/** An axios instance whose requests are answered in process by `handler`. */
export function stubHttp(handler: (config: InternalAxiosRequestConfig) => unknown) {
  const requests: InternalAxiosRequestConfig[] = [];
  const http: AxiosInstance = axios.create({
    adapter: async (config) => {
      requests.push(config);
      const data = await handler(config);
      return { data, status: 200, statusText: "OK", headers: {}, config };
    },
  });
  return { http, requests };
}

/** In-memory PostgreSQL through pg-mem's drop-in replacement for `pg`. */
export function createMemoryPool(): Pool {
  const { Pool: MemoryPool } = newDb().adapters.createPg();
  return new MemoryPool();
}

export const pending = <T>() => new Promise<T>(() => undefined);

export const planId = (n: number) =>
  `00000000-0000-4000-8000-${String(n).padStart(12, "0")}`;

export const HYDERABAD_REPLY = `Here is your food tour:

Day 1: Old City Flavours
1. Breakfast at a dosa stall (1 hour)
   - Try the butter dosa
   - Arrive before 8 am
2. **Charminar street food walk** (2 hours)
   - Sample samosas and Irani chai

Day 2
1. Vegetarian thali lunch (90 minutes): pick a Telugu thali
2. Bakery visit (30 minutes)`;

export const STUDY_ROUTINE_REPLY = `1. Warm-up review (15 minutes)
   - Skim yesterday's notes
2. Read one tutorial chapter (30 minutes)
3. Solve practice exercises (45 minutes)
4. Build a small script (30 minutes)
5. Write a summary (10 minutes)`;
