import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import { UpstreamService } from "../common/common-enum";
import type { AppConfig } from "../configs/environment";
import type { DailyForecast, WeatherInfo } from "../types/model/weather.model";
import { PLANNER_CONSTANTS } from "../utils/constants";
import { toDateKey } from "../utils/convert";
import { UpstreamUnavailableError } from "../utils/errors";
import { logger } from "../utils/logger";

export interface WeatherProvider {
  readonly isConfigured: boolean;
  getWeather(location: string, days?: number): Promise<WeatherInfo>;
}

const conditionSchema = z.array(z.object({ description: z.string() })).min(1);

const forecastEntrySchema = z.object({
  dt: z.number(),
  main: z.object({ temp: z.number(), humidity: z.number().optional() }),
  weather: conditionSchema,
});

const forecastSchema = z.object({
  city: z.object({ name: z.string().optional() }).optional(),
  list: z.array(forecastEntrySchema).min(1),
});

export type ForecastEntry = z.infer<typeof forecastEntrySchema>;

const mostFrequent = (values: string[]): string => {
  const counts = new Map<string, number>();
  let best = values[0] ?? "";
  for (const value of values) {
    const count = (counts.get(value) ?? 0) + 1;
    counts.set(value, count);
    if (count > (counts.get(best) ?? 0)) best = value;
  }
  return best;
};

/**
 * Collapse 3-hourly forecast entries into one summary per calendar day:
 * min/max temperature and the most frequent condition (first seen wins ties).
 */
export function summarizeForecast(entries: ForecastEntry[], days: number): DailyForecast[] {
  const byDate = new Map<string, { temps: number[]; conditions: string[] }>();

  for (const entry of entries.slice(0, days * PLANNER_CONSTANTS.FORECAST_SLOTS_PER_DAY)) {
    const date = toDateKey(entry.dt);
    const bucket = byDate.get(date) ?? { temps: [], conditions: [] };
    bucket.temps.push(entry.main.temp);
    bucket.conditions.push(entry.weather[0].description);
    byDate.set(date, bucket);
  }

  return [...byDate.entries()].map(([date, { temps, conditions }]) => ({
    date,
    minTemperature: Math.min(...temps),
    maxTemperature: Math.max(...temps),
    condition: mostFrequent(conditions),
  }));
}

/**
 * Current conditions and a short daily forecast from one OpenWeatherMap
 * `/forecast` call in metric units. The first 3-hour slot stands in for the
 * current weather.
 */
export class WeatherService implements WeatherProvider {
  private http: AxiosInstance;

  constructor(
    private settings: AppConfig["weather"],
    timeoutMs: number,
    http?: AxiosInstance
  ) {
    this.http = http ?? axios.create({ baseURL: settings.baseUrl, timeout: timeoutMs });

    if (!this.isConfigured) {
      logger.warn("WEATHER_API_KEY not found. Plans will be created without weather.");
    }
  }

  get isConfigured(): boolean {
    return this.settings.apiKey.length > 0;
  }

  async getWeather(
    location: string,
    days: number = PLANNER_CONSTANTS.DEFAULT_FORECAST_DAYS
  ): Promise<WeatherInfo> {
    let data: unknown;
    try {
      const response = await this.http.get("/forecast", {
        params: {
          q: location,
          cnt: days * PLANNER_CONSTANTS.FORECAST_SLOTS_PER_DAY,
          appid: this.settings.apiKey,
          units: "metric",
        },
      });
      data = response.data;
    } catch (error) {
      throw new UpstreamUnavailableError(UpstreamService.WEATHER, error);
    }

    const parsed = forecastSchema.safeParse(data);
    if (!parsed.success) {
      throw new UpstreamUnavailableError(UpstreamService.WEATHER, "malformed response");
    }

    const { city, list } = parsed.data;
    const [current] = list;
    return {
      location: city?.name || location,
      temperature: current.main.temp,
      condition: current.weather[0].description,
      humidity: current.main.humidity,
      forecast: summarizeForecast(list, days),
    };
  }
}
