import type { WeatherInfo } from "../types/model/weather.model";
import { PLANNER_CONSTANTS } from "../utils/constants";
import { logger } from "../utils/logger";
import { analyzeGoal } from "./goalAnalysis.service";
import type { WeatherProvider } from "./weather.service";

export class WeatherAugmenterService {
  constructor(private weatherProvider: WeatherProvider) {}

  /**
   * Weather for the place named in the goal, if any. At most one lookup per
   * plan; an unknown place or a failed lookup leaves the plan without weather.
   */
  async augment(goalText: string): Promise<WeatherInfo | undefined> {
    const goal = analyzeGoal(goalText);
    if (!goal.location) {
      return undefined;
    }
    if (!this.weatherProvider.isConfigured) {
      return undefined;
    }

    const days = Math.min(
      goal.dayCount ?? PLANNER_CONSTANTS.DEFAULT_FORECAST_DAYS,
      PLANNER_CONSTANTS.MAX_FORECAST_DAYS
    );

    try {
      const weather = await this.weatherProvider.getWeather(goal.location, days);
      logger.info(`[WeatherAugmenter] Weather attached for ${weather.location}`);
      return weather;
    } catch (error) {
      logger.warn(`[WeatherAugmenter] No weather for "${goal.location}":`, error);
      return undefined;
    }
  }
}
