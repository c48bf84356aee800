import type { Step } from "../types/model/step.model";
import { PLANNER_CONSTANTS } from "../utils/constants";
import { collapseWhitespace, truncate } from "../utils/convert";
import { logger } from "../utils/logger";
import type { SearchProvider } from "./webSearch.service";

const withPlaceholder = (step: Step): Step => ({
  ...step,
  externalInfo: PLANNER_CONSTANTS.NO_INFO_PLACEHOLDER,
});

export class StepEnricherService {
  constructor(private searchProvider: SearchProvider) {}

  /**
   * Attach the top search result for "<title> <keyword>" to a step. Best
   * effort: one request, no retry, and every failure ends in the
   * placeholder text.
   */
  async enrich(
    step: Step,
    keyword: string = PLANNER_CONSTANTS.DEFAULT_SEARCH_KEYWORD
  ): Promise<Step> {
    if (!this.searchProvider.isConfigured) {
      return withPlaceholder(step);
    }

    const query = collapseWhitespace(`${step.title} ${keyword}`);
    try {
      const results = await this.searchProvider.search(query);
      const top = results[0];
      const text = top ? collapseWhitespace(top.snippet) || collapseWhitespace(top.title) : "";

      if (!top || !text) {
        logger.debug(`[StepEnricher] No results for "${query}"`);
        return withPlaceholder(step);
      }

      return {
        ...step,
        externalInfo: truncate(text, PLANNER_CONSTANTS.MAX_SNIPPET_LENGTH),
        infoSource: top.link || undefined,
      };
    } catch (error) {
      logger.warn(`[StepEnricher] Enrichment failed for step ${step.sequence}:`, error);
      return withPlaceholder(step);
    }
  }

  /** Steps are enriched one after another, in sequence order. */
  async enrichAll(steps: Step[], keyword?: string): Promise<Step[]> {
    const enriched: Step[] = [];
    for (const step of steps) {
      enriched.push(await this.enrich(step, keyword));
    }
    return enriched;
  }
}
