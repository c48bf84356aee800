import { UpstreamService } from "../common/common-enum";
import type { Step } from "../types/model/step.model";
import { withTimeout } from "../utils/async";
import { parseCompletion } from "../utils/completionParser";
import { PLANNER_CONSTANTS } from "../utils/constants";
import { ParseFailureError, UpstreamUnavailableError } from "../utils/errors";
import { logger } from "../utils/logger";
import type { CompletionClient } from "./completion.service";

export function buildDecompositionPrompt(goalText: string): string {
  return `Create a step-by-step action plan for the following goal: "${goalText}"

Format rules:
- If the goal spans several days, start each day with a header line "Day N".
- List each step as a numbered line: "N. Step title (estimated duration)".
- Put one to three short "-" bullets under each step describing what to do.
- Keep durations in minutes or hours when possible, for example "(45 minutes)".
- Do not add an introduction or a closing summary.`;
}

export function buildFallbackStep(goalText: string): Step {
  return {
    sequence: 1,
    day: 1,
    title: PLANNER_CONSTANTS.FALLBACK_STEP.title,
    duration: PLANNER_CONSTANTS.FALLBACK_STEP.duration,
    description: `List the smaller tasks needed to reach: ${goalText}`,
  };
}

/**
 * Goal → ordered steps through the completion service. Never throws: a
 * missing client, a failed or slow call and an unparseable reply all resolve
 * to a single fallback step.
 */
export class GoalDecomposerService {
  constructor(
    private client: CompletionClient | null,
    private timeoutMs: number
  ) {}

  async decompose(goalText: string): Promise<Step[]> {
    if (!this.client) {
      return [buildFallbackStep(goalText)];
    }

    let reply: string;
    try {
      reply = await withTimeout(
        this.client.complete(buildDecompositionPrompt(goalText)),
        this.timeoutMs,
        `${this.client.provider} completion`
      );
    } catch (error) {
      const failure = new UpstreamUnavailableError(UpstreamService.COMPLETION, error);
      logger.warn(`[GoalDecomposer] ${failure.message}. Using fallback step.`);
      return [buildFallbackStep(goalText)];
    }

    const steps = parseCompletion(reply);
    if (steps.length === 0) {
      const failure = new ParseFailureError("Completion reply contained no steps", reply);
      logger.warn(`[GoalDecomposer] ${failure.message}. Using fallback step.`, {
        excerpt: failure.excerpt,
      });
      return [buildFallbackStep(goalText)];
    }

    logger.info(`[GoalDecomposer] Decomposed goal into ${steps.length} steps`);
    return steps;
  }
}
