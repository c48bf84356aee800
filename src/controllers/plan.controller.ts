import { Request, Response, NextFunction } from "express";
import type { PlanningAgentService } from "../services/planningAgent.service";
import { StorageError } from "../utils/errors";
import { logger } from "../utils/logger";
import { exposeError, sendError, sendSuccess } from "../utils/response";
import type { CreatePlanRequest, ListPlansQuery } from "../types/request/planRequest";
import { listPlansSchema } from "../validators/plan.validator";

export class PlanController {
  constructor(private agent: PlanningAgentService) {}

  /**
   * @route POST /api/v1/plans
   * @desc Decompose a goal into a day-by-day plan and save it
   */
  createPlan = async (req: Request, res: Response, next: NextFunction) => {
    const { goal }: CreatePlanRequest = req.body;
    try {
      const view = await this.agent.createPlan(goal);
      sendSuccess(res, `Plan created with ${view.plan.steps.length} steps`, view, 201);
    } catch (error) {
      if (!(error instanceof StorageError)) {
        next(error);
        return;
      }
      logger.error("Plan creation failed:", error);
      sendError(res, "Failed to create plan", 500, exposeError(error));
    }
  };

  /**
   * @route GET /api/v1/plans
   * @desc Most recent plans first
   */
  listPlans = async (req: Request, res: Response, next: NextFunction) => {
    const { limit }: ListPlansQuery = listPlansSchema.query.parse(req.query);
    try {
      const plans = await this.agent.listPlans(limit);
      sendSuccess(res, `Found ${plans.length} plans`, { plans, count: plans.length });
    } catch (error) {
      next(error);
    }
  };

  /**
   * @route GET /api/v1/plans/:id
   */
  getPlan = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const view = await this.agent.getPlan(req.params.id);
      if (!view) {
        sendError(res, "Plan not found", 404);
        return;
      }
      sendSuccess(res, "Plan retrieved successfully", view);
    } catch (error) {
      next(error);
    }
  };
}
