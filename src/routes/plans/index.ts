import express from "express";
import { PlanController } from "../../controllers/plan.controller";
import { requireJsonBody } from "../../middlewares/validation.middleware";
import { validateRequest } from "../../middlewares/schema-validation.middleware";
import { planningAgent } from "../../services";
import {
  createPlanSchema,
  listPlansSchema,
  planParamsSchema,
} from "../../validators/plan.validator";

const router = express.Router();
const planController = new PlanController(planningAgent);

/**
 * @route POST /api/v1/plans
 * @desc Create and save a plan for a free-text goal
 * @access Public
 */
router.post(
  "/",
  requireJsonBody,
  validateRequest(createPlanSchema),
  planController.createPlan
);

/**
 * @route GET /api/v1/plans
 * @desc List saved plans, most recent first
 * @access Public
 */
router.get("/", validateRequest(listPlansSchema), planController.listPlans);

/**
 * @route GET /api/v1/plans/:id
 * @desc Get one saved plan grouped by day
 * @access Public
 */
router.get("/:id", validateRequest(planParamsSchema), planController.getPlan);

export default router;
