import { z } from "zod";
import { PLANNER_CONSTANTS } from "../utils/constants";

export const createPlanSchema = {
  body: z.object({
    goal: z
      .string({
        required_error: "goal is required",
        invalid_type_error: "goal must be a string",
      })
      .trim()
      .min(1, "goal is required")
      .max(500, "goal must be at most 500 characters"),
  }),
};

export const listPlansSchema = {
  query: z.object({
    limit: z.coerce
      .number({ invalid_type_error: "limit must be a number" })
      .int("limit must be an integer")
      .min(1, "limit must be at least 1")
      .max(PLANNER_CONSTANTS.MAX_LIST_LIMIT, `limit must be at most ${PLANNER_CONSTANTS.MAX_LIST_LIMIT}`)
      .optional(),
  }),
};

export const planParamsSchema = {
  params: z.object({
    id: z.string().min(1, "id is required"),
  }),
};
