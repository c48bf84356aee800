import type { Pool } from "pg";
import { validate as isUuid } from "uuid";
import { z } from "zod";
import { PlanStatus } from "../common/common-enum";
import { CREATE_PLANS_INDEX_SQL, CREATE_PLANS_TABLE_SQL } from "../configs/database";
import type { Plan, PlanSummary } from "../types/model/plan.model";
import { PLANNER_CONSTANTS } from "../utils/constants";
import { toIsoTimestamp } from "../utils/convert";
import { StorageError } from "../utils/errors";
import { logger } from "../utils/logger";

const stepSchema = z.object({
  sequence: z.number().int().positive(),
  day: z.number().int().positive(),
  title: z.string(),
  duration: z.string(),
  description: z.string(),
  externalInfo: z.string().optional(),
  infoSource: z.string().optional(),
});

const weatherSchema = z.object({
  location: z.string(),
  temperature: z.number(),
  condition: z.string(),
  humidity: z.number().optional(),
  forecast: z.array(
    z.object({
      date: z.string(),
      minTemperature: z.number(),
      maxTemperature: z.number(),
      condition: z.string(),
    })
  ),
});

const planBodySchema = z.object({
  totalDuration: z.string(),
  steps: z.array(stepSchema).min(1),
  weather: weatherSchema.optional(),
});

type PlanBody = z.infer<typeof planBodySchema>;

type PlanRow = {
  id: string;
  goal: string;
  body: unknown;
  created_at: Date | string;
};

const readJson = (row: PlanRow): unknown => {
  if (typeof row.body !== "string") return row.body;
  try {
    return JSON.parse(row.body);
  } catch (error) {
    throw new StorageError(`Stored plan ${row.id} is not valid JSON`, error);
  }
};

const decodeBody = (row: PlanRow): PlanBody => {
  const parsed = planBodySchema.safeParse(readJson(row));
  if (!parsed.success) {
    throw new StorageError(`Stored plan ${row.id} is corrupt`, parsed.error.issues[0]?.message);
  }
  return parsed.data;
};

const rowToPlan = (row: PlanRow): Plan => {
  const body = decodeBody(row);
  return {
    id: row.id,
    goal: row.goal,
    totalDuration: body.totalDuration,
    steps: body.steps,
    weather: body.weather,
    createdAt: toIsoTimestamp(row.created_at),
    status: PlanStatus.SAVED,
  };
};

const rowToSummary = (row: PlanRow): PlanSummary => {
  const body = decodeBody(row);
  return {
    id: row.id,
    goal: row.goal,
    totalDuration: body.totalDuration,
    stepCount: body.steps.length,
    createdAt: toIsoTimestamp(row.created_at),
  };
};

const clampLimit = (limit: number | undefined) =>
  Math.min(
    Math.max(Math.floor(limit ?? PLANNER_CONSTANTS.DEFAULT_LIST_LIMIT), 1),
    PLANNER_CONSTANTS.MAX_LIST_LIMIT
  );

/**
 * Single-table plan persistence. Rows are written once and never updated, so
 * there are no transactions; every driver error surfaces as StorageError.
 */
export class PlanStoreService {
  constructor(private pool: Pool) {}

  async initialize(): Promise<void> {
    try {
      await this.pool.query(CREATE_PLANS_TABLE_SQL);
      await this.pool.query(CREATE_PLANS_INDEX_SQL);
      logger.info("[PlanStore] plans table ready");
    } catch (error) {
      throw new StorageError("Failed to prepare plans table", error);
    }
  }

  async save(plan: Plan): Promise<string> {
    const body: PlanBody = {
      totalDuration: plan.totalDuration,
      steps: plan.steps,
      weather: plan.weather,
    };

    try {
      await this.pool.query(
        `INSERT INTO plans (id, goal, body, created_at) VALUES ($1, $2, $3, $4)`,
        [plan.id, plan.goal, JSON.stringify(body), plan.createdAt]
      );
    } catch (error) {
      throw new StorageError("Failed to save plan", error);
    }

    logger.info(`[PlanStore] Saved plan ${plan.id}`);
    return plan.id;
  }

  /** Unknown (or malformed) identifiers resolve to null. */
  async load(id: string): Promise<Plan | null> {
    if (!isUuid(id)) {
      return null;
    }

    let rows: PlanRow[];
    try {
      const result = await this.pool.query<PlanRow>(
        `SELECT id, goal, body, created_at FROM plans WHERE id = $1`,
        [id]
      );
      rows = result.rows;
    } catch (error) {
      throw new StorageError(`Failed to load plan ${id}`, error);
    }

    return rows.length > 0 ? rowToPlan(rows[0]) : null;
  }

  async listAll(limit?: number): Promise<PlanSummary[]> {
    let rows: PlanRow[];
    try {
      const result = await this.pool.query<PlanRow>(
        `SELECT id, goal, body, created_at FROM plans ORDER BY created_at DESC LIMIT $1`,
        [clampLimit(limit)]
      );
      rows = result.rows;
    } catch (error) {
      throw new StorageError("Failed to list plans", error);
    }

    return rows.map(rowToSummary);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
