import { describe, it, expect, beforeEach } from "vitest";
import type { Pool } from "pg";
import { PlanStatus } from "../common/common-enum";
import { PlanStoreService } from "../services/planStore.service";
import type { Plan } from "../types/model/plan.model";
import { StorageError } from "../utils/errors";
import { createMemoryPool, planId } from "./helpers";

const makePlan = (n: number, createdAt: string, overrides: Partial<Plan> = {}): Plan => ({
  id: planId(n),
  goal: `Goal number ${n}`,
  totalDuration: "1 hour",
  steps: [
    {
      sequence: 1,
      day: 1,
      title: "Start",
      duration: "1 hour",
      description: "Begin",
      externalInfo: "No additional information found",
    },
  ],
  createdAt,
  status: PlanStatus.DRAFT,
  ...overrides,
});

describe("PlanStoreService", () => {
  let pool: Pool;
  let store: PlanStoreService;

  beforeEach(async () => {
    pool = createMemoryPool();
    store = new PlanStoreService(pool);
    await store.initialize();
  });

  it("loads back what it saved", async () => {
    const plan = makePlan(1, "2026-10-19T08:00:00.000Z", {
      weather: {
        location: "Hyderabad",
        temperature: 28,
        condition: "partly cloudy",
        humidity: 70,
        forecast: [
          { date: "2026-10-20", minTemperature: 24, maxTemperature: 31, condition: "light rain" },
        ],
      },
    });

    const id = await store.save(plan);
    const loaded = await store.load(id);

    expect(id).toBe(plan.id);
    expect(loaded).toEqual({ ...plan, status: PlanStatus.SAVED });
  });

  it("returns the same plan on every load", async () => {
    const id = await store.save(makePlan(2, "2026-10-19T08:00:00.000Z"));

    expect(await store.load(id)).toEqual(await store.load(id));
  });

  it("can be initialized twice", async () => {
    await expect(store.initialize()).resolves.toBeUndefined();
  });

  it("returns null for an unknown id", async () => {
    expect(await store.load(planId(404))).toBeNull();
  });

  it("returns null for a malformed id", async () => {
    expect(await store.load("not-a-plan-id")).toBeNull();
  });

  it("lists newest first with a limit", async () => {
    await store.save(makePlan(1, "2026-10-17T08:00:00.000Z"));
    await store.save(makePlan(2, "2026-10-19T08:00:00.000Z"));
    await store.save(makePlan(3, "2026-10-18T08:00:00.000Z"));

    const all = await store.listAll();
    const latest = await store.listAll(2);

    expect(all.map((p) => p.id)).toEqual([planId(2), planId(3), planId(1)]);
    expect(latest.map((p) => p.id)).toEqual([planId(2), planId(3)]);
    expect(all[0]).toEqual({
      id: planId(2),
      goal: "Goal number 2",
      totalDuration: "1 hour",
      stepCount: 1,
      createdAt: "2026-10-19T08:00:00.000Z",
    });
  });

  it("rejects a duplicate id", async () => {
    await store.save(makePlan(1, "2026-10-19T08:00:00.000Z"));

    await expect(store.save(makePlan(1, "2026-10-19T09:00:00.000Z"))).rejects.toBeInstanceOf(
      StorageError
    );
  });

  it("raises StorageError when the table is missing", async () => {
    const bare = new PlanStoreService(createMemoryPool());

    await expect(bare.save(makePlan(1, "2026-10-19T08:00:00.000Z"))).rejects.toThrow(
      /^Failed to save plan: /
    );
    await expect(bare.listAll()).rejects.toBeInstanceOf(StorageError);
  });

  it("raises StorageError for a corrupt stored body", async () => {
    await pool.query(
      `INSERT INTO plans (id, goal, body, created_at) VALUES ($1, $2, $3, $4)`,
      [planId(9), "Broken", JSON.stringify({ steps: [] }), "2026-10-19T08:00:00.000Z"]
    );

    await expect(store.load(planId(9))).rejects.toThrow(`Stored plan ${planId(9)} is corrupt`);
  });
});
