import { describe, it, expect } from "vitest";
import { createPlanSchema, listPlansSchema } from "../validators/plan.validator";

const firstIssue = (result: { success: boolean; error?: { issues: { message: string }[] } }) =>
  result.error?.issues[0]?.message;

describe("createPlanSchema", () => {
  it("trims the goal", () => {
    const parsed = createPlanSchema.body.safeParse({ goal: "  Learn to juggle  " });
    expect(parsed.success && parsed.data.goal).toBe("Learn to juggle");
  });

  it.each([
    [{}, "goal is required"],
    [{ goal: "   " }, "goal is required"],
    [{ goal: 42 }, "goal must be a string"],
    [{ goal: "x".repeat(501) }, "goal must be at most 500 characters"],
  ])("rejects %j", (body, message) => {
    expect(firstIssue(createPlanSchema.body.safeParse(body))).toBe(message);
  });
});

describe("listPlansSchema", () => {
  it("coerces the limit", () => {
    const parsed = listPlansSchema.query.safeParse({ limit: "10" });
    expect(parsed.success && parsed.data.limit).toBe(10);
  });

  it("allows no limit", () => {
    const parsed = listPlansSchema.query.safeParse({});
    expect(parsed.success).toBe(true);
    expect(parsed.success && parsed.data.limit).toBeUndefined();
  });

  it.each([
    ["abc", "limit must be a number"],
    ["2.5", "limit must be an integer"],
    ["0", "limit must be at least 1"],
    ["500", "limit must be at most 200"],
  ])("rejects limit=%s", (limit, message) => {
    expect(firstIssue(listPlansSchema.query.safeParse({ limit }))).toBe(message);
  });
});
