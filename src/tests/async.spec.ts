import { describe, it, expect } from "vitest";
import { withTimeout } from "../utils/async";
import { TimeoutError } from "../utils/errors";
import { pending } from "./helpers";

describe("withTimeout", () => {
  it("resolves with the task's value", async () => {
    await expect(withTimeout(Promise.resolve("done"), 50, "fast call")).resolves.toBe("done");
  });

  it("passes the task's rejection through", async () => {
    await expect(
      withTimeout(Promise.reject(new Error("boom")), 50, "failing call")
    ).rejects.toThrow("boom");
  });

  it("rejects with TimeoutError when the task is too slow", async () => {
    const result = withTimeout(pending<string>(), 10, "slow call");

    await expect(result).rejects.toBeInstanceOf(TimeoutError);
    await expect(result).rejects.toThrow("slow call timed out after 10ms");
  });
});
