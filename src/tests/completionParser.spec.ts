import { describe, it, expect } from "vitest";
import { parseCompletion, parseEntry } from "../utils/completionParser";
import { HYDERABAD_REPLY } from "./helpers";

describe("parseCompletion", () => {
  it("keeps indented numbered sub-items inside their step", () => {
    const reply = [
      "1. Pack for the trip (45 minutes)",
      "   1. Passport and tickets",
      "   2. **Rain jacket**",
      "2. Check in at the hotel (30 minutes)",
    ].join("\n");

    const steps = parseCompletion(reply);

    expect(steps.map((s) => [s.sequence, s.title, s.description])).toEqual([
      [1, "Pack for the trip", "Passport and tickets Rain jacket"],
      [2, "Check in at the hotel", ""],
    ]);
  });

  it("reads steps that are all indented the same as top-level steps", () => {
    const reply = "Day 1\n  1. Warm up (10 minutes)\n  2. Run (30 minutes)";

    expect(parseCompletion(reply).map((s) => s.title)).toEqual(["Warm up", "Run"]);
  });

  it("groups numbered entries under day headers", () => {
    const steps = parseCompletion(HYDERABAD_REPLY);

    expect(steps).toEqual([
      {
        sequence: 1,
        day: 1,
        title: "Breakfast at a dosa stall",
        duration: "1 hour",
        description: "Try the butter dosa Arrive before 8 am",
      },
      {
        sequence: 2,
        day: 1,
        title: "Charminar street food walk",
        duration: "2 hours",
        description: "Sample samosas and Irani chai",
      },
      {
        sequence: 3,
        day: 2,
        title: "Vegetarian thali lunch",
        duration: "90 minutes",
        description: "pick a Telugu thali",
      },
      {
        sequence: 4,
        day: 2,
        title: "Bakery visit",
        duration: "30 minutes",
        description: "",
      },
    ]);
  });

  it("puts every step on day 1 when there are no day headers", () => {
    const reply = [
      "Here is your plan:",
      "1. Set up a study space (20 minutes)",
      "2. Review Python basics",
      "Spend time on variables and loops.",
      "3) Practice exercises (45 min)",
    ].join("\n");

    const steps = parseCompletion(reply);

    expect(steps.map((s) => s.day)).toEqual([1, 1, 1]);
    expect(steps[1]).toEqual({
      sequence: 2,
      day: 1,
      title: "Review Python basics",
      duration: "Unspecified",
      description: "Spend time on variables and loops.",
    });
    expect(steps[2].title).toBe("Practice exercises");
    expect(steps[2].duration).toBe("45 min");
  });

  it("accepts markdown day headers", () => {
    const reply = "### Day 3\n1. Pack bags (1 hour)\n**Day 4**\n1. Fly home (3 hours)";

    expect(parseCompletion(reply).map((s) => [s.day, s.title])).toEqual([
      [3, "Pack bags"],
      [4, "Fly home"],
    ]);
  });

  it("skips lines that are not steps", () => {
    const reply = "- a bullet before any step\n1. (30 minutes)\nRandom chatter\n2. Stretch (10 minutes)";

    const steps = parseCompletion(reply);

    expect(steps).toHaveLength(1);
    expect(steps[0].title).toBe("Stretch");
    expect(steps[0].sequence).toBe(1);
  });

  it("returns no steps for a reply without numbered entries", () => {
    expect(parseCompletion("I cannot help with that request.")).toEqual([]);
    expect(parseCompletion("")).toEqual([]);
  });
});

describe("parseEntry", () => {
  it("uses the last parenthesised group as the duration", () => {
    expect(parseEntry("Visit Golconda (the fort) (2 hours)")).toEqual({
      title: "Visit Golconda (the fort)",
      duration: "2 hours",
      description: "",
    });
  });

  it("splits an inline description without a duration", () => {
    expect(parseEntry("Book tickets: use the station counter")).toEqual({
      title: "Book tickets",
      duration: "Unspecified",
      description: "use the station counter",
    });
  });
});
