import { describe, it, expect } from "vitest";
import {
  durationSchema,
  latchOptionsSchema,
  scenarioSchema,
} from "../../../src/config/schema.js";

describe("Config Schema Validation", () => {
  describe("durationSchema", () => {
    it("should accept milliseconds and duration strings", () => {
      expect(durationSchema.parse(0)).toBe(0);
      expect(durationSchema.parse(300)).toBe(300);
      expect(durationSchema.parse("1.5s")).toBe(1500);
    });

    it("should reject negative numbers", () => {
      const result = durationSchema.safeParse(-1);
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.errors[0]?.message).toBe(
          "Duration must be non-negative",
        );
      }
    });

    it("should reject durations longer than a timer can wait", () => {
      const fromNumber = durationSchema.safeParse(2_147_483_648);
      const fromString = durationSchema.safeParse("600h");

      expect(fromNumber.success).toBe(false);
      expect(fromString.success).toBe(false);
      if (!fromString.success) {
        expect(fromString.error.errors[0]?.message).toBe(
          "Duration must be at most 2147483647ms",
        );
      }
      expect(durationSchema.parse(2_147_483_647)).toBe(2_147_483_647);
    });

    it("should reject unparsable strings", () => {
      expect(durationSchema.safeParse("later").success).toBe(false);
    });

    it("should reject other types", () => {
      expect(durationSchema.safeParse(true).success).toBe(false);
    });
  });

  describe("latchOptionsSchema", () => {
    it("should apply default timings", () => {
      expect(latchOptionsSchema.parse({})).toEqual({
        delayTime: 300,
        minShowTime: 700,
      });
    });

    it("should keep label and debug", () => {
      expect(
        latchOptionsSchema.parse({
          delayTime: "100ms",
          minShowTime: 2000,
          label: "inbox",
          debug: true,
        }),
      ).toEqual({ delayTime: 100, minShowTime: 2000, label: "inbox", debug: true });
    });

    it("should reject unknown keys", () => {
      expect(latchOptionsSchema.safeParse({ delay: 100 }).success).toBe(false);
    });

    it("should reject an empty label", () => {
      expect(latchOptionsSchema.safeParse({ label: "" }).success).toBe(false);
    });
  });

  describe("scenarioSchema", () => {
    it("should parse a minimal scenario with defaults", () => {
      const scenario = scenarioSchema.parse({
        steps: [{ at: 0, action: "busy" }],
      });

      expect(scenario).toEqual({
        delay_time: 300,
        min_show_time: 700,
        steps: [{ at: 0, action: "busy" }],
      });
    });

    it("should convert step times", () => {
      const scenario = scenarioSchema.parse({
        steps: [
          { at: "0", action: "busy" },
          { at: "1.2s", action: "idle" },
        ],
        until: "2s",
      });

      expect(scenario.steps.map((step) => step.at)).toEqual([0, 1200]);
      expect(scenario.until).toBe(2000);
    });

    it("should require at least one step", () => {
      const result = scenarioSchema.safeParse({ steps: [] });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.errors[0]?.message).toBe(
          "Scenario must contain at least one step",
        );
      }
    });

    it("should reject unknown actions", () => {
      const result = scenarioSchema.safeParse({
        steps: [{ at: 0, action: "jump" }],
      });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.errors[0]?.path).toEqual(["steps", 0, "action"]);
        expect(result.error.errors[0]?.message).toBe(
          "Expected 'busy', 'idle', 'force-show', 'force-hide' or 'dispose'",
        );
      }
    });

    it("should reject steps after until", () => {
      const result = scenarioSchema.safeParse({
        steps: [{ at: 500, action: "busy" }],
        until: 100,
      });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.errors[0]?.path).toEqual(["until"]);
      }
    });
  });
});
