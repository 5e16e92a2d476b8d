import { describe, it, expect } from "vitest";
import { parseSteps } from "../../../src/simulation/steps.js";

describe("parseSteps", () => {
  it("should split time:action pairs", () => {
    expect(parseSteps("0:busy,500ms:idle")).toEqual([
      { at: "0", action: "busy" },
      { at: "500ms", action: "idle" },
    ]);
  });

  it("should trim whitespace and skip empty entries", () => {
    expect(parseSteps(" 0 : busy , , 1.2s:force-hide,")).toEqual([
      { at: "0", action: "busy" },
      { at: "1.2s", action: "force-hide" },
    ]);
  });

  it("should reject a pair without a separator", () => {
    expect(() => parseSteps("0:busy,idle")).toThrow(
      'Invalid step "idle" - expected "time:action", e.g. "100:idle"',
    );
  });

  it("should reject a pair without an action", () => {
    expect(() => parseSteps("100:")).toThrow('Invalid step "100:"');
  });
});
