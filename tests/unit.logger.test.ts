import { describe, it, expect } from "vitest";
import { isLevel } from "../src/utils/logger";

describe("isLevel", () => {
  it("accepts the four level names", () => {
    expect(["debug", "info", "warn", "error"].every(isLevel)).toBe(true);
  });

  it("rejects names inherited from Object.prototype", () => {
    expect(isLevel("constructor")).toBe(false);
    expect(isLevel("toString")).toBe(false);
  });
});
