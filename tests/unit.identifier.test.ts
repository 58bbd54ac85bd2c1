import { describe, it, expect } from "vitest";
import { assertIdentifier, buildMacroStatement, isSafeIdentifier } from "../src/guards/identifier";
import { InvalidIdentifierError } from "../src/errors";

describe("identifier guard", () => {
  it("accepts plain identifiers", () => {
    expect(isSafeIdentifier("greet")).toBe(true);
    expect(isSafeIdentifier("employees_by_department")).toBe(true);
    expect(isSafeIdentifier("Q3report2")).toBe(true);
  });

  it("rejects names that do not start with a letter", () => {
    expect(isSafeIdentifier("1greet")).toBe(false);
    expect(isSafeIdentifier("_greet")).toBe(false);
    expect(isSafeIdentifier("")).toBe(false);
  });

  it("rejects SQL metacharacters", () => {
    expect(isSafeIdentifier("greet; DROP TABLE employees")).toBe(false);
    expect(isSafeIdentifier("greet()")).toBe(false);
    expect(isSafeIdentifier("a-b")).toBe(false);
    expect(isSafeIdentifier('"quoted"')).toBe(false);
  });

  it("throws a typed error from assertIdentifier", () => {
    expect(() => assertIdentifier("x'--")).toThrow(InvalidIdentifierError);
  });
});

describe("buildMacroStatement", () => {
  it("calls scalar macros in the select list", () => {
    expect(buildMacroStatement("greet", "scalar", 1)).toBe("SELECT greet(?)");
    expect(buildMacroStatement("calculate_bonus", "scalar", 2)).toBe("SELECT calculate_bonus(?,?)");
  });

  it("selects from table macros", () => {
    expect(buildMacroStatement("high_earners", "table", 1)).toBe("SELECT * FROM high_earners(?)");
  });

  it("uses an empty argument list when nothing is bound", () => {
    expect(buildMacroStatement("employee_summary", "table", 0)).toBe("SELECT * FROM employee_summary()");
    expect(buildMacroStatement("today", "scalar", 0)).toBe("SELECT today()");
  });

  it("refuses to embed an unsafe name", () => {
    expect(() => buildMacroStatement("x); DROP TABLE employees; --", "table", 0)).toThrow(InvalidIdentifierError);
  });
});
