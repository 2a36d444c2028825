import { describe, expect, it } from "vitest";
import { FormulaError } from "../errors";
import {
  assertFormulaVariables,
  compileFormula,
  evaluateFormula,
  floorDiv,
  floorMod,
} from "./index";

describe("evaluateFormula", () => {
  it("evaluates anchor formulas against the surface height", () => {
    expect(evaluateFormula("H/4 - 40", 600)).toBe(110);
    expect(evaluateFormula("H/2 - 80", 600)).toBe(220);
    expect(evaluateFormula("H/2 + 5", 600)).toBe(305);
    expect(evaluateFormula("20", 600)).toBe(20);
  });

  it("uses floor division for odd heights and negative operands", () => {
    expect(evaluateFormula("H/2", 601)).toBe(300);
    expect(evaluateFormula("(H - 7)/2", 0)).toBe(-4);
    expect(evaluateFormula("-7 % 3", 0)).toBe(2);
    expect(floorDiv(-1, 4)).toBe(-1);
    expect(floorMod(7, -3)).toBe(-2);
  });

  it("evaluates at zero height without dividing by the height", () => {
    expect(evaluateFormula("H/4 - 40", 0)).toBe(-40);
    expect(evaluateFormula("H/2 + 100", 0)).toBe(100);
    expect(evaluateFormula("-H", 0)).toBe(0);
  });

  it("respects operator precedence and parentheses", () => {
    expect(evaluateFormula("2 + 3 * 4", 0)).toBe(14);
    expect(evaluateFormula("(2 + 3) * 4", 0)).toBe(20);
    expect(evaluateFormula("- -5", 0)).toBe(5);
    expect(evaluateFormula("H - 270", 600)).toBe(330);
  });

  it("binds extra scope variables", () => {
    expect(evaluateFormula("W - 220", 600, { W: 800 })).toBe(580);
    expect(evaluateFormula("OWNER_BOTTOM", 600, { OWNER_BOTTOM: 370 })).toBe(370);
  });

  it("rejects undefined variables", () => {
    expect(() => evaluateFormula("W - 10", 600)).toThrow(FormulaError);
    expect(() => evaluateFormula("W - 10", 600)).toThrow(
      'Formula "W - 10": undefined variable "W"',
    );
  });

  it("rejects a zero divisor", () => {
    expect(() => evaluateFormula("H / (H - H)", 600)).toThrow(
      'Formula "H / (H - H)": division by zero',
    );
  });
});

describe("compileFormula", () => {
  it("collects referenced variables", () => {
    const formula = compileFormula("OWNER_BOTTOM + H/2");
    expect([...formula.variables]).toEqual(["OWNER_BOTTOM", "H"]);
    expect(formula.source).toBe("OWNER_BOTTOM + H/2");
  });

  it("reports syntax errors", () => {
    expect(() => compileFormula("")).toThrow('Formula "": formula is empty');
    expect(() => compileFormula("H +")).toThrow(
      'Formula "H +": unexpected end of formula',
    );
    expect(() => compileFormula("H $ 2")).toThrow(
      'Formula "H $ 2": unexpected character "$" at 2',
    );
    expect(() => compileFormula("(H")).toThrow(
      'Formula "(H": missing ")" for "(" at 0',
    );
    expect(() => compileFormula("H 2")).toThrow(
      'Formula "H 2": unexpected token at 2',
    );
  });

  it("checks variables against an allowed set", () => {
    const formula = compileFormula("OWNER_TOP - 10");
    expect(() =>
      assertFormulaVariables(formula, new Set(["H", "W"])),
    ).toThrow('Formula "OWNER_TOP - 10": undefined variable "OWNER_TOP"');
    expect(() =>
      assertFormulaVariables(formula, new Set(["OWNER_TOP"])),
    ).not.toThrow();
  });
});
