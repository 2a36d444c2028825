import { FormulaError } from "../errors";
import { compileFormula } from "./formula-parser";
import {
  SURFACE_HEIGHT_VARIABLE,
  type AnchorFormula,
  type FormulaNode,
  type FormulaScope,
} from "./formula-types";

/**
 * Integer division rounding toward negative infinity.
 */
export const floorDiv = (dividend: number, divisor: number): number =>
  Math.floor(dividend / divisor);

/**
 * Modulo with the sign of the divisor, matching {@link floorDiv}.
 */
export const floorMod = (dividend: number, divisor: number): number =>
  dividend - divisor * floorDiv(dividend, divisor);

const evaluateNode = (
  node: FormulaNode,
  scope: FormulaScope,
  source: string,
): number => {
  switch (node.kind) {
    case "literal": {
      return node.value;
    }
    case "variable": {
      const value = scope[node.name];
      if (value === undefined) {
        throw new FormulaError(source, `undefined variable "${node.name}"`);
      }
      return value;
    }
    case "negate": {
      return -evaluateNode(node.operand, scope, source);
    }
    case "binary": {
      const left = evaluateNode(node.left, scope, source);
      const right = evaluateNode(node.right, scope, source);
      switch (node.operator) {
        case "+": {
          return left + right;
        }
        case "-": {
          return left - right;
        }
        case "*": {
          return left * right;
        }
        case "/":
        case "%": {
          if (right === 0) {
            throw new FormulaError(source, "division by zero");
          }
          return node.operator === "/"
            ? floorDiv(left, right)
            : floorMod(left, right);
        }
      }
    }
  }
};

/**
 * Evaluates a formula against a surface height. `H` is always bound to
 * `surfaceHeight`; `scope` adds or overrides further variables.
 */
export const evaluateFormula = (
  formula: AnchorFormula | string,
  surfaceHeight: number,
  scope: FormulaScope = {},
): number => {
  const compiled =
    typeof formula === "string" ? compileFormula(formula) : formula;
  const bindings: FormulaScope = {
    [SURFACE_HEIGHT_VARIABLE]: surfaceHeight,
    ...scope,
  };
  // Normalizes -0 from negating a zero term.
  return evaluateNode(compiled.expression, bindings, compiled.source) + 0;
};

/**
 * Rejects formulas that reference variables outside `allowed`.
 */
export const assertFormulaVariables = (
  formula: AnchorFormula,
  allowed: ReadonlySet<string>,
): void => {
  for (const name of formula.variables) {
    if (!allowed.has(name)) {
      throw new FormulaError(formula.source, `undefined variable "${name}"`);
    }
  }
};
