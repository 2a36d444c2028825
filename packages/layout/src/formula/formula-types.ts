export type FormulaOperator = "+" | "-" | "*" | "/" | "%";

/**
 * Expression tree produced by the formula parser.
 */
export type FormulaNode =
  | { kind: "literal"; value: number }
  | { kind: "variable"; name: string }
  | { kind: "negate"; operand: FormulaNode }
  | {
      kind: "binary";
      operator: FormulaOperator;
      left: FormulaNode;
      right: FormulaNode;
    };

/**
 * A compiled anchor or height formula.
 */
export interface AnchorFormula {
  readonly source: string;
  readonly expression: FormulaNode;
  readonly variables: ReadonlySet<string>;
}

/**
 * Variable bindings available while evaluating a formula.
 */
export type FormulaScope = Readonly<Record<string, number>>;

/**
 * Surface height variable bound by every evaluation.
 */
export const SURFACE_HEIGHT_VARIABLE = "H";
export const SURFACE_WIDTH_VARIABLE = "W";
export const OWNER_TOP_VARIABLE = "OWNER_TOP";
export const OWNER_BOTTOM_VARIABLE = "OWNER_BOTTOM";
