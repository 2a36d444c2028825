import { FormulaError } from "../errors";
import type { AnchorFormula, FormulaNode, FormulaOperator } from "./formula-types";

type Token =
  | { type: "number"; value: number; position: number }
  | { type: "identifier"; name: string; position: number }
  | { type: "operator"; operator: FormulaOperator; position: number }
  | { type: "paren"; open: boolean; position: number };

const OPERATORS = new Set<string>(["+", "-", "*", "/", "%"]);

const isOperator = (value: string): value is FormulaOperator =>
  OPERATORS.has(value);

const tokenize = (source: string): Token[] => {
  const tokens: Token[] = [];
  let index = 0;

  while (index < source.length) {
    const char = source.charAt(index);

    if (/\s/.test(char)) {
      index += 1;
      continue;
    }

    if (/\d/.test(char)) {
      const match = /^\d+/.exec(source.slice(index));
      const digits = match ? match[0] : char;
      tokens.push({ type: "number", value: Number(digits), position: index });
      index += digits.length;
      continue;
    }

    if (/[A-Za-z_]/.test(char)) {
      const match = /^[A-Za-z_]\w*/.exec(source.slice(index));
      const name = match ? match[0] : char;
      tokens.push({ type: "identifier", name, position: index });
      index += name.length;
      continue;
    }

    if (isOperator(char)) {
      tokens.push({ type: "operator", operator: char, position: index });
      index += 1;
      continue;
    }

    if (char === "(" || char === ")") {
      tokens.push({ type: "paren", open: char === "(", position: index });
      index += 1;
      continue;
    }

    throw new FormulaError(source, `unexpected character "${char}" at ${index}`);
  }

  return tokens;
};

/**
 * Recursive-descent parser over the token list.
 *
 * expression := term (("+" | "-") term)*
 * term       := unary (("*" | "/" | "%") unary)*
 * unary      := "-" unary | primary
 * primary    := number | identifier | "(" expression ")"
 */
class FormulaParser {
  private cursor = 0;

  constructor(
    private readonly source: string,
    private readonly tokens: Token[],
  ) {}

  parse(): FormulaNode {
    if (this.tokens.length === 0) {
      throw new FormulaError(this.source, "formula is empty");
    }

    const expression = this.parseExpression();
    const trailing = this.tokens[this.cursor];
    if (trailing) {
      throw new FormulaError(
        this.source,
        `unexpected token at ${trailing.position}`,
      );
    }
    return expression;
  }

  private parseExpression(): FormulaNode {
    let node = this.parseTerm();
    let operator = this.peekOperator("+", "-");
    while (operator) {
      this.cursor += 1;
      node = { kind: "binary", operator, left: node, right: this.parseTerm() };
      operator = this.peekOperator("+", "-");
    }
    return node;
  }

  private parseTerm(): FormulaNode {
    let node = this.parseUnary();
    let operator = this.peekOperator("*", "/", "%");
    while (operator) {
      this.cursor += 1;
      node = { kind: "binary", operator, left: node, right: this.parseUnary() };
      operator = this.peekOperator("*", "/", "%");
    }
    return node;
  }

  private parseUnary(): FormulaNode {
    if (this.peekOperator("-")) {
      this.cursor += 1;
      return { kind: "negate", operand: this.parseUnary() };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): FormulaNode {
    const token = this.tokens[this.cursor];
    if (!token) {
      throw new FormulaError(this.source, "unexpected end of formula");
    }
    this.cursor += 1;

    switch (token.type) {
      case "number": {
        return { kind: "literal", value: token.value };
      }
      case "identifier": {
        return { kind: "variable", name: token.name };
      }
      case "paren": {
        if (!token.open) {
          throw new FormulaError(
            this.source,
            `unexpected ")" at ${token.position}`,
          );
        }
        const inner = this.parseExpression();
        const closing = this.tokens[this.cursor];
        if (!closing || closing.type !== "paren" || closing.open) {
          throw new FormulaError(
            this.source,
            `missing ")" for "(" at ${token.position}`,
          );
        }
        this.cursor += 1;
        return inner;
      }
      case "operator": {
        throw new FormulaError(
          this.source,
          `unexpected operator "${token.operator}" at ${token.position}`,
        );
      }
    }
  }

  private peekOperator(
    ...operators: FormulaOperator[]
  ): FormulaOperator | undefined {
    const token = this.tokens[this.cursor];
    if (token?.type === "operator" && operators.includes(token.operator)) {
      return token.operator;
    }
    return undefined;
  }
}

const collectVariables = (node: FormulaNode, into: Set<string>): void => {
  switch (node.kind) {
    case "literal": {
      return;
    }
    case "variable": {
      into.add(node.name);
      return;
    }
    case "negate": {
      collectVariables(node.operand, into);
      return;
    }
    case "binary": {
      collectVariables(node.left, into);
      collectVariables(node.right, into);
      return;
    }
  }
};

/**
 * Parses a formula such as `H/2 - 40` into an evaluable expression.
 */
export const compileFormula = (source: string): AnchorFormula => {
  const expression = new FormulaParser(source, tokenize(source)).parse();
  const variables = new Set<string>();
  collectVariables(expression, variables);
  return { source, expression, variables };
};
