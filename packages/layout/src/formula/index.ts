export * from "./formula-types";
export { compileFormula } from "./formula-parser";
export {
  assertFormulaVariables,
  evaluateFormula,
  floorDiv,
  floorMod,
} from "./formula-evaluator";
