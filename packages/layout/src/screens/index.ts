export * from "./difficulty-screen";
export * from "./management-screen";
export { compileScreen } from "./screen-compiler";
export { ScreenRegistry, createDefaultScreenRegistry } from "./screen-registry";
