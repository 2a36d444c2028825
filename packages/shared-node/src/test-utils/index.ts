export * from "./capture-logger";
