// Layout engine for the difficulty and word management screens

export * from "./types";
export * from "./errors";
export * from "./formula";
export * from "./builder";
export * from "./overlap";
export * from "./draw-order";
export * from "./screens";
export * from "./geometry/box-math";
export * from "./layout-pass";
