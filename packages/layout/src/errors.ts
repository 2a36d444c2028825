import type { SurfaceSize } from "./types";

/**
 * Base class for every error raised by the layout engine.
 */
export class LayoutError extends Error {
  override name = "LayoutError";
}

/**
 * Raised when an anchor or height formula cannot be parsed or evaluated.
 */
export class FormulaError extends LayoutError {
  override name = "FormulaError";

  constructor(
    readonly formula: string,
    reason: string,
  ) {
    super(`Formula "${formula}": ${reason}`);
  }
}

export class UnknownScreenError extends LayoutError {
  override name = "UnknownScreenError";

  constructor(readonly screenId: string) {
    super(`Unknown screen "${screenId}".`);
  }
}

export class InvalidSurfaceSizeError extends LayoutError {
  override name = "InvalidSurfaceSizeError";

  constructor(readonly size: SurfaceSize) {
    super(
      `Surface size must be non-negative integers, got ${size.width}x${size.height}.`,
    );
  }
}

export class InvalidLayoutOptionError extends LayoutError {
  override name = "InvalidLayoutOptionError";

  constructor(
    readonly option: string,
    readonly value: number,
  ) {
    super(`Layout option "${option}" must be a non-negative integer, got ${value}.`);
  }
}

/**
 * Raised while compiling a static screen table that breaks a table invariant
 * (duplicate ids, missing heights, dangling overlay owners).
 */
export class ScreenDefinitionError extends LayoutError {
  override name = "ScreenDefinitionError";

  constructor(
    readonly screenId: string,
    reason: string,
  ) {
    super(`Screen "${screenId}": ${reason}`);
  }
}
