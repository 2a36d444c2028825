import { InvalidLayoutOptionError, InvalidSurfaceSizeError } from "../errors";
import { evaluateFormula } from "../formula";
import {
  OWNER_BOTTOM_VARIABLE,
  OWNER_TOP_VARIABLE,
  SURFACE_WIDTH_VARIABLE,
  type FormulaScope,
} from "../formula/formula-types";
import type {
  LayoutBox,
  Screen,
  ScrollState,
  SurfaceSize,
  WidgetSpec,
} from "../types";

/**
 * Height used for labels that do not declare one.
 */
export const DEFAULT_LABEL_HEIGHT_PX = 20;

export interface BuildLayoutOptions {
  /**
   * Live item counts for scrollable widgets, keyed by widget id.
   */
  itemCounts?: Readonly<Record<string, number>>;
  /**
   * Option counts overriding the declared ones, keyed by option list id.
   */
  optionCounts?: Readonly<Record<string, number>>;
  defaultLabelHeight?: number;
}

const isDimension = (value: number): boolean =>
  Number.isInteger(value) && value >= 0;

/**
 * Throws {@link InvalidSurfaceSizeError} unless both dimensions are
 * non-negative integers.
 */
export const assertSurfaceSize = (surface: SurfaceSize): void => {
  if (!isDimension(surface.width) || !isDimension(surface.height)) {
    throw new InvalidSurfaceSizeError({ ...surface });
  }
};

/**
 * Throws {@link InvalidLayoutOptionError} when the default label height is
 * negative or fractional.
 */
export const assertLayoutOptions = (options: BuildLayoutOptions): void => {
  const { defaultLabelHeight } = options;
  if (defaultLabelHeight !== undefined && !isDimension(defaultLabelHeight)) {
    throw new InvalidLayoutOptionError("defaultLabelHeight", defaultLabelHeight);
  }
};

const resolveHeight = (
  widget: WidgetSpec,
  surface: SurfaceSize,
  options: BuildLayoutOptions,
): number => {
  const { height } = widget;
  switch (height.kind) {
    case "fixed": {
      return height.px;
    }
    case "formula": {
      return Math.max(
        0,
        evaluateFormula(height.formula, surface.height, {
          [SURFACE_WIDTH_VARIABLE]: surface.width,
        }),
      );
    }
    case "label": {
      return height.px ?? options.defaultLabelHeight ?? DEFAULT_LABEL_HEIGHT_PX;
    }
    case "rows": {
      const count = Math.max(0, options.optionCounts?.[widget.id] ?? height.count);
      return Math.min(count, height.maxVisible) * height.rowHeight;
    }
  }
};

const resolveScroll = (
  widget: WidgetSpec,
  viewportHeight: number,
  options: BuildLayoutOptions,
): ScrollState | undefined => {
  if (!widget.scroll) {
    return undefined;
  }

  const itemCount = Math.max(0, options.itemCounts?.[widget.id] ?? 0);
  const contentHeight = itemCount * widget.scroll.itemHeight;
  return {
    contentHeight,
    viewportHeight,
    scrollbarVisible: contentHeight > viewportHeight,
    maxScrollOffset: Math.max(0, contentHeight - viewportHeight),
  };
};

const buildBox = (
  widget: WidgetSpec,
  surface: SurfaceSize,
  options: BuildLayoutOptions,
  owner: LayoutBox | undefined,
): LayoutBox => {
  const scope: Record<string, number> = {
    [SURFACE_WIDTH_VARIABLE]: surface.width,
  };
  if (owner) {
    scope[OWNER_TOP_VARIABLE] = owner.top;
    scope[OWNER_BOTTOM_VARIABLE] = owner.bottom;
  }

  const top = evaluateFormula(widget.anchor, surface.height, scope);
  const height = resolveHeight(widget, surface, options);
  const scroll = resolveScroll(widget, height, options);

  const box: LayoutBox = {
    id: widget.id,
    kind: widget.kind,
    overlayClass: widget.overlayClass,
    column: widget.column,
    drawOrderIndex: widget.drawOrderIndex,
    top,
    bottom: top + height,
  };

  if (widget.owner !== undefined) {
    box.owner = widget.owner;
  }

  if (widget.horizontal) {
    const surfaceScope: FormulaScope = { [SURFACE_WIDTH_VARIABLE]: surface.width };
    const left = evaluateFormula(widget.horizontal.left, surface.height, surfaceScope);
    const width = Math.max(
      0,
      evaluateFormula(widget.horizontal.width, surface.height, surfaceScope),
    );
    const scrollbarWidth =
      scroll?.scrollbarVisible && widget.scroll
        ? widget.scroll.scrollbarReservedWidth
        : 0;
    box.left = left;
    box.right = left + width + scrollbarWidth;
  }

  if (scroll) {
    box.scroll = scroll;
  }

  return box;
};

/**
 * Computes one box per widget, in declaration order. Boxes are never clamped
 * to the surface. Overlays are placed after every other widget so their
 * formulas can read the owner's box.
 */
export const buildLayout = (
  screen: Screen,
  surface: SurfaceSize,
  options: BuildLayoutOptions = {},
): LayoutBox[] => {
  assertSurfaceSize(surface);
  assertLayoutOptions(options);

  const boxes = new Map<string, LayoutBox>();
  for (const widget of screen.widgets) {
    if (widget.overlayClass !== "overlay") {
      boxes.set(widget.id, buildBox(widget, surface, options, undefined));
    }
  }
  for (const widget of screen.widgets) {
    if (widget.overlayClass === "overlay") {
      const owner =
        widget.owner === undefined ? undefined : boxes.get(widget.owner);
      boxes.set(widget.id, buildBox(widget, surface, options, owner));
    }
  }

  return screen.widgets.flatMap((widget) => {
    const box = boxes.get(widget.id);
    return box ? [box] : [];
  });
};
