import { ScreenDefinitionError } from "../errors";
import { assertFormulaVariables, compileFormula } from "../formula";
import {
  OWNER_BOTTOM_VARIABLE,
  OWNER_TOP_VARIABLE,
  SURFACE_HEIGHT_VARIABLE,
  SURFACE_WIDTH_VARIABLE,
  type AnchorFormula,
} from "../formula/formula-types";
import type {
  Screen,
  ScreenDefinition,
  WidgetDefinition,
  WidgetHeight,
  WidgetSpec,
} from "../types";

const SURFACE_VARIABLES: ReadonlySet<string> = new Set([
  SURFACE_HEIGHT_VARIABLE,
  SURFACE_WIDTH_VARIABLE,
]);

const OVERLAY_VARIABLES: ReadonlySet<string> = new Set([
  ...SURFACE_VARIABLES,
  OWNER_TOP_VARIABLE,
  OWNER_BOTTOM_VARIABLE,
]);

const compileChecked = (
  source: string,
  allowed: ReadonlySet<string>,
): AnchorFormula => {
  const formula = compileFormula(source);
  assertFormulaVariables(formula, allowed);
  return Object.freeze(formula);
};

const assertNonNegative = (
  screenId: string,
  widgetId: string,
  field: string,
  value: number,
): void => {
  if (!Number.isInteger(value) || value < 0) {
    throw new ScreenDefinitionError(
      screenId,
      `widget "${widgetId}" ${field} must be a non-negative integer, got ${value}`,
    );
  }
};

const compileHeight = (
  screenId: string,
  definition: WidgetDefinition,
): WidgetHeight => {
  if (definition.kind === "option-list") {
    const rows = definition.options;
    if (!rows) {
      throw new ScreenDefinitionError(
        screenId,
        `option list "${definition.id}" needs an options entry`,
      );
    }
    assertNonNegative(screenId, definition.id, "options.count", rows.count);
    assertNonNegative(screenId, definition.id, "options.rowHeight", rows.rowHeight);
    assertNonNegative(screenId, definition.id, "options.maxVisible", rows.maxVisible);
    return Object.freeze({ kind: "rows", ...rows });
  }

  if (definition.kind === "label" && definition.height === undefined) {
    if (definition.labelHeight !== undefined) {
      assertNonNegative(screenId, definition.id, "labelHeight", definition.labelHeight);
    }
    return Object.freeze({ kind: "label", px: definition.labelHeight });
  }

  const { height } = definition;
  if (height === undefined) {
    throw new ScreenDefinitionError(
      screenId,
      `widget "${definition.id}" has no height`,
    );
  }

  if (typeof height === "number") {
    assertNonNegative(screenId, definition.id, "height", height);
    return Object.freeze({ kind: "fixed", px: height });
  }

  return Object.freeze({
    kind: "formula",
    formula: compileChecked(height, SURFACE_VARIABLES),
  });
};

const compileWidget = (
  screenId: string,
  definition: WidgetDefinition,
  drawOrderIndex: number,
): WidgetSpec => {
  const overlayClass = definition.layer ?? "base";
  const variables =
    overlayClass === "overlay" ? OVERLAY_VARIABLES : SURFACE_VARIABLES;

  if (definition.scroll) {
    assertNonNegative(screenId, definition.id, "scroll.itemHeight", definition.scroll.itemHeight);
    assertNonNegative(
      screenId,
      definition.id,
      "scroll.scrollbarReservedWidth",
      definition.scroll.scrollbarReservedWidth,
    );
  }

  return Object.freeze({
    id: definition.id,
    kind: definition.kind,
    anchor: compileChecked(definition.anchor, variables),
    height: compileHeight(screenId, definition),
    drawOrderIndex,
    overlayClass,
    owner: definition.owner,
    column: definition.column ?? "content",
    horizontal: definition.horizontal
      ? Object.freeze({
          left: compileChecked(definition.horizontal.left, SURFACE_VARIABLES),
          width: compileChecked(definition.horizontal.width, SURFACE_VARIABLES),
        })
      : undefined,
    scroll: definition.scroll ? Object.freeze({ ...definition.scroll }) : undefined,
  });
};

const assertOwners = (screenId: string, widgets: readonly WidgetSpec[]): void => {
  const byId = new Map(widgets.map((widget) => [widget.id, widget]));

  for (const widget of widgets) {
    if (widget.overlayClass !== "overlay") {
      if (widget.owner !== undefined) {
        throw new ScreenDefinitionError(
          screenId,
          `only overlays may declare an owner ("${widget.id}")`,
        );
      }
      continue;
    }

    if (widget.owner === undefined) {
      throw new ScreenDefinitionError(
        screenId,
        `overlay "${widget.id}" has no owner`,
      );
    }

    const owner = byId.get(widget.owner);
    if (!owner || owner.overlayClass === "overlay") {
      throw new ScreenDefinitionError(
        screenId,
        `overlay "${widget.id}" must be owned by a non-overlay widget, got "${widget.owner}"`,
      );
    }
  }
};

/**
 * Compiles a declarative screen table into frozen widget specs. Draw order
 * follows declaration order.
 */
export const compileScreen = (definition: ScreenDefinition): Screen => {
  const seen = new Set<string>();
  const widgets = definition.widgets.map((widget, index) => {
    if (seen.has(widget.id)) {
      throw new ScreenDefinitionError(
        definition.id,
        `duplicate widget id "${widget.id}"`,
      );
    }
    seen.add(widget.id);
    return compileWidget(definition.id, widget, index);
  });

  assertOwners(definition.id, widgets);

  return Object.freeze({
    id: definition.id,
    title: definition.title,
    widgets: Object.freeze(widgets),
  });
};
