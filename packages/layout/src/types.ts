import type { AnchorFormula } from "./formula/formula-types";

/**
 * Drawing surface dimensions for a single layout pass.
 */
export interface SurfaceSize {
  width: number;
  height: number;
}

/**
 * Paint class of a widget. Overlays exist only while their owner is expanded;
 * `none` widgets take part in layout but are neither painted nor analyzed.
 */
export type OverlayClass = "none" | "base" | "overlay";

export type WidgetKind =
  | "label"
  | "button"
  | "button-row"
  | "dropdown"
  | "option-list"
  | "text-input"
  | "scroll-list";

/**
 * Screen column a widget lives in. Widgets in different columns are assumed
 * not to share horizontal space unless both declare horizontal extents.
 */
export type LayoutColumn = "content" | "side";

/**
 * Rows shown by an option list while its owner is expanded.
 */
export interface OptionRows {
  count: number;
  rowHeight: number;
  maxVisible: number;
}

export interface ScrollSettings {
  itemHeight: number;
  /**
   * Extra width taken on the right edge while the scrollbar is visible.
   */
  scrollbarReservedWidth: number;
}

/**
 * Declarative table row for a widget, with formulas written as source text.
 */
export interface WidgetDefinition {
  id: string;
  kind: WidgetKind;
  anchor: string;
  /**
   * Pixels or a formula source. Labels and option lists derive their height.
   */
  height?: number | string;
  labelHeight?: number;
  layer?: OverlayClass;
  owner?: string;
  column?: LayoutColumn;
  horizontal?: { left: string; width: string };
  options?: OptionRows;
  scroll?: ScrollSettings;
}

export interface ScreenDefinition {
  id: string;
  title: string;
  widgets: WidgetDefinition[];
}

export type WidgetHeight =
  | { readonly kind: "fixed"; readonly px: number }
  | { readonly kind: "formula"; readonly formula: AnchorFormula }
  | { readonly kind: "label"; readonly px?: number }
  | ({ readonly kind: "rows" } & Readonly<OptionRows>);

/**
 * Compiled widget entry owned by the screen registry.
 */
export interface WidgetSpec {
  readonly id: string;
  readonly kind: WidgetKind;
  readonly anchor: AnchorFormula;
  readonly height: WidgetHeight;
  readonly drawOrderIndex: number;
  readonly overlayClass: OverlayClass;
  readonly owner?: string;
  readonly column: LayoutColumn;
  readonly horizontal?: { readonly left: AnchorFormula; readonly width: AnchorFormula };
  readonly scroll?: Readonly<ScrollSettings>;
}

export interface Screen {
  readonly id: string;
  readonly title: string;
  readonly widgets: readonly WidgetSpec[];
}

export interface ScrollState {
  contentHeight: number;
  viewportHeight: number;
  scrollbarVisible: boolean;
  maxScrollOffset: number;
}

/**
 * Bounding box computed for a widget in one layout pass.
 */
export interface LayoutBox {
  id: string;
  kind: WidgetKind;
  overlayClass: OverlayClass;
  owner?: string;
  column: LayoutColumn;
  drawOrderIndex: number;
  top: number;
  bottom: number;
  left?: number;
  right?: number;
  scroll?: ScrollState;
}
