import { buildLayout, type BuildLayoutOptions } from "./builder";
import { resolvePaintList, type PaintEntry } from "./draw-order";
import { findOffSurfaceBoxes } from "./geometry/box-math";
import {
  analyzeOverlayCoverage,
  analyzeOverlaps,
  type OverlapRecord,
  type OverlayCoverage,
} from "./overlap";
import type { ScreenRegistry } from "./screens";
import type { LayoutBox, Screen, SurfaceSize } from "./types";

export interface ScreenLayoutOptions extends BuildLayoutOptions {
  /**
   * Expanded dropdowns (or overlay ids) for this frame.
   */
  expandedIds?: Iterable<string>;
  minimumGap?: number;
}

/**
 * Everything one layout pass produces for a screen.
 */
export interface ScreenLayout {
  screen: Screen;
  surface: SurfaceSize;
  boxes: LayoutBox[];
  overlaps: OverlapRecord[];
  overlayCoverage: OverlayCoverage[];
  paintList: PaintEntry[];
  paintOrder: string[];
  offSurfaceIds: string[];
}

export const computeScreenLayout = (
  registry: ScreenRegistry,
  screenId: string,
  surface: SurfaceSize,
  options: ScreenLayoutOptions = {},
): ScreenLayout => {
  const screen = registry.get(screenId);
  const boxes = buildLayout(screen, surface, options);
  const expanded = new Set(options.expandedIds ?? []);
  const paintList = resolvePaintList(boxes, expanded);

  return {
    screen,
    surface: { ...surface },
    boxes,
    overlaps: analyzeOverlaps(boxes, { minimumGap: options.minimumGap }),
    overlayCoverage: analyzeOverlayCoverage(boxes, expanded),
    paintList,
    paintOrder: paintList.map((entry) => entry.id),
    offSurfaceIds: findOffSurfaceBoxes(
      paintList.map((entry) => entry.box),
      surface,
    ),
  };
};
