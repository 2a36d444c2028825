import {
  computeScreenLayout,
  formatOverlapRecord,
  formatOverlayCoverage,
  summarizeOverlaps,
  type OverlapSummary,
  type ScreenLayout,
  type ScreenLayoutOptions,
  type ScreenRegistry,
  type SurfaceSize,
} from "@screen-layout/layout";

export interface ScreenReportOptions extends ScreenLayoutOptions {
  /**
   * Also list pairs whose severity is `none`.
   */
  includeAll?: boolean;
}

export interface ScreenReport {
  screenId: string;
  layout: ScreenLayout;
  lines: string[];
  summary: OverlapSummary;
}

/**
 * Runs a layout pass and renders its findings as report lines: pair records
 * first, then overlay coverage, then boxes outside the surface.
 */
export const buildScreenReport = (
  registry: ScreenRegistry,
  screenId: string,
  surface: SurfaceSize,
  options: ScreenReportOptions = {},
): ScreenReport => {
  const layout = computeScreenLayout(registry, screenId, surface, options);
  const records = options.includeAll
    ? layout.overlaps
    : layout.overlaps.filter((record) => record.severity !== "none");

  const lines = [
    ...records.map((record) => formatOverlapRecord(record)),
    ...layout.overlayCoverage.map((coverage) => formatOverlayCoverage(coverage)),
    ...layout.offSurfaceIds.map((id) => `${id} is off-surface`),
  ];

  return {
    screenId,
    layout,
    lines,
    summary: summarizeOverlaps(layout.overlaps),
  };
};
