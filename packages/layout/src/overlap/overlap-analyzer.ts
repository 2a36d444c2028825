import {
  intervalIntersection,
  sharesHorizontalSpace,
  verticalInterval,
} from "../geometry/box-math";
import type { LayoutBox } from "../types";
import { isOverlayActive } from "../draw-order/draw-order-resolver";
import type {
  OverlapRecord,
  OverlapSummary,
  OverlayCoverage,
} from "./overlap-types";

/**
 * Gaps below this many pixels are reported as near overlaps.
 */
export const DEFAULT_MINIMUM_GAP_PX = 10;

export interface AnalyzeOverlapsOptions {
  minimumGap?: number;
}

const byTopThenDeclaration = (a: LayoutBox, b: LayoutBox): number =>
  a.top - b.top || a.drawOrderIndex - b.drawOrderIndex;

const classifyPair = (
  a: LayoutBox,
  b: LayoutBox,
  minimumGap: number,
): OverlapRecord => {
  if (!sharesHorizontalSpace(a, b)) {
    return { idA: a.id, idB: b.id, kind: "none", severity: "none" };
  }

  const intersection = intervalIntersection(
    verticalInterval(a),
    verticalInterval(b),
  );
  if (intersection > 0) {
    return {
      idA: a.id,
      idB: b.id,
      kind: "overlap",
      amount: intersection,
      severity: "overlapping",
    };
  }

  const gap = -intersection + 0;
  return {
    idA: a.id,
    idB: b.id,
    kind: "adjacent",
    gap,
    severity: gap < minimumGap ? "touching" : "none",
  };
};

/**
 * Classifies every unordered pair of base boxes. Pairs come out in sweep
 * order: boxes sorted by top edge, ties broken by declaration order, and
 * `idA` is always the earlier box of the pair.
 */
export const analyzeOverlaps = (
  boxes: readonly LayoutBox[],
  options: AnalyzeOverlapsOptions = {},
): OverlapRecord[] => {
  const minimumGap = options.minimumGap ?? DEFAULT_MINIMUM_GAP_PX;
  const sorted = boxes
    .filter((box) => box.overlayClass === "base")
    .sort(byTopThenDeclaration);

  const records: OverlapRecord[] = [];
  sorted.forEach((current, index) => {
    for (const next of sorted.slice(index + 1)) {
      records.push(classifyPair(current, next, minimumGap));
    }
  });
  return records;
};

/**
 * Finds the record for a pair regardless of the order the ids are given in.
 */
export const findOverlap = (
  records: readonly OverlapRecord[],
  firstId: string,
  secondId: string,
): OverlapRecord | undefined =>
  records.find(
    (record) =>
      (record.idA === firstId && record.idB === secondId) ||
      (record.idA === secondId && record.idB === firstId),
  );

/**
 * Lists, for each active overlay, the base boxes it paints over.
 */
export const analyzeOverlayCoverage = (
  boxes: readonly LayoutBox[],
  overlayActiveIds: ReadonlySet<string>,
): OverlayCoverage[] => {
  const bases = boxes.filter((box) => box.overlayClass === "base");
  const coverage: OverlayCoverage[] = [];

  for (const overlay of boxes) {
    if (!isOverlayActive(overlay, overlayActiveIds)) {
      continue;
    }
    for (const base of bases) {
      if (base.id === overlay.owner || !sharesHorizontalSpace(overlay, base)) {
        continue;
      }
      const amount = intervalIntersection(
        verticalInterval(overlay),
        verticalInterval(base),
      );
      if (amount > 0) {
        coverage.push({ overlayId: overlay.id, baseId: base.id, amount });
      }
    }
  }

  return coverage;
};

export const summarizeOverlaps = (
  records: readonly OverlapRecord[],
): OverlapSummary => ({
  pairs: records.length,
  overlapping: records.filter((record) => record.severity === "overlapping")
    .length,
  touching: records.filter((record) => record.severity === "touching").length,
});
