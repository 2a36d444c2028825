import type { LayoutBox, SurfaceSize } from "../types";

export interface Interval {
  start: number;
  end: number;
}

/**
 * Signed intersection length of two half-open intervals. Positive values are
 * the overlap amount; zero or negative values are the negated gap.
 */
export const intervalIntersection = (a: Interval, b: Interval): number =>
  Math.min(a.end, b.end) - Math.max(a.start, b.start);

export const intervalsOverlap = (a: Interval, b: Interval): boolean =>
  intervalIntersection(a, b) > 0;

export const verticalInterval = (box: LayoutBox): Interval => ({
  start: box.top,
  end: box.bottom,
});

/**
 * Whether two boxes can collide at all. Boxes in the same column always share
 * horizontal space; across columns only boxes with declared extents that
 * intersect do.
 */
export const sharesHorizontalSpace = (a: LayoutBox, b: LayoutBox): boolean => {
  if (a.column === b.column) {
    return true;
  }

  if (
    a.left === undefined ||
    a.right === undefined ||
    b.left === undefined ||
    b.right === undefined
  ) {
    return false;
  }

  return intervalsOverlap(
    { start: a.left, end: a.right },
    { start: b.left, end: b.right },
  );
};

/**
 * Ids of boxes that extend past the surface. Layout never clamps, so callers
 * decide what to do with these.
 */
export const findOffSurfaceBoxes = (
  boxes: readonly LayoutBox[],
  surface: SurfaceSize,
): string[] =>
  boxes
    .filter((box) => {
      if (box.top < 0 || box.bottom > surface.height) {
        return true;
      }
      if (box.left !== undefined && box.left < 0) {
        return true;
      }
      return box.right !== undefined && box.right > surface.width;
    })
    .map((box) => box.id);
