import type { LayoutBox, WidgetSpec } from "../types";

/**
 * Fields the resolver reads. Both widget specs and layout boxes carry them.
 */
export type DrawOrderEntry = Pick<
  WidgetSpec,
  "id" | "overlayClass" | "owner" | "drawOrderIndex"
>;

export interface PaintEntry {
  id: string;
  box: LayoutBox;
}

/**
 * An overlay is active when its own id or its owner's id is in the set.
 */
export const isOverlayActive = (
  entry: DrawOrderEntry,
  overlayActiveIds: ReadonlySet<string>,
): boolean =>
  entry.overlayClass === "overlay" &&
  (overlayActiveIds.has(entry.id) ||
    (entry.owner !== undefined && overlayActiveIds.has(entry.owner)));

const byDeclaration = (a: DrawOrderEntry, b: DrawOrderEntry): number =>
  a.drawOrderIndex - b.drawOrderIndex;

const orderEntries = <T extends DrawOrderEntry>(
  entries: readonly T[],
  overlayActiveIds: ReadonlySet<string>,
): T[] => {
  const declared = [...entries].sort(byDeclaration);
  const bases = declared.filter((entry) => entry.overlayClass === "base");
  const overlays = declared.filter((entry) =>
    isOverlayActive(entry, overlayActiveIds),
  );
  return [...bases, ...overlays];
};

/**
 * Paint order: base widgets in declaration order, then every active overlay
 * in declaration order. Inactive overlays and `none` widgets are left out.
 */
export const resolveDrawOrder = (
  widgets: readonly DrawOrderEntry[],
  overlayActiveIds: ReadonlySet<string>,
): string[] =>
  orderEntries(widgets, overlayActiveIds).map((entry) => entry.id);

/**
 * Same ordering as {@link resolveDrawOrder}, paired with the boxes to paint.
 */
export const resolvePaintList = (
  boxes: readonly LayoutBox[],
  overlayActiveIds: ReadonlySet<string>,
): PaintEntry[] =>
  orderEntries(boxes, overlayActiveIds).map((box) => ({ id: box.id, box }));
