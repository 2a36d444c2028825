export {
  isOverlayActive,
  resolveDrawOrder,
  resolvePaintList,
  type DrawOrderEntry,
  type PaintEntry,
} from "./draw-order-resolver";
