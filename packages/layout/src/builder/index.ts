export {
  DEFAULT_LABEL_HEIGHT_PX,
  assertLayoutOptions,
  assertSurfaceSize,
  buildLayout,
  type BuildLayoutOptions,
} from "./layout-builder";
