export { MIN_VIDEO_SIZE, MIN_SPACE_BETWEEN_INSIDE_SIDEBARS, MUSIC_MODE } from './constants';
export {
  WindowGeometry,
  DEFAULT_VIDEO_ASPECT,
  isViewportLocked,
} from './window-geometry';
export type {
  WindowGeometryInit,
  WindowGeometryChanges,
  ScaleOptions,
  ResizedBars,
  FullScreenGeometryInit,
  ViewportFrameInit,
} from './window-geometry';
export { MusicModeGeometry } from './music-mode-geometry';
export type { MusicModeGeometryInit, MusicModeOptions } from './music-mode-geometry';
export { parseExternalGeometry, formatExternalGeometry } from './external-geometry';
export type { ExternalGeometry, GeometryDimension, GeometryOffset } from './external-geometry';
export {
  BOX_QUAD_ZERO,
  BOX_SIDES,
  boxQuad,
  boxQuadsEqual,
  mergeBoxQuad,
  totalWidth,
  totalHeight,
  totalSize,
} from './utils/box-quad';
export {
  aspectOf,
  centeredRect,
  constrainRect,
  fullScreenWindowFrame,
  getContainerFrame,
  isFullScreenFit,
  rectContains,
  rectsEqual,
  sizesEqual,
} from './utils/rect-utils';
export { fitVideoToContainer, computeMinVideoSize } from './utils/video-fit';
export { computeBestViewportMargins } from './utils/viewport-margins';
