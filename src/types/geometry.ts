/**
 * Value types shared by the geometry, layout and transition features.
 *
 * Coordinates follow screen conventions with the origin at the bottom-left
 * corner of the primary screen and y increasing upward.
 */

export interface Point {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** Sizes of the four sides of a box (bar heights for top/bottom, widths for leading/trailing). */
export interface BoxQuad {
  top: number;
  trailing: number;
  bottom: number;
  leading: number;
}

export type BoxSide = keyof BoxQuad;

export type WindowMode = 'windowed' | 'fullScreen' | 'musicMode';

export type PanelPlacement = 'inside' | 'outside';

export type OSCPosition = 'floating' | 'top' | 'bottom';

/**
 * How a window must fit inside its screen.
 * - noConstraints: no container
 * - keepInVisibleScreen: constrain inside the visible frame
 * - centerInVisibleScreen: constrain and center inside the visible frame (one-shot)
 * - legacyFullScreen: constrain inside the full screen frame
 * - nativeFullScreen: constrain inside the frame below the camera housing
 */
export type ScreenFitOption =
  | 'noConstraints'
  | 'keepInVisibleScreen'
  | 'centerInVisibleScreen'
  | 'legacyFullScreen'
  | 'nativeFullScreen';

/** Snapshot of a display as reported by the windowing system. */
export interface ScreenInfo {
  id: string;
  frame: Rect;
  /** Frame minus menu bar and dock */
  visibleFrame: Rect;
  /** Height of the camera housing at the top of the screen, 0 if none */
  cameraHousingHeight: number;
}
