import type { LayoutPreferences } from '@/features/layout/layout-spec';

/** When a new video may resize the window */
export type ResizeWindowTiming = 'always' | 'onlyWhenOpen' | 'never';

/** How the new window size is chosen */
export type ResizeWindowScheme = 'simpleVideoSizeMultiple' | 'externalGeometry';

/** Target size for the video-size-multiple scheme */
export type ResizeWindowOption = 'fitScreen' | 'videoSize05' | 'videoSize10' | 'videoSize15' | 'videoSize20';

export const RESIZE_WINDOW_RATIOS: Record<Exclude<ResizeWindowOption, 'fitScreen'>, number> = {
  videoSize05: 0.5,
  videoSize10: 1,
  videoSize15: 1.5,
  videoSize20: 2,
};

/**
 * User-facing options read by the window layout controller
 */
export interface PlayerPreferences extends LayoutPreferences {
  // Resizing
  lockViewportToVideoSize: boolean;
  resizeWindowTiming: ResizeWindowTiming;
  resizeWindowScheme: ResizeWindowScheme;
  resizeWindowOption: ResizeWindowOption;
  /** `[W[xH]][±X±Y]`, used by the externalGeometry scheme. Empty = unset. */
  initialWindowGeometry: string;
  moveWindowIntoVisibleScreenOnResize: boolean;

  // Chrome
  playlistWidth: number;
  oscBarHeight: number;
  alwaysShowOnTopIcon: boolean;
  showLeadingSidebarToggleButton: boolean;
  showTrailingSidebarToggleButton: boolean;

  // Full screen
  fullScreenWhenOpen: boolean;
  allowVideoToOverlapCameraHousing: boolean;

  // Animation (seconds)
  animationDurationDefault: number;
  animationDurationFullScreen: number;
}
