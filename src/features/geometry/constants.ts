import type { Size } from '@/types/geometry';

/** Global floor for the video area in windowed & full screen modes */
export const MIN_VIDEO_SIZE: Size = { width: 285, height: 120 };

/** Space kept free for video between two inside sidebars */
export const MIN_SPACE_BETWEEN_INSIDE_SIDEBARS = 220;

/** Tolerance used when comparing geometry values for equality */
export const GEOMETRY_EPSILON = 0.1;

export const MUSIC_MODE = {
  minWindowWidth: 260,
  maxWindowWidth: 1200,
  /** Fixed height of the control bar under the album art / video */
  oscHeight: 72,
  minPlaylistHeight: 138,
  defaultWindowWidth: 280,
} as const;
