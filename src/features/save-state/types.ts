import type { BoxQuad, Rect, Size } from '@/types/geometry';
import type { LayoutSpec } from '@/features/layout/types';

/** Names of the entries in a saved window's property bag */
export const SAVE_STATE_PROPS = {
  layoutSpec: 'layoutSpec',
  windowGeometry: 'windowGeometry',
  musicModeGeometry: 'musicModeGeometry',
  intendedViewportSize: 'intendedViewportSize',
  isOnTop: 'onTop',
} as const;

/** Property bag as written to storage. Values are CSV strings or `Y`/`N`. */
export type SaveStateProperties = Record<string, string>;

/** Windowed geometry as stored. Inside bars and the screen are supplied again on restore. */
export interface SavedWindowGeometry {
  windowFrame: Rect;
  outsideBars: BoxQuad;
  videoSize: Size;
  videoAspect: number;
}

export interface SavedMusicModeGeometry {
  windowFrame: Rect;
  playlistHeight: number;
  isVideoVisible: boolean;
  isPlaylistVisible: boolean;
  videoAspect: number;
  screenId: string;
}

export interface SavedPlayerState {
  layoutSpec?: LayoutSpec;
  windowedModeGeometry?: SavedWindowGeometry;
  musicModeGeometry?: SavedMusicModeGeometry;
  intendedViewportSize?: Size;
  isOnTop: boolean;
}
