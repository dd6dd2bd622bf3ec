import { createStore } from 'zustand/vanilla';
import type { Size } from '@/types/geometry';
import type { MusicModeGeometry } from '@/features/geometry/music-mode-geometry';
import type { WindowGeometry } from '@/features/geometry/window-geometry';
import type { LayoutState } from '@/features/layout/types';
import type { ResizeAxis } from '../utils/resize-strategy';
import type { VideoParams } from '../types';

export interface WindowLayoutState {
  currentLayout: LayoutState;
  /** Windowed geometry, kept while in full screen or music mode so it can be returned to */
  windowedModeGeometry: WindowGeometry;
  musicModeGeometry: MusicModeGeometry;
  videoParams: VideoParams | undefined;
  /** Viewport size from the user's last resize; restored when the video changes */
  intendedViewportSize: Size | undefined;
  isOnTop: boolean;
  /** Set once the window has been sized for its first video */
  isInitialSizeDone: boolean;
  /** True from the start of a restore until its initial layout has run */
  isRestoring: boolean;
  isInitialLayoutDone: boolean;
  /** Axis latched for the rest of a live resize */
  liveResizeAxis: ResizeAxis | undefined;
}

interface WindowLayoutActions {
  setCurrentLayout: (layout: LayoutState) => void;
  setWindowedModeGeometry: (geometry: WindowGeometry) => void;
  setMusicModeGeometry: (geometry: MusicModeGeometry) => void;
  setVideoParams: (params: VideoParams) => void;
  setIntendedViewportSize: (size: Size | undefined) => void;
  setOnTop: (isOnTop: boolean) => void;
  setLiveResizeAxis: (axis: ResizeAxis | undefined) => void;
  markInitialSizeDone: () => void;
  setRestoring: (isRestoring: boolean) => void;
  markInitialLayoutDone: () => void;
}

export type WindowLayoutStore = WindowLayoutState & WindowLayoutActions;

export type WindowLayoutInit = Pick<WindowLayoutState, 'currentLayout' | 'windowedModeGeometry' | 'musicModeGeometry'>;

/**
 * Per-window layout state. Owned by one controller; nothing else writes to it.
 */
export function createWindowLayoutStore(init: WindowLayoutInit) {
  return createStore<WindowLayoutStore>()((set) => ({
    ...init,
    videoParams: undefined,
    intendedViewportSize: undefined,
    isOnTop: false,
    isInitialSizeDone: false,
    isRestoring: false,
    isInitialLayoutDone: false,
    liveResizeAxis: undefined,

    setCurrentLayout: (currentLayout) => set({ currentLayout }),
    setWindowedModeGeometry: (windowedModeGeometry) => set({ windowedModeGeometry }),
    setMusicModeGeometry: (musicModeGeometry) => set({ musicModeGeometry }),
    setVideoParams: (videoParams) => set({ videoParams }),
    setIntendedViewportSize: (intendedViewportSize) => set({ intendedViewportSize }),
    setOnTop: (isOnTop) => set({ isOnTop }),
    setLiveResizeAxis: (liveResizeAxis) => set({ liveResizeAxis }),
    markInitialSizeDone: () => set({ isInitialSizeDone: true }),
    setRestoring: (isRestoring) => set({ isRestoring }),
    markInitialLayoutDone: () => set({ isInitialLayoutDone: true }),
  }));
}

export type WindowLayoutStoreApi = ReturnType<typeof createWindowLayoutStore>;
