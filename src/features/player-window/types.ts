import type { Rect, ScreenInfo, Size } from '@/types/geometry';
import type { WindowGeometry } from '@/features/geometry/window-geometry';
import type { LayoutOperationName, LayoutTransition } from '@/features/transitions/types';

/** A window that has not been created yet, or has been closed, has no frame */
export type WindowFrameResult = { status: 'attached'; frame: Rect } | { status: 'detached' };

/** Steps of a transition that only touch views, never the window frame */
export type ViewStepName = Extract<
  LayoutOperationName,
  'preTransition' | 'showFadeableViews' | 'fadeOutOldViews' | 'updateHiddenViewsAndConstraints' | 'fadeInNewViews' | 'postTransition'
>;

/**
 * The native window and the widgets inside it
 */
export interface WindowHost {
  getFrame(): WindowFrameResult;
  setFrame(frame: Rect): void;
  /** True while the user drags a window edge */
  isInLiveResize(): boolean;
  /** The window system animates the frame when native full screen toggles */
  setNativeFullScreen(enabled: boolean): void;
  /** Shows, hides or restyles chrome for one step of a transition */
  applyViewStep(step: ViewStepName, transition: LayoutTransition): void;
  /** Sizes the bars and places the viewport inside the window */
  applyGeometry(geometry: WindowGeometry): void;
}

export interface ScreenProvider {
  /** The screen holding most of `frame`, or the main screen */
  screenFor(frame?: Rect): ScreenInfo;
  screenById(id: string): ScreenInfo | undefined;
}

export interface VideoRenderer {
  pauseRendering(): void;
  resumeRendering(): void;
  applyVideoGeometry(geometry: WindowGeometry): void;
}

export interface VideoParams {
  /** Display size after aspect override, crop and rotation */
  videoSize: Size;
  /** Decoded size, before any filter */
  rawSize?: Size;
}

export interface VideoParamsContext {
  justOpenedFile: boolean;
  isRestoring?: boolean;
}
