import type { ScreenInfo, Size } from '@/types/geometry';
import type { MusicModeGeometry } from '@/features/geometry/music-mode-geometry';
import type { WindowGeometry } from '@/features/geometry/window-geometry';
import type { LayoutEnvironment, LayoutSpec, LayoutState } from '@/features/layout/types';

export type TimingName = 'linear' | 'easeIn' | 'easeOut' | 'easeInEaseOut';

export type LayoutOperationName =
  | 'preTransition'
  | 'showFadeableViews'
  | 'fadeOutOldViews'
  | 'uncoverCameraHousing'
  | 'closeOldPanels'
  | 'pauseVideoRendering'
  | 'updateHiddenViewsAndConstraints'
  | 'resumeVideoRendering'
  | 'moveWindowForMusicMode'
  | 'openNewPanels'
  | 'toggleFullScreenFrame'
  | 'fadeInNewViews'
  | 'coverCameraHousing'
  | 'postTransition';

/**
 * One step of a transition. Plain data: the host decides what each name means
 * for its widgets. Zero-duration steps change state only.
 */
export interface LayoutOperation {
  readonly name: LayoutOperationName;
  readonly duration: number;
  readonly timing?: TimingName;
  /** Frame and bars the window should reach by the end of this step */
  readonly geometry?: WindowGeometry;
}

export interface TransitionPredicates {
  readonly isOSCChanging: boolean;
  readonly isTogglingLegacyStyle: boolean;
  readonly isTogglingFullScreen: boolean;
  readonly isEnteringFullScreen: boolean;
  readonly isExitingFullScreen: boolean;
  readonly isEnteringLegacyFullScreen: boolean;
  readonly isExitingLegacyFullScreen: boolean;
  readonly isEnteringMusicMode: boolean;
  readonly isExitingMusicMode: boolean;
  readonly isTogglingMusicMode: boolean;
  readonly isTopBarPlacementChanging: boolean;
  readonly isBottomBarPlacementChanging: boolean;
  readonly isShowingLeadingSidebar: boolean;
  readonly isShowingTrailingSidebar: boolean;
  readonly isHidingLeadingSidebar: boolean;
  readonly isHidingTrailingSidebar: boolean;
  readonly isTogglingVisibilityOfAnySidebar: boolean;
  readonly needsFadeOutOldViews: boolean;
  readonly needsFadeInNewViews: boolean;
  readonly needsCloseOldPanels: boolean;
}

export interface LayoutTransition {
  readonly name: string;
  readonly fromState: LayoutState;
  readonly toState: LayoutState;
  readonly fromGeometry: WindowGeometry;
  /** Way-point reached once old panels are closed */
  readonly middleGeometry?: WindowGeometry;
  readonly toGeometry: WindowGeometry;
  readonly isInitialLayout: boolean;
  readonly predicates: TransitionPredicates;
  readonly operations: readonly LayoutOperation[];
}

export interface AnimationDurations {
  /** Seconds per animated step */
  default: number;
  fullScreen: number;
}

/** Window state the planner reads; owned by the caller */
export interface TransitionContext {
  windowedModeGeometry: WindowGeometry;
  musicModeGeometry: MusicModeGeometry;
  videoAspect: number;
  /** Screen of the windowed mode window, which full screen also uses */
  screen: ScreenInfo;
  env: LayoutEnvironment;
  durations: AnimationDurations;
  lockViewportToVideoSize: boolean;
  /** Viewport size from the last user resize, restored when outside bars shrink */
  intendedViewportSize?: Size;
}

export interface BuildTransitionInput {
  name: string;
  from: LayoutState;
  to: LayoutSpec;
  context: TransitionContext;
  isInitialLayout?: boolean;
  totalStartingDuration?: number;
  totalEndingDuration?: number;
}
