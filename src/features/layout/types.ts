import type { OSCPosition, PanelPlacement, WindowMode } from '@/types/geometry';

// ============================================================================
// Sidebars
// ============================================================================

export type SidebarLocation = 'leadingSidebar' | 'trailingSidebar';

export type SidebarTabGroup = 'playlist' | 'settings';

export type SidebarTab =
  | 'playlist'
  | 'chapters'
  | 'video'
  | 'audio'
  | 'sub'
  | `plugin:${string}`;

export interface Sidebar {
  readonly location: SidebarLocation;
  readonly placement: PanelPlacement;
  /** Tab groups the user assigned to this sidebar */
  readonly tabGroups: readonly SidebarTabGroup[];
  /** Undefined when the sidebar is hidden */
  readonly visibleTab?: SidebarTab;
  /** Remembered so reopening the sidebar shows the same tab */
  readonly lastVisibleTab?: SidebarTab;
}

// ============================================================================
// Layout spec
// ============================================================================

/**
 * Immutable description of how the window should be laid out.
 * Carries no sizes; see {@link LayoutState} for the derived values.
 */
export interface LayoutSpec {
  readonly leadingSidebar: Sidebar;
  readonly trailingSidebar: Sidebar;
  readonly mode: WindowMode;
  /** App-drawn window chrome instead of the native title bar */
  readonly isLegacyStyle: boolean;
  readonly topBarPlacement: PanelPlacement;
  readonly bottomBarPlacement: PanelPlacement;
  readonly enableOSC: boolean;
  readonly oscPosition: OSCPosition;
}

// ============================================================================
// Layout state
// ============================================================================

export type Visibility = 'hidden' | 'showAlways' | 'showFadeableTopBar' | 'showFadeableNonTopBar';

/** Values read from outside the layout spec when deriving a layout state */
export interface LayoutEnvironment {
  isOnTop: boolean;
  alwaysShowOnTopIcon: boolean;
  showLeadingSidebarToggleButton: boolean;
  showTrailingSidebarToggleButton: boolean;
  oscBarHeight: number;
  playlistWidth: number;
  /** 0 when the screen has none */
  cameraHousingHeight: number;
  allowVideoToOverlapCameraHousing: boolean;
}

export interface LayoutState {
  readonly spec: LayoutSpec;

  readonly titleBar: Visibility;
  readonly titleIconAndText: Visibility;
  readonly trafficLightButtons: Visibility;
  readonly titlebarAccessoryViewControllers: Visibility;
  readonly leadingSidebarToggleButton: Visibility;
  readonly trailingSidebarToggleButton: Visibility;
  readonly pinToTopButton: Visibility;
  readonly controlBarFloating: Visibility;
  readonly topBarView: Visibility;
  readonly bottomBarView: Visibility;

  readonly titleBarHeight: number;
  readonly topOSCHeight: number;
  /** titleBarHeight + topOSCHeight */
  readonly topBarHeight: number;
  /** Height of the OSC when it sits in the bottom bar */
  readonly bottomBarHeight: number;
  readonly cameraHousingOffset: number;
  readonly osdMinOffsetFromTop: number;
  readonly sidebarDownshift: number;
  readonly sidebarTabHeight: number;

  readonly leadingSidebarWidth: number;
  readonly trailingSidebarWidth: number;
}
