import type { BoxQuad, ScreenInfo } from '@/types/geometry';
import { WindowGeometry } from '@/features/geometry/window-geometry';
import { layoutSpecsEqual } from './layout-spec';
import { SIDEBAR, sidebarCurrentWidth } from './sidebar';
import type { LayoutEnvironment, LayoutSpec, LayoutState, Visibility } from './types';

export const STANDARD_TITLE_BAR_HEIGHT = 28;
/** Title bar height when it shares the top bar with the OSC */
export const REDUCED_TITLE_BAR_HEIGHT = 16;
export const DEFAULT_OSC_BAR_HEIGHT = 44;

const OSD_OFFSET_BELOW_TITLE_BAR = 8;

export const DEFAULT_LAYOUT_ENVIRONMENT: LayoutEnvironment = {
  isOnTop: false,
  alwaysShowOnTopIcon: false,
  showLeadingSidebarToggleButton: true,
  showTrailingSidebarToggleButton: true,
  oscBarHeight: DEFAULT_OSC_BAR_HEIGHT,
  playlistWidth: 270,
  cameraHousingHeight: 0,
  allowVideoToOverlapCameraHousing: false,
};

export function isShowable(visibility: Visibility): boolean {
  return visibility !== 'hidden';
}

function computePinToTopButtonVisibility(spec: LayoutSpec, env: LayoutEnvironment): Visibility {
  if (spec.mode === 'fullScreen' || !(env.alwaysShowOnTopIcon || env.isOnTop)) {
    return 'hidden';
  }
  return spec.topBarPlacement === 'inside' ? 'showFadeableNonTopBar' : 'showAlways';
}

/**
 * Projects a spec into concrete visibilities and sizes. Pure: the same spec
 * and environment always produce the same state.
 */
export function deriveLayoutState(
  spec: LayoutSpec,
  env: LayoutEnvironment = DEFAULT_LAYOUT_ENVIRONMENT
): LayoutState {
  let titleBar: Visibility = 'hidden';
  let titleIconAndText: Visibility = 'hidden';
  let trafficLightButtons: Visibility = 'hidden';
  let titlebarAccessoryViewControllers: Visibility = 'hidden';
  let leadingSidebarToggleButton: Visibility = 'hidden';
  let trailingSidebarToggleButton: Visibility = 'hidden';
  let controlBarFloating: Visibility = 'hidden';
  let topBarView: Visibility = 'hidden';
  let bottomBarView: Visibility = 'hidden';

  let titleBarHeight = 0;
  let topOSCHeight = 0;
  let osdMinOffsetFromTop = 0;
  let sidebarDownshift: number = SIDEBAR.defaultDownshift;
  let sidebarTabHeight: number = SIDEBAR.defaultTabHeight;

  const isTopBarInside = spec.topBarPlacement === 'inside';

  // Title bar and its accessories
  if (spec.mode === 'fullScreen') {
    titleIconAndText = 'showAlways';
    trafficLightButtons = 'showAlways';
  } else if (spec.mode !== 'musicMode') {
    const visibleState: Visibility = isTopBarInside ? 'showFadeableTopBar' : 'showAlways';
    topBarView = visibleState;

    // Legacy style draws no native title bar
    if (!spec.isLegacyStyle) {
      titleBar = visibleState;
      trafficLightButtons = visibleState;
      titleIconAndText = visibleState;
      titleBarHeight = STANDARD_TITLE_BAR_HEIGHT;
      titlebarAccessoryViewControllers = visibleState;

      if (spec.leadingSidebar.tabGroups.length > 0 && env.showLeadingSidebarToggleButton) {
        leadingSidebarToggleButton = visibleState;
      }
      if (spec.trailingSidebar.tabGroups.length > 0 && env.showTrailingSidebarToggleButton) {
        trailingSidebarToggleButton = visibleState;
      }
    }

    if (isTopBarInside) {
      osdMinOffsetFromTop = titleBarHeight + OSD_OFFSET_BELOW_TITLE_BAR;
    }
  }

  // OSC
  if (spec.enableOSC) {
    switch (spec.oscPosition) {
      case 'floating':
        controlBarFloating = 'showFadeableNonTopBar';
        break;
      case 'top':
        if (isShowable(titleBar)) {
          titleBarHeight = REDUCED_TITLE_BAR_HEIGHT;
        }
        topBarView = isTopBarInside ? 'showFadeableTopBar' : 'showAlways';
        topOSCHeight = env.oscBarHeight;
        break;
      case 'bottom':
        bottomBarView = spec.bottomBarPlacement === 'inside' ? 'showFadeableNonTopBar' : 'showAlways';
        break;
    }
  } else if (spec.mode === 'musicMode') {
    bottomBarView = 'showAlways';
  }

  // Sidebar tabs line up with the title bar and the top OSC
  if (spec.mode === 'musicMode') {
    sidebarTabHeight = SIDEBAR.musicModeTabHeight;
  } else if (isShowable(topBarView) && isTopBarInside) {
    sidebarDownshift = titleBarHeight;
    if (topOSCHeight >= SIDEBAR.minTabHeight && topOSCHeight <= SIDEBAR.maxTabHeight) {
      sidebarTabHeight = topOSCHeight;
    }
  }

  const bottomBarHeight =
    spec.enableOSC && spec.oscPosition === 'bottom' ? env.oscBarHeight : 0;
  const cameraHousingOffset =
    spec.mode === 'fullScreen' && spec.isLegacyStyle && !env.allowVideoToOverlapCameraHousing
      ? env.cameraHousingHeight
      : 0;

  return {
    spec,
    titleBar,
    titleIconAndText,
    trafficLightButtons,
    titlebarAccessoryViewControllers,
    leadingSidebarToggleButton,
    trailingSidebarToggleButton,
    pinToTopButton: computePinToTopButtonVisibility(spec, env),
    controlBarFloating,
    topBarView,
    bottomBarView,
    titleBarHeight,
    topOSCHeight,
    topBarHeight: titleBarHeight + topOSCHeight,
    bottomBarHeight,
    cameraHousingOffset,
    osdMinOffsetFromTop,
    sidebarDownshift,
    sidebarTabHeight,
    leadingSidebarWidth: sidebarCurrentWidth(spec.leadingSidebar, env.playlistWidth),
    trailingSidebarWidth: sidebarCurrentWidth(spec.trailingSidebar, env.playlistWidth),
  };
}

// ============================================================================
// Derived accessors
// ============================================================================

export function hasPermanentOSC(state: LayoutState): boolean {
  const { spec } = state;
  return (
    spec.enableOSC &&
    ((spec.oscPosition === 'top' && spec.topBarPlacement === 'outside') ||
      (spec.oscPosition === 'bottom' && spec.bottomBarPlacement === 'outside'))
  );
}

const DERIVED_KEYS: ReadonlyArray<Exclude<keyof LayoutState, 'spec'>> = [
  'titleBar',
  'titleIconAndText',
  'trafficLightButtons',
  'titlebarAccessoryViewControllers',
  'leadingSidebarToggleButton',
  'trailingSidebarToggleButton',
  'pinToTopButton',
  'controlBarFloating',
  'topBarView',
  'bottomBarView',
  'titleBarHeight',
  'topOSCHeight',
  'topBarHeight',
  'bottomBarHeight',
  'cameraHousingOffset',
  'osdMinOffsetFromTop',
  'sidebarDownshift',
  'sidebarTabHeight',
  'leadingSidebarWidth',
  'trailingSidebarWidth',
];

export function layoutStatesEqual(a: LayoutState, b: LayoutState): boolean {
  return layoutSpecsEqual(a.spec, b.spec) && DERIVED_KEYS.every((key) => a[key] === b[key]);
}

/** Bars which push the viewport inward */
export function outsideBarsOf(state: LayoutState): BoxQuad {
  const { spec } = state;
  return {
    top: spec.topBarPlacement === 'outside' ? state.topBarHeight : 0,
    trailing: spec.trailingSidebar.placement === 'outside' ? state.trailingSidebarWidth : 0,
    bottom: spec.bottomBarPlacement === 'outside' ? state.bottomBarHeight : 0,
    leading: spec.leadingSidebar.placement === 'outside' ? state.leadingSidebarWidth : 0,
  };
}

/** Bars which overlap the viewport */
export function insideBarsOf(state: LayoutState): BoxQuad {
  const { spec } = state;
  return {
    top: spec.topBarPlacement === 'inside' ? state.topBarHeight : 0,
    trailing: spec.trailingSidebar.placement === 'inside' ? state.trailingSidebarWidth : 0,
    bottom: spec.bottomBarPlacement === 'inside' ? state.bottomBarHeight : 0,
    leading: spec.leadingSidebar.placement === 'inside' ? state.leadingSidebarWidth : 0,
  };
}

export interface FullScreenGeometryOptions {
  screen: ScreenInfo;
  videoAspect: number;
  allowVideoToOverlapCameraHousing: boolean;
}

export function buildFullScreenGeometry(
  state: LayoutState,
  options: FullScreenGeometryOptions
): WindowGeometry {
  return WindowGeometry.forFullScreen({
    screen: options.screen,
    legacy: state.spec.isLegacyStyle,
    mode: 'fullScreen',
    videoAspect: options.videoAspect,
    outsideBars: outsideBarsOf(state),
    insideBars: insideBarsOf(state),
    allowVideoToOverlapCameraHousing: options.allowVideoToOverlapCameraHousing,
  });
}
