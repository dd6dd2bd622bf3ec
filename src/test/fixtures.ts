import type { ScreenInfo } from '@/types/geometry';
import {
  cloneLayoutSpec,
  defaultLayoutSpec,
  layoutSpecFromPreferences,
} from '@/features/layout/layout-spec';
import type { LayoutPreferences, LayoutSpecInit } from '@/features/layout/layout-spec';
import type { LayoutEnvironment, LayoutSpec } from '@/features/layout/types';

/** 1920x1080 display with a 25 unit menu bar and no camera housing */
export function createScreen(overrides: Partial<ScreenInfo> = {}): ScreenInfo {
  return {
    id: 'screen-1',
    frame: { x: 0, y: 0, width: 1920, height: 1080 },
    visibleFrame: { x: 0, y: 0, width: 1920, height: 1055 },
    cameraHousingHeight: 0,
    ...overrides,
  };
}

/** 1512x982 laptop display with a 32 unit camera housing */
export function createNotchedScreen(overrides: Partial<ScreenInfo> = {}): ScreenInfo {
  return {
    id: 'screen-notched',
    frame: { x: 0, y: 0, width: 1512, height: 982 },
    visibleFrame: { x: 0, y: 0, width: 1512, height: 944 },
    cameraHousingHeight: 32,
    ...overrides,
  };
}

/** Inside bars, OSC in the bottom bar, playlist on the trailing side and settings on the leading side */
export function createLayoutPreferences(overrides: Partial<LayoutPreferences> = {}): LayoutPreferences {
  return {
    topBarPlacement: 'inside',
    bottomBarPlacement: 'inside',
    leadingSidebarPlacement: 'inside',
    trailingSidebarPlacement: 'inside',
    settingsTabGroupLocation: 'leadingSidebar',
    playlistTabGroupLocation: 'trailingSidebar',
    enableOSC: true,
    oscPosition: 'bottom',
    useLegacyWindowedMode: false,
    useLegacyFullScreen: false,
    ...overrides,
  };
}

export function createLayoutSpecFixture(
  prefs: Partial<LayoutPreferences> = {},
  overrides: Partial<LayoutSpecInit> = {}
): LayoutSpec {
  const preferences = createLayoutPreferences(prefs);
  const spec = layoutSpecFromPreferences(preferences, {
    fillingInFrom: defaultLayoutSpec(preferences),
  });
  return cloneLayoutSpec(spec, overrides);
}

export function createLayoutEnvironment(overrides: Partial<LayoutEnvironment> = {}): LayoutEnvironment {
  return {
    isOnTop: false,
    alwaysShowOnTopIcon: false,
    showLeadingSidebarToggleButton: true,
    showTrailingSidebarToggleButton: true,
    oscBarHeight: 44,
    playlistWidth: 270,
    cameraHousingHeight: 0,
    allowVideoToOverlapCameraHousing: false,
    ...overrides,
  };
}
