import { createStore } from 'zustand/vanilla';
import type { LayoutPreferences } from '@/features/layout/layout-spec';
import type { AnimationDurations } from '@/features/transitions/types';
import type { PlayerPreferences } from '../types';

interface PreferencesActions {
  setSetting: <K extends keyof PlayerPreferences>(key: K, value: PlayerPreferences[K]) => void;
  setSettings: (values: Partial<PlayerPreferences>) => void;
  resetToDefaults: () => void;
}

export type PreferencesStore = PlayerPreferences & PreferencesActions;

export const DEFAULT_PREFERENCES: PlayerPreferences = {
  // Layout
  topBarPlacement: 'inside',
  bottomBarPlacement: 'inside',
  leadingSidebarPlacement: 'inside',
  trailingSidebarPlacement: 'inside',
  settingsTabGroupLocation: 'trailingSidebar',
  playlistTabGroupLocation: 'trailingSidebar',
  enableOSC: true,
  oscPosition: 'floating',
  useLegacyWindowedMode: false,
  useLegacyFullScreen: false,

  // Resizing
  lockViewportToVideoSize: true,
  resizeWindowTiming: 'onlyWhenOpen',
  resizeWindowScheme: 'simpleVideoSizeMultiple',
  resizeWindowOption: 'videoSize10',
  initialWindowGeometry: '',
  moveWindowIntoVisibleScreenOnResize: true,

  // Chrome
  playlistWidth: 270,
  oscBarHeight: 44,
  alwaysShowOnTopIcon: false,
  showLeadingSidebarToggleButton: false,
  showTrailingSidebarToggleButton: false,

  // Full screen
  fullScreenWhenOpen: false,
  allowVideoToOverlapCameraHousing: false,

  // Animation
  animationDurationDefault: 0.25,
  animationDurationFullScreen: 0.5,
};

/**
 * Creates a preferences store. Each controller may be given its own; the
 * shared instance below is the default.
 *
 * Usage:
 *   const store = createPreferencesStore({ oscPosition: 'bottom' });
 *   store.getState().setSetting('playlistWidth', 320);
 */
export function createPreferencesStore(initial: Partial<PlayerPreferences> = {}) {
  return createStore<PreferencesStore>()((set) => ({
    ...DEFAULT_PREFERENCES,
    ...initial,

    setSetting: (key, value) => set({ [key]: value }),

    setSettings: (values) => set(values),

    resetToDefaults: () => set(DEFAULT_PREFERENCES),
  }));
}

export type PreferencesStoreApi = ReturnType<typeof createPreferencesStore>;

export const preferencesStore = createPreferencesStore();

// Selectors
export const selectLayoutPreferences = (state: PlayerPreferences): LayoutPreferences => ({
  topBarPlacement: state.topBarPlacement,
  bottomBarPlacement: state.bottomBarPlacement,
  leadingSidebarPlacement: state.leadingSidebarPlacement,
  trailingSidebarPlacement: state.trailingSidebarPlacement,
  settingsTabGroupLocation: state.settingsTabGroupLocation,
  playlistTabGroupLocation: state.playlistTabGroupLocation,
  enableOSC: state.enableOSC,
  oscPosition: state.oscPosition,
  useLegacyWindowedMode: state.useLegacyWindowedMode,
  useLegacyFullScreen: state.useLegacyFullScreen,
});

export const selectAnimationDurations = (state: PlayerPreferences): AnimationDurations => ({
  default: state.animationDurationDefault,
  fullScreen: state.animationDurationFullScreen,
});

