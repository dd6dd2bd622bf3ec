export {
  DEFAULT_PREFERENCES,
  createPreferencesStore,
  preferencesStore,
  selectAnimationDurations,
  selectLayoutPreferences,
} from './stores/preferences-store';
export type { PreferencesStore, PreferencesStoreApi } from './stores/preferences-store';
export { RESIZE_WINDOW_RATIOS } from './types';
export type { PlayerPreferences, ResizeWindowOption, ResizeWindowScheme, ResizeWindowTiming } from './types';
