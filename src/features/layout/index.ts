export type {
  LayoutEnvironment,
  LayoutSpec,
  LayoutState,
  Sidebar,
  SidebarLocation,
  SidebarTab,
  SidebarTabGroup,
  Visibility,
} from './types';
export {
  SIDEBAR,
  cloneSidebar,
  createSidebar,
  defaultTabToShow,
  isSidebarVisible,
  parseSidebarTab,
  tabGroupOf,
  tabGroupWidth,
  visibleTabGroupOf,
} from './sidebar';
export type { SidebarChanges, SidebarInit } from './sidebar';
export {
  cloneLayoutSpec,
  createLayoutSpec,
  defaultLayoutSpec,
  hasSamePrefsValues,
  isHideSidebarNeeded,
  layoutSpecFromPreferences,
  layoutSpecsEqual,
  sidebarAt,
  withSidebarsHidden,
} from './layout-spec';
export type { FromPreferencesOptions, LayoutPreferences, LayoutSpecInit } from './layout-spec';
export {
  DEFAULT_LAYOUT_ENVIRONMENT,
  DEFAULT_OSC_BAR_HEIGHT,
  REDUCED_TITLE_BAR_HEIGHT,
  STANDARD_TITLE_BAR_HEIGHT,
  buildFullScreenGeometry,
  deriveLayoutState,
  hasPermanentOSC,
  insideBarsOf,
  isShowable,
  layoutStatesEqual,
  outsideBarsOf,
} from './layout-state';
export type { FullScreenGeometryOptions } from './layout-state';
