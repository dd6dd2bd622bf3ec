import type { OSCPosition, PanelPlacement, WindowMode } from '@/types/geometry';
import { createLogger } from '@/lib/logger';
import { MIN_SPACE_BETWEEN_INSIDE_SIDEBARS } from '@/features/geometry/constants';
import { cloneSidebar, createSidebar, sidebarInsideWidth } from './sidebar';
import type { LayoutSpec, Sidebar, SidebarLocation, SidebarTabGroup } from './types';

const log = createLogger('LayoutSpec');

/** Preference values that feed a {@link LayoutSpec} */
export interface LayoutPreferences {
  topBarPlacement: PanelPlacement;
  bottomBarPlacement: PanelPlacement;
  leadingSidebarPlacement: PanelPlacement;
  trailingSidebarPlacement: PanelPlacement;
  settingsTabGroupLocation: SidebarLocation;
  playlistTabGroupLocation: SidebarLocation;
  enableOSC: boolean;
  oscPosition: OSCPosition;
  useLegacyWindowedMode: boolean;
  useLegacyFullScreen: boolean;
}

export interface LayoutSpecInit {
  leadingSidebar: Sidebar;
  trailingSidebar: Sidebar;
  mode: WindowMode;
  isLegacyStyle: boolean;
  topBarPlacement: PanelPlacement;
  bottomBarPlacement: PanelPlacement;
  enableOSC: boolean;
  oscPosition: OSCPosition;
}

/**
 * Builds a spec. Music mode has a fixed layout, so its overrides are applied
 * here rather than left to callers.
 */
export function createLayoutSpec(init: LayoutSpecInit): LayoutSpec {
  if (init.mode === 'musicMode') {
    return {
      ...init,
      leadingSidebar: cloneSidebar(init.leadingSidebar, { visibleTab: null }),
      trailingSidebar: cloneSidebar(init.trailingSidebar, { visibleTab: null }),
      topBarPlacement: 'inside',
      bottomBarPlacement: 'outside',
      enableOSC: false,
    };
  }
  return { ...init };
}

export function cloneLayoutSpec(spec: LayoutSpec, changes: Partial<LayoutSpecInit> = {}): LayoutSpec {
  return createLayoutSpec({
    leadingSidebar: changes.leadingSidebar ?? spec.leadingSidebar,
    trailingSidebar: changes.trailingSidebar ?? spec.trailingSidebar,
    mode: changes.mode ?? spec.mode,
    isLegacyStyle: changes.isLegacyStyle ?? spec.isLegacyStyle,
    topBarPlacement: changes.topBarPlacement ?? spec.topBarPlacement,
    bottomBarPlacement: changes.bottomBarPlacement ?? spec.bottomBarPlacement,
    enableOSC: changes.enableOSC ?? spec.enableOSC,
    oscPosition: changes.oscPosition ?? spec.oscPosition,
  });
}

export function tabGroupsFromPreferences(
  location: SidebarLocation,
  prefs: Pick<LayoutPreferences, 'settingsTabGroupLocation' | 'playlistTabGroupLocation'>
): SidebarTabGroup[] {
  const groups: SidebarTabGroup[] = [];
  if (prefs.playlistTabGroupLocation === location) groups.push('playlist');
  if (prefs.settingsTabGroupLocation === location) groups.push('settings');
  return groups;
}

/** Layout of a window before anything is known about it: no OSC, sidebars hidden, bars inside */
export function defaultLayoutSpec(prefs: LayoutPreferences): LayoutSpec {
  return createLayoutSpec({
    leadingSidebar: createSidebar('leadingSidebar', {
      placement: prefs.leadingSidebarPlacement,
      tabGroups: tabGroupsFromPreferences('leadingSidebar', prefs),
    }),
    trailingSidebar: createSidebar('trailingSidebar', {
      placement: prefs.trailingSidebarPlacement,
      tabGroups: tabGroupsFromPreferences('trailingSidebar', prefs),
    }),
    mode: 'windowed',
    isLegacyStyle: false,
    topBarPlacement: 'inside',
    bottomBarPlacement: 'inside',
    enableOSC: false,
    oscPosition: 'floating',
  });
}

export interface FromPreferencesOptions {
  mode?: WindowMode;
  isLegacyStyle?: boolean;
  /** Source of sidebar visibility and of the mode when none is given */
  fillingInFrom: LayoutSpec;
}

/**
 * Spec matching the current preferences. Sidebar visibility is per-window
 * state, so it is carried over from the old spec.
 */
export function layoutSpecFromPreferences(
  prefs: LayoutPreferences,
  options: FromPreferencesOptions
): LayoutSpec {
  const old = options.fillingInFrom;
  const mode = options.mode ?? old.mode;
  const isLegacyStyle =
    options.isLegacyStyle ??
    (mode === 'fullScreen' ? prefs.useLegacyFullScreen : prefs.useLegacyWindowedMode);

  return createLayoutSpec({
    leadingSidebar: createSidebar('leadingSidebar', {
      placement: prefs.leadingSidebarPlacement,
      tabGroups: tabGroupsFromPreferences('leadingSidebar', prefs),
      visibleTab: old.leadingSidebar.visibleTab,
      lastVisibleTab: old.leadingSidebar.lastVisibleTab,
    }),
    trailingSidebar: createSidebar('trailingSidebar', {
      placement: prefs.trailingSidebarPlacement,
      tabGroups: tabGroupsFromPreferences('trailingSidebar', prefs),
      visibleTab: old.trailingSidebar.visibleTab,
      lastVisibleTab: old.trailingSidebar.lastVisibleTab,
    }),
    mode,
    isLegacyStyle,
    topBarPlacement: prefs.topBarPlacement,
    bottomBarPlacement: prefs.bottomBarPlacement,
    enableOSC: prefs.enableOSC,
    oscPosition: prefs.oscPosition,
  });
}

function sameGroups(a: readonly SidebarTabGroup[], b: readonly SidebarTabGroup[]): boolean {
  return a.length === b.length && a.every((group) => b.includes(group));
}

/** Compares only the fields which come from preferences */
export function hasSamePrefsValues(spec: LayoutSpec, other: LayoutSpec): boolean {
  return (
    spec.enableOSC === other.enableOSC &&
    spec.oscPosition === other.oscPosition &&
    spec.isLegacyStyle === other.isLegacyStyle &&
    spec.topBarPlacement === other.topBarPlacement &&
    spec.bottomBarPlacement === other.bottomBarPlacement &&
    spec.leadingSidebar.placement === other.leadingSidebar.placement &&
    spec.trailingSidebar.placement === other.trailingSidebar.placement &&
    sameGroups(spec.leadingSidebar.tabGroups, other.leadingSidebar.tabGroups) &&
    sameGroups(spec.trailingSidebar.tabGroups, other.trailingSidebar.tabGroups)
  );
}

export function layoutSpecsEqual(spec: LayoutSpec, other: LayoutSpec): boolean {
  return (
    hasSamePrefsValues(spec, other) &&
    spec.mode === other.mode &&
    spec.leadingSidebar.visibleTab === other.leadingSidebar.visibleTab &&
    spec.trailingSidebar.visibleTab === other.trailingSidebar.visibleTab
  );
}

/**
 * Inside sidebars that must close so the space left between them is at least
 * the minimum. The wider one goes first; empty when both fit.
 */
export function isHideSidebarNeeded(
  spec: LayoutSpec,
  viewportWidth: number,
  playlistWidth: number
): SidebarLocation[] {
  let leadingWidth = sidebarInsideWidth(spec.leadingSidebar, playlistWidth);
  let trailingWidth = sidebarInsideWidth(spec.trailingSidebar, playlistWidth);
  const toHide: SidebarLocation[] = [];

  while (viewportWidth - (leadingWidth + trailingWidth + MIN_SPACE_BETWEEN_INSIDE_SIDEBARS) < 0) {
    if (leadingWidth > 0 && leadingWidth >= trailingWidth) {
      toHide.push('leadingSidebar');
      leadingWidth = 0;
    } else if (trailingWidth > 0) {
      toHide.push('trailingSidebar');
      trailingWidth = 0;
    } else {
      break;
    }
  }

  if (toHide.length > 0) {
    log.debug(`Viewport width ${viewportWidth} too narrow for inside sidebars; hiding ${toHide.join(', ')}`);
  }
  return toHide;
}

export function withSidebarsHidden(spec: LayoutSpec, locations: readonly SidebarLocation[]): LayoutSpec {
  if (locations.length === 0) return spec;
  return cloneLayoutSpec(spec, {
    leadingSidebar: locations.includes('leadingSidebar')
      ? cloneSidebar(spec.leadingSidebar, { visibleTab: null })
      : spec.leadingSidebar,
    trailingSidebar: locations.includes('trailingSidebar')
      ? cloneSidebar(spec.trailingSidebar, { visibleTab: null })
      : spec.trailingSidebar,
  });
}

export function sidebarAt(spec: LayoutSpec, location: SidebarLocation): Sidebar {
  return location === 'leadingSidebar' ? spec.leadingSidebar : spec.trailingSidebar;
}
