import type { PanelPlacement } from '@/types/geometry';
import { createLogger } from '@/lib/logger';
import type { Sidebar, SidebarLocation, SidebarTab, SidebarTabGroup } from './types';

const log = createLogger('Sidebar');

export const SIDEBAR = {
  settingsWidth: 360,
  minPlaylistWidth: 240,
  maxPlaylistWidth: 800,
  defaultDownshift: 0,
  defaultTabHeight: 48,
  musicModeTabHeight: 32,
  minTabHeight: 16,
  maxTabHeight: 70,
} as const;

const SETTINGS_TABS: readonly SidebarTab[] = ['video', 'audio', 'sub'];

export function tabGroupOf(tab: SidebarTab): SidebarTabGroup {
  if (tab === 'playlist' || tab === 'chapters') return 'playlist';
  return 'settings';
}

export function parseSidebarTab(name: string): SidebarTab | undefined {
  if (name === 'playlist' || name === 'chapters') return name;
  const settingsTab = SETTINGS_TABS.find((tab) => tab === name);
  if (settingsTab) return settingsTab;
  if (name.startsWith('plugin:') && name.length > 'plugin:'.length) {
    return `plugin:${name.slice('plugin:'.length)}`;
  }
  return undefined;
}

export function tabGroupWidth(group: SidebarTabGroup, playlistWidth: number): number {
  if (group === 'settings') return SIDEBAR.settingsWidth;
  return Math.min(Math.max(playlistWidth, SIDEBAR.minPlaylistWidth), SIDEBAR.maxPlaylistWidth);
}

export interface SidebarInit {
  placement: PanelPlacement;
  tabGroups?: readonly SidebarTabGroup[];
  visibleTab?: SidebarTab;
  lastVisibleTab?: SidebarTab;
}

export function createSidebar(location: SidebarLocation, init: SidebarInit): Sidebar {
  const tabGroups = [...new Set(init.tabGroups ?? [])].sort();
  let visibleTab = init.visibleTab;
  if (visibleTab && !tabGroups.includes(tabGroupOf(visibleTab))) {
    log.warn(`${location}: tab "${visibleTab}" is not in its tab groups; hiding`);
    visibleTab = undefined;
  }
  return {
    location,
    placement: init.placement,
    tabGroups,
    visibleTab,
    lastVisibleTab: visibleTab ?? init.lastVisibleTab,
  };
}

export type SidebarChanges = Partial<Omit<SidebarInit, 'visibleTab'>> & {
  /** Pass null to hide the sidebar */
  visibleTab?: SidebarTab | null;
};

export function cloneSidebar(sidebar: Sidebar, changes: SidebarChanges = {}): Sidebar {
  const visibleTab =
    changes.visibleTab === null ? undefined : (changes.visibleTab ?? sidebar.visibleTab);
  return createSidebar(sidebar.location, {
    placement: changes.placement ?? sidebar.placement,
    tabGroups: changes.tabGroups ?? sidebar.tabGroups,
    visibleTab,
    lastVisibleTab: changes.lastVisibleTab ?? sidebar.lastVisibleTab,
  });
}

export function isSidebarVisible(sidebar: Sidebar): boolean {
  return sidebar.visibleTab !== undefined;
}

export function visibleTabGroupOf(sidebar: Sidebar): SidebarTabGroup | undefined {
  return sidebar.visibleTab ? tabGroupOf(sidebar.visibleTab) : undefined;
}

/**
 * Tab to open when the sidebar is toggled on: the last one shown if its group
 * is still configured here, else the first tab of the first group.
 */
export function defaultTabToShow(sidebar: Sidebar): SidebarTab | undefined {
  const last = sidebar.lastVisibleTab;
  if (last && sidebar.tabGroups.includes(tabGroupOf(last))) {
    return last;
  }
  const group = sidebar.tabGroups[0];
  if (group === 'playlist') return 'playlist';
  if (group === 'settings') return 'video';
  log.warn(`No tab groups found for ${sidebar.location}`);
  return undefined;
}

export function sidebarCurrentWidth(sidebar: Sidebar, playlistWidth: number): number {
  const group = visibleTabGroupOf(sidebar);
  return group ? tabGroupWidth(group, playlistWidth) : 0;
}

export function sidebarInsideWidth(sidebar: Sidebar, playlistWidth: number): number {
  return sidebar.placement === 'inside' ? sidebarCurrentWidth(sidebar, playlistWidth) : 0;
}

export function sidebarOutsideWidth(sidebar: Sidebar, playlistWidth: number): number {
  return sidebar.placement === 'outside' ? sidebarCurrentWidth(sidebar, playlistWidth) : 0;
}
