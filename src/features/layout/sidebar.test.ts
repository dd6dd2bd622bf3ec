import { describe, expect, it } from 'vitest';
import {
  cloneSidebar,
  createSidebar,
  defaultTabToShow,
  parseSidebarTab,
  sidebarInsideWidth,
  sidebarOutsideWidth,
  tabGroupOf,
  tabGroupWidth,
} from './sidebar';

describe('parseSidebarTab', () => {
  it('parses built-in and plugin tabs', () => {
    expect(parseSidebarTab('sub')).toBe('sub');
    expect(parseSidebarTab('chapters')).toBe('chapters');
    expect(parseSidebarTab('plugin:lyrics')).toBe('plugin:lyrics');
  });

  it('rejects unknown names and empty plugin ids', () => {
    expect(parseSidebarTab('bogus')).toBeUndefined();
    expect(parseSidebarTab('plugin:')).toBeUndefined();
  });

  it('groups plugin tabs with settings', () => {
    expect(tabGroupOf('plugin:lyrics')).toBe('settings');
    expect(tabGroupOf('chapters')).toBe('playlist');
  });
});

describe('tabGroupWidth', () => {
  it('uses a fixed width for settings', () => {
    expect(tabGroupWidth('settings', 100)).toBe(360);
  });

  it('clamps the playlist width', () => {
    expect(tabGroupWidth('playlist', 100)).toBe(240);
    expect(tabGroupWidth('playlist', 300)).toBe(300);
    expect(tabGroupWidth('playlist', 900)).toBe(800);
  });
});

describe('createSidebar', () => {
  it('hides a tab whose group is not configured', () => {
    const sidebar = createSidebar('leadingSidebar', {
      placement: 'inside',
      tabGroups: ['settings'],
      visibleTab: 'playlist',
    });
    expect(sidebar.visibleTab).toBeUndefined();
    expect(sidebar.lastVisibleTab).toBeUndefined();
  });

  it('sorts and dedupes tab groups', () => {
    const sidebar = createSidebar('trailingSidebar', {
      placement: 'outside',
      tabGroups: ['settings', 'playlist', 'settings'],
    });
    expect(sidebar.tabGroups).toEqual(['playlist', 'settings']);
  });

  it('remembers the last visible tab after hiding', () => {
    const shown = createSidebar('trailingSidebar', {
      placement: 'inside',
      tabGroups: ['playlist'],
      visibleTab: 'chapters',
    });
    const hidden = cloneSidebar(shown, { visibleTab: null });
    expect(hidden.visibleTab).toBeUndefined();
    expect(hidden.lastVisibleTab).toBe('chapters');
    expect(defaultTabToShow(hidden)).toBe('chapters');
  });
});

describe('defaultTabToShow', () => {
  it('falls back to the first tab of the first group', () => {
    const sidebar = createSidebar('leadingSidebar', {
      placement: 'inside',
      tabGroups: ['playlist'],
      lastVisibleTab: 'audio',
    });
    expect(defaultTabToShow(sidebar)).toBe('playlist');

    const settings = createSidebar('leadingSidebar', { placement: 'inside', tabGroups: ['settings'] });
    expect(defaultTabToShow(settings)).toBe('video');
  });

  it('returns undefined when no groups are configured', () => {
    const sidebar = createSidebar('leadingSidebar', { placement: 'inside' });
    expect(defaultTabToShow(sidebar)).toBeUndefined();
  });
});

describe('sidebar widths', () => {
  it('splits the current width by placement', () => {
    const inside = createSidebar('trailingSidebar', {
      placement: 'inside',
      tabGroups: ['playlist'],
      visibleTab: 'playlist',
    });
    expect(sidebarInsideWidth(inside, 300)).toBe(300);
    expect(sidebarOutsideWidth(inside, 300)).toBe(0);

    const outside = cloneSidebar(inside, { placement: 'outside' });
    expect(sidebarInsideWidth(outside, 300)).toBe(0);
    expect(sidebarOutsideWidth(outside, 300)).toBe(300);
  });

  it('is zero while hidden', () => {
    const hidden = createSidebar('trailingSidebar', { placement: 'outside', tabGroups: ['playlist'] });
    expect(sidebarOutsideWidth(hidden, 300)).toBe(0);
  });
});
