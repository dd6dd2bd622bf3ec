import { describe, expect, it } from 'vitest';
import { createLayoutPreferences, createLayoutSpecFixture } from '@/test/fixtures';
import {
  cloneLayoutSpec,
  defaultLayoutSpec,
  hasSamePrefsValues,
  isHideSidebarNeeded,
  layoutSpecFromPreferences,
  tabGroupsFromPreferences,
  withSidebarsHidden,
} from './layout-spec';
import { cloneSidebar } from './sidebar';
import type { LayoutSpec } from './types';

function withBothSidebarsShown(spec: LayoutSpec): LayoutSpec {
  return cloneLayoutSpec(spec, {
    leadingSidebar: cloneSidebar(spec.leadingSidebar, { visibleTab: 'video' }),
    trailingSidebar: cloneSidebar(spec.trailingSidebar, { visibleTab: 'playlist' }),
  });
}

describe('createLayoutSpec', () => {
  it('forces the music mode layout', () => {
    const spec = withBothSidebarsShown(createLayoutSpecFixture({ topBarPlacement: 'outside' }));
    const music = cloneLayoutSpec(spec, { mode: 'musicMode' });

    expect(music.leadingSidebar.visibleTab).toBeUndefined();
    expect(music.trailingSidebar.visibleTab).toBeUndefined();
    expect(music.trailingSidebar.lastVisibleTab).toBe('playlist');
    expect(music.topBarPlacement).toBe('inside');
    expect(music.bottomBarPlacement).toBe('outside');
    expect(music.enableOSC).toBe(false);
    expect(music.oscPosition).toBe('bottom');
  });

  it('leaves other modes as given', () => {
    const spec = createLayoutSpecFixture({ bottomBarPlacement: 'outside' });
    expect(spec.bottomBarPlacement).toBe('outside');
    expect(spec.enableOSC).toBe(true);
  });
});

describe('defaultLayoutSpec', () => {
  it('starts windowed with hidden sidebars and no OSC', () => {
    const spec = defaultLayoutSpec(createLayoutPreferences({ leadingSidebarPlacement: 'outside' }));
    expect(spec.mode).toBe('windowed');
    expect(spec.enableOSC).toBe(false);
    expect(spec.oscPosition).toBe('floating');
    expect(spec.leadingSidebar.placement).toBe('outside');
    expect(spec.leadingSidebar.tabGroups).toEqual(['settings']);
    expect(spec.leadingSidebar.visibleTab).toBeUndefined();
  });
});

describe('tabGroupsFromPreferences', () => {
  it('puts both groups in one sidebar', () => {
    const prefs = createLayoutPreferences({ settingsTabGroupLocation: 'trailingSidebar' });
    expect(tabGroupsFromPreferences('trailingSidebar', prefs)).toEqual(['playlist', 'settings']);
    expect(tabGroupsFromPreferences('leadingSidebar', prefs)).toEqual([]);
  });
});

describe('layoutSpecFromPreferences', () => {
  it('keeps sidebar visibility from the old spec', () => {
    const old = withBothSidebarsShown(createLayoutSpecFixture());
    const spec = layoutSpecFromPreferences(createLayoutPreferences({ bottomBarPlacement: 'outside' }), {
      fillingInFrom: old,
    });
    expect(spec.trailingSidebar.visibleTab).toBe('playlist');
    expect(spec.leadingSidebar.visibleTab).toBe('video');
    expect(spec.bottomBarPlacement).toBe('outside');
  });

  it('picks the legacy style preference for the mode', () => {
    const prefs = createLayoutPreferences({ useLegacyFullScreen: true, useLegacyWindowedMode: false });
    const old = createLayoutSpecFixture();
    expect(layoutSpecFromPreferences(prefs, { fillingInFrom: old, mode: 'fullScreen' }).isLegacyStyle).toBe(true);
    expect(layoutSpecFromPreferences(prefs, { fillingInFrom: old }).isLegacyStyle).toBe(false);
    expect(
      layoutSpecFromPreferences(prefs, { fillingInFrom: old, mode: 'fullScreen', isLegacyStyle: false })
        .isLegacyStyle
    ).toBe(false);
  });
});

describe('hasSamePrefsValues', () => {
  it('ignores per-window state', () => {
    const spec = createLayoutSpecFixture();
    expect(hasSamePrefsValues(spec, withBothSidebarsShown(spec))).toBe(true);
  });

  it('detects drift from preferences', () => {
    const spec = createLayoutSpecFixture();
    expect(hasSamePrefsValues(spec, cloneLayoutSpec(spec, { oscPosition: 'top' }))).toBe(false);
    expect(
      hasSamePrefsValues(spec, createLayoutSpecFixture({ settingsTabGroupLocation: 'trailingSidebar' }))
    ).toBe(false);
  });
});

describe('isHideSidebarNeeded', () => {
  // Leading settings sidebar is 360 wide, trailing playlist 270
  const spec = withBothSidebarsShown(createLayoutSpecFixture());

  it('keeps both sidebars when they fit', () => {
    expect(isHideSidebarNeeded(spec, 900, 270)).toEqual([]);
  });

  it('hides the wider sidebar first', () => {
    expect(isHideSidebarNeeded(spec, 800, 270)).toEqual(['leadingSidebar']);
  });

  it('hides both when neither fits', () => {
    expect(isHideSidebarNeeded(spec, 400, 270)).toEqual(['leadingSidebar', 'trailingSidebar']);
  });

  it('ignores outside sidebars', () => {
    const outside = withBothSidebarsShown(
      createLayoutSpecFixture({ leadingSidebarPlacement: 'outside', trailingSidebarPlacement: 'outside' })
    );
    expect(isHideSidebarNeeded(outside, 300, 270)).toEqual([]);
  });

  it('applies the result to the layout spec', () => {
    const hidden = withSidebarsHidden(spec, ['leadingSidebar']);
    expect(hidden.leadingSidebar.visibleTab).toBeUndefined();
    expect(hidden.trailingSidebar.visibleTab).toBe('playlist');
    expect(withSidebarsHidden(spec, [])).toBe(spec);
  });
});
