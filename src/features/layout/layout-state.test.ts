import { describe, expect, it } from 'vitest';
import {
  createLayoutEnvironment,
  createLayoutSpecFixture,
  createNotchedScreen,
} from '@/test/fixtures';
import { cloneLayoutSpec } from './layout-spec';
import {
  buildFullScreenGeometry,
  deriveLayoutState,
  hasPermanentOSC,
  insideBarsOf,
  outsideBarsOf,
} from './layout-state';
import { cloneSidebar } from './sidebar';

describe('deriveLayoutState', () => {
  const env = createLayoutEnvironment();

  it('fades the native title bar with the top bar when it is inside', () => {
    const state = deriveLayoutState(createLayoutSpecFixture(), env);

    expect(state.titleBar).toBe('showFadeableTopBar');
    expect(state.trafficLightButtons).toBe('showFadeableTopBar');
    expect(state.leadingSidebarToggleButton).toBe('showFadeableTopBar');
    expect(state.titleBarHeight).toBe(28);
    expect(state.topBarHeight).toBe(28);
    expect(state.osdMinOffsetFromTop).toBe(36);
    expect(state.bottomBarView).toBe('showFadeableNonTopBar');
    expect(state.bottomBarHeight).toBe(44);
    expect(state.sidebarDownshift).toBe(28);
    expect(state.sidebarTabHeight).toBe(48);
  });

  it('shares the top bar between a reduced title bar and the OSC', () => {
    const state = deriveLayoutState(createLayoutSpecFixture({ oscPosition: 'top' }), env);

    expect(state.titleBarHeight).toBe(16);
    expect(state.topOSCHeight).toBe(44);
    expect(state.topBarHeight).toBe(60);
    expect(state.bottomBarHeight).toBe(0);
    expect(state.sidebarDownshift).toBe(16);
    expect(state.sidebarTabHeight).toBe(44);
  });

  it('keeps the default tab height when the top OSC is out of range', () => {
    const tall = createLayoutEnvironment({ oscBarHeight: 80 });
    const state = deriveLayoutState(createLayoutSpecFixture({ oscPosition: 'top' }), tall);
    expect(state.sidebarTabHeight).toBe(48);
  });

  it('shows no title bar in legacy windowed mode', () => {
    const spec = createLayoutSpecFixture({ useLegacyWindowedMode: true, topBarPlacement: 'outside' });
    const state = deriveLayoutState(spec, env);

    expect(state.titleBar).toBe('hidden');
    expect(state.trafficLightButtons).toBe('hidden');
    expect(state.leadingSidebarToggleButton).toBe('hidden');
    expect(state.topBarView).toBe('showAlways');
    expect(state.titleBarHeight).toBe(0);
    expect(state.osdMinOffsetFromTop).toBe(0);
  });

  it('offsets legacy full screen by the camera housing', () => {
    const spec = cloneLayoutSpec(createLayoutSpecFixture(), { mode: 'fullScreen', isLegacyStyle: true });
    const state = deriveLayoutState(spec, createLayoutEnvironment({ cameraHousingHeight: 32 }));

    expect(state.cameraHousingOffset).toBe(32);
    expect(state.trafficLightButtons).toBe('showAlways');
    expect(state.titleIconAndText).toBe('showAlways');
    expect(state.titleBar).toBe('hidden');
    expect(state.topBarView).toBe('hidden');

    const overlapping = deriveLayoutState(
      spec,
      createLayoutEnvironment({ cameraHousingHeight: 32, allowVideoToOverlapCameraHousing: true })
    );
    expect(overlapping.cameraHousingOffset).toBe(0);
  });

  it('uses the compact layout in music mode', () => {
    const spec = cloneLayoutSpec(createLayoutSpecFixture(), { mode: 'musicMode' });
    const state = deriveLayoutState(spec, env);

    expect(state.bottomBarView).toBe('showAlways');
    expect(state.titleBar).toBe('hidden');
    expect(state.topBarView).toBe('hidden');
    expect(state.sidebarTabHeight).toBe(32);
    expect(state.bottomBarHeight).toBe(0);
  });

  it('shows the pin-to-top button only while on top', () => {
    const spec = createLayoutSpecFixture();
    expect(deriveLayoutState(spec, env).pinToTopButton).toBe('hidden');

    const onTop = createLayoutEnvironment({ isOnTop: true });
    expect(deriveLayoutState(spec, onTop).pinToTopButton).toBe('showFadeableNonTopBar');
    expect(
      deriveLayoutState(createLayoutSpecFixture({ topBarPlacement: 'outside' }), onTop).pinToTopButton
    ).toBe('showAlways');
    expect(
      deriveLayoutState(cloneLayoutSpec(spec, { mode: 'fullScreen' }), onTop).pinToTopButton
    ).toBe('hidden');
  });

  it('derives the same state from the same inputs', () => {
    const spec = createLayoutSpecFixture({ oscPosition: 'top' });
    expect(deriveLayoutState(spec, env)).toEqual(deriveLayoutState(spec, env));
  });
});

describe('bar sizes', () => {
  it('splits bars by placement', () => {
    const base = createLayoutSpecFixture({
      topBarPlacement: 'outside',
      bottomBarPlacement: 'outside',
      trailingSidebarPlacement: 'outside',
    });
    const spec = cloneLayoutSpec(base, {
      trailingSidebar: cloneSidebar(base.trailingSidebar, { visibleTab: 'playlist' }),
    });
    const state = deriveLayoutState(spec, createLayoutEnvironment());

    expect(outsideBarsOf(state)).toEqual({ top: 28, trailing: 270, bottom: 44, leading: 0 });
    expect(insideBarsOf(state)).toEqual({ top: 0, trailing: 0, bottom: 0, leading: 0 });
    expect(hasPermanentOSC(state)).toBe(true);
  });

  it('has no permanent OSC when the bars are inside', () => {
    const state = deriveLayoutState(createLayoutSpecFixture(), createLayoutEnvironment());
    expect(hasPermanentOSC(state)).toBe(false);
    expect(insideBarsOf(state)).toEqual({ top: 28, trailing: 0, bottom: 44, leading: 0 });
  });
});

describe('buildFullScreenGeometry', () => {
  it('covers the whole screen in legacy style', () => {
    const screen = createNotchedScreen();
    const spec = cloneLayoutSpec(createLayoutSpecFixture({ enableOSC: false }), {
      mode: 'fullScreen',
      isLegacyStyle: true,
    });
    const geometry = buildFullScreenGeometry(deriveLayoutState(spec, createLayoutEnvironment()), {
      screen,
      videoAspect: 16 / 9,
      allowVideoToOverlapCameraHousing: false,
    });

    expect(geometry.windowFrame).toEqual(screen.frame);
    expect(geometry.topMarginHeight).toBe(32);
    expect(geometry.fitOption).toBe('legacyFullScreen');
  });
});
