import { describe, expect, it } from 'vitest';
import type { Rect, ScreenInfo } from '@/types/geometry';
import {
  createLayoutEnvironment,
  createLayoutSpecFixture,
  createNotchedScreen,
  createScreen,
} from '@/test/fixtures';
import { MusicModeGeometry } from '@/features/geometry/music-mode-geometry';
import { WindowGeometry } from '@/features/geometry/window-geometry';
import { cloneLayoutSpec } from '@/features/layout/layout-spec';
import { deriveLayoutState, insideBarsOf, outsideBarsOf } from '@/features/layout/layout-state';
import { cloneSidebar } from '@/features/layout/sidebar';
import type { LayoutSpec, LayoutState } from '@/features/layout/types';
import { buildLayoutTransition } from './transition-planner';
import type { LayoutTransition, TransitionContext } from './types';

const ASPECT = 16 / 9;

function createWindowedGeometry(state: LayoutState, windowFrame: Rect, screen: ScreenInfo): WindowGeometry {
  return WindowGeometry.create({
    windowFrame,
    screen,
    fitOption: 'keepInVisibleScreen',
    mode: 'windowed',
    videoAspect: ASPECT,
    outsideBars: outsideBarsOf(state),
    insideBars: insideBarsOf(state),
  });
}

function createContext(
  from: LayoutState,
  overrides: Partial<TransitionContext> & { windowFrame?: Rect } = {}
): TransitionContext {
  const { windowFrame, ...rest } = overrides;
  const screen = rest.screen ?? createScreen();
  return {
    windowedModeGeometry: createWindowedGeometry(
      from,
      windowFrame ?? { x: 100, y: 100, width: 1280, height: 748 },
      screen
    ),
    musicModeGeometry: MusicModeGeometry.createDefault(screen, ASPECT),
    videoAspect: ASPECT,
    screen,
    env: createLayoutEnvironment({ cameraHousingHeight: screen.cameraHousingHeight }),
    durations: { default: 0.25, fullScreen: 0.5 },
    lockViewportToVideoSize: false,
    ...rest,
  };
}

function operationNames(transition: LayoutTransition): string[] {
  return transition.operations.map((operation) => operation.name);
}

function showSidebars(spec: LayoutSpec, leading?: 'video' | 'playlist', trailing?: 'video' | 'playlist'): LayoutSpec {
  return cloneLayoutSpec(spec, {
    leadingSidebar: leading ? cloneSidebar(spec.leadingSidebar, { visibleTab: leading }) : spec.leadingSidebar,
    trailingSidebar: trailing ? cloneSidebar(spec.trailingSidebar, { visibleTab: trailing }) : spec.trailingSidebar,
  });
}

describe('buildLayoutTransition', () => {
  const env = createLayoutEnvironment();

  it('has no operations when nothing changes', () => {
    const spec = createLayoutSpecFixture();
    const from = deriveLayoutState(spec, env);
    const transition = buildLayoutTransition({
      name: 'Noop',
      from,
      to: spec,
      context: createContext(from),
    });

    expect(transition.operations).toEqual([]);
    expect(transition.fromGeometry.equals(transition.toGeometry)).toBe(true);
  });

  it('closes a sidebar and a moving top bar through zero', () => {
    const fromSpec = showSidebars(createLayoutSpecFixture(), 'video');
    const from = deriveLayoutState(fromSpec, env);
    const toSpec = cloneLayoutSpec(fromSpec, {
      leadingSidebar: cloneSidebar(fromSpec.leadingSidebar, { visibleTab: null }),
      topBarPlacement: 'outside',
    });

    const transition = buildLayoutTransition({
      name: 'HideSidebarMoveTopBar',
      from,
      to: toSpec,
      context: createContext(from),
    });

    const middle = transition.middleGeometry;
    expect(middle).toBeDefined();
    expect(middle?.insideBars.leading).toBe(0);
    expect(middle?.outsideBars.leading).toBe(0);
    expect(middle?.insideBars.top).toBe(0);
    expect(middle?.outsideBars.top).toBe(0);
    expect(middle?.insideBars.bottom).toBe(44);

    expect(transition.predicates.isHidingLeadingSidebar).toBe(true);
    expect(transition.predicates.isTopBarPlacementChanging).toBe(true);
    expect(operationNames(transition)).toEqual([
      'preTransition',
      'showFadeableViews',
      'fadeOutOldViews',
      'closeOldPanels',
      'updateHiddenViewsAndConstraints',
      'openNewPanels',
      'fadeInNewViews',
      'postTransition',
    ]);

    const close = transition.operations[3];
    expect(close.timing).toBe('easeIn');
    expect(close.duration).toBe(0.25);
    expect(close.geometry).toBe(middle);
    expect(transition.operations[5].geometry).toBe(transition.toGeometry);
    expect(transition.toGeometry.outsideBars.top).toBe(28);
  });

  it('treats a tab group switch as close and reopen', () => {
    const prefs = { settingsTabGroupLocation: 'trailingSidebar' as const };
    const fromSpec = showSidebars(createLayoutSpecFixture(prefs), undefined, 'playlist');
    const from = deriveLayoutState(fromSpec, env);
    const toSpec = showSidebars(fromSpec, undefined, 'video');

    const transition = buildLayoutTransition({
      name: 'SwitchTabGroup',
      from,
      to: toSpec,
      context: createContext(from),
    });

    expect(transition.predicates.isHidingTrailingSidebar).toBe(true);
    expect(transition.predicates.isShowingTrailingSidebar).toBe(true);
    expect(transition.middleGeometry?.insideBars.trailing).toBe(0);
    expect(transition.toGeometry.insideBars.trailing).toBe(360);
  });

  it('sets the full screen frame in one step when entering native full screen', () => {
    const fromSpec = createLayoutSpecFixture();
    const from = deriveLayoutState(fromSpec, env);
    const transition = buildLayoutTransition({
      name: 'EnterFullScreen',
      from,
      to: cloneLayoutSpec(fromSpec, { mode: 'fullScreen' }),
      context: createContext(from),
    });

    expect(transition.middleGeometry).toBeUndefined();
    expect(operationNames(transition)).toEqual([
      'preTransition',
      'showFadeableViews',
      'fadeOutOldViews',
      'updateHiddenViewsAndConstraints',
      'toggleFullScreenFrame',
      'postTransition',
    ]);
    expect(transition.operations[1].duration).toBe(0);

    const frameStep = transition.operations[4];
    expect(frameStep.duration).toBe(0.5);
    expect(frameStep.timing).toBe('easeInEaseOut');
    expect(frameStep.geometry?.windowFrame).toEqual({ x: 0, y: 0, width: 1920, height: 1080 });
  });

  it('covers the camera housing last when entering legacy full screen', () => {
    const screen = createNotchedScreen();
    const fromSpec = createLayoutSpecFixture();
    const from = deriveLayoutState(fromSpec, env);
    const transition = buildLayoutTransition({
      name: 'EnterLegacyFullScreen',
      from,
      to: cloneLayoutSpec(fromSpec, { mode: 'fullScreen', isLegacyStyle: true }),
      context: createContext(from, { screen, windowFrame: { x: 100, y: 100, width: 960, height: 568 } }),
    });

    expect(transition.toGeometry.topMarginHeight).toBe(32);
    expect(transition.toGeometry.windowFrame).toEqual(screen.frame);

    const names = operationNames(transition);
    expect(names.slice(-3)).toEqual(['toggleFullScreenFrame', 'coverCameraHousing', 'postTransition']);
    expect(names).toContain('pauseVideoRendering');

    const frameStep = transition.operations[names.indexOf('toggleFullScreenFrame')];
    expect(frameStep.geometry?.windowFrame).toEqual({ x: 0, y: 0, width: 1512, height: 950 });
    expect(frameStep.duration).toBeCloseTo(0.4);

    const cover = transition.operations[names.indexOf('coverCameraHousing')];
    expect(cover.geometry).toBe(transition.toGeometry);
    expect(cover.duration).toBeCloseTo(0.1);
  });

  it('pauses rendering around the restyle when the chrome style flips', () => {
    const fromSpec = createLayoutSpecFixture();
    const from = deriveLayoutState(fromSpec, env);
    const transition = buildLayoutTransition({
      name: 'ToggleLegacyStyle',
      from,
      to: cloneLayoutSpec(fromSpec, { isLegacyStyle: true }),
      context: createContext(from),
    });

    const names = operationNames(transition);
    const update = names.indexOf('updateHiddenViewsAndConstraints');
    expect(names[update - 1]).toBe('pauseVideoRendering');
    expect(names[update + 1]).toBe('resumeVideoRendering');
  });

  it('closes every bar and moves the window when entering music mode', () => {
    const fromSpec = createLayoutSpecFixture();
    const from = deriveLayoutState(fromSpec, env);
    const context = createContext(from);
    const transition = buildLayoutTransition({
      name: 'EnterMusicMode',
      from,
      to: cloneLayoutSpec(fromSpec, { mode: 'musicMode' }),
      context,
    });

    const middle = transition.middleGeometry;
    expect(middle?.insideBars).toEqual({ top: 0, trailing: 0, bottom: 0, leading: 0 });
    expect(middle?.outsideBars).toEqual({ top: 0, trailing: 0, bottom: 0, leading: 0 });

    expect(transition.toGeometry.mode).toBe('musicMode');
    expect(transition.toGeometry.outsideBars.bottom).toBe(72);

    const names = operationNames(transition);
    expect(names).toContain('moveWindowForMusicMode');
    expect(transition.operations[names.indexOf('closeOldPanels')].duration).toBeCloseTo(0.075);
  });

  it('has no middle geometry for the initial layout', () => {
    const spec = createLayoutSpecFixture();
    const from = deriveLayoutState(spec, env);
    const transition = buildLayoutTransition({
      name: 'SetInitialLayout',
      from,
      to: spec,
      context: createContext(from),
      isInitialLayout: true,
    });

    expect(transition.middleGeometry).toBeUndefined();
    expect(transition.operations[0].name).toBe('preTransition');
    expect(transition.operations.at(-1)?.name).toBe('postTransition');
  });

  it('restores the intended viewport when an outside bar closes', () => {
    const fromSpec = showSidebars(createLayoutSpecFixture({ trailingSidebarPlacement: 'outside' }), undefined, 'playlist');
    const from = deriveLayoutState(fromSpec, env);
    const toSpec = cloneLayoutSpec(fromSpec, {
      trailingSidebar: cloneSidebar(fromSpec.trailingSidebar, { visibleTab: null }),
    });

    const transition = buildLayoutTransition({
      name: 'HidePlaylist',
      from,
      to: toSpec,
      context: createContext(from, {
        windowFrame: { x: 100, y: 100, width: 1550, height: 720 },
        lockViewportToVideoSize: true,
        intendedViewportSize: { width: 1600, height: 900 },
      }),
    });

    expect(transition.fromGeometry.outsideBars.trailing).toBe(270);
    expect(transition.toGeometry.outsideBars.trailing).toBe(0);
    expect(transition.toGeometry.windowFrame).toEqual({ x: 0, y: 10, width: 1600, height: 900 });
  });
});
