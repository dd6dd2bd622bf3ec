import { describe, expect, it } from 'vitest';
import { createScreen } from '@/test/fixtures';
import { WindowGeometry } from '@/features/geometry/window-geometry';
import { DEFAULT_PREFERENCES } from '@/features/preferences/stores/preferences-store';
import {
  resizeAfterFileOpen,
  resizeMinimallyAfterVideoReconfig,
  resizeWindowTo,
} from './resize-strategy';
import type { ResizePreferences } from './resize-strategy';

function createGeometry(videoAspect = 16 / 9): WindowGeometry {
  return WindowGeometry.create({
    windowFrame: { x: 100, y: 100, width: 1280, height: 720 },
    screen: createScreen(),
    fitOption: 'keepInVisibleScreen',
    mode: 'windowed',
    videoAspect,
  });
}

function resizePrefs(overrides: Partial<ResizePreferences> = {}): ResizePreferences {
  return {
    resizeWindowTiming: DEFAULT_PREFERENCES.resizeWindowTiming,
    resizeWindowScheme: DEFAULT_PREFERENCES.resizeWindowScheme,
    resizeWindowOption: DEFAULT_PREFERENCES.resizeWindowOption,
    lockViewportToVideoSize: DEFAULT_PREFERENCES.lockViewportToVideoSize,
    initialWindowGeometry: DEFAULT_PREFERENCES.initialWindowGeometry,
    moveWindowIntoVisibleScreenOnResize: DEFAULT_PREFERENCES.moveWindowIntoVisibleScreenOnResize,
    ...overrides,
  };
}

describe('resizeWindowTo', () => {
  it('gives an unlocked window the requested size', () => {
    const result = resizeWindowTo({
      current: createGeometry(),
      requestedSize: { width: 1000, height: 600 },
      isLiveResize: false,
      lockViewportToVideoSize: false,
    });

    expect(result.geometry.windowFrame).toEqual({ x: 240, y: 160, width: 1000, height: 600 });
    expect(result.intendedViewportSize).toBeUndefined();
  });

  it('leaves the window where it is when not moving it on screen', () => {
    const current = createGeometry().withChanges({ windowFrame: { x: 1500, y: 100, width: 1280, height: 720 } });
    const request = { current, requestedSize: { width: 1000, height: 600 }, isLiveResize: false, lockViewportToVideoSize: false };

    expect(resizeWindowTo({ ...request, moveToKeepInContainer: false }).geometry.windowFrame).toEqual({
      x: 1640,
      y: 160,
      width: 1000,
      height: 600,
    });
    expect(resizeWindowTo(request).geometry.windowFrame).toEqual({ x: 920, y: 160, width: 1000, height: 600 });
  });

  it('remembers the viewport of a live unlocked resize', () => {
    const result = resizeWindowTo({
      current: createGeometry(),
      requestedSize: { width: 1000, height: 600 },
      isLiveResize: true,
      lockViewportToVideoSize: false,
    });

    expect(result.intendedViewportSize).toEqual({ width: 1000, height: 600 });
  });

  it('keeps the current geometry for requests below the minimum', () => {
    const current = createGeometry();
    const result = resizeWindowTo({
      current,
      requestedSize: { width: 200, height: 100 },
      isLiveResize: false,
      lockViewportToVideoSize: true,
    });

    expect(result.geometry).toBe(current);
  });

  it('takes the width candidate when it fits the request', () => {
    const result = resizeWindowTo({
      current: createGeometry(),
      requestedSize: { width: 960, height: 700 },
      isLiveResize: false,
      lockViewportToVideoSize: true,
    });

    expect(result.geometry.windowFrame.width).toBe(960);
    expect(result.geometry.windowFrame.height).toBe(540);
  });

  it('falls back to the height candidate when the width one is too tall', () => {
    const result = resizeWindowTo({
      current: createGeometry(),
      requestedSize: { width: 1600, height: 720 },
      isLiveResize: false,
      lockViewportToVideoSize: true,
    });

    expect(result.geometry.windowFrame.width).toBe(1280);
    expect(result.geometry.windowFrame.height).toBe(720);
  });

  it('follows the latched axis during a live resize', () => {
    const result = resizeWindowTo({
      current: createGeometry(),
      requestedSize: { width: 960, height: 800 },
      isLiveResize: true,
      lockViewportToVideoSize: true,
      latchedAxis: 'width',
    });

    expect(result.latchedAxis).toBe('width');
    expect(result.geometry.windowFrame.width).toBe(960);
    expect(result.geometry.windowFrame.height).toBe(540);
  });

  it('latches nothing while the live size is unchanged', () => {
    const current = createGeometry();
    const result = resizeWindowTo({
      current,
      requestedSize: { width: 1280, height: 720 },
      isLiveResize: true,
      lockViewportToVideoSize: true,
    });

    expect(result.geometry).toBe(current);
    expect(result.latchedAxis).toBeUndefined();
  });
});

describe('resizeAfterFileOpen', () => {
  const base = {
    windowGeometry: createGeometry(),
    videoSize: { width: 640, height: 360 },
    justOpenedFile: true,
    isInitialSizeDone: false,
  };

  it('leaves the window alone when no file was just opened', () => {
    expect(resizeAfterFileOpen({ ...base, justOpenedFile: false, prefs: resizePrefs() })).toBeUndefined();
  });

  it('leaves the window alone when resizing is turned off', () => {
    expect(resizeAfterFileOpen({ ...base, prefs: resizePrefs({ resizeWindowTiming: 'never' }) })).toBeUndefined();
  });

  it('scales to a multiple of the video size, centered on screen', () => {
    const geometry = resizeAfterFileOpen({ ...base, prefs: resizePrefs({ resizeWindowOption: 'videoSize15' }) });

    expect(geometry?.windowFrame).toEqual({ x: 480, y: 257.5, width: 960, height: 540 });
  });

  it('fills the visible screen for fitScreen', () => {
    const geometry = resizeAfterFileOpen({ ...base, prefs: resizePrefs({ resizeWindowOption: 'fitScreen' }) });

    expect(geometry?.windowFrame.width).toBe(1876);
    expect(geometry?.windowFrame.height).toBe(1055);
  });

  it('places the window per the external geometry', () => {
    const geometry = resizeAfterFileOpen({
      ...base,
      prefs: resizePrefs({ resizeWindowScheme: 'externalGeometry', initialWindowGeometry: '800+10+20' }),
    });

    expect(geometry?.windowFrame.x).toBe(10);
    expect(geometry?.windowFrame.y).toBe(20);
    expect(geometry?.windowFrame.width).toBe(800);
    expect(geometry?.windowFrame.height).toBeCloseTo(450);
  });

  it('does nothing for an empty external geometry', () => {
    const geometry = resizeAfterFileOpen({
      ...base,
      prefs: resizePrefs({ resizeWindowScheme: 'externalGeometry', initialWindowGeometry: '' }),
    });

    expect(geometry).toBeUndefined();
  });
});

describe('resizeMinimallyAfterVideoReconfig', () => {
  it('grows the height to fit a taller video in a locked viewport', () => {
    const geometry = resizeMinimallyAfterVideoReconfig(createGeometry(4 / 3), { width: 640, height: 480 }, {
      lockViewportToVideoSize: true,
    });

    expect(geometry.windowFrame.width).toBe(1280);
    expect(geometry.windowFrame.height).toBe(960);
  });

  it('returns to the intended viewport when one is known', () => {
    const geometry = resizeMinimallyAfterVideoReconfig(createGeometry(), { width: 1920, height: 1080 }, {
      lockViewportToVideoSize: true,
      intendedViewportSize: { width: 960, height: 540 },
    });

    expect(geometry.windowFrame.width).toBe(960);
    expect(geometry.windowFrame.height).toBe(540);
  });
});
