import { describe, expect, it } from 'vitest';
import { computeMinVideoSize, fitVideoToContainer } from './video-fit';

describe('fitVideoToContainer', () => {
  it('meets the height when the video is taller than the container', () => {
    expect(fitVideoToContainer(16 / 9, { width: 1280, height: 680 })).toEqual({ width: 1209, height: 680 });
  });

  it('meets the width when the video is wider than the container', () => {
    expect(fitVideoToContainer(2.39, { width: 1000, height: 1000 })).toEqual({ width: 1000, height: 418 });
  });

  it('snaps to the container side when within one unit', () => {
    // 563 * 16/9 = 1000.9
    expect(fitVideoToContainer(16 / 9, { width: 1001, height: 563 })).toEqual({ width: 1001, height: 563 });
  });

  it('returns zero for an empty container', () => {
    expect(fitVideoToContainer(16 / 9, { width: 0, height: 720 })).toEqual({ width: 0, height: 0 });
    expect(fitVideoToContainer(16 / 9, { width: 1280, height: -5 })).toEqual({ width: 0, height: 0 });
  });

  it('always fits inside the container and keeps the aspect ratio within a unit', () => {
    const aspects = [0.5, 1, 4 / 3, 1.85, 16 / 9, 2.39, 3];
    const containers = [
      { width: 285, height: 120 },
      { width: 640, height: 480 },
      { width: 1280, height: 720 },
      { width: 999, height: 1001 },
      { width: 3840, height: 1600 },
    ];
    for (const aspect of aspects) {
      for (const container of containers) {
        const size = fitVideoToContainer(aspect, container);
        expect(size.width).toBeLessThanOrEqual(container.width);
        expect(size.height).toBeLessThanOrEqual(container.height);
        expect(Math.abs(size.width - size.height * aspect)).toBeLessThanOrEqual(aspect + 1);
        expect(size.width === container.width || size.height === container.height).toBe(true);
      }
    }
  });
});

describe('computeMinVideoSize', () => {
  it('uses the minimum width when the derived height is tall enough', () => {
    expect(computeMinVideoSize(16 / 9, 'windowed')).toEqual({ width: 285, height: 160 });
  });

  it('uses the minimum height for very wide video', () => {
    expect(computeMinVideoSize(4, 'windowed')).toEqual({ width: 480, height: 120 });
  });

  it('uses the music mode minimum width', () => {
    expect(computeMinVideoSize(1, 'musicMode')).toEqual({ width: 260, height: 260 });
  });
});
