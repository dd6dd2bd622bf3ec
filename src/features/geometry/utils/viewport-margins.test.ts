import { describe, expect, it } from 'vitest';
import { boxQuad } from './box-quad';
import { computeBestViewportMargins } from './viewport-margins';

const viewport = { width: 1000, height: 600 };

describe('computeBestViewportMargins', () => {
  it('centers the video when no sidebar is in the way', () => {
    const margins = computeBestViewportMargins(viewport, { width: 800, height: 450 }, boxQuad(), 'windowed');
    expect(margins).toEqual({ top: 75, trailing: 100, bottom: 75, leading: 100 });
  });

  it('centers the video when it clears an inside sidebar', () => {
    const margins = computeBestViewportMargins(
      viewport,
      { width: 700, height: 600 },
      boxQuad({ leading: 100 }),
      'windowed'
    );
    expect(margins).toEqual({ top: 0, trailing: 150, bottom: 0, leading: 150 });
  });

  it('moves the video out from under a sidebar when there is room', () => {
    const margins = computeBestViewportMargins(
      viewport,
      { width: 600, height: 600 },
      boxQuad({ leading: 250 }),
      'windowed'
    );
    expect(margins).toEqual({ top: 0, trailing: 150, bottom: 0, leading: 250 });
  });

  it('gives all free width to the only sidebar when space is short', () => {
    const margins = computeBestViewportMargins(
      viewport,
      { width: 800, height: 600 },
      boxQuad({ leading: 250 }),
      'windowed'
    );
    expect(margins).toEqual({ top: 0, trailing: 0, bottom: 0, leading: 200 });
  });

  it('centers between two sidebars when space is short', () => {
    const margins = computeBestViewportMargins(
      viewport,
      { width: 800, height: 600 },
      boxQuad({ leading: 300, trailing: 100 }),
      'windowed'
    );
    // Midpoint between sidebars is 600, so the video would need 200 leading and 0 trailing
    expect(margins).toEqual({ top: 0, trailing: 0, bottom: 0, leading: 200 });
  });

  it('ignores sidebars in full screen', () => {
    const margins = computeBestViewportMargins(
      viewport,
      { width: 800, height: 600 },
      boxQuad({ leading: 300 }),
      'fullScreen'
    );
    expect(margins.leading).toBe(100);
    expect(margins.trailing).toBe(100);
  });

  it('has no margins in music mode or for an empty viewport', () => {
    expect(
      computeBestViewportMargins(viewport, { width: 800, height: 450 }, boxQuad(), 'musicMode')
    ).toEqual(boxQuad());
    expect(
      computeBestViewportMargins({ width: 0, height: 0 }, { width: 0, height: 0 }, boxQuad(), 'windowed')
    ).toEqual(boxQuad());
  });
});
