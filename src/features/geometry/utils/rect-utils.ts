import type { Rect, ScreenFitOption, ScreenInfo, Size } from '@/types/geometry';
import { createLogger } from '@/lib/logger';
import { GEOMETRY_EPSILON } from '../constants';

const log = createLogger('RectUtils');

export const SIZE_ZERO: Size = Object.freeze({ width: 0, height: 0 });

export function aspectOf(size: Size): number {
  if (size.height === 0) return 0;
  return size.width / size.height;
}

/**
 * Snap `value` to `other` if they are less than 1 unit apart, otherwise round it.
 * Absorbs division imprecision so results stay whole numbers.
 */
export function snap(value: number, other: number): number {
  if (Math.abs(value - other) < 1) return other;
  return Math.round(value);
}

export function sizesEqual(a: Size | undefined, b: Size | undefined, epsilon = GEOMETRY_EPSILON): boolean {
  if (!a || !b) return a === b;
  return Math.abs(a.width - b.width) < epsilon && Math.abs(a.height - b.height) < epsilon;
}

export function rectsEqual(a: Rect | undefined, b: Rect | undefined, epsilon = GEOMETRY_EPSILON): boolean {
  if (!a || !b) return a === b;
  return (
    Math.abs(a.x - b.x) < epsilon &&
    Math.abs(a.y - b.y) < epsilon &&
    sizesEqual(a, b, epsilon)
  );
}

export function maxX(rect: Rect): number {
  return rect.x + rect.width;
}

export function maxY(rect: Rect): number {
  return rect.y + rect.height;
}

export function rectContains(outer: Rect, inner: Rect): boolean {
  return (
    inner.x >= outer.x &&
    inner.y >= outer.y &&
    maxX(inner) <= maxX(outer) &&
    maxY(inner) <= maxY(outer)
  );
}

/** Rect of the given size centered in `container` */
export function centeredRect(size: Size, container: Rect): Rect {
  return {
    x: container.x + (container.width - size.width) / 2,
    y: container.y + (container.height - size.height) / 2,
    width: size.width,
    height: size.height,
  };
}

/**
 * Shrinks `size` to fit inside `bounds` keeping its aspect ratio.
 * A degenerate size returns `bounds` as-is.
 */
export function shrinkToFit(size: Size, bounds: Size): Size {
  if (size.width === 0 || size.height === 0) return { ...bounds };
  const aspect = aspectOf(size);
  if (aspect < aspectOf(bounds)) {
    return { width: bounds.height * aspect, height: bounds.height };
  }
  return { width: bounds.width, height: bounds.width / aspect };
}

/**
 * Moves `rect` so it lies fully inside `container`.
 * The size should already fit; if it doesn't it is shrunk first, keeping its aspect ratio.
 */
export function constrainRect(rect: Rect, container: Rect): Rect {
  let { width, height } = rect;
  if (width > container.width || height > container.height) {
    log.warn('Rect is larger than its container, shrinking', { rect, container });
    ({ width, height } = shrinkToFit(rect, container));
  }

  let { x, y } = rect;
  if (x < container.x) x = container.x;
  if (y < container.y) y = container.y;
  if (x + width > maxX(container)) x = maxX(container) - width;
  if (y + height > maxY(container)) y = maxY(container) - height;
  return { x, y, width, height };
}

export function frameWithoutCameraHousing(screen: ScreenInfo): Rect {
  return { ...screen.frame, height: screen.frame.height - screen.cameraHousingHeight };
}

/** Frame a full screen window occupies */
export function fullScreenWindowFrame(screen: ScreenInfo, legacy: boolean): Rect {
  return legacy ? { ...screen.frame } : frameWithoutCameraHousing(screen);
}

/** Limiting frame inside which a window must fit, or undefined if unconstrained */
export function getContainerFrame(screen: ScreenInfo, fitOption: ScreenFitOption): Rect | undefined {
  switch (fitOption) {
    case 'noConstraints':
      return undefined;
    case 'keepInVisibleScreen':
    case 'centerInVisibleScreen':
      return { ...screen.visibleFrame };
    case 'legacyFullScreen':
      return { ...screen.frame };
    case 'nativeFullScreen':
      return frameWithoutCameraHousing(screen);
  }
}

export function isFullScreenFit(fitOption: ScreenFitOption): boolean {
  return fitOption === 'legacyFullScreen' || fitOption === 'nativeFullScreen';
}

export function formatRect(rect: Rect): string {
  return `(${rect.x}, ${rect.y}, ${rect.width}x${rect.height})`;
}
