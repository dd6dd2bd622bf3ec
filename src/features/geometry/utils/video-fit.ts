import type { Size, WindowMode } from '@/types/geometry';
import { MIN_VIDEO_SIZE, MUSIC_MODE } from '../constants';
import { aspectOf, snap, SIZE_ZERO } from './rect-utils';

/**
 * Largest size with the given aspect ratio that fits in `container`.
 * Results are whole numbers; a side within 1 unit of the container snaps to it.
 */
export function fitVideoToContainer(aspect: number, container: Size): Size {
  if (container.width <= 0 || container.height <= 0 || !(aspect > 0)) {
    return { ...SIZE_ZERO };
  }

  if (aspect < aspectOf(container)) {
    // Video is taller: meet the height
    const width = snap(container.height * aspect, container.width);
    return { width: Math.round(width), height: container.height };
  }

  // Video is wider: meet the width
  const height = snap(container.width / aspect, container.height);
  return { width: container.width, height: Math.round(height) };
}

/** Does not preserve aspect ratio */
export function minVideoWidth(mode: WindowMode): number {
  return mode === 'musicMode' ? MUSIC_MODE.minWindowWidth : MIN_VIDEO_SIZE.width;
}

/** Does not preserve aspect ratio */
export function minVideoHeight(mode: WindowMode): number {
  return mode === 'musicMode' ? 0 : MIN_VIDEO_SIZE.height;
}

/** Smallest video size for the aspect ratio that satisfies both minimum width and height */
export function computeMinVideoSize(aspect: number, mode: WindowMode): Size {
  const minWidth = minVideoWidth(mode);
  const minHeight = minVideoHeight(mode);
  const byWidth = { width: minWidth, height: Math.round(minWidth / aspect) };
  if (byWidth.height >= minHeight) {
    return byWidth;
  }
  return { width: Math.round(minHeight * aspect), height: minHeight };
}
