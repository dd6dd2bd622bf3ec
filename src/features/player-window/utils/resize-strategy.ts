import type { Size } from '@/types/geometry';
import { createLogger } from '@/lib/logger';
import { parseExternalGeometry } from '@/features/geometry/external-geometry';
import { aspectOf } from '@/features/geometry/utils/rect-utils';
import type { WindowGeometry } from '@/features/geometry/window-geometry';
import { RESIZE_WINDOW_RATIOS } from '@/features/preferences/types';
import type { PlayerPreferences } from '@/features/preferences/types';

const log = createLogger('ResizeStrategy');

export type ResizeAxis = 'width' | 'height';

// ============================================================================
// Window resize requests
// ============================================================================

export interface WindowResizeRequest {
  current: WindowGeometry;
  requestedSize: Size;
  /** The user is dragging an edge, as opposed to a tool or the system asking */
  isLiveResize: boolean;
  lockViewportToVideoSize: boolean;
  /** Move the window back inside the visible screen. Default true. */
  moveToKeepInContainer?: boolean;
  latchedAxis?: ResizeAxis;
}

export interface WindowResizeResult {
  geometry: WindowGeometry;
  latchedAxis?: ResizeAxis;
  /** Set when the resize reflects a size the user chose */
  intendedViewportSize?: Size;
}

/**
 * Answers a request to resize a windowed-mode window.
 *
 * With the viewport unlocked the window takes the requested size. With it
 * locked, two candidates are built: one keeping the requested width and one
 * keeping the requested height. A live resize latches onto the first axis the
 * user changes (height wins when both change) and keeps it until the drag ends,
 * so that dragging a corner does not flip between the candidates. Other
 * requests get the width candidate when it fits inside the requested size.
 */
export function resizeWindowTo(request: WindowResizeRequest): WindowResizeResult {
  const { current, requestedSize, isLiveResize } = request;
  const isWindowed = current.mode === 'windowed';

  if (!isLiveResize) {
    const min = current.minWindowSize();
    if (requestedSize.width < min.width || requestedSize.height < min.height) {
      log.debug(`Requested size is below the minimum ${min.width}x${min.height}; keeping current size`);
      return { geometry: current };
    }
  }

  const { moveToKeepInContainer } = request;

  if (!request.lockViewportToVideoSize) {
    const intended = current.scaleWindow(requestedSize, { fitOption: 'noConstraints' });
    return {
      geometry: intended.refit('keepInVisibleScreen', { moveToKeepInContainer }),
      intendedViewportSize: isLiveResize && isWindowed ? intended.viewportSize : undefined,
    };
  }

  const scaleOptions = { lockViewportToVideoSize: true, moveToKeepInContainer };

  const widthDiff = requestedSize.width - current.windowFrame.width;
  const requestedVideoWidth = current.videoSize.width + widthDiff;
  const fromWidth = current.scaleVideo(
    { width: requestedVideoWidth, height: Math.round(requestedVideoWidth / current.videoAspect) },
    scaleOptions
  );

  const heightDiff = requestedSize.height - current.windowFrame.height;
  const requestedVideoHeight = current.videoSize.height + heightDiff;
  const fromHeight = current.scaleVideo(
    { width: Math.round(requestedVideoHeight * current.videoAspect), height: requestedVideoHeight },
    scaleOptions
  );

  if (isLiveResize) {
    let axis = request.latchedAxis;
    if (!axis) {
      if (current.windowFrame.height !== requestedSize.height) {
        axis = 'height';
      } else if (current.windowFrame.width !== requestedSize.width) {
        axis = 'width';
      }
    }
    if (!axis) {
      return { geometry: current };
    }
    const chosen = axis === 'width' ? fromWidth : fromHeight;
    return {
      geometry: chosen,
      latchedAxis: axis,
      intendedViewportSize: isWindowed ? chosen.viewportSize : undefined,
    };
  }

  // Window managers expect both dimensions to be at most what they asked for
  const widthFits =
    fromWidth.windowFrame.width <= requestedSize.width && fromWidth.windowFrame.height <= requestedSize.height;
  return { geometry: widthFits ? fromWidth : fromHeight };
}

// ============================================================================
// New video
// ============================================================================

export type ResizePreferences = Pick<
  PlayerPreferences,
  | 'resizeWindowTiming'
  | 'resizeWindowScheme'
  | 'resizeWindowOption'
  | 'lockViewportToVideoSize'
  | 'initialWindowGeometry'
  | 'moveWindowIntoVisibleScreenOnResize'
>;

export interface FileOpenResizeInput {
  /** Current windowed geometry, already carrying the new aspect ratio */
  windowGeometry: WindowGeometry;
  videoSize: Size;
  justOpenedFile: boolean;
  isInitialSizeDone: boolean;
  intendedViewportSize?: Size;
  prefs: ResizePreferences;
}

/**
 * Geometry for a file that was just opened, per the resize preferences.
 * Undefined when the preferences leave the window size alone.
 */
export function resizeAfterFileOpen(input: FileOpenResizeInput): WindowGeometry | undefined {
  const { windowGeometry, prefs } = input;
  if (!input.justOpenedFile) {
    return undefined;
  }
  if (prefs.resizeWindowTiming === 'never') {
    log.debug('Resize timing is "never"; not resizing');
    return undefined;
  }

  // A new window sized to its video should have no margins around the video
  const lockViewportToVideoSize = input.isInitialSizeDone ? prefs.lockViewportToVideoSize : true;
  const moveToKeepInContainer = prefs.moveWindowIntoVisibleScreenOnResize;

  if (prefs.resizeWindowScheme === 'externalGeometry') {
    const external = parseExternalGeometry(prefs.initialWindowGeometry);
    if (!external) {
      log.debug('No external geometry set; not resizing');
      return undefined;
    }
    let preferred = windowGeometry;
    if (prefs.lockViewportToVideoSize && input.intendedViewportSize) {
      preferred = windowGeometry.scaleViewport(input.intendedViewportSize);
    }
    return windowGeometry.applyExternalGeometry(external, preferred.videoSize);
  }

  if (prefs.resizeWindowOption === 'fitScreen') {
    return windowGeometry.scaleViewport(windowGeometry.screen.visibleFrame, {
      fitOption: 'centerInVisibleScreen',
      lockViewportToVideoSize,
      moveToKeepInContainer,
    });
  }

  const ratio = RESIZE_WINDOW_RATIOS[prefs.resizeWindowOption];
  const desiredVideoSize: Size = {
    width: input.videoSize.width * ratio,
    height: input.videoSize.height * ratio,
  };
  log.debug(`Scaling video by ${ratio} to ${desiredVideoSize.width}x${desiredVideoSize.height}`);
  return windowGeometry.scaleVideo(desiredVideoSize, {
    fitOption: 'centerInVisibleScreen',
    lockViewportToVideoSize,
    moveToKeepInContainer,
  });
}

/**
 * Geometry after the video changed during playback: keep the viewport, or the
 * size the user last chose, growing the height where the new video needs it.
 */
export function resizeMinimallyAfterVideoReconfig(
  windowGeometry: WindowGeometry,
  videoSize: Size,
  options: { lockViewportToVideoSize: boolean; intendedViewportSize?: Size; moveToKeepInContainer?: boolean }
): WindowGeometry {
  let desired = windowGeometry.viewportSize;

  if (options.lockViewportToVideoSize) {
    if (options.intendedViewportSize) {
      desired = options.intendedViewportSize;
    }
    const minHeight = Math.round(desired.width / aspectOf(videoSize));
    if (desired.height < minHeight) {
      desired = { width: desired.width, height: minHeight };
    }
  }

  return windowGeometry.scaleViewport(desired, {
    lockViewportToVideoSize: options.lockViewportToVideoSize,
    moveToKeepInContainer: options.moveToKeepInContainer,
  });
}
