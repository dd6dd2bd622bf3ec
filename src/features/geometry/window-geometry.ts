import type {
  BoxQuad,
  Rect,
  ScreenFitOption,
  ScreenInfo,
  Size,
  WindowMode,
} from '@/types/geometry';
import { createLogger } from '@/lib/logger';
import { MIN_SPACE_BETWEEN_INSIDE_SIDEBARS } from './constants';
import type { ExternalGeometry } from './external-geometry';
import {
  BOX_QUAD_ZERO,
  boxQuadsEqual,
  formatBoxQuad,
  mapBoxQuad,
  mergeBoxQuad,
  totalHeight,
  totalWidth,
} from './utils/box-quad';
import {
  aspectOf,
  centeredRect,
  constrainRect,
  formatRect,
  fullScreenWindowFrame,
  getContainerFrame,
  isFullScreenFit,
  rectsEqual,
  sizesEqual,
} from './utils/rect-utils';
import { computeBestViewportMargins } from './utils/viewport-margins';
import {
  computeMinVideoSize,
  fitVideoToContainer,
  minVideoHeight,
  minVideoWidth,
} from './utils/video-fit';

const log = createLogger('WindowGeometry');

/** Used when a geometry is built with a missing or nonsensical aspect ratio */
export const DEFAULT_VIDEO_ASPECT = 16 / 9;

export interface WindowGeometryInit {
  windowFrame: Rect;
  screen: ScreenInfo;
  fitOption: ScreenFitOption;
  mode: WindowMode;
  videoAspect: number;
  /** Black space above the top bar, covering the camera housing in legacy full screen */
  topMarginHeight?: number;
  outsideBars?: Partial<BoxQuad>;
  insideBars?: Partial<BoxQuad>;
  /** Overrides the computed placement of the video inside the viewport */
  viewportMargins?: BoxQuad;
}

/** Copy-with-overrides input. Bar quads are merged side by side. */
export interface WindowGeometryChanges {
  windowFrame?: Rect;
  screen?: ScreenInfo;
  fitOption?: ScreenFitOption;
  mode?: WindowMode;
  videoAspect?: number;
  topMarginHeight?: number;
  outsideBars?: Partial<BoxQuad>;
  insideBars?: Partial<BoxQuad>;
  viewportMargins?: BoxQuad;
}

/**
 * Inputs normally read from preferences. Passed explicitly so every
 * operation stays a pure function of its arguments.
 */
export interface ScaleOptions {
  screen?: ScreenInfo;
  fitOption?: ScreenFitOption;
  mode?: WindowMode;
  /** Shrink the viewport to the video so no black bars show. Always on in music mode. */
  lockViewportToVideoSize?: boolean;
  /** Move the window back inside its container after a resize. Default true. */
  moveToKeepInContainer?: boolean;
}

export interface ResizedBars {
  outside?: Partial<BoxQuad>;
  inside?: Partial<BoxQuad>;
  fitOption?: ScreenFitOption;
  videoAspect?: number;
}

export interface FullScreenGeometryInit {
  screen: ScreenInfo;
  legacy: boolean;
  mode: WindowMode;
  videoAspect: number;
  outsideBars?: Partial<BoxQuad>;
  insideBars?: Partial<BoxQuad>;
  allowVideoToOverlapCameraHousing?: boolean;
}

export interface ViewportFrameInit {
  viewportFrame: Rect;
  screen: ScreenInfo;
  fitOption: ScreenFitOption;
  mode: WindowMode;
  videoAspect: number;
  topMarginHeight?: number;
  outsideBars?: Partial<BoxQuad>;
  insideBars?: Partial<BoxQuad>;
}

export function isViewportLocked(mode: WindowMode, lockPreference: boolean | undefined): boolean {
  return (lockPreference ?? false) || mode === 'musicMode';
}

/** Centering is one-shot: once applied, later resizes only keep the window on screen */
function carryOverFitOption(fitOption: ScreenFitOption): ScreenFitOption {
  return fitOption === 'centerInVisibleScreen' ? 'keepInVisibleScreen' : fitOption;
}

function shouldMoveToKeepInContainer(fitOption: ScreenFitOption, moveOnResize: boolean | undefined): boolean {
  switch (fitOption) {
    case 'legacyFullScreen':
    case 'nativeFullScreen':
      return true;
    case 'keepInVisibleScreen':
    case 'centerInVisibleScreen':
      return moveOnResize ?? true;
    case 'noConstraints':
      return false;
  }
}

function sanitizeBars(bars: BoxQuad, label: string): BoxQuad {
  return mapBoxQuad(bars, (value, side) => {
    if (Number.isFinite(value) && value >= 0) return value;
    log.warn(`Clamping invalid ${label} ${side} bar size to 0`, { value });
    return 0;
  });
}

/**
 * Immutable description of a player window's layout:
 *
 * 1. The size & position of the window (`windowFrame`).
 * 2. The size of each of the four bars placed outside the viewport. Their sum,
 *    plus `topMarginHeight`, is subtracted from the window to give the viewport.
 * 3. The size of each of the four bars placed inside (overlapping) the viewport.
 * 4. The video aspect ratio and the derived video size, which fits inside the
 *    viewport and equals it when the viewport is locked to the video.
 *
 * Every operation returns a new instance; nothing is mutated.
 */
export class WindowGeometry {
  readonly windowFrame: Rect;
  readonly screen: ScreenInfo;
  readonly fitOption: ScreenFitOption;
  readonly mode: WindowMode;
  readonly topMarginHeight: number;
  readonly outsideBars: BoxQuad;
  readonly insideBars: BoxQuad;
  readonly videoAspect: number;
  readonly videoSize: Size;
  readonly viewportMargins: BoxQuad;

  private constructor(init: WindowGeometryInit) {
    this.windowFrame = { ...init.windowFrame };
    this.screen = init.screen;
    this.fitOption = init.fitOption;
    this.mode = init.mode;

    const topMargin = init.topMarginHeight ?? 0;
    if (!(topMargin >= 0)) {
      log.warn('Clamping invalid top margin to 0', { topMargin });
    }
    this.topMarginHeight = topMargin >= 0 ? topMargin : 0;
    this.outsideBars = sanitizeBars(mergeBoxQuad(BOX_QUAD_ZERO, init.outsideBars), 'outside');
    this.insideBars = sanitizeBars(mergeBoxQuad(BOX_QUAD_ZERO, init.insideBars), 'inside');

    if (Number.isFinite(init.videoAspect) && init.videoAspect > 0) {
      this.videoAspect = init.videoAspect;
    } else {
      log.warn('Invalid video aspect ratio, using default', { videoAspect: init.videoAspect });
      this.videoAspect = DEFAULT_VIDEO_ASPECT;
    }

    const viewportSize = this.viewportSize;
    this.videoSize = fitVideoToContainer(this.videoAspect, viewportSize);
    this.viewportMargins =
      init.viewportMargins ??
      computeBestViewportMargins(viewportSize, this.videoSize, this.insideBars, this.mode);
  }

  // ==========================================================================
  // Factories
  // ==========================================================================

  static create(init: WindowGeometryInit): WindowGeometry {
    return new WindowGeometry(init);
  }

  /** Builds the window frame around a known viewport frame */
  static fromViewportFrame(init: ViewportFrameInit): WindowGeometry {
    const outside = mergeBoxQuad(BOX_QUAD_ZERO, init.outsideBars);
    const topMargin = init.topMarginHeight ?? 0;
    const windowFrame: Rect = {
      x: init.viewportFrame.x - outside.leading,
      y: init.viewportFrame.y - outside.bottom,
      width: init.viewportFrame.width + totalWidth(outside),
      height: init.viewportFrame.height + totalHeight(outside) + topMargin,
    };
    return new WindowGeometry({
      windowFrame,
      screen: init.screen,
      fitOption: init.fitOption,
      mode: init.mode,
      videoAspect: init.videoAspect,
      topMarginHeight: topMargin,
      outsideBars: outside,
      insideBars: init.insideBars,
    });
  }

  /**
   * Geometry of a window filling the screen. Legacy full screen covers the
   * whole screen and, unless the video may overlap it, blacks out the camera
   * housing with a top margin. Native full screen sits below the housing.
   */
  static forFullScreen(init: FullScreenGeometryInit): WindowGeometry {
    const { screen, legacy } = init;
    const topMarginHeight =
      legacy && !init.allowVideoToOverlapCameraHousing ? screen.cameraHousingHeight : 0;
    return new WindowGeometry({
      windowFrame: fullScreenWindowFrame(screen, legacy),
      screen,
      fitOption: legacy ? 'legacyFullScreen' : 'nativeFullScreen',
      mode: init.mode,
      videoAspect: init.videoAspect,
      topMarginHeight,
      outsideBars: init.outsideBars,
      insideBars: init.insideBars,
    });
  }

  /**
   * Returns a copy with the given fields replaced. The video size and, unless
   * given, the viewport margins are derived again.
   */
  withChanges(changes: WindowGeometryChanges): WindowGeometry {
    return new WindowGeometry({
      windowFrame: changes.windowFrame ?? this.windowFrame,
      screen: changes.screen ?? this.screen,
      fitOption: changes.fitOption ?? this.fitOption,
      mode: changes.mode ?? this.mode,
      videoAspect: changes.videoAspect ?? this.videoAspect,
      topMarginHeight: changes.topMarginHeight ?? this.topMarginHeight,
      outsideBars: mergeBoxQuad(this.outsideBars, changes.outsideBars),
      insideBars: mergeBoxQuad(this.insideBars, changes.insideBars),
      viewportMargins: changes.viewportMargins,
    });
  }

  // ==========================================================================
  // Derived values
  // ==========================================================================

  /** Outside bars plus the top margin: everything that is window but not viewport */
  get chromeSize(): Size {
    return {
      width: totalWidth(this.outsideBars),
      height: totalHeight(this.outsideBars) + this.topMarginHeight,
    };
  }

  get outsideBarsTotalSize(): Size {
    return { width: totalWidth(this.outsideBars), height: totalHeight(this.outsideBars) };
  }

  /** Also known as the video container size */
  get viewportSize(): Size {
    const chrome = this.chromeSize;
    return {
      width: this.windowFrame.width - chrome.width,
      height: this.windowFrame.height - chrome.height,
    };
  }

  get viewportFrameInScreen(): Rect {
    return {
      x: this.windowFrame.x + this.outsideBars.leading,
      y: this.windowFrame.y + this.outsideBars.bottom,
      ...this.viewportSize,
    };
  }

  get videoFrameInWindow(): Rect {
    return {
      x: this.outsideBars.leading + this.viewportMargins.leading,
      y: this.outsideBars.bottom + this.viewportMargins.bottom,
      ...this.videoSize,
    };
  }

  /** Also accounts for the space needed between inside sidebars */
  minViewportWidth(mode: WindowMode = this.mode): number {
    return Math.max(
      minVideoWidth(mode),
      totalWidth(this.insideBars) + MIN_SPACE_BETWEEN_INSIDE_SIDEBARS
    );
  }

  minViewportHeight(mode: WindowMode = this.mode): number {
    return minVideoHeight(mode);
  }

  minWindowSize(mode: WindowMode = this.mode): Size {
    const chrome = this.chromeSize;
    return {
      width: this.minViewportWidth(mode) + chrome.width,
      height: this.minViewportHeight(mode) + chrome.height,
    };
  }

  /** A geometry is valid when its frame is finite and the outside bars leave a non-empty viewport */
  isValid(): boolean {
    const { x, y, width, height } = this.windowFrame;
    if (![x, y, width, height].every(Number.isFinite)) return false;
    const viewport = this.viewportSize;
    return viewport.width > 0 && viewport.height > 0;
  }

  /**
   * Returns this geometry if valid, otherwise one rebuilt through `scaleViewport`,
   * which restores the minimum viewport around the same center.
   */
  ensureValid(options: ScaleOptions = {}): WindowGeometry {
    if (this.isValid()) return this;
    log.warn(`Rebuilding invalid geometry: ${this.toString()}`);

    const { x, y, width, height } = this.windowFrame;
    let base: WindowGeometry = this;
    if (![x, y, width, height].every(Number.isFinite)) {
      const container = getContainerFrame(this.screen, 'keepInVisibleScreen') ?? this.screen.frame;
      base = this.withChanges({ windowFrame: centeredRect(this.minWindowSize(), container) });
    }
    return base.scaleViewport(undefined, options);
  }

  hasEqual(other: { windowFrame?: Rect; videoSize?: Size }): boolean {
    if (other.windowFrame && !rectsEqual(this.windowFrame, other.windowFrame)) return false;
    if (other.videoSize && !sizesEqual(this.videoSize, other.videoSize)) return false;
    return true;
  }

  equals(other: WindowGeometry): boolean {
    return (
      rectsEqual(this.windowFrame, other.windowFrame, 0.000001) &&
      this.screen.id === other.screen.id &&
      this.fitOption === other.fitOption &&
      this.mode === other.mode &&
      this.topMarginHeight === other.topMarginHeight &&
      this.videoAspect === other.videoAspect &&
      boxQuadsEqual(this.outsideBars, other.outsideBars) &&
      boxQuadsEqual(this.insideBars, other.insideBars) &&
      boxQuadsEqual(this.viewportMargins, other.viewportMargins) &&
      sizesEqual(this.videoSize, other.videoSize, 0.000001)
    );
  }

  // ==========================================================================
  // Scaling
  // ==========================================================================

  /** Largest viewport that fits in a container once outside bars are removed */
  private computeMaxViewportSize(containerSize: Size): Size {
    const chrome = this.chromeSize;
    return {
      width: containerSize.width - chrome.width,
      height: containerSize.height - chrome.height,
    };
  }

  /**
   * Attempts to reach the given window size. The outside bars keep their sizes;
   * only the viewport changes.
   */
  scaleWindow(desiredWindowSize?: Size, options: ScaleOptions = {}): WindowGeometry {
    let desiredViewportSize: Size | undefined;
    if (desiredWindowSize) {
      const chrome = this.chromeSize;
      desiredViewportSize = {
        width: desiredWindowSize.width - chrome.width,
        height: desiredWindowSize.height - chrome.height,
      };
    }
    return this.scaleViewport(desiredViewportSize, options);
  }

  /**
   * Resizes the viewport toward `desiredSize` (default: the current viewport),
   * then grows or shrinks the window around its center:
   *
   * - the viewport is kept at least as large as the minimum video and viewport sizes
   * - if the fit option has a container, the viewport is capped by it
   * - a locked viewport shrinks to the video
   * - sizes and origin are rounded to whole units
   * - the frame is moved back inside the container, and centered if asked
   */
  scaleViewport(desiredSize?: Size, options: ScaleOptions = {}): WindowGeometry {
    const mode = options.mode ?? this.mode;
    const lockViewportToVideoSize = isViewportLocked(mode, options.lockViewportToVideoSize);
    const fitOption = options.fitOption ?? carryOverFitOption(this.fitOption);
    const screen = options.screen ?? this.screen;
    const containerFrame = getContainerFrame(screen, fitOption);
    const maxViewportSize = containerFrame ? this.computeMaxViewportSize(containerFrame) : undefined;

    let viewport = desiredSize ?? this.viewportSize;
    log.debug('scaleViewport start', { viewport, lockViewportToVideoSize, fitOption });

    // Matters most when inside sidebars take up most of the space and the viewport is locked
    const minVideoSize = computeMinVideoSize(this.videoAspect, mode);
    viewport = {
      width: Math.max(minVideoSize.width, viewport.width),
      height: Math.max(minVideoSize.height, viewport.height),
    };

    if (lockViewportToVideoSize) {
      // Cap before deriving the video so the video fits too
      if (maxViewportSize) {
        viewport = {
          width: Math.min(viewport.width, maxViewportSize.width),
          height: Math.min(viewport.height, maxViewportSize.height),
        };
      }
      viewport = fitVideoToContainer(this.videoAspect, viewport);
    }

    viewport = {
      width: Math.max(this.minViewportWidth(mode), viewport.width),
      height: Math.max(this.minViewportHeight(mode), viewport.height),
    };

    if (maxViewportSize) {
      viewport = {
        width: Math.min(viewport.width, maxViewportSize.width),
        height: Math.min(viewport.height, maxViewportSize.height),
      };
    }

    const chrome = this.chromeSize;
    const newWindowSize: Size = {
      width: Math.round(viewport.width + chrome.width),
      height: Math.round(viewport.height + chrome.height),
    };

    // Round to keep the window from drifting over many resizes
    const deltaX = (newWindowSize.width - this.windowFrame.width) / 2;
    const deltaY = (newWindowSize.height - this.windowFrame.height) / 2;
    let newWindowFrame: Rect = {
      x: Math.round(this.windowFrame.x - deltaX),
      y: Math.round(this.windowFrame.y - deltaY),
      ...newWindowSize,
    };

    if (containerFrame && shouldMoveToKeepInContainer(fitOption, options.moveToKeepInContainer)) {
      newWindowFrame = constrainRect(newWindowFrame, containerFrame);
      if (fitOption === 'centerInVisibleScreen') {
        newWindowFrame = centeredRect(newWindowSize, containerFrame);
      }
    }
    log.debug(`scaleViewport → windowFrame ${formatRect(newWindowFrame)}`);

    return this.withChanges({ windowFrame: newWindowFrame, screen, fitOption, mode });
  }

  /**
   * Resizes so the video reaches `desiredVideoSize` (aspect ratio enforced from
   * its width). An unlocked viewport is scaled by the same ratio as the video.
   */
  scaleVideo(desiredVideoSize: Size, options: ScaleOptions = {}): WindowGeometry {
    const mode = options.mode ?? this.mode;
    const lockViewportToVideoSize = isViewportLocked(mode, options.lockViewportToVideoSize);

    let fitOption = options.fitOption ?? carryOverFitOption(this.fitOption);
    if (isFullScreenFit(fitOption)) {
      log.error(`scaleVideo: invalid fit option "${fitOption}", using noConstraints`);
      fitOption = 'noConstraints';
    }
    const screen = options.screen ?? this.screen;
    const containerFrame = getContainerFrame(screen, fitOption);

    const minVideoSize = computeMinVideoSize(this.videoAspect, mode);
    const newWidth = Math.max(minVideoSize.width, desiredVideoSize.width);
    let newVideoSize: Size = { width: newWidth, height: Math.round(newWidth / this.videoAspect) };

    if (containerFrame) {
      if (newVideoSize.width > containerFrame.width) {
        newVideoSize = {
          width: containerFrame.width,
          height: Math.round(containerFrame.width / this.videoAspect),
        };
      }
      if (newVideoSize.height > containerFrame.height) {
        newVideoSize = {
          width: Math.round(containerFrame.height * this.videoAspect),
          height: containerFrame.height,
        };
      }
    }

    let newViewportSize: Size;
    if (lockViewportToVideoSize || this.videoSize.width === 0) {
      newViewportSize = newVideoSize;
    } else {
      const scaleRatio = newVideoSize.width / this.videoSize.width;
      const viewport = this.viewportSize;
      newViewportSize = { width: viewport.width * scaleRatio, height: viewport.height * scaleRatio };
    }

    return this.scaleViewport(newViewportSize, { ...options, fitOption, screen, mode });
  }

  /** Re-applies size limits and the container constraint for the given fit option */
  refit(fitOption?: ScreenFitOption, options: ScaleOptions = {}): WindowGeometry {
    return this.scaleViewport(undefined, { ...options, fitOption: fitOption ?? options.fitOption });
  }

  // ==========================================================================
  // Bars
  // ==========================================================================

  /**
   * Changes outside bar sizes, growing or shrinking the window by each delta.
   * Bottom and leading changes also move the origin so the opposite edge stays put.
   */
  withResizedOutsideBars(bars: Partial<BoxQuad>): WindowGeometry {
    let deltaW = 0;
    let deltaH = 0;
    let deltaX = 0;
    let deltaY = 0;

    if (bars.top !== undefined) {
      deltaH += bars.top - this.outsideBars.top;
    }
    if (bars.trailing !== undefined) {
      deltaW += bars.trailing - this.outsideBars.trailing;
    }
    if (bars.bottom !== undefined) {
      const deltaBottom = bars.bottom - this.outsideBars.bottom;
      deltaH += deltaBottom;
      deltaY -= deltaBottom;
    }
    if (bars.leading !== undefined) {
      const deltaLeading = bars.leading - this.outsideBars.leading;
      deltaW += deltaLeading;
      deltaX -= deltaLeading;
    }

    const windowFrame: Rect = {
      x: this.windowFrame.x + deltaX,
      y: this.windowFrame.y + deltaY,
      width: this.windowFrame.width + deltaW,
      height: this.windowFrame.height + deltaH,
    };
    return this.withChanges({ windowFrame, outsideBars: bars });
  }

  /** Applies inside bars, then outside bars, then refits the result */
  withResizedBars(resized: ResizedBars, options: ScaleOptions = {}): WindowGeometry {
    const withInside = this.withChanges({
      fitOption: resized.fitOption,
      insideBars: resized.inside,
      videoAspect: resized.videoAspect,
    });
    const withOutside = resized.outside ? withInside.withResizedOutsideBars(resized.outside) : withInside;
    return withOutside.scaleViewport(undefined, options);
  }

  // ==========================================================================
  // External geometry & crop
  // ==========================================================================

  /**
   * Places the window per a parsed geometry directive, relative to `screenFrame`
   * (default: the visible frame of this geometry's screen).
   *
   * Width and height are exclusive: whichever is set (width first) is clamped to
   * the minimum video size and the other is derived from the aspect ratio. `+`
   * offsets measure from the bottom/leading edge and `-` offsets from the
   * top/trailing edge, minus the window's own size. Percentage offsets place the
   * window's center. With a size but no offsets the window is centered.
   */
  applyExternalGeometry(
    geometry: ExternalGeometry,
    desiredVideoSize: Size = this.videoSize,
    screenFrame: Rect = this.screen.visibleFrame
  ): WindowGeometry {
    const minVideoSize = computeMinVideoSize(this.videoAspect, 'windowed');
    let videoSize: Size = { ...desiredVideoSize };
    let isSizeSet = false;

    if (geometry.width && geometry.width.value > 0) {
      let width = geometry.width.value;
      if (geometry.width.isPercentage) width = width * 0.01 * screenFrame.width;
      width = Math.max(minVideoSize.width, width);
      videoSize = { width, height: width / this.videoAspect };
      isSizeSet = true;
    } else if (geometry.height && geometry.height.value > 0) {
      let height = geometry.height.value;
      if (geometry.height.isPercentage) height = height * 0.01 * screenFrame.height;
      height = Math.max(minVideoSize.height, height);
      videoSize = { width: height * this.videoAspect, height };
      isSizeSet = true;
    }

    const chrome = this.chromeSize;
    const windowSize: Size = {
      width: videoSize.width + chrome.width,
      height: videoSize.height + chrome.height,
    };

    let x = this.windowFrame.x - screenFrame.x;
    let y = this.windowFrame.y - screenFrame.y;

    if (geometry.x) {
      const offset = geometry.x.isPercentage
        ? geometry.x.value * 0.01 * screenFrame.width - windowSize.width / 2
        : geometry.x.value;
      x = geometry.x.sign === '+' ? offset : screenFrame.width - offset - windowSize.width;
    }
    if (geometry.y) {
      const offset = geometry.y.isPercentage
        ? geometry.y.value * 0.01 * screenFrame.height - windowSize.height / 2
        : geometry.y.value;
      y = geometry.y.sign === '+' ? offset : screenFrame.height - offset - windowSize.height;
    }
    if (!geometry.x && !geometry.y && isSizeSet) {
      x = (screenFrame.width - windowSize.width) / 2;
      y = (screenFrame.height - windowSize.height) / 2;
    }

    const windowFrame: Rect = {
      x: x + screenFrame.x,
      y: y + screenFrame.y,
      ...windowSize,
    };
    log.debug(`applyExternalGeometry → ${formatRect(windowFrame)}`);
    return this.withChanges({ windowFrame });
  }

  /**
   * Crops to `cropbox`, which is given at the scale of `unscaledVideoSize` with
   * its origin at the bottom-left of the video. The window shrinks by the removed
   * margins and takes the crop's aspect ratio.
   */
  cropVideo(unscaledVideoSize: Size, cropbox: Rect): WindowGeometry {
    if (unscaledVideoSize.width <= 0 || cropbox.width <= 0 || cropbox.height <= 0) {
      log.error('Cannot crop video: empty video or cropbox', { unscaledVideoSize, cropbox });
      return this;
    }
    const scale = this.videoSize.width / unscaledVideoSize.width;
    const scaled: Rect = {
      x: cropbox.x * scale,
      y: cropbox.y * scale,
      width: cropbox.width * scale,
      height: cropbox.height * scale,
    };

    if (scaled.x > this.videoSize.width || scaled.y > this.videoSize.height) {
      log.error('Cannot crop video: cropbox lies outside the video', { scaled, videoSize: this.videoSize });
      return this;
    }

    const widthRemoved = this.videoSize.width - scaled.width;
    const heightRemoved = this.videoSize.height - scaled.height;
    const windowFrame: Rect = {
      x: this.windowFrame.x + scaled.x,
      y: this.windowFrame.y + scaled.y,
      width: this.windowFrame.width - widthRemoved,
      height: this.windowFrame.height - heightRemoved,
    };
    log.debug(`Cropped to ${formatRect(windowFrame)}`);
    return this.withChanges({
      windowFrame,
      fitOption: carryOverFitOption(this.fitOption),
      videoAspect: aspectOf(cropbox),
    });
  }

  /**
   * Reverses `cropVideo`: grows the window by the part of `fullVideoSize` outside
   * `cropbox` (scaled by `videoScale`), restores the full aspect ratio, then refits.
   */
  uncropVideo(fullVideoSize: Size, cropbox: Rect, videoScale: number, options: ScaleOptions = {}): WindowGeometry {
    if (fullVideoSize.width <= 0 || fullVideoSize.height <= 0) {
      log.error('Cannot uncrop video: empty video size', { fullVideoSize });
      return this;
    }
    const windowFrame: Rect = {
      x: this.windowFrame.x - cropbox.x * videoScale,
      y: this.windowFrame.y - cropbox.y * videoScale,
      width: this.windowFrame.width + (fullVideoSize.width - cropbox.width) * videoScale,
      height: this.windowFrame.height + (fullVideoSize.height - cropbox.height) * videoScale,
    };
    return this.withChanges({ windowFrame, videoAspect: aspectOf(fullVideoSize) }).refit(undefined, options);
  }

  toString(): string {
    return (
      `WindowGeometry(screen: ${this.screen.id}, mode: ${this.mode}, fit: ${this.fitOption}, ` +
      `topMargin: ${this.topMarginHeight}, outsideBars: ${formatBoxQuad(this.outsideBars)}, ` +
      `insideBars: ${formatBoxQuad(this.insideBars)}, videoAspect: ${this.videoAspect.toFixed(4)}, ` +
      `videoSize: ${this.videoSize.width}x${this.videoSize.height}, windowFrame: ${formatRect(this.windowFrame)})`
    );
  }
}
