import type { Rect, ScreenInfo, Size } from '@/types/geometry';
import { createLogger } from '@/lib/logger';
import { MUSIC_MODE } from './constants';
import { constrainRect, formatRect, getContainerFrame, sizesEqual, rectsEqual } from './utils/rect-utils';
import { WindowGeometry } from './window-geometry';

const log = createLogger('MusicModeGeometry');

export interface MusicModeGeometryInit {
  windowFrame: Rect;
  screen: ScreenInfo;
  /** Height of the playlist when visible, remembered while hidden */
  playlistHeight: number;
  isVideoVisible: boolean;
  isPlaylistVisible: boolean;
  videoAspect: number;
}

export interface MusicModeOptions {
  /** Default true */
  moveToKeepInContainer?: boolean;
  maxWindowWidth?: number;
}

/**
 * The compact music mode window, stacked top to bottom:
 * video (optional, scales with window width), control bar (fixed height),
 * playlist (optional, user-resizable height).
 */
export class MusicModeGeometry {
  readonly windowFrame: Rect;
  readonly screen: ScreenInfo;
  readonly playlistHeight: number;
  readonly isVideoVisible: boolean;
  readonly isPlaylistVisible: boolean;
  readonly videoAspect: number;

  constructor(init: MusicModeGeometryInit) {
    this.windowFrame = { ...init.windowFrame };
    this.screen = init.screen;
    this.isVideoVisible = init.isVideoVisible;
    this.isPlaylistVisible = init.isPlaylistVisible;
    this.videoAspect = init.videoAspect > 0 ? init.videoAspect : 1;

    if (init.isPlaylistVisible) {
      // Playlist takes whatever the video and controls leave
      const videoHeight = init.isVideoVisible ? init.windowFrame.width / this.videoAspect : 0;
      this.playlistHeight = Math.round(init.windowFrame.height - MUSIC_MODE.oscHeight - videoHeight);
    } else {
      this.playlistHeight = Math.max(init.playlistHeight, MUSIC_MODE.minPlaylistHeight);
    }
  }

  /** Default window: video shown, playlist hidden, at the bottom trailing corner of the visible screen */
  static createDefault(screen: ScreenInfo, videoAspect: number): MusicModeGeometry {
    const width = MUSIC_MODE.defaultWindowWidth;
    const aspect = videoAspect > 0 ? videoAspect : 1;
    const height = Math.round(width / aspect) + MUSIC_MODE.oscHeight;
    const visible = screen.visibleFrame;
    return new MusicModeGeometry({
      windowFrame: { x: visible.x + visible.width - width, y: visible.y, width, height },
      screen,
      playlistHeight: MUSIC_MODE.minPlaylistHeight,
      isVideoVisible: true,
      isPlaylistVisible: false,
      videoAspect: aspect,
    }).refit();
  }

  withChanges(changes: Partial<MusicModeGeometryInit>): MusicModeGeometry {
    return new MusicModeGeometry({
      windowFrame: changes.windowFrame ?? this.windowFrame,
      screen: changes.screen ?? this.screen,
      playlistHeight: changes.playlistHeight ?? this.playlistHeight,
      isVideoVisible: changes.isVideoVisible ?? this.isVideoVisible,
      isPlaylistVisible: changes.isPlaylistVisible ?? this.isPlaylistVisible,
      videoAspect: changes.videoAspect ?? this.videoAspect,
    });
  }

  get videoHeightIfVisible(): number {
    const byDivision = Math.round(this.windowFrame.width / this.videoAspect);
    const bySubtraction = this.windowFrame.height - MUSIC_MODE.oscHeight - this.playlistHeight;
    // Align with the other controls when within 1 unit
    if (Math.abs(byDivision - bySubtraction) < 1) {
      return bySubtraction;
    }
    return byDivision;
  }

  get videoHeight(): number {
    return this.isVideoVisible ? this.videoHeightIfVisible : 0;
  }

  get videoSize(): Size | undefined {
    if (!this.isVideoVisible) return undefined;
    return { width: this.windowFrame.width, height: this.videoHeightIfVisible };
  }

  get bottomBarHeight(): number {
    return this.windowFrame.height - this.videoHeight;
  }

  hasEqual(other: { windowFrame?: Rect; videoSize?: Size }): boolean {
    if (other.windowFrame && !rectsEqual(this.windowFrame, other.windowFrame)) return false;
    if (other.videoSize && !sizesEqual(this.videoSize, other.videoSize)) return false;
    return true;
  }

  /** Everything below the video becomes one outside bottom bar */
  toWindowGeometry(): WindowGeometry {
    const outsideBottom = MUSIC_MODE.oscHeight + (this.isPlaylistVisible ? this.playlistHeight : 0);
    return WindowGeometry.create({
      windowFrame: this.windowFrame,
      screen: this.screen,
      fitOption: 'keepInVisibleScreen',
      mode: 'musicMode',
      videoAspect: this.videoAspect,
      outsideBars: { bottom: outsideBottom },
    });
  }

  withVideoVisible(visible: boolean): MusicModeGeometry {
    if (visible === this.isVideoVisible) return this;
    const height = visible
      ? this.windowFrame.height + this.videoHeightIfVisible
      : Math.max(MUSIC_MODE.oscHeight, this.windowFrame.height - this.videoHeightIfVisible);
    return this.withChanges({
      windowFrame: { ...this.windowFrame, height },
      isVideoVisible: visible,
    });
  }

  /** Shows or hides the playlist, keeping the window's top edge in place */
  withPlaylistVisible(visible: boolean): MusicModeGeometry {
    const delta = visible ? this.playlistHeight : -this.playlistHeight;
    if (visible === this.isPlaylistVisible) return this;
    return this.withChanges({
      windowFrame: {
        ...this.windowFrame,
        y: this.windowFrame.y - delta,
        height: this.windowFrame.height + delta,
      },
      isPlaylistVisible: visible,
    });
  }

  /**
   * Clamps width between the music mode minimum and what leaves the control bar
   * on screen, derives the height from the video and playlist, and keeps the
   * window inside the visible screen.
   */
  refit(options: MusicModeOptions = {}): MusicModeGeometry {
    const container = getContainerFrame(this.screen, 'keepInVisibleScreen') ?? this.screen.visibleFrame;
    const minPlaylistHeight = this.isPlaylistVisible ? MUSIC_MODE.minPlaylistHeight : 0;

    let maxWidth: number;
    if (this.isVideoVisible) {
      // Can go negative on a very short screen
      const maxVideoHeight = Math.max(
        container.height - MUSIC_MODE.oscHeight - minPlaylistHeight,
        Math.round(MUSIC_MODE.minWindowWidth / this.videoAspect)
      );
      maxWidth = Math.round(maxVideoHeight * this.videoAspect);
    } else {
      maxWidth = options.maxWindowWidth ?? MUSIC_MODE.maxWindowWidth;
    }
    maxWidth = Math.min(maxWidth, container.width);

    const requested = this.windowFrame;
    let newWidth = requested.width;
    if (requested.width < MUSIC_MODE.minWindowWidth) {
      newWidth = MUSIC_MODE.minWindowWidth;
    } else if (requested.width > maxWidth) {
      newWidth = maxWidth;
    }

    const videoHeight = this.isVideoVisible ? Math.round(newWidth / this.videoAspect) : 0;
    const minWindowHeight = videoHeight + MUSIC_MODE.oscHeight + minPlaylistHeight;
    const maxHeight = this.isPlaylistVisible ? container.height : minWindowHeight;
    const newHeight = Math.min(Math.round(Math.max(requested.height, minWindowHeight)), maxHeight);

    let windowFrame: Rect = { x: requested.x, y: requested.y, width: newWidth, height: newHeight };
    if (options.moveToKeepInContainer ?? true) {
      windowFrame = constrainRect(windowFrame, container);
    }
    log.debug(`Refitted music mode window → ${formatRect(windowFrame)}`);
    return this.withChanges({ windowFrame });
  }

  /**
   * Changes the video width, keeping the window height. The window grows toward
   * the farther screen edge so the edge nearest the screen side stays put.
   * Returns undefined when the video is hidden.
   */
  scaleVideo(desiredSize?: Size, options: MusicModeOptions = {}): MusicModeGeometry | undefined {
    const currentVideoSize = this.videoSize;
    if (!currentVideoSize) {
      log.error('Cannot scale music mode video while it is hidden');
      return undefined;
    }
    const container = getContainerFrame(this.screen, 'keepInVisibleScreen') ?? this.screen.visibleFrame;
    const windowHeight = Math.min(container.height, this.windowFrame.height);

    let videoWidth = (desiredSize ?? currentVideoSize).width;
    videoWidth = Math.max(videoWidth, MUSIC_MODE.minWindowWidth);
    videoWidth = Math.min(videoWidth, options.maxWindowWidth ?? MUSIC_MODE.maxWindowWidth);
    videoWidth = Math.min(videoWidth, container.width);

    let videoHeight = videoWidth / this.videoAspect;
    const minPlaylistHeight = this.isPlaylistVisible ? MUSIC_MODE.minPlaylistHeight : 0;
    const maxVideoHeight = windowHeight - MUSIC_MODE.oscHeight - minPlaylistHeight;
    if (videoHeight > maxVideoHeight) {
      videoHeight = maxVideoHeight;
      videoWidth = videoHeight * this.videoAspect;
    }

    let x = this.windowFrame.x;
    const distanceToLeading = Math.abs(this.windowFrame.x - container.x);
    const distanceToTrailing = Math.abs(
      this.windowFrame.x + this.windowFrame.width - (container.x + container.width)
    );
    if (distanceToTrailing < distanceToLeading) {
      // Keep the trailing edge fixed
      x += this.windowFrame.width - videoWidth;
    }

    let windowFrame: Rect = { x, y: this.windowFrame.y, width: videoWidth, height: windowHeight };
    if (options.moveToKeepInContainer ?? true) {
      windowFrame = constrainRect(windowFrame, container);
    }
    return this.withChanges({ windowFrame });
  }

  toString(): string {
    return (
      `MusicModeGeometry(video: {show: ${this.isVideoVisible}, height: ${this.videoHeight}}, ` +
      `playlist: {show: ${this.isPlaylistVisible}, height: ${this.playlistHeight}}, ` +
      `windowFrame: ${formatRect(this.windowFrame)})`
    );
  }
}
