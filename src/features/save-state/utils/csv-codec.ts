import type { z } from 'zod';
import type { ScreenInfo, Size } from '@/types/geometry';
import { createLogger } from '@/lib/logger';
import type { WindowGeometry } from '@/features/geometry/window-geometry';
import { MusicModeGeometry } from '@/features/geometry/music-mode-geometry';
import { createLayoutSpec, tabGroupsFromPreferences } from '@/features/layout/layout-spec';
import type { LayoutPreferences } from '@/features/layout/layout-spec';
import { createSidebar } from '@/features/layout/sidebar';
import type { LayoutSpec } from '@/features/layout/types';
import {
  CSV_FORMAT_VERSION,
  formatValidationErrors,
  layoutSpecTokensSchema,
  musicModeGeometryTokensSchema,
  sizeTokensSchema,
  windowGeometryTokensSchema,
} from '../schemas/save-state-schema';
import type { SavedMusicModeGeometry, SavedWindowGeometry } from '../types';

const log = createLogger('SaveStateCodec');

const yn = (value: boolean): string => (value ? 'Y' : 'N');
const f2 = (value: number): string => value.toFixed(2);
const f6 = (value: number): string => value.toFixed(6);

function parseTokens<S extends z.ZodTypeAny>(
  label: string,
  csv: string,
  expectedTokenCount: number,
  schema: S
): z.output<S> | undefined {
  const tokens = csv.split(',').map((token) => token.trim());
  if (tokens.length !== expectedTokenCount) {
    log.error(
      `Failed to parse ${label} from "${csv}": expected ${expectedTokenCount} tokens but found ${tokens.length}`
    );
    return undefined;
  }
  const result = schema.safeParse(tokens);
  if (!result.success) {
    log.error(`Failed to parse ${label} from "${csv}"`, formatValidationErrors(result.error));
    return undefined;
  }
  return result.data;
}

// ============================================================================
// LayoutSpec
// ============================================================================

export function serializeLayoutSpec(spec: LayoutSpec): string {
  return [
    CSV_FORMAT_VERSION,
    spec.leadingSidebar.visibleTab ?? 'nil',
    spec.trailingSidebar.visibleTab ?? 'nil',
    spec.mode,
    yn(spec.isLegacyStyle),
    spec.topBarPlacement,
    spec.trailingSidebar.placement,
    spec.bottomBarPlacement,
    spec.leadingSidebar.placement,
    yn(spec.enableOSC),
    spec.oscPosition,
  ].join(',');
}

/** Tab groups are not stored; they come from the current preferences */
export function deserializeLayoutSpec(csv: string, prefs: LayoutPreferences): LayoutSpec | undefined {
  const tokens = parseTokens('LayoutSpec', csv, 11, layoutSpecTokensSchema);
  if (!tokens) return undefined;

  const [
    ,
    leadingTab,
    trailingTab,
    mode,
    isLegacyStyle,
    topBarPlacement,
    trailingSidebarPlacement,
    bottomBarPlacement,
    leadingSidebarPlacement,
    enableOSC,
    oscPosition,
  ] = tokens;

  return createLayoutSpec({
    leadingSidebar: createSidebar('leadingSidebar', {
      placement: leadingSidebarPlacement,
      tabGroups: tabGroupsFromPreferences('leadingSidebar', prefs),
      visibleTab: leadingTab,
    }),
    trailingSidebar: createSidebar('trailingSidebar', {
      placement: trailingSidebarPlacement,
      tabGroups: tabGroupsFromPreferences('trailingSidebar', prefs),
      visibleTab: trailingTab,
    }),
    mode,
    isLegacyStyle,
    topBarPlacement,
    bottomBarPlacement,
    enableOSC,
    oscPosition,
  });
}

// ============================================================================
// Windowed geometry
// ============================================================================

export function serializeWindowGeometry(geometry: WindowGeometry): string {
  const { windowFrame, outsideBars, videoSize } = geometry;
  return [
    CSV_FORMAT_VERSION,
    f2(videoSize.width),
    f2(videoSize.height),
    f6(geometry.videoAspect),
    f2(outsideBars.top),
    f2(outsideBars.trailing),
    f2(outsideBars.bottom),
    f2(outsideBars.leading),
    f2(windowFrame.x),
    f2(windowFrame.y),
    f2(windowFrame.width),
    f2(windowFrame.height),
  ].join(',');
}

export function deserializeWindowGeometry(csv: string): SavedWindowGeometry | undefined {
  const tokens = parseTokens('WindowGeometry', csv, 12, windowGeometryTokensSchema);
  if (!tokens) return undefined;

  const [, videoWidth, videoHeight, videoAspect, top, trailing, bottom, leading, x, y, width, height] = tokens;
  return {
    windowFrame: { x, y, width, height },
    outsideBars: { top, trailing, bottom, leading },
    videoSize: { width: videoWidth, height: videoHeight },
    videoAspect,
  };
}

// ============================================================================
// Music mode geometry
// ============================================================================

export function serializeMusicModeGeometry(geometry: MusicModeGeometry): string {
  const { windowFrame } = geometry;
  return [
    CSV_FORMAT_VERSION,
    f2(windowFrame.x),
    f2(windowFrame.y),
    f2(windowFrame.width),
    f2(windowFrame.height),
    f2(geometry.playlistHeight),
    yn(geometry.isVideoVisible),
    yn(geometry.isPlaylistVisible),
    f6(geometry.videoAspect),
    encodeURIComponent(geometry.screen.id),
  ].join(',');
}

export function deserializeMusicModeGeometry(csv: string): SavedMusicModeGeometry | undefined {
  const tokens = parseTokens('MusicModeGeometry', csv, 10, musicModeGeometryTokensSchema);
  if (!tokens) return undefined;

  const [, x, y, width, height, playlistHeight, isVideoVisible, isPlaylistVisible, videoAspect, screenId] =
    tokens;
  return {
    windowFrame: { x, y, width, height },
    playlistHeight,
    isVideoVisible,
    isPlaylistVisible,
    videoAspect,
    screenId,
  };
}

export function toMusicModeGeometry(saved: SavedMusicModeGeometry, screen: ScreenInfo): MusicModeGeometry {
  return new MusicModeGeometry({
    windowFrame: saved.windowFrame,
    screen,
    playlistHeight: saved.playlistHeight,
    isVideoVisible: saved.isVideoVisible,
    isPlaylistVisible: saved.isPlaylistVisible,
    videoAspect: saved.videoAspect,
  });
}

// ============================================================================
// Sizes
// ============================================================================

export function serializeSize(size: Size): string {
  return [f2(size.width), f2(size.height)].join(',');
}

export function deserializeSize(csv: string): Size | undefined {
  const tokens = parseTokens('Size', csv, 2, sizeTokensSchema);
  if (!tokens) return undefined;
  const [width, height] = tokens;
  return { width, height };
}
