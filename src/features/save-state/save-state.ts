import type { Size } from '@/types/geometry';
import { createLogger } from '@/lib/logger';
import type { MusicModeGeometry } from '@/features/geometry/music-mode-geometry';
import type { WindowGeometry } from '@/features/geometry/window-geometry';
import type { LayoutPreferences } from '@/features/layout/layout-spec';
import type { LayoutSpec } from '@/features/layout/types';
import { formatValidationErrors, saveStatePropertiesSchema } from './schemas/save-state-schema';
import {
  deserializeLayoutSpec,
  deserializeMusicModeGeometry,
  deserializeSize,
  deserializeWindowGeometry,
  serializeLayoutSpec,
  serializeMusicModeGeometry,
  serializeSize,
  serializeWindowGeometry,
} from './utils/csv-codec';
import { SAVE_STATE_PROPS } from './types';
import type { SavedPlayerState, SaveStateProperties } from './types';

const log = createLogger('SaveState');

export interface SaveStateInput {
  layoutSpec: LayoutSpec;
  /** The geometry to return to when leaving full screen or music mode */
  windowedModeGeometry: WindowGeometry;
  musicModeGeometry: MusicModeGeometry;
  intendedViewportSize?: Size;
  isOnTop: boolean;
}

export function buildSaveStateProperties(input: SaveStateInput): SaveStateProperties {
  const props: SaveStateProperties = {
    [SAVE_STATE_PROPS.layoutSpec]: serializeLayoutSpec(input.layoutSpec),
    [SAVE_STATE_PROPS.windowGeometry]: serializeWindowGeometry(input.windowedModeGeometry),
    [SAVE_STATE_PROPS.musicModeGeometry]: serializeMusicModeGeometry(input.musicModeGeometry),
  };
  if (input.intendedViewportSize) {
    props[SAVE_STATE_PROPS.intendedViewportSize] = serializeSize(input.intendedViewportSize);
  }
  if (input.isOnTop) {
    props[SAVE_STATE_PROPS.isOnTop] = 'Y';
  }
  return props;
}

/**
 * Reads a stored property bag. Entries that fail to parse are left out and
 * logged; a bag that is not an object of strings gives undefined.
 */
export function parseSavedPlayerState(
  properties: unknown,
  prefs: LayoutPreferences
): SavedPlayerState | undefined {
  const result = saveStatePropertiesSchema.safeParse(properties);
  if (!result.success) {
    log.error('Saved player state is malformed', formatValidationErrors(result.error));
    return undefined;
  }
  const props = result.data;

  return {
    layoutSpec: props.layoutSpec === undefined ? undefined : deserializeLayoutSpec(props.layoutSpec, prefs),
    windowedModeGeometry:
      props.windowGeometry === undefined ? undefined : deserializeWindowGeometry(props.windowGeometry),
    musicModeGeometry:
      props.musicModeGeometry === undefined ? undefined : deserializeMusicModeGeometry(props.musicModeGeometry),
    intendedViewportSize:
      props.intendedViewportSize === undefined ? undefined : deserializeSize(props.intendedViewportSize),
    isOnTop: props.onTop ?? false,
  };
}
