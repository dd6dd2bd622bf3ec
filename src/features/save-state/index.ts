export { buildSaveStateProperties, parseSavedPlayerState } from './save-state';
export type { SaveStateInput } from './save-state';
export {
  deserializeLayoutSpec,
  deserializeMusicModeGeometry,
  deserializeSize,
  deserializeWindowGeometry,
  serializeLayoutSpec,
  serializeMusicModeGeometry,
  serializeSize,
  serializeWindowGeometry,
  toMusicModeGeometry,
} from './utils/csv-codec';
export { CSV_FORMAT_VERSION, formatValidationErrors } from './schemas/save-state-schema';
export { SAVE_STATE_PROPS } from './types';
export type {
  SavedMusicModeGeometry,
  SavedPlayerState,
  SavedWindowGeometry,
  SaveStateProperties,
} from './types';
