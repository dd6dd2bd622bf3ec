export type {
  BoxQuad,
  BoxSide,
  OSCPosition,
  PanelPlacement,
  Point,
  Rect,
  ScreenFitOption,
  ScreenInfo,
  Size,
  WindowMode,
} from './types/geometry';
export { LogLevel, createLogger, getLogLevel, parseLogLevel, setLogLevel } from './lib/logger';
export * from './features/geometry';
export * from './features/layout';
export * from './features/transitions';
export * from './features/animation';
export * from './features/preferences';
export * from './features/save-state';
export * from './features/player-window';
