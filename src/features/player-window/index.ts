export { PlayerWindowLayoutController } from './player-window-layout-controller';
export type {
  ChangeLayoutOptions,
  PlayerWindowLayoutDeps,
  ShowSidebarOptions,
} from './player-window-layout-controller';
export { LayoutEmitter } from './layout-emitter';
export type { CallbackListener, LayoutEventMap, LayoutEventTypes } from './layout-emitter';
export { createWindowLayoutStore } from './stores/window-layout-store';
export type { WindowLayoutState, WindowLayoutStore, WindowLayoutStoreApi } from './stores/window-layout-store';
export { resizeAfterFileOpen, resizeMinimallyAfterVideoReconfig, resizeWindowTo } from './utils/resize-strategy';
export type {
  FileOpenResizeInput,
  ResizeAxis,
  ResizePreferences,
  WindowResizeRequest,
  WindowResizeResult,
} from './utils/resize-strategy';
export type {
  ScreenProvider,
  VideoParams,
  VideoParamsContext,
  VideoRenderer,
  ViewStepName,
  WindowFrameResult,
  WindowHost,
} from './types';
