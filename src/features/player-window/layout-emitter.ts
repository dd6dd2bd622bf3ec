import type { Rect } from '@/types/geometry';
import { createLogger } from '@/lib/logger';
import type { WindowGeometry } from '@/features/geometry/window-geometry';
import type { LayoutSpec } from '@/features/layout/types';

const log = createLogger('LayoutEmitter');

type LayoutChangePayload = { transitionName: string; spec: LayoutSpec; geometry: WindowGeometry };
type WindowSizeAdjustedPayload = { windowFrame: Rect };
type TransitionSkippedPayload = { taskName: string };

export type LayoutEventMap = {
  layoutchange: LayoutChangePayload;
  windowsizeadjusted: WindowSizeAdjustedPayload;
  transitionskipped: TransitionSkippedPayload;
};

export type LayoutEventTypes = keyof LayoutEventMap;

export type CallbackListener<T extends LayoutEventTypes> = (data: {
  detail: LayoutEventMap[T];
}) => void;

type LayoutListeners = {
  [EventType in LayoutEventTypes]: CallbackListener<EventType>[];
};

export class LayoutEmitter {
  private listeners: LayoutListeners = {
    layoutchange: [],
    windowsizeadjusted: [],
    transitionskipped: [],
  };

  addEventListener<Q extends LayoutEventTypes>(name: Q, callback: CallbackListener<Q>): void {
    this.listeners[name].push(callback);
  }

  removeEventListener<Q extends LayoutEventTypes>(name: Q, callback: CallbackListener<Q>): void {
    const callbacks = this.listeners[name];
    const index = callbacks.indexOf(callback);
    if (index >= 0) {
      callbacks.splice(index, 1);
    }
  }

  once<Q extends LayoutEventTypes>(name: Q, callback: CallbackListener<Q>): void {
    const wrapper: CallbackListener<Q> = (data) => {
      this.removeEventListener(name, wrapper);
      callback(data);
    };
    this.addEventListener(name, wrapper);
  }

  hasListeners(name: LayoutEventTypes): boolean {
    return this.listeners[name].length > 0;
  }

  listenerCount(name: LayoutEventTypes): number {
    return this.listeners[name].length;
  }

  removeAllListeners(): void {
    this.listeners.layoutchange = [];
    this.listeners.windowsizeadjusted = [];
    this.listeners.transitionskipped = [];
  }

  dispatchLayoutChange(transitionName: string, spec: LayoutSpec, geometry: WindowGeometry): void {
    this.dispatchEvent('layoutchange', { transitionName, spec, geometry });
  }

  dispatchWindowSizeAdjusted(windowFrame: Rect): void {
    this.dispatchEvent('windowsizeadjusted', { windowFrame });
  }

  dispatchTransitionSkipped(taskName: string): void {
    this.dispatchEvent('transitionskipped', { taskName });
  }

  private dispatchEvent<T extends LayoutEventTypes>(eventName: T, payload: LayoutEventMap[T]): void {
    // Copy so that `once` listeners can remove themselves mid-dispatch
    const callbacks = [...this.listeners[eventName]];
    for (const callback of callbacks) {
      try {
        callback({ detail: payload });
      } catch (error) {
        log.error(`Error in event listener for ${eventName}:`, error);
      }
    }
  }
}
