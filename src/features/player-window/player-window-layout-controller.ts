/**
 * Player Window Layout Controller
 *
 * Owns the layout state of one player window and drives every change to it
 * through the animation pipeline.
 *
 * Features:
 * - Initial layout, either from preferences or restored from saved state
 * - Layout transitions: preference changes, full screen, music mode, sidebars
 * - Live and system window resizes, answered synchronously
 * - Window sizing for new videos, video scale, crop and uncrop
 * - Saved state for the next launch
 */

import type { Rect, ScreenInfo, Size } from '@/types/geometry';
import { createLogger } from '@/lib/logger';
import { AnimationPipeline, createTimerDriver } from '@/features/animation/animation-pipeline';
import type { AnimationDriver, AnimationTask } from '@/features/animation/animation-pipeline';
import { TicketCounter } from '@/features/animation/ticket-counter';
import { MusicModeGeometry } from '@/features/geometry/music-mode-geometry';
import { DEFAULT_VIDEO_ASPECT, WindowGeometry } from '@/features/geometry/window-geometry';
import { aspectOf, centeredRect, sizesEqual } from '@/features/geometry/utils/rect-utils';
import {
  cloneLayoutSpec,
  defaultLayoutSpec,
  hasSamePrefsValues,
  isHideSidebarNeeded,
  layoutSpecFromPreferences,
  sidebarAt,
  withSidebarsHidden,
} from '@/features/layout/layout-spec';
import {
  buildFullScreenGeometry,
  deriveLayoutState,
  insideBarsOf,
  outsideBarsOf,
} from '@/features/layout/layout-state';
import { cloneSidebar, defaultTabToShow, tabGroupOf } from '@/features/layout/sidebar';
import type {
  LayoutEnvironment,
  LayoutSpec,
  LayoutState,
  SidebarLocation,
  SidebarTab,
  SidebarTabGroup,
} from '@/features/layout/types';
import { preferencesStore, selectAnimationDurations, selectLayoutPreferences } from '@/features/preferences/stores/preferences-store';
import type { PreferencesStoreApi } from '@/features/preferences/stores/preferences-store';
import type { PlayerPreferences } from '@/features/preferences/types';
import { buildSaveStateProperties, parseSavedPlayerState } from '@/features/save-state/save-state';
import { toMusicModeGeometry } from '@/features/save-state/utils/csv-codec';
import type { SavedPlayerState, SavedWindowGeometry, SaveStateProperties } from '@/features/save-state/types';
import { buildInputGeometry } from '@/features/transitions/geometry-builders';
import { buildLayoutTransition } from '@/features/transitions/transition-planner';
import type { LayoutOperation, LayoutTransition, TransitionContext } from '@/features/transitions/types';
import { LayoutEmitter } from './layout-emitter';
import { createWindowLayoutStore } from './stores/window-layout-store';
import type { WindowLayoutStore, WindowLayoutStoreApi } from './stores/window-layout-store';
import type {
  ScreenProvider,
  VideoParams,
  VideoParamsContext,
  VideoRenderer,
  WindowHost,
} from './types';
import {
  resizeAfterFileOpen,
  resizeMinimallyAfterVideoReconfig,
  resizeWindowTo,
} from './utils/resize-strategy';

const log = createLogger('PlayerWindowLayout');

/** Viewport for a window that has no frame yet */
const DEFAULT_VIEWPORT_SIZE: Size = { width: 1280, height: 720 };

/** Share of the default duration used to resize for a new video */
const VIDEO_RECONFIG_RATIO = 0.5;

/** Preferences that change the layout spec or its environment */
const LAYOUT_PREFERENCE_KEYS = [
  'topBarPlacement',
  'bottomBarPlacement',
  'leadingSidebarPlacement',
  'trailingSidebarPlacement',
  'settingsTabGroupLocation',
  'playlistTabGroupLocation',
  'enableOSC',
  'oscPosition',
  'useLegacyWindowedMode',
  'useLegacyFullScreen',
  'oscBarHeight',
  'playlistWidth',
  'alwaysShowOnTopIcon',
  'showLeadingSidebarToggleButton',
  'showTrailingSidebarToggleButton',
  'allowVideoToOverlapCameraHousing',
] as const satisfies readonly (keyof PlayerPreferences)[];

export interface PlayerWindowLayoutDeps {
  host: WindowHost;
  screens: ScreenProvider;
  renderer: VideoRenderer;
  preferences?: PreferencesStoreApi;
  driver?: AnimationDriver;
  /** Collapse every animation to zero duration. Defaults to the configuration. */
  disableAnimation?: boolean;
  emitter?: LayoutEmitter;
  /** Receives the property bag each time state is saved */
  onSaveState?: (properties: SaveStateProperties) => void;
}

export interface ChangeLayoutOptions {
  totalStartingDuration?: number;
  totalEndingDuration?: number;
}

export interface ShowSidebarOptions {
  /** Hide the sidebar when it already shows the tab. Default true. */
  hideIfAlreadyShown?: boolean;
}

/** Undefined leaves the window as it is */
type GeometryUpdate = WindowGeometry | MusicModeGeometry | undefined;

interface GeometryTaskOptions {
  /** Seconds. Defaults to the default animation duration. */
  duration?: number;
  /** Skipped when a newer supersedable update is queued before it starts. Default true. */
  supersedable?: boolean;
  onApplied?: (geometry: WindowGeometry | MusicModeGeometry) => void;
}

export class PlayerWindowLayoutController {
  readonly emitter: LayoutEmitter;
  readonly store: WindowLayoutStoreApi;

  private readonly host: WindowHost;
  private readonly screens: ScreenProvider;
  private readonly renderer: VideoRenderer;
  private readonly preferences: PreferencesStoreApi;
  private readonly pipeline: AnimationPipeline;
  private readonly onSaveState?: (properties: SaveStateProperties) => void;

  /** Only the latest queued geometry update is applied */
  private readonly geometryTickets = new TicketCounter();
  private readonly cacheTickets = new TicketCounter();
  private readonly unsubscribePreferences: () => void;

  constructor(deps: PlayerWindowLayoutDeps) {
    this.host = deps.host;
    this.screens = deps.screens;
    this.renderer = deps.renderer;
    this.preferences = deps.preferences ?? preferencesStore;
    this.emitter = deps.emitter ?? new LayoutEmitter();
    this.onSaveState = deps.onSaveState;
    this.pipeline = new AnimationPipeline(deps.driver ?? createTimerDriver(), {
      disableAnimation: deps.disableAnimation,
      onTaskSkipped: (task) => this.emitter.dispatchTransitionSkipped(task.name),
    });

    const prefs = this.preferences.getState();
    const screen = this.currentScreen();
    const spec = defaultLayoutSpec(selectLayoutPreferences(prefs));
    const currentLayout = deriveLayoutState(spec, this.buildEnvironment(screen, false));
    this.store = createWindowLayoutStore({
      currentLayout,
      windowedModeGeometry: this.buildWindowGeometryFromCurrentFrame(currentLayout, screen, DEFAULT_VIDEO_ASPECT),
      musicModeGeometry: MusicModeGeometry.createDefault(screen, DEFAULT_VIDEO_ASPECT),
    });

    this.unsubscribePreferences = this.preferences.subscribe((state, prevState) => {
      if (!this.store.getState().isInitialLayoutDone) return;
      if (LAYOUT_PREFERENCE_KEYS.some((key) => state[key] !== prevState[key])) {
        this.updateTitleBarAndOSC();
      }
    });
  }

  get currentLayout(): LayoutState {
    return this.store.getState().currentLayout;
  }

  /** Resolves once every queued layout change has finished */
  whenIdle(): Promise<void> {
    return this.pipeline.whenIdle();
  }

  dispose(): void {
    this.unsubscribePreferences();
    this.emitter.removeAllListeners();
  }

  // ==========================================================================
  // Environment
  // ==========================================================================

  private currentScreen(): ScreenInfo {
    const frame = this.host.getFrame();
    return this.screens.screenFor(frame.status === 'attached' ? frame.frame : undefined);
  }

  private buildEnvironment(screen: ScreenInfo, isOnTop: boolean): LayoutEnvironment {
    const prefs = this.preferences.getState();
    return {
      isOnTop,
      alwaysShowOnTopIcon: prefs.alwaysShowOnTopIcon,
      showLeadingSidebarToggleButton: prefs.showLeadingSidebarToggleButton,
      showTrailingSidebarToggleButton: prefs.showTrailingSidebarToggleButton,
      oscBarHeight: prefs.oscBarHeight,
      playlistWidth: prefs.playlistWidth,
      cameraHousingHeight: screen.cameraHousingHeight,
      allowVideoToOverlapCameraHousing: prefs.allowVideoToOverlapCameraHousing,
    };
  }

  private buildTransitionContext(screen: ScreenInfo = this.currentScreen()): TransitionContext {
    const state = this.store.getState();
    const prefs = this.preferences.getState();
    return {
      windowedModeGeometry: state.windowedModeGeometry,
      musicModeGeometry: state.musicModeGeometry,
      videoAspect: this.videoAspect(),
      screen,
      env: this.buildEnvironment(screen, state.isOnTop),
      durations: selectAnimationDurations(prefs),
      lockViewportToVideoSize: prefs.lockViewportToVideoSize,
      intendedViewportSize: state.intendedViewportSize,
    };
  }

  private videoAspect(): number {
    const { videoParams, windowedModeGeometry } = this.store.getState();
    if (videoParams) {
      const aspect = aspectOf(videoParams.videoSize);
      if (aspect > 0) return aspect;
    }
    return windowedModeGeometry.videoAspect;
  }

  /** Geometry around the live window frame, or a default one centered on screen */
  private buildWindowGeometryFromCurrentFrame(
    layout: LayoutState,
    screen: ScreenInfo,
    videoAspect: number
  ): WindowGeometry {
    const outsideBars = outsideBarsOf(layout);
    const insideBars = insideBarsOf(layout);
    const frame = this.host.getFrame();
    if (frame.status === 'attached') {
      return WindowGeometry.create({
        windowFrame: frame.frame,
        screen,
        fitOption: 'keepInVisibleScreen',
        mode: 'windowed',
        videoAspect,
        outsideBars,
        insideBars,
      });
    }

    log.debug('Window is detached; centering a default window');
    const viewportFrame = centeredRect(DEFAULT_VIEWPORT_SIZE, screen.visibleFrame);
    return WindowGeometry.fromViewportFrame({
      viewportFrame,
      screen,
      fitOption: 'keepInVisibleScreen',
      mode: 'windowed',
      videoAspect,
      outsideBars,
      insideBars,
    }).refit();
  }

  // ==========================================================================
  // Initial layout
  // ==========================================================================

  /**
   * Lays out a new window with zero-duration steps. With saved properties the
   * saved layout and geometries are restored, then corrected if they no longer
   * agree with the preferences or with each other.
   */
  setInitialLayout(savedProperties?: unknown): void {
    const prefs = this.preferences.getState();
    const layoutPrefs = selectLayoutPreferences(prefs);
    const screen = this.currentScreen();
    const saved =
      savedProperties === undefined ? undefined : parseSavedPlayerState(savedProperties, layoutPrefs);

    const store = this.store.getState();
    let initialSpec: LayoutSpec;
    let needsFix = false;
    const isRestoring = saved?.layoutSpec !== undefined;

    if (saved?.layoutSpec) {
      log.info('Restoring initial layout from saved state');
      store.setRestoring(true);
      store.setOnTop(saved.isOnTop);
      store.setIntendedViewportSize(saved.intendedViewportSize);
      initialSpec = saved.layoutSpec;
      needsFix = this.restoreGeometries(saved, initialSpec, screen);
    } else {
      if (saved) {
        log.warn('Saved state has no layout; using preferences');
      }
      initialSpec = layoutSpecFromPreferences(layoutPrefs, {
        mode: 'windowed',
        fillingInFrom: this.currentLayout.spec,
      });
      const windowedLayout = deriveLayoutState(initialSpec, this.buildEnvironment(screen, store.isOnTop));
      store.setWindowedModeGeometry(
        this.buildWindowGeometryFromCurrentFrame(windowedLayout, screen, this.videoAspect())
      );
    }

    const transition = buildLayoutTransition({
      name: isRestoring ? 'RestoreInitialLayout' : 'SetInitialLayout',
      from: this.currentLayout,
      to: initialSpec,
      context: this.buildTransitionContext(screen),
      isInitialLayout: true,
      totalStartingDuration: 0,
      totalEndingDuration: 0,
    });
    this.submitTransition(transition);

    this.pipeline.submitZeroDuration('FinishInitialLayout', () => {
      const state = this.store.getState();
      state.setRestoring(false);
      state.markInitialLayoutDone();
    });

    if (isRestoring) {
      // The saved layout may predate a preference change
      const prefsSpec = layoutSpecFromPreferences(layoutPrefs, { fillingInFrom: initialSpec });
      if (needsFix || !hasSamePrefsValues(initialSpec, prefsSpec)) {
        log.warn('Saved layout does not match preferences or geometry; correcting');
        this.changeLayout('FixInvalidInitialLayout', (current) =>
          layoutSpecFromPreferences(selectLayoutPreferences(this.preferences.getState()), {
            fillingInFrom: current.spec,
          })
        );
      }
    } else if (prefs.fullScreenWhenOpen) {
      this.enterFullScreen();
    }
  }

  /** Returns true when the saved data was inconsistent */
  private restoreGeometries(saved: SavedPlayerState, spec: LayoutSpec, screen: ScreenInfo): boolean {
    const store = this.store.getState();
    let isInconsistent = false;

    const windowedSpec = spec.mode === 'windowed' ? spec : cloneLayoutSpec(spec, { mode: 'windowed' });
    const windowedLayout = deriveLayoutState(windowedSpec, this.buildEnvironment(screen, saved.isOnTop));

    if (saved.windowedModeGeometry) {
      const geometry = this.restoreWindowGeometry(saved.windowedModeGeometry, windowedLayout, screen);
      if (!sizesEqual(geometry.videoSize, saved.windowedModeGeometry.videoSize, 1)) {
        log.warn('Saved video size does not match the saved window frame', {
          saved: saved.windowedModeGeometry.videoSize,
          derived: geometry.videoSize,
        });
        isInconsistent = true;
      }
      store.setWindowedModeGeometry(geometry);
    } else {
      log.warn('No saved windowed geometry; deriving it from the window frame');
      store.setWindowedModeGeometry(
        this.buildWindowGeometryFromCurrentFrame(windowedLayout, screen, this.videoAspect())
      );
    }

    if (saved.musicModeGeometry) {
      const musicScreen = this.screens.screenById(saved.musicModeGeometry.screenId) ?? screen;
      store.setMusicModeGeometry(toMusicModeGeometry(saved.musicModeGeometry, musicScreen).refit());
    } else {
      log.warn('No saved music mode geometry; using the default');
    }

    return isInconsistent;
  }

  private restoreWindowGeometry(saved: SavedWindowGeometry, layout: LayoutState, screen: ScreenInfo): WindowGeometry {
    return WindowGeometry.create({
      windowFrame: saved.windowFrame,
      screen,
      fitOption: 'keepInVisibleScreen',
      mode: 'windowed',
      videoAspect: saved.videoAspect,
      outsideBars: saved.outsideBars,
      insideBars: insideBarsOf(layout),
    }).ensureValid();
  }

  // ==========================================================================
  // Layout changes
  // ==========================================================================

  /**
   * Queues a transition to the layout spec returned by `buildSpec`, which is built
   * when the change reaches the front of the queue, from the layout left by
   * every change queued before it.
   */
  changeLayout(
    name: string,
    buildSpec: (current: LayoutState) => LayoutSpec | undefined,
    options: ChangeLayoutOptions = {}
  ): void {
    this.pipeline.submit(this.buildLayoutChangeTask(name, buildSpec, options));
  }

  /**
   * Picks a layout change once the queue reaches it, so a toggle acts on the
   * layout left by the changes queued before it.
   */
  private chooseLayoutChange(name: string, choose: (current: LayoutState) => AnimationTask | undefined): void {
    this.pipeline.submitZeroDuration(name, () => {
      const task = choose(this.currentLayout);
      if (task) {
        this.pipeline.submitNext(task);
      }
    });
  }

  private buildLayoutChangeTask(
    name: string,
    buildSpec: (current: LayoutState) => LayoutSpec | undefined,
    options: ChangeLayoutOptions = {}
  ): AnimationTask {
    return {
      name: `Build${name}`,
      duration: 0,
      run: () => {
        const current = this.currentLayout;
        const spec = buildSpec(current);
        if (!spec) {
          log.debug(`[${name}] Nothing to change`);
          return;
        }
        const transition = buildLayoutTransition({
          name,
          from: current,
          to: spec,
          context: this.buildTransitionContext(),
          totalStartingDuration: options.totalStartingDuration,
          totalEndingDuration: options.totalEndingDuration,
        });
        this.submitTransition(transition, { next: true });
      },
    };
  }

  /** Re-applies the layout preferences to the current layout */
  updateTitleBarAndOSC(): void {
    this.changeLayout('UpdateTitleBarAndOSC', (current) =>
      layoutSpecFromPreferences(selectLayoutPreferences(this.preferences.getState()), {
        fillingInFrom: current.spec,
      })
    );
  }

  setOnTop(isOnTop: boolean): void {
    this.store.getState().setOnTop(isOnTop);
    this.updateTitleBarAndOSC();
  }

  toggleFullScreen(): void {
    this.chooseLayoutChange('ToggleFullScreen', (current) =>
      current.spec.mode === 'fullScreen'
        ? this.buildLayoutChangeTask('ExitFullScreen', (layout) => this.buildExitFullScreenSpec(layout))
        : this.buildLayoutChangeTask('EnterFullScreen', (layout) => this.buildEnterFullScreenSpec(layout))
    );
  }

  enterFullScreen(): void {
    this.changeLayout('EnterFullScreen', (current) => this.buildEnterFullScreenSpec(current));
  }

  exitFullScreen(): void {
    this.changeLayout('ExitFullScreen', (current) => this.buildExitFullScreenSpec(current));
  }

  private buildEnterFullScreenSpec(current: LayoutState): LayoutSpec | undefined {
    if (current.spec.mode !== 'windowed') {
      log.warn(`Cannot enter full screen from ${current.spec.mode}`);
      return undefined;
    }
    return cloneLayoutSpec(current.spec, {
      mode: 'fullScreen',
      isLegacyStyle: this.preferences.getState().useLegacyFullScreen,
    });
  }

  private buildExitFullScreenSpec(current: LayoutState): LayoutSpec | undefined {
    if (current.spec.mode !== 'fullScreen') return undefined;
    return layoutSpecFromPreferences(selectLayoutPreferences(this.preferences.getState()), {
      mode: 'windowed',
      fillingInFrom: current.spec,
    });
  }

  toggleMusicMode(): void {
    this.chooseLayoutChange('ToggleMusicMode', (current) =>
      current.spec.mode === 'musicMode'
        ? this.buildLayoutChangeTask('ExitMusicMode', (layout) => this.buildExitMusicModeSpec(layout))
        : this.buildLayoutChangeTask('EnterMusicMode', (layout) => this.buildEnterMusicModeSpec(layout))
    );
  }

  enterMusicMode(): void {
    this.changeLayout('EnterMusicMode', (current) => this.buildEnterMusicModeSpec(current));
  }

  exitMusicMode(): void {
    this.changeLayout('ExitMusicMode', (current) => this.buildExitMusicModeSpec(current));
  }

  private buildEnterMusicModeSpec(current: LayoutState): LayoutSpec | undefined {
    if (current.spec.mode !== 'windowed') {
      log.warn(`Cannot enter music mode from ${current.spec.mode}`);
      return undefined;
    }
    return cloneLayoutSpec(current.spec, { mode: 'musicMode' });
  }

  private buildExitMusicModeSpec(current: LayoutState): LayoutSpec | undefined {
    if (current.spec.mode !== 'musicMode') return undefined;
    return layoutSpecFromPreferences(selectLayoutPreferences(this.preferences.getState()), {
      mode: 'windowed',
      fillingInFrom: current.spec,
    });
  }

  setMusicModeVideoVisible(visible: boolean): void {
    this.updateMusicModeGeometry('SetMusicModeVideoVisible', (geometry) => geometry.withVideoVisible(visible));
  }

  setMusicModePlaylistVisible(visible: boolean): void {
    this.updateMusicModeGeometry('SetMusicModePlaylistVisible', (geometry) => geometry.withPlaylistVisible(visible));
  }

  /** Applies the change in music mode, else stores it for the next time music mode opens */
  private updateMusicModeGeometry(name: string, change: (geometry: MusicModeGeometry) => MusicModeGeometry): void {
    this.applyGeometryInPipeline(
      name,
      (state) => {
        const updated = change(state.musicModeGeometry);
        if (state.currentLayout.spec.mode === 'musicMode') return updated;
        state.setMusicModeGeometry(updated);
        return undefined;
      },
      { supersedable: false }
    );
  }

  /**
   * Shows `tab` in the sidebar configured for its tab group. Inside sidebars
   * that no longer leave room for the video are hidden in the same transition.
   */
  showSidebar(tab: SidebarTab, options: ShowSidebarOptions = {}): void {
    const hideIfAlreadyShown = options.hideIfAlreadyShown ?? true;
    const group = tabGroupOf(tab);

    // Another tab group in the same sidebar closes before the new one opens
    this.changeLayout('HideSidebarForTabGroupChange', (current) => {
      if (current.spec.mode === 'musicMode') return undefined;
      const location = this.sidebarLocationOf(current.spec, group);
      if (!location) return undefined;
      const visibleTab = sidebarAt(current.spec, location).visibleTab;
      if (visibleTab === undefined || tabGroupOf(visibleTab) === group) return undefined;
      return this.specWithSidebar(current.spec, location, null);
    });

    this.changeLayout('ShowSidebar', (current) => this.buildShowSidebarSpec(current, tab, hideIfAlreadyShown));
  }

  private buildShowSidebarSpec(
    current: LayoutState,
    tab: SidebarTab,
    hideIfAlreadyShown: boolean
  ): LayoutSpec | undefined {
    const spec = current.spec;
    if (spec.mode === 'musicMode') return undefined;

    const group = tabGroupOf(tab);
    const location = this.sidebarLocationOf(spec, group);
    if (!location) {
      log.warn(`No sidebar is configured for tab group "${group}"`);
      return undefined;
    }

    const sidebar = sidebarAt(spec, location);
    if (sidebar.visibleTab === tab) {
      return hideIfAlreadyShown ? this.specWithSidebar(spec, location, null) : undefined;
    }

    const shown = this.specWithSidebar(spec, location, tab);
    const context = this.buildTransitionContext();
    const viewportWidth = buildInputGeometry(current, context).viewportSize.width;
    const toHide = isHideSidebarNeeded(shown, viewportWidth, context.env.playlistWidth).filter(
      (candidate) => candidate !== location
    );
    return withSidebarsHidden(shown, toHide);
  }

  hideSidebar(location: SidebarLocation): void {
    this.changeLayout('HideSidebar', (current) => {
      if (sidebarAt(current.spec, location).visibleTab === undefined) return undefined;
      return this.specWithSidebar(current.spec, location, null);
    });
  }

  hideSidebars(): void {
    this.changeLayout('HideSidebars', (current) => {
      const visible = (['leadingSidebar', 'trailingSidebar'] as const).filter(
        (location) => sidebarAt(current.spec, location).visibleTab !== undefined
      );
      return visible.length > 0 ? withSidebarsHidden(current.spec, visible) : undefined;
    });
  }

  /** Hides the sidebar, or shows it again on the tab it last showed */
  toggleSidebar(location: SidebarLocation): void {
    this.chooseLayoutChange('ToggleSidebar', (current) => {
      const sidebar = sidebarAt(current.spec, location);
      if (sidebar.visibleTab !== undefined) {
        return this.buildLayoutChangeTask('HideSidebar', (layout) => this.specWithSidebar(layout.spec, location, null));
      }
      const tab = defaultTabToShow(sidebar);
      if (!tab) return undefined;
      return this.buildLayoutChangeTask('ShowSidebar', (layout) => this.buildShowSidebarSpec(layout, tab, false));
    });
  }

  private sidebarLocationOf(spec: LayoutSpec, group: SidebarTabGroup): SidebarLocation | undefined {
    return (['leadingSidebar', 'trailingSidebar'] as const).find((location) =>
      sidebarAt(spec, location).tabGroups.includes(group)
    );
  }

  private specWithSidebar(spec: LayoutSpec, location: SidebarLocation, visibleTab: SidebarTab | null): LayoutSpec {
    const sidebar = cloneSidebar(sidebarAt(spec, location), { visibleTab });
    return cloneLayoutSpec(
      spec,
      location === 'leadingSidebar' ? { leadingSidebar: sidebar } : { trailingSidebar: sidebar }
    );
  }

  // ==========================================================================
  // Running transitions
  // ==========================================================================

  /** With `next`, the operations run before anything already queued */
  private submitTransition(transition: LayoutTransition, options: { next?: boolean } = {}): void {
    if (transition.operations.length === 0) {
      log.debug(`[${transition.name}] No operations`);
      return;
    }
    const tasks: AnimationTask[] = transition.operations.map((operation) => ({
      name: `${transition.name}.${operation.name}`,
      duration: operation.duration,
      timing: operation.timing,
      run: () => this.runOperation(operation, transition),
    }));
    if (options.next) {
      this.pipeline.submitNext(tasks);
    } else {
      this.pipeline.submit(tasks);
    }
  }

  private runOperation(operation: LayoutOperation, transition: LayoutTransition): void {
    switch (operation.name) {
      case 'preTransition':
      case 'showFadeableViews':
      case 'fadeOutOldViews':
      case 'updateHiddenViewsAndConstraints':
      case 'fadeInNewViews':
        this.host.applyViewStep(operation.name, transition);
        return;
      case 'pauseVideoRendering':
        this.renderer.pauseRendering();
        return;
      case 'resumeVideoRendering':
        this.renderer.resumeRendering();
        return;
      case 'toggleFullScreenFrame':
        this.toggleFullScreenFrame(operation, transition);
        return;
      case 'uncoverCameraHousing':
      case 'closeOldPanels':
      case 'moveWindowForMusicMode':
      case 'openNewPanels':
      case 'coverCameraHousing':
        if (operation.geometry) {
          this.applyTransitionGeometry(operation.geometry, true);
        }
        return;
      case 'postTransition':
        this.finishTransition(transition);
        return;
    }
  }

  private toggleFullScreenFrame(operation: LayoutOperation, transition: LayoutTransition): void {
    const { predicates } = transition;
    const fullScreenState = predicates.isEnteringFullScreen ? transition.toState : transition.fromState;
    const isNative = !fullScreenState.spec.isLegacyStyle;
    if (isNative && !transition.isInitialLayout) {
      this.host.setNativeFullScreen(predicates.isEnteringFullScreen);
    }
    if (operation.geometry) {
      // The window system sets the frame of a native full screen window
      this.applyTransitionGeometry(operation.geometry, !isNative || predicates.isExitingFullScreen);
    }
    if (predicates.needsFadeInNewViews) {
      this.host.applyViewStep('fadeInNewViews', transition);
    }
  }

  private applyTransitionGeometry(geometry: WindowGeometry, setFrame: boolean): void {
    if (setFrame) {
      this.host.setFrame(geometry.windowFrame);
    }
    this.host.applyGeometry(geometry);
    this.renderer.applyVideoGeometry(geometry);
  }

  private finishTransition(transition: LayoutTransition): void {
    const store = this.store.getState();
    const { toState, toGeometry } = transition;

    store.setCurrentLayout(toState);
    if (toState.spec.mode === 'windowed') {
      store.setWindowedModeGeometry(toGeometry);
    } else if (toState.spec.mode === 'musicMode') {
      store.setMusicModeGeometry(
        store.musicModeGeometry.withChanges({
          windowFrame: toGeometry.windowFrame,
          videoAspect: toGeometry.videoAspect,
        })
      );
    }

    if (transition.isInitialLayout && !toState.spec.isLegacyStyle && toState.spec.mode === 'fullScreen') {
      this.host.setNativeFullScreen(true);
    }

    this.host.applyViewStep('postTransition', transition);
    log.debug(`[${transition.name}] Done: ${toGeometry.toString()}`);
    this.emitter.dispatchLayoutChange(transition.name, toState.spec, toGeometry);
    this.saveState();
  }

  // ==========================================================================
  // Window resizing
  // ==========================================================================

  /**
   * Answers a resize request from the window system with the geometry the
   * window should take. Runs synchronously and queues nothing.
   */
  handleWindowWillResize(requestedSize: Size): WindowGeometry {
    const state = this.store.getState();
    const layout = state.currentLayout;
    const isLiveResize = this.host.isInLiveResize();
    const frame = this.host.getFrame();
    const prefs = this.preferences.getState();

    if (layout.spec.mode === 'musicMode') {
      const current = frame.status === 'attached'
        ? state.musicModeGeometry.withChanges({ windowFrame: frame.frame })
        : state.musicModeGeometry;
      return current
        .withChanges({ windowFrame: { ...current.windowFrame, ...requestedSize } })
        .refit({ moveToKeepInContainer: !isLiveResize && prefs.moveWindowIntoVisibleScreenOnResize })
        .toWindowGeometry();
    }
    if (layout.spec.mode !== 'windowed') {
      log.error(`Resize requested in ${layout.spec.mode} mode; keeping windowed geometry`);
      return state.windowedModeGeometry;
    }

    const current =
      frame.status === 'attached'
        ? state.windowedModeGeometry.withChanges({ windowFrame: frame.frame })
        : state.windowedModeGeometry;

    if (state.isRestoring) {
      log.debug('Resize requested during restore; keeping restored size');
      return current;
    }

    const result = resizeWindowTo({
      current,
      requestedSize,
      isLiveResize,
      lockViewportToVideoSize: prefs.lockViewportToVideoSize,
      moveToKeepInContainer: prefs.moveWindowIntoVisibleScreenOnResize,
      latchedAxis: state.liveResizeAxis,
    });
    if (isLiveResize && result.latchedAxis !== state.liveResizeAxis) {
      state.setLiveResizeAxis(result.latchedAxis);
    }
    if (result.intendedViewportSize) {
      state.setIntendedViewportSize(result.intendedViewportSize);
    }
    return result.geometry;
  }

  /** Ends a user drag: releases the axis latch and caches the final frame */
  handleLiveResizeEnd(): void {
    this.store.getState().setLiveResizeAxis(undefined);
    this.updateCachedGeometry();
  }

  /** Caches the live window frame for the current mode and saves state */
  updateCachedGeometry(): void {
    const state = this.store.getState();
    if (state.currentLayout.spec.mode === 'fullScreen' || state.isRestoring) {
      log.debug('Not updating cached geometry in full screen or while restoring');
      return;
    }
    const ticket = this.cacheTickets.next();
    this.pipeline.submit({
      name: 'UpdateCachedGeometry',
      duration: 0,
      isCancelled: () => !this.cacheTickets.isCurrent(ticket),
      run: () => {
        const frame = this.host.getFrame();
        if (frame.status === 'detached') return;
        const current = this.store.getState();
        const screen = this.screens.screenFor(frame.frame);
        if (current.currentLayout.spec.mode === 'windowed') {
          current.setWindowedModeGeometry(
            current.windowedModeGeometry.withChanges({ windowFrame: frame.frame, screen })
          );
        } else if (current.currentLayout.spec.mode === 'musicMode') {
          current.setMusicModeGeometry(current.musicModeGeometry.withChanges({ windowFrame: frame.frame, screen }));
        }
        this.saveState();
      },
    });
  }

  // ==========================================================================
  // Video size
  // ==========================================================================

  /**
   * Resizes for new video parameters: per the resize preferences when a file
   * was just opened, else as little as possible.
   */
  applyVideoParams(params: VideoParams, context: VideoParamsContext): void {
    if (!(params.videoSize.width > 0 && params.videoSize.height > 0)) {
      log.warn('Ignoring video params without a valid size', params.videoSize);
      return;
    }
    const state = this.store.getState();
    const previous = state.videoParams;
    state.setVideoParams(params);

    if (context.isRestoring) {
      log.debug('Restore in progress; keeping restored geometry');
      return;
    }

    const isUnchanged =
      previous !== undefined &&
      sizesEqual(previous.videoSize, params.videoSize) &&
      sizesEqual(previous.rawSize, params.rawSize);
    if (isUnchanged && state.currentLayout.spec.mode !== 'musicMode') {
      log.debug('Video params unchanged; nothing to do');
      return;
    }

    const defaultDuration = this.preferences.getState().animationDurationDefault;
    // The first sizing zooms from the initial window, so give it the full duration
    const duration = state.isInitialSizeDone ? defaultDuration * VIDEO_RECONFIG_RATIO : defaultDuration;

    this.applyGeometryInPipeline(
      'ApplyVideoParams',
      (current) => this.buildGeometryForVideoParams(current, params, context, isUnchanged),
      {
        duration,
        onApplied: (geometry) => {
          if (geometry instanceof WindowGeometry) {
            this.emitter.dispatchWindowSizeAdjusted(geometry.windowFrame);
          }
        },
      }
    );
  }

  private buildGeometryForVideoParams(
    state: WindowLayoutStore,
    params: VideoParams,
    context: VideoParamsContext,
    isUnchanged: boolean
  ): GeometryUpdate {
    const videoAspect = aspectOf(params.videoSize);
    if (state.currentLayout.spec.mode === 'musicMode') {
      return state.musicModeGeometry.withChanges({ videoAspect });
    }
    if (isUnchanged) {
      return undefined;
    }

    const prefs = this.preferences.getState();
    const windowGeometry = state.windowedModeGeometry.withChanges({ videoAspect });
    const geometry =
      resizeAfterFileOpen({
        windowGeometry,
        videoSize: params.videoSize,
        justOpenedFile: context.justOpenedFile,
        isInitialSizeDone: state.isInitialSizeDone,
        intendedViewportSize: state.intendedViewportSize,
        prefs,
      }) ??
      resizeMinimallyAfterVideoReconfig(windowGeometry, params.videoSize, {
        lockViewportToVideoSize: prefs.lockViewportToVideoSize,
        intendedViewportSize: state.intendedViewportSize,
        moveToKeepInContainer: prefs.moveWindowIntoVisibleScreenOnResize,
      });
    state.markInitialSizeDone();
    return geometry;
  }

  /** Scales the video to `scale` times its native size */
  setVideoScale(scale: number): void {
    const videoSize = this.store.getState().videoParams?.videoSize;
    if (!videoSize) {
      log.warn('Cannot set video scale before the video size is known');
      return;
    }
    const desired: Size = {
      width: Math.round(videoSize.width * scale),
      height: Math.round(videoSize.height * scale),
    };

    this.applyGeometryInPipeline('SetVideoScale', (state) => {
      const prefs = this.preferences.getState();
      switch (state.currentLayout.spec.mode) {
        case 'windowed': {
          const unconstrained = state.windowedModeGeometry.scaleVideo(desired, {
            fitOption: 'noConstraints',
            lockViewportToVideoSize: prefs.lockViewportToVideoSize,
          });
          state.setIntendedViewportSize(unconstrained.viewportSize);
          return unconstrained.refit('keepInVisibleScreen', {
            moveToKeepInContainer: prefs.moveWindowIntoVisibleScreenOnResize,
          });
        }
        case 'musicMode':
          return state.musicModeGeometry.scaleVideo(desired, {
            moveToKeepInContainer: prefs.moveWindowIntoVisibleScreenOnResize,
          });
        case 'fullScreen':
          return undefined;
      }
    });
  }

  /**
   * Resizes the viewport toward `desiredViewportSize` (default: its current
   * size), keeping the window on screen and remembering the size as intended.
   */
  resizeViewport(desiredViewportSize?: Size, options: { centerOnScreen?: boolean } = {}): void {
    this.resizeViewportInPipeline('ResizeViewport', () => desiredViewportSize, options.centerOnScreen ?? false);
  }

  /** Grows (or with a negative step, shrinks) the viewport width, keeping its aspect */
  scaleVideoByIncrement(widthStep: number): void {
    this.resizeViewportInPipeline(
      'ScaleVideoByIncrement',
      (viewportSize) => ({
        width: viewportSize.width + widthStep,
        height: viewportSize.height + widthStep / aspectOf(viewportSize),
      }),
      false
    );
  }

  /** `desired` receives the viewport size current when the resize runs */
  private resizeViewportInPipeline(
    name: string,
    desired: (viewportSize: Size) => Size | undefined,
    centerOnScreen: boolean
  ): void {
    this.applyGeometryInPipeline(name, (state) => {
      const prefs = this.preferences.getState();
      const frame = this.host.getFrame();
      const windowFrame: Rect | undefined = frame.status === 'attached' ? frame.frame : undefined;

      switch (state.currentLayout.spec.mode) {
        case 'windowed': {
          const base = windowFrame
            ? state.windowedModeGeometry.withChanges({ windowFrame })
            : state.windowedModeGeometry;
          const unconstrained = base.scaleViewport(desired(base.viewportSize), {
            fitOption: 'noConstraints',
            lockViewportToVideoSize: prefs.lockViewportToVideoSize,
          });
          state.setIntendedViewportSize(unconstrained.viewportSize);
          return unconstrained.refit(centerOnScreen ? 'centerInVisibleScreen' : 'keepInVisibleScreen', {
            moveToKeepInContainer: prefs.moveWindowIntoVisibleScreenOnResize,
          });
        }
        case 'musicMode': {
          const base = windowFrame
            ? state.musicModeGeometry.withChanges({ windowFrame })
            : state.musicModeGeometry;
          const videoSize = base.videoSize;
          return base.scaleVideo(videoSize ? desired(videoSize) : undefined, {
            moveToKeepInContainer: prefs.moveWindowIntoVisibleScreenOnResize,
          });
        }
        case 'fullScreen':
          return undefined;
      }
    });
  }

  /** `cropbox` is at the scale of `unscaledVideoSize`, origin at the video's bottom-left */
  cropVideo(unscaledVideoSize: Size, cropbox: Rect): void {
    this.applyGeometryInPipeline('CropVideo', (state) => {
      if (state.currentLayout.spec.mode !== 'windowed') {
        log.warn(`Crop is only applied to the window in windowed mode, not ${state.currentLayout.spec.mode}`);
        return undefined;
      }
      return state.windowedModeGeometry.cropVideo(unscaledVideoSize, cropbox);
    });
  }

  uncropVideo(fullVideoSize: Size, cropbox: Rect, videoScale: number): void {
    this.applyGeometryInPipeline('UncropVideo', (state) => {
      if (state.currentLayout.spec.mode !== 'windowed') {
        log.warn(`Uncrop is only applied to the window in windowed mode, not ${state.currentLayout.spec.mode}`);
        return undefined;
      }
      const prefs = this.preferences.getState();
      return state.windowedModeGeometry.uncropVideo(fullVideoSize, cropbox, videoScale, {
        lockViewportToVideoSize: prefs.lockViewportToVideoSize,
        moveToKeepInContainer: prefs.moveWindowIntoVisibleScreenOnResize,
      });
    });
  }

  // ==========================================================================
  // Applying geometry
  // ==========================================================================

  /**
   * Queues a geometry update. `build` runs when the update reaches the front
   * of the queue, against the state left by every change queued before it, and
   * the geometry it returns is animated into place right after.
   */
  private applyGeometryInPipeline(
    name: string,
    build: (state: WindowLayoutStore) => GeometryUpdate,
    options: GeometryTaskOptions = {}
  ): void {
    const ticket = options.supersedable === false ? undefined : this.geometryTickets.next();
    this.pipeline.submit({
      name,
      duration: 0,
      isCancelled: () => ticket !== undefined && !this.geometryTickets.isCurrent(ticket),
      run: () => {
        const geometry = build(this.store.getState());
        if (!geometry) return;
        this.pipeline.submitNext({
          name: geometry instanceof MusicModeGeometry ? 'ApplyMusicModeGeometry' : 'ApplyWindowGeometry',
          duration: options.duration ?? this.preferences.getState().animationDurationDefault,
          timing: 'easeInEaseOut',
          run: () => {
            if (geometry instanceof MusicModeGeometry) {
              this.applyMusicModeGeometry(geometry);
            } else {
              this.applyWindowGeometry(geometry);
            }
            options.onApplied?.(geometry);
          },
        });
      },
    });
  }

  private applyWindowGeometry(geometry: WindowGeometry): void {
    const state = this.store.getState();
    const layout = state.currentLayout;

    switch (layout.spec.mode) {
      case 'windowed':
        this.host.setFrame(geometry.windowFrame);
        this.host.applyGeometry(geometry);
        this.renderer.applyVideoGeometry(geometry);
        state.setWindowedModeGeometry(geometry);
        break;
      case 'fullScreen': {
        // Full screen shares the windowed geometry's screen and aspect
        const fullScreenGeometry = buildFullScreenGeometry(layout, {
          screen: geometry.screen,
          videoAspect: geometry.videoAspect,
          allowVideoToOverlapCameraHousing: this.preferences.getState().allowVideoToOverlapCameraHousing,
        });
        this.host.applyGeometry(fullScreenGeometry);
        this.renderer.applyVideoGeometry(fullScreenGeometry);
        state.setWindowedModeGeometry(geometry);
        break;
      }
      case 'musicMode':
        log.error('Window geometry cannot be applied in music mode');
        return;
    }
    this.saveState();
  }

  private applyMusicModeGeometry(geometry: MusicModeGeometry): void {
    const refitted = geometry.refit({
      moveToKeepInContainer: this.preferences.getState().moveWindowIntoVisibleScreenOnResize,
    });
    const windowGeometry = refitted.toWindowGeometry();
    this.host.setFrame(refitted.windowFrame);
    this.host.applyGeometry(windowGeometry);
    this.renderer.applyVideoGeometry(windowGeometry);
    this.store.getState().setMusicModeGeometry(refitted);
    this.saveState();
  }

  // ==========================================================================
  // Saved state
  // ==========================================================================

  /** Builds the property bag and hands it to `onSaveState`. Skipped while restoring. */
  saveState(): SaveStateProperties | undefined {
    const state = this.store.getState();
    if (state.isRestoring) {
      log.debug('Not saving state while restoring');
      return undefined;
    }
    const properties = buildSaveStateProperties({
      layoutSpec: state.currentLayout.spec,
      windowedModeGeometry: state.windowedModeGeometry,
      musicModeGeometry: state.musicModeGeometry,
      intendedViewportSize: state.intendedViewportSize,
      isOnTop: state.isOnTop,
    });
    this.onSaveState?.(properties);
    return properties;
  }
}
