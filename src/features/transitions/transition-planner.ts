import { createLogger } from '@/lib/logger';
import { frameWithoutCameraHousing } from '@/features/geometry/utils/rect-utils';
import { deriveLayoutState, layoutStatesEqual } from '@/features/layout/layout-state';
import { buildInputGeometry, buildMiddleGeometry, buildOutputGeometry } from './geometry-builders';
import { computeTransitionPredicates } from './predicates';
import type {
  BuildTransitionInput,
  LayoutOperation,
  LayoutOperationName,
  LayoutTransition,
  TimingName,
} from './types';

const log = createLogger('TransitionPlanner');

/** Share of the total duration given to the starting steps */
const STARTING_RATIO = 0.3;
/** Share of the ending duration given to covering or uncovering the camera housing */
const CAMERA_HOUSING_RATIO = 0.2;

function step(name: LayoutOperationName): LayoutOperation {
  return { name, duration: 0 };
}

/**
 * Derives the target state and geometries for `input.to`, then lays out the
 * ordered steps to get there:
 *
 * 1. show fadeable views, fade out views that are going away
 * 2. close old panels, animating to the middle geometry
 * 3. restyle with zero duration (bracketed by a render pause when the chrome style flips)
 * 4. open new panels (or set the full screen frame), fade in new views
 *
 * A transition between identical layouts and geometries has no steps.
 */
export function buildLayoutTransition(input: BuildTransitionInput): LayoutTransition {
  const { name, from, context } = input;
  const isInitialLayout = input.isInitialLayout ?? false;

  const to = deriveLayoutState(input.to, context.env);
  const fromGeometry = buildInputGeometry(from, context);
  const toGeometry = buildOutputGeometry(from, fromGeometry, to, context);
  const predicates = computeTransitionPredicates(from, to, isInitialLayout);

  const middleGeometry = isInitialLayout
    ? undefined
    : buildMiddleGeometry({ fromState: from, toState: to, fromGeometry, toGeometry, predicates }, context);

  log.debug(`[${name}] from ${fromGeometry.toString()} to ${toGeometry.toString()}`);
  if (middleGeometry) {
    log.debug(`[${name}] middle ${middleGeometry.toString()}`);
  }

  const transition = {
    name,
    fromState: from,
    toState: to,
    fromGeometry,
    middleGeometry,
    toGeometry,
    isInitialLayout,
    predicates,
  };

  if (!isInitialLayout && layoutStatesEqual(from, to) && fromGeometry.equals(toGeometry)) {
    log.debug(`[${name}] Nothing to change`);
    return { ...transition, operations: [] };
  }

  // Durations
  const defaultDuration = context.durations.default;
  let startingDuration = defaultDuration;
  if (predicates.isTogglingFullScreen) {
    startingDuration = 0;
  } else if (predicates.isEnteringMusicMode) {
    startingDuration = defaultDuration * STARTING_RATIO;
  } else if (input.totalStartingDuration !== undefined) {
    startingDuration = input.totalStartingDuration * STARTING_RATIO;
  }
  const fadeDuration = predicates.isExitingMusicMode ? 0 : startingDuration;
  const endingDuration =
    input.totalEndingDuration ??
    (predicates.isTogglingFullScreen ? context.durations.fullScreen : defaultDuration);

  let panelTiming: TimingName = 'linear';
  if (predicates.isTogglingFullScreen) {
    panelTiming = 'easeInEaseOut';
  } else if (predicates.isTogglingVisibilityOfAnySidebar) {
    panelTiming = 'easeIn';
  }

  const screen = context.screen;
  const hasCameraHousing = screen.cameraHousingHeight > 0;
  const uncoverCameraHousing =
    predicates.isExitingLegacyFullScreen && hasCameraHousing && !isInitialLayout && endingDuration > 0;
  const coverCameraHousing =
    predicates.isEnteringLegacyFullScreen && hasCameraHousing && !isInitialLayout && endingDuration > 0;
  const openPanelsDuration = coverCameraHousing ? endingDuration * (1 - CAMERA_HOUSING_RATIO) : endingDuration;

  const uncoverStep: LayoutOperation = {
    name: 'uncoverCameraHousing',
    duration: endingDuration * CAMERA_HOUSING_RATIO,
    timing: 'easeIn',
    geometry: fromGeometry.withChanges({
      windowFrame: frameWithoutCameraHousing(screen),
      topMarginHeight: 0,
    }),
  };

  const operations: LayoutOperation[] = [step('preTransition')];

  operations.push({ name: 'showFadeableViews', duration: fadeDuration });

  if (predicates.needsFadeOutOldViews) {
    operations.push({ name: 'fadeOutOldViews', duration: fadeDuration });
  }

  // Going to native windowed mode: show the housing before the window leaves the screen frame
  if (uncoverCameraHousing && !to.spec.isLegacyStyle) {
    operations.push(uncoverStep);
  }

  if (predicates.needsCloseOldPanels && !predicates.isTogglingFullScreen) {
    operations.push({
      name: 'closeOldPanels',
      duration: startingDuration,
      timing: panelTiming,
      geometry: middleGeometry,
    });
  }

  if (predicates.isTogglingLegacyStyle) {
    operations.push(step('pauseVideoRendering'));
  }
  operations.push(step('updateHiddenViewsAndConstraints'));
  if (predicates.isTogglingLegacyStyle) {
    operations.push(step('resumeVideoRendering'));
  }

  if (predicates.isEnteringMusicMode && !isInitialLayout && !predicates.isTogglingFullScreen) {
    operations.push({
      name: 'moveWindowForMusicMode',
      duration: defaultDuration,
      timing: 'easeInEaseOut',
      geometry: toGeometry,
    });
  }

  if (uncoverCameraHousing && to.spec.isLegacyStyle) {
    operations.push(uncoverStep);
  }

  if (predicates.isTogglingFullScreen) {
    // Fades in with the frame change; full screen has little time to spare.
    // With a housing to cover, stop below it first and cover it last.
    operations.push({
      name: 'toggleFullScreenFrame',
      duration: openPanelsDuration,
      timing: panelTiming,
      geometry: coverCameraHousing
        ? toGeometry.withChanges({ windowFrame: frameWithoutCameraHousing(screen), topMarginHeight: 0 })
        : toGeometry,
    });
  } else {
    operations.push({
      name: 'openNewPanels',
      duration: openPanelsDuration,
      timing: panelTiming,
      geometry: toGeometry,
    });
    if (predicates.needsFadeInNewViews) {
      operations.push({ name: 'fadeInNewViews', duration: endingDuration, timing: panelTiming });
    }
  }

  if (coverCameraHousing) {
    operations.push({
      name: 'coverCameraHousing',
      duration: endingDuration * CAMERA_HOUSING_RATIO,
      timing: 'easeIn',
      geometry: toGeometry,
    });
  }

  operations.push(step('postTransition'));

  return { ...transition, operations };
}

/** Sum of all step durations */
export function totalDuration(transition: LayoutTransition): number {
  return transition.operations.reduce((sum, operation) => sum + operation.duration, 0);
}
