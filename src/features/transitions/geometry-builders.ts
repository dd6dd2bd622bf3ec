import type { BoxQuad, BoxSide } from '@/types/geometry';
import { createLogger } from '@/lib/logger';
import { BOX_QUAD_ZERO, totalHeight, totalWidth } from '@/features/geometry/utils/box-quad';
import { WindowGeometry } from '@/features/geometry/window-geometry';
import { buildFullScreenGeometry, insideBarsOf, outsideBarsOf } from '@/features/layout/layout-state';
import type { LayoutState } from '@/features/layout/types';
import type { TransitionContext, TransitionPredicates } from './types';

const log = createLogger('TransitionGeometry');

function sameAspect(a: number, b: number): boolean {
  return a.toFixed(6) === b.toFixed(6);
}

/** Where the window is now, for the mode the current layout is in */
export function buildInputGeometry(from: LayoutState, context: TransitionContext): WindowGeometry {
  switch (from.spec.mode) {
    case 'windowed':
      return context.windowedModeGeometry;
    case 'fullScreen':
      return buildFullScreenGeometry(from, {
        screen: context.screen,
        videoAspect: context.videoAspect,
        allowVideoToOverlapCameraHousing: context.env.allowVideoToOverlapCameraHousing,
      });
    case 'musicMode':
      // Stored music mode geometry may predate a screen change
      return context.musicModeGeometry.refit().toWindowGeometry();
  }
}

/**
 * Where the window ends up. Not necessarily the new windowed mode geometry:
 * the caller decides what to keep once the transition is done.
 */
export function buildOutputGeometry(
  from: LayoutState,
  inputGeometry: WindowGeometry,
  to: LayoutState,
  context: TransitionContext
): WindowGeometry {
  switch (to.spec.mode) {
    case 'musicMode':
      // The aspect ratio may have changed while out of music mode
      return context.musicModeGeometry
        .withChanges({ videoAspect: context.videoAspect })
        .refit()
        .toWindowGeometry();
    case 'fullScreen':
      return buildFullScreenGeometry(to, {
        screen: context.screen,
        videoAspect: context.videoAspect,
        allowVideoToOverlapCameraHousing: context.env.allowVideoToOverlapCameraHousing,
      });
    case 'windowed':
      break;
  }

  const outputGeometry = context.windowedModeGeometry.withResizedBars(
    {
      outside: outsideBarsOf(to),
      inside: insideBarsOf(to),
      videoAspect: inputGeometry.videoAspect,
    },
    { lockViewportToVideoSize: context.lockViewportToVideoSize }
  );

  const deltaOutsideWidth = totalWidth(outputGeometry.outsideBars) - totalWidth(inputGeometry.outsideBars);
  const deltaOutsideHeight = totalHeight(outputGeometry.outsideBars) - totalHeight(inputGeometry.outsideBars);
  const isShrinking = deltaOutsideWidth < 0 || (deltaOutsideWidth === 0 && deltaOutsideHeight < 0);

  // A bar that squeezed the video on open gives the space back when it closes
  const intended = context.intendedViewportSize;
  if (
    isShrinking &&
    context.lockViewportToVideoSize &&
    intended &&
    from.spec.mode !== 'musicMode' &&
    sameAspect(context.windowedModeGeometry.videoAspect, inputGeometry.videoAspect)
  ) {
    log.debug('Restoring intended viewport size instead of shrinking the window', {
      deltaOutsideWidth,
      deltaOutsideHeight,
      intended,
    });
    return outputGeometry.scaleViewport(intended, { lockViewportToVideoSize: true });
  }
  return outputGeometry;
}

export interface MiddleGeometryInput {
  fromState: LayoutState;
  toState: LayoutState;
  fromGeometry: WindowGeometry;
  toGeometry: WindowGeometry;
  predicates: TransitionPredicates;
}

function barsWithMinimum(
  from: BoxQuad,
  to: BoxQuad,
  forcedClosed: Readonly<Record<BoxSide, boolean>>
): BoxQuad {
  return {
    top: forcedClosed.top ? 0 : Math.min(from.top, to.top),
    trailing: forcedClosed.trailing ? 0 : Math.min(from.trailing, to.trailing),
    bottom: forcedClosed.bottom ? 0 : Math.min(from.bottom, to.bottom),
    leading: forcedClosed.leading ? 0 : Math.min(from.leading, to.leading),
  };
}

/**
 * Way-point between the two layouts: bars on their way out are closed before
 * the new ones open, so no bar grows and then shrinks again. Each bar takes the
 * smaller of its two sizes; a bar changing placement and a closing sidebar go
 * through zero. Undefined when toggling full screen, which sets its own frame.
 */
export function buildMiddleGeometry(
  input: MiddleGeometryInput,
  context: TransitionContext
): WindowGeometry | undefined {
  const { predicates, fromGeometry, toGeometry, toState } = input;

  if (predicates.isTogglingFullScreen) {
    return undefined;
  }
  if (predicates.isEnteringMusicMode) {
    return fromGeometry.withResizedBars({ outside: BOX_QUAD_ZERO, inside: BOX_QUAD_ZERO });
  }
  if (predicates.isExitingMusicMode) {
    // Only the music mode control bar needs closing
    return fromGeometry.withResizedOutsideBars({ bottom: 0 });
  }

  const forcedClosed: Record<BoxSide, boolean> = {
    top: predicates.isTopBarPlacementChanging,
    trailing: predicates.isHidingTrailingSidebar,
    bottom: predicates.isBottomBarPlacementChanging || predicates.isTogglingMusicMode,
    leading: predicates.isHidingLeadingSidebar,
  };
  const outside = barsWithMinimum(fromGeometry.outsideBars, toGeometry.outsideBars, forcedClosed);
  const inside = barsWithMinimum(fromGeometry.insideBars, toGeometry.insideBars, forcedClosed);

  if (toState.spec.mode === 'fullScreen') {
    return WindowGeometry.forFullScreen({
      screen: context.screen,
      legacy: toState.spec.isLegacyStyle,
      mode: 'fullScreen',
      videoAspect: context.videoAspect,
      outsideBars: outside,
      insideBars: inside,
      allowVideoToOverlapCameraHousing: context.env.allowVideoToOverlapCameraHousing,
    });
  }

  return toGeometry.withResizedBars(
    { outside, inside },
    { lockViewportToVideoSize: context.lockViewportToVideoSize }
  );
}
