import { createLogger } from '@/lib/logger';
import { sidebarAt } from '@/features/layout/layout-spec';
import { isShowable } from '@/features/layout/layout-state';
import { isSidebarVisible, visibleTabGroupOf } from '@/features/layout/sidebar';
import type { LayoutState, SidebarLocation } from '@/features/layout/types';
import type { TransitionPredicates } from './types';

const log = createLogger('TransitionPredicates');

/** Visible before and after, but with a different placement or tab group */
export function isHidingAndThenShowing(
  from: LayoutState,
  to: LayoutState,
  location: SidebarLocation
): boolean {
  const oldSidebar = sidebarAt(from.spec, location);
  const newSidebar = sidebarAt(to.spec, location);
  if (!isSidebarVisible(oldSidebar) || !isSidebarVisible(newSidebar)) {
    return false;
  }
  if (oldSidebar.placement !== newSidebar.placement) {
    return true;
  }
  return visibleTabGroupOf(oldSidebar) !== visibleTabGroupOf(newSidebar);
}

export function isShowingSidebar(from: LayoutState, to: LayoutState, location: SidebarLocation): boolean {
  const wasVisible = isSidebarVisible(sidebarAt(from.spec, location));
  const isVisible = isSidebarVisible(sidebarAt(to.spec, location));
  return (!wasVisible && isVisible) || isHidingAndThenShowing(from, to, location);
}

export function isHidingSidebar(from: LayoutState, to: LayoutState, location: SidebarLocation): boolean {
  const oldSidebar = sidebarAt(from.spec, location);
  const newSidebar = sidebarAt(to.spec, location);
  const oldGroup = visibleTabGroupOf(oldSidebar);
  if (oldGroup) {
    if (!isSidebarVisible(newSidebar)) {
      return true;
    }
    if (!newSidebar.tabGroups.includes(oldGroup)) {
      log.error(`${location}: visible tab group "${oldGroup}" is missing from the new layout`);
      return true;
    }
  }
  return isHidingAndThenShowing(from, to, location);
}

/** Compares the two states once so the planner can branch on plain flags */
export function computeTransitionPredicates(
  from: LayoutState,
  to: LayoutState,
  isInitialLayout: boolean
): TransitionPredicates {
  const a = from.spec;
  const b = to.spec;
  const wasFullScreen = a.mode === 'fullScreen';
  const isFullScreen = b.mode === 'fullScreen';

  const isTogglingLegacyStyle = a.isLegacyStyle !== b.isLegacyStyle;
  const isEnteringFullScreen = isFullScreen && (!wasFullScreen || isInitialLayout);
  const isExitingFullScreen = wasFullScreen && !isFullScreen;
  const isTopBarPlacementChanging = a.topBarPlacement !== b.topBarPlacement;
  const isBottomBarPlacementChanging = a.bottomBarPlacement !== b.bottomBarPlacement;
  const isModeChanging = a.mode !== b.mode;
  const isOSCEnabledChanging = a.enableOSC !== b.enableOSC;
  const isOSCPositionChanging = a.oscPosition !== b.oscPosition;

  const isShowingLeadingSidebar = isShowingSidebar(from, to, 'leadingSidebar');
  const isShowingTrailingSidebar = isShowingSidebar(from, to, 'trailingSidebar');
  const isHidingLeadingSidebar = isHidingSidebar(from, to, 'leadingSidebar');
  const isHidingTrailingSidebar = isHidingSidebar(from, to, 'trailingSidebar');

  const losesToggleButton =
    (isShowable(from.leadingSidebarToggleButton) && !isShowable(to.leadingSidebarToggleButton)) ||
    (isShowable(from.trailingSidebarToggleButton) && !isShowable(to.trailingSidebarToggleButton));
  const gainsToggleButton =
    (!isShowable(from.leadingSidebarToggleButton) && isShowable(to.leadingSidebarToggleButton)) ||
    (!isShowable(from.trailingSidebarToggleButton) && isShowable(to.trailingSidebarToggleButton));

  const needsFadeOutOldViews =
    isTogglingLegacyStyle ||
    isTopBarPlacementChanging ||
    isModeChanging ||
    (a.bottomBarPlacement === 'inside' && b.bottomBarPlacement === 'outside') ||
    isOSCEnabledChanging ||
    (a.enableOSC && isOSCPositionChanging) ||
    losesToggleButton;

  const needsFadeInNewViews =
    isTogglingLegacyStyle ||
    isTopBarPlacementChanging ||
    isModeChanging ||
    (a.bottomBarPlacement === 'outside' && b.bottomBarPlacement === 'inside') ||
    isOSCEnabledChanging ||
    (b.enableOSC && isOSCPositionChanging) ||
    gainsToggleButton;

  // Entering full screen sets a fixed frame; closing panels first would only bounce the video
  const needsCloseOldPanels =
    !isEnteringFullScreen &&
    (isHidingLeadingSidebar ||
      isHidingTrailingSidebar ||
      isTopBarPlacementChanging ||
      isBottomBarPlacementChanging ||
      isTogglingLegacyStyle ||
      isModeChanging ||
      isOSCEnabledChanging ||
      (a.enableOSC && isOSCPositionChanging));

  return {
    isOSCChanging: isOSCEnabledChanging || isOSCPositionChanging,
    isTogglingLegacyStyle,
    isTogglingFullScreen: wasFullScreen !== isFullScreen,
    isEnteringFullScreen,
    isExitingFullScreen,
    isEnteringLegacyFullScreen: isEnteringFullScreen && b.isLegacyStyle,
    isExitingLegacyFullScreen: isExitingFullScreen && a.isLegacyStyle,
    isEnteringMusicMode: a.mode !== 'musicMode' && b.mode === 'musicMode',
    isExitingMusicMode: a.mode === 'musicMode' && b.mode !== 'musicMode',
    isTogglingMusicMode: (a.mode === 'musicMode') !== (b.mode === 'musicMode'),
    isTopBarPlacementChanging,
    isBottomBarPlacementChanging,
    isShowingLeadingSidebar,
    isShowingTrailingSidebar,
    isHidingLeadingSidebar,
    isHidingTrailingSidebar,
    isTogglingVisibilityOfAnySidebar:
      isShowingLeadingSidebar || isShowingTrailingSidebar || isHidingLeadingSidebar || isHidingTrailingSidebar,
    needsFadeOutOldViews,
    needsFadeInNewViews,
    needsCloseOldPanels,
  };
}
