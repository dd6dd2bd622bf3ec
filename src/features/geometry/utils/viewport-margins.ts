import type { BoxQuad, Size, WindowMode } from '@/types/geometry';
import { BOX_QUAD_ZERO } from './box-quad';

/**
 * Splits the unused viewport space around the video into margins.
 *
 * The video is centered when it clears both inside sidebars. Otherwise it is
 * pushed away from whichever sidebar it would sit under, and when there is not
 * enough room for both it is centered between the sidebars with the free space
 * shared in proportion to what each side needs.
 */
export function computeBestViewportMargins(
  viewportSize: Size,
  videoSize: Size,
  insideBars: BoxQuad,
  mode: WindowMode
): BoxQuad {
  if (viewportSize.width <= 0 || viewportSize.height <= 0) {
    return { ...BOX_QUAD_ZERO };
  }
  // Viewport always equals video in music mode
  if (mode === 'musicMode') {
    return { ...BOX_QUAD_ZERO };
  }

  let leading = 0;
  let trailing = 0;
  let unusedWidth = Math.max(0, viewportSize.width - videoSize.width);

  if (unusedWidth > 0) {
    if (mode === 'fullScreen') {
      leading += unusedWidth * 0.5;
      trailing += unusedWidth * 0.5;
    } else {
      const leadingSidebarWidth = insideBars.leading;
      const trailingSidebarWidth = insideBars.trailing;

      const midpointX = viewportSize.width * 0.5;
      const idealVideoLeadingX = midpointX - videoSize.width * 0.5;
      const idealVideoTrailingX = midpointX + videoSize.width * 0.5;

      const leadingClearance = idealVideoLeadingX - leadingSidebarWidth;
      const trailingClearance = viewportSize.width - idealVideoTrailingX - trailingSidebarWidth;
      const freeWidth = viewportSize.width - videoSize.width - leadingSidebarWidth - trailingSidebarWidth;

      if (leadingClearance >= 0 && trailingClearance >= 0) {
        leading += unusedWidth * 0.5;
        trailing += unusedWidth * 0.5;
      } else if (freeWidth >= 0) {
        // Room to realign the video between the sidebars
        leading += leadingSidebarWidth;
        trailing += trailingSidebarWidth;
        unusedWidth = unusedWidth - leadingSidebarWidth - trailingSidebarWidth;
        if (trailingClearance < 0) {
          leading += unusedWidth;
        } else if (leadingClearance < 0) {
          trailing += unusedWidth;
        }
      } else if (leadingSidebarWidth === 0) {
        trailing += unusedWidth;
      } else if (trailingSidebarWidth === 0) {
        leading += unusedWidth;
      } else {
        const sidebarsMidpointX =
          (viewportSize.width - trailingSidebarWidth - leadingSidebarWidth) * 0.5 + leadingSidebarWidth;
        let leadingNeeded = sidebarsMidpointX - videoSize.width * 0.5;
        let trailingNeeded = viewportSize.width - (sidebarsMidpointX + videoSize.width * 0.5);
        // Negative margins would push the video out of the viewport
        if (leadingNeeded < 0) {
          trailingNeeded -= leadingNeeded;
          leadingNeeded = 0;
        }
        if (trailingNeeded < 0) {
          leadingNeeded -= trailingNeeded;
          trailingNeeded = 0;
        }
        const allocationFactor = unusedWidth / (leadingNeeded + trailingNeeded);
        leading += leadingNeeded * allocationFactor;
        trailing += trailingNeeded * allocationFactor;
      }
    }

    leading = Math.floor(leading);
    trailing = Math.ceil(trailing);
  }

  const unusedHeight = viewportSize.height - videoSize.height;
  return {
    top: Math.floor(unusedHeight * 0.5),
    trailing,
    bottom: Math.ceil(unusedHeight * 0.5),
    leading,
  };
}
