/**
 * Zod Validation Schemas for Saved Window State
 *
 * Each saved value is a comma-separated list of tokens led by a format
 * version. The schemas below validate the split tokens and convert them to
 * typed values.
 */

import { z } from 'zod';
import { parseSidebarTab } from '@/features/layout/sidebar';

export const CSV_FORMAT_VERSION = '1';

// ============================================================================
// Token Schemas
// ============================================================================

const versionToken = z.literal(CSV_FORMAT_VERSION, {
  errorMap: () => ({ message: `Expected format version "${CSV_FORMAT_VERSION}"` }),
});

const numberToken = z
  .string()
  .regex(/^-?\d+(\.\d+)?$/, 'Must be a decimal number')
  .transform(Number);

const yesNoToken = z.enum(['Y', 'N']).transform((value) => value === 'Y');

const placementToken = z.enum(['inside', 'outside']);

const modeToken = z.enum(['windowed', 'fullScreen', 'musicMode']);

const oscPositionToken = z.enum(['floating', 'top', 'bottom']);

/** `nil` when the sidebar is hidden */
const sidebarTabToken = z.string().transform((value, ctx) => {
  if (value === 'nil') return undefined;
  const tab = parseSidebarTab(value);
  if (!tab) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown sidebar tab "${value}"` });
    return z.NEVER;
  }
  return tab;
});

/** Percent-encoded so that the id cannot split the record */
const screenIdToken = z
  .string()
  .min(1)
  .transform((value, ctx) => {
    try {
      return decodeURIComponent(value);
    } catch (error) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Malformed screen id "${value}": ${String(error)}` });
      return z.NEVER;
    }
  });

// ============================================================================
// Record Schemas
// ============================================================================

export const layoutSpecTokensSchema = z.tuple([
  versionToken,
  sidebarTabToken, // leading visible tab
  sidebarTabToken, // trailing visible tab
  modeToken,
  yesNoToken, // isLegacyStyle
  placementToken, // top bar
  placementToken, // trailing sidebar
  placementToken, // bottom bar
  placementToken, // leading sidebar
  yesNoToken, // enableOSC
  oscPositionToken,
]);

export const windowGeometryTokensSchema = z.tuple([
  versionToken,
  numberToken, // video width
  numberToken, // video height
  numberToken, // video aspect
  numberToken, // outside top
  numberToken, // outside trailing
  numberToken, // outside bottom
  numberToken, // outside leading
  numberToken, // window x
  numberToken, // window y
  numberToken, // window width
  numberToken, // window height
]);

export const musicModeGeometryTokensSchema = z.tuple([
  versionToken,
  numberToken, // window x
  numberToken, // window y
  numberToken, // window width
  numberToken, // window height
  numberToken, // playlist height
  yesNoToken, // isVideoVisible
  yesNoToken, // isPlaylistVisible
  numberToken, // video aspect
  screenIdToken,
]);

export const sizeTokensSchema = z.tuple([numberToken, numberToken]);

export const saveStatePropertiesSchema = z
  .object({
    layoutSpec: z.string().optional(),
    windowGeometry: z.string().optional(),
    musicModeGeometry: z.string().optional(),
    intendedViewportSize: z.string().optional(),
    onTop: yesNoToken.optional(),
  })
  .passthrough();

export type ValidatedSaveStateProperties = z.infer<typeof saveStatePropertiesSchema>;

/**
 * Format Zod errors into human-readable messages
 */
export function formatValidationErrors(errors: z.ZodError): string[] {
  return errors.issues.map((issue) => {
    const path = issue.path.join('.');
    return `${path ? `${path}: ` : ''}${issue.message}`;
  });
}
