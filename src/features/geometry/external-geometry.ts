import { createLogger } from '@/lib/logger';

const log = createLogger('ExternalGeometry');

/**
 * A size or offset in a geometry directive: absolute units, or a percentage of
 * the screen's matching dimension.
 */
export interface GeometryDimension {
  value: number;
  isPercentage: boolean;
}

export interface GeometryOffset extends GeometryDimension {
  /** `+` measures from the leading/bottom screen edge, `-` from the trailing/top edge */
  sign: '+' | '-';
}

/**
 * Parsed `[W[xH]][±X±Y]` directive.
 * `width` and `height` are mutually exclusive when applied; width wins.
 */
export interface ExternalGeometry {
  width?: GeometryDimension;
  height?: GeometryDimension;
  x?: GeometryOffset;
  y?: GeometryOffset;
}

const GEOMETRY_PATTERN = /^((\d+%?)?(x)?(\d+%?)?)?(([+-])(\d+%?)([+-])(\d+%?))?$/;

function parseDimension(token: string | undefined): GeometryDimension | undefined {
  if (!token) return undefined;
  const isPercentage = token.endsWith('%');
  const value = Number.parseInt(isPercentage ? token.slice(0, -1) : token, 10);
  if (!Number.isFinite(value)) return undefined;
  return { value, isPercentage };
}

function parseSign(token: string | undefined): '+' | '-' | undefined {
  if (token === '+' || token === '-') return token;
  return undefined;
}

function parseOffset(signToken: string | undefined, token: string | undefined): GeometryOffset | undefined {
  const sign = parseSign(signToken);
  const dimension = parseDimension(token);
  if (!sign || !dimension) return undefined;
  return { ...dimension, sign };
}

/**
 * Parses a window geometry directive such as `1280x720`, `50%`, `x600`,
 * `+0-0` or `800+10%+20`. Returns undefined (and logs) if the string is empty
 * or malformed.
 */
export function parseExternalGeometry(input: string): ExternalGeometry | undefined {
  const text = input.trim();
  if (text.length === 0) return undefined;

  const match = GEOMETRY_PATTERN.exec(text);
  if (!match) {
    log.error(`Invalid geometry directive: "${text}"`);
    return undefined;
  }

  const geometry: ExternalGeometry = {};
  const width = parseDimension(match[2]);
  const height = parseDimension(match[4]);
  const x = parseOffset(match[6], match[7]);
  const y = parseOffset(match[8], match[9]);
  if (width) geometry.width = width;
  if (height) geometry.height = height;
  if (x) geometry.x = x;
  if (y) geometry.y = y;
  return geometry;
}

function formatDimension(dimension: GeometryDimension): string {
  return `${dimension.value}${dimension.isPercentage ? '%' : ''}`;
}

export function formatExternalGeometry(geometry: ExternalGeometry): string {
  let text = '';
  if (geometry.width) text += formatDimension(geometry.width);
  if (geometry.height) text += `x${formatDimension(geometry.height)}`;
  if (geometry.x && geometry.y) {
    text += `${geometry.x.sign}${formatDimension(geometry.x)}${geometry.y.sign}${formatDimension(geometry.y)}`;
  }
  return text;
}
