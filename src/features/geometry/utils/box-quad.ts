import type { BoxQuad, BoxSide, Size } from '@/types/geometry';

export const BOX_QUAD_ZERO: BoxQuad = Object.freeze({ top: 0, trailing: 0, bottom: 0, leading: 0 });

export const BOX_SIDES: readonly BoxSide[] = ['top', 'trailing', 'bottom', 'leading'];

export function boxQuad(values: Partial<BoxQuad> = {}): BoxQuad {
  return {
    top: values.top ?? 0,
    trailing: values.trailing ?? 0,
    bottom: values.bottom ?? 0,
    leading: values.leading ?? 0,
  };
}

export function totalWidth(box: BoxQuad): number {
  return box.leading + box.trailing;
}

export function totalHeight(box: BoxQuad): number {
  return box.top + box.bottom;
}

export function totalSize(box: BoxQuad): Size {
  return { width: totalWidth(box), height: totalHeight(box) };
}

/** Fills unspecified sides from `base` */
export function mergeBoxQuad(base: BoxQuad, overrides: Partial<BoxQuad> | undefined): BoxQuad {
  if (!overrides) return base;
  return {
    top: overrides.top ?? base.top,
    trailing: overrides.trailing ?? base.trailing,
    bottom: overrides.bottom ?? base.bottom,
    leading: overrides.leading ?? base.leading,
  };
}

export function mapBoxQuad(box: BoxQuad, fn: (value: number, side: BoxSide) => number): BoxQuad {
  return {
    top: fn(box.top, 'top'),
    trailing: fn(box.trailing, 'trailing'),
    bottom: fn(box.bottom, 'bottom'),
    leading: fn(box.leading, 'leading'),
  };
}

export function boxQuadsEqual(a: BoxQuad, b: BoxQuad): boolean {
  return BOX_SIDES.every((side) => a[side] === b[side]);
}

export function formatBoxQuad(box: BoxQuad): string {
  return `{t:${box.top} tr:${box.trailing} b:${box.bottom} l:${box.leading}}`;
}
