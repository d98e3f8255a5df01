/**
 * Discrete colour ramp for column metrics.
 * Values are bucketed against N+1 ascending boundaries; bucket i covers
 * [t[i], t[i+1]) and the last bucket includes its upper bound.
 */

import type { ColorScale, ColorThresholds, MinMax, RegionMinMax } from './types.js';

// ── Palette ──────────────────────────────────────────────────────────────────

/** Five-step red ramp, lightest → darkest. */
const DEFAULT_COLORS = [
  '#fee5d9',
  '#fcbba1',
  '#fc9272',
  '#ef6548',
  '#a50f15',
];

const DEFAULT_THRESHOLDS = [0, 0.2, 0.4, 0.6, 0.8, 1];

export const WHITE = '#ffffff';
export const DARK_GRAY = '#999999';
export const LIGHT_GRAY = '#e0e0e0';

export interface StateColors {
  /** Column does not exist in this region for the entity. */
  notInRegion: string;
  /** Column exists in the region but the entity has no data there. */
  existsNoData: string;
  /** Stroke drawn only around `existsNoData` hexagons. */
  border: string;
}

/**
 * Index of the bucket `value` falls in. Values outside the boundaries clamp
 * to the first or last bucket.
 */
export function bucketIndex(value: number, boundaries: ColorThresholds): number {
  const last = boundaries.length - 2;
  if (last < 0) return 0;
  for (let i = 0; i < last; i++) {
    if (value < boundaries[i + 1]) return i;
  }
  return last;
}

export class ColorPalette {
  readonly colors: readonly string[];
  readonly thresholds: readonly number[];

  constructor(colors: readonly string[] = DEFAULT_COLORS, thresholds: readonly number[] = DEFAULT_THRESHOLDS) {
    if (colors.length === 0) throw new Error('Palette needs at least one colour');
    if (thresholds.length !== colors.length + 1) {
      throw new Error(`Palette of ${colors.length} colours needs ${colors.length + 1} thresholds, got ${thresholds.length}`);
    }
    this.colors = Object.freeze([...colors]);
    this.thresholds = Object.freeze([...thresholds]);
  }

  get size(): number {
    return this.colors.length;
  }

  colorAt(index: number): string {
    const clamped = Math.max(0, Math.min(this.colors.length - 1, index));
    return this.colors[clamped];
  }

  /** Colour for a value already normalized into [0, 1]. */
  valueToColor(normalized: number): string {
    return this.colorAt(bucketIndex(normalized, this.thresholds));
  }

  stateColors(): StateColors {
    return { notInRegion: DARK_GRAY, existsNoData: WHITE, border: LIGHT_GRAY };
  }
}

// ── Mapper ───────────────────────────────────────────────────────────────────

/**
 * Linear rescale into [0, 1], clamped. A flat range normalizes to 0.
 */
export function normalize(value: number, min: number, max: number): number {
  if (max === min) return 0;
  const normalized = (value - min) / (max - min);
  return Math.max(0, Math.min(1, normalized));
}

const ZERO_RANGE: MinMax = { min: 0, max: 0 };

export class ColorMapper {
  constructor(readonly palette: ColorPalette = new ColorPalette()) {}

  normalize(value: number, min: number, max: number): number {
    return normalize(value, min, max);
  }

  /** Zero is the no-signal state and is always white. */
  colorForValue(value: number, min: number, max: number): string {
    if (value === 0) return WHITE;
    return this.palette.valueToColor(normalize(value, min, max));
  }

  colorForRegionalValue(value: number, region: string, table: RegionMinMax): string {
    const { min, max } = table[region] ?? ZERO_RANGE;
    return this.colorForValue(value, min, max);
  }

  /**
   * Bucket a raw value against explicit boundaries. Throws unless there is
   * exactly one more boundary than palette colours.
   */
  colorForThresholds(value: number, thresholds: ColorThresholds): string {
    this.checkThresholds(thresholds);
    if (value === 0) return WHITE;
    return this.palette.colorAt(bucketIndex(value, thresholds));
  }

  colorForScale(value: number, region: string, scale: ColorScale): string {
    switch (scale.kind) {
      case 'thresholds':
        return this.colorForThresholds(value, scale.thresholds);
      case 'regional-thresholds': {
        const thresholds = scale.thresholds[region];
        if (!thresholds) return this.colorForValue(value, 0, 0);
        return this.colorForThresholds(value, thresholds);
      }
      case 'min-max':
        return this.colorForRegionalValue(value, region, scale.table);
    }
  }

  stateColors(): StateColors {
    return this.palette.stateColors();
  }

  /**
   * Boundary values shown beside the legend bins for `region`.
   */
  legendValues(scale: ColorScale, region: string): number[] {
    switch (scale.kind) {
      case 'thresholds':
        return this.checkThresholds(scale.thresholds);
      case 'regional-thresholds': {
        const thresholds = scale.thresholds[region];
        if (!thresholds) return this.palette.thresholds.map(() => 0);
        return this.checkThresholds(thresholds);
      }
      case 'min-max': {
        const { min, max } = scale.table[region] ?? ZERO_RANGE;
        return this.palette.thresholds.map(t => (max === min ? min : min + t * (max - min)));
      }
    }
  }

  private checkThresholds(thresholds: ColorThresholds): number[] {
    if (thresholds.length !== this.palette.size + 1) {
      throw new Error(
        `Palette of ${this.palette.size} colours needs ${this.palette.size + 1} thresholds, got ${thresholds.length}`,
      );
    }
    return [...thresholds];
  }
}
