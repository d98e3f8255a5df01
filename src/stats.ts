/**
 * Dataset statistics pass: value ranges and colour thresholds shared by
 * every entity rendered from the same dataset snapshot.
 */

import { columnValue, layerValue } from './processor.js';
import { ColorPalette } from './color.js';
import { colorThresholdsSchema } from './types.js';
import type { ColumnData, EyemapScales, MetricScales, Metric, MinMax, RegionMinMax } from './types.js';

export type ScalePolicy = 'regional' | 'global';
export type ThresholdMethod = 'equal' | 'quantile';

const UNIT_RANGE: MinMax = { min: 0, max: 1 };

// ── Ranges ───────────────────────────────────────────────────────────────────

function rangeOf(values: Iterable<number>): MinMax | undefined {
  let min = Infinity, max = -Infinity;
  for (const v of values) {
    if (v < min) min = v;
    if (v > max) max = v;
  }
  return isFinite(min) ? { min, max } : undefined;
}

/**
 * Per-region min/max of positive values. Regions without a positive value
 * take the dataset-wide range, or 0..1 when nothing at all is positive.
 */
function regionalRanges(samples: Iterable<[region: string, value: number]>): Record<string, MinMax> {
  const byRegion = new Map<string, number[]>();
  const positives: number[] = [];
  for (const [region, value] of samples) {
    let list = byRegion.get(region);
    if (!list) {
      list = [];
      byRegion.set(region, list);
    }
    if (value > 0) {
      list.push(value);
      positives.push(value);
    }
  }

  const fallback = rangeOf(positives) ?? UNIT_RANGE;
  const table: Record<string, MinMax> = {};
  for (const [region, values] of byRegion) {
    table[region] = rangeOf(values) ?? { ...fallback };
  }
  return table;
}

export function computeRegionMinMax(records: Iterable<ColumnData>, metric: Metric): RegionMinMax {
  const samples: Array<[string, number]> = [];
  for (const column of records) samples.push([column.region, columnValue(column, metric)]);
  return regionalRanges(samples);
}

export function computeLayerMinMax(records: Iterable<ColumnData>, metric: Metric): RegionMinMax {
  const samples: Array<[string, number]> = [];
  for (const column of records) {
    for (const layer of column.layers) samples.push([column.region, layerValue(layer, metric)]);
  }
  return regionalRanges(samples);
}

// ── Thresholds ───────────────────────────────────────────────────────────────

function quantile(sorted: readonly number[], p: number): number {
  const pos = (sorted.length - 1) * p;
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  const a = sorted[lo] ?? 0;
  const b = sorted[hi] ?? a;
  return a + (b - a) * (pos - lo);
}

/**
 * `bins + 1` ascending boundaries over the positive entries of `values`.
 * With nothing positive the boundaries are 0, 1/bins, …, 1.
 */
export function computeThresholds(values: Iterable<number>, bins = 5, method: ThresholdMethod = 'equal'): number[] {
  const n = Math.max(1, Math.floor(bins));
  const positives = [...values].filter(v => v > 0).sort((a, b) => a - b);
  const steps = Array.from({ length: n + 1 }, (_, i) => i / n);
  if (positives.length === 0) return steps;

  if (method === 'quantile') return steps.map(p => quantile(positives, p));

  const min = positives[0] ?? 0;
  const max = positives[positives.length - 1] ?? min;
  return steps.map(p => min + p * (max - min));
}

// ── Scales ───────────────────────────────────────────────────────────────────

export interface ScaleOptions {
  policy?: ScalePolicy;
  /** Palette the scales are drawn with; defaults to the five-step ramp. */
  palette?: ColorPalette;
  /** Must equal the palette's colour count. */
  bins?: number;
  method?: ThresholdMethod;
  /** Fixed column boundaries for the global policy, used for every metric. */
  thresholds?: readonly number[];
}

/**
 * Column and sublayer scales for every metric. `regional` normalizes each
 * region against its own range; `global` buckets raw values against
 * dataset-wide thresholds.
 */
export function buildScales(records: readonly ColumnData[], options: ScaleOptions = {}): EyemapScales {
  const { policy = 'regional', palette = new ColorPalette(), method = 'equal' } = options;
  const bins = options.bins ?? palette.size;
  if (bins !== palette.size) {
    throw new Error(`Threshold bins must match the ${palette.size}-colour palette, got ${bins}`);
  }
  const fixed = options.thresholds ? colorThresholdsSchema(bins).parse(options.thresholds) : undefined;

  const forMetric = (metric: Metric): MetricScales => {
    if (policy === 'regional') {
      return {
        columns: { kind: 'min-max', table: computeRegionMinMax(records, metric) },
        layers: { kind: 'min-max', table: computeLayerMinMax(records, metric) },
      };
    }
    const totals = records.map(c => columnValue(c, metric));
    const layers = records.flatMap(c => c.layers.map(l => layerValue(l, metric)));
    return {
      columns: { kind: 'thresholds', thresholds: fixed ?? computeThresholds(totals, bins, method) },
      layers: { kind: 'thresholds', thresholds: computeThresholds(layers, bins, method) },
    };
  };

  const scales: Record<Metric, MetricScales> = {
    synapse_density: forMetric('synapse_density'),
    cell_count: forMetric('cell_count'),
  };
  return scales;
}
