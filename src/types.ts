import { z } from 'zod';

// ── Enums ────────────────────────────────

export const SIDE_TAGS = ['L', 'R', 'M'] as const;
export type SideTag = typeof SIDE_TAGS[number];

export const SIDE_SELECTIONS = ['left', 'right', 'middle', 'combined'] as const;
export type SideSelection = typeof SIDE_SELECTIONS[number];

export const METRICS = ['synapse_density', 'cell_count'] as const;
export type Metric = typeof METRICS[number];

export const COLUMN_STATES = ['has_data', 'exists_no_data', 'not_in_region'] as const;
export type ColumnState = typeof COLUMN_STATES[number];

export const OUTPUT_FORMATS = ['svg', 'png'] as const;
export type OutputFormat = typeof OUTPUT_FORMATS[number];

export type MirrorSide = 'left' | 'right';

const SIDE_TAG_ALIASES: Record<string, SideTag> = {
  l: 'L', left: 'L',
  r: 'R', right: 'R',
  m: 'M', middle: 'M',
};

const SIDE_SELECTION_ALIASES: Record<string, SideSelection> = {
  l: 'left', left: 'left',
  r: 'right', right: 'right',
  m: 'middle', middle: 'middle',
  combined: 'combined', both: 'combined',
};

/**
 * Parse a raw side tag ("L", "right", …). Unknown tags throw.
 */
export function parseSideTag(raw: string): SideTag {
  const tag = SIDE_TAG_ALIASES[raw.trim().toLowerCase()];
  if (!tag) throw new Error(`Unknown side tag: "${raw}"`);
  return tag;
}

export function parseSideSelection(raw: string): SideSelection {
  const selection = SIDE_SELECTION_ALIASES[raw.trim().toLowerCase()];
  if (!selection) throw new Error(`Unknown side selection: "${raw}"`);
  return selection;
}

/** Side tag a concrete selection reads from; `undefined` for combined. */
export function selectionTag(selection: SideSelection): SideTag | undefined {
  switch (selection) {
    case 'left': return 'L';
    case 'right': return 'R';
    case 'middle': return 'M';
    case 'combined': return undefined;
  }
}

// ── Zod Schemas ──────────────────────────

export const SideTagSchema = z.string().transform((raw, ctx): SideTag => {
  const tag = SIDE_TAG_ALIASES[raw.trim().toLowerCase()];
  if (!tag) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown side tag: "${raw}"` });
    return z.NEVER;
  }
  return tag;
});

export const LayerMetricSchema = z.object({
  index: z.number().int().min(1),
  synapseCount: z.number().min(0).default(0),
  neuronCount: z.number().int().min(0).default(0),
  value: z.number().min(0).optional(),
});

export const RawColumnRecordSchema = z.object({
  region: z.string().min(1),
  side: SideTagSchema,
  hex1: z.number().int(),
  hex2: z.number().int(),
  totalSynapses: z.number().min(0).default(0),
  neuronCount: z.number().int().min(0).default(0),
  layers: z.array(LayerMetricSchema).default([]),
}).superRefine((rec, ctx) => {
  rec.layers.forEach((layer, i) => {
    if (layer.index !== i + 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['layers', i, 'index'],
        message: `Sublayers must be 1-based and contiguous: expected index ${i + 1}, got ${layer.index}`,
      });
    }
  });
});
export type RawColumnRecord = z.input<typeof RawColumnRecordSchema>;

export const DatasetRecordSchema = RawColumnRecordSchema.and(z.object({
  entity: z.string().min(1),
}));
export type DatasetRecord = z.input<typeof DatasetRecordSchema>;

/** Colour buckets in the default palette. */
export const PALETTE_SIZE = 5;

/** `bins + 1` ascending boundaries, one bucket per palette colour. */
export function colorThresholdsSchema(bins: number) {
  return z.array(z.number()).length(bins + 1, { message: `Expected ${bins + 1} threshold boundaries` }).refine(
    values => values.every((v, i) => i === 0 || v >= (values[i - 1] ?? v)),
    { message: 'Threshold boundaries must be ascending' },
  );
}

export const ColorThresholdsSchema = colorThresholdsSchema(PALETTE_SIZE);

// ── Column Types ─────────────────────────

export interface ColumnCoordinate {
  readonly hex1: number;
  readonly hex2: number;
}

export interface LayerMetric {
  readonly index: number;
  readonly synapseCount: number;
  readonly neuronCount: number;
  readonly value: number;
}

export interface ColumnData {
  readonly region: string;
  readonly side: SideTag;
  readonly coordinate: ColumnCoordinate;
  readonly totalSynapses: number;
  readonly neuronCount: number;
  readonly layers: readonly LayerMetric[];
}

export interface MinMax {
  min: number;
  max: number;
}

/** Per-region min/max for one metric. */
export type RegionMinMax = Readonly<Record<string, MinMax>>;

export type ColorThresholds = readonly number[];

export type ColorScale =
  | { kind: 'thresholds'; thresholds: ColorThresholds }
  | { kind: 'regional-thresholds'; thresholds: Readonly<Record<string, ColorThresholds>> }
  | { kind: 'min-max'; table: RegionMinMax };

/** Column scale plus an optional separate scale for sublayers. */
export interface MetricScales {
  columns: ColorScale;
  layers?: ColorScale;
}

export type EyemapScales = Readonly<Record<Metric, MetricScales>>;

export interface HexagonDescriptor {
  coordinate: ColumnCoordinate;
  region: string;
  side: SideTag;
  state: ColumnState;
  x: number;
  y: number;
  value: number;
  color: string;
  tooltip: string;
  layerColors: string[];
  layerTooltips: string[];
}

// ── Config ───────────────────────────────

export const MIN_HEX_SIZE = 1;
export const MAX_HEX_SIZE = 50;
export const MIN_SPACING_FACTOR = 1.0;
export const MAX_SPACING_FACTOR = 3.0;

export interface EyemapConfig {
  hexSize: number;
  spacingFactor: number;
  margin: number;
  regionOrder: string[];
  outputDir: string;
  dbPath: string;
  format: OutputFormat;
  embed: 'file' | 'inline';
  rasterDensity: number;
  verbose: boolean;
}

export function defaultConfig(overrides: Partial<EyemapConfig> = {}): EyemapConfig {
  const home = process.env.HOME ?? process.env.USERPROFILE ?? '/tmp';
  return {
    hexSize: 6,
    spacingFactor: 1.1,
    margin: 10,
    regionOrder: ['ME', 'LO', 'LOP'],
    outputDir: './eyemap-output',
    dbPath: `${home}/.eyemap/columns.db`,
    format: 'svg',
    embed: 'file',
    rasterDensity: 144,
    verbose: false,
    ...overrides,
  };
}
