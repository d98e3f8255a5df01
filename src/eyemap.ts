/**
 * Eyemap orchestration: one scene per (region, side, metric) for a single
 * entity, rendered against a dataset-wide region universe and shared scales.
 */

import { ColorMapper, ColorPalette } from './color.js';
import { EntityColumnMap, partitionBySide } from './columns.js';
import { effectiveHexSize } from './hex.js';
import { computeLayout } from './layout.js';
import type { SceneLayout } from './layout.js';
import { mirrorFor, processRegion, summarizeStates } from './processor.js';
import { rasterize } from './raster.js';
import { renderSvg } from './renderer.js';
import type { RegionColumnUniverse } from './columns.js';
import { defaultConfig, METRICS, parseSideTag, selectionTag, SIDE_TAGS } from './types.js';
import type {
  ColumnData, ColumnState, EyemapConfig, EyemapScales, Metric,
  MirrorSide, SideSelection, SideTag,
} from './types.js';

// ── Types ────────────────────────────────────────────────────────────────────

export interface EyemapRequest {
  entity: string;
  /** Every column record of this entity, all regions and sides. */
  records: readonly ColumnData[];
  universe: RegionColumnUniverse;
  scales: EyemapScales;
  side?: SideSelection;
  metrics?: readonly Metric[];
  config?: Partial<EyemapConfig>;
  palette?: ColorPalette;
}

export interface EyemapScene {
  entity: string;
  region: string;
  side: SideTag;
  metric: Metric;
  mirror: MirrorSide;
  layout: SceneLayout;
  counts: Record<ColumnState, number>;
}

/** `<region>_<side>` → metric → rendered grid. */
export type EyemapGrids<T> = Record<string, Partial<Record<Metric, T>>>;

const LEGEND_TITLES: Record<Metric, string> = {
  synapse_density: 'Total Synapses',
  cell_count: 'Cell Count',
};

const TITLE_SUFFIXES: Record<Metric, string> = {
  synapse_density: 'Synapses (All Columns)',
  cell_count: 'Cell Count (All Columns)',
};

export function gridKey(region: string, side: SideTag): string {
  return `${region}_${side}`;
}

/** Inverse of gridKey; the side is everything after the last underscore. */
export function parseGridKey(key: string): { region: string; side: SideTag } {
  const cut = key.lastIndexOf('_');
  if (cut <= 0) throw new Error(`Malformed grid key: "${key}"`);
  return { region: key.slice(0, cut), side: parseSideTag(key.slice(cut + 1)) };
}

/** Configured regions first, then the rest of the universe in first-seen order. */
function orderRegions(universe: RegionColumnUniverse, order: readonly string[]): string[] {
  const present = universe.regions();
  const first = order.filter(r => present.includes(r));
  return [...first, ...present.filter(r => !first.includes(r))];
}

// ── Scenes ───────────────────────────────────────────────────────────────────

function sidesFor(universe: RegionColumnUniverse, region: string, selection: SideSelection): SideTag[] {
  const target = selectionTag(selection);
  if (target) return [target];
  return SIDE_TAGS.filter(side => universe.sides(region).includes(side));
}

/**
 * Build every non-empty scene for the request. Regions come in config order,
 * then sides in L, R, M order, then metrics.
 */
export function buildEyemapScenes(request: EyemapRequest): EyemapScene[] {
  const config = defaultConfig(request.config);
  const selection = request.side ?? 'combined';
  const metrics = request.metrics ?? METRICS;
  const palette = request.palette ?? new ColorPalette();
  const mapper = new ColorMapper(palette);
  const size = effectiveHexSize(config.hexSize, config.spacingFactor);
  const bySide = partitionBySide(request.records, selection);

  const scenes: EyemapScene[] = [];
  for (const region of orderRegions(request.universe, config.regionOrder)) {
    for (const side of sidesFor(request.universe, region, selection)) {
      const entityColumns = bySide.get(side) ?? new EntityColumnMap(side);
      const mirror = mirrorFor(selection, side);
      for (const metric of metrics) {
        const scales = request.scales[metric];
        const hexagons = processRegion({
          region, side, metric, entityColumns, mapper, mirror, size,
          universe: request.universe,
          scales,
        });
        if (hexagons.length === 0) continue;

        const layout = computeLayout(hexagons, {
          hexSize: config.hexSize,
          margin: config.margin,
          mirror,
          title: `${region} ${TITLE_SUFFIXES[metric]}`,
          subtitle: `${request.entity} (${side})`,
          legend: {
            title: LEGEND_TITLES[metric],
            values: mapper.legendValues(scales.columns, region),
            colors: [...palette.colors],
          },
        });
        scenes.push({
          entity: request.entity,
          region, side, metric, mirror, layout,
          counts: summarizeStates(hexagons),
        });
      }
    }
  }
  return scenes;
}

// ── Rendering ────────────────────────────────────────────────────────────────

export function renderScene(scene: EyemapScene, palette: ColorPalette = new ColorPalette()): string {
  return renderSvg(scene.layout, { border: palette.stateColors().border });
}

function collect<T>(scenes: readonly EyemapScene[], values: readonly T[]): EyemapGrids<T> {
  const grids: EyemapGrids<T> = {};
  scenes.forEach((scene, i) => {
    const value = values[i];
    if (value === undefined) return;
    const key = gridKey(scene.region, scene.side);
    const entry = grids[key] ?? {};
    entry[scene.metric] = value;
    grids[key] = entry;
  });
  return grids;
}

/** SVG markup for every grid of the request. */
export function generateEyemaps(request: EyemapRequest): EyemapGrids<string> {
  const scenes = buildEyemapScenes(request);
  return collect(scenes, scenes.map(scene => renderScene(scene, request.palette)));
}

/** PNG buffers for every grid of the request. */
export async function generateEyemapImages(request: EyemapRequest): Promise<EyemapGrids<Buffer>> {
  const density = defaultConfig(request.config).rasterDensity;
  const scenes = buildEyemapScenes(request);
  const images = await Promise.all(scenes.map(scene => rasterize(renderScene(scene, request.palette), density)));
  return collect(scenes, images);
}
