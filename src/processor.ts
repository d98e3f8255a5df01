/**
 * Column classification and colouring.
 * Turns one entity's columns plus the shared region universe into a
 * render-ready list of hexagon descriptors for one (region, side, metric).
 */

import { ColorMapper } from './color.js';
import { hexToPixel } from './hex.js';
import type { EntityColumnMap, RegionColumnUniverse } from './columns.js';
import type {
  ColumnCoordinate, ColumnData, ColumnState, HexagonDescriptor,
  LayerMetric, Metric, MetricScales, MirrorSide, SideSelection, SideTag,
} from './types.js';

const METRIC_LABELS: Record<Metric, string> = {
  synapse_density: 'Synapse count',
  cell_count: 'Cell count',
};

export function metricLabel(metric: Metric): string {
  return METRIC_LABELS[metric];
}

export function columnValue(column: ColumnData, metric: Metric): number {
  return metric === 'synapse_density' ? column.totalSynapses : column.neuronCount;
}

export function layerValue(layer: LayerMetric, metric: Metric): number {
  return metric === 'synapse_density' ? layer.value : layer.neuronCount;
}

function formatValue(value: number): string {
  return String(Math.round(value * 100) / 100);
}

/**
 * Left grids are mirrored; under `combined` only the L grid is.
 */
export function mirrorFor(selection: SideSelection, side: SideTag): MirrorSide {
  if (selection === 'left') return 'left';
  if (selection === 'combined' && side === 'L') return 'left';
  return 'right';
}

// ── Classification ───────────────────────────────────────────────────────────

/**
 * Three-way state of one universe coordinate for the current entity.
 * An entity with no columns anywhere in (region, side) sees the whole region
 * as existing-without-data; otherwise coordinates it lacks are not part of
 * its region.
 */
export function classifyColumn(
  region: string,
  coord: ColumnCoordinate,
  entityColumns: EntityColumnMap,
  metric: Metric,
): ColumnState {
  const column = entityColumns.get(region, coord);
  if (column) return columnValue(column, metric) > 0 ? 'has_data' : 'exists_no_data';
  return entityColumns.hasRegion(region) ? 'not_in_region' : 'exists_no_data';
}

// ── Processing ───────────────────────────────────────────────────────────────

export interface RegionRequest {
  region: string;
  side: SideTag;
  metric: Metric;
  entityColumns: EntityColumnMap;
  universe: RegionColumnUniverse;
  scales: MetricScales;
  /** Effective hex size (hex size × spacing factor). */
  size: number;
  mirror: MirrorSide;
  mapper?: ColorMapper;
}

/**
 * One descriptor per coordinate of `universe.get(region, side)`, in universe
 * order. An empty universe yields an empty list.
 */
export function processRegion(req: RegionRequest): HexagonDescriptor[] {
  const { region, side, metric, entityColumns, universe, scales } = req;
  const mapper = req.mapper ?? new ColorMapper();
  const states = mapper.stateColors();
  const { minHex1, minHex2 } = universe.bounds();
  const label = METRIC_LABELS[metric];
  const layerScale = scales.layers ?? scales.columns;

  return universe.get(region, side).map((coord): HexagonDescriptor => {
    const { x, y } = hexToPixel(coord.hex1, coord.hex2, minHex1, minHex2, req.size, req.mirror);
    const heading = `Column: ${coord.hex1}, ${coord.hex2}`;
    const state = classifyColumn(region, coord, entityColumns, metric);
    const base = { coordinate: coord, region, side, state, x, y };

    if (state === 'not_in_region') {
      return {
        ...base,
        value: 0,
        color: states.notInRegion,
        tooltip: `${heading}\nColumn not identified in ${region} (${side})`,
        layerColors: [],
        layerTooltips: [],
      };
    }

    const column = entityColumns.get(region, coord);
    if (state === 'exists_no_data' || !column) {
      return {
        ...base,
        value: 0,
        color: states.existsNoData,
        tooltip: `${heading}\n${label}: 0\nROI: ${region} (${side})`,
        layerColors: [],
        layerTooltips: [],
      };
    }

    const value = columnValue(column, metric);
    return {
      ...base,
      value,
      color: mapper.colorForScale(value, region, scales.columns),
      tooltip: `${heading}\n${label}: ${formatValue(value)}\nROI: ${region} (${side})`,
      layerColors: column.layers.map(layer => mapper.colorForScale(layerValue(layer, metric), region, layerScale)),
      layerTooltips: column.layers.map(layer => `${formatValue(layerValue(layer, metric))}\nROI: ${region}${layer.index}`),
    };
  });
}

export function summarizeStates(hexagons: readonly HexagonDescriptor[]): Record<ColumnState, number> {
  const counts: Record<ColumnState, number> = { has_data: 0, exists_no_data: 0, not_in_region: 0 };
  for (const h of hexagons) counts[h.state]++;
  return counts;
}
