/**
 * Scene layout: bounding box, local-frame translation, title and legend
 * placement. Everything downstream of this module works in the translated
 * frame and does no coordinate math of its own.
 */

import { hexagonPath } from './hex.js';
import type { HexagonDescriptor, MirrorSide } from './types.js';

// ── Types ────────────────────────────────────────────────────────────────────

export interface BoundingBox {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
  width: number;
  height: number;
}

export interface LegendBox {
  x: number;
  y: number;
  width: number;
  height: number;
  binHeight: number;
  title: string;
  /** Boundary values, lowest first; one more than the number of bins. */
  values: number[];
  colors: string[];
  labelX: number;
}

export interface SceneLayout {
  width: number;
  height: number;
  hexPoints: string;
  title?: { text: string; x: number; y: number };
  subtitle?: { text: string; x: number; y: number };
  legend?: LegendBox;
  hexagons: HexagonDescriptor[];
}

export interface LayoutOptions {
  hexSize: number;
  margin: number;
  mirror: MirrorSide;
  title?: string;
  subtitle?: string;
  legend?: { title: string; values: number[]; colors: string[] };
}

const TITLE_LINE = 16;
const SUBTITLE_LINE = 14;
const LEGEND_WIDTH = 12;
const LEGEND_HEIGHT = 60;
const LEGEND_GAP = 15;
const LEGEND_LABEL_WIDTH = 45;

// ── Bounds ───────────────────────────────────────────────────────────────────

/**
 * Pixel bounding box of hexagon centres, padded by one hex size on each side.
 */
export function gridBounds(points: ReadonlyArray<{ x: number; y: number }>, hexSize: number): BoundingBox {
  if (points.length === 0) {
    return { minX: 0, minY: 0, maxX: 0, maxY: 0, width: 0, height: 0 };
  }
  let minX = Infinity, minY = Infinity, maxX = -Infinity, maxY = -Infinity;
  for (const { x, y } of points) {
    if (x - hexSize < minX) minX = x - hexSize;
    if (y - hexSize < minY) minY = y - hexSize;
    if (x + hexSize > maxX) maxX = x + hexSize;
    if (y + hexSize > maxY) maxY = y + hexSize;
  }
  return { minX, minY, maxX, maxY, width: maxX - minX, height: maxY - minY };
}

// ── Layout ───────────────────────────────────────────────────────────────────

/**
 * Translate hexagons into the scene frame and place title and legend.
 * The legend sits right of the grid, or left of it for mirrored grids, and
 * is only drawn when some hexagon carries data.
 */
export function computeLayout(hexagons: readonly HexagonDescriptor[], options: LayoutOptions): SceneLayout {
  const { hexSize, margin, mirror } = options;
  const bounds = gridBounds(hexagons, hexSize);

  const header = (options.title ? TITLE_LINE : 0) + (options.subtitle ? SUBTITLE_LINE : 0);
  const showLegend = options.legend !== undefined && hexagons.some(h => h.state === 'has_data');
  const legendBlock = showLegend ? LEGEND_WIDTH + LEGEND_GAP + LEGEND_LABEL_WIDTH : 0;
  const legendOnLeft = mirror === 'left';

  const gridLeft = margin + (legendOnLeft ? legendBlock : 0);
  const gridTop = margin + header;
  const dx = gridLeft - bounds.minX;
  const dy = gridTop - bounds.minY;

  const width = bounds.width + 2 * margin + legendBlock;
  const height = Math.max(bounds.height, showLegend ? LEGEND_HEIGHT : 0) + 2 * margin + header;

  const layout: SceneLayout = {
    width,
    height,
    hexPoints: hexagonPath(hexSize),
    hexagons: hexagons.map(h => ({ ...h, x: h.x + dx, y: h.y + dy })),
  };

  if (options.title) {
    layout.title = { text: options.title, x: width / 2, y: margin + TITLE_LINE - 4 };
  }
  if (options.subtitle) {
    layout.subtitle = {
      text: options.subtitle,
      x: width / 2,
      y: margin + (options.title ? TITLE_LINE : 0) + SUBTITLE_LINE - 4,
    };
  }

  if (showLegend && options.legend) {
    const bins = options.legend.colors.length;
    const x = legendOnLeft ? margin + LEGEND_LABEL_WIDTH : gridLeft + bounds.width + LEGEND_GAP;
    layout.legend = {
      x,
      y: height - margin - LEGEND_HEIGHT,
      width: LEGEND_WIDTH,
      height: LEGEND_HEIGHT,
      binHeight: bins > 0 ? LEGEND_HEIGHT / bins : LEGEND_HEIGHT,
      title: options.legend.title,
      values: options.legend.values,
      colors: options.legend.colors,
      labelX: legendOnLeft ? x - 4 : x + LEGEND_WIDTH + 4,
    };
  }

  return layout;
}
