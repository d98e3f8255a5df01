/**
 * Hex Grid Engine — flat-top axial coordinate system for column grids.
 * Reference: https://www.redblobgames.com/grids/hexagons/
 *
 * Column indices (hex1, hex2) are recentred on the dataset-wide minimum so
 * every grid starts near the origin regardless of the absolute index range.
 */

import type { MirrorSide } from './types.js';

// ── Types ────────────────────────────────────────────────────────────────────

export interface AxialCoord {
  q: number;
  r: number;
}

export interface PixelCoord {
  x: number;
  y: number;
}

// ── Column → Axial ───────────────────────────────────────────────────────────

/**
 * Convert a column index pair to axial coordinates, offset by the minimum
 * observed indices.
 */
export function hexToAxial(hex1: number, hex2: number, minHex1 = 0, minHex2 = 0): AxialCoord {
  const h1 = hex1 - minHex1;
  const h2 = hex2 - minHex2;
  return { q: -(h1 - h2) - 3, r: -h2 };
}

// ── Axial → Pixel ────────────────────────────────────────────────────────────

export function effectiveHexSize(hexSize: number, spacingFactor: number): number {
  return hexSize * spacingFactor;
}

/**
 * Flat-top projection. Left grids are mirrored on the y axis.
 * @param size - effective size (hex size × spacing factor)
 */
export function axialToPixel(axial: AxialCoord, size: number, mirror: MirrorSide = 'right'): PixelCoord {
  const x = size * (3 / 2 * axial.q);
  const y = size * (Math.sqrt(3) / 2 * axial.q + Math.sqrt(3) * axial.r);
  return { x: mirror === 'left' ? -x : x, y };
}

export function hexToPixel(
  hex1: number,
  hex2: number,
  minHex1: number,
  minHex2: number,
  size: number,
  mirror: MirrorSide = 'right',
): PixelCoord {
  return axialToPixel(hexToAxial(hex1, hex2, minHex1, minHex2), size, mirror);
}

// ── Shape ────────────────────────────────────────────────────────────────────

/**
 * Return the 6 pixel corners of a flat-top hexagon (first corner at 0°).
 */
export function hexCorners(cx: number, cy: number, size: number): PixelCoord[] {
  const corners: PixelCoord[] = [];
  for (let i = 0; i < 6; i++) {
    const angle = (Math.PI / 3) * i;
    corners.push({
      x: cx + size * Math.cos(angle),
      y: cy + size * Math.sin(angle),
    });
  }
  return corners;
}

function fixed(value: number, precision: number): string {
  const text = value.toFixed(precision);
  // -1e-16 prints as "-0.00"
  return Number(text) === 0 ? (0).toFixed(precision) : text;
}

/**
 * Corner points of a hexagon centred at the origin as "x,y" strings.
 */
export function hexagonVertices(hexSize: number, precision = 2): string[] {
  return hexCorners(0, 0, hexSize).map(({ x, y }) => `${fixed(x, precision)},${fixed(y, precision)}`);
}

/** Polygon `points` value for a hexagon centred at the origin. */
export function hexagonPath(hexSize: number, precision = 2): string {
  return hexagonVertices(hexSize, precision).join(' ');
}
