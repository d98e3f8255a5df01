/**
 * Column existence reconciliation.
 * The region universe is the set union of coordinates seen for each
 * (region, side) across every entity in a dataset snapshot. It is built once
 * and shared read-only by every per-entity render.
 */

import { RawColumnRecordSchema, selectionTag } from './types.js';
import type { ColumnCoordinate, ColumnData, SideSelection, SideTag } from './types.js';

// ── Keys ─────────────────────────────────────────────────────────────────────

export function coordKey(coord: ColumnCoordinate): string {
  return `${coord.hex1},${coord.hex2}`;
}

function regionSideKey(region: string, side: SideTag): string {
  return `${region}|${side}`;
}

function compareCoords(a: ColumnCoordinate, b: ColumnCoordinate): number {
  return a.hex1 - b.hex1 || a.hex2 - b.hex2;
}

// ── Validation boundary ──────────────────────────────────────────────────────

/**
 * Validate one raw record and freeze it into a ColumnData.
 * Throws ZodError on malformed input (non-integer indices, unknown side, …).
 */
export function toColumnData(raw: unknown): ColumnData {
  const rec = RawColumnRecordSchema.parse(raw);
  const layers = rec.layers.map(l => Object.freeze({
    index: l.index,
    synapseCount: l.synapseCount,
    neuronCount: l.neuronCount,
    value: l.value ?? l.synapseCount,
  }));
  return Object.freeze({
    region: rec.region,
    side: rec.side,
    coordinate: Object.freeze({ hex1: rec.hex1, hex2: rec.hex2 }),
    totalSynapses: rec.totalSynapses,
    neuronCount: rec.neuronCount,
    layers: Object.freeze(layers),
  });
}

// ── Region Universe ──────────────────────────────────────────────────────────

export interface HexBounds {
  minHex1: number;
  minHex2: number;
  maxHex1: number;
  maxHex2: number;
}

export interface UniverseEntry {
  region: string;
  side: SideTag;
  keys: ReadonlySet<string>;
  coords: readonly ColumnCoordinate[];
}

/** Immutable (region, side) → coordinate set table. */
export class RegionColumnUniverse {
  private readonly entries: ReadonlyMap<string, UniverseEntry>;
  private readonly hexBounds: Readonly<HexBounds>;

  constructor(entries: Map<string, UniverseEntry>, bounds: HexBounds) {
    this.entries = entries;
    this.hexBounds = Object.freeze({ ...bounds });
    Object.freeze(this);
  }

  /** Coordinates for (region, side), sorted by hex1 then hex2. Unknown keys yield []. */
  get(region: string, side: SideTag): readonly ColumnCoordinate[] {
    return this.entries.get(regionSideKey(region, side))?.coords ?? [];
  }

  has(region: string, side: SideTag, coord: ColumnCoordinate): boolean {
    return this.entries.get(regionSideKey(region, side))?.keys.has(coordKey(coord)) ?? false;
  }

  /** Regions in first-seen order. */
  regions(): string[] {
    const seen = new Set<string>();
    for (const entry of this.entries.values()) seen.add(entry.region);
    return [...seen];
  }

  sides(region: string): SideTag[] {
    const sides: SideTag[] = [];
    for (const entry of this.entries.values()) {
      if (entry.region === region) sides.push(entry.side);
    }
    return sides;
  }

  /** Total number of (region, side, coordinate) triples. */
  get size(): number {
    let n = 0;
    for (const entry of this.entries.values()) n += entry.coords.length;
    return n;
  }

  /** Dataset-wide index bounds, the shared origin for every grid. */
  bounds(): Readonly<HexBounds> {
    return this.hexBounds;
  }
}

type UniverseInput = Pick<ColumnData, 'region' | 'side' | 'coordinate'>;

/**
 * Union every record's coordinate into its (region, side) set.
 */
export function buildRegionUniverse(records: Iterable<UniverseInput>): RegionColumnUniverse {
  const sets = new Map<string, { region: string; side: SideTag; coords: Map<string, ColumnCoordinate> }>();
  let minHex1 = Infinity, minHex2 = Infinity, maxHex1 = -Infinity, maxHex2 = -Infinity;

  for (const { region, side, coordinate } of records) {
    const key = regionSideKey(region, side);
    let set = sets.get(key);
    if (!set) {
      set = { region, side, coords: new Map() };
      sets.set(key, set);
    }
    set.coords.set(coordKey(coordinate), coordinate);

    if (coordinate.hex1 < minHex1) minHex1 = coordinate.hex1;
    if (coordinate.hex2 < minHex2) minHex2 = coordinate.hex2;
    if (coordinate.hex1 > maxHex1) maxHex1 = coordinate.hex1;
    if (coordinate.hex2 > maxHex2) maxHex2 = coordinate.hex2;
  }
  if (!isFinite(minHex1)) { minHex1 = 0; minHex2 = 0; maxHex1 = 0; maxHex2 = 0; }

  const entries = new Map<string, UniverseEntry>();
  for (const [key, { region, side, coords }] of sets) {
    const sorted = [...coords.values()]
      .map(c => Object.freeze({ hex1: c.hex1, hex2: c.hex2 }))
      .sort(compareCoords);
    entries.set(key, {
      region,
      side,
      keys: new Set(coords.keys()),
      coords: Object.freeze(sorted),
    });
  }

  return new RegionColumnUniverse(entries, { minHex1, minHex2, maxHex1, maxHex2 });
}

// ── Per-entity lookup ────────────────────────────────────────────────────────

/**
 * One entity's columns for a single side, keyed by (region, coordinate).
 */
export class EntityColumnMap {
  private readonly columns = new Map<string, ColumnData>();
  private readonly regionCounts = new Map<string, number>();

  constructor(readonly side: SideTag, records: Iterable<ColumnData> = []) {
    for (const column of records) this.add(column);
  }

  private add(column: ColumnData): void {
    const key = `${column.region}|${coordKey(column.coordinate)}`;
    if (!this.columns.has(key)) {
      this.regionCounts.set(column.region, (this.regionCounts.get(column.region) ?? 0) + 1);
    }
    // A later record for the same column replaces the earlier one.
    this.columns.set(key, column);
  }

  get(region: string, coord: ColumnCoordinate): ColumnData | undefined {
    return this.columns.get(`${region}|${coordKey(coord)}`);
  }

  /** Whether the entity has any column at all in `region` on this side. */
  hasRegion(region: string): boolean {
    return (this.regionCounts.get(region) ?? 0) > 0;
  }

  regions(): string[] {
    return [...this.regionCounts.keys()];
  }

  get size(): number {
    return this.columns.size;
  }
}

/**
 * Group an entity's records by side. A concrete selection yields exactly
 * that side (possibly empty); `combined` yields every side tag present.
 */
export function partitionBySide(
  records: Iterable<ColumnData>,
  selection: SideSelection,
): Map<SideTag, EntityColumnMap> {
  const target = selectionTag(selection);
  const bySide = new Map<SideTag, ColumnData[]>();
  if (target) bySide.set(target, []);

  for (const column of records) {
    if (target && column.side !== target) continue;
    let list = bySide.get(column.side);
    if (!list) {
      list = [];
      bySide.set(column.side, list);
    }
    list.push(column);
  }

  const result = new Map<SideTag, EntityColumnMap>();
  for (const [side, list] of bySide) result.set(side, new EntityColumnMap(side, list));
  return result;
}
