import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import {
  toColumnData, buildRegionUniverse, partitionBySide, coordKey, EntityColumnMap,
} from '../src/columns.js';

function col(region: string, side: string, hex1: number, hex2: number, totalSynapses = 10) {
  return toColumnData({ region, side, hex1, hex2, totalSynapses });
}

describe('toColumnData', () => {
  it('freezes the validated record', () => {
    const c = toColumnData({
      region: 'ME', side: 'right', hex1: 2, hex2: 3, totalSynapses: 7, neuronCount: 2,
      layers: [{ index: 1, synapseCount: 3, neuronCount: 1 }, { index: 2, synapseCount: 4, neuronCount: 1, value: 0.5 }],
    });
    expect(c.side).toBe('R');
    expect(c.coordinate).toEqual({ hex1: 2, hex2: 3 });
    expect(Object.isFrozen(c)).toBe(true);
    expect(Object.isFrozen(c.layers)).toBe(true);
    expect(c.layers.map(l => l.value)).toEqual([3, 0.5]);
  });

  it('throws ZodError on malformed input', () => {
    expect(() => toColumnData({ region: 'ME', side: 'L', hex1: 'a', hex2: 0 })).toThrow(ZodError);
    expect(() => toColumnData({ region: 'ME', side: 'sideways', hex1: 0, hex2: 0 })).toThrow(ZodError);
  });
});

describe('buildRegionUniverse', () => {
  const records = [
    col('ME', 'L', 3, 1),
    col('ME', 'L', 1, 2),
    col('ME', 'L', 1, 1),
    col('ME', 'L', 3, 1),
    col('LO', 'L', 5, 5),
    col('ME', 'R', 2, 9),
  ];
  const universe = buildRegionUniverse(records);

  it('unions coordinates per (region, side) sorted by hex1 then hex2', () => {
    expect(universe.get('ME', 'L')).toEqual([
      { hex1: 1, hex2: 1 }, { hex1: 1, hex2: 2 }, { hex1: 3, hex2: 1 },
    ]);
    expect(universe.get('ME', 'R')).toEqual([{ hex1: 2, hex2: 9 }]);
  });

  it('keeps sides and regions apart', () => {
    expect(universe.has('ME', 'L', { hex1: 5, hex2: 5 })).toBe(false);
    expect(universe.has('LO', 'L', { hex1: 5, hex2: 5 })).toBe(true);
    expect(universe.has('ME', 'R', { hex1: 1, hex2: 1 })).toBe(false);
  });

  it('returns an empty list for unknown keys', () => {
    expect(universe.get('LOP', 'M')).toEqual([]);
  });

  it('lists regions in first-seen order and their sides', () => {
    expect(universe.regions()).toEqual(['ME', 'LO']);
    expect(universe.sides('ME')).toEqual(['L', 'R']);
  });

  it('counts distinct triples', () => {
    expect(universe.size).toBe(5);
  });

  it('reports dataset-wide bounds', () => {
    expect(universe.bounds()).toEqual({ minHex1: 1, minHex2: 1, maxHex1: 5, maxHex2: 9 });
  });

  it('is immutable', () => {
    expect(Object.isFrozen(universe)).toBe(true);
    expect(Object.isFrozen(universe.get('ME', 'L'))).toBe(true);
  });

  it('defaults bounds to zero when empty', () => {
    const empty = buildRegionUniverse([]);
    expect(empty.size).toBe(0);
    expect(empty.bounds()).toEqual({ minHex1: 0, minHex2: 0, maxHex1: 0, maxHex2: 0 });
  });
});

describe('EntityColumnMap', () => {
  it('looks columns up by region and coordinate', () => {
    const map = new EntityColumnMap('L', [col('ME', 'L', 1, 1, 4), col('LO', 'L', 1, 1, 9)]);
    expect(map.get('ME', { hex1: 1, hex2: 1 })?.totalSynapses).toBe(4);
    expect(map.get('LO', { hex1: 1, hex2: 1 })?.totalSynapses).toBe(9);
    expect(map.get('LOP', { hex1: 1, hex2: 1 })).toBeUndefined();
    expect(map.hasRegion('ME')).toBe(true);
    expect(map.hasRegion('LOP')).toBe(false);
    expect(map.regions()).toEqual(['ME', 'LO']);
  });

  it('lets a later record replace an earlier one', () => {
    const map = new EntityColumnMap('R', [col('ME', 'R', 1, 1, 4), col('ME', 'R', 1, 1, 6)]);
    expect(map.size).toBe(1);
    expect(map.get('ME', { hex1: 1, hex2: 1 })?.totalSynapses).toBe(6);
  });
});

describe('partitionBySide', () => {
  const records = [col('ME', 'L', 1, 1), col('ME', 'R', 2, 2), col('LO', 'R', 3, 3)];

  it('keeps only the selected side', () => {
    const parts = partitionBySide(records, 'right');
    expect([...parts.keys()]).toEqual(['R']);
    expect(parts.get('R')?.size).toBe(2);
  });

  it('yields an empty map for a selected side without records', () => {
    const parts = partitionBySide(records, 'middle');
    expect(parts.get('M')?.size).toBe(0);
  });

  it('splits every side under combined', () => {
    const parts = partitionBySide(records, 'combined');
    expect([...parts.keys()].sort()).toEqual(['L', 'R']);
  });
});

describe('coordKey', () => {
  it('joins indices', () => {
    expect(coordKey({ hex1: -2, hex2: 7 })).toBe('-2,7');
  });
});
