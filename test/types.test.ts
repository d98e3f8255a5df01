import { describe, it, expect } from 'vitest';
import {
  RawColumnRecordSchema, DatasetRecordSchema, ColorThresholdsSchema, SideTagSchema, colorThresholdsSchema,
  parseSideTag, parseSideSelection, selectionTag, defaultConfig,
} from '../src/types.js';

describe('parseSideTag', () => {
  it('accepts short and long forms in any case', () => {
    expect(parseSideTag('L')).toBe('L');
    expect(parseSideTag('right')).toBe('R');
    expect(parseSideTag(' Middle ')).toBe('M');
  });

  it('rejects unknown tags', () => {
    expect(() => parseSideTag('X')).toThrow('Unknown side tag: "X"');
  });
});

describe('parseSideSelection', () => {
  it('maps aliases', () => {
    expect(parseSideSelection('L')).toBe('left');
    expect(parseSideSelection('both')).toBe('combined');
    expect(parseSideSelection('COMBINED')).toBe('combined');
  });

  it('rejects unknown selections', () => {
    expect(() => parseSideSelection('up')).toThrow('Unknown side selection: "up"');
  });

  it('resolves the side tag of a concrete selection', () => {
    expect(selectionTag('left')).toBe('L');
    expect(selectionTag('middle')).toBe('M');
    expect(selectionTag('combined')).toBeUndefined();
  });
});

describe('SideTagSchema', () => {
  it('normalizes valid tags', () => {
    expect(SideTagSchema.parse('r')).toBe('R');
  });

  it('reports unknown tags as a ZodError', () => {
    const result = SideTagSchema.safeParse('Q');
    expect(result.success).toBe(false);
  });
});

describe('RawColumnRecordSchema', () => {
  const base = { region: 'ME', side: 'L', hex1: 3, hex2: 4 };

  it('applies defaults', () => {
    const rec = RawColumnRecordSchema.parse(base);
    expect(rec.totalSynapses).toBe(0);
    expect(rec.neuronCount).toBe(0);
    expect(rec.layers).toEqual([]);
    expect(rec.side).toBe('L');
  });

  it('rejects non-integer indices', () => {
    expect(RawColumnRecordSchema.safeParse({ ...base, hex1: 1.5 }).success).toBe(false);
  });

  it('rejects an empty region', () => {
    expect(RawColumnRecordSchema.safeParse({ ...base, region: '' }).success).toBe(false);
  });

  it('rejects negative counts', () => {
    expect(RawColumnRecordSchema.safeParse({ ...base, totalSynapses: -1 }).success).toBe(false);
  });

  it('accepts 1-based contiguous layers', () => {
    const rec = RawColumnRecordSchema.parse({
      ...base,
      layers: [{ index: 1, synapseCount: 2 }, { index: 2, synapseCount: 3 }],
    });
    expect(rec.layers.map(l => l.index)).toEqual([1, 2]);
  });

  it('rejects gaps in layer indices', () => {
    const result = RawColumnRecordSchema.safeParse({
      ...base,
      layers: [{ index: 1 }, { index: 3 }],
    });
    expect(result.success).toBe(false);
  });
});

describe('DatasetRecordSchema', () => {
  it('requires an entity', () => {
    expect(DatasetRecordSchema.safeParse({ region: 'LO', side: 'R', hex1: 0, hex2: 0 }).success).toBe(false);
    expect(DatasetRecordSchema.safeParse({ entity: 'T4a', region: 'LO', side: 'R', hex1: 0, hex2: 0 }).success).toBe(true);
  });
});

describe('ColorThresholdsSchema', () => {
  it('accepts ascending sequences of palette size + 1', () => {
    expect(ColorThresholdsSchema.safeParse([0, 0.5, 0.5, 1, 1, 2]).success).toBe(true);
  });

  it('rejects descending or wrongly sized sequences', () => {
    expect(ColorThresholdsSchema.safeParse([0, 2, 1, 3, 4, 5]).success).toBe(false);
    expect(ColorThresholdsSchema.safeParse([0, 100]).success).toBe(false);
    expect(ColorThresholdsSchema.safeParse([0, 1, 2, 3, 4, 5, 6]).success).toBe(false);
  });

  it('sizes the sequence to the bin count', () => {
    expect(colorThresholdsSchema(3).safeParse([0, 0.5, 0.5, 1]).success).toBe(true);
    expect(colorThresholdsSchema(3).safeParse([0, 1, 2, 3, 4, 5]).success).toBe(false);
  });
});

describe('defaultConfig', () => {
  it('returns rendering defaults', () => {
    const config = defaultConfig();
    expect(config.hexSize).toBe(6);
    expect(config.spacingFactor).toBe(1.1);
    expect(config.margin).toBe(10);
    expect(config.regionOrder).toEqual(['ME', 'LO', 'LOP']);
    expect(config.format).toBe('svg');
    expect(config.dbPath).toMatch(/\.eyemap\/columns\.db$/);
  });

  it('applies overrides', () => {
    const config = defaultConfig({ hexSize: 12, embed: 'inline' });
    expect(config.hexSize).toBe(12);
    expect(config.embed).toBe('inline');
    expect(config.margin).toBe(10);
  });
});
