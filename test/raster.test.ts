import { describe, it, expect } from 'vitest';
import sharp from 'sharp';
import { rasterize, isPng, toDataUri } from '../src/raster.js';

const SVG = '<svg xmlns="http://www.w3.org/2000/svg" width="20" height="10"><rect width="20" height="10" fill="#a50f15"/></svg>';

describe('rasterize', () => {
  it('encodes SVG as PNG at the SVG size for 72 dpi', async () => {
    const png = await rasterize(SVG, 72);
    expect(isPng(png)).toBe(true);
    const meta = await sharp(png).metadata();
    expect(meta.format).toBe('png');
    expect(meta.width).toBe(20);
    expect(meta.height).toBe(10);
  });

  it('scales with density', async () => {
    const meta = await sharp(await rasterize(SVG, 144)).metadata();
    expect(meta.width).toBe(40);
  });
});

describe('isPng', () => {
  it('checks the signature', () => {
    expect(isPng(Buffer.from('<svg/>'))).toBe(false);
    expect(isPng(Buffer.alloc(0))).toBe(false);
  });
});

describe('toDataUri', () => {
  it('base64-encodes the buffer', () => {
    expect(toDataUri(Buffer.from('abc'))).toBe('data:image/png;base64,YWJj');
  });
});
