import sharp from 'sharp';

/** PNG signature bytes. */
export const PNG_MAGIC = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

/**
 * Encode SVG markup as PNG. `density` is the DPI librsvg renders at; 72 keeps
 * the SVG's own pixel size, 144 doubles it.
 */
export async function rasterize(svg: string, density = 144): Promise<Buffer> {
  return sharp(Buffer.from(svg, 'utf8'), { density }).png().toBuffer();
}

export function isPng(data: Buffer): boolean {
  return data.length >= PNG_MAGIC.length && data.subarray(0, PNG_MAGIC.length).equals(PNG_MAGIC);
}

export function toDataUri(png: Buffer): string {
  return `data:image/png;base64,${png.toString('base64')}`;
}
