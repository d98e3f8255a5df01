import {
  MAX_HEX_SIZE, MAX_SPACING_FACTOR, MIN_HEX_SIZE, MIN_SPACING_FACTOR,
} from './types.js';
import type { EyemapConfig } from './types.js';

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function checkHexSize(hexSize: number): number {
  if (!Number.isFinite(hexSize) || hexSize < MIN_HEX_SIZE || hexSize > MAX_HEX_SIZE) {
    const clamped = Number.isFinite(hexSize) ? clamp(hexSize, MIN_HEX_SIZE, MAX_HEX_SIZE) : MIN_HEX_SIZE;
    process.stderr.write(
      `⚠ Hex size must be between ${MIN_HEX_SIZE} and ${MAX_HEX_SIZE}, using ${clamped}\n`
    );
    return clamped;
  }
  return hexSize;
}

export function checkSpacingFactor(spacingFactor: number): number {
  if (!Number.isFinite(spacingFactor) || spacingFactor < MIN_SPACING_FACTOR || spacingFactor > MAX_SPACING_FACTOR) {
    const clamped = Number.isFinite(spacingFactor)
      ? clamp(spacingFactor, MIN_SPACING_FACTOR, MAX_SPACING_FACTOR)
      : MIN_SPACING_FACTOR;
    process.stderr.write(
      `⚠ Spacing factor must be between ${MIN_SPACING_FACTOR} and ${MAX_SPACING_FACTOR}, using ${clamped}\n`
    );
    return clamped;
  }
  return spacingFactor;
}

/** Apply every range check to a config, returning a corrected copy. */
export function checkConfig(config: EyemapConfig): EyemapConfig {
  return {
    ...config,
    hexSize: checkHexSize(config.hexSize),
    spacingFactor: checkSpacingFactor(config.spacingFactor),
  };
}
