import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { parseGridKey } from './eyemap.js';
import type { EyemapGrids } from './eyemap.js';
import { toDataUri } from './raster.js';
import type { Metric, OutputFormat, SideTag } from './types.js';

export const EYEMAP_DIR = 'eyemaps';

export interface ExportOptions {
  outputDir: string;
  /** `inline` returns the content instead of writing files. */
  embed?: 'file' | 'inline';
}

/**
 * Characters outside `[A-Za-z0-9_]` become `_`, so distinct names such as
 * `T4.a` and `T4_a` share a file name. Exports of two such entities into the
 * same directory overwrite each other.
 */
function sanitize(id: string): string {
  return id.replace(/[^a-zA-Z0-9_]/g, '_');
}

export function eyemapFilename(
  entity: string,
  region: string,
  metric: Metric,
  side: SideTag,
  format: OutputFormat,
): string {
  return `${sanitize(entity)}_${sanitize(region)}_${metric}_${side}.${format}`;
}

function formatOf(content: string | Buffer): OutputFormat {
  return typeof content === 'string' ? 'svg' : 'png';
}

function inlineContent(content: string | Buffer): string {
  return typeof content === 'string' ? content : toDataUri(content);
}

// ── exportEyemaps ─────────────────────────────────────────────────────────────

/**
 * Write every grid to `<outputDir>/eyemaps/` and return the paths relative to
 * `outputDir`, keyed like the input. Inline mode returns SVG markup or a PNG
 * data URI and touches no file. Throws before writing anything when two grids
 * would land on the same file name.
 */
export function exportEyemaps(
  entity: string,
  grids: EyemapGrids<string | Buffer>,
  options: ExportOptions,
): EyemapGrids<string> {
  const result: EyemapGrids<string> = {};
  const inline = options.embed === 'inline';
  if (!inline) {
    assertDistinctFilenames(entity, grids);
    mkdirSync(join(options.outputDir, EYEMAP_DIR), { recursive: true });
  }

  for (const [key, byMetric] of Object.entries(grids)) {
    const { region, side } = parseGridKey(key);
    const out: Partial<Record<Metric, string>> = {};
    for (const [metric, content] of metricEntries(byMetric)) {
      if (inline) {
        out[metric] = inlineContent(content);
        continue;
      }
      const relative = join(EYEMAP_DIR, eyemapFilename(entity, region, metric, side, formatOf(content)));
      writeFileSync(join(options.outputDir, relative), content);
      out[metric] = relative;
    }
    result[key] = out;
  }
  return result;
}

function assertDistinctFilenames(entity: string, grids: EyemapGrids<string | Buffer>): void {
  const owners = new Map<string, string>();
  for (const [key, byMetric] of Object.entries(grids)) {
    const { region, side } = parseGridKey(key);
    for (const [metric, content] of metricEntries(byMetric)) {
      const name = eyemapFilename(entity, region, metric, side, formatOf(content));
      const owner = owners.get(name);
      if (owner !== undefined) {
        throw new Error(`Grids "${owner}" and "${key}" both export to ${name}`);
      }
      owners.set(name, key);
    }
  }
}

function metricEntries<T>(byMetric: Partial<Record<Metric, T>>): Array<[Metric, T]> {
  const entries: Array<[Metric, T]> = [];
  const synapses = byMetric.synapse_density;
  const cells = byMetric.cell_count;
  if (synapses !== undefined) entries.push(['synapse_density', synapses]);
  if (cells !== undefined) entries.push(['cell_count', cells]);
  return entries;
}
