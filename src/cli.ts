import { readFileSync } from 'node:fs';
import { Command, CommanderError, Option } from 'commander';
import { z } from 'zod';
import { buildRegionUniverse, toColumnData } from './columns.js';
import { ColumnStore } from './db.js';
import { buildEyemapScenes, generateEyemapImages, generateEyemaps } from './eyemap.js';
import type { EyemapGrids, EyemapRequest } from './eyemap.js';
import { exportEyemaps } from './exporter.js';
import { checkConfig } from './preflight.js';
import { buildScales } from './stats.js';
import {
  DatasetRecordSchema, defaultConfig, METRICS, OUTPUT_FORMATS, parseSideSelection,
} from './types.js';
import type { ColumnData, Metric } from './types.js';

const DEFAULT_DATASET = 'default';

interface ImportOpts { dataset: string; db?: string; replace: boolean }

interface RenderOpts {
  dataset: string;
  side: string;
  metric: string;
  format: string;
  scale: string;
  inline: boolean;
  output: string;
  hexSize?: string;
  spacing?: string;
  db?: string;
  verbose: boolean;
}

interface ListOpts { dataset?: string; db?: string }

function storeFor(dbPath: string | undefined): ColumnStore {
  return new ColumnStore(defaultConfig(dbPath ? { dbPath } : {}).dbPath);
}

function errorMessage(err: unknown): string {
  if (err instanceof z.ZodError) {
    return err.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
  }
  return err instanceof Error ? err.message : String(err);
}

/** Group raw dataset records by entity, validating each one. */
export function parseDatasetFile(text: string): Map<string, ColumnData[]> {
  const records = z.array(DatasetRecordSchema).parse(JSON.parse(text));
  const byEntity = new Map<string, ColumnData[]>();
  for (const record of records) {
    const list = byEntity.get(record.entity) ?? [];
    list.push(toColumnData(record));
    byEntity.set(record.entity, list);
  }
  return byEntity;
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('eyemap')
    .description('Render hexagonal column eyemaps from per-entity column records')
    .version('0.1.0')
    .exitOverride();

  // ── IMPORT ─────────────────────────────────────────────────────────────────

  program
    .command('import')
    .description('Load a JSON array of column records into the local store')
    .argument('<file>', 'JSON file with records carrying an "entity" field')
    .option('--dataset <name>', 'Dataset snapshot name', DEFAULT_DATASET)
    .option('--replace', 'Drop existing columns of each imported entity first', false)
    .option('--db <path>', 'DB path')
    .action((file: string, opts: ImportOpts) => {
      const store = storeFor(opts.db);
      try {
        const byEntity = parseDatasetFile(readFileSync(file, 'utf8'));
        let total = 0;
        for (const [entity, records] of byEntity) {
          total += opts.replace
            ? store.replaceEntity(opts.dataset, entity, records)
            : store.upsertRecords(opts.dataset, entity, records);
        }
        process.stderr.write(`✓ ${total} columns for ${byEntity.size} entities → ${opts.dataset}\n`);
      } catch (err) {
        process.stderr.write(`❌ Import failed: ${errorMessage(err)}\n`);
        process.exitCode = 1;
      } finally {
        store.close();
      }
    });

  // ── RENDER ─────────────────────────────────────────────────────────────────

  program
    .command('render')
    .description('Render eyemaps for one entity')
    .argument('<entity>', 'Entity name')
    .option('--dataset <name>', 'Dataset snapshot name', DEFAULT_DATASET)
    .option('--side <side>', 'left | right | middle | combined', 'combined')
    .addOption(new Option('--metric <metric>', 'Metric to render').choices([...METRICS, 'all']).default('all'))
    .addOption(new Option('--format <format>', 'Output format').choices([...OUTPUT_FORMATS]).default('svg'))
    .addOption(new Option('--scale <policy>', 'Colour normalization').choices(['regional', 'global']).default('regional'))
    .option('--inline', 'Print content as JSON instead of writing files', false)
    .option('-o, --output <dir>', 'Output dir', defaultConfig().outputDir)
    .option('--hex-size <n>', 'Hexagon radius in px')
    .option('--spacing <f>', 'Spacing factor between hexagons')
    .option('--db <path>', 'DB path')
    .option('-v, --verbose', 'Print per-grid state counts', false)
    .action(async (entity: string, opts: RenderOpts) => {
      const config = checkConfig(defaultConfig({
        outputDir: opts.output,
        format: z.enum(OUTPUT_FORMATS).parse(opts.format),
        embed: opts.inline ? 'inline' : 'file',
        verbose: opts.verbose,
        ...(opts.hexSize ? { hexSize: parseFloat(opts.hexSize) } : {}),
        ...(opts.spacing ? { spacingFactor: parseFloat(opts.spacing) } : {}),
        ...(opts.db ? { dbPath: opts.db } : {}),
      }));
      const store = new ColumnStore(config.dbPath);

      try {
        const side = parseSideSelection(opts.side);
        const metrics: readonly Metric[] = opts.metric === 'all' ? METRICS : [z.enum(METRICS).parse(opts.metric)];
        const datasetRecords = store.getDatasetRecords(opts.dataset);
        if (datasetRecords.length === 0) {
          throw new Error(`No columns stored for dataset "${opts.dataset}"`);
        }
        const records = store.getEntityRecords(opts.dataset, entity);
        if (records.length === 0) {
          process.stderr.write(`⚠ No columns for "${entity}" in ${opts.dataset}; every column renders without data\n`);
        }

        const request: EyemapRequest = {
          entity,
          records,
          universe: buildRegionUniverse(datasetRecords),
          scales: buildScales(datasetRecords, { policy: opts.scale === 'global' ? 'global' : 'regional' }),
          side,
          metrics,
          config,
        };
        const grids: EyemapGrids<string | Buffer> = config.format === 'png'
          ? await generateEyemapImages(request)
          : generateEyemaps(request);

        const result = exportEyemaps(entity, grids, { outputDir: config.outputDir, embed: config.embed });
        if (config.embed === 'inline') {
          process.stdout.write(JSON.stringify(result, null, 2) + '\n');
        } else {
          for (const byMetric of Object.values(result)) {
            for (const path of Object.values(byMetric)) process.stderr.write(`✓ ${path}\n`);
          }
          process.stderr.write(`✓ Exported to: ${config.outputDir}\n`);
        }
        if (config.verbose) {
          for (const scene of buildEyemapScenes(request)) {
            const { has_data, exists_no_data, not_in_region } = scene.counts;
            process.stderr.write(
              `   ${scene.region} ${scene.side} ${scene.metric}: ` +
              `data:${has_data} empty:${exists_no_data} absent:${not_in_region}\n`
            );
          }
        }
      } catch (err) {
        process.stderr.write(`❌ Render failed: ${errorMessage(err)}\n`);
        process.exitCode = 1;
      } finally {
        store.close();
      }
    });

  // ── LISTINGS ───────────────────────────────────────────────────────────────

  program
    .command('entities')
    .description('List stored entities')
    .option('--dataset <name>', 'Only entities of this dataset')
    .option('--db <path>', 'DB path')
    .action((opts: ListOpts) => {
      const store = storeFor(opts.db);
      try {
        const entities = store.listEntities(opts.dataset);
        if (entities.length === 0) process.stderr.write('No entities stored.\n');
        for (const entity of entities) process.stdout.write(`${entity}\n`);
      } finally {
        store.close();
      }
    });

  program
    .command('datasets')
    .description('List stored dataset snapshots')
    .option('--db <path>', 'DB path')
    .action((opts: ListOpts) => {
      const store = storeFor(opts.db);
      try {
        const datasets = store.listDatasets();
        if (datasets.length === 0) process.stderr.write('No datasets stored.\n');
        for (const dataset of datasets) {
          const stats = store.getStats(dataset);
          process.stdout.write(`${dataset}  entities:${stats.entities} columns:${stats.columns}\n`);
        }
      } finally {
        store.close();
      }
    });

  return program;
}

// ── Parse ──────────────────────────────────────────────────────────────────

export async function main(argv: string[] = process.argv): Promise<void> {
  try {
    await buildProgram().parseAsync(argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      const clean = err.code === 'commander.helpDisplayed' || err.code === 'commander.version';
      process.exitCode = clean ? 0 : 2;
      return;
    }
    process.stderr.write(`❌ ${errorMessage(err)}\n`);
    process.exitCode = 1;
  }
}
