import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { toColumnData } from './columns.js';
import type { ColumnData } from './types.js';

const SCHEMA = `
PRAGMA journal_mode = WAL;
PRAGMA busy_timeout = 5000;

CREATE TABLE IF NOT EXISTS columns (
  dataset TEXT NOT NULL,
  entity TEXT NOT NULL,
  region TEXT NOT NULL,
  side TEXT NOT NULL CHECK (side IN ('L','R','M')),
  hex1 INTEGER NOT NULL,
  hex2 INTEGER NOT NULL,
  total_synapses REAL NOT NULL DEFAULT 0,
  neuron_count INTEGER NOT NULL DEFAULT 0,
  layers TEXT NOT NULL DEFAULT '[]',
  imported_at TEXT NOT NULL,
  PRIMARY KEY (dataset, entity, region, side, hex1, hex2)
);

CREATE INDEX IF NOT EXISTS idx_columns_dataset ON columns(dataset);
CREATE INDEX IF NOT EXISTS idx_columns_entity ON columns(dataset, entity);
`;

// ── Row schemas ──────────────────────────────

const ColumnRowSchema = z.object({
  region: z.string(),
  side: z.string(),
  hex1: z.number().int(),
  hex2: z.number().int(),
  total_synapses: z.number(),
  neuron_count: z.number(),
  layers: z.string(),
});

const NameRowSchema = z.object({ name: z.string() });
const CountRowSchema = z.object({ c: z.number() });

function rowToColumn(row: unknown): ColumnData {
  const r = ColumnRowSchema.parse(row);
  return toColumnData({
    region: r.region,
    side: r.side,
    hex1: r.hex1,
    hex2: r.hex2,
    totalSynapses: r.total_synapses,
    neuronCount: r.neuron_count,
    layers: JSON.parse(r.layers),
  });
}

export interface StoreStats {
  datasets: number;
  entities: number;
  columns: number;
}

/**
 * Local cache of per-entity column records, grouped by dataset snapshot.
 */
export class ColumnStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') mkdirSync(dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('busy_timeout = 5000');
    this.migrate();
  }

  private migrate(): void {
    const version = z.number().parse(this.db.pragma('user_version', { simple: true }));
    if (version === 0) {
      this.db.exec(SCHEMA);
      this.db.pragma('user_version = 1');
    }
  }

  close(): void {
    this.db.pragma('optimize');
    this.db.close();
  }

  // ── Writes ──────────────────────────────

  /** Insert or replace an entity's columns; returns the number written. */
  upsertRecords(dataset: string, entity: string, records: readonly ColumnData[]): number {
    const stmt = this.db.prepare(`
      INSERT OR REPLACE INTO columns
        (dataset, entity, region, side, hex1, hex2, total_synapses, neuron_count, layers, imported_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const now = new Date().toISOString();
    const insertAll = this.db.transaction((rows: readonly ColumnData[]) => {
      for (const c of rows) {
        stmt.run(
          dataset, entity, c.region, c.side, c.coordinate.hex1, c.coordinate.hex2,
          c.totalSynapses, c.neuronCount, JSON.stringify(c.layers), now,
        );
      }
      return rows.length;
    });
    return insertAll(records);
  }

  deleteEntity(dataset: string, entity: string): number {
    return this.db.prepare('DELETE FROM columns WHERE dataset = ? AND entity = ?').run(dataset, entity).changes;
  }

  /** Swap the entity's columns for `records`; a failed insert keeps the old rows. */
  replaceEntity(dataset: string, entity: string, records: readonly ColumnData[]): number {
    const replace = this.db.transaction((rows: readonly ColumnData[]) => {
      this.deleteEntity(dataset, entity);
      return this.upsertRecords(dataset, entity, rows);
    });
    return replace(records);
  }

  // ── Reads ───────────────────────────────

  getEntityRecords(dataset: string, entity: string): ColumnData[] {
    return this.db.prepare(
      'SELECT * FROM columns WHERE dataset = ? AND entity = ? ORDER BY rowid'
    ).all(dataset, entity).map(rowToColumn);
  }

  /** Every entity's columns in the dataset, the input for universe and scales. */
  getDatasetRecords(dataset: string): ColumnData[] {
    return this.db.prepare('SELECT * FROM columns WHERE dataset = ? ORDER BY rowid').all(dataset).map(rowToColumn);
  }

  listEntities(dataset?: string): string[] {
    const rows = dataset
      ? this.db.prepare('SELECT DISTINCT entity AS name FROM columns WHERE dataset = ? ORDER BY entity').all(dataset)
      : this.db.prepare('SELECT DISTINCT entity AS name FROM columns ORDER BY entity').all();
    return rows.map(r => NameRowSchema.parse(r).name);
  }

  listDatasets(): string[] {
    return this.db.prepare('SELECT DISTINCT dataset AS name FROM columns ORDER BY dataset').all()
      .map(r => NameRowSchema.parse(r).name);
  }

  getStats(dataset?: string): StoreStats {
    const where = dataset ? ' WHERE dataset = ?' : '';
    const params = dataset ? [dataset] : [];
    const count = (sql: string): number => CountRowSchema.parse(this.db.prepare(sql + where).get(...params)).c;
    return {
      datasets: count('SELECT COUNT(DISTINCT dataset) AS c FROM columns'),
      entities: count('SELECT COUNT(DISTINCT dataset || char(0) || entity) AS c FROM columns'),
      columns: count('SELECT COUNT(*) AS c FROM columns'),
    };
  }
}
