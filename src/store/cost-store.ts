/**
 * Cost Store
 *
 * SQLite-backed time-series store for daily costs and resource snapshots.
 * Uses better-sqlite3 for synchronous, fast local storage.
 * Database lives at ~/.costguard/costs.db by default.
 *
 * A CostStore is also a TimeSeriesSession: createSqliteSource() opens one
 * store per detector session so sessions never share a connection.
 */

import Database from 'better-sqlite3';
import type { EntityGrouping, TimeSeriesSession, TimeSeriesSource } from './types.js';
import { TimeSeriesUnavailableError } from './types.js';
import { ensureConfigDir, resolveStorePath } from '../config/paths.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/** One day of spend for a service (and optionally an account). */
export interface DailyCostPoint {
  service: string;
  /** YYYY-MM-DD (UTC) */
  day: string;
  cost: number;
  account?: string;
}

/** Point-in-time state of one compute resource. */
export interface ResourceSnapshotPoint {
  instanceId: string;
  service: string;
  account: string;
  region: string;
  instanceType: string;
  state: string;
  cpuUtilization: number;
  cost: number;
  wasteScore: number;
  /** ISO 8601 */
  observedAt: string;
}

export interface CostStoreOptions {
  now?: () => Date;
}

export class CostStore implements TimeSeriesSession {
  private db: Database.Database;
  private now: () => Date;

  constructor(dbPath?: string, options: CostStoreOptions = {}) {
    if (!dbPath) {
      ensureConfigDir();
    }
    this.db = new Database(resolveStorePath(dbPath));
    this.db.pragma('journal_mode = WAL');
    this.now = options.now ?? (() => new Date());
    this.migrate();
  }

  // ─── Writes ───────────────────────────────────────────────

  /**
   * Upsert daily cost points. Returns the number written.
   */
  recordDailyCosts(points: DailyCostPoint[]): number {
    const stmt = this.db.prepare(`
      INSERT INTO daily_costs (service, account, day, cost)
      VALUES (@service, @account, @day, @cost)
      ON CONFLICT (service, account, day) DO UPDATE SET cost = excluded.cost
    `);

    const insertMany = this.db.transaction((items: DailyCostPoint[]) => {
      for (const p of items) {
        stmt.run({ service: p.service, account: p.account ?? '', day: p.day, cost: p.cost });
      }
      return items.length;
    });

    return insertMany(points);
  }

  /**
   * Append resource snapshots. Returns the number written.
   */
  recordResourceSnapshots(snapshots: ResourceSnapshotPoint[]): number {
    const stmt = this.db.prepare(`
      INSERT INTO resource_snapshots (
        instance_id, service, account, region, instance_type,
        state, cpu_utilization, cost, waste_score, observed_at
      ) VALUES (
        @instanceId, @service, @account, @region, @instanceType,
        @state, @cpuUtilization, @cost, @wasteScore, @observedAt
      )
    `);

    const insertMany = this.db.transaction((items: ResourceSnapshotPoint[]) => {
      for (const s of items) {
        stmt.run({ ...s });
      }
      return items.length;
    });

    return insertMany(snapshots);
  }

  /**
   * Write daily costs and snapshots in one transaction: either both land or neither.
   */
  recordExport(
    points: DailyCostPoint[],
    snapshots: ResourceSnapshotPoint[]
  ): { dailyCosts: number; resources: number } {
    const writeAll = this.db.transaction(() => ({
      dailyCosts: this.recordDailyCosts(points),
      resources: this.recordResourceSnapshots(snapshots),
    }));
    return writeAll();
  }

  // ─── Queries ──────────────────────────────────────────────

  /**
   * Daily totals per service for the last windowDays days (today included),
   * oldest first. Days after today are ignored.
   */
  queryDailyCosts(grouping: EntityGrouping, windowDays: number): Promise<Map<string, number[]>> {
    return this.query(`daily costs by ${grouping}`, () => {
      const now = this.now();
      const since = toDay(new Date(now.getTime() - (windowDays - 1) * DAY_MS));
      const rows = this.db
        .prepare<[string, string], DailyCostRow>(
          `SELECT service, day, SUM(cost) AS cost FROM daily_costs
           WHERE day >= ? AND day <= ?
           GROUP BY service, day
           ORDER BY service, day`
        )
        .all(since, toDay(now));

      const series = new Map<string, number[]>();
      for (const row of rows) {
        const costs = series.get(row.service) ?? [];
        costs.push(row.cost);
        series.set(row.service, costs);
      }
      return series;
    });
  }

  /**
   * Latest snapshot per resource within the window, kept only when its
   * waste score is above minWasteScore. Highest waste first.
   */
  queryResourceSnapshots(minWasteScore: number, windowHours: number): Promise<unknown[]> {
    return this.query('resource snapshots', () => {
      const since = new Date(this.now().getTime() - windowHours * 60 * 60 * 1000).toISOString();
      return this.db
        .prepare<[string, number], SnapshotRow>(
          `SELECT instance_id, service, account, region, instance_type, state,
                  cpu_utilization, cost, waste_score, observed_at
           FROM (
             SELECT *, ROW_NUMBER() OVER (
               PARTITION BY instance_id ORDER BY observed_at DESC, id DESC
             ) AS rn
             FROM resource_snapshots
             WHERE observed_at >= ?
           )
           WHERE rn = 1 AND waste_score > ?
           ORDER BY waste_score DESC, instance_id`
        )
        .all(since, minWasteScore);
    });
  }

  /**
   * Close the database connection.
   */
  close(): void {
    this.db.close();
  }

  private query<T>(label: string, run: () => T): Promise<T> {
    try {
      return Promise.resolve(run());
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return Promise.reject(
        new TimeSeriesUnavailableError(`Query for ${label} failed: ${message}`, error)
      );
    }
  }

  // ─── Schema Migration ─────────────────────────────────────

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS daily_costs (
        id        INTEGER PRIMARY KEY AUTOINCREMENT,
        service   TEXT NOT NULL,
        account   TEXT NOT NULL DEFAULT '',
        day       TEXT NOT NULL,
        cost      REAL NOT NULL,
        UNIQUE (service, account, day)
      );

      CREATE TABLE IF NOT EXISTS resource_snapshots (
        id               INTEGER PRIMARY KEY AUTOINCREMENT,
        instance_id      TEXT NOT NULL,
        service          TEXT NOT NULL DEFAULT 'EC2',
        account          TEXT NOT NULL DEFAULT '',
        region           TEXT NOT NULL DEFAULT '',
        instance_type    TEXT NOT NULL,
        state            TEXT NOT NULL,
        cpu_utilization  REAL NOT NULL,
        cost             REAL NOT NULL,
        waste_score      INTEGER NOT NULL,
        observed_at      TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_daily_costs_day
        ON daily_costs(day);
      CREATE INDEX IF NOT EXISTS idx_resource_snapshots_observed
        ON resource_snapshots(observed_at, instance_id);
    `);
  }
}

/**
 * A source that opens a fresh store connection per session.
 * Open failures surface as TimeSeriesUnavailableError.
 */
export function createSqliteSource(dbPath?: string, options: CostStoreOptions = {}): TimeSeriesSource {
  return {
    open: () => {
      try {
        return Promise.resolve(new CostStore(dbPath, options));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return Promise.reject(
          new TimeSeriesUnavailableError(`Cannot open cost store: ${message}`, error)
        );
      }
    },
  };
}

/** YYYY-MM-DD in UTC. */
export function toDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

// ─── Row Types ──────────────────────────────────────────────

interface DailyCostRow {
  service: string;
  day: string;
  cost: number;
}

interface SnapshotRow {
  instance_id: string;
  service: string;
  account: string;
  region: string;
  instance_type: string;
  state: string;
  cpu_utilization: number;
  cost: number;
  waste_score: number;
  observed_at: string;
}
