import * as fs from 'fs';
import * as path from 'path';
import initSqlJs, { Database, SqlValue } from 'sql.js';
import { LoggerLike } from '../common/logger';
import { Validator, z } from '../security';
import { CheckRunRecord, ComplianceStatus, FindingValue, ResourceFinding, ScanReport } from '../types';
import { statusIdFor } from '../service/result-serializer';

const StoredResultRowSchema = z.object({
  scan_id: z.string(),
  tenant_id: z.string(),
  check_id: z.string(),
  category: z.enum(['L1', 'L2'] as const),
  status: z.enum(['Pass', 'Fail', 'Error', 'Manual'] as const),
  status_id: z.number().int(),
  start_time: z.string(),
  end_time: z.string(),
  duration: z.number(),
  details: z.string(),
  error: z.optional(z.string()),
  title: z.string(),
  recommendation_id: z.string(),
});

const SummaryRowSchema = z.object({
  total: z.number().int(),
  passed: z.optional(z.number().int()),
  failed: z.optional(z.number().int()),
  errors: z.optional(z.number().int()),
  manual: z.optional(z.number().int()),
});

const ScanIdRowSchema = z.object({
  scan_id: z.string(),
});

export interface StoredResult {
  scanId: string;
  tenantId: string;
  checkId: string;
  category: 'L1' | 'L2';
  status: ComplianceStatus;
  statusId: number;
  startTime: string;
  endTime: string;
  duration: number;
  details: ResourceFinding[];
  error?: string;
  title: string;
  recommendationId: string;
}

export interface ScanSummary {
  total: number;
  passed: number;
  failed: number;
  errors: number;
  manual: number;
}

function isFindingValue(value: unknown): value is FindingValue {
  return value === null
    || typeof value === 'string'
    || typeof value === 'number'
    || typeof value === 'boolean'
    || (Array.isArray(value) && value.every(v => typeof v === 'string'));
}

export function parseFindings(json: string): ResourceFinding[] {
  const parsed: unknown = JSON.parse(json);
  if (!Array.isArray(parsed)) {
    throw new Error('Stored details are not an array');
  }

  return parsed.map((item: unknown, index) => {
    if (typeof item !== 'object' || item === null) {
      throw new Error(`Stored finding [${index}] is not an object`);
    }
    const fields = new Map(Object.entries(item));
    const resourceName = fields.get('ResourceName');
    const isCompliant = fields.get('IsCompliant');
    if (typeof resourceName !== 'string' || !(isCompliant === null || typeof isCompliant === 'boolean')) {
      throw new Error(`Stored finding [${index}] is missing ResourceName or IsCompliant`);
    }

    const finding: ResourceFinding = { ResourceName: resourceName, IsCompliant: isCompliant };
    for (const [key, value] of fields) {
      if (isFindingValue(value)) {
        finding[key] = value;
      }
    }
    return finding;
  });
}

// Persists scan reports and their per-check results in SQLite (sql.js, written back to dbPath)
export class ResultStore {
  private db: Database;
  private dbPath: string | null;
  private logger: LoggerLike;
  private writes: Promise<void> = Promise.resolve();

  private constructor(db: Database, dbPath: string | null, logger: LoggerLike) {
    this.db = db;
    this.dbPath = dbPath;
    this.logger = logger;
  }

  static async open(dbPath: string, logger: LoggerLike): Promise<ResultStore> {
    const SQL = await initSqlJs();
    const inMemory = dbPath === ':memory:';
    const db = !inMemory && fs.existsSync(dbPath)
      ? new SQL.Database(fs.readFileSync(dbPath))
      : new SQL.Database();
    const store = new ResultStore(db, inMemory ? null : dbPath, logger);
    await store.initialize();
    return store;
  }

  private async initialize(): Promise<void> {
    await this.run(`
      CREATE TABLE IF NOT EXISTS cis_scans (
        scan_id TEXT PRIMARY KEY,
        tenant_id TEXT NOT NULL,
        started_at TEXT NOT NULL,
        completed_at TEXT NOT NULL,
        duration_ms INTEGER NOT NULL,
        total_checks INTEGER NOT NULL,
        passed INTEGER NOT NULL,
        failed INTEGER NOT NULL,
        errors INTEGER NOT NULL,
        manual INTEGER NOT NULL,
        compliance_percentage REAL NOT NULL
      )
    `);

    await this.run(`
      CREATE TABLE IF NOT EXISTS cis_results (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        scan_id TEXT NOT NULL,
        tenant_id TEXT NOT NULL,
        check_id TEXT NOT NULL,
        category TEXT NOT NULL,
        status TEXT NOT NULL,
        status_id INTEGER NOT NULL,
        start_time TEXT NOT NULL,
        end_time TEXT NOT NULL,
        duration REAL NOT NULL,
        details TEXT NOT NULL,
        error TEXT,
        title TEXT NOT NULL,
        recommendation_id TEXT NOT NULL,
        metadata TEXT NOT NULL
      )
    `);

    await this.run(`CREATE INDEX IF NOT EXISTS idx_cis_results_scan ON cis_results(scan_id, check_id)`);
    await this.run(`CREATE INDEX IF NOT EXISTS idx_cis_results_status ON cis_results(tenant_id, status)`);
    await this.run(`CREATE INDEX IF NOT EXISTS idx_cis_scans_tenant ON cis_scans(tenant_id, completed_at)`);

    this.logger.info('Result store initialized');
  }

  async saveReport(report: ScanReport): Promise<void> {
    const write = this.writes.then(() => this.writeReport(report));
    // Keep the queue usable after a failed write; the caller still receives the rejection
    this.writes = write.catch(() => undefined);
    return write;
  }

  private async writeReport(report: ScanReport): Promise<void> {
    await this.run('BEGIN TRANSACTION');
    try {
      await this.run(
        `INSERT INTO cis_scans (scan_id, tenant_id, started_at, completed_at, duration_ms, total_checks,
          passed, failed, errors, manual, compliance_percentage)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [
          report.ScanId, report.TenantId, report.StartedAt, report.CompletedAt, report.DurationMs,
          report.TotalChecks, report.Passed, report.Failed, report.Errors, report.Manual,
          report.CompliancePercentage,
        ],
      );

      for (const result of report.Results) {
        await this.insertResult(report, result);
      }

      await this.run('COMMIT');
    } catch (error) {
      await this.run('ROLLBACK');
      throw error;
    }

    await this.persist();
    this.logger.info('Stored scan report', { scan_id: report.ScanId, results: report.Results.length });
  }

  private async insertResult(report: ScanReport, result: CheckRunRecord): Promise<void> {
    await this.run(
      `INSERT INTO cis_results (scan_id, tenant_id, check_id, category, status, status_id, start_time, end_time,
        duration, details, error, title, recommendation_id, metadata)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        report.ScanId, report.TenantId, result.CheckId, result.Category, result.Status,
        statusIdFor(result.Status), result.StartTime, result.EndTime, result.Duration,
        JSON.stringify(result.Details), result.Error ?? null, result.Metadata.Title,
        result.Metadata.RecommendationId, JSON.stringify(result.Metadata),
      ],
    );
  }

  async listResults(scanId: string, status?: ComplianceStatus): Promise<StoredResult[]> {
    const sql = status
      ? 'SELECT * FROM cis_results WHERE scan_id = ? AND status = ? ORDER BY check_id'
      : 'SELECT * FROM cis_results WHERE scan_id = ? ORDER BY check_id';
    const rows = await this.all(sql, status ? [scanId, status] : [scanId], StoredResultRowSchema);

    return rows.map(row => ({
      scanId: row.scan_id,
      tenantId: row.tenant_id,
      checkId: row.check_id,
      category: row.category,
      status: row.status,
      statusId: row.status_id,
      startTime: row.start_time,
      endTime: row.end_time,
      duration: row.duration,
      details: parseFindings(row.details),
      error: row.error,
      title: row.title,
      recommendationId: row.recommendation_id,
    }));
  }

  async getScanSummary(scanId: string): Promise<ScanSummary> {
    const rows = await this.all(
      `SELECT COUNT(*) AS total,
         SUM(CASE WHEN status = 'Pass' THEN 1 ELSE 0 END) AS passed,
         SUM(CASE WHEN status = 'Fail' THEN 1 ELSE 0 END) AS failed,
         SUM(CASE WHEN status = 'Error' THEN 1 ELSE 0 END) AS errors,
         SUM(CASE WHEN status = 'Manual' THEN 1 ELSE 0 END) AS manual
       FROM cis_results WHERE scan_id = ?`,
      [scanId],
      SummaryRowSchema,
    );
    const row = rows[0];

    return {
      total: row?.total ?? 0,
      passed: row?.passed ?? 0,
      failed: row?.failed ?? 0,
      errors: row?.errors ?? 0,
      manual: row?.manual ?? 0,
    };
  }

  async latestScanId(tenantId: string): Promise<string | undefined> {
    const rows = await this.all(
      'SELECT scan_id FROM cis_scans WHERE tenant_id = ? ORDER BY completed_at DESC LIMIT 1',
      [tenantId],
      ScanIdRowSchema,
    );
    return rows[0]?.scan_id;
  }

  async close(): Promise<void> {
    await this.writes;
    this.db.close();
  }

  private async persist(): Promise<void> {
    if (this.dbPath === null) return;
    await fs.promises.mkdir(path.dirname(this.dbPath), { recursive: true });
    await fs.promises.writeFile(this.dbPath, Buffer.from(this.db.export()));
  }

  private async run(sql: string, params: SqlValue[] = []): Promise<void> {
    this.db.run(sql, params);
  }

  private async all<T>(sql: string, params: SqlValue[], row: Validator<T>): Promise<T[]> {
    const statement = this.db.prepare(sql);
    const rows: unknown[] = [];
    try {
      statement.bind(params);
      while (statement.step()) {
        rows.push(statement.getAsObject());
      }
    } finally {
      statement.free();
    }

    const parsed = z.array(row).safeParse(rows);
    if (!parsed.success) {
      throw new Error(`Unexpected row shape: ${parsed.error}`);
    }
    return parsed.data;
  }
}
