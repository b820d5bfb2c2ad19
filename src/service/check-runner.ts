// check-runner.ts - Runs a selection of checks against one tenant session and builds a report
import * as crypto from 'crypto';
import { LoggerLike } from '../common/logger';
import { errorMessage } from '../common/errors';
import { TenantSession } from '../session/tenant-session';
import {
  CheckRunRecord,
  ComplianceResult,
  DriftEvent,
  ScanProgressEvent,
  ScanReport,
} from '../types';
import { ComplianceCheck } from './compliance-check';
import { statusIdFor } from './result-serializer';

export type ScanProgressCallback = (event: ScanProgressEvent) => void | Promise<void>;

export interface RunOptions {
  checkIds?: string[];
  l1Only?: boolean;
  previousReport?: ScanReport | null;
  onProgress?: ScanProgressCallback;
}

export interface CheckRunnerOptions {
  maxConcurrentChecks: number;
  now?: () => number;
}

export class CheckRunner {
  private checks: ComplianceCheck[];
  private logger: LoggerLike;
  private maxConcurrentChecks: number;
  private now: () => number;

  constructor(checks: ComplianceCheck[], logger: LoggerLike, options: CheckRunnerOptions) {
    this.checks = checks;
    this.logger = logger;
    this.maxConcurrentChecks = Math.max(1, options.maxConcurrentChecks);
    this.now = options.now ?? Date.now;
  }

  // ============================
  // SELECTION
  // ============================

  selectChecks(options: Pick<RunOptions, 'checkIds' | 'l1Only'> = {}): ComplianceCheck[] {
    let selected = this.checks;

    if (options.checkIds && options.checkIds.length > 0) {
      const wanted = new Set(options.checkIds);
      const known = new Set(this.checks.map(c => c.id));
      const unknown = options.checkIds.filter(id => !known.has(id));
      if (unknown.length > 0) {
        this.logger.warn('Ignoring unknown check IDs', { check_ids: unknown });
      }
      selected = selected.filter(c => wanted.has(c.id));
    }

    if (options.l1Only) {
      selected = selected.filter(c => c.metadata.Level === 'L1');
    }

    return selected;
  }

  // ============================
  // SCAN EXECUTION
  // ============================

  async run(session: TenantSession, options: RunOptions = {}): Promise<ScanReport> {
    const checks = this.selectChecks(options);
    const scanId = crypto.randomBytes(8).toString('hex');
    const startedAt = this.now();
    let completed = 0;

    this.logger.info('Starting compliance scan', {
      scan_id: scanId,
      tenant_id: session.tenantId,
      checks: checks.length,
      max_concurrent: this.maxConcurrentChecks,
    });

    const results = await this.runPool(checks, async (check) => {
      const record = await this.executeCheck(check, session);
      completed++;
      await this.emitProgress(options.onProgress, {
        ScanId: scanId,
        CheckId: check.id,
        Status: record.Status,
        Completed: completed,
        Total: checks.length,
      });
      return record;
    });

    const driftEvents = options.previousReport
      ? detectDrift(options.previousReport, results, new Date(this.now()).toISOString())
      : [];

    const completedAt = this.now();
    const report = buildReport(scanId, session.tenantId, startedAt, completedAt, results, driftEvents);

    this.logger.info('Compliance scan complete', {
      scan_id: scanId,
      compliance: report.CompliancePercentage.toFixed(1) + '%',
      passed: report.Passed,
      failed: report.Failed,
      errors: report.Errors,
      manual: report.Manual,
      drift_events: driftEvents.length,
      duration_ms: report.DurationMs,
    });

    return report;
  }

  private async runPool(
    checks: ComplianceCheck[],
    worker: (check: ComplianceCheck) => Promise<CheckRunRecord>,
  ): Promise<CheckRunRecord[]> {
    const records = new Array<CheckRunRecord>(checks.length);
    let next = 0;

    const lanes = Array.from({ length: Math.min(this.maxConcurrentChecks, checks.length) }, async () => {
      while (next < checks.length) {
        const index = next++;
        records[index] = await worker(checks[index]);
      }
    });

    await Promise.all(lanes);
    return records;
  }

  private async executeCheck(check: ComplianceCheck, session: TenantSession): Promise<CheckRunRecord> {
    const start = this.now();
    const result = await check.evaluate(session);
    const end = this.now();

    this.logger.debug(`Check ${check.id}: ${result.status}`, { findings: result.details.length });
    return toRunRecord(check, result, start, end);
  }

  private async emitProgress(callback: ScanProgressCallback | undefined, event: ScanProgressEvent): Promise<void> {
    if (!callback) return;
    try {
      await callback(event);
    } catch (err) {
      this.logger.warn('Progress callback failed', { scan_id: event.ScanId, check_id: event.CheckId }, errorMessage(err));
    }
  }
}

// ============================
// RECORDS AND REPORTS
// ============================

export function toRunRecord(check: ComplianceCheck, result: ComplianceResult, start: number, end: number): CheckRunRecord {
  const record: CheckRunRecord = {
    CheckId: check.id,
    Category: check.metadata.Level,
    Status: result.status,
    StatusId: statusIdFor(result.status),
    StartTime: new Date(start).toISOString(),
    EndTime: new Date(end).toISOString(),
    Duration: Math.round((end - start) / 10) / 100,
    Details: result.details,
    Metadata: check.metadata,
  };
  if (result.status === 'Error') {
    record.Error = result.error;
  }
  return record;
}

export function detectDrift(previous: ScanReport, current: CheckRunRecord[], detectedAt: string): DriftEvent[] {
  const before = new Map(previous.Results.map(r => [r.CheckId, r.Status]));
  const events: DriftEvent[] = [];

  for (const record of current) {
    const prev = before.get(record.CheckId);
    if (prev === 'Pass' && record.Status === 'Fail') {
      events.push({
        CheckId: record.CheckId,
        Title: record.Metadata.Title,
        DriftType: 'pass_to_fail',
        PreviousStatus: 'Pass',
        CurrentStatus: 'Fail',
        DetectedAt: detectedAt,
      });
    } else if (prev === 'Fail' && record.Status === 'Pass') {
      events.push({
        CheckId: record.CheckId,
        Title: record.Metadata.Title,
        DriftType: 'fail_to_pass',
        PreviousStatus: 'Fail',
        CurrentStatus: 'Pass',
        DetectedAt: detectedAt,
      });
    }
  }

  return events;
}

export function buildReport(
  scanId: string,
  tenantId: string,
  startedAt: number,
  completedAt: number,
  results: CheckRunRecord[],
  driftEvents: DriftEvent[],
): ScanReport {
  const passed = results.filter(r => r.Status === 'Pass').length;
  const failed = results.filter(r => r.Status === 'Fail').length;
  const errors = results.filter(r => r.Status === 'Error').length;
  const manual = results.filter(r => r.Status === 'Manual').length;

  const gradeable = passed + failed;
  const compliancePercentage = gradeable > 0 ? (passed / gradeable) * 100 : 0;

  return {
    ScanId: scanId,
    TenantId: tenantId,
    StartedAt: new Date(startedAt).toISOString(),
    CompletedAt: new Date(completedAt).toISOString(),
    DurationMs: completedAt - startedAt,

    TotalChecks: results.length,
    Passed: passed,
    Failed: failed,
    Errors: errors,
    Manual: manual,
    CompliancePercentage: Math.round(compliancePercentage * 10) / 10,

    DriftEvents: driftEvents,
    Results: results,
  };
}
