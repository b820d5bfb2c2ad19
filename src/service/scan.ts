// scan.ts - Wires configuration, session, runner, progress and storage for one tenant scan
import { AxiosAdapter } from 'axios';
import { createLogger, LoggerLike } from '../common/logger';
import { CheckLibraryConfig } from '../config/config';
import { listChecks } from '../checks';
import { ResultStore } from '../core/result-store';
import { ProgressReporter } from '../server/progress-reporter';
import { createTenantSession } from '../session/tenant-session';
import { TokenProvider } from '../session/rest-client';
import { ScanReport } from '../types';
import { CheckRunner, ScanProgressCallback } from './check-runner';
import { ComplianceCheck } from './compliance-check';

export interface ScanOptions {
  tokenProvider: TokenProvider;
  logger?: LoggerLike;
  checks?: ComplianceCheck[];
  previousReport?: ScanReport | null;
  adapter?: AxiosAdapter;
}

export async function runTenantScan(config: CheckLibraryConfig, options: ScanOptions): Promise<ScanReport> {
  const logger = options.logger ?? createLogger('scan', config.logging);
  const session = createTenantSession(config, {
    tokenProvider: options.tokenProvider,
    logger,
    adapter: options.adapter,
  });

  const runner = new CheckRunner(options.checks ?? listChecks(), logger, {
    maxConcurrentChecks: config.runner.maxConcurrentChecks,
  });

  let onProgress: ScanProgressCallback | undefined;
  if (config.progress.callbackUrl) {
    const reporter = new ProgressReporter(config.progress.callbackUrl, logger, options.adapter);
    onProgress = async (event) => {
      await reporter.report(event);
    };
  }

  const report = await runner.run(session, {
    checkIds: config.runner.checkIds,
    l1Only: config.runner.l1Only,
    previousReport: options.previousReport,
    onProgress,
  });

  if (config.results.enabled) {
    const store = await ResultStore.open(config.results.dbPath, logger);
    try {
      await store.saveReport(report);
    } finally {
      await store.close();
    }
  }

  return report;
}
