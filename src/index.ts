// Public API of the CIS Microsoft 365 Foundations check library

export * from './types';
export { Logger, LogLevel, createLogger } from './common/logger';
export type { LoggerLike, LogLevelName } from './common/logger';
export { ApiRequestError, CapabilityUnavailableError } from './common/errors';
export { loadConfig, mergeConfig, defaultConfig } from './config/config';
export type { CheckLibraryConfig } from './config/config';
export { z, sanitizeLogData } from './security';
export type { Validator, ValidationResult, Infer } from './security';

export { RestClient } from './session/rest-client';
export type { ReadOnlyRestClient, TokenProvider, QueryParams } from './session/rest-client';
export { GraphDirectoryClient } from './session/directory-client';
export type { DirectoryClient, UserQuery } from './session/directory-client';
export { ExchangeAdminClient } from './session/exchange-client';
export type { ExchangeClient, CmdletParameter } from './session/exchange-client';
export { createTenantSession } from './session/tenant-session';
export type { TenantSession, SessionOptions } from './session/tenant-session';

export { defineCheck, aggregateStatus, toComplianceResult, runControl } from './service/compliance-check';
export type { CheckDefinition, ComplianceCheck, EvaluationOutcome } from './service/compliance-check';
export { statusIdFor, toWireResult } from './service/result-serializer';
export { CheckRunner, buildReport, detectDrift } from './service/check-runner';
export type { RunOptions, ScanProgressCallback } from './service/check-runner';
export { runTenantScan } from './service/scan';
export type { ScanOptions } from './service/scan';
export { ProgressReporter } from './server/progress-reporter';
export { ResultStore } from './core/result-store';
export type { StoredResult, ScanSummary } from './core/result-store';

export { listChecks, getCheck } from './checks';
