import * as fs from 'fs';
import { LogLevelName } from '../common/logger';
import { z } from '../security';

export interface EndpointConfig {
  graphUrl: string;
  graphVersion: 'v1.0' | 'beta';
  exchangeUrl: string;
  fabricUrl: string;
}

export interface HttpConfig {
  timeoutMs: number;
  maxPages: number;
}

export interface LoggingConfig {
  dir?: string;
  level: LogLevelName;
}

export interface RunnerConfig {
  maxConcurrentChecks: number;
  l1Only: boolean;
  checkIds: string[];
}

export interface ResultsConfig {
  enabled: boolean;
  dbPath: string;
}

export interface ProgressConfig {
  callbackUrl?: string;
}

export interface CheckLibraryConfig {
  tenantId: string;
  endpoints: EndpointConfig;
  http: HttpConfig;
  logging: LoggingConfig;
  runner: RunnerConfig;
  results: ResultsConfig;
  progress: ProgressConfig;
}

export const DEFAULT_CONFIG_PATH = './cis-checks.config.json';

export const defaultConfig: CheckLibraryConfig = {
  tenantId: '',
  endpoints: {
    graphUrl: 'https://graph.microsoft.com',
    graphVersion: 'v1.0',
    exchangeUrl: 'https://outlook.office365.com/adminapi/beta',
    fabricUrl: 'https://api.fabric.microsoft.com/v1'
  },
  http: {
    timeoutMs: 30000,
    maxPages: 50
  },
  logging: {
    level: 'info'
  },
  runner: {
    maxConcurrentChecks: 4,
    l1Only: false,
    checkIds: []
  },
  results: {
    enabled: false,
    dbPath: './cis-results.db'
  },
  progress: {}
};

const ConfigSchema = z.object({
  tenantId: z.string().max(100),
  endpoints: z.object({
    graphUrl: z.string().regex(/^https?:\/\//),
    graphVersion: z.enum(['v1.0', 'beta'] as const),
    exchangeUrl: z.string().regex(/^https?:\/\//),
    fabricUrl: z.string().regex(/^https?:\/\//),
  }),
  http: z.object({
    timeoutMs: z.number().int().min(1000).max(600000),
    maxPages: z.number().int().min(1).max(1000),
  }),
  logging: z.object({
    dir: z.optional(z.string().min(1)),
    level: z.enum(['debug', 'info', 'warn', 'error', 'critical'] as const),
  }),
  runner: z.object({
    maxConcurrentChecks: z.number().int().min(1).max(32),
    l1Only: z.boolean(),
    checkIds: z.array(z.string().min(1)),
  }),
  results: z.object({
    enabled: z.boolean(),
    dbPath: z.string().min(1),
  }),
  progress: z.object({
    callbackUrl: z.optional(z.string().regex(/^https?:\/\//)),
  }),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function sectionOf(source: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = source[key];
  return isRecord(value) ? value : {};
}

export function mergeConfig(userConfig: Record<string, unknown>): CheckLibraryConfig {
  const merged = {
    ...defaultConfig,
    ...userConfig,
    endpoints: { ...defaultConfig.endpoints, ...sectionOf(userConfig, 'endpoints') },
    http: { ...defaultConfig.http, ...sectionOf(userConfig, 'http') },
    logging: { ...defaultConfig.logging, ...sectionOf(userConfig, 'logging') },
    runner: { ...defaultConfig.runner, ...sectionOf(userConfig, 'runner') },
    results: { ...defaultConfig.results, ...sectionOf(userConfig, 'results') },
    progress: { ...defaultConfig.progress, ...sectionOf(userConfig, 'progress') }
  };

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new Error(`Invalid configuration: ${result.error}`);
  }
  return result.data;
}

export function loadConfig(configPath: string = DEFAULT_CONFIG_PATH): CheckLibraryConfig {
  if (!fs.existsSync(configPath)) {
    console.warn(`No config file found at ${configPath}, using defaults`);
    return defaultConfig;
  }

  const raw: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  if (!isRecord(raw)) {
    throw new Error(`Invalid configuration: ${configPath} must contain a JSON object`);
  }

  const config = mergeConfig(raw);

  if (config.results.enabled && !config.tenantId) {
    console.warn('WARNING: Result storage is enabled but tenantId is empty. Stored scans cannot be told apart.');
  }

  return config;
}
