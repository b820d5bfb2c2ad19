import { AxiosAdapter } from 'axios';
import { LoggerLike } from '../common/logger';
import { CheckLibraryConfig } from '../config/config';
import { DirectoryClient, GraphDirectoryClient } from './directory-client';
import { ExchangeAdminClient, ExchangeClient } from './exchange-client';
import { ReadOnlyRestClient, RestClient, TokenProvider } from './rest-client';

/**
 * Pre-authenticated context handed to every check. Owned by the caller:
 * checks never create, refresh or close it.
 */
export interface TenantSession {
  tenantId: string;
  directory: DirectoryClient;
  exchange: ExchangeClient;
  fabric: ReadOnlyRestClient;
  logger: LoggerLike;
}

export interface SessionOptions {
  tokenProvider: TokenProvider;
  logger: LoggerLike;
  adapter?: AxiosAdapter;
}

export function createTenantSession(config: CheckLibraryConfig, options: SessionOptions): TenantSession {
  if (!config.tenantId) {
    throw new Error('tenantId is required to create a tenant session');
  }

  const { endpoints, http } = config;
  const client = (baseURL: string, resource: string) => new RestClient({
    baseURL,
    resource,
    timeoutMs: http.timeoutMs,
    maxPages: http.maxPages,
    tokenProvider: options.tokenProvider,
    logger: options.logger,
    adapter: options.adapter,
  });

  const graph = client(`${endpoints.graphUrl}/${endpoints.graphVersion}`, new URL(endpoints.graphUrl).origin);
  const exchange = client(
    `${endpoints.exchangeUrl}/${encodeURIComponent(config.tenantId)}`,
    new URL(endpoints.exchangeUrl).origin,
  );
  const fabric = client(endpoints.fabricUrl, new URL(endpoints.fabricUrl).origin);

  return {
    tenantId: config.tenantId,
    directory: new GraphDirectoryClient(graph),
    exchange: new ExchangeAdminClient(exchange),
    fabric,
    logger: options.logger,
  };
}
