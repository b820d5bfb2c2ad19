import axios, { AxiosAdapter, AxiosInstance, isAxiosError } from 'axios';
import { LoggerLike } from '../common/logger';
import { ApiRequestError } from '../common/errors';
import { Validator, z } from '../security';

export type QueryParams = Record<string, string | number | boolean>;

// Supplies a bearer token for a resource audience; acquisition and refresh belong to the caller
export type TokenProvider = (resource: string) => Promise<string>;

export interface RestClientOptions {
  baseURL: string;
  resource: string;
  timeoutMs: number;
  maxPages: number;
  tokenProvider: TokenProvider;
  logger: LoggerLike;
  adapter?: AxiosAdapter;
}

// Read access shared by every tenant-facing client handed to checks
export interface ReadOnlyRestClient {
  get<T>(path: string, schema: Validator<T>, params?: QueryParams): Promise<T>;
  list<T>(path: string, item: Validator<T>, params?: QueryParams): Promise<T[]>;
}

const PageSchema = z.object({
  value: z.array(z.unknown()),
  '@odata.nextLink': z.optional(z.string()),
});

const ServiceErrorSchema = z.object({
  error: z.optional(z.object({
    code: z.optional(z.string()),
    message: z.optional(z.string()),
  })),
  errorCode: z.optional(z.string()),
  message: z.optional(z.string()),
});

interface Page {
  items: unknown[];
  nextLink?: string;
}

export class RestClient implements ReadOnlyRestClient {
  private logger: LoggerLike;
  private client: AxiosInstance;
  private maxPages: number;

  constructor(options: RestClientOptions) {
    this.logger = options.logger;
    this.maxPages = options.maxPages;

    this.client = axios.create({
      baseURL: options.baseURL,
      timeout: options.timeoutMs,
      adapter: options.adapter,
      headers: {
        'Accept': 'application/json',
        'Content-Type': 'application/json'
      }
    });

    this.client.interceptors.request.use(async (config) => {
      const token = await options.tokenProvider(options.resource);
      config.headers.set('Authorization', `Bearer ${token}`);
      return config;
    });
  }

  async get<T>(path: string, schema: Validator<T>, params?: QueryParams): Promise<T> {
    const data = await this.request('get', path, params);
    return this.validate(path, data, schema);
  }

  async list<T>(path: string, item: Validator<T>, params?: QueryParams): Promise<T[]> {
    return this.collect(path, item, () => this.request('get', path, params), (url) => this.request('get', url));
  }

  // POST for query endpoints that take their arguments in the body; never used to change tenant state
  async postQuery<T>(path: string, body: unknown, item: Validator<T>): Promise<T[]> {
    return this.collect(path, item, () => this.request('post', path, undefined, body), (url) => this.request('post', url, undefined, body));
  }

  private async collect<T>(
    path: string,
    item: Validator<T>,
    first: () => Promise<unknown>,
    next: (url: string) => Promise<unknown>,
  ): Promise<T[]> {
    const results: T[] = [];
    let page = this.readPage(path, await first());
    let pages = 1;

    while (true) {
      for (let i = 0; i < page.items.length; i++) {
        const parsed = item.safeParse(page.items[i]);
        if (!parsed.success) {
          throw new Error(`Unexpected response from ${path}: value: [${results.length}]: ${parsed.error}`);
        }
        results.push(parsed.data);
      }

      if (!page.nextLink) break;
      if (pages >= this.maxPages) {
        throw new Error(`Paging limit of ${this.maxPages} pages reached for ${path}`);
      }
      page = this.readPage(path, await next(page.nextLink));
      pages++;
    }

    this.logger.debug(`Collected ${results.length} items`, { path, pages });
    return results;
  }

  private readPage(path: string, data: unknown): Page {
    const parsed = PageSchema.safeParse(data);
    if (!parsed.success) {
      throw new Error(`Unexpected response from ${path}: ${parsed.error}`);
    }
    return { items: parsed.data.value, nextLink: parsed.data['@odata.nextLink'] };
  }

  private validate<T>(path: string, data: unknown, schema: Validator<T>): T {
    const result = schema.safeParse(data);
    if (!result.success) {
      throw new Error(`Unexpected response from ${path}: ${result.error}`);
    }
    return result.data;
  }

  private async request(method: 'get' | 'post', path: string, params?: QueryParams, body?: unknown): Promise<unknown> {
    try {
      this.logger.debug(`${method.toUpperCase()} ${path}`, params);
      const response = await this.client.request<unknown>({ method, url: path, params, data: body });
      return response.data;
    } catch (error) {
      throw this.toApiError(path, error);
    }
  }

  private toApiError(path: string, error: unknown): ApiRequestError {
    if (!isAxiosError(error)) {
      const message = error instanceof Error ? error.message : String(error);
      return new ApiRequestError(message, path, null, null);
    }

    const status = error.response?.status ?? null;
    const body = ServiceErrorSchema.safeParse(error.response?.data);
    const code = body.success ? (body.data.error?.code ?? body.data.errorCode ?? null) : null;
    const serviceMessage = body.success ? (body.data.error?.message ?? body.data.message) : undefined;
    const message = serviceMessage
      ? `${path} failed with ${status ?? 'no response'}: ${serviceMessage}`
      : `${path} failed: ${error.message}`;

    this.logger.warn('Tenant API request failed', { path, status, code });
    return new ApiRequestError(message, path, status, code);
  }
}
