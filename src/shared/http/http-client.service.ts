import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { Pool, Dispatcher } from 'undici';

export interface HttpRequestOptions {
  method?: Dispatcher.HttpMethod;
  headers?: Record<string, string>;
  body?: string | Buffer;
  /** Header and body timeout in ms. Omitted means wait indefinitely. */
  timeout?: number;
}

export type HttpHeaders = Record<string, string | string[] | undefined>;

export interface HttpResponse {
  statusCode: number;
  headers: HttpHeaders;
  /** Parsed JSON, or the raw text when the body is not JSON */
  body: unknown;
}

export interface BinaryResponse {
  statusCode: number;
  headers: HttpHeaders;
  body: Buffer;
}

/**
 * Pooled HTTP client over undici. One pool per origin, single attempt per
 * request; callers decide what a status code means.
 */
@Injectable()
export class HttpClientService implements OnModuleDestroy {
  private readonly logger = new Logger(HttpClientService.name);
  private readonly pools: Map<string, Pool> = new Map();

  private getPool(origin: string): Pool {
    let pool = this.pools.get(origin);
    if (!pool) {
      pool = new Pool(origin, {
        connections: 4,
        pipelining: 1,
        keepAliveTimeout: 30000,
        keepAliveMaxTimeout: 60000,
      });
      this.pools.set(origin, pool);
    }
    return pool;
  }

  private async dispatch(
    url: string,
    options: HttpRequestOptions,
  ): Promise<Dispatcher.ResponseData> {
    const parsedUrl = new URL(url);
    const pool = this.getPool(parsedUrl.origin);
    const method = options.method || 'GET';

    this.logger.debug(`${method}: ${parsedUrl.origin}${parsedUrl.pathname}`);

    return pool.request({
      path: parsedUrl.pathname + parsedUrl.search,
      method,
      headers: options.headers,
      body: options.body,
      // 0 disables the undici timers
      headersTimeout: options.timeout ?? 0,
      bodyTimeout: options.timeout ?? 0,
    });
  }

  async request(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
    const response = await this.dispatch(url, options);
    const bodyText = await response.body.text();

    return {
      statusCode: response.statusCode,
      headers: response.headers,
      body: this.parseBody(bodyText),
    };
  }

  async requestBuffer(url: string, options: HttpRequestOptions = {}): Promise<BinaryResponse> {
    const response = await this.dispatch(url, options);
    const body = Buffer.from(await response.body.arrayBuffer());

    return {
      statusCode: response.statusCode,
      headers: response.headers,
      body,
    };
  }

  async get(
    url: string,
    options?: Omit<HttpRequestOptions, 'method' | 'body'>,
  ): Promise<HttpResponse> {
    return this.request(url, { ...options, method: 'GET' });
  }

  async put(
    url: string,
    body: unknown,
    options?: Omit<HttpRequestOptions, 'method' | 'body'>,
  ): Promise<HttpResponse> {
    return this.request(url, {
      ...options,
      method: 'PUT',
      body: JSON.stringify(body),
      headers: {
        'Content-Type': 'application/json',
        ...options?.headers,
      },
    });
  }

  async postForm(
    url: string,
    fields: Record<string, string>,
    options?: Omit<HttpRequestOptions, 'method' | 'body'>,
  ): Promise<HttpResponse> {
    return this.request(url, {
      ...options,
      method: 'POST',
      body: new URLSearchParams(fields).toString(),
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        ...options?.headers,
      },
    });
  }

  async download(
    url: string,
    options?: Omit<HttpRequestOptions, 'method' | 'body'>,
  ): Promise<BinaryResponse> {
    return this.requestBuffer(url, { ...options, method: 'GET' });
  }

  private parseBody(bodyText: string): unknown {
    if (bodyText === '') {
      return bodyText;
    }
    try {
      return JSON.parse(bodyText);
    } catch {
      return bodyText;
    }
  }

  async destroy(): Promise<void> {
    const closePromises = Array.from(this.pools.values()).map((pool) => pool.close());
    await Promise.all(closePromises);
    this.pools.clear();
  }

  async onModuleDestroy(): Promise<void> {
    await this.destroy();
  }
}
