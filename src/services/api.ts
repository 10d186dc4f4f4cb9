/**
 * Sigma API Client
 * Sigma REST API 客戶端 - 帶認證的通用 HTTP 請求
 */

import { ofetch, FetchError, type $Fetch } from 'ofetch';
import { AuthService } from './auth.js';
import { DEFAULT_TIMEOUT_MS } from './token-client.js';
import { loggers } from '../lib/logger.js';
import { parseErrorDetail, summarizeErrorDetail } from '../lib/error-detail.js';
import type { Clock } from './token-cache.js';
import type { Credential } from '../types/auth.js';
import type { ErrorDetail, HttpMethod, QueryParams } from '../types/api.js';

/**
 * 平台回傳非 2xx
 */
export class ApiError extends Error {
  public readonly code = 'API_ERROR';
  public readonly status: number;
  public readonly method: HttpMethod;
  public readonly url: string;
  public readonly detail: ErrorDetail;

  constructor(status: number, method: HttpMethod, url: string, detail: ErrorDetail) {
    super(`API request failed (${status}): ${summarizeErrorDetail(detail)}`);
    this.name = 'ApiError';
    this.status = status;
    this.method = method;
    this.url = url;
    this.detail = detail;
  }
}

export interface RequestOptions {
  query?: QueryParams;
  body?: unknown;
  headers?: Record<string, string>;
}

export interface SigmaApiClientOptions {
  /** 自訂 ofetch 實例（測試時注入） */
  fetch?: $Fetch;
  /** 請求逾時（毫秒） */
  timeoutMs?: number;
  /** 時鐘（測試時注入） */
  now?: Clock;
}

/**
 * 去掉值為 undefined 的查詢參數
 */
function compactQuery(query?: QueryParams): Record<string, string | number | boolean> | undefined {
  if (!query) return undefined;
  const result: Record<string, string | number | boolean> = {};
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return Object.keys(result).length > 0 ? result : undefined;
}

export class SigmaApiClient {
  private auth: AuthService;
  private $fetch: $Fetch;
  private timeoutMs: number;
  private baseUrl: string;

  constructor(credential: Credential, options: SigmaApiClientOptions = {}) {
    this.baseUrl = credential.baseUrl;
    this.$fetch = options.fetch ?? ofetch;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.auth = new AuthService(credential, {
      fetch: this.$fetch,
      timeoutMs: this.timeoutMs,
      now: options.now,
    });
  }

  /**
   * 組出完整 URL（path 一律視為絕對路徑）
   */
  buildUrl(path: string): string {
    const normalized = path.startsWith('/') ? path : `/${path}`;
    return new URL(normalized, this.baseUrl).toString();
  }

  /**
   * 發送帶認證的 API 請求
   * 204 或空 body 回傳 undefined；非 2xx 拋出 ApiError；不自動重試
   */
  async request<T = unknown>(
    method: HttpMethod,
    path: string,
    options: RequestOptions = {}
  ): Promise<T> {
    const url = this.buildUrl(path);
    const query = compactQuery(options.query);

    return loggers.api.trackAsync(
      `${method} ${path}`,
      async () => {
        const authHeaders = await this.auth.getAuthHeaders();

        loggers.api.debug('API request started', {
          method,
          url,
          query,
          body: options.body,
        });

        try {
          return await this.$fetch<T>(url, {
            method,
            query,
            body: options.body === undefined ? undefined : JSON.stringify(options.body),
            headers: {
              Accept: 'application/json',
              'Content-Type': 'application/json',
              ...options.headers,
              ...authHeaders,
            },
            timeout: this.timeoutMs,
            retry: 0,
          });
        } catch (error) {
          if (error instanceof FetchError && error.response) {
            throw new ApiError(error.response.status, method, url, parseErrorDetail(error.data));
          }
          throw error;
        }
      },
      { method, url }
    );
  }

  get<T = unknown>(path: string, query?: QueryParams): Promise<T> {
    return this.request<T>('GET', path, { query });
  }

  post<T = unknown>(path: string, body?: unknown, query?: QueryParams): Promise<T> {
    return this.request<T>('POST', path, { body, query });
  }

  put<T = unknown>(path: string, body?: unknown): Promise<T> {
    return this.request<T>('PUT', path, { body });
  }

  patch<T = unknown>(path: string, body?: unknown): Promise<T> {
    return this.request<T>('PATCH', path, { body });
  }

  delete<T = unknown>(path: string): Promise<T> {
    return this.request<T>('DELETE', path);
  }

  /**
   * 取得內部認證服務（auth token 指令使用）
   */
  getAuth(): AuthService {
    return this.auth;
  }

  getBaseUrl(): string {
    return this.baseUrl;
  }
}
