/**
 * Auth Service
 * OAuth2 認證服務 - 處理 Sigma API Token 取得、快取與更新
 */

import type { $Fetch } from 'ofetch';
import { TokenCache, type Clock } from './token-cache.js';
import { TokenClient } from './token-client.js';
import { loggers } from '../lib/logger.js';
import { summarizeErrorDetail } from '../lib/error-detail.js';
import type { ErrorDetail } from '../types/api.js';
import type {
  AuthHeaders,
  Credential,
  TokenFailureReason,
  TokenGrantFailure,
  TokenResponse,
} from '../types/auth.js';

/**
 * 無法以 client credentials 取得 token（沒有下一層可退）
 */
export class AuthenticationError extends Error {
  public readonly code = 'AUTHENTICATION_FAILED';
  public readonly reason: TokenFailureReason;
  public readonly status?: number;
  public readonly detail?: ErrorDetail;

  constructor(failure: TokenGrantFailure) {
    super(AuthenticationError.describe(failure), {
      cause: failure.reason === 'transport' ? failure.cause : undefined,
    });
    this.name = 'AuthenticationError';
    this.reason = failure.reason;
    if (failure.reason === 'rejected') {
      this.status = failure.status;
      this.detail = failure.detail;
    }
  }

  private static describe(failure: TokenGrantFailure): string {
    switch (failure.reason) {
      case 'rejected':
        return `Authentication failed (${failure.status}): ${summarizeErrorDetail(failure.detail)}`;
      case 'malformed':
        return `Authentication failed: ${failure.message}`;
      case 'transport':
        return `Authentication failed: ${failure.message}`;
    }
  }
}

export interface AuthServiceOptions {
  /** 自訂 ofetch 實例（測試時注入） */
  fetch?: $Fetch;
  /** 請求逾時（毫秒） */
  timeoutMs?: number;
  /** 時鐘（測試時注入） */
  now?: Clock;
}

export class AuthService {
  private cache: TokenCache;
  private tokenClient: TokenClient;

  // 單一飛行請求（SFR）模式
  // 記錄正在進行的 token 請求，避免並發時重複發起 API 呼叫
  private inFlightTokenPromise: Promise<string> | null = null;

  constructor(credential: Credential, options: AuthServiceOptions = {}) {
    this.cache = new TokenCache(options.now);
    this.tokenClient = new TokenClient(credential, {
      fetch: options.fetch,
      timeoutMs: options.timeoutMs,
    });
  }

  /**
   * 取得有效的 Access Token
   * - 快取有效：直接返回
   * - 有請求進行中：等待進行中的請求
   * - 快取無效：refresh → client credentials
   * @throws AuthenticationError client credentials 也失敗時
   */
  async getToken(): Promise<string> {
    const cached = this.cache.accessToken;
    if (cached !== null && !this.cache.isExpired()) {
      return cached;
    }

    if (this.inFlightTokenPromise) {
      return this.inFlightTokenPromise;
    }

    this.inFlightTokenPromise = this.acquireToken();

    try {
      return await this.inFlightTokenPromise;
    } finally {
      this.inFlightTokenPromise = null;
    }
  }

  /**
   * getToken 的別名
   */
  getAccessToken(): Promise<string> {
    return this.getToken();
  }

  /**
   * 取得 Authorization header
   */
  async getAuthHeaders(): Promise<AuthHeaders> {
    const token = await this.getToken();
    return { Authorization: `Bearer ${token}` };
  }

  private async acquireToken(): Promise<string> {
    const refreshToken = this.cache.refreshToken;

    if (refreshToken !== null) {
      const refreshed = await this.tokenClient.refreshToken(refreshToken);
      if (refreshed.ok) {
        loggers.auth.debug('Access token refreshed');
        return this.store(refreshed.token);
      }
      // refresh token 可能已被撤銷或過期，改用 client credentials 重新取得
      loggers.auth.debug('Refresh failed, requesting new token', { reason: refreshed.reason });
    }

    const issued = await this.tokenClient.requestNewToken();
    if (!issued.ok) {
      throw new AuthenticationError(issued);
    }

    loggers.auth.debug('Access token issued', { expiresIn: issued.token.expires_in });
    return this.store(issued.token);
  }

  private store(token: TokenResponse): string {
    this.cache.setTokens(token.access_token, token.refresh_token, token.expires_in);
    return token.access_token;
  }

  isTokenValid(): boolean {
    return this.cache.isValid();
  }

  /**
   * 快取 token 的剩餘有效秒數
   */
  getExpiresIn(): number {
    return this.cache.getExpiresInSeconds();
  }

  /**
   * 清除快取的 token
   * 不清除 inFlightTokenPromise：進行中的請求讓它完成
   */
  clearCache(): void {
    this.cache.clear();
  }

  hasInflightRequest(): boolean {
    return this.inFlightTokenPromise !== null;
  }

  getTokenUrl(): string {
    return this.tokenClient.tokenUrl;
  }
}
