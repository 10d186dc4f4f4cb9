/**
 * Token Client
 * OAuth2 token 端點呼叫 - client credentials 與 refresh token 兩種 grant
 *
 * 平台的 token 端點不接受 HTTP Basic Auth，憑證一律放在 form body。
 * 兩種 grant 都以 TokenGrantResult 回傳結果，由 AuthService 決定後續動作。
 */

import { ofetch, FetchError, type $Fetch } from 'ofetch';
import { loggers } from '../lib/logger.js';
import { parseErrorDetail, summarizeErrorDetail } from '../lib/error-detail.js';
import type { Credential, TokenGrantResult } from '../types/auth.js';

const TOKEN_PATH = '/v2/auth/token';

export const DEFAULT_TIMEOUT_MS = 30 * 1000;

type GrantType = 'client_credentials' | 'refresh_token';

export interface TokenClientOptions {
  /** 自訂 ofetch 實例（測試時注入） */
  fetch?: $Fetch;
  /** 請求逾時（毫秒） */
  timeoutMs?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 驗證成功回應的欄位，缺任何一個都視為 malformed
 */
export function parseTokenResponse(data: unknown): TokenGrantResult {
  if (!isRecord(data)) {
    return { ok: false, reason: 'malformed', message: 'Token response is not a JSON object' };
  }

  const { access_token, refresh_token, expires_in } = data;

  if (typeof access_token !== 'string' || access_token.length === 0) {
    return { ok: false, reason: 'malformed', message: 'Token response missing access_token' };
  }
  if (typeof refresh_token !== 'string') {
    return { ok: false, reason: 'malformed', message: 'Token response missing refresh_token' };
  }
  if (typeof expires_in !== 'number' || !Number.isFinite(expires_in)) {
    return { ok: false, reason: 'malformed', message: 'Token response missing expires_in' };
  }

  return { ok: true, token: { access_token, refresh_token, expires_in } };
}

export class TokenClient {
  private credential: Credential;
  private $fetch: $Fetch;
  private timeoutMs: number;
  readonly tokenUrl: string;

  constructor(credential: Credential, options: TokenClientOptions = {}) {
    this.credential = credential;
    this.$fetch = options.fetch ?? ofetch;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    // 絕對路徑：會取代 baseUrl 上的路徑（例如預設的 /v2）
    this.tokenUrl = new URL(TOKEN_PATH, credential.baseUrl).toString();
  }

  /**
   * Client credentials grant
   */
  requestNewToken(): Promise<TokenGrantResult> {
    return this.grant('client_credentials', {});
  }

  /**
   * Refresh token grant
   */
  refreshToken(refreshToken: string): Promise<TokenGrantResult> {
    return this.grant('refresh_token', { refresh_token: refreshToken });
  }

  private async grant(
    grantType: GrantType,
    extra: Record<string, string>
  ): Promise<TokenGrantResult> {
    const body = new URLSearchParams({
      grant_type: grantType,
      ...extra,
      client_id: this.credential.clientId,
      client_secret: this.credential.clientSecret,
    }).toString();

    loggers.auth.debug('Token request started', { url: this.tokenUrl, grantType });

    let data: unknown;
    try {
      data = await this.$fetch<unknown>(this.tokenUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
        },
        body,
        timeout: this.timeoutMs,
        retry: 0,
      });
    } catch (error) {
      if (!(error instanceof FetchError)) {
        throw error;
      }

      if (error.response) {
        const status = error.response.status;
        const detail = parseErrorDetail(error.data);
        const context = { url: this.tokenUrl, statusCode: status, grantType };

        // refresh 失敗會由 client credentials 接手，不需要驚動使用者
        if (grantType === 'refresh_token') {
          loggers.auth.debug('Refresh token rejected', context, { detail });
        } else {
          loggers.auth.error(
            `Authentication failed: ${summarizeErrorDetail(detail)}`,
            null,
            context,
            { detail }
          );
        }
        return { ok: false, reason: 'rejected', status, detail };
      }

      loggers.auth.debug('Token request failed without response', {
        url: this.tokenUrl,
        grantType,
        reason: error.message,
      });
      return { ok: false, reason: 'transport', message: error.message, cause: error };
    }

    const result = parseTokenResponse(data);
    if (!result.ok) {
      loggers.auth.debug('Token response rejected by parser', { url: this.tokenUrl, grantType });
    }
    return result;
  }
}
