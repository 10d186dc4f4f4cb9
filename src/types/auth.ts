import type { ErrorDetail } from './api.js';

/**
 * OAuth2 Token Response
 */
export interface TokenResponse {
  access_token: string;
  refresh_token: string;
  expires_in: number;
}

/**
 * 平台認證憑證（每個 client 實例固定不變）
 */
export interface Credential {
  clientId: string;
  clientSecret: string;
  baseUrl: string;
}

/**
 * Token 快取狀態
 */
export interface TokenState {
  accessToken: string | null;
  refreshToken: string | null;
  expiresAt: number; // Unix timestamp (ms)
}

export type TokenFailureReason = 'rejected' | 'malformed' | 'transport';

/**
 * Token 取得結果（成功或失敗皆以值回傳，不拋出例外）
 */
export type TokenGrantResult =
  | { ok: true; token: TokenResponse }
  | { ok: false; reason: 'rejected'; status: number; detail: ErrorDetail }
  | { ok: false; reason: 'malformed'; message: string }
  | { ok: false; reason: 'transport'; message: string; cause: unknown };

export type TokenGrantFailure = Extract<TokenGrantResult, { ok: false }>;

export interface AuthHeaders {
  Authorization: string;
}
