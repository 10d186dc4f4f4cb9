/**
 * Token Cache
 * 記憶體內的 token 快取（access token、refresh token、到期時間）
 */

import type { TokenState } from '../types/auth.js';

// Token 提前 60 秒視為過期，避免邊界問題
export const TOKEN_EXPIRY_BUFFER_MS = 60 * 1000;

export type Clock = () => number;

export class TokenCache {
  private state: TokenState = {
    accessToken: null,
    refreshToken: null,
    expiresAt: 0,
  };
  private now: Clock;

  constructor(now: Clock = Date.now) {
    this.now = now;
  }

  /**
   * 是否已過期（含 60 秒緩衝）
   */
  isExpired(): boolean {
    return this.now() >= this.state.expiresAt - TOKEN_EXPIRY_BUFFER_MS;
  }

  /**
   * 是否有可直接使用的 access token
   */
  isValid(): boolean {
    return this.state.accessToken !== null && !this.isExpired();
  }

  /**
   * 一次替換三個欄位，到期時間在此刻計算
   */
  setTokens(accessToken: string, refreshToken: string, expiresInSeconds: number): void {
    this.state = {
      accessToken,
      refreshToken,
      expiresAt: this.now() + expiresInSeconds * 1000,
    };
  }

  get accessToken(): string | null {
    return this.state.accessToken;
  }

  get refreshToken(): string | null {
    return this.state.refreshToken;
  }

  get expiresAt(): number {
    return this.state.expiresAt;
  }

  /**
   * 剩餘有效秒數（不含緩衝，最小為 0）
   */
  getExpiresInSeconds(): number {
    return Math.max(0, Math.floor((this.state.expiresAt - this.now()) / 1000));
  }

  clear(): void {
    this.state = { accessToken: null, refreshToken: null, expiresAt: 0 };
  }
}
