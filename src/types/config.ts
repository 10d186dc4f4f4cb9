/**
 * 設定檔結構
 */
export interface AppConfig {
  /** Sigma API Client ID */
  clientId?: string;
  /** Sigma API Client Secret */
  clientSecret?: string;
  /** API base URL */
  baseUrl?: string;
  /** HTTP 請求逾時（毫秒） */
  timeoutMs?: number;
}

/**
 * 設定鍵值
 */
export type ConfigKey = keyof AppConfig;

/**
 * 設定值來源
 */
export type ConfigSource = 'argument' | 'environment' | 'file' | 'default';

/**
 * 命令列覆寫值（未提供的欄位不會遮蔽設定檔）
 */
export interface ConfigOverrides {
  clientId?: string;
  clientSecret?: string;
  baseUrl?: string;
  timeoutMs?: number;
}

/**
 * 合併後的設定
 */
export interface ResolvedConfig {
  clientId?: string;
  clientSecret?: string;
  baseUrl: string;
  timeoutMs: number;
  sources: Record<ConfigKey, ConfigSource>;
}
