/**
 * Config Service
 * 設定管理服務 - 處理設定檔讀寫、環境變數與命令列覆寫
 *
 * 優先順序：命令列 > 環境變數 > 設定檔 > 預設值
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { loggers } from '../lib/logger.js';
import { DEFAULT_TIMEOUT_MS } from './token-client.js';
import type {
  AppConfig,
  ConfigKey,
  ConfigOverrides,
  ConfigSource,
  ResolvedConfig,
} from '../types/config.js';

export const DEFAULT_BASE_URL = 'https://aws-api.sigmacomputing.com/v2';

const DEFAULT_CONFIG_DIR = '.sigma';
const DEFAULT_CONFIG_FILE = 'config.json';

const ENV_KEYS: Record<ConfigKey, string> = {
  clientId: 'SIGMA_CLIENT_ID',
  clientSecret: 'SIGMA_SECRET',
  baseUrl: 'SIGMA_BASE_URL',
  timeoutMs: 'SIGMA_TIMEOUT_MS',
};

const CONFIG_KEYS: ConfigKey[] = ['clientId', 'clientSecret', 'baseUrl', 'timeoutMs'];

/**
 * 解析逾時設定，非正整數回傳 undefined
 */
export function parseTimeout(value: string | number | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  const parsed = typeof value === 'number' ? value : Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : undefined;
}

/**
 * 遮蔽敏感值
 */
export function maskValue(key: ConfigKey, value: string | number | undefined): string {
  if (value === undefined || value === '') return '[not set]';
  const text = String(value);
  if (key === 'clientSecret') {
    return text.length > 8 ? `${text.slice(0, 4)}${'*'.repeat(text.length - 8)}${text.slice(-4)}` : '***';
  }
  if (key === 'clientId') {
    return text.length > 8 ? `${text.slice(0, 4)}...${text.slice(-4)}` : text;
  }
  return text;
}

/**
 * 只保留型別正確的欄位
 */
function sanitize(raw: unknown): AppConfig {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return {};
  }
  const config: AppConfig = {};
  const record: Record<string, unknown> = { ...raw };
  if (typeof record.clientId === 'string') config.clientId = record.clientId;
  if (typeof record.clientSecret === 'string') config.clientSecret = record.clientSecret;
  if (typeof record.baseUrl === 'string') config.baseUrl = record.baseUrl;
  if (typeof record.timeoutMs === 'number') config.timeoutMs = record.timeoutMs;
  return config;
}

export class ConfigService {
  private configPath: string;
  private config: AppConfig;

  constructor(configPath?: string) {
    this.configPath = configPath || path.join(os.homedir(), DEFAULT_CONFIG_DIR, DEFAULT_CONFIG_FILE);
    this.config = this.load();
  }

  /**
   * 載入設定檔，讀取失敗時使用空設定
   */
  private load(): AppConfig {
    if (!fs.existsSync(this.configPath)) {
      return {};
    }
    try {
      const content = fs.readFileSync(this.configPath, 'utf-8');
      return sanitize(JSON.parse(content));
    } catch (error) {
      loggers.config.warn('Could not load config file', {
        path: this.configPath,
        reason: error instanceof Error ? error.message : String(error),
      });
      return {};
    }
  }

  /**
   * 儲存設定檔（僅擁有者可讀寫）
   */
  private save(): void {
    const dir = path.dirname(this.configPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(this.configPath, JSON.stringify(this.config, null, 2), {
      encoding: 'utf-8',
      mode: 0o600,
    });
    // writeFileSync 的 mode 只在建立檔案時生效
    fs.chmodSync(this.configPath, 0o600);
  }

  get<K extends ConfigKey>(key: K): AppConfig[K] {
    return this.config[key];
  }

  set<K extends ConfigKey>(key: K, value: AppConfig[K]): void {
    this.config[key] = value;
    this.save();
  }

  /**
   * 一次更新多個欄位（只寫一次檔案）
   */
  update(values: AppConfig): void {
    for (const key of CONFIG_KEYS) {
      if (values[key] !== undefined) {
        this.config = { ...this.config, [key]: values[key] };
      }
    }
    this.save();
  }

  getAll(): AppConfig {
    return { ...this.config };
  }

  delete(key: ConfigKey): void {
    delete this.config[key];
    this.save();
  }

  clear(): void {
    this.config = {};
    this.save();
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * 讀取環境變數（空字串視為未設定）
   */
  private fromEnv(key: ConfigKey): string | undefined {
    const value = process.env[ENV_KEYS[key]];
    return value && value.length > 0 ? value : undefined;
  }

  /**
   * 合併所有來源
   */
  resolve(overrides: ConfigOverrides = {}): ResolvedConfig {
    const pick = <K extends ConfigKey>(
      key: K,
      fromEnv: (raw: string) => AppConfig[K] | undefined
    ): [AppConfig[K] | undefined, ConfigSource] => {
      const override = overrides[key];
      if (override !== undefined && override !== '') {
        return [override, 'argument'];
      }
      const rawEnv = this.fromEnv(key);
      const envValue = rawEnv === undefined ? undefined : fromEnv(rawEnv);
      if (envValue !== undefined) {
        return [envValue, 'environment'];
      }
      const fileValue = this.config[key];
      if (fileValue !== undefined) {
        return [fileValue, 'file'];
      }
      return [undefined, 'default'];
    };

    const [clientId, clientIdSource] = pick('clientId', (raw) => raw);
    const [clientSecret, clientSecretSource] = pick('clientSecret', (raw) => raw);
    const [baseUrl, baseUrlSource] = pick('baseUrl', (raw) => raw);
    const [timeoutMs, timeoutSource] = pick('timeoutMs', parseTimeout);

    return {
      clientId,
      clientSecret,
      baseUrl: baseUrl ?? DEFAULT_BASE_URL,
      timeoutMs: timeoutMs ?? DEFAULT_TIMEOUT_MS,
      sources: {
        clientId: clientIdSource,
        clientSecret: clientSecretSource,
        baseUrl: baseUrlSource,
        timeoutMs: timeoutSource,
      },
    };
  }

  /**
   * 列出每個設定值與來源（敏感值遮蔽），供 --verbose 使用
   */
  describeSources(overrides: ConfigOverrides = {}): string[] {
    const resolved = this.resolve(overrides);
    return CONFIG_KEYS.map((key) => {
      const source = resolved.sources[key];
      const label =
        source === 'environment'
          ? `environment variable (${ENV_KEYS[key]})`
          : source === 'file'
            ? `config file (${this.configPath})`
            : source === 'argument'
              ? 'command-line option'
              : 'default';
      return `  ${key}: ${maskValue(key, resolved[key])} (${label})`;
    });
  }

  /**
   * 檢查是否有完整的認證資訊
   */
  hasCredentials(overrides: ConfigOverrides = {}): boolean {
    const { clientId, clientSecret } = this.resolve(overrides);
    return Boolean(clientId && clientSecret);
  }
}
