/**
 * API Client Helper
 * 由全域選項 + 設定建立 SigmaApiClient
 */

import type { Command } from 'commander';
import { SigmaApiClient } from '../services/api.js';
import { ConfigService, parseTimeout } from '../services/config.js';
import { setLogLevel } from './logger.js';
import type { ConfigOverrides } from '../types/config.js';
import type { OutputFormat } from '../utils/output.js';

export interface GlobalOptions {
  format: OutputFormat;
  compact: boolean;
  verbose: boolean;
  clientId?: string;
  secret?: string;
  baseUrl?: string;
  timeout?: string;
}

/**
 * 缺少 client id / secret
 */
export class MissingCredentialsError extends Error {
  public readonly code = 'MISSING_CREDENTIALS';

  constructor() {
    super(
      'Missing credentials. Set SIGMA_CLIENT_ID and SIGMA_SECRET, ' +
        "or use --client-id and --secret options, or run 'sigma config' to save them."
    );
    this.name = 'MissingCredentialsError';
  }
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function toFormat(value: unknown): OutputFormat {
  return value === 'table' || value === 'csv' ? value : 'json';
}

/**
 * 取得全域選項（commander 的 opts 是 Record<string, any>，這裡逐一收斂）
 */
export function getGlobalOptions(cmd: Command): GlobalOptions {
  const opts: Record<string, unknown> = cmd.optsWithGlobals();
  return {
    format: toFormat(opts.format),
    compact: opts.compact === true,
    verbose: opts.verbose === true,
    clientId: optionalString(opts.clientId),
    secret: optionalString(opts.secret),
    baseUrl: optionalString(opts.baseUrl),
    timeout: optionalString(opts.timeout),
  };
}

export function toOverrides(globals: GlobalOptions): ConfigOverrides {
  return {
    clientId: globals.clientId,
    clientSecret: globals.secret,
    baseUrl: globals.baseUrl,
    timeoutMs: parseTimeout(globals.timeout),
  };
}

/**
 * 建立 SigmaApiClient
 * @throws MissingCredentialsError 未設定 client id 或 secret
 */
export function getApiClient(globals: GlobalOptions, config: ConfigService = new ConfigService()): SigmaApiClient {
  const overrides = toOverrides(globals);

  if (globals.verbose) {
    setLogLevel('debug');
    console.error('Configuration sources:');
    for (const line of config.describeSources(overrides)) {
      console.error(line);
    }
  }

  const resolved = config.resolve(overrides);
  if (!resolved.clientId || !resolved.clientSecret) {
    throw new MissingCredentialsError();
  }

  return new SigmaApiClient(
    { clientId: resolved.clientId, clientSecret: resolved.clientSecret, baseUrl: resolved.baseUrl },
    { timeoutMs: resolved.timeoutMs }
  );
}
