import { describe, it, expect, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Command } from 'commander';
import {
  getApiClient,
  getGlobalOptions,
  MissingCredentialsError,
  toOverrides,
  type GlobalOptions,
} from '../../src/lib/api-client.js';
import { setLogLevel } from '../../src/lib/logger.js';
import { ConfigService } from '../../src/services/config.js';

const dirs: string[] = [];

function tempConfig(): ConfigService {
  const dir = mkdtempSync(path.join(os.tmpdir(), 'sigma-api-client-'));
  dirs.push(dir);
  return new ConfigService(path.join(dir, 'config.json'));
}

describe('getGlobalOptions', () => {
  it('should read root options from a subcommand', () => {
    const root = new Command('sigma')
      .option('-f, --format <format>', 'Output format', 'json')
      .option('--compact')
      .option('--client-id <id>')
      .option('--timeout <ms>');
    let seen: GlobalOptions | undefined;
    root.command('whoami').action((_options: object, cmd: Command) => {
      seen = getGlobalOptions(cmd);
    });

    root.parse(['node', 'sigma', 'whoami', '-f', 'csv', '--compact', '--client-id', 'abc', '--timeout', '500']);

    expect(seen).toEqual({
      format: 'csv',
      compact: true,
      verbose: false,
      clientId: 'abc',
      secret: undefined,
      baseUrl: undefined,
      timeout: '500',
    });
  });
});

describe('toOverrides', () => {
  it('should map global options to config overrides', () => {
    expect(
      toOverrides({ format: 'json', compact: false, verbose: false, secret: 'test-secret', timeout: '2500' })
    ).toEqual({ clientId: undefined, clientSecret: 'test-secret', baseUrl: undefined, timeoutMs: 2500 });
  });
});

describe('getApiClient', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    setLogLevel('warn');
    for (const dir of dirs.splice(0)) {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('should throw MissingCredentialsError without a secret', () => {
    vi.stubEnv('SIGMA_CLIENT_ID', '');
    vi.stubEnv('SIGMA_SECRET', '');

    expect(() =>
      getApiClient({ format: 'json', compact: false, verbose: false, clientId: 'abc' }, tempConfig())
    ).toThrow(MissingCredentialsError);
  });

  it('should build a client from saved config and option overrides', () => {
    vi.stubEnv('SIGMA_CLIENT_ID', '');
    vi.stubEnv('SIGMA_SECRET', '');
    vi.stubEnv('SIGMA_BASE_URL', '');
    const config = tempConfig();
    config.update({ clientId: 'saved-client', clientSecret: 'test-secret' });

    const client = getApiClient(
      { format: 'json', compact: false, verbose: false, baseUrl: 'https://api.example.com/v2' },
      config
    );

    expect(client.getBaseUrl()).toBe('https://api.example.com/v2');
    expect(client.buildUrl('/v2/whoami')).toBe('https://api.example.com/v2/whoami');
  });

  it('should print configuration sources when verbose', () => {
    vi.stubEnv('SIGMA_CLIENT_ID', '');
    vi.stubEnv('SIGMA_SECRET', '');
    vi.stubEnv('SIGMA_BASE_URL', '');
    vi.stubEnv('SIGMA_TIMEOUT_MS', '');
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const config = tempConfig();

    getApiClient(
      { format: 'json', compact: false, verbose: true, clientId: 'client-123', secret: 'test-secret' },
      config
    );

    expect(error.mock.calls.map(([line]) => line)).toEqual([
      'Configuration sources:',
      '  clientId: clie...-123 (command-line option)',
      '  clientSecret: test***cret (command-line option)',
      '  baseUrl: https://aws-api.sigmacomputing.com/v2 (default)',
      '  timeoutMs: 30000 (default)',
    ]);
  });
});
