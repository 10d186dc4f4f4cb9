/**
 * Config Command
 * 儲存認證資訊到 ~/.sigma/config.json
 *
 * 使用全域選項：sigma config --client-id <id> --secret <secret> [--base-url <url>] [--timeout <ms>]
 */

import { Command } from 'commander';
import { getGlobalOptions, toOverrides } from '../lib/api-client.js';
import { ConfigService, parseTimeout } from '../services/config.js';
import { handleCommandError, outputData, printInfo, printSuccess } from '../utils/output.js';
import type { AppConfig } from '../types/config.js';

export const configCommand = new Command('config')
  .description('Save credentials and settings (use the global --client-id, --secret, --base-url, --timeout)')
  .option('--show', 'Show the current configuration')
  .action((options: { show?: boolean }, cmd: Command) => {
    const globals = getGlobalOptions(cmd);
    try {
      const config = new ConfigService();

      if (options.show) {
        const resolved = config.resolve(toOverrides(globals));
        printInfo('Current configuration:');
        outputData(
          {
            clientId: resolved.clientId ?? '(not set)',
            secret: resolved.clientSecret ? '***' : '(not set)',
            baseUrl: resolved.baseUrl,
            timeoutMs: resolved.timeoutMs,
            configPath: config.getConfigPath(),
          },
          { format: 'json', compact: globals.compact }
        );
        return;
      }

      const timeoutMs = parseTimeout(globals.timeout);
      if (globals.timeout !== undefined && timeoutMs === undefined) {
        throw new Error(`Invalid --timeout value: ${globals.timeout}. Must be a positive integer (milliseconds).`);
      }

      const updates: AppConfig = {
        clientId: globals.clientId,
        clientSecret: globals.secret,
        baseUrl: globals.baseUrl,
        timeoutMs,
      };

      if (Object.values(updates).every((value) => value === undefined)) {
        throw new Error('No configuration provided. Use --client-id, --secret, --base-url or --timeout.');
      }

      config.update(updates);
      printSuccess(`Configuration saved to ${config.getConfigPath()}`);
    } catch (error) {
      handleCommandError(error);
    }
  });
