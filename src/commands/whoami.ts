/**
 * Whoami Command
 */

import { Command } from 'commander';
import { getApiClient, getGlobalOptions } from '../lib/api-client.js';
import { handleCommandError, outputData } from '../utils/output.js';

export const whoamiCommand = new Command('whoami')
  .description('Show the identity behind the configured credentials')
  .action(async (_options: object, cmd: Command) => {
    const globals = getGlobalOptions(cmd);
    try {
      const api = getApiClient(globals);
      outputData(await api.get('/v2/whoami'), globals);
    } catch (error) {
      handleCommandError(error);
    }
  });
