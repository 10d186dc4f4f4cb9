/**
 * Auth Command
 */

import { Command } from 'commander';
import { getApiClient, getGlobalOptions } from '../lib/api-client.js';
import { handleCommandError, outputData } from '../utils/output.js';

export const authCommand = new Command('auth')
  .description('Authentication commands');

/**
 * sigma auth token
 * expires_in 為快取中 token 的剩餘秒數
 */
authCommand
  .command('token')
  .description('Get an access token')
  .action(async (_options: object, cmd: Command) => {
    const globals = getGlobalOptions(cmd);
    try {
      const auth = getApiClient(globals).getAuth();
      const accessToken = await auth.getToken();
      outputData(
        {
          access_token: accessToken,
          token_type: 'Bearer',
          expires_in: auth.getExpiresIn(),
        },
        globals
      );
    } catch (error) {
      handleCommandError(error);
    }
  });
