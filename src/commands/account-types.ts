/**
 * Account Types Command
 */

import { Command } from 'commander';
import { getApiClient, getGlobalOptions } from '../lib/api-client.js';
import { parsePositiveInt, segment } from '../lib/command-options.js';
import { handleCommandError, outputData, type ColumnDef } from '../utils/output.js';

const ACCOUNT_TYPE_COLUMNS: ColumnDef[] = [
  { key: 'accountTypeId' },
  { key: 'accountTypeName' },
  { key: 'isCustom' },
];

interface ListOptions {
  pageSize?: number;
  pageToken?: string;
}

export const accountTypesCommand = new Command('account-types')
  .description('Manage account types');

accountTypesCommand
  .command('list')
  .description('List account types')
  .option('--page-size <n>', 'Number of results per page', parsePositiveInt)
  .option('--page-token <token>', 'Page token')
  .action(async (options: ListOptions, cmd: Command) => {
    const globals = getGlobalOptions(cmd);
    try {
      const api = getApiClient(globals);
      const response = await api.get('/v2/accountTypes', {
        pageSize: options.pageSize,
        pageToken: options.pageToken,
      });
      outputData(response, globals, ACCOUNT_TYPE_COLUMNS);
    } catch (error) {
      handleCommandError(error);
    }
  });

accountTypesCommand
  .command('permissions <accountTypeId>')
  .description('List the permissions of an account type')
  .action(async (accountTypeId: string, _options: object, cmd: Command) => {
    const globals = getGlobalOptions(cmd);
    try {
      const api = getApiClient(globals);
      outputData(await api.get(`/v2/accountTypes/${segment(accountTypeId)}/permissions`), globals);
    } catch (error) {
      handleCommandError(error);
    }
  });
