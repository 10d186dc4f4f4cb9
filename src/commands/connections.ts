/**
 * Connections Command
 * 資料連線指令
 */

import { Command } from 'commander';
import { getApiClient, getGlobalOptions } from '../lib/api-client.js';
import { pageQuery, parsePositiveInt, segment, type PageOptions } from '../lib/command-options.js';
import { handleCommandError, outputData, type ColumnDef } from '../utils/output.js';

const CONNECTION_COLUMNS: ColumnDef[] = [
  { key: 'connectionId' },
  { key: 'name' },
  { key: 'type' },
  { key: 'isSample' },
];

interface ListOptions extends PageOptions {
  search?: string;
  archived?: boolean;
}

export const connectionsCommand = new Command('connections')
  .description('Manage data connections');

connectionsCommand
  .command('list')
  .description('List connections')
  .option('-l, --limit <n>', 'Number of results', parsePositiveInt)
  .option('-p, --page <token>', 'Page token')
  .option('-s, --search <query>', 'Search query')
  .option('--archived', 'Include archived connections')
  .action(async (options: ListOptions, cmd: Command) => {
    const globals = getGlobalOptions(cmd);
    try {
      const api = getApiClient(globals);
      const response = await api.get('/v2/connections', {
        ...pageQuery(options),
        search: options.search,
        includeArchived: options.archived ? true : undefined,
      });
      outputData(response, globals, CONNECTION_COLUMNS);
    } catch (error) {
      handleCommandError(error);
    }
  });

connectionsCommand
  .command('get <connectionId>')
  .description('Get a connection by ID')
  .action(async (connectionId: string, _options: object, cmd: Command) => {
    const globals = getGlobalOptions(cmd);
    try {
      const api = getApiClient(globals);
      outputData(await api.get(`/v2/connections/${segment(connectionId)}`), globals);
    } catch (error) {
      handleCommandError(error);
    }
  });

connectionsCommand
  .command('test <connectionId>')
  .description('Test a connection')
  .action(async (connectionId: string, _options: object, cmd: Command) => {
    const globals = getGlobalOptions(cmd);
    try {
      const api = getApiClient(globals);
      outputData(await api.post(`/v2/connections/${segment(connectionId)}/test`), globals);
    } catch (error) {
      handleCommandError(error);
    }
  });
