/**
 * Workbooks Command
 * 工作簿管理指令
 */

import { Command } from 'commander';
import { getApiClient, getGlobalOptions } from '../lib/api-client.js';
import {
  buildBody,
  pageQuery,
  parsePositiveInt,
  segment,
  type BodyOptions,
  type PageOptions,
} from '../lib/command-options.js';
import { handleCommandError, outputData, printSuccess, type ColumnDef } from '../utils/output.js';

const WORKBOOK_COLUMNS: ColumnDef[] = [
  { key: 'workbookId' },
  { key: 'name' },
  { key: 'createdBy' },
  { key: 'updatedAt' },
];

interface ListOptions extends PageOptions {
  search?: string;
}

interface WriteOptions extends BodyOptions {
  name?: string;
}

export const workbooksCommand = new Command('workbooks')
  .description('Manage workbooks');

/**
 * sigma workbooks list
 */
workbooksCommand
  .command('list')
  .description('List workbooks')
  .option('-l, --limit <n>', 'Number of results', parsePositiveInt)
  .option('-p, --page <token>', 'Page token')
  .option('-s, --search <query>', 'Search query')
  .action(async (options: ListOptions, cmd: Command) => {
    const globals = getGlobalOptions(cmd);
    try {
      const api = getApiClient(globals);
      const response = await api.get('/v2/workbooks', {
        ...pageQuery(options),
        search: options.search,
      });
      outputData(response, globals, WORKBOOK_COLUMNS);
    } catch (error) {
      handleCommandError(error);
    }
  });

/**
 * sigma workbooks get <workbookId>
 */
workbooksCommand
  .command('get <workbookId>')
  .description('Get a workbook by ID')
  .action(async (workbookId: string, _options: object, cmd: Command) => {
    const globals = getGlobalOptions(cmd);
    try {
      const api = getApiClient(globals);
      outputData(await api.get(`/v2/workbooks/${segment(workbookId)}`), globals);
    } catch (error) {
      handleCommandError(error);
    }
  });

/**
 * sigma workbooks create
 */
workbooksCommand
  .command('create')
  .description('Create a workbook')
  .option('-n, --name <name>', 'Workbook name')
  .option('--json <json>', 'Request body as JSON string')
  .option('--file <path>', 'Request body from JSON file')
  .action(async (options: WriteOptions, cmd: Command) => {
    const globals = getGlobalOptions(cmd);
    try {
      const api = getApiClient(globals);
      const body = await buildBody(
        options,
        { name: options.name },
        'No data provided. Use --name, --json, --file, or pipe JSON to stdin.'
      );
      outputData(await api.post('/v2/workbooks', body), globals);
      printSuccess('Workbook created successfully!');
    } catch (error) {
      handleCommandError(error);
    }
  });

/**
 * sigma workbooks update <workbookId>
 */
workbooksCommand
  .command('update <workbookId>')
  .description('Update a workbook')
  .option('-n, --name <name>', 'Workbook name')
  .option('--json <json>', 'Request body as JSON string')
  .option('--file <path>', 'Request body from JSON file')
  .action(async (workbookId: string, options: WriteOptions, cmd: Command) => {
    const globals = getGlobalOptions(cmd);
    try {
      const api = getApiClient(globals);
      const body = await buildBody(options, { name: options.name });
      outputData(await api.patch(`/v2/workbooks/${segment(workbookId)}`, body), globals);
      printSuccess('Workbook updated successfully!');
    } catch (error) {
      handleCommandError(error);
    }
  });

/**
 * sigma workbooks delete <workbookId>
 */
workbooksCommand
  .command('delete <workbookId>')
  .description('Delete a workbook')
  .action(async (workbookId: string, _options: object, cmd: Command) => {
    const globals = getGlobalOptions(cmd);
    try {
      const api = getApiClient(globals);
      await api.delete(`/v2/workbooks/${segment(workbookId)}`);
      printSuccess(`Workbook ${workbookId} deleted successfully!`);
    } catch (error) {
      handleCommandError(error);
    }
  });
