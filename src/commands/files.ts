/**
 * Files Command
 * 檔案（資料夾 / 文件）管理指令
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

const FILE_COLUMNS: ColumnDef[] = [
  { key: 'inodeId' },
  { key: 'name' },
  { key: 'type' },
  { key: 'path' },
  { key: 'createdBy' },
];

interface ListOptions extends PageOptions {
  path?: string;
}

interface WriteOptions extends BodyOptions {
  name?: string;
}

export const filesCommand = new Command('files')
  .description('Manage files and folders');

filesCommand
  .command('list')
  .description('List files')
  .option('-l, --limit <n>', 'Number of results', parsePositiveInt)
  .option('-p, --page <token>', 'Page token')
  .option('--path <path>', 'Folder path')
  .action(async (options: ListOptions, cmd: Command) => {
    const globals = getGlobalOptions(cmd);
    try {
      const api = getApiClient(globals);
      const response = await api.get('/v2/files', { ...pageQuery(options), path: options.path });
      outputData(response, globals, FILE_COLUMNS);
    } catch (error) {
      handleCommandError(error);
    }
  });

filesCommand
  .command('get <inodeId>')
  .description('Get a file by ID')
  .action(async (inodeId: string, _options: object, cmd: Command) => {
    const globals = getGlobalOptions(cmd);
    try {
      const api = getApiClient(globals);
      outputData(await api.get(`/v2/files/${segment(inodeId)}`), globals);
    } catch (error) {
      handleCommandError(error);
    }
  });

filesCommand
  .command('create')
  .description('Create a file or folder')
  .option('-n, --name <name>', 'File name')
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
      outputData(await api.post('/v2/files', body), globals);
      printSuccess('File created successfully!');
    } catch (error) {
      handleCommandError(error);
    }
  });

filesCommand
  .command('update <inodeId>')
  .description('Update a file')
  .option('-n, --name <name>', 'File name')
  .option('--json <json>', 'Request body as JSON string')
  .option('--file <path>', 'Request body from JSON file')
  .action(async (inodeId: string, options: WriteOptions, cmd: Command) => {
    const globals = getGlobalOptions(cmd);
    try {
      const api = getApiClient(globals);
      const body = await buildBody(options, { name: options.name });
      outputData(await api.patch(`/v2/files/${segment(inodeId)}`, body), globals);
      printSuccess('File updated successfully!');
    } catch (error) {
      handleCommandError(error);
    }
  });

filesCommand
  .command('delete <inodeId>')
  .description('Delete a file')
  .action(async (inodeId: string, _options: object, cmd: Command) => {
    const globals = getGlobalOptions(cmd);
    try {
      const api = getApiClient(globals);
      await api.delete(`/v2/files/${segment(inodeId)}`);
      printSuccess(`File ${inodeId} deleted successfully!`);
    } catch (error) {
      handleCommandError(error);
    }
  });
