/**
 * Datasets Command
 * 資料集與授權管理指令
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

const DATASET_COLUMNS: ColumnDef[] = [
  { key: 'datasetId' },
  { key: 'name' },
  { key: 'type' },
  { key: 'createdBy' },
];

interface ListOptions extends PageOptions {
  search?: string;
}

export const datasetsCommand = new Command('datasets')
  .description('Manage datasets');

datasetsCommand
  .command('list')
  .description('List datasets')
  .option('-l, --limit <n>', 'Number of results', parsePositiveInt)
  .option('-p, --page <token>', 'Page token')
  .option('-s, --search <query>', 'Search query')
  .action(async (options: ListOptions, cmd: Command) => {
    const globals = getGlobalOptions(cmd);
    try {
      const api = getApiClient(globals);
      const response = await api.get('/v2/datasets', {
        ...pageQuery(options),
        search: options.search,
      });
      outputData(response, globals, DATASET_COLUMNS);
    } catch (error) {
      handleCommandError(error);
    }
  });

datasetsCommand
  .command('get <datasetId>')
  .description('Get a dataset by ID')
  .action(async (datasetId: string, _options: object, cmd: Command) => {
    const globals = getGlobalOptions(cmd);
    try {
      const api = getApiClient(globals);
      outputData(await api.get(`/v2/datasets/${segment(datasetId)}`), globals);
    } catch (error) {
      handleCommandError(error);
    }
  });

datasetsCommand
  .command('grants <datasetId>')
  .description('List grants on a dataset')
  .action(async (datasetId: string, _options: object, cmd: Command) => {
    const globals = getGlobalOptions(cmd);
    try {
      const api = getApiClient(globals);
      outputData(await api.get(`/v2/datasets/${segment(datasetId)}/grants`), globals);
    } catch (error) {
      handleCommandError(error);
    }
  });

datasetsCommand
  .command('create-grant <datasetId>')
  .description('Create a grant on a dataset')
  .option('--json <json>', 'Request body as JSON string')
  .option('--file <path>', 'Request body from JSON file')
  .action(async (datasetId: string, options: BodyOptions, cmd: Command) => {
    const globals = getGlobalOptions(cmd);
    try {
      const api = getApiClient(globals);
      const body = await buildBody(options, {});
      outputData(await api.post(`/v2/datasets/${segment(datasetId)}/grants`, body), globals);
      printSuccess('Grant created successfully!');
    } catch (error) {
      handleCommandError(error);
    }
  });

datasetsCommand
  .command('update-grant <datasetId> <grantId>')
  .description('Update a grant on a dataset')
  .option('--json <json>', 'Request body as JSON string')
  .option('--file <path>', 'Request body from JSON file')
  .action(async (datasetId: string, grantId: string, options: BodyOptions, cmd: Command) => {
    const globals = getGlobalOptions(cmd);
    try {
      const api = getApiClient(globals);
      const body = await buildBody(options, {});
      const path = `/v2/datasets/${segment(datasetId)}/grants/${segment(grantId)}`;
      outputData(await api.patch(path, body), globals);
      printSuccess('Grant updated successfully!');
    } catch (error) {
      handleCommandError(error);
    }
  });

datasetsCommand
  .command('delete-grant <datasetId> <grantId>')
  .description('Delete a grant on a dataset')
  .action(async (datasetId: string, grantId: string, _options: object, cmd: Command) => {
    const globals = getGlobalOptions(cmd);
    try {
      const api = getApiClient(globals);
      await api.delete(`/v2/datasets/${segment(datasetId)}/grants/${segment(grantId)}`);
      printSuccess(`Grant ${grantId} deleted successfully!`);
    } catch (error) {
      handleCommandError(error);
    }
  });
