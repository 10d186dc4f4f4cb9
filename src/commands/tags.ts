/**
 * Tags Command
 * 版本標籤指令
 */

import { Command } from 'commander';
import { getApiClient, getGlobalOptions } from '../lib/api-client.js';
import { buildBody, segment, type BodyOptions } from '../lib/command-options.js';
import { handleCommandError, outputData, printSuccess, type ColumnDef } from '../utils/output.js';

const TAG_COLUMNS: ColumnDef[] = [{ key: 'tagId' }, { key: 'name' }, { key: 'color' }];

interface WriteOptions extends BodyOptions {
  name?: string;
  color?: string;
}

export const tagsCommand = new Command('tags')
  .description('Manage version tags');

tagsCommand
  .command('list')
  .description('List tags')
  .option('--inode-id <inodeId>', 'Only tags on this document')
  .action(async (options: { inodeId?: string }, cmd: Command) => {
    const globals = getGlobalOptions(cmd);
    try {
      const api = getApiClient(globals);
      outputData(await api.get('/v2/tags', { inodeId: options.inodeId }), globals, TAG_COLUMNS);
    } catch (error) {
      handleCommandError(error);
    }
  });

tagsCommand
  .command('create')
  .description('Create a tag')
  .option('-n, --name <name>', 'Tag name')
  .option('--color <color>', 'Tag color')
  .option('--json <json>', 'Request body as JSON string')
  .option('--file <path>', 'Request body from JSON file')
  .action(async (options: WriteOptions, cmd: Command) => {
    const globals = getGlobalOptions(cmd);
    try {
      const api = getApiClient(globals);
      const body = await buildBody(
        options,
        { name: options.name, color: options.color },
        'No data provided. Use --name, --color, --json, --file, or pipe JSON to stdin.'
      );
      outputData(await api.post('/v2/tags', body), globals);
      printSuccess('Tag created successfully!');
    } catch (error) {
      handleCommandError(error);
    }
  });

tagsCommand
  .command('update <tagId>')
  .description('Update a tag')
  .option('-n, --name <name>', 'Tag name')
  .option('--color <color>', 'Tag color')
  .option('--json <json>', 'Request body as JSON string')
  .option('--file <path>', 'Request body from JSON file')
  .action(async (tagId: string, options: WriteOptions, cmd: Command) => {
    const globals = getGlobalOptions(cmd);
    try {
      const api = getApiClient(globals);
      const body = await buildBody(options, { name: options.name, color: options.color });
      outputData(await api.patch(`/v2/tags/${segment(tagId)}`, body), globals);
      printSuccess('Tag updated successfully!');
    } catch (error) {
      handleCommandError(error);
    }
  });

tagsCommand
  .command('delete <tagId>')
  .description('Delete a tag')
  .action(async (tagId: string, _options: object, cmd: Command) => {
    const globals = getGlobalOptions(cmd);
    try {
      const api = getApiClient(globals);
      await api.delete(`/v2/tags/${segment(tagId)}`);
      printSuccess(`Tag ${tagId} deleted successfully!`);
    } catch (error) {
      handleCommandError(error);
    }
  });

tagsCommand
  .command('assign <tagId> <inodeId>')
  .description('Assign a tag to a document')
  .action(async (tagId: string, inodeId: string, _options: object, cmd: Command) => {
    const globals = getGlobalOptions(cmd);
    try {
      const api = getApiClient(globals);
      await api.put(`/v2/tags/${segment(tagId)}/files/${segment(inodeId)}`);
      printSuccess(`Tag ${tagId} assigned to ${inodeId}!`);
    } catch (error) {
      handleCommandError(error);
    }
  });
