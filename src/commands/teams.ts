/**
 * Teams Command
 * 團隊管理指令（團隊可用 UUID 或名稱指定）
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
import { resolveMemberId, resolveTeamId } from '../lib/entity-resolvers.js';
import { handleCommandError, outputData, printSuccess, type ColumnDef } from '../utils/output.js';
import type { TeamMembershipChange } from '../types/api.js';

const TEAM_COLUMNS: ColumnDef[] = [{ key: 'teamId' }, { key: 'name' }, { key: 'description' }];

const MEMBER_COLUMNS: ColumnDef[] = [
  { key: 'memberId' },
  { key: 'email' },
  { key: 'firstName' },
  { key: 'lastName' },
];

interface WriteOptions extends BodyOptions {
  name?: string;
}

export const teamsCommand = new Command('teams')
  .description('Manage teams');

teamsCommand
  .command('list')
  .description('List teams')
  .option('-l, --limit <n>', 'Number of results', parsePositiveInt)
  .option('-p, --page <token>', 'Page token')
  .action(async (options: PageOptions, cmd: Command) => {
    const globals = getGlobalOptions(cmd);
    try {
      const api = getApiClient(globals);
      outputData(await api.get('/v2/teams', pageQuery(options)), globals, TEAM_COLUMNS);
    } catch (error) {
      handleCommandError(error);
    }
  });

teamsCommand
  .command('get <team>')
  .description('Get a team by name or ID')
  .action(async (team: string, _options: object, cmd: Command) => {
    const globals = getGlobalOptions(cmd);
    try {
      const api = getApiClient(globals);
      const teamId = await resolveTeamId(api, team);
      outputData(await api.get(`/v2/teams/${segment(teamId)}`), globals);
    } catch (error) {
      handleCommandError(error);
    }
  });

teamsCommand
  .command('create')
  .description('Create a team')
  .option('-n, --name <name>', 'Team name')
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
      outputData(await api.post('/v2/teams', body), globals);
      printSuccess('Team created successfully!');
    } catch (error) {
      handleCommandError(error);
    }
  });

teamsCommand
  .command('update <team>')
  .description('Update a team')
  .option('-n, --name <name>', 'Team name')
  .option('--json <json>', 'Request body as JSON string')
  .option('--file <path>', 'Request body from JSON file')
  .action(async (team: string, options: WriteOptions, cmd: Command) => {
    const globals = getGlobalOptions(cmd);
    try {
      const body = await buildBody(options, { name: options.name });
      const api = getApiClient(globals);
      const teamId = await resolveTeamId(api, team);
      outputData(await api.patch(`/v2/teams/${segment(teamId)}`, body), globals);
      printSuccess('Team updated successfully!');
    } catch (error) {
      handleCommandError(error);
    }
  });

teamsCommand
  .command('delete <team>')
  .description('Delete a team')
  .action(async (team: string, _options: object, cmd: Command) => {
    const globals = getGlobalOptions(cmd);
    try {
      const api = getApiClient(globals);
      const teamId = await resolveTeamId(api, team);
      await api.delete(`/v2/teams/${segment(teamId)}`);
      printSuccess(`Team ${team} deleted successfully!`);
    } catch (error) {
      handleCommandError(error);
    }
  });

teamsCommand
  .command('members <team>')
  .description('List the members of a team')
  .action(async (team: string, _options: object, cmd: Command) => {
    const globals = getGlobalOptions(cmd);
    try {
      const api = getApiClient(globals);
      const teamId = await resolveTeamId(api, team);
      outputData(await api.get(`/v2/teams/${segment(teamId)}/members`), globals, MEMBER_COLUMNS);
    } catch (error) {
      handleCommandError(error);
    }
  });

/**
 * sigma teams add-member <team> <member>
 * 成員必須已存在；新成員請用 members create --teams
 */
teamsCommand
  .command('add-member <team> <member>')
  .description('Add an existing member to a team')
  .action(async (team: string, member: string, _options: object, cmd: Command) => {
    const globals = getGlobalOptions(cmd);
    try {
      const api = getApiClient(globals);
      const teamId = await resolveTeamId(api, team);
      const memberId = await resolveMemberId(api, member);
      const change: TeamMembershipChange = { add: [memberId] };
      await api.patch(`/v2/teams/${segment(teamId)}/members`, change);
      printSuccess(`Member '${member}' added to team '${team}'!`);
    } catch (error) {
      handleCommandError(error);
    }
  });

teamsCommand
  .command('remove-member <team> <member>')
  .description('Remove a member from a team')
  .action(async (team: string, member: string, _options: object, cmd: Command) => {
    const globals = getGlobalOptions(cmd);
    try {
      const api = getApiClient(globals);
      const teamId = await resolveTeamId(api, team);
      const memberId = await resolveMemberId(api, member);
      const change: TeamMembershipChange = { remove: [memberId] };
      await api.patch(`/v2/teams/${segment(teamId)}/members`, change);
      printSuccess(`Member '${member}' removed from team '${team}'!`);
    } catch (error) {
      handleCommandError(error);
    }
  });
