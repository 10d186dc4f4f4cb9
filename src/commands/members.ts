/**
 * Members Command
 * 組織成員管理指令（成員可用 UUID、email 或全名指定）
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
import { resolveMemberId } from '../lib/entity-resolvers.js';
import { JsonInputError, mergeJsonWithParams, readJsonObject } from '../lib/json-input.js';
import { handleCommandError, outputData, printSuccess, type ColumnDef } from '../utils/output.js';
import type { JsonObject } from '../types/api.js';

const MEMBER_COLUMNS: ColumnDef[] = [
  { key: 'memberId' },
  { key: 'email' },
  { key: 'firstName' },
  { key: 'lastName' },
  { key: 'accountType' },
];

const TEAM_COLUMNS: ColumnDef[] = [{ key: 'teamId' }, { key: 'name' }, { key: 'description' }];

/** 必填欄位與對應的命令列參數 */
const REQUIRED_FIELDS: ReadonlyArray<[string, string]> = [
  ['email', '--email'],
  ['firstName', '--first-name'],
  ['lastName', '--last-name'],
  ['memberType', '--member-type'],
];

interface CreateOptions extends BodyOptions {
  email?: string;
  firstName?: string;
  lastName?: string;
  memberType?: string;
  teams?: string;
  userKind?: string;
  invite: boolean;
}

/**
 * 組出建立成員的 body：JSON 輸入優先，命令列只補上缺少的欄位
 */
export function buildMemberCreateBody(base: JsonObject | undefined, options: CreateOptions): JsonObject {
  const teamIds = options.teams
    ?.split(',')
    .map((id) => id.trim())
    .filter((id) => id.length > 0);

  const fromFlags = mergeJsonWithParams(undefined, {
    email: options.email,
    firstName: options.firstName,
    lastName: options.lastName,
    memberType: options.memberType,
    userKind: options.userKind,
    addToTeams: teamIds && teamIds.length > 0 ? teamIds.map((teamId) => ({ teamId })) : undefined,
  });

  return { ...fromFlags, ...base };
}

export function missingMemberFields(body: JsonObject): string[] {
  return REQUIRED_FIELDS.filter(([field]) => body[field] === undefined).map(([, flag]) => flag);
}

export const membersCommand = new Command('members')
  .description('Manage organization members');

membersCommand
  .command('list')
  .description('List members')
  .option('-l, --limit <n>', 'Number of results', parsePositiveInt)
  .option('-p, --page <token>', 'Page token')
  .action(async (options: PageOptions, cmd: Command) => {
    const globals = getGlobalOptions(cmd);
    try {
      const api = getApiClient(globals);
      outputData(await api.get('/v2/members', pageQuery(options)), globals, MEMBER_COLUMNS);
    } catch (error) {
      handleCommandError(error);
    }
  });

membersCommand
  .command('get <member>')
  .description('Get a member by ID, email or full name')
  .action(async (member: string, _options: object, cmd: Command) => {
    const globals = getGlobalOptions(cmd);
    try {
      const api = getApiClient(globals);
      const memberId = await resolveMemberId(api, member);
      outputData(await api.get(`/v2/members/${segment(memberId)}`), globals);
    } catch (error) {
      handleCommandError(error);
    }
  });

membersCommand
  .command('create')
  .description('Create a member (requires email, first name, last name and member type)')
  .option('--email <email>', 'Member email')
  .option('--first-name <name>', 'First name')
  .option('--last-name <name>', 'Last name')
  .option('--member-type <type>', "Account type, e.g. 'Viewer' or 'Creator'")
  .option('--teams <ids>', 'Comma-separated team IDs to add the member to')
  .option('--user-kind <kind>', 'User kind: internal, guest or embed')
  .option('--no-invite', 'Do not send an email invitation')
  .option('--json <json>', 'Request body as JSON string')
  .option('--file <path>', 'Request body from JSON file')
  .action(async (options: CreateOptions, cmd: Command) => {
    const globals = getGlobalOptions(cmd);
    try {
      const base = await readJsonObject({ json: options.json, file: options.file });
      const body = buildMemberCreateBody(base, options);

      const missing = missingMemberFields(body);
      if (missing.length > 0) {
        throw new JsonInputError(
          `Missing required fields: ${missing.join(', ')}. ` +
            'Use --json or --file to provide all fields, or specify each required option.'
        );
      }

      const api = getApiClient(globals);
      // sendInvite 是查詢參數，不在 body 內
      const response = await api.post('/v2/members', body, {
        sendInvite: options.invite ? 'true' : 'false',
      });
      outputData(response, globals);
      printSuccess('Member created successfully!');
    } catch (error) {
      handleCommandError(error);
    }
  });

membersCommand
  .command('update <member>')
  .description('Update a member')
  .option('--json <json>', 'Request body as JSON string')
  .option('--file <path>', 'Request body from JSON file')
  .action(async (member: string, options: BodyOptions, cmd: Command) => {
    const globals = getGlobalOptions(cmd);
    try {
      const body = await buildBody(options, {});
      const api = getApiClient(globals);
      const memberId = await resolveMemberId(api, member);
      outputData(await api.patch(`/v2/members/${segment(memberId)}`, body), globals);
      printSuccess('Member updated successfully!');
    } catch (error) {
      handleCommandError(error);
    }
  });

membersCommand
  .command('delete <member>')
  .description('Delete a member')
  .action(async (member: string, _options: object, cmd: Command) => {
    const globals = getGlobalOptions(cmd);
    try {
      const api = getApiClient(globals);
      const memberId = await resolveMemberId(api, member);
      await api.delete(`/v2/members/${segment(memberId)}`);
      printSuccess(`Member ${member} deleted successfully!`);
    } catch (error) {
      handleCommandError(error);
    }
  });

membersCommand
  .command('teams <member>')
  .description('List the teams of a member')
  .action(async (member: string, _options: object, cmd: Command) => {
    const globals = getGlobalOptions(cmd);
    try {
      const api = getApiClient(globals);
      const memberId = await resolveMemberId(api, member);
      outputData(await api.get(`/v2/members/${segment(memberId)}/teams`), globals, TEAM_COLUMNS);
    } catch (error) {
      handleCommandError(error);
    }
  });
