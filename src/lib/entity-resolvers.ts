/**
 * Team / Member 名稱解析
 */

import { IdentifierResolver } from './identifier-resolver.js';
import type { SigmaApiClient } from '../services/api.js';
import type { ListResponse, Member, Team } from '../types/api.js';

/**
 * 清單回應可能是 { entries } 或直接是陣列
 */
function entriesOf<T>(response: ListResponse<T> | T[] | undefined): T[] {
  if (Array.isArray(response)) return response;
  return response?.entries ?? [];
}

export function createTeamResolver(client: SigmaApiClient): IdentifierResolver<Team> {
  return new IdentifierResolver<Team>({
    entity: 'team',
    fetchCollection: async () => entriesOf(await client.get<ListResponse<Team> | Team[]>('/v2/teams')),
    idField: 'teamId',
    primaryField: 'name',
  });
}

export function createMemberResolver(client: SigmaApiClient): IdentifierResolver<Member> {
  return new IdentifierResolver<Member>({
    entity: 'member',
    fetchCollection: async () =>
      entriesOf(await client.get<ListResponse<Member> | Member[]>('/v2/members')),
    idField: 'memberId',
    primaryField: 'email',
    compositeFields: ['firstName', 'lastName'],
    notFoundHint: 'Use email address or full name.',
  });
}

export function resolveTeamId(client: SigmaApiClient, input: string): Promise<string> {
  return createTeamResolver(client).resolveId(input);
}

export function resolveMemberId(client: SigmaApiClient, input: string): Promise<string> {
  return createMemberResolver(client).resolveId(input);
}
