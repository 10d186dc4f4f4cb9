import { describe, it, expect } from 'vitest';
import { SigmaApiClient } from '../../src/services/api.js';
import { resolveMemberId, resolveTeamId } from '../../src/lib/entity-resolvers.js';
import { ResolutionNotFoundError } from '../../src/lib/identifier-resolver.js';
import { createFetchStub, jsonResponse, tokenResponse, type RecordedRequest } from '../helpers/fetch-stub.js';

function createClient(collections: Record<string, unknown>) {
  const stub = createFetchStub((request: RecordedRequest) => {
    if (request.url.pathname === '/v2/auth/token') {
      return tokenResponse('A1', 'R1');
    }
    return jsonResponse(200, collections[request.url.pathname] ?? { entries: [] });
  });
  const client = new SigmaApiClient(
    { clientId: 'test-client', clientSecret: 'test-secret', baseUrl: 'https://api.example.com/v2' },
    { fetch: stub.$fetch }
  );
  return { client, stub };
}

describe('resolveTeamId', () => {
  it('should look up teams from /v2/teams entries', async () => {
    const { client, stub } = createClient({
      '/v2/teams': { entries: [{ teamId: 't-1', name: 'Sales' }, { teamId: 't-2', name: 'Finance' }] },
    });

    await expect(resolveTeamId(client, 'finance')).resolves.toBe('t-2');
    expect(stub.requests.map((r) => r.url.pathname)).toEqual(['/v2/auth/token', '/v2/teams']);
  });

  it('should accept a bare array response', async () => {
    const { client } = createClient({ '/v2/teams': [{ teamId: 't-7', name: 'Support' }] });
    await expect(resolveTeamId(client, 'Support')).resolves.toBe('t-7');
  });

  it('should not call the API for UUIDs', async () => {
    const { client, stub } = createClient({});
    const uuid = '0b6d3a58-7d64-4c4b-9a36-0d7a3f8e2c11';

    await expect(resolveTeamId(client, uuid)).resolves.toBe(uuid);
    expect(stub.requests).toHaveLength(0);
  });
});

describe('resolveMemberId', () => {
  const members = {
    '/v2/members': {
      entries: [
        { memberId: 'm-1', email: 'alice@example.com', firstName: 'Alice', lastName: 'Smith' },
        { memberId: 'm-2', email: 'bob@example.com', firstName: 'Bob', lastName: 'Jones' },
      ],
    },
  };

  it('should resolve by email', async () => {
    const { client } = createClient(members);
    await expect(resolveMemberId(client, 'bob@example.com')).resolves.toBe('m-2');
  });

  it('should resolve by full name', async () => {
    const { client } = createClient(members);
    await expect(resolveMemberId(client, 'Alice Smith')).resolves.toBe('m-1');
  });

  it('should raise ResolutionNotFoundError with a suggestion', async () => {
    const { client } = createClient(members);
    const error = await resolveMemberId(client, 'bob@example.org').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ResolutionNotFoundError);
    if (!(error instanceof ResolutionNotFoundError)) return;
    expect(error.message).toBe("Member not found: 'bob@example.org'. Use email address or full name.");
    expect(error.suggestion).toBe("Did you mean 'bob@example.com'?");
  });
});
