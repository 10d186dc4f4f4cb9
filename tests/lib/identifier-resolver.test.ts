import { describe, it, expect, vi } from 'vitest';
import {
  IdentifierResolver,
  ResolutionAmbiguousError,
  ResolutionNotFoundError,
  isUuid,
} from '../../src/lib/identifier-resolver.js';
import type { Member, Team } from '../../src/types/api.js';

const TEAMS: Team[] = [
  { teamId: 't-1', name: 'Sales' },
  { teamId: 't-2', name: 'Sales Ops' },
  { teamId: 't-3', name: 'Marketing' },
  { teamId: 't-4', name: 'Wholesale' },
];

const MEMBERS: Member[] = [
  { memberId: 'm-1', email: 'alice@example.com', firstName: 'Alice', lastName: 'Smith' },
  { memberId: 'm-2', email: 'bob@example.com', firstName: 'Bob', lastName: 'Jones' },
];

function teamResolver(records: Team[] = TEAMS) {
  const fetchCollection = vi.fn(async () => records);
  const resolver = new IdentifierResolver<Team>({
    entity: 'team',
    fetchCollection,
    idField: 'teamId',
    primaryField: 'name',
  });
  return { resolver, fetchCollection };
}

function memberResolver() {
  return new IdentifierResolver<Member>({
    entity: 'member',
    fetchCollection: async () => MEMBERS,
    idField: 'memberId',
    primaryField: 'email',
    compositeFields: ['firstName', 'lastName'],
    notFoundHint: 'Use email address or full name.',
  });
}

describe('isUuid', () => {
  it('should accept canonical UUIDs in any case', () => {
    expect(isUuid('3f2c7a4e-1b2d-4c5e-8f90-a1b2c3d4e5f6')).toBe(true);
    expect(isUuid('3F2C7A4E-1B2D-4C5E-8F90-A1B2C3D4E5F6')).toBe(true);
  });

  it('should reject other strings', () => {
    expect(isUuid('Sales')).toBe(false);
    expect(isUuid('3f2c7a4e1b2d4c5e8f90a1b2c3d4e5f6')).toBe(false);
    expect(isUuid(' 3f2c7a4e-1b2d-4c5e-8f90-a1b2c3d4e5f6')).toBe(false);
  });
});

describe('IdentifierResolver', () => {
  it('should pass UUIDs through without fetching', async () => {
    const { resolver, fetchCollection } = teamResolver();
    const uuid = '3f2c7a4e-1b2d-4c5e-8f90-a1b2c3d4e5f6';

    await expect(resolver.resolve(uuid)).resolves.toEqual({ success: true, id: uuid, matchedBy: 'identifier' });
    expect(fetchCollection).not.toHaveBeenCalled();
  });

  it('should prefer an exact match over partial matches', async () => {
    const { resolver } = teamResolver();
    await expect(resolver.resolveId('Sales')).resolves.toBe('t-1');
  });

  it('should match exactly without regard to case', async () => {
    const { resolver } = teamResolver();
    const result = await resolver.resolve('sales ops');

    expect(result).toMatchObject({ success: true, id: 't-2', matchedBy: 'exact' });
  });

  it('should accept a single partial match', async () => {
    const { resolver } = teamResolver();
    const result = await resolver.resolve('market');

    expect(result).toMatchObject({ success: true, id: 't-3', matchedBy: 'partial' });
  });

  it('should report ambiguity when several names contain the input', async () => {
    const { resolver } = teamResolver();
    const result = await resolver.resolve('sale');

    expect(result).toEqual({
      success: false,
      error: {
        code: 'AMBIGUOUS',
        message: "Ambiguous team name 'sale'. Matches: Sales, Sales Ops, Wholesale",
        matches: ['Sales', 'Sales Ops', 'Wholesale'],
      },
    });
  });

  it('should throw ResolutionAmbiguousError from resolveId', async () => {
    const { resolver } = teamResolver();
    const error = await resolver.resolveId('sale').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ResolutionAmbiguousError);
    if (!(error instanceof ResolutionAmbiguousError)) return;
    expect(error.matches).toEqual(['Sales', 'Sales Ops', 'Wholesale']);
    expect(error.entity).toBe('team');
  });

  it('should suggest a close name when nothing matches', async () => {
    const { resolver } = teamResolver();
    const result = await resolver.resolve('Marketting');

    expect(result).toMatchObject({
      success: false,
      error: {
        code: 'NOT_FOUND',
        message: "Team not found: 'Marketting'.",
        suggestion: "Did you mean 'Marketing'?",
      },
    });
    if (result.success || result.error.code !== 'NOT_FOUND') return;
    expect(result.error.candidates[0]).toBe('Marketing');
    expect(result.error.candidates).toHaveLength(4);
  });

  it('should throw ResolutionNotFoundError without a suggestion for distant input', async () => {
    const { resolver } = teamResolver();
    const error = await resolver.resolveId('Finance').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ResolutionNotFoundError);
    if (!(error instanceof ResolutionNotFoundError)) return;
    expect(error.message).toBe("Team not found: 'Finance'.");
    expect(error.suggestion).toBeUndefined();
    expect(error.input).toBe('Finance');
  });

  it('should skip records without an identifier', async () => {
    const { resolver } = teamResolver([
      { teamId: '', name: 'Support' },
      { teamId: 't-9', name: 'Support Tier 2' },
    ]);

    await expect(resolver.resolveId('support')).resolves.toBe('t-9');
  });

  it('should report not found for an empty collection', async () => {
    const { resolver } = teamResolver([]);
    await expect(resolver.resolveId('Sales')).rejects.toThrow("Team not found: 'Sales'.");
  });

  describe('composite names', () => {
    it('should match the primary field first', async () => {
      await expect(memberResolver().resolveId('ALICE@example.com')).resolves.toBe('m-1');
    });

    it('should match first and last name', async () => {
      const result = await memberResolver().resolve('bob jones');
      expect(result).toMatchObject({ success: true, id: 'm-2', matchedBy: 'composite' });
    });

    it('should append the hint when not found', async () => {
      await expect(memberResolver().resolveId('Carol King')).rejects.toThrow(
        "Member not found: 'Carol King'. Use email address or full name."
      );
    });
  });
});
