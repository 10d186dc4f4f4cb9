/**
 * Identifier Resolver Module
 * 名稱解析模組 - 將名稱 / email / UUID 轉換為平台識別碼
 *
 * 比對順序固定：UUID → 精確 → 組合名稱 → 部分符合。
 * 前一層命中就直接返回，不做跨層的相似度排序。
 */

import { findBestMatch, getTopCandidates } from './fuzzy.js';
import { loggers } from './logger.js';
import type {
  MatchKind,
  ResolveAmbiguous,
  ResolveNotFound,
  ResolveResponse,
  ResolverConfig,
  StringField,
} from '../types/resolver.js';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function isUuid(value: string): boolean {
  return UUID_PATTERN.test(value);
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

/**
 * 找不到符合的紀錄
 */
export class ResolutionNotFoundError extends Error {
  public readonly code = 'RESOLUTION_NOT_FOUND';
  public readonly input: string;
  public readonly entity: string;
  public readonly suggestion?: string;
  public readonly candidates: string[];

  constructor(entity: string, input: string, error: ResolveNotFound['error']) {
    super(error.message);
    this.name = 'ResolutionNotFoundError';
    this.entity = entity;
    this.input = input;
    this.suggestion = error.suggestion;
    this.candidates = error.candidates;
  }
}

/**
 * 部分符合的紀錄超過一筆
 */
export class ResolutionAmbiguousError extends Error {
  public readonly code = 'RESOLUTION_AMBIGUOUS';
  public readonly input: string;
  public readonly entity: string;
  public readonly matches: string[];

  constructor(entity: string, input: string, error: ResolveAmbiguous['error']) {
    super(error.message);
    this.name = 'ResolutionAmbiguousError';
    this.entity = entity;
    this.input = input;
    this.matches = error.matches;
  }
}

interface Candidate<T> {
  record: T;
  id: string;
  name: string;
}

export class IdentifierResolver<T extends object> {
  private config: ResolverConfig<T>;

  constructor(config: ResolverConfig<T>) {
    this.config = config;
  }

  /**
   * 解析名稱，回傳成功或失敗結果
   */
  async resolve(input: string): Promise<ResolveResponse<T>> {
    // 1. 已經是 UUID，不需要查詢
    if (isUuid(input)) {
      return { success: true, id: input, matchedBy: 'identifier' };
    }

    const records = await this.config.fetchCollection();
    const candidates = this.toCandidates(records);
    const needle = input.toLowerCase();

    // 2. 主要欄位精確符合（不分大小寫）
    const exact = candidates.find((c) => c.name.toLowerCase() === needle);
    if (exact) {
      return this.matched(input, exact, 'exact');
    }

    // 3. 組合名稱精確符合
    const compositeFields = this.config.compositeFields;
    if (compositeFields) {
      const composite = candidates.find(
        (c) => this.compositeName(c.record, compositeFields) === needle
      );
      if (composite) {
        return this.matched(input, composite, 'composite');
      }
    }

    // 4. 部分符合
    const partial = candidates.filter((c) => c.name.toLowerCase().includes(needle));
    if (partial.length === 1) {
      return this.matched(input, partial[0], 'partial');
    }

    if (partial.length > 1) {
      const matches = partial.map((c) => c.name);
      return {
        success: false,
        error: {
          code: 'AMBIGUOUS',
          message: `Ambiguous ${this.config.entity} name '${input}'. Matches: ${matches.join(', ')}`,
          matches,
        },
      };
    }

    // 5. 找不到 - 回傳錯誤和建議
    const names = candidates.map((c) => c.name);
    const best = findBestMatch(input, names);
    const hint = this.config.notFoundHint ? ` ${this.config.notFoundHint}` : '';
    return {
      success: false,
      error: {
        code: 'NOT_FOUND',
        message: `${capitalize(this.config.entity)} not found: '${input}'.${hint}`,
        suggestion: best ? `Did you mean '${best.match}'?` : undefined,
        candidates: getTopCandidates(input, names, 5),
      },
    };
  }

  /**
   * 解析名稱，失敗時拋出 ResolutionNotFoundError / ResolutionAmbiguousError
   */
  async resolveId(input: string): Promise<string> {
    const result = await this.resolve(input);
    if (result.success) {
      return result.id;
    }
    if (result.error.code === 'AMBIGUOUS') {
      throw new ResolutionAmbiguousError(this.config.entity, input, result.error);
    }
    throw new ResolutionNotFoundError(this.config.entity, input, result.error);
  }

  private matched(input: string, candidate: Candidate<T>, matchedBy: MatchKind): ResolveResponse<T> {
    loggers.resolver.info(`Resolved ${this.config.entity} '${input}' -> ${candidate.id}`, {
      matchedBy,
    });
    return { success: true, id: candidate.id, matchedBy, record: candidate.record };
  }

  /**
   * 沒有識別碼的紀錄無法被解析，直接略過
   */
  private toCandidates(records: T[]): Candidate<T>[] {
    const candidates: Candidate<T>[] = [];
    for (const record of records) {
      const id = this.readField(record, this.config.idField);
      if (!id) continue;
      candidates.push({ record, id, name: this.readField(record, this.config.primaryField) });
    }
    return candidates;
  }

  private compositeName(record: T, fields: readonly [StringField<T>, StringField<T>]): string {
    const [first, last] = fields;
    return `${this.readField(record, first)} ${this.readField(record, last)}`.trim().toLowerCase();
  }

  private readField(record: T, field: StringField<T>): string {
    const value: unknown = record[field];
    return typeof value === 'string' ? value : '';
  }
}
