/**
 * 指令共用的參數處理
 */

import { InvalidArgumentError } from 'commander';
import { JsonInputError, mergeJsonWithParams, readJsonObject, type JsonInputOptions } from './json-input.js';
import type { JsonObject, QueryParams } from '../types/api.js';

export interface PageOptions {
  limit?: number;
  page?: string;
}

export type BodyOptions = JsonInputOptions;

/**
 * commander argParser：正整數
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function pageQuery(options: PageOptions): QueryParams {
  return { limit: options.limit, page: options.page };
}

/**
 * 路徑參數編碼
 */
export function segment(value: string): string {
  return encodeURIComponent(value);
}

/**
 * 讀取 JSON body 並合併命令列欄位；結果為空時拋出錯誤
 */
export async function buildBody(
  options: BodyOptions,
  fields: Record<string, unknown>,
  emptyMessage: string = 'No data provided. Use --json, --file, or pipe JSON to stdin.'
): Promise<JsonObject> {
  const base = await readJsonObject({
    json: options.json,
    file: options.file,
    useStdin: options.useStdin,
  });
  const body = mergeJsonWithParams(base, fields);
  if (Object.keys(body).length === 0) {
    throw new JsonInputError(emptyMessage);
  }
  return body;
}
