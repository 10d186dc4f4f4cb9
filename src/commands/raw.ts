/**
 * Raw Command
 * 直接呼叫任意 API 端點
 *
 * 範例：
 *   sigma raw GET /v2/workbooks --params '{"limit": 10}'
 *   sigma raw POST /v2/workbooks --json '{"name": "Quarterly Review"}'
 *   echo '{"name": "Quarterly Review"}' | sigma raw POST /v2/workbooks
 */

import { Command } from 'commander';
import { getApiClient, getGlobalOptions } from '../lib/api-client.js';
import { JsonInputError, readJsonInput, type JsonInputOptions } from '../lib/json-input.js';
import { handleCommandError, outputData } from '../utils/output.js';
import type { HttpMethod, QueryParams } from '../types/api.js';

const METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'];

/** 這些方法預設不從 stdin 讀 body */
const BODYLESS: ReadonlySet<HttpMethod> = new Set<HttpMethod>(['GET', 'DELETE']);

interface RawOptions extends JsonInputOptions {
  params?: string;
}

export function parseMethod(value: string): HttpMethod {
  const upper = value.toUpperCase();
  const method = METHODS.find((m) => m === upper);
  if (!method) {
    throw new Error(`Unsupported HTTP method: ${value}. Use one of ${METHODS.join(', ')}.`);
  }
  return method;
}

/**
 * --params 的 JSON 物件轉為查詢參數（巢狀值以 JSON 字串送出）
 */
export function parseQueryParams(value: string | undefined): QueryParams | undefined {
  if (value === undefined) return undefined;

  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new JsonInputError(`Invalid JSON in --params: ${reason}`, { cause: error });
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new JsonInputError('--params must be a JSON object');
  }

  const query: QueryParams = {};
  for (const [key, item] of Object.entries(parsed)) {
    if (typeof item === 'string' || typeof item === 'number' || typeof item === 'boolean') {
      query[key] = item;
    } else if (item !== null && item !== undefined) {
      query[key] = JSON.stringify(item);
    }
  }
  return query;
}

export const rawCommand = new Command('raw')
  .description('Make a raw HTTP request to the Sigma API')
  .argument('<method>', 'HTTP method (GET, POST, PUT, PATCH, DELETE)')
  .argument('<path>', 'API endpoint path, e.g. /v2/workbooks')
  .option('--params <json>', 'Query parameters as a JSON object')
  .option('--json <json>', 'Request body as JSON string')
  .option('--file <path>', 'Request body from JSON file')
  .action(async (method: string, path: string, options: RawOptions, cmd: Command) => {
    const globals = getGlobalOptions(cmd);
    try {
      const httpMethod = parseMethod(method);
      const query = parseQueryParams(options.params);
      const body = await readJsonInput({
        json: options.json,
        file: options.file,
        useStdin: !BODYLESS.has(httpMethod),
      });

      const api = getApiClient(globals);
      outputData(await api.request(httpMethod, path, { query, body }), globals);
    } catch (error) {
      handleCommandError(error);
    }
  });
