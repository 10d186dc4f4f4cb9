/**
 * JSON Input
 * 請求 body 來源：--json 字串 > --file 檔案 > stdin（僅限 pipe）
 */

import fs from 'node:fs/promises';
import type { JsonObject } from '../types/api.js';

export interface JsonInputOptions {
  json?: string;
  file?: string;
  /** 是否讀取 stdin（預設 true） */
  useStdin?: boolean;
}

/**
 * stdin 的最小介面（方便測試傳入 Readable）
 */
export interface InputStream extends AsyncIterable<string | Buffer> {
  isTTY?: boolean;
}

export class JsonInputError extends Error {
  public readonly code = 'INVALID_JSON_INPUT';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'JsonInputError';
  }
}

function parse(text: string, source: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new JsonInputError(`Invalid JSON ${source}: ${reason}`, { cause: error });
  }
}

async function readStream(stream: InputStream): Promise<string> {
  let content = '';
  for await (const chunk of stream) {
    content += typeof chunk === 'string' ? chunk : chunk.toString('utf-8');
  }
  return content;
}

/**
 * 讀取 JSON 輸入，沒有任何來源時回傳 undefined
 */
export async function readJsonInput(
  options: JsonInputOptions,
  stdin: InputStream = process.stdin
): Promise<unknown> {
  if (options.json) {
    return parse(options.json, 'string');
  }

  if (options.file) {
    let content: string;
    try {
      content = await fs.readFile(options.file, 'utf-8');
    } catch (error) {
      throw new JsonInputError(`File not found: ${options.file}`, { cause: error });
    }
    return parse(content, `in file ${options.file}`);
  }

  if (options.useStdin !== false && !stdin.isTTY) {
    const content = (await readStream(stdin)).trim();
    if (content) {
      return parse(content, 'from stdin');
    }
  }

  return undefined;
}

/**
 * 讀取 JSON 物件（陣列或純值不接受）
 */
export async function readJsonObject(
  options: JsonInputOptions,
  stdin?: InputStream
): Promise<JsonObject | undefined> {
  const data = await readJsonInput(options, stdin);
  if (data === undefined) {
    return undefined;
  }
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new JsonInputError('JSON body must be an object');
  }
  return { ...data };
}

/**
 * 合併 JSON body 與命令列參數（undefined 略過，命令列優先）
 */
export function mergeJsonWithParams(
  base: JsonObject | undefined,
  params: Record<string, unknown>
): JsonObject {
  const result: JsonObject = { ...base };
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}
