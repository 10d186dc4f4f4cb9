import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Readable } from 'node:stream';
import {
  JsonInputError,
  mergeJsonWithParams,
  readJsonInput,
  readJsonObject,
  type InputStream,
} from '../../src/lib/json-input.js';

function pipedStdin(content: string): InputStream {
  return Readable.from([content]);
}

const terminal: InputStream = Object.assign(Readable.from(['{"ignored":true}']), { isTTY: true });

describe('readJsonInput', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sigma-json-input-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should prefer the --json string', async () => {
    const file = path.join(dir, 'body.json');
    fs.writeFileSync(file, '{"from":"file"}');

    await expect(
      readJsonInput({ json: '{"from":"string"}', file }, pipedStdin('{"from":"stdin"}'))
    ).resolves.toEqual({ from: 'string' });
  });

  it('should read the --file path before stdin', async () => {
    const file = path.join(dir, 'body.json');
    fs.writeFileSync(file, '{"name":"Quarterly Review"}');

    await expect(readJsonInput({ file }, pipedStdin('{"from":"stdin"}'))).resolves.toEqual({
      name: 'Quarterly Review',
    });
  });

  it('should read piped stdin', async () => {
    await expect(readJsonInput({}, pipedStdin('  {"name":"Ops"}\n'))).resolves.toEqual({ name: 'Ops' });
  });

  it('should not read stdin from a terminal', async () => {
    await expect(readJsonInput({}, terminal)).resolves.toBeUndefined();
  });

  it('should skip stdin when disabled', async () => {
    await expect(readJsonInput({ useStdin: false }, pipedStdin('{"a":1}'))).resolves.toBeUndefined();
  });

  it('should treat empty stdin as no input', async () => {
    await expect(readJsonInput({}, pipedStdin('   '))).resolves.toBeUndefined();
  });

  it('should report invalid JSON with its source', async () => {
    await expect(readJsonInput({ json: '{nope' }, terminal)).rejects.toThrow(/^Invalid JSON string: /);
    await expect(readJsonInput({}, pipedStdin('{nope'))).rejects.toThrow(/^Invalid JSON from stdin: /);
  });

  it('should report a missing file', async () => {
    const file = path.join(dir, 'missing.json');
    const error = await readJsonInput({ file }, terminal).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(JsonInputError);
    if (!(error instanceof JsonInputError)) return;
    expect(error.message).toBe(`File not found: ${file}`);
  });
});

describe('readJsonObject', () => {
  it('should reject arrays', async () => {
    await expect(readJsonObject({ json: '[1,2]' }, terminal)).rejects.toThrow('JSON body must be an object');
  });

  it('should return undefined without input', async () => {
    await expect(readJsonObject({}, terminal)).resolves.toBeUndefined();
  });
});

describe('mergeJsonWithParams', () => {
  it('should let defined params override the JSON body', () => {
    expect(mergeJsonWithParams({ name: 'old', color: 'red' }, { name: 'new', color: undefined })).toEqual({
      name: 'new',
      color: 'red',
    });
  });

  it('should start from an empty object', () => {
    expect(mergeJsonWithParams(undefined, { name: undefined })).toEqual({});
  });
});
