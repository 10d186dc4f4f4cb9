import { describe, it, expect } from 'vitest';
import { parseMethod, parseQueryParams } from '../../src/commands/raw.js';

describe('parseMethod', () => {
  it('should accept methods in any case', () => {
    expect(parseMethod('get')).toBe('GET');
    expect(parseMethod('Patch')).toBe('PATCH');
  });

  it('should reject unsupported methods', () => {
    expect(() => parseMethod('head')).toThrow(
      'Unsupported HTTP method: head. Use one of GET, POST, PUT, PATCH, DELETE.'
    );
  });
});

describe('parseQueryParams', () => {
  it('should return undefined without --params', () => {
    expect(parseQueryParams(undefined)).toBeUndefined();
  });

  it('should keep scalars and stringify nested values', () => {
    expect(parseQueryParams('{"limit":10,"archived":false,"search":"q3","filter":{"a":1},"skip":null}')).toEqual({
      limit: 10,
      archived: false,
      search: 'q3',
      filter: '{"a":1}',
    });
  });

  it('should reject invalid JSON and non-objects', () => {
    expect(() => parseQueryParams('{limit')).toThrow(/^Invalid JSON in --params: /);
    expect(() => parseQueryParams('[1, 2]')).toThrow('--params must be a JSON object');
  });
});
