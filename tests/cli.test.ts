import { describe, it, expect } from 'vitest';
import { formatCell, renderTable } from '../src/cli/logger.js';
import { parseExecOptions, parseScalar } from '../src/cli/params.js';

describe('parseScalar', () => {
  it('reads numbers, booleans and null', () => {
    expect(parseScalar('7')).toBe(7);
    expect(parseScalar('-2.5')).toBe(-2.5);
    expect(parseScalar('true')).toBe(true);
    expect(parseScalar('false')).toBe(false);
    expect(parseScalar('null')).toBeNull();
  });

  it('keeps everything else as text', () => {
    expect(parseScalar('Ada')).toBe('Ada');
    expect(parseScalar('007x')).toBe('007x');
    expect(parseScalar('')).toBe('');
  });
});

describe('parseExecOptions', () => {
  it('collects repeated --param flags by name', () => {
    expect(parseExecOptions({ param: ['id=7', 'name=Ada Lovelace', 'note=a=b'] })).toEqual({
      id: 7,
      name: 'Ada Lovelace',
      note: 'a=b',
    });
  });

  it('accepts a single --param', () => {
    expect(parseExecOptions({ param: 'id=7' })).toEqual({ id: 7 });
  });

  it('prefers --values', () => {
    expect(parseExecOptions({ param: 'id=1', values: '[130000, 1]' })).toEqual([130000, 1]);
    expect(parseExecOptions({ values: '{"name": "Ada", "manager_id": null}' })).toEqual({
      name: 'Ada',
      manager_id: null,
    });
  });

  it('defaults to no values', () => {
    expect(parseExecOptions({})).toEqual({});
  });

  it('rejects malformed flags', () => {
    expect(() => parseExecOptions({ values: '{id: 7}' })).toThrow('--values is not valid JSON: {id: 7}');
    expect(() => parseExecOptions({ param: 'id' })).toThrow("--param expects name=value, got 'id'");
    expect(() => parseExecOptions({ param: '=7' })).toThrow("--param expects name=value, got '=7'");
  });
});

describe('formatCell', () => {
  it('renders driver values', () => {
    expect(formatCell(null)).toBe('NULL');
    expect(formatCell(undefined)).toBe('NULL');
    expect(formatCell(new Date('2024-03-01T10:00:00.000Z'))).toBe('2024-03-01T10:00:00.000Z');
    expect(formatCell(Buffer.from([1, 2, 3]))).toBe('<3 bytes>');
    expect(formatCell({ tags: ['a'] })).toBe('{"tags":["a"]}');
    expect(formatCell(95000)).toBe('95000');
  });
});

describe('renderTable', () => {
  it('lays out rows in order under the first row columns', () => {
    const text = renderTable([
      { id: 1, name: 'Ada' },
      { id: 7, name: 'Grace' },
    ]);

    const lines = text.split('\n');
    const ada = lines.findIndex((line) => line.includes('Ada'));
    const grace = lines.findIndex((line) => line.includes('Grace'));

    expect(ada).toBeGreaterThan(lines.findIndex((line) => line.includes('name')));
    expect(grace).toBeGreaterThan(ada);
    expect(lines[ada]).toContain('1');
  });
});
