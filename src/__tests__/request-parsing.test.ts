import { describe, it, expect } from 'vitest';
import {
  parseArray,
  parseFilterShape,
  parseName,
  parseOptionalNumber,
  parseStringArray,
} from '../server/RequestParsing';

describe('request parsing', () => {
  it('parses string arrays', () => {
    expect(parseStringArray({ values: ['a', ''] }, 'values')).toEqual({ ok: true, value: ['a', ''] });
    expect(parseStringArray({ values: ['a', 3] }, 'values')).toEqual({
      ok: false,
      error: 'Invalid values at index 1: must be a string',
    });
    expect(parseStringArray({}, 'values')).toEqual({
      ok: false,
      error: 'Invalid request body: "values" must be an array of strings',
    });
    expect(parseStringArray(null, 'values').ok).toBe(false);
  });

  it('passes mixed arrays through untouched', () => {
    expect(parseArray({ passwords: ['x', 1, null] }, 'passwords')).toEqual({
      ok: true,
      value: ['x', 1, null],
    });
    expect(parseArray({ passwords: 'x' }, 'passwords').ok).toBe(false);
  });

  it('requires a non-empty name', () => {
    expect(parseName({ name: 'f' })).toEqual({ ok: true, value: 'f' });
    expect(parseName({ name: '' }).ok).toBe(false);
    expect(parseName([]).ok).toBe(false);
  });

  it('treats missing and null numbers as absent', () => {
    expect(parseOptionalNumber({}, 'capacity')).toEqual({ ok: true, value: undefined });
    expect(parseOptionalNumber({ capacity: null }, 'capacity')).toEqual({ ok: true, value: undefined });
    expect(parseOptionalNumber({ capacity: '10' }, 'capacity')).toEqual({
      ok: false,
      error: 'Invalid capacity: must be a number',
    });
  });

  it('distinguishes explicit and sized filter bodies', () => {
    expect(parseFilterShape({ name: 'f', capacity: 100 })).toEqual({
      ok: true,
      value: { kind: 'explicit', capacity: 100 },
    });
    expect(parseFilterShape({ expectedItems: 10, falsePositiveRate: 0.1 })).toEqual({
      ok: true,
      value: { kind: 'sized', expectedItems: 10, falsePositiveRate: 0.1 },
    });
    expect(parseFilterShape({ expectedItems: 10 })).toEqual({
      ok: false,
      error: 'expectedItems and falsePositiveRate must be given together',
    });
  });
});
