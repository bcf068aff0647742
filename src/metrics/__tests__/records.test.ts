import { describe, it, expect } from 'vitest';
import {
  isDocStatus,
  parseDocStatus,
  parseDuplicateFlag,
  parseStatusTally,
  toCount,
} from '../records.js';

/* ============= parseDocStatus ============= */

describe('parseDocStatus', () => {
  it('accepts each known status', () => {
    for (const status of ['pending', 'processing', 'processed', 'failed', 'preprocessed']) {
      expect(parseDocStatus(status)).toBe(status);
    }
  });

  it('rejects unknown statuses', () => {
    expect(parseDocStatus('archived')).toBeNull();
  });

  it('is case-sensitive', () => {
    expect(parseDocStatus('Pending')).toBeNull();
    expect(isDocStatus('FAILED')).toBe(false);
  });

  it('rejects non-strings', () => {
    expect(parseDocStatus(null)).toBeNull();
    expect(parseDocStatus(1)).toBeNull();
  });
});

/* ============= parseDuplicateFlag ============= */

describe('parseDuplicateFlag', () => {
  it('treats boolean true as duplicate', () => {
    expect(parseDuplicateFlag(true)).toBe(true);
  });

  it('treats the string "true" as duplicate', () => {
    expect(parseDuplicateFlag('true')).toBe(true);
  });

  it('treats missing and false-like values as not duplicate', () => {
    expect(parseDuplicateFlag(undefined)).toBe(false);
    expect(parseDuplicateFlag(null)).toBe(false);
    expect(parseDuplicateFlag(false)).toBe(false);
    expect(parseDuplicateFlag('false')).toBe(false);
  });

  it('treats malformed values as not duplicate', () => {
    expect(parseDuplicateFlag('yes')).toBe(false);
    expect(parseDuplicateFlag('TRUE')).toBe(false);
    expect(parseDuplicateFlag(1)).toBe(false);
    expect(parseDuplicateFlag('1')).toBe(false);
    expect(parseDuplicateFlag({})).toBe(false);
  });
});

/* ============= toCount ============= */

describe('toCount', () => {
  it('passes through positive integers', () => {
    expect(toCount(7)).toBe(7);
  });

  it('parses pg bigint strings', () => {
    expect(toCount('42')).toBe(42);
  });

  it('converts bigints', () => {
    expect(toCount(5n)).toBe(5);
  });

  it('reads counts beyond the safe integer range as 0 in every form', () => {
    expect(toCount(2 ** 53)).toBe(0);
    expect(toCount('9007199254740993')).toBe(0);
    expect(toCount(2n ** 60n)).toBe(0);
  });

  it('keeps the largest safe count in every form', () => {
    expect(toCount(Number.MAX_SAFE_INTEGER)).toBe(9007199254740991);
    expect(toCount('9007199254740991')).toBe(9007199254740991);
    expect(toCount(9007199254740991n)).toBe(9007199254740991);
  });

  it('falls back to 0 for anything else', () => {
    expect(toCount(undefined)).toBe(0);
    expect(toCount(null)).toBe(0);
    expect(toCount(-3)).toBe(0);
    expect(toCount(1.5)).toBe(0);
    expect(toCount('abc')).toBe(0);
    expect(toCount('-1')).toBe(0);
  });
});

/* ============= parseStatusTally ============= */

describe('parseStatusTally', () => {
  it('maps a well-formed row', () => {
    expect(
      parseStatusTally({ workspace: 'w1', status: 'pending', duplicate_flag: 'true', count: '3' })
    ).toEqual({
      workspace: 'w1',
      status: 'pending',
      rawStatus: 'pending',
      isDuplicate: true,
      count: 3,
    });
  });

  it('keeps the raw value of an unknown status', () => {
    expect(
      parseStatusTally({ workspace: 'w1', status: 'archived', duplicate_flag: null, count: 1 })
    ).toEqual({
      workspace: 'w1',
      status: null,
      rawStatus: 'archived',
      isDuplicate: false,
      count: 1,
    });
  });
});
