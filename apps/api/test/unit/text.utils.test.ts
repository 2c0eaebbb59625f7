import { describe, it, expect } from 'vitest';
import { canonicalizeHeader, cellText, containsIgnoreCase, foldCase } from '@labtally/shared';

describe('canonicalizeHeader', () => {
  it('removes whitespace and lower-cases', () => {
    expect(canonicalizeHeader(' Test Name ')).toBe('testname');
    expect(canonicalizeHeader('Booking\tMode')).toBe('bookingmode');
  });

  it('keeps underscores', () => {
    expect(canonicalizeHeader('SUB_GROUP')).toBe('sub_group');
  });
});

describe('foldCase / containsIgnoreCase', () => {
  it('upper-cases for comparison', () => {
    expect(foldCase('Serum IgE')).toBe('SERUM IGE');
  });

  it('matches regardless of case', () => {
    expect(containsIgnoreCase('ipd ward 3', 'IPD')).toBe(true);
    expect(containsIgnoreCase('OPD', 'IPD')).toBe(false);
  });
});

describe('cellText', () => {
  it('returns strings unchanged', () => {
    expect(cellText(' CBC ')).toBe(' CBC ');
  });

  it('treats blank and absent cells as missing', () => {
    expect(cellText('')).toBeNull();
    expect(cellText('   ')).toBeNull();
    expect(cellText(null)).toBeNull();
    expect(cellText(undefined)).toBeNull();
  });

  it('stringifies numbers and booleans', () => {
    expect(cellText(125)).toBe('125');
    expect(cellText(false)).toBe('false');
  });

  it('rejects non-finite numbers and objects', () => {
    expect(cellText(Number.NaN)).toBeNull();
    expect(cellText({ value: 'CBC' })).toBeNull();
    expect(cellText(['CBC'])).toBeNull();
  });
});
