// ============================================================================
// Pathology Reporting: Text Matching Utilities
// ============================================================================

/**
 * Canonical form of a column header: all whitespace removed, lower case.
 * `" Test Name "` and `"TESTNAME"` both become `"testname"`.
 */
export function canonicalizeHeader(header: string): string {
  return header.replace(/\s+/g, '').toLowerCase();
}

/** Upper-cased copy used for case-insensitive substring matching. */
export function foldCase(value: string): string {
  return value.toUpperCase();
}

/** Case-insensitive substring test. */
export function containsIgnoreCase(haystack: string, needle: string): boolean {
  return foldCase(haystack).includes(foldCase(needle));
}

/**
 * Cell value as text, or `null` when the cell is absent or blank.
 * Numbers and booleans are stringified; objects and arrays are not cells.
 */
export function cellText(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') {
    return value.trim().length > 0 ? value : null;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? String(value) : null;
  }
  if (typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  return null;
}
