/**
 * Set and header-map comparison helpers
 *
 * Collections on routes have set semantics: order and duplicates never
 * count as a difference.
 */

import type { FieldChange } from './types.js';

export interface SetDiff {
  added: string[];
  removed: string[];
}

/**
 * Members of `desired` missing from `current` (added) and the reverse (removed), sorted
 */
export function diffSets(current: readonly string[], desired: readonly string[]): SetDiff {
  const have = new Set(current);
  const want = new Set(desired);
  return {
    added: [...want].filter((item) => !have.has(item)).sort(),
    removed: [...have].filter((item) => !want.has(item)).sort(),
  };
}

export function setEquals(a: readonly string[], b: readonly string[]): boolean {
  const { added, removed } = diffSets(a, b);
  return added.length === 0 && removed.length === 0;
}

/**
 * Set diff as a FieldChange, or undefined when the sets are equal
 */
export function setFieldChange(
  field: string,
  current: readonly string[],
  desired: readonly string[]
): FieldChange | undefined {
  const { added, removed } = diffSets(current, desired);
  if (added.length === 0 && removed.length === 0) {
    return undefined;
  }
  return { field, added, removed };
}

export function headersEqual(
  a: Readonly<Record<string, readonly string[]>>,
  b: Readonly<Record<string, readonly string[]>>
): boolean {
  return diffHeaders(a, b).length === 0;
}

/**
 * Compare header maps key by key; one FieldChange per differing header
 *
 * Header names are compared case-insensitively, as the gateway stores them
 * lower-cased.
 */
export function diffHeaders(
  current: Readonly<Record<string, readonly string[]>>,
  desired: Readonly<Record<string, readonly string[]>>
): FieldChange[] {
  const have = lowerKeys(current);
  const want = lowerKeys(desired);
  const changes: FieldChange[] = [];

  for (const [key, { name, values }] of want) {
    const existing = have.get(key);
    const change = setFieldChange(`headers.${name}`, existing?.values ?? [], values);
    if (change) {
      changes.push(change);
    }
  }
  for (const [key, { name, values }] of have) {
    if (!want.has(key)) {
      changes.push({ field: `headers.${name}`, added: [], removed: [...values].sort() });
    }
  }
  return changes;
}

function lowerKeys(
  headers: Readonly<Record<string, readonly string[]>>
): Map<string, { name: string; values: readonly string[] }> {
  const result = new Map<string, { name: string; values: readonly string[] }>();
  for (const name of Object.keys(headers).sort()) {
    result.set(name.toLowerCase(), { name, values: headers[name] ?? [] });
  }
  return result;
}
