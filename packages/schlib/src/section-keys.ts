/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Section key resolution
 *
 * Every component is stored in a storage named after its library reference.
 * Storage names are limited to 31 characters, exclude `/ \ : !` and compare
 * case-insensitively, so some references need a different storage name (a
 * section key). The assignment depends only on the set of references:
 *
 * 1. The candidate is the reference with forbidden and control characters
 *    removed, cut to 31 characters, or `_` when nothing is left.
 * 2. References are grouped by candidate, ignoring case. A lone member keeps
 *    its candidate. In a larger group the ordinally smallest reference that
 *    equals its own candidate keeps it.
 * 3. Every other group member, in ordinal order, gets the candidate followed
 *    by the first counter (0, 1, ...) that yields a free key.
 *
 * Names that are already taken (the root streams) are never handed out.
 */

import { DuplicateLibReferenceError, KeyCollisionExhaustedError } from '@schlib/data';
import { MAX_ENTRY_NAME_LENGTH } from '@schlib/container';

export const DEFAULT_MAX_SECTION_KEY_SUFFIX = 9999;

const FORBIDDEN_CHARS = /[/\\:!\u0000-\u001f]/g;

export function sanitizeSectionKey(libReference: string): string {
  const candidate = libReference.replace(FORBIDDEN_CHARS, '').slice(0, MAX_ENTRY_NAME_LENGTH);
  return candidate.length > 0 ? candidate : '_';
}

function compareOrdinal(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function withSuffix(candidate: string, suffix: number): string {
  const text = String(suffix);
  return candidate.slice(0, MAX_ENTRY_NAME_LENGTH - text.length) + text;
}

/**
 * Assign a section key to every library reference
 * @returns map from library reference to storage name
 */
export function resolveSectionKeys(
  libReferences: readonly string[],
  maxSuffix: number = DEFAULT_MAX_SECTION_KEY_SUFFIX,
  takenNames: readonly string[] = []
): Map<string, string> {
  const seen = new Set<string>();
  for (const ref of libReferences) {
    if (seen.has(ref)) throw new DuplicateLibReferenceError(ref);
    seen.add(ref);
  }

  const groups = new Map<string, string[]>();
  for (const ref of libReferences) {
    const group = sanitizeSectionKey(ref).toUpperCase();
    const members = groups.get(group);
    if (members) members.push(ref);
    else groups.set(group, [ref]);
  }

  const keys = new Map<string, string>();
  const reserved = new Set(takenNames.map((name) => name.toUpperCase()));
  const isFree = (key: string) => !reserved.has(key.toUpperCase());
  const reserve = (ref: string, key: string) => {
    keys.set(ref, key);
    reserved.add(key.toUpperCase());
  };

  // First pass: references that keep their candidate
  const pending: string[][] = [];
  for (const groupKey of [...groups.keys()].sort(compareOrdinal)) {
    const members = (groups.get(groupKey) ?? []).slice().sort(compareOrdinal);
    if (members.length === 1 && isFree(groupKey)) {
      reserve(members[0], sanitizeSectionKey(members[0]));
      continue;
    }
    const keeper = isFree(groupKey) ? members.find((ref) => sanitizeSectionKey(ref) === ref) : undefined;
    if (keeper !== undefined) reserve(keeper, keeper);
    pending.push(members.filter((ref) => ref !== keeper));
  }

  // Second pass: numbered keys for the remaining group members
  for (const members of pending) {
    let suffix = 0;
    for (const ref of members) {
      const candidate = sanitizeSectionKey(ref);
      let key = withSuffix(candidate, suffix);
      while (!isFree(key)) {
        suffix++;
        if (suffix > maxSuffix) throw new KeyCollisionExhaustedError(ref, maxSuffix + 1);
        key = withSuffix(candidate, suffix);
      }
      if (suffix > maxSuffix) throw new KeyCollisionExhaustedError(ref, maxSuffix + 1);
      reserve(ref, key);
      suffix++;
    }
  }

  return keys;
}
