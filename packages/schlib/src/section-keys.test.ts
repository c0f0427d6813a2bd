/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { DuplicateLibReferenceError, KeyCollisionExhaustedError } from '@schlib/data';
import { resolveSectionKeys, sanitizeSectionKey } from './section-keys.js';

describe('sanitizeSectionKey', () => {
  it('removes characters storages cannot hold', () => {
    expect(sanitizeSectionKey('A/B\\C:D!E')).toBe('ABCDE');
    expect(sanitizeSectionKey('\tR\u0001')).toBe('R');
  });

  it('truncates to 31 characters', () => {
    expect(sanitizeSectionKey('x'.repeat(40))).toBe('x'.repeat(31));
  });

  it('falls back to an underscore', () => {
    expect(sanitizeSectionKey('')).toBe('_');
    expect(sanitizeSectionKey('//')).toBe('_');
  });
});

describe('resolveSectionKeys', () => {
  it('keeps clean names as they are', () => {
    expect(resolveSectionKeys(['Resistor', 'Capacitor'])).toEqual(
      new Map([
        ['Resistor', 'Resistor'],
        ['Capacitor', 'Capacitor'],
      ])
    );
  });

  it('numbers names that sanitize to the same key', () => {
    expect(resolveSectionKeys(['Resistor', 'R/', 'R:'])).toEqual(
      new Map([
        ['Resistor', 'Resistor'],
        ['R/', 'R0'],
        ['R:', 'R1'],
      ])
    );
  });

  it('does not depend on input order', () => {
    expect(resolveSectionKeys(['R:', 'Resistor', 'R/'])).toEqual(resolveSectionKeys(['Resistor', 'R/', 'R:']));
  });

  it('lets the clean member of a group keep its name', () => {
    expect(resolveSectionKeys(['R/', 'R'])).toEqual(
      new Map([
        ['R', 'R'],
        ['R/', 'R0'],
      ])
    );
  });

  it('groups names case-insensitively', () => {
    expect(resolveSectionKeys(['res', 'RES'])).toEqual(
      new Map([
        ['RES', 'RES'],
        ['res', 'res0'],
      ])
    );
  });

  it('skips numbered keys already taken by another name', () => {
    expect(resolveSectionKeys(['R/', 'R0', 'R:'])).toEqual(
      new Map([
        ['R0', 'R0'],
        ['R/', 'R1'],
        ['R:', 'R2'],
      ])
    );
  });

  it('shortens the candidate so the numbered key fits', () => {
    const clean = 'A'.repeat(31);
    const keys = resolveSectionKeys([clean, `${clean}/`]);
    expect(keys.get(clean)).toBe(clean);
    expect(keys.get(`${clean}/`)).toBe(`${'A'.repeat(30)}0`);
  });

  it('moves names that clash with reserved stream names', () => {
    expect(resolveSectionKeys(['storage', 'Diode'], 9999, ['FileHeader', 'Storage'])).toEqual(
      new Map([
        ['storage', 'storage0'],
        ['Diode', 'Diode'],
      ])
    );
  });

  it('gives up after the configured number of attempts', () => {
    expect(() => resolveSectionKeys(['R/', 'R:'], 0)).toThrow(KeyCollisionExhaustedError);
  });

  it('rejects duplicate library references', () => {
    expect(() => resolveSectionKeys(['R1', 'R1'])).toThrow(DuplicateLibReferenceError);
  });
});
