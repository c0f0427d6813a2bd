/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Ordered key/value attribute set stored in parameter blocks.
 *
 * Keys are unique case-insensitively but keep the spelling they were added
 * with. Insertion order is preserved since it decides the encoded bytes.
 * Values are stored as their text form; typed getters parse on access.
 */

export type ParameterInput = string | number | boolean;

/** Charset a collection is encoded in: Windows-1252 (with %UTF8% keys) or UTF-16LE */
export type ParameterCharset = 'ansi' | 'utf16';

export interface ParameterEntry {
  key: string;
  value: string;
}

/**
 * Render a typed value the way parameter blocks store it:
 * booleans as T/F, numbers as plain decimal text.
 */
export function formatParameterValue(value: ParameterInput): string {
  if (typeof value === 'boolean') return value ? 'T' : 'F';
  if (typeof value === 'number') return formatDecimal(value);
  return value;
}

function formatDecimal(value: number): string {
  const text = String(value);
  if (!/e/i.test(text)) return text;
  // Exponent notation only shows up for very small or very large magnitudes
  return value.toFixed(20).replace(/\.?0+$/, '');
}

export function parseBoolean(text: string): boolean {
  const upper = text.trim().toUpperCase();
  return upper === 'T' || upper === 'TRUE';
}

export class ParameterCollection implements Iterable<ParameterEntry> {
  private entries: ParameterEntry[] = [];
  private index = new Map<string, number>();

  constructor(
    init?: Iterable<readonly [string, ParameterInput]>,
    public charset: ParameterCharset = 'ansi'
  ) {
    if (init) {
      for (const [key, value] of init) {
        this.set(key, value);
      }
    }
  }

  get size(): number {
    return this.entries.length;
  }

  has(key: string): boolean {
    return this.index.has(key.toUpperCase());
  }

  /** Raw text of a value, or undefined when the key is absent */
  get(key: string): string | undefined {
    const position = this.index.get(key.toUpperCase());
    return position === undefined ? undefined : this.entries[position].value;
  }

  /**
   * Insert a value, or replace an existing key's value in place
   * (the key keeps its original position and spelling).
   */
  set(key: string, value: ParameterInput): this {
    const text = formatParameterValue(value);
    const upper = key.toUpperCase();
    const position = this.index.get(upper);
    if (position === undefined) {
      this.index.set(upper, this.entries.length);
      this.entries.push({ key, value: text });
    } else {
      this.entries[position] = { key: this.entries[position].key, value: text };
    }
    return this;
  }

  delete(key: string): boolean {
    const upper = key.toUpperCase();
    const position = this.index.get(upper);
    if (position === undefined) return false;
    this.entries.splice(position, 1);
    this.index.clear();
    this.entries.forEach((entry, i) => this.index.set(entry.key.toUpperCase(), i));
    return true;
  }

  keys(): string[] {
    return this.entries.map((entry) => entry.key);
  }

  getString(key: string, defaultValue = ''): string {
    return this.get(key) ?? defaultValue;
  }

  getInt(key: string, defaultValue = 0): number {
    const text = this.get(key);
    if (text === undefined) return defaultValue;
    const value = parseInt(text, 10);
    return Number.isNaN(value) ? defaultValue : value;
  }

  getNumber(key: string, defaultValue = 0): number {
    const text = this.get(key);
    if (text === undefined) return defaultValue;
    const value = parseFloat(text);
    return Number.isNaN(value) ? defaultValue : value;
  }

  getBool(key: string, defaultValue = false): boolean {
    const text = this.get(key);
    return text === undefined ? defaultValue : parseBoolean(text);
  }

  clone(): ParameterCollection {
    const copy = new ParameterCollection(undefined, this.charset);
    for (const { key, value } of this.entries) copy.set(key, value);
    return copy;
  }

  [Symbol.iterator](): Iterator<ParameterEntry> {
    return this.entries.map((entry) => ({ ...entry }))[Symbol.iterator]();
  }
}
