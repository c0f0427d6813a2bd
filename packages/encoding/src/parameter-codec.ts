/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Parameter block text codec.
 *
 * Layout: `|KEY=VALUE|KEY=VALUE...` followed by a NUL terminator (one byte in
 * ANSI mode, one UTF-16 code unit in wide mode). An empty collection is just
 * the terminator.
 *
 * Quoting: a value that contains `|` or starts with `"` is written as
 * `"..."` with inner quotes doubled. Anything else is written raw, which
 * leaves values from existing files byte-identical. On read, a value that
 * starts with `"` is only treated as quoted if its closing quote is followed
 * by `|` or the end of the block.
 *
 * ANSI mode writes Windows-1252. A value that Windows-1252 cannot hold is
 * written under `%UTF8%KEY` as UTF-8 bytes and folded back onto `KEY` on read.
 */

import { EncodingError, ParameterCollection, type ParameterCharset } from '@schlib/data';
import {
  decodeAnsi,
  decodeUtf16,
  decodeUtf8,
  encodeUtf16,
  encodeUtf8,
  hasLoneSurrogate,
  tryEncodeAnsi,
} from './charset.js';

const PIPE = 0x7c;
const EQUALS = 0x3d;
const QUOTE = 0x22;

export const UTF8_KEY_PREFIX = '%UTF8%';
const UTF8_PREFIX_BYTES = encodeUtf8(UTF8_KEY_PREFIX);

const RESERVED_KEY_CHARS = /[|="\0]/;

export function quoteValue(value: string): string {
  if (!value.includes('|') && !value.startsWith('"')) return value;
  return `"${value.replace(/"/g, '""')}"`;
}

function validateEntry(key: string, value: string): void {
  if (key.length === 0) {
    throw new EncodingError('Parameter key is empty');
  }
  if (RESERVED_KEY_CHARS.test(key)) {
    throw new EncodingError(`Parameter key "${key}" contains a reserved character`);
  }
  if (key.toUpperCase().startsWith(UTF8_KEY_PREFIX)) {
    throw new EncodingError(`Parameter key "${key}" uses the reserved ${UTF8_KEY_PREFIX} prefix`);
  }
  if (value.includes('\0')) {
    throw new EncodingError(`Value of "${key}" contains a NUL character`);
  }
  if (hasLoneSurrogate(key) || hasLoneSurrogate(value)) {
    throw new EncodingError(`Parameter "${key}" contains an unpaired surrogate`);
  }
}

/**
 * Encode a collection into parameter block bytes (terminator included)
 */
export function encodeParameters(
  params: ParameterCollection,
  charset: ParameterCharset = params.charset
): Uint8Array {
  if (charset === 'utf16') {
    let text = '';
    for (const { key, value } of params) {
      validateEntry(key, value);
      text += `|${key}=${quoteValue(value)}`;
    }
    return encodeUtf16(text + '\0');
  }

  const chunks: Uint8Array[] = [];
  let total = 0;
  const push = (bytes: Uint8Array) => {
    chunks.push(bytes);
    total += bytes.length;
  };

  for (const { key, value } of params) {
    validateEntry(key, value);
    const keyBytes = tryEncodeAnsi(key);
    if (!keyBytes) {
      throw new EncodingError(`Parameter key "${key}" cannot be represented in Windows-1252`);
    }
    const quoted = quoteValue(value);
    const valueBytes = tryEncodeAnsi(quoted);
    push(Uint8Array.of(PIPE));
    if (!valueBytes) push(UTF8_PREFIX_BYTES);
    push(keyBytes);
    push(Uint8Array.of(EQUALS));
    push(valueBytes ?? encodeUtf8(quoted));
  }
  push(Uint8Array.of(0));

  const result = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  return result;
}

interface ScannedEntry {
  keyStart: number;
  keyEnd: number;
  valueStart: number;
  valueEnd: number;
  quoted: boolean;
}

function findClosingQuote(units: ArrayLike<number>, from: number, end: number): number {
  let i = from;
  while (i < end) {
    if (units[i] === QUOTE) {
      if (i + 1 < end && units[i + 1] === QUOTE) {
        i += 2;
        continue;
      }
      return i;
    }
    i++;
  }
  return -1;
}

/**
 * Split a block into key/value ranges. Works on bytes (ANSI) and on UTF-16
 * code units alike, since every delimiter is ASCII.
 */
function scanEntries(units: ArrayLike<number>, end: number): ScannedEntry[] {
  const entries: ScannedEntry[] = [];
  let pos = 0;

  while (pos < end) {
    if (units[pos] === PIPE) {
      pos++;
      continue;
    }

    const keyStart = pos;
    while (pos < end && units[pos] !== EQUALS && units[pos] !== PIPE) pos++;
    const keyEnd = pos;

    if (pos >= end || units[pos] === PIPE) {
      // key without '=' reads as an empty value
      entries.push({ keyStart, keyEnd, valueStart: pos, valueEnd: pos, quoted: false });
      continue;
    }
    pos++;

    if (pos < end && units[pos] === QUOTE) {
      const closing = findClosingQuote(units, pos + 1, end);
      if (closing !== -1 && (closing + 1 === end || units[closing + 1] === PIPE)) {
        entries.push({ keyStart, keyEnd, valueStart: pos + 1, valueEnd: closing, quoted: true });
        pos = closing + 1;
        continue;
      }
    }

    const valueStart = pos;
    while (pos < end && units[pos] !== PIPE) pos++;
    entries.push({ keyStart, keyEnd, valueStart, valueEnd: pos, quoted: false });
  }

  return entries;
}

function unquote(text: string, quoted: boolean): string {
  return quoted ? text.replace(/""/g, '"') : text;
}

function addDecoded(params: ParameterCollection, key: string, value: string): void {
  if (key.length === 0) return;
  params.set(key, value);
}

/**
 * Decode parameter block bytes. Text after the first terminator is ignored.
 */
export function decodeParameters(bytes: Uint8Array, charset: ParameterCharset = 'ansi'): ParameterCollection {
  const params = new ParameterCollection(undefined, charset);

  if (charset === 'utf16') {
    const text = decodeUtf16(bytes);
    const terminator = text.indexOf('\0');
    const end = terminator === -1 ? text.length : terminator;
    const units: number[] = [];
    for (let i = 0; i < end; i++) units.push(text.charCodeAt(i));
    for (const entry of scanEntries(units, end)) {
      addDecoded(
        params,
        text.slice(entry.keyStart, entry.keyEnd),
        unquote(text.slice(entry.valueStart, entry.valueEnd), entry.quoted)
      );
    }
    return params;
  }

  const terminator = bytes.indexOf(0);
  const end = terminator === -1 ? bytes.length : terminator;
  for (const entry of scanEntries(bytes, end)) {
    const key = decodeAnsi(bytes.subarray(entry.keyStart, entry.keyEnd));
    const valueBytes = bytes.subarray(entry.valueStart, entry.valueEnd);
    if (key.toUpperCase().startsWith(UTF8_KEY_PREFIX)) {
      addDecoded(params, key.slice(UTF8_KEY_PREFIX.length), unquote(decodeUtf8(valueBytes), entry.quoted));
    } else {
      addDecoded(params, key, unquote(decodeAnsi(valueBytes), entry.quoted));
    }
  }
  return params;
}
