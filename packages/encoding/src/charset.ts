/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Text charsets used by parameter blocks and name blocks:
 * - Windows-1252 for ANSI blocks and reference names
 * - UTF-8 for %UTF8% keyed values inside ANSI blocks
 * - UTF-16LE for wide parameter blocks
 *
 * Windows-1252 is table driven: Node's TextDecoder treats the label as
 * Latin-1 and decodes 0x80-0x9F as C1 controls.
 */

import { EncodingError } from '@schlib/data';

const utf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
const utf16Decoder = new TextDecoder('utf-16le', { fatal: true, ignoreBOM: true });
const utf8Encoder = new TextEncoder();

/**
 * Code points of bytes 0x80-0x9F. The five bytes Windows-1252 leaves
 * unassigned map to the C1 control with the same value.
 */
const WINDOWS_1252_C1 = [
  0x20ac, 0x0081, 0x201a, 0x0192, 0x201e, 0x2026, 0x2020, 0x2021,
  0x02c6, 0x2030, 0x0160, 0x2039, 0x0152, 0x008d, 0x017d, 0x008f,
  0x0090, 0x2018, 0x2019, 0x201c, 0x201d, 0x2022, 0x2013, 0x2014,
  0x02dc, 0x2122, 0x0161, 0x203a, 0x0153, 0x009d, 0x017e, 0x0178,
];

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/** Substitute written for characters Windows-1252 has no byte for */
export const ANSI_REPLACEMENT = '?';

function ansiCodePoint(byte: number): number {
  return byte >= 0x80 && byte < 0xa0 ? WINDOWS_1252_C1[byte - 0x80] : byte;
}

let ansiEncodeTable: Map<number, number> | null = null;

function getAnsiEncodeTable(): Map<number, number> {
  if (!ansiEncodeTable) {
    ansiEncodeTable = new Map();
    for (let byte = 0; byte < 256; byte++) {
      ansiEncodeTable.set(ansiCodePoint(byte), byte);
    }
  }
  return ansiEncodeTable;
}

export function hasLoneSurrogate(text: string): boolean {
  return LONE_SURROGATE.test(text);
}

/**
 * Encode text as Windows-1252.
 * @returns the bytes, or undefined when a character has no Windows-1252 byte
 */
export function tryEncodeAnsi(text: string): Uint8Array | undefined {
  const table = getAnsiEncodeTable();
  const bytes = new Uint8Array(text.length);
  for (let i = 0; i < text.length; i++) {
    const byte = table.get(text.charCodeAt(i));
    if (byte === undefined) return undefined;
    bytes[i] = byte;
  }
  return bytes;
}

export function encodeAnsi(text: string): Uint8Array {
  const bytes = tryEncodeAnsi(text);
  if (!bytes) {
    throw new EncodingError(`"${text}" cannot be represented in Windows-1252`);
  }
  return bytes;
}

/**
 * Text as it survives a Windows-1252 round trip: every code point without a
 * byte becomes {@link ANSI_REPLACEMENT}.
 */
export function toAnsiText(text: string): string {
  const table = getAnsiEncodeTable();
  let result = '';
  for (const char of text) {
    result += char.length === 1 && table.has(char.charCodeAt(0)) ? char : ANSI_REPLACEMENT;
  }
  return result;
}

export function decodeAnsi(bytes: Uint8Array): string {
  let text = '';
  for (let i = 0; i < bytes.length; i++) {
    text += String.fromCharCode(ansiCodePoint(bytes[i]));
  }
  return text;
}

export function encodeUtf8(text: string): Uint8Array {
  return utf8Encoder.encode(text);
}

export function decodeUtf8(bytes: Uint8Array): string {
  try {
    return utf8Decoder.decode(bytes);
  } catch (error) {
    throw new EncodingError(`Invalid UTF-8 text: ${error instanceof Error ? error.message : String(error)}`);
  }
}

export function encodeUtf16(text: string): Uint8Array {
  const bytes = new Uint8Array(text.length * 2);
  const view = new DataView(bytes.buffer);
  for (let i = 0; i < text.length; i++) {
    view.setUint16(i * 2, text.charCodeAt(i), true);
  }
  return bytes;
}

export function decodeUtf16(bytes: Uint8Array): string {
  if (bytes.length % 2 !== 0) {
    throw new EncodingError(`UTF-16 text has odd byte length ${bytes.length}`);
  }
  try {
    return utf16Decoder.decode(bytes);
  } catch (error) {
    throw new EncodingError(`Invalid UTF-16 text: ${error instanceof Error ? error.message : String(error)}`);
  }
}
