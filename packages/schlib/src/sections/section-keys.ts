/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * SectionKeys stream: the reference names whose storage name differs from
 * the name itself.
 *
 *   KEYCOUNT=n, then LIBREFi / SECTIONKEYi for i in 0..n-1
 */

import { ParameterCollection } from '@schlib/data';
import { readParametersBlock, writeParametersBlock } from '../framing.js';
import type { BufferReader, BufferWriter } from '../utils/buffer-utils.js';

export interface SectionKeyEntry {
  libReference: string;
  sectionKey: string;
}

export function writeSectionKeys(writer: BufferWriter, entries: readonly SectionKeyEntry[]): void {
  const params = new ParameterCollection([['KEYCOUNT', entries.length]]);
  entries.forEach(({ libReference, sectionKey }, i) => {
    params.set(`LIBREF${i}`, libReference);
    params.set(`SECTIONKEY${i}`, sectionKey);
  });
  writeParametersBlock(writer, params);
}

/** @returns map from reference name to storage name */
export function readSectionKeys(reader: BufferReader): Map<string, string> {
  const params = readParametersBlock(reader);
  const count = params.getInt('KEYCOUNT', 0);
  const keys = new Map<string, string>();
  for (let i = 0; i < count; i++) {
    const libReference = params.get(`LIBREF${i}`);
    const sectionKey = params.get(`SECTIONKEY${i}`);
    if (libReference !== undefined && sectionKey !== undefined) {
      keys.set(libReference, sectionKey);
    }
  }
  return keys;
}
