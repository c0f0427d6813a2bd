/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * FileHeader stream: library-wide parameters followed by the ordered list of
 * component reference names.
 *
 *   [parameter block]  HEADER, WEIGHT, MINORVERSION, UNIQUEID, fonts,
 *                      USEMBCS, ISBOC, other globals, COMPCOUNT,
 *                      LIBREFn / COMPDESCRn / PARTCOUNTn per component
 *   [int32 count]
 *   [string block] x count (Windows-1252 form of each name)
 */

import {
  FramingError,
  annotateError,
  ParameterCollection,
  createLogger,
  type Component,
  type FontSpec,
  type LibraryHeader,
} from '@schlib/data';
import { boolField, intField, readDeclaredCount, textField, toAnsiText } from '@schlib/encoding';
import { readParametersBlock, readStringBlock, writeParametersBlock, writeStringBlock } from '../framing.js';
import type { BufferReader, BufferWriter } from '../utils/buffer-utils.js';

const log = createLogger('FileHeader');

const FIXED_KEYS = new Set([
  'HEADER',
  'WEIGHT',
  'MINORVERSION',
  'UNIQUEID',
  'FONTIDCOUNT',
  'USEMBCS',
  'ISBOC',
  'COMPCOUNT',
]);
const INDEXED_KEY = /^(SIZE|FONTNAME|ROTATION|BOLD|ITALIC|UNDERLINE|LIBREF|COMPDESCR|PARTCOUNT)\d+$/;

/** Keys the header model owns or derives; everything else is kept in `extra` */
export function isReservedHeaderKey(key: string): boolean {
  const upper = key.toUpperCase();
  return FIXED_KEYS.has(upper) || INDEXED_KEY.test(upper);
}

function fontFields(id: number) {
  return {
    size: intField(`SIZE${id}`),
    name: textField(`FONTNAME${id}`),
    rotation: intField(`ROTATION${id}`),
    bold: boolField(`BOLD${id}`),
    italic: boolField(`ITALIC${id}`),
    underline: boolField(`UNDERLINE${id}`),
  };
}

export interface FileHeaderContents {
  header: LibraryHeader;
  /** Component reference names in document order */
  names: string[];
}

/**
 * Name blocks hold Windows-1252 only; a name outside it is written with `?`
 * substitutes and recovered from its LIBREFn parameter, which can carry
 * any text.
 */
function resolveName(blockName: string, libRef: string | undefined): string {
  if (libRef === undefined || libRef === blockName) return blockName;
  return toAnsiText(libRef) === blockName ? libRef : blockName;
}

export function writeFileHeader(
  writer: BufferWriter,
  header: LibraryHeader,
  components: readonly Component[],
  weight: number
): void {
  const params = new ParameterCollection();
  params.set('HEADER', header.version);
  params.set('WEIGHT', weight);
  params.set('MINORVERSION', header.minorVersion);
  params.set('UNIQUEID', header.uniqueId);

  params.set('FONTIDCOUNT', header.fonts.length);
  header.fonts.forEach((font, i) => {
    const fields = fontFields(i + 1);
    fields.size.write(params, font.size);
    fields.name.write(params, font.name);
    fields.rotation.write(params, font.rotation);
    fields.bold.write(params, font.bold);
    fields.italic.write(params, font.italic);
    fields.underline.write(params, font.underline);
  });

  params.set('USEMBCS', header.useMbcs);
  params.set('ISBOC', header.isBoc);

  for (const { key, value } of header.extra) {
    if (isReservedHeaderKey(key)) {
      log.warn(`Skipping reserved key ${key} in extra header parameters`);
      continue;
    }
    params.set(key, value);
  }

  params.set('COMPCOUNT', components.length);
  components.forEach((component, i) => {
    params.set(`LIBREF${i}`, component.libReference);
    params.set(`COMPDESCR${i}`, component.description);
    params.set(`PARTCOUNT${i}`, component.partCount);
  });

  writeParametersBlock(writer, params);

  writer.writeInt32(components.length);
  for (const component of components) {
    writeStringBlock(writer, toAnsiText(component.libReference));
  }
}

export function readFileHeader(reader: BufferReader): FileHeaderContents {
  const params = readParametersBlock(reader);

  let fontCount: number;
  try {
    fontCount = readDeclaredCount(params, 'FONTIDCOUNT');
  } catch (error) {
    throw annotateError(error, reader.location);
  }
  const fonts: FontSpec[] = [];
  for (let id = 1; id <= fontCount; id++) {
    const fields = fontFields(id);
    fonts.push({
      size: fields.size.read(params),
      name: fields.name.read(params),
      rotation: fields.rotation.read(params),
      bold: fields.bold.read(params),
      italic: fields.italic.read(params),
      underline: fields.underline.read(params),
    });
  }

  const extra = new ParameterCollection();
  for (const { key, value } of params) {
    if (!isReservedHeaderKey(key)) extra.set(key, value);
  }

  const header: LibraryHeader = {
    version: params.getString('HEADER'),
    minorVersion: params.getInt('MINORVERSION', 0),
    uniqueId: params.getString('UNIQUEID'),
    useMbcs: params.getBool('USEMBCS', true),
    isBoc: params.getBool('ISBOC', true),
    fonts,
    extra,
  };

  const countOffset = reader.position;
  const count = reader.readInt32();
  if (count < 0) {
    throw new FramingError(`Negative component count ${count}`, reader.here(countOffset));
  }
  const names: string[] = [];
  for (let i = 0; i < count; i++) {
    names.push(resolveName(readStringBlock(reader), params.get(`LIBREF${i}`)));
  }

  const declared = params.getInt('COMPCOUNT', names.length);
  if (declared !== names.length) {
    log.warn(`COMPCOUNT is ${declared} but ${names.length} component names follow`);
  }

  return { header, names };
}
