/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

export {
  encodeAnsi,
  tryEncodeAnsi,
  toAnsiText,
  hasLoneSurrogate,
  ANSI_REPLACEMENT,
  decodeAnsi,
  encodeUtf8,
  decodeUtf8,
  encodeUtf16,
  decodeUtf16,
} from './charset.js';
export { encodeParameters, decodeParameters, quoteValue, UTF8_KEY_PREFIX } from './parameter-codec.js';
export {
  intField,
  numberField,
  boolField,
  textField,
  enumField,
  packedField,
  coordField,
  pointField,
  pointListField,
  splitCoord,
  joinCoord,
  COORD_FRACTION_SCALE,
  MAX_DECLARED_COUNT,
  readDeclaredCount,
} from './fields.js';
export type { FieldDef } from './fields.js';
