/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

export type { AttributeGroup } from './attributes.js';
export {
  recordCodecs,
  lookupCodec,
  pinConglomerate,
} from './codecs.js';
export type { RecordCodec, RecordPrimitive } from './codecs.js';
export { createPrimitive, exportPrimitive, importPrimitive, importBinaryRecord } from './primitive.js';
export type { ImportedRecord, UnknownRecordPolicy } from './primitive.js';
