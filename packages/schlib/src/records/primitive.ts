/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Conversion between primitives and their record parameter blocks
 */

import {
  MalformedContainerError,
  ParameterCollection,
  RecordType,
  UnknownRecordTypeError,
  type ErrorLocation,
  type KnownRecordType,
  type Primitive,
  type UnknownPrimitive,
} from '@schlib/data';
import { BASE_KEYS, baseAttributes } from './attributes.js';
import { lookupCodec, recordCodecs, type RecordPrimitive } from './codecs.js';

export type UnknownRecordPolicy = 'preserve' | 'reject';

const RECORD_KEY = 'RECORD';
const OWNER_INDEX_KEY = 'OWNERINDEX';

/**
 * Create a primitive with every attribute at its default. Defaults come from
 * the same field table that decides which keys are omitted on write.
 */
export function createPrimitive<R extends KnownRecordType>(
  record: R,
  overrides: Partial<Omit<RecordPrimitive<R>, 'record'>> = {}
): RecordPrimitive<R> {
  return { ...recordCodecs[record].read(new ParameterCollection()), ...overrides };
}

/**
 * Render a primitive as its record parameters: RECORD, then OWNERINDEX for
 * non-root records, then the variant's fields.
 */
export function exportPrimitive(primitive: Primitive, ownerIndex?: number): ParameterCollection {
  const params = new ParameterCollection();

  if (primitive.record === RecordType.Unknown) {
    params.set(RECORD_KEY, primitive.originalRecord);
    if (ownerIndex !== undefined) params.set(OWNER_INDEX_KEY, ownerIndex);
    baseAttributes.write(params, primitive);
    for (const { key, value } of primitive.parameters ?? []) {
      if (!params.has(key)) params.set(key, value);
    }
    return params;
  }

  const codec = lookupCodec(primitive.record);
  if (!codec) {
    throw new UnknownRecordTypeError(primitive.record);
  }
  params.set(RECORD_KEY, primitive.record);
  if (ownerIndex !== undefined) params.set(OWNER_INDEX_KEY, ownerIndex);
  codec.write(primitive, params);
  return params;
}

export interface ImportedRecord {
  primitive: Primitive;
  /** Flat index of the owner, undefined when the record has no OWNERINDEX */
  ownerIndex: number | undefined;
}

/**
 * Materialize a record from its parameters. Tags without a codec become
 * Unknown primitives that keep their parameters, unless the policy rejects them.
 */
export function importPrimitive(
  params: ParameterCollection,
  policy: UnknownRecordPolicy = 'preserve',
  location?: ErrorLocation
): ImportedRecord {
  const record = params.getInt(RECORD_KEY, Number.NaN);
  if (Number.isNaN(record)) {
    throw new MalformedContainerError('Record block has no RECORD key', location);
  }
  const ownerIndex = params.has(OWNER_INDEX_KEY) ? params.getInt(OWNER_INDEX_KEY, 0) : undefined;

  const codec = lookupCodec(record);
  if (codec) {
    return { primitive: codec.read(params), ownerIndex };
  }
  if (policy === 'reject') {
    throw new UnknownRecordTypeError(record, location);
  }

  const parameters = params.clone();
  for (const key of [RECORD_KEY, OWNER_INDEX_KEY, ...BASE_KEYS]) {
    parameters.delete(key);
  }
  const primitive: UnknownPrimitive = {
    record: RecordType.Unknown,
    originalRecord: record,
    ...baseAttributes.read(params),
    parameters,
    children: [],
  };
  return { primitive, ownerIndex };
}

/**
 * Keep a binary record body as an Unknown primitive. Its tag is the int32 at
 * the start of the body.
 */
export function importBinaryRecord(
  body: Uint8Array,
  policy: UnknownRecordPolicy = 'preserve',
  location?: ErrorLocation
): Primitive {
  const tag = body.length >= 4 ? new DataView(body.buffer, body.byteOffset, 4).getInt32(0, true) : -1;
  if (policy === 'reject') {
    throw new UnknownRecordTypeError(tag, location);
  }
  return {
    record: RecordType.Unknown,
    originalRecord: tag,
    ...baseAttributes.read(new ParameterCollection()),
    binary: body,
    children: [],
  };
}
