/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Data stream: one block per flat record, in flat index order. Parameter
 * blocks carry modelled and unknown records; binary blocks carry opaque
 * record bodies, which are attached to the component on read.
 */

import { FramingError, RecordType } from '@schlib/data';
import { decodeParameters } from '@schlib/encoding';
import { BlockFlags, readBlock, writeParametersBlock, writeRawBlock } from '../framing.js';
import { exportPrimitive, importBinaryRecord, importPrimitive, type UnknownRecordPolicy } from '../records/index.js';
import type { FlatRecord } from '../tree.js';
import type { BufferReader, BufferWriter } from '../utils/buffer-utils.js';

/**
 * @param pinCount - pin count written as the component's cached ALLPINCOUNT
 */
export function writeComponentData(writer: BufferWriter, records: readonly FlatRecord[], pinCount: number): void {
  records.forEach(({ primitive, ownerIndex }, index) => {
    if (primitive.record === RecordType.Unknown && primitive.binary) {
      writeRawBlock(writer, primitive.binary, BlockFlags.Binary);
      return;
    }
    const exported: typeof primitive =
      index === 0 && primitive.record === RecordType.Component ? { ...primitive, pinCount } : primitive;
    writeParametersBlock(writer, exportPrimitive(exported, ownerIndex));
  });
}

export function readComponentData(reader: BufferReader, policy: UnknownRecordPolicy): FlatRecord[] {
  const records: FlatRecord[] = [];
  while (reader.remaining > 0) {
    const { flags, body, offset } = readBlock(reader);
    const location = reader.here(offset);
    if (flags === BlockFlags.Parameters) {
      records.push(importPrimitive(decodeParameters(body), policy, location));
    } else if (flags === BlockFlags.Binary) {
      records.push({ primitive: importBinaryRecord(body, policy, location), ownerIndex: 0 });
    } else {
      throw new FramingError(`Unknown block flags 0x${flags.toString(16)}`, location);
    }
  }
  return records;
}

