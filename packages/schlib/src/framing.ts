/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Block framing
 *
 * Every structure inside a stream is a block: a uint32 little-endian prefix
 * whose low 24 bits hold the body length and whose high 8 bits hold flags,
 * followed by the body.
 *
 *   string block      [len:u8][Windows-1252 bytes]            (no terminator)
 *   compressed block  flags=Binary, body:
 *                     [0xD0][string block: key][u32 inflated length]
 *                     [block: zlib payload]
 */

import { unzlibSync, zlibSync, type DeflateOptions } from 'fflate';
import {
  CompressedPayloadError,
  EncodingError,
  FramingError,
  TruncatedBlockError,
  type ParameterCharset,
  type ParameterCollection,
} from '@schlib/data';
import { decodeAnsi, decodeParameters, encodeAnsi, encodeParameters } from '@schlib/encoding';
import type { CompoundStream } from '@schlib/container';
import { BufferReader, BufferWriter } from './utils/buffer-utils.js';

export enum BlockFlags {
  /** Body is a parameter block */
  Parameters = 0x00,
  /** Body is a binary record */
  Binary = 0x01,
}

export const MAX_BLOCK_LENGTH = 0xffffff;
export const COMPRESSED_STORAGE_TAG = 0xd0;

export type CompressionLevel = NonNullable<DeflateOptions['level']>;

export interface Block {
  flags: number;
  body: Uint8Array;
  /** Offset of the length prefix within the stream */
  offset: number;
}

/**
 * Write a length-prefixed block. The body callback writes into a scratch
 * buffer so the length is known before the prefix goes out.
 */
export function writeBlock(
  writer: BufferWriter,
  body: (w: BufferWriter) => void,
  flags: BlockFlags = BlockFlags.Parameters
): void {
  const scratch = new BufferWriter(256);
  body(scratch);
  writeRawBlock(writer, scratch.build(), flags);
}

export function writeRawBlock(writer: BufferWriter, body: Uint8Array, flags: BlockFlags = BlockFlags.Parameters): void {
  if (body.length > MAX_BLOCK_LENGTH) {
    throw new FramingError(`Block body of ${body.length} bytes exceeds the ${MAX_BLOCK_LENGTH} byte limit`);
  }
  writer.writeUint32(((flags & 0xff) << 24 | body.length) >>> 0);
  writer.writeBytes(body);
}

export function readBlock(reader: BufferReader): Block {
  const offset = reader.position;
  const prefix = reader.readUint32();
  const length = prefix & MAX_BLOCK_LENGTH;
  const flags = prefix >>> 24;
  if (length > reader.remaining) {
    throw new TruncatedBlockError(length, reader.remaining, reader.here(offset));
  }
  return { flags, body: reader.readBytes(length), offset };
}

export function writeStringBlock(writer: BufferWriter, text: string): void {
  const bytes = encodeAnsi(text);
  if (bytes.length > 0xff) {
    throw new EncodingError(`"${text}" is longer than 255 bytes`);
  }
  writeBlock(writer, (w) => {
    w.writeUint8(bytes.length);
    w.writeBytes(bytes);
  });
}

export function readStringBlock(reader: BufferReader): string {
  const { body, offset } = readBlock(reader);
  if (body.length === 0) {
    throw new FramingError('String block is empty', reader.here(offset));
  }
  const length = body[0];
  if (length + 1 > body.length) {
    throw new TruncatedBlockError(length, body.length - 1, reader.here(offset));
  }
  return decodeAnsi(body.subarray(1, 1 + length));
}

export function writeParametersBlock(writer: BufferWriter, params: ParameterCollection, charset?: ParameterCharset): void {
  writeRawBlock(writer, encodeParameters(params, charset));
}

export function readParametersBlock(reader: BufferReader, charset: ParameterCharset = 'ansi'): ParameterCollection {
  const { flags, body, offset } = readBlock(reader);
  if (flags !== BlockFlags.Parameters) {
    throw new FramingError(`Expected a parameter block, found flags 0x${flags.toString(16)}`, reader.here(offset));
  }
  return decodeParameters(body, charset);
}

/**
 * Write a keyed, zlib-compressed sub-block
 */
export function writeCompressedStorage(
  writer: BufferWriter,
  key: string,
  payload: Uint8Array,
  level: CompressionLevel = 6
): void {
  writeBlock(
    writer,
    (w) => {
      w.writeUint8(COMPRESSED_STORAGE_TAG);
      writeStringBlock(w, key);
      w.writeUint32(payload.length);
      writeRawBlock(w, zlibSync(payload, { level }));
    },
    BlockFlags.Binary
  );
}

export interface CompressedStorage {
  key: string;
  payload: Uint8Array;
}

export function readCompressedStorage(reader: BufferReader): CompressedStorage {
  const { body, offset } = readBlock(reader);
  const location = reader.here(offset);
  const inner = new BufferReader(body, reader.location);

  try {
    const tag = inner.readUint8();
    if (tag !== COMPRESSED_STORAGE_TAG) {
      throw new CompressedPayloadError(`Unexpected compressed block tag 0x${tag.toString(16)}`, location);
    }
    const key = readStringBlock(inner);
    const expectedLength = inner.readUint32();
    const compressed = readBlock(inner).body;

    let payload: Uint8Array;
    try {
      payload = unzlibSync(compressed);
    } catch (error) {
      throw new CompressedPayloadError(
        `Payload "${key}" does not inflate: ${error instanceof Error ? error.message : String(error)}`,
        location
      );
    }
    if (payload.length !== expectedLength) {
      throw new CompressedPayloadError(
        `Payload "${key}" inflated to ${payload.length} bytes, expected ${expectedLength}`,
        location
      );
    }
    return { key, payload };
  } catch (error) {
    if (error instanceof CompressedPayloadError) throw error;
    if (error instanceof FramingError) {
      throw new CompressedPayloadError(`Malformed compressed block: ${error.reason}`, location);
    }
    throw error;
  }
}

/**
 * Serialize into a container stream. Whatever the body wrote is committed
 * even when it throws.
 */
export function writeStream(stream: CompoundStream, body: (w: BufferWriter) => void): void {
  stream.write((sink) => {
    const writer = new BufferWriter();
    try {
      body(writer);
    } finally {
      sink.write(writer.build());
    }
  });
}
