/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Auxiliary pin streams (PinTextData, PinWideText, PinSymbolLineWidth).
 *
 *   [parameter block]  HEADER=<stream name>, WEIGHT=<entry count>
 *   [compressed block] x WEIGHT, keyed by decimal pin index
 *
 * PinTextData payloads are raw bytes. The other two hold a UTF-16 parameter
 * block. A stream is only written when at least one pin has a payload.
 */

import {
  MalformedContainerError,
  ParameterCollection,
  createLogger,
  type ErrorLocation,
} from '@schlib/data';
import type { CompoundStorage, CompoundStream } from '@schlib/container';
import {
  readCompressedStorage,
  readParametersBlock,
  writeCompressedStorage,
  writeParametersBlock,
  writeStream,
  type CompressionLevel,
} from '../framing.js';
import { StreamName } from '../types.js';
import { BufferReader, BufferWriter } from '../utils/buffer-utils.js';
import { createPinPayloads, type PinPayloads } from '../tree.js';

const log = createLogger('PinStreams');

const PIN_INDEX = /^\d+$/;

function writeAuxStream(
  stream: CompoundStream,
  name: StreamName,
  payloads: ReadonlyMap<number, Uint8Array>,
  level: CompressionLevel
): void {
  writeStream(stream, (writer) => {
    writeParametersBlock(
      writer,
      new ParameterCollection([
        ['HEADER', name],
        ['WEIGHT', payloads.size],
      ])
    );
    for (const [pinIndex, payload] of [...payloads].sort(([a], [b]) => a - b)) {
      writeCompressedStorage(writer, String(pinIndex), payload, level);
    }
  });
}

function encodeWideParameters(params: ParameterCollection): Uint8Array {
  const writer = new BufferWriter(256);
  writeParametersBlock(writer, params, 'utf16');
  return writer.build();
}

function decodeWideParameters(payload: Uint8Array, location: ErrorLocation): ParameterCollection {
  return readParametersBlock(new BufferReader(payload, location), 'utf16');
}

function mapValues<V, R>(source: ReadonlyMap<number, V>, fn: (value: V) => R): Map<number, R> {
  return new Map([...source].map(([key, value]): [number, R] => [key, fn(value)]));
}

/** Write the non-empty auxiliary streams of one component */
export function writePinStreams(storage: CompoundStorage, pins: PinPayloads, level: CompressionLevel): void {
  if (pins.textData.size > 0) {
    writeAuxStream(storage.getOrAddStream(StreamName.PinTextData), StreamName.PinTextData, pins.textData, level);
  }
  if (pins.wideText.size > 0) {
    writeAuxStream(
      storage.getOrAddStream(StreamName.PinWideText),
      StreamName.PinWideText,
      mapValues(pins.wideText, encodeWideParameters),
      level
    );
  }
  if (pins.symbolLineWidth.size > 0) {
    writeAuxStream(
      storage.getOrAddStream(StreamName.PinSymbolLineWidth),
      StreamName.PinSymbolLineWidth,
      mapValues(pins.symbolLineWidth, encodeWideParameters),
      level
    );
  }
}

function readAuxStream(
  stream: CompoundStream,
  name: StreamName,
  pinCount: number,
  location: ErrorLocation
): Map<number, Uint8Array> {
  const reader = new BufferReader(stream.read(), { ...location, stream: name });
  const header = readParametersBlock(reader);
  const declaredName = header.getString('HEADER');
  if (declaredName !== name) {
    log.warn(`Stream declares HEADER=${declaredName}`, { libReference: location.component, stream: name });
  }

  const weight = header.getInt('WEIGHT', 0);
  const payloads = new Map<number, Uint8Array>();
  for (let i = 0; i < weight; i++) {
    const offset = reader.position;
    const { key, payload } = readCompressedStorage(reader);
    const pinIndex = PIN_INDEX.test(key) ? parseInt(key, 10) : Number.NaN;
    if (Number.isNaN(pinIndex)) {
      throw new MalformedContainerError(`Pin payload key "${key}" is not a pin index`, reader.here(offset));
    }
    if (pinIndex >= pinCount) {
      throw new MalformedContainerError(
        `Pin payload key ${pinIndex} is out of range for ${pinCount} pins`,
        reader.here(offset)
      );
    }
    if (payloads.has(pinIndex)) {
      throw new MalformedContainerError(`Pin payload key ${pinIndex} is repeated`, reader.here(offset));
    }
    payloads.set(pinIndex, payload);
  }

  if (reader.remaining > 0) {
    log.warn(`${reader.remaining} trailing bytes after ${weight} entries`, {
      libReference: location.component,
      stream: name,
    });
  }
  return payloads;
}

/** Read whichever auxiliary streams are present; absent ones are empty */
export function readPinStreams(storage: CompoundStorage, pinCount: number, location: ErrorLocation): PinPayloads {
  const pins = createPinPayloads();

  const textData = storage.tryGetStream(StreamName.PinTextData);
  if (textData) {
    pins.textData = readAuxStream(textData, StreamName.PinTextData, pinCount, location);
  }

  const wideText = storage.tryGetStream(StreamName.PinWideText);
  if (wideText) {
    const streamLocation = { ...location, stream: StreamName.PinWideText };
    pins.wideText = mapValues(readAuxStream(wideText, StreamName.PinWideText, pinCount, location), (payload) =>
      decodeWideParameters(payload, streamLocation)
    );
  }

  const symbolLineWidth = storage.tryGetStream(StreamName.PinSymbolLineWidth);
  if (symbolLineWidth) {
    const streamLocation = { ...location, stream: StreamName.PinSymbolLineWidth };
    pins.symbolLineWidth = mapValues(
      readAuxStream(symbolLineWidth, StreamName.PinSymbolLineWidth, pinCount, location),
      (payload) => decodeWideParameters(payload, streamLocation)
    );
  }

  return pins;
}
