/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @schlib/schlib - Schematic library reader and writer
 *
 * @example
 * ```typescript
 * import { MemoryStorage } from '@schlib/container';
 * import {
 *   SchLibWriter,
 *   SchLibReader,
 *   RecordType,
 *   createPrimitive,
 *   createLibraryDocument,
 * } from '@schlib/schlib';
 *
 * const component = createPrimitive(RecordType.Component, { libReference: 'Resistor' });
 * component.children.push(createPrimitive(RecordType.Pin, { designator: '1' }));
 *
 * const root = new MemoryStorage();
 * new SchLibWriter().write(createLibraryDocument([component]), root);
 * const document = new SchLibReader().read(root);
 * ```
 */

export { SchLibWriter, ROOT_STREAM_NAMES } from './writer.js';
export { SchLibReader } from './reader.js';
export { writeSchLibArchive, readSchLibArchive } from './archive.js';

export { StreamName, EMBEDDED_IMAGES_HEADER } from './types.js';
export type {
  SchLibWriteOptions,
  SchLibReadOptions,
  ResolvedWriteOptions,
  ResolvedReadOptions,
} from './types.js';
export { resolveWriteOptions, resolveReadOptions } from './options.js';

export {
  BlockFlags,
  MAX_BLOCK_LENGTH,
  COMPRESSED_STORAGE_TAG,
  writeBlock,
  writeRawBlock,
  readBlock,
  writeStringBlock,
  readStringBlock,
  writeParametersBlock,
  readParametersBlock,
  writeCompressedStorage,
  readCompressedStorage,
  writeStream,
} from './framing.js';
export type { Block, CompressedStorage, CompressionLevel } from './framing.js';

export { sanitizeSectionKey, resolveSectionKeys, DEFAULT_MAX_SECTION_KEY_SUFFIX } from './section-keys.js';
export { flattenComponent, buildComponentTree, pinsInRecordOrder, applyPinPayloads } from './tree.js';
export type { FlatRecord, FlattenedComponent, PinPayloads } from './tree.js';

export * from './records/index.js';

// Model, parameter and error types come from the shared packages
export * from '@schlib/data';

// Utilities
export { BufferWriter, BufferReader } from './utils/buffer-utils.js';
