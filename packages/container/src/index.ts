/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @schlib/container - Storage/stream container abstraction
 */

export { MAX_ENTRY_NAME_LENGTH, FORBIDDEN_NAME_CHARS } from './types.js';
export type { CompoundStorage, CompoundStream, StreamSink } from './types.js';
export { MemoryStorage, MemoryStream, validateEntryName } from './memory-storage.js';
export { packStorage, unpackStorage } from './archive.js';
export type { PackOptions } from './archive.js';
