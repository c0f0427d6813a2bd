/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Whole-library helpers over the zip packaging of the container
 */

import type { LibraryDocument } from '@schlib/data';
import { MemoryStorage, packStorage, unpackStorage } from '@schlib/container';
import { SchLibReader } from './reader.js';
import { SchLibWriter } from './writer.js';
import type { SchLibReadOptions, SchLibWriteOptions } from './types.js';

export async function writeSchLibArchive(
  document: LibraryDocument,
  options: SchLibWriteOptions = {}
): Promise<Uint8Array> {
  const root = new MemoryStorage();
  new SchLibWriter().write(document, root, options);
  return packStorage(root);
}

export async function readSchLibArchive(bytes: Uint8Array, options: SchLibReadOptions = {}): Promise<LibraryDocument> {
  const root = await unpackStorage(bytes);
  return new SchLibReader().read(root, options);
}
