/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Storage stream: embedded image bytes, stored once per file name.
 *
 *   [parameter block]  HEADER=Icon storage
 *   [compressed block] per image, keyed by file name
 */

import {
  EmbeddedAssetConflictError,
  ParameterCollection,
  RecordType,
  collectPrimitives,
  createLogger,
  type Component,
  type Image,
} from '@schlib/data';
import {
  readCompressedStorage,
  readParametersBlock,
  writeCompressedStorage,
  writeParametersBlock,
  type CompressionLevel,
} from '../framing.js';
import { EMBEDDED_IMAGES_HEADER } from '../types.js';
import type { BufferReader, BufferWriter } from '../utils/buffer-utils.js';

const log = createLogger('EmbeddedImages');

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  if (a === b) return true;
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

function embeddedImages(component: Component): Image[] {
  return collectPrimitives(component, RecordType.Image).filter((image) => image.embedImage);
}

/**
 * Gather distinct embedded images by file name. Identical bytes under one
 * name are stored once; different bytes under one name are rejected. Data on
 * an image that is not embedded is dropped with a warning.
 */
export function collectEmbeddedImages(components: readonly Component[]): Map<string, Uint8Array> {
  const images = new Map<string, Uint8Array>();
  for (const component of components) {
    for (const image of collectPrimitives(component, RecordType.Image)) {
      if (!image.imageData) continue;
      if (!image.embedImage) {
        log.warn(`Image "${image.fileName}" has data but is not embedded; the data is not stored`, {
          libReference: component.libReference,
        });
        continue;
      }
      const existing = images.get(image.fileName);
      if (existing === undefined) {
        images.set(image.fileName, image.imageData);
      } else if (!sameBytes(existing, image.imageData)) {
        throw new EmbeddedAssetConflictError(image.fileName, { component: component.libReference });
      }
    }
  }
  return images;
}

export function writeEmbeddedImages(
  writer: BufferWriter,
  images: ReadonlyMap<string, Uint8Array>,
  level: CompressionLevel
): void {
  writeParametersBlock(writer, new ParameterCollection([['HEADER', EMBEDDED_IMAGES_HEADER]]));
  for (const [fileName, data] of images) {
    writeCompressedStorage(writer, fileName, data, level);
  }
}

export function readEmbeddedImages(reader: BufferReader): Map<string, Uint8Array> {
  const header = readParametersBlock(reader);
  const declared = header.getString('HEADER');
  if (declared !== EMBEDDED_IMAGES_HEADER) {
    log.warn(`Storage stream declares HEADER=${declared}`);
  }

  const images = new Map<string, Uint8Array>();
  while (reader.remaining > 0) {
    const { key, payload } = readCompressedStorage(reader);
    images.set(key, payload);
  }
  return images;
}

/** Attach stored bytes to every embedded image primitive that names them */
export function applyEmbeddedImages(components: readonly Component[], images: ReadonlyMap<string, Uint8Array>): void {
  for (const component of components) {
    for (const image of embeddedImages(component)) {
      const data = images.get(image.fileName);
      if (data) {
        image.imageData = data;
      } else {
        log.warn(`No stored data for embedded image "${image.fileName}"`, {
          libReference: component.libReference,
        });
      }
    }
  }
}
