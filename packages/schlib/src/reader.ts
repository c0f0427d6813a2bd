/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * SchLibReader - reads a library document from a container
 */

import {
  MalformedContainerError,
  annotateError,
  createLogger,
  type Component,
  type ErrorLocation,
  type LibraryDocument,
} from '@schlib/data';
import type { CompoundStorage } from '@schlib/container';
import { resolveReadOptions } from './options.js';
import { readComponentData } from './sections/component.js';
import { applyEmbeddedImages, readEmbeddedImages } from './sections/embedded-images.js';
import { readFileHeader, type FileHeaderContents } from './sections/header.js';
import { readPinStreams } from './sections/pin-streams.js';
import { readSectionKeys } from './sections/section-keys.js';
import { applyPinPayloads, buildComponentTree, pinsInRecordOrder } from './tree.js';
import { StreamName, type ResolvedReadOptions, type SchLibReadOptions } from './types.js';
import { BufferReader } from './utils/buffer-utils.js';

const log = createLogger('SchLibReader');

export class SchLibReader {
  /**
   * Read only the component reference names listed in the FileHeader
   */
  readComponentNames(root: CompoundStorage): string[] {
    return this.readHeader(root).names;
  }

  /**
   * Read a complete library
   */
  read(root: CompoundStorage, options: SchLibReadOptions = {}): LibraryDocument {
    const resolved = resolveReadOptions(options);
    const { header, names } = this.readHeader(root);

    if (resolved.strictComponentCount) {
      const storageCount = root.storageNames().length;
      if (storageCount !== names.length) {
        throw new MalformedContainerError(
          `FileHeader lists ${names.length} components but the container holds ${storageCount} component storages`,
          { stream: StreamName.FileHeader }
        );
      }
    }

    const sectionKeys = this.readSectionKeys(root);
    const components = names.map((name) => {
      const location: ErrorLocation = { component: name };
      try {
        return this.readComponent(root, name, sectionKeys.get(name) ?? name, resolved, location);
      } catch (error) {
        throw annotateError(error, location);
      }
    });

    const images = root.tryGetStream(StreamName.Storage);
    if (images) {
      const reader = new BufferReader(images.read(), { stream: StreamName.Storage });
      applyEmbeddedImages(components, readEmbeddedImages(reader));
    } else {
      applyEmbeddedImages(components, new Map());
    }

    log.info(`Read ${components.length} components`);
    return { header, components };
  }

  private readHeader(root: CompoundStorage): FileHeaderContents {
    const stream = root.tryGetStream(StreamName.FileHeader);
    if (!stream) {
      throw new MalformedContainerError('Missing FileHeader stream');
    }
    return readFileHeader(new BufferReader(stream.read(), { stream: StreamName.FileHeader }));
  }

  private readSectionKeys(root: CompoundStorage): Map<string, string> {
    const stream = root.tryGetStream(StreamName.SectionKeys);
    if (!stream) return new Map();
    return readSectionKeys(new BufferReader(stream.read(), { stream: StreamName.SectionKeys }));
  }

  private readComponent(
    root: CompoundStorage,
    name: string,
    sectionKey: string,
    options: ResolvedReadOptions,
    location: ErrorLocation
  ): Component {
    const storage = root.tryGetStorage(sectionKey);
    if (!storage) {
      throw new MalformedContainerError(`Missing component storage "${sectionKey}"`, location);
    }
    const data = storage.tryGetStream(StreamName.Data);
    if (!data) {
      throw new MalformedContainerError('Missing Data stream', { ...location, stream: StreamName.Data });
    }

    const records = readComponentData(
      new BufferReader(data.read(), { ...location, stream: StreamName.Data }),
      options.unknownRecords
    );
    const component = buildComponentTree(records, { ...location, stream: StreamName.Data });
    const pins = pinsInRecordOrder(records);
    applyPinPayloads(pins, readPinStreams(storage, pins.length, location));

    if (component.libReference !== name) {
      log.warn(`Component record names itself "${component.libReference}"`, { libReference: name });
    }
    if (component.pinCount !== pins.length) {
      log.warn(`ALLPINCOUNT is ${component.pinCount} but ${pins.length} pins were read`, { libReference: name });
    }
    log.debug(`Read ${records.length} records`, undefined, { libReference: name, data: { sectionKey } });
    return component;
  }
}
