/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * SchLibWriter - writes a library document into a container
 */

import { annotateError, createLogger, type LibraryDocument } from '@schlib/data';
import type { CompoundStorage } from '@schlib/container';
import { writeStream } from './framing.js';
import { resolveWriteOptions } from './options.js';
import { resolveSectionKeys } from './section-keys.js';
import { writeComponentData } from './sections/component.js';
import { collectEmbeddedImages, writeEmbeddedImages } from './sections/embedded-images.js';
import { writeFileHeader } from './sections/header.js';
import { writePinStreams } from './sections/pin-streams.js';
import { writeSectionKeys, type SectionKeyEntry } from './sections/section-keys.js';
import { flattenComponent } from './tree.js';
import { StreamName, type SchLibWriteOptions } from './types.js';

const log = createLogger('SchLibWriter');

/** Root stream names a component storage may not take */
export const ROOT_STREAM_NAMES: readonly string[] = [StreamName.FileHeader, StreamName.SectionKeys, StreamName.Storage];

export class SchLibWriter {
  /**
   * Write a complete library
   * @param document - Library to write; it is not modified
   * @param root - Empty container root storage
   */
  write(document: LibraryDocument, root: CompoundStorage, options: SchLibWriteOptions = {}): void {
    const { compressionLevel, maxSectionKeySuffix } = resolveWriteOptions(options);
    const { header, components } = document;

    const sectionKeys = resolveSectionKeys(
      components.map((component) => component.libReference),
      maxSectionKeySuffix,
      ROOT_STREAM_NAMES
    );
    const images = collectEmbeddedImages(components);
    const flattened = components.map((component) => {
      try {
        return flattenComponent(component);
      } catch (error) {
        throw annotateError(error, { component: component.libReference });
      }
    });
    const weight = flattened.reduce((sum, { records }) => sum + records.length, 0);

    this.step({ stream: StreamName.FileHeader }, () => {
      writeStream(root.getOrAddStream(StreamName.FileHeader), (writer) =>
        writeFileHeader(writer, header, components, weight)
      );
    });

    const manifest: SectionKeyEntry[] = [];
    for (const { libReference } of components) {
      const sectionKey = sectionKeys.get(libReference) ?? libReference;
      if (sectionKey !== libReference) manifest.push({ libReference, sectionKey });
    }
    if (manifest.length > 0) {
      this.step({ stream: StreamName.SectionKeys }, () => {
        writeStream(root.getOrAddStream(StreamName.SectionKeys), (writer) => writeSectionKeys(writer, manifest));
      });
    }

    components.forEach((component, i) => {
      const { records, pins, pinCount } = flattened[i];
      const sectionKey = sectionKeys.get(component.libReference) ?? component.libReference;

      this.step({ component: component.libReference }, () => {
        const storage = root.getOrAddStorage(sectionKey);
        this.step({ stream: StreamName.Data }, () => {
          writeStream(storage.getOrAddStream(StreamName.Data), (writer) =>
            writeComponentData(writer, records, pinCount)
          );
        });
        writePinStreams(storage, pins, compressionLevel);
      });

      log.debug(`Wrote ${records.length} records, ${pinCount} pins`, undefined, {
        libReference: component.libReference,
        data: { sectionKey },
      });
    });

    this.step({ stream: StreamName.Storage }, () => {
      writeStream(root.getOrAddStream(StreamName.Storage), (writer) =>
        writeEmbeddedImages(writer, images, compressionLevel)
      );
    });

    log.info(`Wrote ${components.length} components, ${images.size} embedded images`);
  }

  private step(location: { component?: string; stream?: string }, fn: () => void): void {
    try {
      fn();
    } catch (error) {
      throw annotateError(error, location);
    }
  }
}
