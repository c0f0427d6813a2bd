/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Container persistence
 *
 * Packs a storage tree into a single zip archive and back: storages become
 * folders and streams become files. Entry names never contain `/`, so the
 * archive path splits back into the same hierarchy.
 */

import JSZip from 'jszip';
import { MalformedContainerError, createLogger } from '@schlib/data';
import { MemoryStorage } from './memory-storage.js';
import type { CompoundStorage } from './types.js';

const log = createLogger('Container');

export interface PackOptions {
  /** Deflate level for archive entries (0-9, default 6) */
  level?: number;
}

function packInto(folder: JSZip, storage: CompoundStorage): void {
  for (const name of storage.streamNames()) {
    const stream = storage.tryGetStream(name);
    if (!stream) continue;
    folder.file(name, stream.read());
  }
  for (const name of storage.storageNames()) {
    const child = storage.tryGetStorage(name);
    if (!child) continue;
    const childFolder = folder.folder(name);
    if (!childFolder) {
      throw new MalformedContainerError(`Cannot create archive folder for storage "${name}"`);
    }
    packInto(childFolder, child);
  }
}

/**
 * Serialize a storage tree to archive bytes
 */
export async function packStorage(root: CompoundStorage, options: PackOptions = {}): Promise<Uint8Array> {
  const zip = new JSZip();
  packInto(zip, root);
  const bytes = await zip.generateAsync({
    type: 'uint8array',
    compression: 'DEFLATE',
    compressionOptions: { level: options.level ?? 6 },
  });
  log.debug(`Packed ${root.storageNames().length} storages`, { bytes: bytes.length });
  return bytes;
}

/**
 * Load archive bytes into an in-memory storage tree
 */
export async function unpackStorage(bytes: Uint8Array): Promise<MemoryStorage> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(bytes);
  } catch (error) {
    throw new MalformedContainerError(
      `Not a container archive: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const root = new MemoryStorage();
  const entries: Array<{ path: string; file: JSZip.JSZipObject }> = [];
  zip.forEach((path, file) => {
    entries.push({ path, file });
  });

  for (const { path, file } of entries) {
    const segments = path.split('/').filter((segment) => segment.length > 0);
    if (segments.length === 0) continue;

    if (file.dir) {
      segments.reduce<MemoryStorage>((storage, name) => storage.getOrAddStorage(name), root);
      continue;
    }

    const streamName = segments[segments.length - 1];
    const parent = segments
      .slice(0, -1)
      .reduce<MemoryStorage>((storage, name) => storage.getOrAddStorage(name), root);
    parent.setStreamData(streamName, await file.async('uint8array'));
  }

  log.debug(`Unpacked ${entries.length} archive entries`);
  return root;
}
