/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * In-memory container. Entry names are compared case-insensitively and a
 * name can belong to either a storage or a stream, not both.
 */

import { InvalidEntryNameError } from '@schlib/data';
import {
  FORBIDDEN_NAME_CHARS,
  MAX_ENTRY_NAME_LENGTH,
  type CompoundStorage,
  type CompoundStream,
  type StreamSink,
} from './types.js';

export function validateEntryName(name: string): void {
  if (name.length === 0) {
    throw new InvalidEntryNameError(name, 'name is empty');
  }
  if (name.length > MAX_ENTRY_NAME_LENGTH) {
    throw new InvalidEntryNameError(name, `longer than ${MAX_ENTRY_NAME_LENGTH} characters`);
  }
  if (FORBIDDEN_NAME_CHARS.test(name)) {
    throw new InvalidEntryNameError(name, 'contains one of / \\ : !');
  }
  for (let i = 0; i < name.length; i++) {
    if (name.charCodeAt(i) < 0x20) {
      throw new InvalidEntryNameError(name, 'contains a control character');
    }
  }
}

export class MemoryStream implements CompoundStream {
  private data = new Uint8Array(0);

  constructor(readonly name: string) {}

  read(): Uint8Array {
    return this.data;
  }

  write(body: (sink: StreamSink) => void): void {
    const chunks: Uint8Array[] = [];
    try {
      body({ write: (bytes) => chunks.push(bytes.slice()) });
    } finally {
      const total = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
      const data = new Uint8Array(total);
      let offset = 0;
      for (const chunk of chunks) {
        data.set(chunk, offset);
        offset += chunk.length;
      }
      this.data = data;
    }
  }
}

type Entry = { kind: 'storage'; node: MemoryStorage } | { kind: 'stream'; node: MemoryStream };

export class MemoryStorage implements CompoundStorage {
  private entries = new Map<string, Entry>();

  constructor(readonly name: string = 'Root Entry') {}

  private lookup(name: string): Entry | undefined {
    return this.entries.get(name.toUpperCase());
  }

  getOrAddStorage(name: string): MemoryStorage {
    const existing = this.lookup(name);
    if (existing) {
      if (existing.kind !== 'storage') {
        throw new InvalidEntryNameError(name, 'a stream with this name already exists');
      }
      return existing.node;
    }
    validateEntryName(name);
    const node = new MemoryStorage(name);
    this.entries.set(name.toUpperCase(), { kind: 'storage', node });
    return node;
  }

  getOrAddStream(name: string): MemoryStream {
    const existing = this.lookup(name);
    if (existing) {
      if (existing.kind !== 'stream') {
        throw new InvalidEntryNameError(name, 'a storage with this name already exists');
      }
      return existing.node;
    }
    validateEntryName(name);
    const node = new MemoryStream(name);
    this.entries.set(name.toUpperCase(), { kind: 'stream', node });
    return node;
  }

  tryGetStorage(name: string): MemoryStorage | undefined {
    const entry = this.lookup(name);
    return entry?.kind === 'storage' ? entry.node : undefined;
  }

  tryGetStream(name: string): MemoryStream | undefined {
    const entry = this.lookup(name);
    return entry?.kind === 'stream' ? entry.node : undefined;
  }

  storageNames(): string[] {
    return [...this.entries.values()].filter((entry) => entry.kind === 'storage').map((entry) => entry.node.name);
  }

  streamNames(): string[] {
    return [...this.entries.values()].filter((entry) => entry.kind === 'stream').map((entry) => entry.node.name);
  }

  /** Replace a stream's contents in one call */
  setStreamData(name: string, data: Uint8Array): void {
    this.getOrAddStream(name).write((sink) => sink.write(data));
  }
}
