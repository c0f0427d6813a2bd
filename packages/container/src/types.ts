/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Hierarchical container contract: storages (directories) holding streams
 * (byte sequences) and further storages, with compound-file naming rules.
 */

/** Longest storage or stream name a compound file accepts */
export const MAX_ENTRY_NAME_LENGTH = 31;

/** Characters a compound file does not accept in entry names */
export const FORBIDDEN_NAME_CHARS = /[/\\:!]/;

export interface StreamSink {
  write(bytes: Uint8Array): void;
}

export interface CompoundStream {
  readonly name: string;
  /** Current stream contents */
  read(): Uint8Array;
  /**
   * Scoped write: replaces the stream contents with everything the body
   * wrote. The data is committed on every exit path, including when the
   * body throws.
   */
  write(body: (sink: StreamSink) => void): void;
}

export interface CompoundStorage {
  readonly name: string;
  getOrAddStorage(name: string): CompoundStorage;
  getOrAddStream(name: string): CompoundStream;
  tryGetStorage(name: string): CompoundStorage | undefined;
  tryGetStream(name: string): CompoundStream | undefined;
  /** Child storage names in insertion order */
  storageNames(): string[];
  /** Child stream names in insertion order */
  streamNames(): string[];
}
