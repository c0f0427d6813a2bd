/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Buffer utilities for reading/writing little-endian stream data
 */

import { TruncatedBlockError, type ErrorLocation } from '@schlib/data';

/**
 * Writer for building binary buffers
 */
export class BufferWriter {
  private chunks: Uint8Array[] = [];
  private currentChunk: Uint8Array;
  private view: DataView;
  private offset: number = 0;
  private totalSize: number = 0;

  constructor(initialSize: number = 64 * 1024) {
    this.currentChunk = new Uint8Array(initialSize);
    this.view = new DataView(this.currentChunk.buffer);
  }

  private ensureCapacity(bytes: number): void {
    if (this.offset + bytes > this.currentChunk.length) {
      this.chunks.push(this.currentChunk.subarray(0, this.offset));
      this.totalSize += this.offset;

      const newSize = Math.max(bytes, this.currentChunk.length);
      this.currentChunk = new Uint8Array(newSize);
      this.view = new DataView(this.currentChunk.buffer);
      this.offset = 0;
    }
  }

  writeUint8(value: number): void {
    this.ensureCapacity(1);
    this.currentChunk[this.offset++] = value;
  }

  writeUint32(value: number): void {
    this.ensureCapacity(4);
    this.view.setUint32(this.offset, value, true);
    this.offset += 4;
  }

  writeInt32(value: number): void {
    this.ensureCapacity(4);
    this.view.setInt32(this.offset, value, true);
    this.offset += 4;
  }

  writeBytes(data: Uint8Array): void {
    this.ensureCapacity(data.length);
    this.currentChunk.set(data, this.offset);
    this.offset += data.length;
  }

  get position(): number {
    return this.totalSize + this.offset;
  }

  /** Concatenate everything written so far */
  build(): Uint8Array {
    const result = new Uint8Array(this.position);
    let pos = 0;
    for (const chunk of this.chunks) {
      result.set(chunk, pos);
      pos += chunk.length;
    }
    result.set(this.currentChunk.subarray(0, this.offset), pos);
    return result;
  }
}

/**
 * Reader for parsing binary buffers. Every read is bounds-checked and a short
 * read throws a TruncatedBlockError tagged with the reader's location.
 */
export class BufferReader {
  private view: DataView;
  private offset: number = 0;

  constructor(
    private readonly bytes: Uint8Array,
    readonly location: ErrorLocation = {}
  ) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.bytes.length - this.offset;
  }

  /** Location of the current position, for error reporting */
  here(offset: number = this.offset): ErrorLocation {
    return { ...this.location, offset };
  }

  private require(length: number): void {
    if (length > this.remaining) {
      throw new TruncatedBlockError(length, this.remaining, this.here());
    }
  }

  readUint8(): number {
    this.require(1);
    return this.bytes[this.offset++];
  }

  readUint32(): number {
    this.require(4);
    const value = this.view.getUint32(this.offset, true);
    this.offset += 4;
    return value;
  }

  readInt32(): number {
    this.require(4);
    const value = this.view.getInt32(this.offset, true);
    this.offset += 4;
    return value;
  }

  /** Copy of the next `length` bytes */
  readBytes(length: number): Uint8Array {
    this.require(length);
    const slice = this.bytes.slice(this.offset, this.offset + length);
    this.offset += length;
    return slice;
  }
}
