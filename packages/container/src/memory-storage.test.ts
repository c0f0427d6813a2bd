/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { InvalidEntryNameError } from '@schlib/data';
import { MemoryStorage } from './memory-storage.js';

describe('MemoryStorage', () => {
  it('returns the same child for names differing only in case', () => {
    const root = new MemoryStorage();
    const first = root.getOrAddStorage('Resistor');
    const second = root.getOrAddStorage('RESISTOR');
    expect(second).toBe(first);
    expect(root.storageNames()).toEqual(['Resistor']);
  });

  it('keeps storages and streams apart', () => {
    const root = new MemoryStorage();
    root.getOrAddStream('FileHeader');
    root.getOrAddStorage('R1');
    expect(root.streamNames()).toEqual(['FileHeader']);
    expect(root.storageNames()).toEqual(['R1']);
    expect(root.tryGetStorage('FileHeader')).toBeUndefined();
    expect(root.tryGetStream('R1')).toBeUndefined();
    expect(() => root.getOrAddStorage('FileHeader')).toThrow(InvalidEntryNameError);
  });

  it('rejects names a compound file cannot hold', () => {
    const root = new MemoryStorage();
    expect(() => root.getOrAddStorage('')).toThrow(InvalidEntryNameError);
    expect(() => root.getOrAddStorage('a'.repeat(32))).toThrow(InvalidEntryNameError);
    expect(() => root.getOrAddStream('A/B')).toThrow(InvalidEntryNameError);
    expect(() => root.getOrAddStream('A!B')).toThrow(InvalidEntryNameError);
    expect(() => root.getOrAddStream('A\tB')).toThrow(InvalidEntryNameError);
    expect(root.getOrAddStorage('a'.repeat(31)).name).toBe('a'.repeat(31));
  });
});

describe('MemoryStream', () => {
  it('concatenates everything written in one scope', () => {
    const stream = new MemoryStorage().getOrAddStream('Data');
    stream.write((sink) => {
      sink.write(Uint8Array.of(1, 2));
      sink.write(Uint8Array.of(3));
    });
    expect(stream.read()).toEqual(Uint8Array.of(1, 2, 3));
  });

  it('replaces previous contents', () => {
    const stream = new MemoryStorage().getOrAddStream('Data');
    stream.write((sink) => sink.write(Uint8Array.of(9, 9, 9)));
    stream.write((sink) => sink.write(Uint8Array.of(4)));
    expect(stream.read()).toEqual(Uint8Array.of(4));
  });

  it('commits partial output when the writer throws', () => {
    const stream = new MemoryStorage().getOrAddStream('Data');
    expect(() =>
      stream.write((sink) => {
        sink.write(Uint8Array.of(7));
        throw new Error('boom');
      })
    ).toThrow('boom');
    expect(stream.read()).toEqual(Uint8Array.of(7));
  });
});
