/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { MalformedContainerError } from '@schlib/data';
import { MemoryStorage } from './memory-storage.js';
import { packStorage, unpackStorage } from './archive.js';

describe('packStorage / unpackStorage', () => {
  it('restores the storage hierarchy and stream bytes', async () => {
    const root = new MemoryStorage();
    root.setStreamData('FileHeader', Uint8Array.of(1, 2, 3));
    const component = root.getOrAddStorage('Resistor');
    component.setStreamData('Data', Uint8Array.of(4, 5));
    component.getOrAddStorage('Nested').setStreamData('Inner', Uint8Array.of(6));

    const restored = await unpackStorage(await packStorage(root));

    expect(restored.tryGetStream('FileHeader')?.read()).toEqual(Uint8Array.of(1, 2, 3));
    const restoredComponent = restored.tryGetStorage('Resistor');
    expect(restoredComponent?.tryGetStream('Data')?.read()).toEqual(Uint8Array.of(4, 5));
    expect(restoredComponent?.tryGetStorage('Nested')?.tryGetStream('Inner')?.read()).toEqual(Uint8Array.of(6));
  });

  it('keeps empty storages and empty streams', async () => {
    const root = new MemoryStorage();
    root.getOrAddStorage('Empty');
    root.setStreamData('Blank', new Uint8Array(0));

    const restored = await unpackStorage(await packStorage(root));

    expect(restored.storageNames()).toEqual(['Empty']);
    expect(restored.tryGetStream('Blank')?.read()).toEqual(new Uint8Array(0));
  });

  it('rejects bytes that are not an archive', async () => {
    await expect(unpackStorage(Uint8Array.of(1, 2, 3, 4))).rejects.toThrow(MalformedContainerError);
  });
});
