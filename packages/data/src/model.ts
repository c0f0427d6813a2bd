/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Helpers for navigating the primitive tree
 */

import { ParameterCollection } from './parameter-collection.js';
import {
  RecordType,
  type Component,
  type LibraryDocument,
  type LibraryHeader,
  type Pin,
  type Primitive,
} from './types.js';

export const DEFAULT_HEADER_VERSION = 'Protel for Windows - Schematic Library Editor Binary File Version 5.0';

export function isRecord<R extends Primitive['record']>(
  primitive: Primitive,
  record: R
): primitive is Extract<Primitive, { record: R }> {
  return primitive.record === record;
}

/**
 * Visit a primitive and all its descendants depth-first, parents before
 * children and siblings in list order. This is the order records are
 * serialized in, so pins are visited in pin-index order.
 */
export function* walkPrimitives(root: Primitive): Generator<Primitive> {
  const stack: Primitive[] = [root];
  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined) break;
    yield current;
    for (let i = current.children.length - 1; i >= 0; i--) {
      stack.push(current.children[i]);
    }
  }
}

export function collectPrimitives<R extends Primitive['record']>(
  root: Primitive,
  record: R
): Array<Extract<Primitive, { record: R }>> {
  const result: Array<Extract<Primitive, { record: R }>> = [];
  for (const primitive of walkPrimitives(root)) {
    if (isRecord(primitive, record)) result.push(primitive);
  }
  return result;
}

/** Pins of a component in pin-index order */
export function collectPins(component: Component): Pin[] {
  return collectPrimitives(component, RecordType.Pin);
}

export function createLibraryHeader(overrides: Partial<LibraryHeader> = {}): LibraryHeader {
  return {
    version: DEFAULT_HEADER_VERSION,
    minorVersion: 9,
    uniqueId: '',
    useMbcs: true,
    isBoc: true,
    fonts: [{ size: 10, name: 'Times New Roman', rotation: 0, bold: false, italic: false, underline: false }],
    extra: new ParameterCollection(),
    ...overrides,
  };
}

export function createLibraryDocument(components: Component[] = [], header?: Partial<LibraryHeader>): LibraryDocument {
  return { header: createLibraryHeader(header), components };
}
