/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Owner-indexed tree flattening
 *
 * A component's primitive tree is stored as a flat record list in pre-order:
 * the component is record 0 and every other record names the flat index of
 * its owner, which always comes earlier in the list.
 */

import {
  DanglingOwnerReferenceError,
  EncodingError,
  MalformedContainerError,
  RecordType,
  type Component,
  type ErrorLocation,
  type ParameterCollection,
  type Pin,
  type Primitive,
} from '@schlib/data';

export interface FlatRecord {
  primitive: Primitive;
  /** Undefined for the root record */
  ownerIndex: number | undefined;
}

/** Out-of-line pin data, keyed by pin index */
export interface PinPayloads {
  wideText: Map<number, ParameterCollection>;
  textData: Map<number, Uint8Array>;
  symbolLineWidth: Map<number, ParameterCollection>;
}

export interface FlattenedComponent {
  records: FlatRecord[];
  pins: PinPayloads;
  pinCount: number;
}

interface TraversalContext {
  flatIndex: number;
  pinIndex: number;
}

export function createPinPayloads(): PinPayloads {
  return { wideText: new Map(), textData: new Map(), symbolLineWidth: new Map() };
}

/** Wide payload streams are UTF-16 only */
function requireWide(pin: Pin, field: string, params: ParameterCollection): ParameterCollection {
  if (params.charset !== 'utf16') {
    throw new EncodingError(
      `Pin "${pin.designator}" ${field} must be a utf16 collection, found ${params.charset}`
    );
  }
  return params;
}

function stashPinPayloads(pin: Pin, pinIndex: number, pins: PinPayloads): void {
  if (pin.wideText) pins.wideText.set(pinIndex, requireWide(pin, 'wideText', pin.wideText));
  if (pin.textData) pins.textData.set(pinIndex, pin.textData);
  if (pin.symbolLineWidth) {
    pins.symbolLineWidth.set(pinIndex, requireWide(pin, 'symbolLineWidth', pin.symbolLineWidth));
  }
}

/**
 * Flatten a component into pre-order records. Pins are numbered in the same
 * order and their out-of-line payloads collected by pin index.
 */
export function flattenComponent(component: Component): FlattenedComponent {
  const records: FlatRecord[] = [];
  const pins = createPinPayloads();
  const context: TraversalContext = { flatIndex: 0, pinIndex: 0 };

  const stack: FlatRecord[] = [{ primitive: component, ownerIndex: undefined }];
  while (stack.length > 0) {
    const entry = stack.pop();
    if (entry === undefined) break;

    const index = context.flatIndex++;
    records.push(entry);

    if (entry.primitive.record === RecordType.Pin) {
      stashPinPayloads(entry.primitive, context.pinIndex++, pins);
    }

    const { children } = entry.primitive;
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push({ primitive: children[i], ownerIndex: index });
    }
  }

  return { records, pins, pinCount: context.pinIndex };
}

/**
 * Rebuild the primitive tree from flat records. Records without an owner
 * index attach to the component.
 */
export function buildComponentTree(records: readonly FlatRecord[], location?: ErrorLocation): Component {
  const [first] = records;
  if (first === undefined) {
    throw new MalformedContainerError('Component has no records', location);
  }
  if (first.primitive.record !== RecordType.Component) {
    throw new MalformedContainerError(
      `First record must be a component, found record ${first.primitive.record}`,
      location
    );
  }

  const root = first.primitive;
  const materialized: Primitive[] = [root];
  for (let index = 1; index < records.length; index++) {
    const { primitive, ownerIndex = 0 } = records[index];
    if (ownerIndex < 0 || ownerIndex >= index) {
      throw new DanglingOwnerReferenceError(index, ownerIndex, location);
    }
    materialized[ownerIndex].children.push(primitive);
    materialized.push(primitive);
  }
  return root;
}

/** Pins in flat record order, the order pin indices are assigned in */
export function pinsInRecordOrder(records: readonly FlatRecord[]): Pin[] {
  const pins: Pin[] = [];
  for (const { primitive } of records) {
    if (primitive.record === RecordType.Pin) pins.push(primitive);
  }
  return pins;
}

/** Attach out-of-line payloads to pins by pin index */
export function applyPinPayloads(pins: readonly Pin[], payloads: PinPayloads): void {
  pins.forEach((pin, index) => {
    const wideText = payloads.wideText.get(index);
    if (wideText) pin.wideText = wideText;
    const textData = payloads.textData.get(index);
    if (textData) pin.textData = textData;
    const symbolLineWidth = payloads.symbolLineWidth.get(index);
    if (symbolLineWidth) pin.symbolLineWidth = symbolLineWidth;
  });
}
