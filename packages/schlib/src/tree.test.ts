/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import {
  DanglingOwnerReferenceError,
  EncodingError,
  MalformedContainerError,
  ParameterCollection,
  RecordType,
} from '@schlib/data';
import { createPrimitive } from './records/index.js';
import { buildComponentTree, flattenComponent, pinsInRecordOrder, type FlatRecord } from './tree.js';

function sampleComponent() {
  const polyline = createPrimitive(RecordType.Polyline);
  const label = createPrimitive(RecordType.Label, { text: 'inner', children: [polyline] });
  const pinA = createPrimitive(RecordType.Pin, {
    designator: '1',
    children: [label],
    textData: Uint8Array.of(1),
  });
  const rectangle = createPrimitive(RecordType.Rectangle);
  const pinB = createPrimitive(RecordType.Pin, {
    designator: '2',
    wideText: new ParameterCollection([['NAME', 'x']], 'utf16'),
  });
  const component = createPrimitive(RecordType.Component, {
    libReference: 'U1',
    children: [pinA, rectangle, pinB],
  });
  return { component, pinA, label, polyline, rectangle, pinB };
}

describe('flattenComponent', () => {
  it('lists records in pre-order with owner indices', () => {
    const { component, pinA, label, polyline, rectangle, pinB } = sampleComponent();
    const { records } = flattenComponent(component);
    expect(records.map((record) => record.primitive)).toEqual([component, pinA, label, polyline, rectangle, pinB]);
    expect(records.map((record) => record.ownerIndex)).toEqual([undefined, 0, 1, 2, 0, 0]);
  });

  it('numbers pins and collects their payloads by pin index', () => {
    const { component, pinA, pinB } = sampleComponent();
    const { pins, pinCount } = flattenComponent(component);
    expect(pinCount).toBe(2);
    expect([...pins.textData.keys()]).toEqual([0]);
    expect(pins.textData.get(0)).toBe(pinA.textData);
    expect([...pins.wideText.keys()]).toEqual([1]);
    expect(pins.wideText.get(1)).toBe(pinB.wideText);
    expect(pins.symbolLineWidth.size).toBe(0);
  });

  it('rejects wide pin payloads that are not utf16 collections', () => {
    const withWideText = createPrimitive(RecordType.Component, {
      children: [createPrimitive(RecordType.Pin, { wideText: new ParameterCollection([['NAME', 'x']]) })],
    });
    const withLineWidth = createPrimitive(RecordType.Component, {
      children: [createPrimitive(RecordType.Pin, { symbolLineWidth: new ParameterCollection([['W', 1]]) })],
    });
    expect(() => flattenComponent(withWideText)).toThrow(EncodingError);
    expect(() => flattenComponent(withLineWidth)).toThrow(EncodingError);
  });

  it('leaves the component untouched', () => {
    const { component } = sampleComponent();
    flattenComponent(component);
    expect(component.pinCount).toBe(0);
    expect(component.children).toHaveLength(3);
  });
});

describe('buildComponentTree', () => {
  it('restores a nested tree from owner indices', () => {
    const { component } = sampleComponent();
    const records: FlatRecord[] = flattenComponent(component).records.map(({ primitive, ownerIndex }) => ({
      primitive: { ...primitive, children: [] },
      ownerIndex,
    }));

    const rebuilt = buildComponentTree(records);
    expect(rebuilt).toEqual(component);
    expect(rebuilt.children[0].children[0].children[0].record).toBe(RecordType.Polyline);
  });

  it('attaches records without an owner index to the component', () => {
    const component = createPrimitive(RecordType.Component);
    const label = createPrimitive(RecordType.Label);
    const rebuilt = buildComponentTree([
      { primitive: component, ownerIndex: undefined },
      { primitive: label, ownerIndex: undefined },
    ]);
    expect(rebuilt.children).toEqual([label]);
  });

  it('rejects owners that have not been read yet', () => {
    const records: FlatRecord[] = [
      { primitive: createPrimitive(RecordType.Component), ownerIndex: undefined },
      { primitive: createPrimitive(RecordType.Pin), ownerIndex: 1 },
    ];
    expect(() => buildComponentTree(records)).toThrow(DanglingOwnerReferenceError);
  });

  it('requires the first record to be a component', () => {
    const records: FlatRecord[] = [{ primitive: createPrimitive(RecordType.Pin), ownerIndex: undefined }];
    expect(() => buildComponentTree(records)).toThrow(MalformedContainerError);
    expect(() => buildComponentTree([])).toThrow(MalformedContainerError);
  });
});

describe('pinsInRecordOrder', () => {
  it('returns pins in flat order', () => {
    const { component, pinA, pinB } = sampleComponent();
    expect(pinsInRecordOrder(flattenComponent(component).records)).toEqual([pinA, pinB]);
  });
});
