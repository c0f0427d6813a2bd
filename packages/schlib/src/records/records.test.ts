/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import {
  LineStyle,
  LineWidth,
  MalformedContainerError,
  Orientation,
  ParameterCollection,
  PinElectricalType,
  RecordType,
  UnknownRecordTypeError,
  type Primitive,
} from '@schlib/data';
import { createPrimitive, exportPrimitive, importBinaryRecord, importPrimitive } from './primitive.js';

const entries = (params: ParameterCollection) => [...params].map(({ key, value }) => [key, value]);

describe('createPrimitive', () => {
  it('applies the field defaults', () => {
    const pin = createPrimitive(RecordType.Pin);
    expect(pin.orientation).toBe(Orientation.Right);
    expect(pin.hidden).toBe(false);
    expect(pin.showName).toBe(true);
    expect(pin.showDesignator).toBe(true);
    expect(pin.electrical).toBe(PinElectricalType.Input);
    expect(pin.children).toEqual([]);
    expect(createPrimitive(RecordType.Bezier).color).toBe(255);
    expect(createPrimitive(RecordType.Arc).endAngle).toBe(360);
    expect(createPrimitive(RecordType.Label).fontId).toBe(1);
  });

  it('applies overrides', () => {
    const component = createPrimitive(RecordType.Component, { libReference: 'LM358', partCount: 3 });
    expect(component.record).toBe(RecordType.Component);
    expect(component.libReference).toBe('LM358');
    expect(component.partCount).toBe(3);
    expect(component.displayModeCount).toBe(1);
  });

  it('returns a fresh child list each time', () => {
    expect(createPrimitive(RecordType.Line).children).not.toBe(createPrimitive(RecordType.Line).children);
  });
});

describe('exportPrimitive', () => {
  it('writes only non-default fields after RECORD', () => {
    const component = createPrimitive(RecordType.Component, { libReference: 'R1' });
    expect(entries(exportPrimitive(component))).toEqual([
      ['RECORD', '1'],
      ['LIBREFERENCE', 'R1'],
    ]);
  });

  it('writes OWNERINDEX for owned records and packs pin flags', () => {
    const pin = createPrimitive(RecordType.Pin, {
      name: 'VCC',
      designator: '1',
      orientation: Orientation.Left,
      hidden: true,
      pinLength: 30,
    });
    expect(entries(exportPrimitive(pin, 0))).toEqual([
      ['RECORD', '2'],
      ['OWNERINDEX', '0'],
      ['PINCONGLOMERATE', '30'],
      ['PINLENGTH', '30'],
      ['NAME', 'VCC'],
      ['DESIGNATOR', '1'],
    ]);
  });

  it('writes coordinate fractions', () => {
    const line = createPrimitive(RecordType.Line, { location: { x: 1.5, y: 0 }, corner: { x: -2.25, y: 4 } });
    expect(entries(exportPrimitive(line, 0))).toEqual([
      ['RECORD', '13'],
      ['OWNERINDEX', '0'],
      ['LOCATION.X', '1'],
      ['LOCATION.X_FRAC', '50000'],
      ['CORNER.X', '-2'],
      ['CORNER.X_FRAC', '-25000'],
      ['CORNER.Y', '4'],
    ]);
  });
});

describe('importPrimitive', () => {
  const samples: Primitive[] = [
    createPrimitive(RecordType.Component, {
      libReference: 'LM358',
      description: 'Dual op-amp',
      partCount: 3,
      currentPartId: 2,
      libraryPath: 'lib/amps',
      sourceLibraryName: 'Amplifiers',
      targetFileName: 'amps.lib',
      pinCount: 8,
      partIdLocked: true,
      uniqueId: 'ABCDEFGH',
    }),
    createPrimitive(RecordType.Pin, {
      name: 'IN+',
      designator: '3',
      description: 'Non-inverting input',
      electrical: PinElectricalType.Input,
      orientation: Orientation.Down,
      showName: false,
      pinLength: 20,
      location: { x: -10, y: 20.5 },
      symbolOuterEdge: 1,
      swapIdPin: 'A',
      propagationDelay: 1.5,
      ownerPartId: 1,
    }),
    createPrimitive(RecordType.Label, { text: 'GND', fontId: 2, orientation: Orientation.Up, isMirrored: true }),
    createPrimitive(RecordType.Bezier, {
      points: [
        { x: 0, y: 0 },
        { x: 5, y: 10 },
        { x: 10, y: 10 },
        { x: 15, y: 0 },
      ],
      color: 0,
    }),
    createPrimitive(RecordType.Polyline, {
      points: [
        { x: 0, y: 0 },
        { x: 10, y: -5.5 },
      ],
      lineWidth: LineWidth.Large,
      lineStyle: LineStyle.Dotted,
      endLineShape: 2,
      lineShapeSize: 1,
    }),
    createPrimitive(RecordType.Polygon, {
      points: [
        { x: 0, y: 0 },
        { x: 10, y: 0 },
        { x: 5, y: 8 },
      ],
      isSolid: true,
      transparent: true,
      areaColor: 16777215,
    }),
    createPrimitive(RecordType.Ellipse, { radius: 10, secondaryRadius: 7.5, lineWidth: LineWidth.Smallest }),
    createPrimitive(RecordType.RoundedRectangle, {
      corner: { x: 40, y: 30 },
      cornerXRadius: 5,
      cornerYRadius: 2.5,
      isSolid: true,
    }),
    createPrimitive(RecordType.Arc, { radius: 3, startAngle: 45.5, endAngle: 90 }),
    createPrimitive(RecordType.Line, { corner: { x: 10, y: 10 }, lineStyle: LineStyle.Dashed }),
    createPrimitive(RecordType.Rectangle, { location: { x: -10, y: -4 }, corner: { x: 10, y: 4 }, color: 128 }),
    createPrimitive(RecordType.Image, {
      corner: { x: 20, y: 20 },
      fileName: 'logo.bmp',
      embedImage: true,
      keepAspect: true,
    }),
    createPrimitive(RecordType.Designator, { name: 'Designator', text: 'U?', isHidden: false }),
    createPrimitive(RecordType.Parameter, { name: 'Value', text: '10k', isHidden: true, readOnlyState: 1 }),
    createPrimitive(RecordType.ImplementationList, { ownerPartDisplayMode: 1 }),
    createPrimitive(RecordType.Implementation, {
      modelName: 'SOIC8',
      modelType: 'PCBLIB',
      description: 'Footprint',
      isCurrent: true,
    }),
  ];

  it.each(samples.map((primitive): [string, Primitive] => [RecordType[primitive.record], primitive]))(
    'round-trips a %s record',
    (_name, primitive) => {
      const { primitive: imported, ownerIndex } = importPrimitive(exportPrimitive(primitive, 4));
      expect(ownerIndex).toBe(4);
      expect(imported).toEqual(primitive);
    }
  );

  it('reports a missing OWNERINDEX as undefined', () => {
    const params = new ParameterCollection([['RECORD', 1]]);
    expect(importPrimitive(params).ownerIndex).toBeUndefined();
  });

  it('keeps unknown records with their parameters', () => {
    const params = new ParameterCollection([
      ['RECORD', 99],
      ['OWNERINDEX', 0],
      ['OWNERPARTID', 2],
      ['CUSTOM', 'x'],
    ]);
    const { primitive, ownerIndex } = importPrimitive(params);
    expect(ownerIndex).toBe(0);
    expect(primitive).toEqual({
      record: RecordType.Unknown,
      originalRecord: 99,
      ownerPartId: 2,
      ownerPartDisplayMode: 0,
      graphicallyLocked: false,
      uniqueId: '',
      parameters: new ParameterCollection([['CUSTOM', 'x']]),
      children: [],
    });
    expect(entries(exportPrimitive(primitive, 0))).toEqual([
      ['RECORD', '99'],
      ['OWNERINDEX', '0'],
      ['OWNERPARTID', '2'],
      ['CUSTOM', 'x'],
    ]);
  });

  it('rejects unknown records when asked to', () => {
    const params = new ParameterCollection([['RECORD', 99]]);
    expect(() => importPrimitive(params, 'reject')).toThrow(UnknownRecordTypeError);
  });

  it('requires a RECORD key', () => {
    expect(() => importPrimitive(new ParameterCollection([['NAME', 'x']]))).toThrow(MalformedContainerError);
  });
});

describe('importBinaryRecord', () => {
  it('takes the tag from the start of the body', () => {
    const body = Uint8Array.of(2, 0, 0, 0, 9, 9);
    const primitive = importBinaryRecord(body);
    expect(primitive.record).toBe(RecordType.Unknown);
    if (primitive.record !== RecordType.Unknown) return;
    expect(primitive.originalRecord).toBe(2);
    expect(primitive.binary).toEqual(body);
    expect(primitive.parameters).toBeUndefined();
  });

  it('rejects binary records when asked to', () => {
    expect(() => importBinaryRecord(Uint8Array.of(2, 0, 0, 0), 'reject')).toThrow(UnknownRecordTypeError);
  });
});
