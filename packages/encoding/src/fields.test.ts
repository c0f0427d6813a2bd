/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { MalformedContainerError, ParameterCollection } from '@schlib/data';
import {
  intField,
  boolField,
  textField,
  enumField,
  coordField,
  pointField,
  pointListField,
  packedField,
  splitCoord,
  readDeclaredCount,
} from './fields.js';

describe('field default policy', () => {
  it('omits a value equal to the default and reads the default back', () => {
    const width = intField('LINEWIDTH', 1);
    const params = new ParameterCollection();
    width.write(params, 1);
    expect(params.size).toBe(0);
    expect(width.read(params)).toBe(1);

    width.write(params, 3);
    expect(params.get('LINEWIDTH')).toBe('3');
    expect(width.read(params)).toBe(3);
  });

  it('writes false explicitly when the default is true', () => {
    const visible = boolField('SHOWNAME', true);
    const params = new ParameterCollection();
    visible.write(params, true);
    expect(params.has('SHOWNAME')).toBe(false);
    visible.write(params, false);
    expect(params.get('SHOWNAME')).toBe('F');
    expect(visible.read(params)).toBe(false);
  });

  it('distinguishes an empty value from an absent key for text fields', () => {
    const path = textField('LIBRARYPATH', '*');
    const params = new ParameterCollection();
    path.write(params, '');
    expect(params.get('LIBRARYPATH')).toBe('');
    expect(path.read(params)).toBe('');
    expect(path.read(new ParameterCollection())).toBe('*');
  });

  it('reads values outside an enum as the default', () => {
    const width = enumField('LINEWIDTH', [0, 1, 2, 3], 1);
    expect(width.read(new ParameterCollection([['LINEWIDTH', '9']]))).toBe(1);
    expect(width.read(new ParameterCollection([['LINEWIDTH', '2']]))).toBe(2);
  });

  it('packs several values into one key', () => {
    const flags = packedField(
      'FLAGS',
      { a: true, b: false },
      (v) => (v.a ? 1 : 0) | (v.b ? 2 : 0),
      (n) => ({ a: (n & 1) !== 0, b: (n & 2) !== 0 })
    );
    const params = new ParameterCollection();
    flags.write(params, { a: true, b: false });
    expect(params.size).toBe(0);
    flags.write(params, { a: false, b: true });
    expect(params.get('FLAGS')).toBe('2');
    expect(flags.read(params)).toEqual({ a: false, b: true });
  });
});

describe('coordinates', () => {
  it('splits into whole and 1/100000 fraction', () => {
    expect(splitCoord(12.5)).toEqual([12, 50000]);
    expect(splitCoord(-7.25)).toEqual([-7, -25000]);
    expect(splitCoord(3)).toEqual([3, 0]);
  });

  it('writes the _FRAC key only when there is a fraction', () => {
    const x = coordField('LOCATION.X');
    const params = new ParameterCollection();
    x.write(params, 12.5);
    expect([...params]).toEqual([
      { key: 'LOCATION.X', value: '12' },
      { key: 'LOCATION.X_FRAC', value: '50000' },
    ]);
    expect(x.read(params)).toBe(12.5);

    const y = coordField('LOCATION.Y');
    y.write(params, -40);
    expect(params.get('LOCATION.Y')).toBe('-40');
    expect(params.has('LOCATION.Y_FRAC')).toBe(false);
  });

  it('round-trips points and skips zero axes', () => {
    const corner = pointField('CORNER');
    const params = new ParameterCollection();
    corner.write(params, { x: 0, y: -7.25 });
    expect([...params]).toEqual([
      { key: 'CORNER.Y', value: '-7' },
      { key: 'CORNER.Y_FRAC', value: '-25000' },
    ]);
    expect(corner.read(params)).toEqual({ x: 0, y: -7.25 });
  });

  it('writes vertex lists with 1-based keys', () => {
    const points = pointListField();
    const params = new ParameterCollection();
    points.write(params, [
      { x: 10, y: 0 },
      { x: 0, y: -5 },
    ]);
    expect(params.keys()).toEqual(['LOCATIONCOUNT', 'X1', 'Y2']);
    expect(points.read(params)).toEqual([
      { x: 10, y: 0 },
      { x: 0, y: -5 },
    ]);
    expect(points.read(new ParameterCollection())).toEqual([]);
  });

  it('rejects vertex counts no block could hold', () => {
    const params = new ParameterCollection([['LOCATIONCOUNT', 2147483647]]);
    expect(() => pointListField().read(params)).toThrow(MalformedContainerError);
  });

  it('reads negative declared counts as zero', () => {
    expect(readDeclaredCount(new ParameterCollection([['FONTIDCOUNT', -3]]), 'FONTIDCOUNT')).toBe(0);
    expect(readDeclaredCount(new ParameterCollection([['FONTIDCOUNT', 16777215]]), 'FONTIDCOUNT')).toBe(16777215);
  });
});
