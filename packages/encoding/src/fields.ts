/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Field definitions: the per-field default policy for parameter blocks.
 *
 * A field's `write` omits its key exactly when the rendered value equals the
 * rendered default, and `read` returns the default exactly when the key is
 * absent. Both sides consult the same definition, so omission round-trips.
 */

import {
  MalformedContainerError,
  ParameterCollection,
  formatParameterValue,
  parseBoolean,
  type CoordPoint,
} from '@schlib/data';

export interface FieldDef<V> {
  readonly key: string;
  readonly defaultValue: V;
  read(params: ParameterCollection): V;
  write(params: ParameterCollection, value: V): void;
}

/** Largest element count a parameter block may declare (the block length limit) */
export const MAX_DECLARED_COUNT = 0xffffff;

/** Read a declared element count, rejecting values no block could hold */
export function readDeclaredCount(params: ParameterCollection, key: string): number {
  const count = params.getInt(key, 0);
  if (count > MAX_DECLARED_COUNT) {
    throw new MalformedContainerError(`${key}=${count} exceeds ${MAX_DECLARED_COUNT}`);
  }
  return Math.max(0, count);
}

/** Coordinates carry a `_FRAC` companion key in 1/100000 units */
export const COORD_FRACTION_SCALE = 100000;

function scalarField<V>(
  key: string,
  defaultValue: V,
  format: (value: V) => string,
  parse: (text: string, fallback: V) => V
): FieldDef<V> {
  const defaultText = format(defaultValue);
  return {
    key,
    defaultValue,
    read(params) {
      const text = params.get(key);
      return text === undefined ? defaultValue : parse(text, defaultValue);
    },
    write(params, value) {
      const text = format(value);
      if (text !== defaultText) params.set(key, text);
    },
  };
}

function parseInteger(text: string, fallback: number): number {
  const value = parseInt(text, 10);
  return Number.isNaN(value) ? fallback : value;
}

export function intField(key: string, defaultValue = 0): FieldDef<number> {
  return scalarField(key, defaultValue, (value) => formatParameterValue(Math.trunc(value)), parseInteger);
}

export function numberField(key: string, defaultValue = 0): FieldDef<number> {
  return scalarField(key, defaultValue, formatParameterValue, (text, fallback) => {
    const value = parseFloat(text);
    return Number.isNaN(value) ? fallback : value;
  });
}

export function boolField(key: string, defaultValue = false): FieldDef<boolean> {
  return scalarField(key, defaultValue, formatParameterValue, parseBoolean);
}

export function textField(key: string, defaultValue = ''): FieldDef<string> {
  return scalarField(key, defaultValue, (value) => value, (text) => text);
}

/**
 * Integer field restricted to a fixed set of values; anything else reads as
 * the default.
 */
export function enumField<E extends number>(key: string, values: readonly E[], defaultValue: E): FieldDef<E> {
  return scalarField(key, defaultValue, (value) => formatParameterValue(value), (text, fallback) => {
    const parsed = parseInt(text, 10);
    return values.find((value) => value === parsed) ?? fallback;
  });
}

/** Several values bit-packed into one integer key */
export function packedField<V>(
  key: string,
  defaultValue: V,
  pack: (value: V) => number,
  unpack: (packed: number) => V
): FieldDef<V> {
  return scalarField(
    key,
    defaultValue,
    (value) => formatParameterValue(pack(value)),
    (text, fallback) => {
      const parsed = parseInt(text, 10);
      return Number.isNaN(parsed) ? fallback : unpack(parsed);
    }
  );
}

export function splitCoord(value: number): [whole: number, fraction: number] {
  let whole = Math.trunc(value);
  let fraction = Math.round((value - whole) * COORD_FRACTION_SCALE);
  if (Math.abs(fraction) >= COORD_FRACTION_SCALE) {
    whole += Math.sign(fraction);
    fraction = 0;
  }
  return [whole, fraction];
}

export function joinCoord(whole: number, fraction: number): number {
  return whole + fraction / COORD_FRACTION_SCALE;
}

export function coordField(key: string, defaultValue = 0): FieldDef<number> {
  const [defaultWhole, defaultFraction] = splitCoord(defaultValue);
  const whole = intField(key, defaultWhole);
  const fraction = intField(`${key}_FRAC`, defaultFraction);
  return {
    key,
    defaultValue,
    read(params) {
      return joinCoord(whole.read(params), fraction.read(params));
    },
    write(params, value) {
      const [w, f] = splitCoord(value);
      whole.write(params, w);
      fraction.write(params, f);
    },
  };
}

/** `PREFIX.X` / `PREFIX.Y` coordinate pair */
export function pointField(prefix: string, defaultValue: CoordPoint = { x: 0, y: 0 }): FieldDef<CoordPoint> {
  const x = coordField(`${prefix}.X`, defaultValue.x);
  const y = coordField(`${prefix}.Y`, defaultValue.y);
  return {
    key: prefix,
    defaultValue,
    read(params) {
      return { x: x.read(params), y: y.read(params) };
    },
    write(params, value) {
      x.write(params, value.x);
      y.write(params, value.y);
    },
  };
}

/** `LOCATIONCOUNT` followed by 1-based `Xn` / `Yn` vertices */
export function pointListField(countKey = 'LOCATIONCOUNT'): FieldDef<CoordPoint[]> {
  const count = intField(countKey, 0);
  const vertex = (i: number) => ({ x: coordField(`X${i}`), y: coordField(`Y${i}`) });
  return {
    key: countKey,
    defaultValue: [],
    read(params) {
      const points: CoordPoint[] = [];
      const total = readDeclaredCount(params, countKey);
      for (let i = 1; i <= total; i++) {
        const { x, y } = vertex(i);
        points.push({ x: x.read(params), y: y.read(params) });
      }
      return points;
    },
    write(params, value) {
      count.write(params, value.length);
      value.forEach((point, i) => {
        const { x, y } = vertex(i + 1);
        x.write(params, point.x);
        y.write(params, point.y);
      });
    },
  };
}
