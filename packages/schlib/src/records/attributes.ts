/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Attribute groups shared between record variants. Each group reads and
 * writes a fixed set of fields through the field definitions, so defaults
 * and omission follow one table.
 */

import {
  LineStyle,
  LineWidth,
  Orientation,
  type BasicPolylineAttributes,
  type FillAttributes,
  type GraphicalAttributes,
  type ParameterCollection,
  type PrimitiveBase,
  type TextAttributes,
} from '@schlib/data';
import {
  boolField,
  enumField,
  intField,
  pointField,
  pointListField,
  textField,
} from '@schlib/encoding';

export interface AttributeGroup<T> {
  read(params: ParameterCollection): T;
  write(params: ParameterCollection, value: T): void;
}

export const LINE_WIDTHS = [LineWidth.Smallest, LineWidth.Small, LineWidth.Medium, LineWidth.Large];
export const LINE_STYLES = [LineStyle.Solid, LineStyle.Dashed, LineStyle.Dotted];
export const ORIENTATIONS = [Orientation.Right, Orientation.Up, Orientation.Left, Orientation.Down];

export type BaseAttributes = Omit<PrimitiveBase, 'children'>;

const ownerPartId = intField('OWNERPARTID');
const ownerPartDisplayMode = intField('OWNERPARTDISPLAYMODE');
const graphicallyLocked = boolField('GRAPHICALLYLOCKED');
const uniqueId = textField('UNIQUEID');

/** Keys owned by the base group */
export const BASE_KEYS: readonly string[] = [
  ownerPartId.key,
  ownerPartDisplayMode.key,
  graphicallyLocked.key,
  uniqueId.key,
];

export const baseAttributes: AttributeGroup<BaseAttributes> = {
  read: (params) => ({
    ownerPartId: ownerPartId.read(params),
    ownerPartDisplayMode: ownerPartDisplayMode.read(params),
    graphicallyLocked: graphicallyLocked.read(params),
    uniqueId: uniqueId.read(params),
  }),
  write(params, value) {
    ownerPartId.write(params, value.ownerPartId);
    ownerPartDisplayMode.write(params, value.ownerPartDisplayMode);
    graphicallyLocked.write(params, value.graphicallyLocked);
    uniqueId.write(params, value.uniqueId);
  },
};

export function graphicalAttributes(defaults: Partial<GraphicalAttributes> = {}): AttributeGroup<GraphicalAttributes> {
  const location = pointField('LOCATION', defaults.location);
  const color = intField('COLOR', defaults.color ?? 0);
  const areaColor = intField('AREACOLOR', defaults.areaColor ?? 0);
  return {
    read: (params) => ({
      location: location.read(params),
      color: color.read(params),
      areaColor: areaColor.read(params),
    }),
    write(params, value) {
      location.write(params, value.location);
      color.write(params, value.color);
      areaColor.write(params, value.areaColor);
    },
  };
}

const isSolid = boolField('ISSOLID');
const transparent = boolField('TRANSPARENT');

export const fillAttributes: AttributeGroup<FillAttributes> = {
  read: (params) => ({ isSolid: isSolid.read(params), transparent: transparent.read(params) }),
  write(params, value) {
    isSolid.write(params, value.isSolid);
    transparent.write(params, value.transparent);
  },
};

const text = textField('TEXT');
const fontId = intField('FONTID', 1);
const orientation = enumField('ORIENTATION', ORIENTATIONS, Orientation.Right);
const justification = intField('JUSTIFICATION');
const isMirrored = boolField('ISMIRRORED');

export const textAttributes: AttributeGroup<TextAttributes> = {
  read: (params) => ({
    text: text.read(params),
    fontId: fontId.read(params),
    orientation: orientation.read(params),
    justification: justification.read(params),
    isMirrored: isMirrored.read(params),
  }),
  write(params, value) {
    text.write(params, value.text);
    fontId.write(params, value.fontId);
    orientation.write(params, value.orientation);
    justification.write(params, value.justification);
    isMirrored.write(params, value.isMirrored);
  },
};

export const lineWidthField = enumField('LINEWIDTH', LINE_WIDTHS, LineWidth.Small);
export const lineStyleField = enumField('LINESTYLE', LINE_STYLES, LineStyle.Solid);

const points = pointListField('LOCATIONCOUNT');

export const polylineAttributes: AttributeGroup<BasicPolylineAttributes> = {
  read: (params) => ({
    points: points.read(params),
    lineWidth: lineWidthField.read(params),
  }),
  write(params, value) {
    lineWidthField.write(params, value.lineWidth);
    points.write(params, value.points);
  },
};
