/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Record codecs: one entry per modelled record tag, mapping a parameter
 * collection to a primitive variant and back.
 */

import {
  Orientation,
  PinElectricalType,
  RecordType,
  type Arc,
  type Bezier,
  type Component,
  type Designator,
  type Ellipse,
  type Image,
  type Implementation,
  type ImplementationList,
  type KnownPrimitive,
  type KnownRecordType,
  type Label,
  type Line,
  type Parameter,
  type ParameterCollection,
  type Pin,
  type Polygon,
  type Polyline,
  type Rectangle,
  type RoundedRectangle,
} from '@schlib/data';
import {
  boolField,
  coordField,
  enumField,
  intField,
  numberField,
  packedField,
  pointField,
  textField,
} from '@schlib/encoding';
import {
  ORIENTATIONS,
  baseAttributes,
  fillAttributes,
  graphicalAttributes,
  lineStyleField,
  lineWidthField,
  polylineAttributes,
  textAttributes,
} from './attributes.js';

export interface RecordCodec<P extends KnownPrimitive> {
  readonly record: P['record'];
  readonly name: string;
  /** Build the variant from its parameters; absent keys take their defaults */
  read(params: ParameterCollection): P;
  /** Append the variant's fields (RECORD and OWNERINDEX are written by the caller) */
  write(primitive: P, params: ParameterCollection): void;
}

export type RecordPrimitive<R extends KnownRecordType> = Extract<KnownPrimitive, { record: R }>;

const graphical = graphicalAttributes();

// Component

const libReference = textField('LIBREFERENCE');
const componentDescription = textField('COMPONENTDESCRIPTION');
const partCount = intField('PARTCOUNT', 1);
const displayModeCount = intField('DISPLAYMODECOUNT', 1);
const currentPartId = intField('CURRENTPARTID', 1);
const libraryPath = textField('LIBRARYPATH');
const sourceLibraryName = textField('SOURCELIBRARYNAME');
const targetFileName = textField('TARGETFILENAME');
const allPinCount = intField('ALLPINCOUNT');
const partIdLocked = boolField('PARTIDLOCKED');

export const componentCodec: RecordCodec<Component> = {
  record: RecordType.Component,
  name: 'Component',
  read: (params) => ({
    record: RecordType.Component,
    ...baseAttributes.read(params),
    ...graphical.read(params),
    libReference: libReference.read(params),
    description: componentDescription.read(params),
    partCount: partCount.read(params),
    displayModeCount: displayModeCount.read(params),
    currentPartId: currentPartId.read(params),
    libraryPath: libraryPath.read(params),
    sourceLibraryName: sourceLibraryName.read(params),
    targetFileName: targetFileName.read(params),
    pinCount: allPinCount.read(params),
    partIdLocked: partIdLocked.read(params),
    children: [],
  }),
  write(component, params) {
    baseAttributes.write(params, component);
    libReference.write(params, component.libReference);
    componentDescription.write(params, component.description);
    partCount.write(params, component.partCount);
    displayModeCount.write(params, component.displayModeCount);
    currentPartId.write(params, component.currentPartId);
    libraryPath.write(params, component.libraryPath);
    sourceLibraryName.write(params, component.sourceLibraryName);
    targetFileName.write(params, component.targetFileName);
    allPinCount.write(params, component.pinCount);
    partIdLocked.write(params, component.partIdLocked);
    graphical.write(params, component);
  },
};

// Pin

interface PinFlags {
  orientation: Orientation;
  hidden: boolean;
  showName: boolean;
  showDesignator: boolean;
}

const PIN_HIDDEN = 0x04;
const PIN_SHOW_NAME = 0x08;
const PIN_SHOW_DESIGNATOR = 0x10;

/** Orientation in bits 0-1, then the hidden / show name / show designator flags */
export const pinConglomerate = packedField<PinFlags>(
  'PINCONGLOMERATE',
  { orientation: Orientation.Right, hidden: false, showName: true, showDesignator: true },
  (flags) =>
    (flags.orientation & 0x03) |
    (flags.hidden ? PIN_HIDDEN : 0) |
    (flags.showName ? PIN_SHOW_NAME : 0) |
    (flags.showDesignator ? PIN_SHOW_DESIGNATOR : 0),
  (packed) => ({
    orientation: ORIENTATIONS[packed & 0x03],
    hidden: (packed & PIN_HIDDEN) !== 0,
    showName: (packed & PIN_SHOW_NAME) !== 0,
    showDesignator: (packed & PIN_SHOW_DESIGNATOR) !== 0,
  })
);

const pinName = textField('NAME');
const pinDesignator = textField('DESIGNATOR');
const pinDescription = textField('DESCRIPTION');
const electrical = enumField(
  'ELECTRICAL',
  [
    PinElectricalType.Input,
    PinElectricalType.InputOutput,
    PinElectricalType.Output,
    PinElectricalType.OpenCollector,
    PinElectricalType.Passive,
    PinElectricalType.HiZ,
    PinElectricalType.OpenEmitter,
    PinElectricalType.Power,
  ],
  PinElectricalType.Input
);
const pinLength = coordField('PINLENGTH');
const symbolInnerEdge = intField('SYMBOL_INNEREDGE');
const symbolOuterEdge = intField('SYMBOL_OUTEREDGE');
const symbolInside = intField('SYMBOL_INSIDE');
const symbolOutside = intField('SYMBOL_OUTSIDE');
const swapIdPin = textField('SWAPIDPIN');
const swapIdPart = textField('SWAPIDPART');
const propagationDelay = numberField('PINPROPAGATIONDELAY');

export const pinCodec: RecordCodec<Pin> = {
  record: RecordType.Pin,
  name: 'Pin',
  read: (params) => ({
    record: RecordType.Pin,
    ...baseAttributes.read(params),
    ...graphical.read(params),
    ...pinConglomerate.read(params),
    name: pinName.read(params),
    designator: pinDesignator.read(params),
    description: pinDescription.read(params),
    electrical: electrical.read(params),
    pinLength: pinLength.read(params),
    symbolInnerEdge: symbolInnerEdge.read(params),
    symbolOuterEdge: symbolOuterEdge.read(params),
    symbolInside: symbolInside.read(params),
    symbolOutside: symbolOutside.read(params),
    swapIdPin: swapIdPin.read(params),
    swapIdPart: swapIdPart.read(params),
    propagationDelay: propagationDelay.read(params),
    children: [],
  }),
  write(pin, params) {
    baseAttributes.write(params, pin);
    pinDescription.write(params, pin.description);
    symbolInnerEdge.write(params, pin.symbolInnerEdge);
    symbolOuterEdge.write(params, pin.symbolOuterEdge);
    symbolInside.write(params, pin.symbolInside);
    symbolOutside.write(params, pin.symbolOutside);
    electrical.write(params, pin.electrical);
    pinConglomerate.write(params, pin);
    pinLength.write(params, pin.pinLength);
    graphical.write(params, pin);
    pinName.write(params, pin.name);
    pinDesignator.write(params, pin.designator);
    swapIdPin.write(params, pin.swapIdPin);
    swapIdPart.write(params, pin.swapIdPart);
    propagationDelay.write(params, pin.propagationDelay);
  },
};

// Text primitives

export const labelCodec: RecordCodec<Label> = {
  record: RecordType.Label,
  name: 'Label',
  read: (params) => ({
    record: RecordType.Label,
    ...baseAttributes.read(params),
    ...graphical.read(params),
    ...textAttributes.read(params),
    children: [],
  }),
  write(label, params) {
    baseAttributes.write(params, label);
    graphical.write(params, label);
    textAttributes.write(params, label);
  },
};

const fieldName = textField('NAME');
const isHidden = boolField('ISHIDDEN');
const readOnlyState = intField('READONLYSTATE');

export const designatorCodec: RecordCodec<Designator> = {
  record: RecordType.Designator,
  name: 'Designator',
  read: (params) => ({
    record: RecordType.Designator,
    ...baseAttributes.read(params),
    ...graphical.read(params),
    ...textAttributes.read(params),
    name: fieldName.read(params),
    isHidden: isHidden.read(params),
    children: [],
  }),
  write(designator, params) {
    baseAttributes.write(params, designator);
    graphical.write(params, designator);
    textAttributes.write(params, designator);
    fieldName.write(params, designator.name);
    isHidden.write(params, designator.isHidden);
  },
};

export const parameterCodec: RecordCodec<Parameter> = {
  record: RecordType.Parameter,
  name: 'Parameter',
  read: (params) => ({
    record: RecordType.Parameter,
    ...baseAttributes.read(params),
    ...graphical.read(params),
    ...textAttributes.read(params),
    name: fieldName.read(params),
    isHidden: isHidden.read(params),
    readOnlyState: readOnlyState.read(params),
    children: [],
  }),
  write(parameter, params) {
    baseAttributes.write(params, parameter);
    graphical.write(params, parameter);
    textAttributes.write(params, parameter);
    fieldName.write(params, parameter.name);
    isHidden.write(params, parameter.isHidden);
    readOnlyState.write(params, parameter.readOnlyState);
  },
};

// Polylines

const bezierGraphical = graphicalAttributes({ color: 255 });

export const bezierCodec: RecordCodec<Bezier> = {
  record: RecordType.Bezier,
  name: 'Bezier',
  read: (params) => ({
    record: RecordType.Bezier,
    ...baseAttributes.read(params),
    ...bezierGraphical.read(params),
    ...polylineAttributes.read(params),
    children: [],
  }),
  write(bezier, params) {
    baseAttributes.write(params, bezier);
    bezierGraphical.write(params, bezier);
    polylineAttributes.write(params, bezier);
  },
};

const startLineShape = intField('STARTLINESHAPE');
const endLineShape = intField('ENDLINESHAPE');
const lineShapeSize = intField('LINESHAPESIZE');

export const polylineCodec: RecordCodec<Polyline> = {
  record: RecordType.Polyline,
  name: 'Polyline',
  read: (params) => ({
    record: RecordType.Polyline,
    ...baseAttributes.read(params),
    ...graphical.read(params),
    ...polylineAttributes.read(params),
    lineStyle: lineStyleField.read(params),
    startLineShape: startLineShape.read(params),
    endLineShape: endLineShape.read(params),
    lineShapeSize: lineShapeSize.read(params),
    children: [],
  }),
  write(polyline, params) {
    baseAttributes.write(params, polyline);
    graphical.write(params, polyline);
    lineStyleField.write(params, polyline.lineStyle);
    startLineShape.write(params, polyline.startLineShape);
    endLineShape.write(params, polyline.endLineShape);
    lineShapeSize.write(params, polyline.lineShapeSize);
    polylineAttributes.write(params, polyline);
  },
};

export const polygonCodec: RecordCodec<Polygon> = {
  record: RecordType.Polygon,
  name: 'Polygon',
  read: (params) => ({
    record: RecordType.Polygon,
    ...baseAttributes.read(params),
    ...graphical.read(params),
    ...fillAttributes.read(params),
    ...polylineAttributes.read(params),
    children: [],
  }),
  write(polygon, params) {
    baseAttributes.write(params, polygon);
    graphical.write(params, polygon);
    fillAttributes.write(params, polygon);
    polylineAttributes.write(params, polygon);
  },
};

// Shapes

const radius = coordField('RADIUS');
const secondaryRadius = coordField('SECONDARYRADIUS');

export const ellipseCodec: RecordCodec<Ellipse> = {
  record: RecordType.Ellipse,
  name: 'Ellipse',
  read: (params) => ({
    record: RecordType.Ellipse,
    ...baseAttributes.read(params),
    ...graphical.read(params),
    ...fillAttributes.read(params),
    radius: radius.read(params),
    secondaryRadius: secondaryRadius.read(params),
    lineWidth: lineWidthField.read(params),
    children: [],
  }),
  write(ellipse, params) {
    baseAttributes.write(params, ellipse);
    graphical.write(params, ellipse);
    radius.write(params, ellipse.radius);
    secondaryRadius.write(params, ellipse.secondaryRadius);
    lineWidthField.write(params, ellipse.lineWidth);
    fillAttributes.write(params, ellipse);
  },
};

const startAngle = numberField('STARTANGLE');
const endAngle = numberField('ENDANGLE', 360);

export const arcCodec: RecordCodec<Arc> = {
  record: RecordType.Arc,
  name: 'Arc',
  read: (params) => ({
    record: RecordType.Arc,
    ...baseAttributes.read(params),
    ...graphical.read(params),
    radius: radius.read(params),
    startAngle: startAngle.read(params),
    endAngle: endAngle.read(params),
    lineWidth: lineWidthField.read(params),
    children: [],
  }),
  write(arc, params) {
    baseAttributes.write(params, arc);
    graphical.write(params, arc);
    radius.write(params, arc.radius);
    startAngle.write(params, arc.startAngle);
    endAngle.write(params, arc.endAngle);
    lineWidthField.write(params, arc.lineWidth);
  },
};

const corner = pointField('CORNER');

export const lineCodec: RecordCodec<Line> = {
  record: RecordType.Line,
  name: 'Line',
  read: (params) => ({
    record: RecordType.Line,
    ...baseAttributes.read(params),
    ...graphical.read(params),
    corner: corner.read(params),
    lineWidth: lineWidthField.read(params),
    lineStyle: lineStyleField.read(params),
    children: [],
  }),
  write(line, params) {
    baseAttributes.write(params, line);
    graphical.write(params, line);
    corner.write(params, line.corner);
    lineWidthField.write(params, line.lineWidth);
    lineStyleField.write(params, line.lineStyle);
  },
};

export const rectangleCodec: RecordCodec<Rectangle> = {
  record: RecordType.Rectangle,
  name: 'Rectangle',
  read: (params) => ({
    record: RecordType.Rectangle,
    ...baseAttributes.read(params),
    ...graphical.read(params),
    ...fillAttributes.read(params),
    corner: corner.read(params),
    lineWidth: lineWidthField.read(params),
    children: [],
  }),
  write(rectangle, params) {
    baseAttributes.write(params, rectangle);
    graphical.write(params, rectangle);
    corner.write(params, rectangle.corner);
    lineWidthField.write(params, rectangle.lineWidth);
    fillAttributes.write(params, rectangle);
  },
};

const cornerXRadius = coordField('CORNERXRADIUS');
const cornerYRadius = coordField('CORNERYRADIUS');

export const roundedRectangleCodec: RecordCodec<RoundedRectangle> = {
  record: RecordType.RoundedRectangle,
  name: 'RoundedRectangle',
  read: (params) => ({
    record: RecordType.RoundedRectangle,
    ...baseAttributes.read(params),
    ...graphical.read(params),
    ...fillAttributes.read(params),
    corner: corner.read(params),
    lineWidth: lineWidthField.read(params),
    cornerXRadius: cornerXRadius.read(params),
    cornerYRadius: cornerYRadius.read(params),
    children: [],
  }),
  write(rectangle, params) {
    baseAttributes.write(params, rectangle);
    graphical.write(params, rectangle);
    corner.write(params, rectangle.corner);
    lineWidthField.write(params, rectangle.lineWidth);
    cornerXRadius.write(params, rectangle.cornerXRadius);
    cornerYRadius.write(params, rectangle.cornerYRadius);
    fillAttributes.write(params, rectangle);
  },
};

const fileName = textField('FILENAME');
const embedImage = boolField('EMBEDIMAGE');
const keepAspect = boolField('KEEPASPECT');

export const imageCodec: RecordCodec<Image> = {
  record: RecordType.Image,
  name: 'Image',
  read: (params) => ({
    record: RecordType.Image,
    ...baseAttributes.read(params),
    ...graphical.read(params),
    corner: corner.read(params),
    fileName: fileName.read(params),
    embedImage: embedImage.read(params),
    keepAspect: keepAspect.read(params),
    children: [],
  }),
  write(image, params) {
    baseAttributes.write(params, image);
    graphical.write(params, image);
    corner.write(params, image.corner);
    embedImage.write(params, image.embedImage);
    fileName.write(params, image.fileName);
    keepAspect.write(params, image.keepAspect);
  },
};

// Implementations

export const implementationListCodec: RecordCodec<ImplementationList> = {
  record: RecordType.ImplementationList,
  name: 'ImplementationList',
  read: (params) => ({
    record: RecordType.ImplementationList,
    ...baseAttributes.read(params),
    children: [],
  }),
  write(list, params) {
    baseAttributes.write(params, list);
  },
};

const modelName = textField('MODELNAME');
const modelType = textField('MODELTYPE');
const modelDescription = textField('DESCRIPTION');
const isCurrent = boolField('ISCURRENT');

export const implementationCodec: RecordCodec<Implementation> = {
  record: RecordType.Implementation,
  name: 'Implementation',
  read: (params) => ({
    record: RecordType.Implementation,
    ...baseAttributes.read(params),
    modelName: modelName.read(params),
    modelType: modelType.read(params),
    description: modelDescription.read(params),
    isCurrent: isCurrent.read(params),
    children: [],
  }),
  write(implementation, params) {
    baseAttributes.write(params, implementation);
    modelName.write(params, implementation.modelName);
    modelType.write(params, implementation.modelType);
    modelDescription.write(params, implementation.description);
    isCurrent.write(params, implementation.isCurrent);
  },
};

/** Codec for every modelled record tag */
export const recordCodecs: { [R in KnownRecordType]: RecordCodec<RecordPrimitive<R>> } = {
  [RecordType.Component]: componentCodec,
  [RecordType.Pin]: pinCodec,
  [RecordType.Label]: labelCodec,
  [RecordType.Bezier]: bezierCodec,
  [RecordType.Polyline]: polylineCodec,
  [RecordType.Polygon]: polygonCodec,
  [RecordType.Ellipse]: ellipseCodec,
  [RecordType.RoundedRectangle]: roundedRectangleCodec,
  [RecordType.Arc]: arcCodec,
  [RecordType.Line]: lineCodec,
  [RecordType.Rectangle]: rectangleCodec,
  [RecordType.Image]: imageCodec,
  [RecordType.Designator]: designatorCodec,
  [RecordType.Parameter]: parameterCodec,
  [RecordType.ImplementationList]: implementationListCodec,
  [RecordType.Implementation]: implementationCodec,
};

const codecList: ReadonlyArray<RecordCodec<KnownPrimitive>> = [
  componentCodec,
  pinCodec,
  labelCodec,
  bezierCodec,
  polylineCodec,
  polygonCodec,
  ellipseCodec,
  roundedRectangleCodec,
  arcCodec,
  lineCodec,
  rectangleCodec,
  imageCodec,
  designatorCodec,
  parameterCodec,
  implementationListCodec,
  implementationCodec,
];

const codecsByRecord = new Map<number, RecordCodec<KnownPrimitive>>(
  codecList.map((codec) => [codec.record, codec])
);

/** Dispatch on a numeric record tag read from a file */
export function lookupCodec(record: number): RecordCodec<KnownPrimitive> | undefined {
  return codecsByRecord.get(record);
}
