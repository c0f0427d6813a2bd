/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Schematic library document model
 */

import type { ParameterCollection } from './parameter-collection.js';

/** Record discriminants written as the RECORD parameter of every primitive */
export enum RecordType {
  /** Opaque record kept for lossless re-emission; the real tag is in originalRecord */
  Unknown = -1,
  Component = 1,
  Pin = 2,
  Label = 4,
  Bezier = 5,
  Polyline = 6,
  Polygon = 7,
  Ellipse = 8,
  RoundedRectangle = 10,
  Arc = 12,
  Line = 13,
  Rectangle = 14,
  Image = 30,
  Designator = 34,
  Parameter = 41,
  ImplementationList = 44,
  Implementation = 45,
}

export enum LineWidth {
  Smallest = 0,
  Small = 1,
  Medium = 2,
  Large = 3,
}

export enum LineStyle {
  Solid = 0,
  Dashed = 1,
  Dotted = 2,
}

export enum PinElectricalType {
  Input = 0,
  InputOutput = 1,
  Output = 2,
  OpenCollector = 3,
  Passive = 4,
  HiZ = 5,
  OpenEmitter = 6,
  Power = 7,
}

/** Quarter-turn rotation, counter-clockwise */
export enum Orientation {
  Right = 0,
  Up = 1,
  Left = 2,
  Down = 3,
}

export interface CoordPoint {
  x: number;
  y: number;
}

/** Attributes every primitive carries */
export interface PrimitiveBase {
  ownerPartId: number;
  ownerPartDisplayMode: number;
  graphicallyLocked: boolean;
  uniqueId: string;
  children: Primitive[];
}

/** Shared drawing attributes, composed into the graphical variants */
export interface GraphicalAttributes {
  location: CoordPoint;
  color: number;
  areaColor: number;
}

export interface FillAttributes {
  isSolid: boolean;
  transparent: boolean;
}

export interface Component extends PrimitiveBase, GraphicalAttributes {
  record: RecordType.Component;
  libReference: string;
  description: string;
  partCount: number;
  displayModeCount: number;
  currentPartId: number;
  libraryPath: string;
  sourceLibraryName: string;
  targetFileName: string;
  /** Cached number of pins in the tree (ALLPINCOUNT) */
  pinCount: number;
  partIdLocked: boolean;
}

export interface Pin extends PrimitiveBase, GraphicalAttributes {
  record: RecordType.Pin;
  name: string;
  designator: string;
  description: string;
  electrical: PinElectricalType;
  orientation: Orientation;
  hidden: boolean;
  showName: boolean;
  showDesignator: boolean;
  pinLength: number;
  symbolInnerEdge: number;
  symbolOuterEdge: number;
  symbolInside: number;
  symbolOutside: number;
  swapIdPin: string;
  swapIdPart: string;
  propagationDelay: number;
  /** Unicode overrides stored in the PinWideText stream; must be a utf16 collection */
  wideText?: ParameterCollection;
  /** Raw blob stored in the PinTextData stream */
  textData?: Uint8Array;
  /** Custom line widths stored in the PinSymbolLineWidth stream; must be a utf16 collection */
  symbolLineWidth?: ParameterCollection;
}

export interface TextAttributes {
  text: string;
  fontId: number;
  orientation: Orientation;
  justification: number;
  isMirrored: boolean;
}

export interface Label extends PrimitiveBase, GraphicalAttributes, TextAttributes {
  record: RecordType.Label;
}

export interface Designator extends PrimitiveBase, GraphicalAttributes, TextAttributes {
  record: RecordType.Designator;
  name: string;
  isHidden: boolean;
}

export interface Parameter extends PrimitiveBase, GraphicalAttributes, TextAttributes {
  record: RecordType.Parameter;
  name: string;
  isHidden: boolean;
  readOnlyState: number;
}

/** Vertex list shared by beziers, polylines and polygons */
export interface BasicPolylineAttributes {
  points: CoordPoint[];
  lineWidth: LineWidth;
}

export interface Bezier extends PrimitiveBase, GraphicalAttributes, BasicPolylineAttributes {
  record: RecordType.Bezier;
}

export interface Polyline extends PrimitiveBase, GraphicalAttributes, BasicPolylineAttributes {
  record: RecordType.Polyline;
  lineStyle: LineStyle;
  startLineShape: number;
  endLineShape: number;
  lineShapeSize: number;
}

export interface Polygon extends PrimitiveBase, GraphicalAttributes, BasicPolylineAttributes, FillAttributes {
  record: RecordType.Polygon;
}

export interface Ellipse extends PrimitiveBase, GraphicalAttributes, FillAttributes {
  record: RecordType.Ellipse;
  radius: number;
  secondaryRadius: number;
  lineWidth: LineWidth;
}

export interface Arc extends PrimitiveBase, GraphicalAttributes {
  record: RecordType.Arc;
  radius: number;
  startAngle: number;
  endAngle: number;
  lineWidth: LineWidth;
}

export interface Line extends PrimitiveBase, GraphicalAttributes {
  record: RecordType.Line;
  corner: CoordPoint;
  lineWidth: LineWidth;
  lineStyle: LineStyle;
}

export interface Rectangle extends PrimitiveBase, GraphicalAttributes, FillAttributes {
  record: RecordType.Rectangle;
  corner: CoordPoint;
  lineWidth: LineWidth;
}

export interface RoundedRectangle extends PrimitiveBase, GraphicalAttributes, FillAttributes {
  record: RecordType.RoundedRectangle;
  corner: CoordPoint;
  lineWidth: LineWidth;
  cornerXRadius: number;
  cornerYRadius: number;
}

export interface Image extends PrimitiveBase, GraphicalAttributes {
  record: RecordType.Image;
  corner: CoordPoint;
  fileName: string;
  embedImage: boolean;
  keepAspect: boolean;
  /** Opaque image bytes, stored once per distinct content in the Storage stream */
  imageData?: Uint8Array;
}

export interface ImplementationList extends PrimitiveBase {
  record: RecordType.ImplementationList;
}

export interface Implementation extends PrimitiveBase {
  record: RecordType.Implementation;
  modelName: string;
  modelType: string;
  description: string;
  isCurrent: boolean;
}

/**
 * A record whose tag is not modelled. Either a parameter record (kept as its
 * parameters minus RECORD/OWNERINDEX) or a binary record (kept as its body).
 */
export interface UnknownPrimitive extends PrimitiveBase {
  record: RecordType.Unknown;
  originalRecord: number;
  parameters?: ParameterCollection;
  binary?: Uint8Array;
}

export type KnownPrimitive =
  | Component
  | Pin
  | Label
  | Bezier
  | Polyline
  | Polygon
  | Ellipse
  | RoundedRectangle
  | Arc
  | Line
  | Rectangle
  | Image
  | Designator
  | Parameter
  | ImplementationList
  | Implementation;

export type Primitive = KnownPrimitive | UnknownPrimitive;

export type KnownRecordType = KnownPrimitive['record'];

export interface FontSpec {
  size: number;
  name: string;
  rotation: number;
  bold: boolean;
  italic: boolean;
  underline: boolean;
}

/** Global attributes of the FileHeader stream */
export interface LibraryHeader {
  version: string;
  minorVersion: number;
  uniqueId: string;
  useMbcs: boolean;
  isBoc: boolean;
  fonts: FontSpec[];
  /** Unrecognised global keys, kept in file order */
  extra: ParameterCollection;
}

export interface LibraryDocument {
  header: LibraryHeader;
  components: Component[];
}
