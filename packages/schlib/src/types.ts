/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Schematic library container layout and codec options
 */

import type { CompressionLevel } from './framing.js';
import type { UnknownRecordPolicy } from './records/index.js';

/** Stream names, matched exactly */
export enum StreamName {
  FileHeader = 'FileHeader',
  SectionKeys = 'SectionKeys',
  Data = 'Data',
  PinTextData = 'PinTextData',
  PinWideText = 'PinWideText',
  PinSymbolLineWidth = 'PinSymbolLineWidth',
  Storage = 'Storage',
}

/** HEADER value of the embedded image stream */
export const EMBEDDED_IMAGES_HEADER = 'Icon storage';

export interface SchLibWriteOptions {
  /** zlib level for compressed sub-blocks (default: 6) */
  compressionLevel?: CompressionLevel;
  /** Highest counter tried when numbering colliding section keys (default: 9999) */
  maxSectionKeySuffix?: number;
}

export interface SchLibReadOptions {
  /** What to do with record tags that have no codec (default: 'preserve') */
  unknownRecords?: UnknownRecordPolicy;
  /**
   * Require the FileHeader name count to match the number of component
   * storages (default: true)
   */
  strictComponentCount?: boolean;
}

export type ResolvedWriteOptions = Required<SchLibWriteOptions>;
export type ResolvedReadOptions = Required<SchLibReadOptions>;
