/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { DEFAULT_MAX_SECTION_KEY_SUFFIX } from './section-keys.js';
import type {
  ResolvedReadOptions,
  ResolvedWriteOptions,
  SchLibReadOptions,
  SchLibWriteOptions,
} from './types.js';

export function resolveWriteOptions(options: SchLibWriteOptions = {}): ResolvedWriteOptions {
  const { compressionLevel = 6, maxSectionKeySuffix = DEFAULT_MAX_SECTION_KEY_SUFFIX } = options;
  if (!Number.isInteger(maxSectionKeySuffix) || maxSectionKeySuffix < 0) {
    throw new RangeError(`maxSectionKeySuffix must be a non-negative integer, got ${maxSectionKeySuffix}`);
  }
  return { compressionLevel, maxSectionKeySuffix };
}

export function resolveReadOptions(options: SchLibReadOptions = {}): ResolvedReadOptions {
  const { unknownRecords = 'preserve', strictComponentCount = true } = options;
  return { unknownRecords, strictComponentCount };
}
