/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @schlib/data - Document model, parameter collections, errors and logging
 */

export * from './types.js';
export {
  ParameterCollection,
  formatParameterValue,
  parseBoolean,
} from './parameter-collection.js';
export type { ParameterInput, ParameterCharset, ParameterEntry } from './parameter-collection.js';
export {
  DEFAULT_HEADER_VERSION,
  isRecord,
  walkPrimitives,
  collectPrimitives,
  collectPins,
  createLibraryHeader,
  createLibraryDocument,
} from './model.js';
export * from './errors.js';
export { createLogger } from './logger.js';
export type { Logger, LogLevel, LogContext } from './logger.js';
