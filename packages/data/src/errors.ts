/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Error taxonomy for schematic library reading and writing.
 *
 * Every error carries an optional location (component, stream, byte offset).
 * Low-level code throws with whatever it knows; the document reader/writer
 * fills in the rest through {@link annotateError} before rethrowing.
 */

export type SchLibErrorCode =
  | 'MALFORMED_CONTAINER'
  | 'FRAMING'
  | 'TRUNCATED_BLOCK'
  | 'COMPRESSED_PAYLOAD'
  | 'DANGLING_OWNER_REFERENCE'
  | 'UNKNOWN_RECORD_TYPE'
  | 'ENCODING'
  | 'KEY_COLLISION_EXHAUSTED'
  | 'DUPLICATE_LIB_REFERENCE'
  | 'EMBEDDED_ASSET_CONFLICT'
  | 'INVALID_ENTRY_NAME';

export interface ErrorLocation {
  /** Library reference of the component being processed */
  component?: string;
  /** Container stream name */
  stream?: string;
  /** Byte offset within the stream */
  offset?: number;
}

function formatLocation(location: ErrorLocation): string {
  const parts: string[] = [];
  if (location.component !== undefined) parts.push(`component "${location.component}"`);
  if (location.stream !== undefined) parts.push(`stream "${location.stream}"`);
  if (location.offset !== undefined) parts.push(`offset ${location.offset}`);
  return parts.length > 0 ? ` (${parts.join(', ')})` : '';
}

export class SchLibError extends Error {
  readonly location: ErrorLocation;

  constructor(
    public readonly code: SchLibErrorCode,
    public readonly reason: string,
    location: ErrorLocation = {}
  ) {
    super(reason + formatLocation(location));
    this.name = 'SchLibError';
    this.location = { ...location };
  }

  /** Fill in location fields that are still unknown. */
  locate(location: ErrorLocation): this {
    if (this.location.component === undefined) this.location.component = location.component;
    if (this.location.stream === undefined) this.location.stream = location.stream;
    if (this.location.offset === undefined) this.location.offset = location.offset;
    this.message = this.reason + formatLocation(this.location);
    return this;
  }
}

/** A required stream or storage is missing, or the container contents disagree. */
export class MalformedContainerError extends SchLibError {
  constructor(reason: string, location?: ErrorLocation) {
    super('MALFORMED_CONTAINER', reason, location);
    this.name = 'MalformedContainerError';
  }
}

/** Length-prefixed block structure is invalid. */
export class FramingError extends SchLibError {
  constructor(reason: string, location?: ErrorLocation, code: SchLibErrorCode = 'FRAMING') {
    super(code, reason, location);
    this.name = 'FramingError';
  }
}

/** A declared length runs past the end of the available bytes. */
export class TruncatedBlockError extends FramingError {
  constructor(
    public readonly declared: number,
    public readonly available: number,
    location?: ErrorLocation
  ) {
    super(`Block declares ${declared} bytes but only ${available} remain`, location, 'TRUNCATED_BLOCK');
    this.name = 'TruncatedBlockError';
  }
}

/** A compressed sub-block is malformed or its payload does not inflate. */
export class CompressedPayloadError extends FramingError {
  constructor(reason: string, location?: ErrorLocation) {
    super(reason, location, 'COMPRESSED_PAYLOAD');
    this.name = 'CompressedPayloadError';
  }
}

export class DanglingOwnerReferenceError extends SchLibError {
  constructor(
    public readonly index: number,
    public readonly ownerIndex: number,
    location?: ErrorLocation
  ) {
    super(
      'DANGLING_OWNER_REFERENCE',
      `Record ${index} references owner ${ownerIndex} which has not been read yet`,
      location
    );
    this.name = 'DanglingOwnerReferenceError';
  }
}

export class UnknownRecordTypeError extends SchLibError {
  constructor(public readonly record: number, location?: ErrorLocation) {
    super('UNKNOWN_RECORD_TYPE', `Unknown record type ${record}`, location);
    this.name = 'UnknownRecordTypeError';
  }
}

/** Parameter text cannot be encoded or decoded in its declared charset. */
export class EncodingError extends SchLibError {
  constructor(reason: string, location?: ErrorLocation) {
    super('ENCODING', reason, location);
    this.name = 'EncodingError';
  }
}

export class KeyCollisionExhaustedError extends SchLibError {
  constructor(public readonly libReference: string, attempts: number) {
    super(
      'KEY_COLLISION_EXHAUSTED',
      `No free section key for "${libReference}" after ${attempts} attempts`,
      { component: libReference }
    );
    this.name = 'KeyCollisionExhaustedError';
  }
}

export class DuplicateLibReferenceError extends SchLibError {
  constructor(public readonly libReference: string) {
    super('DUPLICATE_LIB_REFERENCE', `Library reference "${libReference}" is used by more than one component`, {
      component: libReference,
    });
    this.name = 'DuplicateLibReferenceError';
  }
}

export class EmbeddedAssetConflictError extends SchLibError {
  constructor(public readonly fileName: string, location?: ErrorLocation) {
    super(
      'EMBEDDED_ASSET_CONFLICT',
      `Embedded image "${fileName}" is used with different contents`,
      location
    );
    this.name = 'EmbeddedAssetConflictError';
  }
}

/** A storage or stream name violates compound-file naming rules. */
export class InvalidEntryNameError extends SchLibError {
  constructor(public readonly entryName: string, reason: string) {
    super('INVALID_ENTRY_NAME', `Invalid entry name "${entryName}": ${reason}`);
    this.name = 'InvalidEntryNameError';
  }
}

/**
 * Attach location information to an error on its way up.
 * Errors that are not SchLibErrors pass through unchanged.
 */
export function annotateError(error: unknown, location: ErrorLocation): unknown {
  if (error instanceof SchLibError) {
    return error.locate(location);
  }
  return error;
}
