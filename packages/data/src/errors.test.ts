/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { FramingError, MalformedContainerError, annotateError } from './errors.js';

describe('error locations', () => {
  it('fills in only the fields that are still unknown', () => {
    const error = new FramingError('Bad block', { stream: 'Data', offset: 12 });
    error.locate({ component: 'R1', stream: 'FileHeader', offset: 0 });
    expect(error.location).toEqual({ component: 'R1', stream: 'Data', offset: 12 });
    expect(error.message).toBe('Bad block (component "R1", stream "Data", offset 12)');
  });

  it('formats a message without location', () => {
    expect(new MalformedContainerError('Missing FileHeader stream').message).toBe('Missing FileHeader stream');
  });

  it('annotates library errors and passes other errors through', () => {
    const error = new MalformedContainerError('Missing Data stream');
    expect(annotateError(error, { component: 'C1' })).toBe(error);
    expect(error.location.component).toBe('C1');

    const other = new Error('boom');
    expect(annotateError(other, { component: 'C1' })).toBe(other);
  });
});
