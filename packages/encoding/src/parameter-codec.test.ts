/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { EncodingError, ParameterCollection } from '@schlib/data';
import { encodeParameters, decodeParameters, quoteValue } from './parameter-codec.js';

const ascii = (text: string) => new TextEncoder().encode(text);

describe('encodeParameters', () => {
  it('writes pipe-delimited pairs with a NUL terminator', () => {
    const params = new ParameterCollection([
      ['RECORD', 14],
      ['ISSOLID', true],
      ['TEXT', ''],
    ]);
    expect(encodeParameters(params)).toEqual(ascii('|RECORD=14|ISSOLID=T|TEXT=\0'));
  });

  it('writes an empty collection as the terminator only', () => {
    expect(encodeParameters(new ParameterCollection())).toEqual(Uint8Array.of(0));
  });

  it('quotes values containing the delimiter or starting with a quote', () => {
    const params = new ParameterCollection([
      ['NAME', 'A|B'],
      ['TEXT', '"q"'],
      ['PLAIN', 'say "hi"'],
    ]);
    expect(encodeParameters(params)).toEqual(ascii('|NAME="A|B"|TEXT="""q"""|PLAIN=say "hi"\0'));
  });

  it('writes Windows-1252 bytes for Latin text', () => {
    const params = new ParameterCollection([['NAME', 'é€']]);
    expect(encodeParameters(params)).toEqual(Uint8Array.of(0x7c, 0x4e, 0x41, 0x4d, 0x45, 0x3d, 0xe9, 0x80, 0x00));
  });

  it('moves values outside Windows-1252 under a %UTF8% key', () => {
    const params = new ParameterCollection([['NAME', 'Ω']]);
    expect(encodeParameters(params)).toEqual(
      Uint8Array.of(...ascii('|%UTF8%NAME='), 0xce, 0xa9, 0x00)
    );
  });

  it('writes UTF-16LE in wide mode', () => {
    const params = new ParameterCollection([['A', 'Ω']], 'utf16');
    expect(encodeParameters(params)).toEqual(
      Uint8Array.of(0x7c, 0, 0x41, 0, 0x3d, 0, 0xa9, 0x03, 0, 0)
    );
  });

  it('rejects keys and values it cannot represent', () => {
    expect(() => encodeParameters(new ParameterCollection([['A=B', '1']]))).toThrow(EncodingError);
    expect(() => encodeParameters(new ParameterCollection([['A|B', '1']]))).toThrow(EncodingError);
    expect(() => encodeParameters(new ParameterCollection([['', '1']]))).toThrow(EncodingError);
    expect(() => encodeParameters(new ParameterCollection([['%utf8%A', '1']]))).toThrow(EncodingError);
    expect(() => encodeParameters(new ParameterCollection([['TEXT', 'a\0b']]))).toThrow(EncodingError);
    expect(() => encodeParameters(new ParameterCollection([['Ω', '1']]))).toThrow(EncodingError);
  });

  it('rejects unpaired surrogates in both modes', () => {
    expect(() => encodeParameters(new ParameterCollection([['A', 'x\uD800y']]))).toThrow(EncodingError);
    expect(() => encodeParameters(new ParameterCollection([['A', 'x\uDC00']], 'utf16'))).toThrow(EncodingError);
  });
});

describe('decodeParameters', () => {
  it('reads pairs in order and stops at the terminator', () => {
    const params = decodeParameters(ascii('|RECORD=2|NAME=VCC\0|IGNORED=1'));
    expect([...params]).toEqual([
      { key: 'RECORD', value: '2' },
      { key: 'NAME', value: 'VCC' },
    ]);
    expect(params.charset).toBe('ansi');
  });

  it('reads a key without "=" as an empty value', () => {
    const params = decodeParameters(ascii('|FLAG|A=1'));
    expect(params.get('FLAG')).toBe('');
    expect(params.get('A')).toBe('1');
  });

  it('takes a badly closed quoted value raw', () => {
    const params = decodeParameters(ascii('|TEXT="abc"def|X=1'));
    expect(params.get('TEXT')).toBe('"abc"def');
    expect(params.get('X')).toBe('1');
  });

  it('folds %UTF8% keys onto the plain key in place', () => {
    const bytes = Uint8Array.of(...ascii('|NAME=?|OTHER=1|%UTF8%NAME='), 0xce, 0xa9, 0x00);
    const params = decodeParameters(bytes);
    expect([...params]).toEqual([
      { key: 'NAME', value: 'Ω' },
      { key: 'OTHER', value: '1' },
    ]);
  });

  it('fails on malformed wide text', () => {
    expect(() => decodeParameters(Uint8Array.of(0x7c, 0, 0x41), 'utf16')).toThrow(EncodingError);
  });

  it('fails on malformed UTF-8 under a %UTF8% key', () => {
    const bytes = Uint8Array.of(...ascii('|%UTF8%NAME='), 0xc3, 0x00);
    expect(() => decodeParameters(bytes)).toThrow(EncodingError);
  });
});

describe('parameter round trip', () => {
  const values = [
    '',
    'plain',
    'A|B|',
    '"',
    '""',
    '"leading',
    'trailing"',
    'mixed "quotes" | pipes',
    'Größe 5 µF',
    '电阻 Ω',
    'emoji 🔌',
    'C:\\Libraries\\Passive.SchLib',
  ];

  for (const charset of ['ansi', 'utf16'] as const) {
    it(`reproduces ordered key/value sets in ${charset} mode`, () => {
      const params = new ParameterCollection(
        values.map((value, i): [string, string] => [`KEY${i}`, value]),
        charset
      );
      const decoded = decodeParameters(encodeParameters(params), charset);
      expect(decoded).toEqual(params);
    });
  }

  it('leaves values without delimiters unquoted', () => {
    expect(quoteValue('say "hi"')).toBe('say "hi"');
    expect(quoteValue('|')).toBe('"|"');
  });
});
