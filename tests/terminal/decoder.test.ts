import { describe, it, expect, beforeEach } from 'vitest';
import { IncrementalDecoder } from '../../src/terminal/decoder.js';

const bytes = (...values: number[]) => Uint8Array.from(values);

describe('IncrementalDecoder', () => {
  let decoder: IncrementalDecoder;

  beforeEach(() => {
    decoder = new IncrementalDecoder();
  });

  it('decodes plain ASCII unchanged', () => {
    expect(decoder.decode(Buffer.from('echo foo\r\n'))).toBe('echo foo\r\n');
  });

  it('decodes complete multi-byte text in one chunk', () => {
    expect(decoder.decode(Buffer.from('Gãńdåłf_Thê_Gręât'))).toBe('Gãńdåłf_Thê_Gręât');
  });

  it('holds back a two-byte sequence split across chunks', () => {
    // "ã" is c3 a3
    expect(decoder.decode(bytes(0x61, 0xc3))).toBe('a');
    expect(decoder.pendingBytes).toBe(1);
    expect(decoder.decode(bytes(0xa3, 0x62))).toBe('ãb');
    expect(decoder.pendingBytes).toBe(0);
  });

  it('reassembles a four-byte sequence delivered one piece at a time', () => {
    // U+1F600 is f0 9f 98 80
    expect(decoder.decode(bytes(0xf0))).toBe('');
    expect(decoder.decode(bytes(0x9f, 0x98))).toBe('');
    expect(decoder.decode(bytes(0x80))).toBe('\u{1F600}');
  });

  it('escapes a byte that can never start a sequence', () => {
    expect(decoder.decode(bytes(0x61, 0xff, 0x62))).toBe('a\\xffb');
  });

  it('escapes a lead byte followed by a non-continuation byte', () => {
    expect(decoder.decode(bytes(0xe2, 0x41))).toBe('\\xe2A');
  });

  it('escapes overlong and surrogate encodings byte by byte', () => {
    expect(decoder.decode(bytes(0xc0, 0xaf))).toBe('\\xc0\\xaf');
    expect(decoder.decode(bytes(0xed, 0xa0, 0x80))).toBe('\\xed\\xa0\\x80');
  });

  it('flushes a dangling sequence as escapes when final', () => {
    expect(decoder.decode(bytes(0x6f, 0x6b, 0xe2, 0x82))).toBe('ok');
    expect(decoder.decode(bytes(), true)).toBe('\\xe2\\x82');
    expect(decoder.pendingBytes).toBe(0);
  });
});
