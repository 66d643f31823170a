import { describe, expect, it } from 'vitest';
import { encodeMouseScroll, wantsMouseEvents } from './mouseEncoding';

const decode = (bytes: Uint8Array) => String.fromCharCode(...bytes);

describe('encodeMouseScroll', () => {
  it('uses one-based coordinates in SGR form', () => {
    expect(decode(encodeMouseScroll('up', 4, 2, true))).toBe('\x1b[<64;5;3M');
    expect(decode(encodeMouseScroll('down', 0, 0, true))).toBe('\x1b[<65;1;1M');
  });

  it('offsets button and coordinates in legacy form', () => {
    expect(Array.from(encodeMouseScroll('down', 4, 2, false))).toEqual([0x1b, 0x5b, 0x4d, 97, 37, 35]);
  });

  it('clamps legacy coordinates to one byte', () => {
    expect(Array.from(encodeMouseScroll('up', 500, 300, false))).toEqual([0x1b, 0x5b, 0x4d, 96, 255, 255]);
  });
});

describe('wantsMouseEvents', () => {
  it('ignores the SGR flag on its own', () => {
    const none = { x10: false, normal: false, button: false, any: false, sgr: true };
    expect(wantsMouseEvents(none)).toBe(false);
    expect(wantsMouseEvents({ ...none, button: true })).toBe(true);
  });
});
