import type { MouseTrackingModes } from '../types';

export type ScrollDirection = 'up' | 'down';

const WHEEL_UP_BUTTON = 64;
const WHEEL_DOWN_BUTTON = 65;

// Legacy encoding offsets coordinates by 33 and must fit a single byte.
const LEGACY_MAX_COORD = 222;
const LEGACY_OFFSET = 32;

const encoder = new TextEncoder();

export const wantsMouseEvents = (modes: MouseTrackingModes): boolean =>
  modes.x10 || modes.normal || modes.button || modes.any;

// encodeMouseScroll builds one wheel report for a zero-based cell.
export const encodeMouseScroll = (direction: ScrollDirection, col: number, row: number, sgr: boolean): Uint8Array => {
  const button = direction === 'up' ? WHEEL_UP_BUTTON : WHEEL_DOWN_BUTTON;
  if (sgr) {
    return encoder.encode(`\x1b[<${button};${col + 1};${row + 1}M`);
  }
  return Uint8Array.of(
    0x1b,
    0x5b,
    0x4d,
    button + LEGACY_OFFSET,
    Math.min(col, LEGACY_MAX_COORD) + LEGACY_OFFSET + 1,
    Math.min(row, LEGACY_MAX_COORD) + LEGACY_OFFSET + 1
  );
};
