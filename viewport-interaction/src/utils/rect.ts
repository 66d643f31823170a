import type { Rect } from '../types';

// rectContains treats the right and bottom edges as exclusive.
export const rectContains = (rect: Rect, x: number, y: number): boolean =>
  x >= rect.x && x < rect.x + rect.w && y >= rect.y && y < rect.y + rect.h;

export const isEmptyRect = (rect: Rect): boolean => !(rect.w > 0 && rect.h > 0);
