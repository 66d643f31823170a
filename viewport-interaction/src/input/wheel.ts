import type { WheelSource } from '../types';

export type DomWheelLike = {
  deltaY: number;
  deltaMode: number;
};

export type WheelRows = {
  ticks: number;
  delta: number;
  source: WheelSource;
};

export const DOM_DELTA_PIXEL = 0;
export const DOM_DELTA_LINE = 1;
export const DOM_DELTA_PAGE = 2;

// Pixel deltas below this per event come from touchpads rather than notched wheels.
const TOUCH_PIXEL_THRESHOLD = 50;

// WheelAccumulator turns DOM wheel events into whole-row ticks, carrying
// fractional rows between events so slow touchpad scrolls still move.
export class WheelAccumulator {
  private pending = 0;

  push(event: DomWheelLike, cellHeight: number, pageRows: number): WheelRows {
    let rows: number;
    switch (event.deltaMode) {
      case DOM_DELTA_LINE:
        rows = event.deltaY;
        break;
      case DOM_DELTA_PAGE:
        rows = event.deltaY * pageRows;
        break;
      default:
        rows = cellHeight > 0 ? event.deltaY / cellHeight : 0;
        break;
    }

    if (Math.sign(rows) !== Math.sign(this.pending)) {
      this.pending = 0;
    }
    this.pending += rows;
    const ticks = Math.trunc(this.pending) || 0;
    this.pending -= ticks;

    const source: WheelSource =
      event.deltaMode === DOM_DELTA_PIXEL && Math.abs(event.deltaY) < TOUCH_PIXEL_THRESHOLD ? 'touch' : 'mouse';
    return { ticks, delta: rows, source };
  }

  reset(): void {
    this.pending = 0;
  }
}
