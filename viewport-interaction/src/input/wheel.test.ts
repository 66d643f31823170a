import { describe, expect, it } from 'vitest';
import { DOM_DELTA_LINE, DOM_DELTA_PAGE, DOM_DELTA_PIXEL, WheelAccumulator } from './wheel';

describe('WheelAccumulator', () => {
  it('passes line deltas through as ticks', () => {
    const wheel = new WheelAccumulator();
    expect(wheel.push({ deltaY: -3, deltaMode: DOM_DELTA_LINE }, 20, 24)).toEqual({ ticks: -3, delta: -3, source: 'mouse' });
  });

  it('scales page deltas by the page height', () => {
    const wheel = new WheelAccumulator();
    expect(wheel.push({ deltaY: 1, deltaMode: DOM_DELTA_PAGE }, 20, 24).ticks).toBe(24);
  });

  it('carries fractional pixel rows until they add up', () => {
    const wheel = new WheelAccumulator();
    expect(wheel.push({ deltaY: 12, deltaMode: DOM_DELTA_PIXEL }, 20, 24)).toEqual({ ticks: 0, delta: 0.6, source: 'touch' });
    expect(wheel.push({ deltaY: 12, deltaMode: DOM_DELTA_PIXEL }, 20, 24).ticks).toBe(1);
  });

  it('drops the carried fraction when the direction flips', () => {
    const wheel = new WheelAccumulator();
    wheel.push({ deltaY: 12, deltaMode: DOM_DELTA_PIXEL }, 20, 24);
    expect(wheel.push({ deltaY: -12, deltaMode: DOM_DELTA_PIXEL }, 20, 24).ticks).toBe(0);
  });

  it('treats large pixel steps as a notched wheel', () => {
    const wheel = new WheelAccumulator();
    expect(wheel.push({ deltaY: 100, deltaMode: DOM_DELTA_PIXEL }, 20, 24)).toEqual({ ticks: 5, delta: 5, source: 'mouse' });
  });
});
