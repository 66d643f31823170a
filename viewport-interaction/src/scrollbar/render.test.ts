import { describe, expect, it, vi } from 'vitest';
import { renderScrollbar, rgba, type ScrollbarCanvas } from './render';

const makeCanvas = () => {
  const stops: Array<[number, string]> = [];
  const ctx: ScrollbarCanvas = {
    save: vi.fn(),
    restore: vi.fn(),
    beginPath: vi.fn(),
    moveTo: vi.fn(),
    arcTo: vi.fn(),
    closePath: vi.fn(),
    fill: vi.fn<[], void>(),
    stroke: vi.fn<[], void>(),
    createLinearGradient: vi.fn(() => ({
      addColorStop: (offset: number, color: string) => {
        stops.push([offset, color]);
      }
    })),
    fillStyle: '',
    strokeStyle: '',
    lineWidth: 0
  };
  return { ctx, stops };
};

const layout = {
  trackRect: { x: 184, y: 4, w: 12, h: 292 },
  thumbRect: { x: 185, y: 121, w: 10, h: 58 },
  thumbTravel: 234
};

const accent = { r: 100, g: 150, b: 200 };

describe('renderScrollbar', () => {
  it('skips drawing when faded out', () => {
    const { ctx } = makeCanvas();
    renderScrollbar(ctx, layout, accent, { alpha: 0.0005, hovered: false, dragging: false });
    expect(ctx.save).not.toHaveBeenCalled();
    expect(ctx.fill).not.toHaveBeenCalled();
  });

  it('fills the track and the thumb', () => {
    const { ctx, stops } = makeCanvas();
    renderScrollbar(ctx, layout, accent, { alpha: 1, hovered: false, dragging: false });
    expect(ctx.fill).toHaveBeenCalledTimes(2);
    expect(ctx.stroke).toHaveBeenCalledTimes(2);
    expect(stops[0]).toEqual([0, 'rgba(30, 34, 40, 0.490)']);
  });

  it('scales colors by the fade alpha and brightens while dragging', () => {
    const { ctx, stops } = makeCanvas();
    renderScrollbar(ctx, layout, accent, { alpha: 0.5, hovered: false, dragging: true });
    expect(stops[0]).toEqual([0, 'rgba(30, 34, 40, 0.245)']);
    // thumb top: accent lightened by 25%, alpha (200 + 34) / 255 * 0.5
    expect(stops[2]).toEqual([0, 'rgba(139, 176, 214, 0.459)']);
  });
});

describe('rgba', () => {
  it('clamps alpha to one', () => {
    expect(rgba({ r: 1, g: 2, b: 3 }, 400, 1)).toBe('rgba(1, 2, 3, 1.000)');
  });
});
