import type { Rect } from '../types';
import { clamp } from '../utils/easing';
import type { ScrollbarLayout } from './geometry';
import type { ScrollbarState } from './ScrollbarState';

export interface RgbColor {
  r: number;
  g: number;
  b: number;
}

export type ScrollbarCanvas = Pick<
  CanvasRenderingContext2D,
  | 'save'
  | 'restore'
  | 'beginPath'
  | 'moveTo'
  | 'arcTo'
  | 'closePath'
  | 'fill'
  | 'stroke'
  | 'createLinearGradient'
  | 'fillStyle'
  | 'strokeStyle'
  | 'lineWidth'
>;

type scrollbar_paint_state = Pick<ScrollbarState, 'alpha' | 'hovered' | 'dragging'>;

const TRACK_TOP: RgbColor = { r: 30, g: 34, b: 40 };
const TRACK_BOTTOM: RgbColor = { r: 22, g: 25, b: 30 };

// Base alpha values are on the 0..255 scale and get multiplied by the fade alpha.
const TRACK_ALPHA = 125;
const TRACK_BORDER_ALPHA = 70;
const THUMB_ALPHA = 200;
const THUMB_BORDER_ALPHA = 150;
const HOVER_BOOST = 16;
const DRAG_BOOST = 34;
const MIN_RENDER_ALPHA = 0.001;

export const rgba = (color: RgbColor, alpha255: number, fade: number): string => {
  const a = clamp((alpha255 / 255) * fade, 0, 1);
  return `rgba(${color.r}, ${color.g}, ${color.b}, ${a.toFixed(3)})`;
};

const mix = (a: RgbColor, b: RgbColor, t: number): RgbColor => ({
  r: Math.round(a.r + (b.r - a.r) * t),
  g: Math.round(a.g + (b.g - a.g) * t),
  b: Math.round(a.b + (b.b - a.b) * t)
});

const lighten = (color: RgbColor, amount: number): RgbColor => mix(color, { r: 255, g: 255, b: 255 }, amount);

const roundedRectPath = (ctx: ScrollbarCanvas, rect: Rect, radius: number): void => {
  const r = Math.max(0, Math.min(radius, rect.w / 2, rect.h / 2));
  const right = rect.x + rect.w;
  const bottom = rect.y + rect.h;
  ctx.beginPath();
  ctx.moveTo(rect.x + r, rect.y);
  ctx.arcTo(right, rect.y, right, bottom, r);
  ctx.arcTo(right, bottom, rect.x, bottom, r);
  ctx.arcTo(rect.x, bottom, rect.x, rect.y, r);
  ctx.arcTo(rect.x, rect.y, right, rect.y, r);
  ctx.closePath();
};

const fillVertical = (ctx: ScrollbarCanvas, rect: Rect, top: string, bottom: string): void => {
  const gradient = ctx.createLinearGradient(0, rect.y, 0, rect.y + rect.h);
  gradient.addColorStop(0, top);
  gradient.addColorStop(1, bottom);
  ctx.fillStyle = gradient;
  roundedRectPath(ctx, rect, rect.w / 2);
  ctx.fill();
};

// renderScrollbar paints the track and thumb tinted by accent.
// Does nothing while the bar is faded out.
export const renderScrollbar = (
  ctx: ScrollbarCanvas,
  layout: ScrollbarLayout,
  accent: RgbColor,
  state: scrollbar_paint_state
): void => {
  const fade = clamp(state.alpha, 0, 1);
  if (fade <= MIN_RENDER_ALPHA) {
    return;
  }

  const boost = state.dragging ? DRAG_BOOST : state.hovered ? HOVER_BOOST : 0;

  ctx.save();

  fillVertical(ctx, layout.trackRect, rgba(TRACK_TOP, TRACK_ALPHA, fade), rgba(TRACK_BOTTOM, TRACK_ALPHA, fade));
  ctx.lineWidth = 1;
  ctx.strokeStyle = rgba(lighten(TRACK_TOP, 0.2), TRACK_BORDER_ALPHA, fade);
  ctx.stroke();

  const thumbTop = lighten(accent, 0.25);
  const thumbBottom = mix(accent, TRACK_BOTTOM, 0.2);
  fillVertical(
    ctx,
    layout.thumbRect,
    rgba(thumbTop, THUMB_ALPHA + boost, fade),
    rgba(thumbBottom, THUMB_ALPHA + boost, fade)
  );
  ctx.strokeStyle = rgba(lighten(accent, 0.45), THUMB_BORDER_ALPHA + boost, fade);
  ctx.stroke();

  ctx.restore();
};
