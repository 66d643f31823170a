import type { Rect, ScrollbarConfig } from '../types';
import { getDefaultScrollbarConfig } from '../utils/config';
import { clamp } from '../utils/easing';
import { rectContains } from '../utils/rect';

// ScrollbarMetrics describes a scroll range in rows. offset is the distance of
// the viewport top from the top of the content.
export interface ScrollbarMetrics {
  total: number;
  offset: number;
  viewport: number;
}

export interface ScrollbarLayout {
  trackRect: Rect;
  thumbRect: Rect;
  thumbTravel: number;
}

export type ScrollbarHitTarget = 'none' | 'track' | 'thumb';

const DEFAULT_GEOMETRY = getDefaultScrollbarConfig();

// Reserved gutter beyond the track, so content text does not run under the thumb.
const SCROLLBAR_GUTTER = 8;

export const createScrollbarMetrics = (total: number, offset: number, viewport: number): ScrollbarMetrics => {
  const safeTotal = Math.max(0, total);
  const safeViewport = Math.max(0, viewport);
  const maxOffset = Math.max(0, safeTotal - safeViewport);
  return { total: safeTotal, offset: clamp(offset, 0, maxOffset), viewport: safeViewport };
};

export const maxScrollOffset = (metrics: ScrollbarMetrics): number => Math.max(0, metrics.total - metrics.viewport);

export const isScrollable = (metrics: ScrollbarMetrics): boolean =>
  metrics.total > metrics.viewport && metrics.viewport > 0;

export const normalizedOffset = (metrics: ScrollbarMetrics): number => {
  const max = maxScrollOffset(metrics);
  if (max <= 0) {
    return 0;
  }
  return clamp(metrics.offset / max, 0, 1);
};

export const offsetForRatio = (metrics: ScrollbarMetrics, ratio: number): number =>
  clamp(ratio, 0, 1) * maxScrollOffset(metrics);

// scaleLength converts a logical length to device pixels, never below one pixel.
export const scaleLength = (value: number, uiScale: number): number => Math.max(1, Math.round(value * uiScale));

export const reservedScrollbarWidth = (uiScale: number, geometry: ScrollbarConfig = DEFAULT_GEOMETRY): number =>
  scaleLength(geometry.trackWidth, uiScale) + scaleLength(SCROLLBAR_GUTTER, uiScale);

// computeScrollbarLayout places the track along the right edge of bounds and
// sizes the thumb proportionally. Returns null when there is nothing to scroll
// or the bounds cannot hold a track.
export const computeScrollbarLayout = (
  bounds: Rect,
  metrics: ScrollbarMetrics,
  uiScale = 1,
  geometry: ScrollbarConfig = DEFAULT_GEOMETRY
): ScrollbarLayout | null => {
  if (!isScrollable(metrics)) {
    return null;
  }

  const trackW = scaleLength(geometry.trackWidth, uiScale);
  const edgeMargin = scaleLength(geometry.edgeMargin, uiScale);
  const marginY = scaleLength(geometry.trackMarginY, uiScale);
  const trackH = bounds.h - marginY * 2;
  if (trackH <= 0 || trackW <= 0 || bounds.w <= trackW + edgeMargin) {
    return null;
  }

  const trackRect: Rect = {
    x: bounds.x + bounds.w - trackW - edgeMargin,
    y: bounds.y + marginY,
    w: trackW,
    h: trackH
  };

  const visibleRatio = clamp(metrics.viewport / metrics.total, 0, 1);
  const proportionalH = Math.trunc(trackH * visibleRatio);
  const minThumbH = Math.min(trackH, scaleLength(geometry.minThumbHeight, uiScale));
  const thumbH = clamp(proportionalH, minThumbH, trackH);
  const thumbTravel = Math.max(0, trackH - thumbH);
  const thumbY = trackRect.y + Math.trunc(thumbTravel * normalizedOffset(metrics));
  const inset = Math.max(1, scaleLength(1, uiScale));

  return {
    trackRect,
    thumbRect: {
      x: trackRect.x + inset,
      y: thumbY,
      w: Math.max(2, trackW - inset * 2),
      h: thumbH
    },
    thumbTravel
  };
};

export const hitTestScrollbar = (layout: ScrollbarLayout, x: number, y: number): ScrollbarHitTarget => {
  if (rectContains(layout.thumbRect, x, y)) {
    return 'thumb';
  }
  if (rectContains(layout.trackRect, x, y)) {
    return 'track';
  }
  return 'none';
};

export const offsetForThumbTop = (layout: ScrollbarLayout, metrics: ScrollbarMetrics, thumbTop: number): number => {
  if (layout.thumbTravel <= 0) {
    return 0;
  }
  const ratio = clamp((thumbTop - layout.trackRect.y) / layout.thumbTravel, 0, 1);
  return offsetForRatio(metrics, ratio);
};

// offsetForTrackClick centers the thumb on the click position.
export const offsetForTrackClick = (layout: ScrollbarLayout, metrics: ScrollbarMetrics, y: number): number =>
  offsetForThumbTop(layout, metrics, y - layout.thumbRect.h / 2);

// offsetForDrag keeps the thumb under the same grab point it was picked up at.
export const offsetForDrag = (
  state: { dragGrabOffsetPx: number },
  layout: ScrollbarLayout,
  metrics: ScrollbarMetrics,
  y: number
): number => offsetForThumbTop(layout, metrics, y - state.dragGrabOffsetPx);
