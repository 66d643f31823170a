import type { ScrollbarConfig } from '../types';
import { getDefaultScrollbarConfig } from '../utils/config';
import { easeInOutCubic, easeOutCubic } from '../utils/easing';
import type { ScrollbarLayout } from './geometry';

export type ScrollbarPhase = 'hidden' | 'fadingIn' | 'visible' | 'fadingOut';

type scrollbar_timing = Pick<ScrollbarConfig, 'idleHideDelayMs' | 'fadeInDurationMs' | 'fadeOutDurationMs'>;

const VISIBLE_ALPHA_EPSILON = 0.001;

const normalizedTime = (nowMs: number, startMs: number, durationMs: number): number => {
  if (durationMs <= 0) {
    return 1;
  }
  const elapsed = nowMs - startMs;
  if (elapsed <= 0) {
    return 0;
  }
  return Math.min(1, elapsed / durationMs);
};

// ScrollbarState drives the idle-hide fade of an overlay scrollbar.
//
// Activity (scrolling, hover, drag) fades the bar in and pushes the idle
// deadline out; once the deadline passes with the pointer away the bar fades out.
export class ScrollbarState {
  alpha = 0;
  phase: ScrollbarPhase = 'hidden';
  phaseStartMs = 0;
  phaseStartAlpha = 0;
  idleDeadlineMs = 0;
  hovered = false;
  dragging = false;
  dragGrabOffsetPx = 0;

  // A phase change needs one more frame even when the fade math alone would not ask for it.
  private firstFramePending = false;
  private timing: scrollbar_timing;

  constructor(timing: Partial<scrollbar_timing> = {}) {
    this.timing = getDefaultScrollbarConfig(timing);
  }

  hideNow(): void {
    this.alpha = 0;
    this.phase = 'hidden';
    this.phaseStartMs = 0;
    this.phaseStartAlpha = 0;
    this.idleDeadlineMs = 0;
    this.hovered = false;
    this.dragging = false;
    this.dragGrabOffsetPx = 0;
    this.firstFramePending = false;
  }

  noteActivity(nowMs: number): void {
    this.idleDeadlineMs = nowMs + this.timing.idleHideDelayMs;
    if (this.phase === 'hidden' || this.phase === 'fadingOut') {
      this.startFadeIn(nowMs);
    }
  }

  setHovered(hovered: boolean, nowMs: number): void {
    if (this.hovered === hovered) {
      return;
    }
    this.hovered = hovered;
    if (hovered) {
      this.noteActivity(nowMs);
    }
  }

  beginDrag(layout: ScrollbarLayout, mouseY: number, nowMs: number): void {
    this.dragging = true;
    this.dragGrabOffsetPx = mouseY - layout.thumbRect.y;
    this.noteActivity(nowMs);
  }

  endDrag(nowMs: number): void {
    this.dragging = false;
    this.noteActivity(nowMs);
  }

  update(nowMs: number): void {
    if (this.dragging || this.hovered) {
      this.idleDeadlineMs = nowMs + this.timing.idleHideDelayMs;
      if (this.phase === 'hidden' || this.phase === 'fadingOut') {
        this.startFadeIn(nowMs);
      }
    } else if (this.phase === 'visible' && nowMs >= this.idleDeadlineMs && this.alpha > 0) {
      this.startFadeOut(nowMs);
    }

    switch (this.phase) {
      case 'fadingIn': {
        const t = normalizedTime(nowMs, this.phaseStartMs, this.timing.fadeInDurationMs);
        this.alpha = this.phaseStartAlpha + (1 - this.phaseStartAlpha) * easeOutCubic(t);
        if (t >= 1) {
          this.alpha = 1;
          this.phase = 'visible';
          this.firstFramePending = true;
        }
        break;
      }
      case 'fadingOut': {
        const t = normalizedTime(nowMs, this.phaseStartMs, this.timing.fadeOutDurationMs);
        this.alpha = this.phaseStartAlpha * (1 - easeInOutCubic(t));
        if (t >= 1) {
          this.alpha = 0;
          this.phase = 'hidden';
          this.firstFramePending = true;
        }
        break;
      }
      case 'visible':
        this.alpha = 1;
        break;
      case 'hidden':
        this.alpha = 0;
        break;
    }
  }

  wantsFrame(nowMs: number): boolean {
    if (this.firstFramePending) {
      return true;
    }
    switch (this.phase) {
      case 'fadingIn':
      case 'fadingOut':
        return true;
      case 'visible':
        return !this.hovered && !this.dragging && nowMs < this.idleDeadlineMs;
      case 'hidden':
        return false;
    }
  }

  // markDrawn acknowledges the frame requested by the last phase change.
  markDrawn(): void {
    this.firstFramePending = false;
  }

  isVisible(): boolean {
    return this.alpha > VISIBLE_ALPHA_EPSILON;
  }

  private startFadeIn(nowMs: number): void {
    this.phase = 'fadingIn';
    this.phaseStartMs = nowMs;
    this.phaseStartAlpha = this.alpha;
    this.firstFramePending = true;
  }

  private startFadeOut(nowMs: number): void {
    this.phase = 'fadingOut';
    this.phaseStartMs = nowMs;
    this.phaseStartAlpha = this.alpha;
    this.firstFramePending = true;
  }
}
