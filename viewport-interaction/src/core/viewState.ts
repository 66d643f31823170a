import type { GridPin, ScrollbarConfig, SessionStatus } from '../types';
import { ScrollbarState } from '../scrollbar/ScrollbarState';

// SessionViewState is the per-session interaction state the engine owns.
// Invariants: selectionDragging implies !selectionPending, and
// selectionPending implies selectionAnchor is set.
export interface SessionViewState {
  status: SessionStatus;
  attention: boolean;
  waveStartMs: number | null;
  isViewingScrollback: boolean;
  // Rows per reference frame; positive scrolls toward the live screen.
  scrollVelocity: number;
  scrollRemainder: number;
  lastScrollMs: number | null;
  inertiaAllowed: boolean;
  selectionAnchor: GridPin | null;
  selectionDragging: boolean;
  selectionPending: boolean;
  hoveredLinkStart: GridPin | null;
  hoveredLinkEnd: GridPin | null;
  scrollbar: ScrollbarState;
}

export const createSessionViewState = (scrollbar: Partial<ScrollbarConfig> = {}): SessionViewState => ({
  status: 'idle',
  attention: false,
  waveStartMs: null,
  isViewingScrollback: false,
  scrollVelocity: 0,
  scrollRemainder: 0,
  lastScrollMs: null,
  inertiaAllowed: true,
  selectionAnchor: null,
  selectionDragging: false,
  selectionPending: false,
  hoveredLinkStart: null,
  hoveredLinkEnd: null,
  scrollbar: new ScrollbarState(scrollbar)
});

export const clearViewSelection = (view: SessionViewState): void => {
  view.selectionAnchor = null;
  view.selectionDragging = false;
  view.selectionPending = false;
};

export const clearViewHover = (view: SessionViewState): void => {
  view.hoveredLinkStart = null;
  view.hoveredLinkEnd = null;
};

export const clearViewScroll = (view: SessionViewState): void => {
  view.isViewingScrollback = false;
  view.scrollVelocity = 0;
  view.scrollRemainder = 0;
  view.lastScrollMs = null;
  view.inertiaAllowed = true;
};

export const resetViewState = (view: SessionViewState): void => {
  view.status = 'idle';
  view.attention = false;
  view.waveStartMs = null;
  clearViewScroll(view);
  clearViewSelection(view);
  clearViewHover(view);
  view.scrollbar.hideNow();
};
