import type { InteractionConfig, InteractiveSession, Logger, ViewMode } from '../types';
import { encodeMouseScroll, wantsMouseEvents } from '../input/mouseEncoding';
import { createScrollbarMetrics, maxScrollOffset, type ScrollbarMetrics } from '../scrollbar/geometry';
import { getDefaultInteractionConfig } from '../utils/config';
import { clamp } from '../utils/easing';
import { createInteractionError } from '../utils/errors';
import { noopLogger } from '../utils/logger';
import type { CellPosition } from './coordinates';
import { clearViewScroll, type SessionViewState } from './viewState';

type scroll_tuning = Pick<
  InteractionConfig,
  | 'linesPerTick'
  | 'scrollSensitivity'
  | 'maxScrollVelocity'
  | 'inertiaDecayConstant'
  | 'inertiaStopVelocity'
  | 'inertiaReferenceFps'
>;

const DEFAULT_TUNING: scroll_tuning = getDefaultInteractionConfig();

// wheelRowDelta converts a wheel report into signed rows, positive toward the live screen.
export const wheelRowDelta = (ticks: number, delta: number, linesPerTick = DEFAULT_TUNING.linesPerTick): number => {
  if (ticks !== 0) {
    return Math.trunc(ticks * linesPerTick);
  }
  return Math.trunc(delta * linesPerTick);
};

const syncViewport = (session: InteractiveSession, view: SessionViewState, nowMs: number): void => {
  const grid = session.grid;
  if (!grid) {
    return;
  }
  view.isViewingScrollback = !grid.isViewportActive();
  view.scrollbar.noteActivity(nowMs);
  session.markDirty();
};

// scrollSession applies a user scroll and feeds the momentum accumulator.
export const scrollSession = (
  session: InteractiveSession,
  view: SessionViewState,
  delta: number,
  nowMs: number,
  tuning: scroll_tuning = DEFAULT_TUNING
): void => {
  if (!session.spawned) {
    return;
  }

  view.lastScrollMs = nowMs;
  view.scrollRemainder = 0;
  view.inertiaAllowed = true;

  if (session.grid) {
    session.grid.scroll({ type: 'delta', rows: delta });
    syncViewport(session, view, nowMs);
  }

  view.scrollVelocity = clamp(
    view.scrollVelocity + delta * tuning.scrollSensitivity,
    -tuning.maxScrollVelocity,
    tuning.maxScrollVelocity
  );
};

// advanceScrollInertia moves the viewport by the distance the decaying velocity
// covers in dtSeconds. The integral form keeps total distance independent of
// how the time is sliced into frames; fractional rows carry over in scrollRemainder.
export const advanceScrollInertia = (
  session: InteractiveSession,
  view: SessionViewState,
  dtSeconds: number,
  nowMs: number,
  tuning: scroll_tuning = DEFAULT_TUNING
): void => {
  if (!session.spawned || !view.inertiaAllowed || view.scrollVelocity === 0 || view.lastScrollMs === null) {
    return;
  }
  if (dtSeconds <= 0) {
    return;
  }

  if (Math.abs(view.scrollVelocity) < tuning.inertiaStopVelocity) {
    view.scrollVelocity = 0;
    view.scrollRemainder = 0;
    return;
  }

  const k = tuning.inertiaDecayConstant;
  const decay = Math.exp(-k * dtSeconds);
  const travelSeconds = k > 0 ? (1 - decay) / k : dtSeconds;
  const amount = view.scrollVelocity * tuning.inertiaReferenceFps * travelSeconds + view.scrollRemainder;
  const rows = Math.trunc(amount);

  if (rows !== 0 && session.grid) {
    session.grid.scroll({ type: 'delta', rows });
    syncViewport(session, view, nowMs);
  }
  view.scrollRemainder = amount - rows;
  view.scrollVelocity *= decay;
};

// scrollbarMetricsFor reads the grid's scroll position as scrollbar metrics.
export const scrollbarMetricsFor = (session: InteractiveSession): ScrollbarMetrics | null => {
  const grid = session.grid;
  if (!session.spawned || !grid) {
    return null;
  }
  const bar = grid.scrollbar();
  return createScrollbarMetrics(bar.total, bar.offset, bar.len);
};

// applyScrollbarOffset jumps to an absolute offset chosen on the scrollbar and cancels momentum.
export const applyScrollbarOffset = (
  session: InteractiveSession,
  view: SessionViewState,
  metrics: ScrollbarMetrics,
  offset: number,
  nowMs: number
): void => {
  const grid = session.grid;
  if (!session.spawned || !grid) {
    return;
  }
  const target = Math.round(clamp(offset, 0, maxScrollOffset(metrics)));
  grid.scroll({ type: 'row', row: target });

  view.scrollVelocity = 0;
  view.scrollRemainder = 0;
  view.inertiaAllowed = false;
  view.lastScrollMs = nowMs;
  syncViewport(session, view, nowMs);
};

// shouldForwardWheel is true when the application asked for mouse reports and
// the user is looking at the live screen.
export const shouldForwardWheel = (session: InteractiveSession, view: SessionViewState, viewMode: ViewMode): boolean => {
  const grid = session.grid;
  if (viewMode !== 'full' || view.isViewingScrollback || !grid) {
    return false;
  }
  return wantsMouseEvents(grid.mouseTracking());
};

// forwardWheelToApplication sends one wheel report per row of delta. Returns how many were sent.
export const forwardWheelToApplication = (
  session: InteractiveSession,
  cell: CellPosition,
  rowDelta: number,
  logger: Logger = noopLogger
): number => {
  const grid = session.grid;
  if (!grid || rowDelta === 0) {
    return 0;
  }
  const direction = rowDelta < 0 ? 'up' : 'down';
  const report = encodeMouseScroll(direction, cell.col, cell.row, grid.mouseTracking().sgr);
  const count = Math.abs(rowDelta);
  for (let i = 0; i < count; i += 1) {
    try {
      session.sendInput(report);
    } catch (error) {
      const record = createInteractionError('passthrough', error, { session: session.id });
      logger.warn('[Scrolling] Failed to forward wheel event', { ...record });
      return i;
    }
  }
  return count;
};

// resetScrollIfNeeded returns a session viewing scrollback to the live screen.
export const resetScrollIfNeeded = (session: InteractiveSession, view: SessionViewState): void => {
  if (!view.isViewingScrollback) {
    return;
  }
  session.grid?.scroll({ type: 'active' });
  clearViewScroll(view);
  session.markDirty();
};
