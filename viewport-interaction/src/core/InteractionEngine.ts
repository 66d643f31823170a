import type {
  CursorKind,
  EventDisposition,
  GridPin,
  InteractionComponent,
  InteractionConfig,
  InteractionConfigOverrides,
  InteractionEvent,
  InteractionEventHandlers,
  InteractionHost,
  InteractiveSession,
  Logger,
  Modifiers,
  MouseButton,
  SessionStatus
} from '../types';
import { matchLinkAtPin, linkAtPin } from '../links/linkMatcher';
import {
  computeScrollbarLayout,
  hitTestScrollbar,
  offsetForDrag,
  offsetForTrackClick,
  type ScrollbarLayout,
  type ScrollbarMetrics
} from '../scrollbar/geometry';
import { getDefaultInteractionConfig, normalizeInteractionConfig } from '../utils/config';
import { createInteractionError } from '../utils/errors';
import { noopLogger } from '../utils/logger';
import { cellAt, contentRect, pinAt, pinsEqual, type CellPosition } from './coordinates';
import { beginSelection, edgeAutoscrollDirection, endSelection, handleSelectionMotion, selectLine, selectWord } from './selection';
import {
  advanceScrollInertia,
  applyScrollbarOffset,
  forwardWheelToApplication,
  resetScrollIfNeeded,
  scrollSession,
  scrollbarMetricsFor,
  shouldForwardWheel,
  wheelRowDelta
} from './scrolling';
import { gridSlotAt, hoveredSession, sessionRect } from './sessionLayout';
import { createSessionViewState, resetViewState, type SessionViewState } from './viewState';

export type ViewportInteractionEngineOptions = {
  config?: InteractionConfigOverrides;
  handlers?: InteractionEventHandlers;
  logger?: Logger;
};

type scrollbar_context = {
  session: InteractiveSession;
  view: SessionViewState;
  metrics: ScrollbarMetrics;
  layout: ScrollbarLayout;
};

// ViewportInteractionEngine routes pointer and wheel input to selection,
// link, scrolling and scrollbar handling for a set of terminal sessions.
// Every Grid call happens inside handleEvent/update, on the caller's thread.
export class ViewportInteractionEngine implements InteractionComponent {
  private sessions: InteractiveSession[] = [];
  private views: SessionViewState[] = [];
  private config: InteractionConfig;
  private handlers: InteractionEventHandlers;
  private logger: Logger;

  private cursor: CursorKind = 'arrow';
  private lastUpdateMs: number | null = null;
  private scrollbarDragIndex: number | null = null;

  constructor(sessions: InteractiveSession[], options: ViewportInteractionEngineOptions = {}) {
    this.config = normalizeInteractionConfig(getDefaultInteractionConfig(options.config));
    this.handlers = options.handlers ?? {};
    this.logger = options.logger ?? noopLogger;
    this.setSessions(sessions);
  }

  // setSessions replaces the session list. View state survives for sessions
  // that keep their index and id.
  setSessions(sessions: InteractiveSession[]): void {
    this.views = sessions.map((session, index) => {
      const previous = this.sessions[index];
      const view = this.views[index];
      if (previous && view && previous.id === session.id) {
        return view;
      }
      return createSessionViewState(this.config.scrollbar);
    });
    this.sessions = [...sessions];
    if (this.scrollbarDragIndex !== null && this.scrollbarDragIndex >= sessions.length) {
      this.scrollbarDragIndex = null;
    }
  }

  setHandlers(handlers: InteractionEventHandlers): void {
    this.handlers = handlers;
  }

  getConfig(): Readonly<InteractionConfig> {
    return this.config;
  }

  getView(index: number): SessionViewState | null {
    return this.views[index] ?? null;
  }

  getCursor(): CursorKind {
    return this.cursor;
  }

  resetView(index: number): void {
    const entry = this.entry(index);
    if (!entry) {
      return;
    }
    resetViewState(entry.view);
    entry.session.grid?.clearSelection();
    entry.session.markDirty();
    if (this.scrollbarDragIndex === index) {
      this.scrollbarDragIndex = null;
    }
  }

  clearSelection(index: number): void {
    const entry = this.entry(index);
    if (!entry) {
      return;
    }
    entry.session.grid?.clearSelection();
    endSelection(entry.view);
    entry.session.markDirty();
  }

  setStatus(index: number, status: SessionStatus): void {
    const view = this.views[index];
    if (view) {
      view.status = status;
    }
  }

  // setAttention flags a session and starts its attention wave.
  setAttention(index: number, attention: boolean, nowMs: number): void {
    const entry = this.entry(index);
    if (!entry) {
      return;
    }
    entry.view.attention = attention;
    entry.view.waveStartMs = attention ? nowMs : null;
    entry.session.markDirty();
  }

  // attentionWaveProgress returns 0..1 while the wave runs and null otherwise.
  attentionWaveProgress(index: number, nowMs: number): number | null {
    const view = this.views[index];
    if (!view || view.waveStartMs === null || this.config.attentionWaveMs <= 0) {
      return null;
    }
    const elapsed = nowMs - view.waveStartMs;
    if (elapsed < 0 || elapsed >= this.config.attentionWaveMs) {
      return null;
    }
    return elapsed / this.config.attentionWaveMs;
  }

  resetScrollIfNeeded(index: number): void {
    const entry = this.entry(index);
    if (entry) {
      resetScrollIfNeeded(entry.session, entry.view);
    }
  }

  getSelectionText(index: number): string | null {
    const grid = this.sessions[index]?.grid;
    if (!grid) {
      return null;
    }
    try {
      return grid.selectedText();
    } catch (error) {
      this.logger.warn('[ViewportInteraction] Failed to read selection', { ...createInteractionError('stale_pin', error) });
      return null;
    }
  }

  // scrollbarLayout exposes where the scrollbar of a session is drawn this frame.
  scrollbarLayout(host: InteractionHost, index: number): ScrollbarLayout | null {
    return this.scrollbarContext(host, index)?.layout ?? null;
  }

  markFrameDrawn(): void {
    for (const view of this.views) {
      view.scrollbar.markDrawn();
    }
  }

  handleEvent(host: InteractionHost, event: InteractionEvent): EventDisposition {
    switch (event.type) {
      case 'mouseDown':
        return this.handleMouseDown(host, event.x, event.y, event.button, event.clicks, event.modifiers);
      case 'mouseUp':
        return this.handleMouseUp(host, event.button);
      case 'mouseMove':
        return this.handleMouseMove(host, event.x, event.y, event.modifiers);
      case 'wheel':
        return this.handleWheel(host, event);
    }
  }

  update(host: InteractionHost): void {
    const now = host.nowMs;
    const dtSeconds = this.lastUpdateMs === null ? 0 : Math.max(0, (now - this.lastUpdateMs) / 1000);
    this.lastUpdateMs = now;

    this.sessions.forEach((session, index) => {
      const view = this.views[index];
      advanceScrollInertia(session, view, dtSeconds, now, this.config);
      view.scrollbar.update(now);
      if (view.waveStartMs !== null && now - view.waveStartMs >= this.config.attentionWaveMs) {
        view.waveStartMs = null;
        session.markDirty();
      }
    });
  }

  wantsFrame(host: InteractionHost): boolean {
    return this.views.some(view => {
      if (view.scrollVelocity !== 0 && view.inertiaAllowed) {
        return true;
      }
      if (view.waveStartMs !== null) {
        return true;
      }
      return view.scrollbar.wantsFrame(host.nowMs);
    });
  }

  private entry(index: number): { session: InteractiveSession; view: SessionViewState } | null {
    const session = this.sessions[index];
    const view = this.views[index];
    if (!session || !view) {
      return null;
    }
    return { session, view };
  }

  private setCursor(cursor: CursorKind): void {
    if (this.cursor === cursor) {
      return;
    }
    this.cursor = cursor;
    this.handlers.onCursorChange?.(cursor);
  }

  private cellFromMouse(host: InteractionHost, index: number, x: number, y: number): CellPosition | null {
    const grid = this.sessions[index]?.grid;
    const rect = sessionRect(host, index);
    if (!grid || !rect) {
      return null;
    }
    return cellAt(
      x,
      y,
      rect,
      host.fontCellW,
      host.fontCellH,
      Math.min(host.termCols, grid.cols),
      Math.min(host.termRows, grid.rows),
      this.config.terminalPadding
    );
  }

  private pinFromMouse(host: InteractionHost, index: number, x: number, y: number): GridPin | null {
    const grid = this.sessions[index]?.grid;
    const view = this.views[index];
    const cell = this.cellFromMouse(host, index, x, y);
    if (!grid || !view || !cell) {
      return null;
    }
    return pinAt(grid, view.isViewingScrollback, cell);
  }

  private scrollbarContext(host: InteractionHost, index: number): scrollbar_context | null {
    const entry = this.entry(index);
    if (!entry) {
      return null;
    }
    const metrics = scrollbarMetricsFor(entry.session);
    const rect = sessionRect(host, index);
    const content = rect ? contentRect(rect, this.config.terminalPadding) : null;
    if (!metrics || !content) {
      return null;
    }
    const layout = computeScrollbarLayout(content, metrics, host.uiScale, this.config.scrollbar);
    if (!layout) {
      return null;
    }
    return { ...entry, metrics, layout };
  }

  private handleScrollbarMouseDown(host: InteractionHost, x: number, y: number): boolean {
    const index = hoveredSession(host, x, y, this.sessions.length);
    if (index === null) {
      return false;
    }
    const context = this.scrollbarContext(host, index);
    if (!context) {
      return false;
    }

    const target = hitTestScrollbar(context.layout, x, y);
    if (target === 'none') {
      return false;
    }

    // A track click only jumps; dragging starts from the thumb.
    if (target === 'track') {
      const offset = offsetForTrackClick(context.layout, context.metrics, y);
      applyScrollbarOffset(context.session, context.view, context.metrics, offset, host.nowMs);
    } else {
      context.view.scrollbar.beginDrag(context.layout, y, host.nowMs);
      this.scrollbarDragIndex = index;
    }
    this.setCursor('pointer');
    return true;
  }

  private handleScrollbarDrag(host: InteractionHost, y: number): boolean {
    const index = this.scrollbarDragIndex;
    if (index === null) {
      return false;
    }
    const context = this.scrollbarContext(host, index);
    if (context) {
      const offset = offsetForDrag(context.view.scrollbar, context.layout, context.metrics, y);
      applyScrollbarOffset(context.session, context.view, context.metrics, offset, host.nowMs);
    }
    this.setCursor('pointer');
    return true;
  }

  // updateScrollbarHover marks the scrollbar under the pointer as hovered and
  // every other one as not. Returns whether the pointer is over a scrollbar.
  private updateScrollbarHover(host: InteractionHost, x: number, y: number): boolean {
    const hoveredIndex = hoveredSession(host, x, y, this.sessions.length);
    let overScrollbar = false;
    this.views.forEach((view, index) => {
      let hovered = false;
      if (index === hoveredIndex && !host.mouseOverUi) {
        const context = this.scrollbarContext(host, index);
        hovered = context !== null && hitTestScrollbar(context.layout, x, y) !== 'none';
      }
      view.scrollbar.setHovered(hovered, host.nowMs);
      overScrollbar = overScrollbar || hovered;
    });
    return overScrollbar;
  }

  private handleMouseDown(
    host: InteractionHost,
    x: number,
    y: number,
    button: MouseButton,
    clicks: number,
    modifiers: Modifiers
  ): EventDisposition {
    if (button === 'left' && !host.mouseOverUi && this.handleScrollbarMouseDown(host, x, y)) {
      return 'consumed';
    }

    if (host.viewMode === 'grid') {
      const slot = gridSlotAt(host, x, y);
      if (slot === null || slot >= this.sessions.length) {
        return 'passThrough';
      }
      this.handlers.onFocusSession?.(slot);
      return 'consumed';
    }

    if (host.viewMode !== 'full' || button !== 'left') {
      return 'passThrough';
    }

    const index = host.focusedSession;
    const entry = this.entry(index);
    if (!entry || !entry.session.spawned || !entry.session.grid) {
      return 'passThrough';
    }
    const { session, view } = entry;
    const grid = entry.session.grid;

    const pin = this.pinFromMouse(host, index, x, y);
    if (!pin) {
      return 'passThrough';
    }

    if (clicks >= 3) {
      selectLine(session, view, pin, this.logger);
    } else if (clicks === 2) {
      selectWord(session, view, pin, this.logger);
    } else if (modifiers.open && !view.selectionDragging) {
      const url = linkAtPin(grid, pin, view.isViewingScrollback, this.logger);
      if (url) {
        this.openUrl(url);
      } else {
        beginSelection(session, view, pin);
      }
    } else {
      beginSelection(session, view, pin);
    }
    return 'consumed';
  }

  private handleMouseUp(host: InteractionHost, button: MouseButton): EventDisposition {
    if (button !== 'left') {
      return 'passThrough';
    }

    let handled = false;
    if (this.scrollbarDragIndex !== null) {
      this.views[this.scrollbarDragIndex]?.scrollbar.endDrag(host.nowMs);
      this.scrollbarDragIndex = null;
      handled = true;
    }

    for (const view of this.views) {
      if (view.selectionPending || view.selectionDragging) {
        endSelection(view);
        handled = true;
      }
    }

    return handled || host.viewMode === 'full' ? 'consumed' : 'passThrough';
  }

  private handleMouseMove(host: InteractionHost, x: number, y: number, modifiers: Modifiers): EventDisposition {
    if (this.handleScrollbarDrag(host, y)) {
      return 'consumed';
    }

    const overScrollbar = this.updateScrollbarHover(host, x, y);

    if (host.viewMode !== 'full') {
      this.setCursor(overScrollbar ? 'pointer' : 'arrow');
      return 'passThrough';
    }

    const index = host.focusedSession;
    const entry = this.entry(index);
    if (!entry || !entry.session.spawned || !entry.session.grid) {
      this.setCursor('arrow');
      return 'passThrough';
    }
    const { session, view } = entry;
    const grid = entry.session.grid;

    if (view.selectionDragging) {
      const rect = sessionRect(host, index);
      const direction = rect ? edgeAutoscrollDirection(y, rect, this.config.selectionEdgeThreshold) : 0;
      if (direction !== 0) {
        scrollSession(session, view, direction * this.config.selectionEdgeScrollRows, host.nowMs, this.config);
        view.inertiaAllowed = false;
      }
    }

    const pin = this.pinFromMouse(host, index, x, y);
    if (pin && (view.selectionPending || view.selectionDragging)) {
      handleSelectionMotion(session, view, pin, this.logger);
    }

    if (overScrollbar) {
      this.clearLinkHover(session, view);
      this.setCursor('pointer');
      return 'consumed';
    }

    if (pin && modifiers.open && !host.mouseOverUi && !view.selectionDragging) {
      const match = matchLinkAtPin(grid, pin, view.isViewingScrollback, this.logger);
      if (match) {
        if (!pinsEqual(view.hoveredLinkStart, match.startPin) || !pinsEqual(view.hoveredLinkEnd, match.endPin)) {
          view.hoveredLinkStart = match.startPin;
          view.hoveredLinkEnd = match.endPin;
          session.markDirty();
        }
        this.setCursor('pointer');
        return 'consumed';
      }
    }

    this.clearLinkHover(session, view);
    this.setCursor(pin && !host.mouseOverUi ? 'text' : 'arrow');
    return 'consumed';
  }

  private handleWheel(host: InteractionHost, event: Extract<InteractionEvent, { type: 'wheel' }>): EventDisposition {
    const index = hoveredSession(host, event.x, event.y, this.sessions.length);
    const entry = index === null ? null : this.entry(index);
    if (index === null || !entry || !entry.session.spawned) {
      return 'passThrough';
    }
    const { session, view } = entry;

    const rowDelta = wheelRowDelta(event.ticks, event.delta, this.config.linesPerTick);
    if (rowDelta === 0) {
      return 'consumed';
    }

    if (shouldForwardWheel(session, view, host.viewMode)) {
      const cell = this.cellFromMouse(host, index, event.x, event.y);
      if (cell) {
        forwardWheelToApplication(session, cell, rowDelta, this.logger);
        return 'consumed';
      }
    }

    scrollSession(session, view, rowDelta, host.nowMs, this.config);
    if (event.source === 'touch') {
      view.inertiaAllowed = false;
    }
    return 'consumed';
  }

  private clearLinkHover(session: InteractiveSession, view: SessionViewState): void {
    if (view.hoveredLinkStart === null && view.hoveredLinkEnd === null) {
      return;
    }
    view.hoveredLinkStart = null;
    view.hoveredLinkEnd = null;
    session.markDirty();
  }

  private openUrl(url: string): void {
    try {
      this.handlers.onOpenUrl?.(url);
    } catch (error) {
      const record = createInteractionError('open_url', error, { url });
      this.logger.error('[ViewportInteraction] Failed to open url', { ...record });
    }
  }
}
