import { describe, expect, it, vi } from 'vitest';
import { MemoryGrid } from '../internal/MemoryGrid';
import { MemorySession } from '../internal/MemorySession';
import type { InteractionHost, Modifiers } from '../types';
import { noopLogger } from '../utils/logger';
import { ViewportInteractionEngine } from './InteractionEngine';

const NO_MODS: Modifiers = { open: false, shift: false, alt: false };
const OPEN_MOD: Modifiers = { open: true, shift: false, alt: false };

const makeHost = (overrides: Partial<InteractionHost> = {}): InteractionHost => ({
  nowMs: 1000,
  windowW: 800,
  windowH: 600,
  gridCols: 2,
  gridRows: 2,
  cellW: 400,
  cellH: 300,
  viewMode: 'full',
  focusedSession: 0,
  termCols: 40,
  termRows: 10,
  fontCellW: 10,
  fontCellH: 20,
  uiScale: 1,
  mouseOverUi: false,
  animatingRect: null,
  ...overrides
});

// Pixel position inside cell (col, row) with 8px padding and 10x20 cells.
const px = (col: number, row: number) => ({ x: 8 + col * 10 + 2, y: 8 + row * 20 + 5 });

const setup = (lines: string[]) => {
  const grid = new MemoryGrid({ cols: 40, rows: 10 });
  grid.writeLines(lines);
  const session = new MemorySession(0, grid);
  const onOpenUrl = vi.fn();
  const onFocusSession = vi.fn();
  const onCursorChange = vi.fn();
  const engine = new ViewportInteractionEngine([session], {
    handlers: { onOpenUrl, onFocusSession, onCursorChange }
  });
  return { grid, session, engine, onOpenUrl, onFocusSession, onCursorChange };
};

const down = (col: number, row: number, clicks = 1, modifiers = NO_MODS) => ({
  type: 'mouseDown' as const,
  ...px(col, row),
  button: 'left' as const,
  clicks,
  modifiers
});

const move = (col: number, row: number, modifiers = NO_MODS) => ({
  type: 'mouseMove' as const,
  ...px(col, row),
  modifiers
});

const up = { type: 'mouseUp' as const, x: 0, y: 0, button: 'left' as const };

const manyLines = (count: number) => Array.from({ length: count }, (_, i) => `row ${i}`);

describe('ViewportInteractionEngine selection', () => {
  it('selects the dragged span and stops dragging on release', () => {
    const { grid, engine } = setup(['zero', 'one', 'two', 'abcdefghijklmnop']);
    const host = makeHost();

    expect(engine.handleEvent(host, down(5, 3))).toBe('consumed');
    expect(engine.getView(0)?.selectionPending).toBe(true);

    engine.handleEvent(host, move(10, 3));
    expect(engine.getView(0)?.selectionDragging).toBe(true);

    expect(engine.handleEvent(host, up)).toBe('consumed');
    expect(engine.getView(0)?.selectionDragging).toBe(false);
    expect(grid.selectionRange?.start).toMatchObject({ x: 5, y: 3 });
    expect(grid.selectionRange?.end).toMatchObject({ x: 10, y: 3 });
    expect(engine.getSelectionText(0)).toBe('fghijk');
  });

  it('selects a word on double click and a line on triple click', () => {
    const { engine } = setup(['alpha beta_gamma delta']);
    const host = makeHost();

    engine.handleEvent(host, down(8, 0, 2));
    expect(engine.getSelectionText(0)).toBe('beta_gamma');

    engine.handleEvent(host, down(8, 0, 3));
    expect(engine.getSelectionText(0)).toBe('alpha beta_gamma delta');
  });

  it('autoscrolls toward history while dragging near the top edge', () => {
    const { grid, engine } = setup(manyLines(30));
    const host = makeHost();

    engine.handleEvent(host, down(5, 3));
    engine.handleEvent(host, move(10, 3));
    engine.handleEvent(host, move(10, 0));

    expect(grid.scrollbar().offset).toBe(19);
    expect(engine.getView(0)?.isViewingScrollback).toBe(true);
    expect(engine.getView(0)?.inertiaAllowed).toBe(false);
  });

  it('ignores presses in the padding', () => {
    const { engine } = setup(['text']);
    expect(engine.handleEvent(makeHost(), { ...down(0, 0), x: 2, y: 2 })).toBe('passThrough');
  });

  it('ends a selection on release even outside full view', () => {
    const { engine } = setup(['hello world']);
    engine.handleEvent(makeHost(), down(1, 0));

    expect(engine.handleEvent(makeHost({ viewMode: 'collapsing' }), up)).toBe('consumed');
    expect(engine.getView(0)?.selectionPending).toBe(false);
  });

  it('clears the selection on request', () => {
    const { grid, engine } = setup(['hello world']);
    engine.handleEvent(makeHost(), down(1, 0, 2));
    engine.clearSelection(0);
    expect(grid.selectionRange).toBeNull();
    expect(engine.getSelectionText(0)).toBeNull();
  });
});

describe('ViewportInteractionEngine links', () => {
  it('opens a link on modifier click instead of selecting', () => {
    const { engine, onOpenUrl } = setup(['visit https://example.test now']);
    expect(engine.handleEvent(makeHost(), down(10, 0, 1, OPEN_MOD))).toBe('consumed');
    expect(onOpenUrl).toHaveBeenCalledWith('https://example.test');
    expect(engine.getView(0)?.selectionPending).toBe(false);
  });

  it('begins a selection on modifier click away from links', () => {
    const { engine, onOpenUrl } = setup(['visit https://example.test now']);
    engine.handleEvent(makeHost(), down(2, 0, 1, OPEN_MOD));
    expect(onOpenUrl).not.toHaveBeenCalled();
    expect(engine.getView(0)?.selectionPending).toBe(true);
  });

  it('logs a failing opener without throwing', () => {
    const grid = new MemoryGrid({ cols: 40, rows: 10 });
    grid.writeLine('visit https://example.test now');
    const logger = { ...noopLogger, error: vi.fn() };
    const engine = new ViewportInteractionEngine([new MemorySession(0, grid)], {
      logger,
      handlers: {
        onOpenUrl: () => {
          throw new Error('no browser');
        }
      }
    });

    expect(engine.handleEvent(makeHost(), down(10, 0, 1, OPEN_MOD))).toBe('consumed');
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it('highlights the hovered link while the modifier is held', () => {
    const { engine, onCursorChange } = setup(['visit https://example.test now']);
    const host = makeHost();

    engine.handleEvent(host, move(10, 0, OPEN_MOD));
    expect(engine.getView(0)?.hoveredLinkStart).toMatchObject({ x: 6, y: 0 });
    expect(engine.getView(0)?.hoveredLinkEnd).toMatchObject({ x: 25, y: 0 });
    expect(engine.getCursor()).toBe('pointer');

    engine.handleEvent(host, move(10, 0));
    expect(engine.getView(0)?.hoveredLinkStart).toBeNull();
    expect(engine.getCursor()).toBe('text');
    expect(onCursorChange.mock.calls).toEqual([['pointer'], ['text']]);
  });
});

describe('ViewportInteractionEngine wheel', () => {
  it('forwards wheel reports to applications that track the mouse', () => {
    const { grid, session, engine } = setup(['$ top']);
    grid.setMouseTracking({ normal: true, sgr: true });

    const event = { type: 'wheel' as const, ...px(4, 2), ticks: -3, delta: 0, source: 'mouse' as const };
    expect(engine.handleEvent(makeHost(), event)).toBe('consumed');
    expect(session.sentText()).toBe('\x1b[<64;5;3M'.repeat(3));
    expect(grid.isViewportActive()).toBe(true);
  });

  it('scrolls locally and disables momentum for touch input', () => {
    const { grid, engine } = setup(manyLines(30));
    const event = { type: 'wheel' as const, ...px(4, 2), ticks: -3, delta: 0, source: 'touch' as const };

    engine.handleEvent(makeHost(), event);
    expect(grid.scrollbar().offset).toBe(17);
    expect(engine.getView(0)?.isViewingScrollback).toBe(true);
    expect(engine.getView(0)?.inertiaAllowed).toBe(false);
  });

  it('coasts after a mouse wheel scroll until momentum runs out', () => {
    const { grid, engine } = setup(manyLines(200));
    let host = makeHost();

    engine.handleEvent(host, { type: 'wheel', ...px(4, 2), ticks: -10, delta: 0, source: 'mouse' });
    expect(grid.scrollbar().offset).toBe(180);
    expect(engine.wantsFrame(host)).toBe(true);

    engine.update(host);
    for (let i = 0; i < 120; i += 1) {
      host = makeHost({ nowMs: host.nowMs + 16 });
      engine.update(host);
    }

    expect(grid.scrollbar().offset).toBeLessThan(180);
    expect(engine.getView(0)?.scrollVelocity).toBe(0);
  });
});

describe('ViewportInteractionEngine scrollbar', () => {
  // 30 rows of content in a 10-row viewport: thumb is 192px tall at y=396.
  it('drags the thumb to scroll', () => {
    const { grid, engine } = setup(manyLines(30));
    const host = makeHost();

    expect(engine.scrollbarLayout(host, 0)?.thumbRect).toEqual({ x: 777, y: 396, w: 10, h: 192 });

    expect(engine.handleEvent(host, { ...down(0, 0), x: 780, y: 400 })).toBe('consumed');
    expect(engine.getView(0)?.scrollbar.dragging).toBe(true);

    expect(engine.handleEvent(host, { type: 'mouseMove', x: 500, y: 16, modifiers: NO_MODS })).toBe('consumed');
    expect(grid.scrollbar().offset).toBe(0);
    expect(engine.getView(0)?.isViewingScrollback).toBe(true);

    expect(engine.handleEvent(host, up)).toBe('consumed');
    expect(engine.getView(0)?.scrollbar.dragging).toBe(false);
  });

  it('jumps when the track is clicked', () => {
    const { grid, engine } = setup(manyLines(30));
    const host = makeHost();
    expect(engine.handleEvent(host, { ...down(0, 0), x: 780, y: 12 })).toBe('consumed');
    expect(grid.scrollbar().offset).toBe(0);
    expect(engine.getView(0)?.inertiaAllowed).toBe(false);
    expect(engine.getView(0)?.scrollbar.dragging).toBe(false);

    engine.handleEvent(host, { type: 'mouseMove', x: 780, y: 400, modifiers: NO_MODS });
    expect(grid.scrollbar().offset).toBe(0);
  });

  it('shows the pointer cursor over the scrollbar', () => {
    const { engine } = setup(manyLines(30));
    engine.handleEvent(makeHost(), { type: 'mouseMove', x: 780, y: 400, modifiers: NO_MODS });
    expect(engine.getCursor()).toBe('pointer');
    expect(engine.getView(0)?.scrollbar.hovered).toBe(true);
  });
});

describe('ViewportInteractionEngine view modes and state', () => {
  it('focuses the clicked slot in grid view', () => {
    const sessions = [0, 1, 2].map(id => new MemorySession(id, new MemoryGrid({ cols: 40, rows: 10 })));
    const onFocusSession = vi.fn();
    const engine = new ViewportInteractionEngine(sessions, { handlers: { onFocusSession } });
    const host = makeHost({ viewMode: 'grid' });

    expect(engine.handleEvent(host, { ...down(0, 0), x: 450, y: 100 })).toBe('consumed');
    expect(onFocusSession).toHaveBeenCalledWith(1);

    expect(engine.handleEvent(host, { ...down(0, 0), x: 450, y: 400 })).toBe('passThrough');
    expect(onFocusSession).toHaveBeenCalledTimes(1);
  });

  it('runs the attention wave for its configured duration', () => {
    const { engine } = setup(['x']);
    engine.setAttention(0, true, 1000);

    expect(engine.wantsFrame(makeHost())).toBe(true);
    expect(engine.attentionWaveProgress(0, 1200)).toBe(0.5);

    engine.update(makeHost({ nowMs: 1400 }));
    expect(engine.getView(0)?.waveStartMs).toBeNull();
    expect(engine.getView(0)?.attention).toBe(true);
    expect(engine.wantsFrame(makeHost({ nowMs: 1400 }))).toBe(false);
  });

  it('resets view state and returns scrolled sessions to the live screen', () => {
    const { grid, engine } = setup(manyLines(30));
    engine.setStatus(0, 'running');
    engine.handleEvent(makeHost(), { type: 'wheel', ...px(1, 1), ticks: -2, delta: 0, source: 'mouse' });

    engine.resetScrollIfNeeded(0);
    expect(grid.isViewportActive()).toBe(true);
    expect(engine.getView(0)?.isViewingScrollback).toBe(false);

    engine.resetView(0);
    expect(engine.getView(0)?.status).toBe('idle');
    expect(engine.getView(0)?.scrollbar.phase).toBe('hidden');
  });

  it('keeps view state for sessions that survive a list update', () => {
    const first = new MemorySession(7, new MemoryGrid({ cols: 4, rows: 2 }));
    const engine = new ViewportInteractionEngine([first]);
    engine.setStatus(0, 'done');

    engine.setSessions([first, new MemorySession(8, null)]);
    expect(engine.getView(0)?.status).toBe('done');
    expect(engine.getView(1)?.status).toBe('idle');

    engine.setSessions([new MemorySession(9, null)]);
    expect(engine.getView(0)?.status).toBe('idle');
    expect(engine.getView(1)).toBeNull();
  });
});
