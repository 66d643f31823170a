// @vitest-environment jsdom
import { beforeEach, describe, expect, it, vi } from 'vitest';

const ghosttyMocks = vi.hoisted(() => ({
  init: vi.fn<[], Promise<void>>(),
  fit: vi.fn(),
  open: vi.fn(),
  loadAddon: vi.fn(),
  dispose: vi.fn(),
  fitDispose: vi.fn()
}));

vi.mock('ghostty-web', () => {
  class Terminal {
    cols = 80;
    rows = 24;
    options: unknown;
    constructor(options: unknown) {
      this.options = options;
    }
    open = ghosttyMocks.open;
    loadAddon = ghosttyMocks.loadAddon;
    dispose = ghosttyMocks.dispose;
  }
  class FitAddon {
    fit = ghosttyMocks.fit;
    dispose = ghosttyMocks.fitDispose;
  }
  return { Terminal, FitAddon, init: ghosttyMocks.init };
});

const loadModule = async () => {
  vi.resetModules();
  return import('./loadGhostty');
};

describe('loadGhosttyTerminal', () => {
  beforeEach(() => {
    ghosttyMocks.init.mockReset();
    ghosttyMocks.init.mockResolvedValue(undefined);
    ghosttyMocks.fit.mockReset();
  });

  it('initializes the WASM once and opens a fitted terminal', async () => {
    const { loadGhosttyTerminal } = await loadModule();
    const container = document.createElement('div');

    const first = await loadGhosttyTerminal(container, { fontSize: 13 });
    await loadGhosttyTerminal(container);

    expect(ghosttyMocks.init).toHaveBeenCalledTimes(1);
    expect(ghosttyMocks.open).toHaveBeenCalledWith(container);
    expect(ghosttyMocks.fit).toHaveBeenCalledTimes(2);
    expect(first.grid.cols).toBe(80);
    expect(first.grid.rows).toBe(24);

    first.dispose();
    expect(ghosttyMocks.fitDispose).toHaveBeenCalled();
    expect(ghosttyMocks.dispose).toHaveBeenCalled();
  });

  it('retries initialization after a failure', async () => {
    const { loadGhosttyTerminal } = await loadModule();
    ghosttyMocks.init.mockRejectedValueOnce(new Error('wasm unavailable'));
    const container = document.createElement('div');

    await expect(loadGhosttyTerminal(container)).rejects.toThrow('wasm unavailable');
    await expect(loadGhosttyTerminal(container)).resolves.toHaveProperty('terminal');
    expect(ghosttyMocks.init).toHaveBeenCalledTimes(2);
  });

  it('logs and continues when fitting fails', async () => {
    const { loadGhosttyTerminal } = await loadModule();
    ghosttyMocks.fit.mockImplementation(() => {
      throw new Error('no size');
    });
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

    await loadGhosttyTerminal(document.createElement('div'), {}, logger);

    expect(logger.warn).toHaveBeenCalledWith('[Ghostty] Failed to fit terminal', { error: 'no size' });
  });
});

describe('GhosttySession', () => {
  it('forwards input and dirty marks to its callbacks', async () => {
    const { GhosttySession } = await loadModule();
    const { GhosttyGrid } = await import('./GhosttyGrid');
    const onInput = vi.fn();
    const onDirty = vi.fn();
    const grid = new GhosttyGrid({
      cols: 2,
      rows: 1,
      buffer: { active: { length: 1, viewportY: 0, getLine: () => undefined } },
      getViewportY: () => 0,
      scrollLines: vi.fn(),
      scrollToLine: vi.fn(),
      scrollToBottom: vi.fn(),
      select: vi.fn(),
      clearSelection: vi.fn(),
      getSelection: () => '',
      hasSelection: () => false,
      getMode: () => false
    });
    const session = new GhosttySession(4, grid, { onInput, onDirty });

    session.sendInput(new Uint8Array([27]));
    session.markDirty();

    expect(session.id).toBe(4);
    expect(onInput).toHaveBeenCalledWith(new Uint8Array([27]));
    expect(onDirty).toHaveBeenCalledTimes(1);
  });
});
