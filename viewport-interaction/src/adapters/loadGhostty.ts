import { noopLogger } from '../utils/logger';
import type { InteractiveSession, Logger } from '../types';
import { GhosttyGrid } from './GhosttyGrid';

type ghostty_module = typeof import('ghostty-web');

export type GhosttyTerminal = import('ghostty-web').Terminal;
export type GhosttyTerminalOptions = import('ghostty-web').ITerminalOptions;

export type LoadedGhosttyTerminal = {
  terminal: GhosttyTerminal;
  grid: GhosttyGrid;
  fit: () => void;
  dispose: () => void;
};

// Dynamic imports avoid SSR issues and keep the WASM out of the main bundle.
let ghosttyModule: ghostty_module | null = null;
let ghosttyInitPromise: Promise<void> | null = null;

const loadGhosttyModule = async (logger: Logger): Promise<ghostty_module> => {
  if (typeof window === 'undefined') {
    throw new Error('ghostty-web can only be loaded in a browser environment');
  }

  const mod = ghosttyModule ?? (await import('ghostty-web'));
  ghosttyModule = mod;

  if (!ghosttyInitPromise) {
    logger.debug('[Ghostty] Initializing ghostty-web WASM');
    ghosttyInitPromise = mod.init().catch(error => {
      ghosttyInitPromise = null;
      throw error;
    });
  }

  await ghosttyInitPromise;
  return mod;
};

// loadGhosttyTerminal creates a ghostty-web terminal inside container, fits it
// and wraps it in a GhosttyGrid.
export const loadGhosttyTerminal = async (
  container: HTMLElement,
  options: GhosttyTerminalOptions = {},
  logger: Logger = noopLogger
): Promise<LoadedGhosttyTerminal> => {
  const { Terminal, FitAddon } = await loadGhosttyModule(logger);

  const terminal = new Terminal(options);
  const fitAddon = new FitAddon();
  terminal.loadAddon(fitAddon);
  terminal.open(container);

  const fit = () => {
    try {
      fitAddon.fit();
    } catch (error) {
      logger.warn('[Ghostty] Failed to fit terminal', {
        error: error instanceof Error ? error.message : String(error)
      });
    }
  };
  fit();

  logger.info('[Ghostty] Terminal ready', { cols: terminal.cols, rows: terminal.rows });

  return {
    terminal,
    grid: new GhosttyGrid(terminal),
    fit,
    dispose: () => {
      fitAddon.dispose();
      terminal.dispose();
    }
  };
};

export type GhosttySessionOptions = {
  onInput: (data: Uint8Array) => void;
  onDirty?: () => void;
};

// GhosttySession exposes a ghostty-backed grid to the interaction engine.
// Encoded mouse reports go to onInput, which normally writes them to the
// backing process. ghostty-web repaints on its own render loop, so dirty
// marks are only forwarded to onDirty.
export class GhosttySession implements InteractiveSession {
  readonly id: number;
  readonly spawned = true;
  readonly grid: GhosttyGrid;

  private readonly options: GhosttySessionOptions;

  constructor(id: number, grid: GhosttyGrid, options: GhosttySessionOptions) {
    this.id = id;
    this.grid = grid;
    this.options = options;
  }

  sendInput(data: Uint8Array): void {
    this.options.onInput(data);
  }

  markDirty(): void {
    this.options.onDirty?.();
  }
}
