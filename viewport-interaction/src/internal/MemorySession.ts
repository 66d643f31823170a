import type { Grid, InteractiveSession } from '../types';

export type MemorySessionOptions = {
  spawned?: boolean;
  onInput?: (data: Uint8Array) => void;
};

// MemorySession records input and redraw requests instead of talking to a process.
export class MemorySession implements InteractiveSession {
  readonly id: number;
  spawned: boolean;
  grid: Grid | null;
  readonly sent: Uint8Array[] = [];
  dirtyCount = 0;

  private onInput: ((data: Uint8Array) => void) | undefined;

  constructor(id: number, grid: Grid | null, options: MemorySessionOptions = {}) {
    this.id = id;
    this.grid = grid;
    this.spawned = options.spawned ?? true;
    this.onInput = options.onInput;
  }

  sendInput(data: Uint8Array): void {
    this.onInput?.(data);
    this.sent.push(data);
  }

  markDirty(): void {
    this.dirtyCount += 1;
  }

  // sentText decodes every recorded write one byte per character.
  sentText(): string {
    return this.sent.map(chunk => String.fromCharCode(...chunk)).join('');
  }
}
