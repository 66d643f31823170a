import type {
  CellWidth,
  Grid,
  GridCell,
  GridPin,
  GridPoint,
  GridRowFlags,
  GridScrollbar,
  MouseTrackingModes,
  PointSpace,
  ScrollTarget
} from '../types';

// Structural slices of the ghostty-web Terminal the grid reads. A real
// `Terminal` satisfies them, and tests can hand in small fakes.
export interface GhosttyCellLike {
  getCode(): number;
  getWidth(): number;
  getHyperlinkId(): number;
}

export interface GhosttyLineLike {
  readonly length: number;
  readonly isWrapped: boolean;
  getCell(x: number): GhosttyCellLike | undefined;
}

export interface GhosttyBufferLike {
  readonly length: number;
  readonly viewportY: number;
  getLine(y: number): GhosttyLineLike | undefined;
}

export interface GhosttyTerminalLike {
  readonly cols: number;
  readonly rows: number;
  readonly buffer: { readonly active: GhosttyBufferLike };
  wasmTerm?: { getHyperlinkUri(hyperlinkId: number): string | null };
  getViewportY(): number;
  scrollLines(amount: number): void;
  scrollToLine(line: number): void;
  scrollToBottom(): void;
  select(column: number, row: number, length: number): void;
  clearSelection(): void;
  getSelection(): string;
  hasSelection(): boolean;
  getMode(mode: number, isAnsi?: boolean): boolean;
}

// DEC private modes that request mouse reports.
const MODE_X10 = 9;
const MODE_NORMAL = 1000;
const MODE_BUTTON = 1002;
const MODE_ANY = 1003;
const MODE_SGR = 1006;

const PIN_NODE = 1;

// GhosttyGrid adapts a ghostty-web terminal to Grid. Pins address lines
// absolutely from the top of the active buffer (0 = oldest scrollback line).
// ghostty-web itself counts the viewport position back from the bottom.
export class GhosttyGrid implements Grid {
  private readonly terminal: GhosttyTerminalLike;

  constructor(terminal: GhosttyTerminalLike) {
    this.terminal = terminal;
  }

  get cols(): number {
    return this.terminal.cols;
  }

  get rows(): number {
    return this.terminal.rows;
  }

  pin(point: GridPoint): GridPin | null {
    if (point.x < 0 || point.x >= this.cols || point.y < 0 || point.y >= this.rows) {
      return null;
    }
    const y = this.spaceTop(point.space) + point.y;
    if (y < 0 || y >= this.buffer().length) {
      return null;
    }
    return { node: PIN_NODE, x: point.x, y };
  }

  pointFromPin(space: PointSpace, pin: GridPin): { x: number; y: number } | null {
    if (!this.isLive(pin)) {
      return null;
    }
    const y = pin.y - this.spaceTop(space);
    if (y < 0 || y >= this.rows) {
      return null;
    }
    return { x: pin.x, y };
  }

  cell(point: GridPoint): GridCell | null {
    const pin = this.pin(point);
    if (!pin) {
      return null;
    }
    const line = this.buffer().getLine(pin.y);
    if (!line) {
      return null;
    }
    return this.readCell(line, pin.x);
  }

  rowFlags(pin: GridPin): GridRowFlags | null {
    if (!this.isLive(pin)) {
      return null;
    }
    const buffer = this.buffer();
    const line = buffer.getLine(pin.y);
    if (!line) {
      return null;
    }
    const previous = pin.y > 0 ? buffer.getLine(pin.y - 1) : undefined;
    return { wrap: line.isWrapped, wrapContinuation: previous?.isWrapped ?? false };
  }

  hyperlinkUri(id: number): string | null {
    if (id === 0) {
      return null;
    }
    return this.terminal.wasmTerm?.getHyperlinkUri(id) ?? null;
  }

  scroll(target: ScrollTarget): void {
    switch (target.type) {
      case 'delta':
        if (target.rows !== 0) {
          this.terminal.scrollLines(target.rows);
        }
        break;
      case 'row': {
        // scrollToLine takes lines scrolled back from the bottom.
        const activeTop = this.activeTop();
        this.terminal.scrollToLine(activeTop - Math.min(activeTop, Math.max(0, target.row)));
        break;
      }
      case 'active':
        this.terminal.scrollToBottom();
        break;
    }
  }

  isViewportActive(): boolean {
    return this.scrolledBack() === 0;
  }

  // Block selection is not offered by ghostty-web; the range is applied
  // linearly. ghostty-web selects in viewport rows, so the range is clipped
  // to the rows currently on screen.
  select(anchor: GridPin, head: GridPin, _block: boolean): void {
    this.assertLive(anchor);
    this.assertLive(head);
    const [start, end] = orderPins(anchor, head);
    const top = this.spaceTop('viewport');
    const bottom = top + this.rows - 1;
    if (end.y < top || start.y > bottom) {
      this.terminal.clearSelection();
      return;
    }

    const from = start.y < top ? { x: 0, y: 0 } : { x: start.x, y: start.y - top };
    const to = end.y > bottom ? { x: this.cols - 1, y: this.rows - 1 } : { x: end.x, y: end.y - top };
    const length = (to.y - from.y) * this.cols + (to.x - from.x) + 1;
    this.terminal.select(from.x, from.y, length);
  }

  clearSelection(): void {
    this.terminal.clearSelection();
  }

  selectionString(start: GridPin, end: GridPin, options: { trim: boolean }): string {
    this.assertLive(start);
    this.assertLive(end);
    const [from, to] = orderPins(start, end);
    const buffer = this.buffer();

    let out = '';
    for (let y = from.y; y <= to.y; y += 1) {
      const line = buffer.getLine(y);
      if (!line) {
        break;
      }
      const x0 = y === from.y ? from.x : 0;
      const x1 = y === to.y ? to.x : this.cols - 1;
      let segment = '';
      for (let x = x0; x <= x1; x += 1) {
        const cell = this.readCell(line, x);
        if (!cell || cell.wide === 'spacer_tail' || cell.wide === 'spacer_head') {
          continue;
        }
        segment += cell.codepoint === 0 ? ' ' : String.fromCodePoint(cell.codepoint);
      }
      out += options.trim && !line.isWrapped ? segment.trimEnd() : segment;
      if (y < to.y && !line.isWrapped) {
        out += '\n';
      }
    }
    return out;
  }

  selectedText(): string | null {
    if (!this.terminal.hasSelection()) {
      return null;
    }
    return this.terminal.getSelection();
  }

  scrollbar(): GridScrollbar {
    return {
      total: Math.max(this.buffer().length, this.rows),
      offset: Math.max(0, this.spaceTop('viewport')),
      len: this.rows
    };
  }

  mouseTracking(): MouseTrackingModes {
    const mode = (value: number) => this.terminal.getMode(value, false);
    return {
      x10: mode(MODE_X10),
      normal: mode(MODE_NORMAL),
      button: mode(MODE_BUTTON),
      any: mode(MODE_ANY),
      sgr: mode(MODE_SGR)
    };
  }

  private buffer(): GhosttyBufferLike {
    return this.terminal.buffer.active;
  }

  private activeTop(): number {
    return Math.max(0, this.buffer().length - this.rows);
  }

  // Smooth scrolling reports fractional offsets; the grid snaps to whole rows.
  private scrolledBack(): number {
    return Math.max(0, Math.floor(this.terminal.getViewportY()));
  }

  private spaceTop(space: PointSpace): number {
    const activeTop = this.activeTop();
    return space === 'viewport' ? Math.max(0, activeTop - this.scrolledBack()) : activeTop;
  }

  private readCell(line: GhosttyLineLike, x: number): GridCell | null {
    const cell = line.getCell(x);
    if (!cell) {
      return null;
    }
    return { codepoint: cell.getCode(), wide: this.widthOf(line, x, cell), hyperlinkId: cell.getHyperlinkId() };
  }

  private widthOf(line: GhosttyLineLike, x: number, cell: GhosttyCellLike): CellWidth {
    const width = cell.getWidth();
    if (width === 2) {
      return 'wide';
    }
    if (width !== 0) {
      return 'narrow';
    }
    if (x > 0 && line.getCell(x - 1)?.getWidth() === 2) {
      return 'spacer_tail';
    }
    if (x === this.cols - 1 && line.isWrapped) {
      return 'spacer_head';
    }
    return 'narrow';
  }

  private isLive(pin: GridPin): boolean {
    return pin.node === PIN_NODE && pin.y >= 0 && pin.y < this.buffer().length && pin.x >= 0 && pin.x < this.cols;
  }

  private assertLive(pin: GridPin): void {
    if (!this.isLive(pin)) {
      throw new Error(`stale pin at ${pin.x},${pin.y}`);
    }
  }
}

const orderPins = (a: GridPin, b: GridPin): [GridPin, GridPin] => {
  const before = a.y === b.y ? a.x <= b.x : a.y < b.y;
  return before ? [a, b] : [b, a];
};
