import type {
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

type memory_row = {
  cells: GridCell[];
  wrap: boolean;
  wrapContinuation: boolean;
};

type memory_selection = {
  start: GridPin;
  end: GridPin;
  block: boolean;
};

export type MemoryGridOptions = {
  cols: number;
  rows: number;
};

export type WriteLineOptions = {
  hyperlink?: { id: number; uri: string };
};

// Ranges of codepoints that occupy two cells.
const WIDE_RANGES: ReadonlyArray<readonly [number, number]> = [
  [0x1100, 0x115f],
  [0x2e80, 0xa4cf],
  [0xac00, 0xd7a3],
  [0xf900, 0xfaff],
  [0xfe30, 0xfe4f],
  [0xff00, 0xff60],
  [0xffe0, 0xffe6],
  [0x1f300, 0x1faff],
  [0x20000, 0x3fffd]
];

const isWide = (codepoint: number): boolean => WIDE_RANGES.some(([lo, hi]) => codepoint >= lo && codepoint <= hi);

const blankCell = (): GridCell => ({ codepoint: 0, wide: 'narrow', hyperlinkId: 0 });

const blankRow = (cols: number): memory_row => ({
  cells: Array.from({ length: cols }, blankCell),
  wrap: false,
  wrapContinuation: false
});

const comparePins = (a: GridPin, b: GridPin): number => (a.y === b.y ? a.x - b.x : a.y - b.y);

// MemoryGrid is an in-process Grid with scrollback, soft wrapping, wide cells,
// hyperlinks and mouse modes. Rows are addressed absolutely from the top of
// scrollback; the last `rows` rows form the active screen.
export class MemoryGrid implements Grid {
  readonly cols: number;
  readonly rows: number;

  private lines: memory_row[];
  private cursorRow = 0;
  private viewportTop = 0;
  private generation = 1;
  private hyperlinks = new Map<number, string>();
  private selection: memory_selection | null = null;
  private modes: MouseTrackingModes = { x10: false, normal: false, button: false, any: false, sgr: false };

  constructor(options: MemoryGridOptions) {
    this.cols = Math.max(1, Math.trunc(options.cols));
    this.rows = Math.max(1, Math.trunc(options.rows));
    this.lines = Array.from({ length: this.rows }, () => blankRow(this.cols));
  }

  // writeLine writes one logical line at the cursor, soft-wrapping at the right edge.
  writeLine(text: string, options: WriteLineOptions = {}): void {
    const hyperlinkId = options.hyperlink?.id ?? 0;
    if (options.hyperlink) {
      this.hyperlinks.set(options.hyperlink.id, options.hyperlink.uri);
    }

    let row = this.takeRow(false);
    let x = 0;
    for (const ch of text) {
      const codepoint = ch.codePointAt(0) ?? 0;
      const wide = isWide(codepoint);
      const width = wide ? 2 : 1;
      if (x + width > this.cols) {
        if (wide && x < this.cols) {
          row.cells[x] = { codepoint: 0, wide: 'spacer_head', hyperlinkId: 0 };
        }
        row.wrap = true;
        row = this.takeRow(true);
        x = 0;
      }
      row.cells[x] = { codepoint, wide: wide ? 'wide' : 'narrow', hyperlinkId };
      if (wide) {
        row.cells[x + 1] = { codepoint: 0, wide: 'spacer_tail', hyperlinkId };
      }
      x += width;
    }
  }

  writeLines(lines: string[]): void {
    for (const line of lines) {
      this.writeLine(line);
    }
  }

  setMouseTracking(modes: Partial<MouseTrackingModes>): void {
    this.modes = { ...this.modes, ...modes };
  }

  // invalidatePins makes every pin handed out so far stale, as a reflow would.
  invalidatePins(): void {
    this.generation += 1;
    this.selection = null;
  }

  get selectionRange(): { start: GridPin; end: GridPin; block: boolean } | null {
    return this.selection;
  }

  pin(point: GridPoint): GridPin | null {
    if (point.x < 0 || point.x >= this.cols || point.y < 0 || point.y >= this.rows) {
      return null;
    }
    const y = this.spaceTop(point.space) + point.y;
    if (y >= this.lines.length) {
      return null;
    }
    return { node: this.generation, x: point.x, y };
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
    const cell = this.lines[pin.y].cells[pin.x];
    return { ...cell };
  }

  rowFlags(pin: GridPin): GridRowFlags | null {
    if (!this.isLive(pin)) {
      return null;
    }
    const row = this.lines[pin.y];
    return { wrap: row.wrap, wrapContinuation: row.wrapContinuation };
  }

  hyperlinkUri(id: number): string | null {
    return this.hyperlinks.get(id) ?? null;
  }

  scroll(target: ScrollTarget): void {
    const activeTop = this.activeTop();
    switch (target.type) {
      case 'delta':
        this.viewportTop = Math.min(activeTop, Math.max(0, this.viewportTop + target.rows));
        break;
      case 'row':
        this.viewportTop = Math.min(activeTop, Math.max(0, target.row));
        break;
      case 'active':
        this.viewportTop = activeTop;
        break;
    }
  }

  isViewportActive(): boolean {
    return this.viewportTop === this.activeTop();
  }

  select(anchor: GridPin, head: GridPin, block: boolean): void {
    this.assertLive(anchor);
    this.assertLive(head);
    const [start, end] = comparePins(anchor, head) <= 0 ? [anchor, head] : [head, anchor];
    this.selection = { start, end, block };
  }

  clearSelection(): void {
    this.selection = null;
  }

  selectionString(start: GridPin, end: GridPin, options: { trim: boolean }): string {
    this.assertLive(start);
    this.assertLive(end);
    const [from, to] = comparePins(start, end) <= 0 ? [start, end] : [end, start];

    let out = '';
    for (let y = from.y; y <= to.y; y += 1) {
      const row = this.lines[y];
      const x0 = y === from.y ? from.x : 0;
      const x1 = y === to.y ? to.x : this.cols - 1;
      let segment = '';
      for (let x = x0; x <= x1; x += 1) {
        const cell = row.cells[x];
        if (cell.wide === 'spacer_tail' || cell.wide === 'spacer_head') {
          continue;
        }
        segment += cell.codepoint === 0 ? ' ' : String.fromCodePoint(cell.codepoint);
      }
      out += options.trim && !row.wrap ? segment.trimEnd() : segment;
      if (y < to.y && !row.wrap) {
        out += '\n';
      }
    }
    return out;
  }

  selectedText(): string | null {
    if (!this.selection) {
      return null;
    }
    return this.selectionString(this.selection.start, this.selection.end, { trim: true });
  }

  scrollbar(): GridScrollbar {
    return { total: this.lines.length, offset: this.viewportTop, len: this.rows };
  }

  mouseTracking(): MouseTrackingModes {
    return { ...this.modes };
  }

  private activeTop(): number {
    return this.lines.length - this.rows;
  }

  private spaceTop(space: PointSpace): number {
    return space === 'viewport' ? this.viewportTop : this.activeTop();
  }

  private isLive(pin: GridPin): boolean {
    return pin.node === this.generation && pin.y >= 0 && pin.y < this.lines.length && pin.x >= 0 && pin.x < this.cols;
  }

  private assertLive(pin: GridPin): void {
    if (!this.isLive(pin)) {
      throw new Error(`stale pin at ${pin.x},${pin.y}`);
    }
  }

  private takeRow(continuation: boolean): memory_row {
    const following = this.isViewportActive();
    if (this.cursorRow >= this.lines.length) {
      this.lines.push(blankRow(this.cols));
      if (following) {
        this.viewportTop = this.activeTop();
      }
    }
    const row = this.lines[this.cursorRow];
    row.wrap = false;
    row.wrapContinuation = continuation;
    this.cursorRow += 1;
    return row;
  }
}
