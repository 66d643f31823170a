// Logger is a lightweight interface for capturing interaction diagnostics.
export interface Logger {
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Rect {
  x: number;
  y: number;
  w: number;
  h: number;
}

// PointSpace selects how a grid row coordinate is interpreted: relative to the
// scrolled viewport, or relative to the live (active) screen.
export type PointSpace = 'viewport' | 'active';

export interface GridPoint {
  space: PointSpace;
  x: number;
  y: number;
}

// GridPin is an opaque, stable address of a cell inside the grid's storage.
// Only the grid that produced it knows how to interpret it.
export interface GridPin {
  readonly node: number;
  readonly x: number;
  readonly y: number;
}

export type CellWidth = 'narrow' | 'wide' | 'spacer_tail' | 'spacer_head';

export interface GridCell {
  codepoint: number;
  wide: CellWidth;
  hyperlinkId: number;
}

export interface GridRowFlags {
  // The row continues on the next row (soft wrap).
  wrap: boolean;
  // The row continues the previous row.
  wrapContinuation: boolean;
}

export type ScrollTarget =
  | { type: 'delta'; rows: number }
  | { type: 'row'; row: number }
  | { type: 'active' };

// GridScrollbar reports scroll position in rows.
export interface GridScrollbar {
  total: number;
  offset: number;
  len: number;
}

export interface MouseTrackingModes {
  x10: boolean;
  normal: boolean;
  button: boolean;
  any: boolean;
  sgr: boolean;
}

// Grid is the capability the engine needs from a terminal emulator. Mutating
// calls may throw when a pin no longer refers to live storage.
export interface Grid {
  readonly cols: number;
  readonly rows: number;
  pin(point: GridPoint): GridPin | null;
  pointFromPin(space: PointSpace, pin: GridPin): { x: number; y: number } | null;
  cell(point: GridPoint): GridCell | null;
  rowFlags(pin: GridPin): GridRowFlags | null;
  hyperlinkUri(id: number): string | null;
  scroll(target: ScrollTarget): void;
  isViewportActive(): boolean;
  select(anchor: GridPin, head: GridPin, block: boolean): void;
  clearSelection(): void;
  selectionString(start: GridPin, end: GridPin, options: { trim: boolean }): string;
  selectedText(): string | null;
  scrollbar(): GridScrollbar;
  mouseTracking(): MouseTrackingModes;
}

// InteractiveSession is the per-terminal collaborator the engine drives.
export interface InteractiveSession {
  readonly id: number;
  readonly spawned: boolean;
  readonly grid: Grid | null;
  sendInput(data: Uint8Array): void;
  markDirty(): void;
}

export type SessionStatus = 'idle' | 'running' | 'awaitingApproval' | 'done';

export type ViewMode =
  | 'grid'
  | 'gridResizing'
  | 'expanding'
  | 'full'
  | 'collapsing'
  | 'panningLeft'
  | 'panningRight'
  | 'panningUp'
  | 'panningDown';

// InteractionHost is the per-frame snapshot of layout and timing owned by the embedding app.
export interface InteractionHost {
  nowMs: number;
  windowW: number;
  windowH: number;
  gridCols: number;
  gridRows: number;
  // Size of one grid slot while in grid view.
  cellW: number;
  cellH: number;
  viewMode: ViewMode;
  focusedSession: number;
  termCols: number;
  termRows: number;
  fontCellW: number;
  fontCellH: number;
  uiScale: number;
  mouseOverUi: boolean;
  animatingRect: Rect | null;
}

export type MouseButton = 'left' | 'middle' | 'right';

export interface Modifiers {
  // Platform link-open modifier (Cmd on macOS, Ctrl elsewhere).
  open: boolean;
  shift: boolean;
  alt: boolean;
}

export type WheelSource = 'mouse' | 'touch';

export type InteractionEvent =
  | { type: 'mouseDown'; x: number; y: number; button: MouseButton; clicks: number; modifiers: Modifiers }
  | { type: 'mouseUp'; x: number; y: number; button: MouseButton }
  | { type: 'mouseMove'; x: number; y: number; modifiers: Modifiers }
  // ticks counts whole notches, positive toward the live screen; delta is the
  // precise amount in the same direction, used when ticks is zero.
  | { type: 'wheel'; x: number; y: number; ticks: number; delta: number; source: WheelSource };

export type EventDisposition = 'consumed' | 'passThrough';

export type CursorKind = 'arrow' | 'text' | 'pointer';

export interface InteractionEventHandlers {
  onFocusSession?: (index: number) => void;
  onOpenUrl?: (url: string) => void;
  onCursorChange?: (cursor: CursorKind) => void;
}

// InteractionComponent is the contract every input handler in a frame loop follows.
export interface InteractionComponent {
  handleEvent(host: InteractionHost, event: InteractionEvent): EventDisposition;
  update(host: InteractionHost): void;
  wantsFrame(host: InteractionHost): boolean;
}

export interface ScrollbarConfig {
  idleHideDelayMs: number;
  fadeInDurationMs: number;
  fadeOutDurationMs: number;
  trackWidth: number;
  edgeMargin: number;
  trackMarginY: number;
  minThumbHeight: number;
}

export interface InteractionConfig {
  terminalPadding: number;
  linesPerTick: number;
  scrollSensitivity: number;
  maxScrollVelocity: number;
  inertiaDecayConstant: number;
  inertiaStopVelocity: number;
  inertiaReferenceFps: number;
  selectionEdgeThreshold: number;
  selectionEdgeScrollRows: number;
  attentionWaveMs: number;
  logLevel: LogLevel;
  scrollbar: ScrollbarConfig;
}

export type InteractionConfigOverrides = Partial<Omit<InteractionConfig, 'scrollbar'>> & {
  scrollbar?: Partial<ScrollbarConfig>;
};

export type InteractionErrorType =
  | 'unresolvable_coordinate'
  | 'stale_pin'
  | 'link_scratch'
  | 'invalid_geometry'
  | 'passthrough'
  | 'open_url';

export interface InteractionError {
  type: InteractionErrorType;
  message: string;
  timestamp: number;
  details?: Record<string, unknown>;
}
