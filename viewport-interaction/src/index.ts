export { ViewportInteractionEngine } from './core/InteractionEngine';
export type { ViewportInteractionEngineOptions } from './core/InteractionEngine';
export { useViewportInteraction } from './hooks/useViewportInteraction';
export type { OpenModifier, UseViewportInteractionOptions, UseViewportInteractionReturn } from './hooks/useViewportInteraction';

export type {
  CellWidth,
  CursorKind,
  EventDisposition,
  Grid,
  GridCell,
  GridPin,
  GridPoint,
  GridRowFlags,
  GridScrollbar,
  InteractionComponent,
  InteractionConfig,
  InteractionConfigOverrides,
  InteractionError,
  InteractionErrorType,
  InteractionEvent,
  InteractionEventHandlers,
  InteractionHost,
  InteractiveSession,
  Logger,
  LogLevel,
  Modifiers,
  MouseButton,
  MouseTrackingModes,
  PointSpace,
  Rect,
  ScrollbarConfig,
  ScrollTarget,
  SessionStatus,
  ViewMode,
  WheelSource
} from './types';

export { DEFAULT_TERMINAL_PADDING, cellAt, contentRect, pinAt, pinsEqual } from './core/coordinates';
export type { CellPosition } from './core/coordinates';
export { sessionRect, hoveredSession, gridSlotRect } from './core/sessionLayout';
export {
  createSessionViewState,
  resetViewState,
  clearViewSelection,
  clearViewHover,
  clearViewScroll
} from './core/viewState';
export type { SessionViewState } from './core/viewState';
export {
  isWordCharacter,
  beginSelection,
  startSelectionDrag,
  updateSelectionDrag,
  endSelection,
  selectWord,
  selectLine,
  edgeAutoscrollDirection
} from './core/selection';
export {
  wheelRowDelta,
  scrollSession,
  advanceScrollInertia,
  applyScrollbarOffset,
  shouldForwardWheel,
  forwardWheelToApplication,
  resetScrollIfNeeded
} from './core/scrolling';

export { matchLinkAtPin, linkAtPin } from './links/linkMatcher';
export type { LinkMatch } from './links/linkMatcher';
export { findUrlMatchAtPosition, findUrlMatchInText } from './links/urlMatcher';
export type { UrlMatch } from './links/urlMatcher';

export {
  createScrollbarMetrics,
  computeScrollbarLayout,
  hitTestScrollbar,
  offsetForTrackClick,
  offsetForDrag,
  reservedScrollbarWidth
} from './scrollbar/geometry';
export type { ScrollbarHitTarget, ScrollbarLayout, ScrollbarMetrics } from './scrollbar/geometry';
export { ScrollbarState } from './scrollbar/ScrollbarState';
export type { ScrollbarPhase } from './scrollbar/ScrollbarState';
export { renderScrollbar } from './scrollbar/render';
export type { RgbColor, ScrollbarCanvas } from './scrollbar/render';

export { encodeMouseScroll, wantsMouseEvents } from './input/mouseEncoding';
export { WheelAccumulator } from './input/wheel';

export { GhosttyGrid } from './adapters/GhosttyGrid';
export type { GhosttyTerminalLike } from './adapters/GhosttyGrid';
export { loadGhosttyTerminal, GhosttySession } from './adapters/loadGhostty';
export type { LoadedGhosttyTerminal, GhosttySessionOptions, GhosttyTerminalOptions } from './adapters/loadGhostty';
export { MemoryGrid } from './internal/MemoryGrid';
export { MemorySession } from './internal/MemorySession';

export { getDefaultInteractionConfig, getDefaultScrollbarConfig, normalizeInteractionConfig } from './utils/config';
export { createConsoleLogger, createScopedLogger, noopLogger } from './utils/logger';
export { createInteractionError } from './utils/errors';
