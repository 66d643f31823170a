import type { GridPin, InteractiveSession, Logger, Rect } from '../types';
import { createInteractionError } from '../utils/errors';
import { noopLogger } from '../utils/logger';
import { pinsEqual } from './coordinates';
import type { SessionViewState } from './viewState';

// isWordCharacter accepts ASCII letters, digits and underscore. Everything
// outside ASCII counts as a separator.
export const isWordCharacter = (codepoint: number): boolean => {
  if (codepoint > 127) {
    return false;
  }
  return (
    (codepoint >= 0x30 && codepoint <= 0x39) ||
    (codepoint >= 0x41 && codepoint <= 0x5a) ||
    (codepoint >= 0x61 && codepoint <= 0x7a) ||
    codepoint === 0x5f
  );
};

const trySelect = (
  session: InteractiveSession,
  anchor: GridPin,
  head: GridPin,
  logger: Logger,
  clearFirst: boolean
): boolean => {
  const grid = session.grid;
  if (!grid) {
    return false;
  }
  try {
    if (clearFirst) {
      grid.clearSelection();
    }
    grid.select(anchor, head, false);
    return true;
  } catch (error) {
    const record = createInteractionError('stale_pin', error, { session: session.id });
    logger.warn('[Selection] Failed to apply selection', { ...record });
    return false;
  }
};

// beginSelection records where a press happened. Nothing is selected until the pointer moves.
export const beginSelection = (session: InteractiveSession, view: SessionViewState, pin: GridPin): void => {
  const grid = session.grid;
  if (!grid) {
    return;
  }
  grid.clearSelection();
  view.selectionAnchor = pin;
  view.selectionPending = true;
  view.selectionDragging = false;
};

export const startSelectionDrag = (
  session: InteractiveSession,
  view: SessionViewState,
  pin: GridPin,
  logger: Logger = noopLogger
): void => {
  const anchor = view.selectionAnchor;
  if (!anchor) {
    view.selectionPending = false;
    return;
  }
  if (!trySelect(session, anchor, pin, logger, true)) {
    return;
  }
  view.selectionDragging = true;
  view.selectionPending = false;
  session.markDirty();
};

export const updateSelectionDrag = (
  session: InteractiveSession,
  view: SessionViewState,
  pin: GridPin,
  logger: Logger = noopLogger
): void => {
  const anchor = view.selectionAnchor;
  if (!view.selectionDragging || !anchor) {
    return;
  }
  if (trySelect(session, anchor, pin, logger, false)) {
    session.markDirty();
  }
};

// handleSelectionMotion advances the press/drag state machine for a pointer move onto pin.
export const handleSelectionMotion = (
  session: InteractiveSession,
  view: SessionViewState,
  pin: GridPin,
  logger: Logger = noopLogger
): void => {
  if (view.selectionPending) {
    if (!view.selectionAnchor) {
      view.selectionPending = false;
      return;
    }
    if (!pinsEqual(view.selectionAnchor, pin)) {
      startSelectionDrag(session, view, pin, logger);
    }
    return;
  }
  if (view.selectionDragging) {
    updateSelectionDrag(session, view, pin, logger);
  }
};

// endSelection stops tracking the pointer; whatever is selected stays selected.
export const endSelection = (view: SessionViewState): void => {
  view.selectionAnchor = null;
  view.selectionDragging = false;
  view.selectionPending = false;
};

export const selectWord = (
  session: InteractiveSession,
  view: SessionViewState,
  pin: GridPin,
  logger: Logger = noopLogger
): void => {
  const grid = session.grid;
  if (!grid) {
    return;
  }
  const space = view.isViewingScrollback ? 'viewport' : 'active';
  const point = grid.pointFromPin(space, pin);
  if (!point) {
    return;
  }

  const isWordAt = (x: number): boolean => {
    const cell = grid.cell({ space, x, y: point.y });
    return cell !== null && isWordCharacter(cell.codepoint);
  };

  if (!isWordAt(point.x)) {
    return;
  }

  let startX = point.x;
  while (startX > 0 && isWordAt(startX - 1)) {
    startX -= 1;
  }
  let endX = point.x;
  while (endX + 1 < grid.cols && isWordAt(endX + 1)) {
    endX += 1;
  }

  const startPin = grid.pin({ space, x: startX, y: point.y });
  const endPin = grid.pin({ space, x: endX, y: point.y });
  if (!startPin || !endPin) {
    return;
  }
  if (trySelect(session, startPin, endPin, logger, true)) {
    endSelection(view);
    session.markDirty();
  }
};

export const selectLine = (
  session: InteractiveSession,
  view: SessionViewState,
  pin: GridPin,
  logger: Logger = noopLogger
): void => {
  const grid = session.grid;
  if (!grid) {
    return;
  }
  const space = view.isViewingScrollback ? 'viewport' : 'active';
  const point = grid.pointFromPin(space, pin);
  if (!point) {
    return;
  }
  const startPin = grid.pin({ space, x: 0, y: point.y });
  const endPin = grid.pin({ space, x: grid.cols - 1, y: point.y });
  if (!startPin || !endPin) {
    return;
  }
  if (trySelect(session, startPin, endPin, logger, true)) {
    endSelection(view);
    session.markDirty();
  }
};

// edgeAutoscrollDirection returns the row step to apply while dragging near an edge of rect.
export const edgeAutoscrollDirection = (mouseY: number, rect: Rect, threshold: number): -1 | 0 | 1 => {
  if (mouseY < rect.y + threshold) {
    return -1;
  }
  if (mouseY > rect.y + rect.h - threshold) {
    return 1;
  }
  return 0;
};
