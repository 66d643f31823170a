import type { InteractionHost, Rect, ViewMode } from '../types';
import { rectContains } from '../utils/rect';

const isGridMode = (mode: ViewMode): boolean => mode === 'grid' || mode === 'gridResizing';

const isAnimatingMode = (mode: ViewMode): boolean => mode === 'expanding' || mode === 'collapsing';

export const gridSlotRect = (host: InteractionHost, index: number): Rect | null => {
  if (host.gridCols <= 0 || index < 0) {
    return null;
  }
  const col = index % host.gridCols;
  const row = Math.floor(index / host.gridCols);
  if (row >= host.gridRows) {
    return null;
  }
  return { x: col * host.cellW, y: row * host.cellH, w: host.cellW, h: host.cellH };
};

// gridSlotAt returns the grid slot under the pointer. Pointers inside the
// window clamp to the grid; pointers outside it hit no slot.
export const gridSlotAt = (host: InteractionHost, x: number, y: number): number | null => {
  if (host.cellW <= 0 || host.cellH <= 0 || host.gridCols <= 0 || host.gridRows <= 0) {
    return null;
  }
  if (x < 0 || y < 0 || x >= host.windowW || y >= host.windowH) {
    return null;
  }
  const col = Math.min(host.gridCols - 1, Math.max(0, Math.floor(x / host.cellW)));
  const row = Math.min(host.gridRows - 1, Math.max(0, Math.floor(y / host.cellH)));
  return row * host.gridCols + col;
};

// sessionRect returns where a session is drawn in the current view mode.
export const sessionRect = (host: InteractionHost, index: number): Rect | null => {
  if (isGridMode(host.viewMode)) {
    return gridSlotRect(host, index);
  }
  if (index !== host.focusedSession) {
    return null;
  }
  if (isAnimatingMode(host.viewMode)) {
    return host.animatingRect;
  }
  return { x: 0, y: 0, w: host.windowW, h: host.windowH };
};

// hoveredSession picks the session under the pointer for the current view mode.
export const hoveredSession = (host: InteractionHost, x: number, y: number, sessionCount: number): number | null => {
  let index: number | null;
  if (isGridMode(host.viewMode)) {
    index = gridSlotAt(host, x, y);
  } else if (isAnimatingMode(host.viewMode)) {
    const rect = host.animatingRect;
    index = rect && rectContains(rect, x, y) ? host.focusedSession : null;
  } else {
    index = host.focusedSession;
  }

  if (index === null || index < 0 || index >= sessionCount) {
    return null;
  }
  return index;
};
