import type { Grid, GridPin, Rect } from '../types';
import { isEmptyRect } from '../utils/rect';

export const DEFAULT_TERMINAL_PADDING = 8;

export interface CellPosition {
  col: number;
  row: number;
}

// contentRect is the drawable area of a session rect once padding is removed.
export const contentRect = (sessionRect: Rect, padding = DEFAULT_TERMINAL_PADDING): Rect | null => {
  const rect = {
    x: sessionRect.x + padding,
    y: sessionRect.y + padding,
    w: sessionRect.w - padding * 2,
    h: sessionRect.h - padding * 2
  };
  return isEmptyRect(rect) ? null : rect;
};

// cellAt maps a pixel position to a viewport cell; null anywhere outside the grid.
export const cellAt = (
  mouseX: number,
  mouseY: number,
  viewportRect: Rect,
  cellW: number,
  cellH: number,
  cols: number,
  rows: number,
  padding = DEFAULT_TERMINAL_PADDING
): CellPosition | null => {
  if (cellW <= 0 || cellH <= 0 || cols <= 0 || rows <= 0) {
    return null;
  }

  const originX = viewportRect.x + padding;
  const originY = viewportRect.y + padding;
  if (mouseX < originX || mouseY < originY) {
    return null;
  }
  if (mouseX >= originX + viewportRect.w - padding * 2 || mouseY >= originY + viewportRect.h - padding * 2) {
    return null;
  }

  const col = Math.floor((mouseX - originX) / cellW);
  const row = Math.floor((mouseY - originY) / cellH);
  if (col < 0 || row < 0 || col >= cols || row >= rows) {
    return null;
  }
  return { col, row };
};

// pinAt resolves a viewport cell to a pin. While the user is looking at
// scrollback, rows count from the scrolled viewport; otherwise from the active screen.
export const pinAt = (grid: Grid, isViewingScrollback: boolean, cell: CellPosition): GridPin | null => {
  return grid.pin({ space: isViewingScrollback ? 'viewport' : 'active', x: cell.col, y: cell.row });
};

export const pinsEqual = (a: GridPin | null, b: GridPin | null): boolean => {
  if (a === null || b === null) {
    return a === b;
  }
  return a.node === b.node && a.x === b.x && a.y === b.y;
};
