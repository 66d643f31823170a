import type { Grid, GridCell, GridPin, Logger } from '../types';
import { createInteractionError } from '../utils/errors';
import { noopLogger } from '../utils/logger';
import { findUrlMatchAtPosition } from './urlMatcher';

export interface LinkMatch {
  url: string;
  startPin: GridPin;
  endPin: GridPin;
}

const SPACE = 0x20;
const TAB = 0x09;

const utf8Length = (codepoint: number): number => {
  if (codepoint < 0x80) return 1;
  if (codepoint < 0x800) return 2;
  if (codepoint < 0x10000) return 3;
  return 4;
};

// encodedCellLength is how many bytes a cell contributes to the extracted row text.
const encodedCellLength = (cell: GridCell): number => {
  if (cell.wide === 'spacer_tail' || cell.wide === 'spacer_head') {
    return 0;
  }
  if (cell.codepoint === 0 || cell.codepoint === SPACE) {
    return 1;
  }
  return utf8Length(cell.codepoint);
};

const isBlankCell = (cell: GridCell): boolean =>
  cell.codepoint === 0 || cell.codepoint === SPACE || cell.codepoint === TAB;

// matchLinkAtPin finds the link under pin, following soft wraps so a url that
// spills onto the next row still matches as one.
export const matchLinkAtPin = (
  grid: Grid,
  pin: GridPin,
  isViewingScrollback: boolean,
  logger: Logger = noopLogger
): LinkMatch | null => {
  const space = isViewingScrollback ? 'viewport' : 'active';
  const point = grid.pointFromPin(space, pin);
  if (!point) {
    return null;
  }

  const hovered = grid.cell({ space, x: point.x, y: point.y });
  if (!hovered) {
    return null;
  }
  if (hovered.hyperlinkId !== 0) {
    const uri = grid.hyperlinkUri(hovered.hyperlinkId);
    if (uri) {
      return { url: uri, startPin: pin, endPin: pin };
    }
  }
  if (isBlankCell(hovered)) {
    return null;
  }

  const hoveredFlags = grid.rowFlags(pin);
  if (!hoveredFlags) {
    return null;
  }

  let startY = point.y;
  let flags = hoveredFlags;
  while (flags.wrapContinuation && startY > 0) {
    const above = grid.pin({ space, x: 0, y: startY - 1 });
    const aboveFlags = above ? grid.rowFlags(above) : null;
    if (!aboveFlags) {
      break;
    }
    startY -= 1;
    flags = aboveFlags;
  }

  let endY = point.y;
  flags = hoveredFlags;
  while (flags.wrap && endY + 1 < grid.rows) {
    const below = grid.pin({ space, x: 0, y: endY + 1 });
    const belowFlags = below ? grid.rowFlags(below) : null;
    if (!belowFlags) {
      break;
    }
    endY += 1;
    flags = belowFlags;
  }

  const rangeStart = grid.pin({ space, x: 0, y: startY });
  const rangeEnd = grid.pin({ space, x: grid.cols - 1, y: endY });
  if (!rangeStart || !rangeEnd) {
    return null;
  }

  let text: string;
  try {
    text = grid.selectionString(rangeStart, rangeEnd, { trim: false });
  } catch (error) {
    const record = createInteractionError('link_scratch', error, { row: point.y });
    logger.debug('[LinkMatcher] Failed to extract row text', { ...record });
    return null;
  }

  // cellOffsets[i] is the byte offset of the i-th cell of the range within text.
  // The trailing half of a wide character shares its leading cell's offset.
  const cellOffsets: number[] = [];
  let bytePos = 0;
  let charStart = 0;
  for (let y = startY; y <= endY; y += 1) {
    for (let x = 0; x < grid.cols; x += 1) {
      const cell = grid.cell({ space, x, y });
      if (cell?.wide === 'spacer_tail') {
        cellOffsets.push(charStart);
        continue;
      }
      charStart = bytePos;
      cellOffsets.push(bytePos);
      if (cell) {
        bytePos += encodedCellLength(cell);
      }
    }
    if (y < endY) {
      const rowPin = grid.pin({ space, x: 0, y });
      const rowFlags = rowPin ? grid.rowFlags(rowPin) : null;
      if (!rowFlags?.wrap) {
        bytePos += 1;
      }
    }
  }

  const clickIndex = (point.y - startY) * grid.cols + point.x;
  if (clickIndex >= cellOffsets.length) {
    return null;
  }

  const match = findUrlMatchAtPosition(new TextEncoder().encode(text), cellOffsets[clickIndex]);
  if (!match) {
    return null;
  }

  let startIndex = cellOffsets.findIndex(offset => offset >= match.start);
  if (startIndex < 0) {
    startIndex = 0;
  }
  const firstPast = cellOffsets.findIndex(offset => offset >= match.end);
  const endIndex = firstPast < 0 ? cellOffsets.length - 1 : Math.max(0, firstPast - 1);

  const startPin = grid.pin({ space, x: startIndex % grid.cols, y: startY + Math.floor(startIndex / grid.cols) });
  const endPin = grid.pin({ space, x: endIndex % grid.cols, y: startY + Math.floor(endIndex / grid.cols) });
  if (!startPin || !endPin) {
    return null;
  }
  return { url: match.url, startPin, endPin };
};

export const linkAtPin = (
  grid: Grid,
  pin: GridPin,
  isViewingScrollback: boolean,
  logger: Logger = noopLogger
): string | null => matchLinkAtPin(grid, pin, isViewingScrollback, logger)?.url ?? null;
