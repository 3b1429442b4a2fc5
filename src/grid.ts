/**
 * Detection → tile mapping.
 *
 * Two policies, one per grid shape:
 * - centroid mapper: 3x3 over a 300px canvas, a box selects the cell under its centre
 * - overlap mapper:  4x4 over a 450px canvas, a box selects every cell in the
 *   rectangle spanned by the cells its corners land in
 */

import type { ChallengeVariant, Detection, GridSize } from './types.js';

export const CANVAS_SIZE: Record<GridSize, number> = { 3: 300, 4: 450 };

const CENTROID_CELL = 100;
const CENTROID_COLUMNS = 3;

const OVERLAP_CELL = 112.5;
const OVERLAP_COLUMNS = 4;
const OVERLAP_EDGE = 450;

const sortedUnique = (values: Iterable<number>): number[] => [...new Set(values)].sort((a, b) => a - b);

const clampCell = (value: number): number => Math.min(CENTROID_COLUMNS - 1, Math.max(0, value));

export function centroidTiles(detections: readonly Detection[], targetClass: number): number[] {
  const tiles: number[] = [];
  for (const { classId, box } of detections) {
    if (classId !== targetClass) continue;
    const [x1, y1, x2, y2] = box.map(Math.trunc);
    const xc = (x1 + x2) / 2;
    const yc = (y1 + y2) / 2;
    const row = clampCell(Math.floor(yc / CENTROID_CELL));
    const col = clampCell(Math.floor(xc / CENTROID_CELL));
    tiles.push(row * CENTROID_COLUMNS + col + 1);
  }
  return sortedUnique(tiles);
}

/**
 * Index of the 112.5px band containing `v`, or null when `v` sits exactly on an
 * inner boundary or past the far edge.
 */
export function overlapBand(v: number): number | null {
  if (v < OVERLAP_CELL) return 0;
  if (v > OVERLAP_CELL && v < OVERLAP_CELL * 2) return 1;
  if (v > OVERLAP_CELL * 2 && v < OVERLAP_CELL * 3) return 2;
  if (v > OVERLAP_CELL * 3 && v <= OVERLAP_EDGE) return 3;
  return null;
}

/** Cells (1-based) touched by the four corners of a box. */
export function cornerCells(box: readonly number[]): number[] {
  const [x1, y1, x2, y2] = box.map(Math.trunc);
  const corners: Array<[number, number]> = [[x1, y1], [x2, y1], [x1, y2], [x2, y2]];
  const cells: number[] = [];
  for (const [x, y] of corners) {
    const col = overlapBand(x);
    const row = overlapBand(y);
    if (col === null || row === null) continue;
    cells.push(row * OVERLAP_COLUMNS + col + 1);
  }
  return cells;
}

/** Every cell inside the row/column span of `cells`. */
export function fillSpan(cells: readonly number[]): number[] {
  if (cells.length === 0) return [];
  const rows = cells.map((c) => Math.floor((c - 1) / OVERLAP_COLUMNS));
  const cols = cells.map((c) => (c - 1) % OVERLAP_COLUMNS);
  const out: number[] = [];
  for (let r = Math.min(...rows); r <= Math.max(...rows); r++) {
    for (let c = Math.min(...cols); c <= Math.max(...cols); c++) {
      out.push(OVERLAP_COLUMNS * r + c + 1);
    }
  }
  return sortedUnique(out);
}

export function overlapTiles(detections: readonly Detection[], targetClass: number): number[] {
  const tiles: number[] = [];
  for (const { classId, box } of detections) {
    if (classId !== targetClass) continue;
    tiles.push(...fillSpan(cornerCells(box)));
  }
  return sortedUnique(tiles);
}

export function mapDetections(variant: ChallengeVariant, detections: readonly Detection[], targetClass: number): number[] {
  return variant === 'squares' ? overlapTiles(detections, targetClass) : centroidTiles(detections, targetClass);
}

/**
 * Fewer than three hits on a 3x3 grid means the detector most likely missed
 * objects; a full 4x4 hit means it matched the whole image.
 */
export function isSolvable(variant: ChallengeVariant, tiles: readonly number[]): boolean {
  if (variant === 'squares') return tiles.length >= 1 && tiles.length < 16;
  return tiles.length > 2;
}
