/**
 * Grid Operations
 *
 * Pure queries over a GeoGrid. Unknown regions and positions answer
 * false/null; nothing here throws except validateGrid().
 *
 * Neighbor queries are existential, not adjacency checks: "below" means
 * any entry in the same column with a strictly greater row, however far
 * away. On sparse grids this keeps inner decorations hidden across gaps.
 */

import { GeoGrid } from './geo-grid.js';
import { PositionConflictError, type GridPosition } from './errors.js';
import type { GridEntry } from './grid-entry.js';

/**
 * Grid size as (maxRow, maxCol). (0, 0) for an empty grid.
 */
export function gridDimensions(grid: GeoGrid): GridPosition {
  if (grid.length === 0) {
    return [0, 0];
  }
  return [Math.max(...grid.rows), Math.max(...grid.cols)];
}

/**
 * Re-check that no two entries share a position.
 * Returns true, or throws PositionConflictError.
 */
export function validateGrid(grid: GeoGrid): true {
  const positionToRegion = new Map<string, string>();

  for (const entry of grid) {
    const key = `${entry.row},${entry.col}`;
    const existing = positionToRegion.get(key);
    if (existing !== undefined) {
      throw new PositionConflictError(existing, entry.region, [entry.row, entry.col]);
    }
    positionToRegion.set(key, entry.region);
  }

  return true;
}

export function hasRegion(grid: GeoGrid, region: string): boolean {
  return grid.entry(region) !== undefined;
}

export function getPosition(grid: GeoGrid, region: string): GridPosition | null {
  const entry = grid.entry(region);
  return entry ? [entry.row, entry.col] : null;
}

export function getRegionAt(grid: GeoGrid, row: number, col: number): string | null {
  return grid.entryAt(row, col)?.region ?? null;
}

export function getRegions(grid: GeoGrid): readonly string[] {
  return grid.regions;
}

/**
 * True when every cell of the bounding rectangle is occupied.
 * An empty grid is complete.
 */
export function isCompleteRectangle(grid: GeoGrid): boolean {
  if (grid.length === 0) {
    return true;
  }
  const [maxRow, maxCol] = gridDimensions(grid);
  return grid.length === maxRow * maxCol;
}

// ---
// NEIGHBORS
// ---

function hasEntryWhere(
  grid: GeoGrid,
  region: string,
  test: (other: GridEntry, row: number, col: number) => boolean
): boolean {
  const position = getPosition(grid, region);
  if (!position) return false;

  const [row, col] = position;
  return grid.entries.some(other => test(other, row, col));
}

export function hasNeighborBelow(grid: GeoGrid, region: string): boolean {
  return hasEntryWhere(grid, region, (other, row, col) => other.col === col && other.row > row);
}

export function hasNeighborAbove(grid: GeoGrid, region: string): boolean {
  return hasEntryWhere(grid, region, (other, row, col) => other.col === col && other.row < row);
}

export function hasNeighborLeft(grid: GeoGrid, region: string): boolean {
  return hasEntryWhere(grid, region, (other, row, col) => other.row === row && other.col < col);
}

export function hasNeighborRight(grid: GeoGrid, region: string): boolean {
  return hasEntryWhere(grid, region, (other, row, col) => other.row === row && other.col > col);
}

// ---
// FILTERING
// ---

/**
 * New grid holding the entries that pass the predicate, in order.
 */
export function filterGrid(
  grid: GeoGrid,
  predicate: (entry: GridEntry) => boolean
): GeoGrid {
  return new GeoGrid(grid.entries.filter(predicate));
}
