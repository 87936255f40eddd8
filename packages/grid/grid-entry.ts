/**
 * Grid Entry
 *
 * One region placed on the grid.
 */

import { InvalidEntityError, InvalidPositionError } from './errors.js';

export type GridMetadata = Readonly<Record<string, unknown>>;

export interface GridEntry {
  /** Region code (e.g., "CA") */
  readonly region: string;

  /** 1-based row */
  readonly row: number;

  /** 1-based column */
  readonly col: number;

  /** Display name (e.g., "California"); defaults to the region code */
  readonly name: string;

  /** Extra attributes from auxiliary columns */
  readonly metadata: GridMetadata;
}

export function assertValidRegion(region: string): void {
  if (region.trim() === '') {
    throw new InvalidEntityError(region);
  }
}

export function assertValidPosition(region: string, row: number, col: number): void {
  if (!Number.isInteger(row) || !Number.isInteger(col) || row < 1 || col < 1) {
    throw new InvalidPositionError(region, [row, col]);
  }
}

/**
 * Create a validated, frozen grid entry.
 */
export function createGridEntry(
  region: string,
  row: number,
  col: number,
  name?: string,
  metadata: GridMetadata = {}
): GridEntry {
  assertValidRegion(region);
  assertValidPosition(region, row, col);

  const displayName = name === undefined || name.trim() === '' ? region : name;

  return Object.freeze({
    region,
    row,
    col,
    name: displayName,
    metadata: Object.freeze({ ...metadata }),
  });
}
