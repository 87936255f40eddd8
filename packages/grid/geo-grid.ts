/**
 * GeoGrid - The Grid Layout Model
 *
 * An ordered, immutable collection of GridEntry values, addressable by
 * region code and by (row, col) position.
 *
 * Every construction path (position map, parallel arrays, entry list)
 * funnels through validateEntries(), so the invariants are checked in
 * exactly one place:
 *
 * 1. region codes are non-empty after trimming
 * 2. rows and columns are integers >= 1
 * 3. no two entries share a (row, col) position
 * 4. no region code appears twice
 *
 * A grid is never mutated after construction. Filtering produces a new grid.
 */

import {
  DuplicateRegionError,
  PositionConflictError,
  ShapeMismatchError,
  type GridPosition,
} from './errors.js';
import {
  assertValidPosition,
  assertValidRegion,
  createGridEntry,
  type GridEntry,
  type GridMetadata,
} from './grid-entry.js';

// ---
// CONSTRUCTION INPUTS
// ---

/**
 * Region code → (row, col).
 */
export type PositionMap =
  | Readonly<Record<string, GridPosition>>
  | ReadonlyMap<string, GridPosition>;

/**
 * Parallel arrays describing a grid, one element per region.
 */
export interface GridArrays {
  readonly regions: readonly string[];
  readonly rows: readonly number[];
  readonly cols: readonly number[];
  readonly names?: readonly string[];
  readonly metadata?: readonly GridMetadata[];
}

// ---
// VALIDATION
// ---

function positionKey(row: number, col: number): string {
  return `${row},${col}`;
}

/**
 * Check the grid invariants over a list of entries.
 * Throws the first violation found.
 */
function validateEntries(entries: readonly GridEntry[]): void {
  for (const entry of entries) {
    assertValidRegion(entry.region);
  }

  for (const entry of entries) {
    assertValidPosition(entry.region, entry.row, entry.col);
  }

  const positionToRegion = new Map<string, string>();
  for (const entry of entries) {
    const key = positionKey(entry.row, entry.col);
    const existing = positionToRegion.get(key);
    if (existing !== undefined) {
      throw new PositionConflictError(existing, entry.region, [entry.row, entry.col]);
    }
    positionToRegion.set(key, entry.region);
  }

  const seen = new Set<string>();
  for (const entry of entries) {
    if (seen.has(entry.region)) {
      throw new DuplicateRegionError(entry.region);
    }
    seen.add(entry.region);
  }
}

// ---
// GRID
// ---

export class GeoGrid implements Iterable<GridEntry> {
  readonly entries: readonly GridEntry[];

  /** Structure-of-arrays views, in entry order */
  readonly regions: readonly string[];
  readonly rows: readonly number[];
  readonly cols: readonly number[];
  readonly names: readonly string[];

  private readonly regionIndex: ReadonlyMap<string, number>;
  private readonly positionIndex: ReadonlyMap<string, number>;

  constructor(entries: readonly GridEntry[] = []) {
    validateEntries(entries);

    // Normalize plain objects (e.g. from a loader) into frozen entries
    this.entries = Object.freeze(
      entries.map(e => createGridEntry(e.region, e.row, e.col, e.name, e.metadata))
    );

    this.regions = Object.freeze(this.entries.map(e => e.region));
    this.rows = Object.freeze(this.entries.map(e => e.row));
    this.cols = Object.freeze(this.entries.map(e => e.col));
    this.names = Object.freeze(this.entries.map(e => e.name));

    this.regionIndex = new Map(this.entries.map((e, i) => [e.region, i]));
    this.positionIndex = new Map(this.entries.map((e, i) => [positionKey(e.row, e.col), i]));
  }

  /**
   * Create a grid from a region → (row, col) mapping.
   *
   * @example
   * ```typescript
   * const grid = GeoGrid.fromPositions({ CA: [1, 1], NY: [1, 2], TX: [2, 1], FL: [2, 2] });
   * ```
   */
  static fromPositions(positions: PositionMap): GeoGrid {
    const pairs: Array<[string, GridPosition]> = isMapInput(positions)
      ? [...positions.entries()]
      : Object.entries(positions);

    return new GeoGrid(
      pairs.map(([region, [row, col]]) => ({ region, row, col, name: region, metadata: {} }))
    );
  }

  /**
   * Create a grid from parallel arrays.
   * Names default to the region codes, metadata to empty objects.
   */
  static fromArrays(arrays: GridArrays): GeoGrid {
    const { regions, rows, cols, names, metadata } = arrays;

    const lengths: Record<string, number> = {
      regions: regions.length,
      rows: rows.length,
      cols: cols.length,
    };
    if (names) lengths.names = names.length;
    if (metadata) lengths.metadata = metadata.length;

    if (Object.values(lengths).some(length => length !== regions.length)) {
      throw new ShapeMismatchError(lengths);
    }

    return new GeoGrid(
      regions.map((region, i) => ({
        region,
        row: rows[i],
        col: cols[i],
        name: names?.[i] ?? region,
        metadata: metadata?.[i] ?? {},
      }))
    );
  }

  /**
   * Create a grid from an already-built entry list (e.g. a loader result).
   */
  static fromEntries(entries: readonly GridEntry[]): GeoGrid {
    return new GeoGrid(entries);
  }

  get length(): number {
    return this.entries.length;
  }

  [Symbol.iterator](): Iterator<GridEntry> {
    return this.entries[Symbol.iterator]();
  }

  /** Entry for a region code, or undefined */
  entry(region: string): GridEntry | undefined {
    const index = this.regionIndex.get(region);
    return index === undefined ? undefined : this.entries[index];
  }

  /** Entry at a position, or undefined */
  entryAt(row: number, col: number): GridEntry | undefined {
    const index = this.positionIndex.get(positionKey(row, col));
    return index === undefined ? undefined : this.entries[index];
  }
}

function isMapInput(positions: PositionMap): positions is ReadonlyMap<string, GridPosition> {
  return positions instanceof Map;
}
