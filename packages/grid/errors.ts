/**
 * Grid Errors
 *
 * Every error raised while building or loading a grid layout.
 * A grid is validated once at construction; any of these aborts the
 * construction, so a GeoGrid is never partially built.
 */

export type GridPosition = readonly [row: number, col: number];

/**
 * Base class for every error raised by the library.
 */
export class GeoFacetError extends Error {
  constructor(message?: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/** A region code that is empty or whitespace-only. */
export class InvalidEntityError extends GeoFacetError {
  readonly region: string;

  constructor(region: string) {
    super(`Region names cannot be empty or whitespace-only, got '${region}'`);
    this.region = region;
  }
}

/** A row or column below 1, or not an integer. */
export class InvalidPositionError extends GeoFacetError {
  readonly region: string;
  readonly position: GridPosition;

  constructor(region: string, position: GridPosition) {
    super(
      `Grid positions must be positive integers (>= 1), got (${position[0]}, ${position[1]}) for region '${region}'`
    );
    this.region = region;
    this.position = position;
  }
}

/** Two regions placed on the same cell. */
export class PositionConflictError extends GeoFacetError {
  readonly regions: readonly [string, string];
  readonly position: GridPosition;

  constructor(existing: string, incoming: string, position: GridPosition) {
    super(
      `Position conflict: regions '${existing}' and '${incoming}' both at position (${position[0]}, ${position[1]})`
    );
    this.regions = [existing, incoming];
    this.position = position;
  }
}

/** The same region code placed twice. */
export class DuplicateRegionError extends GeoFacetError {
  readonly region: string;

  constructor(region: string) {
    super(`Region '${region}' appears more than once in the grid`);
    this.region = region;
  }
}

/** Parallel arrays of different lengths. */
export class ShapeMismatchError extends GeoFacetError {
  readonly lengths: Readonly<Record<string, number>>;

  constructor(lengths: Record<string, number>) {
    const detail = Object.entries(lengths)
      .map(([field, length]) => `${field}=${length}`)
      .join(', ');
    super(`All input arrays must have the same length (${detail})`);
    this.lengths = { ...lengths };
  }
}

/** A grid source (CSV text or file) that cannot be turned into a grid. */
export class GridFormatError extends GeoFacetError {}
