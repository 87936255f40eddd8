/**
 * Facet Errors
 *
 * Raised by geofacet() while validating its input, before any cell is
 * rendered. Per-cell render failures are warnings, not errors (see
 * FacetWarning in geofacet.ts).
 */

import { GeoFacetError } from '../grid/errors.js';

export class EmptyInputError extends GeoFacetError {
  constructor() {
    super('Input data is empty');
  }
}

export class ColumnNotFoundError extends GeoFacetError {
  readonly column: string;

  constructor(column: string) {
    super(`Column '${column}' not found in data`);
    this.column = column;
  }
}

function describeValue(value: unknown): string {
  return typeof value === 'string' ? `'${value}'` : String(value);
}

/**
 * An option outside its allowed values.
 * `expected` is either the list of allowed values or a description.
 */
export class InvalidOptionError extends GeoFacetError {
  readonly option: string;

  constructor(option: string, value: unknown, expected: readonly string[] | string) {
    const detail = typeof expected === 'string' ? `Expected ${expected}` : `Must be one of: ${expected.join(', ')}`;
    super(`Invalid value for ${option}: ${describeValue(value)}. ${detail}`);
    this.option = option;
  }
}

/** Grid regions without data, under missingRegions: 'error'. */
export class MissingRegionsError extends GeoFacetError {
  readonly regions: readonly string[];

  constructor(regions: readonly string[]) {
    super(`Missing data for regions: ${regions.join(', ')}`);
    this.regions = [...regions];
  }
}

/** Data regions not in the grid, under additionalRegions: 'error'. */
export class ExtraRegionsError extends GeoFacetError {
  readonly regions: readonly string[];

  constructor(regions: readonly string[]) {
    super(`Data contains regions not in grid: ${regions.join(', ')}`);
    this.regions = [...regions];
  }
}
