/**
 * Grid Loader
 *
 * Builds GeoGrid layouts from the CSV grid source format:
 *
 *   row,col,code,name,<any other columns...>
 *
 * - `row` and `col` are required
 * - the first column whose name contains "code" (any case) holds the region code
 * - `name` is optional (display name, defaults to the code)
 * - every other column becomes per-entry metadata
 *
 * Predefined grids live as CSV files in packages/grids.
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { GeoGrid } from '../grid/geo-grid.js';
import { filterGrid } from '../grid/grid-operations.js';
import { GridFormatError } from '../grid/errors.js';
import type { GridEntry } from '../grid/grid-entry.js';
import { parseCSV } from './csv-parser.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/** Default predefined grid */
export const DEFAULT_GRID_NAME = 'us_state_grid1';

// ---
// GRIDS DIRECTORY
// ---

/**
 * Directory holding predefined grid CSV files.
 *
 * Priority:
 * 1. GEOFACET_GRIDS_DIR env var
 * 2. packages/grids next to the sources
 * 3. packages/grids at the project root (when running from dist/)
 */
export function getGridsDirectory(): string {
  const fromEnv = process.env.GEOFACET_GRIDS_DIR;
  if (fromEnv) {
    return path.resolve(fromEnv);
  }

  const candidates = [
    path.resolve(__dirname, '../grids'),
    path.resolve(__dirname, '../../../packages/grids'),
  ];
  return candidates.find(dir => fs.existsSync(dir)) ?? candidates[0];
}

// ---
// CSV → GRID
// ---

const NUMERIC = /^-?\d+(?:\.\d+)?$/;

function toMetadataValue(raw: string): string | number {
  return NUMERIC.test(raw) ? Number(raw) : raw;
}

/**
 * Parse grid CSV text into a GeoGrid.
 *
 * @param text - CSV contents
 * @param source - file name or label used in error messages
 */
export function parseGridCSV(text: string, source = '<input>'): GeoGrid {
  const { header, records } = parseCSV(text);

  if (header.length === 0) {
    throw new GridFormatError(`Grid source is empty: ${source}`);
  }

  const missingColumns = ['row', 'col'].filter(c => !header.includes(c));
  if (missingColumns.length > 0) {
    throw new GridFormatError(`Missing required columns: ${missingColumns.join(', ')} in ${source}`);
  }

  const codeIndex = header.findIndex(c => /code/i.test(c));
  if (codeIndex === -1) {
    throw new GridFormatError(
      `Missing code column. No column name contains 'code' (case-insensitive) in ${source}`
    );
  }

  const rowIndex = header.indexOf('row');
  const colIndex = header.indexOf('col');
  const nameIndex = header.indexOf('name');
  const metadataIndexes = header
    .map((_, i) => i)
    .filter(i => i !== rowIndex && i !== colIndex && i !== codeIndex && i !== nameIndex);

  const entries: GridEntry[] = records.map(record => {
    const { fields, line } = record;
    if (fields.length !== header.length) {
      throw new GridFormatError(
        `Line ${line ?? '?'} of ${source}: expected ${header.length} fields, got ${fields.length}`
      );
    }

    const region = fields[codeIndex];
    const metadata: Record<string, string | number> = {};
    for (const i of metadataIndexes) {
      metadata[header[i]] = toMetadataValue(fields[i]);
    }

    return {
      region,
      row: Number(fields[rowIndex]),
      col: Number(fields[colIndex]),
      name: nameIndex === -1 ? region : fields[nameIndex],
      metadata,
    };
  });

  return GeoGrid.fromEntries(entries);
}

/**
 * Load a grid from a CSV file.
 *
 * @param filename - file name, ".csv" is appended when missing
 * @param directory - defaults to the predefined grids directory
 */
export function loadGridFromCSV(filename: string, directory: string = getGridsDirectory()): GeoGrid {
  const csvFilename = filename.endsWith('.csv') ? filename : `${filename}.csv`;
  const csvPath = path.join(directory, csvFilename);

  if (!fs.existsSync(csvPath)) {
    throw new GridFormatError(`Grid file not found: ${csvPath}`);
  }

  return parseGridCSV(fs.readFileSync(csvPath, 'utf-8'), csvPath);
}

/**
 * Names (without extension) of the grid CSV files in a directory, sorted.
 */
export function listAvailableGrids(directory: string = getGridsDirectory()): string[] {
  if (!fs.existsSync(directory)) {
    return [];
  }

  return fs
    .readdirSync(directory)
    .filter(f => f.endsWith('.csv'))
    .map(f => path.basename(f, '.csv'))
    .sort();
}

/**
 * Load a predefined grid by name.
 */
export function loadGrid(name: string): GeoGrid {
  const available = listAvailableGrids();
  if (!available.includes(name)) {
    throw new GridFormatError(
      `Unknown grid '${name}'. Available grids: ${available.join(', ') || '(none)'}`
    );
  }
  return loadGridFromCSV(name);
}

// ---
// PREDEFINED US LAYOUTS
// ---

/** Versions of the US states layout shipped in packages/grids */
export const US_STATE_GRID_VERSIONS: readonly number[] = [1];

export interface UsStateGridOptions {
  /** Layout version, one of US_STATE_GRID_VERSIONS (default: 1) */
  version?: number;
  /** Include the District of Columbia (default: true) */
  includeDC?: boolean;
}

/**
 * US states layout (50 states + DC, or 50 without DC).
 */
export function loadUsStateGrid(options: UsStateGridOptions = {}): GeoGrid {
  const { version = 1, includeDC = true } = options;
  if (!US_STATE_GRID_VERSIONS.includes(version)) {
    throw new GridFormatError(
      `US state grid version must be one of: ${US_STATE_GRID_VERSIONS.join(', ')} (got ${version})`
    );
  }
  const grid = loadGrid(`us_state_grid${version}`);
  return includeDC ? grid : filterGrid(grid, e => e.region !== 'DC');
}

/**
 * Contiguous US layout: without Alaska and Hawaii (48 states + DC).
 */
export function loadUsContiguousGrid(): GeoGrid {
  return filterGrid(loadGrid(DEFAULT_GRID_NAME), e => e.region !== 'AK' && e.region !== 'HI');
}

// ---
// DEFAULT GRID (lazy)
// ---

let defaultGrid: GeoGrid | null = null;

/**
 * The grid used when none is passed to geofacet().
 * Loaded on first use; load failures propagate to the caller.
 */
export function getDefaultGrid(): GeoGrid {
  if (!defaultGrid) {
    defaultGrid = loadGrid(DEFAULT_GRID_NAME);
  }
  return defaultGrid;
}

/** Forget the cached default grid (next getDefaultGrid() reloads it) */
export function resetDefaultGrid(): void {
  defaultGrid = null;
}
