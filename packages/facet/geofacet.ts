/**
 * geofacet()
 *
 * Draws one facet per grid region into a shared Figure:
 *
 *   validate → partition → cross-check → neighbor grid → cell loop
 *            → link axes → title → legend
 *
 * Everything before the cell loop may throw; once cells are being drawn,
 * problems are reported through onWarning and processing continues.
 */

import type { GeoGrid } from '../grid/geo-grid.js';
import type { GridEntry } from '../grid/grid-entry.js';
import { filterGrid, gridDimensions } from '../grid/grid-operations.js';
import { getDefaultGrid } from '../parser/grid-loader.js';
import { Figure, type AxisOptions, type FigureOptions, type GridLayout, type TitleOptions } from '../renderer/figure.js';
import { buildAxisOptionsList, LINK_MODES, type LinkMode } from './axis-options.js';
import { linkAxesByPosition } from './axis-linking.js';
import {
  getAvailableRegions,
  getRegionData,
  hasRegionData,
  prepareGroupedData,
  type DataRow,
} from './data-matcher.js';
import {
  ColumnNotFoundError,
  EmptyInputError,
  ExtraRegionsError,
  InvalidOptionError,
  MissingRegionsError,
} from './errors.js';
import { addLegend, type LegendOptions } from './legend.js';
import { defaultWarningHandler, extraRegionsWarning, renderFailureWarning, type WarningHandler } from './warnings.js';

// ---
// OPTIONS
// ---

export const MISSING_REGION_POLICIES = ['skip', 'placeholder', 'error'] as const;
export const ADDITIONAL_REGION_POLICIES = ['warn', 'error'] as const;

/** What to do with grid regions that have no data */
export type MissingRegionPolicy = (typeof MISSING_REGION_POLICIES)[number];

/** What to do with data regions that are not in the grid */
export type AdditionalRegionPolicy = (typeof ADDITIONAL_REGION_POLICIES)[number];

/** Extra values handed to every plot function call */
export type PlotArgs = Readonly<Record<string, unknown>>;

export interface GeoFacetOptions {
  /** Layout to draw into (default: the predefined US states grid) */
  grid?: GeoGrid;
  /** Share axis ranges across facets (default: 'none') */
  linkAxes?: LinkMode;
  /** default: 'skip' */
  missingRegions?: MissingRegionPolicy;
  /** default: 'error' */
  additionalRegions?: AdditionalRegionPolicy;
  /** Hide ticks and labels of linked axes facing another facet (default: true) */
  hideInnerDecorations?: boolean;
  /** Options applied to every axis */
  commonAxisOptions?: AxisOptions;
  /** Options per axis index; its length is the number of axes per cell */
  axisOptionsList?: readonly AxisOptions[];
  /** false disables the legend */
  legend?: LegendOptions | false;
  title?: string;
  titleOptions?: TitleOptions;
  /** Merged over the default figure size */
  figure?: FigureOptions;
  plotArgs?: PlotArgs;
  onWarning?: WarningHandler;
}

export interface PlotContext {
  region: string;
  entry: GridEntry;
  /** Options for the first (or only) axis */
  axisOptions: AxisOptions;
  /** Options for every axis, in order */
  axisOptionsList: readonly AxisOptions[];
  args: PlotArgs;
}

/**
 * Draws one facet. Create axes on `layout` in the order of
 * `context.axisOptionsList`. Drawing must finish before the function
 * returns; a function that returns a promise fails its region.
 */
export type PlotFunction<Row extends DataRow = DataRow> = (
  layout: GridLayout,
  rows: readonly Row[],
  context: PlotContext
) => void;

// ---
// VALIDATION
// ---

function isOneOf<T extends string>(value: unknown, allowed: readonly T[]): value is T {
  return typeof value === 'string' && allowed.some(a => a === value);
}

function isOptionsObject(value: unknown): value is AxisOptions {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateOption<T extends string>(option: string, value: unknown, allowed: readonly T[]): T {
  if (!isOneOf(value, allowed)) {
    throw new InvalidOptionError(option, value, allowed);
  }
  return value;
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return typeof value === 'object' && value !== null && 'then' in value && typeof value.then === 'function';
}

function validateAxisOptionsList(value: unknown): AxisOptions[] {
  if (!Array.isArray(value) || !value.every(isOptionsObject)) {
    throw new InvalidOptionError('axisOptionsList', value, 'an array of axis option objects');
  }
  return value;
}

// ---
// CROSS-CHECK
// ---

/** Grid regions without data, in grid order */
function findMissingRegions(grid: GeoGrid, available: ReadonlySet<string>): string[] {
  return grid.regions.filter(region => !hasRegionData(available, region));
}

/** Data regions not in the grid, once per region in first-seen spelling and order */
function findExtraRegions(dataRegions: Iterable<string>, grid: GeoGrid): string[] {
  const seen = new Set(grid.regions.map(region => region.toUpperCase()));
  const extra: string[] = [];
  for (const region of dataRegions) {
    const key = region.toUpperCase();
    if (!seen.has(key)) {
      seen.add(key);
      extra.push(region);
    }
  }
  return extra;
}

// ---
// MAIN
// ---

/**
 * Draw one facet per grid region.
 *
 * @param data - rows tagged with a region code in `regionColumn`
 * @param plotFn - called once per region with data
 */
export function geofacet<Row extends DataRow>(
  data: readonly Row[],
  regionColumn: string,
  plotFn: PlotFunction<Row>,
  options: GeoFacetOptions = {}
): Figure {
  const onWarning = options.onWarning ?? defaultWarningHandler;

  if (data.length === 0) {
    throw new EmptyInputError();
  }
  if (!data.some(row => regionColumn in row)) {
    throw new ColumnNotFoundError(regionColumn);
  }

  const linkAxes = validateOption('linkAxes', options.linkAxes ?? 'none', LINK_MODES);
  const missingRegions = validateOption('missingRegions', options.missingRegions ?? 'skip', MISSING_REGION_POLICIES);
  const additionalRegions = validateOption(
    'additionalRegions',
    options.additionalRegions ?? 'error',
    ADDITIONAL_REGION_POLICIES
  );
  const axisOptionsList = validateAxisOptionsList(options.axisOptionsList ?? []);
  const commonAxisOptions = options.commonAxisOptions ?? {};
  const hideInnerDecorations = options.hideInnerDecorations ?? true;
  const args = options.plotArgs ?? {};

  const grid = options.grid ?? getDefaultGrid();

  // Partition
  const grouped = prepareGroupedData(data, regionColumn);
  const available = getAvailableRegions(grouped);

  // Cross-check
  const missing = findMissingRegions(grid, available);
  if (missingRegions === 'error' && missing.length > 0) {
    throw new MissingRegionsError(missing);
  }

  const extra = findExtraRegions(grouped.keys(), grid);
  if (extra.length > 0) {
    if (additionalRegions === 'error') {
      throw new ExtraRegionsError(extra);
    }
    onWarning(extraRegionsWarning(extra));
  }

  // Placeholder cells count as neighbors; skipped cells do not
  const neighborGrid =
    missingRegions === 'placeholder' ? grid : filterGrid(grid, entry => hasRegionData(available, entry.region));

  const [maxRow, maxCol] = gridDimensions(grid);
  const figure = new Figure({ size: [maxCol * 200, maxRow * 150], ...options.figure });

  const cells = new Map<string, GridLayout>();

  for (const entry of grid) {
    const { region } = entry;
    const merged = buildAxisOptionsList({
      region,
      neighborGrid,
      linkAxes,
      hideInnerDecorations,
      commonAxisOptions,
      axisOptionsList,
      axisCount: 0,
    });

    const rows = hasRegionData(available, region) ? getRegionData(grouped, region) : null;

    if (rows) {
      const layout = figure.layout.layout({ row: entry.row, col: entry.col });
      try {
        const result: unknown = plotFn(layout, rows, {
          region,
          entry,
          axisOptions: merged[0],
          axisOptionsList: merged,
          args,
        });
        if (isPromiseLike(result)) {
          // The region is reported below; a later rejection has nowhere to go
          Promise.resolve(result).catch(() => undefined);
          throw new Error('plot function must draw synchronously, it returned a promise');
        }
      } catch (error) {
        figure.layout.remove(layout);
        onWarning(renderFailureWarning(region, error));
        continue;
      }
      cells.set(region, layout);
    } else if (missingRegions === 'placeholder') {
      const layout = figure.layout.layout({ row: entry.row, col: entry.col });
      for (const axisOptions of merged) {
        layout.axis({ title: region, ...axisOptions });
      }
      cells.set(region, layout);
    }
  }

  linkAxesByPosition(cells.values(), linkAxes);

  if (options.title) {
    figure.setTitle(options.title, options.titleOptions);
  }

  addLegend(figure, grid, options.legend, onWarning);

  return figure;
}
