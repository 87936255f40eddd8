/**
 * geogrid-facet - per-region plots arranged like a map
 *
 * Lays out one small plot per region (state, country, district...) on a
 * grid whose positions approximate the regions' geography, with shared
 * axes, inner decorations hidden and one legend for the whole figure.
 *
 * @example
 * ```typescript
 * import { createGeoFacet, GeoGrid } from 'geogrid-facet';
 *
 * const grid = GeoGrid.fromPositions({ WA: [1, 1], OR: [2, 1], ID: [1, 2] });
 * const facet = createGeoFacet({ grid, linkAxes: 'both' });
 *
 * const { html } = facet.render(rows, 'state', (layout, stateRows, { axisOptions }) => {
 *   const axis = layout.axis(axisOptions);
 *   axis.lines(stateRows.map(r => r.year), stateRows.map(r => r.value), { label: 'value' });
 * });
 * ```
 */

// grid model
export {
  GeoFacetError,
  InvalidEntityError,
  InvalidPositionError,
  PositionConflictError,
  DuplicateRegionError,
  ShapeMismatchError,
  GridFormatError,
  createGridEntry,
  GeoGrid,
  gridDimensions,
  validateGrid,
  hasRegion,
  getPosition,
  getRegionAt,
  getRegions,
  isCompleteRectangle,
  hasNeighborAbove,
  hasNeighborBelow,
  hasNeighborLeft,
  hasNeighborRight,
  filterGrid,
} from './grid/index.js';
export type { GridPosition, GridEntry, GridMetadata, PositionMap, GridArrays } from './grid/index.js';

// grid loading
export {
  parseCSV,
  parseCSVWithErrors,
  DEFAULT_GRID_NAME,
  getGridsDirectory,
  parseGridCSV,
  loadGridFromCSV,
  listAvailableGrids,
  loadGrid,
  loadUsStateGrid,
  loadUsContiguousGrid,
  US_STATE_GRID_VERSIONS,
  getDefaultGrid,
  resetDefaultGrid,
} from './parser/index.js';
export type { CSVTable, CSVRecord, CSVParseResult, UsStateGridOptions } from './parser/index.js';

// figure model + rendering
export {
  Figure,
  GridLayout,
  Axis,
  Legend,
  LinkGroup,
  linkXAxes,
  linkYAxes,
  DEFAULT_PALETTE,
  renderFigureToHTML,
  formatTick,
} from './renderer/index.js';
export type {
  AxisOptions,
  ResolvedAxisOptions,
  YAxisPosition,
  Limits,
  Plot,
  PlotKind,
  PlotStyle,
  LegendEntry,
  Span,
  Placement,
  LayoutItem,
  LayoutContent,
  LinkDirection,
  FigureOptions,
  FigureTitle,
  TitleOptions,
  FigureRenderOptions,
} from './renderer/index.js';

// faceting
export {
  EmptyInputError,
  ColumnNotFoundError,
  InvalidOptionError,
  MissingRegionsError,
  ExtraRegionsError,
  defaultWarningHandler,
  prepareGroupedData,
  getAvailableRegions,
  hasRegionData,
  getRegionData,
  LINK_MODES,
  getYAxisPosition,
  computeDecorationOptions,
  mergeAxisOptions,
  buildAxisOptionsList,
  collectAxes,
  collectAxesByPosition,
  linkAxesByPosition,
  hasLabeledPlots,
  collectLegendEntries,
  resolveLegendPlacement,
  addLegend,
  geofacet,
  MISSING_REGION_POLICIES,
  ADDITIONAL_REGION_POLICIES,
} from './facet/index.js';
export type {
  FacetWarning,
  ExtraRegionsWarning,
  RenderFailureWarning,
  NoLabeledPlotsWarning,
  WarningHandler,
  DataRow,
  GroupedData,
  LinkMode,
  DecorationParams,
  LegendOptions,
  GeoFacetOptions,
  MissingRegionPolicy,
  AdditionalRegionPolicy,
  PlotArgs,
  PlotContext,
  PlotFunction,
} from './facet/index.js';

import { geofacet, type DataRow, type GeoFacetOptions, type PlotFunction } from './facet/index.js';
import { renderFigureToHTML, type Figure, type FigureRenderOptions } from './renderer/index.js';

/**
 * Result of rendering a figure
 */
export interface RenderResult {
  html: string;
  figure: Figure;
}

/**
 * Holds default options for repeated geofacet() calls.
 */
export class GeoFacet {
  private options: GeoFacetOptions;

  constructor(options: GeoFacetOptions = {}) {
    this.options = options;
  }

  /** defaults with per-call options on top; axis options and figure options merge one level deeper */
  resolveOptions(options: GeoFacetOptions = {}): GeoFacetOptions {
    return {
      ...this.options,
      ...options,
      commonAxisOptions: { ...this.options.commonAxisOptions, ...options.commonAxisOptions },
      figure: { ...this.options.figure, ...options.figure },
    };
  }

  /** build the figure */
  plot<Row extends DataRow>(
    data: readonly Row[],
    regionColumn: string,
    plotFn: PlotFunction<Row>,
    options?: GeoFacetOptions
  ): Figure {
    return geofacet(data, regionColumn, plotFn, this.resolveOptions(options));
  }

  /** build the figure and render it to HTML */
  render<Row extends DataRow>(
    data: readonly Row[],
    regionColumn: string,
    plotFn: PlotFunction<Row>,
    options?: GeoFacetOptions & FigureRenderOptions
  ): RenderResult {
    const figure = this.plot(data, regionColumn, plotFn, options);
    const html = renderFigureToHTML(figure, { className: options?.className });
    return { html, figure };
  }
}

/**
 * Create a GeoFacet with default options.
 */
export function createGeoFacet(options: GeoFacetOptions = {}): GeoFacet {
  return new GeoFacet(options);
}
