/**
 * facet package - per-region plotting into a geographic grid
 */

export {
  EmptyInputError,
  ColumnNotFoundError,
  InvalidOptionError,
  MissingRegionsError,
  ExtraRegionsError,
} from './errors.js';

export {
  defaultWarningHandler,
  type FacetWarning,
  type ExtraRegionsWarning,
  type RenderFailureWarning,
  type NoLabeledPlotsWarning,
  type WarningHandler,
} from './warnings.js';

export {
  prepareGroupedData,
  getAvailableRegions,
  hasRegionData,
  getRegionData,
  type DataRow,
  type GroupedData,
} from './data-matcher.js';

export {
  LINK_MODES,
  getYAxisPosition,
  computeDecorationOptions,
  mergeAxisOptions,
  buildAxisOptionsList,
  type LinkMode,
  type DecorationParams,
} from './axis-options.js';

export {
  collectAxes,
  collectAxesByPosition,
  linkAxesByPosition,
} from './axis-linking.js';

export {
  hasLabeledPlots,
  collectLegendEntries,
  resolveLegendPlacement,
  addLegend,
  type LegendOptions,
} from './legend.js';

export {
  geofacet,
  MISSING_REGION_POLICIES,
  ADDITIONAL_REGION_POLICIES,
  type GeoFacetOptions,
  type MissingRegionPolicy,
  type AdditionalRegionPolicy,
  type PlotArgs,
  type PlotContext,
  type PlotFunction,
} from './geofacet.js';
