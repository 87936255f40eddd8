/**
 * grid package - layout model and queries
 */

export {
  GeoFacetError,
  InvalidEntityError,
  InvalidPositionError,
  PositionConflictError,
  DuplicateRegionError,
  ShapeMismatchError,
  GridFormatError,
  type GridPosition,
} from './errors.js';

export {
  createGridEntry,
  type GridEntry,
  type GridMetadata,
} from './grid-entry.js';

export {
  GeoGrid,
  type PositionMap,
  type GridArrays,
} from './geo-grid.js';

export {
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
} from './grid-operations.js';
