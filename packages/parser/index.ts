/**
 * parser package - grid source format (CSV) and predefined grids
 */

export {
  parseCSV,
  parseCSVWithErrors,
  type CSVTable,
  type CSVRecord,
  type CSVParseResult,
} from './csv-parser.js';

export {
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
  type UsStateGridOptions,
} from './grid-loader.js';
