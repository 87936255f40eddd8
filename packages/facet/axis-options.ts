/**
 * Axis Options Merge
 *
 * Computes the options each axis of a cell is created with. For axis i:
 *
 *   commonAxisOptions  <  axisOptionsList[i]  <  decoration options[i]
 *
 * (later layers win on key collision). Decoration options hide the inner
 * ticks, tick labels and axis labels of linked axes: x decorations when
 * another rendered cell lies anywhere below, y decorations when one lies
 * anywhere on the side the y axis is drawn on.
 */

import type { GeoGrid } from '../grid/geo-grid.js';
import { hasNeighborBelow, hasNeighborLeft, hasNeighborRight } from '../grid/grid-operations.js';
import type { AxisOptions, YAxisPosition } from '../renderer/figure.js';

export const LINK_MODES = ['none', 'x', 'y', 'both'] as const;

/** Which axis ranges are shared across facets */
export type LinkMode = (typeof LINK_MODES)[number];

export function linksX(mode: LinkMode): boolean {
  return mode === 'x' || mode === 'both';
}

export function linksY(mode: LinkMode): boolean {
  return mode === 'y' || mode === 'both';
}

/** Side the y axis is drawn on (default: left) */
export function getYAxisPosition(options: AxisOptions): YAxisPosition {
  return options.yAxisPosition ?? 'left';
}

/** 0 means "as many axes as per-axis options, at least one" */
function resolveAxisCount(axisOptionsList: readonly AxisOptions[], axisCount: number): number {
  if (axisCount > 0) return axisCount;
  return Math.max(1, axisOptionsList.length);
}

const HIDDEN_X_DECORATIONS: AxisOptions = {
  xTicksVisible: false,
  xTickLabelsVisible: false,
  xLabelVisible: false,
};

const HIDDEN_Y_DECORATIONS: AxisOptions = {
  yTicksVisible: false,
  yTickLabelsVisible: false,
  yLabelVisible: false,
};

export interface DecorationParams {
  region: string;
  /** Grid the neighbor queries run against (only cells that get drawn) */
  neighborGrid: GeoGrid;
  linkAxes: LinkMode;
  hideInnerDecorations: boolean;
  commonAxisOptions: AxisOptions;
  axisOptionsList: readonly AxisOptions[];
  /** Number of axes in the cell; 0 derives it from axisOptionsList */
  axisCount: number;
}

/**
 * Decoration-hiding options, one object per axis.
 */
export function computeDecorationOptions(params: DecorationParams): AxisOptions[] {
  const { region, neighborGrid, linkAxes, hideInnerDecorations, commonAxisOptions, axisOptionsList } = params;
  const count = resolveAxisCount(axisOptionsList, params.axisCount);

  const result: AxisOptions[] = [];
  for (let i = 0; i < count; i++) {
    if (!hideInnerDecorations) {
      result.push({});
      continue;
    }

    let options: AxisOptions = {};

    if (linksX(linkAxes) && hasNeighborBelow(neighborGrid, region)) {
      options = { ...options, ...HIDDEN_X_DECORATIONS };
    }

    if (linksY(linkAxes)) {
      const position = getYAxisPosition({ ...commonAxisOptions, ...axisOptionsList[i] });
      const hasSideNeighbor =
        position === 'right' ? hasNeighborRight(neighborGrid, region) : hasNeighborLeft(neighborGrid, region);
      if (hasSideNeighbor) {
        options = { ...options, ...HIDDEN_Y_DECORATIONS };
      }
    }

    result.push(options);
  }
  return result;
}

/**
 * Merge the three option layers per axis. Always returns fresh objects.
 */
export function mergeAxisOptions(
  commonAxisOptions: AxisOptions,
  axisOptionsList: readonly AxisOptions[],
  decorationOptionsList: readonly AxisOptions[],
  axisCount = 0
): AxisOptions[] {
  const count = resolveAxisCount(axisOptionsList, axisCount);

  const result: AxisOptions[] = [];
  for (let i = 0; i < count; i++) {
    result.push({
      ...commonAxisOptions,
      ...axisOptionsList[i],
      ...decorationOptionsList[i],
    });
  }
  return result;
}

/**
 * Final options for every axis of a cell.
 */
export function buildAxisOptionsList(params: DecorationParams): AxisOptions[] {
  const decorations = computeDecorationOptions(params);
  return mergeAxisOptions(params.commonAxisOptions, params.axisOptionsList, decorations, params.axisCount);
}
