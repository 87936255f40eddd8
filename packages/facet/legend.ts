/**
 * Legend pass: one legend for the whole figure, built from the labels of
 * the plots drawn in every facet.
 */

import type { GeoGrid } from '../grid/geo-grid.js';
import { gridDimensions } from '../grid/grid-operations.js';
import { Legend, type Figure, type LegendEntry, type Placement, type Span } from '../renderer/figure.js';
import { noLabeledPlotsWarning, type WarningHandler } from './warnings.js';

export interface LegendOptions {
  title?: string;
  /** Overrides either part of the default placement */
  position?: {
    row?: Span;
    col?: Span;
  };
}

export function hasLabeledPlots(figure: Figure): boolean {
  return figure.axes().some(axis => axis.plots.some(plot => !!plot.label));
}

/**
 * One entry per distinct label, in first-seen order. Kind and color come
 * from the first plot carrying the label.
 */
export function collectLegendEntries(figure: Figure): LegendEntry[] {
  const entries = new Map<string, LegendEntry>();
  for (const axis of figure.axes()) {
    for (const plot of axis.plots) {
      if (!plot.label || entries.has(plot.label)) continue;
      entries.set(plot.label, { label: plot.label, kind: plot.kind, color: plot.color });
    }
  }
  return [...entries.values()];
}

/**
 * Default: the column right of the grid, spanning all grid rows.
 */
export function resolveLegendPlacement(grid: GeoGrid, legend: LegendOptions = {}): Placement {
  const [maxRow, maxCol] = gridDimensions(grid);
  return {
    row: legend.position?.row ?? [1, Math.max(1, maxRow)],
    col: legend.position?.col ?? maxCol + 1,
  };
}

/**
 * Add the unified legend to the figure.
 *
 * @param legend - false disables the legend; undefined adds one only when
 *   there is something to show; an object requests one, and a warning is
 *   reported when no plot carries a label
 */
export function addLegend(
  figure: Figure,
  grid: GeoGrid,
  legend: LegendOptions | false | undefined,
  onWarning: WarningHandler
): void {
  if (legend === false) return;

  if (!hasLabeledPlots(figure)) {
    if (legend !== undefined) {
      onWarning(noLabeledPlotsWarning());
    }
    return;
  }

  figure.setLegend(
    new Legend(collectLegendEntries(figure), legend?.title ?? ''),
    resolveLegendPlacement(grid, legend)
  );
}
