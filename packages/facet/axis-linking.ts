/**
 * Cross-facet axis linking.
 *
 * Axes are grouped by creation order within their cell, so the first axis
 * of every cell links with the first axis of every other cell, the second
 * with the second, and so on. Axis 1 never links to axis 2.
 */

import { linkXAxes, linkYAxes, type Axis, type GridLayout } from '../renderer/figure.js';
import { linksX, linksY, type LinkMode } from './axis-options.js';

/** Every axis of every layout, layouts in order */
export function collectAxes(layouts: Iterable<GridLayout>): Axis[] {
  const axes: Axis[] = [];
  for (const layout of layouts) {
    axes.push(...layout.axes());
  }
  return axes;
}

/**
 * `result[i]` holds the i-th created axis of each layout that has one.
 */
export function collectAxesByPosition(layouts: Iterable<GridLayout>): Axis[][] {
  const groups: Axis[][] = [];
  for (const layout of layouts) {
    layout.axes().forEach((axis, i) => {
      if (groups.length <= i) groups.push([]);
      groups[i].push(axis);
    });
  }
  return groups;
}

export function linkAxesByPosition(layouts: Iterable<GridLayout>, linkAxes: LinkMode): void {
  if (linkAxes === 'none') return;

  for (const group of collectAxesByPosition(layouts)) {
    if (group.length === 0) continue;
    if (linksX(linkAxes)) linkXAxes(group);
    if (linksY(linkAxes)) linkYAxes(group);
  }
}
