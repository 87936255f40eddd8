/**
 * Public API Tests
 */

import { describe, it, expect } from 'vitest';
import {
  createGeoFacet,
  GeoFacet,
  GeoGrid,
  Figure,
  geofacet,
  loadUsStateGrid,
  GeoFacetError,
  MissingRegionsError,
} from '../packages/index.js';

const grid = GeoGrid.fromPositions({ N: [1, 1], S: [2, 1] });

const rows = [
  { zone: 'N', t: 1, v: 4 },
  { zone: 'N', t: 2, v: 6 },
  { zone: 'S', t: 1, v: 1 },
];

describe('GeoFacet', () => {
  it('plots with its default options', () => {
    const facet = createGeoFacet({ grid, linkAxes: 'x', commonAxisOptions: { xLabel: 't' } });
    const figure = facet.plot(rows, 'zone', (layout, zoneRows, { axisOptions }) => {
      layout.axis(axisOptions).lines(zoneRows.map(r => r.t), zoneRows.map(r => r.v));
    });

    expect(facet).toBeInstanceOf(GeoFacet);
    expect(figure).toBeInstanceOf(Figure);
    expect(figure.axes().map(a => a.options.xLabel)).toEqual(['t', 't']);
    // N sits above S, so its x decorations are hidden
    expect(figure.axes().map(a => a.options.xTicksVisible)).toEqual([false, true]);
  });

  it('merges per-call options over its defaults', () => {
    const facet = new GeoFacet({
      grid,
      missingRegions: 'error',
      commonAxisOptions: { xLabel: 't', yLabel: 'v' },
    });

    const resolved = facet.resolveOptions({ missingRegions: 'skip', commonAxisOptions: { yLabel: 'value' } });

    expect(resolved.grid).toBe(grid);
    expect(resolved.missingRegions).toBe('skip');
    expect(resolved.commonAxisOptions).toEqual({ xLabel: 't', yLabel: 'value' });
  });

  it('applies its defaults when a call does not override them', () => {
    const facet = new GeoFacet({ grid, missingRegions: 'error' });
    const northOnly = rows.filter(r => r.zone === 'N');

    expect(() => facet.plot(northOnly, 'zone', () => {})).toThrow(MissingRegionsError);
    expect(facet.plot(northOnly, 'zone', () => {}, { missingRegions: 'skip' }).axes()).toEqual([]);
  });

  it('renders HTML', () => {
    const facet = createGeoFacet({ grid });
    const { html, figure } = facet.render(
      rows,
      'zone',
      (layout, zoneRows, { region }) => {
        layout.axis({ title: region }).scatter(zoneRows.map(r => r.t), zoneRows.map(r => r.v));
      },
      { className: 'map' }
    );

    expect(figure.axes()).toHaveLength(2);
    expect(html.startsWith('<div class="map" style="width:200px;height:300px">')).toBe(true);
    expect(html).toContain('<div class="gf-axis-title">S</div>');
  });
});

describe('Exports', () => {
  it('exposes the building blocks', () => {
    expect(typeof geofacet).toBe('function');
    expect(loadUsStateGrid().length).toBe(51);
    expect(new MissingRegionsError(['X'])).toBeInstanceOf(GeoFacetError);
  });
});
