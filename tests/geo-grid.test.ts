/**
 * Grid Model Test Suite
 *
 * Entry validation and the three GeoGrid construction paths.
 */

import { describe, it, expect } from 'vitest';
import {
  createGridEntry,
  GeoGrid,
  GeoFacetError,
  InvalidEntityError,
  InvalidPositionError,
  PositionConflictError,
  DuplicateRegionError,
  ShapeMismatchError,
} from '../packages/grid/index.js';

describe('createGridEntry', () => {
  it('builds a frozen entry with defaults', () => {
    const entry = createGridEntry('CA', 3, 1);

    expect(entry).toEqual({ region: 'CA', row: 3, col: 1, name: 'CA', metadata: {} });
    expect(Object.isFrozen(entry)).toBe(true);
    expect(Object.isFrozen(entry.metadata)).toBe(true);
  });

  it('keeps an explicit name and metadata', () => {
    const entry = createGridEntry('CA', 3, 1, 'California', { population: 39 });

    expect(entry.name).toBe('California');
    expect(entry.metadata).toEqual({ population: 39 });
  });

  it('falls back to the region for a blank name', () => {
    expect(createGridEntry('CA', 1, 1, '   ').name).toBe('CA');
  });

  it('rejects empty and whitespace-only regions', () => {
    expect(() => createGridEntry('', 1, 1)).toThrow(InvalidEntityError);
    expect(() => createGridEntry('  ', 1, 1)).toThrow(
      "Region names cannot be empty or whitespace-only, got '  '"
    );
  });

  it('rejects positions below 1', () => {
    expect(() => createGridEntry('CA', 0, 1)).toThrow(InvalidPositionError);
    expect(() => createGridEntry('CA', 1, -2)).toThrow(
      "Grid positions must be positive integers (>= 1), got (1, -2) for region 'CA'"
    );
  });

  it('rejects non-integer positions', () => {
    expect(() => createGridEntry('CA', 1.5, 1)).toThrow(InvalidPositionError);
  });

  it('exposes the offending region and position on the error', () => {
    try {
      createGridEntry('NV', 0, 4);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidPositionError);
      expect(error).toBeInstanceOf(GeoFacetError);
      if (error instanceof InvalidPositionError) {
        expect(error.region).toBe('NV');
        expect(error.position).toEqual([0, 4]);
        expect(error.name).toBe('InvalidPositionError');
      }
    }
  });
});

describe('GeoGrid.fromPositions', () => {
  it('builds a grid from a record', () => {
    const grid = GeoGrid.fromPositions({ CA: [1, 1], NY: [1, 2], TX: [2, 1] });

    expect(grid.length).toBe(3);
    expect(grid.regions).toEqual(['CA', 'NY', 'TX']);
    expect(grid.rows).toEqual([1, 1, 2]);
    expect(grid.cols).toEqual([1, 2, 1]);
    expect(grid.names).toEqual(['CA', 'NY', 'TX']);
  });

  it('builds a grid from a Map', () => {
    const grid = GeoGrid.fromPositions(new Map([['A', [2, 3] as const], ['B', [1, 1] as const]]));

    expect(grid.regions).toEqual(['A', 'B']);
    expect(grid.entry('A')).toMatchObject({ row: 2, col: 3 });
  });

  it('rejects two regions on one position, naming both', () => {
    try {
      GeoGrid.fromPositions({ A: [1, 1], B: [2, 2], C: [1, 1] });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(PositionConflictError);
      if (error instanceof PositionConflictError) {
        expect(error.regions).toEqual(['A', 'C']);
        expect(error.position).toEqual([1, 1]);
        expect(error.message).toBe("Position conflict: regions 'A' and 'C' both at position (1, 1)");
      }
    }
  });

  it('checks region names before positions', () => {
    expect(() => GeoGrid.fromPositions({ A: [0, 1], ' ': [1, 1] })).toThrow(InvalidEntityError);
  });

  it('checks positions before conflicts', () => {
    expect(() => GeoGrid.fromPositions({ A: [1, 1], B: [1, 1], C: [0, 0] })).toThrow(
      InvalidPositionError
    );
  });

  it('accepts an empty mapping', () => {
    const grid = GeoGrid.fromPositions({});
    expect(grid.length).toBe(0);
    expect([...grid]).toEqual([]);
  });
});

describe('GeoGrid.fromArrays', () => {
  it('builds a grid from parallel arrays', () => {
    const grid = GeoGrid.fromArrays({
      regions: ['WA', 'OR'],
      rows: [1, 2],
      cols: [1, 1],
      names: ['Washington', 'Oregon'],
      metadata: [{ fips: 53 }, { fips: 41 }],
    });

    expect(grid.names).toEqual(['Washington', 'Oregon']);
    expect(grid.entry('OR')?.metadata).toEqual({ fips: 41 });
  });

  it('rejects arrays of different lengths', () => {
    expect(() => GeoGrid.fromArrays({ regions: ['A', 'B'], rows: [1], cols: [1, 2] })).toThrow(
      'All input arrays must have the same length (regions=2, rows=1, cols=2)'
    );
  });

  it('counts optional arrays in the length check', () => {
    expect(() =>
      GeoGrid.fromArrays({ regions: ['A'], rows: [1], cols: [1], names: ['a', 'b'] })
    ).toThrow(ShapeMismatchError);
  });

  it('rejects two regions on one position', () => {
    expect(() =>
      GeoGrid.fromArrays({ regions: ['A', 'B', 'C'], rows: [1, 2, 1], cols: [1, 2, 1] })
    ).toThrow(new PositionConflictError('A', 'C', [1, 1]));
  });
});

describe('GeoGrid invariants', () => {
  it('rejects duplicate region codes', () => {
    expect(() =>
      GeoGrid.fromArrays({ regions: ['A', 'A'], rows: [1, 1], cols: [1, 2] })
    ).toThrow(DuplicateRegionError);
  });

  it('freezes its entries', () => {
    const grid = GeoGrid.fromPositions({ A: [1, 1] });
    expect(Object.isFrozen(grid.entries)).toBe(true);
    expect(Object.isFrozen(grid.entries[0])).toBe(true);
  });

  it('rejects two entries on one position', () => {
    expect(() =>
      GeoGrid.fromEntries([
        { region: 'A', row: 3, col: 2, name: 'A', metadata: {} },
        { region: 'B', row: 3, col: 2, name: 'B', metadata: {} },
      ])
    ).toThrow("Position conflict: regions 'A' and 'B' both at position (3, 2)");
  });

  it('iterates entries in construction order', () => {
    const grid = GeoGrid.fromEntries([
      { region: 'B', row: 2, col: 2, name: 'Bee', metadata: {} },
      { region: 'A', row: 1, col: 1, name: 'Ay', metadata: {} },
    ]);

    expect([...grid].map(e => e.region)).toEqual(['B', 'A']);
    expect(new GeoGrid(grid.entries).regions).toEqual(['B', 'A']);
  });

  it('looks entries up by region and position', () => {
    const grid = GeoGrid.fromPositions({ A: [1, 1], B: [2, 3] });

    expect(grid.entry('B')?.col).toBe(3);
    expect(grid.entryAt(1, 1)?.region).toBe('A');
    expect(grid.entry('Z')).toBeUndefined();
    expect(grid.entryAt(5, 5)).toBeUndefined();
  });
});
