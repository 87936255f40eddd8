/**
 * Figure Model Test Suite
 */

import { describe, it, expect } from 'vitest';
import {
  Axis,
  Figure,
  GridLayout,
  Legend,
  linkXAxes,
  linkYAxes,
  DEFAULT_PALETTE,
} from '../packages/renderer/figure.js';

describe('Axis', () => {
  it('resolves option defaults', () => {
    const axis = new Axis({ title: 'CA', yTicksVisible: false });

    expect(axis.options).toMatchObject({
      title: 'CA',
      xLabel: '',
      xTicksVisible: true,
      yTicksVisible: false,
      yAxisPosition: 'left',
    });
  });

  it('records plots with palette colors by plot order', () => {
    const axis = new Axis();
    const first = axis.lines([1, 2], [3, 4], { label: 'a' });
    const second = axis.scatter([1], [1]);
    const third = axis.barplot([1], [2], { color: 'black' });

    expect(first).toEqual({ kind: 'line', x: [1, 2], y: [3, 4], label: 'a', color: DEFAULT_PALETTE[0] });
    expect(second.color).toBe(DEFAULT_PALETTE[1]);
    expect(second.label).toBeUndefined();
    expect(third.color).toBe('black');
    expect(axis.plots).toHaveLength(3);
  });

  it('copies plotted arrays', () => {
    const xs = [1, 2];
    const plot = new Axis().lines(xs, [1, 2]);
    xs.push(3);

    expect(plot.x).toEqual([1, 2]);
  });

  it('rejects x and y of different lengths', () => {
    expect(() => new Axis().lines([1, 2], [1])).toThrow('line plot needs x and y of equal length, got 2 and 1');
  });

  it('hides all decorations', () => {
    const axis = new Axis({ title: 'kept' });
    axis.hideDecorations();

    expect(axis.options).toMatchObject({
      title: 'kept',
      xTicksVisible: false,
      xTickLabelsVisible: false,
      xLabelVisible: false,
      yTicksVisible: false,
      yTickLabelsVisible: false,
      yLabelVisible: false,
    });
  });
});

describe('Axis limits', () => {
  it('follows its own data', () => {
    const axis = new Axis();
    axis.lines([1, 3], [10, 20]);
    axis.scatter([0], [15]);

    expect(axis.dataLimits()).toEqual({ x: [0, 3], y: [10, 20] });
    expect(axis.xLimits()).toEqual([0, 3]);
    expect(axis.yLimits()).toEqual([10, 20]);
  });

  it('ignores non-finite values', () => {
    const axis = new Axis();
    axis.lines([1, 2, 3], [5, NaN, 7]);

    expect(axis.yLimits()).toEqual([5, 7]);
  });

  it('pads a flat range and defaults to [0, 1] without data', () => {
    const flat = new Axis();
    flat.lines([2, 2], [4, 4]);

    expect(flat.xLimits()).toEqual([1.5, 2.5]);
    expect(new Axis().dataLimits()).toBeNull();
    expect(new Axis().yLimits()).toEqual([0, 1]);
  });

  it('prefers explicit limits', () => {
    const axis = new Axis({ yLimits: [0, 100] });
    axis.lines([1], [5]);

    expect(axis.yLimits()).toEqual([0, 100]);
  });
});

describe('Axis linking', () => {
  it('shares the union of ranges in the linked direction only', () => {
    const a = new Axis();
    const b = new Axis();
    a.lines([0, 1], [0, 10]);
    b.lines([5, 6], [-5, 2]);

    linkYAxes([a, b]);

    expect(a.yLimits()).toEqual([-5, 10]);
    expect(b.yLimits()).toEqual([-5, 10]);
    expect(a.xLimits()).toEqual([0, 1]);
    expect(b.xLimits()).toEqual([5, 6]);
  });

  it('is transitive across separate link calls', () => {
    const [a, b, c] = [new Axis(), new Axis(), new Axis()];
    a.lines([0], [0]);
    c.lines([9], [9]);

    linkXAxes([a, b]);
    linkXAxes([b, c]);

    expect(a.linkGroup('x')).toBe(c.linkGroup('x'));
    expect(a.xLimits()).toEqual([0, 9]);
    expect(a.linkedAxes('x')).toHaveLength(2);
    expect(a.linkedAxes('x')[0]).toBe(b);
    expect(a.linkedAxes('x')[1]).toBe(c);
  });

  it('is idempotent', () => {
    const [a, b] = [new Axis(), new Axis()];
    linkXAxes([a, b]);
    linkXAxes([a, b]);

    expect(a.linkGroup('x').members.size).toBe(2);
    expect(a.linkedAxes('y')).toEqual([]);
  });

  it('accepts an empty list', () => {
    expect(() => linkXAxes([])).not.toThrow();
  });
});

describe('GridLayout', () => {
  it('places axes and nested layouts', () => {
    const layout = new GridLayout();
    const first = layout.axis({ title: 'first' });
    const nested = layout.layout({ row: 2, col: [1, 3] });
    nested.axis({ title: 'inner' });
    layout.axis({ title: 'last' }, { row: 1, col: 2 });

    expect(layout.size()).toEqual([2, 3]);
    expect(layout.contentAt(1, 1)[0]).toBe(first);
    expect(layout.contentAt(2, 2)[0]).toBe(nested);
    expect(layout.contentAt(3, 1)).toEqual([]);
    expect(layout.axes().map(a => a.options.title)).toEqual(['first', 'inner', 'last']);
  });

  it('removes placed items', () => {
    const layout = new GridLayout();
    const axis = layout.axis();

    expect(layout.remove(axis)).toBe(true);
    expect(layout.remove(axis)).toBe(false);
    expect(layout.contents()).toEqual([]);
    expect(layout.size()).toEqual([0, 0]);
  });
});

describe('Figure', () => {
  it('defaults its size', () => {
    expect(new Figure().size).toEqual([800, 600]);
    expect(new Figure({ size: [300, 200] }).size).toEqual([300, 200]);
  });

  it('sets a title', () => {
    const figure = new Figure();
    expect(figure.title).toBeNull();

    figure.setTitle('Rainfall', { fontSize: 20 });
    expect(figure.title).toEqual({ text: 'Rainfall', options: { fontSize: 20 } });
  });

  it('replaces a previous legend', () => {
    const figure = new Figure();
    const first = new Legend([]);
    const second = new Legend([{ label: 'a', kind: 'line', color: 'red' }], 'Series');

    figure.setLegend(first, { row: 1, col: 3 });
    figure.setLegend(second, { row: [1, 2], col: 3 });

    expect(figure.legend).toBe(second);
    expect(figure.layout.contents()).toEqual([{ item: second, rows: [1, 2], cols: [3, 3] }]);
  });

  it('lists axes cell by cell in placement order', () => {
    const figure = new Figure();
    const cellA = figure.layout.layout({ row: 1, col: 1 });
    const cellB = figure.layout.layout({ row: 1, col: 2 });
    cellB.axis({ title: 'b' });
    cellA.axis({ title: 'a' });

    expect(figure.axes().map(a => a.options.title)).toEqual(['a', 'b']);
  });
});
