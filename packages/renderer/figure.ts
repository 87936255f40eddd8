/**
 * Figure Model
 *
 * The render container that facets are drawn into:
 *
 *   Figure
 *   └── GridLayout (top level, one slot per grid position)
 *       ├── GridLayout (one per rendered region)
 *       │   └── Axis ... (created by the plot function, in order)
 *       └── Legend
 *
 * Axes hold their plots as data; nothing is rasterized here. Linked axes
 * share one LinkGroup per direction and report the union of the group's
 * data ranges as their limits. See figure-renderer.ts for HTML output.
 */

// ---
// AXIS OPTIONS
// ---

export type YAxisPosition = 'left' | 'right';

export type Limits = readonly [min: number, max: number];

/**
 * Attributes accepted by an Axis.
 */
export interface AxisOptions {
  title?: string;
  xLabel?: string;
  yLabel?: string;

  xTicksVisible?: boolean;
  xTickLabelsVisible?: boolean;
  xLabelVisible?: boolean;
  yTicksVisible?: boolean;
  yTickLabelsVisible?: boolean;
  yLabelVisible?: boolean;

  /** Side the y axis is drawn on (default: left) */
  yAxisPosition?: YAxisPosition;

  /** Fixed ranges; when absent the range follows the data (and links) */
  xLimits?: Limits;
  yLimits?: Limits;

  backgroundColor?: string;
}

export interface ResolvedAxisOptions {
  readonly title: string;
  readonly xLabel: string;
  readonly yLabel: string;
  readonly xTicksVisible: boolean;
  readonly xTickLabelsVisible: boolean;
  readonly xLabelVisible: boolean;
  readonly yTicksVisible: boolean;
  readonly yTickLabelsVisible: boolean;
  readonly yLabelVisible: boolean;
  readonly yAxisPosition: YAxisPosition;
  readonly xLimits?: Limits;
  readonly yLimits?: Limits;
  readonly backgroundColor?: string;
}

function resolveAxisOptions(options: AxisOptions): ResolvedAxisOptions {
  return {
    title: options.title ?? '',
    xLabel: options.xLabel ?? '',
    yLabel: options.yLabel ?? '',
    xTicksVisible: options.xTicksVisible ?? true,
    xTickLabelsVisible: options.xTickLabelsVisible ?? true,
    xLabelVisible: options.xLabelVisible ?? true,
    yTicksVisible: options.yTicksVisible ?? true,
    yTickLabelsVisible: options.yTickLabelsVisible ?? true,
    yLabelVisible: options.yLabelVisible ?? true,
    yAxisPosition: options.yAxisPosition ?? 'left',
    xLimits: options.xLimits,
    yLimits: options.yLimits,
    backgroundColor: options.backgroundColor,
  };
}

// ---
// PLOTS
// ---

export type PlotKind = 'line' | 'scatter' | 'bar';

export interface PlotStyle {
  /** Legend label; plots without one are left out of the legend */
  label?: string;
  color?: string;
}

export interface Plot {
  readonly kind: PlotKind;
  readonly x: readonly number[];
  readonly y: readonly number[];
  readonly label?: string;
  readonly color: string;
}

export const DEFAULT_PALETTE: readonly string[] = [
  '#4a9eff',
  '#ff6b6b',
  '#6bcf7f',
  '#ffd93d',
  '#a78bfa',
  '#f97316',
];

// ---
// LINKING
// ---

/**
 * Axes whose range is shared in one direction.
 */
export class LinkGroup {
  readonly members = new Set<Axis>();
}

export type LinkDirection = 'x' | 'y';

function linkAxes(axes: readonly Axis[], direction: LinkDirection): void {
  if (axes.length === 0) return;

  const target = axes[0].linkGroup(direction);
  for (const axis of axes) {
    const group = axis.linkGroup(direction);
    if (group === target) continue;
    for (const member of group.members) {
      target.members.add(member);
      member.setLinkGroup(direction, target);
    }
  }
}

/** Share the x range across the given axes */
export function linkXAxes(axes: readonly Axis[]): void {
  linkAxes(axes, 'x');
}

/** Share the y range across the given axes */
export function linkYAxes(axes: readonly Axis[]): void {
  linkAxes(axes, 'y');
}

function unionLimits(ranges: Limits[]): Limits | null {
  if (ranges.length === 0) return null;
  return [Math.min(...ranges.map(r => r[0])), Math.max(...ranges.map(r => r[1]))];
}

function padFlat(limits: Limits): Limits {
  return limits[0] === limits[1] ? [limits[0] - 0.5, limits[1] + 0.5] : limits;
}

// ---
// AXIS
// ---

export class Axis {
  private _options: ResolvedAxisOptions;
  private readonly _plots: Plot[] = [];
  private xGroup: LinkGroup;
  private yGroup: LinkGroup;

  constructor(options: AxisOptions = {}) {
    this._options = resolveAxisOptions(options);
    this.xGroup = new LinkGroup();
    this.xGroup.members.add(this);
    this.yGroup = new LinkGroup();
    this.yGroup.members.add(this);
  }

  get options(): ResolvedAxisOptions {
    return this._options;
  }

  get plots(): readonly Plot[] {
    return this._plots;
  }

  lines(x: readonly number[], y: readonly number[], style: PlotStyle = {}): Plot {
    return this.addPlot('line', x, y, style);
  }

  scatter(x: readonly number[], y: readonly number[], style: PlotStyle = {}): Plot {
    return this.addPlot('scatter', x, y, style);
  }

  barplot(x: readonly number[], y: readonly number[], style: PlotStyle = {}): Plot {
    return this.addPlot('bar', x, y, style);
  }

  private addPlot(kind: PlotKind, x: readonly number[], y: readonly number[], style: PlotStyle): Plot {
    if (x.length !== y.length) {
      throw new Error(`${kind} plot needs x and y of equal length, got ${x.length} and ${y.length}`);
    }
    const plot: Plot = {
      kind,
      x: [...x],
      y: [...y],
      label: style.label,
      color: style.color ?? DEFAULT_PALETTE[this._plots.length % DEFAULT_PALETTE.length],
    };
    this._plots.push(plot);
    return plot;
  }

  /** Hide ticks, tick labels and axis labels in both directions */
  hideDecorations(): void {
    this._options = {
      ...this._options,
      xTicksVisible: false,
      xTickLabelsVisible: false,
      xLabelVisible: false,
      yTicksVisible: false,
      yTickLabelsVisible: false,
      yLabelVisible: false,
    };
  }

  /** Range of this axis' own plotted data (finite values only) */
  dataLimits(): { x: Limits; y: Limits } | null {
    const xs = this._plots.flatMap(p => p.x).filter(Number.isFinite);
    const ys = this._plots.flatMap(p => p.y).filter(Number.isFinite);
    if (xs.length === 0 || ys.length === 0) return null;

    return {
      x: [Math.min(...xs), Math.max(...xs)],
      y: [Math.min(...ys), Math.max(...ys)],
    };
  }

  xLimits(): Limits {
    return this.resolveLimits('x');
  }

  yLimits(): Limits {
    return this.resolveLimits('y');
  }

  private resolveLimits(direction: LinkDirection): Limits {
    const explicit = direction === 'x' ? this._options.xLimits : this._options.yLimits;
    if (explicit) return explicit;

    const ranges: Limits[] = [];
    for (const member of this.linkGroup(direction).members) {
      const limits = member.dataLimits();
      if (limits) ranges.push(limits[direction]);
    }
    const union = unionLimits(ranges);
    return union ? padFlat(union) : [0, 1];
  }

  linkGroup(direction: LinkDirection): LinkGroup {
    return direction === 'x' ? this.xGroup : this.yGroup;
  }

  /** Used by linkXAxes/linkYAxes */
  setLinkGroup(direction: LinkDirection, group: LinkGroup): void {
    if (direction === 'x') {
      this.xGroup = group;
    } else {
      this.yGroup = group;
    }
  }

  /** Other axes sharing this axis' range in a direction */
  linkedAxes(direction: LinkDirection): Axis[] {
    return [...this.linkGroup(direction).members].filter(a => a !== this);
  }
}

// ---
// LEGEND
// ---

export interface LegendEntry {
  readonly label: string;
  readonly kind: PlotKind;
  readonly color: string;
}

export class Legend {
  constructor(
    readonly entries: readonly LegendEntry[],
    readonly title: string = ''
  ) {}
}

// ---
// GRID LAYOUT
// ---

/** A 1-based row or column, or an inclusive [start, end] range */
export type Span = number | readonly [start: number, end: number];

export interface Placement {
  row: Span;
  col: Span;
}

export type LayoutItem = Axis | GridLayout | Legend;

export interface LayoutContent {
  readonly item: LayoutItem;
  readonly rows: readonly [number, number];
  readonly cols: readonly [number, number];
}

function normalizeSpan(span: Span): readonly [number, number] {
  return typeof span === 'number' ? [span, span] : span;
}

export class GridLayout {
  private readonly items: LayoutContent[] = [];

  /** Create an axis in this layout (default position: 1, 1) */
  axis(options: AxisOptions = {}, at: Placement = { row: 1, col: 1 }): Axis {
    const axis = new Axis(options);
    this.place(axis, at);
    return axis;
  }

  /** Create a nested layout */
  layout(at: Placement): GridLayout {
    const layout = new GridLayout();
    this.place(layout, at);
    return layout;
  }

  place(item: LayoutItem, at: Placement): void {
    this.items.push({ item, rows: normalizeSpan(at.row), cols: normalizeSpan(at.col) });
  }

  /** Remove an item; returns false when it was not placed here */
  remove(item: LayoutItem): boolean {
    const index = this.items.findIndex(c => c.item === item);
    if (index === -1) return false;
    this.items.splice(index, 1);
    return true;
  }

  contents(): readonly LayoutContent[] {
    return this.items;
  }

  /** Items covering a cell, in placement order */
  contentAt(row: number, col: number): LayoutItem[] {
    return this.items
      .filter(c => c.rows[0] <= row && row <= c.rows[1] && c.cols[0] <= col && col <= c.cols[1])
      .map(c => c.item);
  }

  /** Number of rows and columns spanned by the contents */
  size(): readonly [rows: number, cols: number] {
    let rows = 0;
    let cols = 0;
    for (const c of this.items) {
      rows = Math.max(rows, c.rows[1]);
      cols = Math.max(cols, c.cols[1]);
    }
    return [rows, cols];
  }

  /** All axes in creation order, nested layouts flattened depth-first */
  axes(): Axis[] {
    const result: Axis[] = [];
    for (const { item } of this.items) {
      if (item instanceof Axis) {
        result.push(item);
      } else if (item instanceof GridLayout) {
        result.push(...item.axes());
      }
    }
    return result;
  }
}

// ---
// FIGURE
// ---

export interface FigureOptions {
  /** Width and height in pixels */
  size?: readonly [width: number, height: number];
  backgroundColor?: string;
}

export interface TitleOptions {
  fontSize?: number;
  align?: 'left' | 'center' | 'right';
}

export interface FigureTitle {
  readonly text: string;
  readonly options: TitleOptions;
}

export class Figure {
  readonly layout = new GridLayout();
  readonly size: readonly [number, number];
  readonly backgroundColor?: string;

  private _title: FigureTitle | null = null;
  private _legend: Legend | null = null;

  constructor(options: FigureOptions = {}) {
    this.size = options.size ?? [800, 600];
    this.backgroundColor = options.backgroundColor;
  }

  get title(): FigureTitle | null {
    return this._title;
  }

  get legend(): Legend | null {
    return this._legend;
  }

  setTitle(text: string, options: TitleOptions = {}): void {
    this._title = { text, options };
  }

  /** Place a legend on the top-level layout (replaces any previous one) */
  setLegend(legend: Legend, at: Placement): void {
    if (this._legend) {
      this.layout.remove(this._legend);
    }
    this.layout.place(legend, at);
    this._legend = legend;
  }

  axes(): Axis[] {
    return this.layout.axes();
  }
}
