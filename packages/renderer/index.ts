/**
 * renderer package - figure model and HTML output
 */

export {
  Figure,
  GridLayout,
  Axis,
  Legend,
  LinkGroup,
  linkXAxes,
  linkYAxes,
  DEFAULT_PALETTE,
  type AxisOptions,
  type ResolvedAxisOptions,
  type YAxisPosition,
  type Limits,
  type Plot,
  type PlotKind,
  type PlotStyle,
  type LegendEntry,
  type Span,
  type Placement,
  type LayoutItem,
  type LayoutContent,
  type LinkDirection,
  type FigureOptions,
  type FigureTitle,
  type TitleOptions,
} from './figure.js';

export {
  renderFigureToHTML,
  formatTick,
  type FigureRenderOptions,
} from './figure-renderer.js';
