/**
 * Figure Renderer
 *
 * Renders a Figure to HTML: a CSS grid with one positioned block per
 * layout item, each axis drawn as an inline SVG scaled to its (possibly
 * linked) limits. Decorations flagged invisible are not emitted at all.
 */

import {
  Axis,
  Figure,
  GridLayout,
  Legend,
  type LayoutContent,
  type Limits,
  type Plot,
} from './figure.js';

// ---
// MAIN RENDER FUNCTION
// ---

export interface FigureRenderOptions {
  /** CSS class for the outer element */
  className?: string;
}

/** SVG viewBox is 0..VIEW on both axes */
const VIEW = 100;

/**
 * Render a Figure to HTML.
 */
export function renderFigureToHTML(
  figure: Figure,
  options: FigureRenderOptions = {}
): string {
  const { className = 'gf-figure' } = options;
  const [width, height] = figure.size;

  const styles = [`width:${width}px`, `height:${height}px`];
  if (figure.backgroundColor) styles.push(`background:${escapeHTML(figure.backgroundColor)}`);

  const lines: string[] = [];
  lines.push(`<div class="${escapeHTML(className)}" style="${styles.join(';')}">`);

  if (figure.title) {
    const { text, options: titleOptions } = figure.title;
    const titleStyles = [`text-align:${titleOptions.align ?? 'center'}`];
    if (titleOptions.fontSize !== undefined) titleStyles.push(`font-size:${titleOptions.fontSize}px`);
    lines.push(`<h2 class="gf-title" style="${titleStyles.join(';')}">${escapeHTML(text)}</h2>`);
  }

  renderLayout(figure.layout, lines, 'gf-grid');

  lines.push('</div>');
  return lines.join('\n');
}

// ---
// LAYOUTS
// ---

function gridArea(content: LayoutContent): string {
  const [rowStart, rowEnd] = content.rows;
  const [colStart, colEnd] = content.cols;
  return `grid-row:${rowStart} / ${rowEnd + 1};grid-column:${colStart} / ${colEnd + 1}`;
}

function renderLayout(
  layout: GridLayout,
  lines: string[],
  cssClass: string,
  area?: string
): void {
  const [rows, cols] = layout.size();
  const styles = [
    'display:grid',
    `grid-template-rows:repeat(${Math.max(rows, 1)}, 1fr)`,
    `grid-template-columns:repeat(${Math.max(cols, 1)}, 1fr)`,
  ];
  if (area) styles.unshift(area);

  lines.push(`<div class="${cssClass}" style="${styles.join(';')}">`);

  for (const content of layout.contents()) {
    const { item } = content;
    if (item instanceof Axis) {
      renderAxis(item, gridArea(content), lines);
    } else if (item instanceof GridLayout) {
      renderLayout(item, lines, 'gf-cell', gridArea(content));
    } else if (item instanceof Legend) {
      renderLegend(item, gridArea(content), lines);
    }
  }

  lines.push('</div>');
}

// ---
// AXES
// ---

function renderAxis(axis: Axis, area: string, lines: string[]): void {
  const opts = axis.options;
  const xLimits = axis.xLimits();
  const yLimits = axis.yLimits();

  const classes = ['gf-axis', `gf-yaxis-${opts.yAxisPosition}`];
  if (!opts.xTicksVisible) classes.push('gf-no-xticks');
  if (!opts.yTicksVisible) classes.push('gf-no-yticks');

  const styles = [area];
  if (opts.backgroundColor) styles.push(`background:${escapeHTML(opts.backgroundColor)}`);

  lines.push(`<div class="${classes.join(' ')}" style="${styles.join(';')}">`);

  if (opts.title !== '') {
    lines.push(`<div class="gf-axis-title">${escapeHTML(opts.title)}</div>`);
  }

  lines.push(`<svg class="gf-plot" viewBox="0 0 ${VIEW} ${VIEW}" preserveAspectRatio="none">`);
  for (const plot of axis.plots) {
    lines.push(renderPlot(plot, xLimits, yLimits));
  }
  lines.push('</svg>');

  if (opts.xTickLabelsVisible) {
    lines.push(
      `<div class="gf-xticklabels"><span>${formatTick(xLimits[0])}</span><span>${formatTick(xLimits[1])}</span></div>`
    );
  }
  if (opts.xLabelVisible && opts.xLabel !== '') {
    lines.push(`<div class="gf-xlabel">${escapeHTML(opts.xLabel)}</div>`);
  }
  if (opts.yTickLabelsVisible) {
    lines.push(
      `<div class="gf-yticklabels"><span>${formatTick(yLimits[1])}</span><span>${formatTick(yLimits[0])}</span></div>`
    );
  }
  if (opts.yLabelVisible && opts.yLabel !== '') {
    lines.push(`<div class="gf-ylabel">${escapeHTML(opts.yLabel)}</div>`);
  }

  lines.push('</div>');
}

function scale(value: number, limits: Limits, flip: boolean): number {
  const [min, max] = limits;
  const t = max === min ? 0.5 : (value - min) / (max - min);
  return (flip ? 1 - t : t) * VIEW;
}

function coord(value: number): string {
  return value.toFixed(2);
}

function renderPlot(plot: Plot, xLimits: Limits, yLimits: Limits): string {
  const color = escapeHTML(plot.color);
  const points = plot.x
    .map((x, i) => [x, plot.y[i]] as const)
    .filter(([x, y]) => Number.isFinite(x) && Number.isFinite(y))
    .map(([x, y]) => [scale(x, xLimits, false), scale(y, yLimits, true)] as const);

  switch (plot.kind) {
    case 'line': {
      const attr = points.map(([x, y]) => `${coord(x)},${coord(y)}`).join(' ');
      return `<polyline class="gf-line" points="${attr}" fill="none" stroke="${color}" />`;
    }
    case 'scatter':
      return points
        .map(([x, y]) => `<circle class="gf-point" cx="${coord(x)}" cy="${coord(y)}" r="1.5" fill="${color}" />`)
        .join('');
    case 'bar': {
      const base = scale(Math.min(Math.max(0, yLimits[0]), yLimits[1]), yLimits, true);
      const barWidth = points.length > 0 ? (VIEW / points.length) * 0.8 : 0;
      return points
        .map(([x, y]) => {
          const top = Math.min(y, base);
          const height = Math.abs(base - y);
          return `<rect class="gf-bar" x="${coord(x - barWidth / 2)}" y="${coord(top)}" width="${coord(barWidth)}" height="${coord(height)}" fill="${color}" />`;
        })
        .join('');
    }
  }
}

/**
 * Format a tick value: integers as-is, others to 3 significant digits.
 */
export function formatTick(value: number): string {
  if (Number.isInteger(value)) return String(value);
  return String(Number(value.toPrecision(3)));
}

// ---
// LEGEND
// ---

function renderLegend(legend: Legend, area: string, lines: string[]): void {
  lines.push(`<div class="gf-legend" style="${area}">`);
  if (legend.title !== '') {
    lines.push(`<div class="gf-legend-title">${escapeHTML(legend.title)}</div>`);
  }
  lines.push('<ul>');
  for (const entry of legend.entries) {
    lines.push(
      `<li class="gf-legend-${entry.kind}"><span class="gf-swatch" style="background:${escapeHTML(entry.color)}"></span>${escapeHTML(entry.label)}</li>`
    );
  }
  lines.push('</ul>');
  lines.push('</div>');
}

// ---
// UTILITIES
// ---

/**
 * Escape HTML special characters.
 */
function escapeHTML(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}
