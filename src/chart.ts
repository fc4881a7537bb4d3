import type { Summary } from './types';

export interface ChartSize {
  width: number;
  height: number;
}

export interface PieSlice {
  label: 'Income' | 'Expenses' | 'Savings';
  value: number;
  percent: number;
  percentLabel: string; // e.g. "62.5%"
  color: string;
  path?: string; // SVG path data; absent for zero-valued slices
  labelAt?: { x: number; y: number };
}

export interface PieChart {
  title: string;
  size: ChartSize;
  center: { x: number; y: number };
  radius: number;
  slices: PieSlice[];
}

export const CHART_TITLE = 'Income vs Expenses vs Savings';
export const DEFAULT_CHART_SIZE: ChartSize = { width: 400, height: 300 };

const COLORS = { Income: '#4caf50', Expenses: '#f44336', Savings: '#2196f3' } as const;
const TITLE_HEIGHT = 30;
const LEGEND_WIDTH = 120;

export function hasChartData(s: Summary): boolean {
  return s.totalIncome + s.totalExpense + s.totalSavings > 0;
}

function r2(n: number) {
  return Math.round(n * 100) / 100;
}

function pointAt(cx: number, cy: number, r: number, angle: number) {
  return { x: r2(cx + r * Math.cos(angle)), y: r2(cy + r * Math.sin(angle)) };
}

function slicePath(cx: number, cy: number, r: number, from: number, to: number): string {
  if (to - from >= 2 * Math.PI - 1e-9) {
    // full circle: two half arcs
    const top = pointAt(cx, cy, r, from);
    const bottom = pointAt(cx, cy, r, from + Math.PI);
    return `M ${top.x} ${top.y} A ${r} ${r} 0 1 1 ${bottom.x} ${bottom.y} A ${r} ${r} 0 1 1 ${top.x} ${top.y} Z`;
  }
  const a = pointAt(cx, cy, r, from);
  const b = pointAt(cx, cy, r, to);
  const large = to - from > Math.PI ? 1 : 0;
  return `M ${r2(cx)} ${r2(cy)} L ${a.x} ${a.y} A ${r} ${r} 0 ${large} 1 ${b.x} ${b.y} Z`;
}

/**
 * Builds a three-slice pie of income, expenses and savings. Slices start at
 * twelve o'clock and run clockwise. Callers should check {@link hasChartData}
 * first; an all-zero input yields slices without geometry.
 */
export function buildPieChart(
  income: number,
  expense: number,
  savings: number,
  size: ChartSize = DEFAULT_CHART_SIZE,
): PieChart {
  const values = [
    { label: 'Income' as const, value: Math.max(0, income) },
    { label: 'Expenses' as const, value: Math.max(0, expense) },
    { label: 'Savings' as const, value: Math.max(0, savings) },
  ];
  const total = values.reduce((acc, v) => acc + v.value, 0);
  const plotWidth = size.width - LEGEND_WIDTH;
  const plotHeight = size.height - TITLE_HEIGHT;
  const radius = r2(Math.max(10, Math.min(plotWidth, plotHeight) / 2 - 10));
  const center = { x: r2(plotWidth / 2), y: r2(TITLE_HEIGHT + plotHeight / 2) };

  let angle = -Math.PI / 2;
  const slices: PieSlice[] = values.map(({ label, value }) => {
    const percent = total > 0 ? (value / total) * 100 : 0;
    const slice: PieSlice = { label, value, percent, percentLabel: `${percent.toFixed(1)}%`, color: COLORS[label] };
    if (value > 0) {
      const sweep = (value / total) * 2 * Math.PI;
      slice.path = slicePath(center.x, center.y, radius, angle, angle + sweep);
      slice.labelAt = pointAt(center.x, center.y, radius * 0.65, angle + sweep / 2);
      angle += sweep;
    }
    return slice;
  });

  return { title: CHART_TITLE, size, center, radius, slices };
}

export function renderChartSvg(chart: PieChart): string {
  const { width, height } = chart.size;
  const legendX = width - LEGEND_WIDTH + 10;
  const parts: string[] = [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}" role="img" aria-label="${chart.title}">`,
    `<text x="${width / 2}" y="20" text-anchor="middle" font-size="14" font-weight="bold">${chart.title}</text>`,
  ];
  for (const s of chart.slices) {
    if (!s.path) continue;
    parts.push(`<path d="${s.path}" fill="${s.color}" stroke="#fff" stroke-width="1"/>`);
    if (s.labelAt) {
      parts.push(`<text x="${s.labelAt.x}" y="${s.labelAt.y}" text-anchor="middle" font-size="11" fill="#fff">${s.percentLabel}</text>`);
    }
  }
  chart.slices.forEach((s, i) => {
    const y = 50 + i * 22;
    parts.push(`<rect x="${legendX}" y="${y}" width="12" height="12" fill="${s.color}"/>`);
    parts.push(`<text x="${legendX + 18}" y="${y + 10}" font-size="12">${s.label} (${s.percentLabel})</text>`);
  });
  parts.push('</svg>');
  return parts.join('');
}
