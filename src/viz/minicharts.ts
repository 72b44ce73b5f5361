import * as d3 from 'd3';
import type { SlideMap } from '../map';
import { formatNumber, seriesTotal } from '../stats';
import type { AnimatedSlide, MiniChartPoint, MiniChartSlide, SeriesEntry } from '../types';
import { renderSwatchLegend } from './legend';

const MIN_RADIUS = 4;
const MONTHS = d3.range(12).map((m) => d3.utcFormat('%b')(new Date(Date.UTC(2000, m, 1))));
const fraction = (value: number) => String(Math.round(value * 10_000) / 10_000 || 0);

interface PlacedPoint {
  point: MiniChartPoint;
  x: number;
  y: number;
}

function place(map: SlideMap, points: readonly MiniChartPoint[]): PlacedPoint[] {
  return points.flatMap((point) => {
    const xy = map.project(point.coordinates[0], point.coordinates[1]);
    return xy ? [{ point, x: xy[0], y: xy[1] }] : [];
  });
}

export function breakdownKeys(points: readonly MiniChartPoint[]): string[] {
  const keys = new Set<string>();
  for (const point of points) {
    for (const entry of point.breakdown) keys.add(entry.key);
  }
  return [...keys].sort(d3.ascending);
}

export function renderMiniCharts(map: SlideMap, points: readonly MiniChartPoint[], slide: MiniChartSlide): number {
  const placed = place(map, points);
  const keys = breakdownKeys(points);
  const color = d3.scaleOrdinal<string, string>().domain(keys).range(d3.schemeTableau10);
  const maxTotal = d3.max(points, (point) => seriesTotal(point.breakdown)) ?? 0;
  const radius = d3.scaleSqrt().domain([0, maxTotal || 1]).range([MIN_RADIUS, slide.maxRadius]);
  const pie = d3
    .pie<SeriesEntry>()
    .value((d) => d.value)
    .sort(null);

  map.outlines();
  const charts = map
    .layer('minicharts')
    .selectAll('g')
    .data(placed)
    .join('g')
    .attr('class', 'mini-chart')
    .attr('data-region', (d) => d.point.id)
    .attr('transform', (d) => `translate(${d.x.toFixed(2)},${d.y.toFixed(2)})`);

  charts.each(function (d) {
    const total = seriesTotal(d.point.breakdown);
    const arc = d3.arc<d3.PieArcDatum<SeriesEntry>>().innerRadius(0).outerRadius(radius(total));
    const group = d3.select(this);
    group
      .selectAll('path')
      .data(pie([...d.point.breakdown]).filter((slice) => slice.value > 0))
      .join('path')
      .attr('d', (slice) => arc(slice))
      .attr('fill', (slice) => color(slice.data.key))
      .attr('stroke', '#ffffff')
      .attr('stroke-width', 0.75)
      .append('title')
      .text((slice) => `${d.point.name} · ${slice.data.key}: ${formatNumber(slice.value)}`);
  });

  renderSwatchLegend(
    map.legend,
    slide.breakdown === 'season' ? 'Crashes by season' : 'Crashes by category',
    keys.map((key) => ({ label: key, color: color(key) }))
  );
  return placed.length;
}

export function renderAnimatedCharts(map: SlideMap, points: readonly MiniChartPoint[], slide: AnimatedSlide): number {
  const placed = place(map, points);
  const maxMonthly = d3.max(points, (point) => d3.max(point.monthly)) ?? 0;
  const height = d3.scaleLinear().domain([0, maxMonthly || 1]).range([0, slide.maxHeight]);
  const step = 1 / 12;

  map.outlines();
  const charts = map
    .layer('animated')
    .selectAll('g')
    .data(placed)
    .join('g')
    .attr('class', 'animated-chart')
    .attr('data-region', (d) => d.point.id)
    .attr('transform', (d) => `translate(${d.x.toFixed(2)},${d.y.toFixed(2)})`);

  charts
    .append('title')
    .text((d) => `${d.point.name}: ${formatNumber(d3.sum(d.point.monthly))} crashes`);
  charts
    .append('line')
    .attr('class', 'baseline')
    .attr('x1', -6 * slide.barWidth)
    .attr('x2', 6 * slide.barWidth)
    .attr('stroke', '#0f172a')
    .attr('stroke-width', 0.5);

  charts.each(function (d) {
    const bars = d3
      .select(this)
      .selectAll('rect')
      .data(d.point.monthly.map((value, month) => ({ value, month, h: height(value) })))
      .join('rect')
      .attr('class', 'month-bar')
      .attr('x', (bar) => (bar.month - 6) * slide.barWidth)
      .attr('y', 0)
      .attr('width', Math.max(0.5, slide.barWidth - 0.5))
      .attr('height', 0)
      .attr('fill', slide.color);

    bars.append('title').text((bar) => `${MONTHS[bar.month]}: ${formatNumber(bar.value)}`);

    // Bars grow one month at a time, hold until the cycle ends, then restart.
    const keyTimes = (bar: { month: number }) =>
      ['0', fraction(bar.month * step), fraction((bar.month + 1) * step), '1'].join(';');
    bars
      .append('animate')
      .attr('attributeName', 'height')
      .attr('values', (bar) => `0;0;${fraction(bar.h)};${fraction(bar.h)}`)
      .attr('keyTimes', keyTimes)
      .attr('dur', `${slide.duration}s`)
      .attr('repeatCount', 'indefinite');
    bars
      .append('animate')
      .attr('attributeName', 'y')
      .attr('values', (bar) => `0;0;${fraction(-bar.h)};${fraction(-bar.h)}`)
      .attr('keyTimes', keyTimes)
      .attr('dur', `${slide.duration}s`)
      .attr('repeatCount', 'indefinite');
  });

  renderSwatchLegend(map.legend, 'Crashes by month', [
    { label: `${MONTHS[0]}–${MONTHS[11]}, one ${slide.duration}s cycle`, color: slide.color }
  ]);
  return placed.length;
}
