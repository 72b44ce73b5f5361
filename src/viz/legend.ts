import * as d3 from 'd3';
import type { LegendBreaks } from '../types';

type LegendContainer = d3.Selection<HTMLDivElement, unknown, null, undefined>;

export interface SwatchEntry {
  label: string;
  color: string;
}

export function renderSwatchLegend(container: LegendContainer, title: string, entries: SwatchEntry[]) {
  container.selectAll('*').remove();
  container.append('p').attr('class', 'legend-title').text(title);
  if (entries.length === 0) {
    container.append('p').attr('class', 'legend-empty').text('No data available');
    return;
  }
  const list = container.append('ul').attr('class', 'legend-swatches');
  for (const entry of entries) {
    const item = list.append('li').attr('class', 'legend-item');
    item.append('span').attr('class', 'legend-swatch').style('background', entry.color);
    item.append('span').text(entry.label);
  }
}

export function thresholdEntries(scale: d3.ScaleThreshold<number, string>, legend: LegendBreaks): SwatchEntry[] {
  const { bins, labels } = legend;
  return labels.map((label, idx) => ({ label, color: scale((bins[idx] + bins[idx + 1]) / 2) }));
}

export interface GradientLegendParams {
  id: string;
  title: string;
  colorScale: d3.ScaleSequential<string>;
  width?: number;
  format?: (value: number) => string;
}

export function renderGradientLegend(container: LegendContainer, params: GradientLegendParams) {
  const width = params.width ?? 280;
  const height = 60;
  container.selectAll('*').remove();

  const svg = container
    .append('svg')
    .attr('class', 'legend')
    .attr('viewBox', `0 0 ${width} ${height}`)
    .attr('preserveAspectRatio', 'xMidYMid meet');

  svg.append('text').attr('class', 'legend-title').attr('x', 0).attr('y', 12).text(params.title);
  const gradientId = `${params.id}-gradient`;
  const gradient = svg
    .append('defs')
    .append('linearGradient')
    .attr('id', gradientId)
    .attr('x1', '0%')
    .attr('x2', '100%')
    .attr('y1', '0%')
    .attr('y2', '0%');

  const [min, max] = params.colorScale.domain();
  const stops = d3.range(0, 1.0001, 0.2).map((t) => ({ offset: t, color: params.colorScale(min + (max - min) * t) }));
  gradient
    .selectAll('stop')
    .data(stops)
    .join('stop')
    .attr('offset', (d) => `${Math.round(d.offset * 100)}%`)
    .attr('stop-color', (d) => d.color);

  svg
    .append('rect')
    .attr('class', 'legend-bar')
    .attr('x', 0)
    .attr('y', 20)
    .attr('height', 12)
    .attr('width', width - 20)
    .attr('fill', `url(#${gradientId})`);

  const axisScale = d3.scaleLinear().domain([min, max]).range([0, width - 20]);
  const formatter = params.format ?? d3.format('.2~s');
  const axis = d3.axisBottom(axisScale).ticks(4).tickFormat((value) => formatter(Number(value)));
  svg.append('g').attr('class', 'legend-axis').attr('transform', 'translate(0, 40)').call(axis);
}
