import * as d3 from 'd3';
import { DEFAULT_COLORS, interpolatorFor } from '../map';
import type { SlideMap } from '../map';
import { computeBreaks, formatNumber } from '../stats';
import type { ChoroplethCell, ChoroplethSlide, ChoroplethTable, LegendBreaks, SchemeName } from '../types';
import { renderSwatchLegend, thresholdEntries } from './legend';

export type ChoroplethMetric = ChoroplethSlide['metric'];

export function cellValue(cell: ChoroplethCell, metric: ChoroplethMetric): number | null {
  return metric === 'rate' ? cell.rate : cell.count;
}

export function thresholdScale(legend: LegendBreaks, scheme: SchemeName): d3.ScaleThreshold<number, string> {
  const { bins } = legend;
  if (bins.length === 0) {
    return d3.scaleThreshold<number, string>().domain([0]).range([DEFAULT_COLORS.noData]);
  }
  const interpolate = interpolatorFor(scheme);
  const classes = Math.max(1, bins.length - 1);
  const colors = classes === 1 ? [interpolate(0.6)] : d3.quantize((t) => interpolate(t * 0.85 + 0.15), classes);
  return d3.scaleThreshold<number, string>().domain(bins.slice(1, -1)).range(colors);
}

export function metricLabel(metric: ChoroplethMetric): string {
  return metric === 'rate' ? 'Crashes per 100,000 residents' : 'Fatal crashes';
}

export interface ChoroplethResult {
  legend: LegendBreaks;
  scale: d3.ScaleThreshold<number, string>;
}

export function renderChoropleth(map: SlideMap, table: ChoroplethTable, slide: ChoroplethSlide): ChoroplethResult {
  const cells = new Map(table.cells.map((cell) => [cell.boundary.id, cell] as const));
  const values = table.cells
    .map((cell) => cellValue(cell, slide.metric))
    .filter((value): value is number => value != null);
  const legend = computeBreaks(values, slide.breakMode, slide.classes);
  const scale = thresholdScale(legend, slide.scheme);

  const valueOf = (id: string) => {
    const cell = cells.get(id);
    return cell ? cellValue(cell, slide.metric) : null;
  };

  map.regions
    .attr('fill', (d) => {
      const value = valueOf(d.id);
      return value == null ? `url(#${map.hatchId})` : scale(value);
    })
    .attr('data-hatched', (d) => (valueOf(d.id) == null ? 'true' : null))
    .attr('data-value', (d) => valueOf(d.id))
    .append('title')
    .text((d) => `${d.name}: ${formatNumber(valueOf(d.id))}`);

  map.outlines();
  renderSwatchLegend(map.legend, metricLabel(slide.metric), thresholdEntries(scale, legend));
  if (table.unassigned > 0) {
    map.legend
      .append('p')
      .attr('class', 'legend-note')
      .text(`${formatNumber(table.unassigned)} crashes outside the mapped regions`);
  }
  return { legend, scale };
}
