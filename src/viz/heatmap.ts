import * as d3 from 'd3';
import { interpolatorFor } from '../map';
import type { SlideMap } from '../map';
import type { CrashRecord, HeatmapSlide } from '../types';
import { renderGradientLegend } from './legend';

export function projectRecords(map: SlideMap, records: readonly CrashRecord[]): [number, number][] {
  return records.flatMap((record) => {
    const xy = map.project(record.longitude, record.latitude);
    return xy ? [xy] : [];
  });
}

export function densityContours(
  points: [number, number][],
  size: [number, number],
  bandwidth: number,
  thresholds: number
): d3.ContourMultiPolygon[] {
  return d3
    .contourDensity<[number, number]>()
    .x((d) => d[0])
    .y((d) => d[1])
    .size(size)
    .bandwidth(bandwidth)
    .thresholds(thresholds)(points);
}

export function renderHeatmap(map: SlideMap, records: readonly CrashRecord[], slide: HeatmapSlide): number {
  const points = projectRecords(map, records);
  const contours = points.length === 0 ? [] : densityContours(points, [map.width, map.height], slide.bandwidth, slide.thresholds);
  const maxValue = d3.max(contours, (contour) => contour.value) ?? 0;
  const colorScale = d3.scaleSequential(interpolatorFor(slide.scheme)).domain([0, maxValue || 1]);
  const contourPath = d3.geoPath();

  map
    .layer('heatmap')
    .attr('fill-opacity', 0.75)
    .selectAll('path')
    .data(contours)
    .join('path')
    .attr('class', 'density')
    .attr('d', (d) => contourPath(d))
    .attr('fill', (d) => colorScale(d.value))
    .attr('data-value', (d) => d.value);

  map.outlines();
  renderGradientLegend(map.legend, {
    id: slide.id,
    title: 'Crash density',
    colorScale,
    format: d3.format('.1~e')
  });
  return contours.length;
}
