import Supercluster from 'supercluster';
import type { SlideMap } from '../map';
import { formatNumber } from '../stats';
import type { CrashRecord, PointsSlide } from '../types';
import { renderSwatchLegend } from './legend';

type CrashPointProps = {
  id: string;
  label: string;
};

export interface PointMark {
  coordinates: [number, number];
  count: number;
  label: string;
}

const WORLD: [number, number, number, number] = [-180, -85, 180, 85];

export function pointLabel(record: CrashRecord): string {
  return `${record.date} · ${record.category}`;
}

export function clusterRecords(records: readonly CrashRecord[], radius: number, zoom: number): PointMark[] {
  const index = new Supercluster<CrashPointProps>({ radius, maxZoom: 16 });
  index.load(
    records.map((record) => ({
      type: 'Feature' as const,
      geometry: { type: 'Point' as const, coordinates: [record.longitude, record.latitude] },
      properties: { id: record.id, label: pointLabel(record) }
    }))
  );
  return index.getClusters(WORLD, zoom).map((feature): PointMark => {
    const [lon, lat] = feature.geometry.coordinates;
    const props = feature.properties;
    if ('cluster' in props) {
      return { coordinates: [lon, lat], count: props.point_count, label: `${formatNumber(props.point_count)} crashes` };
    }
    return { coordinates: [lon, lat], count: 1, label: props.label };
  });
}

export function pointMarks(records: readonly CrashRecord[]): PointMark[] {
  return records.map((record): PointMark => ({
    coordinates: [record.longitude, record.latitude],
    count: 1,
    label: pointLabel(record)
  }));
}

export function renderPoints(map: SlideMap, records: readonly CrashRecord[], slide: PointsSlide): number {
  const marks = slide.cluster ? clusterRecords(records, slide.clusterRadius, slide.clusterZoom) : pointMarks(records);
  const placed = marks.flatMap((mark) => {
    const xy = map.project(mark.coordinates[0], mark.coordinates[1]);
    return xy ? [{ ...mark, x: xy[0], y: xy[1] }] : [];
  });

  map.outlines();
  const groups = map
    .layer('points')
    .selectAll('g')
    .data(placed)
    .join('g')
    .attr('class', (d) => (d.count > 1 ? 'crash-point cluster' : 'crash-point'))
    .attr('transform', (d) => `translate(${d.x.toFixed(2)},${d.y.toFixed(2)})`);

  groups
    .append('circle')
    .attr('r', (d) => (d.count > 1 ? slide.radius * (1 + Math.sqrt(d.count)) : slide.radius))
    .attr('fill', slide.color)
    .attr('fill-opacity', slide.opacity)
    .attr('stroke', '#ffffff')
    .attr('stroke-width', 0.5)
    .append('title')
    .text((d) => d.label);

  groups
    .filter((d) => d.count > 1)
    .append('text')
    .attr('class', 'cluster-count')
    .attr('text-anchor', 'middle')
    .attr('dy', '0.35em')
    .text((d) => formatNumber(d.count));

  const shown = placed.reduce((sum, mark) => sum + mark.count, 0);
  renderSwatchLegend(map.legend, 'Fatal crashes', [
    { label: `${formatNumber(shown)} crashes${slide.cluster ? ' (clustered)' : ''}`, color: slide.color }
  ]);
  return placed.length;
}
