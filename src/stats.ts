import * as d3 from 'd3';
import { SEASONS } from './types';
import type {
  BoundaryPolygon,
  BreakMode,
  BreakdownKey,
  ChoroplethCell,
  ChoroplethTable,
  CrashRecord,
  LegendBreaks,
  MiniChartPoint,
  SeriesEntry
} from './types';

const PER_CAPITA = 100_000;

export interface RegionAssignment {
  byRegion: Map<string, CrashRecord[]>;
  unassigned: CrashRecord[];
}

function crossesAntimeridian(bounds: [[number, number], [number, number]]): boolean {
  return bounds[0][0] > bounds[1][0];
}

export function assignRegions(records: readonly CrashRecord[], boundaries: readonly BoundaryPolygon[]): RegionAssignment {
  const ordered = [...boundaries].sort((a, b) => d3.ascending(a.id, b.id));
  const candidates = ordered.map((boundary) => ({ boundary, bounds: d3.geoBounds(boundary.feature) }));
  const byRegion = new Map<string, CrashRecord[]>(ordered.map((boundary) => [boundary.id, []]));
  const unassigned: CrashRecord[] = [];

  for (const record of records) {
    const point: [number, number] = [record.longitude, record.latitude];
    const match = candidates.find(({ boundary, bounds }) => {
      if (!crossesAntimeridian(bounds)) {
        const [[west, south], [east, north]] = bounds;
        if (point[0] < west || point[0] > east || point[1] < south || point[1] > north) {
          return false;
        }
      }
      return d3.geoContains(boundary.feature, point);
    });
    if (match) {
      byRegion.get(match.boundary.id)?.push(record);
    } else {
      unassigned.push(record);
    }
  }
  return { byRegion, unassigned };
}

export function aggregateChoropleth(records: readonly CrashRecord[], boundaries: readonly BoundaryPolygon[]): ChoroplethTable {
  const { byRegion, unassigned } = assignRegions(records, boundaries);
  const cells: ChoroplethCell[] = [...boundaries]
    .sort((a, b) => d3.ascending(a.id, b.id))
    .map((boundary) => {
      const inside = byRegion.get(boundary.id) ?? [];
      const count = inside.length;
      return {
        boundary,
        count,
        fatalities: d3.sum(inside, (record) => record.fatalities),
        rate: boundary.population == null ? null : (count / boundary.population) * PER_CAPITA
      };
    });
  return { cells, unassigned: unassigned.length };
}

function breakdownFor(records: readonly CrashRecord[], key: BreakdownKey): SeriesEntry[] {
  const counts = d3.rollup(records, (group) => group.length, (record) => record[key]);
  const keys: string[] = key === 'season' ? [...SEASONS] : [...counts.keys()].sort(d3.ascending);
  return keys.map((entry) => ({ key: entry, value: counts.get(entry) ?? 0 }));
}

export function monthlySeries(records: readonly CrashRecord[]): number[] {
  const series = new Array<number>(12).fill(0);
  for (const record of records) {
    series[record.month - 1] += 1;
  }
  return series;
}

export function aggregateMiniCharts(
  records: readonly CrashRecord[],
  boundaries: readonly BoundaryPolygon[],
  breakdown: BreakdownKey
): MiniChartPoint[] {
  const { byRegion } = assignRegions(records, boundaries);
  return [...boundaries]
    .sort((a, b) => d3.ascending(a.id, b.id))
    .flatMap((boundary) => {
      const inside = byRegion.get(boundary.id) ?? [];
      if (inside.length === 0) return [];
      const [lon, lat] = d3.geoCentroid(boundary.feature);
      return [
        {
          id: boundary.id,
          name: boundary.name,
          coordinates: [lon, lat] as const,
          breakdown: breakdownFor(inside, breakdown),
          monthly: monthlySeries(inside)
        }
      ];
    });
}

export function seriesTotal(series: readonly SeriesEntry[]): number {
  return d3.sum(series, (entry) => entry.value);
}

export function minMax(values: number[]): { min: number; max: number } {
  return { min: d3.min(values) ?? 0, max: d3.max(values) ?? 0 };
}

export function equalIntervalBreaks(values: number[], k = 5): number[] {
  if (values.length === 0) {
    return [];
  }
  const { min, max } = minMax(values);
  if (min === max) {
    return [min, max];
  }
  const step = (max - min) / k;
  const breaks = [min];
  for (let i = 1; i < k; i += 1) {
    breaks.push(min + step * i);
  }
  breaks.push(max);
  return breaks;
}

export function quantileBreaks(values: number[], k = 5): number[] {
  if (values.length === 0) {
    return [];
  }
  const sorted = [...values].sort((a, b) => a - b);
  const breaks = [sorted[0]];
  for (let i = 1; i < k; i += 1) {
    const q = d3.quantileSorted(sorted, i / k) ?? sorted[sorted.length - 1];
    breaks.push(q);
  }
  breaks.push(sorted[sorted.length - 1]);
  return breaks;
}

function initialiseCentroids(sorted: number[], k: number): number[] {
  const centroids: number[] = [];
  for (let i = 0; i < k; i += 1) {
    const position = (i / (k - 1)) * (sorted.length - 1);
    const lower = Math.floor(position);
    const upper = Math.ceil(position);
    centroids.push(lower === upper ? sorted[lower] : (sorted[lower] + sorted[upper]) / 2);
  }
  return centroids;
}

// One-dimensional k-means over the sorted values; close to Jenks natural breaks for small k.
export function jenksBreaks(values: number[], k = 5, iterations = 200): number[] {
  if (values.length === 0) {
    return [];
  }
  const data = [...values].sort((a, b) => a - b);
  const centroids = initialiseCentroids(data, k);
  const assignments = new Array<number>(data.length).fill(0);
  for (let iter = 0; iter < iterations; iter += 1) {
    let moved = false;
    for (let i = 0; i < data.length; i += 1) {
      let bestCluster = 0;
      let bestDist = Infinity;
      for (let c = 0; c < k; c += 1) {
        const dist = Math.abs(data[i] - centroids[c]);
        if (dist < bestDist) {
          bestDist = dist;
          bestCluster = c;
        }
      }
      if (assignments[i] !== bestCluster) {
        assignments[i] = bestCluster;
        moved = true;
      }
    }
    const clusterSums = new Array<number>(k).fill(0);
    const clusterCounts = new Array<number>(k).fill(0);
    for (let i = 0; i < data.length; i += 1) {
      clusterSums[assignments[i]] += data[i];
      clusterCounts[assignments[i]] += 1;
    }
    for (let c = 0; c < k; c += 1) {
      if (clusterCounts[c] > 0) {
        centroids[c] = clusterSums[c] / clusterCounts[c];
      }
    }
    if (!moved) {
      break;
    }
  }
  const clusterValues: number[][] = Array.from({ length: k }, () => []);
  for (let i = 0; i < data.length; i += 1) {
    clusterValues[assignments[i]].push(data[i]);
  }
  const breaks = [data[0]];
  for (let c = 0; c < k - 1; c += 1) {
    const cluster = clusterValues[c];
    breaks.push(cluster.length === 0 ? breaks[breaks.length - 1] : cluster[cluster.length - 1]);
  }
  breaks.push(data[data.length - 1]);
  return breaks;
}

export function formatNumber(value: number | null): string {
  if (value == null || Number.isNaN(value)) {
    return '—';
  }
  return Number.isInteger(value) ? d3.format(',')(value) : d3.format(',.1f')(value);
}

export function formatBreaks(breaks: number[]): LegendBreaks {
  if (breaks.length < 2) {
    return { bins: [], labels: [] };
  }
  const labels: string[] = [];
  for (let i = 0; i < breaks.length - 1; i += 1) {
    labels.push(`${formatNumber(breaks[i])} – ${formatNumber(breaks[i + 1])}`);
  }
  return { bins: breaks, labels };
}

export function computeBreaks(values: number[], mode: BreakMode, classes = 5): LegendBreaks {
  const filtered = values.filter((v) => Number.isFinite(v));
  if (filtered.length === 0) {
    return { bins: [], labels: [] };
  }
  let breaks: number[];
  if (mode === 'equal') {
    breaks = equalIntervalBreaks(filtered, classes);
  } else if (mode === 'jenks') {
    breaks = jenksBreaks(filtered, classes);
  } else {
    breaks = quantileBreaks(filtered, classes);
  }
  const deduped = [breaks[0]];
  for (let i = 1; i < breaks.length; i += 1) {
    if (breaks[i] !== deduped[deduped.length - 1]) {
      deduped.push(breaks[i]);
    }
  }
  if (deduped.length === 1) {
    deduped.push(deduped[0]);
  }
  return formatBreaks(deduped);
}
