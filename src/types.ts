import type { Feature, MultiPolygon, Polygon } from 'geojson';

export const SEASONS = ['summer', 'winter'] as const;

export type Season = typeof SEASONS[number];

export type BreakMode = 'quantile' | 'equal' | 'jenks';

export type SchemeName = 'YlOrRd' | 'Reds' | 'Blues' | 'Viridis' | 'Magma';

export type ProjectionName = 'albersUsa' | 'mercator';

export interface CrashRecord {
  readonly id: string;
  readonly date: string;
  readonly year: number;
  readonly month: number;
  readonly season: Season;
  readonly latitude: number;
  readonly longitude: number;
  readonly fatalities: number;
  readonly category: string;
}

export type RegionFeature = Feature<MultiPolygon | Polygon, Record<string, unknown>>;

export interface BoundaryPolygon {
  readonly id: string;
  readonly name: string;
  readonly level: string;
  readonly population: number | null;
  readonly feature: RegionFeature;
}

export interface BoundarySet {
  name: string;
  source: string;
  object?: string;
  idProperty: string;
  labelProperty: string;
  populationProperty?: string;
}

export interface ChoroplethCell {
  readonly boundary: BoundaryPolygon;
  readonly count: number;
  readonly fatalities: number;
  readonly rate: number | null;
}

export interface ChoroplethTable {
  readonly cells: readonly ChoroplethCell[];
  readonly unassigned: number;
}

export interface SeriesEntry {
  readonly key: string;
  readonly value: number;
}

export interface MiniChartPoint {
  readonly id: string;
  readonly name: string;
  readonly coordinates: readonly [number, number];
  readonly breakdown: readonly SeriesEntry[];
  readonly monthly: readonly number[];
}

export type BreakdownKey = 'category' | 'season';

export interface LegendBreaks {
  bins: number[];
  labels: string[];
}

export interface RecordFilter {
  year?: number;
  season?: Season;
  months?: number[];
}

interface SlideBase {
  id: string;
  title: string;
  body: string[];
}

interface MapSlideBase extends SlideBase {
  boundary: string;
  filter: RecordFilter;
}

export interface TextSlide extends SlideBase {
  kind: 'text';
}

export interface PointsSlide extends MapSlideBase {
  kind: 'points';
  radius: number;
  color: string;
  opacity: number;
  cluster: boolean;
  clusterRadius: number;
  clusterZoom: number;
}

export interface HeatmapSlide extends MapSlideBase {
  kind: 'heatmap';
  bandwidth: number;
  thresholds: number;
  scheme: SchemeName;
}

export interface ChoroplethSlide extends MapSlideBase {
  kind: 'choropleth';
  metric: 'count' | 'rate';
  breakMode: BreakMode;
  classes: number;
  scheme: SchemeName;
}

export interface MiniChartSlide extends MapSlideBase {
  kind: 'minicharts';
  breakdown: BreakdownKey;
  maxRadius: number;
}

export interface AnimatedSlide extends MapSlideBase {
  kind: 'animated';
  duration: number;
  barWidth: number;
  maxHeight: number;
  color: string;
}

export type MapSlide = PointsSlide | HeatmapSlide | ChoroplethSlide | MiniChartSlide | AnimatedSlide;

export type SlideSpec = TextSlide | MapSlide;

export interface Deck {
  title: string;
  subtitle: string;
  year: number | null;
  projection: ProjectionName;
  boundaries: BoundarySet[];
  slides: SlideSpec[];
}
