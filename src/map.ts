import * as d3 from 'd3';
import type { FeatureCollection } from 'geojson';
import type { BoundaryPolygon, ProjectionName, RegionFeature, SchemeName } from './types';

export const DEFAULT_COLORS = {
  background: '#f1f5f9',
  border: '#0f172a',
  noData: '#94a3b8'
};

const INTERPOLATORS: Record<SchemeName, (t: number) => string> = {
  YlOrRd: d3.interpolateYlOrRd,
  Reds: d3.interpolateReds,
  Blues: d3.interpolateBlues,
  Viridis: d3.interpolateViridis,
  Magma: d3.interpolateMagma
};

export function interpolatorFor(scheme: SchemeName): (t: number) => string {
  return INTERPOLATORS[scheme];
}

export interface SlideMapOptions {
  id: string;
  label: string;
  width: number;
  height: number;
  projection: ProjectionName;
  padding?: number;
}

function featureCollection(features: RegionFeature[]): FeatureCollection {
  return { type: 'FeatureCollection', features };
}

function createProjection(name: ProjectionName): d3.GeoProjection {
  return name === 'albersUsa' ? d3.geoAlbersUsa() : d3.geoMercator();
}

export class SlideMap {
  readonly svg: d3.Selection<SVGSVGElement, unknown, null, undefined>;

  readonly legend: d3.Selection<HTMLDivElement, unknown, null, undefined>;

  readonly projection: d3.GeoProjection;

  readonly path: d3.GeoPath<unknown, d3.GeoPermissibleObjects>;

  readonly hatchId: string;

  readonly width: number;

  readonly height: number;

  readonly boundaries: readonly BoundaryPolygon[];

  private regionsLayer: d3.Selection<SVGGElement, unknown, null, undefined>;

  private outlineLayer: d3.Selection<SVGGElement, unknown, null, undefined> | null = null;

  constructor(container: HTMLElement, boundaries: readonly BoundaryPolygon[], options: SlideMapOptions) {
    this.boundaries = boundaries;
    this.width = options.width;
    this.height = options.height;
    this.hatchId = `${options.id}-hatch`;
    const padding = options.padding ?? 16;

    this.projection = createProjection(options.projection).fitExtent(
      [
        [padding, padding],
        [this.width - padding, this.height - padding]
      ],
      featureCollection(boundaries.map((boundary) => boundary.feature))
    );
    this.path = d3.geoPath(this.projection);

    const frame = d3.select(container).append('div').attr('class', 'map-frame');
    this.svg = frame
      .append('svg')
      .attr('role', 'img')
      .attr('aria-label', options.label)
      .attr('class', 'slide-map')
      .attr('viewBox', `0 0 ${this.width} ${this.height}`)
      .attr('preserveAspectRatio', 'xMidYMid meet');

    const defs = this.svg.append('defs');
    const pattern = defs
      .append('pattern')
      .attr('id', this.hatchId)
      .attr('patternUnits', 'userSpaceOnUse')
      .attr('width', 6)
      .attr('height', 6)
      .attr('patternTransform', 'rotate(45)');
    pattern.append('rect').attr('width', 6).attr('height', 6).attr('fill', 'rgba(148, 163, 184, 0.4)');
    pattern
      .append('line')
      .attr('x1', 0)
      .attr('y1', 0)
      .attr('x2', 0)
      .attr('y2', 6)
      .attr('stroke', 'rgba(15, 23, 42, 0.4)')
      .attr('stroke-width', 1);

    this.regionsLayer = this.svg.append('g').attr('class', 'regions');
    this.regionsLayer
      .selectAll<SVGPathElement, BoundaryPolygon>('path')
      .data(boundaries, (d) => d.id)
      .join('path')
      .attr('class', 'region')
      .attr('data-region', (d) => d.id)
      .attr('d', (d) => this.path(d.feature))
      .attr('fill', DEFAULT_COLORS.background)
      .attr('stroke', DEFAULT_COLORS.border)
      .attr('stroke-opacity', 0.35)
      .attr('stroke-width', 0.6);

    this.legend = frame.append('div').attr('class', 'map-legend');
  }

  get regions(): d3.Selection<SVGPathElement, BoundaryPolygon, SVGGElement, unknown> {
    return this.regionsLayer.selectAll<SVGPathElement, BoundaryPolygon>('path.region');
  }

  layer(name: string): d3.Selection<SVGGElement, unknown, null, undefined> {
    return this.svg.append('g').attr('class', `layer layer-${name}`);
  }

  project(longitude: number, latitude: number): [number, number] | null {
    return this.projection([longitude, latitude]);
  }

  // Region borders drawn over the fill layers; idempotent.
  outlines() {
    if (this.outlineLayer) {
      this.outlineLayer.raise();
      return;
    }
    this.outlineLayer = this.svg.append('g').attr('class', 'outlines').attr('pointer-events', 'none');
    this.outlineLayer
      .selectAll('path')
      .data(this.boundaries)
      .join('path')
      .attr('d', (d) => this.path(d.feature))
      .attr('fill', 'none')
      .attr('stroke', DEFAULT_COLORS.border)
      .attr('stroke-opacity', 0.5)
      .attr('stroke-width', 0.6);
  }
}
