import { readFile } from 'node:fs/promises';
import path from 'node:path';
import * as d3 from 'd3';
import { csvParse } from 'd3-dsv';
import { feature } from 'topojson-client';
import type { Feature, GeoJsonProperties, Geometry, MultiPolygon, Polygon, Position } from 'geojson';
import type { Topology } from 'topojson-specification';
import { deriveRecord, parseCrashDate } from './derive';
import type { BoundaryPolygon, BoundarySet, CrashRecord, RegionFeature } from './types';

type CrashRow = Record<string, unknown>;

const REQUIRED_COLUMNS = ['id', 'crash_date', 'latitude', 'longitude'] as const;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMissingFile(error: unknown): boolean {
  return isRecord(error) && error.code === 'ENOENT';
}

export async function readText(file: string, label: string): Promise<string> {
  try {
    const text = await readFile(file, 'utf8');
    return text.startsWith('\uFEFF') ? text.slice(1) : text;
  } catch (error) {
    if (isMissingFile(error)) {
      throw new Error(`${label} not found: ${file}`, { cause: error });
    }
    throw error;
  }
}

export function parseJson(text: string, source: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`${source}: invalid JSON (${reason})`, { cause: error });
  }
}

function cell(row: CrashRow, column: string): string | null {
  const value = row[column];
  if (value == null) return null;
  const text = String(value).trim();
  return text === '' ? null : text;
}

function parseNumber(value: string | null): number | null {
  if (value == null) return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

export function parseCrashRows(rows: readonly CrashRow[], source: string): CrashRecord[] {
  const seen = new Set<string>();
  return rows.map((row, index) => {
    const where = `${source} row ${index + 1}`;
    for (const column of REQUIRED_COLUMNS) {
      if (cell(row, column) == null) {
        throw new Error(`${where}: missing value for "${column}"`);
      }
    }
    const id = cell(row, 'id') ?? '';
    if (seen.has(id)) {
      throw new Error(`${where}: duplicate id "${id}"`);
    }
    seen.add(id);

    const dateText = cell(row, 'crash_date') ?? '';
    const date = parseCrashDate(dateText);
    if (!date) {
      throw new Error(`${where}: unparseable crash_date "${dateText}"`);
    }
    const latitude = parseNumber(cell(row, 'latitude'));
    if (latitude == null || latitude < -90 || latitude > 90) {
      throw new Error(`${where}: latitude out of range "${cell(row, 'latitude')}"`);
    }
    const longitude = parseNumber(cell(row, 'longitude'));
    if (longitude == null || longitude < -180 || longitude > 180) {
      throw new Error(`${where}: longitude out of range "${cell(row, 'longitude')}"`);
    }
    const fatalitiesText = cell(row, 'fatalities');
    const fatalities = fatalitiesText == null ? 1 : parseNumber(fatalitiesText);
    if (fatalities == null || !Number.isInteger(fatalities) || fatalities < 1) {
      throw new Error(`${where}: fatalities must be a positive integer, got "${fatalitiesText}"`);
    }

    return deriveRecord({
      id,
      date,
      latitude,
      longitude,
      fatalities,
      category: (cell(row, 'category') ?? 'unknown').toLowerCase()
    });
  });
}

export function parseCrashText(text: string, source: string): CrashRecord[] {
  const extension = path.extname(source).toLowerCase();
  if (extension === '.csv') {
    const rows = csvParse(text);
    for (const column of REQUIRED_COLUMNS) {
      if (!rows.columns.includes(column)) {
        throw new Error(`${source}: missing column "${column}"`);
      }
    }
    return parseCrashRows(rows, source);
  }
  if (extension === '.json') {
    const parsed = parseJson(text, source);
    if (!Array.isArray(parsed)) {
      throw new Error(`${source}: expected an array of crash rows`);
    }
    const rows = parsed.map((row, index) => {
      if (!isRecord(row)) {
        throw new Error(`${source} row ${index + 1}: expected an object`);
      }
      return row;
    });
    return parseCrashRows(rows, source);
  }
  throw new Error(`${source}: unsupported crash data format "${extension || 'none'}"`);
}

export async function loadCrashes(file: string): Promise<CrashRecord[]> {
  const text = await readText(file, 'Crash data');
  return parseCrashText(text, file);
}

function isRemote(source: string): boolean {
  return /^https?:\/\//i.test(source);
}

async function readBoundarySource(source: string): Promise<unknown> {
  if (isRemote(source)) {
    let body: unknown;
    try {
      body = await d3.json<unknown>(source);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new Error(`Boundary fetch failed for ${source}: ${reason}`, { cause: error });
    }
    if (body == null) {
      throw new Error(`Boundary fetch returned no content: ${source}`);
    }
    return body;
  }
  const text = await readText(source, 'Boundary data');
  return parseJson(text, source);
}

function isTopology(value: unknown): value is Topology {
  return isRecord(value) && value.type === 'Topology' && isRecord(value.objects) && Array.isArray(value.arcs);
}

function isFeature(value: unknown): value is Feature<Geometry | null, GeoJsonProperties> {
  return isRecord(value) && value.type === 'Feature';
}

function reverseRings(rings: Position[][]): Position[][] {
  return rings.map((ring) => [...ring].reverse());
}

function windRings(rings: Position[][]): Position[][] {
  return d3.geoArea({ type: 'Polygon', coordinates: rings }) > 2 * Math.PI ? reverseRings(rings) : rings;
}

// d3-geo reads exterior rings clockwise; RFC 7946 files wind them the other way and
// would otherwise cover everything but the region. Each polygon is checked on its own.
export function rewind(geometry: MultiPolygon | Polygon): MultiPolygon | Polygon {
  if (geometry.type === 'Polygon') {
    const coordinates = windRings(geometry.coordinates);
    return coordinates === geometry.coordinates ? geometry : { type: 'Polygon', coordinates };
  }
  const coordinates = geometry.coordinates.map(windRings);
  return coordinates.every((rings, index) => rings === geometry.coordinates[index])
    ? geometry
    : { type: 'MultiPolygon', coordinates };
}

function toRegionFeature(item: Feature<Geometry | null, GeoJsonProperties>): RegionFeature | null {
  const geometry = item.geometry;
  if (!geometry || (geometry.type !== 'Polygon' && geometry.type !== 'MultiPolygon')) {
    return null;
  }
  return { type: 'Feature', id: item.id, properties: { ...(item.properties ?? {}) }, geometry: rewind(geometry) };
}

export function extractFeatures(value: unknown, set: Pick<BoundarySet, 'source' | 'object'>): RegionFeature[] {
  let features: Feature<Geometry | null, GeoJsonProperties>[];
  if (isTopology(value)) {
    const name = set.object ?? Object.keys(value.objects)[0];
    const object = name == null ? undefined : value.objects[name];
    if (!object) {
      throw new Error(`${set.source}: no object "${name ?? ''}" in topology`);
    }
    const converted = feature(value, object);
    features = 'features' in converted ? converted.features : [converted];
  } else if (isRecord(value) && value.type === 'FeatureCollection' && Array.isArray(value.features)) {
    features = value.features.filter(isFeature);
  } else {
    throw new Error(`${set.source}: expected a TopoJSON topology or a GeoJSON FeatureCollection`);
  }
  return features.map(toRegionFeature).filter((item): item is RegionFeature => item !== null);
}

function propertyText(value: unknown): string | null {
  if (typeof value === 'string' && value.trim() !== '') return value.trim();
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

export function toBoundaries(features: readonly RegionFeature[], set: BoundarySet): BoundaryPolygon[] {
  const seen = new Set<string>();
  const boundaries = features.map((item, index) => {
    const id = propertyText(item.properties[set.idProperty]) ?? propertyText(item.id);
    if (id == null) {
      throw new Error(`${set.source}: feature ${index + 1} has no "${set.idProperty}"`);
    }
    if (seen.has(id)) {
      throw new Error(`${set.source}: duplicate boundary id "${id}"`);
    }
    seen.add(id);
    const population = set.populationProperty
      ? parseNumber(propertyText(item.properties[set.populationProperty]))
      : null;
    return {
      id,
      name: propertyText(item.properties[set.labelProperty]) ?? id,
      level: set.name,
      population: population != null && population > 0 ? population : null,
      feature: item
    };
  });
  return boundaries.sort((a, b) => d3.ascending(a.id, b.id));
}

export async function loadBoundaries(set: BoundarySet): Promise<BoundaryPolygon[]> {
  const body = await readBoundarySource(set.source);
  const boundaries = toBoundaries(extractFeatures(body, set), set);
  if (boundaries.length === 0) {
    throw new Error(`${set.source}: no polygon features in boundary set "${set.name}"`);
  }
  return boundaries;
}
