import { parseCrashDate, deriveRecord } from '../../src/derive';
import { createDocument } from '../../src/document';
import { SlideMap } from '../../src/map';
import type { BoundaryPolygon, CrashRecord } from '../../src/types';

export function region(
  id: string,
  name: string,
  [west, east, south, north]: [number, number, number, number],
  population: number | null = null
): BoundaryPolygon {
  return {
    id,
    name,
    level: 'test',
    population,
    feature: {
      type: 'Feature',
      properties: { id, name },
      geometry: {
        type: 'Polygon',
        coordinates: [
          [
            [west, south],
            [west, north],
            [east, north],
            [east, south],
            [west, south]
          ]
        ]
      }
    }
  };
}

export function crash(
  id: string,
  date: string,
  longitude: number,
  latitude: number,
  category = 'occupant',
  fatalities = 1
): CrashRecord {
  const parsed = parseCrashDate(date);
  if (!parsed) {
    throw new Error(`bad fixture date ${date}`);
  }
  return deriveRecord({ id, date: parsed, latitude, longitude, fatalities, category });
}

export const REGIONS: BoundaryPolygon[] = [
  region('R1', 'North', [-104, -96, 40, 46], 100_000),
  region('R2', 'East', [-96, -88, 40, 46], 200_000),
  region('R3', 'South', [-104, -96, 34, 40])
];

// R1: two summer crashes, R2: one winter crash, R3: three July crashes, plus one outside every region.
export const RECORDS: CrashRecord[] = [
  crash('a', '2019-07-04', -100, 43, 'occupant'),
  crash('b', '2019-08-10', -99, 44, 'pedestrian', 2),
  crash('c', '2019-01-15', -92, 42, 'occupant'),
  crash('d', '2019-07-20', -101, 37, 'cyclist'),
  crash('e', '2019-07-21', -100, 36, 'cyclist'),
  crash('f', '2019-07-22', -99, 38, 'occupant'),
  crash('g', '2019-03-03', -80, 30, 'pedestrian')
];

export function testMap(id = 'm', boundaries: BoundaryPolygon[] = REGIONS) {
  const { document } = createDocument('test');
  const container = document.createElement('div');
  document.body.appendChild(container);
  const map = new SlideMap(container, boundaries, {
    id,
    label: 'Test map',
    width: 400,
    height: 300,
    projection: 'mercator'
  });
  return { document, container, map };
}
