import path from 'node:path';
import { isRecord, parseJson, readText } from './data';
import { SEASONS } from './types';
import type {
  BoundarySet,
  BreakMode,
  Deck,
  ProjectionName,
  RecordFilter,
  SchemeName,
  Season,
  SlideSpec
} from './types';

const SCHEMES: readonly SchemeName[] = ['YlOrRd', 'Reds', 'Blues', 'Viridis', 'Magma'];
const BREAK_MODES: readonly BreakMode[] = ['quantile', 'equal', 'jenks'];
const PROJECTIONS: readonly ProjectionName[] = ['albersUsa', 'mercator'];

class Reader {
  constructor(private readonly value: Record<string, unknown>, private readonly at: string) {}

  fail(key: string, expected: string): never {
    throw new Error(`${this.at}.${key}: expected ${expected}, got ${JSON.stringify(this.value[key])}`);
  }

  string(key: string, fallback?: string): string {
    const value = this.value[key];
    if (value == null && fallback != null) return fallback;
    if (typeof value !== 'string' || value.trim() === '') this.fail(key, 'a non-empty string');
    return value;
  }

  number(key: string, fallback: number, check: (n: number) => boolean = (n) => n > 0): number {
    const value = this.value[key];
    if (value == null) return fallback;
    if (typeof value !== 'number' || !Number.isFinite(value) || !check(value)) this.fail(key, 'a valid number');
    return value;
  }

  boolean(key: string, fallback: boolean): boolean {
    const value = this.value[key];
    if (value == null) return fallback;
    if (typeof value !== 'boolean') this.fail(key, 'a boolean');
    return value;
  }

  oneOf<T extends string>(key: string, options: readonly T[], fallback: T): T {
    const value = this.value[key];
    if (value == null) return fallback;
    const match = options.find((option) => option === value);
    if (match == null) this.fail(key, `one of ${options.join(', ')}`);
    return match;
  }

  lines(key: string): string[] {
    const value = this.value[key];
    if (value == null) return [];
    if (typeof value === 'string') return [value];
    if (!Array.isArray(value) || value.some((line) => typeof line !== 'string')) {
      this.fail(key, 'a string or a list of strings');
    }
    return value.map(String);
  }

  child(key: string): Reader {
    const value = this.value[key];
    if (value == null) return new Reader({}, `${this.at}.${key}`);
    if (!isRecord(value)) this.fail(key, 'an object');
    return new Reader(value, `${this.at}.${key}`);
  }

  list(key: string): Reader[] {
    const value = this.value[key];
    if (!Array.isArray(value)) this.fail(key, 'a list');
    return value.map((item, index) => {
      if (!isRecord(item)) throw new Error(`${this.at}.${key}[${index}]: expected an object`);
      return new Reader(item, `${this.at}.${key}[${index}]`);
    });
  }

  has(key: string): boolean {
    return this.value[key] != null;
  }

  raw(key: string): unknown {
    return this.value[key];
  }
}

const isYear = (n: number) => Number.isInteger(n) && n >= 1900 && n <= 2100;

function parseFilter(reader: Reader): RecordFilter {
  const filter: RecordFilter = {};
  if (reader.has('year')) {
    filter.year = reader.number('year', 0, isYear);
  }
  if (reader.has('season')) {
    filter.season = reader.oneOf<Season>('season', SEASONS, 'summer');
  }
  if (reader.has('months')) {
    const months = reader.raw('months');
    if (!Array.isArray(months) || months.some((m) => !Number.isInteger(m) || m < 1 || m > 12)) {
      reader.fail('months', 'a list of months from 1 to 12');
    }
    filter.months = months.map(Number);
  }
  return filter;
}

function parseBoundarySet(reader: Reader): BoundarySet {
  const set: BoundarySet = {
    name: reader.string('name'),
    source: reader.string('source'),
    idProperty: reader.string('idProperty', 'id'),
    labelProperty: reader.string('labelProperty', 'name')
  };
  if (reader.has('object')) set.object = reader.string('object');
  if (reader.has('populationProperty')) set.populationProperty = reader.string('populationProperty');
  return set;
}

function parseSlide(reader: Reader, index: number, boundaries: readonly BoundarySet[]): SlideSpec {
  const base = {
    id: reader.string('id', `slide-${index + 1}`),
    title: reader.string('title'),
    body: reader.lines('body')
  };
  const kind = reader.oneOf('kind', ['text', 'points', 'heatmap', 'choropleth', 'minicharts', 'animated'], 'text');
  if (kind === 'text') {
    return { ...base, kind };
  }

  const boundary = reader.string('boundary', boundaries[0]?.name);
  if (!boundaries.some((set) => set.name === boundary)) {
    reader.fail('boundary', `one of the declared boundary sets (${boundaries.map((set) => set.name).join(', ')})`);
  }
  const mapBase = { ...base, boundary, filter: parseFilter(reader.child('filter')) };

  switch (kind) {
    case 'points':
      return {
        ...mapBase,
        kind,
        radius: reader.number('radius', 2.5),
        color: reader.string('color', '#b91c1c'),
        opacity: reader.number('opacity', 0.6, (n) => n > 0 && n <= 1),
        cluster: reader.boolean('cluster', false),
        clusterRadius: reader.number('clusterRadius', 40),
        clusterZoom: reader.number('clusterZoom', 4, (n) => Number.isInteger(n) && n >= 0 && n <= 16)
      };
    case 'heatmap':
      return {
        ...mapBase,
        kind,
        bandwidth: reader.number('bandwidth', 20),
        thresholds: reader.number('thresholds', 10, (n) => Number.isInteger(n) && n > 0),
        scheme: reader.oneOf('scheme', SCHEMES, 'YlOrRd')
      };
    case 'choropleth':
      return {
        ...mapBase,
        kind,
        metric: reader.oneOf('metric', ['count', 'rate'], 'count'),
        breakMode: reader.oneOf('breakMode', BREAK_MODES, 'quantile'),
        classes: reader.number('classes', 5, (n) => Number.isInteger(n) && n >= 2 && n <= 9),
        scheme: reader.oneOf('scheme', SCHEMES, 'Reds')
      };
    case 'minicharts':
      return {
        ...mapBase,
        kind,
        breakdown: reader.oneOf('breakdown', ['category', 'season'], 'category'),
        maxRadius: reader.number('maxRadius', 28)
      };
    case 'animated':
      return {
        ...mapBase,
        kind,
        duration: reader.number('duration', 6),
        barWidth: reader.number('barWidth', 3),
        maxHeight: reader.number('maxHeight', 40),
        color: reader.string('color', '#1d4ed8')
      };
  }
}

export function parseDeck(value: unknown): Deck {
  if (!isRecord(value)) {
    throw new Error('deck: expected an object');
  }
  const reader = new Reader(value, 'deck');
  const boundaries = reader.list('boundaries').map(parseBoundarySet);
  const slides = reader.list('slides').map((slide, index) => parseSlide(slide, index, boundaries));
  if (slides.length === 0) {
    throw new Error('deck.slides: expected at least one slide');
  }
  const ids = new Set<string>(['cover']);
  for (const slide of slides) {
    if (ids.has(slide.id)) {
      throw new Error(`deck.slides: duplicate or reserved slide id "${slide.id}"`);
    }
    ids.add(slide.id);
  }
  return {
    title: reader.string('title'),
    subtitle: reader.string('subtitle', ''),
    year: reader.has('year') ? reader.number('year', 0, isYear) : null,
    projection: reader.oneOf('projection', PROJECTIONS, 'albersUsa'),
    boundaries,
    slides
  };
}

// Local boundary sources are relative to the deck file.
export async function loadDeck(file: string): Promise<Deck> {
  const text = await readText(file, 'Deck definition');
  const deck = parseDeck(parseJson(text, file));
  const base = path.dirname(file);
  return {
    ...deck,
    boundaries: deck.boundaries.map((set) =>
      /^https?:\/\//i.test(set.source) ? set : { ...set, source: path.resolve(base, set.source) }
    )
  };
}
