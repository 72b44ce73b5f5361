import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, it, expect } from 'vitest';
import { loadDeck, parseDeck } from '../../src/deck';

const boundaries = [{ name: 'states', source: 'states.json' }];

describe('parseDeck', () => {
  it('fills in defaults for every slide kind', () => {
    const deck = parseDeck({
      title: 'Crashes',
      boundaries,
      slides: [
        { title: 'Intro', body: 'Hello' },
        { kind: 'points', title: 'Points' },
        { kind: 'heatmap', title: 'Heat' },
        { kind: 'choropleth', title: 'Counts', filter: { season: 'winter', months: [1, 2] } },
        { kind: 'minicharts', title: 'Pies', breakdown: 'season' },
        { kind: 'animated', title: 'Bars', filter: { year: 2018 } }
      ]
    });
    expect(deck).toMatchObject({ title: 'Crashes', subtitle: '', year: null, projection: 'albersUsa' });
    expect(deck.boundaries).toEqual([{ name: 'states', source: 'states.json', idProperty: 'id', labelProperty: 'name' }]);
    expect(deck.slides[0]).toEqual({ id: 'slide-1', title: 'Intro', body: ['Hello'], kind: 'text' });
    expect(deck.slides[1]).toMatchObject({
      id: 'slide-2',
      boundary: 'states',
      filter: {},
      radius: 2.5,
      color: '#b91c1c',
      opacity: 0.6,
      cluster: false,
      clusterRadius: 40,
      clusterZoom: 4
    });
    expect(deck.slides[2]).toMatchObject({ bandwidth: 20, thresholds: 10, scheme: 'YlOrRd' });
    expect(deck.slides[3]).toMatchObject({
      metric: 'count',
      breakMode: 'quantile',
      classes: 5,
      scheme: 'Reds',
      filter: { season: 'winter', months: [1, 2] }
    });
    expect(deck.slides[4]).toMatchObject({ breakdown: 'season', maxRadius: 28 });
    expect(deck.slides[5]).toMatchObject({ duration: 6, barWidth: 3, maxHeight: 40, color: '#1d4ed8', filter: { year: 2018 } });
  });

  it('points at the offending field', () => {
    const slide = (extra: Record<string, unknown>) => ({ title: 'Deck', boundaries, slides: [{ title: 'S', ...extra }] });
    expect(() => parseDeck(slide({ kind: 'globe' }))).toThrow(
      'deck.slides[0].kind: expected one of text, points, heatmap, choropleth, minicharts, animated, got "globe"'
    );
    expect(() => parseDeck(slide({ kind: 'choropleth', classes: 12 }))).toThrow(
      'deck.slides[0].classes: expected a valid number, got 12'
    );
    expect(() => parseDeck(slide({ kind: 'points', filter: { months: [0] } }))).toThrow(
      'deck.slides[0].filter.months: expected a list of months from 1 to 12, got [0]'
    );
    expect(() => parseDeck(slide({ kind: 'points', boundary: 'counties' }))).toThrow(
      'deck.slides[0].boundary: expected one of the declared boundary sets (states), got "counties"'
    );
    expect(() => parseDeck({ boundaries, slides: [{ title: 'S' }] })).toThrow(
      'deck.title: expected a non-empty string, got undefined'
    );
  });

  it('rejects empty, duplicate and reserved slide lists', () => {
    expect(() => parseDeck([])).toThrow('deck: expected an object');
    expect(() => parseDeck({ title: 'T', boundaries, slides: [] })).toThrow('deck.slides: expected at least one slide');
    expect(() => parseDeck({ title: 'T', boundaries, slides: [{ id: 'a', title: 'A' }, { id: 'a', title: 'B' }] })).toThrow(
      'deck.slides: duplicate or reserved slide id "a"'
    );
    expect(() => parseDeck({ title: 'T', boundaries, slides: [{ id: 'cover', title: 'A' }] })).toThrow(
      'deck.slides: duplicate or reserved slide id "cover"'
    );
  });
});

describe('loadDeck', () => {
  let dir = '';

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
  });

  it('resolves local boundary sources beside the deck file', async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'deck-'));
    const file = path.join(dir, 'deck.json');
    await writeFile(
      file,
      JSON.stringify({
        title: 'T',
        year: 2019,
        boundaries: [
          { name: 'local', source: 'shapes/regions.json' },
          { name: 'remote', source: 'https://example.test/regions.json' }
        ],
        slides: [{ title: 'S' }]
      })
    );
    const deck = await loadDeck(file);
    expect(deck.year).toBe(2019);
    expect(deck.boundaries.map((set) => set.source)).toEqual([
      path.join(dir, 'shapes', 'regions.json'),
      'https://example.test/regions.json'
    ]);
  });

  it('names a deck file that is not valid JSON', async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'deck-'));
    const file = path.join(dir, 'deck.json');
    await writeFile(file, '{"title": "T",');
    await expect(loadDeck(file)).rejects.toThrow(`${file}: invalid JSON (`);
  });

  it('reports a missing deck file', async () => {
    await expect(loadDeck('/no/such/deck.json')).rejects.toThrow('Deck definition not found: /no/such/deck.json');
  });
});
