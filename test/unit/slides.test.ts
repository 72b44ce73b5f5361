import { describe, it, expect } from 'vitest';
import * as d3 from 'd3';
import { buildDeck, renderBody, resolveFilter } from '../../src/slides';
import type { DeckContext } from '../../src/slides';
import type { Deck } from '../../src/types';
import { REGIONS, RECORDS, testMap } from './fixtures';

const map = { boundary: 'test', body: [] };

const deck: Deck = {
  title: 'Test deck',
  subtitle: 'Fixture crashes',
  year: null,
  projection: 'mercator',
  boundaries: [{ name: 'test', source: 'test.json', idProperty: 'id', labelProperty: 'name' }],
  slides: [
    { id: 'intro', kind: 'text', title: 'Intro', body: ['Why maps', '- points', '- regions'] },
    {
      ...map,
      id: 'dots',
      kind: 'points',
      title: 'Dots',
      filter: {},
      radius: 2,
      color: '#b91c1c',
      opacity: 0.6,
      cluster: false,
      clusterRadius: 40,
      clusterZoom: 4
    },
    {
      ...map,
      id: 'counts',
      kind: 'choropleth',
      title: 'Counts',
      filter: {},
      metric: 'count',
      breakMode: 'quantile',
      classes: 3,
      scheme: 'Reds'
    },
    { ...map, id: 'pies', kind: 'minicharts', title: 'Pies', filter: {}, breakdown: 'category', maxRadius: 20 },
    {
      ...map,
      id: 'winter-bars',
      kind: 'animated',
      title: 'Winter',
      filter: { season: 'winter' },
      duration: 4,
      barWidth: 2,
      maxHeight: 30,
      color: '#1d4ed8'
    }
  ]
};

const context: DeckContext = {
  records: RECORDS,
  boundaries: new Map([['test', REGIONS]]),
  width: 400,
  height: 300,
  year: 2019,
  stylesheet: '.slide { display: none; }'
};

describe('buildDeck', () => {
  it('summarises what each slide shows', () => {
    const built = buildDeck(deck, context);
    expect(built.slides).toEqual([
      { id: 'intro', kind: 'text', records: 0, marks: 0 },
      { id: 'dots', kind: 'points', records: 7, marks: 7 },
      { id: 'counts', kind: 'choropleth', records: 7, marks: 3 },
      { id: 'pies', kind: 'minicharts', records: 7, marks: 3 },
      { id: 'winter-bars', kind: 'animated', records: 2, marks: 1 }
    ]);
  });

  it('writes one section per slide after the cover', () => {
    const { html } = buildDeck(deck, context);
    expect(html.startsWith('<!DOCTYPE html><html lang="en"><head><meta charset="utf-8"><title>Test deck</title>')).toBe(true);
    expect(html.match(/<section /g)).toHaveLength(6);
    expect(html).toContain('<section class="slide slide-cover" id="cover"><h1>Test deck</h1><p class="subtitle">Fixture crashes</p></section>');
    expect(html).toContain('<section class="slide slide-text" id="intro"><h2>Intro</h2>');
    expect(html).toContain('<style>.slide { display: none; }</style>');
    expect(html.endsWith('</script></body></html>')).toBe(true);
  });

  it('applies the deck year unless a slide names its own', () => {
    const older = { ...context, year: 2018 };
    expect(buildDeck(deck, older).slides[1].records).toBe(0);
    expect(buildDeck(deck, { ...context, year: null }).slides[1].records).toBe(7);
  });

  it('produces the same document every time', () => {
    expect(buildDeck(deck, context).html).toBe(buildDeck(deck, context).html);
  });

  it('fails when a slide needs boundaries that were not loaded', () => {
    expect(() => buildDeck(deck, { ...context, boundaries: new Map() })).toThrow(
      'Slide "dots": boundary set "test" was not loaded'
    );
  });
});

describe('renderBody', () => {
  it('groups dash lines into lists', () => {
    const { document } = testMap();
    const div = document.createElement('div');
    renderBody(d3.select(div), ['Intro', '- one', '- two', 'After', '- three']);
    expect(div.innerHTML).toBe('<p>Intro</p><ul><li>one</li><li>two</li></ul><p>After</p><ul><li>three</li></ul>');
  });
});

describe('resolveFilter', () => {
  it('fills in the deck year only when the slide has none', () => {
    expect(resolveFilter({ season: 'summer' }, 2019)).toEqual({ season: 'summer', year: 2019 });
    expect(resolveFilter({ year: 2018 }, 2019)).toEqual({ year: 2018 });
    expect(resolveFilter({ months: [1] }, null)).toEqual({ months: [1] });
  });
});
