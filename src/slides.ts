import * as d3 from 'd3';
import { filterRecords } from './derive';
import { createDocument } from './document';
import { SlideMap } from './map';
import { aggregateChoropleth, aggregateMiniCharts } from './stats';
import type { BoundaryPolygon, CrashRecord, Deck, MapSlide, ProjectionName, RecordFilter, SlideSpec } from './types';
import { renderChoropleth } from './viz/choropleth';
import { renderHeatmap } from './viz/heatmap';
import { renderAnimatedCharts, renderMiniCharts } from './viz/minicharts';
import { renderPoints } from './viz/points';

export interface DeckContext {
  records: readonly CrashRecord[];
  boundaries: ReadonlyMap<string, readonly BoundaryPolygon[]>;
  width: number;
  height: number;
  year: number | null;
  stylesheet: string;
}

export interface SlideSummary {
  id: string;
  kind: SlideSpec['kind'];
  records: number;
  marks: number;
}

export interface BuiltDeck {
  html: string;
  slides: SlideSummary[];
}

// Hash routing between slides: arrow keys, page keys and space.
const NAVIGATION = `
(() => {
  const slides = Array.from(document.querySelectorAll('.slide'));
  let current = 0;
  const show = (index) => {
    current = Math.max(0, Math.min(slides.length - 1, index));
    slides.forEach((slide, i) => slide.classList.toggle('active', i === current));
    const hash = '#' + slides[current].id;
    if (window.location.hash !== hash) history.replaceState(null, '', hash);
  };
  document.addEventListener('keydown', (event) => {
    if (['ArrowRight', 'PageDown', ' '].includes(event.key)) show(current + 1);
    if (['ArrowLeft', 'PageUp'].includes(event.key)) show(current - 1);
  });
  window.addEventListener('hashchange', () => {
    const index = slides.findIndex((slide) => '#' + slide.id === window.location.hash);
    if (index >= 0 && index !== current) show(index);
  });
  const start = slides.findIndex((slide) => '#' + slide.id === window.location.hash);
  show(start < 0 ? 0 : start);
})();
`;

export function resolveFilter(filter: RecordFilter, year: number | null): RecordFilter {
  return filter.year == null && year != null ? { ...filter, year } : filter;
}

export function renderBody<E extends HTMLElement>(container: d3.Selection<E, unknown, null, undefined>, lines: readonly string[]) {
  let list: d3.Selection<HTMLUListElement, unknown, null, undefined> | null = null;
  for (const line of lines) {
    if (line.startsWith('- ')) {
      list ??= container.append('ul');
      list.append('li').text(line.slice(2));
    } else {
      list = null;
      container.append('p').text(line);
    }
  }
}

function renderLayer(
  map: SlideMap,
  slide: MapSlide,
  records: readonly CrashRecord[],
  boundaries: readonly BoundaryPolygon[]
): number {
  switch (slide.kind) {
    case 'points':
      return renderPoints(map, records, slide);
    case 'heatmap':
      return renderHeatmap(map, records, slide);
    case 'choropleth':
      return renderChoropleth(map, aggregateChoropleth(records, boundaries), slide).legend.labels.length;
    case 'minicharts':
      return renderMiniCharts(map, aggregateMiniCharts(records, boundaries, slide.breakdown), slide);
    case 'animated':
      return renderAnimatedCharts(map, aggregateMiniCharts(records, boundaries, 'category'), slide);
  }
}

function renderMapSlide(
  figure: HTMLElement,
  slide: MapSlide,
  projection: ProjectionName,
  context: DeckContext
): SlideSummary {
  const boundaries = context.boundaries.get(slide.boundary);
  if (!boundaries) {
    throw new Error(`Slide "${slide.id}": boundary set "${slide.boundary}" was not loaded`);
  }
  const records = filterRecords(context.records, resolveFilter(slide.filter, context.year));
  const map = new SlideMap(figure, boundaries, {
    id: slide.id,
    label: slide.title,
    width: context.width,
    height: context.height,
    projection
  });
  const marks = renderLayer(map, slide, records, boundaries);
  return { id: slide.id, kind: slide.kind, records: records.length, marks };
}

export function buildDeck(deck: Deck, context: DeckContext): BuiltDeck {
  const { document, serialize } = createDocument(deck.title);
  const head = d3.select(document.head);
  head.append('meta').attr('name', 'viewport').attr('content', 'width=device-width, initial-scale=1');
  head.append('style').text(context.stylesheet);

  const main = d3.select(document.body).append('main').attr('class', 'deck');
  const cover = main.append('section').attr('class', 'slide slide-cover').attr('id', 'cover');
  cover.append('h1').text(deck.title);
  if (deck.subtitle) {
    cover.append('p').attr('class', 'subtitle').text(deck.subtitle);
  }

  const summaries = deck.slides.map((slide): SlideSummary => {
    const section = main.append('section').attr('class', `slide slide-${slide.kind}`).attr('id', slide.id);
    section.append('h2').text(slide.title);
    const body = section.append('div').attr('class', 'slide-body');
    renderBody(body, slide.body);
    if (slide.kind === 'text') {
      return { id: slide.id, kind: slide.kind, records: 0, marks: 0 };
    }
    const figure = document.createElement('figure');
    figure.className = 'slide-figure';
    section.node()?.appendChild(figure);
    return renderMapSlide(figure, slide, deck.projection, context);
  });

  d3.select(document.body).append('script').text(NAVIGATION);
  return { html: serialize(), slides: summaries };
}
