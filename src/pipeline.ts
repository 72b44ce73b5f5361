import { fileURLToPath } from 'node:url';
import type { BuildConfig } from './config';
import { loadBoundaries, loadCrashes, readText } from './data';
import { loadDeck } from './deck';
import { yearsIn } from './derive';
import { buildDeck } from './slides';
import type { BuiltDeck } from './slides';
import type { BoundaryPolygon, CrashRecord, Deck } from './types';

const stylesheetPath = fileURLToPath(new URL('./slides.css', import.meta.url));

export interface PipelineInputs {
  deck: Deck;
  records: CrashRecord[];
  boundaries: Map<string, BoundaryPolygon[]>;
  stylesheet: string;
}

export interface PipelineResult extends BuiltDeck {
  inputs: PipelineInputs;
  year: number | null;
}

export type Reporter = (message: string) => void;

const silent: Reporter = () => undefined;

export function referencedBoundaries(deck: Deck): string[] {
  const names = new Set<string>();
  for (const slide of deck.slides) {
    if (slide.kind !== 'text') names.add(slide.boundary);
  }
  return deck.boundaries.map((set) => set.name).filter((name) => names.has(name));
}

export async function loadInputs(config: BuildConfig, report: Reporter = silent): Promise<PipelineInputs> {
  const deck = await loadDeck(config.deckFile);
  report(`deck: ${deck.slides.length} slides from ${config.deckFile}`);

  const records = await loadCrashes(config.crashData);
  report(`crashes: ${records.length} records (${yearsIn(records).join(', ') || 'no years'}) from ${config.crashData}`);

  const boundaries = new Map<string, BoundaryPolygon[]>();
  const wanted = new Set(referencedBoundaries(deck));
  for (const set of deck.boundaries) {
    if (!wanted.has(set.name)) continue;
    const polygons = await loadBoundaries(set);
    boundaries.set(set.name, polygons);
    report(`boundaries: ${polygons.length} ${set.name} from ${set.source}`);
  }

  const stylesheet = await readText(stylesheetPath, 'Stylesheet');
  return { deck, records, boundaries, stylesheet };
}

export function renderInputs(inputs: PipelineInputs, config: BuildConfig): PipelineResult {
  const year = config.year ?? inputs.deck.year;
  const built = buildDeck(inputs.deck, {
    records: inputs.records,
    boundaries: inputs.boundaries,
    width: config.width,
    height: config.height,
    year,
    stylesheet: inputs.stylesheet
  });
  return { ...built, inputs, year };
}

export async function runPipeline(config: BuildConfig, report: Reporter = silent): Promise<PipelineResult> {
  const inputs = await loadInputs(config, report);
  return renderInputs(inputs, config);
}
