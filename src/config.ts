import path from 'node:path';

export interface BuildConfig {
  crashData: string;
  deckFile: string;
  outFile: string;
  year: number | null;
  width: number;
  height: number;
}

type Env = Record<string, string | undefined>;

export function defaultConfig(root: string = process.cwd()): BuildConfig {
  return {
    crashData: path.join(root, 'data', 'crashes.csv'),
    deckFile: path.join(root, 'data', 'deck.json'),
    outFile: path.join(root, 'dist', 'slides.html'),
    year: null,
    width: 960,
    height: 600
  };
}

function integerFrom(env: Env, key: string, min: number, max: number): number | undefined {
  const raw = env[key];
  if (raw == null || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${key} must be an integer from ${min} to ${max}, got "${raw}"`);
  }
  return value;
}

export function loadConfig(env: Env = process.env, root: string = process.cwd()): BuildConfig {
  const config = defaultConfig(root);
  const resolve = (value: string | undefined, fallback: string) =>
    value == null || value.trim() === '' ? fallback : path.resolve(root, value);
  return {
    crashData: resolve(env.CRASH_DATA, config.crashData),
    deckFile: resolve(env.DECK_FILE, config.deckFile),
    outFile: resolve(env.SLIDES_OUT, config.outFile),
    year: integerFrom(env, 'SLIDES_YEAR', 1900, 2100) ?? config.year,
    width: integerFrom(env, 'MAP_WIDTH', 200, 4000) ?? config.width,
    height: integerFrom(env, 'MAP_HEIGHT', 200, 4000) ?? config.height
  };
}
