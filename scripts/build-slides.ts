import fs from 'node:fs/promises';
import path from 'node:path';
import { loadConfig } from '../src/config';
import { formatNumber } from '../src/stats';
import { runPipeline } from '../src/pipeline';

const MAX_OUTPUT_BYTES = 20_000_000;

async function main() {
  const config = loadConfig();
  const result = await runPipeline(config, (message) => console.log(message));

  for (const slide of result.slides) {
    const detail = slide.kind === 'text' ? '' : `: ${formatNumber(slide.records)} records, ${formatNumber(slide.marks)} marks`;
    console.log(`slide ${slide.id} (${slide.kind})${detail}`);
  }

  const size = Buffer.byteLength(result.html, 'utf8');
  if (size > MAX_OUTPUT_BYTES) {
    throw new Error(`${config.outFile} too large: ${size} bytes`);
  }
  await fs.mkdir(path.dirname(config.outFile), { recursive: true });
  await fs.writeFile(config.outFile, result.html, 'utf8');
  console.log(`wrote ${config.outFile} (${formatNumber(size)} bytes, year ${result.year ?? 'all'})`);
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
