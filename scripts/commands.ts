// The cat, collect, filter and obj commands: inputs, engines and writer wired together

import type { Writable } from 'stream';
import type { SortingStrategy } from './types.js';
import { parseCityJSON, stringifyCityJSON } from './cityjson.js';
import { stringifyFeature } from './feature.js';
import { cat } from './split.js';
import { collect } from './merge.js';
import { type FeatureFilter, filterStream } from './filters.js';
import { projectFilter, resolveCrs } from './reproject.js';
import { toObj } from './obj.js';
import { openInput, readLines, readText, writeLine } from './lines.js';
import { CityJsonError } from './errors.js';

const PROGRESS_EVERY = 1000;

function log(message: string): void {
  console.error(message);
}

async function* prepend(
  first: string,
  rest: AsyncIterator<string>
): AsyncGenerator<string> {
  yield first;
  for (let next = await rest.next(); !next.done; next = await rest.next()) {
    yield next.value;
  }
}

export interface CatOptions {
  file?: string;
  order: SortingStrategy;
  verbose?: boolean;
}

export async function runCat(
  opts: CatOptions,
  out: Writable = process.stdout
): Promise<void> {
  if (opts.verbose) log(`📄 Reading ${opts.file ?? 'stdin'}`);
  const doc = parseCityJSON(await readText(openInput(opts.file)));
  const { header, features } = cat(doc, opts.order);

  await writeLine(out, stringifyCityJSON(header));
  let count = 0;
  for (const feature of features) {
    await writeLine(out, stringifyFeature(feature));
    count++;
    if (opts.verbose && count % PROGRESS_EVERY === 0) {
      log(`   ${count}/${doc.sortedIds.length} features`);
    }
  }
  if (opts.verbose) log(`✅ Wrote ${count} features`);
}

export interface CollectOptions {
  files: string[];
  verbose?: boolean;
}

export async function runCollect(
  opts: CollectOptions,
  out: Writable = process.stdout
): Promise<void> {
  const inputs: (string | undefined)[] = opts.files.length ? opts.files : [undefined];
  const sources = inputs.map((file) => {
    if (opts.verbose) log(`📄 Reading ${file ?? 'stdin'}`);
    return readLines(openInput(file));
  });
  const doc = await collect(sources);

  await writeLine(out, stringifyCityJSON(doc));
  if (opts.verbose) {
    log(`✅ Collected ${doc.sortedIds.length} features, ${doc.vertices.length} vertices`);
  }
}

export interface FilterOptions {
  file?: string;
  filter: FeatureFilter;
  exclude?: boolean;
  // bbox/radius coordinates are WGS84 lat/lng
  latlng?: boolean;
  projDef?: string;
  verbose?: boolean;
}

export async function runFilter(
  opts: FilterOptions,
  out: Writable = process.stdout
): Promise<void> {
  let lines: AsyncIterable<string> = readLines(openInput(opts.file));
  let filter = opts.filter;

  if (opts.latlng) {
    const iterator = lines[Symbol.asyncIterator]();
    const first = await iterator.next();
    if (first.done) throw new CityJsonError('missing header line');
    const code = resolveCrs(parseCityJSON(first.value, 1), opts.projDef);
    filter = projectFilter(filter, code);
    if (opts.verbose) log(`📄 Filter coordinates projected to ${code}`);
    lines = prepend(first.value, iterator);
  }

  const stats = await filterStream(lines, filter, opts.exclude ?? false, (line) =>
    writeLine(out, line)
  );
  if (opts.verbose) {
    log(`✅ Kept ${stats.kept} of ${stats.features} features`);
  }
  if (stats.failed > 0) {
    log(`⚠️  ${stats.failed} features could not be read`);
  }
}

export interface ObjOptions {
  file?: string;
  verbose?: boolean;
}

// A sequence has a complete JSON object on its first line; a pretty-printed document does not
export function isSequence(lines: string[]): boolean {
  if (lines.length < 2) return false;
  const first = lines[0].trim();
  return first.startsWith('{') && first.endsWith('}');
}

export async function runObj(
  opts: ObjOptions,
  out: Writable = process.stdout
): Promise<void> {
  const lines: string[] = [];
  for await (const line of readLines(openInput(opts.file))) {
    lines.push(line);
  }
  const doc = isSequence(lines) ? await collect([lines]) : parseCityJSON(lines.join('\n'));
  for (const line of toObj(doc)) {
    await writeLine(out, line);
  }
  if (opts.verbose) log(`✅ Wrote ${doc.vertices.length} vertices`);
}
