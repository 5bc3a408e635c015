#!/usr/bin/env node
// cjseq: convert between CityJSON documents and CityJSONSeq streams

import {
  ArgsError,
  getBoolArg,
  getCommand,
  getNumberArg,
  getNumberValues,
  getPositionalArgs,
  getStringArg,
  makeArgGetter,
} from './argparse.js';
import {
  type SortingStrategy,
  SORTING_STRATEGIES,
  isSortingStrategy,
} from './types.js';
import type { BBox, FeatureFilter } from './filters.js';
import { runCat, runCollect, runFilter, runObj } from './commands.js';

function printHelp(): void {
  console.log('cjseq: CityJSON <-> CityJSONSeq');
  console.log('');
  console.log('Usage:');
  console.log(
    '  cjseq cat [-f <file>] [-o <order>]          # CityJSON -> CityJSONSeq'
  );
  console.log(
    '  cjseq collect [<file>...]                   # CityJSONSeq -> CityJSON'
  );
  console.log(
    '  cjseq filter [-f <file>] <filter> [--exclude]  # CityJSONSeq -> CityJSONSeq'
  );
  console.log(
    '  cjseq obj [-f <file>]                       # CityJSON -> Wavefront OBJ'
  );
  console.log('');
  console.log('Input is read from stdin when no file is given; output goes to stdout.');
  console.log('');
  console.log('Arguments:');
  console.log('  -f, --file <path>              Input file');
  console.log(
    `  -o, --order <order>            Feature order for cat (one of ${SORTING_STRATEGIES.join(', ')}; default: insertion)`
  );
  console.log('  --bbox <minx miny maxx maxy>   Keep features whose centroid is inside the box');
  console.log('  --radius <x y r>               Keep features whose centroid is within r of (x, y)');
  console.log('  --cotype <type>                Keep features whose main object has this type');
  console.log('  --random <n>                   Keep one feature in n, at random');
  console.log('  --exclude                      Invert the filter');
  console.log(
    '  --latlng                       bbox/radius coordinates are WGS84 lat,lng (bbox: minlat minlng maxlat maxlng)'
  );
  console.log('  --proj-def <proj4 string>      Projection of the dataset CRS, for --latlng');
  console.log('  -v, --verbose                  Print progress on stderr');
  console.log('  -h, --help                     Show this help message');
  console.log('');
  console.log('Examples:');
  console.log('  cjseq cat -f city.city.json > city.city.jsonl');
  console.log('  cjseq filter -f city.city.jsonl --cotype Building | cjseq collect > buildings.city.json');
  console.log('  cjseq collect a.city.jsonl b.city.jsonl > ab.city.json');
}

const getOrderArg = makeArgGetter<SortingStrategy>((arg: string) => {
  if (!isSortingStrategy(arg)) {
    throw new ArgsError(
      `--order must be one of ${SORTING_STRATEGIES.join(', ')}, got "${arg}"`
    );
  }
  return arg;
});

function getFilter(): FeatureFilter {
  const filters: FeatureFilter[] = [];

  const bbox = getNumberValues('bbox', [], 4);
  if (bbox) {
    const [minx, miny, maxx, maxy] = bbox;
    const box: BBox = [minx, miny, maxx, maxy];
    filters.push({ kind: 'bbox', bbox: box });
  }
  const radius = getNumberValues('radius', [], 3);
  if (radius) {
    const [x, y, r] = radius;
    filters.push({ kind: 'radius', center: [x, y], radius: r });
  }
  const cotype = getStringArg('cotype');
  if (cotype) {
    filters.push({ kind: 'cotype', cotype });
  }
  const n = getNumberArg('random', [], {
    validate: (value) => {
      if (!Number.isInteger(value) || value < 1) {
        throw new ArgsError(`--random takes a positive integer, got ${value}`);
      }
    },
  });
  if (n !== undefined) {
    filters.push({ kind: 'random', n });
  }

  if (filters.length !== 1) {
    throw new ArgsError(
      'filter takes exactly one of --bbox, --radius, --cotype, --random'
    );
  }
  return filters[0];
}

async function main(): Promise<void> {
  const command = getCommand();
  if (getBoolArg('help', ['h']) || !command) {
    printHelp();
    return;
  }

  const file = getStringArg('file', ['f']);
  const verbose = getBoolArg('verbose', ['v']);

  switch (command) {
    case 'cat':
      await runCat({
        file,
        order: getOrderArg('order', ['o'], { default: 'insertion' }) ?? 'insertion',
        verbose,
      });
      break;
    case 'collect':
      await runCollect({
        files: file ? [file, ...getPositionalArgs()] : getPositionalArgs(),
        verbose,
      });
      break;
    case 'filter':
      await runFilter({
        file,
        filter: getFilter(),
        exclude: getBoolArg('exclude'),
        latlng: getBoolArg('latlng'),
        projDef: getStringArg('proj-def'),
        verbose,
      });
      break;
    case 'obj':
      await runObj({ file, verbose });
      break;
    default:
      throw new ArgsError(`Unknown command "${command}"; see cjseq --help`);
  }
}

main().catch((e: unknown) => {
  console.error(`❌ ${e instanceof Error ? e.message : String(e)}`);
  process.exit(1);
});
