// Streaming filters over a CityJSONSeq: one feature at a time, header passed through as-is

import { type Transform, type Vec2, identityTransform, toRealWorld } from './types.js';
import { parseCityJSON } from './cityjson.js';
import {
  type CityJSONFeature,
  featureCentroid,
  mainCityObject,
  parseFeature,
} from './feature.js';
import type { LineSource } from './merge.js';

// [minx, miny, maxx, maxy]
export type BBox = [number, number, number, number];

export type FeatureFilter =
  | { kind: 'bbox'; bbox: BBox }
  | { kind: 'radius'; center: Vec2; radius: number }
  | { kind: 'cotype'; cotype: string }
  | { kind: 'random'; n: number; random?: () => number };

export interface FilterStats {
  features: number;
  kept: number;
  failed: number;
}

export type Predicate = (line: string, lineNumber: number) => boolean;

// Real-world x/y of the average feature vertex
export function realCentroid(f: CityJSONFeature, transform: Transform): Vec2 {
  const [x, y] = toRealWorld(featureCentroid(f), transform);
  return [x, y];
}

export function insideBBox(point: Vec2, bbox: BBox): boolean {
  const [x, y] = point;
  return x > bbox[0] && x < bbox[2] && y > bbox[1] && y < bbox[3];
}

export function withinRadius(point: Vec2, center: Vec2, radius: number): boolean {
  const d2 = (point[0] - center[0]) ** 2 + (point[1] - center[1]) ** 2;
  return d2 <= radius * radius;
}

// Uniform integer in [1, n]; kept iff it is 1
export function drawOneIn(n: number, random: () => number = Math.random): boolean {
  return Math.floor(random() * n) + 1 === 1;
}

export function needsTransform(filter: FeatureFilter): boolean {
  return filter.kind === 'bbox' || filter.kind === 'radius';
}

// Whether a feature line is selected (before `exclude` is applied)
export function makePredicate(
  filter: FeatureFilter,
  transform: Transform
): Predicate {
  switch (filter.kind) {
    case 'bbox':
      return (line, n) =>
        insideBBox(realCentroid(parseFeature(line, n), transform), filter.bbox);
    case 'radius':
      return (line, n) =>
        withinRadius(
          realCentroid(parseFeature(line, n), transform),
          filter.center,
          filter.radius
        );
    case 'cotype':
      return (line, n) => mainCityObject(parseFeature(line, n)).type === filter.cotype;
    case 'random':
      return () => drawOneIn(filter.n, filter.random);
  }
}

/**
 * Write the header, then every feature line the filter keeps.
 * A feature line that cannot be read is reported and skipped; the stream goes on.
 */
export async function filterStream(
  lines: LineSource,
  filter: FeatureFilter,
  exclude: boolean,
  write: (line: string) => void | Promise<void>,
  report: (message: string) => void = (message) => console.error(message)
): Promise<FilterStats> {
  const stats: FilterStats = { features: 0, kept: 0, failed: 0 };
  let predicate: Predicate | undefined;
  let lineNumber = 0;

  for await (const line of lines) {
    lineNumber++;
    if (lineNumber === 1) {
      const transform = needsTransform(filter)
        ? parseCityJSON(line, lineNumber).transform
        : identityTransform();
      predicate = makePredicate(filter, transform);
      await write(line);
      continue;
    }
    if (!predicate) continue;

    stats.features++;
    let selected: boolean;
    try {
      selected = predicate(line, lineNumber);
    } catch (e) {
      stats.failed++;
      report(`⚠️  Skipping line ${lineNumber}: ${e instanceof Error ? e.message : String(e)}`);
      continue;
    }
    if (selected !== exclude) {
      stats.kept++;
      await write(line);
    }
  }

  return stats;
}
