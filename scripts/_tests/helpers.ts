// Shared fixtures for the tests

import fs from 'fs';
import { type CityJSON, parseCityJSON } from '../cityjson.js';
import type { Geometry } from '../geometry.js';
import type { Appearance } from '../appearance.js';
import type { Transform, Vec2, Vec3, Vertex } from '../types.js';
import { toRealWorld } from '../types.js';
import { leafLists, leaves } from '../nested-array.js';

export function readFixture(name: string): string {
  return fs.readFileSync(new URL(`./fixtures/${name}`, import.meta.url), 'utf8');
}

export function loadSmallCity(): CityJSON {
  return parseCityJSON(readFixture('small.city.json'));
}

export function loadTemplateCity(): CityJSON {
  return parseCityJSON(readFixture('templates.city.json'));
}

// Real-world coordinates of every boundary leaf, in order
export function realBoundaries(
  g: Geometry,
  vertices: Vertex[],
  transform: Transform
): Vec3[] {
  return [...leaves(g.boundaries)].map((i) => {
    const v = vertices[i];
    if (!v) throw new Error(`vertex ${i} out of range`);
    return toRealWorld(v, transform);
  });
}

// Material name per surface for one theme
export function materialNames(
  g: Geometry,
  theme: string,
  appearance: Appearance | undefined
): (string | null)[] {
  const reference = g.material?.[theme];
  if (!reference) return [];
  const ids = 'value' in reference ? [reference.value] : [...leaves(reference.values)];
  return ids.map((id) => (id === null ? null : appearance?.materials?.[id]?.name ?? null));
}

// Image and uv coordinates per ring for one theme
export function textureRings(
  g: Geometry,
  theme: string,
  appearance: Appearance | undefined
): { image: string | null; uvs: Vec2[] }[] {
  const reference = g.texture?.[theme];
  if (!reference) return [];
  return [...leafLists(reference.values)].map(([textureId, ...uvIds]) => ({
    image:
      textureId === null || textureId === undefined
        ? null
        : appearance?.textures?.[textureId]?.image ?? null,
    uvs: uvIds.flatMap((id) => {
      const uv = id === null ? undefined : appearance?.verticesTexture?.[id];
      return uv ? [uv] : [];
    }),
  }));
}
