// Wavefront OBJ export of a CityJSON document

import type { CityJSON } from './cityjson.js';
import type { Geometry } from './geometry.js';
import { toRealWorld } from './types.js';
import { leafLists } from './nested-array.js';

function numericLod(g: Geometry): number {
  return g.lod === undefined ? NaN : Number(g.lod);
}

// Geometries at the highest LOD; all of them when no LOD is a number
export function highestLodGeometries(geometries: Geometry[]): Geometry[] {
  const lods = geometries.map(numericLod).filter((lod) => !isNaN(lod));
  if (lods.length === 0) return geometries;
  const max = Math.max(...lods);
  return geometries.filter((g) => numericLod(g) === max);
}

export function faceLines(g: Geometry): string[] {
  if (g.type === 'GeometryInstance') return [];
  const lines: string[] = [];
  for (const ring of leafLists(g.boundaries)) {
    if (ring.length === 0) continue;
    lines.push('f ' + ring.map((i) => i + 1).join(' '));
  }
  return lines;
}

export function toObj(doc: CityJSON): string[] {
  const lines = [
    `# CityJSON ${doc.version}`,
    `# ${doc.vertices.length} vertices, ${doc.cityObjects.size} city objects`,
  ];
  for (const v of doc.vertices) {
    const [x, y, z] = toRealWorld(v, doc.transform);
    lines.push(`v ${x} ${y} ${z}`);
  }
  for (const [id, co] of doc.cityObjects) {
    const faces = highestLodGeometries(co.geometry ?? []).flatMap(faceLines);
    if (faces.length === 0) continue;
    lines.push(`o ${id}`, ...faces);
  }
  return lines;
}
