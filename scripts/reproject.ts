// Lat/lng filter arguments projected into the dataset CRS

import fs from 'fs';
import proj4 from 'proj4';
import { z } from 'zod';
import type { Vec2 } from './types.js';
import type { CityJSON } from './cityjson.js';
import { parseReferenceSystem, referenceSystemCode } from './metadata.js';
import { CjseqError } from './errors.js';
import { parseWith } from './schema.js';
import type { BBox, FeatureFilter } from './filters.js';

const CRS_DEFS_FILE = new URL('./data/crs-defs.json', import.meta.url);

const crsDefsSchema = z.record(z.string());

export function loadCrsDefinitions(
  file: URL | string = CRS_DEFS_FILE
): Record<string, string> {
  return parseWith(
    crsDefsSchema,
    JSON.parse(fs.readFileSync(file, 'utf8')),
    'CRS definitions'
  );
}

// Registers the CRS of the header with proj4 and returns its "EPSG:xxxx" code
export function resolveCrs(header: CityJSON, projDef?: string): string {
  const url = header.metadata?.referenceSystem;
  if (!url) {
    throw new CjseqError(
      'Lat/lng coordinates need metadata.referenceSystem in the header'
    );
  }
  const code = referenceSystemCode(parseReferenceSystem(url));
  if (projDef) {
    proj4.defs(code, projDef);
    return code;
  }
  const definition = loadCrsDefinitions()[code];
  if (definition === undefined) {
    throw new CjseqError(
      `No projection definition for ${code}; pass one with --proj-def`
    );
  }
  proj4.defs(code, definition);
  return code;
}

export function latLngToCrs(latlng: Vec2, code: string): Vec2 {
  const [lat, lng] = latlng;
  // proj4 takes [lng, lat]
  const [x, y] = proj4('EPSG:4326', code, [lng, lat]);
  return [x, y];
}

// bbox given as [minLat, minLng, maxLat, maxLng]; the envelope of the projected corners
export function projectBBox(bbox: BBox, code: string): BBox {
  const [minLat, minLng, maxLat, maxLng] = bbox;
  const corners = [
    latLngToCrs([minLat, minLng], code),
    latLngToCrs([minLat, maxLng], code),
    latLngToCrs([maxLat, minLng], code),
    latLngToCrs([maxLat, maxLng], code),
  ];
  const xs = corners.map((c) => c[0]);
  const ys = corners.map((c) => c[1]);
  return [Math.min(...xs), Math.min(...ys), Math.max(...xs), Math.max(...ys)];
}

export function projectFilter(filter: FeatureFilter, code: string): FeatureFilter {
  switch (filter.kind) {
    case 'bbox':
      return { kind: 'bbox', bbox: projectBBox(filter.bbox, code) };
    case 'radius':
      return { ...filter, center: latLngToCrs(filter.center, code) };
    default:
      return filter;
  }
}
