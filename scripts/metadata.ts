// Document metadata, OGC reference system URLs and extension declarations

import type { Extra, GeographicalExtent } from './types.js';
import {
  type RawExtension,
  type RawMetadata,
  extensionFileSchema,
  parseWith,
} from './schema.js';
import { InvalidValueError } from './errors.js';

export interface Metadata {
  geographicalExtent?: GeographicalExtent;
  identifier?: string;
  title?: string;
  referenceDate?: string;
  referenceSystem?: string;
  pointOfContact?: Record<string, unknown>;
  other: Extra;
}

export function parseMetadata(raw: RawMetadata): Metadata {
  const {
    geographicalExtent,
    identifier,
    title,
    referenceDate,
    referenceSystem,
    pointOfContact,
    ...other
  } = raw;
  return {
    geographicalExtent,
    identifier,
    title,
    referenceDate,
    referenceSystem,
    pointOfContact,
    other,
  };
}

export function metadataToJson(m: Metadata): Record<string, unknown> {
  return {
    ...m.other,
    geographicalExtent: m.geographicalExtent,
    identifier: m.identifier,
    title: m.title,
    referenceDate: m.referenceDate,
    referenceSystem: m.referenceSystem,
    pointOfContact: m.pointOfContact,
  };
}

/**
 * A CRS following the OGC Name Type Specification:
 * `http://www.opengis.net/def/crs/{authority}/{version}/{code}`,
 * where version is "0" when the CRS has no version.
 */
export interface ReferenceSystem {
  baseUrl: string;
  authority: string;
  version: string;
  code: string;
}

export function parseReferenceSystem(url: string): ReferenceSystem {
  const marker = '//www.opengis.net/def/crs';
  const at = url.indexOf(marker);
  if (at === -1) {
    throw new InvalidValueError('referenceSystem', `not an OGC CRS URL: ${url}`);
  }
  const end = at + marker.length;
  const parts = url.slice(end + 1).split('/');
  if (url[end] !== '/' || parts.length !== 3 || parts.some((p) => !p)) {
    throw new InvalidValueError('referenceSystem', `not an OGC CRS URL: ${url}`);
  }
  const [authority, version, code] = parts;
  return { baseUrl: url.slice(0, end), authority, version, code };
}

export function referenceSystemToUrl(rs: ReferenceSystem): string {
  return `${rs.baseUrl}/${rs.authority}/${rs.version}/${rs.code}`;
}

// e.g. "EPSG:7415"
export function referenceSystemCode(rs: ReferenceSystem): string {
  return `${rs.authority}:${rs.code}`;
}

export interface Extension {
  url: string;
  version: string;
  other: Extra;
}

export type Extensions = Record<string, Extension>;

export function parseExtensions(
  raw: Record<string, RawExtension> | undefined
): Extensions | undefined {
  if (!raw) return undefined;
  return Object.fromEntries(
    Object.entries(raw).map(([name, { url, version, ...other }]) => [
      name,
      { url, version, other },
    ])
  );
}

export function extensionsToJson(
  extensions: Extensions | undefined
): Record<string, unknown> | undefined {
  if (!extensions) return undefined;
  return Object.fromEntries(
    Object.entries(extensions).map(([name, e]) => [
      name,
      { ...e.other, url: e.url, version: e.version },
    ])
  );
}

// The schema file an extension's url points at (fetching it is left to the caller)
export interface ExtensionFile {
  type: string;
  name: string;
  description: string;
  url: string;
  version: string;
  versionCityJSON: string;
  extraAttributes: unknown;
  extraCityObjects: unknown;
  extraRootProperties: unknown;
  extraSemanticSurfaces: unknown;
}

export function parseExtensionFile(json: unknown): ExtensionFile {
  const {
    type,
    name,
    description,
    url,
    version,
    versionCityJSON,
    extraAttributes,
    extraCityObjects,
    extraRootProperties,
    extraSemanticSurfaces,
  } = parseWith(extensionFileSchema, json, 'extension file');
  return {
    type,
    name,
    description,
    url,
    version,
    versionCityJSON,
    extraAttributes,
    extraCityObjects,
    extraRootProperties,
    extraSemanticSurfaces,
  };
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function validateExtensionFile(ext: ExtensionFile): void {
  if (ext.type !== 'CityJSONExtension') {
    throw new InvalidValueError('type', "must be 'CityJSONExtension'");
  }
  const required: [string, string][] = [
    ['name', ext.name],
    ['url', ext.url],
    ['version', ext.version],
    ['versionCityJSON', ext.versionCityJSON],
  ];
  for (const [field, value] of required) {
    if (!value) throw new InvalidValueError(field, 'cannot be empty');
  }
  const extras: [string, unknown][] = [
    ['extraAttributes', ext.extraAttributes],
    ['extraCityObjects', ext.extraCityObjects],
    ['extraRootProperties', ext.extraRootProperties],
    ['extraSemanticSurfaces', ext.extraSemanticSurfaces],
  ];
  for (const [field, value] of extras) {
    if (!isJsonObject(value)) {
      throw new InvalidValueError(field, 'must be a JSON object');
    }
  }
}

export function extensionCityObjectTypes(ext: ExtensionFile): string[] {
  return isJsonObject(ext.extraCityObjects)
    ? Object.keys(ext.extraCityObjects)
    : [];
}
