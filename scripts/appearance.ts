// Materials, textures and texture vertices of one document or feature.
// Insertion deduplicates (materials by name, textures by image); slicing projects
// a catalog down to the entries one feature references.

import type { Extra, Vec2, Vec3 } from './types.js';
import type { RawAppearance, RawMaterial, RawTexture } from './schema.js';
import { IdRemapTable } from './id-remap.js';
import { InvalidValueError, MissingReferenceError } from './errors.js';

export interface Material {
  name: string;
  ambientIntensity?: number;
  diffuseColor?: Vec3;
  emissiveColor?: Vec3;
  specularColor?: Vec3;
  shininess?: number;
  transparency?: number;
  isSmooth?: boolean;
  other: Extra;
}

export type TextureFormat = 'PNG' | 'JPG';
export type WrapMode = 'none' | 'wrap' | 'mirror' | 'clamp' | 'border';
export type TextureType = 'unknown' | 'specific' | 'typical';

export interface Texture {
  type: TextureFormat;
  image: string;
  wrapMode?: WrapMode;
  textureType?: TextureType;
  borderColor?: [number, number, number, number];
  other: Extra;
}

export interface Appearance {
  materials?: Material[];
  textures?: Texture[];
  verticesTexture?: Vec2[];
  defaultThemeTexture?: string;
  defaultThemeMaterial?: string;
  other: Extra;
}

// Tables mapping catalog index -> sliced index
export interface AppearanceTables {
  materials: IdRemapTable;
  textures: IdRemapTable;
  textureVertices: IdRemapTable;
}

export function createAppearanceTables(): AppearanceTables {
  return {
    materials: new IdRemapTable(),
    textures: new IdRemapTable(),
    textureVertices: new IdRemapTable(),
  };
}

export function createAppearance(): Appearance {
  return { other: {} };
}

export function parseMaterial(raw: RawMaterial): Material {
  const {
    name,
    ambientIntensity,
    diffuseColor,
    emissiveColor,
    specularColor,
    shininess,
    transparency,
    isSmooth,
    ...other
  } = raw;
  return {
    name,
    ambientIntensity,
    diffuseColor,
    emissiveColor,
    specularColor,
    shininess,
    transparency,
    isSmooth,
    other,
  };
}

export function parseTexture(raw: RawTexture): Texture {
  const { type, image, wrapMode, textureType, borderColor, ...other } = raw;
  return { type, image, wrapMode, textureType, borderColor, other };
}

export function parseAppearance(raw: RawAppearance): Appearance {
  const {
    materials,
    textures,
    'vertices-texture': verticesTexture,
    'default-theme-texture': defaultThemeTexture,
    'default-theme-material': defaultThemeMaterial,
    ...other
  } = raw;
  return {
    materials: materials?.map(parseMaterial),
    textures: textures?.map(parseTexture),
    verticesTexture,
    defaultThemeTexture,
    defaultThemeMaterial,
    other,
  };
}

export function materialToJson(m: Material): Record<string, unknown> {
  return {
    ...m.other,
    name: m.name,
    ambientIntensity: m.ambientIntensity,
    diffuseColor: m.diffuseColor,
    emissiveColor: m.emissiveColor,
    specularColor: m.specularColor,
    shininess: m.shininess,
    transparency: m.transparency,
    isSmooth: m.isSmooth,
  };
}

export function textureToJson(t: Texture): Record<string, unknown> {
  return {
    ...t.other,
    type: t.type,
    image: t.image,
    wrapMode: t.wrapMode,
    textureType: t.textureType,
    borderColor: t.borderColor,
  };
}

export function appearanceToJson(a: Appearance): Record<string, unknown> {
  return {
    ...a.other,
    materials: a.materials?.map(materialToJson),
    textures: a.textures?.map(textureToJson),
    'vertices-texture': a.verticesTexture,
    'default-theme-texture': a.defaultThemeTexture,
    'default-theme-material': a.defaultThemeMaterial,
  };
}

function checkUnit(field: string, value: number | undefined): void {
  if (value !== undefined && !(value >= 0 && value <= 1)) {
    throw new InvalidValueError(field, 'must be between 0.0 and 1.0');
  }
}

function checkColor(field: string, color: readonly number[] | undefined): void {
  color?.forEach((component, i) => {
    if (!(component >= 0 && component <= 1)) {
      throw new InvalidValueError(
        field,
        `${field}[${i}] must be between 0.0 and 1.0`
      );
    }
  });
}

export function validateMaterial(m: Material): void {
  checkUnit('ambientIntensity', m.ambientIntensity);
  checkColor('diffuseColor', m.diffuseColor);
  checkColor('emissiveColor', m.emissiveColor);
  checkColor('specularColor', m.specularColor);
  checkUnit('shininess', m.shininess);
  checkUnit('transparency', m.transparency);
}

export function validateTexture(t: Texture): void {
  checkColor('borderColor', t.borderColor);
}

// Index of an existing material with the same name, or of the newly appended one
export function addMaterial(appearance: Appearance, material: Material): number {
  validateMaterial(material);
  const materials = (appearance.materials ??= []);
  const existing = materials.findIndex((m) => m.name === material.name);
  if (existing !== -1) return existing;
  materials.push(material);
  return materials.length - 1;
}

// Index of an existing texture with the same image, or of the newly appended one
export function addTexture(appearance: Appearance, texture: Texture): number {
  validateTexture(texture);
  const textures = (appearance.textures ??= []);
  const existing = textures.findIndex((t) => t.image === texture.image);
  if (existing !== -1) return existing;
  textures.push(texture);
  return textures.length - 1;
}

// Appends verbatim and returns the index the block starts at
export function addTextureVertices(appearance: Appearance, uvs: Vec2[]): number {
  const verticesTexture = (appearance.verticesTexture ??= []);
  const offset = verticesTexture.length;
  verticesTexture.push(...uvs.map((uv): Vec2 => [uv[0], uv[1]]));
  return offset;
}

function sliceList<T>(
  source: T[] | undefined,
  table: IdRemapTable,
  what: string
): T[] | undefined {
  if (table.size === 0) return undefined;
  const sliced = new Array<T>(table.size);
  for (const [oldId, newId] of table.entries()) {
    const entry = source?.[oldId];
    if (entry === undefined) {
      throw new MissingReferenceError(`${what} ${oldId}`, 'appearance slice');
    }
    sliced[newId] = entry;
  }
  return sliced;
}

// New appearance whose entry `new` is `original[old]` for every (old, new) in the tables
export function sliceAppearance(
  appearance: Appearance,
  tables: AppearanceTables
): Appearance {
  return {
    materials: sliceList(appearance.materials, tables.materials, 'material')?.map(
      (m) => structuredClone(m)
    ),
    textures: sliceList(appearance.textures, tables.textures, 'texture')?.map(
      (t) => structuredClone(t)
    ),
    verticesTexture: sliceList(
      appearance.verticesTexture,
      tables.textureVertices,
      'texture vertex'
    )?.map((uv): Vec2 => [uv[0], uv[1]]),
    defaultThemeTexture: appearance.defaultThemeTexture,
    defaultThemeMaterial: appearance.defaultThemeMaterial,
    other: structuredClone(appearance.other),
  };
}

export function isAppearanceEmpty(appearance: Appearance): boolean {
  return (
    !appearance.materials?.length &&
    !appearance.textures?.length &&
    !appearance.verticesTexture?.length
  );
}
