// Wire shapes of CityJSON, CityJSONFeature and their members.
// Unknown members pass through; the model modules move them into `other`.

import { z } from 'zod';
import { CityJsonError } from './errors.js';

const vec2 = z.tuple([z.number(), z.number()]);
const vec3 = z.tuple([z.number(), z.number(), z.number()]);
const unit = z.number();

// Nested index arrays are parsed leniently by parseNestedArray
const nestedIndexArray = z.array(z.unknown());

const geographicalExtent = z.tuple([
  z.number(),
  z.number(),
  z.number(),
  z.number(),
  z.number(),
  z.number(),
]);

export const transformSchema = z.object({
  scale: vec3,
  translate: vec3,
});

export const verticesSchema = z.array(
  z.tuple([z.number().int(), z.number().int(), z.number().int()])
);

export const materialSchema = z
  .object({
    name: z.string(),
    ambientIntensity: unit.optional(),
    diffuseColor: vec3.optional(),
    emissiveColor: vec3.optional(),
    specularColor: vec3.optional(),
    shininess: unit.optional(),
    transparency: unit.optional(),
    isSmooth: z.boolean().optional(),
  })
  .passthrough();

export const textureSchema = z
  .object({
    type: z.enum(['PNG', 'JPG']),
    image: z.string(),
    wrapMode: z.enum(['none', 'wrap', 'mirror', 'clamp', 'border']).optional(),
    textureType: z.enum(['unknown', 'specific', 'typical']).optional(),
    borderColor: z.tuple([unit, unit, unit, unit]).optional(),
  })
  .passthrough();

export const appearanceSchema = z
  .object({
    materials: z.array(materialSchema).optional(),
    textures: z.array(textureSchema).optional(),
    'vertices-texture': z.array(vec2).optional(),
    'default-theme-texture': z.string().optional(),
    'default-theme-material': z.string().optional(),
  })
  .passthrough();

export const semanticSurfaceSchema = z
  .object({
    type: z.string(),
    parent: z.number().int().nonnegative().optional(),
    children: z.array(z.number().int().nonnegative()).optional(),
  })
  .passthrough();

export const geometrySchema = z
  .object({
    type: z.string(),
    lod: z.union([z.string(), z.number()]).optional(),
    boundaries: nestedIndexArray,
    semantics: z
      .object({
        values: nestedIndexArray,
        surfaces: z.array(semanticSurfaceSchema),
      })
      .passthrough()
      .optional(),
    material: z
      .record(
        z
          .object({
            value: z.number().int().nonnegative().optional(),
            values: nestedIndexArray.optional(),
          })
          .passthrough()
      )
      .optional(),
    texture: z
      .record(z.object({ values: nestedIndexArray }).passthrough())
      .optional(),
    template: z.number().int().nonnegative().optional(),
    transformationMatrix: z.array(z.number()).length(16).optional(),
  })
  .passthrough();

export const cityObjectSchema = z
  .object({
    type: z.string(),
    geographicalExtent: geographicalExtent.optional(),
    attributes: z.record(z.unknown()).optional(),
    geometry: z.array(geometrySchema).optional(),
    children: z.array(z.string()).optional(),
    children_roles: z.array(z.string()).optional(),
    parents: z.array(z.string()).optional(),
  })
  .passthrough();

export const metadataSchema = z
  .object({
    geographicalExtent: geographicalExtent.optional(),
    identifier: z.string().optional(),
    title: z.string().optional(),
    referenceDate: z.string().optional(),
    referenceSystem: z.string().optional(),
    pointOfContact: z.record(z.unknown()).optional(),
  })
  .passthrough();

export const geometryTemplatesSchema = z
  .object({
    templates: z.array(geometrySchema),
    'vertices-templates': z.array(vec3),
  })
  .passthrough();

export const extensionSchema = z
  .object({
    url: z.string(),
    version: z.string(),
  })
  .passthrough();

// Anything other than an object under "extensions" is treated as absent
const extensionsSchema = z.preprocess(
  (value) =>
    typeof value === 'object' && value !== null && !Array.isArray(value)
      ? value
      : undefined,
  z.record(extensionSchema).optional()
);

export const cityJSONSchema = z
  .object({
    type: z.string(),
    version: z.string(),
    transform: transformSchema,
    CityObjects: z.record(cityObjectSchema),
    vertices: verticesSchema,
    metadata: metadataSchema.optional(),
    appearance: appearanceSchema.optional(),
    'geometry-templates': geometryTemplatesSchema.optional(),
    extensions: extensionsSchema,
  })
  .passthrough();

export const featureSchema = z
  .object({
    type: z.string(),
    id: z.string(),
    CityObjects: z.record(cityObjectSchema),
    vertices: verticesSchema,
    appearance: appearanceSchema.optional(),
    extensions: extensionsSchema,
  })
  .passthrough();

export const extensionFileSchema = z
  .object({
    type: z.string(),
    name: z.string(),
    description: z.string().default(''),
    url: z.string(),
    version: z.string(),
    versionCityJSON: z.string(),
    extraAttributes: z.unknown(),
    extraCityObjects: z.unknown(),
    extraRootProperties: z.unknown(),
    extraSemanticSurfaces: z.unknown(),
  })
  .passthrough();

export type RawGeometry = z.infer<typeof geometrySchema>;
export type RawCityObject = z.infer<typeof cityObjectSchema>;
export type RawAppearance = z.infer<typeof appearanceSchema>;
export type RawMaterial = z.infer<typeof materialSchema>;
export type RawTexture = z.infer<typeof textureSchema>;
export type RawMetadata = z.infer<typeof metadataSchema>;
export type RawGeometryTemplates = z.infer<typeof geometryTemplatesSchema>;
export type RawExtension = z.infer<typeof extensionSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 5)
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

// Validate `value` against `schema`, turning zod's error into a CityJsonError
export function parseWith<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  what: string
): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new CityJsonError(`invalid ${what}: ${describeIssues(result.error)}`);
  }
  return result.data;
}
