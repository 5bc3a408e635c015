import { describe, it, expect } from 'vitest';
import {
  type Appearance,
  type Material,
  addMaterial,
  addTexture,
  addTextureVertices,
  appearanceToJson,
  createAppearance,
  createAppearanceTables,
  isAppearanceEmpty,
  parseAppearance,
  sliceAppearance,
  validateMaterial,
} from '../appearance.js';
import { InvalidValueError, MissingReferenceError } from '../errors.js';

function material(name: string, extra: Partial<Material> = {}): Material {
  return { name, other: {}, ...extra };
}

function catalog(): Appearance {
  return {
    materials: [material('brick'), material('glass'), material('roof')],
    textures: [
      { type: 'PNG', image: 'facade.png', other: {} },
      { type: 'JPG', image: 'roof.jpg', other: {} },
    ],
    verticesTexture: [
      [0, 0],
      [1, 0],
      [1, 1],
      [0, 1],
    ],
    other: {},
  };
}

describe('appearance.ts functionality', () => {
  describe('parseAppearance', () => {
    it('should map the hyphenated members and keep unknown ones', () => {
      const appearance = parseAppearance({
        'vertices-texture': [[0.5, 0.5]],
        'default-theme-material': 'summer',
        '+colour-scheme': 'warm',
      });
      expect(appearance.verticesTexture).toEqual([[0.5, 0.5]]);
      expect(appearance.defaultThemeMaterial).toBe('summer');
      expect(appearance.other).toEqual({ '+colour-scheme': 'warm' });
      expect(appearanceToJson(appearance)).toEqual({
        '+colour-scheme': 'warm',
        'vertices-texture': [[0.5, 0.5]],
        'default-theme-material': 'summer',
      });
    });
  });

  describe('validation', () => {
    it('should accept values in range', () => {
      expect(() =>
        validateMaterial(
          material('ok', { transparency: 0, shininess: 1, diffuseColor: [0.1, 0.2, 0.3] })
        )
      ).not.toThrow();
    });

    it('should reject a transparency above 1', () => {
      expect(() => validateMaterial(material('bad', { transparency: 1.5 }))).toThrow(
        'Invalid value for transparency: must be between 0.0 and 1.0'
      );
    });

    it('should reject a negative color component', () => {
      expect(() =>
        validateMaterial(material('bad', { specularColor: [0, -0.1, 0] }))
      ).toThrow('Invalid value for specularColor: specularColor[1] must be between 0.0 and 1.0');
    });

    it('should reject NaN', () => {
      expect(() => validateMaterial(material('bad', { ambientIntensity: NaN }))).toThrow(
        InvalidValueError
      );
    });
  });

  describe('insertion', () => {
    it('should deduplicate materials by name', () => {
      const appearance = createAppearance();
      expect(addMaterial(appearance, material('brick'))).toBe(0);
      expect(addMaterial(appearance, material('glass'))).toBe(1);
      expect(addMaterial(appearance, material('brick', { shininess: 0.5 }))).toBe(0);
      expect(appearance.materials).toHaveLength(2);
    });

    it('should deduplicate textures by image', () => {
      const appearance = createAppearance();
      expect(addTexture(appearance, { type: 'PNG', image: 'a.png', other: {} })).toBe(0);
      expect(addTexture(appearance, { type: 'JPG', image: 'b.jpg', other: {} })).toBe(1);
      expect(addTexture(appearance, { type: 'PNG', image: 'a.png', other: {} })).toBe(0);
    });

    it('should not add an invalid material', () => {
      const appearance = createAppearance();
      expect(() => addMaterial(appearance, material('bad', { shininess: 2 }))).toThrow(
        InvalidValueError
      );
      expect(appearance.materials ?? []).toHaveLength(0);
    });

    it('should append texture vertices and return their offset', () => {
      const appearance = createAppearance();
      expect(addTextureVertices(appearance, [[0, 0], [1, 1]])).toBe(0);
      expect(addTextureVertices(appearance, [[0, 0]])).toBe(2);
      expect(appearance.verticesTexture).toEqual([[0, 0], [1, 1], [0, 0]]);
    });
  });

  describe('sliceAppearance', () => {
    it('should keep only referenced entries, in table order', () => {
      const tables = createAppearanceTables();
      tables.materials.resolve(2);
      tables.materials.resolve(0);
      tables.textureVertices.resolve(3);
      tables.textureVertices.resolve(1);

      const sliced = sliceAppearance(catalog(), tables);
      expect(sliced.materials?.map((m) => m.name)).toEqual(['roof', 'brick']);
      expect(sliced.textures).toBeUndefined();
      expect(sliced.verticesTexture).toEqual([[0, 1], [1, 0]]);
    });

    it('should conserve every referenced entry', () => {
      const source = catalog();
      const tables = createAppearanceTables();
      for (const old of [1, 0]) tables.textures.resolve(old);

      const sliced = sliceAppearance(source, tables);
      for (const [oldId, newId] of tables.textures.entries()) {
        expect(sliced.textures?.[newId]).toEqual(source.textures?.[oldId]);
      }
    });

    it('should throw on a missing entry', () => {
      const tables = createAppearanceTables();
      tables.materials.resolve(7);
      expect(() => sliceAppearance(catalog(), tables)).toThrow(MissingReferenceError);
    });

    it('should copy, not share, entries', () => {
      const source = catalog();
      const tables = createAppearanceTables();
      tables.materials.resolve(0);
      const sliced = sliceAppearance(source, tables);
      sliced.materials?.forEach((m) => (m.name = 'changed'));
      expect(source.materials?.[0]?.name).toBe('brick');
    });

    it('should be empty when nothing is referenced', () => {
      expect(isAppearanceEmpty(sliceAppearance(catalog(), createAppearanceTables()))).toBe(
        true
      );
    });
  });
});
