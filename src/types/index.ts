/**
 * 类型定义统一导出
 */

// 字段来源
export type { Field, Parsed } from './field';
export { createField, assignField, copyField } from './field';

// 材质类型
export type {
  Rgb,
  Xyz,
  Uvw,
  Model,
  Spectral,
  Color,
  ImfChannel,
  Texture,
  Opacity,
  ReflectionType,
  Reflection,
  ColorKey,
  TextureKey,
  NumberKey,
  Material,
  MaterialDocument,
  CloneOptions,
} from './material';
export {
  IMF_CHANNELS,
  REFLECTION_TYPES,
  COLOR_KEYS,
  TEXTURE_KEYS,
  NUMBER_KEYS,
  createColor,
  createTexture,
  createOpacity,
  createReflection,
  createMaterial,
  cloneColor,
  cloneTexture,
  cloneReflection,
  cloneMaterial,
} from './material';
