/**
 * MTL 材质解析库
 * 库入口文件 - 导出所有公共 API
 */

// ============================================
// 类型定义
// ============================================
export type {
  Field,
  Parsed,
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
} from './types';

export {
  createField,
  assignField,
  copyField,
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
} from './types';

// ============================================
// 工具函数
// ============================================
export {
  Cursor,
  trim,
  formatMaterial,
  formatDocument,
  traceDocument,
} from './utils';

// ============================================
// Loaders
// ============================================
export { MTLParser } from './loaders/MTLParser';
export type { MTLParserOptions, MTLLogger } from './loaders/MTLParser';
export { MTLLoader } from './loaders/MTLLoader';
export type { MTLLoaderOptions } from './loaders/MTLLoader';
export {
  decodeColor,
  decodeTexture,
  decodeOpacity,
  decodeReflection,
} from './loaders/decoders';
export { KEYWORD_HANDLERS, FIELD_KEYWORDS } from './loaders/keywords';
export type { KeywordHandler } from './loaders/keywords';
