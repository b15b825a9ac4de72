/**
 * 工具函数统一导出
 */

// 行扫描
export { Cursor, trim, isSpace } from './scanner';

// 文本输出
export {
  formatTexture,
  formatTextureBody,
  formatColor,
  formatOpacity,
  formatReflection,
  formatMaterial,
  formatDocument,
  traceDocument,
} from './trace';
