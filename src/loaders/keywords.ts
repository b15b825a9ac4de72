/**
 * 关键字分发表
 * 关键字 → 作用于当前材质对应字段的解码函数，模块加载时构建一次
 */

import { assignField } from '../types/field';
import type { Material } from '../types/material';
import { COLOR_KEYS, NUMBER_KEYS, TEXTURE_KEYS } from '../types/material';
import {
  decodeColor,
  decodeFloat,
  decodeInt,
  decodeOpacity,
  decodeReflection,
  decodeTexture,
} from './decoders';

/**
 * 关键字处理函数
 * @param material 当前材质
 * @param text 关键字之后的行内容
 * @returns 是否成功解码（失败时材质保持不变）
 */
export type KeywordHandler = (material: Material, text: string) => boolean;

function buildKeywordTable(): Map<string, KeywordHandler> {
  const table = new Map<string, KeywordHandler>();

  for (const key of COLOR_KEYS) {
    table.set(key, (material, text) => {
      const color = decodeColor(text, material[key]);
      if (!color) return false;
      material[key] = color;
      return true;
    });
  }

  for (const key of TEXTURE_KEYS) {
    table.set(key, (material, text) => {
      const texture = decodeTexture(text, material[key]);
      if (!texture) return false;
      material[key] = texture;
      return true;
    });
  }

  for (const key of NUMBER_KEYS) {
    table.set(key, (material, text) => {
      const value = decodeFloat(text);
      if (value === null) return false;
      assignField(material[key], value);
      return true;
    });
  }

  table.set('illum', (material, text) => {
    const value = decodeInt(text);
    if (value === null) return false;
    assignField(material.illum, value);
    return true;
  });

  table.set('d', (material, text) => {
    const opacity = decodeOpacity(text, material.d);
    if (!opacity) return false;
    material.d = opacity;
    return true;
  });

  table.set('refl', (material, text) => {
    const refl = decodeReflection(text, material.refl);
    if (!refl) return false;
    material.refl = refl;
    return true;
  });

  return table;
}

export const KEYWORD_HANDLERS: ReadonlyMap<string, KeywordHandler> = buildKeywordTable();

/** 所有可识别的字段关键字（不含 newmtl） */
export const FIELD_KEYWORDS: readonly string[] = [...KEYWORD_HANDLERS.keys()];
