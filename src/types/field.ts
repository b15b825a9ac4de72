/**
 * 字段来源（provenance）类型定义
 * 每个材质属性都是一个值加一个「是否由源文本提供」标记
 */

/**
 * 带来源标记的字段
 */
export interface Field<T> {
  /** 字段值（未解析时为默认值） */
  value: T;
  /** 值是否由源文本解析或显式赋值得到 */
  parsed: boolean;
}

/**
 * 复合值的来源标记（颜色、纹理、三元组等）
 */
export interface Parsed {
  parsed: boolean;
}

/**
 * 创建未解析的字段
 */
export function createField<T>(value: T): Field<T> {
  return { value, parsed: false };
}

/**
 * 赋值：写入解码得到的值，来源标记置为 true
 */
export function assignField<T>(field: Field<T>, value: T): Field<T> {
  field.value = value;
  field.parsed = true;
  return field;
}

/**
 * 复制字段
 * @param field 源字段
 * @param preserveProvenance 为 false 时目标字段的来源标记强制为 false
 */
export function copyField<T>(field: Readonly<Field<T>>, preserveProvenance: boolean): Field<T> {
  return {
    value: field.value,
    parsed: preserveProvenance ? field.parsed : false,
  };
}
