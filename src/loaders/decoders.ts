/**
 * MTL 字段解码器
 *
 * 每个解码器读取当前值的副本，成功时返回新值（来源标记为 true），
 * 失败时返回 null，调用方保持原字段不变。
 */

import { assignField } from '../types/field';
import type {
  Color,
  ImfChannel,
  Model,
  Opacity,
  Reflection,
  ReflectionType,
  Rgb,
  Spectral,
  Texture,
  Uvw,
  Xyz,
} from '../types/material';
import {
  IMF_CHANNELS,
  REFLECTION_TYPES,
  cloneColor,
  cloneReflection,
  cloneTexture,
} from '../types/material';
import { Cursor, isSpace, trim } from '../utils/scanner';

type Triple = [number, number, number];

/**
 * 读取三元组
 * 只有一个分量时广播到三个分量；缺第三个分量时取第一个分量
 */
export function readTriple(cursor: Cursor): Triple | null {
  const first = cursor.readFloat();
  if (first === null) return null;

  const second = cursor.readFloat();
  if (second === null) return [first, first, first];

  const third = cursor.readFloat();
  return [first, second, third ?? first];
}

export function decodeRgb(cursor: Cursor): Rgb | null {
  const triple = readTriple(cursor);
  if (!triple) return null;
  const [r, g, b] = triple;
  return { r, g, b, parsed: true };
}

export function decodeXyz(cursor: Cursor): Xyz | null {
  const triple = readTriple(cursor);
  if (!triple) return null;
  const [x, y, z] = triple;
  return { x, y, z, parsed: true };
}

export function decodeUvw(cursor: Cursor): Uvw | null {
  const triple = readTriple(cursor);
  if (!triple) return null;
  const [u, v, w] = triple;
  return { u, v, w, parsed: true };
}

/**
 * 解码 base/gain（-mm），gain 缺省时保留原值
 */
export function decodeModel(cursor: Cursor, current: Readonly<Model>): Model | null {
  const base = cursor.readInt();
  if (base === null) return null;

  const gain = cursor.readInt();
  return { base, gain: gain ?? current.gain, parsed: true };
}

/**
 * 解码光谱文件（spectral file [factor]），factor 缺省时保留原值
 */
export function decodeSpectral(cursor: Cursor, current: Readonly<Spectral>): Spectral | null {
  const file = cursor.readWord();
  if (file === null) return null;

  const factor = cursor.readFloat();
  return { file, factor: factor ?? current.factor, parsed: true };
}

/**
 * 解码颜色
 * 依次尝试 `spectral `、`xyz ` 前缀，否则按 RGB 解码
 */
export function decodeColor(text: string, current: Readonly<Color>): Color | null {
  const cursor = new Cursor(text);
  const next = cloneColor(current, true);

  if (cursor.readKeyword('spectral')) {
    const spectral = decodeSpectral(cursor, current.spectral);
    if (!spectral) return null;
    next.spectral = spectral;
  } else if (cursor.readKeyword('xyz')) {
    const xyz = decodeXyz(cursor);
    if (!xyz) return null;
    next.xyz = xyz;
  } else {
    const rgb = decodeRgb(cursor);
    if (!rgb) return null;
    next.rgb = rgb;
  }

  next.parsed = true;
  return next;
}

export function decodeFloat(text: string): number | null {
  return new Cursor(text).readFloat();
}

export function decodeInt(text: string): number | null {
  return new Cursor(text).readInt();
}

/**
 * 解码透明度
 * 行中任意位置出现 `-halo <factor>` 时同时设置 halo 和 d，否则整行按数值解码
 */
export function decodeOpacity(text: string, current: Readonly<Opacity>): Opacity | null {
  const cursor = new Cursor(text);

  while (!cursor.done) {
    cursor.skipSpace();
    if (cursor.peek() === '-') {
      const start = cursor.position;
      cursor.advance();
      if (cursor.readKeyword('halo')) {
        const d = cursor.readFloat();
        if (d !== null) {
          return { d, halo: true, parsed: true };
        }
      }
      cursor.seek(start);
    }
    cursor.readToken();
  }

  const d = decodeFloat(text);
  if (d === null) return null;
  return { d, halo: current.halo, parsed: true };
}

/**
 * 纹理选项读取结果
 * - accepted: 选项及其值被接受
 * - consumed: 值被读取但被忽略（如 -blendu maybe）
 * - unknown: 不能识别，按未知选项跳过
 */
type OptionResult = 'accepted' | 'consumed' | 'unknown';

type OptionReader = (cursor: Cursor, texture: Texture) => OptionResult;

function readSwitch(key: 'blendu' | 'blendv' | 'clamp'): OptionReader {
  return (cursor, texture) => {
    const word = cursor.readWord();
    if (word === null) return 'unknown';

    if (word === 'on' || word === 'off') {
      assignField(texture[key], word === 'on');
      return 'accepted';
    }
    return 'consumed';
  };
}

function readNumber(key: 'bm' | 'boost' | 'texres'): OptionReader {
  return (cursor, texture) => {
    const value = cursor.readFloat();
    if (value === null) return 'unknown';

    assignField(texture[key], value);
    return 'accepted';
  };
}

function readUvw(key: 'o' | 's' | 't'): OptionReader {
  return (cursor, texture) => {
    const uvw = decodeUvw(cursor);
    if (!uvw) return 'unknown';

    texture[key] = uvw;
    return 'accepted';
  };
}

export function isImfChannel(value: string): value is ImfChannel {
  return IMF_CHANNELS.some((channel) => channel === value);
}

const readModel: OptionReader = (cursor, texture) => {
  const mm = decodeModel(cursor, texture.mm);
  if (!mm) return 'unknown';

  texture.mm = mm;
  return 'accepted';
};

// 值不是单个合法通道字符时按未知选项处理
const readImfChannel: OptionReader = (cursor, texture) => {
  const word = cursor.readWord();
  if (word === null || !isImfChannel(word)) return 'unknown';

  assignField(texture.imfchan, word);
  return 'accepted';
};

/**
 * 纹理选项表（-cc 不在表中）
 */
const TEXTURE_OPTIONS: ReadonlyMap<string, OptionReader> = new Map<string, OptionReader>([
  ['blendu', readSwitch('blendu')],
  ['blendv', readSwitch('blendv')],
  ['clamp', readSwitch('clamp')],
  ['bm', readNumber('bm')],
  ['boost', readNumber('boost')],
  ['texres', readNumber('texres')],
  ['mm', readModel],
  ['o', readUvw('o')],
  ['s', readUvw('s')],
  ['t', readUvw('t')],
  ['imfchan', readImfChannel],
]);

/**
 * 读取游标处的一个选项（游标位于 `-` 之后）
 */
function readTextureOption(cursor: Cursor, texture: Texture): OptionResult {
  if (cursor.done || isSpace(cursor.peek())) return 'unknown';

  const name = cursor.readToken();
  const reader = TEXTURE_OPTIONS.get(name);
  if (!reader || !isSpace(cursor.peek())) return 'unknown';
  return reader(cursor, texture);
}

/**
 * 跳过未知选项：逐字符前进到下一个位于 token 开头的 `-` 或行尾
 * @returns 跳过的文本
 */
function skipUnknownOption(cursor: Cursor): string {
  const start = cursor.position;
  cursor.advance();

  while (!cursor.done) {
    if (cursor.peek() === '-' && isSpace(cursor.text[cursor.position - 1])) break;
    cursor.advance();
  }

  return cursor.text.slice(start, cursor.position);
}

/**
 * 未知选项一直延伸到行尾时，取其最后一个 token 作为文件名
 */
function trailingFile(skipped: string): string | null {
  const tokens = trim(skipped).split(/[ \t\n\v\f\r]+/);
  if (tokens.length < 2) return null;

  const last = tokens[tokens.length - 1];
  return last.startsWith('-') ? null : last;
}

/**
 * 解码纹理行：任意顺序的 `-flag value…` 选项，后跟文件名
 */
export function decodeTexture(text: string, current: Readonly<Texture>): Texture | null {
  const texture = cloneTexture(current, true);
  const cursor = new Cursor(text);
  let accepted = false;
  let file: string | null = null;

  while (true) {
    cursor.skipSpace();
    if (cursor.done) break;

    // 第一个不是选项的 token 开始即为文件名
    if (cursor.peek() !== '-') {
      file = trim(cursor.rest());
      break;
    }

    const start = cursor.position;
    cursor.advance();

    const result = readTextureOption(cursor, texture);
    if (result === 'accepted') {
      accepted = true;
      continue;
    }
    if (result === 'consumed') continue;

    cursor.seek(start);
    const skipped = skipUnknownOption(cursor);
    if (cursor.done) {
      file = trailingFile(skipped);
    }
  }

  if (file) {
    assignField(texture.file, file);
    accepted = true;
  }

  if (!accepted) return null;

  texture.parsed = true;
  return texture;
}

export function isReflectionType(value: string): value is ReflectionType {
  return REFLECTION_TYPES.some((type) => type === value);
}

/**
 * 解码反射贴图
 * `-type <name>` 选择槽位，其后的行内容整体按纹理解码到该槽位
 */
export function decodeReflection(text: string, current: Readonly<Reflection>): Reflection | null {
  const cursor = new Cursor(text);

  while (!cursor.done) {
    cursor.skipSpace();
    if (cursor.peek() === '-') {
      const start = cursor.position;
      cursor.advance();
      if (cursor.readKeyword('type')) {
        const type = cursor.readWord();
        if (type === null || !isReflectionType(type)) return null;

        const slot = decodeTexture(cursor.rest(), current[type]);
        if (!slot) return null;

        const next = cloneReflection(current, true);
        next[type] = slot;
        next.parsed = true;
        return next;
      }
      cursor.seek(start);
    }
    cursor.readToken();
  }

  return null;
}
