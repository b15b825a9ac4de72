/**
 * MTL 材质类型定义
 * 所有属性均带来源标记，未出现在源文本中的属性保留默认值
 */

import type { Field, Parsed } from './field';
import { copyField, createField } from './field';

/**
 * RGB 颜色 [0..1]
 */
export interface Rgb extends Parsed {
  r: number;
  g: number;
  b: number;
}

/**
 * CIE XYZ 三刺激值
 */
export interface Xyz extends Parsed {
  x: number;
  y: number;
  z: number;
}

/**
 * 纹理坐标三元组（-o / -s / -t）
 */
export interface Uvw extends Parsed {
  u: number;
  v: number;
  w: number;
}

/**
 * 纹理值修正（-mm base gain）
 */
export interface Model extends Parsed {
  base: number;
  gain: number;
}

/**
 * 光谱文件颜色（spectral file factor）
 */
export interface Spectral extends Parsed {
  file: string;
  factor: number;
}

/**
 * 颜色：RGB、CIE XYZ、光谱文件三种表示之一
 */
export interface Color extends Parsed {
  rgb: Rgb;
  xyz: Xyz;
  spectral: Spectral;
}

/** -imfchan 可选通道 */
export const IMF_CHANNELS = ['r', 'g', 'b', 'm', 'l', 'z'] as const;
export type ImfChannel = (typeof IMF_CHANNELS)[number];

/**
 * 纹理引用及其选项
 */
export interface Texture extends Parsed {
  /** 纹理文件名（行尾最后的非选项部分） */
  file: Field<string>;
  /** 水平方向纹理混合 */
  blendu: Field<boolean>;
  /** 垂直方向纹理混合 */
  blendv: Field<boolean>;
  /** 仅在 [0, 1] 范围内渲染 */
  clamp: Field<boolean>;
  /** 颜色校正（没有选项能设置它，仅可由代码赋值） */
  cc: Field<boolean>;
  /** 凹凸倍数 */
  bm: Field<number>;
  /** 锐度提升 */
  boost: Field<number>;
  /** 纹理分辨率倍数 */
  texres: Field<number>;
  mm: Model;
  /** 原点偏移 */
  o: Uvw;
  /** 缩放 */
  s: Uvw;
  /** 扰动 */
  t: Uvw;
  /** 使用的通道 */
  imfchan: Field<ImfChannel>;
}

/**
 * 透明度（d [-halo] factor）
 */
export interface Opacity extends Parsed {
  d: number;
  halo: boolean;
}

/** refl -type 可选类型 */
export const REFLECTION_TYPES = [
  'sphere',
  'cube_top',
  'cube_bottom',
  'cube_front',
  'cube_back',
  'cube_left',
  'cube_right',
] as const;
export type ReflectionType = (typeof REFLECTION_TYPES)[number];

/**
 * 反射贴图：球面或立方体六个面，每行只填充一个
 */
export type Reflection = Parsed & Record<ReflectionType, Texture>;

/** 颜色属性关键字 */
export const COLOR_KEYS = ['Kd', 'Ka', 'Ks', 'Tf', 'Ke'] as const;
export type ColorKey = (typeof COLOR_KEYS)[number];

/** 纹理属性关键字 */
export const TEXTURE_KEYS = [
  'map_Kd',
  'map_Ka',
  'map_Ks',
  'map_Ns',
  'map_Pr',
  'map_Pm',
  'map_Ps',
  'map_d',
  'map_bump',
  'map_Po',
  'disp',
  'decal',
  'bump',
  'map_Ke',
  'norm',
  'map_RMA',
  'map_ORM',
] as const;
export type TextureKey = (typeof TEXTURE_KEYS)[number];

/** 浮点属性关键字 */
export const NUMBER_KEYS = [
  'Ns',
  'sharpness',
  'Ni',
  'Tr',
  'Pr',
  'Pm',
  'Ps',
  'Pc',
  'Pcr',
  'aniso',
  'anisor',
] as const;
export type NumberKey = (typeof NUMBER_KEYS)[number];

/**
 * 材质
 *
 * Kd/Ka/Ks/Tf/Ns/d/Tr/illum/Ni/sharpness 为标准 MTL 参数；
 * Ke/Pr/Pm/Ps/Pc/Pcr/aniso/anisor/map_Ke/norm 来自 PBR 扩展；
 * map_RMA/map_ORM 来自 DirectXMesh。
 */
export type Material = {
  name: Field<string>;
  /** 整数光照模型 [0..10] */
  illum: Field<number>;
  d: Opacity;
  refl: Reflection;
} & Record<ColorKey, Color> &
  Record<TextureKey, Texture> &
  Record<NumberKey, Field<number>>;

/**
 * 解析结果文档
 */
export interface MaterialDocument {
  /** 按源文本顺序排列的材质 */
  materials: Material[];
  /** 第一个材质之前的注释行 */
  information: string[];
}

const DEFAULT_NUMBERS: Readonly<Record<NumberKey, number>> = {
  Ns: 0,
  sharpness: 60,
  Ni: 0,
  Tr: 1,
  Pr: 0,
  Pm: 0,
  Ps: 0,
  Pc: 0,
  Pcr: 0,
  aniso: 0,
  anisor: 0,
};

export function createRgb(): Rgb {
  return { r: 0, g: 0, b: 0, parsed: false };
}

export function createXyz(): Xyz {
  return { x: 0, y: 0, z: 0, parsed: false };
}

export function createUvw(): Uvw {
  return { u: 0, v: 0, w: 0, parsed: false };
}

export function createModel(): Model {
  return { base: 0, gain: 1, parsed: false };
}

export function createSpectral(): Spectral {
  return { file: '', factor: 1, parsed: false };
}

export function createColor(): Color {
  return { rgb: createRgb(), xyz: createXyz(), spectral: createSpectral(), parsed: false };
}

export function createOpacity(): Opacity {
  return { d: 1, halo: false, parsed: false };
}

export function createTexture(): Texture {
  return {
    file: createField(''),
    blendu: createField(true),
    blendv: createField(true),
    clamp: createField(false),
    cc: createField(false),
    bm: createField(0),
    boost: createField(60),
    texres: createField(1),
    mm: createModel(),
    o: createUvw(),
    s: createUvw(),
    t: createUvw(),
    imfchan: createField<ImfChannel>('m'),
    parsed: false,
  };
}

export function createReflection(): Reflection {
  return {
    sphere: createTexture(),
    cube_top: createTexture(),
    cube_bottom: createTexture(),
    cube_front: createTexture(),
    cube_back: createTexture(),
    cube_left: createTexture(),
    cube_right: createTexture(),
    parsed: false,
  };
}

/**
 * 创建空材质（所有字段为默认值且未解析）
 */
export function createMaterial(): Material {
  return cloneMaterial(EMPTY_MATERIAL, { preserveProvenance: false });
}

/**
 * 复制选项
 */
export interface CloneOptions {
  /** 为 false 时所有来源标记清零，用于由已有材质构造默认模板 */
  preserveProvenance: boolean;
}

function keep(parsed: boolean, preserve: boolean): boolean {
  return preserve ? parsed : false;
}

export function cloneRgb(rgb: Readonly<Rgb>, preserve: boolean): Rgb {
  return { ...rgb, parsed: keep(rgb.parsed, preserve) };
}

export function cloneXyz(xyz: Readonly<Xyz>, preserve: boolean): Xyz {
  return { ...xyz, parsed: keep(xyz.parsed, preserve) };
}

export function cloneUvw(uvw: Readonly<Uvw>, preserve: boolean): Uvw {
  return { ...uvw, parsed: keep(uvw.parsed, preserve) };
}

export function cloneModel(mm: Readonly<Model>, preserve: boolean): Model {
  return { ...mm, parsed: keep(mm.parsed, preserve) };
}

export function cloneSpectral(spectral: Readonly<Spectral>, preserve: boolean): Spectral {
  return { ...spectral, parsed: keep(spectral.parsed, preserve) };
}

export function cloneOpacity(opacity: Readonly<Opacity>, preserve: boolean): Opacity {
  return { ...opacity, parsed: keep(opacity.parsed, preserve) };
}

export function cloneColor(color: Readonly<Color>, preserve: boolean): Color {
  return {
    rgb: cloneRgb(color.rgb, preserve),
    xyz: cloneXyz(color.xyz, preserve),
    spectral: cloneSpectral(color.spectral, preserve),
    parsed: keep(color.parsed, preserve),
  };
}

export function cloneTexture(texture: Readonly<Texture>, preserve: boolean): Texture {
  return {
    file: copyField(texture.file, preserve),
    blendu: copyField(texture.blendu, preserve),
    blendv: copyField(texture.blendv, preserve),
    clamp: copyField(texture.clamp, preserve),
    cc: copyField(texture.cc, preserve),
    bm: copyField(texture.bm, preserve),
    boost: copyField(texture.boost, preserve),
    texres: copyField(texture.texres, preserve),
    mm: cloneModel(texture.mm, preserve),
    o: cloneUvw(texture.o, preserve),
    s: cloneUvw(texture.s, preserve),
    t: cloneUvw(texture.t, preserve),
    imfchan: copyField(texture.imfchan, preserve),
    parsed: keep(texture.parsed, preserve),
  };
}

export function cloneReflection(refl: Readonly<Reflection>, preserve: boolean): Reflection {
  return {
    sphere: cloneTexture(refl.sphere, preserve),
    cube_top: cloneTexture(refl.cube_top, preserve),
    cube_bottom: cloneTexture(refl.cube_bottom, preserve),
    cube_front: cloneTexture(refl.cube_front, preserve),
    cube_back: cloneTexture(refl.cube_back, preserve),
    cube_left: cloneTexture(refl.cube_left, preserve),
    cube_right: cloneTexture(refl.cube_right, preserve),
    parsed: keep(refl.parsed, preserve),
  };
}

/**
 * 深复制材质
 */
export function cloneMaterial(material: Readonly<Material>, options: CloneOptions): Material {
  const preserve = options.preserveProvenance;
  return {
    name: copyField(material.name, preserve),
    illum: copyField(material.illum, preserve),
    d: cloneOpacity(material.d, preserve),
    refl: cloneReflection(material.refl, preserve),
    Kd: cloneColor(material.Kd, preserve),
    Ka: cloneColor(material.Ka, preserve),
    Ks: cloneColor(material.Ks, preserve),
    Tf: cloneColor(material.Tf, preserve),
    Ke: cloneColor(material.Ke, preserve),
    map_Kd: cloneTexture(material.map_Kd, preserve),
    map_Ka: cloneTexture(material.map_Ka, preserve),
    map_Ks: cloneTexture(material.map_Ks, preserve),
    map_Ns: cloneTexture(material.map_Ns, preserve),
    map_Pr: cloneTexture(material.map_Pr, preserve),
    map_Pm: cloneTexture(material.map_Pm, preserve),
    map_Ps: cloneTexture(material.map_Ps, preserve),
    map_d: cloneTexture(material.map_d, preserve),
    map_bump: cloneTexture(material.map_bump, preserve),
    map_Po: cloneTexture(material.map_Po, preserve),
    disp: cloneTexture(material.disp, preserve),
    decal: cloneTexture(material.decal, preserve),
    bump: cloneTexture(material.bump, preserve),
    map_Ke: cloneTexture(material.map_Ke, preserve),
    norm: cloneTexture(material.norm, preserve),
    map_RMA: cloneTexture(material.map_RMA, preserve),
    map_ORM: cloneTexture(material.map_ORM, preserve),
    Ns: copyField(material.Ns, preserve),
    sharpness: copyField(material.sharpness, preserve),
    Ni: copyField(material.Ni, preserve),
    Tr: copyField(material.Tr, preserve),
    Pr: copyField(material.Pr, preserve),
    Pm: copyField(material.Pm, preserve),
    Ps: copyField(material.Ps, preserve),
    Pc: copyField(material.Pc, preserve),
    Pcr: copyField(material.Pcr, preserve),
    aniso: copyField(material.aniso, preserve),
    anisor: copyField(material.anisor, preserve),
  };
}

/**
 * 所有字段均为默认值的材质
 */
const EMPTY_MATERIAL: Readonly<Material> = {
  name: createField(''),
  illum: createField(0),
  d: createOpacity(),
  refl: createReflection(),
  Kd: createColor(),
  Ka: createColor(),
  Ks: createColor(),
  Tf: createColor(),
  Ke: createColor(),
  map_Kd: createTexture(),
  map_Ka: createTexture(),
  map_Ks: createTexture(),
  map_Ns: createTexture(),
  map_Pr: createTexture(),
  map_Pm: createTexture(),
  map_Ps: createTexture(),
  map_d: createTexture(),
  map_bump: createTexture(),
  map_Po: createTexture(),
  disp: createTexture(),
  decal: createTexture(),
  bump: createTexture(),
  map_Ke: createTexture(),
  norm: createTexture(),
  map_RMA: createTexture(),
  map_ORM: createTexture(),
  Ns: createField(DEFAULT_NUMBERS.Ns),
  sharpness: createField(DEFAULT_NUMBERS.sharpness),
  Ni: createField(DEFAULT_NUMBERS.Ni),
  Tr: createField(DEFAULT_NUMBERS.Tr),
  Pr: createField(DEFAULT_NUMBERS.Pr),
  Pm: createField(DEFAULT_NUMBERS.Pm),
  Ps: createField(DEFAULT_NUMBERS.Ps),
  Pc: createField(DEFAULT_NUMBERS.Pc),
  Pcr: createField(DEFAULT_NUMBERS.Pcr),
  aniso: createField(DEFAULT_NUMBERS.aniso),
  anisor: createField(DEFAULT_NUMBERS.anisor),
};
