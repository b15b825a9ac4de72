/**
 * 材质文档的文本输出
 * 只输出来源标记为 true 的字段，每条语句一行，输出可被 MTLParser 重新解析
 */

import type { Field } from '../types/field';
import type {
  Color,
  Material,
  MaterialDocument,
  Model,
  Opacity,
  Reflection,
  Texture,
  Uvw,
} from '../types/material';
import { REFLECTION_TYPES } from '../types/material';

function formatSwitch(value: boolean): string {
  return value ? 'on' : 'off';
}

function formatUvw(uvw: Uvw): string {
  return `${uvw.u} ${uvw.v} ${uvw.w}`;
}

function formatModel(mm: Model): string {
  return `${mm.base} ${mm.gain}`;
}

function pushField<T>(out: string[], label: string, field: Field<T>, format: (value: T) => string): void {
  if (field.parsed) out.push(label, format(field.value));
}

/**
 * 纹理的选项和文件名（不含关键字）
 */
export function formatTextureBody(texture: Texture): string {
  const out: string[] = [];

  pushField(out, '-blendu', texture.blendu, formatSwitch);
  pushField(out, '-blendv', texture.blendv, formatSwitch);
  pushField(out, '-clamp', texture.clamp, formatSwitch);
  pushField(out, '-cc', texture.cc, formatSwitch);
  pushField(out, '-bm', texture.bm, String);
  pushField(out, '-boost', texture.boost, String);
  pushField(out, '-texres', texture.texres, String);
  if (texture.mm.parsed) out.push('-mm', formatModel(texture.mm));
  if (texture.o.parsed) out.push('-o', formatUvw(texture.o));
  if (texture.s.parsed) out.push('-s', formatUvw(texture.s));
  if (texture.t.parsed) out.push('-t', formatUvw(texture.t));
  pushField(out, '-imfchan', texture.imfchan, String);
  if (texture.file.parsed) out.push(texture.file.value);

  return out.join(' ');
}

export function formatTexture(label: string, texture: Texture): string[] {
  if (!texture.parsed) return [];
  return [`${label} ${formatTextureBody(texture)}`];
}

/**
 * 颜色：每种已解析的表示各输出一行
 */
export function formatColor(label: string, color: Color): string[] {
  if (!color.parsed) return [];

  const lines: string[] = [];
  const { rgb, xyz, spectral } = color;
  if (rgb.parsed) lines.push(`${label} ${rgb.r} ${rgb.g} ${rgb.b}`);
  if (xyz.parsed) lines.push(`${label} xyz ${xyz.x} ${xyz.y} ${xyz.z}`);
  if (spectral.parsed) lines.push(`${label} spectral ${spectral.file} ${spectral.factor}`);
  return lines;
}

export function formatOpacity(label: string, opacity: Opacity): string[] {
  if (!opacity.parsed) return [];
  return [opacity.halo ? `${label} -halo ${opacity.d}` : `${label} ${opacity.d}`];
}

/**
 * 反射：每个已解析的槽位各输出一行
 */
export function formatReflection(label: string, refl: Reflection): string[] {
  if (!refl.parsed) return [];

  return REFLECTION_TYPES.filter((type) => refl[type].parsed).map(
    (type) => `${label} -type ${type} ${formatTextureBody(refl[type])}`
  );
}

function formatValue<T>(label: string, field: Field<T>): string[] {
  return field.parsed ? [`${label} ${String(field.value)}`] : [];
}

/**
 * 输出单个材质
 */
export function formatMaterial(material: Material): string[] {
  return [
    ...formatValue('newmtl', material.name),
    ...formatColor('Ka', material.Ka),
    ...formatColor('Kd', material.Kd),
    ...formatColor('Ks', material.Ks),
    ...formatColor('Ke', material.Ke),
    ...formatTexture('map_Kd', material.map_Kd),
    ...formatTexture('map_Ka', material.map_Ka),
    ...formatTexture('map_Ks', material.map_Ks),
    ...formatTexture('map_Ke', material.map_Ke),
    ...formatTexture('map_Ns', material.map_Ns),
    ...formatTexture('map_Pr', material.map_Pr),
    ...formatTexture('map_Pm', material.map_Pm),
    ...formatTexture('map_Ps', material.map_Ps),
    ...formatTexture('map_d', material.map_d),
    ...formatTexture('map_bump', material.map_bump),
    ...formatTexture('map_Po', material.map_Po),
    ...formatValue('Ns', material.Ns),
    ...formatColor('Tf', material.Tf),
    ...formatValue('Tr', material.Tr),
    ...formatValue('sharpness', material.sharpness),
    ...formatOpacity('d', material.d),
    ...formatTexture('disp', material.disp),
    ...formatTexture('decal', material.decal),
    ...formatTexture('bump', material.bump),
    ...formatValue('illum', material.illum),
    ...formatValue('Ni', material.Ni),
    ...formatReflection('refl', material.refl),
    ...formatValue('Pr', material.Pr),
    ...formatValue('Pm', material.Pm),
    ...formatValue('Ps', material.Ps),
    ...formatValue('Pc', material.Pc),
    ...formatValue('Pcr', material.Pcr),
    ...formatValue('aniso', material.aniso),
    ...formatValue('anisor', material.anisor),
    ...formatTexture('norm', material.norm),
    ...formatTexture('map_RMA', material.map_RMA),
    ...formatTexture('map_ORM', material.map_ORM),
  ];
}

/**
 * 输出整个文档：头部注释，然后每个材质之间空一行
 */
export function formatDocument(document: MaterialDocument): string {
  const blocks = [
    document.information.map((line) => `# ${line}`),
    ...document.materials.map(formatMaterial),
  ].filter((lines) => lines.length > 0);

  return blocks.map((lines) => lines.join('\n')).join('\n\n') + '\n';
}

/**
 * 打印文档
 */
export function traceDocument(document: MaterialDocument, log: (line: string) => void = console.log): void {
  for (const line of formatDocument(document).split('\n')) {
    log(line);
  }
}
