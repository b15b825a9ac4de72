/**
 * MTLParser - MTL 材质文件解析器
 * 逐行解析 MTL 文本，生成带来源标记的材质文档
 */

import { assignField } from '../types/field';
import type { Material, MaterialDocument } from '../types/material';
import { cloneMaterial, createMaterial } from '../types/material';
import { Cursor, trim } from '../utils/scanner';
import { KEYWORD_HANDLERS } from './keywords';

// 字节顺序标记
const BOM = '\uFEFF';

/**
 * 日志输出接口
 */
export type MTLLogger = Pick<Console, 'warn'>;

/**
 * 解析器选项
 */
export interface MTLParserOptions {
  /** 默认材质模板，每个新材质以其值为初始值（来源标记清零） */
  defaultMaterial?: Material;
  /** 首次遇到不支持的关键字时输出警告 */
  verbose?: boolean;
  /** 日志输出，默认 console */
  logger?: MTLLogger;
}

/**
 * MTL 文本解析器
 */
export class MTLParser {
  // 已解析的材质，第一个为哨兵材质
  private mtl: Material[] = [];
  // 第一个材质命名之前的注释行
  private info: string[] = [];
  // 新材质的默认模板（来源标记均为 false）
  private template: Material;

  // 不支持的关键字（用于只警告首次）
  private unsupportedKeywords: Set<string> = new Set();

  private readonly verbose: boolean;
  private readonly logger: MTLLogger;

  constructor(options: MTLParserOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.logger = options.logger ?? console;

    this.template = options.defaultMaterial
      ? cloneMaterial(options.defaultMaterial, { preserveProvenance: false })
      : createMaterial();
    this.mtl = [this.createFromTemplate()];
  }

  /**
   * 解析 MTL 文本内容
   * @param text MTL 文件文本
   * @returns 解析结果，没有任何命名材质时返回 null
   */
  parse(text: string): MaterialDocument | null {
    return this.parseLines(text.split(/\r?\n/));
  }

  /**
   * 解析逐行输入（文件、内存缓冲、网络流均可）
   */
  parseLines(lines: Iterable<string>): MaterialDocument | null {
    this.begin();

    for (const line of lines) {
      this.decode(line);
    }

    return this.finalize();
  }

  /**
   * 开始新的解析
   * 以当前第一个材质（构造时的模板或上次解析的第一个材质）为默认模板，
   * 清空已有材质和注释
   */
  begin(): void {
    this.template = this.defaultMaterial();

    this.mtl = [this.createFromTemplate()];
    this.info = [];
    this.unsupportedKeywords = new Set();
  }

  /**
   * 解析单行
   * @returns 该行是否被接受（注释、材质名或成功解码的字段）
   */
  decode(line: string): boolean {
    const text = trim(line.startsWith(BOM) ? line.slice(1) : line);
    if (text === '') {
      return false;
    }

    const material = this.current();

    // 只收集文件头部的注释
    if (text.startsWith('#')) {
      if (material.name.parsed) {
        return false;
      }
      this.info.push(trim(text.slice(1)));
      return true;
    }

    const cursor = new Cursor(text);
    const keyword = cursor.readToken();
    if (keyword === 'newmtl') {
      return this.parseNewMaterial(trim(cursor.rest()));
    }

    const handler = KEYWORD_HANDLERS.get(keyword);
    if (!handler) {
      this.warnUnsupportedKeyword(keyword);
      return false;
    }

    return handler(material, cursor.rest());
  }

  /**
   * 完成解析
   * @returns 第一个材质已命名时返回文档，否则返回 null（已解析的状态仍可通过 materials() 查看）
   */
  finalize(): MaterialDocument | null {
    if (!this.mtl[0].name.parsed) {
      return null;
    }
    return { materials: this.mtl, information: this.info };
  }

  /**
   * 所有材质（包括未命名的哨兵材质）
   */
  materials(): Material[] {
    return this.mtl;
  }

  /**
   * 文件头部注释
   */
  information(): string[] {
    return this.info;
  }

  /**
   * 按名称查找材质（精确匹配，返回第一个）
   */
  lookup(name: string): Material | null {
    return this.mtl.find((material) => material.name.value === name) ?? null;
  }

  /**
   * 以第一个材质的值构造默认模板，所有来源标记清零
   */
  defaultMaterial(): Material {
    if (this.mtl.length === 0) {
      return createMaterial();
    }
    return cloneMaterial(this.mtl[0], { preserveProvenance: false });
  }

  /**
   * 已出现过的不支持关键字
   */
  getUnsupportedKeywords(): string[] {
    return [...this.unsupportedKeywords];
  }

  private createFromTemplate(): Material {
    return cloneMaterial(this.template, { preserveProvenance: false });
  }

  private current(): Material {
    return this.mtl[this.mtl.length - 1];
  }

  /**
   * 解析新材质定义 (newmtl name)
   * 当前材质已命名时先追加一个由模板复制的新材质
   */
  private parseNewMaterial(name: string): boolean {
    if (name === '') {
      return false;
    }

    if (this.current().name.parsed) {
      this.mtl.push(this.createFromTemplate());
    }

    assignField(this.current().name, name);
    return true;
  }

  /**
   * 记录不支持的关键字（仅首次出现时警告）
   */
  private warnUnsupportedKeyword(keyword: string): void {
    if (this.unsupportedKeywords.has(keyword)) {
      return;
    }
    this.unsupportedKeywords.add(keyword);

    if (this.verbose) {
      this.logger.warn(`MTLParser: 不支持的关键字 "${keyword}"`);
    }
  }
}
