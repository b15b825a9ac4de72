/**
 * MTLLoader - MTL 文件加载器
 * 从文件或可读流逐行读取 MTL 文本并交给 MTLParser 解析
 */

import { readFile } from 'node:fs/promises';
import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import type { Material, MaterialDocument } from '../types/material';
import { MTLParser } from './MTLParser';
import type { MTLParserOptions } from './MTLParser';

/**
 * 加载器选项
 */
export interface MTLLoaderOptions extends MTLParserOptions {
  /** 文件编码，默认 utf-8 */
  encoding?: BufferEncoding;
}

/**
 * MTL 文件加载器
 * 多次加载时，上一次结果的第一个材质作为下一次的默认模板
 */
export class MTLLoader {
  private readonly parser: MTLParser;
  private readonly encoding: BufferEncoding;
  private readonly logger: Pick<Console, 'warn'>;

  // 最近一次加载的文件路径
  private path: string | null = null;

  constructor(options: MTLLoaderOptions = {}) {
    this.parser = new MTLParser(options);
    this.encoding = options.encoding ?? 'utf-8';
    this.logger = options.logger ?? console;
  }

  /**
   * 加载 MTL 文件
   * @param path 文件路径
   * @returns 文件可读且至少包含一个命名材质时返回 true
   */
  async load(path: string): Promise<boolean> {
    this.path = path;

    let text: string;
    try {
      text = await readFile(path, { encoding: this.encoding });
    } catch (e) {
      this.logger.warn(`MTLLoader: 无法打开文件: ${path}`, e);
      return false;
    }

    return this.parser.parse(text) !== null;
  }

  /**
   * 从可读流加载（逐行解析，不缓存整个文件）
   * @returns 流读取完成且至少包含一个命名材质时返回 true
   */
  async loadFromStream(input: Readable): Promise<boolean> {
    this.parser.begin();

    const lines = createInterface({ input, crlfDelay: Infinity });
    try {
      for await (const line of lines) {
        this.parser.decode(line);
      }
    } catch (e) {
      this.logger.warn('MTLLoader: 读取输入流失败', e);
      return false;
    } finally {
      lines.close();
    }

    return this.parser.finalize() !== null;
  }

  /**
   * 加载 MTL 文件并返回文档
   * 文件不可读或没有命名材质时抛出错误
   */
  async loadDocument(path: string): Promise<MaterialDocument> {
    this.path = path;
    const text = await readFile(path, { encoding: this.encoding });

    const document = this.parser.parse(text);
    if (!document) {
      throw new Error(`MTL 文件中没有材质定义: ${path}`);
    }
    return document;
  }

  /**
   * 最近一次加载的文件路径
   */
  get source(): string | null {
    return this.path;
  }

  materials(): Material[] {
    return this.parser.materials();
  }

  information(): string[] {
    return this.parser.information();
  }

  lookup(name: string): Material | null {
    return this.parser.lookup(name);
  }

  /**
   * 当前结果的文档（没有命名材质时为 null）
   */
  document(): MaterialDocument | null {
    return this.parser.finalize();
  }
}
