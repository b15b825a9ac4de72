/**
 * 行扫描工具
 * 在不可变的行文本上以游标方式读取 token / 整数 / 浮点数
 */

// 仅 ASCII 空白，与 isspace 一致
const WHITESPACE = /[ \t\n\v\f\r]/;

// 最长合法前缀
const INT_PATTERN = /^[+-]?\d+/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/;

/**
 * 是否为空白字符
 */
export function isSpace(ch: string | undefined): boolean {
  return ch !== undefined && WHITESPACE.test(ch);
}

/**
 * 去除首尾空白，全空白时返回空串
 */
export function trim(text: string): string {
  let start = 0;
  let end = text.length;

  while (start < end && isSpace(text[start])) start++;
  while (end > start && isSpace(text[end - 1])) end--;

  return text.slice(start, end);
}

/**
 * 行游标
 * 所有 read* 方法成功时前移游标，失败时返回 null 且游标不变
 */
export class Cursor {
  readonly text: string;
  private offset: number;

  constructor(text: string, offset: number = 0) {
    this.text = text;
    this.offset = offset;
  }

  /** 当前位置 */
  get position(): number {
    return this.offset;
  }

  /** 是否已到行尾 */
  get done(): boolean {
    return this.offset >= this.text.length;
  }

  /** 当前位置字符 */
  peek(): string | undefined {
    return this.text[this.offset];
  }

  /** 剩余文本 */
  rest(): string {
    return this.text.slice(this.offset);
  }

  seek(offset: number): void {
    this.offset = Math.min(Math.max(offset, 0), this.text.length);
  }

  /** 前移一个字符 */
  advance(): void {
    if (!this.done) this.offset++;
  }

  skipSpace(): void {
    while (!this.done && isSpace(this.text[this.offset])) this.offset++;
  }

  /**
   * 读取下一个空白分隔的 token
   * 行尾时返回空串，游标不动
   */
  readToken(): string {
    let start = this.offset;
    while (start < this.text.length && isSpace(this.text[start])) start++;

    let end = start;
    while (end < this.text.length && !isSpace(this.text[end])) end++;

    if (start === end) return '';

    this.offset = end;
    return this.text.slice(start, end);
  }

  /**
   * 读取单词（文件名、on/off 等）
   */
  readWord(): string | null {
    const token = this.readToken();
    return token === '' ? null : token;
  }

  /**
   * 读取十进制有符号整数
   */
  readInt(): number | null {
    return this.read(INT_PATTERN, (match) => {
      const value = parseInt(match, 10);
      return Number.isSafeInteger(value) ? value : null;
    });
  }

  /**
   * 读取浮点数（支持小数和指数形式）
   * 溢出为 Infinity 的值视为失败
   */
  readFloat(): number | null {
    return this.read(FLOAT_PATTERN, (match) => {
      const value = parseFloat(match);
      return Number.isFinite(value) ? value : null;
    });
  }

  /**
   * 当前 token 是否以给定前缀开头（前缀后必须是空白）
   * 匹配成功时游标移到前缀之后
   */
  readKeyword(keyword: string): boolean {
    const end = this.offset + keyword.length;
    if (this.text.startsWith(keyword, this.offset) && isSpace(this.text[end])) {
      this.offset = end;
      return true;
    }
    return false;
  }

  private read(pattern: RegExp, convert: (match: string) => number | null): number | null {
    let start = this.offset;
    while (start < this.text.length && isSpace(this.text[start])) start++;

    const result = pattern.exec(this.text.slice(start));
    if (!result) return null;

    const value = convert(result[0]);
    if (value === null) return null;

    this.offset = start + result[0].length;
    return value;
  }
}
