/**
 * Line-oriented builder for C header text.
 */

/** Macro suffixes are padded to this column so values line up. */
export const MACRO_NAME_WIDTH = 23;
export const BODY_INDENT = '    ';
export const TOKEN_SEPARATOR = ', ';
export const ROW_SEPARATOR = ',\n';
export const HEX_PREFIX = '0x';

export function formatHexByte(value: number): string {
  return HEX_PREFIX + (value & 0xff).toString(16).toUpperCase().padStart(2, '0');
}

export class HeaderWriter {
  private lines: string[] = [];

  comment(lines: string[]): this {
    this.lines.push('/*');
    for (const line of lines) {
      this.lines.push(` * ${line}`);
    }
    this.lines.push(' */');
    return this;
  }

  blank(): this {
    this.lines.push('');
    return this;
  }

  ifndef(name: string): this {
    this.lines.push(`#ifndef ${name}`);
    return this;
  }

  /** `#define` with no value, as used by include guards. */
  guard(name: string): this {
    this.lines.push(`#define ${name}`);
    return this;
  }

  define(prefix: string, suffix: string, value: string): this {
    this.lines.push(`#define ${prefix}${suffix.padEnd(MACRO_NAME_WIDTH)}${value}`);
    return this;
  }

  endif(name: string): this {
    this.lines.push(`#endif /* ${name} */`);
    return this;
  }

  /**
   * Array declaration and initializer, `stride` bytes per source line.
   */
  byteArray(declaration: string, bytes: Uint8Array, stride: number): this {
    if (!Number.isInteger(stride) || stride <= 0) {
      throw new RangeError(`Row stride must be a positive integer, got ${stride}`);
    }

    const rows: string[] = [];
    for (let start = 0; start < bytes.length; start += stride) {
      const tokens = Array.from(bytes.subarray(start, start + stride), formatHexByte);
      rows.push(BODY_INDENT + tokens.join(TOKEN_SEPARATOR));
    }

    this.lines.push(`${declaration} =`);
    this.lines.push('{');
    if (rows.length > 0) {
      this.lines.push(rows.join(ROW_SEPARATOR));
    }
    this.lines.push('};');
    return this;
  }

  toString(): string {
    return this.lines.join('\n') + '\n';
  }
}
