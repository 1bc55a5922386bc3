export * from './types';
export * from './errors';
export * from './formats/registry';
export * from './encoding/encoder';
export * from './header/sanitize';
export * from './header/writer';
export * from './header/render';
export * from './imaging/decode';

import { lookupFormat } from './formats/registry';
import { encodePixels } from './encoding/encoder';
import { sanitizeName, symbolStem } from './header/sanitize';
import { renderHeader } from './header/render';
import { decodeImage } from './imaging/decode';
import { ConversionResult } from './types';

/**
 * Main converter class
 * Turns an encoded PNG/JPEG into the text of a C header
 */
export class HeaderConverter {
  /**
   * Convert image content to a header
   * @param content - Raw PNG or JPEG file content
   * @param sourceFileName - File name the symbols and header comment are derived from
   * @param format - Pixel format identifier, e.g. `rgb565`
   */
  convert(content: Buffer, sourceFileName: string, format: string): ConversionResult {
    // Reject the format before spending any time decoding
    const descriptor = lookupFormat(format);
    const grid = decodeImage(content);
    const bytes = encodePixels(grid, descriptor);
    const names = sanitizeName(symbolStem(sourceFileName));
    const text = renderHeader(bytes, descriptor, grid.width, grid.height, names, sourceFileName);

    return {
      format: descriptor,
      width: grid.width,
      height: grid.height,
      bytes,
      names,
      text
    };
  }
}

export default HeaderConverter;
