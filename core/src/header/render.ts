import { FormatDescriptor, SymbolNames } from '../types';
import { HeaderWriter } from './writer';

export const GENERATOR_NAME = 'pixarray';
export const DEFAULT_ALIGNMENT_ATTRIBUTE = '__attribute__((aligned(128)))';

/**
 * Render the C header for an encoded image.
 * Each line of the array body holds exactly one image row.
 */
export function renderHeader(
  encoded: Uint8Array,
  format: FormatDescriptor,
  width: number,
  height: number,
  names: SymbolNames,
  sourceFileName: string
): string {
  const stride = width * format.bytesPerPixel;
  const expected = stride * height;
  if (encoded.length !== expected) {
    throw new RangeError(
      `Encoded data is ${encoded.length} bytes, expected ${expected} for ${width}x${height} ${format.id}`
    );
  }

  const prefix = names.macroPrefix;
  const guard = `${prefix}_IMG`;
  const macro = (suffix: string) => `${prefix}${suffix}`;

  return new HeaderWriter()
    .comment([
      `Auto-generated C header file for image: ${sourceFileName}`,
      `Format: ${format.description}`,
      `Dimensions: ${width}x${height} pixels`,
      `Generated by ${GENERATOR_NAME}`
    ])
    .blank()
    .ifndef(guard)
    .guard(guard)
    .blank()
    .ifndef(macro('_IMG_ATTRIBUTE'))
    .define(prefix, '_IMG_ATTRIBUTE', DEFAULT_ALIGNMENT_ATTRIBUTE)
    .endif(macro('_IMG_ATTRIBUTE'))
    .blank()
    .define(prefix, '_IMG_WIDTH', `(${width})`)
    .define(prefix, '_IMG_HEIGHT', `(${height})`)
    .define(prefix, '_IMG_BYTES_PER_PIXEL', `(${format.bytesPerPixel})`)
    .define(prefix, '_IMG_STRIDE', `(${macro('_IMG_WIDTH')} * ${macro('_IMG_BYTES_PER_PIXEL')})`)
    .define(prefix, '_IMG_FORMAT', `(${format.formatConstant})`)
    .define(prefix, '_IMG_PIXEL_DATA', `((unsigned char*) ${names.arrayName}_img_map)`)
    .define(
      prefix,
      '_IMG_PIXEL_DATA_SIZE',
      `(${macro('_IMG_WIDTH')} * ${macro('_IMG_HEIGHT')} * ${macro('_IMG_BYTES_PER_PIXEL')})`
    )
    .blank()
    .byteArray(`const ${macro('_IMG_ATTRIBUTE')} uint8_t ${names.arrayName}_img_map[]`, encoded, stride)
    .blank()
    .endif(guard)
    .toString();
}
