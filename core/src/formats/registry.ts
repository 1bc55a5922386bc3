import { ConversionError, ConversionErrorKind } from '../errors';
import { FormatDescriptor, PixelFormat } from '../types';

export const DEFAULT_FORMAT = PixelFormat.BGR565;

function descriptor(format: FormatDescriptor): Readonly<FormatDescriptor> {
  return Object.freeze(format);
}

const FORMATS: Readonly<Record<PixelFormat, Readonly<FormatDescriptor>>> = Object.freeze({
  [PixelFormat.RGB565]: descriptor({
    id: PixelFormat.RGB565,
    bytesPerPixel: 2,
    formatConstant: 'VG_LITE_RGB565',
    description: 'RGB565 (16-bit, 5-6-5)'
  }),
  [PixelFormat.BGR565]: descriptor({
    id: PixelFormat.BGR565,
    bytesPerPixel: 2,
    formatConstant: 'VG_LITE_BGR565',
    description: 'BGR565 (16-bit, 5-6-5)'
  }),
  [PixelFormat.ARGB8888]: descriptor({
    id: PixelFormat.ARGB8888,
    bytesPerPixel: 4,
    formatConstant: 'VG_LITE_ARGB8888',
    description: 'ARGB8888 (32-bit, 8-8-8-8)'
  }),
  [PixelFormat.RGBA8888]: descriptor({
    id: PixelFormat.RGBA8888,
    bytesPerPixel: 4,
    formatConstant: 'VG_LITE_RGBA8888',
    description: 'RGBA8888 (32-bit, 8-8-8-8)'
  }),
  [PixelFormat.RGB888]: descriptor({
    id: PixelFormat.RGB888,
    bytesPerPixel: 3,
    formatConstant: 'VG_LITE_RGB888',
    description: 'RGB888 (24-bit, 8-8-8)'
  }),
  [PixelFormat.BGR888]: descriptor({
    id: PixelFormat.BGR888,
    bytesPerPixel: 3,
    formatConstant: 'VG_LITE_BGR888',
    description: 'BGR888 (24-bit, 8-8-8)'
  })
});

const FORMAT_IDS: readonly string[] = Object.values(PixelFormat);

export function isPixelFormat(value: string): value is PixelFormat {
  return FORMAT_IDS.includes(value);
}

/**
 * Resolve a format identifier. Matching is exact, so `RGB565` is rejected.
 */
export function lookupFormat(identifier: string): FormatDescriptor {
  if (!isPixelFormat(identifier)) {
    throw new ConversionError(
      ConversionErrorKind.UNSUPPORTED_FORMAT,
      `Unsupported format: ${identifier} (expected one of ${FORMAT_IDS.join(', ')})`
    );
  }
  return FORMATS[identifier];
}

export function listFormats(): FormatDescriptor[] {
  return Object.values(PixelFormat).map((id) => FORMATS[id]);
}
