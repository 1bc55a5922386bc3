/**
 * Image decoding utilities.
 * Supports JPEG (via jpeg-js) and PNG (via pngjs).
 */
import jpeg from 'jpeg-js';
import { PNG } from 'pngjs';
import { ConversionError, ConversionErrorKind } from '../errors';
import { PixelGrid } from '../types';

/**
 * Decode an image buffer to 8-bit RGBA, auto-detecting format from magic bytes.
 * Supports JPEG (FF D8) and PNG (89 50 4E 47).
 */
export function decodeImage(buffer: Buffer): PixelGrid {
  if (buffer.length < 4) {
    throw new ConversionError(
      ConversionErrorKind.IMAGE_DECODE_FAILURE,
      'Buffer too small to be a valid image'
    );
  }
  if (buffer[0] === 0xff && buffer[1] === 0xd8) {
    return runDecoder('JPEG', () => decodeJPEG(buffer));
  }
  if (buffer[0] === 0x89 && buffer[1] === 0x50 && buffer[2] === 0x4e && buffer[3] === 0x47) {
    return runDecoder('PNG', () => decodePNG(buffer));
  }
  throw new ConversionError(
    ConversionErrorKind.IMAGE_DECODE_FAILURE,
    'Unsupported image format (expected JPEG or PNG)'
  );
}

function runDecoder(kind: string, decode: () => PixelGrid): PixelGrid {
  try {
    return decode();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConversionError(
      ConversionErrorKind.IMAGE_DECODE_FAILURE,
      `Failed to decode ${kind} image: ${reason}`,
      { cause: error }
    );
  }
}

function decodeJPEG(buffer: Buffer): PixelGrid {
  const decoded = jpeg.decode(buffer, { useTArray: true, formatAsRGBA: true });
  return {
    width: decoded.width,
    height: decoded.height,
    data: new Uint8Array(decoded.data),
  };
}

function decodePNG(buffer: Buffer): PixelGrid {
  const png = PNG.sync.read(buffer);
  return {
    width: png.width,
    height: png.height,
    data: new Uint8Array(png.data),
  };
}
