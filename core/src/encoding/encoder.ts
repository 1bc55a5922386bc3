/**
 * Pixel packing for the supported output formats.
 * Input is always 8-bit RGBA; precision is reduced by truncation, never rounding.
 */
import { FormatDescriptor, PixelFormat, PixelGrid } from '../types';

/** Writes one pixel starting at `offset`. */
type PixelWriter = (out: Uint8Array, offset: number, r: number, g: number, b: number, a: number) => void;

const MASK_5 = 0x1f;
const MASK_6 = 0x3f;

export function packRgb565(r: number, g: number, b: number): number {
  const r5 = (r >>> 3) & MASK_5;
  const g6 = (g >>> 2) & MASK_6;
  const b5 = (b >>> 3) & MASK_5;
  return (r5 << 11) | (g6 << 5) | b5;
}

export function packBgr565(r: number, g: number, b: number): number {
  const r5 = (r >>> 3) & MASK_5;
  const g6 = (g >>> 2) & MASK_6;
  const b5 = (b >>> 3) & MASK_5;
  return (b5 << 11) | (g6 << 5) | r5;
}

// 16-bit words are stored little endian (low byte first)
function writeWord(out: Uint8Array, offset: number, word: number): void {
  out[offset] = word & 0xff;
  out[offset + 1] = (word >>> 8) & 0xff;
}

const WRITERS: Record<PixelFormat, PixelWriter> = {
  [PixelFormat.RGB565]: (out, o, r, g, b) => writeWord(out, o, packRgb565(r, g, b)),
  [PixelFormat.BGR565]: (out, o, r, g, b) => writeWord(out, o, packBgr565(r, g, b)),
  [PixelFormat.ARGB8888]: (out, o, r, g, b, a) => {
    out[o] = a;
    out[o + 1] = r;
    out[o + 2] = g;
    out[o + 3] = b;
  },
  [PixelFormat.RGBA8888]: (out, o, r, g, b, a) => {
    out[o] = r;
    out[o + 1] = g;
    out[o + 2] = b;
    out[o + 3] = a;
  },
  [PixelFormat.RGB888]: (out, o, r, g, b) => {
    out[o] = r;
    out[o + 1] = g;
    out[o + 2] = b;
  },
  [PixelFormat.BGR888]: (out, o, r, g, b) => {
    out[o] = b;
    out[o + 1] = g;
    out[o + 2] = r;
  }
};

export function assertValidGrid(grid: PixelGrid): void {
  const { width, height, data } = grid;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new RangeError(`Invalid image dimensions: ${width}x${height}`);
  }
  if (data.length !== width * height * 4) {
    throw new RangeError(
      `Pixel data length ${data.length} does not match ${width}x${height} RGBA (${width * height * 4})`
    );
  }
}

/**
 * Encode a pixel grid into the byte layout of `format`.
 * Pixels are visited row by row, left to right.
 */
export function encodePixels(grid: PixelGrid, format: FormatDescriptor): Uint8Array {
  assertValidGrid(grid);

  const write = WRITERS[format.id];
  const bpp = format.bytesPerPixel;
  const { data } = grid;
  const pixelCount = grid.width * grid.height;
  const out = new Uint8Array(pixelCount * bpp);

  for (let i = 0; i < pixelCount; i++) {
    const src = i * 4;
    write(out, i * bpp, data[src], data[src + 1], data[src + 2], data[src + 3]);
  }

  return out;
}
