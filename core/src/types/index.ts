export enum PixelFormat {
  RGB565 = 'rgb565',
  BGR565 = 'bgr565',
  ARGB8888 = 'argb8888',
  RGBA8888 = 'rgba8888',
  RGB888 = 'rgb888',
  BGR888 = 'bgr888'
}

/**
 * Decoded image, row-major, four bytes (R, G, B, A) per pixel.
 */
export interface PixelGrid {
  width: number;
  height: number;
  data: Uint8Array;
}

export interface FormatDescriptor {
  id: PixelFormat;
  bytesPerPixel: 1 | 2 | 3 | 4;
  /** Symbolic constant written into the generated header */
  formatConstant: string;
  description: string;
}

export interface SymbolNames {
  macroPrefix: string;
  arrayName: string;
}

export interface ConversionResult {
  format: FormatDescriptor;
  width: number;
  height: number;
  bytes: Uint8Array;
  names: SymbolNames;
  text: string;
}
