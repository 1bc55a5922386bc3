import path from 'path';
import { SymbolNames } from '../types';

const SEPARATORS = /[- ]/g;

/**
 * Derive the macro prefix and array name used in a generated header.
 * Only `-` and space are replaced; any other character passes through,
 * so names containing e.g. `.` or `#` yield symbols a C compiler rejects.
 */
export function sanitizeName(rawName: string): SymbolNames {
  return {
    macroPrefix: rawName.toUpperCase().replace(SEPARATORS, '_'),
    arrayName: rawName.toLowerCase().replace(SEPARATORS, '_')
  };
}

/**
 * Remove the last extension of the final path segment. Leading dots never
 * start an extension, so `.hidden` and `..png` are returned unchanged.
 */
export function stripExtension(filePath: string): string {
  const sepIndex = Math.max(filePath.lastIndexOf('/'), filePath.lastIndexOf(path.sep));
  const dotIndex = filePath.lastIndexOf('.');
  if (dotIndex <= sepIndex) {
    return filePath;
  }
  const stem = filePath.slice(sepIndex + 1, dotIndex);
  return /[^.]/.test(stem) ? filePath.slice(0, dotIndex) : filePath;
}

/** File name without directory and without its last extension. */
export function symbolStem(fileName: string): string {
  return stripExtension(path.basename(fileName));
}
