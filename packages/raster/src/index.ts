// ============================================================================
// @irshot/raster – public API
// ============================================================================

export type { ErrorReason, ErrorSource, ErrorEntry, Result } from './errors';
export {
  ErrorStack,
  ERROR_STACK_CAPACITY,
  REASON_NAMES,
  SOURCE_NAMES,
  ok,
  fail,
  delegate,
} from './errors';

export type { DebugLog } from './log';
export { createDebugLog } from './log';

export type { Canvas } from './canvas';
export {
  MAX_CANVAS_SIDE,
  rgb565,
  rgb888,
  toRgb888,
  createCanvas,
  copyCanvas,
  mergeCanvas,
  getPixel,
  setPixel,
} from './canvas';

export type { Bitmap, PixelFormat, PixelLayout } from './bitmap';
export {
  MAX_BITMAP_PIXELS,
  PIXEL_LAYOUTS,
  strideOf,
  createBitmap,
  decodeBitmap,
  encodeBitmap,
  readBitmapFile,
  writeBitmapFile,
  editBitmap,
  mergeIntoBitmap,
  bitmapFromCanvas,
} from './bitmap';

export type { OcrFont, ReadStringOptions } from './ocr';
export { LARGE_FONT, SMALL_FONT, signatureOf, sampleSignature, readChar, readString } from './ocr';
