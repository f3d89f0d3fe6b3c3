// ============================================================================
// Core types for screenshot recovery
// ============================================================================

import type { Canvas } from '@irshot/raster';

/** Axis-aligned rectangle; coordinates may be negative when a crosshair is clipped */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** Device models the crosshair matcher can identify */
export type KnownModel = 'TG165' | 'TG167';

/** `pending` until the locator has been processed */
export type DeviceModel = 'pending' | 'unknown' | KnownModel;

/** Per-pixel classes stored in a thermal mask */
export const PixelClass = {
  Fail: 0,
  Bounds: 1,
  Image: 2,
  Crosshair: 3,
  Invalid: 4,
} as const;

export type PixelClass = (typeof PixelClass)[keyof typeof PixelClass];

// ============================================================================
// Palettes
// ============================================================================

export type PaletteId = 'iron' | 'grayscale' | 'rainbow';

/** Raw values in `[base, base + width)` render as `color` */
export interface PaletteEntry {
  base: number;
  width: number;
  color: number;
}

export interface PaletteTable {
  id: PaletteId;
  entries: readonly PaletteEntry[];
}

export type LookupDirection = 'color' | 'value';

/** Most-recently-found entries of one table, searched before the table itself */
export interface PaletteCache {
  entries: PaletteEntry[];
  /** Next slot to overwrite once the cache is full */
  index: number;
  palette: PaletteId | null;
  direction: LookupDirection | null;
}

// ============================================================================
// Locator
// ============================================================================

export interface Locator {
  model: DeviceModel;
  crosshair: Rect;
  /** Measurement spot in the middle of the crosshair */
  aperture: Rect;
  /** OSD text strip; null once moved into a thermal context */
  textCanvas: Canvas | null;
  /** Infrared region; null once moved into a thermal context */
  irCanvas: Canvas | null;
}

export interface LocateOptions {
  debug?: boolean;
}

// ============================================================================
// Thermal pipeline
// ============================================================================

export type Interpolation =
  | 'zero'
  | 'min'
  | 'med'
  | 'max'
  | 'squareSmall'
  | 'squareLarge'
  | 'squareWeight';

export type Quantization = 'exact' | 'floor' | 'ceiling' | 'medianLow' | 'medianHigh';

export interface ThermalMask {
  width: number;
  height: number;
  pixels: Uint8Array;
}

/** Relative intensity per pixel plus the width of the palette range it came from */
export interface ThermalImage {
  width: number;
  height: number;
  quantization: Quantization;
  values: Uint8Array;
  uncertainty: Uint8Array;
}

export interface ThermalPoint {
  value: number;
  uncertainty: number;
}

export interface ThermalContext {
  model: DeviceModel;
  spot: Rect;
  irCanvas: Canvas | null;
  textCanvas: Canvas | null;
  mask: ThermalMask | null;
  image: ThermalImage | null;
  /** Palette the last reconstruction decoded */
  palette: PaletteId | null;
  /** Tenths of a degree Celsius, null until read */
  spotTemperature: number | null;
  /** Hundredths, null until read */
  emissivity: number | null;
}

export interface ReconstructOptions {
  interpolation?: Interpolation;
  quantization?: Quantization;
  debug?: boolean;
}

export interface RecoveryOptions extends ReconstructOptions {
  /** Palette for the rendered output (default: the detected one) */
  palette?: PaletteId;
  /** Paint the crosshair back over the rendered output (default true) */
  redrawCrosshair?: boolean;
  crosshairBorder?: number;
  crosshairFill?: number;
}

export interface RecoveryResult {
  model: DeviceModel;
  palette: PaletteId;
  spotTemperature: number | null;
  emissivity: number | null;
  spot: Rect;
  thermal: ThermalImage;
  rendered: Canvas;
}
