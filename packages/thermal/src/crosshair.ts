import { rgb888 } from '@irshot/raster';
import type { KnownModel, Rect } from './types';

// ============================================================================
// Crosshair glyph
// ============================================================================

export const CROSSHAIR_BORDER = rgb888(0x00, 0x00, 0x00);
export const CROSSHAIR_FILL = rgb888(0xff, 0xff, 0xff);

/** Border pixels crossed by a horizontal line through the crosshair centre */
export const CROSSHAIR_BORDER_RUNS = 4;

/**
 * Fixed crosshair shape of one device model. Stroke rectangles are relative to
 * the crosshair origin and together cover every stroke pixel, border included.
 */
export interface ModelGeometry {
  model: KnownModel;
  height: number;
  /** Fill pixels between two border pixels on one arm of the target row */
  fillWidth: number;
  centerWidth: number;
  centerHeight: number;
  centerOffsetX: number;
  centerOffsetY: number;
  /** Row of the crosshair the matcher recognises */
  targetRow: number;
  strokes: readonly Rect[];
}

function stroke(x: number, y: number, width: number, height: number): Rect {
  return { x, y, width, height };
}

export const MODEL_GEOMETRY: Readonly<Record<KnownModel, ModelGeometry>> = {
  TG165: {
    model: 'TG165',
    height: 23,
    fillWidth: 7,
    centerWidth: 5,
    centerHeight: 5,
    centerOffsetX: 9,
    centerOffsetY: 9,
    targetRow: 11,
    strokes: [
      stroke(6, 6, 11, 3),
      stroke(0, 10, 6, 3),
      stroke(17, 10, 6, 3),
      stroke(10, 17, 3, 6),
      stroke(6, 9, 3, 8),
      stroke(14, 9, 3, 8),
      stroke(10, 0, 3, 6),
      stroke(9, 14, 5, 3),
    ],
  },
  TG167: {
    model: 'TG167',
    height: 47,
    fillWidth: 14,
    centerWidth: 17,
    centerHeight: 17,
    centerOffsetX: 16,
    centerOffsetY: 15,
    targetRow: 23,
    strokes: [
      stroke(13, 12, 23, 3),
      stroke(13, 32, 23, 3),
      stroke(0, 22, 13, 3),
      stroke(36, 22, 13, 3),
      stroke(23, 35, 3, 12),
      stroke(13, 15, 3, 17),
      stroke(33, 15, 3, 17),
      stroke(23, 0, 3, 12),
    ],
  },
};

export const KNOWN_MODELS: readonly KnownModel[] = ['TG165', 'TG167'];

export function crosshairWidth(geometry: ModelGeometry): number {
  return CROSSHAIR_BORDER_RUNS + geometry.centerWidth + geometry.fillWidth * 2;
}

/** Smallest fill count a row must hold to be worth matching */
export const MIN_ROW_FILL = Math.min(...KNOWN_MODELS.map((model) => MODEL_GEOMETRY[model].fillWidth)) * 2;

export function within(x: number, y: number, rect: Rect): boolean {
  return x >= rect.x && y >= rect.y && x < rect.x + rect.width && y < rect.y + rect.height;
}

// ============================================================================
// Pattern matcher
// ============================================================================
//
// Target row: border, fill, border, eye, border, fill, border. The fill count
// runs on across both arms, so the second arm must bring it to twice a
// model's fill width.

export type PixelKind = 'border' | 'fill' | 'other';

export type MatcherPhase =
  | 'start'
  | 'border1'
  | 'fill1'
  | 'border2'
  | 'eye'
  | 'border3'
  | 'fill2'
  | 'border4';

export interface MatcherState {
  phase: MatcherPhase;
  borders: number;
  fill: number;
  eye: number;
}

export const MATCHER_START: Readonly<MatcherState> = { phase: 'start', borders: 0, fill: 0, eye: 0 };

export function pixelKind(color: number): PixelKind {
  if (color === CROSSHAIR_BORDER) return 'border';
  if (color === CROSSHAIR_FILL) return 'fill';
  return 'other';
}

const FILL_WIDTHS = new Set(KNOWN_MODELS.map((model) => MODEL_GEOMETRY[model].fillWidth));
const CENTER_WIDTHS = new Set(KNOWN_MODELS.map((model) => MODEL_GEOMETRY[model].centerWidth));
const DOUBLE_FILL_WIDTHS = new Set(KNOWN_MODELS.map((model) => MODEL_GEOMETRY[model].fillWidth * 2));

export function stepMatcher(state: Readonly<MatcherState>, kind: PixelKind): MatcherState {
  const { phase, borders, fill, eye } = state;

  switch (kind) {
    case 'border':
      if (phase === 'fill1' && borders === 1 && FILL_WIDTHS.has(fill)) {
        return { phase: 'border2', borders: 2, fill, eye };
      }
      if (phase === 'eye' && borders === 2 && CENTER_WIDTHS.has(eye)) {
        return { phase: 'border3', borders: 3, fill, eye };
      }
      if (phase === 'fill2' && borders === 3 && DOUBLE_FILL_WIDTHS.has(fill)) {
        return { phase: 'border4', borders: 4, fill, eye };
      }
      // Any other border pixel may open a new match
      return { phase: 'border1', borders: 1, fill: 0, eye: 0 };

    case 'fill':
      if (phase === 'border1' && borders === 1) return { ...state, phase: 'fill1', fill: fill + 1 };
      if (phase === 'border3' && borders === 3) return { ...state, phase: 'fill2', fill: fill + 1 };
      if (phase === 'fill1' || phase === 'fill2') return { ...state, fill: fill + 1 };
      return { ...MATCHER_START };

    case 'other':
      if (phase === 'border2' && borders === 2) return { ...state, phase: 'eye', eye: eye + 1 };
      if (phase === 'eye') return { ...state, eye: eye + 1 };
      return { ...MATCHER_START };
  }
}

/** Model whose fill and centre widths a completed match carries, if any */
export function identifyModel(state: Readonly<MatcherState>): KnownModel | null {
  if (state.borders !== CROSSHAIR_BORDER_RUNS) return null;
  for (const model of KNOWN_MODELS) {
    const geometry = MODEL_GEOMETRY[model];
    if (state.fill === geometry.fillWidth * 2 && state.eye === geometry.centerWidth) return model;
  }
  return null;
}

// ============================================================================
// Painter
// ============================================================================

export type PainterPhase = 'none' | 'border' | 'fill';

export interface PainterState {
  phase: PainterPhase;
  length: number;
}

export interface PainterStep {
  state: PainterState;
  /** Color slot for the current pixel */
  paint: 'border' | 'fill' | null;
  /** Repaint the previous pixel as border, closing a fill run */
  closeRun: boolean;
}

export const PAINTER_START: Readonly<PainterState> = { phase: 'none', length: 0 };

export function stepPainter(state: Readonly<PainterState>, crosshair: boolean): PainterStep {
  if (!crosshair) {
    return {
      state: { ...PAINTER_START },
      paint: null,
      closeRun: state.phase === 'fill' && state.length > 1,
    };
  }

  if (state.phase === 'none') {
    return { state: { phase: 'border', length: state.length + 1 }, paint: 'border', closeRun: false };
  }
  return { state: { phase: 'fill', length: state.length + 1 }, paint: 'fill', closeRun: false };
}
