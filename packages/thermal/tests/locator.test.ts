import { describe, expect, test } from 'vitest';
import type { MatcherState, PainterState, PixelKind } from '../src/crosshair';
import { MATCHER_START, PAINTER_START, identifyModel, stepMatcher, stepPainter } from '../src/crosshair';
import { classifyPixel, createLocator, destroyLocator, locate, processLocator } from '../src/locator';
import { PixelClass } from '../src/types';
import { canvasOf, createScreenshot, errorOf, unwrap } from './fixtures';

function runMatcher(runs: ReadonlyArray<readonly [PixelKind, number]>): MatcherState {
  let state: MatcherState = { ...MATCHER_START };
  for (const [kind, length] of runs) {
    for (let i = 0; i < length; i++) state = stepMatcher(state, kind);
  }
  return state;
}

function targetRow(fill: number, eye: number, secondFill = fill): Array<readonly [PixelKind, number]> {
  return [
    ['other', 3],
    ['border', 1],
    ['fill', fill],
    ['border', 1],
    ['other', eye],
    ['border', 1],
    ['fill', secondFill],
    ['border', 1],
  ];
}

// ============================================================================
// Matcher
// ============================================================================

describe('Crosshair matcher', () => {
  test('recognises both target rows', () => {
    const tg165 = runMatcher(targetRow(7, 5));
    expect(tg165).toEqual({ phase: 'border4', borders: 4, fill: 14, eye: 5 });
    expect(identifyModel(tg165)).toBe('TG165');
    expect(identifyModel(runMatcher(targetRow(14, 17)))).toBe('TG167');
  });

  test('incomplete or mixed rows carry no model', () => {
    expect(identifyModel(runMatcher(targetRow(7, 5).slice(0, -1)))).toBeNull();
    expect(identifyModel(runMatcher(targetRow(7, 17)))).toBeNull();
    expect(identifyModel(runMatcher(targetRow(6, 5)))).toBeNull();
    expect(identifyModel(runMatcher(targetRow(7, 5, 8)))).toBeNull();
  });

  test('a stray border restarts the match', () => {
    expect(stepMatcher({ phase: 'fill1', borders: 1, fill: 3, eye: 0 }, 'border')).toEqual({
      phase: 'border1',
      borders: 1,
      fill: 0,
      eye: 0,
    });
    expect(stepMatcher({ phase: 'border1', borders: 1, fill: 0, eye: 0 }, 'other')).toEqual(MATCHER_START);
  });
});

// ============================================================================
// Painter
// ============================================================================

describe('Crosshair painter', () => {
  function paint(run: readonly boolean[]): Array<{ paint: string | null; closeRun: boolean }> {
    let state: PainterState = { ...PAINTER_START };
    return run.map((crosshair) => {
      const step = stepPainter(state, crosshair);
      state = step.state;
      return { paint: step.paint, closeRun: step.closeRun };
    });
  }

  test('a run starts with border and continues with fill', () => {
    expect(paint([true, true, true, false])).toEqual([
      { paint: 'border', closeRun: false },
      { paint: 'fill', closeRun: false },
      { paint: 'fill', closeRun: false },
      { paint: null, closeRun: true },
    ]);
  });

  test('single-pixel runs are not closed', () => {
    expect(paint([true, false]).map((step) => step.closeRun)).toEqual([false, false]);
    expect(paint([true, true, false]).map((step) => step.closeRun)).toEqual([false, false, true]);
  });
});

// ============================================================================
// Locator
// ============================================================================

describe('Locator', () => {
  test('locate rejects screenshots of the wrong size', () => {
    const { bitmap } = createScreenshot();
    expect(errorOf(locate({ ...bitmap, width: 173 })).latest()).toEqual({
      reason: 'imageSemantic',
      source: 'locator',
    });
  });

  test('finds a TG165 crosshair', () => {
    const locator = unwrap(locate(createScreenshot({ model: 'TG165', origin: [40, 60] }).bitmap));
    expect(locator.model).toBe('pending');
    unwrap(processLocator(locator));
    expect(locator.model).toBe('TG165');
    expect(locator.crosshair).toEqual({ x: 40, y: 60, width: 23, height: 23 });
    expect(locator.aperture).toEqual({ x: 49, y: 69, width: 5, height: 5 });
  });

  test('finds a TG167 crosshair', () => {
    const locator = unwrap(locate(createScreenshot({ model: 'TG167', origin: [50, 50] }).bitmap));
    unwrap(processLocator(locator));
    expect(locator.model).toBe('TG167');
    expect(locator.crosshair).toEqual({ x: 50, y: 50, width: 49, height: 47 });
    expect(locator.aperture).toEqual({ x: 66, y: 65, width: 17, height: 17 });
  });

  test('a crosshair clipped at the top keeps a negative origin', () => {
    const locator = unwrap(locate(createScreenshot({ model: 'TG165', origin: [20, -5] }).bitmap));
    unwrap(processLocator(locator));
    expect(locator.crosshair).toEqual({ x: 20, y: -5, width: 23, height: 23 });
  });

  test('no crosshair leaves the model unknown', () => {
    const locator = unwrap(locate(createScreenshot().bitmap));
    expect(errorOf(processLocator(locator)).latest()).toEqual({ reason: 'imageSemantic', source: 'locator' });
    expect(locator.model).toBe('unknown');
    expect(locator.crosshair).toEqual({ x: 0, y: 0, width: 0, height: 0 });
    expect(classifyPixel(locator, 75, 80)).toBe(PixelClass.Image);
  });

  test('processLocator checks its canvases', () => {
    const wrongSize = createLocator(canvasOf(170, 23), canvasOf(150, 174));
    expect(errorOf(processLocator(wrongSize)).latest()?.reason).toBe('outOfRange');

    const released = createLocator(canvasOf(170, 23), canvasOf(150, 175));
    destroyLocator(released);
    expect(released.irCanvas).toBeNull();
    expect(errorOf(processLocator(released)).latest()).toEqual({ reason: 'nullInput', source: 'locator' });
  });

  test('classifyPixel', () => {
    const locator = unwrap(locate(createScreenshot({ model: 'TG165', origin: [40, 60] }).bitmap));
    expect(classifyPixel(locator, 0, 0)).toBe(PixelClass.Fail);

    unwrap(processLocator(locator));
    expect(classifyPixel(locator, -1, 0)).toBe(PixelClass.Bounds);
    expect(classifyPixel(locator, 150, 0)).toBe(PixelClass.Bounds);
    expect(classifyPixel(locator, 51, 61)).toBe(PixelClass.Crosshair);
    expect(classifyPixel(locator, 51, 71)).toBe(PixelClass.Image);
    expect(classifyPixel(locator, 40, 60)).toBe(PixelClass.Image);
    expect(classifyPixel(locator, 10, 10)).toBe(PixelClass.Image);

    locator.crosshair = { ...locator.crosshair, width: 22 };
    expect(classifyPixel(locator, 51, 61)).toBe(PixelClass.Fail);
  });
});
