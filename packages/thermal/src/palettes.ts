import { createDebugLog, fail, ok } from '@irshot/raster';
import type { Canvas, Result } from '@irshot/raster';
import type {
  LookupDirection,
  PaletteCache,
  PaletteEntry,
  PaletteId,
  PaletteTable,
} from './types';
import { CROSSHAIR_BORDER, CROSSHAIR_FILL } from './crosshair';
import ironFile from '../data/palettes/iron.json';
import grayscaleFile from '../data/palettes/grayscale.json';
import rainbowFile from '../data/palettes/rainbow.json';

// ============================================================================
// Tables
// ============================================================================

export const PALETTE_IDS: readonly PaletteId[] = ['iron', 'grayscale', 'rainbow'];

/** Entries a lookup cache holds */
export const PALETTE_CACHE_SIZE = 4;

/** Miss budget that disables the limit in determinePalette */
export const IGNORE_ERRORS = 0xffff;

interface PaletteFile {
  name: string;
  entries: PaletteEntry[];
}

function freezeTable(id: PaletteId, file: PaletteFile): PaletteTable {
  const entries = file.entries.map(({ base, width, color }) => Object.freeze({ base, width, color }));
  return Object.freeze({ id, entries: Object.freeze(entries) });
}

const TABLES: Readonly<Record<PaletteId, PaletteTable>> = {
  iron: freezeTable('iron', ironFile),
  grayscale: freezeTable('grayscale', grayscaleFile),
  rainbow: freezeTable('rainbow', rainbowFile),
};

export function getPalette(id: PaletteId): PaletteTable {
  return TABLES[id];
}

/** The entries must tile 0..255 in order with no gap or overlap */
export function validatePalette(table: PaletteTable): Result<void> {
  let next = 0;
  for (const entry of table.entries) {
    if (entry.width < 1) return fail('imageSemantic', 'palettes');
    if (entry.base !== next) return fail('outOfRange', 'palettes');
    next = entry.base + entry.width;
  }
  if (next !== 256) return fail('outOfRange', 'palettes');
  return ok(undefined);
}

// ============================================================================
// Lookup cache
// ============================================================================

export function createPaletteCache(): PaletteCache {
  return { entries: [], index: 0, palette: null, direction: null };
}

export function resetPaletteCache(cache: PaletteCache): void {
  cache.entries.length = 0;
  cache.index = 0;
  cache.palette = null;
  cache.direction = null;
}

/** Bind the cache to a table and direction, dropping entries from any other binding */
function bindCache(cache: PaletteCache, palette: PaletteId, direction: LookupDirection): void {
  if (cache.palette === palette && cache.direction === direction) return;
  resetPaletteCache(cache);
  cache.palette = palette;
  cache.direction = direction;
}

function remember(cache: PaletteCache, entry: PaletteEntry): void {
  if (cache.entries.length < PALETTE_CACHE_SIZE) {
    cache.index = 0;
    cache.entries.push(entry);
    return;
  }
  cache.entries[cache.index++] = entry;
  if (cache.index >= cache.entries.length) cache.index = 0;
}

function find(
  table: PaletteTable,
  cache: PaletteCache,
  direction: LookupDirection,
  matches: (entry: PaletteEntry) => boolean
): Result<PaletteEntry> {
  bindCache(cache, table.id, direction);
  const cached = cache.entries.find(matches);
  if (cached) return ok(cached);

  const entry = table.entries.find(matches);
  if (!entry) return fail('imageSemantic', 'palettes');
  remember(cache, entry);
  return ok(entry);
}

/** Entry whose display color is exactly `color` */
export function findByColor(color: number, table: PaletteTable, cache: PaletteCache): Result<PaletteEntry> {
  return find(table, cache, 'color', (entry) => entry.color === color);
}

/** Entry whose half-open range `[base, base + width)` contains `value` */
export function findByValue(value: number, table: PaletteTable, cache: PaletteCache): Result<PaletteEntry> {
  if (!Number.isInteger(value) || value < 0 || value > 255) return fail('outOfRange', 'palettes');
  return find(table, cache, 'value', (entry) => entry.base <= value && value < entry.base + entry.width);
}

// ============================================================================
// Palette classification
// ============================================================================

export interface DeterminePaletteOptions {
  debug?: boolean;
}

/**
 * Decide which palette rendered `canvas` by counting, per table, how many
 * pixels it can decode. Crosshair colors are skipped. Every pixel no table
 * knows costs one unit of `maxMisses` unless it is IGNORE_ERRORS.
 */
export function determinePalette(
  canvas: Canvas,
  maxMisses: number,
  options: DeterminePaletteOptions = {}
): Result<PaletteId> {
  const debugLog = createDebugLog('Palettes', options.debug);
  if (canvas.width < 1 || canvas.height < 1) return fail('outOfRange', 'palettes');

  const counts: Record<PaletteId, number> = { iron: 0, grayscale: 0, rainbow: 0 };
  const caches: Record<PaletteId, PaletteCache> = {
    iron: createPaletteCache(),
    grayscale: createPaletteCache(),
    rainbow: createPaletteCache(),
  };
  let missesLeft = maxMisses;
  let misses = 0;

  for (const color of canvas.data) {
    if (color === CROSSHAIR_BORDER || color === CROSSHAIR_FILL) continue;

    let matched = false;
    for (const id of PALETTE_IDS) {
      if (findByColor(color, TABLES[id], caches[id]).ok) {
        counts[id]++;
        matched = true;
      }
    }

    if (matched) continue;
    misses++;
    if (maxMisses === IGNORE_ERRORS) continue;
    missesLeft--;
    if (missesLeft < 1) {
      debugLog('Miss budget exhausted', { maxMisses, misses });
      return fail('imageSemantic', 'palettes');
    }
  }

  let best: PaletteId | null = null;
  let bestCount = 0;
  let tied = false;
  for (const id of PALETTE_IDS) {
    const count = counts[id];
    if (count > bestCount) {
      best = id;
      bestCount = count;
      tied = false;
    } else if (count === bestCount && count > 0) {
      tied = true;
    }
  }

  debugLog('Palette match counts', { ...counts, misses });
  if (!best || tied) return fail('imageSemantic', 'palettes');
  return ok(best);
}
