/**
 * Palette Module
 *
 * Loads named filament colors from JSON or Markdown tables and
 * matches pixels to their nearest entry.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import type { Color, Palette, PaletteEntry } from './types';
import { EmptyPaletteError, PaletteFormatError } from './errors';
import { BASE_PART_NAME } from './meshGenerator';
import { slugify } from './slug';

const HEX_TOKEN = /^[0-9a-fA-F]{6}$/;

/** Hex code inside a Markdown table cell, with or without '#' */
const HEX_IN_CELL = /#?[0-9A-Fa-f]{6}/;

const jsonPaletteSchema = z.array(
  z.object({
    name: z.string().min(1),
    hex: z.string(),
  })
);

/**
 * Parses a 6-digit hex token ("#1E90FF", "1e90ff") into a color
 */
export function parseHex(token: string): Color {
  const digits = token.trim().replace(/^#/, '');
  if (!HEX_TOKEN.test(digits)) {
    throw new PaletteFormatError(`Invalid hex color: ${digits}`);
  }
  return {
    r: parseInt(digits.slice(0, 2), 16),
    g: parseInt(digits.slice(2, 4), 16),
    b: parseInt(digits.slice(4, 6), 16),
  };
}

/**
 * Converts a color to upper-case `#RRGGBB`
 */
export function toHex(color: Color): string {
  const toHexByte = (n: number) => n.toString(16).padStart(2, '0').toUpperCase();
  return `#${toHexByte(color.r)}${toHexByte(color.g)}${toHexByte(color.b)}`;
}

/**
 * Builds a palette from name/hex pairs.
 * Names are compared case-insensitively; the first occurrence wins.
 * Every name needs its own non-empty slug other than the base part's,
 * since slugs name the output files.
 */
export function createPalette(pairs: ReadonlyArray<{ name: string; hex: string }>): PaletteEntry[] {
  const seen = new Set<string>();
  const slugs = new Map<string, string>();
  const entries: PaletteEntry[] = [];

  for (const { name, hex } of pairs) {
    const key = name.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);

    const slug = slugify(name);
    if (slug === '') {
      throw new PaletteFormatError(`Color name "${name}" has no letters or digits`);
    }
    if (slug === BASE_PART_NAME) {
      throw new PaletteFormatError(`Color name "${name}" collides with the ${BASE_PART_NAME} part`);
    }
    const other = slugs.get(slug);
    if (other !== undefined) {
      throw new PaletteFormatError(`Color names "${other}" and "${name}" both map to "${slug}"`);
    }
    slugs.set(slug, name);

    const color = parseHex(hex);
    entries.push({ name, color, hex: toHex(color) });
  }

  return entries;
}

/**
 * Keeps only the entries named in `names` (case-insensitive), in palette order.
 * An empty selection keeps everything.
 */
export function selectColors(palette: Palette, names: readonly string[]): PaletteEntry[] {
  const wanted = new Set(names.map((n) => n.toLowerCase()));
  const selected = wanted.size === 0
    ? [...palette]
    : palette.filter((entry) => wanted.has(entry.name.toLowerCase()));

  if (selected.length === 0) {
    throw new EmptyPaletteError();
  }
  return selected;
}

/**
 * Parses a JSON palette: an array of `{ "name": ..., "hex": ... }` objects
 */
export function parseJsonPalette(text: string): PaletteEntry[] {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new PaletteFormatError(`Palette JSON could not be parsed: ${message}`);
  }

  const result = jsonPaletteSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new PaletteFormatError(
      `Palette JSON must be a list of {name, hex} objects (${issue.path.join('.')}: ${issue.message})`
    );
  }

  return createPalette(result.data);
}

/**
 * Parses a Markdown table with a name column followed by a hex column.
 * Header, separator and rows without a hex code are skipped.
 */
export function parseMarkdownPalette(text: string): PaletteEntry[] {
  const pairs: Array<{ name: string; hex: string }> = [];

  for (const line of text.split(/\r?\n/)) {
    if (!line.includes('|')) continue;

    const cells = line.split('|').map((cell) => cell.trim());
    // "| a | b |" yields empty edge cells
    if (cells[0] === '') cells.shift();
    if (cells[cells.length - 1] === '') cells.pop();

    const [name, ...rest] = cells;
    if (!name || cells.length < 2 || name.toLowerCase() === 'name') continue;

    const hexCell = rest.find((cell) => cell.includes('#'));
    const match = hexCell?.match(HEX_IN_CELL);
    if (!match) continue;

    pairs.push({ name, hex: match[0] });
  }

  return createPalette(pairs);
}

/**
 * Loads a palette file, choosing the parser by extension
 * (`.json`, anything else is read as a Markdown table).
 *
 * @param select - Names to keep (case-insensitive); empty or omitted keeps all
 */
export async function loadPalette(filePath: string, select: readonly string[] = []): Promise<PaletteEntry[]> {
  const text = await fs.readFile(filePath, 'utf-8');
  const entries = path.extname(filePath).toLowerCase() === '.json'
    ? parseJsonPalette(text)
    : parseMarkdownPalette(text);

  return selectColors(entries, select);
}

/**
 * Finds the entry closest to `color` by squared Euclidean RGB distance.
 * Ties go to the earliest entry.
 */
export function findNearestEntry(color: Color, palette: Palette): PaletteEntry {
  let best = palette[0];
  let minDistance = Infinity;

  for (const entry of palette) {
    const dr = color.r - entry.color.r;
    const dg = color.g - entry.color.g;
    const db = color.b - entry.color.b;
    const distance = dr * dr + dg * dg + db * db;
    if (distance < minDistance) {
      minDistance = distance;
      best = entry;
    }
  }

  return best;
}

/**
 * Hex color of the entry named `name` (case-insensitive), or black
 */
export function findBackgroundColor(palette: Palette, name: string): string {
  const match = palette.find((entry) => entry.name.toLowerCase() === name.toLowerCase());
  return match ? match.hex : '#000000';
}
