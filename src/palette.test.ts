import { describe, it, expect } from 'vitest';
import * as path from 'path';
import {
  createPalette,
  findBackgroundColor,
  findNearestEntry,
  loadPalette,
  parseHex,
  parseJsonPalette,
  parseMarkdownPalette,
  selectColors,
  toHex,
} from './palette';
import { EmptyPaletteError, PaletteFormatError } from './errors';

const PALETTES_DIR = path.resolve(process.cwd(), 'palettes');

describe('Hex parsing', () => {
  it('should accept upper, lower and prefixed tokens', () => {
    expect(parseHex('#1E90FF')).toEqual({ r: 30, g: 144, b: 255 });
    expect(parseHex('1e90ff')).toEqual({ r: 30, g: 144, b: 255 });
    expect(parseHex('  #000000 ')).toEqual({ r: 0, g: 0, b: 0 });
  });

  it('should reject anything but 6 hex digits', () => {
    expect(() => parseHex('#FFF')).toThrow(PaletteFormatError);
    expect(() => parseHex('#GG0000')).toThrow('Invalid hex color: GG0000');
    expect(() => parseHex('##FF0000')).toThrow(PaletteFormatError);
  });

  it('should format upper-case hex', () => {
    expect(toHex({ r: 200, g: 41, b: 7 })).toBe('#C82907');
  });
});

describe('Markdown palettes', () => {
  const TABLE = [
    '# Filament colors',
    '',
    '| Name | Hex | Notes |',
    '|------|-----|-------|',
    '| Sky Blue | #6fb1e0 | |',
    '| Scarlet Red | Hex: #C8292F | glossy too |',
    '| Mystery | n/a | |',
    'Charcoal | #2B2B2B',
    '| sky blue | #000000 | duplicate |',
  ].join('\n');

  it('should read name and hex columns and skip header and separator rows', () => {
    const palette = parseMarkdownPalette(TABLE);

    expect(palette.map((e) => [e.name, e.hex])).toEqual([
      ['Sky Blue', '#6FB1E0'],
      ['Scarlet Red', '#C8292F'],
      ['Charcoal', '#2B2B2B'],
    ]);
  });

  it('should load the bundled table by extension', async () => {
    const palette = await loadPalette(path.join(PALETTES_DIR, 'pla-matte.md'), []);

    expect(palette).toHaveLength(13);
    expect(palette[0]).toEqual({ name: 'Ivory White', hex: '#F2EFE6', color: { r: 242, g: 239, b: 230 } });
  });
});

describe('JSON palettes', () => {
  it('should read name/hex objects', () => {
    const palette = parseJsonPalette('[{"name": "Lemon Yellow", "hex": "f4d23c"}]');

    expect(palette).toEqual([{ name: 'Lemon Yellow', hex: '#F4D23C', color: { r: 244, g: 210, b: 60 } }]);
  });

  it('should reject malformed documents', () => {
    expect(() => parseJsonPalette('{not json')).toThrow(PaletteFormatError);
    expect(() => parseJsonPalette('[{"name": "Lemon Yellow"}]')).toThrow(PaletteFormatError);
    expect(() => parseJsonPalette('[{"name": "Bad", "hex": "#12345"}]')).toThrow('Invalid hex color: 12345');
  });

  it('should load and filter the bundled JSON palette', async () => {
    const palette = await loadPalette(path.join(PALETTES_DIR, 'pla-matte.json'), ['charcoal', 'SKY BLUE']);

    expect(palette.map((e) => e.name)).toEqual(['Sky Blue', 'Charcoal']);
  });
});

describe('Color names', () => {
  it('should reject names that share a slug', () => {
    expect(() => createPalette([
      { name: 'Sky Blue', hex: '#0000FF' },
      { name: 'Sky-Blue', hex: '#0000FE' },
    ])).toThrow('Color names "Sky Blue" and "Sky-Blue" both map to "sky-blue"');
  });

  it('should reject a color that would replace the base part', () => {
    expect(() => createPalette([{ name: 'Base', hex: '#FF0000' }]))
      .toThrow('Color name "Base" collides with the base part');
    expect(() => parseMarkdownPalette('| Base | #FF0000 |\n| Sky Blue | #0000FF |'))
      .toThrow(PaletteFormatError);
  });

  it('should reject names without letters or digits', () => {
    expect(() => createPalette([{ name: '***', hex: '#FFFFFF' }]))
      .toThrow('Color name "***" has no letters or digits');
  });

  it('should still drop case-insensitive duplicates quietly', () => {
    const palette = createPalette([
      { name: 'Sky Blue', hex: '#0000FF' },
      { name: 'SKY BLUE', hex: '#0000FE' },
    ]);

    expect(palette.map((e) => e.hex)).toEqual(['#0000FF']);
  });
});

describe('Color selection', () => {
  const palette = createPalette([
    { name: 'Sky Blue', hex: '#6FB1E0' },
    { name: 'Charcoal', hex: '#2B2B2B' },
  ]);

  it('should keep everything for an empty selection', () => {
    expect(selectColors(palette, [])).toHaveLength(2);
  });

  it('should fail when nothing matches', () => {
    expect(() => selectColors(palette, ['Neon Green'])).toThrow(EmptyPaletteError);
  });
});

describe('Nearest color', () => {
  const palette = createPalette([
    { name: 'Dark Red', hex: '#0A0000' },
    { name: 'Dark Green', hex: '#000A00' },
    { name: 'White', hex: '#FFFFFF' },
  ]);

  it('should pick the closest entry', () => {
    expect(findNearestEntry({ r: 250, g: 240, b: 245 }, palette).name).toBe('White');
  });

  it('should break ties in palette order', () => {
    expect(findNearestEntry({ r: 0, g: 0, b: 0 }, palette).name).toBe('Dark Red');
  });

  it('should find the background by name or fall back to black', () => {
    expect(findBackgroundColor(palette, 'white')).toBe('#FFFFFF');
    expect(findBackgroundColor(palette, 'Charcoal')).toBe('#000000');
  });
});
