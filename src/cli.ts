/**
 * Command-line argument handling
 */

import { parseArgs } from 'util';
import { parseColorList, type PipelineOptionsInput } from './config';

export const USAGE = `Usage: pointillist [image] [palette] [outDir] [options]

Generate pointillist dots (SVG, per-color STL, masks, metadata) from an image and palette.

Positionals:
  image                  Input image (PNG/JPEG). Default: sailboat.jpg
  palette                Palette file (.json or Markdown table with Name | Hex).
                         Default: palettes/pla-matte.md
  outDir                 Output directory. Default: out

Options:
  --width-mm <mm>        Physical width of the print (default: 180)
  --spacing-mm <mm>      Dot spacing (default: 0.8)
  --dot-mm <mm>          Dot diameter (default: 0.8)
  --dot-height-mm <mm>   Dot height above the base (default: 0.4)
  --base-thickness-mm <mm>  Base tile thickness (default: 0.6)
  --segments <n>         Facets per dot circle, >= 3 (default: 12)
  --colors <list>        Comma-separated palette names to use, case-insensitive
                         (default: Sky Blue,Scarlet Red,Lemon Yellow,Charcoal; "" for all)
  --background <name>    Palette color behind the dots in the SVG (default: Charcoal)
  --normals              Write computed facet normals instead of 0 0 0
  -h, --help             Show this help`;

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'run'; options: PipelineOptionsInput };

/**
 * Number option or undefined when absent. Non-numeric text becomes NaN,
 * which option validation reports.
 */
function toNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

export function parseCliArgs(argv: string[]): CliCommand {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      'width-mm': { type: 'string' },
      'spacing-mm': { type: 'string' },
      'dot-mm': { type: 'string' },
      'dot-height-mm': { type: 'string' },
      'base-thickness-mm': { type: 'string' },
      segments: { type: 'string' },
      colors: { type: 'string' },
      background: { type: 'string' },
      normals: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  if (values.help) {
    return { kind: 'help' };
  }

  const [imagePath, palettePath, outDir] = positionals;

  return {
    kind: 'run',
    options: {
      imagePath,
      palettePath,
      outDir,
      colors: values.colors === undefined ? undefined : parseColorList(values.colors),
      widthMm: toNumber(values['width-mm']),
      spacingMm: toNumber(values['spacing-mm']),
      dotDiameterMm: toNumber(values['dot-mm']),
      dotHeightMm: toNumber(values['dot-height-mm']),
      baseThicknessMm: toNumber(values['base-thickness-mm']),
      segments: toNumber(values.segments),
      backgroundName: values.background,
      computeNormals: values.normals,
    },
  };
}
