/**
 * Run options, their defaults and validation
 */

import { z } from 'zod';
import { ConfigurationError } from './errors';

export const DEFAULT_COLORS = ['Sky Blue', 'Scarlet Red', 'Lemon Yellow', 'Charcoal'];

export const pipelineOptionsSchema = z.object({
  imagePath: z.string().min(1).default('sailboat.jpg'),
  palettePath: z.string().min(1).default('palettes/pla-matte.md'),
  outDir: z.string().min(1).default('out'),
  /** Names to keep from the palette; empty keeps all */
  colors: z.array(z.string().min(1)).default(DEFAULT_COLORS),
  widthMm: z.number().positive().default(180),
  spacingMm: z.number().positive().default(0.8),
  dotDiameterMm: z.number().positive().default(0.8),
  dotHeightMm: z.number().positive().default(0.4),
  baseThicknessMm: z.number().positive().default(0.6),
  segments: z.number().int().min(3).default(12),
  backgroundName: z.string().default('Charcoal'),
  computeNormals: z.boolean().default(false),
});

export type PipelineOptions = z.infer<typeof pipelineOptionsSchema>;
export type PipelineOptionsInput = z.input<typeof pipelineOptionsSchema>;

/**
 * Validates options and fills in defaults.
 * All problems are reported together.
 */
export function parseOptions(input: PipelineOptionsInput): PipelineOptions {
  const result = pipelineOptionsSchema.safeParse(input);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid options:\n  ${problems.join('\n  ')}`);
  }
  return result.data;
}

/**
 * Splits "Sky Blue, Charcoal" into trimmed names, dropping empties
 */
export function parseColorList(csv: string): string[] {
  return csv
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}
