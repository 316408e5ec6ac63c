/**
 * CLI Entry Point
 * Parses arguments and runs the pipeline: palette, dithering, hex grid, SVG/STL export
 */

import { parseCliArgs, USAGE } from './cli';
import { runPipeline } from './pipeline';

// ============================================================================
// Main
// ============================================================================

async function main(argv: string[]): Promise<void> {
  const command = parseCliArgs(argv);

  if (command.kind === 'help') {
    console.log(USAGE);
    return;
  }

  const metadata = await runPipeline(command.options);
  const { coverage, grid } = metadata;
  console.log(
    `Done: ${coverage.totalDots} dots, ${grid.widthMm.toFixed(2)}mm x ${grid.heightMm.toFixed(2)}mm, ` +
    `coverage ${coverage.coveragePercent.toFixed(1)}%`
  );
}

main(process.argv.slice(2)).catch((error: unknown) => {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
});
