#!/usr/bin/env node
/**
 * Converts a segment descriptor document (JSON) to a GDSII file,
 * optionally writing SVG and PNG previews alongside.
 *
 * Usage: tsx scripts/convert-outline.ts <input.json> <output.gds> [options]
 *   --method fixed|adaptive   approximation method (default fixed)
 *   --steps N                 steps per segment for fixed (default 1000)
 *   --max-error E             chord tolerance for adaptive (default 0.01)
 *   --width W                 scale so the combined width is W micrometres
 *   --layer L                 GDSII layer (default 0)
 *   --no-flip-y               keep the input y direction
 *   --svg PATH                also write an SVG preview
 *   --png PATH                also write a PNG preview (needs sharp)
 */

import * as fs from 'node:fs/promises';
import { parseArgs } from 'node:util';
import {
  OutlineConverter,
  GdsWriter,
  SvgPreviewWriter,
  FanOutSink,
  createLogger,
  createPreviewRasterizer,
  parseSegmentDocument,
  ConversionError,
  errorMessage,
} from '../src/index.js';
import type { ConversionOptions, FlattenMethod } from '../src/index.js';

function parseNumber(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new Error(`--${name} expects a number, got "${value}"`);
  }
  return parsed;
}

function parseMethod(value: string | undefined): FlattenMethod | undefined {
  if (value === undefined || value === 'fixed' || value === 'adaptive') return value;
  throw new Error(`--method must be "fixed" or "adaptive", got "${value}"`);
}

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      method: { type: 'string' },
      steps: { type: 'string' },
      'max-error': { type: 'string' },
      width: { type: 'string' },
      layer: { type: 'string' },
      'no-flip-y': { type: 'boolean', default: false },
      svg: { type: 'string' },
      png: { type: 'string' },
      verbose: { type: 'boolean', default: false },
    },
  });

  const [inputPath, outputPath] = positionals;
  if (!inputPath || !outputPath) {
    console.error('Usage: tsx scripts/convert-outline.ts <input.json> <output.gds> [options]');
    process.exit(1);
  }

  const options: ConversionOptions = {
    method: parseMethod(values.method),
    steps: parseNumber('steps', values.steps),
    maxError: parseNumber('max-error', values['max-error']),
    targetWidth: parseNumber('width', values.width),
    layer: parseNumber('layer', values.layer),
    flipY: !values['no-flip-y'],
  };

  const logger = createLogger(values.verbose ? 'debug' : 'info', 'convert-outline');
  const startTime = Date.now();

  try {
    const document: unknown = JSON.parse(await fs.readFile(inputPath, 'utf8'));
    const paths = parseSegmentDocument(document);

    const converter = new OutlineConverter({ logger });
    const result = converter.convert(paths, options);

    if (result.status === 'empty') {
      console.log('No geometry found in input. Nothing written.');
      return;
    }

    const gds = new GdsWriter({ logger: logger.child('Gds') });
    const preview = new SvgPreviewWriter();
    converter.emit(result, new FanOutSink(gds, preview));

    await fs.writeFile(outputPath, gds.toBuffer());
    const { elements, skipped, fractured } = gds.getStats();
    console.log(
      `Wrote ${outputPath}: ${elements} boundaries (${fractured} polygons split, ${skipped} skipped), scale ${result.transform.scale}`
    );

    if (values.svg) {
      await fs.writeFile(values.svg, preview.toString(), 'utf8');
      console.log(`Wrote ${values.svg}`);
    }

    if (values.png) {
      const rasterizer = createPreviewRasterizer(logger.child('Png'));
      await rasterizer.initialize();
      const png = await rasterizer.rasterize(preview.toString());
      if (png) {
        await fs.writeFile(values.png, png);
        console.log(`Wrote ${values.png}`);
      } else {
        console.log('Skipped PNG preview: sharp is not available');
      }
    }

    console.log(`Completed in ${Date.now() - startTime}ms`);
  } catch (error) {
    const code = error instanceof ConversionError ? ` [${error.code}]` : '';
    console.error(`Error${code}: ${errorMessage(error)}`);
    if (error instanceof Error && error.stack && !(error instanceof ConversionError)) {
      console.error(error.stack);
    }
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
