/**
 * Display sink: where a rendered chart ends up
 */

import { writeFile } from "node:fs/promises";
import { extname } from "node:path";
import { convertSvgToPng } from "../charts/SvgToPng.ts";
import { RenderError } from "../utils/errors.ts";
import { logger } from "../utils/logger.ts";

/**
 * Write `svg` to stdout, or to `output`. A .png output is rasterized first.
 */
export async function display(svg: string, output?: string): Promise<void> {
  if (!output) {
    logger.log(svg);
    return;
  }

  if (extname(output).toLowerCase() === '.png') {
    const result = convertSvgToPng(svg);
    if (!result.success) {
      throw new RenderError(result.error);
    }
    await writeFile(output, result.data);
    logger.success(`Wrote ${result.width}x${result.height} PNG to ${output}`);
    return;
  }

  await writeFile(output, svg, 'utf8');
  logger.success(`Wrote SVG to ${output}`);
}
