/**
 * SvgToPng.ts - SVG to PNG conversion using @resvg/resvg-js
 *
 * resvg ships prebuilt native bindings through npm, so no system
 * dependencies are required.
 */

import { Resvg } from "@resvg/resvg-js";

export type ConversionResult =
  | { success: true; data: Uint8Array; width: number; height: number }
  | { success: false; error: string };

// Larger renders overflow resvg's stack
const MAX_DIMENSION = 4096;

/**
 * Convert an SVG document to PNG bytes at its own size, shrunk to fit
 * MAX_DIMENSION on both sides.
 */
export function convertSvgToPng(svgString: string): ConversionResult {
  const svgDimensions = extractSvgDimensions(svgString);
  if (!svgDimensions) {
    return {
      success: false,
      error: "Could not extract SVG dimensions from SVG string"
    };
  }

  const { width, height } = svgDimensions;
  const factor = Math.min(1, MAX_DIMENSION / width, MAX_DIMENSION / height);
  // Fit the longer side so rounding never pushes it past the cap
  const fitTo = width >= height
    ? { mode: 'width' as const, value: Math.max(1, Math.round(width * factor)) }
    : { mode: 'height' as const, value: Math.max(1, Math.round(height * factor)) };

  try {
    const resvg = new Resvg(svgString, {
      fitTo,
      font: { loadSystemFonts: true }
    });
    const rendered = resvg.render();

    return {
      success: true,
      data: new Uint8Array(rendered.asPng()),
      width: rendered.width,
      height: rendered.height
    };
  } catch (error) {
    let errorMessage = error instanceof Error ? error.message : String(error);
    if (errorMessage.includes("stack")) {
      errorMessage = "Image too large or complex. Try reducing the chart size.";
    }
    return {
      success: false,
      error: `PNG conversion failed: ${errorMessage}`
    };
  }
}

/**
 * Extract width and height from the root <svg> tag
 */
export function extractSvgDimensions(svgString: string): { width: number; height: number } | null {
  const svgMatch = svgString.match(/<svg[^>]*>/);
  if (!svgMatch) {
    return null;
  }

  const svgTag = svgMatch[0];

  const widthMatch = svgTag.match(/\swidth\s*=\s*["']?(\d+(?:\.\d+)?)["']?/);
  const heightMatch = svgTag.match(/\sheight\s*=\s*["']?(\d+(?:\.\d+)?)["']?/);
  if (widthMatch && heightMatch) {
    return {
      width: parseFloat(widthMatch[1]),
      height: parseFloat(heightMatch[1])
    };
  }

  return null;
}
