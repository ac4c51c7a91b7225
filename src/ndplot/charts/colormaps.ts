/**
 * Colormaps for image plots
 *
 * A colormap argument is one of the named d3 maps, a palette color name
 * (white-to-color gradient), or a comma-separated list of colors.
 */

import { interpolateRgb } from "d3-interpolate";
import {
  interpolateBlues,
  interpolateGreys,
  interpolateInferno,
  interpolatePlasma,
  interpolateRdBu,
  interpolateRdYlBu,
  interpolateViridis
} from "d3-scale-chromatic";
import { BaseChart } from "./BaseChart.ts";

export type Interpolator = (t: number) => string;

// d3's single-hue and diverging maps run light-to-dark / red-to-blue; flip
// them so low values are dark (gray) and blue (diverging)
const COLORMAPS: Record<string, Interpolator> = {
  gray: t => interpolateGreys(1 - t),
  viridis: interpolateViridis,
  plasma: interpolatePlasma,
  inferno: interpolateInferno,
  blues: interpolateBlues,
  rdbu: t => interpolateRdBu(1 - t),
  coolwarm: t => interpolateRdYlBu(1 - t)
};

const ALIASES: Record<string, string> = {
  grey: 'gray',
  greys: 'gray',
  grays: 'gray'
};

export const DEFAULT_COLORMAP = 'gray';

export const COLORMAP_NAMES: readonly string[] = Object.keys(COLORMAPS);

export function gradient(colors: string[]): Interpolator {
  const stops = colors.map(color => BaseChart.resolveColor(color));
  if (stops.length === 1) return () => stops[0];

  const segments = stops.length - 1;
  return t => {
    const clamped = Math.max(0, Math.min(1, t));
    const segment = Math.min(Math.floor(clamped * segments), segments - 1);
    return interpolateRgb(stops[segment], stops[segment + 1])(clamped * segments - segment);
  };
}

/**
 * Interpolator for `value`, or undefined when it names nothing known.
 */
export function resolveColormap(value: string): Interpolator | undefined {
  const key = value.trim().toLowerCase();
  const name = ALIASES[key] ?? key;
  if (Object.hasOwn(COLORMAPS, name)) {
    return COLORMAPS[name];
  }

  if (key.includes(',')) {
    const colors = key.split(',').map(color => color.trim()).filter(color => color !== '');
    return colors.length >= 2 ? gradient(colors) : undefined;
  }

  if (Object.hasOwn(BaseChart.NAMED_COLORS, key)) {
    return gradient(['white', key]);
  }

  return undefined;
}
