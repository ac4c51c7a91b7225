/**
 * Visualization entry points: turn a loaded array into a chart and display it
 */

import {
  leadingSlice,
  lastAxisRows,
  size,
  toReal,
  type ComplexMode,
  type NDArray
} from "../arrays/NDArray.ts";
import type { Theme } from "../charts/BaseChart.ts";
import { HeatmapChart, type HeatmapData } from "../charts/HeatmapChart.ts";
import { LineChart, type LineSeries } from "../charts/LineChart.ts";
import { ScatterChart, type ScatterPoint } from "../charts/ScatterChart.ts";
import { RenderError } from "../utils/errors.ts";
import { logger } from "../utils/logger.ts";
import { display } from "./display.ts";

export interface PlotOptions {
  /** File to write; stdout when absent */
  output?: string;
  title?: string;
  theme?: Theme;
  width?: number;
  height?: number;
}

export interface ImagePlotOptions extends PlotOptions {
  colormap?: string;
  mode?: ComplexMode;
}

export interface LinePlotOptions extends PlotOptions {
  mode?: ComplexMode;
  points?: boolean;
}

export interface ScatterPlotOptions extends PlotOptions {
  pointSize?: number;
}

const formatShape = (shape: readonly number[]): string => `(${shape.join(', ')})`;

function assertPlottable(array: NDArray, minDims: number, kind: string): void {
  if (array.shape.length < minDims) {
    throw new RenderError(
      `${kind} plot needs an array with at least ${minDims} dimension${minDims === 1 ? '' : 's'}, got shape ${formatShape(array.shape)}`
    );
  }
  if (size(array.shape) === 0) {
    throw new RenderError(`Cannot plot an empty array of shape ${formatShape(array.shape)}`);
  }
}

function assertFinite(values: ArrayLike<number>): void {
  for (let i = 0; i < values.length; i++) {
    if (Number.isFinite(values[i])) return;
  }
  throw new RenderError('Array has no finite values to plot');
}

/** A point counts when both coordinates are finite */
function assertFinitePoints(points: readonly ScatterPoint[]): void {
  if (!points.some(p => Number.isFinite(p.x) && Number.isFinite(p.y))) {
    throw new RenderError('Array has no finite values to plot');
  }
}

/** Index of row `row` over the leading axes, e.g. "[1, 0]" */
function rowLabel(leadingShape: readonly number[], row: number): string {
  const index = new Array<number>(leadingShape.length);
  let rest = row;
  for (let axis = leadingShape.length - 1; axis >= 0; axis--) {
    index[axis] = rest % leadingShape[axis];
    rest = Math.floor(rest / leadingShape[axis]);
  }
  return `[${index.join(', ')}]`;
}

export function buildImageChart(array: NDArray, options: ImagePlotOptions = {}): HeatmapChart {
  assertPlottable(array, 2, 'Image');

  const plane = leadingSlice(array, 2);
  if (plane !== array) {
    logger.debug(`Showing the first ${formatShape(plane.shape)} slice of ${formatShape(array.shape)}`);
  }

  const values = toReal(plane, options.mode ?? 'magnitude');
  assertFinite(values);

  const [rows, cols] = plane.shape;
  const data: HeatmapData[] = [];
  for (let y = 0; y < rows; y++) {
    for (let x = 0; x < cols; x++) {
      data.push({ x, y, value: values[y * cols + x] });
    }
  }

  return new HeatmapChart(data, {
    title: options.title,
    theme: options.theme,
    width: options.width,
    height: options.height,
    colormap: options.colormap,
    rows,
    cols
  });
}

export function buildLineChart(array: NDArray, options: LinePlotOptions = {}): LineChart {
  assertPlottable(array, 1, 'Line');

  const values = toReal(array, options.mode ?? 'real');
  assertFinite(values);

  const rows = lastAxisRows(array.shape, values);
  const leadingShape = array.shape.slice(0, -1);
  const series: LineSeries[] = rows.map((row, i) => ({
    name: rows.length > 1 ? rowLabel(leadingShape, i) : '',
    data: Array.from(row, (y, x) => ({ x, y }))
  }));

  return new LineChart(series, {
    title: options.title,
    theme: options.theme,
    width: options.width,
    height: options.height,
    showPoints: options.points,
    xLabel: 'index'
  });
}

export function buildScatterChart(array: NDArray, options: ScatterPlotOptions = {}): ScatterChart {
  assertPlottable(array, 1, 'Scatter');

  const { data, imag, shape } = array;
  const common = {
    title: options.title,
    theme: options.theme,
    width: options.width,
    height: options.height,
    pointSize: options.pointSize
  };

  let points: ScatterPoint[];
  if (imag) {
    points = Array.from(data, (re, i) => ({ x: re, y: imag[i] }));
    assertFinitePoints(points);
    return new ScatterChart([{ name: '', data: points }], {
      ...common,
      aspectRatio: 'equal',
      xLabel: 'real',
      yLabel: 'imag'
    });
  }

  assertFinite(data);

  if (shape.length >= 2 && shape[shape.length - 1] === 2) {
    points = [];
    for (let i = 0; i < data.length; i += 2) {
      points.push({ x: data[i], y: data[i + 1] });
    }
    return new ScatterChart([{ name: '', data: points }], {
      ...common,
      aspectRatio: 'equal',
      xLabel: 'x',
      yLabel: 'y'
    });
  }

  points = Array.from(data, (value, i) => ({ x: i, y: value }));
  return new ScatterChart([{ name: '', data: points }], {
    ...common,
    xLabel: 'index',
    yLabel: 'value'
  });
}

export async function renderAsImage(array: NDArray, options: ImagePlotOptions = {}): Promise<void> {
  await display(buildImageChart(array, options).render(), options.output);
}

export async function renderAsLine(array: NDArray, options: LinePlotOptions = {}): Promise<void> {
  await display(buildLineChart(array, options).render(), options.output);
}

export async function renderAsScatter(array: NDArray, options: ScatterPlotOptions = {}): Promise<void> {
  await display(buildScatterChart(array, options).render(), options.output);
}
