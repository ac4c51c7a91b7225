/**
 * HeatmapChart - 2D matrix visualization with color mapping
 * Row 0 is drawn at the top, like an image
 */

import { extent } from "d3-array";
import { scaleSequential, type ScaleSequential } from "d3-scale";
import { BaseChart, type BaseChartOptions } from "./BaseChart.ts";
import { DEFAULT_COLORMAP, resolveColormap } from "./colormaps.ts";

export interface HeatmapData {
  x: number;        // Column index
  y: number;        // Row index
  value: number;    // Cell value for color mapping
}

export interface HeatmapChartOptions extends BaseChartOptions {
  colormap?: string;
  rows?: number;
  cols?: number;
}

export class HeatmapChart extends BaseChart<HeatmapData[], HeatmapChartOptions> {
  private cellSize = 0;
  private valueScale: ScaleSequential<string>;

  constructor(data: HeatmapData[], options: HeatmapChartOptions = {}) {
    super(data, options);
    this.valueScale = this.createScales();
  }

  private createScales(): ScaleSequential<string> {
    const { colormap, rows, cols } = this.options;
    const { innerWidth, innerHeight } = this.dimensions;

    // Square cells, sized so the whole image fits
    this.cellSize = Math.min(innerWidth / cols, innerHeight / rows);

    const finite = this.data.map(d => d.value).filter(Number.isFinite);
    const [minValue = 0, maxValue = 0] = extent(finite);

    const interpolator = resolveColormap(colormap);
    if (!interpolator) {
      throw new Error(`Unknown colormap '${colormap}'`);
    }

    return scaleSequential(interpolator).domain([minValue, maxValue]).clamp(true);
  }

  protected getDefaultOptions(): Required<HeatmapChartOptions> {
    return {
      ...this.getBaseDefaults(),
      width: 480,
      height: 480,
      margin: { top: 40, right: 20, bottom: 40, left: 50 },
      colormap: DEFAULT_COLORMAP,
      rows: 1,
      cols: 1
    };
  }

  protected getColorDomain(): string[] {
    // Heatmaps use the sequential value scale, not categorical colors
    return [];
  }

  /** Fill color for a cell value; non-finite values leave the cell empty */
  colorFor(value: number): string {
    return Number.isFinite(value) ? this.valueScale(value) : 'none';
  }

  protected renderChartElements(): void {
    this.data.forEach(d => {
      const x = d.x * this.cellSize;
      const y = d.y * this.cellSize;

      this.svgElements.push(
        `<rect x="${x}" y="${y}" width="${this.cellSize}" height="${this.cellSize}" fill="${this.colorFor(d.value)}" stroke="none" stroke-width="0"/>`
      );
    });
  }

  protected renderAxisLines(): void {
    // The image itself marks the plot area
  }

  protected renderXAxis(): void {
    const { rows, cols, xticks } = this.options;
    const { axis, text } = this.themeColors;
    const bottom = rows * this.cellSize;

    this.indexTicks(cols, xticks, Math.floor(this.dimensions.innerWidth / 30)).forEach(i => {
      const x = i * this.cellSize + this.cellSize / 2;
      this.svgElements.push(
        `<line x1="${x}" y1="${bottom}" x2="${x}" y2="${bottom + 6}" stroke="${axis}" stroke-width="1"/>`
      );
      this.svgElements.push(
        `<text x="${x}" y="${bottom + 20}" text-anchor="middle" fill="${text}" font-size="12px">${i}</text>`
      );
    });
  }

  protected renderYAxis(): void {
    const { rows, yticks } = this.options;
    const { axis, text } = this.themeColors;

    this.indexTicks(rows, yticks, Math.floor(this.dimensions.innerHeight / 20)).forEach(i => {
      const y = i * this.cellSize + this.cellSize / 2;
      this.svgElements.push(
        `<line x1="-6" y1="${y}" x2="0" y2="${y}" stroke="${axis}" stroke-width="1"/>`
      );
      this.svgElements.push(
        `<text x="-10" y="${y + 4}" text-anchor="end" fill="${text}" font-size="12px">${i}</text>`
      );
    });
  }

  /**
   * Evenly spaced index ticks; the last index is added only when it sits
   * at least half a step away from the previous tick.
   */
  private indexTicks(count: number, requested: number, maxTicks: number): number[] {
    if (requested === 0 || count <= 1) return [];

    const effectiveTicks = Math.max(1, Math.min(requested, count, maxTicks));
    const tickStep = Math.max(1, Math.ceil(count / effectiveTicks));

    const ticks: number[] = [];
    for (let i = 0; i < count; i += tickStep) {
      ticks.push(i);
    }

    const lastRegularTick = ticks[ticks.length - 1];
    const finalTick = count - 1;
    if (finalTick !== lastRegularTick && finalTick - lastRegularTick >= Math.max(1, tickStep / 2)) {
      ticks.push(finalTick);
    }

    return ticks;
  }
}
