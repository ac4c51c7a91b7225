/**
 * LineChart - Extends BaseChart for line chart specific functionality
 */

import { extent } from "d3-array";
import { BaseChart, type BaseChartOptions, type LinearScale } from "./BaseChart.ts";

export interface LineData {
  x: number;
  y: number;
}

export interface LineSeries {
  name: string;
  data: LineData[];
  color?: string;
}

export interface LineChartOptions extends BaseChartOptions {
  showPoints?: boolean;
}

const isFinitePoint = (d: LineData): boolean => Number.isFinite(d.x) && Number.isFinite(d.y);

/**
 * SVG path data for a series. Non-finite points break the line into
 * separate runs; a run of one point draws nothing.
 */
export function linePath(data: LineData[], xScale: (x: number) => number, yScale: (y: number) => number): string {
  const runs: string[][] = [[]];
  data.forEach(d => {
    if (isFinitePoint(d)) {
      runs[runs.length - 1].push(`${xScale(d.x)},${yScale(d.y)}`);
    } else if (runs[runs.length - 1].length > 0) {
      runs.push([]);
    }
  });

  return runs
    .filter(run => run.length > 1)
    .map(run => `M${run.join('L')}`)
    .join('');
}

export class LineChart extends BaseChart<LineSeries[], LineChartOptions> {
  private xScale: LinearScale;
  private yScale: LinearScale;
  private xRange: number;
  private yRange: number;

  constructor(data: LineSeries[], options: LineChartOptions = {}) {
    super(data, options);

    const { innerWidth, innerHeight } = this.dimensions;
    const finite = this.data.flatMap(s => s.data.filter(isFinitePoint));
    const [xMin = 0, xMax = 1] = extent(finite, d => d.x);
    const [yMin = 0, yMax = 1] = extent(finite, d => d.y);

    this.xRange = xMax - xMin;
    this.yRange = yMax - yMin;
    this.xScale = this.createOptimalScale([xMin, xMax], [0, innerWidth]);
    this.yScale = this.createOptimalScale([yMin, yMax], [innerHeight, 0]);
  }

  protected getDefaultOptions(): Required<LineChartOptions> {
    return {
      ...this.getBaseDefaults(),
      showPoints: false
    };
  }

  protected getColorDomain(): string[] {
    return this.data.map((s, i) => s.name || `series_${i}`);
  }

  protected getLegendLabels(): string[] {
    return this.data.length > 1 ? this.getColorDomain() : [];
  }

  protected renderXAxis(): void {
    this.renderLinearXAxis(this.xScale, this.xRange);
  }

  protected renderYAxis(): void {
    this.renderLinearYAxis(this.yScale, this.yRange);
  }

  protected renderChartElements(): void {
    const { showPoints } = this.options;

    this.data.forEach((seriesData, i) => {
      const color = seriesData.color ?? this.colorScale(seriesData.name || `series_${i}`);

      const pathData = linePath(seriesData.data, this.xScale, this.yScale);
      if (pathData) {
        this.svgElements.push(
          `<path d="${pathData}" fill="none" stroke="${color}" stroke-width="2"/>`
        );
      }

      if (showPoints) {
        seriesData.data.filter(isFinitePoint).forEach(point => {
          this.svgElements.push(
            `<circle cx="${this.xScale(point.x)}" cy="${this.yScale(point.y)}" r="3" fill="${color}" stroke="none"/>`
          );
        });
      }
    });
  }

  protected renderLegendMarker(x: number, y: number, color: string): void {
    super.renderLegendMarker(x, y, color);
    if (this.options.showPoints) {
      this.svgElements.push(
        `<circle cx="${x + 7}" cy="${y + 6}" r="2" fill="${color}"/>`
      );
    }
  }
}
