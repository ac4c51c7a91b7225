/**
 * ScatterChart - Extends BaseChart for scatter plot specific functionality
 */

import { extent } from "d3-array";
import { BaseChart, type BaseChartOptions, type LinearScale } from "./BaseChart.ts";

export interface ScatterPoint {
  x: number;
  y: number;
}

export interface ScatterSeries {
  name: string;
  data: ScatterPoint[];
  color?: string;
}

export interface ScatterChartOptions extends BaseChartOptions {
  pointSize?: number;
  opacity?: number;
  aspectRatio?: 'auto' | 'equal';
}

export class ScatterChart extends BaseChart<ScatterSeries[], ScatterChartOptions> {
  private xScale: LinearScale;
  private yScale: LinearScale;
  private xRange: number;
  private yRange: number;

  constructor(data: ScatterSeries[], options: ScatterChartOptions = {}) {
    super(data, options);

    const { innerWidth, innerHeight } = this.dimensions;
    const finite = this.data.flatMap(s => s.data.filter(d => Number.isFinite(d.x) && Number.isFinite(d.y)));
    const xDomain: [number, number] = [0, 1];
    const yDomain: [number, number] = [0, 1];
    const [xMin, xMax] = extent(finite, d => d.x);
    const [yMin, yMax] = extent(finite, d => d.y);
    if (xMin !== undefined && xMax !== undefined) {
      xDomain[0] = xMin;
      xDomain[1] = xMax;
    }
    if (yMin !== undefined && yMax !== undefined) {
      yDomain[0] = yMin;
      yDomain[1] = yMax;
    }

    this.xRange = xDomain[1] - xDomain[0];
    this.yRange = yDomain[1] - yDomain[0];

    if (this.options.aspectRatio === 'equal') {
      // One data unit spans the same number of pixels on both axes
      const scales = this.createEqualScales(xDomain, yDomain, [0, innerWidth], [innerHeight, 0]);
      this.xScale = scales.xScale;
      this.yScale = scales.yScale;
    } else {
      this.xScale = this.createOptimalScale(xDomain, [0, innerWidth]);
      this.yScale = this.createOptimalScale(yDomain, [innerHeight, 0]);
    }
  }

  protected getDefaultOptions(): Required<ScatterChartOptions> {
    return {
      ...this.getBaseDefaults(),
      pointSize: 3,
      opacity: 0.8,
      aspectRatio: 'auto'
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
    const { pointSize, opacity } = this.options;

    this.data.forEach((seriesData, i) => {
      const color = seriesData.color ?? this.colorScale(seriesData.name || `series_${i}`);

      seriesData.data.forEach(point => {
        if (!Number.isFinite(point.x) || !Number.isFinite(point.y)) return;

        this.svgElements.push(
          `<circle cx="${this.xScale(point.x)}" cy="${this.yScale(point.y)}" r="${pointSize}" fill="${color}" opacity="${opacity}"/>`
        );
      });
    });
  }

  protected renderLegendMarker(x: number, y: number, color: string): void {
    this.svgElements.push(
      `<circle cx="${x + 6}" cy="${y + 6}" r="4" fill="${color}" opacity="${this.options.opacity}"/>`
    );
  }
}
