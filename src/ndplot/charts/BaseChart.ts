/**
 * BaseChart - Abstract base class for D3-scaled SVG chart generation
 * Contains shared functionality for all chart types
 */

import { scaleLinear, scaleOrdinal, type ScaleLinear, type ScaleOrdinal } from "d3-scale";

export interface Margin {
  top: number;
  right: number;
  bottom: number;
  left: number;
}

export type Theme = 'light' | 'dark';

export interface BaseChartOptions {
  width?: number;
  height?: number;
  margin?: Margin;
  title?: string;
  xLabel?: string;
  yLabel?: string;
  colors?: string[];
  theme?: Theme;
  xticks?: number;
  yticks?: number;
}

export interface ThemeColors {
  background: string;
  text: string;
  axis: string;
}

export interface ChartDimensions {
  width: number;
  height: number;
  innerWidth: number;
  innerHeight: number;
  margin: Margin;
}

export type LinearScale = ScaleLinear<number, number>;

/** Legends with more entries than this are left out */
export const MAX_LEGEND_ENTRIES = 10;

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * Theme from the environment: NDPLOT_THEME wins, then a TERM mentioning "dark".
 */
export function detectTheme(env: NodeJS.ProcessEnv = process.env): Theme {
  const explicit = env.NDPLOT_THEME?.toLowerCase();
  if (explicit === 'dark' || explicit === 'light') {
    return explicit;
  }

  if (env.TERM?.includes('dark')) {
    return 'dark';
  }

  return 'light';
}

export abstract class BaseChart<TData, TOptions extends BaseChartOptions> {
  protected options: Required<TOptions>;
  protected dimensions: ChartDimensions;
  protected colorScale: ScaleOrdinal<string, string>;
  protected themeColors: ThemeColors;
  protected svgElements: string[] = [];

  constructor(protected data: TData, options: TOptions) {
    this.options = this.mergeWithDefaults(options);
    this.dimensions = this.calculateDimensions();
    this.themeColors = this.getThemeColors();
    this.colorScale = this.createColorScale();
  }

  // Named color mapping
  static readonly NAMED_COLORS: Record<string, string> = {
    'red': '#CF7280',
    'yellow': '#DBB55C',
    'blue': '#658DCD',
    'green': '#96ceb4',
    'orange': '#f39c12',
    'purple': '#9b59b6',
    'pink': '#e91e63',
    'teal': '#1abc9c',
    'grey': '#95a5a6',
    'gray': '#95a5a6'
  };

  // Shared default values
  protected getBaseDefaults(): Required<BaseChartOptions> {
    return {
      width: 600,
      height: 400,
      margin: { top: 40, right: 20, bottom: 50, left: 55 },
      title: '',
      xLabel: '',
      yLabel: '',
      colors: ['#658DCD', '#CF7280', '#DBB55C', '#96ceb4'],
      theme: detectTheme(),
      xticks: 5,
      yticks: 5
    };
  }

  // Named colors map to the palette hex codes; anything else passes through
  static resolveColor(color: string): string {
    return BaseChart.NAMED_COLORS[color.toLowerCase()] ?? color;
  }

  // Abstract methods that must be implemented by subclasses
  protected abstract getDefaultOptions(): Required<TOptions>;
  protected abstract renderChartElements(): void;
  protected abstract getColorDomain(): string[];

  // Template method - defines the overall structure
  public render(): string {
    this.svgElements = [];

    this.renderBackground();
    this.renderTitle();
    this.renderMainGroup();
    this.renderAxes();
    this.renderChartElements();
    this.closeMainGroup();
    this.renderLegend();
    this.renderAxisLabels();

    return this.wrapSVG();
  }

  getDimensions(): { width: number; height: number } {
    return {
      width: this.dimensions.width,
      height: this.dimensions.height
    };
  }

  // Shared helper methods
  protected mergeWithDefaults(options: TOptions): Required<TOptions> {
    const defined = Object.fromEntries(
      Object.entries(options).filter(([, value]) => value !== undefined)
    );
    return { ...this.getDefaultOptions(), ...defined };
  }

  protected calculateDimensions(): ChartDimensions {
    const { width, height, margin } = this.options;

    return {
      width,
      height,
      innerWidth: Math.max(1, width - margin.left - margin.right),
      innerHeight: Math.max(1, height - margin.top - margin.bottom),
      margin: { ...margin }
    };
  }

  protected getThemeColors(): ThemeColors {
    const { theme } = this.options;
    return {
      background: '#00000000',
      text: theme === 'dark' ? '#ffffff' : '#333333',
      axis: theme === 'dark' ? '#666666' : '#333333'
    };
  }

  protected createColorScale(): ScaleOrdinal<string, string> {
    return scaleOrdinal<string, string>()
      .domain(this.getColorDomain())
      .range(this.options.colors.map(color => BaseChart.resolveColor(color)));
  }

  protected renderBackground(): void {
    this.svgElements.push(
      `<rect width="${this.dimensions.width}" height="${this.dimensions.height}" fill="${this.themeColors.background}"/>`
    );
  }

  protected renderMainGroup(): void {
    this.svgElements.push(
      `<g transform="translate(${this.dimensions.margin.left},${this.dimensions.margin.top})">`
    );
  }

  protected closeMainGroup(): void {
    this.svgElements.push('</g>');
  }

  protected renderAxes(): void {
    this.renderXAxis();
    this.renderYAxis();
    this.renderAxisLines();
  }

  protected renderXAxis(): void {
    // To be overridden by subclasses with specific scale types
  }

  protected renderYAxis(): void {
    // To be overridden by subclasses with specific scale types
  }

  protected renderAxisLines(): void {
    const { innerWidth, innerHeight } = this.dimensions;
    const { axis } = this.themeColors;

    this.svgElements.push(
      `<line x1="0" y1="0" x2="0" y2="${innerHeight}" stroke="${axis}" stroke-width="1"/>`
    );
    this.svgElements.push(
      `<line x1="0" y1="${innerHeight}" x2="${innerWidth}" y2="${innerHeight}" stroke="${axis}" stroke-width="1"/>`
    );
  }

  protected renderTitle(): void {
    const { title } = this.options;
    const { width } = this.dimensions;
    const { text } = this.themeColors;

    if (title) {
      this.svgElements.push(
        `<text x="${width / 2}" y="20" text-anchor="middle" fill="${text}" font-size="16px" font-weight="500">${escapeXml(title)}</text>`
      );
    }
  }

  protected renderAxisLabels(): void {
    const { xLabel, yLabel } = this.options;
    const { width, height } = this.dimensions;
    const { text } = this.themeColors;

    if (xLabel) {
      this.svgElements.push(
        `<text x="${width / 2}" y="${height - 10}" text-anchor="middle" fill="${text}" font-size="12px">${escapeXml(xLabel)}</text>`
      );
    }

    if (yLabel) {
      this.svgElements.push(
        `<text transform="rotate(-90)" y="15" x="${-height / 2}" text-anchor="middle" fill="${text}" font-size="12px">${escapeXml(yLabel)}</text>`
      );
    }
  }

  /** Labels for the legend; empty means no legend */
  protected getLegendLabels(): string[] {
    return [];
  }

  /** Draws one legend marker at (x, y) */
  protected renderLegendMarker(x: number, y: number, color: string): void {
    this.svgElements.push(
      `<line x1="${x}" y1="${y + 6}" x2="${x + 15}" y2="${y + 6}" stroke="${color}" stroke-width="2"/>`
    );
  }

  protected renderLegend(): void {
    const labels = this.getLegendLabels();
    if (labels.length === 0 || labels.length > MAX_LEGEND_ENTRIES) return;

    const { text } = this.themeColors;
    const { x, y } = this.calculateLegendPosition(labels);

    labels.forEach((label, i) => {
      const color = this.colorScale(label);
      const itemY = y + i * 18;

      this.renderLegendMarker(x, itemY, color);
      this.svgElements.push(
        `<text x="${x + 20}" y="${itemY + 10}" fill="${text}" font-size="10px">${escapeXml(label)}</text>`
      );
    });
  }

  protected calculateLegendWidth(labels: string[]): number {
    // Rough approximation: 6px per character
    const maxLabelLength = Math.max(...labels.map(label => label.length));
    return Math.max(80, maxLabelLength * 6 + 30);
  }

  /** Top-right corner of the plot area */
  protected calculateLegendPosition(labels: string[]): { x: number; y: number } {
    const { width, margin } = this.dimensions;
    return { x: width - margin.right - this.calculateLegendWidth(labels), y: margin.top + 10 };
  }

  protected wrapSVG(): string {
    const { width, height } = this.dimensions;
    const svgContent = this.svgElements.join('\n    ');

    return `<svg width="${width}" height="${height}" viewBox="0 0 ${width} ${height}" xmlns="http://www.w3.org/2000/svg" preserveAspectRatio="xMidYMid meet" style="font-family: Arial, sans-serif;">
    ${svgContent}
</svg>`;
  }

  // Smart tick formatting that determines appropriate precision
  protected formatTickValueSmart(value: number, dataRange: number): string {
    let decimalPlaces: number;

    if (dataRange < 0.01) {
      decimalPlaces = 4;
    } else if (dataRange < 0.1) {
      decimalPlaces = 3;
    } else if (dataRange < 10) {
      decimalPlaces = 2;
    } else {
      decimalPlaces = 0;
    }

    return value.toFixed(decimalPlaces);
  }

  protected createEqualScales(
    xDomain: [number, number],
    yDomain: [number, number],
    xRange: [number, number],
    yRange: [number, number]
  ): { xScale: LinearScale; yScale: LinearScale } {
    // A zero-width domain would make the pixels-per-unit ratio infinite
    const xDataRange = xDomain[1] - xDomain[0] || 1;
    const yDataRange = yDomain[1] - yDomain[0] || 1;

    const xPixelRange = xRange[1] - xRange[0];
    const yPixelRange = Math.abs(yRange[1] - yRange[0]);

    // The smaller ratio keeps both axes inside the plot area
    const pixelsPerUnit = Math.min(xPixelRange / xDataRange, yPixelRange / yDataRange);

    const actualXPixelRange = xDataRange * pixelsPerUnit;
    const actualYPixelRange = yDataRange * pixelsPerUnit;

    // Center the shorter axis in its available space
    const xStart = xRange[0] + (xPixelRange - actualXPixelRange) / 2;
    const yStart = yRange[0] - (yPixelRange - actualYPixelRange) / 2;

    const xScale = scaleLinear()
      .domain([xDomain[0], xDomain[0] + xDataRange])
      .range([xStart, xStart + actualXPixelRange]);

    const yScale = scaleLinear()
      .domain([yDomain[0], yDomain[0] + yDataRange])
      .range([yStart, yStart - actualYPixelRange]);

    return { xScale, yScale };
  }

  protected createOptimalScale(domain: [number, number], range: [number, number]): LinearScale {
    return scaleLinear()
      .domain(domain)
      .range(range)
      .nice();
  }

  protected renderLinearXAxis(scale: LinearScale, dataRange: number): void {
    const { innerHeight } = this.dimensions;
    const { axis, text } = this.themeColors;
    const { xticks } = this.options;

    if (xticks === 0) return;

    scale.ticks(xticks).forEach(tick => {
      const x = scale(tick);
      this.svgElements.push(
        `<line x1="${x}" y1="${innerHeight}" x2="${x}" y2="${innerHeight + 6}" stroke="${axis}" stroke-width="1"/>`
      );
      this.svgElements.push(
        `<text x="${x}" y="${innerHeight + 20}" text-anchor="middle" fill="${text}" font-size="12px">${this.formatTickValueSmart(tick, dataRange)}</text>`
      );
    });
  }

  protected renderLinearYAxis(scale: LinearScale, dataRange: number): void {
    const { text, axis } = this.themeColors;
    const { yticks } = this.options;

    if (yticks === 0) return;

    scale.ticks(yticks).forEach(tick => {
      const y = scale(tick);
      this.svgElements.push(
        `<line x1="-6" y1="${y}" x2="0" y2="${y}" stroke="${axis}" stroke-width="1"/>`
      );
      this.svgElements.push(
        `<text x="-10" y="${y + 4}" text-anchor="end" fill="${text}" font-size="12px">${this.formatTickValueSmart(tick, dataRange)}</text>`
      );
    });
  }
}
