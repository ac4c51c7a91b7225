import { describe, expect, it } from 'vitest';
import { detectTheme, escapeXml } from '../../src/ndplot/charts/BaseChart.ts';
import { LineChart } from '../../src/ndplot/charts/LineChart.ts';

describe('escapeXml', () => {
  it('escapes markup characters', () => {
    expect(escapeXml('a<b & "c">')).toBe('a&lt;b &amp; &quot;c&quot;&gt;');
  });
});

describe('detectTheme', () => {
  it('prefers NDPLOT_THEME in any case', () => {
    expect(detectTheme({ NDPLOT_THEME: 'DARK' })).toBe('dark');
    expect(detectTheme({ NDPLOT_THEME: 'light', TERM: 'xterm-dark' })).toBe('light');
  });

  it('falls back to a TERM mentioning dark', () => {
    expect(detectTheme({ TERM: 'xterm-dark' })).toBe('dark');
    expect(detectTheme({ NDPLOT_THEME: 'blue', TERM: 'xterm-256color' })).toBe('light');
  });

  it('defaults to light', () => {
    expect(detectTheme({})).toBe('light');
  });
});

describe('BaseChart rendering', () => {
  const series = [{ name: '', data: [{ x: 0, y: 0 }, { x: 1, y: 1 }] }];

  it('escapes the title and axis labels', () => {
    const svg = new LineChart(series, { title: 'a<b', xLabel: 'x & y', theme: 'light' }).render();

    expect(svg).toContain('font-size="16px" font-weight="500">a&lt;b</text>');
    expect(svg).toContain('font-size="12px">x &amp; y</text>');
  });

  it('uses light text on the dark theme', () => {
    const svg = new LineChart(series, { title: 'T', theme: 'dark' }).render();
    expect(svg).toContain('<text x="300" y="20" text-anchor="middle" fill="#ffffff" font-size="16px" font-weight="500">T</text>');
  });

  it('sizes the document from the options', () => {
    const svg = new LineChart(series, { width: 320, height: 200 }).render();
    expect(svg.startsWith('<svg width="320" height="200" viewBox="0 0 320 200"')).toBe(true);
  });
});
