import { describe, expect, it } from 'vitest';
import { graphSvgFilename, serializeGraphSvg } from './exportSvg';
import type { OptionalCategory } from '../types/graph';

const SVG_NS = 'http://www.w3.org/2000/svg';

function renderedGraph(): SVGSVGElement {
  const svg = document.createElementNS(SVG_NS, 'svg');
  const circle = document.createElementNS(SVG_NS, 'circle');
  circle.setAttribute('r', '22.5');
  svg.appendChild(circle);
  return svg;
}

function parse(markup: string): Document {
  return new DOMParser().parseFromString(markup, 'image/svg+xml');
}

describe('serializeGraphSvg', () => {
  it('produces a standalone SVG painted on the dark background', () => {
    const doc = parse(serializeGraphSvg(renderedGraph()));
    const root = doc.documentElement;

    expect(root.namespaceURI).toBe(SVG_NS);
    expect(root.firstElementChild?.tagName).toBe('rect');
    expect(root.firstElementChild?.getAttribute('fill')).toBe('#0f172a');
    expect(root.firstElementChild?.getAttribute('width')).toBe('100%');
    expect(root.querySelector('circle')?.getAttribute('r')).toBe('22.5');
  });

  it('crops to the drawn content with padding', () => {
    const svg = renderedGraph();
    Object.defineProperty(svg, 'getBBox', {
      value: () => ({ x: 10, y: 20, width: 100, height: 50 }),
    });

    const root = parse(serializeGraphSvg(svg)).documentElement;

    expect(root.getAttribute('viewBox')).toBe('-10 0 140 90');
    expect(root.getAttribute('width')).toBe('140');
    expect(root.getAttribute('height')).toBe('90');
    const background = root.firstElementChild;
    expect(background?.getAttribute('x')).toBe('-10');
    expect(background?.getAttribute('y')).toBe('0');
    expect(background?.getAttribute('width')).toBe('140');
  });

  it('leaves the on-screen element untouched', () => {
    const svg = renderedGraph();
    serializeGraphSvg(svg);
    expect(svg.childNodes).toHaveLength(1);
    expect(svg.hasAttribute('viewBox')).toBe(false);
  });
});

describe('graphSvgFilename', () => {
  const now = new Date('2024-05-01T10:20:30.456Z');

  it('names the enabled layers in display order', () => {
    const layers = new Set<OptionalCategory>(['anomaly', 'physics']);
    expect(graphSvgFilename(layers, now)).toBe('knowledge-graph-physics-anomaly-2024-05-01T10-20-30.svg');
  });

  it('falls back to "base" with every layer off', () => {
    expect(graphSvgFilename(new Set<OptionalCategory>(), now)).toBe('knowledge-graph-base-2024-05-01T10-20-30.svg');
  });
});
