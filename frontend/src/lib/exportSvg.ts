import { OPTIONAL_CATEGORIES } from './graphBuilder';
import type { OptionalCategory } from '../types/graph';

const SVG_NS = 'http://www.w3.org/2000/svg';
const EXPORT_PADDING = 20;
// The on-screen backdrop is a CSS gradient; labels are light, so the file needs its own
const EXPORT_BACKGROUND = '#0f172a';

/**
 * Serialize the rendered graph as a standalone SVG document, cropped to the
 * drawn content and painted on a dark background.
 */
export function serializeGraphSvg(svgElement: SVGSVGElement): string {
  const clone = svgElement.cloneNode(true);
  if (!(clone instanceof SVGSVGElement)) {
    throw new Error('Graph export expects an <svg> root element');
  }

  const background = document.createElementNS(SVG_NS, 'rect');
  background.setAttribute('fill', EXPORT_BACKGROUND);

  // getBBox needs layout, which not every DOM provides
  const bbox = typeof svgElement.getBBox === 'function' ? svgElement.getBBox() : null;
  if (bbox && bbox.width > 0 && bbox.height > 0) {
    const x = bbox.x - EXPORT_PADDING;
    const y = bbox.y - EXPORT_PADDING;
    const width = bbox.width + EXPORT_PADDING * 2;
    const height = bbox.height + EXPORT_PADDING * 2;

    clone.setAttribute('viewBox', `${x} ${y} ${width} ${height}`);
    clone.setAttribute('width', String(width));
    clone.setAttribute('height', String(height));
    background.setAttribute('x', String(x));
    background.setAttribute('y', String(y));
    background.setAttribute('width', String(width));
    background.setAttribute('height', String(height));
  } else {
    background.setAttribute('width', '100%');
    background.setAttribute('height', '100%');
  }

  clone.insertBefore(background, clone.firstChild);
  return new XMLSerializer().serializeToString(clone);
}

/**
 * e.g. knowledge-graph-physics-anomaly-2024-05-01T10-20-30.svg; "base" when
 * only raw sensors and outcomes are shown
 */
export function graphSvgFilename(
  enabledLayers: ReadonlySet<OptionalCategory>,
  now: Date = new Date()
): string {
  const layers = OPTIONAL_CATEGORIES.filter((layer) => enabledLayers.has(layer));
  const suffix = layers.length ? layers.join('-') : 'base';
  const timestamp = now.toISOString().replace(/[:.]/g, '-').slice(0, 19);
  return `knowledge-graph-${suffix}-${timestamp}.svg`;
}

export function downloadGraphSvg(
  svgElement: SVGSVGElement,
  enabledLayers: ReadonlySet<OptionalCategory>
): void {
  const blob = new Blob([serializeGraphSvg(svgElement)], { type: 'image/svg+xml' });
  const url = URL.createObjectURL(blob);

  const anchor = document.createElement('a');
  anchor.href = url;
  anchor.download = graphSvgFilename(enabledLayers);
  anchor.click();

  URL.revokeObjectURL(url);
  console.log('[export] Saved', anchor.download);
}
