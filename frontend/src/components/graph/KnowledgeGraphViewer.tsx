import { useEffect, useRef, useState } from 'react';
import * as d3 from 'd3';
import type { GraphData, StyledNode, WeightedEdge } from '../../types/graph';
import { edgeStrokeWidth, nodeRadius } from '../../lib/graphUtils';
import { downloadGraphSvg } from '../../lib/exportSvg';
import { useLayerStore } from '../../stores/layerStore';
import { GraphControls } from './GraphControls';
import { NodeDetailsPanel } from './NodeDetailsPanel';

// Extended types for D3 simulation
interface SimNode extends StyledNode, d3.SimulationNodeDatum {}

interface SimEdge extends d3.SimulationLinkDatum<SimNode> {
  weight: WeightedEdge['weight'];
}

interface KnowledgeGraphViewerProps {
  graph: GraphData;
}

function endpoint(value: string | number | SimNode): SimNode | undefined {
  return typeof value === 'object' ? value : undefined;
}

export function KnowledgeGraphViewer({ graph }: KnowledgeGraphViewerProps) {
  const containerRef = useRef<HTMLDivElement>(null);
  const svgRef = useRef<SVGSVGElement>(null);
  const zoomRef = useRef<d3.ZoomBehavior<SVGSVGElement, unknown> | null>(null);
  const [selectedId, setSelectedId] = useState<string | null>(null);

  useEffect(() => {
    if (!svgRef.current) return;

    const svg = d3.select(svgRef.current);

    // Clear the previous render before drawing the new layer set
    svg.selectAll('*').remove();

    if (!graph.nodes.length) return;

    const width = svgRef.current.clientWidth;
    const height = svgRef.current.clientHeight;

    const defs = svg.append('defs');
    defs.append('marker')
      .attr('id', 'kg-arrow')
      .attr('viewBox', '0 -5 10 10')
      .attr('refX', 10)
      .attr('markerWidth', 6)
      .attr('markerHeight', 6)
      .attr('orient', 'auto')
      .append('path')
      .attr('d', 'M0,-5L10,0L0,5')
      .attr('fill', 'rgba(100, 116, 139, 0.8)');

    const g = svg.append('g');

    const zoom = d3.zoom<SVGSVGElement, unknown>()
      .scaleExtent([0.1, 4])
      .on('zoom', (event: d3.D3ZoomEvent<SVGSVGElement, unknown>) => {
        g.attr('transform', event.transform.toString());
      });
    zoomRef.current = zoom;
    svg.call(zoom);

    // D3 mutates these with positions, so never hand it the store's records
    const nodes: SimNode[] = graph.nodes.map((n) => ({ ...n }));
    const edges: SimEdge[] = graph.edges.map((e) => ({ ...e }));

    const simulation = d3.forceSimulation<SimNode>(nodes)
      .force('link', d3.forceLink<SimNode, SimEdge>(edges)
        .id((d) => d.id)
        .distance(120)
      )
      .force('charge', d3.forceManyBody<SimNode>().strength(-400))
      .force('center', d3.forceCenter(width / 2, height / 2))
      .force('collision', d3.forceCollide<SimNode>().radius((d) => nodeRadius(d) + 12));

    const link = g.append('g')
      .selectAll<SVGLineElement, SimEdge>('line')
      .data(edges)
      .join('line')
      .attr('stroke', 'rgba(148, 163, 184, 0.6)')
      .attr('stroke-opacity', 0.6)
      .attr('stroke-width', (d) => edgeStrokeWidth(d.weight))
      .attr('marker-end', 'url(#kg-arrow)');

    link.append('title').text((d) => `weight ${d.weight}`);

    const node = g.append('g')
      .selectAll<SVGCircleElement, SimNode>('circle')
      .data(nodes)
      .join('circle')
      .attr('r', (d) => nodeRadius(d))
      .attr('fill', (d) => d.fill)
      .attr('stroke', (d) => d.border)
      .attr('stroke-width', 2)
      .attr('data-category', (d) => d.category)
      .style('cursor', 'pointer')
      .on('click', (event: MouseEvent, d) => {
        event.stopPropagation();
        setSelectedId(d.id);
      })
      .call(d3.drag<SVGCircleElement, SimNode, SimNode>()
        .on('start', dragstarted)
        .on('drag', dragged)
        .on('end', dragended)
      );

    const nodeLabels = g.append('g')
      .selectAll<SVGTextElement, SimNode>('text')
      .data(nodes)
      .join('text')
      .attr('text-anchor', 'middle')
      .attr('dy', (d) => nodeRadius(d) + 14)
      .attr('font-size', '12px')
      .attr('font-weight', 500)
      .attr('fill', '#e5e7eb')
      .attr('pointer-events', 'none')
      .text((d) => d.label);

    simulation.on('tick', () => {
      link
        .attr('x1', (d) => endpoint(d.source)?.x ?? 0)
        .attr('y1', (d) => endpoint(d.source)?.y ?? 0)
        .attr('x2', (d) => endpoint(d.target)?.x ?? 0)
        .attr('y2', (d) => endpoint(d.target)?.y ?? 0);

      node
        .attr('cx', (d) => d.x ?? 0)
        .attr('cy', (d) => d.y ?? 0);

      nodeLabels
        .attr('x', (d) => d.x ?? 0)
        .attr('y', (d) => d.y ?? 0);
    });

    function dragstarted(event: d3.D3DragEvent<SVGCircleElement, SimNode, SimNode>) {
      if (!event.active) simulation.alphaTarget(0.3).restart();
      event.subject.fx = event.subject.x;
      event.subject.fy = event.subject.y;
    }

    function dragged(event: d3.D3DragEvent<SVGCircleElement, SimNode, SimNode>) {
      event.subject.fx = event.x;
      event.subject.fy = event.y;
    }

    function dragended(event: d3.D3DragEvent<SVGCircleElement, SimNode, SimNode>) {
      if (!event.active) simulation.alphaTarget(0);
      event.subject.fx = null;
      event.subject.fy = null;
    }

    // Click on background to deselect
    svg.on('click', () => {
      setSelectedId(null);
    });

    return () => {
      simulation.stop();
    };
  }, [graph]);

  const handleReset = () => {
    const zoom = zoomRef.current;
    if (!svgRef.current || !zoom) return;
    d3.select(svgRef.current)
      .transition()
      .duration(750)
      .call(zoom.transform, d3.zoomIdentity);
  };

  const handleExport = () => {
    if (!svgRef.current) return;
    try {
      downloadGraphSvg(svgRef.current, useLayerStore.getState().enabledLayers);
    } catch (err) {
      console.error('Failed to export graph:', err);
    }
  };

  const handleFullscreen = () => {
    const container = containerRef.current;
    if (!container?.requestFullscreen) return;
    container.requestFullscreen().catch((err: unknown) => {
      console.error('Failed to enter fullscreen:', err);
    });
  };

  // Hide the panel when the selected node's layer is switched off
  const selectedNode = graph.nodes.find((n) => n.id === selectedId) ?? null;

  return (
    <div ref={containerRef} className="flex h-full bg-slate-900 rounded-xl overflow-hidden">
      <div className="flex-1 relative">
        <GraphControls
          nodeCount={graph.nodes.length}
          edgeCount={graph.edges.length}
          onReset={handleReset}
          onExport={handleExport}
          onFullscreen={handleFullscreen}
        />
        {!graph.nodes.length && (
          <div className="absolute inset-0 flex items-center justify-center z-20">
            <p className="text-gray-400">No nodes to display</p>
          </div>
        )}
        <svg
          ref={svgRef}
          role="img"
          aria-label="Knowledge graph"
          className="w-full h-full min-h-[600px] bg-gradient-to-br from-indigo-500/80 to-purple-700/80"
        />
      </div>

      {selectedNode && (
        <NodeDetailsPanel
          node={selectedNode}
          graph={graph}
          onClose={() => setSelectedId(null)}
        />
      )}
    </div>
  );
}
