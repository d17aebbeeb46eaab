import { Download, Maximize2, RotateCcw } from 'lucide-react';
import { Button } from '../ui/button';
import { useLayerStore } from '../../stores/layerStore';
import { LAYER_OPTIONS } from './layerOptions';

interface GraphControlsProps {
  nodeCount: number;
  edgeCount: number;
  onReset: () => void;
  onExport: () => void;
  onFullscreen: () => void;
}

export function GraphControls({ nodeCount, edgeCount, onReset, onExport, onFullscreen }: GraphControlsProps) {
  const enabledLayers = useLayerStore((s) => s.enabledLayers);
  const toggleLayer = useLayerStore((s) => s.toggleLayer);

  return (
    <>
      {/* Main controls panel */}
      <div className="absolute top-4 left-4 z-10 bg-slate-800 rounded-lg shadow-lg p-4 space-y-3 border border-slate-700">
        <div className="text-sm font-semibold text-gray-200">Graph Controls</div>

        <div className="space-y-2">
          <div className="flex items-center justify-between gap-6 text-xs text-gray-400">
            <span>Nodes:</span>
            <span className="font-semibold text-gray-200" data-testid="node-count">{nodeCount}</span>
          </div>
          <div className="flex items-center justify-between gap-6 text-xs text-gray-400">
            <span>Edges:</span>
            <span className="font-semibold text-gray-200" data-testid="edge-count">{edgeCount}</span>
          </div>
        </div>

        <div className="pt-2 border-t border-slate-600 flex flex-col gap-2">
          <Button variant="outline" size="sm" onClick={onReset} className="w-full">
            <RotateCcw className="h-4 w-4 mr-2" />
            Reset View
          </Button>
          <Button variant="outline" size="sm" onClick={onExport} className="w-full">
            <Download className="h-4 w-4 mr-2" />
            Export
          </Button>
          <Button variant="outline" size="sm" onClick={onFullscreen} className="w-full">
            <Maximize2 className="h-4 w-4 mr-2" />
            Fullscreen
          </Button>
        </div>
      </div>

      {/* Floating layer toggles; raw sensors and outcomes are always on */}
      <div className="absolute top-4 right-4 z-10 flex flex-col gap-2">
        {LAYER_OPTIONS.map((layer) => {
          const active = enabledLayers.has(layer.id);
          return (
            <button
              key={layer.id}
              type="button"
              aria-pressed={active}
              onClick={() => toggleLayer(layer.id)}
              className={`
                flex items-center gap-2 px-4 py-2 rounded-lg shadow-lg transition-all duration-200 border
                ${active
                  ? 'bg-slate-700 border-slate-500 ring-2 ring-offset-2 ring-offset-slate-900 ring-slate-400'
                  : 'bg-slate-800 border-slate-700 hover:bg-slate-700 opacity-70'
                }
              `}
            >
              <div className="w-3 h-3 rounded-full" style={{ backgroundColor: layer.color }}></div>
              <span className={`text-sm font-medium ${active ? 'text-white' : 'text-gray-300'}`}>
                {layer.label}
              </span>
            </button>
          );
        })}
      </div>
    </>
  );
}
