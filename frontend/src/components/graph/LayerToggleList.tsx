import { useLayerStore } from '../../stores/layerStore';
import { LAYER_OPTIONS } from './layerOptions';

export function LayerToggleList() {
  const enabledLayers = useLayerStore((s) => s.enabledLayers);
  const toggleLayer = useLayerStore((s) => s.toggleLayer);

  return (
    <fieldset className="space-y-2">
      <legend className="sr-only">Feature layers</legend>
      {LAYER_OPTIONS.map((layer) => (
        <label key={layer.id} className="flex items-center gap-3 text-sm text-slate-200 cursor-pointer">
          <input
            type="checkbox"
            checked={enabledLayers.has(layer.id)}
            onChange={() => toggleLayer(layer.id)}
            className="h-4 w-4 rounded border-slate-500 bg-slate-700"
            style={{ accentColor: layer.color }}
          />
          {layer.label}
        </label>
      ))}
    </fieldset>
  );
}
