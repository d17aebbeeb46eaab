import { create } from 'zustand';
import { OPTIONAL_CATEGORIES, buildGraph, isOptionalCategory } from '../lib/graphBuilder';
import type { GraphData, OptionalCategory } from '../types/graph';

interface LayerStore {
  enabledLayers: ReadonlySet<OptionalCategory>;
  graph: GraphData;

  toggleLayer: (layer: OptionalCategory) => void;
  setLayers: (layers: Iterable<string>) => void;
}

const initialLayers: ReadonlySet<OptionalCategory> = new Set(OPTIONAL_CATEGORIES);

export const useLayerStore = create<LayerStore>((set, get) => ({
  enabledLayers: initialLayers,
  graph: buildGraph(initialLayers),

  toggleLayer: (layer: OptionalCategory) => {
    const next = new Set(get().enabledLayers);
    if (next.has(layer)) {
      next.delete(layer);
    } else {
      next.add(layer);
    }
    set({ enabledLayers: next, graph: buildGraph(next) });
  },

  setLayers: (layers: Iterable<string>) => {
    const next = new Set<OptionalCategory>();
    for (const layer of layers) {
      if (isOptionalCategory(layer)) next.add(layer);
    }
    set({ enabledLayers: next, graph: buildGraph(next) });
  },
}));
