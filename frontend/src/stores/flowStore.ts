import { create } from 'zustand';
import { config } from '../lib/config';
import {
  LOADER_STATUS,
  SCENARIO_MESSAGES,
  evaluateScenario,
  findScenario,
} from '../lib/scenario';

export type Stage = 'select' | 'loading' | 'graph_view';

export interface FlowNotice {
  kind: 'unsupported' | 'empty';
  message: string;
}

interface FlowStore {
  stage: Stage;
  scenarioText: string;
  loaderStatus: string;
  notice: FlowNotice | null;

  setScenarioText: (text: string) => void;
  selectScenarioChip: (key: string) => void;
  submitScenario: () => void;
  completeLoading: () => void;
  openSettings: () => void;
}

// Only one loading timer is live at a time; a new one supersedes the old
let loadingTimer: ReturnType<typeof setTimeout> | null = null;

function clearLoadingTimer() {
  if (loadingTimer) {
    clearTimeout(loadingTimer);
    loadingTimer = null;
  }
}

export const useFlowStore = create<FlowStore>((set, get) => ({
  stage: 'select',
  scenarioText: '',
  loaderStatus: '',
  notice: null,

  setScenarioText: (text: string) => {
    set({ scenarioText: text });
  },

  selectScenarioChip: (key: string) => {
    const scenario = findScenario(key);
    if (scenario) {
      set({ scenarioText: scenario.title });
    }
  },

  submitScenario: () => {
    const decision = evaluateScenario(get().scenarioText);

    if (decision !== 'start') {
      console.warn(`[flow] Scenario rejected (${decision}):`, get().scenarioText);
      set({ notice: { kind: decision, message: SCENARIO_MESSAGES[decision] } });
      return;
    }

    console.log('[flow] select -> loading');
    set({ stage: 'loading', loaderStatus: LOADER_STATUS, notice: null });

    clearLoadingTimer();
    loadingTimer = setTimeout(() => {
      loadingTimer = null;
      get().completeLoading();
    }, config.loadingDelayMs);
  },

  completeLoading: () => {
    if (get().stage !== 'loading') return;
    console.log('[flow] loading -> graph_view');
    set({ stage: 'graph_view' });
  },

  openSettings: () => {
    clearLoadingTimer();
    console.log(`[flow] ${get().stage} -> select`);
    set({ stage: 'select', loaderStatus: '', notice: null });
  },
}));
