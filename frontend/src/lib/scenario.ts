export type ScenarioKey = 'wind' | 'grid' | 'inv' | 'infl';

export type ScenarioDecision = 'start' | 'unsupported' | 'empty';

export interface Scenario {
  key: ScenarioKey;
  /** Text placed in the scenario input */
  title: string;
  /** Chip label */
  chip: string;
}

export const SCENARIOS: readonly Scenario[] = [
  { key: 'wind', title: 'Wind turbines (Sentinel)', chip: '🌬️ Wind turbines (Sentinel)' },
  { key: 'grid', title: 'Data center supply-demand (Grid)', chip: '🖥️ Data center supply–demand' },
  { key: 'inv', title: 'Inventory management (Horizon)', chip: '📦 Inventory management' },
  { key: 'infl', title: 'Inflation (Optima)', chip: '📈 Inflation (Optima)' },
];

export const SCENARIO_MESSAGES: Record<Exclude<ScenarioDecision, 'start'>, string> = {
  unsupported: 'Wind turbines scenario is currently available. Other scenarios coming soon!',
  empty: 'Please select a scenario to continue',
};

export const LOADER_STATUS = 'Initializing turbine sensors A0–A71...';

export function findScenario(key: string): Scenario | undefined {
  return SCENARIOS.find((s) => s.key === key);
}

// Only the wind-turbine scenario has a graph behind it
export function evaluateScenario(text: string | null | undefined): ScenarioDecision {
  const value = (text ?? '').trim();
  if (!value) return 'empty';
  return value.toLowerCase().includes('wind') ? 'start' : 'unsupported';
}
