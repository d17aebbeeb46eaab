import type { Config } from 'tailwindcss';

const config: Config = {
  content: ['./frontend/index.html', './frontend/src/**/*.{ts,tsx}'],
  theme: {
    extend: {
      colors: {
        'layer-raw': '#3b82f6',
        'layer-physics': '#10b981',
        'layer-statistical': '#8b5cf6',
        'layer-anomaly': '#ef4444',
        'layer-outcome': '#f59e0b',
      },
    },
  },
  plugins: [],
};

export default config;
