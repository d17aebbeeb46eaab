import {
  Bar,
  BarChart,
  Cell,
  ResponsiveContainer,
  Tooltip,
  XAxis,
  YAxis,
} from 'recharts';
import type { FeatureImportance } from '../../data/insights';

interface FeatureImportanceChartProps {
  data: readonly FeatureImportance[];
  height?: number;
}

const trendColors: Record<FeatureImportance['trend'], string> = {
  up: '#ef4444',
  down: '#10b981',
  stable: '#94a3b8',
};

export function FeatureImportanceChart({ data, height = 180 }: FeatureImportanceChartProps) {
  if (data.length === 0) {
    return (
      <div
        className="flex items-center justify-center bg-slate-800/50 rounded-lg border border-slate-700"
        style={{ height }}
      >
        <div className="text-slate-400 text-sm">No data available</div>
      </div>
    );
  }

  return (
    <ResponsiveContainer width="100%" height={height}>
      <BarChart data={[...data]} layout="vertical" margin={{ top: 0, right: 8, left: 0, bottom: 0 }}>
        <XAxis type="number" domain={[0, 1]} hide />
        <YAxis
          type="category"
          dataKey="name"
          width={130}
          tick={{ fontSize: 11, fill: '#94a3b8' }}
          axisLine={false}
          tickLine={false}
        />
        <Tooltip
          cursor={{ fill: 'rgba(148, 163, 184, 0.1)' }}
          contentStyle={{
            backgroundColor: '#1e293b',
            border: '1px solid #475569',
            borderRadius: '8px',
          }}
          labelStyle={{ color: '#e2e8f0', fontWeight: 500 }}
          formatter={(value: number) => [`${Math.round(value * 100)}%`, 'Importance']}
        />
        <Bar dataKey="score" radius={[0, 4, 4, 0]} isAnimationActive={false}>
          {data.map((item) => (
            <Cell key={item.name} fill={trendColors[item.trend]} />
          ))}
        </Bar>
      </BarChart>
    </ResponsiveContainer>
  );
}
