import React from 'react';
import { useTheme } from '../context/ThemeContext';

const QuickStats: React.FC<{ county: string }> = ({ county }) => {
  const { isDark } = useTheme();
  const stats = [
    { label: 'Selected County', value: county },
    { label: 'National Coverage', value: '47 Counties' },
    { label: 'Planning Horizon', value: '2026' },
  ];

  return (
    <section
      aria-label="Quick stats"
      className={`rounded-3xl p-6 shadow-xl border ${isDark ? 'bg-stone-900 border-stone-800' : 'bg-white border-stone-100'}`}
    >
      <h2 className="text-lg font-bold mb-4">Quick Stats</h2>
      <dl className="space-y-4">
        {stats.map(stat => (
          <div key={stat.label}>
            <dt className="text-[10px] font-bold uppercase tracking-widest text-stone-400">{stat.label}</dt>
            <dd className="text-2xl font-black">{stat.value}</dd>
          </div>
        ))}
      </dl>
    </section>
  );
};

export default QuickStats;
