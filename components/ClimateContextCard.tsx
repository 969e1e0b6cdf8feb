import React from 'react';
import { CloudRain, CloudSun, Loader2 } from 'lucide-react';
import type { ClimateContext } from '../types';
import { useTheme } from '../context/ThemeContext';

interface ClimateContextCardProps {
  context: ClimateContext | null; // null while the forecast is loading
}

const ClimateContextCard: React.FC<ClimateContextCardProps> = ({ context }) => {
  const { isDark } = useTheme();

  return (
    <section
      aria-label="Climate context"
      className={`rounded-3xl p-6 shadow-xl border ${isDark ? 'bg-stone-900 border-stone-800' : 'bg-white border-stone-100'}`}
    >
      <h2 className="text-lg font-bold mb-4 flex items-center gap-2">
        {context?.mode === 'live' ? <CloudSun className="text-blue-500" /> : <CloudRain className="text-blue-500" />}
        Climate Context for 2026
      </h2>
      {context ? (
        <div className={`rounded-2xl p-4 border space-y-1 text-sm ${isDark ? 'bg-blue-950/40 border-blue-900' : 'bg-blue-50 border-blue-100'}`}>
          {context.lines.map(line => (
            <p key={line}>{line}</p>
          ))}
        </div>
      ) : (
        <div className="flex items-center gap-2 text-sm text-stone-400">
          <Loader2 className="animate-spin" size={16} /> Fetching forecast…
        </div>
      )}
    </section>
  );
};

export default ClimateContextCard;
