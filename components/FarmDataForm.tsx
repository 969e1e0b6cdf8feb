import React from 'react';
import { ClipboardList, MapPin, Moon, Sprout, Sun, Zap } from 'lucide-react';
import { SOIL_TYPES, type FarmProfile, type SoilType } from '../types';
import { COUNTIES } from '../services/countyService';
import { useTheme } from '../context/ThemeContext';

interface FarmDataFormProps {
  profile: FarmProfile;
  onChange: (profile: FarmProfile) => void;
  disabled?: boolean;
}

const isSoilType = (value: string): value is SoilType => SOIL_TYPES.some(soil => soil === value);

const FarmDataForm: React.FC<FarmDataFormProps> = ({ profile, onChange, disabled = false }) => {
  const { isDark, setDark } = useTheme();

  const update = <K extends keyof FarmProfile>(key: K, value: FarmProfile[K]) => onChange({ ...profile, [key]: value });

  const field = isDark
    ? 'bg-stone-800 border-stone-700 text-stone-100'
    : 'bg-stone-50 border-stone-200 text-stone-900';
  const label = `block text-sm font-bold mb-2 ${isDark ? 'text-stone-200' : 'text-stone-700'}`;

  return (
    <form
      aria-label="Farm data"
      onSubmit={e => e.preventDefault()}
      className={`p-6 rounded-3xl shadow-xl border h-fit ${isDark ? 'bg-stone-900 border-stone-800' : 'bg-white border-stone-100'}`}
    >
      <h2 className="font-bold mb-6 uppercase tracking-wider text-sm border-b border-stone-200/40 pb-2 flex items-center gap-2">
        <ClipboardList size={18} className="text-emerald-500" /> Farm Data
      </h2>

      <div className="space-y-5">
        <div>
          <label htmlFor="county" className={label}>County (Kenya's 47 counties)</label>
          <div className="relative">
            <MapPin className="absolute left-4 top-3.5 text-stone-400 w-5 h-5" />
            <select
              id="county"
              value={profile.county}
              disabled={disabled}
              onChange={e => update('county', e.target.value)}
              className={`w-full pl-12 pr-4 py-3 border rounded-xl outline-none focus:ring-2 focus:ring-emerald-500 appearance-none font-medium ${field}`}
            >
              {COUNTIES.map(county => (
                <option key={county} value={county}>{county}</option>
              ))}
            </select>
          </div>
        </div>

        <div>
          <label htmlFor="location" className={label}>Nearest town / ward / market</label>
          <input
            id="location"
            type="text"
            value={profile.location}
            disabled={disabled}
            onChange={e => update('location', e.target.value)}
            className={`w-full px-4 py-3 border rounded-xl outline-none focus:ring-2 focus:ring-emerald-500 font-medium ${field}`}
            placeholder="e.g. Ruiru"
          />
        </div>

        <fieldset>
          <legend className={label}>Soil type</legend>
          <div className="flex flex-col gap-2">
            {SOIL_TYPES.map(soil => (
              <label key={soil} className="flex items-center gap-3 text-sm font-medium cursor-pointer">
                <input
                  type="radio"
                  name="soilType"
                  value={soil}
                  checked={profile.soilType === soil}
                  disabled={disabled}
                  onChange={e => {
                    if (isSoilType(e.target.value)) update('soilType', e.target.value);
                  }}
                  className="accent-emerald-600"
                />
                {soil}
              </label>
            ))}
          </div>
        </fieldset>

        <div>
          <label htmlFor="plantedCrop" className={label}>Currently planted crop</label>
          <div className="relative">
            <Sprout className="absolute left-4 top-3.5 text-stone-400 w-5 h-5" />
            <input
              id="plantedCrop"
              type="text"
              value={profile.plantedCrop}
              disabled={disabled}
              onChange={e => update('plantedCrop', e.target.value)}
              className={`w-full pl-12 pr-4 py-3 border rounded-xl outline-none focus:ring-2 focus:ring-emerald-500 font-medium ${field}`}
              placeholder="e.g. Maize"
            />
          </div>
        </div>

        <label className="flex items-center justify-between gap-3 text-sm font-bold cursor-pointer">
          <span className="flex items-center gap-2"><Zap size={16} className="text-amber-500" /> Quick action plan summary</span>
          <input
            type="checkbox"
            role="switch"
            checked={profile.quickPlan}
            disabled={disabled}
            onChange={e => update('quickPlan', e.target.checked)}
            className="accent-emerald-600 w-5 h-5"
          />
        </label>
        <p className="text-xs text-stone-400 -mt-3">On = short bullet plan. Off = full detailed strategy.</p>

        <div className="border-t border-stone-200/40 pt-4">
          <label className="flex items-center justify-between gap-3 text-sm font-bold cursor-pointer">
            <span className="flex items-center gap-2">{isDark ? <Moon size={16} /> : <Sun size={16} />} Dark theme</span>
            <input
              type="checkbox"
              role="switch"
              checked={isDark}
              onChange={e => setDark(e.target.checked)}
              className="accent-emerald-600 w-5 h-5"
            />
          </label>
        </div>
      </div>
    </form>
  );
};

export default FarmDataForm;
