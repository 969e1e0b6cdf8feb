import React, { useEffect, useState } from 'react';
import { AlertTriangle, CheckCircle, Loader2, Rocket, Sprout } from 'lucide-react';
import type { ClimateContext, FarmProfile, PlannerSnapshot, WeatherOutcome } from '../types';
import type { AdvisoryModel } from '../services/geminiService';
import { ResiliencePlanner } from '../services/resiliencePlanner';
import { DEFAULT_COUNTY } from '../services/countyService';
import { describeClimateContext, fetchCountyForecast, type ForecastOptions } from '../services/weatherService';
import { useTheme } from '../context/ThemeContext';
import FarmDataForm from '../components/FarmDataForm';
import ClimateContextCard from '../components/ClimateContextCard';
import QuickStats from '../components/QuickStats';
import PlanReport from '../components/PlanReport';
import FollowUpChat from '../components/FollowUpChat';

export type ForecastFetcher = (county: string, options?: ForecastOptions) => Promise<WeatherOutcome>;

interface PlannerDashboardProps {
  model: AdvisoryModel;
  weatherTimeoutMs?: number;
  fetchForecast?: ForecastFetcher;
}

const INITIAL_PROFILE: FarmProfile = {
  county: DEFAULT_COUNTY,
  location: 'Ruiru',
  soilType: 'Red Volcanic',
  plantedCrop: 'Maize',
  quickPlan: false,
};

const PlannerDashboard: React.FC<PlannerDashboardProps> = ({ model, weatherTimeoutMs, fetchForecast = fetchCountyForecast }) => {
  const { isDark } = useTheme();
  // One planner per page instance: it owns this page's report and transcript.
  const [planner] = useState(() => new ResiliencePlanner(model));
  const [snapshot, setSnapshot] = useState<PlannerSnapshot>(() => planner.snapshot());

  const [profile, setProfile] = useState<FarmProfile>(INITIAL_PROFILE);
  const [climate, setClimate] = useState<ClimateContext | null>(null);
  const [isGenerating, setIsGenerating] = useState(false);
  const [pendingQuestion, setPendingQuestion] = useState<string | null>(null);
  const [chatRefusal, setChatRefusal] = useState<string | null>(null);
  const [error, setError] = useState<string | null>(null);
  const [notice, setNotice] = useState<string | null>(null);

  useEffect(() => {
    const county = profile.county;
    let active = true;
    setClimate(null);
    void fetchForecast(county, { timeoutMs: weatherTimeoutMs })
      .catch((err: unknown): WeatherOutcome => {
        console.error("Forecast Error:", err);
        return { status: 'unavailable', reason: String(err) };
      })
      .then(outcome => {
        if (active) setClimate(describeClimateContext(county, outcome));
      });
    return () => {
      active = false;
    };
  }, [profile.county, fetchForecast, weatherTimeoutMs]);

  const isBusy = isGenerating || pendingQuestion !== null;

  const handleGenerate = async () => {
    setIsGenerating(true);
    setChatRefusal(null);
    setError(null);
    setNotice(null);
    const outcome = await planner.generatePlan(profile);
    if (outcome.ok) {
      setNotice('Resilience plan generated.');
    } else {
      setError(outcome.error);
    }
    setSnapshot(planner.snapshot());
    setIsGenerating(false);
  };

  const handleAsk = async (question: string) => {
    setPendingQuestion(question);
    setChatRefusal(null);
    const outcome = await planner.askFollowUp(question);
    // Failed calls are already in the transcript; refusals are not.
    if (!outcome.ok && outcome.refused) setChatRefusal(outcome.error);
    setSnapshot(planner.snapshot());
    setPendingQuestion(null);
  };

  return (
    <div className={`min-h-screen pt-12 pb-12 px-4 transition-colors ${isDark ? 'bg-stone-950 text-stone-100' : 'bg-stone-50 text-stone-900'}`}>
      <div className="max-w-6xl mx-auto">

        <header className="text-center mb-10">
          <div className="inline-flex p-4 bg-emerald-100 rounded-full text-emerald-600 mb-4 shadow-sm">
            <Sprout size={32} />
          </div>
          <h1 className="text-3xl md:text-4xl font-bold mb-2">Resilience Planner: 2026 Climate Bridge</h1>
          <p className="text-stone-500 max-w-xl mx-auto">
            Helping Kenyan smallholder farmers pivot from failing crops to climate-smart survival. Covers all 47 counties.
          </p>
        </header>

        <div className="grid lg:grid-cols-3 gap-8">

          {/* FARM DATA */}
          <aside className="lg:col-span-1">
            <FarmDataForm profile={profile} onChange={setProfile} disabled={isBusy} />
          </aside>

          {/* CONTEXT + OUTPUT */}
          <main className="lg:col-span-2 space-y-6">
            <div className="grid md:grid-cols-3 gap-6">
              <div className="md:col-span-2"><ClimateContextCard context={climate} /></div>
              <QuickStats county={profile.county} />
            </div>

            <button
              type="button"
              onClick={handleGenerate}
              disabled={isBusy}
              className="w-full bg-emerald-600 hover:bg-emerald-500 text-white font-bold py-4 rounded-xl shadow-lg shadow-emerald-900/20 transition-all flex items-center justify-center gap-2 disabled:opacity-50 disabled:cursor-not-allowed"
            >
              {isGenerating ? <Loader2 className="animate-spin" /> : <Rocket size={20} />}
              {isGenerating ? 'Analyzing 2026 forecasts and climate data…' : 'Generate Resilience Plan'}
            </button>

            {error && (
              <div role="alert" className="rounded-2xl p-4 border border-red-300 bg-red-50 text-red-800 text-sm">
                <p className="font-bold flex items-center gap-2"><AlertTriangle size={16} /> {error}</p>
                <p className="mt-1">Check your API key and internet connection.</p>
              </div>
            )}
            {notice && (
              <p role="status" className="text-sm font-bold text-emerald-600 flex items-center gap-2"><CheckCircle size={16} /> {notice}</p>
            )}

            {snapshot.report && <PlanReport report={snapshot.report} county={profile.county} />}

            <FollowUpChat
              hasReport={snapshot.report !== null}
              messages={snapshot.conversation}
              pendingQuestion={pendingQuestion}
              disabled={isBusy}
              refusal={chatRefusal}
              onAsk={handleAsk}
            />
          </main>
        </div>

        <footer className="mt-12 text-center text-xs text-stone-400">
          🌱 Resilience Planner 2026 | Powered by Google Gemini | Supporting farmers across Kenya's 47 counties
        </footer>
      </div>
    </div>
  );
};

export default PlannerDashboard;
