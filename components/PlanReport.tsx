import React, { useEffect, useRef, useState } from 'react';
import { FileText, Check, ClipboardCopy, Pin, Printer, Share2 } from 'lucide-react';
import type { AdvisoryReport } from '../types';
import { composeReportText } from '../services/plannerSession';
import { useTheme } from '../context/ThemeContext';
import MarkdownText from './MarkdownText';

const FEEDBACK_MS = 3000;

interface PlanReportProps {
  report: AdvisoryReport;
  county: string;
}

const PlanReport: React.FC<PlanReportProps> = ({ report, county }) => {
  const { isDark } = useTheme();
  const [feedback, setFeedback] = useState<string | null>(null);
  const feedbackTimer = useRef<ReturnType<typeof setTimeout> | null>(null);

  useEffect(() => () => {
    if (feedbackTimer.current) clearTimeout(feedbackTimer.current);
  }, []);

  const planText = composeReportText(report);
  const card = isDark ? 'bg-stone-900 border-stone-800' : 'bg-white border-stone-100';

  const flash = (message: string) => {
    setFeedback(message);
    if (feedbackTimer.current) clearTimeout(feedbackTimer.current);
    feedbackTimer.current = setTimeout(() => setFeedback(null), FEEDBACK_MS);
  };

  const handleCopy = async () => {
    try {
      await navigator.clipboard.writeText(planText);
      flash('Plan copied to clipboard.');
    } catch (err) {
      console.warn("Clipboard unavailable:", err);
      flash('Copy the plan from the report above and paste it into your document.');
    }
  };

  const handleShare = async (e: React.MouseEvent) => {
    e.preventDefault();
    const title = `Resilience Plan 2026: ${county}`;

    // 1. Native Share API
    if (navigator.share) {
      try {
        await navigator.share({ title, text: planText });
        return;
      } catch (err) {
        console.warn("Share cancelled, falling back to email:", err);
      }
    }

    // 2. Email fallback
    window.location.href = `mailto:?subject=${encodeURIComponent(title)}&body=${encodeURIComponent(planText)}`;
  };

  return (
    <div className="space-y-6 animate-fade-in">
      {report.rundown && (
        <section aria-label="Quick rundown" className={`rounded-3xl p-6 shadow-xl border ${isDark ? 'bg-emerald-950/40 border-emerald-900' : 'bg-emerald-50 border-emerald-100'}`}>
          <h2 className="text-lg font-bold mb-1 flex items-center gap-2"><Pin size={18} className="text-emerald-600" /> Quick rundown</h2>
          <p className="text-xs text-stone-400 mb-4">Advisability, season, and tips. Full details are in the report below.</p>
          <div className="whitespace-pre-line text-sm font-medium">{report.rundown}</div>
        </section>
      )}

      <section aria-label="Resilience strategy" id="printable-report" className={`rounded-3xl p-8 shadow-xl border ${card}`}>
        <h2 className="text-xl font-black mb-4 flex items-center gap-2"><FileText className="text-emerald-600" /> Your 2026 Resilience Strategy</h2>
        <MarkdownText>{report.fullReport}</MarkdownText>
      </section>

      <div className="flex flex-wrap gap-3 no-print">
        <button type="button" onClick={handleCopy} className="px-5 py-3 rounded-2xl font-bold flex items-center gap-2 bg-stone-900 text-white hover:bg-stone-800 transition-all">
          <ClipboardCopy size={18} /> Copy plan to clipboard
        </button>
        <button type="button" onClick={handleShare} className="px-5 py-3 rounded-2xl font-bold flex items-center gap-2 bg-emerald-600 text-white hover:bg-emerald-500 transition-all">
          <Share2 size={18} /> Share strategy
        </button>
        <button type="button" onClick={() => window.print()} className="px-5 py-3 rounded-2xl font-bold flex items-center gap-2 border border-stone-300 hover:border-emerald-400 transition-all">
          <Printer size={18} /> Print
        </button>
      </div>

      {feedback && (
        <p role="status" className="text-sm font-medium text-emerald-600 flex items-center gap-2">
          <Check size={16} /> {feedback}
        </p>
      )}
    </div>
  );
};

export default PlanReport;
