import React from 'react';
import { AlertTriangle } from 'lucide-react';

// Shown in place of the planner when configuration fails at start-up.
const StartupError: React.FC<{ message: string }> = ({ message }) => (
  <div className="min-h-screen flex items-center justify-center bg-stone-950 px-4">
    <div role="alert" className="max-w-lg w-full bg-stone-900 border border-red-900 rounded-3xl p-8 text-stone-100 shadow-2xl">
      <div className="flex items-center gap-3 mb-4">
        <div className="p-3 bg-red-500 rounded-2xl text-white"><AlertTriangle size={24} /></div>
        <h1 className="text-xl font-black">Resilience Planner cannot start</h1>
      </div>
      <p className="text-stone-300 text-sm leading-relaxed">{message}</p>
    </div>
  </div>
);

export default StartupError;
