import React from 'react';
import { ThemeProvider } from './context/ThemeContext';
import PlannerDashboard from './pages/PlannerDashboard';
import type { AppConfig } from './services/config';
import type { AdvisoryModel } from './services/geminiService';

interface AppProps {
  config: AppConfig;
  model: AdvisoryModel;
}

const App: React.FC<AppProps> = ({ config, model }) => (
  <ThemeProvider>
    <PlannerDashboard model={model} weatherTimeoutMs={config.weatherTimeoutMs} />
  </ThemeProvider>
);

export default App;
