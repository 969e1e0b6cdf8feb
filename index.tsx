import React from 'react';
import ReactDOM from 'react-dom/client';
import App from './App';
import StartupError from './components/StartupError';
import { ConfigurationError, loadConfig } from './services/config';
import { createGeminiAdvisor } from './services/geminiService';
import './index.css';

const rootElement = document.getElementById('root');
if (!rootElement) {
  throw new Error("Could not find root element to mount to");
}

const root = ReactDOM.createRoot(rootElement);

// The planner is only mounted once the key and a usable model are confirmed.
const bootstrap = async () => {
  try {
    const config = loadConfig();
    const model = await createGeminiAdvisor(config);
    root.render(
      <React.StrictMode>
        <App config={config} model={model} />
      </React.StrictMode>
    );
  } catch (error) {
    console.error("Startup Error:", error);
    const message = error instanceof ConfigurationError ? error.message : `Unexpected start-up failure: ${String(error)}`;
    root.render(<StartupError message={message} />);
  }
};

void bootstrap();
