import { z } from 'zod';
import { WEATHER_TIMEOUT_MS } from './weatherService';

export const DEFAULT_MODEL = 'gemini-2.5-flash';

/** Settings the planner cannot start without. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const ConfigSchema = z.object({
  apiKey: z.preprocess(
    blankToUndefined,
    z.string({ required_error: 'GEMINI_API_KEY not set. Add it to your .env file or environment.' }).trim()
  ),
  model: z.preprocess(blankToUndefined, z.string().trim().default(DEFAULT_MODEL)),
  weatherTimeoutMs: z.number().int().positive().default(WEATHER_TIMEOUT_MS),
});

export type AppConfig = z.infer<typeof ConfigSchema>;
export type RawConfig = z.input<typeof ConfigSchema>;

export const parseConfig = (raw: RawConfig): AppConfig => {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigurationError(issue ? issue.message : 'Invalid configuration.');
  }
  return result.data;
};

// Vite replaces these at build time from GEMINI_API_KEY / GEMINI_MODEL (see vite.config.ts).
export const loadConfig = (): AppConfig =>
  parseConfig({
    apiKey: process.env.API_KEY,
    model: process.env.GEMINI_MODEL,
  });
