
export enum PlannerStatus {
  IDLE = 'IDLE',
  GENERATING = 'GENERATING',
  READY = 'READY',
  ANSWERING = 'ANSWERING'
}

export interface County {
  name: string;
  latitude: number;
  longitude: number;
}

export interface Coordinates {
  latitude: number;
  longitude: number;
}

export const SOIL_TYPES = ['Red Volcanic', 'Black Cotton', 'Sandy/Loamy'] as const;
export type SoilType = typeof SOIL_TYPES[number];

// --- WEATHER ---
export interface ForecastSnapshot {
  temperature: number | null; // celsius
  precipitation: number; // mm, current hour
  humidity: number | null; // percentage
  weatherCode: number; // WMO code
  condition: string;
  dailyMax: (number | null)[];
  dailyMin: (number | null)[];
  dailyPrecipitation: (number | null)[];
  weeklyPrecipitation: number; // sum of the non-null daily entries
}

export type WeatherOutcome =
  | { status: 'available'; forecast: ForecastSnapshot }
  | { status: 'unavailable'; reason: string };

export interface ClimateContext {
  mode: 'live' | 'fallback';
  lines: string[];
}

// --- PLANNING ---
export interface FarmProfile {
  county: string;
  location: string; // nearest town / ward / market
  soilType: SoilType;
  plantedCrop: string;
  quickPlan: boolean; // short bullet plan instead of the full strategy
}

export interface AdvisoryReport {
  rundown: string; // empty when the model skipped the rundown markers
  fullReport: string;
}

export type ChatRole = 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface PlannerSnapshot {
  status: PlannerStatus;
  report: AdvisoryReport | null;
  conversation: ChatMessage[];
}

export type PlanOutcome =
  | { ok: true; report: AdvisoryReport }
  | { ok: false; error: string };

// `refused` failures never reached the model and left the transcript alone.
export type FollowUpOutcome =
  | { ok: true; reply: string }
  | { ok: false; error: string; refused: boolean };
