
import { z } from 'zod';
import type { ClimateContext, ForecastSnapshot, WeatherOutcome } from '../types';
import { getCountyCoordinates } from './countyService';

const FORECAST_URL = 'https://api.open-meteo.com/v1/forecast';
const FORECAST_TIMEZONE = 'Africa/Nairobi';
export const WEATHER_TIMEOUT_MS = 8_000;

// WMO weather interpretation codes
export function weatherCodeToLabel(code: number): string {
  if (code === 0) return 'Clear';
  if ([1, 2, 3].includes(code)) return 'Mainly clear / partly cloudy';
  if ([45, 48].includes(code)) return 'Foggy';
  if ([51, 53, 55, 56, 57].includes(code)) return 'Drizzle';
  if ([61, 63, 65, 66, 67].includes(code)) return 'Rain';
  if ([80, 81, 82].includes(code)) return 'Rain showers';
  if ([95, 96, 99].includes(code)) return 'Thunderstorm';
  return 'Variable';
}

const reading = z.number().nullable().optional();
const series = z.array(z.number().nullable()).optional();

const ForecastResponseSchema = z.object({
  current: z.object({
    temperature_2m: reading,
    relative_humidity_2m: reading,
    precipitation: reading,
    weather_code: reading,
  }).optional(),
  daily: z.object({
    temperature_2m_max: series,
    temperature_2m_min: series,
    precipitation_sum: series,
  }).optional(),
});

type ForecastResponse = z.infer<typeof ForecastResponseSchema>;

const orDefault = (values: (number | null)[] | undefined, fallback: number | null): (number | null)[] =>
  values && values.length > 0 ? values : [fallback];

function toSnapshot(data: ForecastResponse): ForecastSnapshot {
  const { current, daily } = data;
  const weatherCode = current?.weather_code ?? 0;
  const dailyPrecipitation = orDefault(daily?.precipitation_sum, 0);

  return {
    temperature: current?.temperature_2m ?? null,
    precipitation: current?.precipitation ?? 0,
    humidity: current?.relative_humidity_2m ?? null,
    weatherCode,
    condition: weatherCodeToLabel(weatherCode),
    dailyMax: orDefault(daily?.temperature_2m_max, null),
    dailyMin: orDefault(daily?.temperature_2m_min, null),
    dailyPrecipitation,
    // Partial weeks are summed as-is, nulls skipped.
    weeklyPrecipitation: dailyPrecipitation.reduce<number>((total, mm) => (mm === null ? total : total + mm), 0),
  };
}

export interface ForecastOptions {
  timeoutMs?: number;
}

/**
 * Current conditions and a 7-day outlook for a county from Open-Meteo (free, no key).
 * Any network, status or parsing failure comes back as `unavailable`.
 */
export const fetchCountyForecast = async (
  county: string,
  { timeoutMs = WEATHER_TIMEOUT_MS }: ForecastOptions = {}
): Promise<WeatherOutcome> => {
  const { latitude, longitude } = getCountyCoordinates(county);

  const url = new URL(FORECAST_URL);
  url.searchParams.set('latitude', String(latitude));
  url.searchParams.set('longitude', String(longitude));
  url.searchParams.set('current', 'temperature_2m,relative_humidity_2m,precipitation,weather_code');
  url.searchParams.set('daily', 'temperature_2m_max,temperature_2m_min,precipitation_sum');
  url.searchParams.set('timezone', FORECAST_TIMEZONE);
  url.searchParams.set('forecast_days', '7');

  try {
    const response = await fetch(url.toString(), { signal: AbortSignal.timeout(timeoutMs) });
    if (!response.ok) {
      throw new Error(`Forecast failed: ${response.status}`);
    }

    const body: unknown = await response.json();
    const parsed = ForecastResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new Error('Malformed forecast response');
    }
    if (!parsed.data.current && !parsed.data.daily) {
      throw new Error('Empty forecast response');
    }

    return { status: 'available', forecast: toSnapshot(parsed.data) };
  } catch (error) {
    console.warn(`Weather unavailable for ${county}:`, error);
    return { status: 'unavailable', reason: error instanceof Error ? error.message : String(error) };
  }
};

const OUTLOOK_LINE = '🌧️ 2026 outlook: Heavy rains/floods then dry spells, plan for both.';
const CHALLENGE_LINE = '⚠️ Challenge: Unpredictable weather; many traditional crops at risk.';

const show = (value: number | null): string => (value === null ? '—' : String(value));

export function describeClimateContext(county: string, outcome: WeatherOutcome): ClimateContext {
  if (outcome.status === 'unavailable') {
    return {
      mode: 'fallback',
      lines: [
        '🌧️ 2026 outlook: Heavy rains/floods expected, then dry spells.',
        `📍 Region: ${county}, Kenya (all 47 counties).`,
        CHALLENGE_LINE,
      ],
    };
  }

  const { forecast } = outcome;
  return {
    mode: 'live',
    lines: [
      `🌡️ Now (${county}): ${show(forecast.temperature)}°C, ${forecast.condition} · Rain: ${forecast.precipitation} mm · Humidity: ${show(forecast.humidity)}%`,
      `📅 7-day: Highs ~${show(forecast.dailyMax[0])}°C, Lows ~${show(forecast.dailyMin[0])}°C · Total rain: ~${Math.round(forecast.weeklyPrecipitation)} mm`,
      OUTLOOK_LINE,
      CHALLENGE_LINE,
    ],
  };
}
