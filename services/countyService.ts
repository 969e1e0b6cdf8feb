import type { County, Coordinates } from '../types';
import countyTable from '../data/counties.json';

// One representative point per county, used for the forecast lookup.
const COUNTY_TABLE: readonly County[] = countyTable;

export const NAIROBI_FALLBACK: Coordinates = { latitude: -1.29, longitude: 36.82 };

export const DEFAULT_COUNTY = 'Kiambu';

export const COUNTIES: readonly string[] = COUNTY_TABLE.map(county => county.name);

const coordinatesByName = new Map<string, Coordinates>(
  COUNTY_TABLE.map(({ name, latitude, longitude }) => [name, { latitude, longitude }])
);

/**
 * Coordinates for a county name. Names outside the table (which the form never
 * produces) fall back to Nairobi instead of failing.
 */
export const getCountyCoordinates = (name: string): Coordinates => {
  return coordinatesByName.get(name) ?? NAIROBI_FALLBACK;
};
