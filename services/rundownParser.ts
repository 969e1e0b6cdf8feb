import type { AdvisoryReport } from '../types';
import { RUNDOWN_END, RUNDOWN_START } from './promptService';

/**
 * Splits the rundown block out of a model response.
 *
 * The model is asked, not guaranteed, to emit the markers. When the start marker is
 * missing, or no end marker follows it, the rundown is empty and the whole response
 * is the report.
 */
export function splitRundown(
  raw: string,
  startMarker: string = RUNDOWN_START,
  endMarker: string = RUNDOWN_END
): AdvisoryReport {
  const startIndex = raw.indexOf(startMarker);
  if (startIndex === -1) {
    return { rundown: '', fullReport: raw };
  }

  const rundownStart = startIndex + startMarker.length;
  const endIndex = raw.indexOf(endMarker, rundownStart);
  if (endIndex === -1) {
    return { rundown: '', fullReport: raw };
  }

  return {
    rundown: raw.slice(rundownStart, endIndex).trim(),
    fullReport: raw.slice(endIndex + endMarker.length).trim(),
  };
}
