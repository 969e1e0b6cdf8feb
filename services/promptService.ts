import type { FarmProfile } from '../types';

// Markers the model is asked to wrap the short rundown in, so it can be split from the full report.
export const RUNDOWN_START = '--- RUNDOWN ---';
export const RUNDOWN_END = '--- END RUNDOWN ---';

// Keeps follow-up prompts under the model's token limits.
export const MAX_PLAN_LENGTH_FOR_CHAT = 12_000;

export const CLIMATE_OUTLOOK_2026 = 'Heavy rains/floods followed by dry spells in 2026.';

const QUICK_PLAN_STYLE = `
PROVIDE A SHORT, ACTION-FOCUSED RESILIENCE PLAN with:
- 3–5 bullet points on the main climate risks for the farmer.
- 3–5 bullet points listing specific alternative crops and varieties.
- 3–5 bullet points outlining immediate next steps for the coming weeks.
Keep it clear and practical. Add one short paragraph on how farmers in other Kenyan counties with similar conditions can adapt the same ideas.
`;

const DETAILED_PLAN_STYLE = `
PROVIDE A COMPREHENSIVE RESILIENCE STRATEGY with these sections:

1. **CLIMATE RISK ASSESSMENT**
   - Why is the current crop at risk in 2026 given the forecasted weather?
   - Specific vulnerabilities for the given soil type and local microclimate.

2. **RECOMMENDED PIVOT CROPS (Short-cycle alternatives)**
   - Suggest 3–4 specific crop varieties suitable for the farmer's location and county.
   - Include expected maturity period and yield potential.
   - Explain how each handles flood/drought cycles.

3. **LOCAL SUPPLIER RECOMMENDATIONS**
   - Name 2–3 likely types of agrovets or seed suppliers in the area.
   - What seeds/inputs they typically stock and timeframe to source.

4. **IMPLEMENTATION TIMELINE**
   - Weekly action steps for immediate preparation (Feb–March 2026).
   - Soil preparation for the given soil type and planting schedule aligned with weather.

5. **RISK MITIGATION PRACTICES**
   - Water harvest/conservation, soil amendments, crop insurance or safety nets in Kenya.

Close with a brief note on adapting this plan for other Kenyan counties with different microclimates.
`;

const RUNDOWN_INSTRUCTION = `
FIRST output a very short RUNDOWN (under 80 words) in this exact format, then a blank line, then the full plan:

${RUNDOWN_START}
Advisable to grow [crop] now: Yes or No
Current season: [e.g. Short rains / Long rains / Dry]
Best season for [crop]: [e.g. Long rains, March–May]
Tips: • One short tip • Another • One more
${RUNDOWN_END}

Then continue with the full resilience plan as requested below.
`;

export const buildPlanPrompt = (profile: FarmProfile): string => {
  const planStyle = profile.quickPlan ? QUICK_PLAN_STYLE : DETAILED_PLAN_STYLE;

  return `
Act as an expert Kenyan Agricultural Scientist for smallholder farming across all 47 counties of Kenya in 2026.

CONTEXT:
- Weather forecast: ${CLIMATE_OUTLOOK_2026}
- Farmer county: ${profile.county}
- Farmer local area: ${profile.location}
- Soil type: ${profile.soilType}
- Currently growing: ${profile.plantedCrop}

${RUNDOWN_INSTRUCTION}

The plan must be grounded in the selected county and relevant to farmers across Kenya's 47 counties.

${planStyle}
`;
};

export const PLAN_OPEN = '--- PLAN ---';
export const PLAN_CLOSE = '--- END PLAN ---';

/**
 * Follow-up prompt over the stored plan. Reports longer than `maxLength` are cut,
 * so the model never sees content past that point.
 */
export const buildChatPrompt = (
  report: string,
  question: string,
  maxLength: number = MAX_PLAN_LENGTH_FOR_CHAT
): string => {
  const planSnippet = report.slice(0, maxLength);
  return (
    "Use this resilience plan as the only source. Answer the user's question " +
    'briefly and practically. If they ask for another report or summary, provide it.\n\n' +
    `${PLAN_OPEN}\n${planSnippet}\n${PLAN_CLOSE}\n\nUser question: ${question}`
  );
};
