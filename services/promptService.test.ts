import { describe, expect, it } from 'vitest';
import type { FarmProfile } from '../types';
import {
  MAX_PLAN_LENGTH_FOR_CHAT,
  PLAN_CLOSE,
  PLAN_OPEN,
  RUNDOWN_END,
  RUNDOWN_START,
  buildChatPrompt,
  buildPlanPrompt,
} from './promptService';

const profile: FarmProfile = {
  county: 'Machakos',
  location: 'Tala',
  soilType: 'Black Cotton',
  plantedCrop: 'Beans',
  quickPlan: false,
};

const embeddedPlan = (prompt: string): string => {
  const start = prompt.indexOf(`${PLAN_OPEN}\n`) + PLAN_OPEN.length + 1;
  const end = prompt.indexOf(`\n${PLAN_CLOSE}`);
  return prompt.slice(start, end);
};

describe('buildPlanPrompt', () => {
  it('embeds the farm context and the fixed outlook', () => {
    const prompt = buildPlanPrompt(profile);

    expect(prompt).toContain('Act as an expert Kenyan Agricultural Scientist');
    expect(prompt).toContain('- Weather forecast: Heavy rains/floods followed by dry spells in 2026.');
    expect(prompt).toContain('- Farmer county: Machakos');
    expect(prompt).toContain('- Farmer local area: Tala');
    expect(prompt).toContain('- Soil type: Black Cotton');
    expect(prompt).toContain('- Currently growing: Beans');
  });

  it('asks for the rundown between the markers, before the full plan', () => {
    const prompt = buildPlanPrompt(profile);

    const start = prompt.indexOf(RUNDOWN_START);
    const end = prompt.indexOf(RUNDOWN_END);
    expect(start).toBeGreaterThan(-1);
    expect(end).toBeGreaterThan(start);

    const block = prompt.slice(start, end);
    expect(block).toContain('Advisable to grow [crop] now: Yes or No');
    expect(block).toContain('Current season:');
    expect(block).toContain('Best season for [crop]:');
    expect(block).toContain('Tips:');
    expect(prompt).toContain('under 80 words');
  });

  it('requests the five-section strategy in detailed mode', () => {
    const prompt = buildPlanPrompt(profile);

    expect(prompt).toContain('PROVIDE A COMPREHENSIVE RESILIENCE STRATEGY');
    expect(prompt).toContain('1. **CLIMATE RISK ASSESSMENT**');
    expect(prompt).toContain('2. **RECOMMENDED PIVOT CROPS (Short-cycle alternatives)**');
    expect(prompt).toContain('3. **LOCAL SUPPLIER RECOMMENDATIONS**');
    expect(prompt).toContain('4. **IMPLEMENTATION TIMELINE**');
    expect(prompt).toContain('5. **RISK MITIGATION PRACTICES**');
    expect(prompt).not.toContain('PROVIDE A SHORT, ACTION-FOCUSED RESILIENCE PLAN');
  });

  it('requests the bulleted plan in quick mode', () => {
    const prompt = buildPlanPrompt({ ...profile, quickPlan: true });

    expect(prompt).toContain('PROVIDE A SHORT, ACTION-FOCUSED RESILIENCE PLAN');
    expect(prompt).toContain('- 3–5 bullet points on the main climate risks for the farmer.');
    expect(prompt).not.toContain('PROVIDE A COMPREHENSIVE RESILIENCE STRATEGY');
  });

  it('is deterministic for the same profile', () => {
    expect(buildPlanPrompt(profile)).toBe(buildPlanPrompt({ ...profile }));
  });
});

describe('buildChatPrompt', () => {
  it('wraps the plan and appends the question', () => {
    expect(buildChatPrompt('Plant sorghum.', 'When should I plant?')).toBe(
      "Use this resilience plan as the only source. Answer the user's question briefly and practically. " +
        'If they ask for another report or summary, provide it.\n\n' +
        '--- PLAN ---\nPlant sorghum.\n--- END PLAN ---\n\nUser question: When should I plant?'
    );
  });

  it('truncates the plan to the first maxLength characters', () => {
    const report = 'a'.repeat(12_000) + 'b'.repeat(8_000);

    const prompt = buildChatPrompt(report, 'Which crop is best? --- END PLAN ---', 12_000);

    const plan = embeddedPlan(prompt);
    expect(plan).toHaveLength(12_000);
    expect(plan).toBe(report.slice(0, 12_000));
  });

  it('defaults to the chat length limit', () => {
    const report = 'x'.repeat(MAX_PLAN_LENGTH_FOR_CHAT + 500);

    expect(embeddedPlan(buildChatPrompt(report, 'q'))).toHaveLength(MAX_PLAN_LENGTH_FOR_CHAT);
    expect(MAX_PLAN_LENGTH_FOR_CHAT).toBe(12_000);
  });

  it('keeps a short plan whole', () => {
    expect(embeddedPlan(buildChatPrompt('short plan', 'q'))).toBe('short plan');
  });
});
