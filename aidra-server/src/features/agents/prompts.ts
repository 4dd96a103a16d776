import { DISASTER_TYPES } from '../../shared/types/schemas';
import type { ResponseAgentInput, SafetyAgentInput } from './agent.types';

const JSON_ONLY = [
  'Respond ONLY with one valid JSON object.',
  'No markdown, no commentary, no text before or after it.',
].join(' ');

export const IMAGE_AGENT_SYSTEM_INSTRUCTION = [
  'You are a precise, analytical disaster assessment system.',
  'You look at a single photo and describe only what is visible in it.',
  JSON_ONLY,
].join(' ');

export const SAFETY_AGENT_SYSTEM_INSTRUCTION = [
  'You are a disaster preparedness expert and public safety advisor.',
  'You give clear, actionable safety advice to civilians',
  'based on a written hazard assessment.',
  JSON_ONLY,
].join(' ');

export const RESPONSE_AGENT_SYSTEM_INSTRUCTION = [
  'You are a calm, authoritative emergency response dispatcher.',
  'You combine an assessment, safety advice and verified emergency contacts',
  'into one final plan for a civilian.',
  'You never invent phone numbers:',
  'only numbers from the verified contact list may appear in your answer.',
  JSON_ONLY,
].join(' ');

const bullets = (items: readonly string[]): string =>
  items.map((item) => `  - ${item}`).join('\n');

const quotedTypes = DISASTER_TYPES.map((type) => `"${type}"`).join(', ');

export const buildImageAssessmentPrompt = (): string => `\
Analyze the attached disaster image.
Base every field only on what you can see.

Return a JSON object with exactly these fields:
{
  "disaster_type": string, one of ${quotedTypes},
  "hazards": string[], the specific visible dangers, most serious first
    (e.g. "Heavy smoke", "Submerged vehicles", "Damaged power lines"),
  "severity_score": integer from 0 (minor) to 100 (catastrophic),
  "detailed_analysis": string, a 2-3 sentence technical description
}`;

export const buildSafetyAdvicePrompt = (input: SafetyAgentInput): string => {
  const lines = [
    'A disaster has been identified.',
    '',
    'Assessment:',
    `- Type: ${input.disaster_type}`,
    `- Hazards:\n${bullets(input.hazards)}`,
  ];
  if (input.severity_score !== undefined) {
    lines.push(`- Severity: ${input.severity_score}/100`);
  }
  if (input.detailed_analysis) {
    lines.push(`- Details: ${input.detailed_analysis}`);
  }

  return `${lines.join('\n')}

Based on this assessment, return a JSON object with exactly these fields:
{
  "personal_safety": string[], immediate steps for personal protection,
  "preventive_actions": string[], actions that stop things getting worse,
  "risk_mitigation_checklist": string[], a short to-do list to tick off
}
Every list must contain at least one item.`;
};

export const buildResponsePrompt = (input: ResponseAgentInput): string => `\
Synthesize everything below into one final, actionable plan.

Context:
- Country: ${input.countryCode}
- Disaster type: ${input.assessment.disaster_type}
- Severity: ${input.assessment.severity_score}/100
- Hazards:
${bullets(input.assessment.hazards)}
- Analysis: ${input.assessment.detailed_analysis}
- Safety advice:
${JSON.stringify(input.advice, null, 2)}
- Verified emergency contacts (the ONLY numbers you may use):
${JSON.stringify(input.contacts, null, 2)}

Return a JSON object with exactly these fields:
{
  "risk_level": one of "low", "moderate", "high", "critical",
  "lives_in_danger": boolean, whether lives are in immediate danger,
  "step_by_step_instructions": string[], numbered steps, most urgent first,
  "what_to_say": string, a short script to read to the emergency operator,
  "emergency_contacts": [{ "service_name": string, "phone_number": string }],
    copied from the verified list
}`;
