import type { InlineImage } from '../../src/features/agents/model-client';

export const PNG_BYTES = Buffer.concat([
  Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]),
  Buffer.from('placeholder-image-body'),
]);

export const JPEG_BYTES = Buffer.from([
  0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10, 0x4a, 0x46,
]);

export const pngImage = (): InlineImage => ({
  data: PNG_BYTES,
  mimeType: 'image/png',
});

export const FIRE_ASSESSMENT = {
  disaster_type: 'Structural Fire',
  hazards: ['Heavy smoke', 'Open flames on upper floors'],
  severity_score: 72,
  detailed_analysis:
    'A two-storey house is burning with flames on the upper floor.',
};

export const FLOOD_ASSESSMENT = {
  disaster_type: 'Flash Flood',
  hazards: ['Rising water', 'People trapped on rooftops'],
  severity_score: 55,
  detailed_analysis:
    'A street is under water and residents are waiting on rooftops.',
};

export const SAFETY_ADVICE = {
  personal_safety: ['Stay low to avoid smoke'],
  preventive_actions: ['Keep doors closed behind you'],
  risk_mitigation_checklist: ['Confirm everyone is out of the building'],
};

export const FIRE_ASSESSMENT_REPLY = JSON.stringify(FIRE_ASSESSMENT);
export const FLOOD_ASSESSMENT_REPLY = JSON.stringify(FLOOD_ASSESSMENT);
export const SAFETY_REPLY = JSON.stringify(SAFETY_ADVICE);

/** Keys set to `undefined` are left out of the JSON entirely. */
export const draftReply = (overrides: Record<string, unknown> = {}): string =>
  JSON.stringify({
    risk_level: 'High',
    lives_in_danger: false,
    step_by_step_instructions: [
      'Move away from the building',
      'Call the fire brigade',
    ],
    what_to_say: 'There is a building fire at my location.',
    ...overrides,
  });
