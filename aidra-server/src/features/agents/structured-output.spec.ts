import { z } from 'zod';

import { SchemaValidationError } from '../../common/errors/analysis-errors';
import { parseStructured } from './structured-output';

const Schema = z.object({ hazards: z.array(z.string()).min(1) });

describe('parseStructured', () => {
  it('parses plain JSON', () => {
    const raw = '{"hazards":["smoke"]}';
    expect(parseStructured(raw, Schema, 'image_assessment')).toEqual({
      ok: true,
      value: { hazards: ['smoke'] },
    });
  });

  it('unwraps a fenced JSON block', () => {
    const raw = '```json\n{"hazards":["smoke"]}\n```';
    expect(parseStructured(raw, Schema, 'image_assessment')).toEqual({
      ok: true,
      value: { hazards: ['smoke'] },
    });
  });

  it.each([
    ['', 'image_assessment returned an empty response'],
    [
      'Here is the JSON you asked for',
      'image_assessment returned unparsable JSON',
    ],
    [
      '{"hazards":[]}',
      'image_assessment output failed validation: ' +
        'hazards: Array must contain at least 1 element(s)',
    ],
  ])('fails %j with a schema validation error', (raw, message) => {
    const result = parseStructured(raw, Schema, 'image_assessment');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(SchemaValidationError);
    expect(result.error.message).toBe(message);
  });
});
