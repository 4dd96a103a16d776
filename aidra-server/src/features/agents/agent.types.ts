import { z } from 'zod';

import {
  ContactRecordSchema,
  ImageAssessmentSchema,
  SafetyAdviceSchema,
} from '../../shared/types/schemas';

/**
 * What the safety stage may see: the assessment text, never the image. Only
 * type and hazards are required.
 */
export const SafetyAgentInputSchema = ImageAssessmentSchema.pick({
  disaster_type: true,
  hazards: true,
}).merge(
  ImageAssessmentSchema.pick({
    severity_score: true,
    detailed_analysis: true,
  }).partial(),
);

export type SafetyAgentInput = z.infer<typeof SafetyAgentInputSchema>;

export const ResponseAgentInputSchema = z.object({
  assessment: ImageAssessmentSchema,
  advice: SafetyAdviceSchema,
  contacts: z.array(ContactRecordSchema).min(1),
  countryCode: z.string().trim().min(1),
});

export type ResponseAgentInput = z.infer<typeof ResponseAgentInputSchema>;
