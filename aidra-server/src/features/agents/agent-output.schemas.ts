import { z } from 'zod';

import { normalizeDisasterType } from '../../shared/lib/disaster-type';
import {
  ContactRecord,
  ContactRecordSchema,
  ImageAssessmentSchema,
  RiskLevelSchema,
  SafetyAdviceSchema,
} from '../../shared/types/schemas';

export const ImageAssessmentOutputSchema = ImageAssessmentSchema.extend({
  disaster_type: z.string().trim().min(1).transform(normalizeDisasterType),
  // A fractional score fails here and is retried; its scale is never guessed.
  severity_score: z.number().int().min(0).max(100),
});

export const SafetyAdviceOutputSchema = SafetyAdviceSchema;

const ModelRiskLevelSchema = z
  .string()
  .trim()
  .toLowerCase()
  .transform((level) => (level === 'medium' ? 'moderate' : level))
  .pipe(RiskLevelSchema);

// Models answer with either a list of records or a { service: number } map.
const ModelContactsSchema = z
  .union([z.array(ContactRecordSchema), z.record(z.string())])
  .transform((contacts): ContactRecord[] =>
    Array.isArray(contacts)
      ? contacts
      : Object.entries(contacts).map(([service_name, phone_number]) => ({
          service_name,
          phone_number,
        })),
  );

export const ResponseDraftSchema = z.object({
  risk_level: ModelRiskLevelSchema,
  lives_in_danger: z.boolean(),
  step_by_step_instructions: z.array(z.string().trim().min(1)).min(1),
  what_to_say: z.string().trim().default(''),
  emergency_contacts: ModelContactsSchema.optional(),
});

export type ResponseDraft = z.infer<typeof ResponseDraftSchema>;

export const phoneDigits = (phone: string): string => phone.replace(/\D/g, '');

/**
 * Draft schema that also rejects any phone number the directory did not
 * supply, so a fabricated number fails the same gate as malformed JSON.
 */
export const groundedDraftSchema = (directory: readonly ContactRecord[]) => {
  const allowed = new Set(
    directory.map((record) => phoneDigits(record.phone_number)),
  );

  return ResponseDraftSchema.superRefine((draft, ctx) => {
    (draft.emergency_contacts ?? []).forEach((contact, index) => {
      if (!allowed.has(phoneDigits(contact.phone_number))) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message:
            `phone number "${contact.phone_number}" for ` +
            `${contact.service_name} is not in the emergency directory`,
          path: ['emergency_contacts', index, 'phone_number'],
        });
      }
    });
  });
};
