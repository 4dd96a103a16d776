import { z } from 'zod';

export const DISASTER_TYPES = [
  'fire',
  'flood',
  'earthquake',
  'road_accident',
  'building_collapse',
  'chemical_leak',
  'landslide',
  'storm',
  'other',
] as const;

export const RISK_LEVELS = ['low', 'moderate', 'high', 'critical'] as const;

export const DisasterTypeSchema = z.enum(DISASTER_TYPES);
export const RiskLevelSchema = z.enum(RISK_LEVELS);

const Text = z.string().trim().min(1);
const TextList = z.array(Text).min(1);

export const ImageAssessmentSchema = z.object({
  disaster_type: DisasterTypeSchema,
  hazards: TextList,
  severity_score: z.number().min(0).max(100), // 0 minor .. 100 catastrophic
  detailed_analysis: Text,
});

export const SafetyAdviceSchema = z.object({
  personal_safety: TextList,
  preventive_actions: TextList,
  risk_mitigation_checklist: TextList,
});

export const ContactRecordSchema = z.object({
  service_name: Text,
  phone_number: z
    .string()
    .trim()
    .regex(
      /^\+?[0-9][0-9 ()-]*$/,
      'phone_number must contain only digits and separators',
    ),
});

export const EmergencyReportSchema = z.object({
  disaster_type: DisasterTypeSchema,
  confidence: z.number().min(0).max(1),
  risk_level: RiskLevelSchema,
  lives_in_danger: z.boolean(),
  analysis: Text,
  hazards: TextList,
  immediate_instructions: TextList,
  safety_measures: TextList,
  emergency_contacts: z.array(ContactRecordSchema).min(1),
  optional_script: z.string(),
});

export const SessionRecordSchema = z.object({
  session_id: Text,
  last_disaster_type: DisasterTypeSchema,
  last_risk_level: RiskLevelSchema,
  last_lives_in_danger: z.boolean(),
  analysis_count: z.number().int().positive(),
  last_updated_timestamp: z.string().datetime(),
});

export type DisasterType = z.infer<typeof DisasterTypeSchema>;
export type RiskLevel = z.infer<typeof RiskLevelSchema>;
export type ImageAssessment = z.infer<typeof ImageAssessmentSchema>;
export type SafetyAdvice = z.infer<typeof SafetyAdviceSchema>;
export type ContactRecord = z.infer<typeof ContactRecordSchema>;
export type EmergencyReport = z.infer<typeof EmergencyReportSchema>;
export type SessionRecord = z.infer<typeof SessionRecordSchema>;
