import type { RiskThresholds } from '../../config/aidra.config';
import { RISK_LEVELS, RiskLevel } from '../../shared/types/schemas';

export const LIFE_THREATENING_KEYWORDS = [
  'trapped',
  'unconscious',
  'drowning',
  'casualt',
  'fatalit',
  'injured',
  'injuries',
  'bleeding',
  'people inside',
  'person inside',
  'victims',
  'explosion',
  'electrocution',
  'not breathing',
] as const;

export type RiskClassification = {
  risk_level: RiskLevel;
  lives_in_danger: boolean;
};

export const hasLifeThreateningHazard = (hazards: readonly string[]): boolean =>
  hazards.some((hazard) => {
    const text = hazard.toLowerCase();
    return LIFE_THREATENING_KEYWORDS.some((keyword) => text.includes(keyword));
  });

/**
 * Deterministic risk policy. Severity at or above the critical threshold, or
 * any life-threatening hazard, is critical with lives in danger; otherwise
 * the score bands map to low/moderate/high. Monotone in severity for a fixed
 * hazard list.
 */
export const classifyRisk = (
  input: { severity_score: number; hazards: readonly string[] },
  thresholds: RiskThresholds,
): RiskClassification => {
  const score = input.severity_score;

  if (score >= thresholds.critical || hasLifeThreateningHazard(input.hazards)) {
    return { risk_level: 'critical', lives_in_danger: true };
  }
  if (score >= thresholds.high) {
    return { risk_level: 'high', lives_in_danger: false };
  }
  if (score >= thresholds.moderate) {
    return { risk_level: 'moderate', lives_in_danger: false };
  }
  return { risk_level: 'low', lives_in_danger: false };
};

export const riskRank = (level: RiskLevel): number =>
  RISK_LEVELS.indexOf(level);

export const maxRiskLevel = (a: RiskLevel, b: RiskLevel): RiskLevel =>
  riskRank(a) >= riskRank(b) ? a : b;
