import { Inject, Injectable, Logger } from '@nestjs/common';

import {
  IncompleteInputError,
  SchemaValidationError,
} from '../../common/errors/analysis-errors';
import {
  failure,
  StageResult,
  success,
} from '../../common/errors/stage-result';
import { aidraConfig, AidraConfig } from '../../config/aidra.config';
import {
  EmergencyReport,
  EmergencyReportSchema,
  SafetyAdvice,
} from '../../shared/types/schemas';
import { groundedDraftSchema } from './agent-output.schemas';
import { ResponseAgentInput, ResponseAgentInputSchema } from './agent.types';
import {
  buildResponsePrompt,
  RESPONSE_AGENT_SYSTEM_INSTRUCTION,
} from './prompts';
import { classifyRisk, maxRiskLevel } from './risk-policy';
import { formatIssues } from './structured-output';
import { StructuredGenerator } from './structured-generator.service';

const flattenAdvice = (advice: SafetyAdvice): string[] => [
  ...advice.personal_safety,
  ...advice.preventive_actions,
  ...advice.risk_mitigation_checklist,
];

/**
 * Stage 3: assessment + advice + directory contacts -> final report.
 *
 * Risk comes from the deterministic policy; the model may raise it but never
 * lower it. Contacts in the report are always the directory's.
 */
@Injectable()
export class ResponseSynthesisAgent {
  private readonly logger = new Logger(ResponseSynthesisAgent.name);

  constructor(
    private readonly generator: StructuredGenerator,
    @Inject(aidraConfig.KEY) private readonly config: AidraConfig,
  ) {}

  async run(
    input: ResponseAgentInput,
    signal?: AbortSignal,
  ): Promise<StageResult<EmergencyReport>> {
    const checked = ResponseAgentInputSchema.safeParse(input);
    if (!checked.success) {
      return failure(
        new IncompleteInputError(
          'Response stage received incomplete input',
          formatIssues(checked.error),
        ),
      );
    }
    const { assessment, advice, contacts } = checked.data;

    const drafted = await this.generator.generate(
      {
        purpose: 'response_synthesis',
        model: this.config.model.textModel,
        systemInstruction: RESPONSE_AGENT_SYSTEM_INSTRUCTION,
        prompt: buildResponsePrompt(checked.data),
        signal,
      },
      groundedDraftSchema(contacts),
    );
    if (!drafted.ok) return drafted;
    const draft = drafted.value;

    const policy = classifyRisk(assessment, this.config.risk);
    const riskLevel = maxRiskLevel(policy.risk_level, draft.risk_level);
    if (riskLevel !== policy.risk_level) {
      this.logger.log(
        `Model escalated risk from ${policy.risk_level} to ${riskLevel}`,
      );
    }

    const report = EmergencyReportSchema.safeParse({
      disaster_type: assessment.disaster_type,
      confidence: assessment.severity_score / 100,
      risk_level: riskLevel,
      lives_in_danger: policy.lives_in_danger || draft.lives_in_danger,
      analysis: assessment.detailed_analysis,
      hazards: assessment.hazards,
      immediate_instructions: draft.step_by_step_instructions,
      safety_measures: flattenAdvice(advice),
      emergency_contacts: contacts,
      optional_script: draft.what_to_say,
    });
    if (!report.success) {
      return failure(
        new SchemaValidationError(
          'Final report failed validation',
          formatIssues(report.error),
        ),
      );
    }
    return success(report.data);
  }
}
