import { Inject, Injectable } from '@nestjs/common';

import { IncompleteInputError } from '../../common/errors/analysis-errors';
import { failure, StageResult } from '../../common/errors/stage-result';
import { aidraConfig, AidraConfig } from '../../config/aidra.config';
import type { SafetyAdvice } from '../../shared/types/schemas';
import { SafetyAdviceOutputSchema } from './agent-output.schemas';
import { SafetyAgentInput, SafetyAgentInputSchema } from './agent.types';
import { formatIssues } from './structured-output';
import {
  buildSafetyAdvicePrompt,
  SAFETY_AGENT_SYSTEM_INSTRUCTION,
} from './prompts';
import { StructuredGenerator } from './structured-generator.service';

/**
 * Stage 2: assessment -> safety advice. Text only; the request it builds has
 * no image part.
 */
@Injectable()
export class SafetyMeasuresAgent {
  constructor(
    private readonly generator: StructuredGenerator,
    @Inject(aidraConfig.KEY) private readonly config: AidraConfig,
  ) {}

  async run(
    input: SafetyAgentInput,
    signal?: AbortSignal,
  ): Promise<StageResult<SafetyAdvice>> {
    const checked = SafetyAgentInputSchema.safeParse(input);
    if (!checked.success) {
      return failure(
        new IncompleteInputError(
          'Safety stage received an incomplete assessment',
          formatIssues(checked.error),
        ),
      );
    }

    return this.generator.generate(
      {
        purpose: 'safety_advice',
        model: this.config.model.textModel,
        systemInstruction: SAFETY_AGENT_SYSTEM_INSTRUCTION,
        prompt: buildSafetyAdvicePrompt(checked.data),
        signal,
      },
      SafetyAdviceOutputSchema,
    );
  }
}
