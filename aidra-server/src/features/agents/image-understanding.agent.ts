import { Inject, Injectable, Logger } from '@nestjs/common';

import { StageResult } from '../../common/errors/stage-result';
import { aidraConfig, AidraConfig } from '../../config/aidra.config';
import type { ImageAssessment } from '../../shared/types/schemas';
import { ImageAssessmentOutputSchema } from './agent-output.schemas';
import { validateImageInput } from './image-input';
import type { InlineImage } from './model-client';
import {
  buildImageAssessmentPrompt,
  IMAGE_AGENT_SYSTEM_INSTRUCTION,
} from './prompts';
import { StructuredGenerator } from './structured-generator.service';

/**
 * Stage 1: photo -> structured hazard assessment. The only stage that ever
 * handles image bytes.
 */
@Injectable()
export class ImageUnderstandingAgent {
  private readonly logger = new Logger(ImageUnderstandingAgent.name);

  constructor(
    private readonly generator: StructuredGenerator,
    @Inject(aidraConfig.KEY) private readonly config: AidraConfig,
  ) {}

  async run(
    image: InlineImage,
    signal?: AbortSignal,
  ): Promise<StageResult<ImageAssessment>> {
    const checked = validateImageInput(image, this.config.maxImageBytes);
    if (!checked.ok) return checked;

    const result = await this.generator.generate(
      {
        purpose: 'image_assessment',
        model: this.config.model.imageModel,
        systemInstruction: IMAGE_AGENT_SYSTEM_INSTRUCTION,
        prompt: buildImageAssessmentPrompt(),
        image: checked.value,
        signal,
      },
      ImageAssessmentOutputSchema,
    );

    if (result.ok) {
      const { disaster_type, severity_score, hazards } = result.value;
      this.logger.debug(
        `Assessed ${disaster_type} (severity ${severity_score}, ` +
          `${hazards.length} hazards)`,
      );
    }
    return result;
  }
}
