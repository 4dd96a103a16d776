import { Module } from '@nestjs/common';

import { GeminiModelClient } from './gemini-model.client';
import { ImageUnderstandingAgent } from './image-understanding.agent';
import { MODEL_CLIENT } from './model-client';
import { ResponseSynthesisAgent } from './response-synthesis.agent';
import { SafetyMeasuresAgent } from './safety-measures.agent';
import { StructuredGenerator } from './structured-generator.service';

@Module({
  providers: [
    { provide: MODEL_CLIENT, useClass: GeminiModelClient },
    StructuredGenerator,
    ImageUnderstandingAgent,
    SafetyMeasuresAgent,
    ResponseSynthesisAgent,
  ],
  exports: [
    ImageUnderstandingAgent,
    SafetyMeasuresAgent,
    ResponseSynthesisAgent,
  ],
})
export class AgentsModule {}
