import { Inject, Injectable, Logger } from '@nestjs/common';
import { GoogleGenAI, type Part } from '@google/genai';

import { aidraConfig, AidraConfig } from '../../config/aidra.config';
import { ModelClient, ModelRequest, toModelError } from './model-client';

@Injectable()
export class GeminiModelClient implements ModelClient {
  private readonly logger = new Logger(GeminiModelClient.name);
  private readonly ai: GoogleGenAI;

  constructor(@Inject(aidraConfig.KEY) config: AidraConfig) {
    this.ai = new GoogleGenAI({ apiKey: config.geminiApiKey });
  }

  async generateJson(request: ModelRequest): Promise<string> {
    const parts: Part[] = [{ text: request.prompt }];
    if (request.image) {
      parts.push({
        inlineData: {
          mimeType: request.image.mimeType,
          data: request.image.data.toString('base64'),
        },
      });
    }

    try {
      const response = await this.ai.models.generateContent({
        model: request.model,
        contents: [{ role: 'user', parts }],
        config: {
          systemInstruction: request.systemInstruction,
          responseMimeType: 'application/json',
          abortSignal: request.signal,
        },
      });

      const text = response.text ?? '';
      this.logger.debug(`${request.purpose} raw response: ${text}`);
      return text;
    } catch (error) {
      throw toModelError(error, request.signal);
    }
  }
}
