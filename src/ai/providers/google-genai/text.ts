/**
 * Google GenAI Text Generation Service
 */

import { GoogleGenerativeAI } from '@google/generative-ai';
import type { ITextGenerationService } from '../../interfaces.js';
import { logger } from '@/config/logger.js';
import { TextGenerationError, errorMessage } from '@/shared/errors.js';

export interface GoogleGenAITextConfig {
  apiKey: string;
  model?: string;
}

export class GoogleGenAITextService implements ITextGenerationService {
  public readonly provider = 'google-genai';
  public readonly model: string;
  private genAI: GoogleGenerativeAI;

  constructor(config: GoogleGenAITextConfig) {
    this.genAI = new GoogleGenerativeAI(config.apiKey);
    this.model = config.model || 'gemini-2.5-pro';

    logger.info('Google GenAI Text Service initialized', {
      model: this.model,
    });
  }

  async complete(prompt: string): Promise<string> {
    try {
      const generativeModel = this.genAI.getGenerativeModel({ model: this.model });
      const result = await generativeModel.generateContent(prompt);
      const text = result.response.text();

      logger.debug('Google GenAI text completion received', {
        model: this.model,
        promptLength: prompt.length,
        responseLength: text.length,
      });

      return text;
    } catch (error) {
      logger.error('Google GenAI text generation failed', {
        error: errorMessage(error),
        model: this.model,
      });
      throw new TextGenerationError({
        provider: this.provider,
        message: `Google GenAI text generation failed: ${errorMessage(error)}`,
        cause: error,
      });
    }
  }
}
