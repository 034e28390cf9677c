/**
 * OpenAI DALL-E Service (dall-e-2, dall-e-3)
 * Generation only: this backend does not advertise edit support.
 */

import { logger } from '@/config/logger.js';
import type { IGenerateOnlyImageService } from '../../interfaces.js';
import { OpenAIImageServiceBase, type OpenAIImageConfig } from './image-base.js';

type DallESize = '256x256' | '512x512' | '1024x1024' | '1792x1024' | '1024x1792';

const DALL_E_3_SIZES: readonly DallESize[] = ['1024x1024', '1792x1024', '1024x1792'];
const DALL_E_2_SIZES: readonly DallESize[] = ['256x256', '512x512', '1024x1024'];

export class OpenAIDallEImageService extends OpenAIImageServiceBase implements IGenerateOnlyImageService {
  public readonly supportsEdit = false;

  constructor(config: OpenAIImageConfig) {
    super(config, 'dall-e-3');

    if (!this.model.startsWith('dall-e')) {
      logger.warn('OpenAIDallEImageService initialized with non-DALL-E model', { model: this.model });
    }
    logger.info('OpenAI DALL-E Image Service initialized', { model: this.model });
  }

  async generate(prompt: string, outputPath: string, size: string = '1024x1024'): Promise<string | null> {
    try {
      const finalSize = this.resolveSize(size);
      const { quality, style } = this.options;

      logger.info('OpenAI: Generating DALL-E image', {
        model: this.model,
        promptPreview: prompt.slice(0, 50),
        size: finalSize,
      });

      const response = await this.client.images.generate({
        model: this.model,
        prompt,
        n: 1,
        size: finalSize,
        response_format: 'b64_json',
        ...(quality === 'standard' || quality === 'hd' ? { quality } : {}),
        ...(style === 'vivid' || style === 'natural' ? { style } : {}),
      });
      return await this.saveImage(response.data?.[0]?.b64_json, outputPath);
    } catch (error) {
      return this.handleFailure('generate', error, prompt);
    }
  }

  private resolveSize(size: string): DallESize {
    const valid = this.model === 'dall-e-2' ? DALL_E_2_SIZES : DALL_E_3_SIZES;
    const match = valid.find((s) => s === size);
    if (match) return match;

    logger.warn('OpenAI: Unsupported size for DALL-E, using 1024x1024', { size, model: this.model });
    return '1024x1024';
  }
}
