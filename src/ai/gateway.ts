/**
 * AI Gateway Factory
 * Creates the text and image services from environment configuration
 */

import type { Environment } from '@/config/environment.js';
import { logger } from '@/config/logger.js';
import { CredentialMissingError } from '@/shared/errors.js';
import type {
  AIProviderConfig,
  IImageGenerationService,
  ITextGenerationService,
} from './interfaces.js';
import { GoogleGenAITextService } from './providers/google-genai/text.js';
import { OpenAIGptImageService } from './providers/openai/image.js';
import { OpenAIDallEImageService } from './providers/openai/dall-e.js';

export function createTextService(apiKey: string, model?: string): ITextGenerationService {
  return new GoogleGenAITextService({ apiKey, ...(model && { model }) });
}

/**
 * Picks the image backend from the provider and model name.
 * Returns null when images are disabled or the model is not recognised; the
 * book is then produced without illustrations.
 */
export function createImageService(config: AIProviderConfig): IImageGenerationService | null {
  if (config.imageProvider === 'none') {
    logger.warn('Image provider disabled, pages will be text-only');
    return null;
  }

  const apiKey = config.credentials.openaiApiKey;
  if (!apiKey) {
    throw new CredentialMissingError(['OPENAI_API_KEY']);
  }

  const modelName = (config.image.model || 'gpt-image-1').toLowerCase();
  const options = { ...config.image, model: modelName };

  if (modelName.startsWith('gpt-image')) {
    logger.info('Creating GPT Image service', { model: modelName });
    return new OpenAIGptImageService({ apiKey, options });
  }
  if (modelName.startsWith('dall-e')) {
    logger.info('Creating DALL-E image service', { model: modelName });
    return new OpenAIDallEImageService({ apiKey, options });
  }

  logger.warn('Unknown OpenAI image model, cannot create image service', { model: modelName });
  return null;
}

export function imageProviderConfigFromEnvironment(env: Environment): AIProviderConfig {
  return {
    imageProvider: env.IMAGE_PROVIDER,
    credentials: {
      ...(env.OPENAI_API_KEY && { openaiApiKey: env.OPENAI_API_KEY }),
    },
    image: {
      model: env.OPENAI_IMAGE_MODEL,
      ...(env.OPENAI_IMAGE_QUALITY && { quality: env.OPENAI_IMAGE_QUALITY }),
      ...(env.OPENAI_IMAGE_STYLE && { style: env.OPENAI_IMAGE_STYLE }),
      ...(env.OPENAI_IMAGE_OUTPUT_FORMAT && { outputFormat: env.OPENAI_IMAGE_OUTPUT_FORMAT }),
      ...(env.OPENAI_IMAGE_OUTPUT_COMPRESSION !== undefined && {
        outputCompression: env.OPENAI_IMAGE_OUTPUT_COMPRESSION,
      }),
    },
  };
}
