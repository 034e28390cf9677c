/**
 * OpenAI GPT Image Service (gpt-image-*)
 * Supports generation from a prompt and editing from reference images.
 */

import { readFile } from 'fs/promises';
import path from 'path';
import { toFile } from 'openai';
import { logger } from '@/config/logger.js';
import type { IEditableImageService } from '../../interfaces.js';
import {
  OpenAIImageServiceBase,
  mimeTypeFor,
  withFormatExtension,
  type OpenAIImageConfig,
} from './image-base.js';

type GptImageSize = '1024x1024' | '1536x1024' | '1024x1536' | 'auto';
type GptImageQuality = 'low' | 'medium' | 'high' | 'auto';

const VALID_SIZES: readonly GptImageSize[] = ['1024x1024', '1536x1024', '1024x1536', 'auto'];
const VALID_QUALITIES: readonly GptImageQuality[] = ['low', 'medium', 'high', 'auto'];
const DEFAULT_SIZE: GptImageSize = '1536x1024';

function isGptImageSize(value: string): value is GptImageSize {
  return VALID_SIZES.some((s) => s === value);
}

function isGptImageQuality(value: string): value is GptImageQuality {
  return VALID_QUALITIES.some((q) => q === value);
}

export class OpenAIGptImageService extends OpenAIImageServiceBase implements IEditableImageService {
  public readonly supportsEdit = true;

  constructor(config: OpenAIImageConfig) {
    super(config, 'gpt-image-1');

    if (!this.model.startsWith('gpt-image')) {
      logger.warn('OpenAIGptImageService initialized with non-GPT-Image model', { model: this.model });
    }
    if (this.options.quality && !isGptImageQuality(this.options.quality)) {
      logger.warn('Ignoring unsupported GPT Image quality', { quality: this.options.quality });
    }
    logger.info('OpenAI GPT Image Service initialized', { model: this.model });
  }

  async generate(prompt: string, outputPath: string, size: string = DEFAULT_SIZE): Promise<string | null> {
    const finalPath = this.resolveOutputPath(outputPath);
    try {
      const finalSize = isGptImageSize(size) ? size : DEFAULT_SIZE;
      if (finalSize !== size) {
        logger.warn('OpenAI: Unsupported size for GPT Image, using default', { size, finalSize });
      }

      const format = this.formatParams();
      logger.info('OpenAI: Generating GPT Image', {
        model: this.model,
        promptPreview: prompt.slice(0, 50),
        size: finalSize,
        ...format,
      });

      const response = await this.client.images.generate({
        model: this.model,
        prompt,
        n: 1,
        size: finalSize,
        ...format,
      });
      return await this.saveImage(response.data?.[0]?.b64_json, finalPath);
    } catch (error) {
      return this.handleFailure('generate', error, prompt);
    }
  }

  async edit(prompt: string, inputImagePaths: readonly string[], outputPath: string): Promise<string | null> {
    const finalPath = this.resolveOutputPath(outputPath);
    try {
      if (inputImagePaths.length === 0) {
        throw new Error('At least one input image is required for editing');
      }

      const images = await Promise.all(
        inputImagePaths.map(async (imagePath) =>
          toFile(await readFile(imagePath), path.basename(imagePath), { type: mimeTypeFor(imagePath) }),
        ),
      );

      const format = this.formatParams();
      logger.info('OpenAI: Editing GPT Image', {
        model: this.model,
        promptPreview: prompt.slice(0, 50),
        referenceCount: images.length,
        ...format,
      });

      const response = await this.client.images.edit({
        model: this.model,
        prompt,
        image: images,
        n: 1,
        ...format,
      });
      return await this.saveImage(response.data?.[0]?.b64_json, finalPath);
    } catch (error) {
      return this.handleFailure('edit', error, prompt);
    }
  }

  /**
   * An explicit output format forces the file extension to match.
   */
  private resolveOutputPath(outputPath: string): string {
    const format = this.options.outputFormat;
    if (!format) return outputPath;

    const adjusted = withFormatExtension(outputPath, format);
    if (adjusted !== outputPath) {
      logger.info('OpenAI: Adjusted output path to match format', { outputPath: adjusted });
    }
    return adjusted;
  }

  private formatParams(): {
    quality?: GptImageQuality;
    output_format?: 'png' | 'jpeg' | 'webp';
    output_compression?: number;
  } {
    const { quality, outputFormat, outputCompression } = this.options;
    return {
      ...(quality && isGptImageQuality(quality) && { quality }),
      ...(outputFormat && { output_format: outputFormat }),
      ...(outputCompression !== undefined && { output_compression: outputCompression }),
    };
  }
}
