/**
 * Shared plumbing for the OpenAI Images API backends
 */

import OpenAI from 'openai';
import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { logger } from '@/config/logger.js';
import { ImageGenerationError, errorMessage } from '@/shared/errors.js';
import type { ImageMode } from '@/shared/types.js';
import type { ImageServiceOptions } from '../../interfaces.js';

export interface OpenAIImageConfig {
  apiKey: string;
  baseURL?: string;
  options?: ImageServiceOptions;
}

/**
 * Replace the extension of `outputPath` so it matches `format`.
 * `jpeg` keeps an existing `.jpg` extension.
 */
export function withFormatExtension(outputPath: string, format: string): string {
  const parsed = path.parse(outputPath);
  const current = parsed.ext.toLowerCase().replace(/^\./, '');
  if (current === format || (format === 'jpeg' && current === 'jpg')) {
    return outputPath;
  }
  return path.join(parsed.dir, `${parsed.name}.${format}`);
}

export function mimeTypeFor(filePath: string): string {
  switch (path.extname(filePath).toLowerCase()) {
    case '.jpg':
    case '.jpeg':
      return 'image/jpeg';
    case '.webp':
      return 'image/webp';
    default:
      return 'image/png';
  }
}

export abstract class OpenAIImageServiceBase {
  public readonly provider = 'openai';
  public readonly model: string;
  protected readonly client: OpenAI;
  protected readonly options: ImageServiceOptions;

  constructor(config: OpenAIImageConfig, defaultModel: string) {
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
    });
    this.options = config.options ?? {};
    this.model = this.options.model || defaultModel;
  }

  /**
   * Decode the base64 payload and write it, creating parent directories.
   */
  protected async saveImage(b64Json: string | null | undefined, outputPath: string): Promise<string> {
    if (!b64Json) {
      throw new Error('No image data in response');
    }
    const buffer = Buffer.from(b64Json, 'base64');
    await mkdir(path.dirname(outputPath), { recursive: true });
    await writeFile(outputPath, buffer);

    logger.info('OpenAI: Image saved', {
      model: this.model,
      outputPath,
      imageSize: buffer.length,
    });
    return outputPath;
  }

  /**
   * Provider failures are logged and turned into a null result; they never
   * propagate out of generate() / edit().
   */
  protected handleFailure(mode: ImageMode, error: unknown, prompt: string): null {
    const failure = new ImageGenerationError({
      provider: this.provider,
      mode,
      message: `OpenAI ${mode} failed: ${errorMessage(error)}`,
      cause: error,
    });

    const status = error instanceof OpenAI.APIError ? error.status : undefined;
    logger.error('OpenAI: Image request failed', {
      error: failure.message,
      code: failure.code,
      status,
      model: this.model,
      mode,
      promptLength: prompt.length,
    });
    return null;
  }
}
