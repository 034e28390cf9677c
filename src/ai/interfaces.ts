/**
 * AI Gateway Interfaces
 * Provider-agnostic interfaces for text and image generation services
 */

export interface ITextGenerationService {
  readonly provider: string;
  readonly model: string;

  /**
   * Complete a text generation request
   * @param prompt The input prompt
   */
  complete(prompt: string): Promise<string>;
}

interface ImageServiceBase {
  readonly provider: string;
  readonly model: string;

  /**
   * Generate an image from a text prompt and write it to `outputPath`
   * (parent directories are created).
   * Resolves to the path actually written, which may carry a different
   * extension than requested, or null when the provider call failed.
   */
  generate(prompt: string, outputPath: string, size?: string): Promise<string | null>;
}

export interface IGenerateOnlyImageService extends ImageServiceBase {
  readonly supportsEdit: false;
}

export interface IEditableImageService extends ImageServiceBase {
  readonly supportsEdit: true;

  /**
   * Produce a new image from one or more reference images guided by the prompt.
   * Same result contract as generate().
   */
  edit(prompt: string, inputImagePaths: readonly string[], outputPath: string): Promise<string | null>;
}

/**
 * Image backends advertise edit support through `supportsEdit`; callers
 * narrow on that flag rather than on the concrete class.
 */
export type IImageGenerationService = IGenerateOnlyImageService | IEditableImageService;

export type ImageOutputFormat = 'png' | 'jpeg' | 'webp';

/**
 * Per-backend options. Unset values fall back to the provider defaults.
 */
export interface ImageServiceOptions {
  model?: string;
  quality?: string;
  style?: string;
  outputFormat?: ImageOutputFormat;
  outputCompression?: number;
}

export interface AIProviderConfig {
  imageProvider: 'openai' | 'none';
  credentials: {
    openaiApiKey?: string;
  };
  image: ImageServiceOptions;
}
