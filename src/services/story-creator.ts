/**
 * Story Creator
 * Orchestrates one book: story text -> pages -> illustrations -> metadata.
 */

import { createImageService, createTextService, imageProviderConfigFromEnvironment } from '@/ai/gateway.js';
import type { IImageGenerationService, ITextGenerationService } from '@/ai/interfaces.js';
import { resolveCredentials, type Environment } from '@/config/environment.js';
import { logger } from '@/config/logger.js';
import { TextGenerationError, errorMessage } from '@/shared/errors.js';
import type { Book, StoryConfig } from '@/shared/types.js';
import { assembleBook, deriveBookTitle, resolveBookOutputDir } from './book-assembler.js';
import { persistBook } from './metadata-persister.js';
import { DEFAULT_IMAGE_SIZE } from './page-worker.js';
import { createLoggerObserver, type PipelineObserver } from './pipeline-events.js';
import { buildStoryPrompt } from './prompt.js';
import { segmentStory } from './segmentation.js';

export const MIN_STORY_LENGTH = 50;

export interface StoryCreatorOptions {
  config: StoryConfig;
  textService: ITextGenerationService;
  /** null produces a text-only book */
  imageService: IImageGenerationService | null;
  outputBaseDir: string;
  imageSize?: string;
  observer?: PipelineObserver;
  clock?: () => Date;
}

export class StoryCreator {
  private readonly config: StoryConfig;
  private readonly textService: ITextGenerationService;
  private readonly imageService: IImageGenerationService | null;
  private readonly outputBaseDir: string;
  private readonly imageSize: string;
  private readonly observer: PipelineObserver;
  private readonly clock: () => Date;

  constructor(options: StoryCreatorOptions) {
    this.config = options.config;
    this.textService = options.textService;
    this.imageService = options.imageService;
    this.outputBaseDir = options.outputBaseDir;
    this.imageSize = options.imageSize ?? DEFAULT_IMAGE_SIZE;
    this.observer = options.observer ?? createLoggerObserver(logger);
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Builds the backends from the environment. Missing credentials throw
   * before any client is created.
   */
  static fromEnvironment(config: StoryConfig, env: Environment): StoryCreator {
    const credentials = resolveCredentials(env);
    const textService = createTextService(credentials.geminiApiKey, env.GEMINI_TEXT_MODEL);
    const imageService = createImageService(imageProviderConfigFromEnvironment(env));

    return new StoryCreator({
      config,
      textService,
      imageService,
      outputBaseDir: env.OUTPUT_DIR,
      imageSize: env.IMAGE_SIZE,
    });
  }

  async generateStoryText(): Promise<string> {
    const prompt = await buildStoryPrompt(this.config);
    this.observer({
      type: 'story.requested',
      model: this.textService.model,
      targetPages: this.config.storyLengthPages,
    });

    let text: string;
    try {
      text = (await this.textService.complete(prompt)).trim();
    } catch (error) {
      if (error instanceof TextGenerationError) throw error;
      throw new TextGenerationError({
        provider: this.textService.provider,
        message: `Story text generation failed: ${errorMessage(error)}`,
        cause: error,
      });
    }

    if (text.length < MIN_STORY_LENGTH) {
      throw new TextGenerationError({
        provider: this.textService.provider,
        message: `Generated story text is too short or empty (${text.length} characters)`,
      });
    }

    this.observer({ type: 'story.generated', length: text.length });
    return text;
  }

  async createBook(): Promise<Book> {
    const fullStory = await this.generateStoryText();

    const title = deriveBookTitle(fullStory, this.config.characters);
    const outputDir = resolveBookOutputDir(this.outputBaseDir, title, this.clock());
    const pageTexts = segmentStory(fullStory, this.config.storyLengthPages, this.observer);

    const book = await assembleBook({
      title,
      fullStory,
      config: this.config,
      outputDir,
      pageTexts,
      imageService: this.imageService,
      imageSize: this.imageSize,
      observer: this.observer,
    });

    await persistBook(book, this.observer);
    return book;
  }
}
