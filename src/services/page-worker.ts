/**
 * Page Worker
 * Produces one Page: plans the illustration, calls the image backend and
 * degrades to a text-only page when the image step fails.
 */

import path from 'path';
import type { IImageGenerationService } from '@/ai/interfaces.js';
import { ImageGenerationError, errorMessage } from '@/shared/errors.js';
import type { ImageRequest, Page, StoryConfig } from '@/shared/types.js';
import { pageImageFilename } from '@/shared/utils.js';
import { planPageImage } from './page-image-planner.js';
import { noopObserver, type PipelineObserver } from './pipeline-events.js';

export const DEFAULT_IMAGE_SIZE = '1536x1024';

export interface PageWorkerInput {
  pageText: string;
  pageNumber: number;
  outputDir: string;
  pageTexts: readonly string[];
  config: StoryConfig;
  imageService: IImageGenerationService | null;
  imageSize?: string;
  observer?: PipelineObserver;
}

function buildPage(input: PageWorkerInput, imagePath: string | null, imagePrompt: string | null): Page {
  return Object.freeze({
    pageNumber: input.pageNumber,
    text: input.pageText,
    imagePath,
    imagePrompt,
  });
}

async function dispatch(
  imageService: IImageGenerationService,
  request: ImageRequest,
  targetPath: string,
  imageSize: string,
): Promise<string | null> {
  if (request.mode === 'edit' && imageService.supportsEdit) {
    return imageService.edit(request.prompt, request.referenceImages, targetPath);
  }
  return imageService.generate(request.prompt, targetPath, imageSize);
}

/**
 * Never rejects for an image failure: the page is returned with
 * `imagePath: null` and the prompt that was tried.
 */
export async function runPageWorker(input: PageWorkerInput): Promise<Page> {
  const { pageNumber, imageService } = input;
  const observer = input.observer ?? noopObserver;

  let request: ImageRequest;
  try {
    request = await planPageImage({
      pageText: input.pageText,
      pageNumber,
      pageTexts: input.pageTexts,
      config: input.config,
      imageService,
      observer,
    });
  } catch (error) {
    // Without a plan there is no prompt to record
    observer({
      type: 'page.image-failed',
      pageNumber,
      prompt: '',
      error: new ImageGenerationError({
        provider: imageService?.provider ?? 'none',
        mode: 'generate',
        pageNumber,
        message: `Could not plan image for page ${pageNumber}: ${errorMessage(error)}`,
        cause: error,
      }),
    });
    return buildPage(input, null, null);
  }

  if (!imageService) {
    observer({ type: 'page.image-skipped', pageNumber });
    return buildPage(input, null, request.prompt);
  }

  const targetPath = path.join(input.outputDir, pageImageFilename(pageNumber));
  observer({
    type: 'page.image-requested',
    pageNumber,
    mode: request.mode,
    referenceCount: request.referenceImages.length,
  });

  let failure: unknown = null;
  let imagePath: string | null = null;
  try {
    imagePath = await dispatch(imageService, request, targetPath, input.imageSize ?? DEFAULT_IMAGE_SIZE);
  } catch (error) {
    failure = error;
  }

  if (!imagePath) {
    observer({
      type: 'page.image-failed',
      pageNumber,
      prompt: request.prompt,
      error: new ImageGenerationError({
        provider: imageService.provider,
        mode: request.mode,
        pageNumber,
        message: failure
          ? `Image ${request.mode} for page ${pageNumber} failed: ${errorMessage(failure)}`
          : `Image backend returned no image for page ${pageNumber}`,
        ...(failure !== null && { cause: failure }),
      }),
    });
    return buildPage(input, null, request.prompt);
  }

  observer({ type: 'page.image-saved', pageNumber, imagePath });
  return buildPage(input, imagePath, request.prompt);
}
