/**
 * Book Assembler
 * Runs one page worker per chunk concurrently, waits for all of them and
 * builds the Book with its pages in page order.
 */

import path from 'path';
import type { IImageGenerationService } from '@/ai/interfaces.js';
import { errorMessage } from '@/shared/errors.js';
import type { Book, Character, Page, StoryConfig } from '@/shared/types.js';
import { ensureDir, formatTimestamp, sanitizeFilename } from '@/shared/utils.js';
import { runPageWorker } from './page-worker.js';
import { noopObserver, type PipelineObserver } from './pipeline-events.js';

export const MAX_TITLE_LENGTH = 30;

/**
 * Title from the text before the first period, made filesystem safe.
 * Falls back to `Story_<first character>` when nothing usable remains.
 */
export function deriveBookTitle(fullStory: string, characters: readonly Character[]): string {
  const firstSentence = fullStory.split('.')[0] ?? '';
  const title = sanitizeFilename(firstSentence).slice(0, MAX_TITLE_LENGTH);
  if (title) return title;

  const fallbackName = characters[0]?.name ?? 'Untitled';
  return `Story_${sanitizeFilename(fallbackName) || 'Untitled'}`;
}

/** `<base>/<YYYYMMDD_HHMMSS>/<title>` */
export function resolveBookOutputDir(baseDir: string, title: string, now: Date): string {
  return path.join(baseDir, formatTimestamp(now), title);
}

export interface AssembleBookInput {
  title: string;
  fullStory: string;
  config: StoryConfig;
  outputDir: string;
  pageTexts: readonly string[];
  imageService: IImageGenerationService | null;
  imageSize?: string;
  observer?: PipelineObserver;
}

export async function assembleBook(input: AssembleBookInput): Promise<Book> {
  const { pageTexts, outputDir } = input;
  const observer = input.observer ?? noopObserver;

  await ensureDir(outputDir);
  observer({ type: 'book.output-dir', outputDir, title: input.title });

  // Pages are recorded in the order their workers finish
  const completed: Page[] = [];
  const tasks = pageTexts.map((pageText, index) =>
    runPageWorker({
      pageText,
      pageNumber: index + 1,
      outputDir,
      pageTexts,
      config: input.config,
      imageService: input.imageService,
      ...(input.imageSize && { imageSize: input.imageSize }),
      observer,
    }).then((page) => {
      completed.push(page);
      return page;
    }),
  );

  const settled = await Promise.allSettled(tasks);
  for (const result of settled) {
    if (result.status === 'rejected') {
      observer({ type: 'page.worker-failed', reason: errorMessage(result.reason) });
    }
  }

  const pages = [...completed].sort((a, b) => a.pageNumber - b.pageNumber);

  const book: Book = Object.freeze({
    title: input.title,
    config: input.config,
    fullStory: input.fullStory,
    outputDir,
    pages: Object.freeze(pages),
  });

  observer({
    type: 'book.assembled',
    title: book.title,
    pageCount: pages.length,
    illustratedCount: pages.filter((p) => p.imagePath !== null).length,
  });
  return book;
}
