/**
 * Metadata Persister
 * Writes story.txt and pages_manifest.json next to the page images.
 */

import { readFile, writeFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { serializeStoryConfig } from '@/config/story-config.js';
import { PersistenceError, errorMessage } from '@/shared/errors.js';
import type { Book } from '@/shared/types.js';
import { noopObserver, type PipelineObserver } from './pipeline-events.js';

export const STORY_FILENAME = 'story.txt';
export const MANIFEST_FILENAME = 'pages_manifest.json';

const manifestEntrySchema = z.object({
  page: z.number().int().positive(),
  text: z.string(),
  image_prompt: z.string().nullable(),
  image_filename: z.string().nullable(),
});

export type ManifestEntry = z.infer<typeof manifestEntrySchema>;

/**
 * One entry per page, in page order. Only the image's base filename is kept
 * so the manifest stays valid when the folder is moved.
 */
export function buildManifest(book: Book): ManifestEntry[] {
  return [...book.pages]
    .sort((a, b) => a.pageNumber - b.pageNumber)
    .map((p) => ({
      page: p.pageNumber,
      text: p.text,
      image_prompt: p.imagePrompt,
      image_filename: p.imagePath ? path.basename(p.imagePath) : null,
    }));
}

export function renderStoryFile(book: Book): string {
  return (
    `Title: ${book.title}\n\n` +
    '--- Story Config ---\n' +
    JSON.stringify(serializeStoryConfig(book.config), null, 2) +
    '\n\n--- Full Story Text ---\n' +
    book.fullStory
  );
}

async function writeTarget(target: string, content: string): Promise<void> {
  try {
    await writeFile(target, content, 'utf-8');
  } catch (error) {
    throw new PersistenceError({
      target,
      message: `Could not write ${path.basename(target)}: ${errorMessage(error)}`,
      cause: error,
    });
  }
}

/**
 * Best effort: a failure is reported and `false` returned. Page images already
 * on disk are left in place.
 */
export async function persistBook(book: Book, observer: PipelineObserver = noopObserver): Promise<boolean> {
  try {
    await writeTarget(path.join(book.outputDir, STORY_FILENAME), renderStoryFile(book));
    await writeTarget(
      path.join(book.outputDir, MANIFEST_FILENAME),
      JSON.stringify(buildManifest(book), null, 2),
    );
    observer({ type: 'book.persisted', outputDir: book.outputDir });
    return true;
  } catch (error) {
    const failure =
      error instanceof PersistenceError
        ? error
        : new PersistenceError({ target: book.outputDir, message: errorMessage(error), cause: error });
    observer({ type: 'book.persist-failed', error: failure });
    return false;
  }
}

export async function readManifest(manifestPath: string): Promise<ManifestEntry[]> {
  const raw = await readFile(manifestPath, 'utf-8');
  return z.array(manifestEntrySchema).parse(JSON.parse(raw));
}
