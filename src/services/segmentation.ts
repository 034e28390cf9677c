/**
 * Story Segmentation
 * Splits generated prose into a fixed number of page-sized chunks.
 *
 * Paragraphs are used as pages when their count is close to the target. Too few
 * paragraphs fall back to sentence buckets; too many are merged, shortest first.
 */

import { noopObserver, type PipelineObserver } from './pipeline-events.js';

/**
 * Split text into paragraphs on blank lines, dropping empty ones
 */
export function splitByParagraphs(text: string): string[] {
  return text
    .split(/\n\s*\n/)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

/**
 * Split text into sentences on `.`, `!` and `?`, keeping the terminator.
 * Trailing text without a terminator becomes its own sentence.
 */
export function splitBySentences(text: string): string[] {
  const flattened = text.replace(/\r?\n/g, ' ');
  const matches = flattened.match(/[^.!?]+(?:[.!?]+|$)/g) ?? [];
  return matches.map((s) => s.trim()).filter((s) => s.length > 0 && !/^[.!?]+$/.test(s));
}

/**
 * Groups sentences into at most `targetPages` buckets of equal size
 */
export function bucketSentences(sentences: string[], targetPages: number): string[] {
  const perPage = Math.max(1, Math.floor(sentences.length / targetPages));
  const pages: string[] = [];
  for (let i = 0; i < sentences.length && pages.length < targetPages; i += perPage) {
    pages.push(sentences.slice(i, i + perPage).join(' '));
  }
  return pages;
}

/**
 * Repeatedly folds the shortest paragraph into its predecessor (or, for the
 * first paragraph, pulls the second one into it) until `targetPages` remain.
 * Ties go to the earliest index.
 */
export function mergeShortestParagraphs(paragraphs: string[], targetPages: number): string[] {
  const merged = [...paragraphs];

  while (merged.length > targetPages && merged.length > 1) {
    let shortestIdx = 0;
    for (let i = 1; i < merged.length; i++) {
      if ((merged[i] ?? '').length < (merged[shortestIdx] ?? '').length) {
        shortestIdx = i;
      }
    }

    if (shortestIdx > 0) {
      const [absorbed] = merged.splice(shortestIdx, 1);
      merged[shortestIdx - 1] = `${merged[shortestIdx - 1]}\n${absorbed}`;
    } else {
      const [absorbed] = merged.splice(1, 1);
      merged[0] = `${merged[0]}\n${absorbed}`;
    }
  }

  return merged;
}

export function segmentStory(
  fullText: string,
  targetPages: number,
  observer: PipelineObserver = noopObserver,
): string[] {
  if (!Number.isInteger(targetPages) || targetPages < 1) {
    throw new RangeError(`targetPages must be a positive integer, got ${targetPages}`);
  }

  let pages = splitByParagraphs(fullText);

  if (pages.length <= targetPages / 2) {
    const sentences = splitBySentences(fullText);
    observer({
      type: 'segmentation.sentences',
      paragraphCount: pages.length,
      sentenceCount: sentences.length,
      targetPages,
    });
    pages = bucketSentences(sentences, targetPages);
  } else if (pages.length > targetPages * 1.5) {
    observer({ type: 'segmentation.merge', paragraphCount: pages.length, targetPages });
    pages = mergeShortestParagraphs(pages, targetPages);
  }

  if (pages.length > targetPages) {
    pages = pages.slice(0, targetPages);
  }

  observer({ type: 'segmentation.completed', pageCount: pages.length, targetPages });
  return pages;
}
