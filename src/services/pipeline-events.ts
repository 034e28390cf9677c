/**
 * Pipeline events
 * The assembly pipeline reports what it does through an injected observer
 * instead of logging directly. createLoggerObserver() forwards events to winston.
 */

import type { ImageMode } from '@/shared/types.js';
import type { ImageGenerationError, PersistenceError } from '@/shared/errors.js';

export type PipelineEvent =
  | { type: 'story.requested'; model: string; targetPages: number }
  | { type: 'story.generated'; length: number }
  | { type: 'segmentation.sentences'; paragraphCount: number; sentenceCount: number; targetPages: number }
  | { type: 'segmentation.merge'; paragraphCount: number; targetPages: number }
  | { type: 'segmentation.completed'; pageCount: number; targetPages: number }
  | { type: 'page.mentions'; pageNumber: number; characters: string[] }
  | { type: 'page.reference-missing'; pageNumber: number; character: string; imagePath: string }
  | { type: 'page.capability-mismatch'; pageNumber: number; referenceCount: number; provider: string }
  | { type: 'page.image-requested'; pageNumber: number; mode: ImageMode; referenceCount: number }
  | { type: 'page.image-saved'; pageNumber: number; imagePath: string }
  | { type: 'page.image-failed'; pageNumber: number; prompt: string; error: ImageGenerationError }
  | { type: 'page.image-skipped'; pageNumber: number }
  | { type: 'page.worker-failed'; reason: string }
  | { type: 'book.output-dir'; outputDir: string; title: string }
  | { type: 'book.assembled'; title: string; pageCount: number; illustratedCount: number }
  | { type: 'book.persisted'; outputDir: string }
  | { type: 'book.persist-failed'; error: PersistenceError };

export type PipelineEventType = PipelineEvent['type'];

export type PipelineObserver = (event: PipelineEvent) => void;

export const noopObserver: PipelineObserver = () => undefined;

/** The part of a winston logger the observer writes to */
export interface EventLogger {
  info(message: string, meta?: Record<string, unknown>): unknown;
  warn(message: string, meta?: Record<string, unknown>): unknown;
  error(message: string, meta?: Record<string, unknown>): unknown;
}

/**
 * Forwards pipeline events to a winston logger at the matching level.
 */
export function createLoggerObserver(log: EventLogger): PipelineObserver {
  return (event) => {
    switch (event.type) {
      case 'story.requested':
        log.info('Generating story text', { model: event.model, targetPages: event.targetPages });
        break;
      case 'story.generated':
        log.info('Story text generated', { length: event.length });
        break;
      case 'segmentation.sentences':
        log.warn('Too few paragraphs, splitting story by sentences', {
          paragraphCount: event.paragraphCount,
          sentenceCount: event.sentenceCount,
          targetPages: event.targetPages,
        });
        break;
      case 'segmentation.merge':
        log.warn('More paragraphs than expected, merging shortest', {
          paragraphCount: event.paragraphCount,
          targetPages: event.targetPages,
        });
        break;
      case 'segmentation.completed':
        log.info('Split story into pages', { pageCount: event.pageCount, targetPages: event.targetPages });
        break;
      case 'page.mentions':
        log.info('Characters mentioned on page', {
          pageNumber: event.pageNumber,
          characters: event.characters,
        });
        break;
      case 'page.reference-missing':
        log.warn('Character image file not found, generating without it', {
          pageNumber: event.pageNumber,
          character: event.character,
          imagePath: event.imagePath,
        });
        break;
      case 'page.capability-mismatch':
        log.warn('Character images found but image backend cannot edit, generating from scratch', {
          pageNumber: event.pageNumber,
          referenceCount: event.referenceCount,
          provider: event.provider,
        });
        break;
      case 'page.image-requested':
        log.info('Requesting page image', {
          pageNumber: event.pageNumber,
          mode: event.mode,
          referenceCount: event.referenceCount,
        });
        break;
      case 'page.image-saved':
        log.info('Page image saved', { pageNumber: event.pageNumber, imagePath: event.imagePath });
        break;
      case 'page.image-failed':
        log.error('Failed to generate or edit page image', {
          pageNumber: event.pageNumber,
          mode: event.error.mode,
          provider: event.error.provider,
          error: event.error.message,
          prompt: event.prompt,
        });
        break;
      case 'page.image-skipped':
        log.warn('Image generator not available, page will be text-only', { pageNumber: event.pageNumber });
        break;
      case 'page.worker-failed':
        log.error('Page worker failed, page dropped from book', { reason: event.reason });
        break;
      case 'book.output-dir':
        log.info('Book output directory ready', { outputDir: event.outputDir, title: event.title });
        break;
      case 'book.assembled':
        log.info('Book assembled', {
          title: event.title,
          pageCount: event.pageCount,
          illustratedCount: event.illustratedCount,
        });
        break;
      case 'book.persisted':
        log.info('Saved story text and page manifest', { outputDir: event.outputDir });
        break;
      case 'book.persist-failed':
        log.error('Error saving book metadata', {
          target: event.error.target,
          error: event.error.message,
        });
        break;
    }
  };
}
