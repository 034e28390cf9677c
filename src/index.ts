#!/usr/bin/env node
/**
 * Command line entry point: reads the story brief and credentials, creates
 * one book and prints where it was written.
 */

import path from 'path';
import { getEnvironment } from '@/config/environment.js';
import { logger } from '@/config/logger.js';
import { loadStoryConfig } from '@/config/story-config.js';
import { StoryCreator } from '@/services/story-creator.js';
import { describeError } from '@/shared/errors.js';
import { ensureDir } from '@/shared/utils.js';

export async function runCreation(configPath?: string): Promise<number> {
  try {
    const env = getEnvironment();
    const storyConfig = await loadStoryConfig(configPath ?? env.STORY_CONFIG_PATH);
    logger.info('Loaded story configuration', {
      characters: storyConfig.characters.length,
      pages: storyConfig.storyLengthPages,
    });

    // Credentials are checked here, before the output folder exists
    const creator = StoryCreator.fromEnvironment(storyConfig, env);
    await ensureDir(env.OUTPUT_DIR);

    logger.info('Starting book creation process');
    const book = await creator.createBook();

    const illustrated = book.pages.filter((p) => p.imagePath !== null).length;
    console.log(`\nSuccess! Book '${book.title}' generated in folder: ${path.resolve(book.outputDir)}`);
    console.log(`${book.pages.length} pages, ${illustrated} illustrated. Story text and manifest are saved there.`);
    return 0;
  } catch (error) {
    logger.error('Book creation failed', { error: describeError(error) });
    console.error(`\nERROR: Book creation failed. ${describeError(error)}`);
    return 1;
  }
}

if (require.main === module) {
  runCreation(process.argv[2])
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    });
}
