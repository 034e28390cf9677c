/**
 * Story brief schema and loader
 * The brief is a JSON document with snake_case keys; the rest of the code works
 * with the camelCase StoryConfig produced here.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { ConfigValidationError, errorMessage } from '@/shared/errors.js';
import type { StoryConfig } from '@/shared/types.js';

export const MIN_STORY_PAGES = 4;
export const MAX_STORY_PAGES = 20;
export const DEFAULT_STORY_PAGES = 8;

const nonEmpty = z.string().trim().min(1);

const characterSchema = z
  .object({
    name: nonEmpty,
    description: nonEmpty,
    image_path: z.string().trim().min(1).nullish(),
  })
  .transform((c) => ({
    name: c.name,
    description: c.description,
    ...(c.image_path ? { imagePath: c.image_path } : {}),
  }));

const locationSchema = z.object({
  setting: nonEmpty,
  details: z.array(nonEmpty).default([]),
});

export const storyConfigSchema = z
  .object({
    characters: z
      .array(characterSchema)
      .min(1, 'At least one character is required')
      .superRefine((characters, ctx) => {
        const seen = new Set<string>();
        characters.forEach((c, index) => {
          const key = c.name.toLowerCase();
          if (seen.has(key)) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              message: `Duplicate character name "${c.name}"`,
              path: [index, 'name'],
            });
          }
          seen.add(key);
        });
      }),
    theme: nonEmpty,
    age_range: nonEmpty,
    location: locationSchema,
    story_length_pages: z
      .number()
      .int()
      .min(MIN_STORY_PAGES)
      .max(MAX_STORY_PAGES)
      .default(DEFAULT_STORY_PAGES),
    image_style: nonEmpty,
  })
  .transform(
    (raw): StoryConfig => ({
      characters: raw.characters,
      theme: raw.theme,
      ageRange: raw.age_range,
      location: raw.location,
      storyLengthPages: raw.story_length_pages,
      imageStyle: raw.image_style,
    }),
  );

export function parseStoryConfig(data: unknown): StoryConfig {
  const result = storyConfigSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigValidationError(
      'Invalid story configuration',
      result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    );
  }
  return Object.freeze(result.data);
}

export async function loadStoryConfig(configPath: string): Promise<StoryConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigValidationError(`Configuration file not found or unreadable: ${configPath}`, [], {
      cause: error,
    });
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ConfigValidationError(
      `Error decoding JSON from ${configPath}: ${errorMessage(error)}`,
      [],
      { cause: error },
    );
  }

  return parseStoryConfig(data);
}

/**
 * Inverse of the schema transform, used when the configuration is written
 * back out next to the story.
 */
export function serializeStoryConfig(config: StoryConfig): Record<string, unknown> {
  return {
    characters: config.characters.map((c) => ({
      name: c.name,
      description: c.description,
      image_path: c.imagePath ?? null,
    })),
    theme: config.theme,
    age_range: config.ageRange,
    location: {
      setting: config.location.setting,
      details: [...config.location.details],
    },
    story_length_pages: config.storyLengthPages,
    image_style: config.imageStyle,
  };
}
