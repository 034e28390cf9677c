/**
 * Prompt Service
 * Loads prompt templates from JSON files and fills their {{variables}}
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { getPromptsPath } from '@/shared/path-utils.js';
import type { Character, Location, StoryConfig } from '@/shared/types.js';

export type PromptName = 'story-text' | 'page-image' | 'page-image-edit';

const promptTemplateSchema = z.object({
  systemPrompt: z.string().optional(),
  userPrompt: z.string(),
});

export type PromptTemplate = z.infer<typeof promptTemplateSchema>;

export class PromptService {
  private static cache = new Map<PromptName, Promise<PromptTemplate>>();

  /**
   * Load a prompt template from src/prompts (dist/prompts in production).
   * Templates are read once per process.
   */
  static loadPrompt(name: PromptName): Promise<PromptTemplate> {
    let pending = this.cache.get(name);
    if (!pending) {
      pending = this.readTemplate(name);
      this.cache.set(name, pending);
      // A failed read is not cached so the next call tries again
      void pending.catch(() => this.cache.delete(name));
    }
    return pending;
  }

  private static async readTemplate(name: PromptName): Promise<PromptTemplate> {
    const promptPath = join(getPromptsPath(), `${name}.json`);
    try {
      const content = await readFile(promptPath, 'utf-8');
      return promptTemplateSchema.parse(JSON.parse(content));
    } catch (error) {
      throw new Error(`Failed to load prompt template: ${name}`, { cause: error });
    }
  }

  /**
   * Replace {{variable}} placeholders. Unknown placeholders are left untouched
   * and substituted values are not scanned again.
   */
  static processPrompt(template: string, variables: Record<string, string>): string {
    return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) => variables[key] ?? match);
  }
}

export function describeLocation(location: Location): string {
  return location.details.length > 0
    ? `${location.setting}, featuring ${location.details.join(', ')}.`
    : `${location.setting}.`;
}

export function listCharacters(characters: readonly Character[]): string {
  return characters.map((c) => `- ${c.name}: ${c.description}`).join('\n');
}

export async function buildStoryPrompt(config: StoryConfig): Promise<string> {
  const template = await PromptService.loadPrompt('story-text');
  return PromptService.processPrompt(template.userPrompt, {
    ageRange: config.ageRange,
    theme: config.theme,
    characterList: listCharacters(config.characters),
    locationDescription: describeLocation(config.location),
    pageCount: String(config.storyLengthPages),
  });
}
